import { createGrid } from "../core/grid";
import { asTick } from "../core/types";

import type { MatchConfig } from "../config";
import type { ShapeRandomGenerator } from "../core/rng/interface";
import type { Grid, Piece, Tick } from "../core/types";
import type { MatchEvent } from "../events";
import type { InputIntents } from "../input";

export type MatchContext = Readonly<{
  config: MatchConfig;
  grid: Grid; // settled blocks plus the active piece stamped for rendering
  piece: Piece | null;
  fallAccumulator: number; // seconds since the last gravity step
  spawnAccumulator: number; // seconds spent waiting to spawn
  rng: ShapeRandomGenerator;
  tick: Tick;
  events: ReadonlyArray<MatchEvent>; // produced by the most recent tick
}>;

export type TickEvent = {
  type: "tick";
  delta: number; // seconds since the previous tick
  input: InputIntents;
};

export function createMatchContext(
  config: MatchConfig,
  rng: ShapeRandomGenerator,
  grid: Grid = createGrid(config.width, config.height),
): MatchContext {
  if (grid.width !== config.width || grid.height !== config.height) {
    throw new Error("Initial grid does not match configured dimensions");
  }
  return {
    config,
    events: [],
    fallAccumulator: 0,
    grid,
    piece: null,
    rng,
    spawnAccumulator: 0,
    tick: asTick(0),
  };
}

// Negative, NaN and infinite deltas advance nothing
export function elapsedSeconds(event: TickEvent): number {
  return Number.isFinite(event.delta) && event.delta > 0 ? event.delta : 0;
}
