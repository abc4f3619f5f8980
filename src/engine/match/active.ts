import { eliminateFullRows, stampCells } from "../core/grid";
import { tryOffset, tryRotate, worldCells } from "../core/piece";
import { incrementTick, type Grid, type Piece } from "../core/types";
import { horizontalIntent } from "../input";

import { elapsedSeconds, type MatchContext, type TickEvent } from "./context";

import type { MatchEvent } from "../events";

export type SteerResult = {
  ctx: MatchContext; // grid here is settled, the piece is not stamped
  landed: boolean;
};

function dropOne(
  grid: Grid,
  piece: Piece,
  ctx: MatchContext,
  source: "gravity" | "softDrop",
  events: Array<MatchEvent>,
): Piece | null {
  const r = tryOffset(grid, piece, 0, -1, ctx.config.ceiling);
  if (!r.applied) return null;
  events.push({
    fromY: piece.y,
    kind: "MovedDown",
    source,
    tick: ctx.tick,
    toY: r.piece.y,
  });
  return r.piece;
}

/**
 * One tick of the active phase up to, but not including, lock or re-stamp:
 * unstamp, clear full rows, gravity, then down, left/right and rotate intents.
 * A failed downward step marks the piece landed. Left/right and rotate still
 * apply after that, and a landed piece locks wherever they leave it.
 */
export function steerActive(ctx: MatchContext, event: TickEvent): SteerResult {
  const current = ctx.piece;
  if (!current) return { ctx, landed: false };

  const events: Array<MatchEvent> = [];
  const ceiling = ctx.config.ceiling;

  const cleared = eliminateFullRows(
    stampCells(ctx.grid, worldCells(current), false),
  );
  const grid = cleared.grid;
  if (cleared.cleared > 0) {
    events.push({ kind: "LinesCleared", rows: cleared.rows, tick: ctx.tick });
  }

  let piece = current;
  let landed = false;

  let fallAccumulator = ctx.fallAccumulator + elapsedSeconds(event);
  if (fallAccumulator > ctx.config.fallDelaySeconds) {
    fallAccumulator = 0;
    const dropped = dropOne(grid, piece, ctx, "gravity", events);
    if (dropped) piece = dropped;
    else landed = true;
  }

  const { input } = event;

  if (!landed && input.down) {
    const dropped = dropOne(grid, piece, ctx, "softDrop", events);
    if (dropped) piece = dropped;
    else landed = true;
  }

  const dir = horizontalIntent(input);
  if (dir !== 0) {
    const r = tryOffset(grid, piece, dir, 0, ceiling);
    if (r.applied) {
      events.push({
        fromX: piece.x,
        kind: dir < 0 ? "MovedLeft" : "MovedRight",
        tick: ctx.tick,
        toX: r.piece.x,
      });
      piece = r.piece;
    }
  }

  if (input.rotate) {
    const r = tryRotate(grid, piece, ceiling);
    if (r.applied) {
      events.push({ kind: "Rotated", rotation: r.piece.rotation, tick: ctx.tick });
      piece = r.piece;
    }
  }

  return {
    ctx: { ...ctx, events, fallAccumulator, grid, piece },
    landed,
  };
}

export function landsThisTick(ctx: MatchContext, event: TickEvent): boolean {
  return steerActive(ctx, event).landed;
}

// Piece keeps falling: stamp it back for rendering
export function settleActive(
  ctx: MatchContext,
  event: TickEvent,
): MatchContext {
  const { ctx: s } = steerActive(ctx, event);
  if (!s.piece) return s;
  return {
    ...s,
    grid: stampCells(s.grid, worldCells(s.piece), true),
    tick: incrementTick(s.tick),
  };
}

// Piece landed: write it into the grid for good and clear completed rows
export function lockActive(ctx: MatchContext, event: TickEvent): MatchContext {
  const { ctx: s } = steerActive(ctx, event);
  const piece = s.piece;
  if (!piece) return s;

  const cells = worldCells(piece);
  const events: Array<MatchEvent> = [
    ...s.events,
    { cells, kind: "Locked", shapeId: piece.shape.id, tick: s.tick },
  ];

  const cleared = eliminateFullRows(stampCells(s.grid, cells, true));
  if (cleared.cleared > 0) {
    events.push({ kind: "LinesCleared", rows: cleared.rows, tick: s.tick });
  }

  return {
    ...s,
    events,
    fallAccumulator: 0,
    grid: cleared.grid,
    piece: null,
    spawnAccumulator: 0,
    tick: incrementTick(s.tick),
  };
}
