import { topOutRow } from "../config";
import { isRowOccupied, stampCells } from "../core/grid";
import { worldCells } from "../core/piece";
import { incrementTick, type Grid } from "../core/types";

import type { MatchContext } from "./context";

// Grid without the active piece's rendering marks
export function settledGrid(ctx: MatchContext): Grid {
  return ctx.piece ? stampCells(ctx.grid, worldCells(ctx.piece), false) : ctx.grid;
}

/**
 * True once a settled block reaches the top-out row. The active piece is
 * ignored so that it can fall through that row freely.
 */
export function isEndConditionMet(ctx: MatchContext): boolean {
  return isRowOccupied(settledGrid(ctx), topOutRow(ctx.config));
}

// Final transition; grid and piece stay as they are so the last frame still shows them
export function haltOnStack(ctx: MatchContext): MatchContext {
  return {
    ...ctx,
    events: [{ kind: "TopOut", reason: "stack", tick: ctx.tick }],
    tick: incrementTick(ctx.tick),
  };
}
