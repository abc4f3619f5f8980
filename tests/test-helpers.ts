/**
 * @fileoverview Shared test helper functions for blockfall tests
 */

import { createMatchConfig, type MatchConfig } from "@/engine/config";
import { createGrid, gridRows, stampCells } from "@/engine/core/grid";
import { createShape } from "@/engine/core/shapes";
import { type Cell, type Grid } from "@/engine/core/types";
import { NO_INPUT, type InputIntents } from "@/engine/input";
import { MatchService, type MatchOptions } from "@/engine/match/service";
import { OneShapeRng } from "@/engine/core/rng/one-piece";

import type { MatchEvent } from "@/engine/events";

// Single-cell and vertical bar shapes for scenarios
export const DOT = createShape("dot", [[0, 0]]);
export const BAR = createShape("bar", [
  [0, 0],
  [0, 1],
  [0, 2],
  [0, 3],
]);

/**
 * Build a grid from rows written top row first; "#" is occupied.
 *
 * @example
 * ```typescript
 * const grid = gridFromRows([
 *   "....",
 *   "#..#",
 * ]);
 * ```
 */
export function gridFromRows(rows: ReadonlyArray<string>): Grid {
  const height = rows.length;
  const width = rows[0]?.length ?? 0;
  const cells: Array<Cell> = [];
  rows.forEach((row, i) => {
    const y = height - 1 - i;
    [...row].forEach((ch, x) => {
      if (ch === "#") cells.push([x, y]);
    });
  });
  return stampCells(createGrid(width, height), cells, true);
}

// Inverse of gridFromRows
export function gridToRows(grid: Grid): Array<string> {
  return gridRows(grid).map((row) => row.map((c) => (c ? "#" : ".")).join(""));
}

// Fill row y, leaving the listed columns empty
export function fillRow(
  grid: Grid,
  y: number,
  except: ReadonlyArray<number> = [],
): Grid {
  const cells: Array<Cell> = [];
  for (let x = 0; x < grid.width; x++) {
    if (!except.includes(x)) cells.push([x, y]);
  }
  return stampCells(grid, cells, true);
}

export function createTestConfig(
  overrides: Partial<MatchConfig> = {},
): MatchConfig {
  return createMatchConfig({
    fallDelaySeconds: 1,
    spawnDelaySeconds: 0.5,
    ...overrides,
  });
}

export function createTestMatch(
  overrides: Partial<MatchOptions> = {},
): MatchService {
  return new MatchService({
    config: createTestConfig(),
    rng: new OneShapeRng(DOT),
    ...overrides,
  });
}

/**
 * Tick the match n times with the same delta and input.
 * Returns every event produced along the way.
 */
export function runTicks(
  match: MatchService,
  n: number,
  delta: number,
  input: InputIntents = NO_INPUT,
): Array<MatchEvent> {
  const all: Array<MatchEvent> = [];
  for (let i = 0; i < n; i++) {
    match.tick(delta, input);
    all.push(...match.lastEvents);
  }
  return all;
}

// Tick until the match is over or the limit is reached; returns ticks taken
export function tickUntilOver(
  match: MatchService,
  delta: number,
  limit = 500,
): number {
  let ticks = 0;
  while (!match.isOver && ticks < limit) {
    match.tick(delta);
    ticks++;
  }
  return ticks;
}
