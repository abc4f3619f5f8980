import { stampCells } from "../core/grid";
import { bottomRow, createPiece, hasCollision, worldCells } from "../core/piece";
import {
  incrementTick,
  type CeilingPolicy,
  type Grid,
  type Piece,
  type Shape,
} from "../core/types";

import { elapsedSeconds, type MatchContext, type TickEvent } from "./context";

import type { ShapeRandomGenerator } from "../core/rng/interface";

export type SpawnPlan =
  | { kind: "waiting"; spawnAccumulator: number }
  | { kind: "spawned"; piece: Piece; rng: ShapeRandomGenerator }
  | { kind: "blocked"; shape: Shape; rng: ShapeRandomGenerator };

/**
 * Anchor a new piece at the horizontal centre of the top row, then walk it
 * down one row at a time while it collides. Returns null when it reaches the
 * floor without finding a free position.
 */
export function placeSpawn(
  grid: Grid,
  shape: Shape,
  ceiling: CeilingPolicy,
): Piece | null {
  let piece = createPiece(shape, Math.floor(grid.width / 2), grid.height - 1);
  while (hasCollision(grid, piece, ceiling)) {
    if (bottomRow(piece) <= 0) return null;
    piece = { ...piece, y: piece.y - 1 };
  }
  return piece;
}

export function planSpawn(ctx: MatchContext, event: TickEvent): SpawnPlan {
  const spawnAccumulator = ctx.spawnAccumulator + elapsedSeconds(event);
  if (spawnAccumulator <= ctx.config.spawnDelaySeconds) {
    return { kind: "waiting", spawnAccumulator };
  }

  const { shape, newRng } = ctx.rng.getNextShape();
  const piece = placeSpawn(ctx.grid, shape, ctx.config.ceiling);
  if (!piece) return { kind: "blocked", rng: newRng, shape };
  return { kind: "spawned", piece, rng: newRng };
}

export function isSpawnDue(ctx: MatchContext, event: TickEvent): boolean {
  return planSpawn(ctx, event).kind === "spawned";
}

export function isSpawnBlocked(ctx: MatchContext, event: TickEvent): boolean {
  return planSpawn(ctx, event).kind === "blocked";
}

function isPlanOf<K extends SpawnPlan["kind"]>(
  plan: SpawnPlan,
  kind: K,
): plan is Extract<SpawnPlan, { kind: K }> {
  return plan.kind === kind;
}

// Guards and reducers each call planSpawn; a pure generator keeps them in step
function expectPlan<K extends SpawnPlan["kind"]>(
  plan: SpawnPlan,
  kind: K,
): Extract<SpawnPlan, { kind: K }> {
  const actual = plan.kind;
  if (!isPlanOf(plan, kind)) {
    throw new Error(
      `Spawn plan changed between guard and reducer: expected ${kind}, got ${actual}`,
    );
  }
  return plan;
}

export function waitForSpawn(
  ctx: MatchContext,
  event: TickEvent,
): MatchContext {
  const plan = expectPlan(planSpawn(ctx, event), "waiting");
  return {
    ...ctx,
    events: [],
    spawnAccumulator: plan.spawnAccumulator,
    tick: incrementTick(ctx.tick),
  };
}

export function spawnActive(ctx: MatchContext, event: TickEvent): MatchContext {
  const plan = expectPlan(planSpawn(ctx, event), "spawned");

  const { piece } = plan;
  return {
    ...ctx,
    events: [
      {
        kind: "PieceSpawned",
        shapeId: piece.shape.id,
        tick: ctx.tick,
        x: piece.x,
        y: piece.y,
      },
    ],
    fallAccumulator: 0,
    grid: stampCells(ctx.grid, worldCells(piece), true),
    piece,
    rng: plan.rng,
    spawnAccumulator: 0,
    tick: incrementTick(ctx.tick),
  };
}

// Nowhere to put the new piece; the grid is left untouched
export function refuseSpawn(ctx: MatchContext, event: TickEvent): MatchContext {
  const plan = expectPlan(planSpawn(ctx, event), "blocked");
  return {
    ...ctx,
    events: [{ kind: "TopOut", reason: "spawnBlocked", tick: ctx.tick }],
    rng: plan.rng,
    spawnAccumulator: 0,
    tick: incrementTick(ctx.tick),
  };
}
