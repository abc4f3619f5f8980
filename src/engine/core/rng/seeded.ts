import { ALL_TETROMINOES } from "../shapes";

import { type ShapeRandomGenerator } from "./interface";
import { type Shape } from "../types";

export type UniformRngState = {
  seed: string;
  internalSeed: number;
};

// Simple string hash (FNV-1a, 32-bit) for stable seeds
export function hashString(str: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < str.length; i++) {
    h ^= str.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0; // unsigned 32-bit
}

// Linear congruential step over 32-bit state
export function nextRandom(seed: number): number {
  return (Math.imul(seed, 1664525) + 1013904223) >>> 0;
}

export function createUniformState(seed = "default"): UniformRngState {
  return { internalSeed: hashString(seed), seed };
}

// Draw one shape with equal probability from the pool
export function drawUniform(
  state: UniformRngState,
  pool: ReadonlyArray<Shape>,
): { shape: Shape; nextState: UniformRngState } {
  const internalSeed = nextRandom(state.internalSeed);
  // High bits mapped to [0, n) to reduce modulo bias
  const index = Math.floor((internalSeed / 4294967296) * pool.length);
  const shape = pool[index];
  if (shape === undefined) {
    throw new Error("Shape pool is empty");
  }
  return { nextState: { ...state, internalSeed }, shape };
}

export class UniformRngImpl implements ShapeRandomGenerator {
  constructor(
    private readonly state: UniformRngState,
    private readonly pool: ReadonlyArray<Shape>,
  ) {
    if (pool.length === 0) throw new Error("Shape pool must not be empty");
  }

  getNextShape(): { shape: Shape; newRng: ShapeRandomGenerator } {
    const result = drawUniform(this.state, this.pool);
    return {
      newRng: new UniformRngImpl(result.nextState, this.pool),
      shape: result.shape,
    };
  }
}

/**
 * Seeded generator choosing uniformly among the given shapes (all seven
 * tetrominoes by default).
 */
export function createUniformRng(
  seed = "default",
  pool: ReadonlyArray<Shape> = ALL_TETROMINOES,
): ShapeRandomGenerator {
  return new UniformRngImpl(createUniformState(seed), pool);
}
