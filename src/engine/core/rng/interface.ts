import { type Shape } from "../types";

/**
 * Source of the next shape to spawn.
 * Implementations are immutable: each draw returns the generator to use next,
 * so a match replays exactly from the same starting generator.
 */
export type ShapeRandomGenerator = {
  getNextShape(): {
    shape: Shape;
    newRng: ShapeRandomGenerator;
  };
};
