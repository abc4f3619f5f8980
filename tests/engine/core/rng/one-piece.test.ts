// Tests for @/engine/core/rng/one-piece.ts
import { OneShapeRng } from "@/engine/core/rng/one-piece";
import { TETROMINOES } from "@/engine/core/shapes";

describe("@/engine/core/rng/one-piece", () => {
  test("always returns the same shape and itself", () => {
    const rng = new OneShapeRng(TETROMINOES.S);
    const first = rng.getNextShape();
    const second = first.newRng.getNextShape();

    expect(first.shape).toBe(TETROMINOES.S);
    expect(second.shape).toBe(TETROMINOES.S);
    expect(first.newRng).toBe(rng);
  });
});
