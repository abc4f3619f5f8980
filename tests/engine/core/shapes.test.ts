// Tests for @/engine/core/shapes.ts
import { ALL_TETROMINOES, TETROMINOES, createShape } from "@/engine/core/shapes";

describe("@/engine/core/shapes", () => {
  test("seven tetrominoes of four distinct cells each", () => {
    expect(ALL_TETROMINOES.map((s) => s.id)).toEqual([
      "I",
      "O",
      "T",
      "S",
      "Z",
      "J",
      "L",
    ]);
    for (const shape of ALL_TETROMINOES) {
      const keys = new Set(shape.cells.map(([x, y]) => `${String(x)},${String(y)}`));
      expect(keys.size).toBe(4);
    }
  });

  test("every tetromino contains its pivot", () => {
    for (const shape of Object.values(TETROMINOES)) {
      expect(shape.cells).toContainEqual([0, 0]);
    }
  });

  test("createShape copies the offsets", () => {
    const cells: Array<readonly [number, number]> = [
      [0, 0],
      [1, 0],
    ];
    const shape = createShape("domino", cells);
    cells.push([2, 0]);

    expect(shape.id).toBe("domino");
    expect(shape.cells).toEqual([
      [0, 0],
      [1, 0],
    ]);
  });

  test("createShape validates its offsets", () => {
    expect(() => createShape("none", [])).toThrow(
      "Shape must have at least one cell",
    );
    expect(() => createShape("half", [[0.5, 0]])).toThrow(
      "Shape offsets must be integers",
    );
  });
});
