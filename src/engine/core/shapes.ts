import { type Cell, type Shape } from "./types";

export type TetrominoId = "I" | "O" | "T" | "S" | "Z" | "J" | "L";

// Offsets around the rotation pivot at [0, 0]; y grows upward
export const TETROMINOES: Readonly<Record<TetrominoId, Shape>> = {
  I: {
    cells: [
      [-1, 0],
      [0, 0],
      [1, 0],
      [2, 0],
    ],
    id: "I",
  },
  J: {
    cells: [
      [-1, 1],
      [-1, 0],
      [0, 0],
      [1, 0],
    ],
    id: "J",
  },
  L: {
    cells: [
      [-1, 0],
      [0, 0],
      [1, 0],
      [1, 1],
    ],
    id: "L",
  },
  O: {
    cells: [
      [0, 0],
      [1, 0],
      [0, 1],
      [1, 1],
    ],
    id: "O",
  },
  S: {
    cells: [
      [-1, 0],
      [0, 0],
      [0, 1],
      [1, 1],
    ],
    id: "S",
  },
  T: {
    cells: [
      [-1, 0],
      [0, 0],
      [1, 0],
      [0, 1],
    ],
    id: "T",
  },
  Z: {
    cells: [
      [-1, 1],
      [0, 1],
      [0, 0],
      [1, 0],
    ],
    id: "Z",
  },
};

export const ALL_TETROMINOES: ReadonlyArray<Shape> = [
  TETROMINOES.I,
  TETROMINOES.O,
  TETROMINOES.T,
  TETROMINOES.S,
  TETROMINOES.Z,
  TETROMINOES.J,
  TETROMINOES.L,
];

export function createShape(id: string, cells: ReadonlyArray<Cell>): Shape {
  if (cells.length === 0) throw new Error("Shape must have at least one cell");
  for (const [dx, dy] of cells) {
    if (!Number.isInteger(dx) || !Number.isInteger(dy)) {
      throw new Error("Shape offsets must be integers");
    }
  }
  return { cells: cells.map(([dx, dy]) => [dx, dy] as const), id };
}
