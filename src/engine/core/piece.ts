import {
  type CeilingPolicy,
  type Cell,
  type Grid,
  type Piece,
  type Rotation,
  type Shape,
  assertRotation,
  idx,
} from "./types";

export type MoveResult = {
  piece: Piece;
  applied: boolean;
};

export function createPiece(
  shape: Shape,
  x: number,
  y: number,
  rotation: Rotation = 0,
): Piece {
  return { rotation, shape, x, y };
}

export function nextRotation(rotation: Rotation): Rotation {
  const next = (rotation + 1) % 4;
  assertRotation(next);
  return next;
}

// Quarter turns clockwise about the local origin
export function rotateOffset([x, y]: Cell, rotation: number): Cell {
  switch (rotation) {
    case 0:
      return [x, y];
    case 1:
      return [y, -x];
    case 2:
      return [-x, -y];
    case 3:
      return [-y, x];
    default:
      throw new Error(`Invalid rotation index: ${String(rotation)}`);
  }
}

export function worldCells(piece: Piece): ReadonlyArray<Cell> {
  return piece.shape.cells.map((offset) => {
    const [dx, dy] = rotateOffset(offset, piece.rotation);
    return [piece.x + dx, piece.y + dy] as const;
  });
}

export function hasCollision(
  grid: Grid,
  piece: Piece,
  ceiling: CeilingPolicy = "closed",
): boolean {
  for (const [x, y] of worldCells(piece)) {
    if (x < 0 || x >= grid.width || y < 0) return true;
    if (y >= grid.height) {
      if (ceiling === "closed") return true;
      continue; // open spawn zone above the grid
    }
    if (grid.cells[idx(grid, x, y)] === true) return true;
  }
  return false;
}

/**
 * Sweep the piece by (dx, dy) one cell at a time, alternating x then y. Stops
 * at the first step that collides and keeps the progress made before it.
 * Throws unless both offsets are integers.
 */
export function tryOffset(
  grid: Grid,
  piece: Piece,
  dx: number,
  dy: number,
  ceiling: CeilingPolicy = "closed",
): MoveResult {
  if (!Number.isInteger(dx) || !Number.isInteger(dy)) {
    throw new Error(`Invalid offset: (${String(dx)}, ${String(dy)})`);
  }
  const stepX = Math.sign(dx);
  const stepY = Math.sign(dy);
  let remainingX = dx;
  let remainingY = dy;
  let current = piece;

  while (remainingX !== 0 || remainingY !== 0) {
    if (remainingX !== 0) {
      const candidate = { ...current, x: current.x + stepX };
      if (hasCollision(grid, candidate, ceiling)) {
        return { applied: false, piece: current };
      }
      current = candidate;
      remainingX -= stepX;
    }

    if (remainingY !== 0) {
      const candidate = { ...current, y: current.y + stepY };
      if (hasCollision(grid, candidate, ceiling)) {
        return { applied: false, piece: current };
      }
      current = candidate;
      remainingY -= stepY;
    }
  }

  return { applied: true, piece: current };
}

// No kick search: a colliding rotation is simply refused
export function tryRotate(
  grid: Grid,
  piece: Piece,
  ceiling: CeilingPolicy = "closed",
): MoveResult {
  const candidate = { ...piece, rotation: nextRotation(piece.rotation) };
  if (hasCollision(grid, candidate, ceiling)) {
    return { applied: false, piece };
  }
  return { applied: true, piece: candidate };
}

// Lowest world row the piece occupies
export function bottomRow(piece: Piece): number {
  return Math.min(...worldCells(piece).map(([, y]) => y));
}
