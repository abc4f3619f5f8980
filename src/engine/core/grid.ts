import { type Cell, type Grid, idx, isInBounds } from "./types";

export function createGrid(width: number, height: number): Grid {
  if (!Number.isInteger(width) || width <= 0) {
    throw new Error("Grid width must be a positive integer");
  }
  if (!Number.isInteger(height) || height <= 0) {
    throw new Error("Grid height must be a positive integer");
  }
  return {
    cells: new Array<boolean>(width * height).fill(false),
    height,
    width,
  };
}

// Occupancy at (x, y), or null when the point lies outside the grid
export function getCell(grid: Grid, x: number, y: number): boolean | null {
  if (!isInBounds(grid, x, y)) return null;
  return grid.cells[idx(grid, x, y)] ?? false;
}

// Returns the updated grid, or null when the point lies outside the grid
export function setCell(
  grid: Grid,
  x: number,
  y: number,
  value: boolean,
): Grid | null {
  if (!isInBounds(grid, x, y)) return null;
  const cells = [...grid.cells];
  cells[idx(grid, x, y)] = value;
  return { ...grid, cells };
}

// Write value into every in-bounds cell; out-of-bounds cells are skipped
export function stampCells(
  grid: Grid,
  cells: ReadonlyArray<Cell>,
  value: boolean,
): Grid {
  const next = [...grid.cells];
  for (const [x, y] of cells) {
    if (!isInBounds(grid, x, y)) continue;
    next[idx(grid, x, y)] = value;
  }
  return { ...grid, cells: next };
}

export function isRowFull(grid: Grid, y: number): boolean {
  if (y < 0 || y >= grid.height) return false;
  for (let x = 0; x < grid.width; x++) {
    if (grid.cells[idx(grid, x, y)] !== true) return false;
  }
  return true;
}

export function isRowOccupied(grid: Grid, y: number): boolean {
  if (y < 0 || y >= grid.height) return false;
  for (let x = 0; x < grid.width; x++) {
    if (grid.cells[idx(grid, x, y)] === true) return true;
  }
  return false;
}

export function getFullRows(grid: Grid): ReadonlyArray<number> {
  const rows: Array<number> = [];
  for (let y = 0; y < grid.height; y++) {
    if (isRowFull(grid, y)) rows.push(y);
  }
  return rows;
}

/**
 * Remove every full row. Rows are spliced out bottom-up, each at its original
 * index less the rows already removed beneath it, and empty rows are appended
 * at the top so the length stays width×height. Equivalent to dropping all
 * full rows at once and collapsing the rest downward.
 */
export function eliminateFullRows(grid: Grid): {
  grid: Grid;
  cleared: number;
  rows: ReadonlyArray<number>;
} {
  const rows = getFullRows(grid);
  if (rows.length === 0) return { cleared: 0, grid, rows };

  const cells = [...grid.cells];
  rows.forEach((row, removedBelow) => {
    cells.splice((row - removedBelow) * grid.width, grid.width);
  });
  for (let i = 0; i < rows.length * grid.width; i++) cells.push(false);

  return { cleared: rows.length, grid: { ...grid, cells }, rows };
}

// Rows from the top of the grid down, for renderers
export function gridRows(grid: Grid): ReadonlyArray<ReadonlyArray<boolean>> {
  const rows: Array<ReadonlyArray<boolean>> = [];
  for (let y = grid.height - 1; y >= 0; y--) {
    rows.push(grid.cells.slice(y * grid.width, (y + 1) * grid.width));
  }
  return rows;
}

export function countOccupied(grid: Grid): number {
  return grid.cells.filter(Boolean).length;
}
