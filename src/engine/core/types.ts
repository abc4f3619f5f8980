// Default playfield dimensions
export const GRID_WIDTH = 10 as const;
export const GRID_HEIGHT = 21 as const; // rows 0..20, row 0 is the floor

// Local or world cell position; y grows upward
export type Cell = readonly [x: number, y: number];

export type Grid = {
  readonly width: number;
  readonly height: number;
  readonly cells: ReadonlyArray<boolean>; // width×height, row-major, index 0 = bottom-left
};

// Quarter-turn count
export type Rotation = 0 | 1 | 2 | 3;

export function isRotation(n: unknown): n is Rotation {
  return n === 0 || n === 1 || n === 2 || n === 3;
}

export function assertRotation(n: unknown): asserts n is Rotation {
  if (!isRotation(n)) throw new Error(`Invalid rotation index: ${String(n)}`);
}

// Whether cells above the top row count as solid
export type CeilingPolicy = "closed" | "open";

export type Shape = {
  readonly id: string;
  readonly cells: ReadonlyArray<Cell>;
};

export type Piece = {
  readonly shape: Shape;
  readonly x: number;
  readonly y: number;
  readonly rotation: Rotation;
};

// Monotonic match tick counter
declare const TickBrand: unique symbol;
export type Tick = number & { readonly [TickBrand]: true };

export function asTick(n: number): Tick {
  return n as Tick;
}

export function incrementTick(tick: Tick): Tick {
  return (tick + 1) as Tick;
}

// Row-major index, only meaningful when (x, y) is in bounds
export function idx(grid: Grid, x: number, y: number): number {
  return y * grid.width + x;
}

export function isInBounds(grid: Grid, x: number, y: number): boolean {
  return x >= 0 && x < grid.width && y >= 0 && y < grid.height;
}
