import { GRID_HEIGHT, GRID_WIDTH, type CeilingPolicy } from "./core/types";

export type MatchConfig = Readonly<{
  width: number;
  height: number;
  fallDelaySeconds: number; // gravity step interval
  spawnDelaySeconds: number; // pause between a lock and the next spawn
  topOutDepth: number; // the match ends once row (height - topOutDepth) holds a block
  ceiling: CeilingPolicy;
}>;

export const DEFAULT_MATCH_CONFIG: MatchConfig = {
  ceiling: "closed",
  fallDelaySeconds: 0.5,
  height: GRID_HEIGHT,
  spawnDelaySeconds: 0.25,
  topOutDepth: 4,
  width: GRID_WIDTH,
};

function isPositiveInteger(n: number): boolean {
  return Number.isInteger(n) && n > 0;
}

function isNonNegativeFinite(n: number): boolean {
  return Number.isFinite(n) && n >= 0;
}

/**
 * Merge overrides onto the defaults and validate the result.
 * Throws on the first invalid field.
 */
export function createMatchConfig(
  overrides: Partial<MatchConfig> = {},
): MatchConfig {
  const cfg: MatchConfig = { ...DEFAULT_MATCH_CONFIG, ...overrides };

  if (!isPositiveInteger(cfg.width)) {
    throw new Error("width must be a positive integer");
  }
  if (!isPositiveInteger(cfg.height)) {
    throw new Error("height must be a positive integer");
  }
  if (!isNonNegativeFinite(cfg.fallDelaySeconds)) {
    throw new Error("fallDelaySeconds must be a non-negative finite number");
  }
  if (!isNonNegativeFinite(cfg.spawnDelaySeconds)) {
    throw new Error("spawnDelaySeconds must be a non-negative finite number");
  }
  if (
    !Number.isInteger(cfg.topOutDepth) ||
    cfg.topOutDepth < 1 ||
    cfg.topOutDepth > cfg.height
  ) {
    throw new Error("topOutDepth must be an integer from 1 to height");
  }
  if (cfg.ceiling !== "closed" && cfg.ceiling !== "open") {
    throw new Error('ceiling must be "closed" or "open"');
  }

  return cfg;
}

// Grid row whose occupancy ends the match
export function topOutRow(cfg: MatchConfig): number {
  return cfg.height - cfg.topOutDepth;
}
