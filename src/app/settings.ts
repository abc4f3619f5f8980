// Settings file: load + (private) validation helpers
// Concerned only with the JSON file shape and conversion to engine-facing config

import { readFileSync } from "node:fs";

import { debugLog } from "../utils/debug";

import type { MatchConfig } from "../engine/config";

export const DEFAULT_FRAME_MS = 16 as const;

export type Settings = {
  match: Partial<MatchConfig>;
  seed?: string;
  frameMs?: number;
};

const NUMERIC_MATCH_KEYS = [
  "width",
  "height",
  "fallDelaySeconds",
  "spawnDelaySeconds",
  "topOutDepth",
] as const;

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function isNumber(x: unknown): x is number {
  return typeof x === "number" && Number.isFinite(x);
}

function isString(x: unknown): x is string {
  return typeof x === "string";
}

function coerceCeiling(u: unknown): MatchConfig["ceiling"] | undefined {
  if (u === "closed" || u === "open") return u;
  return undefined;
}

function extractMatch(source: Record<string, unknown>): Partial<MatchConfig> {
  const out: { -readonly [K in keyof MatchConfig]?: MatchConfig[K] } = {};
  for (const k of NUMERIC_MATCH_KEYS) {
    const v = source[k];
    if (v === undefined) continue;
    if (isNumber(v)) out[k] = v;
    else debugLog("settings", `ignoring non-numeric ${k}`, v);
  }
  const rawCeiling = source["ceiling"];
  const ceiling = coerceCeiling(rawCeiling);
  if (ceiling !== undefined) out.ceiling = ceiling;
  else if (rawCeiling !== undefined) {
    debugLog("settings", "ignoring unknown ceiling", rawCeiling);
  }
  return out;
}

// Accepts { match: {...}, seed, frameMs } or the match keys at top level
export function parseSettings(raw: unknown): Settings {
  if (!isRecord(raw)) return { match: {} };

  const nested = raw["match"];
  const match = isRecord(nested) ? extractMatch(nested) : extractMatch(raw);
  const out: Settings = { match };

  const seed = raw["seed"];
  if (isString(seed) && seed.length > 0) out.seed = seed;

  const frameMs = raw["frameMs"];
  if (isNumber(frameMs) && frameMs > 0) out.frameMs = frameMs;
  else if (frameMs !== undefined) {
    debugLog("settings", "ignoring invalid frameMs", frameMs);
  }

  return out;
}

/**
 * Read settings from a JSON file. A missing file or malformed JSON yields
 * empty settings; other read errors propagate.
 */
export function loadSettings(path: string): Settings {
  let text: string;
  try {
    text = readFileSync(path, "utf8");
  } catch (err: unknown) {
    if (isRecord(err) && err["code"] === "ENOENT") {
      debugLog("settings", `no settings file at ${path}`);
      return { match: {} };
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err: unknown) {
    debugLog("settings", `malformed JSON in ${path}`, err);
    return { match: {} };
  }
  return parseSettings(parsed);
}
