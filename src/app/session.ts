import { gridRows } from "../engine/core/grid";
import { MatchService } from "../engine/match/service";
import { debugLog } from "../utils/debug";

import type { MatchConfig } from "../engine/config";
import type { ShapeRandomGenerator } from "../engine/core/rng/interface";
import type { MatchEvent } from "../engine/events";
import type { InputIntents } from "../engine/input";

/** What a renderer reads once per tick */
export type SessionView = Readonly<{
  rows: ReadonlyArray<ReadonlyArray<boolean>>; // top row first
  width: number;
  height: number;
  isOver: boolean;
}>;

/**
 * Owns the running match. Constructed once at startup and handed to the
 * loop and renderer; nothing else holds game state.
 */
export class GameSession {
  private match: MatchService;
  private matchCount = 1;

  constructor(
    private readonly config: MatchConfig,
    rng: ShapeRandomGenerator,
  ) {
    this.match = new MatchService({ config, rng });
  }

  tick(delta: number, input: InputIntents): void {
    this.match.tick(delta, input);
  }

  get isOver(): boolean {
    return this.match.isOver;
  }

  get lastEvents(): ReadonlyArray<MatchEvent> {
    return this.match.lastEvents;
  }

  get matchNumber(): number {
    return this.matchCount;
  }

  view(): SessionView {
    const { grid } = this.match;
    return {
      height: grid.height,
      isOver: this.match.isOver,
      rows: gridRows(grid),
      width: grid.width,
    };
  }

  /** Start a fresh match, continuing the shape sequence where it left off */
  restart(): void {
    const rng = this.match.rng;
    this.match = new MatchService({ config: this.config, rng });
    this.matchCount++;
    debugLog("match", `restart #${String(this.matchCount)}`);
  }
}
