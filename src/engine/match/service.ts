import { interpret } from "robot3";

import { debugLog } from "../../utils/debug";
import { stampCells } from "../core/grid";
import { hasCollision, worldCells } from "../core/piece";
import { NO_INPUT, type InputIntents } from "../input";

import { createMatchContext, type MatchContext } from "./context";
import {
  createMatchMachine,
  type MatchMachine,
  type MatchState,
} from "./machine";

import type { MatchConfig } from "../config";
import type { ShapeRandomGenerator } from "../core/rng/interface";
import type { Grid, Piece } from "../core/types";
import type { MatchEvent } from "../events";
import type { Service } from "robot3";

type MatchRobotService = Service<MatchMachine>;

export type MatchOptions = {
  config: MatchConfig;
  rng: ShapeRandomGenerator;
  /** Starting grid; defaults to an empty one */
  grid?: Grid;
  /** Start with this piece already in play instead of awaiting a spawn */
  piece?: Piece;
};

/*
 * MATCH SERVICE - Thin wrapper around robot3
 *
 * Owns one match for its whole life: sends tick events, keeps a typed
 * snapshot of the current state name and exposes what renderers need.
 */
export class MatchService {
  private service: MatchRobotService;
  private currentStateName: MatchState;
  private events: ReadonlyArray<MatchEvent> = [];

  constructor(options: MatchOptions) {
    let ctx = createMatchContext(options.config, options.rng, options.grid);
    let initialState: MatchState = "awaitingSpawn";

    if (options.piece) {
      if (hasCollision(ctx.grid, options.piece, ctx.config.ceiling)) {
        throw new Error("Initial piece collides with the grid");
      }
      ctx = {
        ...ctx,
        grid: stampCells(ctx.grid, worldCells(options.piece), true),
        piece: options.piece,
      };
      initialState = "active";
    }

    this.currentStateName = initialState;
    const machine = createMatchMachine(ctx, initialState);
    this.service = interpret(machine, (service) => {
      this.currentStateName = service.machine.state.name;
    });
  }

  /**
   * Advance the match by `delta` seconds with the intents held this tick.
   * Once over, ticks change nothing.
   */
  tick(delta: number, input: InputIntents = NO_INPUT): void {
    const before = this.currentStateName;
    if (before === "over") {
      this.events = [];
      return;
    }

    this.service.send({ delta, input, type: "tick" });
    this.events = this.service.context.events;

    const after = this.currentStateName;
    if (after !== before) {
      debugLog("match", `${before} -> ${after}`, this.events);
    }
  }

  get state(): MatchState {
    return this.currentStateName;
  }

  get isOver(): boolean {
    return this.currentStateName === "over";
  }

  get context(): MatchContext {
    return this.service.context;
  }

  get grid(): Grid {
    return this.service.context.grid;
  }

  get piece(): Piece | null {
    return this.service.context.piece;
  }

  get rng(): ShapeRandomGenerator {
    return this.service.context.rng;
  }

  /** Domain events produced by the most recent tick */
  get lastEvents(): ReadonlyArray<MatchEvent> {
    return this.events;
  }
}
