/*
 * Match state machine (robot3)
 *
 * awaitingSpawn → active (spawn delay elapsed, piece placed)
 * active → awaitingSpawn (piece landed and locked)
 * awaitingSpawn | active → over (stack reached the top-out row, or no room to spawn)
 * over is final: it has no transitions, so further ticks are ignored.
 *
 * Every tick is a single "tick" event. Transitions for the same event are
 * tried in order and the first whose guard passes wins; guards and reducers
 * are pure functions of (context, event), so evaluating a guard and then its
 * reducer yields the same outcome.
 */

import { createMachine, guard, reduce, state, transition } from "robot3";

import { landsThisTick, lockActive, settleActive } from "./active";
import {
  isSpawnBlocked,
  isSpawnDue,
  refuseSpawn,
  spawnActive,
  waitForSpawn,
} from "./spawn";
import { haltOnStack, isEndConditionMet } from "./top-out";

import type { MatchContext, TickEvent } from "./context";
import type { Machine, MachineState, MachineStates } from "robot3";

export type MatchState = "awaitingSpawn" | "active" | "over";

type MatchEventType = TickEvent["type"];

const endConditionMet = (ctx: MatchContext, _event: TickEvent): boolean =>
  isEndConditionMet(ctx);

const haltMatch = (ctx: MatchContext, _event: TickEvent): MatchContext =>
  haltOnStack(ctx);

const createAwaitingSpawnState = (): MachineState<MatchEventType> =>
  state(
    transition("tick", "over", guard(endConditionMet), reduce(haltMatch)),
    transition("tick", "over", guard(isSpawnBlocked), reduce(refuseSpawn)),
    transition("tick", "active", guard(isSpawnDue), reduce(spawnActive)),
    transition("tick", "awaitingSpawn", reduce(waitForSpawn)),
  );

const createActiveState = (): MachineState<MatchEventType> =>
  state(
    transition("tick", "over", guard(endConditionMet), reduce(haltMatch)),
    transition(
      "tick",
      "awaitingSpawn",
      guard(landsThisTick),
      reduce(lockActive),
    ),
    transition("tick", "active", reduce(settleActive)),
  );

const createOverState = (): MachineState<MatchEventType> => state();

type MatchStatesObject = Record<MatchState, MachineState<MatchEventType>>;
export type MatchMachine = Machine<
  MatchStatesObject,
  MatchContext,
  MatchState,
  MatchEventType
>;

export const createMatchMachine = (
  initialContext: MatchContext,
  initialState: MatchState = "awaitingSpawn",
): MatchMachine => {
  const states = {
    active: createActiveState(),
    awaitingSpawn: createAwaitingSpawnState(),
    over: createOverState(),
  } as const;

  // robot3's return type widens the event type to `string`; cast back to the
  // precise machine type at this module boundary.
  return createMachine(
    initialState,
    states as unknown as MachineStates<MatchStatesObject, MatchEventType>,
    (_ctx: MatchContext): MatchContext => initialContext,
  ) as unknown as MatchMachine;
};
