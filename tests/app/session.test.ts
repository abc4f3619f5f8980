import { GameSession } from "@/app/session";
import { createMatchConfig } from "@/engine/config";
import { SequenceRng } from "@/engine/core/rng/sequence";
import { NO_INPUT } from "@/engine/input";

import { BAR, DOT } from "../test-helpers";

// One column, four rows: the first locked dot sits in the top-out row
const config = createMatchConfig({
  fallDelaySeconds: 0,
  height: 4,
  spawnDelaySeconds: 0,
  topOutDepth: 4,
  width: 1,
});

function playToOver(session: GameSession): number {
  let ticks = 0;
  while (!session.isOver && ticks < 50) {
    session.tick(0.1, NO_INPUT);
    ticks++;
  }
  return ticks;
}

describe("GameSession", () => {
  it("starts with an empty view", () => {
    const session = new GameSession(config, new SequenceRng([DOT]));
    expect(session.view()).toEqual({
      height: 4,
      isOver: false,
      rows: [[false], [false], [false], [false]],
      width: 1,
    });
    expect(session.matchNumber).toBe(1);
  });

  it("plays a match to game over", () => {
    const session = new GameSession(config, new SequenceRng([DOT]));

    // spawn, three drops, lock, top-out
    expect(playToOver(session)).toBe(6);
    expect(session.lastEvents).toEqual([
      { kind: "TopOut", reason: "stack", tick: 5 },
    ]);
    expect(session.view()).toEqual({
      height: 4,
      isOver: true,
      rows: [[false], [false], [false], [true]],
      width: 1,
    });
  });

  it("restart begins a fresh match with the shape sequence continued", () => {
    const session = new GameSession(config, new SequenceRng([DOT, BAR]));
    playToOver(session);

    session.restart();
    expect(session.matchNumber).toBe(2);
    expect(session.isOver).toBe(false);
    expect(session.view().rows).toEqual([[false], [false], [false], [false]]);

    session.tick(0.1, NO_INPUT);
    expect(session.lastEvents).toEqual([
      { kind: "PieceSpawned", shapeId: "bar", tick: 0, x: 0, y: 0 },
    ]);
  });
});
