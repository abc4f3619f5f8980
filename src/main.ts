#!/usr/bin/env node
import { parseArgs } from "./app/cli-args";
import { GameSession } from "./app/session";
import { DEFAULT_FRAME_MS, loadSettings } from "./app/settings";
import { createMatchConfig } from "./engine/config";
import { createUniformRng } from "./engine/core/rng/seeded";
import { TerminalInputSource } from "./input/terminal";
import { CLEAR_SCREEN, renderFrame } from "./presentation/terminal/renderer";
import { startLoop, type LoopHandle } from "./runtime/loop";

// Main entry point
function main(): void {
  const args = parseArgs(process.argv.slice(2));
  const settings = loadSettings(args.configPath);
  const config = createMatchConfig(settings.match);
  const seed = args.seed ?? settings.seed ?? String(Date.now());
  const intervalMs = settings.frameMs ?? DEFAULT_FRAME_MS;

  const session = new GameSession(config, createUniformRng(seed));
  let loop: LoopHandle | null = null;

  const draw = (): void => {
    process.stdout.write(`${CLEAR_SCREEN}${renderFrame(session.view())}\n`);
  };

  const input = new TerminalInputSource({
    onQuit: () => {
      loop?.stop();
      input.detach();
    },
    onRestart: () => {
      if (!session.isOver) return;
      session.restart();
      run();
    },
  });

  const run = (): void => {
    loop = startLoop({
      intervalMs,
      isOver: () => session.isOver,
      render: draw,
      step: (delta) => session.tick(delta, input.sample()),
    });
  };

  // Leave the terminal usable however the process ends
  process.once("exit", () => input.detach());

  input.attach(process.stdin);
  run();
}

try {
  main();
} catch (error) {
  console.error("Failed to start blockfall:", error);
  process.exitCode = 1;
}
