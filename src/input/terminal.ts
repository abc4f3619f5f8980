import { emitKeypressEvents } from "node:readline";

import { DEFAULT_TERMINAL_MAP, type Keymap } from "../device/default-keymaps";
import { NO_INPUT, type InputIntents } from "../engine/input";

type Keypress = { name?: string; ctrl?: boolean };

// process.stdin, or any readable that emits keypress events
export type KeyStream = NodeJS.ReadableStream & {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

export type TerminalInputOptions = {
  keymap?: Keymap;
  onQuit?: () => void;
  onRestart?: () => void;
};

/**
 * Terminals report key presses but never releases, so each press is latched
 * as a held intent until the next tick samples it.
 */
export class TerminalInputSource {
  private latched: { -readonly [K in keyof InputIntents]: boolean } = {
    ...NO_INPUT,
  };
  private readonly keymap: Keymap;
  private stream: KeyStream | null = null;
  private readonly listener = (_str: string | undefined, key?: Keypress): void => {
    if (key?.name === undefined) return;
    this.handleKey(key.name, key.ctrl === true);
  };

  constructor(private readonly options: TerminalInputOptions = {}) {
    this.keymap = options.keymap ?? DEFAULT_TERMINAL_MAP;
  }

  handleKey(name: string, ctrl = false): void {
    if (ctrl && name === "c") {
      this.options.onQuit?.();
      return;
    }
    for (const action of this.keymap.get(name) ?? []) {
      switch (action) {
        case "MoveLeft":
          this.latched.left = true;
          break;
        case "MoveRight":
          this.latched.right = true;
          break;
        case "SoftDrop":
          this.latched.down = true;
          break;
        case "Rotate":
          this.latched.rotate = true;
          break;
        case "Restart":
          this.options.onRestart?.();
          break;
        case "Quit":
          this.options.onQuit?.();
          break;
      }
    }
  }

  /** Intents pressed since the last sample; clears the latch */
  sample(): InputIntents {
    const snapshot: InputIntents = { ...this.latched };
    this.latched = { ...NO_INPUT };
    return snapshot;
  }

  attach(stream: KeyStream): void {
    if (this.stream) return;
    emitKeypressEvents(stream);
    if (stream.isTTY === true) stream.setRawMode?.(true);
    stream.on("keypress", this.listener);
    stream.resume();
    this.stream = stream;
  }

  detach(): void {
    const stream = this.stream;
    if (!stream) return;
    stream.off("keypress", this.listener);
    if (stream.isTTY === true) stream.setRawMode?.(false);
    stream.pause();
    this.stream = null;
  }
}
