import { PassThrough } from "node:stream";

import { TerminalInputSource } from "@/input/terminal";
import { NO_INPUT } from "@/engine/input";

import type { Keymap } from "@/device/default-keymaps";

describe("TerminalInputSource", () => {
  it("latches key presses until the next sample", () => {
    const input = new TerminalInputSource();
    input.handleKey("left");
    input.handleKey("up");

    expect(input.sample()).toEqual({
      down: false,
      left: true,
      right: false,
      rotate: true,
    });
    expect(input.sample()).toEqual(NO_INPUT);
  });

  it("maps WASD and vi keys", () => {
    const input = new TerminalInputSource();
    input.handleKey("d");
    input.handleKey("j");
    expect(input.sample()).toEqual({
      down: true,
      left: false,
      right: true,
      rotate: false,
    });
  });

  it("ignores unmapped keys", () => {
    const input = new TerminalInputSource();
    input.handleKey("z");
    expect(input.sample()).toEqual(NO_INPUT);
  });

  it("invokes quit and restart callbacks", () => {
    const onQuit = jest.fn();
    const onRestart = jest.fn();
    const input = new TerminalInputSource({ onQuit, onRestart });

    input.handleKey("q");
    input.handleKey("c", true);
    input.handleKey("r");

    expect(onQuit).toHaveBeenCalledTimes(2);
    expect(onRestart).toHaveBeenCalledTimes(1);
  });

  it("plain c is not a quit", () => {
    const onQuit = jest.fn();
    new TerminalInputSource({ onQuit }).handleKey("c");
    expect(onQuit).not.toHaveBeenCalled();
  });

  it("uses a custom keymap", () => {
    const keymap: Keymap = new Map([["x", ["SoftDrop", "Rotate"]]]);
    const input = new TerminalInputSource({ keymap });
    input.handleKey("x");
    input.handleKey("left");

    expect(input.sample()).toEqual({
      down: true,
      left: false,
      right: false,
      rotate: true,
    });
  });

  it("listens to keypress events between attach and detach", () => {
    const stream = new PassThrough();
    const input = new TerminalInputSource();

    input.attach(stream);
    stream.emit("keypress", "a", { name: "a" });
    stream.emit("keypress", undefined, {});
    expect(input.sample().left).toBe(true);

    input.detach();
    stream.emit("keypress", "a", { name: "a" });
    expect(input.sample()).toEqual(NO_INPUT);
  });
});
