import { DEFAULT_TERMINAL_MAP } from "@/device/default-keymaps";

describe("default terminal keymap", () => {
  it("binds arrows, WASD and vi keys to the same moves", () => {
    for (const key of ["left", "a", "h"]) {
      expect(DEFAULT_TERMINAL_MAP.get(key)).toEqual(["MoveLeft"]);
    }
    for (const key of ["right", "d", "l"]) {
      expect(DEFAULT_TERMINAL_MAP.get(key)).toEqual(["MoveRight"]);
    }
    for (const key of ["down", "s", "j"]) {
      expect(DEFAULT_TERMINAL_MAP.get(key)).toEqual(["SoftDrop"]);
    }
    for (const key of ["up", "space", "w", "k"]) {
      expect(DEFAULT_TERMINAL_MAP.get(key)).toEqual(["Rotate"]);
    }
  });

  it("binds restart and quit", () => {
    expect(DEFAULT_TERMINAL_MAP.get("r")).toEqual(["Restart"]);
    expect(DEFAULT_TERMINAL_MAP.get("q")).toEqual(["Quit"]);
    expect(DEFAULT_TERMINAL_MAP.get("escape")).toEqual(["Quit"]);
  });
});
