import {
  FILLED_CELL,
  GAME_OVER_BANNER,
  renderFrame,
} from "@/presentation/terminal/renderer";

import type { SessionView } from "@/app/session";

describe("terminal renderer", () => {
  const view: SessionView = {
    height: 2,
    isOver: false,
    rows: [
      [true, false],
      [false, true],
    ],
    width: 2,
  };

  it("draws rows top first between walls, over a floor line", () => {
    expect(renderFrame(view).split("\n")).toEqual([
      "<![] .!>",
      "<! .[]!>",
      "<!====!>",
    ]);
  });

  it("adds the game over banner once the match has ended", () => {
    const lines = renderFrame({ ...view, isOver: true }).split("\n");
    expect(lines).toHaveLength(4);
    expect(lines[3]).toBe(GAME_OVER_BANNER);
  });

  it("accepts custom cell glyphs", () => {
    expect(renderFrame(view, { empty: "_", filled: "#" })).toBe(
      "<!#_!>\n<!_#!>\n<!==!>",
    );
  });

  it("filled cells are two columns wide by default", () => {
    expect(FILLED_CELL).toHaveLength(2);
  });
});
