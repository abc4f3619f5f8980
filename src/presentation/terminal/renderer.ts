import type { SessionView } from "../../app/session";

export type RenderOptions = {
  filled?: string;
  empty?: string;
};

export const FILLED_CELL = "[]" as const;
export const EMPTY_CELL = " ." as const;
export const GAME_OVER_BANNER = "GAME OVER - press r to restart, q to quit";

// Terminal control: cursor home + clear screen
export const CLEAR_SCREEN = "\x1b[H\x1b[2J" as const;

/**
 * Draw the grid as text, top row first, framed by walls and a floor line.
 */
export function renderFrame(
  view: SessionView,
  options: RenderOptions = {},
): string {
  const filled = options.filled ?? FILLED_CELL;
  const empty = options.empty ?? EMPTY_CELL;

  const lines = view.rows.map(
    (row) => `<!${row.map((cell) => (cell ? filled : empty)).join("")}!>`,
  );
  lines.push(`<!${"=".repeat(view.width * filled.length)}!>`);
  if (view.isOver) lines.push(GAME_OVER_BANNER);

  return lines.join("\n");
}
