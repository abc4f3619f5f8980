export type InputAction =
  | "MoveLeft"
  | "MoveRight"
  | "SoftDrop"
  | "Rotate"
  | "Restart"
  | "Quit";

export type Keymap = Readonly<Map<string, ReadonlyArray<InputAction>>>; // terminal key name → InputAction(s)

// Node readline key names → InputAction(s)
export const DEFAULT_TERMINAL_MAP: Keymap = new Map([
  ["left", ["MoveLeft"]],
  ["right", ["MoveRight"]],
  ["down", ["SoftDrop"]],
  ["up", ["Rotate"]],
  ["space", ["Rotate"]],

  // WASD
  ["a", ["MoveLeft"]],
  ["d", ["MoveRight"]],
  ["s", ["SoftDrop"]],
  ["w", ["Rotate"]],

  // vi keys
  ["h", ["MoveLeft"]],
  ["l", ["MoveRight"]],
  ["j", ["SoftDrop"]],
  ["k", ["Rotate"]],

  ["r", ["Restart"]],
  ["q", ["Quit"]],
  ["escape", ["Quit"]],
]);
