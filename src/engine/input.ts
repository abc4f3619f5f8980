// Intents held during one tick, sampled by the input source
export type InputIntents = Readonly<{
  down: boolean;
  left: boolean;
  right: boolean;
  rotate: boolean;
}>;

export const NO_INPUT: InputIntents = {
  down: false,
  left: false,
  right: false,
  rotate: false,
};

export function createInput(held: Partial<InputIntents> = {}): InputIntents {
  return { ...NO_INPUT, ...held };
}

// Left wins when both directions are held
export function horizontalIntent(input: InputIntents): -1 | 0 | 1 {
  if (input.left) return -1;
  if (input.right) return 1;
  return 0;
}
