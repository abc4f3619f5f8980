import { debugLog } from "../utils/debug";

export type LoopOptions = {
  intervalMs: number;
  /** Advance the simulation by `delta` seconds */
  step: (delta: number) => void;
  render: () => void;
  isOver: () => boolean;
  /** Called once, after the loop stops itself on game over */
  onOver?: () => void;
  /** Milliseconds clock; defaults to performance.now */
  now?: () => number;
};

export type LoopHandle = {
  stop: () => void;
  readonly running: boolean;
};

/**
 * Fixed-interval driver: every frame measures elapsed time, steps the
 * simulation once and renders. Stops by itself when the match is over.
 */
export function startLoop(options: LoopOptions): LoopHandle {
  const now = options.now ?? ((): number => performance.now());

  let last = now();
  let handle: ReturnType<typeof setInterval> | null = null;

  const stop = (): void => {
    if (handle === null) return;
    clearInterval(handle);
    handle = null;
    debugLog("loop", "stopped");
  };

  const frame = (): void => {
    const t = now();
    const delta = (t - last) / 1000;
    last = t;

    options.step(delta);
    options.render();

    if (options.isOver()) {
      stop();
      options.onOver?.();
    }
  };

  handle = setInterval(frame, options.intervalMs);
  debugLog("loop", `started at ${String(options.intervalMs)}ms`);
  options.render();

  return {
    get running(): boolean {
      return handle !== null;
    },
    stop,
  };
}
