export interface FrameLoopOptions {
  fps?: number;
  now?: () => number; // milliseconds
}

/**
 * Calls `frame` with the measured milliseconds since the previous frame,
 * aiming for `fps` frames per second. Returns a function that stops the loop.
 */
export function startFrameLoop(frame: (dtMs: number) => void, opts: FrameLoopOptions = {}): () => void {
  const fps = opts.fps ?? 120;
  const now = opts.now ?? (() => performance.now());
  const period = 1000 / fps;
  let last = now();
  let stopped = false;
  let handle: ReturnType<typeof setTimeout> | null = null;

  const run = () => {
    const started = now();
    const dt = started - last;
    last = started;
    frame(dt);
    if (stopped) return;
    handle = setTimeout(run, Math.max(0, period - (now() - started)));
  };

  handle = setTimeout(run, period);
  return () => {
    stopped = true;
    if (handle !== null) clearTimeout(handle);
  };
}
