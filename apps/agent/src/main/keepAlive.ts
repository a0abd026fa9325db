export const KEEP_ALIVE_INTERVAL_MS = 60 * 60 * 1000;

export interface KeepAlive {
  release(): void;
}

/** Holds the event loop open until released, for runs without the keyboard hook. */
export const keepProcessAlive = (intervalMs = KEEP_ALIVE_INTERVAL_MS): KeepAlive => {
  const timer = setInterval(() => undefined, intervalMs);
  return {
    release: () => clearInterval(timer),
  };
};
