import { setTimeout as delay } from "timers/promises";

export type RateLimiterOpts = {
  windowMs?: number;
  maxPerWindow?: number;
  minIntervalMs?: number;
};

export type Scheduler = <T>(task: () => Promise<T>) => Promise<T>;

// Sliding window: at most maxPerWindow task starts per windowMs, spaced by minIntervalMs.
export function createRateLimiter(opts: RateLimiterOpts = {}): Scheduler {
  const windowMs = opts.windowMs ?? 1000;
  const maxPerWindow = Math.max(1, opts.maxPerWindow ?? 10);
  const minIntervalMs = opts.minIntervalMs ?? Math.ceil(windowMs / maxPerWindow);

  const timestamps: number[] = [];
  let chain: Promise<unknown> = Promise.resolve();

  async function acquireSlot() {
    while (true) {
      const now = Date.now();
      while (timestamps.length && now - timestamps[0] >= windowMs) {
        timestamps.shift();
      }

      const sinceLast = timestamps.length ? now - timestamps[timestamps.length - 1] : Infinity;
      if (timestamps.length < maxPerWindow && sinceLast >= minIntervalMs) {
        timestamps.push(Date.now());
        return;
      }

      const waitForInterval = Math.max(0, minIntervalMs - sinceLast);
      const waitForWindow =
        timestamps.length >= maxPerWindow ? windowMs - (now - timestamps[0]) : 0;
      const waitMs = Math.max(waitForInterval, waitForWindow, 1);
      await delay(waitMs);
    }
  }

  return <T>(task: () => Promise<T>): Promise<T> => {
    const run = async () => {
      await acquireSlot();
      return task();
    };
    const next = chain.then(run, run);
    chain = next;
    return next;
  };
}

export const unlimited: Scheduler = (task) => task();
