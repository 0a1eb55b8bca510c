/**
 * Time source for the session engine
 * Lets tests drive the engine on virtual time
 */

export interface SessionClock {
  /** Milliseconds since the epoch */
  now(): number;
  /** Resolve after `ms` milliseconds */
  sleep(ms: number): Promise<void>;
}

export const systemClock: SessionClock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, Math.max(0, ms))),
};
