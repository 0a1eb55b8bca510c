/**
 * Virtual-time clock for engine tests
 *
 * `sleep` advances time instantly. Callbacks registered with `at` fire, in
 * time order, when a sleep passes their moment, so tests can inject human
 * messages in the middle of a settle delay or a stream.
 */

import type { SessionClock } from '../../src/utils/clock.js';

interface Scheduled {
  at: number;
  run: () => void;
}

export class ManualClock implements SessionClock {
  private time: number;
  private scheduled: Scheduled[] = [];
  readonly sleeps: number[] = [];

  constructor(start: number = 1_700_000_000_000) {
    this.time = start;
  }

  now(): number {
    return this.time;
  }

  /** Run `run` once virtual time reaches `at` */
  at(at: number, run: () => void): void {
    this.scheduled.push({ at, run });
    this.scheduled.sort((a, b) => a.at - b.at);
  }

  /** Run `run` after `delayMs` of virtual time */
  after(delayMs: number, run: () => void): void {
    this.at(this.time + delayMs, run);
  }

  async sleep(ms: number): Promise<void> {
    const wake = this.time + Math.max(0, ms);
    this.sleeps.push(ms);

    let next = this.scheduled[0];
    while (next && next.at <= wake) {
      this.scheduled.shift();
      this.time = Math.max(this.time, next.at);
      next.run();
      next = this.scheduled[0];
    }

    this.time = wake;
    await Promise.resolve();
  }
}
