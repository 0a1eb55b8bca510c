/**
 * Inbound Queue
 *
 * Human messages waiting for the engine. Any request handler may enqueue;
 * only the engine polls and drains.
 */

import type { SessionClock } from '../../utils/clock.js';
import type { HumanMessage } from '../../types/session.js';

export class InboundQueue {
  private items: HumanMessage[] = [];
  private readonly clock: SessionClock;

  constructor(clock: SessionClock) {
    this.clock = clock;
  }

  get size(): number {
    return this.items.length;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  enqueue(message: HumanMessage): void {
    this.items.push(message);
  }

  /**
   * Oldest message, waiting at most `timeoutMs` for one to arrive
   */
  async poll(timeoutMs: number): Promise<HumanMessage | null> {
    const ready = this.items.shift();
    if (ready) {
      return ready;
    }

    await this.clock.sleep(timeoutMs);
    return this.items.shift() ?? null;
  }

  /**
   * Remove and return everything queued, oldest first
   */
  drain(): HumanMessage[] {
    const drained = this.items;
    this.items = [];
    return drained;
  }
}
