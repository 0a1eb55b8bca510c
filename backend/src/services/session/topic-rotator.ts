/**
 * Topic Rotator
 *
 * Hands out discussion topics so that the whole pool is covered before any
 * topic repeats. Once every topic has been used the cycle restarts.
 */

import type { RandomSource } from '../../utils/random.js';

export class TopicRotator {
  private readonly pool: readonly string[];
  private readonly random: RandomSource;
  private used: Set<string> = new Set();

  constructor(pool: readonly string[], random: RandomSource) {
    const unique = [...new Set(pool)];
    if (unique.length === 0) {
      throw new Error('Topic pool must contain at least one topic');
    }
    this.pool = unique;
    this.random = random;
  }

  get size(): number {
    return this.pool.length;
  }

  /** Topics still eligible in the current coverage cycle */
  get remaining(): number {
    return this.pool.length - this.used.size;
  }

  pick(): string {
    let eligible = this.pool.filter((topic) => !this.used.has(topic));
    if (eligible.length === 0) {
      this.used.clear();
      eligible = [...this.pool];
    }

    const topic = this.random.pick(eligible);
    this.used.add(topic);
    return topic;
  }
}
