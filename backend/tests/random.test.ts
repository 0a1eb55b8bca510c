/**
 * Random Source Tests
 */

import { describe, it, expect } from 'vitest';
import { createRandom, fromGenerator } from '../src/utils/random.js';

describe('createRandom', () => {
  it('repeats the same sequence for the same seed', () => {
    const a = createRandom(123);
    const b = createRandom(123);

    expect(Array.from({ length: 5 }, () => a.next())).toEqual(Array.from({ length: 5 }, () => b.next()));
  });

  it('keeps integers within the inclusive range', () => {
    const random = createRandom(9);
    const values = Array.from({ length: 500 }, () => random.int(20, 30));

    expect(Math.min(...values)).toBeGreaterThanOrEqual(20);
    expect(Math.max(...values)).toBeLessThanOrEqual(30);
  });

  it('samples distinct elements', () => {
    const random = createRandom(5);
    const sample = random.sample(['a', 'b', 'c', 'd'], 2);

    expect(sample).toHaveLength(2);
    expect(new Set(sample).size).toBe(2);
  });
});

describe('fromGenerator', () => {
  it('maps the generator onto ranges', () => {
    const random = fromGenerator(() => 0.5);

    expect(random.int(0, 9)).toBe(5);
    expect(random.uniform(3000, 6000)).toBe(4500);
    expect(random.pick(['a', 'b', 'c', 'd'])).toBe('c');
  });

  it('refuses impossible requests', () => {
    const random = fromGenerator(() => 0);

    expect(() => random.pick([])).toThrow('Cannot pick from an empty list');
    expect(() => random.sample(['a'], 2)).toThrow('Cannot sample 2 items from 1');
  });
});
