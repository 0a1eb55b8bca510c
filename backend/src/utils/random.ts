/**
 * Seedable random source scoped to one session
 */

export interface RandomSource {
  /** Float in [0, 1) */
  next(): number;
  /** Integer in the inclusive range [min, max] */
  int(min: number, max: number): number;
  /** Float in [min, max) */
  uniform(min: number, max: number): number;
  /** Uniformly chosen element; throws on an empty list */
  pick<T>(items: readonly T[]): T;
  /** `count` distinct elements in random order */
  sample<T>(items: readonly T[], count: number): T[];
}

/**
 * Mulberry32 generator: 32-bit state, good enough for scheduling choices
 */
function mulberry32(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Wrap a [0, 1) generator in the RandomSource helpers
 */
export function fromGenerator(next: () => number): RandomSource {
  const int = (min: number, max: number): number =>
    min + Math.floor(next() * (max - min + 1));

  return {
    next,
    int,
    uniform: (min, max) => min + next() * (max - min),
    pick<T>(items: readonly T[]): T {
      if (items.length === 0) {
        throw new Error('Cannot pick from an empty list');
      }
      const item = items[int(0, items.length - 1)];
      if (item === undefined) {
        throw new Error('Random index out of range');
      }
      return item;
    },
    sample<T>(items: readonly T[], count: number): T[] {
      if (count > items.length) {
        throw new Error(`Cannot sample ${count} items from ${items.length}`);
      }
      const pool = [...items];
      const out: T[] = [];
      for (let i = 0; i < count; i++) {
        const [taken] = pool.splice(int(0, pool.length - 1), 1);
        if (taken !== undefined) {
          out.push(taken);
        }
      }
      return out;
    },
  };
}

/**
 * Create a session random source; a null seed falls back to Math.random
 */
export function createRandom(seed: number | null = null): RandomSource {
  return fromGenerator(seed === null ? Math.random : mulberry32(seed));
}
