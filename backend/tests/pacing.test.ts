/**
 * Pacing and utterance cleanup tests
 */

import { describe, it, expect } from 'vitest';
import { displayBudgetMs, wordDelayMs } from '../src/services/engine/pacing.js';
import { cleanUtterance, tokenize } from '../src/services/content/utterance-cleaner.js';
import type { PacingConfig } from '../src/config/session.js';

const pacing: PacingConfig = {
  targetBudgetMs: 18000,
  minBudgetMs: 6000,
  minWordDelayMs: 60,
  maxWordDelayMs: 500,
};

describe('displayBudgetMs', () => {
  it('subtracts generation time from the target', () => {
    expect(displayBudgetMs(0, pacing)).toBe(18000);
    expect(displayBudgetMs(5000, pacing)).toBe(13000);
  });

  it('never drops below the minimum budget', () => {
    expect(displayBudgetMs(15000, pacing)).toBe(6000);
    expect(displayBudgetMs(60000, pacing)).toBe(6000);
  });
});

describe('wordDelayMs', () => {
  it('spreads the budget over the words', () => {
    expect(wordDelayMs(60, 18000, pacing)).toBe(300);
  });

  it('clamps to the per-word bounds', () => {
    expect(wordDelayMs(4, 18000, pacing)).toBe(500);
    expect(wordDelayMs(200, 6000, pacing)).toBe(60);
  });

  it('treats an empty utterance as one word', () => {
    expect(wordDelayMs(0, 18000, pacing)).toBe(500);
  });
});

describe('cleanUtterance', () => {
  it('strips a leaked speaker prefix and wrapping quotes', () => {
    expect(cleanUtterance('Ada: "Trains beat cars."', 'Ada')).toBe('Trains beat cars.');
    expect(cleanUtterance('**ada** — Not so fast', 'Ada')).toBe('Not so fast');
  });

  it('keeps the name when it is not a prefix', () => {
    expect(cleanUtterance('I agree with Ada: mostly.', 'Ada')).toBe('I agree with Ada: mostly.');
  });

  it('collapses whitespace', () => {
    expect(cleanUtterance('  one\n\ntwo\t three  ', 'Bo')).toBe('one two three');
  });

  it('caps the number of words', () => {
    expect(cleanUtterance('a b c d e f', 'Bo', 4)).toBe('a b c d');
  });

  it('escapes names that contain pattern characters', () => {
    expect(cleanUtterance('Dr. (X): fine', 'Dr. (X)')).toBe('fine');
  });
});

describe('tokenize', () => {
  it('joins back into cleaned text', () => {
    const text = cleanUtterance('  Well,   that\nis   new ', 'Bo');

    expect(tokenize(text)).toEqual(['Well,', 'that', 'is', 'new']);
    expect(tokenize(text).join(' ')).toBe(text);
  });

  it('returns no tokens for blank text', () => {
    expect(tokenize('   ')).toEqual([]);
  });
});
