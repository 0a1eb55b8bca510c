/**
 * Word pacing for streamed utterances
 *
 * The per-word delay spreads an utterance over a display budget, bounded so
 * short messages don't crawl and long ones don't flash by.
 */

import type { PacingConfig } from '../../config/session.js';

/**
 * Display budget left once generation time is spent
 */
export function displayBudgetMs(generationMs: number, pacing: PacingConfig): number {
  return Math.max(pacing.minBudgetMs, pacing.targetBudgetMs - Math.max(0, generationMs));
}

/**
 * Delay after each word so that `wordCount` words take about `budgetMs`
 */
export function wordDelayMs(
  wordCount: number,
  budgetMs: number,
  pacing: PacingConfig
): number {
  const raw = budgetMs / Math.max(wordCount, 1);
  return Math.round(Math.min(pacing.maxWordDelayMs, Math.max(pacing.minWordDelayMs, raw)));
}
