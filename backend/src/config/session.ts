/**
 * Session Configuration
 *
 * Timing, turn budget and capacity settings for the live session engine.
 * Values are seconds in the environment and milliseconds in code.
 */

import path from 'path';
import { fileURLToPath } from 'url';
import { config } from 'dotenv';
import { getEnvInt, getEnvVar } from './env.js';

config();

export interface SessionConfig {
  /** Total uptime budget of the session */
  maxUptimeMs: number;
  /** No new turn starts once time remaining is at or below this */
  shutdownMarginMs: number;
  /** Gap between automatic AI turns */
  aiGapMs: number;
  /** Delay before the very first automatic turn */
  firstTurnDelayMs: number;
  /** Delay before the first automatic turn of a new topic */
  topicChangeDelayMs: number;
  /** Settle window after a human message, drawn uniformly in [min, max] */
  settleMinMs: number;
  settleMaxMs: number;
  /** Automatic turns are pushed back this far after answering a human */
  humanCooldownMs: number;
  /** Retry delay after a turn failed on both content sources */
  failureBackoffMs: number;
  /** Inbound queue poll timeout */
  pollIntervalMs: number;
  /** Inclusive bounds of the per-topic turn budget */
  turnsPerTopicMin: number;
  turnsPerTopicMax: number;
  /** AI utterances kept as model context, and kept across a topic change */
  historyWindow: number;
  historyCarryOver: number;
  /** Trailing messages bundled into snapshots */
  snapshotMessages: number;
  /** Word-by-word pacing */
  pacing: PacingConfig;
  /** Bus listener inbox capacity */
  listenerCapacity: number;
  /** Idle time before an SSE client gets a ping */
  pingIntervalMs: number;
  /** Ingress caps */
  maxNameLength: number;
  maxTextLength: number;
  /** Seed for the session random source; unset means non-deterministic */
  seed: number | null;
  /** Directory holding personas.json and topics.json */
  catalogDir: string;
}

export interface PacingConfig {
  /** Target display time of one utterance */
  targetBudgetMs: number;
  /** Floor of the display budget once generation time is subtracted */
  minBudgetMs: number;
  /** Per-word delay bounds */
  minWordDelayMs: number;
  maxWordDelayMs: number;
}

const DEFAULT_CATALOG_DIR = fileURLToPath(new URL('../../data', import.meta.url));

function getSeed(): number | null {
  const raw = getEnvVar('SESSION_SEED');
  if (!raw) {
    return null;
  }
  const parsed = parseInt(raw, 10);
  return isNaN(parsed) ? null : parsed;
}

/**
 * Session configuration loaded from environment variables
 *
 * Environment variables:
 * - SESSION_MAX_UPTIME_S (default: 21300, i.e. 5 h 55 m)
 * - SESSION_SHUTDOWN_MARGIN_S (default: 60)
 * - AI_GAP_S (default: 25)
 * - SETTLE_MIN_MS / SETTLE_MAX_MS (default: 3000 / 6000)
 * - HUMAN_COOLDOWN_S (default: 15)
 * - TURNS_PER_TOPIC_MIN / TURNS_PER_TOPIC_MAX (default: 20 / 30)
 * - LISTENER_CAPACITY (default: 400)
 * - SESSION_SEED (optional)
 * - CATALOG_DIR (default: backend/data)
 */
export const sessionConfig: SessionConfig = {
  maxUptimeMs: getEnvInt('SESSION_MAX_UPTIME_S', 21300) * 1000,
  shutdownMarginMs: getEnvInt('SESSION_SHUTDOWN_MARGIN_S', 60) * 1000,
  aiGapMs: getEnvInt('AI_GAP_S', 25) * 1000,
  firstTurnDelayMs: 6000,
  topicChangeDelayMs: 5000,
  settleMinMs: getEnvInt('SETTLE_MIN_MS', 3000),
  settleMaxMs: getEnvInt('SETTLE_MAX_MS', 6000),
  humanCooldownMs: getEnvInt('HUMAN_COOLDOWN_S', 15) * 1000,
  failureBackoffMs: 5000,
  pollIntervalMs: 500,
  turnsPerTopicMin: getEnvInt('TURNS_PER_TOPIC_MIN', 20),
  turnsPerTopicMax: getEnvInt('TURNS_PER_TOPIC_MAX', 30),
  historyWindow: 16,
  historyCarryOver: 6,
  snapshotMessages: 120,
  pacing: {
    targetBudgetMs: 18000,
    minBudgetMs: 6000,
    minWordDelayMs: 60,
    maxWordDelayMs: 500,
  },
  listenerCapacity: getEnvInt('LISTENER_CAPACITY', 400),
  pingIntervalMs: 25000,
  maxNameLength: 20,
  maxTextLength: 500,
  seed: getSeed(),
  catalogDir: path.resolve(getEnvVar('CATALOG_DIR', false, DEFAULT_CATALOG_DIR)),
};

/**
 * Validate configuration at startup
 */
export function validateSessionConfig(cfg: SessionConfig = sessionConfig): void {
  const errors: string[] = [];

  if (cfg.maxUptimeMs <= cfg.shutdownMarginMs) {
    errors.push('SESSION_MAX_UPTIME_S must be greater than SESSION_SHUTDOWN_MARGIN_S');
  }

  if (cfg.turnsPerTopicMin < 1 || cfg.turnsPerTopicMax < cfg.turnsPerTopicMin) {
    errors.push('TURNS_PER_TOPIC_MIN must be >= 1 and <= TURNS_PER_TOPIC_MAX');
  }

  if (cfg.settleMinMs < 0 || cfg.settleMaxMs < cfg.settleMinMs) {
    errors.push('SETTLE_MIN_MS must be >= 0 and <= SETTLE_MAX_MS');
  }

  if (cfg.listenerCapacity < 1) {
    errors.push('LISTENER_CAPACITY must be >= 1');
  }

  if (cfg.pacing.maxWordDelayMs < cfg.pacing.minWordDelayMs) {
    errors.push('Maximum word delay must be >= minimum word delay');
  }

  if (cfg.pacing.targetBudgetMs > cfg.aiGapMs) {
    errors.push('AI_GAP_S must leave room for a full utterance to stream');
  }

  if (errors.length > 0) {
    throw new Error(`Session configuration validation failed:\n${errors.join('\n')}`);
  }
}
