/**
 * Session Engine Barrel Export
 */

export { SessionEngine } from './session-engine.js';
export type { EngineConfig, EngineStatus, SessionEngineOptions } from './session-engine.js';

export { ConversationHistory } from './conversation-history.js';
export type { HistoryEntry, HistoryRole } from './conversation-history.js';

export { displayBudgetMs, wordDelayMs } from './pacing.js';
