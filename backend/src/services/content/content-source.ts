/**
 * Content Sources
 *
 * Produce one short utterance for a persona from its system prompt, its
 * view of the recent conversation and a turn instruction.
 */

import { createLogger } from '../../utils/logger.js';
import { LLMError, type ChatMessage } from '../../types/llm.js';
import { TransientContentError, toError } from '../../types/errors.js';
import type { Persona } from '../../types/session.js';
import type { HistoryEntry } from '../engine/conversation-history.js';
import type { LLMClient } from '../llm/client.js';
import { cleanUtterance, MAX_UTTERANCE_WORDS } from './utterance-cleaner.js';

const logger = createLogger({ module: 'ContentSource' });

/** History entries passed to the model */
export const MAX_CONTEXT_ENTRIES = 16;

export interface ContentRequest {
  persona: Persona;
  /** System prompt describing the persona and the situation */
  system: string;
  /** The persona's own view of recent AI turns */
  history: HistoryEntry[];
  /** What to do this turn */
  instruction: string;
}

export interface ContentSource {
  readonly name: string;
  generate(request: ContentRequest): Promise<string>;
}

/**
 * Build chat-completions messages: own turns as assistant, the peer's as user
 */
export function buildChatMessages(
  request: ContentRequest,
  maxEntries: number = MAX_CONTEXT_ENTRIES
): ChatMessage[] {
  const history: ChatMessage[] = request.history.slice(-maxEntries).map((entry) => ({
    role: entry.role === 'self' ? 'assistant' : 'user',
    content: entry.text,
  }));

  return [
    { role: 'system', content: request.system },
    ...history,
    { role: 'user', content: request.instruction },
  ];
}

/**
 * One chat-completions model
 */
export class LLMContentSource implements ContentSource {
  readonly name: string;
  private readonly client: LLMClient;
  private readonly model: string;
  private readonly maxWords: number;

  constructor(client: LLMClient, model: string, maxWords: number = MAX_UTTERANCE_WORDS) {
    this.client = client;
    this.model = model;
    this.name = model;
    this.maxWords = maxWords;
  }

  async generate(request: ContentRequest): Promise<string> {
    const response = await this.client.complete({
      model: this.model,
      messages: buildChatMessages(request),
    });

    const text = cleanUtterance(response.content, request.persona.name, this.maxWords);
    if (!text) {
      throw new LLMError(`Empty utterance from ${this.model}`, 'empty_response', true);
    }
    return text;
  }
}

/**
 * Primary source with exactly one backup attempt
 */
export class FallbackContentSource implements ContentSource {
  readonly name: string;
  private readonly primary: ContentSource;
  private readonly backup: ContentSource;

  constructor(primary: ContentSource, backup: ContentSource) {
    this.primary = primary;
    this.backup = backup;
    this.name = `${primary.name}+${backup.name}`;
  }

  async generate(request: ContentRequest): Promise<string> {
    try {
      return await this.primary.generate(request);
    } catch (error) {
      const primaryError = toError(error);
      logger.warn(
        { source: this.primary.name, persona: request.persona.id, error: primaryError.message },
        'Primary content source failed, trying backup'
      );

      try {
        return await this.backup.generate(request);
      } catch (backupFailure) {
        const backupError = toError(backupFailure);
        throw new TransientContentError(
          `Content sources failed: ${primaryError.message}; ${backupError.message}`,
          [primaryError, backupError]
        );
      }
    }
  }
}
