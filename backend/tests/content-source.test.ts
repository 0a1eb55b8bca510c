/**
 * Content Source Tests
 */

import { describe, it, expect, vi } from 'vitest';
import type OpenAI from 'openai';
import {
  buildChatMessages,
  FallbackContentSource,
  LLMContentSource,
  type ContentRequest,
} from '../src/services/content/content-source.js';
import { LLMClient, type ChatCompletionsApi } from '../src/services/llm/client.js';
import { LLMError } from '../src/types/llm.js';
import { TransientContentError } from '../src/types/errors.js';
import type { LLMConfig } from '../src/config/llm.js';
import { PERSONA_A, ScriptedContentSource } from './helpers/fixtures.js';

const config: LLMConfig = {
  apiKey: 'test-key',
  baseURL: 'http://localhost:9999/v1',
  primaryModel: 'primary-model',
  backupModel: 'backup-model',
  temperature: 0.85,
  maxTokens: 150,
  timeoutMs: 20000,
};

function request(overrides: Partial<ContentRequest> = {}): ContentRequest {
  return {
    persona: PERSONA_A,
    system: 'You are Ada.',
    history: [],
    instruction: 'Say something.',
    ...overrides,
  };
}

function replying(content: string): LLMClient {
  const create = vi.fn(
    (body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming): Promise<OpenAI.Chat.ChatCompletion> =>
      Promise.resolve({
        id: 'cmpl-1',
        object: 'chat.completion',
        created: 1700000000,
        model: body.model,
        choices: [
          { index: 0, finish_reason: 'stop', logprobs: null, message: { role: 'assistant', content, refusal: null } },
        ],
      })
  );
  const api: ChatCompletionsApi = { chat: { completions: { create } } };
  return new LLMClient(config, api);
}

describe('buildChatMessages', () => {
  it('maps own turns to assistant and the peer turns to user', () => {
    const messages = buildChatMessages(
      request({
        history: [
          { role: 'peer', text: 'Cities need cars.' },
          { role: 'self', text: 'They need people more.' },
        ],
      })
    );

    expect(messages).toEqual([
      { role: 'system', content: 'You are Ada.' },
      { role: 'user', content: 'Cities need cars.' },
      { role: 'assistant', content: 'They need people more.' },
      { role: 'user', content: 'Say something.' },
    ]);
  });

  it('keeps only the most recent history entries', () => {
    const history = Array.from({ length: 20 }, (_, i) => ({ role: 'peer' as const, text: `turn ${i}` }));

    const messages = buildChatMessages(request({ history }), 16);

    expect(messages).toHaveLength(18);
    expect(messages[1]).toEqual({ role: 'user', content: 'turn 4' });
  });
});

describe('LLMContentSource', () => {
  it('returns the cleaned completion', async () => {
    const source = new LLMContentSource(replying('Ada: "Walkable streets win."'), 'primary-model');

    await expect(source.generate(request())).resolves.toBe('Walkable streets win.');
    expect(source.name).toBe('primary-model');
  });

  it('fails on an empty completion', async () => {
    const source = new LLMContentSource(replying('  ""  '), 'primary-model');

    const error = await source.generate(request()).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(LLMError);
    expect(error).toMatchObject({ code: 'empty_response' });
  });
});

describe('FallbackContentSource', () => {
  it('does not touch the backup when the primary succeeds', async () => {
    const primary = new ScriptedContentSource(() => 'primary text', 'p');
    const backup = new ScriptedContentSource(() => 'backup text', 'b');
    const source = new FallbackContentSource(primary, backup);

    await expect(source.generate(request())).resolves.toBe('primary text');
    expect(backup.requests).toHaveLength(0);
    expect(source.name).toBe('p+b');
  });

  it('asks the backup exactly once after a primary failure', async () => {
    const primary = new ScriptedContentSource(() => {
      throw new Error('overloaded');
    }, 'p');
    const backup = new ScriptedContentSource(() => 'backup text', 'b');
    const source = new FallbackContentSource(primary, backup);

    await expect(source.generate(request())).resolves.toBe('backup text');
    expect(primary.requests).toHaveLength(1);
    expect(backup.requests).toHaveLength(1);
  });

  it('raises a transient error carrying both failures', async () => {
    const primary = new ScriptedContentSource(() => {
      throw new Error('overloaded');
    }, 'p');
    const backup = new ScriptedContentSource(() => {
      throw new Error('timed out');
    }, 'b');
    const source = new FallbackContentSource(primary, backup);

    const error = await source.generate(request()).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TransientContentError);
    if (error instanceof TransientContentError) {
      expect(error.attempts.map((attempt) => attempt.message)).toEqual(['overloaded', 'timed out']);
    }
  });
});
