/**
 * LLM Client Tests
 * Request shaping and error mapping against a stubbed chat-completions API
 */

import { describe, it, expect, vi } from 'vitest';
import OpenAI from 'openai';
import { LLMClient, type ChatCompletionsApi } from '../src/services/llm/client.js';
import { LLMError } from '../src/types/llm.js';
import type { LLMConfig } from '../src/config/llm.js';

const config: LLMConfig = {
  apiKey: 'test-key',
  baseURL: 'http://localhost:9999/v1',
  primaryModel: 'primary-model',
  backupModel: 'backup-model',
  temperature: 0.85,
  maxTokens: 150,
  timeoutMs: 20000,
};

function completion(content: string | null, finishReason: 'stop' | 'length' = 'stop'): OpenAI.Chat.ChatCompletion {
  return {
    id: 'cmpl-1',
    object: 'chat.completion',
    created: 1700000000,
    model: 'primary-model',
    choices: [
      {
        index: 0,
        finish_reason: finishReason,
        logprobs: null,
        message: { role: 'assistant', content, refusal: null },
      },
    ],
    usage: { prompt_tokens: 12, completion_tokens: 8, total_tokens: 20 },
  };
}

function stubApi(reply: () => Promise<OpenAI.Chat.ChatCompletion>) {
  const create = vi.fn(
    (_body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming, _options?: OpenAI.RequestOptions) => reply()
  );
  const api: ChatCompletionsApi = { chat: { completions: { create } } };
  return { api, create };
}

describe('LLMClient', () => {
  it('sends the configured sampling settings and timeout', async () => {
    const { api, create } = stubApi(() => Promise.resolve(completion('Hello there')));
    const client = new LLMClient(config, api);

    const response = await client.complete({
      model: 'primary-model',
      messages: [
        { role: 'system', content: 'Be brief.' },
        { role: 'assistant', content: 'Earlier point' },
        { role: 'user', content: 'Your turn' },
      ],
    });

    expect(create).toHaveBeenCalledWith(
      {
        model: 'primary-model',
        messages: [
          { role: 'system', content: 'Be brief.' },
          { role: 'assistant', content: 'Earlier point' },
          { role: 'user', content: 'Your turn' },
        ],
        temperature: 0.85,
        max_tokens: 150,
        stream: false,
      },
      { timeout: 20000 }
    );
    expect(response).toEqual({
      content: 'Hello there',
      model: 'primary-model',
      usage: { promptTokens: 12, completionTokens: 8, totalTokens: 20 },
      finishReason: 'stop',
    });
  });

  it('lets a request override temperature, token cap and timeout', async () => {
    const { api, create } = stubApi(() => Promise.resolve(completion('ok', 'length')));
    const client = new LLMClient(config, api);

    const response = await client.complete({
      model: 'backup-model',
      messages: [{ role: 'user', content: 'hi' }],
      temperature: 0.2,
      maxTokens: 40,
      timeout: 5000,
    });

    expect(create.mock.calls[0]?.[0]).toMatchObject({ temperature: 0.2, max_tokens: 40 });
    expect(create.mock.calls[0]?.[1]).toEqual({ timeout: 5000 });
    expect(response.finishReason).toBe('length');
  });

  it('treats a null message content as empty text', async () => {
    const { api } = stubApi(() => Promise.resolve(completion(null)));
    const client = new LLMClient(config, api);

    const response = await client.complete({ model: 'primary-model', messages: [] });

    expect(response.content).toBe('');
  });

  it('rejects a completion without choices', async () => {
    const { api } = stubApi(() => Promise.resolve({ ...completion('x'), choices: [] }));
    const client = new LLMClient(config, api);

    await expect(client.complete({ model: 'primary-model', messages: [] })).rejects.toMatchObject({
      name: 'LLMError',
      code: 'server_error',
      retryable: true,
    });
  });

  it('maps provider status codes to error codes', async () => {
    const { api } = stubApi(() =>
      Promise.reject(new OpenAI.APIError(429, undefined, 'Too many requests', undefined))
    );
    const client = new LLMClient(config, api);

    await expect(client.complete({ model: 'primary-model', messages: [] })).rejects.toMatchObject({
      code: 'rate_limit',
      retryable: true,
      statusCode: 429,
    });
  });

  it('maps 5xx responses to retryable server errors', async () => {
    const { api } = stubApi(() =>
      Promise.reject(new OpenAI.APIError(503, undefined, 'Service unavailable', undefined))
    );
    const client = new LLMClient(config, api);

    await expect(client.complete({ model: 'primary-model', messages: [] })).rejects.toMatchObject({
      code: 'server_error',
      retryable: true,
      statusCode: 503,
    });
  });

  it('maps connection timeouts', async () => {
    const { api } = stubApi(() => Promise.reject(new OpenAI.APIConnectionTimeoutError()));
    const client = new LLMClient(config, api);

    await expect(client.complete({ model: 'primary-model', messages: [] })).rejects.toMatchObject({
      code: 'timeout',
      retryable: true,
    });
  });
});

describe('LLMError', () => {
  it('should create error with all properties', () => {
    const error = new LLMError('Test error', 'rate_limit', true, 429);

    expect(error.message).toBe('Test error');
    expect(error.code).toBe('rate_limit');
    expect(error.retryable).toBe(true);
    expect(error.statusCode).toBe(429);
    expect(error.name).toBe('LLMError');
  });

  it('should keep the original error as cause', () => {
    const original = new Error('socket hang up');
    const error = new LLMError('wrapped', 'unknown', false, undefined, original);

    expect(error.cause).toBe(original);
  });

  it('should detect rate limit errors from message', () => {
    const error = LLMError.fromError(new Error('Rate limit exceeded'));

    expect(error.code).toBe('rate_limit');
    expect(error.retryable).toBe(true);
  });

  it('should detect authentication errors from message', () => {
    const error = LLMError.fromError(new Error('Unauthorized: Invalid API key'));

    expect(error.code).toBe('authentication');
    expect(error.retryable).toBe(false);
  });

  it('should detect timeout errors from message', () => {
    const error = LLMError.fromError(new Error('Request timed out'));

    expect(error.code).toBe('timeout');
    expect(error.retryable).toBe(true);
  });

  it('should handle non-Error objects', () => {
    const error = LLMError.fromError('String error message');

    expect(error).toBeInstanceOf(LLMError);
    expect(error.message).toBe('String error message');
  });
});
