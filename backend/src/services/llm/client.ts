/**
 * LLM Client Implementation
 *
 * Client for OpenAI-compatible chat-completions endpoints with timeout
 * handling and token usage tracking. Every call is a single attempt;
 * fallback between models is decided by the content source.
 */

import OpenAI from 'openai';
import { createLogger } from '../../utils/logger.js';
import type {
  ChatMessage,
  FinishReason,
  LLMRequest,
  LLMResponse,
  TokenUsage,
} from '../../types/llm.js';
import { LLMError } from '../../types/llm.js';
import { llmConfig, type LLMConfig } from '../../config/llm.js';

const logger = createLogger({ module: 'llm-client' });

/**
 * Minimal surface of the OpenAI SDK used here, so tests can pass a stub
 */
export interface ChatCompletionsApi {
  chat: {
    completions: {
      create(
        body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming,
        options?: OpenAI.RequestOptions
      ): PromiseLike<OpenAI.Chat.ChatCompletion>;
    };
  };
}

function toMessageParam(message: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
  }
}

/**
 * LLM Client for chat completions
 */
export class LLMClient {
  private readonly api: ChatCompletionsApi;
  private readonly config: LLMConfig;

  constructor(config: LLMConfig = llmConfig, api?: ChatCompletionsApi) {
    this.config = config;
    this.api = api ?? new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      maxRetries: 0,
    });

    logger.info({ baseURL: config.baseURL }, 'LLM client initialized');
  }

  /**
   * Complete a chat request (single attempt)
   */
  async complete(request: LLMRequest): Promise<LLMResponse> {
    const startTime = Date.now();

    logger.debug({
      model: request.model,
      messageCount: request.messages.length,
      temperature: request.temperature,
      maxTokens: request.maxTokens,
    }, 'Starting LLM completion request');

    try {
      const response = await this.executeRequest(request);

      logger.info({
        model: response.model,
        usage: response.usage,
        duration: Date.now() - startTime,
        finishReason: response.finishReason,
      }, 'LLM completion successful');

      return response;
    } catch (error) {
      const llmError = this.handleError(error);

      logger.warn({
        model: request.model,
        duration: Date.now() - startTime,
        error: {
          code: llmError.code,
          message: llmError.message,
          retryable: llmError.retryable,
          statusCode: llmError.statusCode,
        },
      }, 'LLM completion failed');

      throw llmError;
    }
  }

  private async executeRequest(request: LLMRequest): Promise<LLMResponse> {
    const timeout = request.timeout ?? this.config.timeoutMs;

    const completion = await this.api.chat.completions.create(
      {
        model: request.model,
        messages: request.messages.map(toMessageParam),
        temperature: request.temperature ?? this.config.temperature,
        max_tokens: request.maxTokens ?? this.config.maxTokens,
        stream: false,
      },
      { timeout }
    );

    const choice = completion.choices[0];
    if (!choice) {
      throw new LLMError(
        'No completion choices returned',
        'server_error',
        true
      );
    }

    const usage: TokenUsage = {
      promptTokens: completion.usage?.prompt_tokens ?? 0,
      completionTokens: completion.usage?.completion_tokens ?? 0,
      totalTokens: completion.usage?.total_tokens ?? 0,
    };

    return {
      content: choice.message.content ?? '',
      model: completion.model,
      usage,
      finishReason: this.mapFinishReason(choice.finish_reason),
    };
  }

  /**
   * Map OpenAI finish reason to our standard format
   */
  private mapFinishReason(reason: string | null): FinishReason {
    switch (reason) {
      case 'stop':
        return 'stop';
      case 'length':
        return 'length';
      case 'content_filter':
        return 'content_filter';
      case 'tool_calls':
      case 'function_call':
        return 'tool_calls';
      default:
        return 'stop';
    }
  }

  /**
   * Translate provider errors into LLMError
   */
  private handleError(error: unknown): LLMError {
    if (error instanceof OpenAI.APIConnectionTimeoutError) {
      return new LLMError(error.message, 'timeout', true, undefined, error);
    }

    if (error instanceof OpenAI.APIError) {
      if (error.status === 429) {
        return new LLMError(error.message, 'rate_limit', true, error.status, error);
      }

      if (error.status === 401) {
        return new LLMError(error.message, 'authentication', false, error.status, error);
      }

      if (error.status === 400) {
        return new LLMError(error.message, 'invalid_request', false, error.status, error);
      }

      if (error.status && error.status >= 500) {
        return new LLMError(error.message, 'server_error', true, error.status, error);
      }
    }

    return LLMError.fromError(error);
  }
}
