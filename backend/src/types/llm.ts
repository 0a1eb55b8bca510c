/**
 * LLM API Integration Types
 *
 * Type definitions for the chat-completions client used as the content
 * source for persona utterances.
 */

/**
 * Message role in conversation
 */
export type MessageRole = 'system' | 'user' | 'assistant';

/**
 * Chat message structure
 */
export interface ChatMessage {
  /** Role of the message sender */
  role: MessageRole;
  /** Content of the message */
  content: string;
}

/**
 * LLM completion request
 */
export interface LLMRequest {
  /** Model identifier (e.g., 'llama-3.1-8b-instant') */
  model: string;
  /** Conversation messages */
  messages: ChatMessage[];
  /** Temperature for response randomness (0.0 - 2.0) */
  temperature?: number;
  /** Maximum tokens to generate */
  maxTokens?: number;
  /** Request timeout in milliseconds */
  timeout?: number;
}

/**
 * Token usage statistics
 */
export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/**
 * Reason why the completion finished
 */
export type FinishReason = 'stop' | 'length' | 'content_filter' | 'tool_calls' | 'error';

/**
 * LLM completion response
 */
export interface LLMResponse {
  /** Generated content */
  content: string;
  /** Model that generated the response */
  model: string;
  /** Token usage statistics */
  usage: TokenUsage;
  /** Reason the completion finished */
  finishReason: FinishReason;
}

/**
 * LLM error codes
 */
export type LLMErrorCode =
  | 'rate_limit'        // Rate limit exceeded
  | 'timeout'           // Request timed out
  | 'invalid_request'   // Invalid request parameters
  | 'server_error'      // Server-side error
  | 'authentication'    // Authentication failed
  | 'not_found'         // Resource not found
  | 'empty_response'    // Completion came back with no usable text
  | 'unknown';          // Unknown error

/**
 * Custom error class for LLM operations
 */
export class LLMError extends Error {
  /** Error code categorizing the error type */
  public readonly code: LLMErrorCode;
  /** Whether the error is retryable */
  public readonly retryable: boolean;
  /** HTTP status code if applicable */
  public readonly statusCode?: number;

  constructor(
    message: string,
    code: LLMErrorCode,
    retryable: boolean,
    statusCode?: number,
    cause?: Error
  ) {
    super(message, cause ? { cause } : undefined);
    this.name = 'LLMError';
    this.code = code;
    this.retryable = retryable;
    this.statusCode = statusCode;

    // Maintains proper stack trace for where error was thrown (V8 engines)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LLMError);
    }
  }

  /**
   * Create an LLMError from an unknown error
   */
  static fromError(error: unknown, defaultCode: LLMErrorCode = 'unknown'): LLMError {
    if (error instanceof LLMError) {
      return error;
    }

    if (error instanceof Error) {
      const message = error.message.toLowerCase();

      if (message.includes('rate limit') || message.includes('429')) {
        return new LLMError(error.message, 'rate_limit', true, 429, error);
      }

      if (message.includes('timeout') || message.includes('timed out')) {
        return new LLMError(error.message, 'timeout', true, undefined, error);
      }

      if (message.includes('authentication') || message.includes('unauthorized') || message.includes('401')) {
        return new LLMError(error.message, 'authentication', false, 401, error);
      }

      if (message.includes('not found') || message.includes('404')) {
        return new LLMError(error.message, 'not_found', false, 404, error);
      }

      if (message.includes('invalid') || message.includes('bad request') || message.includes('400')) {
        return new LLMError(error.message, 'invalid_request', false, 400, error);
      }

      if (message.includes('server error') || message.includes('500') || message.includes('503')) {
        return new LLMError(error.message, 'server_error', true, 500, error);
      }

      return new LLMError(error.message, defaultCode, false, undefined, error);
    }

    return new LLMError(String(error), defaultCode, false);
  }
}
