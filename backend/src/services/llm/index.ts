/**
 * LLM Service Barrel Export
 */

export { LLMClient } from './client.js';
export type { ChatCompletionsApi } from './client.js';
export type {
  LLMRequest,
  LLMResponse,
  ChatMessage,
  MessageRole,
  TokenUsage,
  FinishReason,
  LLMErrorCode,
} from '../../types/llm.js';
export { LLMError } from '../../types/llm.js';
export { llmConfig, validateLLMConfig } from '../../config/llm.js';
export type { LLMConfig } from '../../config/llm.js';
