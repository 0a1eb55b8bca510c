/**
 * LLM Configuration
 *
 * Configuration for the chat-completions content source loaded from
 * environment variables. Any OpenAI-compatible endpoint works; the defaults
 * target Groq's.
 */

import { config } from 'dotenv';
import { getEnvInt, getEnvVar } from './env.js';

// Load environment variables
config();

/**
 * LLM configuration interface
 */
export interface LLMConfig {
  /** API key and endpoint of the OpenAI-compatible provider */
  apiKey: string;
  baseURL: string;
  /** Model asked first for every utterance */
  primaryModel: string;
  /** Model asked once when the primary fails */
  backupModel: string;
  /** Sampling temperature for utterances */
  temperature: number;
  /** Completion token cap per utterance */
  maxTokens: number;
  /** Request timeout in milliseconds */
  timeoutMs: number;
}

/**
 * LLM configuration loaded from environment variables
 *
 * Environment variables:
 * - OPENAI_API_KEY: API key of the provider (required outside tests)
 * - OPENAI_BASE_URL: Provider base URL (default: Groq's OpenAI-compatible endpoint)
 * - LLM_PRIMARY_MODEL: Primary model (default: 'llama-3.1-8b-instant')
 * - LLM_BACKUP_MODEL: Backup model (default: 'meta-llama/llama-4-scout-17b-16e-instruct')
 * - LLM_MAX_TOKENS: Completion token cap (default: 150)
 * - LLM_TIMEOUT_MS: Request timeout in milliseconds (default: 20000)
 */
export const llmConfig: LLMConfig = {
  apiKey: getEnvVar('OPENAI_API_KEY'),
  baseURL: getEnvVar('OPENAI_BASE_URL', false, 'https://api.groq.com/openai/v1'),
  primaryModel: getEnvVar('LLM_PRIMARY_MODEL', false, 'llama-3.1-8b-instant'),
  backupModel: getEnvVar('LLM_BACKUP_MODEL', false, 'meta-llama/llama-4-scout-17b-16e-instruct'),
  temperature: 0.85,
  maxTokens: getEnvInt('LLM_MAX_TOKENS', 150),
  timeoutMs: getEnvInt('LLM_TIMEOUT_MS', 20000),
};

/**
 * Validate configuration at startup
 */
export function validateLLMConfig(cfg: LLMConfig = llmConfig): void {
  const errors: string[] = [];

  if (!cfg.apiKey) {
    errors.push('OPENAI_API_KEY is required');
  }

  if (cfg.primaryModel === cfg.backupModel) {
    errors.push('LLM_BACKUP_MODEL must differ from LLM_PRIMARY_MODEL');
  }

  if (cfg.maxTokens < 16) {
    errors.push('LLM_MAX_TOKENS must be >= 16');
  }

  if (cfg.timeoutMs < 1000) {
    errors.push('LLM_TIMEOUT_MS must be >= 1000 (1 second)');
  }

  if (errors.length > 0) {
    throw new Error(`LLM configuration validation failed:\n${errors.join('\n')}`);
  }
}
