/**
 * Chat model configuration and construction
 *
 * Use `createChatModel()` to get a tool-calling model for the provider selected
 * by the environment (OpenAI or Anthropic).
 *
 * @module llm
 */

export type { LLMConfig, LLMProvider } from './types.js';
export { createChatModel } from './factory.js';
export {
  loadLLMConfig,
  validateLLMConfig,
  detectProvider,
  getProviderDisplayName,
  logLLMConfig,
  DEFAULT_MODELS,
  DEFAULT_TEMPERATURE,
  DEFAULT_MAX_TOKENS,
} from './config.js';
