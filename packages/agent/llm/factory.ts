import { Logger } from '@nestjs/common';
import { ChatOpenAI } from '@langchain/openai';
import { ChatAnthropic } from '@langchain/anthropic';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import type { LLMConfig } from './types.js';
import { getProviderDisplayName, loadLLMConfig, logLLMConfig, validateLLMConfig } from './config.js';

const logger = new Logger('LLMFactory');

/**
 * Build the tool-calling chat model for the configured provider.
 *
 * @param verbose - also log the resolved configuration (keys are never printed)
 *
 * @example
 * ```typescript
 * // Provider and model from environment
 * const model = createChatModel();
 *
 * // Explicit configuration
 * const claude = createChatModel({ ...loadLLMConfig(), provider: 'anthropic' });
 * ```
 */
export function createChatModel(config: LLMConfig = loadLLMConfig(), verbose = false): BaseChatModel {
  validateLLMConfig(config);

  logger.log(`Creating chat model with provider: ${getProviderDisplayName(config.provider)}`);
  if (verbose) {
    logLLMConfig(config, logger);
  }

  switch (config.provider) {
    case 'anthropic':
      return new ChatAnthropic({
        model: config.model,
        temperature: config.temperature,
        maxTokens: config.maxTokens,
        apiKey: config.anthropic?.apiKey,
      });

    case 'openai':
      return new ChatOpenAI({
        model: config.model,
        temperature: config.temperature,
        maxTokens: config.maxTokens,
        apiKey: config.openai?.apiKey,
        configuration: config.baseURL ? { baseURL: config.baseURL } : undefined,
      });
  }
}
