import { Logger } from '@nestjs/common';
import type { LLMConfig, LLMProvider } from './types.js';

type Env = Record<string, string | undefined>;

export const DEFAULT_MODELS: Record<LLMProvider, string> = {
  openai: 'gpt-4.1',
  anthropic: 'claude-3-5-haiku-20241022',
};

export const DEFAULT_TEMPERATURE = 0.1;
export const DEFAULT_MAX_TOKENS = 8000;

const parseNumber = (value: string | undefined, fallback: number) => {
  if (value === undefined || value.trim() === '') return fallback;
  const num = Number(value);
  return Number.isFinite(num) ? num : fallback;
};

/**
 * Load chat model configuration from environment variables
 */
export function loadLLMConfig(env: Env = process.env): LLMConfig {
  const provider = detectProvider(env);

  const config: LLMConfig = {
    provider,
    model: env.MODEL_NAME?.trim() || DEFAULT_MODELS[provider],
    temperature: parseNumber(env.MODEL_TEMPERATURE, DEFAULT_TEMPERATURE),
    maxTokens: Math.trunc(parseNumber(env.MODEL_MAX_TOKENS, DEFAULT_MAX_TOKENS)),
    baseURL: env.MODEL_BASE_URL?.trim() || undefined,
  };

  if (env.OPENAI_API_KEY) {
    config.openai = { apiKey: env.OPENAI_API_KEY };
  }

  if (env.ANTHROPIC_API_KEY) {
    config.anthropic = { apiKey: env.ANTHROPIC_API_KEY };
  }

  return config;
}

/**
 * Detects which provider to use.
 * Priority:
 * 1. MODEL_PROVIDER env var (openai, anthropic/claude)
 * 2. ANTHROPIC_API_KEY present without OPENAI_API_KEY → anthropic
 * 3. Default to openai
 */
export function detectProvider(env: Env = process.env): LLMProvider {
  const explicitProvider = env.MODEL_PROVIDER?.trim().toLowerCase();

  if (explicitProvider === 'anthropic' || explicitProvider === 'claude') {
    return 'anthropic';
  }

  if (explicitProvider === 'openai') {
    return 'openai';
  }

  if (explicitProvider) {
    throw new Error(`Unsupported MODEL_PROVIDER: ${env.MODEL_PROVIDER}`);
  }

  if (env.ANTHROPIC_API_KEY && !env.OPENAI_API_KEY) {
    return 'anthropic';
  }

  return 'openai';
}

/**
 * @throws Error if the key for the selected provider is missing
 */
export function validateLLMConfig(config: LLMConfig): void {
  switch (config.provider) {
    case 'openai':
      if (!config.openai?.apiKey) {
        throw new Error('OpenAI API key is required. Set OPENAI_API_KEY environment variable.');
      }
      break;

    case 'anthropic':
      if (!config.anthropic?.apiKey) {
        throw new Error(
          'Anthropic API key is required. Set ANTHROPIC_API_KEY environment variable.',
        );
      }
      break;
  }
}

export function getProviderDisplayName(provider: LLMProvider): string {
  switch (provider) {
    case 'openai':
      return 'OpenAI';
    case 'anthropic':
      return 'Anthropic Claude';
  }
}

/**
 * Log current configuration (safe - doesn't log API keys)
 */
export function logLLMConfig(config: LLMConfig, logger = new Logger('LLMConfig')): void {
  const apiKey = config.provider === 'openai' ? config.openai?.apiKey : config.anthropic?.apiKey;
  logger.log(`Provider: ${getProviderDisplayName(config.provider)}`);
  logger.log(`Model: ${config.model} (temperature=${config.temperature}, maxTokens=${config.maxTokens})`);
  if (config.baseURL) logger.log(`Base URL: ${config.baseURL}`);
  logger.log(`API Key: ${apiKey ? '✓ Set' : '✗ Missing'}`);
}
