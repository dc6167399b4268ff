export type LLMProvider = 'openai' | 'anthropic';

/**
 * Chat model settings, resolved from the environment
 */
export interface LLMConfig {
  provider: LLMProvider;
  model: string;
  temperature: number;
  maxTokens: number;
  // OpenAI-compatible endpoint override (ignored for Anthropic)
  baseURL?: string;
  openai?: {
    apiKey: string;
  };
  anthropic?: {
    apiKey: string;
  };
}
