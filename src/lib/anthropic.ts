import { ConfigError } from './errors.js';

export const ANTHROPIC_DEFAULT_MODEL = 'claude-haiku-4-5-20251001';

type Env = Record<string, string | undefined>;

export interface AnthropicConfig {
  apiKey: string;
  model: string;
}

/**
 * Anthropic credentials and chat model, read from the given environment.
 * The SDK client itself is created on the provider's first call.
 */
export function getAnthropicConfig(env: Env = process.env): AnthropicConfig {
  const apiKey = env.ANTHROPIC_API_KEY;
  if (!apiKey) {
    throw new ConfigError('ANTHROPIC_API_KEY environment variable is required when LLM_PROVIDER=anthropic');
  }
  return { apiKey, model: env.ANTHROPIC_MODEL || ANTHROPIC_DEFAULT_MODEL };
}
