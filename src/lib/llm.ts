import { AnthropicProvider, OpenAIProvider, type LLMProvider } from './llm-provider.js';
import { ANTHROPIC_DEFAULT_MODEL, getAnthropicConfig } from './anthropic.js';
import { ConfigError } from './errors.js';

export const OPENAI_BASE_URL = 'https://api.openai.com/v1';

/** Cheapest model that still follows the persona output format reliably. */
export const OPENAI_MODEL = 'gpt-4.1-nano';

type Env = Record<string, string | undefined>;

export type ProviderName = 'openai' | 'anthropic';

export function resolveProviderName(env: Env = process.env): ProviderName {
  const configured = env.LLM_PROVIDER?.toLowerCase();
  if (configured === 'openai' || configured === 'anthropic') return configured;
  if (configured) {
    throw new ConfigError(`Unknown LLM_PROVIDER "${env.LLM_PROVIDER}" (expected openai or anthropic)`);
  }
  return env.OPENAI_API_KEY || !env.ANTHROPIC_API_KEY ? 'openai' : 'anthropic';
}

/**
 * OpenAI credentials. The batch endpoint only exists on the OpenAI-compatible
 * API, so batch runs call this regardless of LLM_PROVIDER.
 */
export function getOpenAIConfig(env: Env = process.env): { apiKey: string; baseUrl: string } {
  const apiKey = env.OPENAI_API_KEY;
  if (!apiKey) {
    throw new ConfigError('OPENAI_API_KEY not set (in env or .env).');
  }
  return { apiKey, baseUrl: env.OPENAI_BASE_URL ?? OPENAI_BASE_URL };
}

/** Chat provider for the streaming source, selected by LLM_PROVIDER. */
export function createProvider(env: Env = process.env): LLMProvider {
  const providerName = resolveProviderName(env);
  if (providerName === 'anthropic') {
    return new AnthropicProvider(getAnthropicConfig(env));
  }
  return new OpenAIProvider(getOpenAIConfig(env));
}

export function getDefaultModel(provider: Pick<LLMProvider, 'name' | 'defaultModel'>): string {
  if (provider.defaultModel) return provider.defaultModel;
  return provider.name === 'anthropic' ? ANTHROPIC_DEFAULT_MODEL : OPENAI_MODEL;
}
