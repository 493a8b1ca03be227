import { describe, it, expect, vi } from 'vitest';

const mockCreate = vi.hoisted(() => vi.fn());
const mockConstruct = vi.hoisted(() => vi.fn());
vi.mock('@anthropic-ai/sdk', () => ({
  default: class {
    messages = { create: mockCreate };
    constructor(options: { apiKey: string }) {
      mockConstruct(options);
    }
  },
}));

import { getAnthropicConfig } from '../lib/anthropic.js';
import { ConfigError } from '../lib/errors.js';
import { createProvider, getDefaultModel } from '../lib/llm.js';

describe('getAnthropicConfig', () => {
  it('reads the key and model from the given environment', () => {
    expect(getAnthropicConfig({ ANTHROPIC_API_KEY: 'test-secret', ANTHROPIC_MODEL: 'claude-test' })).toEqual({
      apiKey: 'test-secret',
      model: 'claude-test',
    });
    expect(getAnthropicConfig({ ANTHROPIC_API_KEY: 'test-secret' }).model).toBe('claude-haiku-4-5-20251001');
  });

  it('requires a key', () => {
    expect(() => getAnthropicConfig({})).toThrow(ConfigError);
  });
});

describe('AnthropicProvider', () => {
  it('uses the key and model from the environment passed to createProvider', async () => {
    mockCreate.mockResolvedValueOnce({
      content: [{ type: 'text', text: ' 1,CTO,Executive Sponsor,90% ' }],
      usage: { input_tokens: 12, output_tokens: 8 },
    });
    const provider = createProvider({
      LLM_PROVIDER: 'anthropic',
      ANTHROPIC_API_KEY: 'test-secret',
      ANTHROPIC_MODEL: 'claude-test',
    });

    expect(provider.name).toBe('anthropic');
    expect(getDefaultModel(provider)).toBe('claude-test');
    expect(mockConstruct).not.toHaveBeenCalled();

    const response = await provider.chat({
      model: getDefaultModel(provider),
      system: 'Frame',
      messages: [{ role: 'user', content: '1,CTO' }],
      max_tokens: 100,
    });

    expect(mockConstruct).toHaveBeenCalledWith({ apiKey: 'test-secret' });
    expect(mockCreate.mock.calls[0][0]).toEqual({
      model: 'claude-test',
      max_tokens: 100,
      system: 'Frame',
      messages: [{ role: 'user', content: '1,CTO' }],
    });
    expect(mockCreate.mock.calls[0][1].maxRetries).toBe(0);
    expect(response).toEqual({
      text: '1,CTO,Executive Sponsor,90%',
      usage: { input_tokens: 12, output_tokens: 8 },
    });
  });
});
