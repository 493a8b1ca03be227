import path from 'node:path';
import { describe, it, expect } from 'vitest';
import { DEFAULT_PERSONAS, loadConfig, resolveInitialChunk } from '../lib/config.js';
import { ConfigError } from '../lib/errors.js';

describe('loadConfig', () => {
  it('applies defaults when the environment is empty', () => {
    const config = loadConfig({});

    expect(config.tpmBudget).toBe(360_000);
    expect(config.baseSleepMs).toBe(1_500);
    expect(config.maxRetries).toBe(5);
    expect(config.initialBackoffMs).toBe(2_000);
    expect(config.maxBackoffMs).toBe(30_000);
    expect(config.minChunk).toBe(10);
    expect(config.maxChunk).toBe(250);
    expect(config.maxPasses).toBe(3);
    expect(config.fuzzyMatch).toBe(true);
    expect(config.batchModel).toBe('gpt-4.1-nano');
    expect(config.streamModel).toBeUndefined();
    expect(config.validPersonas).toEqual([...DEFAULT_PERSONAS]);
    expect(config.outputDir).toBe(path.resolve('output'));
    expect(config.excludedEmailDomains).toEqual([]);
  });

  it('reads and coerces environment variables', () => {
    const config = loadConfig({
      TARGET_TPM_BUDGET: '90000',
      MIN_CHUNK: '5',
      MAX_CHUNK: '50',
      FF_FUZZY_MATCH: '0',
      VALID_PERSONAS: 'Alpha, Beta ,Gamma',
      EXCLUDED_EMAIL_DOMAINS: 'example.com,internal.test',
      OUTPUT_DIR: '/tmp/personas',
    });

    expect(config.tpmBudget).toBe(90_000);
    expect(config.minChunk).toBe(5);
    expect(config.maxChunk).toBe(50);
    expect(config.fuzzyMatch).toBe(false);
    expect(config.validPersonas).toEqual(['Alpha', 'Beta', 'Gamma']);
    expect(config.excludedEmailDomains).toEqual(['example.com', 'internal.test']);
    expect(config.outputDir).toBe('/tmp/personas');
  });

  it('ignores blank environment values', () => {
    expect(loadConfig({ MAX_PASSES: '  ' }).maxPasses).toBe(3);
  });

  it('lets overrides win over the environment', () => {
    const config = loadConfig({ MAX_PASSES: '2', FF_FUZZY_MATCH: 'true' }, { maxPasses: 7, fuzzyMatch: false });

    expect(config.maxPasses).toBe(7);
    expect(config.fuzzyMatch).toBe(false);
  });

  it('rejects invalid values with a ConfigError', () => {
    expect(() => loadConfig({ MAX_RETRIES: 'abc' })).toThrow(ConfigError);
    expect(() => loadConfig({ MAX_RETRIES: 'abc' })).toThrow(/^Invalid configuration: maxRetries: /);
  });

  it('rejects an empty persona list', () => {
    expect(() => loadConfig({ VALID_PERSONAS: ' , ' })).toThrow(/^Invalid configuration: validPersonas: /);
  });

  it('rejects minChunk above maxChunk', () => {
    expect(() => loadConfig({ MIN_CHUNK: '300' })).toThrow(
      'Invalid configuration: minChunk: minChunk must not exceed maxChunk',
    );
  });
});

describe('resolveInitialChunk', () => {
  it('starts at maxChunk by default', () => {
    expect(resolveInitialChunk({ minChunk: 10, maxChunk: 250 })).toBe(250);
  });

  it('clamps a requested start into bounds', () => {
    expect(resolveInitialChunk({ initialChunk: 4, minChunk: 10, maxChunk: 250 })).toBe(10);
    expect(resolveInitialChunk({ initialChunk: 999, minChunk: 10, maxChunk: 250 })).toBe(250);
    expect(resolveInitialChunk({ initialChunk: 40, minChunk: 10, maxChunk: 250 })).toBe(40);
  });
});
