import pino from 'pino';
import { describe, it, expect, vi } from 'vitest';
import { StreamingSource, formatChunk } from '../enrichment/streaming-source.js';
import type { ProspectRow } from '../enrichment/types.js';
import { loadConfig } from '../lib/config.js';
import { LLMHttpError } from '../lib/errors.js';
import type { ChatParams, ChatResponse, LLMProvider } from '../lib/llm-provider.js';
import { RunMetrics } from '../lib/run-metrics.js';

const log = pino({ level: 'silent' });
const config = loadConfig({}, { minChunk: 1, maxChunk: 2 });
const timing = { sleep: vi.fn(async (_ms: number) => {}), random: () => 0, now: () => 0 };

const rows: ProspectRow[] = [
  { id: '1', email: '', jobTitle: 'Data Analyst' },
  { id: '2', email: '', jobTitle: 'VP, Sales' },
  { id: '3', email: '', jobTitle: 'SRE' },
];

/** Answers every `id,title` line of the latest user turn with Data User. */
function echoProvider(failures: Error[] = []) {
  const chat = vi.fn(async (params: ChatParams): Promise<ChatResponse> => {
    const failure = failures.shift();
    if (failure) throw failure;
    const latest = params.messages[params.messages.length - 1];
    const text = latest.content
      .split('\n')
      .map((line) => `${line},Data User,80%`)
      .join('\n');
    return { text, usage: { input_tokens: 100, output_tokens: 20 } };
  });
  const provider: LLMProvider = { name: 'openai', chat };
  return { provider, chat };
}

describe('formatChunk', () => {
  it('writes one id,title line per row without inner commas', () => {
    expect(formatChunk(rows)).toBe('1,Data Analyst\n2,VP  Sales\n3,SRE');
  });
});

describe('StreamingSource', () => {
  it('classifies every row in chunks over one conversation', async () => {
    const { provider, chat } = echoProvider();
    const source = new StreamingSource({ provider, config, systemPrompt: 'Frame', log, timing });

    const outcome = await source.classify(rows);

    expect(outcome.results).toEqual([
      { id: '1', jobTitle: 'Data Analyst', persona: 'Data User', certainty: '80%' },
      { id: '2', jobTitle: 'VP  Sales', persona: 'Data User', certainty: '80%' },
      { id: '3', jobTitle: 'SRE', persona: 'Data User', certainty: '80%' },
    ]);
    expect(outcome.errors.size).toBe(0);
    expect(chat).toHaveBeenCalledTimes(2);
    expect(chat.mock.calls[0][0].model).toBe('gpt-4.1-nano');
    expect(chat.mock.calls[1][0].messages).toHaveLength(3);
    expect(source.lastSession?.turns).toHaveLength(4);
    expect(source.metrics.snapshot().usage).toEqual({ input_tokens: 200, output_tokens: 40 });
  });

  it('counts calls, rate limits and chunk shrinks', async () => {
    const { provider, chat } = echoProvider([new LLMHttpError('OpenAI', 429, 'Rate limit reached')]);
    const metrics = new RunMetrics();
    const source = new StreamingSource({ provider, config, systemPrompt: 'Frame', log, timing, metrics });

    const outcome = await source.classify(rows);

    expect(outcome.results.map((r) => r.id)).toEqual(['1', '2', '3']);
    expect(chat.mock.calls.map(([params]) => params.messages[params.messages.length - 1].content)).toEqual([
      '1,Data Analyst\n2,VP  Sales',
      '1,Data Analyst\n2,VP  Sales',
      '3,SRE',
    ]);
    expect(metrics.snapshot().counters).toEqual({
      total: 3,
      ok: 2,
      status_4xx: 1,
      status_5xx: 0,
      status_429: 1,
      network: 0,
      retries: 1,
      chunk_shrinks: 1,
    });
  });

  it('uses the configured stream model', async () => {
    const { provider, chat } = echoProvider();
    const source = new StreamingSource({
      provider,
      config: { ...config, streamModel: 'custom-model' },
      systemPrompt: 'Frame',
      log,
      timing,
    });

    await source.classify(rows.slice(0, 1));

    expect(chat.mock.calls[0][0].model).toBe('custom-model');
  });
});
