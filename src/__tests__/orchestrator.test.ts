import { describe, it, expect, vi } from 'vitest';
import { runPasses, type OrchestratorConfig } from '../enrichment/orchestrator.js';
import type { ProspectRow } from '../enrichment/types.js';
import { DEFAULT_PERSONAS } from '../lib/config.js';

const config: OrchestratorConfig = {
  tpmBudget: 360_000,
  baseSleepMs: 0,
  pacingJitterMs: 0,
  tokensPerRow: 120,
  maxRetries: 3,
  initialBackoffMs: 10,
  maxBackoffMs: 100,
  backoffJitterMs: 0,
  minChunk: 1,
  maxChunk: 3,
  maxPasses: 3,
  initialChunk: undefined,
  validPersonas: [...DEFAULT_PERSONAS],
};

const rows: ProspectRow[] = ['1', '2', '3'].map((id) => ({ id, email: '', jobTitle: 'Engineer' }));

function line(id: string, persona: string): string {
  return `${id},Engineer,${persona},80%`;
}

const deps = () => ({ sleep: vi.fn(async (_ms: number) => {}), random: () => 0 });

describe('runPasses', () => {
  it('re-asks for missing rows with a halved chunk size', async () => {
    const callChunk = vi.fn(async (chunk: readonly ProspectRow[]) => {
      if (chunk.length === 3) return [line('1', 'Data User'), line('2', 'Not a target')].join('\n');
      return chunk.map((r) => line(r.id, 'Application Developer')).join('\n');
    });
    const onPassStart = vi.fn();

    const result = await runPasses(rows, callChunk, config, { ...deps(), onPassStart });

    expect(callChunk.mock.calls.map(([chunk]) => chunk.map((r) => r.id))).toEqual([['1', '2', '3'], ['3']]);
    expect(result.remainingIds.size).toBe(0);
    expect(result.passes).toEqual([
      { pass: 1, chunkSize: 3, attempted: 3, failed: 0, remaining: 1 },
      { pass: 2, chunkSize: 1, attempted: 1, failed: 0, remaining: 0 },
    ]);
    expect(onPassStart.mock.calls).toEqual([[1, 3, 3], [2, 1, 1]]);
    expect(result.replies).toHaveLength(2);
  });

  it('stops after maxPasses with the unanswered ids remaining', async () => {
    const callChunk = vi.fn(async (chunk: readonly ProspectRow[]) =>
      chunk.filter((r) => r.id !== '3').map((r) => line(r.id, 'Data User')).join('\n'));

    const result = await runPasses(rows, callChunk, config, deps());

    expect(callChunk).toHaveBeenCalledTimes(3);
    expect([...result.remainingIds]).toEqual(['3']);
    expect(result.passes.map((p) => p.remaining)).toEqual([1, 1, 1]);
    expect(result.chunkSize).toBe(1);
  });

  it('re-queues rows of chunks that exhausted their retries', async () => {
    let calls = 0;
    const callChunk = vi.fn(async (chunk: readonly ProspectRow[]) => {
      calls += 1;
      if (calls <= config.maxRetries) throw new Error('boom');
      return chunk.map((r) => line(r.id, 'Data User')).join('\n');
    });

    const result = await runPasses(rows, callChunk, config, deps());

    expect(result.passes).toEqual([
      { pass: 1, chunkSize: 3, attempted: 3, failed: 3, remaining: 3 },
      { pass: 2, chunkSize: 1, attempted: 3, failed: 0, remaining: 0 },
    ]);
    expect(callChunk).toHaveBeenCalledTimes(6);
  });

  it('keeps the first answer for an id across passes', async () => {
    let calls = 0;
    const callChunk = vi.fn(async (chunk: readonly ProspectRow[]) => {
      calls += 1;
      const persona = calls === 1 ? 'Wizard' : 'Data User';
      return chunk.map((r) => line(r.id, persona)).join('\n');
    });

    const result = await runPasses(rows.slice(0, 1), callChunk, config, deps());

    expect(callChunk).toHaveBeenCalledTimes(3);
    expect([...result.remainingIds]).toEqual(['1']);
  });

  it('does nothing for an empty input', async () => {
    const callChunk = vi.fn(async () => '');

    const result = await runPasses([], callChunk, config, deps());

    expect(callChunk).not.toHaveBeenCalled();
    expect(result.passes).toEqual([]);
  });
});
