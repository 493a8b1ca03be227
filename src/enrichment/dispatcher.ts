import type { EnrichmentConfig } from '../lib/config.js';
import { ConfigError, toError } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import { sleep, withChunkRetry, type RetryInfo } from '../lib/retry.js';
import type { ProspectRow, TimingDeps } from './types.js';

export type DispatchConfig = Pick<
  EnrichmentConfig,
  | 'tpmBudget'
  | 'baseSleepMs'
  | 'pacingJitterMs'
  | 'tokensPerRow'
  | 'maxRetries'
  | 'initialBackoffMs'
  | 'maxBackoffMs'
  | 'backoffJitterMs'
  | 'minChunk'
  | 'maxChunk'
>;

/** Sends one chunk to the model and returns its raw reply. */
export type ChunkCaller = (chunk: readonly ProspectRow[]) => Promise<string>;

export interface DispatchDeps extends Partial<TimingDeps> {
  log?: Logger;
  onRetry?: (info: RetryInfo) => void;
}

export interface DispatchResult {
  replies: string[];
  failedIds: Set<string>;
  /** Chunk size after any rate-limit shrinking during this sweep. */
  chunkSize: number;
}

export function estimateTokens(rowCount: number, tokensPerRow: number): number {
  return rowCount * tokensPerRow;
}

/**
 * Delay after a chunk: the larger of the base sleep and the chunk's share of
 * the per-minute token budget, plus jitter.
 */
export function paceDelayMs(
  rowCount: number,
  config: Pick<DispatchConfig, 'tpmBudget' | 'baseSleepMs' | 'pacingJitterMs' | 'tokensPerRow'>,
  random: () => number = Math.random,
): number {
  const est = estimateTokens(rowCount, config.tokensPerRow);
  const budgetShareMs = (est / Math.max(1, config.tpmBudget)) * 60_000;
  return Math.max(config.baseSleepMs, budgetShareMs) + random() * config.pacingJitterMs;
}

/**
 * Walk `rows` in chunks and push each through the retrying call.
 *
 * The chunk size only ever goes down within a sweep: a rate-limit shrink
 * reported by the retry helper applies to every later chunk. A chunk whose
 * retries are exhausted contributes its ids to `failedIds` and the sweep
 * moves on. ConfigError aborts the sweep.
 */
export async function dispatchChunks(
  rows: readonly ProspectRow[],
  startChunkSize: number,
  callChunk: ChunkCaller,
  config: DispatchConfig,
  deps: DispatchDeps = {},
): Promise<DispatchResult> {
  const wait = deps.sleep ?? sleep;
  const random = deps.random ?? Math.random;

  let chunkSize = Math.min(config.maxChunk, Math.max(config.minChunk, startChunkSize));
  const replies: string[] = [];
  const failedIds = new Set<string>();

  let i = 0;
  while (i < rows.length) {
    const end = Math.min(i + chunkSize, rows.length);
    const chunk = rows.slice(i, end);
    const pace = paceDelayMs(chunk.length, config, random);

    try {
      const { value, chunkSize: updated } = await withChunkRetry(
        () => callChunk(chunk),
        chunkSize,
        config,
        { sleep: wait, random, now: deps.now, onRetry: deps.onRetry },
      );
      chunkSize = updated;
      if (value) replies.push(value);
    } catch (err) {
      if (err instanceof ConfigError) throw err;
      for (const row of chunk) failedIds.add(row.id);
      deps.log?.error(
        { rows: `${i}:${end}`, ids: chunk.map((r) => r.id), error: toError(err).message },
        'Chunk failed after retries',
      );
    }

    await wait(pace);
    i = end;
  }

  return { replies, failedIds, chunkSize };
}
