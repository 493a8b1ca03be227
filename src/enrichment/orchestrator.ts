/**
 * Multi-pass orchestrator for the streaming source.
 *
 * Each pass:
 *   1. Dispatch every row whose id is still remaining
 *   2. Re-parse the replies of all passes so far (first answer per id wins)
 *   3. remaining := (remaining − ids with a valid persona) ∪ ids of exhausted chunks
 *   4. If anything remains, halve the chunk size (floored) for the next pass
 *
 * Stops when nothing remains or after `maxPasses`. Rows still remaining at
 * that point surface as skipped in the accept/skip stage.
 */

import { resolveInitialChunk, type EnrichmentConfig } from '../lib/config.js';
import type { Logger } from '../lib/logger.js';
import { shrinkChunk } from '../lib/retry.js';
import { firstResultById } from './classification.js';
import { dispatchChunks, type ChunkCaller, type DispatchConfig, type DispatchDeps } from './dispatcher.js';
import { parseLlmCsv } from './parsing.js';
import type { ProspectRow } from './types.js';

export type OrchestratorConfig = DispatchConfig
  & Pick<EnrichmentConfig, 'maxPasses' | 'initialChunk' | 'validPersonas'>;

export interface PassSummary {
  pass: number;
  chunkSize: number;
  attempted: number;
  failed: number;
  remaining: number;
}

export interface PassesResult {
  /** Raw replies from every pass, in call order. */
  replies: string[];
  /** Ids without a valid persona after the last pass. */
  remainingIds: Set<string>;
  passes: PassSummary[];
  chunkSize: number;
}

export interface OrchestratorDeps extends DispatchDeps {
  onPassStart?: (pass: number, rows: number, chunkSize: number) => void;
}

export async function runPasses(
  rows: readonly ProspectRow[],
  callChunk: ChunkCaller,
  config: OrchestratorConfig,
  deps: OrchestratorDeps = {},
): Promise<PassesResult> {
  const log = deps.log;
  const vocabulary = new Set(config.validPersonas);

  let chunkSize = resolveInitialChunk(config);
  let remainingIds = new Set(rows.map((r) => r.id));
  const replies: string[] = [];
  const passes: PassSummary[] = [];

  for (let pass = 1; pass <= config.maxPasses; pass++) {
    if (remainingIds.size === 0) break;

    const passRows = rows.filter((r) => remainingIds.has(r.id));
    log?.info(
      { pass, maxPasses: config.maxPasses, remaining: passRows.length, chunkSize },
      'Starting pass',
    );
    deps.onPassStart?.(pass, passRows.length, chunkSize);

    const sweep = await dispatchChunks(passRows, chunkSize, callChunk, config, deps);
    replies.push(...sweep.replies);
    chunkSize = sweep.chunkSize;

    // Cumulative parse across passes: an id answered in an earlier pass keeps that answer.
    const byId = firstResultById(parseLlmCsv(replies.join('\n'), log));
    const okIds = new Set<string>();
    for (const [id, result] of byId) {
      if (vocabulary.has(result.persona.trim())) okIds.add(id);
    }

    const before = remainingIds.size;
    const next = new Set<string>();
    for (const id of remainingIds) {
      if (!okIds.has(id)) next.add(id);
    }
    for (const id of sweep.failedIds) next.add(id);
    remainingIds = next;

    passes.push({
      pass,
      chunkSize,
      attempted: passRows.length,
      failed: sweep.failedIds.size,
      remaining: remainingIds.size,
    });
    log?.info(
      { pass, processed: before - remainingIds.size, remaining: remainingIds.size },
      'Pass summary',
    );

    if (remainingIds.size > 0) {
      chunkSize = shrinkChunk(chunkSize, config.minChunk);
    }
  }

  return { replies, remainingIds, passes, chunkSize };
}
