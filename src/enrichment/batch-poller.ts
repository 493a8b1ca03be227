import type { BatchApi, BatchStatus } from '../lib/batch-client.js';
import { BatchTimeoutError, toError } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import { isTransient, sleep, type Sleep } from '../lib/retry.js';

const TERMINAL_STATUSES = new Set(['completed', 'failed', 'cancelled', 'canceled', 'expired']);

export function isTerminalStatus(status: string): boolean {
  return TERMINAL_STATUSES.has(status);
}

// ─── ETA ─────────────────────────────────────────────────────────────

export interface RequestCounts {
  total?: number;
  completed?: number;
  failed?: number;
}

/**
 * Seconds left at the observed throughput, or null ("unknown") when there is
 * nothing to measure yet: zero total, no start time, no elapsed time, or no
 * completed requests.
 */
export function estimateEta(
  counts: RequestCounts | null | undefined,
  startedAtSec: number | null | undefined,
  nowSec: number,
): number | null {
  const completed = counts?.completed ?? 0;
  const failed = counts?.failed ?? 0;
  const total = counts?.total ?? completed + failed;
  if (!total) return null;
  if (startedAtSec == null) return null;

  const elapsed = nowSec - startedAtSec;
  if (elapsed <= 0) return null;

  const rate = completed / elapsed;
  if (rate <= 0) return null;
  return Math.max(0, total - completed) / rate;
}

export function formatEta(seconds: number | null): string {
  if (seconds === null || !Number.isFinite(seconds) || seconds < 0) return 'unknown';
  const whole = Math.floor(seconds);
  const h = Math.floor(whole / 3600);
  const m = Math.floor((whole % 3600) / 60);
  const s = whole % 60;
  if (h) return `${h}h ${m}m ${s}s`;
  if (m) return `${m}m ${s}s`;
  return `${s}s`;
}

// ─── Poller ──────────────────────────────────────────────────────────

export interface PollOptions {
  pollIntervalMs: number;
  pollMaxBackoffMs: number;
  /** Hard wall-clock limit; omitted means poll until a terminal status. */
  pollTimeoutMs?: number;
  /** Log the full status payload on every poll instead of a summary line. */
  echo?: boolean;
}

export interface PollDeps {
  sleep?: Sleep;
  now?: () => number;
  log?: Logger;
}

/**
 * Poll a batch job until it reaches a terminal status and return the final
 * payload. Transient transport errors back off exponentially (starting at the poll
 * interval, capped at `pollMaxBackoffMs`) and the backoff resets after the
 * next successful poll. Anything else (auth, unknown batch id, a malformed
 * payload) is rethrown.
 */
export async function pollBatchUntilDone(
  api: Pick<BatchApi, 'retrieveBatch'>,
  batchId: string,
  options: PollOptions,
  deps: PollDeps = {},
): Promise<BatchStatus> {
  const wait = deps.sleep ?? sleep;
  const now = deps.now ?? Date.now;
  const log = deps.log;

  const start = now();
  let backoff = options.pollIntervalMs;

  while (true) {
    if (options.pollTimeoutMs !== undefined && now() - start > options.pollTimeoutMs) {
      throw new BatchTimeoutError(batchId, options.pollTimeoutMs);
    }

    let meta: BatchStatus;
    try {
      meta = await api.retrieveBatch(batchId);
    } catch (err) {
      if (!isTransient(err)) throw err;
      log?.warn(
        { batchId, error: toError(err).message, backoffMs: backoff },
        'Batch poll failed; backing off',
      );
      await wait(backoff);
      backoff = Math.min(options.pollMaxBackoffMs, backoff * 2);
      continue;
    }

    backoff = options.pollIntervalMs;
    const counts = meta.request_counts ?? undefined;
    const eta = estimateEta(counts, meta.in_progress_at, Math.floor(now() / 1000));

    if (options.echo) {
      log?.info({ batch: meta }, 'Batch status');
    } else {
      log?.info(
        {
          batchId,
          status: meta.status,
          completed: counts?.completed ?? 0,
          total: counts?.total ?? 0,
          eta: formatEta(eta),
        },
        'Batch progress',
      );
    }

    if (isTerminalStatus(meta.status)) return meta;
    await wait(options.pollIntervalMs);
  }
}
