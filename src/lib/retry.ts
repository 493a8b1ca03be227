import { ConfigError, toError } from './errors.js';

const TRANSIENT_STATUSES = new Set([408, 425, 429, 500, 502, 503, 504, 529]);
const TRANSIENT_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ETIMEDOUT',
  'ECONNABORTED',
  'EAI_AGAIN',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);
const TRANSIENT_PATTERNS = [
  'rate limit',
  'rate_limit',
  'too many requests',
  'overloaded',
  'temporarily unavailable',
  'timed out',
  'timeout',
  'socket hang up',
  'fetch failed',
  'network error',
  'service unavailable',
  'gateway timeout',
  'bad gateway',
];
const RATE_LIMIT_PATTERNS = ['rate limit', 'rate_limit', 'too many requests'];

/** Upper bound for a server-suggested wait. */
const MAX_RETRY_AFTER_MS = 60_000;

type HeaderBag = Headers | Record<string, string | undefined>;

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

function readHeader(headers: HeaderBag | undefined, name: string): string | null {
  if (!headers) return null;
  if (headers instanceof Headers) {
    return headers.get(name);
  }
  const key = Object.keys(headers).find((k) => k.toLowerCase() === name.toLowerCase());
  const value = key ? headers[key] : undefined;
  return typeof value === 'string' ? value : null;
}

function getStatusCode(error: unknown): number | null {
  const fromTopLevel = (error as { status?: unknown; statusCode?: unknown }) ?? {};
  const topStatus = typeof fromTopLevel.status === 'number'
    ? fromTopLevel.status
    : (typeof fromTopLevel.statusCode === 'number' ? fromTopLevel.statusCode : null);
  if (topStatus != null) return topStatus;

  const responseStatus = (error as { response?: { status?: unknown } })?.response?.status;
  if (typeof responseStatus === 'number') return responseStatus;
  return null;
}

function getErrorCode(error: unknown): string | null {
  const code = (error as { code?: unknown })?.code;
  return typeof code === 'string' ? code.toUpperCase() : null;
}

function messageOf(error: unknown): string {
  return toError(error).message.toLowerCase();
}

export function isTransient(error: unknown): boolean {
  if (error instanceof ConfigError) return false;
  const status = getStatusCode(error);
  if (status != null && TRANSIENT_STATUSES.has(status)) return true;

  const code = getErrorCode(error);
  if (code && TRANSIENT_ERROR_CODES.has(code)) return true;

  const msg = messageOf(error);
  if (TRANSIENT_PATTERNS.some((p) => msg.includes(p))) return true;

  // Catch status text embedded in message ("Request failed with status 429")
  return /\b(408|425|429|500|502|503|504|529)\b/.test(msg);
}

/**
 * True when the failure signals rate limiting: HTTP 429 on the error or its
 * response, or a rate-limit marker in the message.
 */
export function isRateLimited(error: unknown): boolean {
  if (getStatusCode(error) === 429) return true;
  const msg = messageOf(error);
  if (RATE_LIMIT_PATTERNS.some((p) => msg.includes(p))) return true;
  return /\b429\b/.test(msg);
}

/**
 * Server-suggested delay in milliseconds, or 0 when there is none.
 *
 * Reads `Retry-After` (seconds or HTTP date) from the error or its response,
 * then falls back to "try again in 1.5s" / "try again in 250ms" hints that
 * OpenAI-style providers put in the error message.
 */
export function getRetryAfterMs(error: unknown, now: () => number = Date.now): number {
  const topHeaders = (error as { headers?: HeaderBag })?.headers;
  const responseHeaders = (error as { response?: { headers?: HeaderBag } })?.response?.headers;
  const retryAfter = readHeader(topHeaders, 'retry-after') ?? readHeader(responseHeaders, 'retry-after');

  if (retryAfter) {
    const seconds = Number.parseFloat(retryAfter);
    if (Number.isFinite(seconds) && seconds > 0) {
      return Math.min(seconds * 1000, MAX_RETRY_AFTER_MS);
    }
    const asDateMs = Date.parse(retryAfter);
    if (Number.isFinite(asDateMs)) {
      return Math.min(Math.max(0, asDateMs - now()), MAX_RETRY_AFTER_MS);
    }
  }

  const hint = /try again in ([0-9]+(?:\.[0-9]+)?)(ms|s)\b/i.exec(toError(error).message);
  if (hint) {
    const value = Number.parseFloat(hint[1]);
    const ms = hint[2].toLowerCase() === 'ms' ? value : value * 1000;
    return Math.min(ms, MAX_RETRY_AFTER_MS);
  }
  return 0;
}

// ─── Chunk-aware retry ───────────────────────────────────────────────

export interface BackoffPolicy {
  maxRetries: number;
  initialBackoffMs: number;
  maxBackoffMs: number;
  backoffJitterMs: number;
  minChunk: number;
}

/** Exponential schedule for 0-based `attempt`, capped, plus jitter. */
export function computeBackoffMs(
  attempt: number,
  policy: Pick<BackoffPolicy, 'initialBackoffMs' | 'maxBackoffMs' | 'backoffJitterMs'>,
  random: () => number = Math.random,
): number {
  const exponential = Math.min(policy.maxBackoffMs, policy.initialBackoffMs * 2 ** attempt);
  return exponential + random() * policy.backoffJitterMs;
}

export function shrinkChunk(size: number, minChunk: number): number {
  return Math.max(minChunk, Math.floor(size / 2));
}

export interface ChunkRetryDeps {
  sleep?: Sleep;
  random?: () => number;
  now?: () => number;
  onRetry?: (info: RetryInfo) => void;
}

export interface RetryInfo {
  attempt: number;
  error: Error;
  waitMs: number;
  rateLimited: boolean;
  chunkSize: number;
  previousChunkSize: number;
}

/**
 * Run `fn` up to `policy.maxRetries` times. Before each retry, wait the larger
 * of the server hint and the exponential backoff. Every rate-limit signal
 * halves the chunk size (never below `minChunk`); the caller receives the
 * reduced size and applies it to subsequent chunks.
 *
 * Throws the last error once attempts run out. ConfigError is rethrown at once.
 */
export async function withChunkRetry<T>(
  fn: () => Promise<T>,
  chunkSize: number,
  policy: BackoffPolicy,
  deps: ChunkRetryDeps = {},
): Promise<{ value: T; chunkSize: number }> {
  const wait = deps.sleep ?? sleep;
  const random = deps.random ?? Math.random;
  const now = deps.now ?? Date.now;

  let localChunk = chunkSize;
  let lastError: Error | undefined;

  for (let attempt = 0; attempt < policy.maxRetries; attempt++) {
    try {
      const value = await fn();
      return { value, chunkSize: localChunk };
    } catch (err) {
      if (err instanceof ConfigError) throw err;
      lastError = toError(err);

      if (attempt + 1 >= policy.maxRetries) break;

      const rateLimited = isRateLimited(err);
      const previousChunkSize = localChunk;
      if (rateLimited) {
        localChunk = shrinkChunk(localChunk, policy.minChunk);
      }
      const waitMs = Math.max(getRetryAfterMs(err, now), computeBackoffMs(attempt, policy, random));
      deps.onRetry?.({
        attempt,
        error: lastError,
        waitMs,
        rateLimited,
        chunkSize: localChunk,
        previousChunkSize,
      });
      await wait(waitMs);
    }
  }

  throw lastError ?? new Error('withChunkRetry: no attempts were made');
}

// ─── General transient retry ─────────────────────────────────────────

export async function withRetry<T>(
  fn: () => Promise<T>,
  options?: {
    maxAttempts?: number;
    baseDelay?: number;
    onRetry?: (attempt: number, error: Error) => void;
    sleep?: Sleep;
  },
): Promise<T> {
  const maxAttempts = options?.maxAttempts ?? 3;
  const baseDelay = options?.baseDelay ?? 1000;
  const wait = options?.sleep ?? sleep;

  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = toError(err);

      if (attempt >= maxAttempts || !isTransient(err)) {
        throw lastError;
      }

      options?.onRetry?.(attempt, lastError);

      // Prefer server-specified Retry-After delay; fall back to exponential backoff
      const retryAfterMs = getRetryAfterMs(err);
      const delay = retryAfterMs > 0
        ? retryAfterMs
        : baseDelay * Math.pow(2, attempt - 1) * (0.5 + Math.random());
      await wait(delay);
    }
  }

  throw lastError;
}
