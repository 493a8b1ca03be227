/**
 * Error classes shared by the enrichment pipeline.
 *
 * ConfigError is fatal and never retried. LLMHttpError carries the status
 * and headers the retry helpers classify.
 */

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

type HeaderBag = Headers | Record<string, string | undefined>;

export class LLMHttpError extends Error {
  readonly status: number;
  readonly headers: HeaderBag;

  constructor(provider: string, status: number, detail: string, headers: HeaderBag = {}) {
    super(`${provider} API error ${status}: ${detail}`);
    this.name = 'LLMHttpError';
    this.status = status;
    this.headers = headers;
  }
}

export class BatchTimeoutError extends Error {
  readonly batchId: string;

  constructor(batchId: string, timeoutMs: number) {
    super(`Batch ${batchId} did not finish within ${Math.round(timeoutMs / 1000)}s`);
    this.name = 'BatchTimeoutError';
    this.batchId = batchId;
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
