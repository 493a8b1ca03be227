import { z } from 'zod';
import { toHttpError } from './llm-provider.js';
import { withRetry } from './retry.js';

// ─── Wire schemas ────────────────────────────────────────────────────

const IdPayloadSchema = z.object({ id: z.string().min(1) }).passthrough();

export const BatchStatusSchema = z.object({
  id: z.string(),
  status: z.string(),
  request_counts: z.object({
    total: z.number().int().nonnegative().optional(),
    completed: z.number().int().nonnegative().optional(),
    failed: z.number().int().nonnegative().optional(),
  }).nullish(),
  created_at: z.number().nullish(),
  in_progress_at: z.number().nullish(),
  output_file_id: z.string().nullish(),
  output_file_ids: z.array(z.string()).nullish(),
  error_file_id: z.string().nullish(),
}).passthrough();

export type BatchStatus = z.infer<typeof BatchStatusSchema>;

/** Operations the batch source and the poller need from the provider. */
export interface BatchApi {
  uploadBatchFile(jsonl: string, filename?: string): Promise<string>;
  createBatch(inputFileId: string, completionWindow?: string): Promise<string>;
  retrieveBatch(batchId: string): Promise<BatchStatus>;
  downloadFileContent(fileId: string): Promise<string>;
}

interface SendInit {
  method: 'GET' | 'POST';
  body?: string | FormData;
  headers?: Record<string, string>;
}

interface BatchClientConfig {
  apiKey: string;
  baseUrl: string;
  /** Per-request timeout for uploads/downloads. */
  timeoutMs?: number;
}

/**
 * OpenAI-compatible Batch API client over fetch. Upload and download retry
 * transient failures. Batch creation is not idempotent and status retrieval
 * is retried by the poller, so neither retries here.
 */
export class BatchClient implements BatchApi {
  private apiKey: string;
  private baseUrl: string;
  private timeoutMs: number;

  constructor(config: BatchClientConfig) {
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
    this.timeoutMs = config.timeoutMs ?? 300_000;
  }

  async uploadBatchFile(jsonl: string, filename = 'requests.jsonl'): Promise<string> {
    return withRetry(async () => {
      const form = new FormData();
      form.append('purpose', 'batch');
      form.append('file', new Blob([jsonl], { type: 'application/jsonl' }), filename);
      const data = await this.request('/files', { method: 'POST', body: form });
      return IdPayloadSchema.parse(data).id;
    });
  }

  async createBatch(inputFileId: string, completionWindow = '24h'): Promise<string> {
    const data = await this.request('/batches', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        input_file_id: inputFileId,
        endpoint: '/v1/chat/completions',
        completion_window: completionWindow,
      }),
    });
    return IdPayloadSchema.parse(data).id;
  }

  async retrieveBatch(batchId: string): Promise<BatchStatus> {
    const data = await this.request(`/batches/${encodeURIComponent(batchId)}`, { method: 'GET' });
    return BatchStatusSchema.parse(data);
  }

  async downloadFileContent(fileId: string): Promise<string> {
    return withRetry(async () => {
      const response = await this.send(`/files/${encodeURIComponent(fileId)}/content`, { method: 'GET' });
      return response.text();
    });
  }

  private async request(route: string, init: SendInit): Promise<unknown> {
    const response = await this.send(route, init);
    return response.json();
  }

  private async send(route: string, init: SendInit): Promise<Response> {
    const response = await fetch(`${this.baseUrl}${route}`, {
      method: init.method,
      body: init.body,
      headers: {
        ...init.headers,
        'Authorization': `Bearer ${this.apiKey}`,
      },
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!response.ok) {
      throw await toHttpError('OpenAI', response);
    }
    return response;
  }
}
