import type { BatchApi } from '../lib/batch-client.js';
import type { EnrichmentConfig } from '../lib/config.js';
import { buildChatRequestBody, type OpenAIChatRequest } from '../lib/llm-provider.js';
import type { Logger } from '../lib/logger.js';
import { saveCheckpoint } from '../lib/save-checkpoint.js';
import type { Sleep } from '../lib/retry.js';
import { pollBatchUntilDone } from './batch-poller.js';
import { parseBatchOutput, parsePersonaJson, sanitizeJobTitle } from './parsing.js';
import type {
  ClassificationOutcome,
  ClassificationSource,
  PersonaClassification,
  ProspectRow,
} from './types.js';

const OUTPUT_FORMAT_INSTRUCTIONS = [
  'CRITICAL OUTPUT FORMAT: Respond with a SINGLE JSON object only.',
  'Required keys: {"persona": <one of the defined personas>, "certainty": <0-100 integer or %>}.',
  'Do not include extra keys, code fences, or commentary.',
].join('\n');

/** Per-row replies are one short JSON object. */
const BATCH_MAX_TOKENS = 200;

export interface BatchRequestLine {
  custom_id: string;
  method: 'POST';
  url: '/v1/chat/completions';
  body: OpenAIChatRequest;
}

/**
 * One chat-completion request per row, keyed by the row id so results can be
 * matched back regardless of output order.
 */
export function buildBatchRequests(
  rows: readonly ProspectRow[],
  systemPrompt: string,
  model: string,
): string {
  const system = `${systemPrompt.trim()}\n\n${OUTPUT_FORMAT_INSTRUCTIONS}`;
  return rows
    .map((row): BatchRequestLine => ({
      custom_id: row.id,
      method: 'POST',
      url: '/v1/chat/completions',
      body: buildChatRequestBody({
        model,
        system,
        max_tokens: BATCH_MAX_TOKENS,
        temperature: 0,
        messages: [{
          role: 'user',
          content: `Prospect Id: ${row.id}\nJob Title: ${sanitizeJobTitle(row.jobTitle)}\n\nReturn ONLY the JSON.`,
        }],
      }),
    }))
    .map((line) => JSON.stringify(line))
    .join('\n');
}

export interface BatchSourceParams {
  api: BatchApi;
  config: EnrichmentConfig;
  systemPrompt: string;
  log: Logger;
  /** Skip upload/create and poll an existing job instead. */
  resumeBatchId?: string;
  /** Log the full status payload on every poll. */
  printStatus?: boolean;
  checkpoint?: boolean;
  sleep?: Sleep;
  now?: () => number;
}

/**
 * Classification through the asynchronous Batch API: upload → create →
 * poll → download → parse.
 */
export class BatchSource implements ClassificationSource {
  readonly name = 'batch';
  private readonly params: BatchSourceParams;
  private batchId: string | null = null;

  constructor(params: BatchSourceParams) {
    this.params = params;
  }

  get lastBatchId(): string | null {
    return this.batchId;
  }

  async classify(rows: readonly ProspectRow[]): Promise<ClassificationOutcome> {
    const { api, config, log } = this.params;

    let batchId: string;
    if (this.params.resumeBatchId) {
      batchId = this.params.resumeBatchId;
      log.info({ batchId }, 'Resuming batch');
    } else {
      const jsonl = buildBatchRequests(rows, this.params.systemPrompt, config.batchModel);
      const inputFileId = await api.uploadBatchFile(jsonl);
      log.info({ inputFileId, requests: rows.length }, 'Uploaded requests file');
      batchId = await api.createBatch(inputFileId);
      log.info({ batchId }, 'Created batch');
    }
    this.batchId = batchId;

    const meta = await pollBatchUntilDone(api, batchId, {
      pollIntervalMs: config.pollIntervalMs,
      pollMaxBackoffMs: config.pollMaxBackoffMs,
      pollTimeoutMs: config.pollTimeoutMs,
      echo: this.params.printStatus,
    }, { sleep: this.params.sleep, now: this.params.now, log });

    if (meta.status !== 'completed') {
      if (this.params.checkpoint) {
        await saveCheckpoint(config.outputDir, `batch_${batchId}_meta`, meta, log);
      }
      throw new Error(`Batch not completed: ${meta.status}`);
    }
    const outputFileId = meta.output_file_id ?? meta.output_file_ids?.[0];
    if (!outputFileId) {
      throw new Error('No output file id in batch response.');
    }

    const jsonlOutput = await api.downloadFileContent(outputFileId);
    if (this.params.checkpoint) {
      await saveCheckpoint(config.outputDir, `batch_${batchId}_output`, jsonlOutput, log);
    }

    return toOutcome(rows, jsonlOutput, log);
  }
}

/**
 * Per-row JSON replies → classifications. Inner HTTP errors and replies that
 * hold no JSON become per-id error reasons.
 */
export function toOutcome(
  rows: readonly ProspectRow[],
  jsonlOutput: string,
  log?: Logger,
): ClassificationOutcome {
  const { results: contents, errors: rawErrors } = parseBatchOutput(jsonlOutput, log);
  const titles = new Map(rows.map((r) => [r.id, r.jobTitle]));

  const errors = new Map<string, string>();
  for (const [id, message] of rawErrors) {
    errors.set(id, `Batch error: ${message}`);
  }

  const results: PersonaClassification[] = [];
  for (const [id, content] of contents) {
    const reply = parsePersonaJson(content);
    if (!reply) {
      errors.set(id, `Invalid JSON: ${content.slice(0, 160)}...`);
      continue;
    }
    results.push({ id, jobTitle: titles.get(id) ?? '', ...reply });
  }

  if (errors.size > 0) {
    log?.warn({ errors: errors.size }, 'Batch output contained per-row errors');
  }
  return { results, errors };
}
