import type { EnrichmentConfig } from '../lib/config.js';
import { getDefaultModel } from '../lib/llm.js';
import type { LLMProvider } from '../lib/llm-provider.js';
import type { Logger } from '../lib/logger.js';
import { RunMetrics } from '../lib/run-metrics.js';
import { saveCheckpoint } from '../lib/save-checkpoint.js';
import { runPasses } from './orchestrator.js';
import { parseLlmCsv, sanitizeJobTitle } from './parsing.js';
import { ChatSession } from './session.js';
import type { ClassificationOutcome, ClassificationSource, ProspectRow, TimingDeps } from './types.js';

export interface StreamingSourceParams {
  provider: LLMProvider;
  config: EnrichmentConfig;
  /** Frame instructions + persona definitions. */
  systemPrompt: string;
  log: Logger;
  metrics?: RunMetrics;
  timing?: Partial<TimingDeps>;
  /** Write raw replies under the output directory when done. */
  checkpoint?: boolean;
}

/** `id,jobTitle` lines, one per row, as the model expects them. */
export function formatChunk(rows: readonly ProspectRow[]): string {
  return rows.map((r) => `${r.id},${sanitizeJobTitle(r.jobTitle)}`).join('\n');
}

function statusOf(err: unknown): number | null {
  const status = (err as { status?: unknown })?.status;
  return typeof status === 'number' ? status : null;
}

/**
 * Chunked, paced classification over one conversation session. Every chunk
 * is sent as a new user turn in the same session.
 */
export class StreamingSource implements ClassificationSource {
  readonly name = 'streaming';
  readonly metrics: RunMetrics;
  private readonly params: StreamingSourceParams;
  private session: ChatSession | null = null;

  constructor(params: StreamingSourceParams) {
    this.params = params;
    this.metrics = params.metrics ?? new RunMetrics();
  }

  /** The session of the last `classify` call. */
  get lastSession(): ChatSession | null {
    return this.session;
  }

  async classify(rows: readonly ProspectRow[]): Promise<ClassificationOutcome> {
    const { provider, config, log, timing } = this.params;
    const now = timing?.now ?? Date.now;
    const model = config.streamModel ?? getDefaultModel(provider);
    const session = ChatSession.create(this.params.systemPrompt, model);
    this.session = session;

    const callChunk = async (chunk: readonly ProspectRow[]): Promise<string> => {
      const startedAt = now();
      try {
        const text = await session.ask(provider, formatChunk(chunk), {
          maxTokens: config.maxOutputTokens,
          timeoutMs: config.requestTimeoutMs,
        });
        this.metrics.recordCall(200, now() - startedAt);
        return text;
      } catch (err) {
        this.metrics.recordCall(statusOf(err), now() - startedAt);
        throw err;
      }
    };

    log.info({ rows: rows.length, model, provider: provider.name }, 'Streaming classification started');
    const outcome = await runPasses(rows, callChunk, config, {
      ...timing,
      log,
      onRetry: (info) => {
        this.metrics.recordRetry(info.chunkSize < info.previousChunkSize);
        log.warn(
          {
            attempt: info.attempt + 1,
            waitMs: Math.round(info.waitMs),
            rateLimited: info.rateLimited,
            chunkSize: info.chunkSize,
            error: info.error.message,
          },
          info.chunkSize < info.previousChunkSize
            ? `Rate limit: chunk ${info.previousChunkSize} → ${info.chunkSize}, retrying`
            : 'LLM call failed, retrying',
        );
      },
    });
    this.metrics.recordUsage(session.totalUsage);

    const enriched = outcome.replies.join('\n');
    if (this.params.checkpoint) {
      await saveCheckpoint(config.outputDir, 'stream_output', enriched, log);
    }

    if (outcome.remainingIds.size > 0) {
      log.warn({ remaining: outcome.remainingIds.size }, 'Rows left unclassified after final pass');
    }
    log.info({ passes: outcome.passes, metrics: this.metrics.snapshot() }, 'Streaming classification finished');

    return { results: parseLlmCsv(enriched, log), errors: new Map() };
  }
}
