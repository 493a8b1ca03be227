import path from 'node:path';
import { z } from 'zod';
import { ConfigError } from './errors.js';

// ─── Personas ────────────────────────────────────────────────────────

export const DEFAULT_PERSONAS = [
  'Executive Sponsor',
  'Economic Buyer',
  'Data Product Manager/Owner',
  'Data User',
  'Application Developer',
  'Real-time Specialist',
  'Operator/Systems Administrator',
  'Technical Decision Maker',
  'Not a target',
] as const;

// ─── Schema ──────────────────────────────────────────────────────────

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();

const envBool = z.preprocess((val) => {
  if (typeof val !== 'string') return val;
  return val === '1' || val.toLowerCase() === 'true';
}, z.boolean());

const csvList = z.preprocess((val) => {
  if (typeof val !== 'string') return val;
  return val.split(',').map((s) => s.trim()).filter(Boolean);
}, z.array(z.string().min(1)));

export const EnrichmentConfigSchema = z.object({
  /** Chat model for the streaming source; falls back to the provider default. */
  streamModel: z.string().min(1).optional(),
  batchModel: z.string().min(1).default('gpt-4.1-nano'),

  /** Target tokens-per-minute budget used for pacing. */
  tpmBudget: positiveInt.default(360_000),
  baseSleepMs: nonNegativeInt.default(1_500),
  pacingJitterMs: nonNegativeInt.default(750),
  /** Rough per-row token cost used to estimate a chunk's budget share. */
  tokensPerRow: positiveInt.default(120),

  maxRetries: positiveInt.default(5),
  initialBackoffMs: nonNegativeInt.default(2_000),
  maxBackoffMs: nonNegativeInt.default(30_000),
  backoffJitterMs: nonNegativeInt.default(1_000),

  minChunk: positiveInt.default(10),
  maxChunk: positiveInt.default(250),
  initialChunk: positiveInt.optional(),
  maxPasses: positiveInt.default(3),

  maxOutputTokens: positiveInt.default(8_192),
  requestTimeoutMs: positiveInt.default(120_000),

  validPersonas: csvList.pipe(z.array(z.string().min(1)).min(1)).default([...DEFAULT_PERSONAS]),
  fuzzyMatch: envBool.default(true),
  fuzzyThreshold: z.coerce.number().min(0).max(1).default(0.85),

  pollIntervalMs: positiveInt.default(20_000),
  pollMaxBackoffMs: positiveInt.default(120_000),
  pollTimeoutMs: positiveInt.optional(),

  outputDir: z.string().min(1).default(path.resolve('output')),
  frameFile: z.string().min(1).default(path.resolve('prompts', 'frame_instructions.txt')),
  personasFile: z.string().min(1).default(path.resolve('prompts', 'persona_definitions.txt')),
  excludedEmailDomains: csvList.default([]),
}).refine((cfg) => cfg.minChunk <= cfg.maxChunk, {
  message: 'minChunk must not exceed maxChunk',
  path: ['minChunk'],
});

export type EnrichmentConfig = z.infer<typeof EnrichmentConfigSchema>;
export type EnrichmentConfigInput = z.input<typeof EnrichmentConfigSchema>;

// ─── Environment mapping ─────────────────────────────────────────────

const ENV_KEYS: Record<keyof EnrichmentConfig, string> = {
  streamModel: 'STREAM_MODEL',
  batchModel: 'BATCH_MODEL',
  tpmBudget: 'TARGET_TPM_BUDGET',
  baseSleepMs: 'BASE_SLEEP_MS',
  pacingJitterMs: 'PACING_JITTER_MS',
  tokensPerRow: 'SAFETY_TOKENS_PER_ROW',
  maxRetries: 'MAX_RETRIES',
  initialBackoffMs: 'INITIAL_BACKOFF_MS',
  maxBackoffMs: 'MAX_BACKOFF_MS',
  backoffJitterMs: 'BACKOFF_JITTER_MS',
  minChunk: 'MIN_CHUNK',
  maxChunk: 'MAX_CHUNK',
  initialChunk: 'INITIAL_CHUNK',
  maxPasses: 'MAX_PASSES',
  maxOutputTokens: 'MAX_TOKENS',
  requestTimeoutMs: 'REQUEST_TIMEOUT_MS',
  validPersonas: 'VALID_PERSONAS',
  fuzzyMatch: 'FF_FUZZY_MATCH',
  fuzzyThreshold: 'FUZZY_THRESHOLD',
  pollIntervalMs: 'BATCH_POLL_INTERVAL_MS',
  pollMaxBackoffMs: 'BATCH_POLL_MAX_BACKOFF_MS',
  pollTimeoutMs: 'BATCH_POLL_TIMEOUT_MS',
  outputDir: 'OUTPUT_DIR',
  frameFile: 'FRAME_FILE',
  personasFile: 'PERSONAS_FILE',
  excludedEmailDomains: 'EXCLUDED_EMAIL_DOMAINS',
};

type Env = Record<string, string | undefined>;

/**
 * Build the run configuration from environment variables plus explicit
 * overrides (CLI flags, tests). Overrides win over the environment.
 */
export function loadConfig(
  env: Env = process.env,
  overrides: Partial<EnrichmentConfigInput> = {},
): EnrichmentConfig {
  const raw: Record<string, unknown> = {};
  for (const [key, envKey] of Object.entries(ENV_KEYS)) {
    const value = env[envKey];
    if (value !== undefined && value.trim() !== '') raw[key] = value;
  }
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) raw[key] = value;
  }

  const result = EnrichmentConfigSchema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${detail}`);
  }
  return result.data;
}

/** Starting chunk size, clamped to the configured bounds. */
export function resolveInitialChunk(config: Pick<EnrichmentConfig, 'initialChunk' | 'minChunk' | 'maxChunk'>): number {
  const requested = config.initialChunk ?? config.maxChunk;
  return Math.min(config.maxChunk, Math.max(config.minChunk, requested));
}
