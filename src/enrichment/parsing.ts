import Papa from 'papaparse';
import { z } from 'zod';
import { repairJSON } from '../lib/json-repair.js';
import type { Logger } from '../lib/logger.js';
import type { PersonaClassification } from './types.js';

const LLM_CSV_FIELDS = 4;

/** Commas in a job title would break the `id,title` lines sent to the model. */
export function sanitizeJobTitle(title: string | null | undefined): string {
  return (title ?? '').replace(/,/g, ' ');
}

// ─── Streaming replies (CSV-shaped text) ─────────────────────────────

/**
 * Parse `id,job title,persona,certainty` lines from one or more model replies.
 *
 * Lines with extra columns keep the first four; lines with fewer than four
 * fields are dropped. Both cases are logged and never abort the batch.
 */
export function parseLlmCsv(text: string, log?: Logger): PersonaClassification[] {
  if (!text.trim()) return [];

  const parsed = Papa.parse<string[]>(text.trim(), {
    header: false,
    delimiter: ',',
    skipEmptyLines: 'greedy',
  });

  const rows: PersonaClassification[] = [];
  let extraColumns = 0;
  let malformed = 0;

  for (const fields of parsed.data) {
    if (fields.length < LLM_CSV_FIELDS) {
      malformed += 1;
      log?.warn({ line: fields.join(',').slice(0, 200) }, 'Dropping malformed LLM output line');
      continue;
    }
    if (fields.length > LLM_CSV_FIELDS) extraColumns += 1;

    const [id, jobTitle, persona, certainty] = fields.map((f) => f.trim());
    if (!id) {
      malformed += 1;
      continue;
    }
    rows.push({ id, jobTitle, persona, certainty });
  }

  if (extraColumns > 0) {
    log?.warn({ lines: extraColumns }, 'Extra columns present in LLM output; using first four');
  }
  if (malformed > 0) {
    log?.debug({ malformed, parsed: rows.length }, 'LLM output parsed with dropped lines');
  }
  return rows;
}

// ─── Batch output (JSONL) ────────────────────────────────────────────

const BatchOutputLineSchema = z.object({
  custom_id: z.union([z.string(), z.number()]).transform(String),
  response: z.object({
    status_code: z.number().int().nullish(),
    body: z.unknown(),
  }).nullish(),
  error: z.object({ message: z.string().nullish() }).passthrough().nullish(),
});

const SuccessBodySchema = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string() }),
  })).min(1),
});

const ErrorBodySchema = z.object({
  error: z.object({ message: z.string() }),
});

export interface BatchOutput {
  /** custom_id → assistant message content */
  results: Map<string, string>;
  /** custom_id → error description */
  errors: Map<string, string>;
}

/**
 * Parse the Batch API output file. Successful lines land in `results`;
 * non-200 inner statuses and malformed success bodies land in `errors` under
 * the same id. Lines that are not JSON, or carry no id, are logged and dropped.
 */
export function parseBatchOutput(jsonl: string, log?: Logger): BatchOutput {
  const results = new Map<string, string>();
  const errors = new Map<string, string>();

  for (const [index, line] of jsonl.split(/\r?\n/).entries()) {
    if (!line.trim()) continue;

    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      log?.warn({ line: index + 1, snippet: line.slice(0, 160) }, 'Skipping unparseable batch output line');
      continue;
    }

    const parsedLine = BatchOutputLineSchema.safeParse(raw);
    if (!parsedLine.success) {
      log?.warn({ line: index + 1 }, 'Skipping batch output line without custom_id');
      continue;
    }

    const { custom_id: id, response, error } = parsedLine.data;
    const status = response?.status_code ?? 0;

    if (status === 200) {
      const body = SuccessBodySchema.safeParse(response?.body);
      if (body.success) {
        results.set(id, body.data.choices[0].message.content);
      } else {
        errors.set(id, `Malformed success body: ${body.error.issues[0]?.message ?? 'unknown shape'}`);
      }
      continue;
    }

    const errorBody = ErrorBodySchema.safeParse(response?.body);
    const message = errorBody.success
      ? errorBody.data.error.message
      : (error?.message ?? JSON.stringify(response?.body ?? null));
    errors.set(id, `HTTP ${status}: ${message}`);
  }

  return { results, errors };
}

// ─── Batch replies (one JSON object per row) ─────────────────────────

const PersonaReplySchema = z.object({
  persona: z.unknown().optional(),
  certainty: z.unknown().optional(),
});

function asText(value: unknown): string {
  if (value === undefined || value === null) return '';
  return String(value).trim();
}

/**
 * Read `{ "persona": ..., "certainty": ... }` from one batch reply. Returns
 * null when the reply holds no JSON object.
 */
export function parsePersonaJson(content: string): { persona: string; certainty: string } | null {
  const parsed = PersonaReplySchema.safeParse(repairJSON(content));
  if (!parsed.success) return null;
  return {
    persona: asText(parsed.data.persona),
    certainty: asText(parsed.data.certainty),
  };
}
