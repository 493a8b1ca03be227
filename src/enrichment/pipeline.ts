import type { EnrichmentConfig } from '../lib/config.js';
import type { Logger } from '../lib/logger.js';
import { saveOutputs, type SavedOutputs } from '../io/output.js';
import { classifyRows, type ClassifiedRows } from './classification.js';
import type {
  ClassificationOutcome,
  ClassificationSource,
  PersonaClassification,
  ProspectRow,
  SkippedRow,
} from './types.js';

export interface EnrichmentResult extends SavedOutputs {
  accepted: number;
  skipped: number;
  corrected: number;
}

export interface RunEnrichmentParams {
  rows: readonly ProspectRow[];
  source: ClassificationSource;
  config: Pick<EnrichmentConfig, 'validPersonas' | 'fuzzyMatch' | 'fuzzyThreshold' | 'outputDir'>;
  log: Logger;
  /** Inserted into the output file names, e.g. "Rerun". */
  label?: string;
  now?: Date;
}

function summarize(classified: ClassifiedRows, saved: SavedOutputs): EnrichmentResult {
  return {
    ...saved,
    accepted: classified.accepted.length,
    skipped: classified.skipped.length,
    corrected: classified.corrected.length,
  };
}

/** Source → accept/skip (with optional fuzzy repair) → two CSV files. */
export async function runEnrichment(params: RunEnrichmentParams): Promise<EnrichmentResult> {
  const { rows, source, config, log } = params;
  if (rows.length === 0) {
    log.warn('No valid rows to process');
  }

  const outcome = rows.length > 0
    ? await source.classify(rows)
    : { results: [], errors: new Map<string, string>() };
  const classified = classifyRows(rows, outcome, config, log);
  const saved = await saveOutputs(classified.accepted, classified.skipped, config.outputDir, {
    label: params.label,
    now: params.now,
  });

  const result = summarize(classified, saved);
  log.info(
    {
      source: source.name,
      accepted: result.accepted,
      skipped: result.skipped,
      corrected: result.corrected,
      acceptedPath: result.acceptedPath,
      skippedPath: result.skippedPath,
    },
    'Processing results',
  );
  return result;
}

// ─── Rerun of a previous skipped file ────────────────────────────────

/**
 * New values win when non-empty; otherwise the row keeps what the earlier run
 * produced. Rows the rerun did not touch keep their old persona.
 */
export function mergeRerunOutcome(
  previous: readonly SkippedRow[],
  rerun: ClassificationOutcome,
): ClassificationOutcome {
  const fresh = new Map<string, PersonaClassification>();
  for (const result of rerun.results) {
    if (!fresh.has(result.id)) fresh.set(result.id, result);
  }

  const results: PersonaClassification[] = previous.map((row) => {
    const next = fresh.get(row.id);
    const persona = next?.persona.trim() ? next.persona : row.persona;
    const certainty = next?.certainty.trim() ? next.certainty : row.certainty;
    return { id: row.id, jobTitle: row.jobTitle, persona, certainty };
  });
  return { results, errors: rerun.errors };
}

export interface RunSkippedRerunParams {
  skipped: readonly SkippedRow[];
  source: ClassificationSource;
  config: RunEnrichmentParams['config'];
  log: Logger;
  now?: Date;
}

/**
 * Re-submit the rows of a skipped file that never got a persona, then write
 * `Personas Rerun …` / `Skipped prospects Rerun …` for the whole file.
 * Returns null when every row already has a persona.
 */
export async function runSkippedRerun(params: RunSkippedRerunParams): Promise<EnrichmentResult | null> {
  const { skipped, source, config, log } = params;
  const todo = skipped.filter((r) => !r.persona.trim());
  if (todo.length === 0) {
    log.info('No rows without Persona in skipped file; nothing to re-run');
    return null;
  }

  log.info({ rerun: todo.length, total: skipped.length }, 'Re-running skipped prospects');
  const rerun = await source.classify(todo.map(({ id, email, jobTitle }) => ({ id, email, jobTitle })));
  const outcome = mergeRerunOutcome(skipped, rerun);

  const rows: ProspectRow[] = skipped.map(({ id, email, jobTitle }) => ({ id, email, jobTitle }));
  const classified = classifyRows(rows, outcome, config, log);
  const saved = await saveOutputs(classified.accepted, classified.skipped, config.outputDir, {
    label: 'Rerun',
    now: params.now,
  });

  const result = summarize(classified, saved);
  log.info(
    { accepted: result.accepted, skipped: result.skipped, corrected: result.corrected },
    'Rerun results',
  );
  return result;
}
