import { distance } from 'fastest-levenshtein';
import type { Logger } from '../lib/logger.js';
import type {
  AcceptedRow,
  ClassificationOutcome,
  PersonaClassification,
  ProspectRow,
  SkippedRow,
} from './types.js';

export const NO_LLM_RESPONSE = 'No LLM response';
const INVALID_PERSONA_PREFIX = 'Invalid persona: ';

/**
 * Null when the persona is accepted, otherwise the skip reason. Only an exact
 * vocabulary member is accepted; surrounding whitespace is ignored.
 */
export function determineSkipReason(
  persona: string | undefined,
  vocabulary: ReadonlySet<string>,
  missingReason: string = NO_LLM_RESPONSE,
): string | null {
  const value = (persona ?? '').trim();
  if (!value) return missingReason;
  if (!vocabulary.has(value)) return `${INVALID_PERSONA_PREFIX}${value}`;
  return null;
}

// ─── Fuzzy persona repair ────────────────────────────────────────────

/** 1 for identical strings, 0 for nothing in common (case-insensitive). */
export function personaSimilarity(a: string, b: string): number {
  const left = a.trim().toLowerCase();
  const right = b.trim().toLowerCase();
  const longest = Math.max(left.length, right.length);
  if (longest === 0) return 1;
  return 1 - distance(left, right) / longest;
}

/**
 * Closest vocabulary entry scoring at or above `threshold`, or null.
 * Ties go to the earlier vocabulary entry.
 */
export function closestPersona(
  value: string,
  vocabulary: readonly string[],
  threshold: number,
): string | null {
  let best: string | null = null;
  let bestScore = -1;
  for (const candidate of vocabulary) {
    const score = personaSimilarity(value, candidate);
    if (score > bestScore) {
      best = candidate;
      bestScore = score;
    }
  }
  return best !== null && bestScore >= threshold ? best : null;
}

// ─── Merge + accept/skip ─────────────────────────────────────────────

export interface ClassifyOptions {
  validPersonas: readonly string[];
  fuzzyMatch: boolean;
  fuzzyThreshold: number;
}

export interface ClassifiedRows {
  accepted: AcceptedRow[];
  skipped: SkippedRow[];
  /** Rows moved from skipped to accepted by fuzzy repair. */
  corrected: Array<{ id: string; from: string; to: string }>;
}

/** First result per id wins; later duplicates are ignored. */
export function firstResultById(results: readonly PersonaClassification[]): Map<string, PersonaClassification> {
  const byId = new Map<string, PersonaClassification>();
  for (const result of results) {
    if (!byId.has(result.id)) byId.set(result.id, result);
  }
  return byId;
}

/**
 * Merge source output onto the input rows and split them into accepted and
 * skipped. Every input row lands in exactly one of the two lists, in input
 * order. Ids the model invented are ignored.
 */
export function classifyRows(
  rows: readonly ProspectRow[],
  outcome: ClassificationOutcome,
  options: ClassifyOptions,
  log?: Logger,
): ClassifiedRows {
  const vocabulary = new Set(options.validPersonas);
  const byId = firstResultById(outcome.results);

  const accepted: AcceptedRow[] = [];
  const skipped: SkippedRow[] = [];
  const corrected: ClassifiedRows['corrected'] = [];

  for (const row of rows) {
    const result = byId.get(row.id);
    const persona = result?.persona.trim() ?? '';
    const certainty = result?.certainty ?? '';
    const reason = determineSkipReason(persona, vocabulary, outcome.errors.get(row.id) ?? NO_LLM_RESPONSE);

    if (reason === null) {
      accepted.push({ ...row, persona, certainty });
      continue;
    }

    if (options.fuzzyMatch && reason.startsWith(INVALID_PERSONA_PREFIX)) {
      const repaired = closestPersona(persona, options.validPersonas, options.fuzzyThreshold);
      if (repaired !== null) {
        accepted.push({ ...row, persona: repaired, certainty });
        corrected.push({ id: row.id, from: persona, to: repaired });
        continue;
      }
    }

    skipped.push({ ...row, persona, certainty, skipReason: reason });
  }

  if (corrected.length > 0) {
    log?.info({ corrected: corrected.length }, 'Fuzzy matching corrected invalid personas');
  }
  return { accepted, skipped, corrected };
}
