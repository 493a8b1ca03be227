/**
 * Shared type definitions for the persona enrichment pipeline.
 *
 * Rows flow in one direction: loaded prospects → a classification source →
 * the shared accept/skip stage → CSV output.
 */

import type { Sleep } from '../lib/retry.js';

// ─── Rows ────────────────────────────────────────────────────────────

export interface ProspectRow {
  readonly id: string;
  readonly email: string;
  readonly jobTitle: string;
}

export interface PersonaClassification {
  id: string;
  jobTitle: string;
  persona: string;
  certainty: string;
}

export interface AcceptedRow extends ProspectRow {
  persona: string;
  certainty: string;
}

export interface SkippedRow extends ProspectRow {
  persona: string;
  certainty: string;
  skipReason: string;
}

// ─── Sources ─────────────────────────────────────────────────────────

export interface ClassificationOutcome {
  /** Parsed classifications; may omit input ids or contain unknown ones. */
  results: PersonaClassification[];
  /** Per-id failure reasons, used as the skip reason when no persona came back. */
  errors: Map<string, string>;
}

/**
 * A way of turning rows into persona classifications: the chunked chat
 * session (streaming) or the asynchronous batch job.
 */
export interface ClassificationSource {
  readonly name: 'streaming' | 'batch';
  classify(rows: readonly ProspectRow[]): Promise<ClassificationOutcome>;
}

// ─── Timing ──────────────────────────────────────────────────────────

/** Injected clock so pacing and backoff can be driven from tests. */
export interface TimingDeps {
  sleep: Sleep;
  random: () => number;
  now: () => number;
}
