import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import Papa from 'papaparse';
import type { AcceptedRow, SkippedRow } from '../enrichment/types.js';

export const SKIPPED_SUBDIR = 'Skipped prospects';

const ACCEPTED_COLUMNS = ['Prospect Id', 'Email', 'Job Title', 'Persona', 'Persona Certainty'];
const SKIPPED_COLUMNS = [...ACCEPTED_COLUMNS, 'Skip Reason'];

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Local-time stamp for file names: `2026-03-05 14 07 09` by default.
 */
export function fileStamp(date: Date = new Date(), dateTimeSep = ' ', timeSep = ' '): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = [date.getHours(), date.getMinutes(), date.getSeconds()].map(pad).join(timeSep);
  return `${day}${dateTimeSep}${time}`;
}

/**
 * Every field quoted so spreadsheet tools keep long numeric ids as text. The
 * last line never ends in a newline, with or without data rows.
 */
export function toCsv(columns: string[], rows: string[][]): string {
  return Papa.unparse({ fields: columns, data: rows }, { quotes: true, newline: '\n' }).replace(/\n$/, '');
}

export function acceptedToCsv(rows: readonly AcceptedRow[]): string {
  return toCsv(
    ACCEPTED_COLUMNS,
    rows.map((r) => [r.id, r.email, r.jobTitle, r.persona, r.certainty]),
  );
}

export function skippedToCsv(rows: readonly SkippedRow[]): string {
  return toCsv(
    SKIPPED_COLUMNS,
    rows.map((r) => [r.id, r.email, r.jobTitle, r.persona, r.certainty, r.skipReason]),
  );
}

export interface SavedOutputs {
  acceptedPath: string;
  skippedPath: string;
}

/**
 * Write `Personas[ <label>] <stamp>.csv` to `outputDir` and
 * `Skipped prospects[ <label>] <stamp>.csv` to its skipped subdirectory.
 */
export async function saveOutputs(
  accepted: readonly AcceptedRow[],
  skipped: readonly SkippedRow[],
  outputDir: string,
  options: { label?: string; now?: Date } = {},
): Promise<SavedOutputs> {
  const skippedDir = path.join(outputDir, SKIPPED_SUBDIR);
  await mkdir(skippedDir, { recursive: true });

  const stamp = fileStamp(options.now);
  const label = options.label ? ` ${options.label}` : '';
  const acceptedPath = path.join(outputDir, `Personas${label} ${stamp}.csv`);
  const skippedPath = path.join(skippedDir, `Skipped prospects${label} ${stamp}.csv`);

  await writeFile(acceptedPath, acceptedToCsv(accepted), 'utf-8');
  await writeFile(skippedPath, skippedToCsv(skipped), 'utf-8');
  return { acceptedPath, skippedPath };
}
