import { readFile } from 'node:fs/promises';
import Papa from 'papaparse';
import type { ProspectRow, SkippedRow } from '../enrichment/types.js';
import { ConfigError, toError } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';

const ID_COLUMN = 'Prospect Id';
const ID_ALIASES = ['Record ID'];
const REQUIRED_COLUMNS = [ID_COLUMN, 'Email', 'Job Title'];

export interface LoadOptions {
  excludedEmailDomains?: readonly string[];
}

type RawRecord = Record<string, string | undefined>;

function stripBom(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

function parseCsv(text: string, source: string): { fields: string[]; records: RawRecord[] } {
  const parsed = Papa.parse<RawRecord>(text, {
    header: true,
    skipEmptyLines: 'greedy',
    transformHeader: (h) => h.trim(),
  });
  const fields = parsed.meta.fields ?? [];
  if (fields.length === 0) {
    throw new ConfigError(`Input file ${source} has no header row`);
  }
  return { fields, records: parsed.data };
}

function resolveIdColumn(fields: readonly string[]): string | undefined {
  if (fields.includes(ID_COLUMN)) return ID_COLUMN;
  return ID_ALIASES.find((alias) => fields.includes(alias));
}

function requireColumns(fields: readonly string[], source: string): string {
  const idColumn = resolveIdColumn(fields);
  const missing = REQUIRED_COLUMNS.filter((c) => (c === ID_COLUMN ? !idColumn : !fields.includes(c)));
  if (missing.length > 0 || !idColumn) {
    throw new ConfigError(`Input file ${source} is missing required column(s): ${missing.join(', ')}`);
  }
  return idColumn;
}

function isExcludedEmail(email: string, domains: readonly string[]): boolean {
  const lower = email.toLowerCase();
  return domains.some((d) => lower.includes(`@${d.toLowerCase().replace(/^@/, '')}`));
}

/**
 * Turn CSV text into prospect rows. `Record ID` is accepted in place of
 * `Prospect Id`. Rows with an excluded email domain, an empty job title or
 * an empty id are dropped; duplicate ids keep their first row.
 */
export function parseProspects(
  text: string,
  source: string,
  options: LoadOptions = {},
  log?: Logger,
): ProspectRow[] {
  const { fields, records } = parseCsv(text, source);
  const idColumn = requireColumns(fields, source);
  const excluded = options.excludedEmailDomains ?? [];

  const rows: ProspectRow[] = [];
  const seen = new Set<string>();
  let droppedEmail = 0;
  let droppedTitle = 0;
  let duplicates = 0;

  for (const record of records) {
    const id = (record[idColumn] ?? '').trim();
    const email = (record.Email ?? '').trim();
    const jobTitle = (record['Job Title'] ?? '').trim();

    if (!id) continue;
    if (excluded.length > 0 && isExcludedEmail(email, excluded)) {
      droppedEmail += 1;
      continue;
    }
    if (!jobTitle) {
      droppedTitle += 1;
      continue;
    }
    if (seen.has(id)) {
      duplicates += 1;
      continue;
    }
    seen.add(id);
    rows.push({ id, email, jobTitle });
  }

  log?.info(
    { source, loaded: records.length, kept: rows.length, droppedEmail, droppedTitle, duplicates },
    'Prospects loaded',
  );
  return rows;
}

export async function loadProspects(path: string, options: LoadOptions = {}, log?: Logger): Promise<ProspectRow[]> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read input file ${path}: ${toError(err).message}`);
  }
  return parseProspects(stripBom(text), path, options, log);
}

/**
 * Rows from a previous run's skipped CSV, with whatever persona, certainty
 * and reason they carried.
 */
export async function loadSkipped(path: string, log?: Logger): Promise<SkippedRow[]> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read skipped file ${path}: ${toError(err).message}`);
  }
  const { fields, records } = parseCsv(stripBom(text), path);
  const idColumn = requireColumns(fields, path);

  const rows = records
    .filter((r) => (r[idColumn] ?? '').trim() !== '')
    .map((r) => ({
      id: (r[idColumn] ?? '').trim(),
      email: (r.Email ?? '').trim(),
      jobTitle: (r['Job Title'] ?? '').trim(),
      persona: (r.Persona ?? '').trim(),
      certainty: (r['Persona Certainty'] ?? '').trim(),
      skipReason: (r['Skip Reason'] ?? '').trim(),
    }));
  log?.info({ source: path, rows: rows.length }, 'Skipped prospects loaded');
  return rows;
}

export async function readInstructions(frameFile: string, personasFile: string): Promise<string> {
  try {
    const [frame, personas] = await Promise.all([
      readFile(frameFile, 'utf-8'),
      readFile(personasFile, 'utf-8'),
    ]);
    return `${frame.trimEnd()}\n\n${personas.trim()}\n`;
  } catch (err) {
    throw new ConfigError(`Cannot read instruction files: ${toError(err).message}`);
  }
}
