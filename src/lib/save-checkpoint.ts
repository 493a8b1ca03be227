import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { Logger } from './logger.js';
import { toError } from './errors.js';
import { fileStamp } from '../io/output.js';

interface CheckpointResult {
  success: boolean;
  path?: string;
  error?: string;
}

/**
 * Dump raw intermediate data (batch status payloads, raw LLM output) to
 * `<outputDir>/_checkpoints`. Objects are written as JSON, strings as JSONL.
 * A failed write is logged and reported, never thrown.
 */
export async function saveCheckpoint(
  outputDir: string,
  name: string,
  content: string | Record<string, unknown>,
  log: Logger,
  now: Date = new Date(),
): Promise<CheckpointResult> {
  const dir = path.join(outputDir, '_checkpoints');
  const isText = typeof content === 'string';
  const file = path.join(dir, `${name}_${fileStamp(now, '_', '-')}.${isText ? 'jsonl' : 'json'}`);

  try {
    await mkdir(dir, { recursive: true });
    await writeFile(file, isText ? content : JSON.stringify(content, null, 2), 'utf-8');
  } catch (err) {
    const message = toError(err).message;
    log.warn({ error: message, checkpoint: name }, 'Checkpoint save error');
    return { success: false, error: message };
  }

  log.debug({ checkpoint: file }, 'Checkpoint saved');
  return { success: true, path: file };
}
