import pino from 'pino';
import { describe, it, expect, vi } from 'vitest';
import { BatchSource, buildBatchRequests, toOutcome, type BatchRequestLine } from '../enrichment/batch-source.js';
import type { ProspectRow } from '../enrichment/types.js';
import type { BatchStatus } from '../lib/batch-client.js';
import { loadConfig } from '../lib/config.js';

const log = pino({ level: 'silent' });
const config = loadConfig({});

const rows: ProspectRow[] = [
  { id: '1', email: 'one@example.com', jobTitle: 'VP, Sales' },
  { id: '2', email: 'two@example.com', jobTitle: 'Data Engineer' },
];

function success(id: string, content: string): string {
  return JSON.stringify({
    custom_id: id,
    response: { status_code: 200, body: { choices: [{ message: { content } }] } },
  });
}

function completed(outputFileId: string | null = 'file_out'): BatchStatus {
  return {
    id: 'batch_1',
    status: 'completed',
    request_counts: { total: 2, completed: 2, failed: 0 },
    output_file_id: outputFileId,
  };
}

function fakeApi(meta: BatchStatus, output = '') {
  return {
    uploadBatchFile: vi.fn(async (_jsonl: string) => 'file_in'),
    createBatch: vi.fn(async (_inputFileId: string) => 'batch_1'),
    retrieveBatch: vi.fn(async (_batchId: string) => meta),
    downloadFileContent: vi.fn(async (_fileId: string) => output),
  };
}

describe('buildBatchRequests', () => {
  it('writes one chat request per row keyed by prospect id', () => {
    const lines = buildBatchRequests(rows, 'Frame\n', 'gpt-4.1-nano').split('\n');
    const first: BatchRequestLine = JSON.parse(lines[0]);

    expect(lines).toHaveLength(2);
    expect(first.custom_id).toBe('1');
    expect(first.method).toBe('POST');
    expect(first.url).toBe('/v1/chat/completions');
    expect(first.body.model).toBe('gpt-4.1-nano');
    expect(first.body.temperature).toBe(0);
    expect(first.body.max_tokens).toBe(200);
    expect(first.body.messages[0].role).toBe('system');
    expect(first.body.messages[0].content.startsWith('Frame\n\nCRITICAL OUTPUT FORMAT:')).toBe(true);
    expect(first.body.messages[1]).toEqual({
      role: 'user',
      content: 'Prospect Id: 1\nJob Title: VP  Sales\n\nReturn ONLY the JSON.',
    });
  });
});

describe('toOutcome', () => {
  it('turns replies into classifications and failures into reasons', () => {
    const jsonl = [
      success('1', '{"persona": "Economic Buyer", "certainty": "90%"}'),
      success('2', 'not json'),
      JSON.stringify({
        custom_id: '3',
        response: { status_code: 500, body: { error: { message: 'oops' } } },
      }),
    ].join('\n');

    const outcome = toOutcome(rows, jsonl);

    expect(outcome.results).toEqual([
      { id: '1', jobTitle: 'VP, Sales', persona: 'Economic Buyer', certainty: '90%' },
    ]);
    expect(outcome.errors.get('2')).toBe('Invalid JSON: not json...');
    expect(outcome.errors.get('3')).toBe('Batch error: HTTP 500: oops');
    expect(outcome.errors.size).toBe(2);
  });
});

describe('BatchSource', () => {
  it('uploads, creates, polls and parses a new batch', async () => {
    const output = [
      success('1', '{"persona":"Economic Buyer","certainty":"90%"}'),
      success('2', '{"persona":"Real-time Specialist","certainty":"85%"}'),
    ].join('\n');
    const api = fakeApi(completed(), output);
    const source = new BatchSource({ api, config, systemPrompt: 'Frame', log, sleep: vi.fn(async () => {}) });

    const outcome = await source.classify(rows);

    expect(api.uploadBatchFile).toHaveBeenCalledWith(buildBatchRequests(rows, 'Frame', config.batchModel));
    expect(api.createBatch).toHaveBeenCalledWith('file_in');
    expect(api.retrieveBatch).toHaveBeenCalledWith('batch_1');
    expect(api.downloadFileContent).toHaveBeenCalledWith('file_out');
    expect(source.lastBatchId).toBe('batch_1');
    expect(outcome.results.map((r) => [r.id, r.persona])).toEqual([
      ['1', 'Economic Buyer'],
      ['2', 'Real-time Specialist'],
    ]);
  });

  it('resumes an existing batch without uploading', async () => {
    const api = fakeApi(completed(), success('1', '{"persona":"Data User","certainty":"70%"}'));
    const source = new BatchSource({
      api,
      config,
      systemPrompt: 'Frame',
      log,
      resumeBatchId: 'batch_9',
      sleep: vi.fn(async () => {}),
    });

    await source.classify(rows);

    expect(api.uploadBatchFile).not.toHaveBeenCalled();
    expect(api.createBatch).not.toHaveBeenCalled();
    expect(api.retrieveBatch).toHaveBeenCalledWith('batch_9');
    expect(source.lastBatchId).toBe('batch_9');
  });

  it('fails when the batch ends without completing', async () => {
    const api = fakeApi({ ...completed(null), status: 'expired' });
    const source = new BatchSource({ api, config, systemPrompt: 'Frame', log, sleep: vi.fn(async () => {}) });

    await expect(source.classify(rows)).rejects.toThrow('Batch not completed: expired');
    expect(api.downloadFileContent).not.toHaveBeenCalled();
  });

  it('fails when a completed batch has no output file', async () => {
    const api = fakeApi(completed(null));
    const source = new BatchSource({ api, config, systemPrompt: 'Frame', log, sleep: vi.fn(async () => {}) });

    await expect(source.classify(rows)).rejects.toThrow('No output file id in batch response.');
  });

  it('falls back to the first entry of output_file_ids', async () => {
    const api = fakeApi(
      { ...completed(null), output_file_ids: ['file_out_a', 'file_out_b'] },
      success('1', '{"persona":"Data User","certainty":"70%"}'),
    );
    const source = new BatchSource({ api, config, systemPrompt: 'Frame', log, sleep: vi.fn(async () => {}) });

    const outcome = await source.classify(rows);

    expect(api.downloadFileContent).toHaveBeenCalledWith('file_out_a');
    expect(outcome.results.map((r) => r.id)).toEqual(['1']);
  });
});
