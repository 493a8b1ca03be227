#!/usr/bin/env node
import 'dotenv/config';
import { randomUUID } from 'node:crypto';
import { Command, type OptionValues } from 'commander';
import { BatchSource } from './enrichment/batch-source.js';
import { runEnrichment, runSkippedRerun } from './enrichment/pipeline.js';
import { StreamingSource } from './enrichment/streaming-source.js';
import { loadProspects, loadSkipped, readInstructions } from './io/input.js';
import { BatchClient } from './lib/batch-client.js';
import { loadConfig, type EnrichmentConfig, type EnrichmentConfigInput } from './lib/config.js';
import { ConfigError } from './lib/errors.js';
import { createProvider, getOpenAIConfig } from './lib/llm.js';
import { createRunLogger, type Logger } from './lib/logger.js';

type GlobalOptions = {
  outputDir?: string;
  maxPasses?: string;
  fuzzy: boolean;
  checkpoint: boolean;
};

type StreamOptions = GlobalOptions & {
  input: string;
};

type BatchOptions = GlobalOptions & {
  input: string;
  resumeBatchId?: string;
  printStatus?: boolean;
};

type RerunOptions = GlobalOptions & {
  skipped: string;
  printStatus?: boolean;
};

function toOverrides(opts: GlobalOptions): Partial<EnrichmentConfigInput> {
  const overrides: Partial<EnrichmentConfigInput> = {};
  if (opts.outputDir) overrides.outputDir = opts.outputDir;
  if (opts.maxPasses !== undefined) overrides.maxPasses = Number(opts.maxPasses);
  // Only an explicit --no-fuzzy overrides FF_FUZZY_MATCH.
  if (!opts.fuzzy) overrides.fuzzyMatch = false;
  return overrides;
}

interface RunContext<T> {
  opts: T;
  config: EnrichmentConfig;
  systemPrompt: string;
  log: Logger;
}

/**
 * Wrap a command body: resolve config and instructions, give it a run-scoped
 * logger, and turn any failure into a logged error and exit code 1.
 */
function action<T extends GlobalOptions>(body: (ctx: RunContext<T>) => Promise<void>) {
  return async (_options: OptionValues, command: Command): Promise<void> => {
    const log = createRunLogger(randomUUID(), { command: command.name() });
    try {
      const opts = command.optsWithGlobals<T>();
      const config = loadConfig(process.env, toOverrides(opts));
      const systemPrompt = await readInstructions(config.frameFile, config.personasFile);
      await body({ opts, config, systemPrompt, log });
    } catch (err) {
      if (err instanceof ConfigError) {
        log.error({ error: err.message }, 'Configuration error');
      } else {
        log.error({ err }, 'Enrichment run failed');
      }
      process.exitCode = 1;
    }
  };
}

const program = new Command();

program
  .name('persona-enrich')
  .description('Classify prospects into buyer personas by job title')
  .option('--output-dir <dir>', 'directory for result CSV files')
  .option('--max-passes <n>', 'passes over rows missing from the model output')
  .option('--no-fuzzy', 'disable correction of near-miss persona labels')
  .option('--no-checkpoint', 'do not write raw model output under _checkpoints');

program
  .command('stream')
  .description('classify through chunked chat requests in one conversation')
  .requiredOption('--input <path>', 'prospects CSV with Prospect Id, Email, Job Title')
  .action(action<StreamOptions>(async ({ opts, config, systemPrompt, log }) => {
    const rows = await loadProspects(opts.input, { excludedEmailDomains: config.excludedEmailDomains }, log);
    const source = new StreamingSource({
      provider: createProvider(),
      config,
      systemPrompt,
      log,
      checkpoint: opts.checkpoint,
    });
    await runEnrichment({ rows, source, config, log });
  }));

program
  .command('batch')
  .description('classify through the asynchronous Batch API')
  .requiredOption('--input <path>', 'prospects CSV with Prospect Id, Email, Job Title')
  .option('--resume-batch-id <id>', 'poll an existing batch instead of submitting a new one')
  .option('--print-status', 'log the full batch status on every poll')
  .action(action<BatchOptions>(async ({ opts, config, systemPrompt, log }) => {
    const rows = await loadProspects(opts.input, { excludedEmailDomains: config.excludedEmailDomains }, log);
    const source = new BatchSource({
      api: new BatchClient(getOpenAIConfig()),
      config,
      systemPrompt,
      log,
      resumeBatchId: opts.resumeBatchId,
      printStatus: opts.printStatus,
      checkpoint: opts.checkpoint,
    });
    await runEnrichment({ rows, source, config, log });
  }));

program
  .command('rerun-skipped')
  .description('re-submit rows of a skipped file that have no persona')
  .requiredOption('--skipped <path>', 'a "Skipped prospects" CSV from an earlier run')
  .option('--print-status', 'log the full batch status on every poll')
  .action(action<RerunOptions>(async ({ opts, config, systemPrompt, log }) => {
    const skipped = await loadSkipped(opts.skipped, log);
    const source = new BatchSource({
      api: new BatchClient(getOpenAIConfig()),
      config,
      systemPrompt,
      log,
      printStatus: opts.printStatus,
      checkpoint: opts.checkpoint,
    });
    await runSkippedRerun({ skipped, source, config, log });
  }));

await program.parseAsync(process.argv);
