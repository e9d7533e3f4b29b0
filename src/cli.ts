#!/usr/bin/env node
/**
 * paper-digest CLI
 *
 * Scheduled research-paper digests: fetch, filter, analyze, render, deliver.
 */

import { Command, Option } from 'commander';
import { run } from './commands/run.js';
import { schedule } from './commands/schedule.js';
import { preview } from './commands/preview.js';
import { check } from './commands/check.js';
import { errorMessage } from './lib/errors.js';
import { DIGEST_KINDS, OUTPUT_FORMATS, type DigestKind, type OutputFormat } from './types.js';
import type { GlobalOptions } from './lib/context.js';

const program = new Command();

program
  .name('paper-digest')
  .description('Scheduled research-paper digests with LLM analysis')
  .version('0.1.0')
  .option('-c, --config <path>', 'Path to settings.json');

const globals = () => program.opts<GlobalOptions>();

program
  .command('run')
  .description('Run the pipeline once and exit')
  .addOption(new Option('--kind <kind>', 'Digest kind').choices(DIGEST_KINDS).default('manual'))
  .option('--dry-run', 'Run every stage except delivery')
  .action((options: { kind: DigestKind; dryRun?: boolean }) => run({ ...globals(), ...options }));

program
  .command('schedule')
  .description('Run daily and weekly digests on their timers until stopped')
  .action(() => schedule(globals()));

program
  .command('preview')
  .description('Dry run, printing one artifact to stdout')
  .addOption(new Option('--format <format>', 'Output format').choices(OUTPUT_FORMATS).default('markdown'))
  .action((options: { format: OutputFormat }) => preview({ ...globals(), ...options }));

program
  .command('check')
  .description('Validate configuration and show upcoming runs')
  .action(() => check(globals()));

program.parseAsync().catch((error: unknown) => {
  console.error(`[paper-digest] ${errorMessage(error)}`);
  process.exitCode = 1;
});
