/**
 * Run command - one digest run, then exit
 */

import { createContext, type GlobalOptions } from '../lib/context.js';
import { runAndRecord } from '../lib/pipeline.js';
import { Scheduler } from '../lib/scheduler.js';
import type { DigestKind } from '../types.js';

interface RunCommandOptions extends GlobalOptions {
  kind: DigestKind;
  dryRun?: boolean;
}

export async function run(options: RunCommandOptions): Promise<void> {
  const { deps, runLog, settings } = await createContext(options);

  const scheduler = new Scheduler({
    schedule: settings.schedule,
    clock: deps.clock,
    run: async kind => (await runAndRecord(deps, runLog, { kind, dryRun: options.dryRun })).result,
  });

  const result = await scheduler.runNow(options.kind);
  scheduler.stop();

  if (!result) return;

  for (const warning of result.warnings) {
    console.warn(`[run] warning (${warning.kind}): ${warning.message}`);
  }
  if (result.usage.inputTokens > 0) {
    console.log(`[run] Tokens: ${result.usage.inputTokens} in, ${result.usage.outputTokens} out`);
  }
  for (const artifact of result.artifacts) {
    console.log(`[run] Delivered ${artifact}`);
  }

  if (result.status === 'failed') {
    process.exitCode = 1;
  }
}
