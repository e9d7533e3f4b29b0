/**
 * Schedule command - long-running daily/weekly timers
 */

import { createContext, type GlobalOptions } from '../lib/context.js';
import { runAndRecord } from '../lib/pipeline.js';
import { Scheduler } from '../lib/scheduler.js';

export async function schedule(options: GlobalOptions): Promise<void> {
  const { deps, runLog, settings } = await createContext(options);

  const scheduler = new Scheduler({
    schedule: settings.schedule,
    clock: deps.clock,
    run: async kind => (await runAndRecord(deps, runLog, { kind })).result,
  });

  const shutdown = (signal: string) => {
    console.log(`[schedule] Received ${signal}`);
    scheduler.stop();
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  console.log(`[schedule] Started (timezone ${settings.schedule.timezone})`);
  await scheduler.start();
  console.log('[schedule] Stopped');
}
