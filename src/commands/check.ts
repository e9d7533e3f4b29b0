/**
 * Check command - validate configuration and show the schedule
 */

import { loadSettings, defaultConfigPath } from '../lib/config.js';
import { loadTemplates } from '../lib/render.js';
import { backoffSchedule } from '../lib/retry.js';
import { buildTriggers } from '../lib/scheduler.js';
import { formatDisplayDateTime } from '../lib/time.js';
import type { GlobalOptions } from '../lib/context.js';

export async function check(options: GlobalOptions): Promise<void> {
  const path = options.config ?? defaultConfigPath();
  const settings = await loadSettings(path);
  await loadTemplates();

  const { research, analysis, schedule, output } = settings;

  console.log(`Configuration OK: ${path}`);
  console.log(`  Categories:     ${research.categories.join(', ')}`);
  console.log(`  Keywords:       ${research.keywords.join(', ') || '(none)'}`);
  console.log(`  Model:          ${analysis.model} (budget ${analysis.budget}, parallelism ${analysis.parallelism})`);
  console.log(`  Threshold:      ${analysis.minSignificance} (high ${analysis.highSignificance})`);
  console.log(`  Retry delays:   ${backoffSchedule(analysis.retry).map(ms => `${ms}ms`).join(', ') || '(no retries)'}`);
  console.log(`  Formats:        ${output.formats.join(', ')} -> ${output.directory}`);
  console.log(`  Postmark:       ${settings.postmark.enabled ? settings.postmark.to.join(', ') : 'disabled'}`);
  console.log(`  Webhook:        ${settings.webhook.enabled ? 'enabled' : 'disabled'}`);
  if (!settings.anthropic.apiKey) {
    console.warn('  Warning: anthropic.apiKey is empty; runs will fail until ANTHROPIC_API_KEY is set');
  }

  const triggers = buildTriggers(schedule, new Date());
  if (triggers.length === 0) {
    console.log('  Schedule:       no timers enabled');
    return;
  }
  console.log(`  Schedule (${schedule.timezone}):`);
  if (schedule.daily.enabled) {
    console.log(`    daily at ${schedule.daily.time}`);
  }
  if (schedule.weekly.enabled) {
    console.log(`    weekly on ${schedule.weekly.day} at ${schedule.weekly.time}`);
  }
  if (schedule.daily.enabled && schedule.weekly.enabled && schedule.daily.time === schedule.weekly.time) {
    console.log(`    on ${schedule.weekly.day} the weekly run takes the daily slot`);
  }
  for (const trigger of triggers) {
    console.log(`    next ${trigger.kind}: ${formatDisplayDateTime(trigger.nextDue, schedule.timezone)}`);
  }
}
