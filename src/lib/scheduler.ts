/**
 * Run scheduler
 *
 * Cooperative single loop: sleep until the nearest due trigger, start at
 * most one run, repeat. A trigger that falls due while a run is in
 * progress is moved to its next occurrence, never queued. When both
 * timers fall due on the same tick the weekly run goes first, since its
 * window covers the daily one.
 */

import { errorMessage } from './errors.js';
import { nextOccurrence, type Clock, type Recurrence } from './time.js';
import type { Settings } from './config.js';
import type { DigestKind, RunResult } from '../types.js';

export type SchedulerState = 'idle' | 'running' | 'stopped';

export type ScheduledKind = Exclude<DigestKind, 'manual'>;

export type RunFn = (kind: DigestKind) => Promise<RunResult>;

export interface Trigger {
  kind: ScheduledKind;
  recurrence: Recurrence;
  nextDue: Date;
}

export interface SchedulerOptions {
  schedule: Settings['schedule'];
  clock: Clock;
  run: RunFn;
  /** Upper bound on a single sleep, so a suspended host catches up. */
  maxSleepMs?: number;
}

const DEFAULT_MAX_SLEEP_MS = 60_000;

const PRIORITY: Record<ScheduledKind, number> = { weekly: 0, daily: 1 };

export function buildTriggers(schedule: Settings['schedule'], now: Date): Trigger[] {
  const triggers: Trigger[] = [];
  if (schedule.daily.enabled) {
    const recurrence = { time: schedule.daily.time };
    triggers.push({ kind: 'daily', recurrence, nextDue: nextOccurrence(now, recurrence, schedule.timezone) });
  }
  if (schedule.weekly.enabled) {
    const recurrence = { time: schedule.weekly.time, weekday: schedule.weekly.day };
    triggers.push({ kind: 'weekly', recurrence, nextDue: nextOccurrence(now, recurrence, schedule.timezone) });
  }
  return triggers;
}

export class Scheduler {
  private state: SchedulerState = 'idle';
  private active: Promise<RunResult> | null = null;
  private readonly triggers: Trigger[];
  private wake: (() => void) | null = null;
  private readonly maxSleepMs: number;

  constructor(private readonly options: SchedulerOptions) {
    this.triggers = buildTriggers(options.schedule, options.clock.now());
    this.maxSleepMs = options.maxSleepMs ?? DEFAULT_MAX_SLEEP_MS;
  }

  get status(): SchedulerState {
    return this.state;
  }

  get running(): boolean {
    return this.active !== null;
  }

  upcoming(): ReadonlyArray<Readonly<Trigger>> {
    return [...this.triggers].sort((a, b) => a.nextDue.getTime() - b.nextDue.getTime());
  }

  /**
   * Fire every trigger due at `now`. Returns the kinds whose runs were
   * started; at most one per call.
   */
  tick(now: Date): ScheduledKind[] {
    const started: ScheduledKind[] = [];
    if (this.state === 'stopped') return started;

    const due = this.triggers
      .filter(trigger => trigger.nextDue.getTime() <= now.getTime())
      .sort((a, b) => PRIORITY[a.kind] - PRIORITY[b.kind]);

    for (const trigger of due) {
      const dueAt = trigger.nextDue;
      trigger.nextDue = nextOccurrence(now, trigger.recurrence, this.options.schedule.timezone);

      if (this.active) {
        console.warn(
          `[schedule] ${trigger.kind} run due ${dueAt.toISOString()} skipped, a run is in progress; next at ${trigger.nextDue.toISOString()}`
        );
        continue;
      }

      console.log(`[schedule] ${trigger.kind} run due ${dueAt.toISOString()} starting`);
      void this.launch(trigger.kind);
      started.push(trigger.kind);
    }

    return started;
  }

  /**
   * Start a run outside the timers. Resolves to null when another run is
   * already in progress.
   */
  async runNow(kind: DigestKind): Promise<RunResult | null> {
    if (this.state === 'stopped') {
      throw new Error('Scheduler is stopped');
    }
    if (this.active) {
      console.warn(`[schedule] ${kind} run requested while a run is in progress, skipping`);
      return null;
    }
    return this.launch(kind);
  }

  /**
   * Run the timer loop until stop() is called. Resolves once the loop has
   * exited and any in-progress run has finished.
   */
  async start(): Promise<void> {
    if (this.state === 'stopped') return;

    for (const trigger of this.upcoming()) {
      console.log(`[schedule] Next ${trigger.kind} run at ${trigger.nextDue.toISOString()}`);
    }
    if (this.triggers.length === 0) {
      console.warn('[schedule] No timers enabled, waiting for stop');
    }

    while (!this.isStopped()) {
      const now = this.options.clock.now();
      this.tick(now);

      const nearest = Math.min(...this.triggers.map(t => t.nextDue.getTime()));
      const waitMs = Math.min(Math.max(nearest - now.getTime(), 0), this.maxSleepMs);
      await this.sleep(waitMs);
    }

    if (this.active) {
      console.log('[schedule] Waiting for the in-progress run to finish');
      await this.active;
    }
  }

  stop(): void {
    if (this.state === 'stopped') return;
    this.state = 'stopped';
    console.log('[schedule] Stopping');
    this.wake?.();
  }

  private isStopped(): boolean {
    return this.state === 'stopped';
  }

  private sleep(ms: number): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.wake = () => resolve();
      this.options.clock.sleep(ms).then(resolve, reject);
    }).finally(() => {
      this.wake = null;
    });
  }

  private launch(kind: DigestKind): Promise<RunResult> {
    const startedAt = this.options.clock.now();
    if (this.state !== 'stopped') this.state = 'running';

    const run = Promise.resolve()
      .then(() => this.options.run(kind))
      .catch((error: unknown): RunResult => {
        const message = errorMessage(error);
        console.error(`[schedule] ${kind} run crashed: ${message}`);
        return crashedRun(kind, startedAt, this.options.clock.now(), message);
      })
      .finally(() => {
        this.active = null;
        if (this.state === 'running') this.state = 'idle';
      });

    this.active = run;
    return run;
  }
}

function crashedRun(kind: DigestKind, startedAt: Date, finishedAt: Date, error: string): RunResult {
  return {
    runId: `${kind}_crashed_${startedAt.getTime()}`,
    kind,
    status: 'failed',
    startedAt,
    finishedAt,
    dryRun: false,
    counts: { fetched: 0, kept: 0, analyzed: 0, inDigest: 0 },
    usage: { inputTokens: 0, outputTokens: 0 },
    warnings: [],
    artifacts: [],
    error,
  };
}
