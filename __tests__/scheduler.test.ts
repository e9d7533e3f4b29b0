import { describe, it, expect, vi, beforeEach } from 'vitest';
import { DEFAULT_SETTINGS, type Settings } from '../src/lib/config.js';
import { Scheduler, buildTriggers } from '../src/lib/scheduler.js';
import type { DigestKind, RunResult } from '../src/types.js';
import { FakeClock } from './helpers.js';

function schedule(overrides: Partial<Settings['schedule']> = {}): Settings['schedule'] {
  return {
    ...DEFAULT_SETTINGS.schedule,
    daily: { enabled: true, time: '09:00' },
    weekly: { enabled: true, day: 'monday', time: '09:00' },
    ...overrides,
  };
}

function result(kind: DigestKind, at: Date): RunResult {
  return {
    runId: `${kind}-test`,
    kind,
    status: 'success',
    startedAt: at,
    finishedAt: at,
    dryRun: false,
    counts: { fetched: 0, kept: 0, analyzed: 0, inDigest: 0 },
    usage: { inputTokens: 0, outputTokens: 0 },
    warnings: [],
    artifacts: [],
  };
}

/** A run the test finishes by hand. */
function controllableRuns() {
  const started: DigestKind[] = [];
  const finishers: Array<() => void> = [];
  const run = (kind: DigestKind) =>
    new Promise<RunResult>(resolve => {
      started.push(kind);
      finishers.push(() => resolve(result(kind, new Date(0))));
    });
  return { started, finishers, run };
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

describe('buildTriggers', () => {
  it('computes the first due time of each enabled timer', () => {
    const triggers = buildTriggers(schedule({ weekly: { enabled: true, day: 'wednesday', time: '07:30' } }), new Date('2024-03-04T10:00:00Z'));

    expect(triggers.map(t => [t.kind, t.nextDue.toISOString()])).toEqual([
      ['daily', '2024-03-05T09:00:00.000Z'],
      ['weekly', '2024-03-06T07:30:00.000Z'],
    ]);
  });

  it('skips disabled timers', () => {
    const triggers = buildTriggers(schedule({ daily: { enabled: false, time: '09:00' } }), new Date('2024-03-04T10:00:00Z'));
    expect(triggers.map(t => t.kind)).toEqual(['weekly']);
  });
});

describe('Scheduler', () => {
  it('defers a trigger that falls due while a run is in progress', async () => {
    const clock = new FakeClock(new Date('2024-03-04T08:00:00Z'));
    const runs = controllableRuns();
    const scheduler = new Scheduler({ schedule: schedule(), clock, run: runs.run });

    const started = scheduler.tick(new Date('2024-03-04T09:00:00Z'));
    await Promise.resolve();

    // Both timers are due on Monday at 09:00; the weekly run wins.
    expect(started).toEqual(['weekly']);
    expect(runs.started).toEqual(['weekly']);
    expect(scheduler.running).toBe(true);
    expect(scheduler.status).toBe('running');
    expect(scheduler.upcoming().map(t => [t.kind, t.nextDue.toISOString()])).toEqual([
      ['daily', '2024-03-05T09:00:00.000Z'],
      ['weekly', '2024-03-11T09:00:00.000Z'],
    ]);

    // Still busy when the next daily slot arrives.
    expect(scheduler.tick(new Date('2024-03-05T09:00:00Z'))).toEqual([]);
    expect(runs.started).toEqual(['weekly']);

    runs.finishers[0]();
    await vi.waitFor(() => expect(scheduler.running).toBe(false));
    expect(scheduler.status).toBe('idle');

    expect(scheduler.tick(new Date('2024-03-06T09:00:00Z'))).toEqual(['daily']);
  });

  it('runs the weekly digest every week when it shares the daily slot', async () => {
    const clock = new FakeClock(new Date('2024-03-04T08:00:00Z'));
    const scheduler = new Scheduler({ schedule: schedule(), clock, run: async kind => result(kind, clock.now()) });

    const kinds: string[] = [];
    for (let day = 0; day < 28; day++) {
      kinds.push(...scheduler.tick(new Date(Date.UTC(2024, 2, 4 + day, 9))));
      await vi.waitFor(() => expect(scheduler.running).toBe(false));
    }

    expect(kinds.filter(kind => kind === 'weekly')).toHaveLength(4);
    expect(kinds.filter(kind => kind === 'daily')).toHaveLength(24);
    expect(kinds.slice(0, 8)).toEqual(['weekly', 'daily', 'daily', 'daily', 'daily', 'daily', 'daily', 'weekly']);
  });

  it('does nothing before a trigger is due', () => {
    const clock = new FakeClock(new Date('2024-03-04T08:00:00Z'));
    const runs = controllableRuns();
    const scheduler = new Scheduler({ schedule: schedule(), clock, run: runs.run });

    expect(scheduler.tick(new Date('2024-03-04T08:59:59Z'))).toEqual([]);
    expect(scheduler.running).toBe(false);
  });

  it('skips a manual run while another is in progress', async () => {
    const clock = new FakeClock(new Date('2024-03-04T08:00:00Z'));
    const runs = controllableRuns();
    const scheduler = new Scheduler({ schedule: schedule(), clock, run: runs.run });

    const first = scheduler.runNow('manual');
    await expect(scheduler.runNow('manual')).resolves.toBeNull();

    await vi.waitFor(() => expect(runs.finishers).toHaveLength(1));
    runs.finishers[0]();
    await expect(first).resolves.toMatchObject({ kind: 'manual', status: 'success' });
  });

  it('turns a crashing run into a failed result and keeps going', async () => {
    const clock = new FakeClock(new Date('2024-03-04T08:00:00Z'));
    let calls = 0;
    const scheduler = new Scheduler({
      schedule: schedule(),
      clock,
      run: async kind => {
        calls++;
        if (calls === 1) throw new Error('out of memory');
        return result(kind, clock.now());
      },
    });

    const crashed = await scheduler.runNow('daily');
    expect(crashed).toMatchObject({ kind: 'daily', status: 'failed', error: 'out of memory' });
    expect(scheduler.status).toBe('idle');

    await expect(scheduler.runNow('daily')).resolves.toMatchObject({ status: 'success' });
  });

  it('ends in the stopped state and refuses further runs', async () => {
    const clock = new FakeClock(new Date('2024-03-04T08:00:00Z'));
    const scheduler = new Scheduler({ schedule: schedule(), clock, run: async kind => result(kind, clock.now()) });

    await scheduler.runNow('manual');
    scheduler.stop();

    expect(scheduler.status).toBe('stopped');
    expect(scheduler.tick(new Date('2024-03-04T09:00:00Z'))).toEqual([]);
    await expect(scheduler.runNow('manual')).rejects.toThrow('Scheduler is stopped');
  });

  it('sleeps until the next due time and runs it from the loop', async () => {
    const clock = new FakeClock(new Date('2024-03-04T08:59:00Z'));
    const kinds: DigestKind[] = [];
    const scheduler = new Scheduler({
      schedule: schedule({ weekly: { enabled: false, day: 'monday', time: '09:00' } }),
      clock,
      run: async kind => {
        kinds.push(kind);
        scheduler.stop();
        return result(kind, clock.now());
      },
    });

    await scheduler.start();

    expect(kinds).toEqual(['daily']);
    expect(clock.sleeps[0]).toBe(60_000);
    expect(scheduler.status).toBe('stopped');
    expect(scheduler.running).toBe(false);
  });

  it('caps a single sleep at maxSleepMs', async () => {
    const clock = new FakeClock(new Date('2024-03-04T08:00:00Z'));
    const scheduler = new Scheduler({
      schedule: schedule({ weekly: { enabled: false, day: 'monday', time: '09:00' } }),
      clock,
      maxSleepMs: 1_000,
      run: async kind => result(kind, clock.now()),
    });
    const sleep = clock.sleep.bind(clock);
    vi.spyOn(clock, 'sleep').mockImplementation(async ms => {
      await sleep(ms);
      if (clock.sleeps.length === 3) scheduler.stop();
    });

    await scheduler.start();

    expect(clock.sleeps).toEqual([1_000, 1_000, 1_000]);
  });
});
