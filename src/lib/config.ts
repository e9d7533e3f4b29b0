/**
 * Configuration loading and management
 */

import { readFile } from 'fs/promises';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { ConfigError } from './errors.js';
import { isValidTimeZone } from './time.js';
import { OUTPUT_FORMATS, type OutputFormat } from '../types.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const CONFIG_DIR = join(__dirname, '../../config');

export const WEEKDAYS = [
  'sunday',
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday',
] as const;

export type Weekday = (typeof WEEKDAYS)[number];

export interface RetryPolicy {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  factor: number;
}

export interface Settings {
  research: {
    categories: string[];
    keywords: string[];
    boostKeywords: string[];
    excludeKeywords: string[];
    /** Keep papers on category match alone, without a keyword hit. */
    categoryMatchSufficient: boolean;
    lookbackDays: number;
    maxResults: number;
    /** Fraction of fetched papers the cheap filter is expected to drop. */
    targetReduction: number;
  };
  analysis: {
    model: string;
    maxTokens: number;
    budget: number;
    parallelism: number;
    requestTimeoutMs: number;
    minSignificance: number;
    highSignificance: number;
    /** Ask for a cross-paper trend summary on weekly digests. */
    trendSummary: boolean;
    trendMaxTokens: number;
    retry: RetryPolicy;
  };
  schedule: {
    timezone: string;
    daily: { enabled: boolean; time: string };
    weekly: { enabled: boolean; day: Weekday; time: string };
    runTimeoutMs: number;
  };
  output: {
    directory: string;
    formats: OutputFormat[];
    runLog: string;
    brandName: string;
  };
  postmark: {
    enabled: boolean;
    from: string;
    replyTo: string;
    to: string[];
    token: string;
  };
  webhook: {
    enabled: boolean;
    url: string;
    username: string;
  };
  anthropic: {
    apiKey: string;
  };
}

export const DEFAULT_SETTINGS: Settings = {
  research: {
    categories: ['cs.AI', 'cs.LG', 'cs.CL'],
    keywords: ['large language model', 'agent', 'reinforcement learning'],
    boostKeywords: ['state-of-the-art', 'novel', 'outperforms'],
    excludeKeywords: ['survey', 'tutorial'],
    categoryMatchSufficient: false,
    lookbackDays: 1,
    maxResults: 300,
    targetReduction: 0.7,
  },
  analysis: {
    model: 'claude-3-5-sonnet-latest',
    maxTokens: 1500,
    budget: 10,
    parallelism: 3,
    requestTimeoutMs: 60_000,
    minSignificance: 0.4,
    highSignificance: 0.7,
    trendSummary: true,
    trendMaxTokens: 2000,
    retry: { attempts: 3, baseDelayMs: 2_000, maxDelayMs: 30_000, factor: 2 },
  },
  schedule: {
    timezone: 'UTC',
    daily: { enabled: true, time: '09:00' },
    weekly: { enabled: true, day: 'monday', time: '08:00' },
    runTimeoutMs: 30 * 60_000,
  },
  output: {
    directory: 'output',
    formats: ['html', 'markdown', 'json', 'email'],
    runLog: 'output/runs.jsonl',
    brandName: 'Research Digest',
  },
  postmark: {
    enabled: false,
    from: '',
    replyTo: '',
    to: [],
    token: '',
  },
  webhook: {
    enabled: false,
    url: '',
    username: 'Research Digest',
  },
  anthropic: {
    apiKey: '',
  },
};

/**
 * Replace ${VAR} and ${VAR:default} with environment values.
 */
export function substituteEnv(text: string, env: NodeJS.ProcessEnv = process.env): string {
  return text.replace(/\$\{([^}:]+)(?::([^}]*))?\}/g, (_match, name: string, fallback?: string) => {
    return env[name] ?? fallback ?? '';
  });
}

export function defaultConfigPath(): string {
  return process.env.PAPER_DIGEST_CONFIG || join(CONFIG_DIR, 'settings.json');
}

export async function loadSettings(path: string = defaultConfigPath()): Promise<Settings> {
  const content = await readFile(path, 'utf-8');
  return parseSettings(content);
}

/**
 * Shape of settings.json: every section and field optional.
 */
export interface SettingsFile {
  research?: Partial<Settings['research']>;
  analysis?: Partial<Omit<Settings['analysis'], 'retry'>> & { retry?: Partial<RetryPolicy> };
  schedule?: Partial<Omit<Settings['schedule'], 'daily' | 'weekly'>> & {
    daily?: Partial<Settings['schedule']['daily']>;
    weekly?: Partial<Settings['schedule']['weekly']>;
  };
  output?: Partial<Settings['output']>;
  postmark?: Partial<Settings['postmark']>;
  webhook?: Partial<Settings['webhook']>;
  anthropic?: Partial<Settings['anthropic']>;
}

export function parseSettings(content: string, env: NodeJS.ProcessEnv = process.env): Settings {
  // Substitute string values only, so env values never change the document's structure.
  const file: SettingsFile | null = JSON.parse(content, (_key, value: unknown) =>
    typeof value === 'string' ? substituteEnv(value, env) : value
  );
  if (typeof file !== 'object' || file === null || Array.isArray(file)) {
    throw new ConfigError(['settings file must contain a JSON object']);
  }
  const settings = mergeSettings(DEFAULT_SETTINGS, file);
  const problems = validateSettings(settings);
  if (problems.length > 0) {
    throw new ConfigError(problems);
  }
  return settings;
}

/**
 * Overlay a settings file on the defaults. Field types are not checked
 * here; validateSettings reports anything that came in malformed.
 */
export function mergeSettings(defaults: Settings, file: SettingsFile): Settings {
  return {
    research: { ...defaults.research, ...file.research },
    analysis: {
      ...defaults.analysis,
      ...file.analysis,
      retry: { ...defaults.analysis.retry, ...file.analysis?.retry },
    },
    schedule: {
      ...defaults.schedule,
      ...file.schedule,
      daily: { ...defaults.schedule.daily, ...file.schedule?.daily },
      weekly: { ...defaults.schedule.weekly, ...file.schedule?.weekly },
    },
    output: { ...defaults.output, ...file.output },
    postmark: { ...defaults.postmark, ...file.postmark },
    webhook: { ...defaults.webhook, ...file.webhook },
    anthropic: { ...defaults.anthropic, ...file.anthropic },
  };
}

const TIME_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

export function validateSettings(settings: Settings): string[] {
  const problems: string[] = [];
  const { research, analysis, schedule, output, postmark, webhook } = settings;

  const unit = (name: string, value: unknown) => {
    if (typeof value !== 'number' || Number.isNaN(value) || value < 0 || value > 1) {
      problems.push(`${name} must be a number between 0 and 1`);
    }
  };
  const positiveInt = (name: string, value: unknown) => {
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
      problems.push(`${name} must be a positive integer`);
    }
  };
  const stringList = (name: string, value: unknown) => {
    if (!Array.isArray(value) || value.some(v => typeof v !== 'string')) {
      problems.push(`${name} must be a list of strings`);
    }
  };

  stringList('research.categories', research.categories);
  if (Array.isArray(research.categories) && research.categories.length === 0) {
    problems.push('research.categories must not be empty');
  }
  stringList('research.keywords', research.keywords);
  stringList('research.boostKeywords', research.boostKeywords);
  stringList('research.excludeKeywords', research.excludeKeywords);
  positiveInt('research.lookbackDays', research.lookbackDays);
  positiveInt('research.maxResults', research.maxResults);
  unit('research.targetReduction', research.targetReduction);

  unit('analysis.minSignificance', analysis.minSignificance);
  unit('analysis.highSignificance', analysis.highSignificance);
  positiveInt('analysis.budget', analysis.budget);
  positiveInt('analysis.parallelism', analysis.parallelism);
  positiveInt('analysis.maxTokens', analysis.maxTokens);
  positiveInt('analysis.requestTimeoutMs', analysis.requestTimeoutMs);
  positiveInt('analysis.trendMaxTokens', analysis.trendMaxTokens);
  positiveInt('analysis.retry.attempts', analysis.retry.attempts);
  if (!(analysis.retry.baseDelayMs >= 0) || !(analysis.retry.maxDelayMs >= analysis.retry.baseDelayMs)) {
    problems.push('analysis.retry delays must satisfy 0 <= baseDelayMs <= maxDelayMs');
  }
  if (!(analysis.retry.factor >= 1)) {
    problems.push('analysis.retry.factor must be >= 1');
  }

  if (!TIME_PATTERN.test(schedule.daily.time)) {
    problems.push(`schedule.daily.time must be HH:MM, got "${schedule.daily.time}"`);
  }
  if (!TIME_PATTERN.test(schedule.weekly.time)) {
    problems.push(`schedule.weekly.time must be HH:MM, got "${schedule.weekly.time}"`);
  }
  if (!WEEKDAYS.some(day => day === schedule.weekly.day)) {
    problems.push(`schedule.weekly.day must be one of ${WEEKDAYS.join(', ')}`);
  }
  if (typeof schedule.timezone !== 'string' || !isValidTimeZone(schedule.timezone)) {
    problems.push(`schedule.timezone must be an IANA timezone name, got "${schedule.timezone}"`);
  }
  positiveInt('schedule.runTimeoutMs', schedule.runTimeoutMs);

  if (!Array.isArray(output.formats)) {
    problems.push('output.formats must be a list');
  } else {
    for (const format of output.formats) {
      if (!OUTPUT_FORMATS.includes(format)) {
        problems.push(`output.formats contains unknown format "${format}"`);
      }
    }
  }

  if (postmark.enabled && (!postmark.from || postmark.to.length === 0 || !postmark.token)) {
    problems.push('postmark requires from, to and token when enabled');
  }
  if (webhook.enabled && !webhook.url) {
    problems.push('webhook.url is required when the webhook is enabled');
  }

  return problems;
}
