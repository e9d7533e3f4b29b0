import { DEFAULT_SETTINGS, type Settings } from '../src/lib/config.js';
import type { AnalysisProvider, LLMInput, LLMOutput } from '../src/lib/llm.js';
import type { DeliverySink } from '../src/lib/send.js';
import type { PaperSource } from '../src/lib/source.js';
import type { Clock } from '../src/lib/time.js';
import type { AnalyzedPaper, Artifact, OutputFormat, PaperRecord, SourceRequest } from '../src/types.js';

export class FakeClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(private current: Date) {}

  now(): Date {
    return new Date(this.current.getTime());
  }

  set(date: Date): void {
    this.current = date;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current = new Date(this.current.getTime() + ms);
  }
}

export function makePaper(id: string, overrides: Partial<PaperRecord> = {}): PaperRecord {
  return {
    id,
    title: `Paper ${id}`,
    authors: ['Ada Example', 'Ben Sample'],
    abstract: `Abstract of paper ${id}.`,
    categories: ['cs.AI'],
    publishedAt: new Date('2024-03-04T10:00:00Z'),
    links: { abstract: `https://arxiv.org/abs/${id}`, pdf: `https://arxiv.org/pdf/${id}` },
    ...overrides,
  };
}

export function makeAnalyzed(id: string, significance: number, overrides: Partial<AnalyzedPaper> = {}): AnalyzedPaper {
  return {
    paper: makePaper(id),
    significance,
    novelty: 0.5,
    summary: `Summary of ${id}.`,
    keyInsights: [`Insight for ${id}`],
    businessRelevance: `Relevance of ${id}.`,
    implementationDifficulty: 'medium',
    tags: ['llm'],
    ...overrides,
  };
}

export function analysisJson(significance: number, extra: Record<string, unknown> = {}): string {
  return JSON.stringify({
    significance,
    novelty: 0.5,
    summary: 'A summary.',
    key_insights: ['First insight'],
    business_relevance: 'Some relevance.',
    implementation_difficulty: 'medium',
    tags: ['llm'],
    ...extra,
  });
}

export class ArraySource implements PaperSource {
  readonly name = 'fixture';
  readonly requests: SourceRequest[] = [];

  constructor(private readonly papers: PaperRecord[]) {}

  async *fetch(request: SourceRequest): AsyncGenerator<PaperRecord> {
    this.requests.push(request);
    yield* this.papers;
  }
}

type Responder = (input: LLMInput, call: number) => Promise<LLMOutput>;

/**
 * Provider driven by a callback; records every prompt it receives.
 */
export class FakeProvider implements AnalysisProvider {
  readonly model = 'fake-model';
  readonly prompts: string[] = [];

  constructor(private readonly respond: Responder) {}

  generate(input: LLMInput): Promise<LLMOutput> {
    this.prompts.push(input.prompt);
    return this.respond(input, this.prompts.length);
  }
}

export class MemorySink implements DeliverySink {
  readonly delivered: Artifact[] = [];

  constructor(
    readonly name: string,
    private readonly formats: readonly OutputFormat[],
    private readonly fail?: Error
  ) {}

  accepts(format: OutputFormat): boolean {
    return this.formats.includes(format);
  }

  async deliver(artifact: Artifact): Promise<string> {
    if (this.fail) throw this.fail;
    this.delivered.push(artifact);
    return `${this.name}:${artifact.filename}`;
  }
}

export function testSettings(overrides: (settings: Settings) => void = () => {}): Settings {
  const settings: Settings = structuredClone(DEFAULT_SETTINGS);
  settings.research.categories = ['cs.AI'];
  settings.research.keywords = ['language model'];
  settings.research.boostKeywords = [];
  settings.research.excludeKeywords = [];
  settings.analysis.retry = { attempts: 3, baseDelayMs: 100, maxDelayMs: 1000, factor: 2 };
  settings.anthropic.apiKey = 'test-secret';
  overrides(settings);
  return settings;
}
