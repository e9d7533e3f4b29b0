/**
 * Paper analysis
 *
 * Picks the top candidates by cheap relevance, asks the provider for a
 * structured assessment of each, and drops papers whose call or response
 * fails. Calls run concurrently up to the configured cap; the returned
 * promise settles only after every dispatched paper has an outcome.
 */

import { AnalysisFailure, TransientError, errorMessage } from './errors.js';
import { ConcurrencyLimiter } from './limiter.js';
import { parseAnalysis } from './parse.js';
import { withRetry } from './retry.js';
import type { RetryPolicy } from './config.js';
import type { AnalysisProvider, LLMOutput } from './llm.js';
import type { Clock } from './time.js';
import type { AnalyzedPaper, PaperRecord, ScoredPaper, TokenUsage } from '../types.js';

export interface AnalyzerOptions {
  provider: AnalysisProvider;
  budget: number;
  parallelism: number;
  maxTokens: number;
  retry: RetryPolicy;
  clock: Clock;
  interests: string[];
  /** Once aborted, papers not yet dispatched are dropped. */
  signal?: AbortSignal;
}

export interface AnalysisOutcome {
  analyzed: AnalyzedPaper[];
  failures: AnalysisFailure[];
  selected: ScoredPaper[];
  /** Kept papers left out by the budget. */
  overBudget: number;
  usage: TokenUsage;
}

export const SYSTEM_PROMPT =
  'You are an expert research analyst. You assess newly published papers for a research digest ' +
  'and answer with a single JSON object, no prose.';

export function buildAnalysisPrompt(paper: PaperRecord, interests: string[]): string {
  const lines = [
    'Analyze the following paper.',
    '',
    `Title: ${paper.title}`,
    `Authors: ${paper.authors.join(', ')}`,
    `Categories: ${paper.categories.join(', ')}`,
    `arXiv ID: ${paper.id}`,
    '',
    'Abstract:',
    paper.abstract,
    '',
    'Respond with JSON in exactly this shape:',
    '{',
    '  "significance": <number 0-1, potential significance to the field>,',
    '  "novelty": <number 0-1, how novel the work is>,',
    '  "summary": "<2-3 sentence summary of the main contribution>",',
    '  "key_insights": ["<insight>", "<insight>", "<insight>"],',
    '  "business_relevance": "<how this could affect commercial applications>",',
    '  "implementation_difficulty": "low" | "medium" | "high",',
    '  "tags": ["<tag>", "<tag>"]',
    '}',
  ];

  if (interests.length > 0) {
    lines.push('', `Reader's research interests: ${interests.join(', ')}`);
    lines.push('Weigh significance with these interests in mind.');
  }

  return lines.join('\n');
}

/**
 * Highest relevance first; newer papers, then lower ids, win ties.
 */
export function selectForAnalysis(candidates: readonly ScoredPaper[], budget: number): ScoredPaper[] {
  return [...candidates]
    .sort((a, b) => {
      if (b.relevance !== a.relevance) return b.relevance - a.relevance;
      const byDate = b.paper.publishedAt.getTime() - a.paper.publishedAt.getTime();
      if (byDate !== 0) return byDate;
      return a.paper.id < b.paper.id ? -1 : a.paper.id > b.paper.id ? 1 : 0;
    })
    .slice(0, Math.max(0, budget));
}

type PaperOutcome =
  | { ok: true; paper: AnalyzedPaper; usage?: TokenUsage }
  | { ok: false; failure: AnalysisFailure };

export async function analyzePapers(
  candidates: readonly ScoredPaper[],
  options: AnalyzerOptions
): Promise<AnalysisOutcome> {
  const selected = selectForAnalysis(candidates, options.budget);
  const limiter = new ConcurrencyLimiter(options.parallelism);

  console.log(
    `[analyze] Analyzing ${selected.length} of ${candidates.length} candidates (budget ${options.budget}, parallelism ${options.parallelism})`
  );

  const outcomes = await Promise.all(
    selected.map(candidate => limiter.execute(() => analyzeOne(candidate.paper, options)))
  );

  const analyzed: AnalyzedPaper[] = [];
  const failures: AnalysisFailure[] = [];
  const usage: TokenUsage = { inputTokens: 0, outputTokens: 0 };

  for (const outcome of outcomes) {
    if (outcome.ok) {
      analyzed.push(outcome.paper);
      usage.inputTokens += outcome.usage?.inputTokens ?? 0;
      usage.outputTokens += outcome.usage?.outputTokens ?? 0;
    } else {
      failures.push(outcome.failure);
    }
  }

  return {
    analyzed,
    failures,
    selected,
    overBudget: candidates.length - selected.length,
    usage,
  };
}

async function analyzeOne(paper: PaperRecord, options: AnalyzerOptions): Promise<PaperOutcome> {
  const { provider, retry, clock, signal } = options;

  if (signal?.aborted) {
    return {
      ok: false,
      failure: new AnalysisFailure(paper.id, 'provider', `Analysis of ${paper.id} abandoned: run aborted`),
    };
  }

  let output: LLMOutput;
  try {
    output = await withRetry(
      () =>
        provider.generate({
          system: SYSTEM_PROMPT,
          prompt: buildAnalysisPrompt(paper, options.interests),
          maxTokens: options.maxTokens,
        }),
      {
        policy: retry,
        clock,
        signal,
        shouldRetry: error => error instanceof TransientError && !signal?.aborted,
        onRetry: (error, attempt, delayMs) => {
          console.warn(
            `[analyze] ${paper.id}: ${errorMessage(error)}, retrying in ${delayMs}ms (attempt ${attempt}/${retry.attempts})`
          );
        },
      }
    );
  } catch (error) {
    const reason = error instanceof TransientError && error.reason !== 'unavailable' ? error.reason : 'provider';
    const failure = new AnalysisFailure(paper.id, reason, `Analysis of ${paper.id} failed: ${errorMessage(error)}`, {
      cause: error,
    });
    console.warn(`[analyze] ${failure.message}`);
    return { ok: false, failure };
  }

  const parsed = parseAnalysis(output.text);
  if (!parsed.ok) {
    const failure = new AnalysisFailure(
      paper.id,
      'malformed',
      `Analysis of ${paper.id} returned an unusable response: ${parsed.error}`
    );
    console.warn(`[analyze] ${failure.message} (raw: ${parsed.raw.slice(0, 200)})`);
    return { ok: false, failure };
  }

  return { ok: true, paper: { paper, ...parsed.fields }, usage: output.usage };
}
