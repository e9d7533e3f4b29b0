/**
 * Weekly trend summary
 *
 * One extra provider call that reads every paper in a weekly digest and
 * writes a short cross-paper commentary. A failed call leaves the digest
 * without trends; it never drops papers.
 */

import { TransientError, errorMessage } from './errors.js';
import { withRetry } from './retry.js';
import type { RetryPolicy } from './config.js';
import type { AnalysisProvider } from './llm.js';
import type { Clock } from './time.js';
import type { AnalyzedPaper, TokenUsage, TrendSummary } from '../types.js';

export interface TrendOptions {
  provider: AnalysisProvider;
  maxTokens: number;
  retry: RetryPolicy;
  clock: Clock;
  signal?: AbortSignal;
}

export type TrendOutcome =
  | { ok: true; trends: TrendSummary; usage?: TokenUsage }
  | { ok: false; error: string };

export const TREND_SYSTEM_PROMPT =
  'You are an expert research analyst reviewing a week of newly published papers ' +
  'to identify trends and highlight the most important work.';

export function buildTrendPrompt(papers: readonly AnalyzedPaper[]): string {
  const summaries = papers.map(p => ({
    id: p.paper.id,
    title: p.paper.title,
    summary: p.summary,
    significance: p.significance,
    novelty: p.novelty,
    tags: p.tags,
    key_insights: p.keyInsights,
  }));

  return [
    'Papers to review:',
    JSON.stringify(summaries, null, 2),
    '',
    'Cover:',
    '1. Overall trends and themes across these papers',
    '2. The most significant papers and why they matter',
    '3. Any breakthrough or paradigm-shifting work',
    '4. Concerning developments or limitations',
    '5. Likely research directions for the coming weeks',
    '',
    'Write for researchers and practitioners, in plain paragraphs separated by blank lines. No headings.',
  ].join('\n');
}

export async function summarizeTrends(papers: readonly AnalyzedPaper[], options: TrendOptions): Promise<TrendOutcome> {
  const { provider, retry, clock, signal } = options;

  if (signal?.aborted) {
    return { ok: false, error: 'run aborted' };
  }

  console.log(`[analyze] Summarizing trends across ${papers.length} paper(s)`);

  try {
    const output = await withRetry(
      () =>
        provider.generate({
          system: TREND_SYSTEM_PROMPT,
          prompt: buildTrendPrompt(papers),
          maxTokens: options.maxTokens,
          temperature: 0.4,
        }),
      {
        policy: retry,
        clock,
        signal,
        shouldRetry: error => error instanceof TransientError && !signal?.aborted,
        onRetry: (error, attempt, delayMs) => {
          console.warn(
            `[analyze] Trend summary: ${errorMessage(error)}, retrying in ${delayMs}ms (attempt ${attempt}/${retry.attempts})`
          );
        },
      }
    );

    const text = output.text.trim();
    if (!text) {
      return { ok: false, error: 'empty response' };
    }
    return { ok: true, trends: { text, paperCount: papers.length }, usage: output.usage };
  } catch (error) {
    return { ok: false, error: errorMessage(error) };
  }
}

/**
 * Split a summary into display paragraphs on blank lines.
 */
export function trendParagraphs(trends: TrendSummary | undefined): string[] {
  if (!trends) return [];
  return trends.text
    .split(/\n\s*\n/)
    .map(paragraph => paragraph.trim())
    .filter(paragraph => paragraph.length > 0);
}
