/**
 * Strict parsing of analysis responses
 *
 * Either every field is present and well-typed, or the response is
 * rejected with the raw text kept for diagnostics. No partial results.
 */

import { DIFFICULTIES, type AnalysisFields, type Difficulty } from '../types.js';

export type ParseResult =
  | { ok: true; fields: AnalysisFields }
  | { ok: false; error: string; raw: string };

const FENCE = /^```(?:json)?\s*\n?([\s\S]*?)\n?```$/;

export function parseAnalysis(raw: string): ParseResult {
  const fail = (error: string): ParseResult => ({ ok: false, error, raw });

  let text = raw.trim();
  const fenced = FENCE.exec(text);
  if (fenced) {
    text = fenced[1].trim();
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    return fail(`response is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    return fail('response is not a JSON object');
  }
  const record: Record<string, unknown> = { ...data };

  const significance = unitScore(record.significance);
  if (significance === null) return fail('significance must be a number between 0 and 1');

  const novelty = unitScore(record.novelty);
  if (novelty === null) return fail('novelty must be a number between 0 and 1');

  const { summary, business_relevance: businessRelevance } = record;
  if (typeof summary !== 'string') return fail('summary must be a string');
  if (typeof businessRelevance !== 'string') return fail('business_relevance must be a string');

  const keyInsights = stringList(record.key_insights);
  if (keyInsights === null) return fail('key_insights must be a list of strings');

  const tags = stringList(record.tags);
  if (tags === null) return fail('tags must be a list of strings');

  const difficulty = parseDifficulty(record.implementation_difficulty);
  if (difficulty === null) return fail(`implementation_difficulty must be one of ${DIFFICULTIES.join(', ')}`);

  return {
    ok: true,
    fields: {
      significance,
      novelty,
      summary: summary.trim(),
      keyInsights,
      businessRelevance: businessRelevance.trim(),
      implementationDifficulty: difficulty,
      tags: [...new Set(tags)],
    },
  };
}

function unitScore(value: unknown): number | null {
  if (typeof value !== 'number' || !Number.isFinite(value)) return null;
  if (value < 0 || value > 1) return null;
  return value;
}

function stringList(value: unknown): string[] | null {
  if (!Array.isArray(value)) return null;
  const items: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string') return null;
    const trimmed = item.trim();
    if (trimmed) items.push(trimmed);
  }
  return items;
}

function parseDifficulty(value: unknown): Difficulty | null {
  if (typeof value !== 'string') return null;
  const normalized = value.trim().toLowerCase();
  return DIFFICULTIES.find(d => d === normalized) ?? null;
}
