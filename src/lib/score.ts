/**
 * Cheap relevance scoring
 *
 * Runs before any paid analysis call, so it must stay local and pure.
 */

import type { Settings } from './config.js';
import type { PaperRecord, ScoredPaper } from '../types.js';

export type RelevanceCriteria = Pick<
  Settings['research'],
  'categories' | 'keywords' | 'boostKeywords' | 'excludeKeywords' | 'categoryMatchSufficient'
>;

export interface RelevanceDecision {
  keep: boolean;
  score: number;
  matchedKeywords: string[];
  matchedCategories: string[];
  excludedBy?: string;
}

const KEYWORD_WEIGHT = 1;
const BOOST_WEIGHT = 0.5;
const CATEGORY_WEIGHT = 0.25;

function normalize(text: string): string {
  return text.toLowerCase().replace(/\s+/g, ' ').trim();
}

function matching(haystack: string, terms: string[]): string[] {
  return terms.filter(term => {
    const needle = normalize(term);
    return needle.length > 0 && haystack.includes(needle);
  });
}

export function assessRelevance(paper: PaperRecord, criteria: RelevanceCriteria): RelevanceDecision {
  const haystack = normalize(`${paper.title} ${paper.abstract}`);
  const allowed = new Set(criteria.categories);

  const matchedCategories = paper.categories.filter(c => allowed.has(c));
  const matchedKeywords = matching(haystack, criteria.keywords);
  const boostHits = matching(haystack, criteria.boostKeywords);

  const score =
    matchedKeywords.length * KEYWORD_WEIGHT +
    boostHits.length * BOOST_WEIGHT +
    matchedCategories.length * CATEGORY_WEIGHT;

  const [excludedBy] = matching(haystack, criteria.excludeKeywords);
  if (excludedBy !== undefined) {
    return { keep: false, score, matchedKeywords, matchedCategories, excludedBy };
  }

  const keep =
    matchedCategories.length > 0 && (matchedKeywords.length >= 1 || criteria.categoryMatchSufficient);

  return { keep, score, matchedKeywords, matchedCategories };
}

export interface FilterResult {
  kept: ScoredPaper[];
  total: number;
  /** Fraction of the input that was dropped, 0 for empty input. */
  reduction: number;
}

export function filterPapers(papers: readonly PaperRecord[], criteria: RelevanceCriteria): FilterResult {
  const kept: ScoredPaper[] = [];

  for (const paper of papers) {
    const decision = assessRelevance(paper, criteria);
    if (decision.keep) {
      kept.push({ paper, relevance: decision.score, matchedKeywords: decision.matchedKeywords });
    }
  }

  const total = papers.length;
  return {
    kept,
    total,
    reduction: total === 0 ? 0 : 1 - kept.length / total,
  };
}
