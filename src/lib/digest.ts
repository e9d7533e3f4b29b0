/**
 * Digest aggregation
 */

import type { AnalyzedPaper, Digest, DigestKind, DigestStats, TagCount } from '../types.js';

export interface AggregateOptions {
  kind: DigestKind;
  generatedAt: Date;
  /** Papers below this significance are left out. */
  minSignificance: number;
  /** Papers at or above this significance count as high-significance. */
  highSignificance: number;
  topTagCount?: number;
}

const TOP_TAGS = 5;

export function buildDigest(papers: readonly AnalyzedPaper[], options: AggregateOptions): Digest {
  const byId = new Map<string, AnalyzedPaper>();
  for (const analyzed of papers) {
    if (analyzed.significance < options.minSignificance) continue;
    const existing = byId.get(analyzed.paper.id);
    if (!existing || analyzed.significance > existing.significance) {
      byId.set(analyzed.paper.id, analyzed);
    }
  }

  const ordered = [...byId.values()].sort(compareForDigest);

  return {
    kind: options.kind,
    generatedAt: options.generatedAt,
    papers: ordered,
    stats: computeStats(ordered, options.highSignificance, options.topTagCount ?? TOP_TAGS),
  };
}

/**
 * Significance descending, then publication time descending, then id.
 */
export function compareForDigest(a: AnalyzedPaper, b: AnalyzedPaper): number {
  if (b.significance !== a.significance) return b.significance - a.significance;
  const byDate = b.paper.publishedAt.getTime() - a.paper.publishedAt.getTime();
  if (byDate !== 0) return byDate;
  return a.paper.id < b.paper.id ? -1 : a.paper.id > b.paper.id ? 1 : 0;
}

export function computeStats(papers: readonly AnalyzedPaper[], highSignificance: number, topTagCount = TOP_TAGS): DigestStats {
  if (papers.length === 0) {
    return { analyzedCount: 0, highSignificanceCount: 0, meanSignificance: 0, meanNovelty: 0, topTags: [] };
  }

  const sum = (values: number[]) => values.reduce((a, b) => a + b, 0);

  return {
    analyzedCount: papers.length,
    highSignificanceCount: papers.filter(p => p.significance >= highSignificance).length,
    meanSignificance: sum(papers.map(p => p.significance)) / papers.length,
    meanNovelty: sum(papers.map(p => p.novelty)) / papers.length,
    topTags: topTags(papers, topTagCount),
  };
}

function topTags(papers: readonly AnalyzedPaper[], limit: number): TagCount[] {
  const counts = new Map<string, number>();
  for (const paper of papers) {
    for (const tag of paper.tags) {
      counts.set(tag, (counts.get(tag) ?? 0) + 1);
    }
  }
  return [...counts.entries()]
    .map(([tag, count]) => ({ tag, count }))
    .sort((a, b) => b.count - a.count || (a.tag < b.tag ? -1 : a.tag > b.tag ? 1 : 0))
    .slice(0, limit);
}
