/**
 * Canonical JSON form of a Digest
 *
 * Dates are ISO-8601 strings; every other field is written as-is, so
 * digestFromJson(digestToJson(d)) is field-for-field equal to d.
 */

import { DIFFICULTIES, DIGEST_KINDS } from '../types.js';
import type { AnalyzedPaper, Digest, DigestStats, PaperRecord, TagCount, TrendSummary } from '../types.js';

export const DIGEST_SCHEMA_VERSION = 1;

export function digestToJson(digest: Digest): string {
  const document = {
    version: DIGEST_SCHEMA_VERSION,
    kind: digest.kind,
    generatedAt: digest.generatedAt.toISOString(),
    stats: digest.stats,
    papers: digest.papers.map(p => ({
      paper: {
        id: p.paper.id,
        title: p.paper.title,
        authors: p.paper.authors,
        abstract: p.paper.abstract,
        categories: p.paper.categories,
        publishedAt: p.paper.publishedAt.toISOString(),
        links: p.paper.links,
      },
      significance: p.significance,
      novelty: p.novelty,
      summary: p.summary,
      keyInsights: p.keyInsights,
      businessRelevance: p.businessRelevance,
      implementationDifficulty: p.implementationDifficulty,
      tags: p.tags,
    })),
    ...(digest.trends ? { trends: { text: digest.trends.text, paperCount: digest.trends.paperCount } } : {}),
  };
  return JSON.stringify(document, null, 2) + '\n';
}

export class DigestFormatError extends Error {
  constructor(path: string, expected: string) {
    super(`Invalid digest JSON at ${path}: expected ${expected}`);
    this.name = 'DigestFormatError';
  }
}

type Json = Record<string, unknown>;

export function digestFromJson(text: string): Digest {
  const root = object(JSON.parse(text), '$');

  const kind = root.kind;
  const validKind = DIGEST_KINDS.find(k => k === kind);
  if (!validKind) throw new DigestFormatError('$.kind', DIGEST_KINDS.join(' | '));

  return {
    kind: validKind,
    generatedAt: date(root.generatedAt, '$.generatedAt'),
    stats: readStats(object(root.stats, '$.stats')),
    papers: array(root.papers, '$.papers').map((item, i) => readAnalyzed(object(item, `$.papers[${i}]`), `$.papers[${i}]`)),
    ...(root.trends === undefined ? {} : { trends: readTrends(object(root.trends, '$.trends')) }),
  };
}

function readTrends(trends: Json): TrendSummary {
  return {
    text: string(trends.text, '$.trends.text'),
    paperCount: number(trends.paperCount, '$.trends.paperCount'),
  };
}

function readStats(stats: Json): DigestStats {
  return {
    analyzedCount: number(stats.analyzedCount, '$.stats.analyzedCount'),
    highSignificanceCount: number(stats.highSignificanceCount, '$.stats.highSignificanceCount'),
    meanSignificance: number(stats.meanSignificance, '$.stats.meanSignificance'),
    meanNovelty: number(stats.meanNovelty, '$.stats.meanNovelty'),
    topTags: array(stats.topTags, '$.stats.topTags').map((item, i): TagCount => {
      const entry = object(item, `$.stats.topTags[${i}]`);
      return {
        tag: string(entry.tag, `$.stats.topTags[${i}].tag`),
        count: number(entry.count, `$.stats.topTags[${i}].count`),
      };
    }),
  };
}

function readAnalyzed(item: Json, path: string): AnalyzedPaper {
  const difficulty = item.implementationDifficulty;
  const validDifficulty = DIFFICULTIES.find(d => d === difficulty);
  if (!validDifficulty) throw new DigestFormatError(`${path}.implementationDifficulty`, DIFFICULTIES.join(' | '));

  return {
    paper: readPaper(object(item.paper, `${path}.paper`), `${path}.paper`),
    significance: number(item.significance, `${path}.significance`),
    novelty: number(item.novelty, `${path}.novelty`),
    summary: string(item.summary, `${path}.summary`),
    keyInsights: strings(item.keyInsights, `${path}.keyInsights`),
    businessRelevance: string(item.businessRelevance, `${path}.businessRelevance`),
    implementationDifficulty: validDifficulty,
    tags: strings(item.tags, `${path}.tags`),
  };
}

function readPaper(paper: Json, path: string): PaperRecord {
  const links = object(paper.links, `${path}.links`);
  return {
    id: string(paper.id, `${path}.id`),
    title: string(paper.title, `${path}.title`),
    authors: strings(paper.authors, `${path}.authors`),
    abstract: string(paper.abstract, `${path}.abstract`),
    categories: strings(paper.categories, `${path}.categories`),
    publishedAt: date(paper.publishedAt, `${path}.publishedAt`),
    links: {
      abstract: string(links.abstract, `${path}.links.abstract`),
      pdf: string(links.pdf, `${path}.links.pdf`),
    },
  };
}

function object(value: unknown, path: string): Json {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new DigestFormatError(path, 'object');
  }
  return { ...value };
}

function array(value: unknown, path: string): unknown[] {
  if (!Array.isArray(value)) throw new DigestFormatError(path, 'array');
  return value;
}

function string(value: unknown, path: string): string {
  if (typeof value !== 'string') throw new DigestFormatError(path, 'string');
  return value;
}

function strings(value: unknown, path: string): string[] {
  return array(value, path).map((item, i) => string(item, `${path}[${i}]`));
}

function number(value: unknown, path: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) throw new DigestFormatError(path, 'number');
  return value;
}

function date(value: unknown, path: string): Date {
  const parsed = new Date(string(value, path));
  if (Number.isNaN(parsed.getTime())) throw new DigestFormatError(path, 'ISO-8601 timestamp');
  return parsed;
}
