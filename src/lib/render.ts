/**
 * Template rendering
 *
 * One renderer per output format. Templates are read and compiled once;
 * after that, rendering a Digest is pure and uses no clock other than
 * digest.generatedAt.
 */

import { readFile } from 'fs/promises';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import Handlebars from 'handlebars';
import { RenderFailure, errorMessage } from './errors.js';
import { digestToJson } from './serialize.js';
import { fileStamp, formatDisplayDate, formatDisplayDateTime } from './time.js';
import { trendParagraphs } from './trends.js';
import type { AnalyzedPaper, Artifact, Digest, DigestKind, OutputFormat } from '../types.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
export const TEMPLATES_DIR = join(__dirname, '../../templates');

const EMAIL_PAPER_LIMIT = 5;
const AUTHOR_LIMIT = 5;

type Template = Handlebars.TemplateDelegate<DigestView>;

export interface Templates {
  html: Template;
  markdown: Template;
  email: Template;
}

export interface RenderOptions {
  timezone: string;
  brandName: string;
  highSignificance: number;
}

export type Renderer = (digest: Digest) => Artifact;

export const FILE_EXTENSIONS: Record<OutputFormat, string> = {
  html: 'html',
  markdown: 'md',
  json: 'json',
  email: 'email.html',
};

const CONTENT_TYPES: Record<OutputFormat, string> = {
  html: 'text/html; charset=utf-8',
  markdown: 'text/markdown; charset=utf-8',
  json: 'application/json',
  email: 'text/html; charset=utf-8',
};

const KIND_LABELS: Record<DigestKind, string> = {
  daily: 'Daily',
  weekly: 'Weekly',
  manual: 'Manual',
};

interface PaperView {
  rank: number;
  id: string;
  title: string;
  authors: string;
  published: string;
  significance: string;
  novelty: string;
  scoreClass: 'high' | 'medium' | 'low';
  highlight: boolean;
  summary: string;
  keyInsights: string[];
  firstInsight: string;
  businessRelevance: string;
  difficulty: string;
  tags: string[];
  tagList: string;
  abstractUrl: string;
  pdfUrl: string;
}

export interface DigestView {
  brandName: string;
  kindLabel: string;
  title: string;
  date: string;
  generatedAt: string;
  empty: boolean;
  stats: {
    analyzedCount: number;
    highSignificanceCount: number;
    meanSignificance: string;
    meanNovelty: string;
    topTags: string;
  };
  /** Empty unless the digest carries a trend summary. */
  trends: string[];
  papers: PaperView[];
  morePapers: number;
}

export function digestFilename(digest: Digest, format: OutputFormat, timezone: string): string {
  return `digest_${fileStamp(digest.generatedAt, timezone)}.${FILE_EXTENSIONS[format]}`;
}

export function emailSubject(digest: Digest, options: RenderOptions): string {
  const date = formatDisplayDate(digest.generatedAt, options.timezone);
  return `${options.brandName} ${KIND_LABELS[digest.kind]} Digest - ${date}`;
}

function scoreClass(score: number): PaperView['scoreClass'] {
  if (score >= 0.7) return 'high';
  if (score >= 0.4) return 'medium';
  return 'low';
}

function formatAuthors(authors: readonly string[]): string {
  const shown = authors.slice(0, AUTHOR_LIMIT).join(', ');
  return authors.length > AUTHOR_LIMIT ? `${shown} et al.` : shown;
}

function toPaperView(p: AnalyzedPaper, index: number, options: RenderOptions): PaperView {
  return {
    rank: index + 1,
    id: p.paper.id,
    title: p.paper.title,
    authors: formatAuthors(p.paper.authors),
    published: formatDisplayDate(p.paper.publishedAt, options.timezone),
    significance: p.significance.toFixed(2),
    novelty: p.novelty.toFixed(2),
    scoreClass: scoreClass(p.significance),
    highlight: p.significance >= options.highSignificance,
    summary: p.summary,
    keyInsights: p.keyInsights,
    firstInsight: p.keyInsights[0] ?? '',
    businessRelevance: p.businessRelevance,
    difficulty: p.implementationDifficulty,
    tags: p.tags,
    tagList: p.tags.join(', '),
    abstractUrl: p.paper.links.abstract,
    pdfUrl: p.paper.links.pdf,
  };
}

export function buildView(digest: Digest, options: RenderOptions, paperLimit?: number): DigestView {
  const kindLabel = KIND_LABELS[digest.kind];
  const shown = paperLimit === undefined ? digest.papers : digest.papers.slice(0, paperLimit);

  return {
    brandName: options.brandName,
    kindLabel,
    title: `${options.brandName}: ${kindLabel} Digest`,
    date: formatDisplayDate(digest.generatedAt, options.timezone),
    generatedAt: formatDisplayDateTime(digest.generatedAt, options.timezone),
    empty: digest.papers.length === 0,
    stats: {
      analyzedCount: digest.stats.analyzedCount,
      highSignificanceCount: digest.stats.highSignificanceCount,
      meanSignificance: digest.stats.meanSignificance.toFixed(2),
      meanNovelty: digest.stats.meanNovelty.toFixed(2),
      topTags: digest.stats.topTags.map(t => `${t.tag} (${t.count})`).join(', '),
    },
    trends: trendParagraphs(digest.trends),
    papers: shown.map((p, i) => toPaperView(p, i, options)),
    morePapers: digest.papers.length - shown.length,
  };
}

export async function loadTemplates(dir: string = TEMPLATES_DIR): Promise<Templates> {
  const read = (name: string) => readFile(join(dir, name), 'utf-8');
  const [html, markdown, email] = await Promise.all([
    read('digest.html.hbs'),
    read('digest.md.hbs'),
    read('email.html.hbs'),
  ]);

  return {
    html: Handlebars.compile<DigestView>(html, { strict: true }),
    markdown: Handlebars.compile<DigestView>(markdown, { noEscape: true, strict: true }),
    email: Handlebars.compile<DigestView>(email, { strict: true }),
  };
}

export function createRenderer(format: OutputFormat, templates: Templates, options: RenderOptions): Renderer {
  const artifact = (digest: Digest, content: string, subject?: string): Artifact => ({
    format,
    filename: digestFilename(digest, format, options.timezone),
    contentType: CONTENT_TYPES[format],
    content,
    ...(subject === undefined ? {} : { subject }),
  });

  switch (format) {
    case 'html':
      return digest => artifact(digest, templates.html(buildView(digest, options)));
    case 'markdown':
      return digest => artifact(digest, templates.markdown(buildView(digest, options)));
    case 'json':
      return digest => artifact(digest, digestToJson(digest));
    case 'email':
      return digest =>
        artifact(digest, templates.email(buildView(digest, options, EMAIL_PAPER_LIMIT)), emailSubject(digest, options));
  }
}

/**
 * Render one format, wrapping any failure in RenderFailure.
 */
export function renderArtifact(format: OutputFormat, digest: Digest, templates: Templates, options: RenderOptions): Artifact {
  try {
    return createRenderer(format, templates, options)(digest);
  } catch (error) {
    throw new RenderFailure(format, `Rendering ${format} failed: ${errorMessage(error)}`, { cause: error });
  }
}
