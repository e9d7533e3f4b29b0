/**
 * arXiv API client
 *
 * Uses the Atom query API, newest submissions first
 */

import { XMLParser } from 'fast-xml-parser';
import { SourceUnavailable, TransientError, errorMessage } from './errors.js';
import { withRetry } from './retry.js';
import { systemClock, type Clock } from './time.js';
import type { RetryPolicy } from './config.js';
import type { PaperSource } from './source.js';
import type { PaperRecord, SourceRequest } from '../types.js';

const ARXIV_API_URL = 'https://export.arxiv.org/api/query';
const PAGE_SIZE = 100;

// arXiv asks clients to back off hard on 429: 5s, 15s, 30s
const DEFAULT_RETRY: RetryPolicy = { attempts: 4, baseDelayMs: 5_000, maxDelayMs: 30_000, factor: 3 };

interface AtomLink {
  '@_href'?: string;
  '@_rel'?: string;
  '@_title'?: string;
  '@_type'?: string;
}

type AtomText = string | { '#text'?: string };

interface AtomEntry {
  id?: AtomText;
  title?: AtomText;
  summary?: AtomText;
  published?: AtomText;
  author?: Array<{ name?: AtomText }>;
  category?: Array<{ '@_term'?: string }>;
  link?: AtomLink[];
}

interface AtomDocument {
  feed?: { entry?: AtomEntry[] };
}

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  parseTagValue: false,
  trimValues: true,
  isArray: name => ['entry', 'author', 'category', 'link'].includes(name),
});

export interface ArxivSourceOptions {
  maxResults: number;
  pageSize?: number;
  retry?: RetryPolicy;
  clock?: Clock;
  fetchFn?: typeof fetch;
}

export class ArxivSource implements PaperSource {
  readonly name = 'arxiv';

  private readonly pageSize: number;
  private readonly retry: RetryPolicy;
  private readonly clock: Clock;
  private readonly fetchFn: typeof fetch;

  constructor(private readonly options: ArxivSourceOptions) {
    this.pageSize = options.pageSize ?? PAGE_SIZE;
    this.retry = options.retry ?? DEFAULT_RETRY;
    this.clock = options.clock ?? systemClock;
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
  }

  buildQuery(categories: string[]): string {
    return categories.map(c => `cat:${c}`).join(' OR ');
  }

  buildUrl(categories: string[], start: number, size: number): string {
    const params = new URLSearchParams({
      search_query: this.buildQuery(categories),
      start: String(start),
      max_results: String(size),
      sortBy: 'submittedDate',
      sortOrder: 'descending',
    });
    return `${ARXIV_API_URL}?${params.toString()}`;
  }

  async *fetch(request: SourceRequest): AsyncGenerator<PaperRecord, void, undefined> {
    const windowStart = request.window.start.getTime();

    for (let start = 0; start < this.options.maxResults; start += this.pageSize) {
      const size = Math.min(this.pageSize, this.options.maxResults - start);
      const xml = await this.fetchPage(this.buildUrl(request.categories, start, size));
      const papers = parseAtomFeed(xml);

      if (papers.length === 0) return;

      console.log(`[source] arXiv page at ${start}: ${papers.length} entries`);
      yield* papers;

      // Results are newest first; a page entirely before the window ends paging.
      if (papers.every(p => p.publishedAt.getTime() < windowStart)) return;
    }
  }

  private async fetchPage(url: string): Promise<string> {
    try {
      return await withRetry(() => this.requestOnce(url), {
        policy: this.retry,
        clock: this.clock,
        shouldRetry: error => error instanceof TransientError,
        onRetry: (error, attempt, delayMs) => {
          console.warn(
            `[source] arXiv request failed (${errorMessage(error)}), retrying in ${delayMs / 1000}s (attempt ${attempt}/${this.retry.attempts})`
          );
        },
      });
    } catch (error) {
      throw new SourceUnavailable(`arXiv unreachable: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async requestOnce(url: string): Promise<string> {
    let response: Response;
    try {
      response = await this.fetchFn(url, { headers: { Accept: 'application/atom+xml' } });
    } catch (error) {
      throw new TransientError('unavailable', `network error: ${errorMessage(error)}`, { cause: error });
    }

    if (response.status === 429) {
      throw new TransientError('rate_limit', 'HTTP 429');
    }
    if (response.status >= 500) {
      throw new TransientError('unavailable', `HTTP ${response.status}`);
    }
    if (!response.ok) {
      throw new SourceUnavailable(`arXiv returned HTTP ${response.status}`);
    }
    return response.text();
  }
}

/**
 * Parse an arXiv Atom document. Entries without an id or a valid
 * publication date are skipped.
 */
export function parseAtomFeed(xml: string): PaperRecord[] {
  let doc: AtomDocument;
  try {
    doc = parser.parse(xml);
  } catch (error) {
    throw new SourceUnavailable(`arXiv returned unparseable XML: ${errorMessage(error)}`, { cause: error });
  }

  const papers: PaperRecord[] = [];
  for (const entry of doc.feed?.entry ?? []) {
    const paper = transformEntry(entry);
    if (paper) papers.push(paper);
  }
  return papers;
}

function transformEntry(entry: AtomEntry): PaperRecord | null {
  const rawId = textOf(entry.id);
  const id = extractArxivId(rawId);
  if (!id) return null;

  const publishedAt = new Date(textOf(entry.published));
  if (Number.isNaN(publishedAt.getTime())) return null;

  const links = entry.link ?? [];
  const abstractLink = links.find(l => l['@_rel'] === 'alternate')?.['@_href'];
  const pdfLink = links.find(l => l['@_title'] === 'pdf' || l['@_type'] === 'application/pdf')?.['@_href'];

  return {
    id,
    title: cleanText(textOf(entry.title)) || 'Untitled',
    authors: (entry.author ?? []).map(a => cleanText(textOf(a.name))).filter(Boolean),
    abstract: cleanText(textOf(entry.summary)),
    categories: [...new Set((entry.category ?? []).map(c => c['@_term'] ?? '').filter(Boolean))],
    publishedAt,
    links: {
      abstract: abstractLink || `https://arxiv.org/abs/${id}`,
      pdf: pdfLink || `https://arxiv.org/pdf/${id}`,
    },
  };
}

/**
 * http://arxiv.org/abs/2410.01234v2 -> 2410.01234
 * http://arxiv.org/abs/hep-th/9901001v1 -> hep-th/9901001
 */
export function extractArxivId(raw: string): string {
  const match = raw.match(/arxiv\.org\/abs\/(.+?)(v\d+)?$/i);
  return match ? match[1] : raw.trim();
}

function textOf(node: AtomText | undefined): string {
  if (node === undefined) return '';
  if (typeof node === 'string') return node;
  return node['#text'] ?? '';
}

function cleanText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}
