import { describe, it, expect, vi } from 'vitest';
import { ArxivSource, extractArxivId, parseAtomFeed } from '../src/lib/arxiv.js';
import { SourceUnavailable } from '../src/lib/errors.js';
import { collectPapers, streamPapers, type PaperSource } from '../src/lib/source.js';
import type { PaperRecord } from '../src/types.js';
import { ArraySource, FakeClock, makePaper } from './helpers.js';

const window = { start: new Date('2024-03-03T00:00:00Z'), end: new Date('2024-03-04T00:00:00Z') };

function entry(id: string, published: string, title = `Title ${id}`): string {
  return `
  <entry>
    <id>http://arxiv.org/abs/${id}v1</id>
    <published>${published}</published>
    <title>${title}</title>
    <summary>  An abstract
      spanning lines.  </summary>
    <author><name>Ada Example</name></author>
    <author><name>Ben Sample</name></author>
    <category term="cs.AI" scheme="http://arxiv.org/schemas/atom"/>
    <category term="cs.LG" scheme="http://arxiv.org/schemas/atom"/>
    <link href="http://arxiv.org/abs/${id}v1" rel="alternate" type="text/html"/>
    <link title="pdf" href="http://arxiv.org/pdf/${id}v1" rel="related" type="application/pdf"/>
  </entry>`;
}

function feed(...entries: string[]): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title type="html">ArXiv Query</title>
  ${entries.join('\n')}
</feed>`;
}

describe('streamPapers', () => {
  it('drops out-of-window entries, dedupes by id and orders by publication time', async () => {
    const source = new ArraySource([
      makePaper('b', { publishedAt: new Date('2024-03-03T12:00:00Z') }),
      makePaper('a', { publishedAt: new Date('2024-03-03T06:00:00Z') }),
      makePaper('b', { publishedAt: new Date('2024-03-03T12:00:00Z'), title: 'Later duplicate' }),
      makePaper('old', { publishedAt: new Date('2024-03-02T23:59:59Z') }),
      makePaper('edge', { publishedAt: new Date('2024-03-04T00:00:00Z') }),
      makePaper('c', { publishedAt: new Date('2024-03-03T12:00:00Z') }),
    ]);

    const papers = await collectPapers(streamPapers(source, { categories: ['cs.AI'], window }));

    expect(papers.map(p => p.id)).toEqual(['a', 'b', 'c']);
    expect(papers[1].title).toBe('Paper b');
  });

  it('does not contact the source until the first element is pulled', async () => {
    const source = new ArraySource([makePaper('a', { publishedAt: new Date('2024-03-03T06:00:00Z') })]);
    const stream = streamPapers(source, { categories: ['cs.AI'], window });
    expect(source.requests).toHaveLength(0);

    await stream.next();
    expect(source.requests).toHaveLength(1);
  });

  it('wraps source errors in SourceUnavailable', async () => {
    const failing: PaperSource = {
      name: 'flaky',
      fetch: async function* (): AsyncGenerator<PaperRecord> {
        throw new Error('socket hang up');
      },
    };

    await expect(collectPapers(streamPapers(failing, { categories: [], window }))).rejects.toThrow(
      new SourceUnavailable('flaky: socket hang up')
    );
  });
});

describe('parseAtomFeed', () => {
  it('maps entries to paper records', () => {
    const [paper] = parseAtomFeed(feed(entry('2403.01234', '2024-03-03T17:00:00Z')));

    expect(paper).toEqual({
      id: '2403.01234',
      title: 'Title 2403.01234',
      authors: ['Ada Example', 'Ben Sample'],
      abstract: 'An abstract spanning lines.',
      categories: ['cs.AI', 'cs.LG'],
      publishedAt: new Date('2024-03-03T17:00:00Z'),
      links: {
        abstract: 'http://arxiv.org/abs/2403.01234v1',
        pdf: 'http://arxiv.org/pdf/2403.01234v1',
      },
    });
  });

  it('skips entries without a valid date and returns nothing for an empty feed', () => {
    expect(parseAtomFeed(feed(entry('2403.00001', 'not a date')))).toEqual([]);
    expect(parseAtomFeed(feed())).toEqual([]);
  });

  it('strips version suffixes from ids', () => {
    expect(extractArxivId('http://arxiv.org/abs/2410.01234v12')).toBe('2410.01234');
    expect(extractArxivId('http://arxiv.org/abs/hep-th/9901001v1')).toBe('hep-th/9901001');
  });
});

describe('ArxivSource', () => {
  const retry = { attempts: 3, baseDelayMs: 10, maxDelayMs: 100, factor: 2 };

  it('builds an OR query over categories, newest first', () => {
    const source = new ArxivSource({ maxResults: 10 });
    const url = new URL(source.buildUrl(['cs.AI', 'cs.CL'], 20, 10));

    expect(url.searchParams.get('search_query')).toBe('cat:cs.AI OR cat:cs.CL');
    expect(url.searchParams.get('start')).toBe('20');
    expect(url.searchParams.get('max_results')).toBe('10');
    expect(url.searchParams.get('sortBy')).toBe('submittedDate');
    expect(url.searchParams.get('sortOrder')).toBe('descending');
  });

  it('pages until a page falls entirely before the window', async () => {
    const pages = [
      feed(entry('2403.00003', '2024-03-03T20:00:00Z'), entry('2403.00002', '2024-03-03T10:00:00Z')),
      feed(entry('2403.00001', '2024-03-02T10:00:00Z'), entry('2403.00000', '2024-03-02T09:00:00Z')),
      feed(entry('2402.99999', '2024-03-01T10:00:00Z')),
    ];
    let call = 0;
    const fetchFn = vi.fn(async () => new Response(pages[call++]));
    const source = new ArxivSource({ maxResults: 100, pageSize: 2, fetchFn, retry, clock: new FakeClock(window.end) });

    const papers = await collectPapers(streamPapers(source, { categories: ['cs.AI'], window }));

    expect(fetchFn).toHaveBeenCalledTimes(2);
    expect(papers.map(p => p.id)).toEqual(['2403.00002', '2403.00003']);
  });

  it('retries server errors on the backoff schedule', async () => {
    const clock = new FakeClock(window.end);
    const responses = [
      new Response('busy', { status: 503 }),
      new Response('slow down', { status: 429 }),
      new Response(feed(entry('2403.00002', '2024-03-03T10:00:00Z'))),
      new Response(feed()),
    ];
    let call = 0;
    const fetchFn = vi.fn(async () => responses[call++]);
    const source = new ArxivSource({ maxResults: 100, pageSize: 1, fetchFn, retry, clock });

    const papers = await collectPapers(streamPapers(source, { categories: ['cs.AI'], window }));

    expect(papers.map(p => p.id)).toEqual(['2403.00002']);
    expect(clock.sleeps).toEqual([10, 20]);
  });

  it('raises SourceUnavailable once retries run out', async () => {
    const clock = new FakeClock(window.end);
    const fetchFn = vi.fn(async () => new Response('down', { status: 502 }));
    const source = new ArxivSource({ maxResults: 100, fetchFn, retry, clock });

    await expect(collectPapers(streamPapers(source, { categories: ['cs.AI'], window }))).rejects.toThrow(
      'arXiv unreachable: HTTP 502'
    );
    expect(fetchFn).toHaveBeenCalledTimes(3);
  });

  it('does not retry client errors', async () => {
    const fetchFn = vi.fn(async () => new Response('bad query', { status: 400 }));
    const source = new ArxivSource({ maxResults: 100, fetchFn, retry, clock: new FakeClock(window.end) });

    await expect(collectPapers(streamPapers(source, { categories: ['cs.AI'], window }))).rejects.toBeInstanceOf(
      SourceUnavailable
    );
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });
});
