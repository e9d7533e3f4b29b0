/**
 * Paper source contract
 *
 * A PaperSource talks to a catalog and may yield duplicates, entries
 * outside the window, or entries in any order. streamPapers() turns that
 * into the sequence the pipeline consumes.
 */

import { SourceUnavailable, errorMessage } from './errors.js';
import type { PaperRecord, SourceRequest } from '../types.js';

export interface PaperSource {
  readonly name: string;
  fetch(request: SourceRequest): AsyncIterable<PaperRecord>;
}

/**
 * Papers published in [window.start, window.end), deduplicated by id and
 * ordered by publication time ascending (id ascending on ties).
 *
 * Nothing is requested until the first element is pulled. The returned
 * generator can be consumed once.
 */
export async function* streamPapers(
  source: PaperSource,
  request: SourceRequest
): AsyncGenerator<PaperRecord, void, undefined> {
  const { start, end } = request.window;
  const seen = new Map<string, PaperRecord>();

  try {
    for await (const paper of source.fetch(request)) {
      const t = paper.publishedAt.getTime();
      if (t < start.getTime() || t >= end.getTime()) continue;
      if (seen.has(paper.id)) continue;
      seen.set(paper.id, paper);
    }
  } catch (error) {
    if (error instanceof SourceUnavailable) throw error;
    throw new SourceUnavailable(`${source.name}: ${errorMessage(error)}`, { cause: error });
  }

  const ordered = [...seen.values()].sort(comparePublishedAsc);
  yield* ordered;
}

function comparePublishedAsc(a: PaperRecord, b: PaperRecord): number {
  const diff = a.publishedAt.getTime() - b.publishedAt.getTime();
  if (diff !== 0) return diff;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Drain a paper stream into an array.
 */
export async function collectPapers(stream: AsyncIterable<PaperRecord>): Promise<PaperRecord[]> {
  const papers: PaperRecord[] = [];
  for await (const paper of stream) {
    papers.push(paper);
  }
  return papers;
}
