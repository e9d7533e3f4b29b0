/**
 * Append-only run log (JSON Lines)
 */

import { appendFile, mkdir } from 'fs/promises';
import { dirname } from 'path';
import type { RunResult } from '../types.js';

export interface RunLog {
  append(result: RunResult): Promise<void>;
}

export function formatRunEntry(result: RunResult): string {
  return JSON.stringify({
    ...result,
    startedAt: result.startedAt.toISOString(),
    finishedAt: result.finishedAt.toISOString(),
    digestGeneratedAt: result.digestGeneratedAt?.toISOString(),
  });
}

export class JsonlRunLog implements RunLog {
  constructor(readonly path: string) {}

  async append(result: RunResult): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    await appendFile(this.path, formatRunEntry(result) + '\n', 'utf-8');
  }
}
