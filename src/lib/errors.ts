/**
 * Error taxonomy
 *
 * Only SourceUnavailable and RunTimeout end a run. The others are caught
 * at the stage that raised them and recorded as run warnings.
 */

import type { OutputFormat } from '../types.js';

export type DigestErrorKind =
  | 'source_unavailable'
  | 'analysis_failure'
  | 'render_failure'
  | 'delivery_failure'
  | 'config'
  | 'transient'
  | 'run_timeout';

export abstract class DigestError extends Error {
  abstract readonly kind: DigestErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class SourceUnavailable extends DigestError {
  readonly kind = 'source_unavailable';
}

export type AnalysisFailureReason = 'timeout' | 'rate_limit' | 'malformed' | 'provider';

export class AnalysisFailure extends DigestError {
  readonly kind = 'analysis_failure';

  constructor(
    readonly paperId: string,
    readonly reason: AnalysisFailureReason,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class RenderFailure extends DigestError {
  readonly kind = 'render_failure';

  constructor(readonly format: OutputFormat, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class DeliveryFailure extends DigestError {
  readonly kind = 'delivery_failure';

  constructor(readonly sink: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class ConfigError extends DigestError {
  readonly kind = 'config';

  constructor(readonly problems: string[]) {
    super(`Invalid configuration:\n  - ${problems.join('\n  - ')}`);
  }
}

/**
 * A capability failure worth retrying: timeouts, rate limits, 5xx.
 */
export class TransientError extends DigestError {
  readonly kind = 'transient';

  constructor(
    readonly reason: 'timeout' | 'rate_limit' | 'unavailable',
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class RunTimeout extends DigestError {
  readonly kind = 'run_timeout';

  constructor(readonly timeoutMs: number) {
    super(`Run exceeded its ${timeoutMs}ms budget`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
