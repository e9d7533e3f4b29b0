/**
 * Delivery sinks
 *
 * Each sink takes the artifacts of the formats it accepts. Deliveries are
 * at-least-once: transient failures are retried, and one failing
 * (sink, artifact) pair never stops the others.
 */

import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { DeliveryFailure, errorMessage } from './errors.js';
import { withRetry } from './retry.js';
import type { RetryPolicy, Settings } from './config.js';
import type { Clock } from './time.js';
import type { Artifact, Digest, OutputFormat } from '../types.js';

export interface DeliverySink {
  readonly name: string;
  accepts(format: OutputFormat): boolean;
  /**
   * Returns a short description of where the artifact went. Throw
   * DeliveryFailure for failures that retrying cannot fix.
   */
  deliver(artifact: Artifact, digest: Digest, signal?: AbortSignal): Promise<string>;
}

export class FileSink implements DeliverySink {
  readonly name = 'file';
  private static readonly FORMATS: readonly OutputFormat[] = ['html', 'markdown', 'json'];

  constructor(private readonly directory: string) {}

  accepts(format: OutputFormat): boolean {
    return FileSink.FORMATS.includes(format);
  }

  async deliver(artifact: Artifact, _digest: Digest, signal?: AbortSignal): Promise<string> {
    await mkdir(this.directory, { recursive: true });
    const path = join(this.directory, artifact.filename);
    try {
      // Two runs in the same second share a filename; keep the first file.
      await writeFile(path, artifact.content, { encoding: 'utf-8', flag: 'wx', signal });
    } catch (error) {
      if (isErrnoException(error) && error.code === 'EEXIST') {
        throw new DeliveryFailure(this.name, `${path} already exists, not overwriting`, { cause: error });
      }
      throw error;
    }
    return path;
  }
}

interface PostmarkResponse {
  MessageID: string;
  ErrorCode?: number;
  Message?: string;
}

/**
 * Email delivery via Postmark
 */
export class PostmarkSink implements DeliverySink {
  readonly name = 'postmark';

  constructor(
    private readonly config: Settings['postmark'],
    private readonly fetchFn: typeof fetch = (input, init) => fetch(input, init)
  ) {}

  accepts(format: OutputFormat): boolean {
    return format === 'email';
  }

  async deliver(artifact: Artifact, _digest: Digest, signal?: AbortSignal): Promise<string> {
    const body = {
      From: this.config.from,
      To: this.config.to.join(', '),
      Subject: artifact.subject ?? artifact.filename,
      HtmlBody: artifact.content,
      ReplyTo: this.config.replyTo || undefined,
      MessageStream: 'outbound',
    };

    const response = await this.fetchFn('https://api.postmarkapp.com/email', {
      method: 'POST',
      headers: {
        Accept: 'application/json',
        'Content-Type': 'application/json',
        'X-Postmark-Server-Token': this.config.token,
      },
      body: JSON.stringify(body),
      signal,
    });

    if (!response.ok) {
      const error = await response.text();
      const message = `Postmark send failed (${response.status}): ${error}`;
      if (response.status === 429 || response.status >= 500) {
        throw new Error(message);
      }
      throw new DeliveryFailure(this.name, message);
    }

    const result = await response.json() as PostmarkResponse;
    return `postmark:${result.MessageID}`;
  }
}

const WEBHOOK_LIMIT = 1900;

/**
 * Chat webhook (Discord-compatible payload) carrying the Markdown digest,
 * truncated to fit a single message.
 */
export class WebhookSink implements DeliverySink {
  readonly name = 'webhook';

  constructor(
    private readonly config: Settings['webhook'],
    private readonly fetchFn: typeof fetch = (input, init) => fetch(input, init)
  ) {}

  accepts(format: OutputFormat): boolean {
    return format === 'markdown';
  }

  async deliver(artifact: Artifact, _digest: Digest, signal?: AbortSignal): Promise<string> {
    const response = await this.fetchFn(this.config.url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ content: truncateMessage(artifact.content), username: this.config.username }),
      signal,
    });

    if (!response.ok) {
      const message = `Webhook returned HTTP ${response.status}`;
      if (response.status === 429 || response.status >= 500) {
        throw new Error(message);
      }
      throw new DeliveryFailure(this.name, message);
    }
    return `webhook:${artifact.filename}`;
  }
}

export function truncateMessage(content: string, limit = WEBHOOK_LIMIT): string {
  if (content.length <= limit) return content;
  return `${content.slice(0, limit)}...\n\n(truncated, see the full digest)`;
}

export interface DeliveryOptions {
  retry: RetryPolicy;
  clock: Clock;
  /** Once aborted, no further (sink, artifact) pair is attempted or retried. */
  signal?: AbortSignal;
  /** Called as each artifact lands, before the remaining pairs run. */
  onDelivered?: (where: string) => void;
}

export interface DeliveryReport {
  delivered: string[];
  failures: DeliveryFailure[];
}

export async function deliverAll(
  artifacts: readonly Artifact[],
  digest: Digest,
  sinks: readonly DeliverySink[],
  options: DeliveryOptions
): Promise<DeliveryReport> {
  const { signal } = options;
  const delivered: string[] = [];
  const failures: DeliveryFailure[] = [];

  for (const sink of sinks) {
    for (const artifact of artifacts) {
      if (!sink.accepts(artifact.format)) continue;
      if (signal?.aborted) {
        console.warn(`[deliver] Run aborted, ${sink.name} ${artifact.filename} not delivered`);
        continue;
      }

      try {
        const where = await withRetry(() => sink.deliver(artifact, digest, signal), {
          policy: options.retry,
          clock: options.clock,
          signal,
          shouldRetry: error => !(error instanceof DeliveryFailure) && !signal?.aborted,
          onRetry: (error, attempt, delayMs) => {
            console.warn(
              `[deliver] ${sink.name} ${artifact.filename}: ${errorMessage(error)}, retrying in ${delayMs}ms (attempt ${attempt}/${options.retry.attempts})`
            );
          },
        });
        delivered.push(where);
        options.onDelivered?.(where);
        console.log(`[deliver] ${sink.name}: ${where}`);
      } catch (error) {
        const failure =
          error instanceof DeliveryFailure
            ? error
            : new DeliveryFailure(sink.name, `${artifact.filename}: ${errorMessage(error)}`, { cause: error });
        failures.push(failure);
        console.error(`[deliver] ${sink.name} failed: ${failure.message}`);
      }
    }
  }

  return { delivered, failures };
}

export function buildSinks(settings: Settings): DeliverySink[] {
  const sinks: DeliverySink[] = [new FileSink(settings.output.directory)];
  if (settings.postmark.enabled) sinks.push(new PostmarkSink(settings.postmark));
  if (settings.webhook.enabled) sinks.push(new WebhookSink(settings.webhook));
  return sinks;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
