/**
 * LLM access for paper analysis
 *
 * The analyzer only sees AnalysisProvider; AnthropicProvider is the
 * production implementation.
 */

import Anthropic from '@anthropic-ai/sdk';
import { TransientError, errorMessage } from './errors.js';
import type { TokenUsage } from '../types.js';

export interface LLMInput {
  system?: string;
  prompt: string;
  maxTokens: number;
  temperature?: number;
}

export interface LLMOutput {
  text: string;
  usage?: TokenUsage;
}

export interface AnalysisProvider {
  readonly model: string;
  /**
   * Rejects with TransientError for failures worth retrying.
   */
  generate(input: LLMInput): Promise<LLMOutput>;
}

export interface AnthropicProviderOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
}

export class AnthropicProvider implements AnalysisProvider {
  readonly model: string;
  private client: Anthropic;

  constructor(options: AnthropicProviderOptions) {
    this.model = options.model;
    // Retries are ours, so per-paper backoff stays observable.
    this.client = new Anthropic({ apiKey: options.apiKey, timeout: options.timeoutMs, maxRetries: 0 });
  }

  async generate(input: LLMInput): Promise<LLMOutput> {
    let response: Anthropic.Message;
    try {
      response = await this.client.messages.create({
        model: this.model,
        max_tokens: input.maxTokens,
        temperature: input.temperature ?? 0.2,
        system: input.system,
        messages: [{ role: 'user', content: input.prompt }],
      });
    } catch (error) {
      throw classifyProviderError(error);
    }

    const text = response.content
      .map(block => (block.type === 'text' ? block.text : ''))
      .join('');

    return {
      text,
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      },
    };
  }
}

/**
 * Map SDK errors onto retryable and final failures.
 */
export function classifyProviderError(error: unknown): Error {
  if (error instanceof Anthropic.APIConnectionTimeoutError) {
    return new TransientError('timeout', 'request timed out', { cause: error });
  }
  if (error instanceof Anthropic.RateLimitError) {
    return new TransientError('rate_limit', 'rate limited', { cause: error });
  }
  if (error instanceof Anthropic.InternalServerError || error instanceof Anthropic.APIConnectionError) {
    return new TransientError('unavailable', errorMessage(error), { cause: error });
  }
  return error instanceof Error ? error : new Error(String(error));
}
