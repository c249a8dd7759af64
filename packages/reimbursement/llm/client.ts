// LLM collaborator: text completion behind a narrow interface
// The Anthropic SDK is loaded on first use.

import type Anthropic from '@anthropic-ai/sdk';
import { LlmUnavailableError } from '../errors.js';

export interface CompletionOptions {
  maxTokens?: number;
  /** Optional system prompt */
  system?: string;
}

export interface LlmClient {
  readonly model: string;
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

export interface LlmConfig {
  apiKey?: string;
  model: string;
  maxTokens: number;
  timeoutMs: number;
}

/** Anthropic Messages API client (haiku by default). */
export class AnthropicLlmClient implements LlmClient {
  readonly model: string;
  private apiKey: string;
  private maxTokens: number;
  private timeoutMs: number;
  private clientPromise: Promise<Anthropic> | null = null;

  constructor(config: LlmConfig & { apiKey: string }) {
    this.apiKey = config.apiKey;
    this.model = config.model;
    this.maxTokens = config.maxTokens;
    this.timeoutMs = config.timeoutMs;
  }

  private getClient(): Promise<Anthropic> {
    if (!this.clientPromise) {
      this.clientPromise = import('@anthropic-ai/sdk').then(
        (mod) => new mod.default({ apiKey: this.apiKey, timeout: this.timeoutMs, maxRetries: 1 }),
        (err: unknown) => {
          this.clientPromise = null;
          throw new LlmUnavailableError('Anthropic SDK could not be loaded', { cause: err });
        },
      );
    }
    return this.clientPromise;
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    const client = await this.getClient();
    const response = await client.messages.create({
      model: this.model,
      max_tokens: options.maxTokens ?? this.maxTokens,
      ...(options.system ? { system: options.system } : {}),
      messages: [{ role: 'user', content: prompt }],
    });

    return response.content
      .map(block => (block.type === 'text' ? block.text : ''))
      .join('')
      .trim();
  }
}

/**
 * Build the configured client.
 * Returns null if no API key is set; callers degrade instead of failing.
 */
export function createLlmClient(config: LlmConfig): LlmClient | null {
  const apiKey = config.apiKey?.trim().replace(/^["']|["']$/g, '');
  if (!apiKey) return null;
  return new AnthropicLlmClient({ ...config, apiKey });
}
