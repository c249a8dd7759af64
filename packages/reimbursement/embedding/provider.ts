// Embedding providers: pure text → fixed-dimension vector
// HashingEmbeddingProvider is the default: deterministic feature hashing, no model download.
// OpenAIEmbeddingProvider calls the OpenAI embeddings API through @langchain/openai.

import { createHash } from 'node:crypto';

export interface EmbeddingProvider {
  /** Provider identifier, e.g. 'hashing', 'openai' */
  readonly name: string;
  /** Model identifier recorded in the snapshot manifest */
  readonly model: string;
  /** Output vector dimensions; fixed for the lifetime of an index */
  readonly dimensions: number;
  /** Deterministic for identical input. Output is not required to be normalized. */
  embed(text: string): Promise<Float32Array>;
}

const TOKEN_PATTERN = /[\p{L}\p{N}]+/gu;

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(TOKEN_PATTERN) ?? [];
}

/**
 * Signed feature hashing over lowercase word tokens.
 * Each token lands in one bucket with a +1/-1 sign taken from its sha256 digest.
 * Text with no word characters yields the zero vector, which the embedding
 * guard rejects.
 */
export class HashingEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'hashing';
  readonly model: string;
  readonly dimensions: number;
  private bucketCache = new Map<string, { bucket: number; sign: number }>();

  constructor(dimensions = 384) {
    if (!Number.isInteger(dimensions) || dimensions <= 0) {
      throw new RangeError(`Embedding dimensions must be a positive integer, got ${dimensions}`);
    }
    this.dimensions = dimensions;
    this.model = `feature-hashing-${dimensions}`;
  }

  async embed(text: string): Promise<Float32Array> {
    const vector = new Float32Array(this.dimensions);
    for (const token of tokenize(text)) {
      const { bucket, sign } = this.locate(token);
      vector[bucket] += sign;
    }
    return vector;
  }

  private locate(token: string): { bucket: number; sign: number } {
    const cached = this.bucketCache.get(token);
    if (cached) return cached;

    const digest = createHash('sha256').update(token).digest();
    const slot = {
      bucket: digest.readUInt32LE(0) % this.dimensions,
      sign: (digest[4] & 1) === 0 ? 1 : -1,
    };
    if (this.bucketCache.size < 50_000) this.bucketCache.set(token, slot);
    return slot;
  }
}

export interface OpenAIEmbeddingOptions {
  apiKey: string;
  model?: string;
  /** Requested output size; text-embedding-3 models shorten to it. */
  dimensions?: number;
}

interface QueryEmbedder {
  embedQuery(text: string): Promise<number[]>;
}

/**
 * OpenAI embeddings through @langchain/openai.
 * The client is constructed on first embed. A response of the wrong size is
 * returned as-is; the index rejects it on dimension.
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'openai';
  readonly model: string;
  readonly dimensions: number;
  private apiKey: string;
  private client: QueryEmbedder | null = null;

  constructor(options: OpenAIEmbeddingOptions) {
    this.apiKey = options.apiKey;
    this.model = options.model ?? 'text-embedding-3-small';
    this.dimensions = options.dimensions ?? 384;
  }

  private async ensureClient(): Promise<QueryEmbedder> {
    if (this.client) return this.client;
    const { OpenAIEmbeddings } = await import('@langchain/openai');
    this.client = new OpenAIEmbeddings({
      model: this.model,
      apiKey: this.apiKey,
      dimensions: this.dimensions,
    });
    return this.client;
  }

  async embed(text: string): Promise<Float32Array> {
    const client = await this.ensureClient();
    return Float32Array.from(await client.embedQuery(text));
  }
}
