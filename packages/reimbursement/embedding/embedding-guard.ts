// Embedding guard: validates and L2-normalizes vectors at the moment of embedding.
// Stored and query vectors are both normalized here, never at search time.

import { EmbeddingFailure, errorMessage } from '../errors.js';
import type { EmbeddingProvider } from './provider.js';

/** Tolerance for "unit norm" checks on float32 vectors. */
export const UNIT_NORM_TOLERANCE = 1e-3;

export function l2Norm(vector: Float32Array): number {
  let sum = 0;
  for (let i = 0; i < vector.length; i++) sum += vector[i] * vector[i];
  return Math.sqrt(sum);
}

export function dot(a: Float32Array, b: Float32Array, offsetB = 0): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) sum += a[i] * b[offsetB + i];
  return sum;
}

/**
 * Reject vectors that cannot be normalized.
 *
 * Checks:
 * 1. Non-empty.
 * 2. Every component finite.
 * 3. L2 norm > 0 (an all-zero vector means the text produced no features).
 *
 * @throws EmbeddingFailure
 */
export function validateEmbedding(embedding: Float32Array, text?: string): number {
  const context = text !== undefined ? ` for text "${text.slice(0, 50)}"` : '';

  if (embedding.length === 0) {
    throw new EmbeddingFailure(`Empty embedding vector${context}`, 0);
  }
  for (let i = 0; i < embedding.length; i++) {
    if (!Number.isFinite(embedding[i])) {
      throw new EmbeddingFailure(`Embedding component ${i} is not finite${context}`);
    }
  }

  const norm = l2Norm(embedding);
  if (norm === 0) {
    throw new EmbeddingFailure(`Embedding has zero L2 norm${context}`, 0);
  }
  return norm;
}

/** Return a new unit-length copy of the vector. The input is not modified. */
export function normalizeL2(embedding: Float32Array, text?: string): Float32Array {
  const norm = validateEmbedding(embedding, text);
  const out = new Float32Array(embedding.length);
  for (let i = 0; i < embedding.length; i++) out[i] = embedding[i] / norm;
  return out;
}

export function isUnitNorm(embedding: Float32Array): boolean {
  return Math.abs(l2Norm(embedding) - 1) <= UNIT_NORM_TOLERANCE;
}

/**
 * Embed text with the provider, then validate and normalize the result.
 * Anything the provider throws is wrapped in EmbeddingFailure.
 *
 * @throws EmbeddingFailure
 */
export async function computeNormalizedEmbedding(
  provider: EmbeddingProvider,
  text: string,
): Promise<Float32Array> {
  let raw: Float32Array;
  try {
    raw = await provider.embed(text);
  } catch (err) {
    if (err instanceof EmbeddingFailure) throw err;
    throw new EmbeddingFailure(
      `Embedding provider "${provider.name}" failed: ${errorMessage(err)}`,
      undefined,
      { cause: err },
    );
  }
  return normalizeL2(raw, text);
}
