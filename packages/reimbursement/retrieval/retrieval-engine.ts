// Retrieval engine: validate filters, embed the query, ranked filtered search

import { computeNormalizedEmbedding } from '../embedding/embedding-guard.js';
import type { EmbeddingProvider } from '../embedding/provider.js';
import type { InvoiceVectorIndex } from '../memory/invoice-index.js';
import type { RecordPredicate, SearchHit } from '../types/retrieval.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { buildPredicate } from './filters.js';

export interface RetrievalEngineOptions {
  index: InvoiceVectorIndex;
  embedder: EmbeddingProvider;
  /** Upper bound on k regardless of what callers ask for. Default 50. */
  maxK?: number;
  logger?: Logger;
}

export class RetrievalEngine {
  private index: InvoiceVectorIndex;
  private embedder: EmbeddingProvider;
  private maxK: number;
  private log: Logger;

  constructor(options: RetrievalEngineOptions) {
    this.index = options.index;
    this.embedder = options.embedder;
    this.maxK = options.maxK ?? 50;
    this.log = options.logger ?? createLogger('retrieval');
  }

  /**
   * Top-k records for the query that satisfy every filter, best first.
   * Filters are validated before anything is embedded.
   *
   * @throws InvalidFilterError for unknown keys or malformed values
   * @throws EmbeddingFailure when the query cannot be embedded
   */
  async retrieve(queryText: string, k: number, filters?: unknown): Promise<SearchHit[]> {
    return this.retrieveMatching(queryText, k, buildPredicate(filters));
  }

  /** Same as retrieve, for callers that already compiled their filters with buildPredicate. */
  async retrieveMatching(queryText: string, k: number, predicate?: RecordPredicate): Promise<SearchHit[]> {
    const limit = Math.min(Math.floor(k), this.maxK);
    if (limit <= 0 || this.index.count() === 0) return [];

    const query = await computeNormalizedEmbedding(this.embedder, queryText);
    const hits = this.index.search(query, limit, predicate);
    this.log('debug', 'Retrieved invoice records', {
      k: limit,
      filtered: predicate !== undefined,
      hits: hits.length,
      topScore: hits[0]?.score,
    });
    return hits;
  }
}
