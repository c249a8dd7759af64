// InvoiceVectorIndex: record arena + flat inner-product index + snapshot lifecycle
//
// Records live in an arena keyed by a stable integer handle; the similarity
// structure stores handles, never arena positions. An add becomes visible
// to search all at once: both structures are updated in one synchronous
// block inside the write lock. Stored records hold their own copy of the
// embedding, and snapshots are written from the search matrix.

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { IndexWriteError, SnapshotLoadError, errorMessage } from '../errors.js';
import { computeNormalizedEmbedding, normalizeL2 } from '../embedding/embedding-guard.js';
import type { EmbeddingProvider } from '../embedding/provider.js';
import type { SnapshotStore } from '../db/snapshot-store.js';
import {
  REIMBURSEMENT_STATUSES,
  type IndexStatistics,
  type InvoiceRecord,
  type NewInvoiceRecord,
  type ReimbursementStatus,
} from '../types/invoice.js';
import type { RecordPredicate, SearchHit } from '../types/retrieval.js';
import { FlatInnerProductIndex } from './flat-index.js';
import { Mutex } from '../utils/mutex.js';
import { createLogger, type Logger } from '../utils/logger.js';

export interface InvoiceIndexOptions {
  embedder: EmbeddingProvider;
  /** Defaults to the embedder's dimensions. */
  dimension?: number;
  /** Where snapshots go. Without a store the index is memory-only. */
  store?: SnapshotStore;
  /** Snapshot after every successful add. Default: true when a store is set. */
  persistOnWrite?: boolean;
  logger?: Logger;
}

const NewRecordSchema = z.object({
  employeeName: z.string().trim().min(1, 'employeeName is required'),
  invoiceFilename: z.string().trim().min(1, 'invoiceFilename is required'),
  reimbursementStatus: z.enum(REIMBURSEMENT_STATUSES),
  reimbursedAmount: z.number().finite().nonnegative(),
  totalAmount: z.number().finite().nonnegative(),
  reasoning: z.string(),
  rawContent: z.string().min(1, 'rawContent is required'),
  invoiceDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'invoiceDate must be YYYY-MM-DD').optional(),
}).refine(r => r.reimbursedAmount <= r.totalAmount, {
  message: 'reimbursedAmount must not exceed totalAmount',
  path: ['reimbursedAmount'],
});

export class InvoiceVectorIndex {
  readonly dimension: number;
  private embedder: EmbeddingProvider;
  private store?: SnapshotStore;
  private persistOnWrite: boolean;
  private log: Logger;

  private arena = new Map<number, InvoiceRecord>();
  private idToHandle = new Map<string, number>();
  private vectors: FlatInnerProductIndex;
  private nextHandle = 0;
  private writeLock = new Mutex();
  private dirty = false;

  constructor(options: InvoiceIndexOptions) {
    this.embedder = options.embedder;
    this.dimension = options.dimension ?? options.embedder.dimensions;
    this.store = options.store;
    this.persistOnWrite = options.persistOnWrite ?? options.store !== undefined;
    this.log = options.logger ?? createLogger('vector-index');
    this.vectors = new FlatInnerProductIndex(this.dimension);
  }

  get model(): string {
    return this.embedder.model;
  }

  /** True when in-memory state has changes not yet in a snapshot. */
  get isDirty(): boolean {
    return this.dirty;
  }

  count(): number {
    return this.arena.size;
  }

  /**
   * Embed (unless an embedding is supplied), normalize and store a record.
   * Embedding runs before the write lock is taken.
   *
   * @throws IndexWriteError on invalid record or dimension mismatch
   * @throws EmbeddingFailure when the provider fails or returns an unusable vector
   */
  async add(input: NewInvoiceRecord): Promise<InvoiceRecord> {
    const parsed = NewRecordSchema.safeParse(input);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new IndexWriteError(
        `Invalid invoice record: ${issue ? `${issue.path.join('.') || 'record'}: ${issue.message}` : 'unknown'}`,
      );
    }

    const embedding = input.embedding
      ? normalizeL2(input.embedding, input.invoiceFilename)
      : await computeNormalizedEmbedding(this.embedder, input.rawContent);

    if (embedding.length !== this.dimension) {
      throw new IndexWriteError(
        `Embedding dimension ${embedding.length} does not match index dimension ${this.dimension}`,
      );
    }

    const record: InvoiceRecord = {
      id: randomUUID(),
      employeeName: input.employeeName.trim(),
      invoiceFilename: input.invoiceFilename.trim(),
      reimbursementStatus: input.reimbursementStatus,
      reimbursedAmount: input.reimbursedAmount,
      totalAmount: input.totalAmount,
      reasoning: input.reasoning,
      rawContent: input.rawContent,
      embedding,
      createdAt: new Date(),
      invoiceDate: input.invoiceDate,
      invoiceNumber: input.invoiceNumber,
      expenseCategory: input.expenseCategory,
      policyViolations: [...(input.policyViolations ?? [])],
      approvedItems: [...(input.approvedItems ?? [])],
      rejectedItems: [...(input.rejectedItems ?? [])],
    };

    await this.writeLock.runExclusive(() => this.insert(record));
    this.log('debug', 'Indexed invoice record', { id: record.id, invoiceFilename: record.invoiceFilename });

    if (this.persistOnWrite) {
      await this.persistQuietly();
    }
    return record;
  }

  /**
   * Top-k records by inner product with an already-normalized query.
   * The predicate is applied before scoring, so fewer than k results come
   * back only when fewer than k records match.
   */
  search(queryEmbedding: Float32Array, k: number, predicate?: RecordPredicate): SearchHit[] {
    const accept = predicate
      ? (handle: number) => {
          const record = this.arena.get(handle);
          return record !== undefined && predicate(record);
        }
      : undefined;

    const hits: SearchHit[] = [];
    for (const { handle, score } of this.vectors.search(queryEmbedding, k, accept)) {
      const record = this.arena.get(handle);
      if (record) hits.push({ record, score });
    }
    return hits;
  }

  get(id: string): InvoiceRecord | undefined {
    const handle = this.idToHandle.get(id);
    return handle === undefined ? undefined : this.arena.get(handle);
  }

  /** All records in insertion order, optionally filtered. */
  list(predicate?: RecordPredicate): InvoiceRecord[] {
    const records: InvoiceRecord[] = [];
    for (const [handle] of this.vectors.entries()) {
      const record = this.arena.get(handle);
      if (record && (!predicate || predicate(record))) records.push(record);
    }
    return records;
  }

  statistics(): IndexStatistics {
    const statusDistribution: Record<ReimbursementStatus, number> = {
      'Fully Reimbursed': 0,
      'Partially Reimbursed': 0,
      'Declined': 0,
    };
    const employees = new Set<string>();
    let totalReimbursed = 0;
    let reimbursedCount = 0;

    for (const record of this.arena.values()) {
      employees.add(record.employeeName);
      statusDistribution[record.reimbursementStatus]++;
      if (record.reimbursedAmount > 0) {
        totalReimbursed += record.reimbursedAmount;
        reimbursedCount++;
      }
    }

    return {
      totalAnalyses: this.arena.size,
      employees: [...employees].sort(),
      statusDistribution,
      totalReimbursed,
      averageReimbursement: reimbursedCount > 0 ? totalReimbursed / reimbursedCount : 0,
    };
  }

  /**
   * Replace in-memory state with the newest snapshot. A missing or empty
   * snapshot leaves an empty index. Returns the number of records loaded.
   *
   * @throws SnapshotLoadError when the snapshot is corrupt or its dimension differs
   */
  async load(): Promise<number> {
    const store = this.store;
    if (!store) {
      this.log('info', 'No snapshot store configured, starting with an empty index');
      return 0;
    }

    return this.writeLock.runExclusive(async () => {
      const snapshot = await store.read();
      if (!snapshot || snapshot.records.length === 0) {
        this.reset();
        this.log('info', 'No existing snapshot found, starting with an empty index', { dir: store.dir });
        return 0;
      }
      if (snapshot.dimension !== this.dimension) {
        throw new SnapshotLoadError(
          `Snapshot dimension ${snapshot.dimension} does not match index dimension ${this.dimension}`,
          store.dir,
        );
      }
      this.reset();
      if (snapshot.model !== this.embedder.model) {
        this.log('warn', 'Snapshot was written with a different embedding model', {
          snapshotModel: snapshot.model,
          currentModel: this.embedder.model,
        });
      }

      for (const record of snapshot.records) this.insert(record);
      this.dirty = false;
      this.log('info', `Loaded vector index with ${snapshot.records.length} records`, {
        generation: snapshot.generation,
      });
      return snapshot.records.length;
    });
  }

  /**
   * Write a snapshot of the current state.
   *
   * @throws IndexWriteError when no store is configured or the write fails
   */
  async persist(): Promise<void> {
    const store = this.store;
    if (!store) {
      throw new IndexWriteError('Cannot persist: no snapshot store configured');
    }

    await this.writeLock.runExclusive(async () => {
      const records = this.snapshotRecords();
      try {
        const generation = await store.write(records, { dimension: this.dimension, model: this.embedder.model });
        this.dirty = false;
        this.log('debug', 'Snapshot written', { generation, count: records.length });
      } catch (err) {
        throw new IndexWriteError(`Snapshot write failed: ${errorMessage(err)}`, undefined, { cause: err });
      }
    });
  }

  /** Persist only when there are unsnapshotted changes. Returns whether a write happened. */
  async persistIfDirty(): Promise<boolean> {
    if (!this.dirty || !this.store) return false;
    await this.persist();
    return true;
  }

  /** Snapshot failures after an add are logged; the dirty flag keeps them queued for the next tick. */
  private async persistQuietly(): Promise<void> {
    try {
      await this.persist();
    } catch (err) {
      this.log('error', 'Snapshot after write failed, will retry on next scheduled snapshot', {
        error: errorMessage(err),
      });
    }
  }

  private insert(record: InvoiceRecord): void {
    if (this.idToHandle.has(record.id)) {
      throw new IndexWriteError(`Record ${record.id} is already indexed`, record.id);
    }
    if (record.embedding.length !== this.dimension) {
      throw new IndexWriteError(
        `Embedding dimension ${record.embedding.length} does not match index dimension ${this.dimension}`,
        record.id,
      );
    }

    const handle = this.nextHandle++;
    this.vectors.add(handle, record.embedding);
    this.arena.set(handle, { ...record, embedding: Float32Array.from(record.embedding) });
    this.idToHandle.set(record.id, handle);
    this.dirty = true;
  }

  /** Records in row order, each carrying the vector search actually scores against. */
  private snapshotRecords(): InvoiceRecord[] {
    const records: InvoiceRecord[] = [];
    for (const [handle, row] of this.vectors.entries()) {
      const record = this.arena.get(handle);
      if (record) records.push({ ...record, embedding: Float32Array.from(row) });
    }
    return records;
  }

  private reset(): void {
    this.arena.clear();
    this.idToHandle.clear();
    this.vectors = new FlatInnerProductIndex(this.dimension);
    this.nextHandle = 0;
    this.dirty = false;
  }
}
