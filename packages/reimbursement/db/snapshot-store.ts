// Snapshot store: two co-located artifacts per generation, committed by a manifest swap
//
//   manifest.json             points at the live generation (replaced via temp file + rename)
//   vectors-<gen>.f32         count × dimension little-endian float32, row order
//   metadata-<gen>.json       record metadata in the same row order
//
// A crash before the manifest rename leaves the previous generation live and intact.

import { mkdir, readFile, readdir, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { SnapshotLoadError, errorMessage } from '../errors.js';
import { isUnitNorm } from '../embedding/embedding-guard.js';
import { REIMBURSEMENT_STATUSES, type InvoiceRecord } from '../types/invoice.js';
import { createLogger, type Logger } from '../utils/logger.js';

export const SNAPSHOT_FORMAT_VERSION = 1;
const MANIFEST_FILE = 'manifest.json';
const ARTIFACT_PATTERN = /^(vectors|metadata)-(\d+)\.(f32|json)(\.tmp)?$/;

const ManifestSchema = z.object({
  formatVersion: z.literal(SNAPSHOT_FORMAT_VERSION),
  generation: z.number().int().nonnegative(),
  dimension: z.number().int().positive(),
  count: z.number().int().nonnegative(),
  model: z.string(),
  vectorsFile: z.string().regex(ARTIFACT_PATTERN),
  metadataFile: z.string().regex(ARTIFACT_PATTERN),
  writtenAt: z.string().datetime(),
});

export type SnapshotManifest = z.infer<typeof ManifestSchema>;

const StoredRecordSchema = z.object({
  id: z.string().min(1),
  employeeName: z.string(),
  invoiceFilename: z.string(),
  reimbursementStatus: z.enum(REIMBURSEMENT_STATUSES),
  reimbursedAmount: z.number(),
  totalAmount: z.number(),
  reasoning: z.string(),
  rawContent: z.string(),
  createdAt: z.string().datetime(),
  invoiceDate: z.string().optional(),
  invoiceNumber: z.string().optional(),
  expenseCategory: z.string().optional(),
  policyViolations: z.array(z.string()).default([]),
  approvedItems: z.array(z.string()).default([]),
  rejectedItems: z.array(z.string()).default([]),
});

type StoredRecord = z.infer<typeof StoredRecordSchema>;

const MetadataFileSchema = z.object({
  generation: z.number().int().nonnegative(),
  dimension: z.number().int().positive(),
  records: z.array(StoredRecordSchema),
});

export interface LoadedSnapshot {
  generation: number;
  dimension: number;
  model: string;
  records: InvoiceRecord[];
}

export interface SnapshotInfo {
  dimension: number;
  model: string;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function toStored(record: InvoiceRecord): StoredRecord {
  return {
    id: record.id,
    employeeName: record.employeeName,
    invoiceFilename: record.invoiceFilename,
    reimbursementStatus: record.reimbursementStatus,
    reimbursedAmount: record.reimbursedAmount,
    totalAmount: record.totalAmount,
    reasoning: record.reasoning,
    rawContent: record.rawContent,
    createdAt: record.createdAt.toISOString(),
    invoiceDate: record.invoiceDate,
    invoiceNumber: record.invoiceNumber,
    expenseCategory: record.expenseCategory,
    policyViolations: [...record.policyViolations],
    approvedItems: [...record.approvedItems],
    rejectedItems: [...record.rejectedItems],
  };
}

export function encodeVectors(records: readonly InvoiceRecord[], dimension: number): Buffer {
  const buf = Buffer.alloc(records.length * dimension * 4);
  records.forEach((record, row) => {
    for (let i = 0; i < dimension; i++) {
      buf.writeFloatLE(record.embedding[i], (row * dimension + i) * 4);
    }
  });
  return buf;
}

export function decodeVector(buf: Buffer, row: number, dimension: number): Float32Array {
  const vec = new Float32Array(dimension);
  for (let i = 0; i < dimension; i++) {
    vec[i] = buf.readFloatLE((row * dimension + i) * 4);
  }
  return vec;
}

export class SnapshotStore {
  readonly dir: string;
  private generation = -1;
  private log: Logger;

  constructor(dir: string, logger: Logger = createLogger('snapshot-store')) {
    this.dir = dir;
    this.log = logger;
  }

  get currentGeneration(): number {
    return this.generation;
  }

  /**
   * Read the live generation.
   * Returns null when there is no snapshot yet (missing or empty manifest).
   *
   * @throws SnapshotLoadError when the artifacts exist but disagree
   */
  async read(): Promise<LoadedSnapshot | null> {
    const manifest = await this.readManifest();
    if (!manifest) return null;

    const metadata = await this.readMetadata(manifest);
    const vectors = await this.readArtifact(manifest.vectorsFile);
    const expectedBytes = manifest.count * manifest.dimension * 4;
    if (vectors.length !== expectedBytes) {
      throw new SnapshotLoadError(
        `Vector file ${manifest.vectorsFile} has ${vectors.length} bytes, expected ${expectedBytes}`,
        this.dir,
      );
    }

    const seen = new Set<string>();
    const records = metadata.records.map((stored, row): InvoiceRecord => {
      if (seen.has(stored.id)) {
        throw new SnapshotLoadError(`Duplicate record id ${stored.id} in ${manifest.metadataFile}`, this.dir);
      }
      seen.add(stored.id);

      const embedding = decodeVector(vectors, row, manifest.dimension);
      if (!isUnitNorm(embedding)) {
        throw new SnapshotLoadError(`Vector for record ${stored.id} is not unit-normalized`, this.dir);
      }
      return { ...stored, createdAt: new Date(stored.createdAt), embedding };
    });

    this.generation = manifest.generation;
    return {
      generation: manifest.generation,
      dimension: manifest.dimension,
      model: manifest.model,
      records,
    };
  }

  /**
   * Write both artifacts of a new generation, then swap the manifest.
   * Returns the committed generation. Throws on any storage failure; the
   * previous generation stays live.
   */
  async write(records: readonly InvoiceRecord[], info: SnapshotInfo): Promise<number> {
    await mkdir(this.dir, { recursive: true });

    if (this.generation < 0) {
      const existing = await this.readManifest().catch((err: unknown) => {
        this.log('warn', 'Existing manifest unreadable, starting a new generation sequence', { error: errorMessage(err) });
        return null;
      });
      this.generation = existing?.generation ?? 0;
    }
    const generation = this.generation + 1;
    const vectorsFile = `vectors-${generation}.f32`;
    const metadataFile = `metadata-${generation}.json`;

    const metadata = {
      generation,
      dimension: info.dimension,
      records: records.map(toStored),
    };
    const manifest: SnapshotManifest = {
      formatVersion: SNAPSHOT_FORMAT_VERSION,
      generation,
      dimension: info.dimension,
      count: records.length,
      model: info.model,
      vectorsFile,
      metadataFile,
      writtenAt: new Date().toISOString(),
    };

    await this.writeAtomic(vectorsFile, encodeVectors(records, info.dimension));
    await this.writeAtomic(metadataFile, JSON.stringify(metadata));
    await this.writeAtomic(MANIFEST_FILE, JSON.stringify(manifest, null, 2));
    this.generation = generation;

    await this.removeStaleGenerations(generation);
    return generation;
  }

  private async readManifest(): Promise<SnapshotManifest | null> {
    let text: string;
    try {
      text = await readFile(join(this.dir, MANIFEST_FILE), 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw new SnapshotLoadError(`Cannot read manifest: ${errorMessage(err)}`, this.dir, { cause: err });
    }
    if (text.trim() === '') return null;

    const parsed = ManifestSchema.safeParse(this.parseJson(text, MANIFEST_FILE));
    if (!parsed.success) {
      throw new SnapshotLoadError(`Invalid manifest: ${parsed.error.issues[0]?.message ?? 'unknown'}`, this.dir);
    }
    return parsed.data;
  }

  private async readMetadata(manifest: SnapshotManifest): Promise<z.infer<typeof MetadataFileSchema>> {
    const text = (await this.readArtifact(manifest.metadataFile)).toString('utf-8');
    const parsed = MetadataFileSchema.safeParse(this.parseJson(text, manifest.metadataFile));
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new SnapshotLoadError(
        `Invalid metadata file ${manifest.metadataFile}: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unknown'}`,
        this.dir,
      );
    }

    const metadata = parsed.data;
    if (metadata.generation !== manifest.generation) {
      throw new SnapshotLoadError(
        `Metadata generation ${metadata.generation} does not match manifest generation ${manifest.generation}`,
        this.dir,
      );
    }
    if (metadata.dimension !== manifest.dimension || metadata.records.length !== manifest.count) {
      throw new SnapshotLoadError(
        `Metadata (${metadata.records.length} × ${metadata.dimension}) does not match manifest (${manifest.count} × ${manifest.dimension})`,
        this.dir,
      );
    }
    return metadata;
  }

  private async readArtifact(file: string): Promise<Buffer> {
    try {
      return await readFile(join(this.dir, file));
    } catch (err) {
      throw new SnapshotLoadError(`Cannot read ${file}: ${errorMessage(err)}`, this.dir, { cause: err });
    }
  }

  private parseJson(text: string, file: string): unknown {
    try {
      return JSON.parse(text);
    } catch (err) {
      throw new SnapshotLoadError(`${file} is not valid JSON: ${errorMessage(err)}`, this.dir, { cause: err });
    }
  }

  private async writeAtomic(file: string, data: string | Buffer): Promise<void> {
    const target = join(this.dir, file);
    const temp = `${target}.tmp`;
    try {
      await writeFile(temp, data);
      await rename(temp, target);
    } catch (err) {
      await rm(temp, { force: true }).catch((cleanupErr: unknown) => {
        this.log('debug', 'Could not remove temp artifact', { file: temp, error: errorMessage(cleanupErr) });
      });
      throw err;
    }
  }

  private async removeStaleGenerations(live: number): Promise<void> {
    let files: string[];
    try {
      files = await readdir(this.dir);
    } catch (err) {
      this.log('warn', 'Could not list snapshot directory for cleanup', { dir: this.dir, error: errorMessage(err) });
      return;
    }

    for (const file of files) {
      const match = ARTIFACT_PATTERN.exec(file);
      if (!match || Number(match[2]) === live) continue;
      try {
        await rm(join(this.dir, file), { force: true });
      } catch (err) {
        this.log('warn', 'Could not remove stale snapshot artifact', { file, error: errorMessage(err) });
      }
    }
  }
}
