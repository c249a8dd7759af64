import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdir, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { SnapshotStore, decodeVector, encodeVectors } from '../db/snapshot-store.js';
import { SnapshotLoadError } from '../errors.js';
import type { InvoiceRecord } from '../types/invoice.js';
import { silentLogger } from '../utils/logger.js';
import { makeTempDir, vec } from './helpers.js';

function record(id: string, embedding: Float32Array, extra: Partial<InvoiceRecord> = {}): InvoiceRecord {
  return {
    id,
    employeeName: 'Alice',
    invoiceFilename: `${id}.pdf`,
    reimbursementStatus: 'Partially Reimbursed',
    reimbursedAmount: 30,
    totalAmount: 50,
    reasoning: 'Meal cap applies',
    rawContent: 'meal',
    embedding,
    createdAt: new Date('2024-05-01T10:00:00.000Z'),
    policyViolations: [],
    approvedItems: ['Lunch'],
    rejectedItems: [],
    ...extra,
  };
}

const INFO = { dimension: 2, model: 'keyword-test' };

describe('SnapshotStore', () => {
  let dir: string;
  let cleanup: () => Promise<void>;
  let store: SnapshotStore;

  beforeEach(async () => {
    ({ dir, cleanup } = await makeTempDir());
    store = new SnapshotStore(dir, silentLogger);
  });

  afterEach(async () => {
    await cleanup();
  });

  it('returns null when nothing has been written', async () => {
    await expect(new SnapshotStore(join(dir, 'missing'), silentLogger).read()).resolves.toBeNull();
  });

  it('treats an empty manifest as no snapshot', async () => {
    await writeFile(join(dir, 'manifest.json'), '');
    await expect(store.read()).resolves.toBeNull();
  });

  it('round-trips records and vectors in row order', async () => {
    const records = [
      record('r1', vec(1, 0), { invoiceDate: '2024-04-30', expenseCategory: 'Meals' }),
      record('r2', vec(0.6, 0.8)),
    ];
    await expect(store.write(records, INFO)).resolves.toBe(1);

    const loaded = await new SnapshotStore(dir, silentLogger).read();
    expect(loaded?.generation).toBe(1);
    expect(loaded?.dimension).toBe(2);
    expect(loaded?.model).toBe('keyword-test');
    expect(loaded?.records.map(r => r.id)).toEqual(['r1', 'r2']);

    const [first, second] = loaded?.records ?? [];
    expect(first.invoiceDate).toBe('2024-04-30');
    expect(first.expenseCategory).toBe('Meals');
    expect(first.approvedItems).toEqual(['Lunch']);
    expect(first.createdAt.toISOString()).toBe('2024-05-01T10:00:00.000Z');
    expect(Array.from(second.embedding)).toEqual([Math.fround(0.6), Math.fround(0.8)]);
  });

  it('keeps only the live generation on disk', async () => {
    await writeFile(join(dir, 'vectors-0.f32.tmp'), 'partial');
    await store.write([record('r1', vec(1, 0))], INFO);
    await store.write([record('r1', vec(1, 0)), record('r2', vec(0, 1))], INFO);

    expect((await readdir(dir)).sort()).toEqual(['manifest.json', 'metadata-2.json', 'vectors-2.f32']);
    const manifest: unknown = JSON.parse(await readFile(join(dir, 'manifest.json'), 'utf-8'));
    expect(manifest).toMatchObject({ formatVersion: 1, generation: 2, count: 2, dimension: 2 });
    expect(store.currentGeneration).toBe(2);
  });

  it('continues the generation sequence of an existing snapshot', async () => {
    await store.write([record('r1', vec(1, 0))], INFO);
    const restarted = new SnapshotStore(dir, silentLogger);
    await expect(restarted.write([record('r1', vec(1, 0))], INFO)).resolves.toBe(2);
  });

  it('writes an empty snapshot that reads back with no records', async () => {
    await store.write([], INFO);
    const loaded = await store.read();
    expect(loaded?.records).toEqual([]);
  });

  it('keeps the previous generation live when the manifest swap fails', async () => {
    await store.write([record('r1', vec(1, 0))], INFO);
    await mkdir(join(dir, 'manifest.json.tmp'));

    await expect(store.write([record('r1', vec(1, 0)), record('r2', vec(0, 1))], INFO)).rejects.toThrow(/EISDIR/);
    expect(store.currentGeneration).toBe(1);
    const loaded = await new SnapshotStore(dir, silentLogger).read();
    expect(loaded?.generation).toBe(1);
    expect(loaded?.records.map(r => r.id)).toEqual(['r1']);

    await rm(join(dir, 'manifest.json.tmp'), { recursive: true });
    await expect(store.write([record('r1', vec(1, 0)), record('r2', vec(0, 1))], INFO)).resolves.toBe(2);
    expect((await readdir(dir)).sort()).toEqual(['manifest.json', 'metadata-2.json', 'vectors-2.f32']);
  });

  describe('corruption', () => {
    beforeEach(async () => {
      await store.write([record('r1', vec(1, 0)), record('r2', vec(0, 1))], INFO);
    });

    it('rejects a truncated vector file', async () => {
      await writeFile(join(dir, 'vectors-1.f32'), Buffer.alloc(4));
      const promise = store.read();
      await expect(promise).rejects.toBeInstanceOf(SnapshotLoadError);
      await expect(promise).rejects.toThrow('Vector file vectors-1.f32 has 4 bytes, expected 16');
    });

    it('rejects a manifest that is not JSON', async () => {
      await writeFile(join(dir, 'manifest.json'), '{ nope');
      await expect(store.read()).rejects.toThrow(/^manifest\.json is not valid JSON/);
    });

    it('rejects a missing metadata file', async () => {
      await writeFile(join(dir, 'manifest.json'), (await readFile(join(dir, 'manifest.json'), 'utf-8'))
        .replace('metadata-1.json', 'metadata-9.json'));
      await expect(store.read()).rejects.toThrow(/^Cannot read metadata-9\.json/);
    });

    it('rejects metadata whose record count disagrees with the manifest', async () => {
      const path = join(dir, 'metadata-1.json');
      const metadata: { records: unknown[] } = JSON.parse(await readFile(path, 'utf-8'));
      await writeFile(path, JSON.stringify({ ...metadata, records: metadata.records.slice(0, 1) }));
      await expect(store.read()).rejects.toThrow('Metadata (1 × 2) does not match manifest (2 × 2)');
    });

    it('rejects vectors that are not unit length', async () => {
      await writeFile(join(dir, 'vectors-1.f32'), encodeVectors([record('r1', vec(2, 0)), record('r2', vec(0, 1))], 2));
      await expect(store.read()).rejects.toThrow('Vector for record r1 is not unit-normalized');
    });
  });

  it('encodes vectors as little-endian float32 rows', () => {
    const buf = encodeVectors([record('a', vec(1, 0.5)), record('b', vec(-2, 0))], 2);
    expect(buf.length).toBe(16);
    expect(buf.readFloatLE(4)).toBe(0.5);
    expect(Array.from(decodeVector(buf, 1, 2))).toEqual([-2, 0]);
  });
});
