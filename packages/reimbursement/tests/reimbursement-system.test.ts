import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { configFromEnv, type AppConfig } from '../config/index.js';
import { createReimbursementSystem, type SystemOverrides } from '../service/reimbursement-system.js';
import type { InvoiceAnalyst } from '../orchestrator/batch-analyzer.js';
import { SnapshotLoadError } from '../errors.js';
import { silentLogger } from '../utils/logger.js';
import { KeywordEmbedder, VOCABULARY, makeTempDir } from './helpers.js';

const analyst: InvoiceAnalyst = async ({ invoiceFilename }) => ({
  reimbursementStatus: 'Partially Reimbursed',
  reimbursedAmount: 40,
  totalAmount: 60,
  reasoning: `Meal cap applied to ${invoiceFilename}`,
  policyViolations: [],
  approvedItems: [],
  rejectedItems: [],
});

describe('ReimbursementSystem', () => {
  let dir: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    ({ dir, cleanup } = await makeTempDir());
  });

  afterEach(async () => {
    await cleanup();
  });

  function config(extra: Record<string, string> = {}): AppConfig {
    return configFromEnv({ VECTOR_DB_PATH: dir, EMBEDDING_BACKEND: 'hashing', ...extra });
  }

  function overrides(extra: SystemOverrides = {}): SystemOverrides {
    return { embedder: new KeywordEmbedder(VOCABULARY), llm: null, logger: silentLogger, ...extra };
  }

  it('starts empty and reports health', async () => {
    const system = await createReimbursementSystem(config(), overrides());
    expect(system.health()).toEqual({
      status: 'healthy',
      indexedRecords: 0,
      dirty: false,
      activeSessions: 0,
      totalTurns: 0,
      embeddingModel: 'keyword-test',
      llmModel: null,
    });
  });

  it('fails analysis cleanly without a language model', async () => {
    const system = await createReimbursementSystem(config(), overrides());
    const result = await system.analyzer.analyze('Alice', 'policy', [{ filename: 'lunch.pdf', text: 'lunch' }]);
    expect(result.invoices[0]).toMatchObject({
      failedPhase: 'analysis',
      error: 'No language model configured; set ANTHROPIC_API_KEY to analyze invoices',
    });
  });

  it('persists analyses across restarts and answers questions about them', async () => {
    const first = await createReimbursementSystem(config(), overrides({ analyst }));
    await first.analyzer.analyze('Alice', 'policy', [{ filename: 'lunch.pdf', text: 'team lunch' }]);
    await first.shutdown();

    const second = await createReimbursementSystem(config(), overrides());
    expect(second.index.count()).toBe(1);

    const reply = await second.chat.chat({ queryText: 'lunch', filters: { employeeName: 'alice' } });
    expect(reply.sources.map(s => s.invoiceFilename)).toEqual(['lunch.pdf']);
    expect(reply.response).toContain('- **Alice**, lunch.pdf: Partially Reimbursed, reimbursed $40.00 of $60.00');
    expect(second.health().activeSessions).toBe(1);
  });

  it('writes a final snapshot on shutdown when writes are deferred', async () => {
    const lazy = await createReimbursementSystem(config({ PERSIST_ON_WRITE: 'false' }), overrides({ analyst }));
    lazy.start();
    await lazy.analyzer.analyze('Bob', 'policy', [{ filename: 'cab.pdf', text: 'cab' }]);
    expect(lazy.health().dirty).toBe(true);
    await lazy.shutdown();
    expect(lazy.health().dirty).toBe(false);

    const reloaded = await createReimbursementSystem(config(), overrides());
    expect(reloaded.index.list().map(r => r.employeeName)).toEqual(['Bob']);
  });

  it('refuses to start on a corrupt snapshot', async () => {
    await writeFile(join(dir, 'manifest.json'), 'not json');
    await expect(createReimbursementSystem(config(), overrides())).rejects.toBeInstanceOf(SnapshotLoadError);
  });
});
