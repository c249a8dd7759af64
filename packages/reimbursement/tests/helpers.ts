// Shared fixtures: a keyword embedder with one axis per vocabulary word,
// so test scores can be worked out by hand.

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { tokenize, type EmbeddingProvider } from '../embedding/provider.js';
import type { CompletionOptions, LlmClient } from '../llm/client.js';
import type { InvoiceRecord, NewInvoiceRecord } from '../types/invoice.js';

export class KeywordEmbedder implements EmbeddingProvider {
  readonly name = 'keyword';
  readonly model = 'keyword-test';
  readonly dimensions: number;
  calls = 0;

  constructor(private readonly vocabulary: readonly string[]) {
    this.dimensions = vocabulary.length;
  }

  async embed(text: string): Promise<Float32Array> {
    this.calls++;
    const vec = new Float32Array(this.dimensions);
    for (const token of tokenize(text)) {
      const i = this.vocabulary.indexOf(token);
      if (i >= 0) vec[i] += 1;
    }
    return vec;
  }
}

/** LLM stand-in that records prompts and answers from a script. */
export class ScriptedLlm implements LlmClient {
  readonly model = 'scripted-test';
  readonly prompts: string[] = [];
  readonly options: CompletionOptions[] = [];

  constructor(private readonly reply: (prompt: string, call: number) => string | Promise<string>) {}

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    this.prompts.push(prompt);
    this.options.push(options);
    return this.reply(prompt, this.prompts.length);
  }
}

export const VOCABULARY = ['travel', 'meal', 'cab', 'hotel', 'expense', 'flight', 'lunch', 'taxi'];

export function vec(...components: number[]): Float32Array {
  return Float32Array.from(components);
}

export function newRecord(overrides: Partial<NewInvoiceRecord> = {}): NewInvoiceRecord {
  return {
    employeeName: 'Alice',
    invoiceFilename: 'invoice-001.pdf',
    reimbursementStatus: 'Declined',
    reimbursedAmount: 0,
    totalAmount: 120,
    reasoning: 'Exceeds the travel limit',
    rawContent: 'travel expense',
    ...overrides,
  };
}

/** A stored record built directly, for code that never touches the index. */
export function makeRecord(overrides: Partial<InvoiceRecord> = {}): InvoiceRecord {
  return {
    id: 'rec-1',
    employeeName: 'Alice',
    invoiceFilename: 'invoice-001.pdf',
    reimbursementStatus: 'Declined',
    reimbursedAmount: 0,
    totalAmount: 120,
    reasoning: 'Exceeds the travel limit',
    rawContent: 'travel expense',
    embedding: vec(1, 0),
    createdAt: new Date('2024-03-20T12:00:00.000Z'),
    policyViolations: [],
    approvedItems: [],
    rejectedItems: [],
    ...overrides,
  };
}

export async function makeTempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(join(tmpdir(), 'reimbursement-test-'));
  return { dir, cleanup: () => rm(dir, { recursive: true, force: true }) };
}
