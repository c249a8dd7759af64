import { beforeEach, describe, it, expect } from 'vitest';
import { InvoiceVectorIndex } from '../memory/invoice-index.js';
import {
  BatchAnalyzer,
  composeRawContent,
  createLlmInvoiceAnalyst,
  type AnalysisProgress,
  type InvoiceAnalyst,
} from '../orchestrator/batch-analyzer.js';
import type { InvoiceVerdict } from '../types/invoice.js';
import { silentLogger } from '../utils/logger.js';
import { KeywordEmbedder, ScriptedLlm, VOCABULARY } from './helpers.js';

function verdict(overrides: Partial<InvoiceVerdict> = {}): InvoiceVerdict {
  return {
    reimbursementStatus: 'Fully Reimbursed',
    reimbursedAmount: 50,
    totalAmount: 50,
    reasoning: 'Within the meal limit',
    policyViolations: [],
    approvedItems: ['Lunch'],
    rejectedItems: [],
    ...overrides,
  };
}

describe('composeRawContent', () => {
  it('lays out the verdict and the start of the invoice text', () => {
    const text = composeRawContent(
      'Alice',
      { filename: 'lunch.pdf', text: `  Lunch receipt ${'y'.repeat(600)}` },
      verdict({ expenseCategory: 'meal', invoiceDate: '2024-03-14' }),
    );
    const lines = text.split('\n');
    expect(lines.slice(0, 5)).toEqual([
      'Employee: Alice',
      'Invoice: lunch.pdf',
      'Status: Fully Reimbursed',
      'Amount: 50 of 50',
      'Reason: Within the meal limit',
    ]);
    expect(lines[5]).toBe(`Invoice Content: ${`Lunch receipt ${'y'.repeat(600)}`.slice(0, 500)}`);
    expect(lines.slice(6)).toEqual(['Category: meal', 'Date: 2024-03-14']);
  });
});

describe('createLlmInvoiceAnalyst', () => {
  it('prompts with the policy and parses the reply', async () => {
    const llm = new ScriptedLlm(() => '{"reimbursement_status":"Declined","total_invoice_amount":30,"reason":"Alcohol"}');
    const analyst = createLlmInvoiceAnalyst(llm);
    const result = await analyst({
      policyText: 'Alcohol is never reimbursed.',
      employeeName: 'Bob',
      invoiceFilename: 'bar.pdf',
      invoiceText: 'Two beers',
    });
    expect(result.reimbursementStatus).toBe('Declined');
    expect(result.totalAmount).toBe(30);
    expect(result.reasoning).toBe('Alcohol');
    expect(llm.prompts[0]).toContain('**COMPANY REIMBURSEMENT POLICY:**\nAlcohol is never reimbursed.');
    expect(llm.prompts[0]).toContain('Employee Name: Bob\nInvoice File: bar.pdf');
  });
});

describe('BatchAnalyzer', () => {
  let index: InvoiceVectorIndex;

  beforeEach(() => {
    index = new InvoiceVectorIndex({ embedder: new KeywordEmbedder(VOCABULARY), logger: silentLogger });
  });

  it('indexes every analyzed invoice and keeps input order', async () => {
    const analyst: InvoiceAnalyst = async ({ invoiceFilename }) => {
      await new Promise(resolve => setTimeout(resolve, invoiceFilename === 'a.pdf' ? 15 : 1));
      return verdict({ reasoning: `Checked ${invoiceFilename}` });
    };
    const analyzer = new BatchAnalyzer(index, analyst, { logger: silentLogger });
    const result = await analyzer.analyze('Alice', 'policy', [
      { filename: 'a.pdf', text: 'lunch' },
      { filename: 'b.pdf', text: 'taxi' },
    ]);

    expect(result.invoices.map(o => o.invoiceFilename)).toEqual(['a.pdf', 'b.pdf']);
    expect(result.processed).toBe(2);
    expect(result.failed).toBe(0);
    expect(index.count()).toBe(2);

    const stored = index.get(result.invoices[0].recordId ?? '');
    expect(stored?.employeeName).toBe('Alice');
    expect(stored?.reasoning).toBe('Checked a.pdf');
    expect(stored?.approvedItems).toEqual(['Lunch']);
  });

  it('keeps going after failures and names the failed phase', async () => {
    const analyst: InvoiceAnalyst = async ({ invoiceFilename }) => {
      if (invoiceFilename === 'broken.pdf') throw new Error('timeout');
      if (invoiceFilename === 'odd.pdf') return verdict({ reimbursedAmount: 200, totalAmount: 100 });
      return verdict();
    };
    const analyzer = new BatchAnalyzer(index, analyst, { logger: silentLogger });
    const result = await analyzer.analyze('Alice', 'policy', [
      { filename: 'broken.pdf', text: 'meal' },
      { filename: 'odd.pdf', text: 'meal' },
      { filename: 'fine.pdf', text: 'meal' },
    ]);

    expect(result.processed).toBe(1);
    expect(result.failed).toBe(2);
    expect(result.invoices[0]).toMatchObject({ failedPhase: 'analysis', error: 'timeout' });
    expect(result.invoices[0].verdict).toBeUndefined();
    expect(result.invoices[1]).toMatchObject({
      failedPhase: 'indexing',
      error: 'Invalid invoice record: reimbursedAmount: reimbursedAmount must not exceed totalAmount',
    });
    expect(result.invoices[2].recordId).toBeDefined();
    expect(index.count()).toBe(1);
  });

  it('never runs more analyses at once than the concurrency limit', async () => {
    let inFlight = 0;
    let peak = 0;
    const analyst: InvoiceAnalyst = async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise(resolve => setTimeout(resolve, 5));
      inFlight--;
      return verdict();
    };
    const analyzer = new BatchAnalyzer(index, analyst, { logger: silentLogger });
    const invoices = Array.from({ length: 5 }, (_, i) => ({ filename: `${i}.pdf`, text: 'hotel' }));
    await analyzer.analyze('Alice', 'policy', invoices, { concurrency: 2 });
    expect(peak).toBe(2);
  });

  it('reports progress twice per invoice', async () => {
    const events: AnalysisProgress[] = [];
    const analyzer = new BatchAnalyzer(index, async () => verdict(), { concurrency: 1, logger: silentLogger });
    await analyzer.analyze('Alice', 'policy', [{ filename: 'a.pdf', text: 'cab' }], {
      onProgress: event => events.push(event),
    });
    expect(events).toEqual([
      { completed: 0, total: 1, current: 'a.pdf', status: 'running' },
      { completed: 1, total: 1, current: 'a.pdf', status: 'completed', error: undefined },
    ]);
  });

  it('writes a markdown summary of results and failures', async () => {
    const analyst: InvoiceAnalyst = async ({ invoiceFilename }) => {
      if (invoiceFilename === 'b.pdf') throw new Error('timeout');
      return verdict();
    };
    const analyzer = new BatchAnalyzer(index, analyst, { logger: silentLogger });
    const result = await analyzer.analyze('Alice', 'policy', [
      { filename: 'a.pdf', text: 'lunch' },
      { filename: 'b.pdf', text: 'lunch' },
    ]);

    expect(result.summary).toBe([
      '## Invoice Analysis',
      '',
      '**Employee:** Alice',
      '**Invoices analyzed:** 1/2',
      '',
      '### Results Summary',
      '',
      '| Invoice | Status | Reimbursed | Total |',
      '|---------|--------|------------|-------|',
      '| a.pdf | Fully Reimbursed | 50.00 | 50.00 |',
      '',
      '**Reimbursed:** 50.00 of 50.00 claimed',
      '**Status counts:** Fully Reimbursed: 1, Partially Reimbursed: 0, Declined: 0',
      '',
      '### Failed Analyses',
      '',
      '- **b.pdf** (analysis): timeout',
      '',
    ].join('\n'));
  });

  it('summarizes an empty batch', async () => {
    const analyzer = new BatchAnalyzer(index, async () => verdict(), { logger: silentLogger });
    const result = await analyzer.analyze('Alice', 'policy', []);
    expect(result.summary).toBe('## Invoice Analysis\n\nNo invoices were submitted.');
    expect(result.processed).toBe(0);
  });
});
