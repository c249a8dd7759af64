// Batch invoice analysis
// Runs verdict → index for N invoices with concurrency control and produces
// per-invoice results + a markdown summary. A failed invoice never aborts the batch.

import type { InvoiceVectorIndex } from '../memory/invoice-index.js';
import type { LlmClient } from '../llm/client.js';
import { buildAnalysisPrompt, type AnalysisPromptInput } from '../llm/prompts.js';
import { parseInvoiceVerdict } from '../llm/verdict.js';
import type { InvoiceVerdict, ReimbursementStatus } from '../types/invoice.js';
import { errorMessage } from '../errors.js';
import { createLogger, type Logger } from '../utils/logger.js';

export interface InvoiceDocument {
  filename: string;
  text: string;
}

/** Produces a verdict for one invoice. Throwing marks that invoice failed. */
export type InvoiceAnalyst = (input: AnalysisPromptInput) => Promise<InvoiceVerdict>;

export interface AnalyzeOptions {
  /** Max concurrent analyses (default: 3) */
  concurrency?: number;
  onProgress?: (progress: AnalysisProgress) => void;
}

export interface AnalysisProgress {
  completed: number;
  total: number;
  current: string;
  status: 'running' | 'completed' | 'failed';
  error?: string;
}

export interface InvoiceOutcome {
  invoiceFilename: string;
  /** Set when the record was indexed */
  recordId?: string;
  verdict?: InvoiceVerdict;
  /** Which phase failed, when one did */
  failedPhase?: 'analysis' | 'indexing';
  error?: string;
  durationMs: number;
}

export interface AnalysisBatchResult {
  employeeName: string;
  invoices: InvoiceOutcome[];
  processed: number;
  failed: number;
  summary: string;
  totalDurationMs: number;
}

const MAX_EMBEDDED_INVOICE_CHARS = 500;

/** The text stored and embedded for one analyzed invoice. */
export function composeRawContent(
  employeeName: string,
  invoice: InvoiceDocument,
  verdict: InvoiceVerdict,
): string {
  return [
    `Employee: ${employeeName}`,
    `Invoice: ${invoice.filename}`,
    `Status: ${verdict.reimbursementStatus}`,
    `Amount: ${verdict.reimbursedAmount} of ${verdict.totalAmount}`,
    `Reason: ${verdict.reasoning}`,
    `Invoice Content: ${invoice.text.trim().slice(0, MAX_EMBEDDED_INVOICE_CHARS)}`,
    `Category: ${verdict.expenseCategory ?? ''}`,
    `Date: ${verdict.invoiceDate ?? ''}`,
  ].join('\n');
}

/** Analyst backed by the LLM collaborator; transport errors propagate. */
export function createLlmInvoiceAnalyst(llm: LlmClient): InvoiceAnalyst {
  return async (input) => parseInvoiceVerdict(await llm.complete(buildAnalysisPrompt(input)));
}

export class BatchAnalyzer {
  private index: InvoiceVectorIndex;
  private analyst: InvoiceAnalyst;
  private defaultConcurrency: number;
  private log: Logger;

  constructor(index: InvoiceVectorIndex, analyst: InvoiceAnalyst, options: { concurrency?: number; logger?: Logger } = {}) {
    this.index = index;
    this.analyst = analyst;
    this.defaultConcurrency = options.concurrency ?? 3;
    this.log = options.logger ?? createLogger('analyzer');
  }

  /**
   * Analyze each invoice against the policy, then index the result.
   * Outcomes come back in input order.
   */
  async analyze(
    employeeName: string,
    policyText: string,
    invoices: InvoiceDocument[],
    options: AnalyzeOptions = {},
  ): Promise<AnalysisBatchResult> {
    const concurrency = Math.max(1, Math.floor(options.concurrency ?? this.defaultConcurrency));
    const { onProgress } = options;
    const totalStart = Date.now();
    const outcomes: InvoiceOutcome[] = [];

    this.log('info', `Starting invoice analysis for employee: ${employeeName}`, { invoices: invoices.length });

    // Process in batches respecting concurrency limit
    for (let i = 0; i < invoices.length; i += concurrency) {
      const batch = invoices.slice(i, i + concurrency);

      const batchResults = await Promise.all(batch.map(async (invoice): Promise<InvoiceOutcome> => {
        onProgress?.({
          completed: outcomes.length,
          total: invoices.length,
          current: invoice.filename,
          status: 'running',
        });

        const outcome = await this.analyzeOne(employeeName, policyText, invoice);

        onProgress?.({
          completed: outcomes.length + 1,
          total: invoices.length,
          current: invoice.filename,
          status: outcome.error ? 'failed' : 'completed',
          error: outcome.error,
        });
        return outcome;
      }));

      outcomes.push(...batchResults);
    }

    const failed = outcomes.filter(o => o.error).length;
    this.log('info', `Completed invoice analysis: ${outcomes.length - failed} processed, ${failed} errors`);

    return {
      employeeName,
      invoices: outcomes,
      processed: outcomes.length - failed,
      failed,
      summary: this.buildSummary(employeeName, outcomes),
      totalDurationMs: Date.now() - totalStart,
    };
  }

  private async analyzeOne(employeeName: string, policyText: string, invoice: InvoiceDocument): Promise<InvoiceOutcome> {
    const start = Date.now();

    let verdict: InvoiceVerdict;
    try {
      verdict = await this.analyst({
        policyText,
        employeeName,
        invoiceFilename: invoice.filename,
        invoiceText: invoice.text,
      });
    } catch (err) {
      this.log('error', `Error analyzing invoice ${invoice.filename}`, { error: errorMessage(err) });
      return {
        invoiceFilename: invoice.filename,
        failedPhase: 'analysis',
        error: errorMessage(err),
        durationMs: Date.now() - start,
      };
    }

    try {
      const record = await this.index.add({
        employeeName,
        invoiceFilename: invoice.filename,
        reimbursementStatus: verdict.reimbursementStatus,
        reimbursedAmount: verdict.reimbursedAmount,
        totalAmount: verdict.totalAmount,
        reasoning: verdict.reasoning,
        rawContent: composeRawContent(employeeName, invoice, verdict),
        invoiceDate: verdict.invoiceDate,
        invoiceNumber: verdict.invoiceNumber,
        expenseCategory: verdict.expenseCategory,
        policyViolations: verdict.policyViolations,
        approvedItems: verdict.approvedItems,
        rejectedItems: verdict.rejectedItems,
      });
      return {
        invoiceFilename: invoice.filename,
        recordId: record.id,
        verdict,
        durationMs: Date.now() - start,
      };
    } catch (err) {
      this.log('error', `Error indexing invoice ${invoice.filename}`, { error: errorMessage(err) });
      return {
        invoiceFilename: invoice.filename,
        verdict,
        failedPhase: 'indexing',
        error: errorMessage(err),
        durationMs: Date.now() - start,
      };
    }
  }

  private buildSummary(employeeName: string, outcomes: InvoiceOutcome[]): string {
    const indexed = outcomes.filter(o => !o.error);
    const failed = outcomes.filter(o => o.error);

    if (outcomes.length === 0) {
      return '## Invoice Analysis\n\nNo invoices were submitted.';
    }

    const lines: string[] = [
      '## Invoice Analysis',
      '',
      `**Employee:** ${employeeName}`,
      `**Invoices analyzed:** ${indexed.length}/${outcomes.length}`,
      '',
    ];

    if (indexed.length > 0) {
      const totals: Record<ReimbursementStatus, number> = {
        'Fully Reimbursed': 0,
        'Partially Reimbursed': 0,
        'Declined': 0,
      };
      let reimbursed = 0;
      let claimed = 0;

      lines.push('### Results Summary');
      lines.push('');
      lines.push('| Invoice | Status | Reimbursed | Total |');
      lines.push('|---------|--------|------------|-------|');
      for (const o of indexed) {
        if (!o.verdict) continue;
        totals[o.verdict.reimbursementStatus]++;
        reimbursed += o.verdict.reimbursedAmount;
        claimed += o.verdict.totalAmount;
        lines.push(`| ${o.invoiceFilename} | ${o.verdict.reimbursementStatus} | ${o.verdict.reimbursedAmount.toFixed(2)} | ${o.verdict.totalAmount.toFixed(2)} |`);
      }
      lines.push('');
      lines.push(`**Reimbursed:** ${reimbursed.toFixed(2)} of ${claimed.toFixed(2)} claimed`);
      lines.push(
        `**Status counts:** ${Object.entries(totals).map(([status, n]) => `${status}: ${n}`).join(', ')}`,
      );
      lines.push('');
    }

    if (failed.length > 0) {
      lines.push('### Failed Analyses');
      lines.push('');
      for (const o of failed) {
        lines.push(`- **${o.invoiceFilename}** (${o.failedPhase}): ${o.error}`);
      }
      lines.push('');
    }

    return lines.join('\n');
  }
}
