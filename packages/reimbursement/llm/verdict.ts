// Verdict parsing for the analysis collaborator's free-text reply.
// JSON is preferred; anything else falls back to keyword and amount heuristics.

import { z } from 'zod';
import type { InvoiceVerdict, ReimbursementStatus } from '../types/invoice.js';

const UNDETERMINED_REASON = 'Unable to determine reimbursement status';
const UNPARSED_REASON = 'Unable to parse analysis response';

function toAmount(value: number | string | null | undefined): number | undefined {
  if (value === null || value === undefined) return undefined;
  const n = typeof value === 'number' ? value : Number.parseFloat(value.replace(/[$,\s]/g, ''));
  return Number.isFinite(n) ? n : undefined;
}

function toOptionalText(value: string | number | null | undefined): string | undefined {
  if (value === null || value === undefined) return undefined;
  const text = String(value).trim();
  return text === '' || text.toLowerCase() === 'null' || text.toLowerCase() === 'n/a' ? undefined : text;
}

const AmountSchema = z.union([z.number(), z.string(), z.null()]).optional().catch(undefined).transform(toAmount);
const TextSchema = z.union([z.string(), z.number(), z.null()]).optional().catch(undefined).transform(toOptionalText);
const ListSchema = z.array(z.union([z.string(), z.number()])).nullish().catch(null)
  .transform(list => (list ?? []).map(item => String(item).trim()).filter(item => item !== ''));

const RawVerdictSchema = z.object({
  reimbursement_status: TextSchema,
  reimbursement_amount: AmountSchema,
  total_invoice_amount: AmountSchema,
  reason: TextSchema,
  policy_violations: ListSchema,
  approved_items: ListSchema,
  rejected_items: ListSchema,
  invoice_date: TextSchema,
  invoice_number: TextSchema,
  expense_category: TextSchema,
});

/** Map loose status wording onto one of the three categories, or null. */
export function normalizeStatus(raw: string | undefined): ReimbursementStatus | null {
  if (!raw) return null;
  const s = raw.toLowerCase();
  if (s.includes('partial')) return 'Partially Reimbursed';
  if (s.includes('fully') || s === 'reimbursed' || s === 'approved') return 'Fully Reimbursed';
  if (s.includes('declin') || s.includes('reject') || s.includes('denied')) return 'Declined';
  return null;
}

/** YYYY-MM-DD, or undefined when the value is not a recognizable date. */
export function normalizeInvoiceDate(raw: string | undefined): string | undefined {
  if (!raw) return undefined;
  const iso = /^(\d{4}-\d{2}-\d{2})/.exec(raw);
  if (iso) return Number.isNaN(Date.parse(`${iso[1]}T00:00:00Z`)) ? undefined : iso[1];
  const ms = Date.parse(raw);
  if (Number.isNaN(ms)) return undefined;
  const d = new Date(ms);
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
}

/**
 * Settle amounts so that 0 ≤ reimbursed ≤ total.
 * A missing total takes the reimbursed amount; a missing reimbursed amount
 * follows the status (full total, or nothing). Declined is always 0.
 */
function settleAmounts(
  status: ReimbursementStatus,
  reimbursed: number | undefined,
  total: number | undefined,
): { reimbursedAmount: number; totalAmount: number } {
  const totalAmount = Math.max(0, total ?? reimbursed ?? 0);
  if (status === 'Declined') return { reimbursedAmount: 0, totalAmount };

  const fallback = status === 'Fully Reimbursed' ? totalAmount : 0;
  const reimbursedAmount = Math.min(totalAmount, Math.max(0, reimbursed ?? fallback));
  return { reimbursedAmount, totalAmount };
}

function extractJsonObject(text: string): unknown {
  const match = /\{[\s\S]*\}/.exec(text);
  if (!match) return undefined;
  try {
    return JSON.parse(match[0]);
  } catch {
    return undefined;
  }
}

function fallbackVerdict(text: string): InvoiceVerdict {
  const lower = text.toLowerCase();
  let status: ReimbursementStatus = 'Declined';
  if (lower.includes('fully reimbursed')) status = 'Fully Reimbursed';
  else if (lower.includes('partially reimbursed')) status = 'Partially Reimbursed';

  const amounts = [...text.matchAll(/\$\s?(\d[\d,]*(?:\.\d+)?)/g)].map(m => toAmount(m[1]));
  const trimmed = text.trim();
  const reasoning = trimmed.length > 50
    ? (trimmed.length > 500 ? `${trimmed.slice(0, 500)}...` : trimmed)
    : UNPARSED_REASON;

  return {
    reimbursementStatus: status,
    ...settleAmounts(status, amounts[1], amounts[0]),
    reasoning,
    policyViolations: [],
    approvedItems: [],
    rejectedItems: [],
  };
}

/**
 * Turn the collaborator's reply into a verdict.
 * An unrecognized status becomes Declined; amounts are clamped into range.
 */
export function parseInvoiceVerdict(text: string): InvoiceVerdict {
  const json = extractJsonObject(text);
  const parsed = RawVerdictSchema.safeParse(json);
  if (!parsed.success) return fallbackVerdict(text);

  const raw = parsed.data;
  const status = normalizeStatus(raw.reimbursement_status);
  const reimbursementStatus = status ?? 'Declined';

  return {
    reimbursementStatus,
    ...settleAmounts(reimbursementStatus, raw.reimbursement_amount, raw.total_invoice_amount),
    reasoning: status ? (raw.reason ?? 'Analysis incomplete') : UNDETERMINED_REASON,
    invoiceDate: normalizeInvoiceDate(raw.invoice_date),
    invoiceNumber: raw.invoice_number,
    expenseCategory: raw.expense_category,
    policyViolations: raw.policy_violations,
    approvedItems: raw.approved_items,
    rejectedItems: raw.rejected_items,
  };
}
