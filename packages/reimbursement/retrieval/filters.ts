// Retrieval filters: strict validation, then compilation into a record predicate.
// Unknown keys and malformed values are rejected, never dropped.

import { z } from 'zod';
import { InvalidFilterError } from '../errors.js';
import { REIMBURSEMENT_STATUSES, type InvoiceRecord, type ReimbursementStatus } from '../types/invoice.js';
import type { RecordPredicate, RetrievalFilters } from '../types/retrieval.js';

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const END_OF_DAY_MS = 24 * 60 * 60 * 1000 - 1;

const DateBoundSchema = z.union([
  z.date().refine(d => !Number.isNaN(d.getTime()), 'Invalid date'),
  z.string().refine(s => !Number.isNaN(Date.parse(s)), 'Expected an ISO-8601 date'),
]);

export const RetrievalFiltersSchema = z.object({
  employeeName: z.string().trim().min(1, 'employeeName must not be empty').optional(),
  reimbursementStatus: z.union([
    z.enum(REIMBURSEMENT_STATUSES),
    z.array(z.enum(REIMBURSEMENT_STATUSES)).min(1, 'reimbursementStatus list must not be empty'),
  ]).optional(),
  dateRange: z.object({
    from: DateBoundSchema.optional(),
    to: DateBoundSchema.optional(),
  }).strict().optional(),
}).strict();

export interface CompiledFilters {
  employeeName?: string;
  statuses?: ReadonlySet<ReimbursementStatus>;
  fromMs?: number;
  toMs?: number;
}

function boundToMs(value: string | Date, edge: 'from' | 'to'): number {
  if (value instanceof Date) return value.getTime();
  if (DATE_ONLY.test(value)) {
    const startOfDay = Date.parse(`${value}T00:00:00.000Z`);
    return edge === 'to' ? startOfDay + END_OF_DAY_MS : startOfDay;
  }
  return Date.parse(value);
}

/**
 * Validate raw filter input.
 *
 * @throws InvalidFilterError listing every issue found
 */
export function parseRetrievalFilters(input: unknown): RetrievalFilters {
  if (input === undefined || input === null) return {};
  const parsed = RetrievalFiltersSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    });
    throw new InvalidFilterError(`Invalid retrieval filters: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}

export function compileFilters(filters: RetrievalFilters): CompiledFilters {
  const compiled: CompiledFilters = {};
  if (filters.employeeName !== undefined) {
    compiled.employeeName = filters.employeeName.trim().toLowerCase();
  }
  if (filters.reimbursementStatus !== undefined) {
    const list = Array.isArray(filters.reimbursementStatus)
      ? filters.reimbursementStatus
      : [filters.reimbursementStatus];
    compiled.statuses = new Set(list);
  }
  if (filters.dateRange?.from !== undefined) compiled.fromMs = boundToMs(filters.dateRange.from, 'from');
  if (filters.dateRange?.to !== undefined) compiled.toMs = boundToMs(filters.dateRange.to, 'to');

  if (compiled.fromMs !== undefined && compiled.toMs !== undefined && compiled.fromMs > compiled.toMs) {
    const issue = 'dateRange: from must not be after to';
    throw new InvalidFilterError(`Invalid retrieval filters: ${issue}`, [issue]);
  }
  return compiled;
}

/** The date a record is filtered on: its invoice date when known, else when it was analyzed. */
export function recordDateMs(record: InvoiceRecord): number {
  if (record.invoiceDate && DATE_ONLY.test(record.invoiceDate)) {
    return Date.parse(`${record.invoiceDate}T00:00:00.000Z`);
  }
  return record.createdAt.getTime();
}

export function matchesFilters(record: InvoiceRecord, compiled: CompiledFilters): boolean {
  if (compiled.employeeName !== undefined
    && record.employeeName.trim().toLowerCase() !== compiled.employeeName) {
    return false;
  }
  if (compiled.statuses && !compiled.statuses.has(record.reimbursementStatus)) {
    return false;
  }
  if (compiled.fromMs !== undefined || compiled.toMs !== undefined) {
    const at = recordDateMs(record);
    if (compiled.fromMs !== undefined && at < compiled.fromMs) return false;
    if (compiled.toMs !== undefined && at > compiled.toMs) return false;
  }
  return true;
}

/**
 * Validate and compile filters into a predicate for the index.
 * Returns undefined when no filter is set.
 *
 * @throws InvalidFilterError
 */
export function buildPredicate(input: unknown): RecordPredicate | undefined {
  const filters = parseRetrievalFilters(input);
  const compiled = compileFilters(filters);
  if (compiled.employeeName === undefined && !compiled.statuses
    && compiled.fromMs === undefined && compiled.toMs === undefined) {
    return undefined;
  }
  return record => matchesFilters(record, compiled);
}
