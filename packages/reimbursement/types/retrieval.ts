// Retrieval query/result shapes shared by the engine, the chat service and outer surfaces

import type { InvoiceRecord, ReimbursementStatus } from './invoice.js';

export interface DateRangeFilter {
  from?: string | Date;
  to?: string | Date;
}

export interface RetrievalFilters {
  employeeName?: string;
  reimbursementStatus?: ReimbursementStatus | ReimbursementStatus[];
  dateRange?: DateRangeFilter;
}

export type RecordPredicate = (record: InvoiceRecord) => boolean;

export interface SearchHit {
  record: InvoiceRecord;
  score: number;
}

export interface SourceCitation {
  employeeName: string;
  invoiceFilename: string;
  reimbursementStatus: ReimbursementStatus;
  similarityScore: number;
}

export interface ChatResponse {
  response: string;
  sessionId: string;
  sources: SourceCitation[];
  groundingText: string;
}
