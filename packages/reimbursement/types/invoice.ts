// Invoice analysis records: the single schema the vector index stores

export const REIMBURSEMENT_STATUSES = [
  'Fully Reimbursed',
  'Partially Reimbursed',
  'Declined',
] as const;

export type ReimbursementStatus = typeof REIMBURSEMENT_STATUSES[number];

export interface InvoiceRecord {
  readonly id: string;
  readonly employeeName: string;
  readonly invoiceFilename: string;
  readonly reimbursementStatus: ReimbursementStatus;
  readonly reimbursedAmount: number;
  readonly totalAmount: number;
  readonly reasoning: string;
  /** Invoice text plus analysis reasoning; this is what was embedded. */
  readonly rawContent: string;
  /** Unit-normalized, length equals the index dimension. */
  readonly embedding: Float32Array;
  readonly createdAt: Date;
  readonly invoiceDate?: string;      // YYYY-MM-DD
  readonly invoiceNumber?: string;
  readonly expenseCategory?: string;
  readonly policyViolations: readonly string[];
  readonly approvedItems: readonly string[];
  readonly rejectedItems: readonly string[];
}

/** What callers hand to the index; id and createdAt are assigned on write. */
export interface NewInvoiceRecord {
  employeeName: string;
  invoiceFilename: string;
  reimbursementStatus: ReimbursementStatus;
  reimbursedAmount: number;
  totalAmount: number;
  reasoning: string;
  rawContent: string;
  /** Precomputed embedding; normalized on write. Omit to embed rawContent. */
  embedding?: Float32Array;
  invoiceDate?: string;
  invoiceNumber?: string;
  expenseCategory?: string;
  policyViolations?: string[];
  approvedItems?: string[];
  rejectedItems?: string[];
}

/** Structured verdict returned by the analysis collaborator for one invoice. */
export interface InvoiceVerdict {
  reimbursementStatus: ReimbursementStatus;
  reimbursedAmount: number;
  totalAmount: number;
  reasoning: string;
  invoiceDate?: string;
  invoiceNumber?: string;
  expenseCategory?: string;
  policyViolations: string[];
  approvedItems: string[];
  rejectedItems: string[];
}

export interface IndexStatistics {
  totalAnalyses: number;
  employees: string[];
  statusDistribution: Record<ReimbursementStatus, number>;
  totalReimbursed: number;
  averageReimbursement: number;
}
