import { z } from "zod";
import { REIMBURSEMENT_STATUSES, type RetrievalFilters } from "../../../reimbursement/index.js";

export const ReimbursementStatusSchema = z
  .enum(REIMBURSEMENT_STATUSES)
  .describe("Reimbursement status category");

export const RetrievalFiltersSchema = z
  .object({
    employee_name: z
      .string()
      .min(1)
      .optional()
      .describe("Exact employee name (case-insensitive)"),
    reimbursement_status: z
      .union([ReimbursementStatusSchema, z.array(ReimbursementStatusSchema).min(1)])
      .optional()
      .describe("One status or a list of statuses to include"),
    date_range: z
      .object({
        from: z.string().optional().describe("Inclusive lower bound, ISO 8601 (YYYY-MM-DD)"),
        to: z.string().optional().describe("Inclusive upper bound, ISO 8601 (YYYY-MM-DD)"),
      })
      .strict()
      .optional()
      .describe("Invoice date range; falls back to analysis time when the invoice date is unknown"),
  })
  .strict()
  .describe("Metadata filters applied before ranking");

export const SearchInvoicesSchema = z.object({
  query: z.string().min(1).describe("Natural-language search text"),
  top_k: z.coerce.number().int().min(1).max(50).default(5).describe("Number of results"),
  filters: RetrievalFiltersSchema.optional(),
});

export const ChatInvoicesSchema = z.object({
  query: z.string().min(1).describe("Question about analyzed invoices"),
  session_id: z
    .string()
    .optional()
    .describe("Conversation id from a previous reply; omit to start a new conversation"),
  filters: RetrievalFiltersSchema.optional(),
});

export const ResetConversationSchema = z.object({
  session_id: z.string().min(1).describe("Conversation id to clear"),
});

export const InvoiceStatisticsSchema = z.object({});

export const AnalyzeInvoiceSchema = z.object({
  employee_name: z.string().min(1).describe("Employee who submitted the invoice"),
  policy_text: z.string().min(1).describe("Company reimbursement policy text"),
  invoice_filename: z.string().min(1).describe("Invoice file name, used for citations"),
  invoice_text: z.string().min(1).describe("Extracted invoice text"),
});

export type WireFilters = z.infer<typeof RetrievalFiltersSchema>;

/** snake_case wire filters → core filter shape */
export function toRetrievalFilters(wire: WireFilters | undefined): RetrievalFilters | undefined {
  if (!wire) return undefined;
  const filters: RetrievalFilters = {};
  if (wire.employee_name !== undefined) filters.employeeName = wire.employee_name;
  if (wire.reimbursement_status !== undefined) filters.reimbursementStatus = wire.reimbursement_status;
  if (wire.date_range !== undefined) filters.dateRange = { ...wire.date_range };
  return filters;
}
