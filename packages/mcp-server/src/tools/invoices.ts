import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ReimbursementSystem, SearchHit, SourceCitation } from "../../../reimbursement/index.js";
import {
  SearchInvoicesSchema,
  ChatInvoicesSchema,
  ResetConversationSchema,
  InvoiceStatisticsSchema,
  AnalyzeInvoiceSchema,
  toRetrievalFilters,
} from "../schemas/invoices.js";
import { wrapResponse, wrapError, type ToolResponse } from "../formatters/response.js";

function hitToWire({ record, score }: SearchHit) {
  return {
    id: record.id,
    employee_name: record.employeeName,
    invoice_filename: record.invoiceFilename,
    reimbursement_status: record.reimbursementStatus,
    reimbursed_amount: record.reimbursedAmount,
    total_amount: record.totalAmount,
    invoice_date: record.invoiceDate ?? null,
    expense_category: record.expenseCategory ?? null,
    reason: record.reasoning,
    similarity_score: Number(score.toFixed(4)),
  };
}

function sourceToWire(source: SourceCitation) {
  return {
    employee_name: source.employeeName,
    invoice_filename: source.invoiceFilename,
    reimbursement_status: source.reimbursementStatus,
    similarity_score: source.similarityScore,
  };
}

/**
 * Tool handlers over one ReimbursementSystem. Each takes raw params,
 * validates them, and never throws: failures come back as isError results.
 */
export function createInvoiceToolHandlers(system: ReimbursementSystem) {
  return {
    async searchInvoices(params: unknown): Promise<ToolResponse> {
      try {
        const { query, top_k, filters } = SearchInvoicesSchema.parse(params);
        const hits = await system.retrieval.retrieve(query, top_k, toRetrievalFilters(filters));
        return wrapResponse({ count: hits.length, results: hits.map(hitToWire) });
      } catch (err) {
        return wrapError(err);
      }
    },

    async chatInvoices(params: unknown): Promise<ToolResponse> {
      try {
        const { query, session_id, filters } = ChatInvoicesSchema.parse(params);
        const reply = await system.chat.chat({
          queryText: query,
          sessionId: session_id,
          filters: toRetrievalFilters(filters),
        });
        return wrapResponse({
          response: reply.response,
          session_id: reply.sessionId,
          sources: reply.sources.map(sourceToWire),
        });
      } catch (err) {
        return wrapError(err);
      }
    },

    async resetConversation(params: unknown): Promise<ToolResponse> {
      try {
        const { session_id } = ResetConversationSchema.parse(params);
        const cleared = system.conversations.resetSession(session_id);
        return wrapResponse({ session_id, cleared });
      } catch (err) {
        return wrapError(err);
      }
    },

    async invoiceStatistics(params: unknown): Promise<ToolResponse> {
      try {
        InvoiceStatisticsSchema.parse(params ?? {});
        const stats = system.index.statistics();
        const sessions = system.conversations.stats();
        return wrapResponse({
          total_analyses: stats.totalAnalyses,
          employees: stats.employees,
          status_distribution: stats.statusDistribution,
          total_reimbursed: stats.totalReimbursed,
          average_reimbursement: stats.averageReimbursement,
          active_sessions: sessions.activeSessions,
          total_messages: sessions.totalTurns,
        });
      } catch (err) {
        return wrapError(err);
      }
    },

    async analyzeInvoice(params: unknown): Promise<ToolResponse> {
      try {
        const input = AnalyzeInvoiceSchema.parse(params);
        const result = await system.analyzer.analyze(input.employee_name, input.policy_text, [
          { filename: input.invoice_filename, text: input.invoice_text },
        ]);
        const [outcome] = result.invoices;
        if (!outcome || outcome.error || !outcome.verdict) {
          return wrapError(new Error(`Analysis of ${input.invoice_filename} failed: ${outcome?.error ?? "no result"}`));
        }
        return wrapResponse({
          record_id: outcome.recordId ?? null,
          invoice_filename: outcome.invoiceFilename,
          reimbursement_status: outcome.verdict.reimbursementStatus,
          reimbursed_amount: outcome.verdict.reimbursedAmount,
          total_amount: outcome.verdict.totalAmount,
          reason: outcome.verdict.reasoning,
          policy_violations: outcome.verdict.policyViolations,
          invoice_date: outcome.verdict.invoiceDate ?? null,
        });
      } catch (err) {
        return wrapError(err);
      }
    },
  };
}

export function registerInvoiceTools(server: McpServer, system: ReimbursementSystem) {
  const handlers = createInvoiceToolHandlers(system);

  server.tool(
    "search_invoices",
    "Semantic search over analyzed invoices. Returns the top matches by cosine similarity with employee, status, amounts and the analysis reason. Filters (employee_name, reimbursement_status, date_range) are applied before ranking; unknown filter keys are rejected.",
    SearchInvoicesSchema.shape,
    async (params) => handlers.searchInvoices(params)
  );

  server.tool(
    "chat_invoices",
    "Ask a natural-language question about analyzed invoices. Retrieves the most relevant analyses, answers grounded in them, and returns the answer, a session_id to continue the conversation, and the cited sources.",
    ChatInvoicesSchema.shape,
    async (params) => handlers.chatInvoices(params)
  );

  server.tool(
    "reset_conversation",
    "Clear a chat conversation so its history is no longer used.",
    ResetConversationSchema.shape,
    async (params) => handlers.resetConversation(params)
  );

  server.tool(
    "invoice_statistics",
    "Summary statistics of the invoice index: total analyses, employees, status distribution, total and average reimbursement, active chat sessions.",
    InvoiceStatisticsSchema.shape,
    async (params) => handlers.invoiceStatistics(params)
  );

  server.tool(
    "analyze_invoice",
    "Analyze one invoice's text against a reimbursement policy with the language model, store the verdict in the index, and return it. Requires ANTHROPIC_API_KEY on the server.",
    AnalyzeInvoiceSchema.shape,
    async (params) => handlers.analyzeInvoice(params)
  );
}
