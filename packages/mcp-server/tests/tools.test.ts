import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { z } from "zod";
import {
  configFromEnv,
  createReimbursementSystem,
  silentLogger,
  type InvoiceAnalyst,
  type ReimbursementSystem,
} from "../../reimbursement/index.js";
import { KeywordEmbedder, VOCABULARY, makeTempDir } from "../../reimbursement/tests/helpers.js";
import { createInvoiceToolHandlers } from "../src/tools/invoices.js";
import type { ToolResponse } from "../src/formatters/response.js";

const analyst: InvoiceAnalyst = async ({ invoiceFilename }) => ({
  reimbursementStatus: invoiceFilename.startsWith("bar") ? "Declined" : "Fully Reimbursed",
  reimbursedAmount: invoiceFilename.startsWith("bar") ? 0 : 45,
  totalAmount: 45,
  reasoning: invoiceFilename.startsWith("bar") ? "Alcohol is excluded" : "Within the meal limit",
  invoiceDate: "2024-02-10",
  policyViolations: invoiceFilename.startsWith("bar") ? ["Alcohol"] : [],
  approvedItems: [],
  rejectedItems: [],
});

function payload(response: ToolResponse): unknown {
  return JSON.parse(response.content[0].text);
}

const SessionPayload = z.object({ session_id: z.string() });

describe("invoice tool handlers", () => {
  let cleanup: () => Promise<void>;
  let system: ReimbursementSystem;
  let handlers: ReturnType<typeof createInvoiceToolHandlers>;

  beforeEach(async () => {
    const temp = await makeTempDir();
    cleanup = temp.cleanup;
    system = await createReimbursementSystem(
      configFromEnv({ VECTOR_DB_PATH: temp.dir }),
      { embedder: new KeywordEmbedder(VOCABULARY), llm: null, analyst, logger: silentLogger },
    );
    handlers = createInvoiceToolHandlers(system);
  });

  afterEach(async () => {
    await system.shutdown();
    await cleanup();
  });

  async function analyze(filename: string, text: string): Promise<ToolResponse> {
    return handlers.analyzeInvoice({
      employee_name: "Alice",
      policy_text: "Meals up to $50. No alcohol.",
      invoice_filename: filename,
      invoice_text: text,
    });
  }

  it("analyzes and indexes an invoice", async () => {
    const response = await analyze("lunch.pdf", "lunch");
    expect(response.isError).toBeUndefined();
    expect(payload(response)).toMatchObject({
      invoice_filename: "lunch.pdf",
      reimbursement_status: "Fully Reimbursed",
      reimbursed_amount: 45,
      total_amount: 45,
      reason: "Within the meal limit",
      policy_violations: [],
      invoice_date: "2024-02-10",
    });
    expect(system.index.count()).toBe(1);
  });

  it("searches with wire filters", async () => {
    await analyze("lunch.pdf", "lunch");
    await analyze("bar.pdf", "lunch");

    const all = payload(await handlers.searchInvoices({ query: "lunch", top_k: "5" }));
    expect(all).toMatchObject({ count: 2 });

    const declined = payload(await handlers.searchInvoices({
      query: "lunch",
      filters: { reimbursement_status: "Declined" },
    }));
    expect(declined).toMatchObject({
      count: 1,
      results: [{ invoice_filename: "bar.pdf", reimbursement_status: "Declined", reimbursed_amount: 0 }],
    });
  });

  it("reports bad filters as errors", async () => {
    await analyze("lunch.pdf", "lunch");
    const unknownKey = await handlers.searchInvoices({ query: "lunch", filters: { department: "Sales" } });
    expect(unknownKey.isError).toBe(true);
    expect(payload(unknownKey)).toMatchObject({ type: "ZodError" });

    const inverted = await handlers.searchInvoices({
      query: "lunch",
      filters: { date_range: { from: "2024-03-01", to: "2024-01-01" } },
    });
    expect(payload(inverted)).toEqual({
      error: "Invalid retrieval filters: dateRange: from must not be after to",
      type: "InvalidFilterError",
    });
  });

  it("continues a chat session and resets it", async () => {
    await analyze("lunch.pdf", "lunch");
    const first = await handlers.chatInvoices({ query: "lunch" });
    const { session_id } = SessionPayload.parse(payload(first));
    expect(payload(first)).toMatchObject({
      sources: [{ employee_name: "Alice", invoice_filename: "lunch.pdf", reimbursement_status: "Fully Reimbursed" }],
    });

    const second = SessionPayload.parse(payload(await handlers.chatInvoices({ query: "lunch again", session_id })));
    expect(second.session_id).toBe(session_id);
    expect(system.conversations.buildContext(session_id, 10)).toHaveLength(4);

    expect(payload(await handlers.resetConversation({ session_id }))).toEqual({ session_id, cleared: true });
    expect(payload(await handlers.resetConversation({ session_id }))).toEqual({ session_id, cleared: false });
  });

  it("summarizes the index", async () => {
    await analyze("lunch.pdf", "lunch");
    await analyze("bar.pdf", "lunch");
    await handlers.chatInvoices({ query: "lunch" });

    expect(payload(await handlers.invoiceStatistics(undefined))).toEqual({
      total_analyses: 2,
      employees: ["Alice"],
      status_distribution: { "Fully Reimbursed": 1, "Partially Reimbursed": 0, "Declined": 1 },
      total_reimbursed: 45,
      average_reimbursement: 45,
      active_sessions: 1,
      total_messages: 2,
    });
  });

  it("reports a failed analysis as an error", async () => {
    const bare = createInvoiceToolHandlers(await createReimbursementSystem(
      configFromEnv({ VECTOR_DB_PATH: system.config.vectorDbPath }),
      { embedder: new KeywordEmbedder(VOCABULARY), llm: null, logger: silentLogger },
    ));
    const response = await bare.analyzeInvoice({
      employee_name: "Alice",
      policy_text: "policy",
      invoice_filename: "taxi.pdf",
      invoice_text: "taxi",
    });
    expect(response.isError).toBe(true);
    expect(payload(response)).toEqual({
      error: "Analysis of taxi.pdf failed: No language model configured; set ANTHROPIC_API_KEY to analyze invoices",
      type: "Error",
    });
  });
});
