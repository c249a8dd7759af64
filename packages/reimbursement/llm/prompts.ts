// Prompt templates for invoice analysis and grounded chat

import type { ConversationTurn } from '../types/conversation.js';

export interface AnalysisPromptInput {
  policyText: string;
  employeeName: string;
  invoiceFilename: string;
  invoiceText: string;
}

export function buildAnalysisPrompt(input: AnalysisPromptInput): string {
  return `You are an expert financial analyst reviewing employee expense reimbursements against company policy.

**COMPANY REIMBURSEMENT POLICY:**
${input.policyText.trim()}

**EMPLOYEE INVOICE TO ANALYZE:**
Employee Name: ${input.employeeName}
Invoice File: ${input.invoiceFilename}
Invoice Content:
${input.invoiceText.trim()}

**RESPONSE FORMAT (JSON only):**
{
  "reimbursement_status": "Fully Reimbursed" | "Partially Reimbursed" | "Declined",
  "reimbursement_amount": <number or null>,
  "total_invoice_amount": <number or null>,
  "reason": "<detailed explanation citing the policy>",
  "policy_violations": ["<violation>"],
  "approved_items": ["<approved expense item>"],
  "rejected_items": ["<rejected expense item>"],
  "invoice_date": "<YYYY-MM-DD or null>",
  "invoice_number": "<invoice number or null>",
  "expense_category": "<travel | meal | cab | accommodation | other>"
}

Rules:
1. Cite the specific policy sections that apply.
2. Compute the exact reimbursable amount from the policy limits.
3. List every expense item as approved or rejected.
4. Respond with a single valid JSON object and nothing else.`;
}

export interface ChatPromptInput {
  queryText: string;
  history: readonly ConversationTurn[];
  groundingText: string;
}

export function buildChatPrompt(input: ChatPromptInput): string {
  const sections = [
    'You are the assistant of an invoice reimbursement system. Answer questions about analyzed invoices using only the analyses provided below.',
  ];

  if (input.history.length > 0) {
    sections.push([
      '**CONVERSATION HISTORY:**',
      ...input.history.map(turn => `- ${turn.role}: ${turn.text}`),
    ].join('\n'));
  }

  sections.push(input.groundingText);
  sections.push(`**USER QUERY:** ${input.queryText}`);
  sections.push(`**INSTRUCTIONS:**
1. Base the answer on the invoice analyses above; say so plainly when they do not cover the question.
2. Cite employee names, invoice files, statuses and amounts from the analyses.
3. Format the answer in markdown, using tables for comparisons and summaries.`);

  return sections.join('\n\n');
}
