// Grounding text and caller-facing citations built from retrieval hits

import type { SearchHit, SourceCitation } from '../types/retrieval.js';

function formatAmount(value: number): string {
  return `$${value.toFixed(2)}`;
}

/**
 * Markdown block listing each hit with the fields the answer should cite.
 * Returns an empty string when there are no hits.
 */
export function formatGroundingContext(hits: readonly SearchHit[]): string {
  if (hits.length === 0) return '';

  const lines = ['**RELEVANT INVOICE ANALYSES:**', ''];
  hits.forEach(({ record, score }, i) => {
    lines.push(`**Invoice ${i + 1}:** ${record.invoiceFilename} (similarity ${score.toFixed(3)})`);
    lines.push(`- Employee: ${record.employeeName}`);
    lines.push(`- Status: ${record.reimbursementStatus}`);
    lines.push(`- Amount: ${formatAmount(record.reimbursedAmount)} of ${formatAmount(record.totalAmount)}`);
    lines.push(`- Date: ${record.invoiceDate ?? 'N/A'}`);
    if (record.expenseCategory) lines.push(`- Category: ${record.expenseCategory}`);
    if (record.policyViolations.length > 0) {
      lines.push(`- Policy violations: ${record.policyViolations.join('; ')}`);
    }
    lines.push(`- Reason: ${record.reasoning}`);
    lines.push('');
  });
  return lines.join('\n').trimEnd();
}

export function toSourceCitations(hits: readonly SearchHit[], limit = hits.length): SourceCitation[] {
  return hits.slice(0, limit).map(({ record, score }) => ({
    employeeName: record.employeeName,
    invoiceFilename: record.invoiceFilename,
    reimbursementStatus: record.reimbursementStatus,
    similarityScore: Number(score.toFixed(4)),
  }));
}
