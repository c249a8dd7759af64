// Chat service: session + retrieval + LLM → grounded answer with cited sources

import type { ConversationManager } from '../conversation/conversation-manager.js';
import type { LlmClient } from '../llm/client.js';
import { buildChatPrompt } from '../llm/prompts.js';
import { buildPredicate } from '../retrieval/filters.js';
import { formatGroundingContext, toSourceCitations } from '../retrieval/grounding.js';
import type { RetrievalEngine } from '../retrieval/retrieval-engine.js';
import type { ConversationTurn } from '../types/conversation.js';
import type { ChatResponse, SearchHit } from '../types/retrieval.js';
import { errorMessage } from '../errors.js';
import { createLogger, type Logger } from '../utils/logger.js';

export const NO_MATCHES_RESPONSE = 'No matching analyzed invoices were found for this query.';

export interface ChatRequest {
  queryText: string;
  sessionId?: string;
  /** Validated before the session is resolved; unknown keys are rejected. */
  filters?: unknown;
}

export interface ChatServiceOptions {
  conversations: ConversationManager;
  retrieval: RetrievalEngine;
  /** null when no model is configured; answers degrade to a summary of the hits. */
  llm: LlmClient | null;
  /** Records retrieved as grounding. Default 5. */
  topK?: number;
  /** Prior turns included in the prompt. Default 3. */
  historyTurns?: number;
  /** Sources returned to the caller. Default 3. */
  maxSources?: number;
  logger?: Logger;
}

function degradedAnswer(hits: readonly SearchHit[], reason: string): string {
  const lines = [
    `The assistant model is unavailable (${reason}). The most relevant analyzed invoices are:`,
    '',
  ];
  for (const { record, score } of hits) {
    lines.push(
      `- **${record.employeeName}**, ${record.invoiceFilename}: ${record.reimbursementStatus}, `
      + `reimbursed $${record.reimbursedAmount.toFixed(2)} of $${record.totalAmount.toFixed(2)} `
      + `(similarity ${score.toFixed(3)})`,
    );
  }
  return lines.join('\n');
}

export class ChatService {
  private conversations: ConversationManager;
  private retrieval: RetrievalEngine;
  private llm: LlmClient | null;
  private topK: number;
  private historyTurns: number;
  private maxSources: number;
  private log: Logger;

  constructor(options: ChatServiceOptions) {
    this.conversations = options.conversations;
    this.retrieval = options.retrieval;
    this.llm = options.llm;
    this.topK = options.topK ?? 5;
    this.historyTurns = options.historyTurns ?? 3;
    this.maxSources = options.maxSources ?? 3;
    this.log = options.logger ?? createLogger('chat');
  }

  /**
   * Answer a question about analyzed invoices.
   * Filters are validated before the session is touched. A request that
   * fails leaves the conversation history unchanged.
   *
   * @throws InvalidFilterError for unknown keys or malformed filter values
   * @throws EmbeddingFailure when the query cannot be embedded
   */
  async chat(request: ChatRequest): Promise<ChatResponse> {
    const queryText = request.queryText.trim();
    if (queryText === '') {
      throw new RangeError('Query text must not be empty');
    }
    const predicate = buildPredicate(request.filters);
    const sessionId = this.conversations.getOrCreateSession(request.sessionId);

    return this.conversations.withSession(sessionId, async () => {
      const hits = await this.retrieval.retrieveMatching(queryText, this.topK, predicate);
      const history = this.conversations.buildContext(sessionId, this.historyTurns);
      this.conversations.appendTurn(sessionId, 'user', queryText);

      const groundingText = formatGroundingContext(hits);
      const response = await this.answer(queryText, hits, history, groundingText);

      this.conversations.appendTurn(sessionId, 'assistant', response);
      return {
        response,
        sessionId,
        sources: toSourceCitations(hits, this.maxSources),
        groundingText,
      };
    });
  }

  private async answer(
    queryText: string,
    hits: SearchHit[],
    history: readonly ConversationTurn[],
    groundingText: string,
  ): Promise<string> {
    if (hits.length === 0) return NO_MATCHES_RESPONSE;
    if (!this.llm) return degradedAnswer(hits, 'no language model configured');

    try {
      const text = await this.llm.complete(buildChatPrompt({ queryText, history, groundingText }));
      if (text.trim() === '') return degradedAnswer(hits, 'empty model response');
      return text;
    } catch (err) {
      this.log('error', 'Error generating chat response', { error: errorMessage(err) });
      return degradedAnswer(hits, 'model request failed');
    }
  }
}
