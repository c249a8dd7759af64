// ReimbursementSystem: explicitly wired service object owning the index,
// conversations and their background timers. No module-level singletons.

import { ConversationManager } from '../conversation/conversation-manager.js';
import { SnapshotStore } from '../db/snapshot-store.js';
import type { EmbeddingProvider } from '../embedding/provider.js';
import { createLlmClient, type LlmClient } from '../llm/client.js';
import { InvoiceVectorIndex } from '../memory/invoice-index.js';
import { BatchAnalyzer, createLlmInvoiceAnalyst, type InvoiceAnalyst } from '../orchestrator/batch-analyzer.js';
import { ChatService } from '../orchestrator/chat-service.js';
import { RetrievalEngine } from '../retrieval/retrieval-engine.js';
import { createEmbeddingProvider, type AppConfig } from '../config/index.js';
import { LlmUnavailableError, errorMessage } from '../errors.js';
import { createLogger, type Logger } from '../utils/logger.js';

export interface SystemOverrides {
  embedder?: EmbeddingProvider;
  /** null forces "no model configured" even when an API key is set */
  llm?: LlmClient | null;
  analyst?: InvoiceAnalyst;
  now?: () => Date;
  /** Logger for system lifecycle lines; components keep their own scopes */
  logger?: Logger;
}

export interface SystemHealth {
  status: 'healthy';
  indexedRecords: number;
  dirty: boolean;
  activeSessions: number;
  totalTurns: number;
  embeddingModel: string;
  llmModel: string | null;
}

const unavailableAnalyst: InvoiceAnalyst = async () => {
  throw new LlmUnavailableError('No language model configured; set ANTHROPIC_API_KEY to analyze invoices');
};

export class ReimbursementSystem {
  readonly config: AppConfig;
  readonly index: InvoiceVectorIndex;
  readonly retrieval: RetrievalEngine;
  readonly conversations: ConversationManager;
  readonly chat: ChatService;
  readonly analyzer: BatchAnalyzer;
  readonly llm: LlmClient | null;
  private log: Logger;
  private timers: NodeJS.Timeout[] = [];

  constructor(config: AppConfig, overrides: SystemOverrides = {}) {
    this.config = config;
    this.log = overrides.logger ?? createLogger('system');
    const embedder = overrides.embedder ?? createEmbeddingProvider(config.embedding);
    this.llm = overrides.llm !== undefined ? overrides.llm : createLlmClient(config.llm);

    this.index = new InvoiceVectorIndex({
      embedder,
      store: new SnapshotStore(config.vectorDbPath),
      persistOnWrite: config.persistOnWrite,
    });
    this.retrieval = new RetrievalEngine({ index: this.index, embedder, maxK: config.retrieval.maxK });
    this.conversations = new ConversationManager({
      maxTurns: config.conversation.maxTurns,
      ttlMs: config.conversation.ttlMs,
      maxSessions: config.conversation.maxSessions,
      now: overrides.now,
    });
    this.chat = new ChatService({
      conversations: this.conversations,
      retrieval: this.retrieval,
      llm: this.llm,
      topK: config.retrieval.topK,
      historyTurns: config.conversation.historyTurns,
    });

    const llm = this.llm;
    const analyst = overrides.analyst
      ?? (llm ? createLlmInvoiceAnalyst(llm) : unavailableAnalyst);
    this.analyzer = new BatchAnalyzer(this.index, analyst, { concurrency: config.analysisConcurrency });
  }

  /** Schedule snapshot and session-eviction timers. Timers never keep the process alive. */
  start(): void {
    if (this.timers.length > 0) return;

    if (this.config.snapshotIntervalMs > 0) {
      this.timers.push(setInterval(() => {
        this.index.persistIfDirty().catch((err: unknown) => {
          this.log('error', 'Scheduled snapshot failed, will retry', { error: errorMessage(err) });
        });
      }, this.config.snapshotIntervalMs));
    }

    if (this.config.conversation.evictionIntervalMs > 0) {
      this.timers.push(setInterval(() => {
        this.conversations.evictExpired();
      }, this.config.conversation.evictionIntervalMs));
    }

    for (const timer of this.timers) timer.unref();
  }

  /** Stop timers and write a final snapshot when there are unsaved changes. */
  async shutdown(): Promise<void> {
    for (const timer of this.timers) clearInterval(timer);
    this.timers = [];
    const wrote = await this.index.persistIfDirty();
    this.log('info', 'Shut down', { finalSnapshot: wrote, records: this.index.count() });
  }

  health(): SystemHealth {
    const sessions = this.conversations.stats();
    return {
      status: 'healthy',
      indexedRecords: this.index.count(),
      dirty: this.index.isDirty,
      activeSessions: sessions.activeSessions,
      totalTurns: sessions.totalTurns,
      embeddingModel: this.index.model,
      llmModel: this.llm?.model ?? null,
    };
  }
}

/**
 * Wire the system and load the newest snapshot.
 *
 * @throws SnapshotLoadError when an existing snapshot is corrupt
 */
export async function createReimbursementSystem(
  config: AppConfig,
  overrides: SystemOverrides = {},
): Promise<ReimbursementSystem> {
  const system = new ReimbursementSystem(config, overrides);
  const loaded = await system.index.load();
  (overrides.logger ?? createLogger('system'))('info', `Vector store initialized with ${loaded} existing analyses`, {
    path: config.vectorDbPath,
  });
  return system;
}
