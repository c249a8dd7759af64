// Invoice reimbursement core
// Vector index, filtered retrieval and conversational context for analyzed invoices

export { InvoiceVectorIndex } from './memory/invoice-index.js';
export type { InvoiceIndexOptions } from './memory/invoice-index.js';
export { FlatInnerProductIndex } from './memory/flat-index.js';
export { SnapshotStore, SNAPSHOT_FORMAT_VERSION } from './db/snapshot-store.js';
export type { LoadedSnapshot, SnapshotManifest } from './db/snapshot-store.js';

export { HashingEmbeddingProvider, OpenAIEmbeddingProvider } from './embedding/provider.js';
export type { EmbeddingProvider } from './embedding/provider.js';
export { computeNormalizedEmbedding, normalizeL2, isUnitNorm } from './embedding/embedding-guard.js';

export { RetrievalEngine } from './retrieval/retrieval-engine.js';
export { parseRetrievalFilters, buildPredicate } from './retrieval/filters.js';
export { formatGroundingContext, toSourceCitations } from './retrieval/grounding.js';

export { ConversationManager } from './conversation/conversation-manager.js';
export type { ConversationManagerOptions } from './conversation/conversation-manager.js';

export { AnthropicLlmClient, createLlmClient } from './llm/client.js';
export type { LlmClient, LlmConfig } from './llm/client.js';
export { buildAnalysisPrompt, buildChatPrompt } from './llm/prompts.js';
export { parseInvoiceVerdict } from './llm/verdict.js';

export { BatchAnalyzer, createLlmInvoiceAnalyst, composeRawContent } from './orchestrator/batch-analyzer.js';
export type { InvoiceAnalyst, InvoiceDocument, AnalysisBatchResult, InvoiceOutcome } from './orchestrator/batch-analyzer.js';
export { ChatService, NO_MATCHES_RESPONSE } from './orchestrator/chat-service.js';
export type { ChatRequest } from './orchestrator/chat-service.js';

// Service object: wires everything from AppConfig
export { ReimbursementSystem, createReimbursementSystem } from './service/reimbursement-system.js';
export type { SystemOverrides, SystemHealth } from './service/reimbursement-system.js';
export { configFromEnv, createEmbeddingProvider, ConfigError } from './config/index.js';
export type { AppConfig, EmbeddingBackend } from './config/index.js';

export * from './errors.js';
export { createLogger, silentLogger } from './utils/logger.js';
export type { Logger, LogLevel } from './utils/logger.js';
export * from './types/index.js';
