export * from './invoice.js';
export * from './conversation.js';
export * from './retrieval.js';
