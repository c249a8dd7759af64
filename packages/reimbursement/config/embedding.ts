// Embedding factory: selects the provider from the configured backend
// Supported values: 'hashing' (default, offline), 'openai' (text-embedding-3-small)

import {
  HashingEmbeddingProvider,
  OpenAIEmbeddingProvider,
  type EmbeddingProvider,
} from '../embedding/provider.js';
import { ConfigError, type AppConfig } from './index.js';

export function createEmbeddingProvider(config: AppConfig['embedding']): EmbeddingProvider {
  switch (config.backend) {
    case 'openai':
      if (!config.apiKey) {
        const issue = 'OPENAI_API_KEY: required when EMBEDDING_BACKEND is openai';
        throw new ConfigError(`Invalid configuration: ${issue}`, [issue]);
      }
      return new OpenAIEmbeddingProvider({
        apiKey: config.apiKey,
        model: config.model,
        dimensions: config.dimension,
      });
    case 'hashing':
    default:
      return new HashingEmbeddingProvider(config.dimension);
  }
}
