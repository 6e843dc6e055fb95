import { embedMany } from 'ai';
import type { EmbeddingProvider } from '@subpair/core';
import type { EmbeddingProviderConfig, ProviderLogger } from '../../types.js';
import type { OpenAiClientManager } from './client.js';

export interface OpenAiEmbeddingInit {
  model: string;
  clientManager: OpenAiClientManager;
  config: EmbeddingProviderConfig;
  logger?: ProviderLogger;
  signal?: AbortSignal;
}

export function createOpenAiEmbeddingProvider(init: OpenAiEmbeddingInit): EmbeddingProvider {
  const { model, clientManager, config, logger } = init;
  return {
    async embed(texts) {
      const client = await clientManager.ensure();
      const { embeddings, usage } = await embedMany({
        model: client.textEmbeddingModel(model),
        values: texts,
        maxRetries: config.maxRetries,
        abortSignal: init.signal,
        providerOptions: config.dimensions ? { openai: { dimensions: config.dimensions } } : undefined,
      });
      logger?.debug?.('provider.openai.embed', { model, texts: texts.length, tokens: usage.tokens });
      return embeddings;
    },
  };
}
