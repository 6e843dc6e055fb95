import type { EmbeddingProvider } from '@subpair/core';
import { createProviderError, ProviderErrorCode } from '@subpair/core';
import { DEFAULT_NGRAM_SIZE, DEFAULT_SIMULATED_DIMENSIONS, parseEmbeddingConfig } from './sdk/embedding-config.js';
import { createOpenAiClientManager } from './sdk/openai/client.js';
import { createOpenAiEmbeddingProvider } from './sdk/openai/embedding.js';
import { createSimulatedEmbeddingProvider } from './sdk/simulation.js';
import { createEnvSecretResolver } from './secrets.js';
import type { CreateEmbeddingProviderOptions, EmbeddingProviderName, ProviderMode } from './types.js';

export const EMBEDDING_PROVIDERS: readonly EmbeddingProviderName[] = ['openai'];

function isEmbeddingProviderName(value: string): value is EmbeddingProviderName {
  return EMBEDDING_PROVIDERS.some((name) => name === value);
}

/**
 * Resolves an embedding provider for a provider/model pair.
 *
 * In simulated mode the provider name is still checked, but vectors come
 * from hashed character n-grams and no secret is read.
 */
export function createEmbeddingProvider(options: CreateEmbeddingProviderOptions): EmbeddingProvider {
  const mode: ProviderMode = options.mode ?? 'live';
  const { logger } = options;

  if (!isEmbeddingProviderName(options.provider)) {
    throw createProviderError(
      ProviderErrorCode.UNKNOWN_PROVIDER,
      `No embedding provider registered for "${options.provider}".`,
      { suggestion: `Use one of: ${EMBEDDING_PROVIDERS.join(', ')}.` },
    );
  }
  const config = parseEmbeddingConfig(options.config);
  logger?.debug?.('provider.resolved', { provider: options.provider, model: options.model, mode });

  if (mode === 'simulated') {
    return createSimulatedEmbeddingProvider({
      dimensions: config.dimensions ?? DEFAULT_SIMULATED_DIMENSIONS,
      ngramSize: config.ngramSize ?? DEFAULT_NGRAM_SIZE,
    });
  }

  const secretResolver = options.secretResolver ?? createEnvSecretResolver({ logger });
  return createOpenAiEmbeddingProvider({
    model: options.model,
    clientManager: createOpenAiClientManager(secretResolver, logger),
    config,
    logger,
    signal: options.signal,
  });
}
