export { createEmbeddingProvider, EMBEDDING_PROVIDERS } from './registry.js';
export { createEnvSecretResolver, type EnvSecretResolverOptions } from './secrets.js';
export {
  DEFAULT_NGRAM_SIZE,
  DEFAULT_SIMULATED_DIMENSIONS,
  EMBEDDING_CONFIG_SCHEMA,
  parseEmbeddingConfig,
} from './sdk/embedding-config.js';
export { createPayloadValidator } from './sdk/schema-validator.js';
export { createSimulatedEmbeddingProvider, simulateEmbeddings, type SimulatedEmbeddingOptions } from './sdk/simulation.js';
export { createOpenAiClientManager, type OpenAiClientManager } from './sdk/openai/client.js';
export { createOpenAiEmbeddingProvider, type OpenAiEmbeddingInit } from './sdk/openai/embedding.js';
export type {
  CreateEmbeddingProviderOptions,
  EmbeddingProviderConfig,
  EmbeddingProviderName,
  ProviderLogger,
  ProviderMode,
  SecretResolver,
} from './types.js';
