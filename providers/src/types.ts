import type { Logger } from '@subpair/core';

/** `simulated` never touches the network; used for dry runs and tests. */
export type ProviderMode = 'live' | 'simulated';

export type EmbeddingProviderName = 'openai';

export interface SecretResolver {
  getSecret(key: string): Promise<string | null>;
}

export type ProviderLogger = Partial<Logger>;

/** Provider settings, validated against the embedding config schema. */
export interface EmbeddingProviderConfig {
  dimensions?: number;    // requested vector size; simulated default 256
  maxRetries?: number;    // live calls only
  ngramSize?: number;     // simulated only, default 3
}

export interface CreateEmbeddingProviderOptions {
  provider: string;
  model: string;
  mode?: ProviderMode;
  /** Defaults to the environment, after loading .env files */
  secretResolver?: SecretResolver;
  logger?: ProviderLogger;
  /** Raw config from the caller; rejected when it does not match the schema */
  config?: unknown;
  /** Aborts in-flight provider requests */
  signal?: AbortSignal;
}
