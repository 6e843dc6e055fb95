import type { SchemaObject } from 'ajv';
import type { EmbeddingProviderConfig } from '../types.js';
import { createPayloadValidator } from './schema-validator.js';

export const EMBEDDING_CONFIG_SCHEMA: SchemaObject = {
  type: 'object',
  additionalProperties: false,
  properties: {
    dimensions: { type: 'integer', minimum: 1, maximum: 8192 },
    maxRetries: { type: 'integer', minimum: 0, maximum: 10 },
    ngramSize: { type: 'integer', minimum: 1, maximum: 8 },
  },
};

export const DEFAULT_SIMULATED_DIMENSIONS = 256;
export const DEFAULT_NGRAM_SIZE = 3;

const validate = createPayloadValidator<EmbeddingProviderConfig>(EMBEDDING_CONFIG_SCHEMA, 'embedding provider config');

/** Missing config is the empty config. */
export function parseEmbeddingConfig(raw: unknown): EmbeddingProviderConfig {
  return validate(raw ?? {});
}
