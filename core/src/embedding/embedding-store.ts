import { CancelledError, isCancelledError, throwIfCancelled } from '../cancellation.js';
import { createProviderError, createRuntimeError, isSubpairError, ProviderErrorCode, RuntimeErrorCode } from '../errors/index.js';
import type { Logger } from '../logger.js';
import { LINE_BREAK_MARKER } from '../tokenization/tokenizer.js';
import type { EmbeddingProvider, LocalProgress } from '../types.js';

export interface EmbeddingStoreOptions {
  provider: EmbeddingProvider;
  batchSize: number;
  signal?: AbortSignal;
  logger?: Partial<Logger>;
}

/**
 * Per-run embedding cache.
 *
 * Every distinct non-empty string is embedded once, in batches, and stored
 * L2-normalized so that similarity is a dot product.
 */
export class EmbeddingStore {
  private readonly provider: EmbeddingProvider;
  private readonly batchSize: number;
  private readonly signal?: AbortSignal;
  private readonly logger: Partial<Logger>;
  private readonly vectors = new Map<string, Float64Array>();
  private dimension: number | null = null;
  private calls = 0;

  constructor(options: EmbeddingStoreOptions) {
    this.provider = options.provider;
    this.batchSize = options.batchSize;
    this.signal = options.signal;
    this.logger = options.logger ?? {};
  }

  get size(): number {
    return this.vectors.size;
  }

  get providerCalls(): number {
    return this.calls;
  }

  has(text: string): boolean {
    return text.length === 0 || this.vectors.has(text);
  }

  /**
   * Embeds the texts not yet cached. Cancellation is checked before each
   * batch; `onProgress` receives the embedded fraction after each batch.
   */
  async ensure(texts: Iterable<string>, onProgress?: LocalProgress): Promise<void> {
    const missing: string[] = [];
    const seen = new Set<string>();
    for (const text of texts) {
      if (text.length === 0 || seen.has(text) || this.vectors.has(text)) {
        continue;
      }
      seen.add(text);
      missing.push(text);
    }
    if (missing.length === 0) {
      return;
    }

    let done = 0;
    for (let offset = 0; offset < missing.length; offset += this.batchSize) {
      throwIfCancelled(this.signal);
      const batch = missing.slice(offset, offset + this.batchSize);
      const vectors = await this.embedBatch(batch);
      batch.forEach((text, index) => {
        const vector = vectors[index];
        if (vector) {
          this.vectors.set(text, normalize(vector));
        }
      });
      done += batch.length;
      this.logger.debug?.('embedding.batch', { size: batch.length, done, total: missing.length });
      onProgress?.(done / missing.length);
    }
  }

  /** Cosine similarity of two ensured texts. Empty text scores 0. */
  similarity(a: string, b: string): number {
    if (a.length === 0 || b.length === 0) {
      return 0;
    }
    const left = this.require(a);
    const right = this.require(b);
    let dot = 0;
    for (let index = 0; index < left.length; index += 1) {
      dot += (left[index] ?? 0) * (right[index] ?? 0);
    }
    return dot;
  }

  /** Normalized vector of an ensured text; undefined for the empty string. */
  vector(text: string): Float64Array | undefined {
    return text.length === 0 ? undefined : this.require(text);
  }

  private require(text: string): Float64Array {
    const vector = this.vectors.get(text);
    if (!vector) {
      throw createRuntimeError(RuntimeErrorCode.STAGE_FAILED, `No embedding was computed for "${text}".`, {
        context: 'embedding-store',
      });
    }
    return vector;
  }

  private async embedBatch(batch: string[]): Promise<number[][]> {
    let result: unknown;
    this.calls += 1;
    try {
      result = await this.provider.embed(batch.map(toEmbeddingInput));
    } catch (error) {
      if (isCancelledError(error) || isSubpairError(error)) {
        throw error;
      }
      // an aborted in-flight request is a cancellation, whatever the provider threw
      if (this.signal?.aborted) {
        throw new CancelledError();
      }
      throw createProviderError(
        ProviderErrorCode.EMBEDDING_CALL_FAILED,
        `Embedding provider failed: ${error instanceof Error ? error.message : String(error)}`,
        { context: `batch of ${batch.length}`, cause: error },
      );
    }
    throwIfCancelled(this.signal);
    return this.validate(result, batch.length);
  }

  private validate(result: unknown, expected: number): number[][] {
    if (!Array.isArray(result) || result.length !== expected) {
      throw createProviderError(
        ProviderErrorCode.EMBEDDING_BATCH_MISMATCH,
        `Embedding provider returned ${Array.isArray(result) ? result.length : 'no'} vectors for a batch of ${expected}.`,
        { suggestion: 'The provider must return exactly one vector per input text.' },
      );
    }
    const vectors: number[][] = [];
    for (const candidate of result) {
      if (!Array.isArray(candidate) || candidate.length === 0) {
        throw createProviderError(
          ProviderErrorCode.EMBEDDING_DIMENSION_MISMATCH,
          'Embedding provider returned an empty or malformed vector.',
        );
      }
      this.dimension ??= candidate.length;
      if (candidate.length !== this.dimension) {
        throw createProviderError(
          ProviderErrorCode.EMBEDDING_DIMENSION_MISMATCH,
          `Embedding dimension changed from ${this.dimension} to ${candidate.length}.`,
        );
      }
      const vector: number[] = [];
      for (const value of candidate) {
        if (typeof value !== 'number' || !Number.isFinite(value)) {
          throw createProviderError(
            ProviderErrorCode.EMBEDDING_INVALID_VALUE,
            `Embedding provider returned a non-finite value: ${String(value)}`,
          );
        }
        vector.push(value);
      }
      vectors.push(vector);
    }
    return vectors;
  }
}

/** Line-break markers reach the provider as plain spaces. */
function toEmbeddingInput(text: string): string {
  return text.replaceAll(LINE_BREAK_MARKER, ' ');
}

export function normalize(values: readonly number[]): Float64Array {
  const vector = Float64Array.from(values);
  let norm = 0;
  for (const value of vector) {
    norm += value * value;
  }
  norm = Math.sqrt(norm);
  if (norm === 0) {
    return vector;
  }
  for (let index = 0; index < vector.length; index += 1) {
    vector[index] = (vector[index] ?? 0) / norm;
  }
  return vector;
}
