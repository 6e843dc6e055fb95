import { createHash } from 'node:crypto';
import type { EmbeddingProvider } from '@subpair/core';

export interface SimulatedEmbeddingOptions {
  dimensions: number;
  ngramSize: number;
}

function gramsOf(text: string, size: number): string[] {
  const padded = ` ${text.toLowerCase()} `;
  const chars = Array.from(padded);
  if (chars.length <= size) {
    return [padded];
  }
  const grams: string[] = [];
  for (let index = 0; index + size <= chars.length; index += 1) {
    grams.push(chars.slice(index, index + size).join(''));
  }
  return grams;
}

/**
 * Signed feature hashing of character n-grams. Identical texts embed
 * identically and texts sharing n-grams point in similar directions.
 */
export function simulateEmbeddings(texts: readonly string[], options: SimulatedEmbeddingOptions): number[][] {
  return texts.map((text) => {
    const vector = new Array<number>(options.dimensions).fill(0);
    for (const gram of gramsOf(text, options.ngramSize)) {
      const digest = createHash('sha256').update(gram).digest();
      const slot = digest.readUInt32BE(0) % options.dimensions;
      const sign = (digest[4] ?? 0) & 1 ? -1 : 1;
      vector[slot] = (vector[slot] ?? 0) + sign;
    }
    return vector;
  });
}

export function createSimulatedEmbeddingProvider(options: SimulatedEmbeddingOptions): EmbeddingProvider {
  return {
    async embed(texts) {
      return simulateEmbeddings(texts, options);
    },
  };
}
