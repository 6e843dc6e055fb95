import { describe, it, expect } from 'vitest';
import { DEFAULT_ALIGNER_CONFIG, type ExtendedCutConfig } from '../config/aligner-config.js';
import { EmbeddingStore } from '../embedding/embedding-store.js';
import { NumericArena } from '../numeric/arena.js';
import { ConceptEmbedder } from '../testing/concept-embedder.js';
import { tokenizeEntries } from '../tokenization/tokenizer.js';
import { extractExtendedCut, type ExtendedCutOptions } from './extended-cut.js';
import type { RefinerEntry } from './window-refiner.js';

interface Row {
  text: string;
  secondary: string;
  score: number;
}

function makeEntries(rows: Row[]): RefinerEntry[] {
  return tokenizeEntries(
    rows.map((row, index) => ({ start: index * 1000, end: index * 1000 + 1000, text: row.text, style: 'Main' })),
    true,
  ).map((primary, index) => ({
    primary,
    primaryText: primary.entry.text,
    span: { start: index, end: index },
    secondaryText: rows[index]?.secondary ?? '',
    score: rows[index]?.score ?? 0,
  }));
}

function options(config: Partial<ExtendedCutConfig> = {}): ExtendedCutOptions {
  return {
    config: { ...DEFAULT_ALIGNER_CONFIG.extendedCut, ...config },
    store: new EmbeddingStore({ provider: new ConceptEmbedder(), batchSize: 32 }),
    arena: new NumericArena(),
  };
}

describe('extractExtendedCut', () => {
  it('extracts an entry that has no secondary counterpart', async () => {
    const entries = makeEntries([
      { text: 'Hello world', secondary: 'Bonjour monde', score: 1 },
      { text: 'The dragon sleeps', secondary: '', score: 0 },
      { text: 'Goodbye', secondary: 'Au revoir', score: 1 },
    ]);

    const result = await extractExtendedCut(entries, options());

    expect(result.extended).toEqual([
      {
        start: 1000,
        end: 2000,
        primaryText: 'The dragon sleeps',
        secondaryText: '',
        primaryStyle: 'Main',
        score: 0,
        origin: 'extended',
        sourceIndex: 1,
      },
    ]);
    expect(result.pool.map((entry) => entry.primaryText)).toEqual(['Hello world', 'Goodbye']);
  });

  it('returns the pool unchanged when everything is aligned', async () => {
    const entries = makeEntries([
      { text: 'Hello world', secondary: 'Bonjour monde', score: 1 },
      { text: 'Goodbye', secondary: 'Au revoir', score: 0.9 },
    ]);

    const result = await extractExtendedCut(entries, options());

    expect(result.extended).toEqual([]);
    expect(result.pool).toEqual(entries);
  });

  it('trims borderline entries from the edges of a run', async () => {
    const entries = makeEntries([
      { text: 'Hello world', secondary: 'Bonjour monde', score: 1 },
      { text: 'Hello', secondary: '', score: 0 },
      { text: 'The dragon', secondary: '', score: 0 },
      { text: 'sleeps here', secondary: '', score: 0 },
      { text: 'Goodbye', secondary: 'Au revoir', score: 1 },
    ]);

    const result = await extractExtendedCut(entries, options());

    expect(result.extended.map((field) => field.sourceIndex)).toEqual([2, 3]);
    expect(result.pool.map((entry) => entry.primary.sourceIndex)).toEqual([0, 1, 4]);
  });

  it('drops runs shorter than the minimum length', async () => {
    const entries = makeEntries([
      { text: 'Hello world', secondary: 'Bonjour monde', score: 1 },
      { text: 'Hello', secondary: '', score: 0 },
      { text: 'The dragon', secondary: '', score: 0 },
      { text: 'sleeps here', secondary: '', score: 0 },
      { text: 'Goodbye', secondary: 'Au revoir', score: 1 },
    ]);

    const result = await extractExtendedCut(entries, options({ minRunLength: 3 }));

    expect(result.extended).toEqual([]);
    expect(result.pool).toHaveLength(5);
  });

  it('handles an empty pool', async () => {
    expect(await extractExtendedCut([], options())).toEqual({ pool: [], extended: [] });
  });
});
