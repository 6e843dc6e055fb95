import { describe, it, expect, vi } from 'vitest';
import { isCancelledError } from '../cancellation.js';
import { EmbeddingStore } from '../embedding/embedding-store.js';
import { NumericArena } from '../numeric/arena.js';
import { ConceptEmbedder } from '../testing/concept-embedder.js';
import { alignTokens, bandRadiusFor, groupPairingByEntry, type DtwOptions } from './dtw.js';

function setup(overrides: Partial<DtwOptions> = {}): { provider: ConceptEmbedder; options: DtwOptions } {
  const provider = new ConceptEmbedder();
  return {
    provider,
    options: {
      store: new EmbeddingStore({ provider, batchSize: 32 }),
      arena: new NumericArena(),
      maxFullMatrixCells: 4_000_000,
      bandRadius: 64,
      ...overrides,
    },
  };
}

function expectMonotonicPath(path: Array<[number, number]>, rows: number, columns: number): void {
  expect(path[0]).toEqual([0, 0]);
  expect(path[path.length - 1]).toEqual([rows - 1, columns - 1]);
  for (let k = 1; k < path.length; k += 1) {
    const [pi, pj] = path[k - 1] ?? [0, 0];
    const [i, j] = path[k] ?? [0, 0];
    expect(i - pi === 0 || i - pi === 1).toBe(true);
    expect(j - pj === 0 || j - pj === 1).toBe(true);
    expect(i + j).toBeGreaterThan(pi + pj);
  }
}

const LONG_PRIMARY = ['Hello', 'cat', 'world', 'night', 'thanks', 'yes', 'Goodbye', 'dragon', 'cat', 'night'];
const LONG_SECONDARY = ['Bonjour', 'chat', 'monde', 'merci', 'oui', 'au revoir', 'chat', 'nuit'];

describe('alignTokens', () => {
  it('pairs matching tokens along the diagonal', async () => {
    const { options } = setup();
    const result = await alignTokens(['Hello world', 'Goodbye'], ['Bonjour monde', 'Au revoir'], options);
    expect(result.path).toEqual([
      [0, 0],
      [1, 1],
    ]);
    expect(result.pairing).toEqual([[0], [1]]);
    expect(result.cost).toBeCloseTo(0, 10);
    expect(result.banded).toBe(false);
  });

  it('prefers the diagonal when costs tie', async () => {
    const { options } = setup();
    const result = await alignTokens(['Hello world', 'The dragon sleeps', 'Goodbye'], ['Bonjour monde', 'Au revoir'], options);
    expect(result.path).toEqual([
      [0, 0],
      [1, 0],
      [2, 1],
    ]);
    expect(result.pairing).toEqual([[0], [0], [1]]);
    expect(result.cost).toBeCloseTo(1, 10);
  });

  it('produces a monotonic pairing', async () => {
    const { options } = setup();
    const result = await alignTokens(LONG_PRIMARY, LONG_SECONDARY, options);
    expectMonotonicPath(result.path, LONG_PRIMARY.length, LONG_SECONDARY.length);
    const flat = result.pairing.flat();
    for (let k = 1; k < flat.length; k += 1) {
      expect(flat[k] ?? 0).toBeGreaterThanOrEqual(flat[k - 1] ?? 0);
    }
    expect(result.pairing.every((indices) => indices.length > 0)).toBe(true);
  });

  it('matches the full matrix when the band covers it', async () => {
    const full = await alignTokens(LONG_PRIMARY, LONG_SECONDARY, setup().options);
    const banded = await alignTokens(LONG_PRIMARY, LONG_SECONDARY, setup({ maxFullMatrixCells: 1 }).options);
    expect(banded.banded).toBe(true);
    expect(banded.path).toEqual(full.path);
    expect(banded.cost).toBeCloseTo(full.cost, 10);
  });

  it('keeps a narrow band connected', async () => {
    const primary = Array.from({ length: 40 }, (_, i) => (i % 2 === 0 ? 'cat' : 'night'));
    const secondary = Array.from({ length: 25 }, (_, i) => (i % 3 === 0 ? 'chat' : 'nuit'));
    const result = await alignTokens(primary, secondary, setup({ maxFullMatrixCells: 10, bandRadius: 1 }).options);
    expect(result.banded).toBe(true);
    expectMonotonicPath(result.path, 40, 25);
    expect(Number.isFinite(result.cost)).toBe(true);
  });

  it('embeds each distinct token once', async () => {
    const { provider, options } = setup();
    await alignTokens(['cat', 'cat', 'night'], ['chat', 'nuit', 'chat'], options);
    expect(provider.embeddedTexts).toEqual(['cat', 'night', 'chat', 'nuit']);
  });

  it('returns an empty pairing without calling the provider', async () => {
    const { provider, options } = setup();
    const embed = vi.spyOn(provider, 'embed');
    expect(await alignTokens(['a', 'b'], [], options)).toEqual({ path: [], pairing: [[], []], cost: 0, banded: false });
    expect(await alignTokens([], ['a'], options)).toEqual({ path: [], pairing: [], cost: 0, banded: false });
    expect(embed).not.toHaveBeenCalled();
  });

  it('reports progress ending at 1', async () => {
    const onProgress = vi.fn();
    await alignTokens(['cat'], ['chat'], setup({ onProgress }).options);
    const fractions = onProgress.mock.calls.map(([fraction]) => fraction);
    expect(fractions[fractions.length - 1]).toBe(1);
    expect(fractions).toEqual([...fractions].sort((a, b) => a - b));
  });

  it('stops when cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(alignTokens(['cat'], ['chat'], setup({ signal: controller.signal }).options)).rejects.toSatisfy(
      isCancelledError,
    );
  });
});

describe('bandRadiusFor', () => {
  it('widens the band for steep rectangles', () => {
    expect(bandRadiusFor(100, 100, 4)).toBe(4);
    expect(bandRadiusFor(100, 10, 4)).toBe(11);
    expect(bandRadiusFor(10, 100, 64)).toBe(64);
  });
});

describe('groupPairingByEntry', () => {
  it('takes the range of secondary indices per entry', () => {
    expect(
      groupPairingByEntry(
        [[0], [0], [1]],
        [
          { start: 0, end: 1 },
          { start: 1, end: 2 },
          { start: 2, end: 3 },
        ],
      ),
    ).toEqual([
      { start: 0, end: 1 },
      { start: 0, end: 1 },
      { start: 1, end: 2 },
    ]);
  });

  it('places entries without tokens after their predecessor', () => {
    expect(
      groupPairingByEntry(
        [[0, 1], [2]],
        [
          { start: 0, end: 1 },
          { start: 1, end: 1 },
          { start: 1, end: 2 },
        ],
      ),
    ).toEqual([
      { start: 0, end: 2 },
      { start: 2, end: 2 },
      { start: 2, end: 3 },
    ]);
  });
});
