/**
 * Dynamic Time Warping over token embeddings.
 *
 * Distance is 1 - cosine similarity. Moves are diagonal, advance-primary
 * and advance-secondary; backtracking breaks ties in that order. Large
 * inputs are restricted to a band around the rectangle diagonal.
 */

import { throwIfCancelled } from '../cancellation.js';
import type { EmbeddingStore } from '../embedding/embedding-store.js';
import type { Logger } from '../logger.js';
import type { NumericArena } from '../numeric/arena.js';
import type { LocalProgress, TokenSpan } from '../types.js';

export interface DtwOptions {
  store: EmbeddingStore;
  arena: NumericArena;
  maxFullMatrixCells: number;
  bandRadius: number;
  signal?: AbortSignal;
  onProgress?: LocalProgress;
  logger?: Partial<Logger>;
}

export interface DtwResult {
  /** (primary, secondary) index pairs from (0, 0) to (N-1, M-1) */
  path: Array<[number, number]>;
  /** Secondary indices aligned to each primary index, ascending */
  pairing: number[][];
  cost: number;
  banded: boolean;
}

/** Share of the stage spent embedding; the rest is the matrix. */
const EMBEDDING_SHARE = 0.6;
const ROWS_PER_CHECK = 128;

/**
 * Column bounds of every row, stored as one flat buffer of row widths.
 * A full matrix is the band with lo = 0 and hi = M - 1.
 */
interface Band {
  lo: Int32Array;
  hi: Int32Array;
  offset: Int32Array;
  cells: number;
  banded: boolean;
}

export function bandRadiusFor(rows: number, columns: number, bandRadius: number): number {
  const slope = Math.max(rows, columns) / Math.max(1, Math.min(rows, columns));
  return Math.max(bandRadius, Math.ceil(slope) + 1);
}

function buildBand(rows: number, columns: number, options: DtwOptions): Band {
  const lo = options.arena.int32('dtw.lo', rows);
  const hi = options.arena.int32('dtw.hi', rows);
  const offset = options.arena.int32('dtw.offset', rows);
  const banded = rows > 1 && columns > 1 && rows * columns > options.maxFullMatrixCells;
  const radius = bandRadiusFor(rows, columns, options.bandRadius);

  let cells = 0;
  for (let i = 0; i < rows; i += 1) {
    if (banded) {
      const center = Math.round((i * (columns - 1)) / (rows - 1));
      lo[i] = Math.max(0, center - radius);
      hi[i] = Math.min(columns - 1, center + radius);
    } else {
      lo[i] = 0;
      hi[i] = columns - 1;
    }
    offset[i] = cells;
    cells += (hi[i] ?? 0) - (lo[i] ?? 0) + 1;
  }
  return { lo, hi, offset, cells, banded };
}

function dot(a: Float64Array | undefined, b: Float64Array | undefined): number {
  if (!a || !b) {
    return 0;
  }
  let sum = 0;
  for (let index = 0; index < a.length; index += 1) {
    sum += (a[index] ?? 0) * (b[index] ?? 0);
  }
  return sum;
}

export async function alignTokens(
  primary: readonly string[],
  secondary: readonly string[],
  options: DtwOptions,
): Promise<DtwResult> {
  const rows = primary.length;
  const columns = secondary.length;
  if (rows === 0 || columns === 0) {
    return { path: [], pairing: primary.map(() => []), cost: 0, banded: false };
  }

  await options.store.ensure([...primary, ...secondary], (fraction) =>
    options.onProgress?.(fraction * EMBEDDING_SHARE),
  );

  const primaryVectors = primary.map((text) => options.store.vector(text));
  const secondaryVectors = secondary.map((text) => options.store.vector(text));
  const band = buildBand(rows, columns, options);
  const acc = options.arena.float64('dtw.acc', band.cells);

  const at = (i: number, j: number): number => {
    if (i < 0 || j < 0) {
      return Number.POSITIVE_INFINITY;
    }
    const lo = band.lo[i] ?? 0;
    const hi = band.hi[i] ?? -1;
    if (j < lo || j > hi) {
      return Number.POSITIVE_INFINITY;
    }
    return acc[(band.offset[i] ?? 0) + j - lo] ?? Number.POSITIVE_INFINITY;
  };

  options.logger?.debug?.('dtw.start', { rows, columns, cells: band.cells, banded: band.banded });

  for (let i = 0; i < rows; i += 1) {
    if (i % ROWS_PER_CHECK === 0) {
      throwIfCancelled(options.signal);
      options.onProgress?.(EMBEDDING_SHARE + (1 - EMBEDDING_SHARE) * (i / rows));
    }
    const lo = band.lo[i] ?? 0;
    const hi = band.hi[i] ?? -1;
    const rowOffset = band.offset[i] ?? 0;
    for (let j = lo; j <= hi; j += 1) {
      const distance = 1 - dot(primaryVectors[i], secondaryVectors[j]);
      const best = i === 0 && j === 0 ? 0 : Math.min(at(i - 1, j - 1), at(i - 1, j), at(i, j - 1));
      acc[rowOffset + j - lo] = distance + best;
    }
  }

  const path = backtrack(rows, columns, at);
  const pairing: number[][] = primary.map(() => []);
  for (const [i, j] of path) {
    pairing[i]?.push(j);
  }
  options.onProgress?.(1);

  return { path, pairing, cost: at(rows - 1, columns - 1), banded: band.banded };
}

function backtrack(rows: number, columns: number, at: (i: number, j: number) => number): Array<[number, number]> {
  const path: Array<[number, number]> = [];
  let i = rows - 1;
  let j = columns - 1;
  path.push([i, j]);
  while (i > 0 || j > 0) {
    // diagonal first, then advance-primary, then advance-secondary
    let nextI = i - 1;
    let nextJ = j - 1;
    let best = at(nextI, nextJ);
    const up = at(i - 1, j);
    if (up < best) {
      best = up;
      nextI = i - 1;
      nextJ = j;
    }
    const left = at(i, j - 1);
    if (left < best) {
      nextI = i;
      nextJ = j - 1;
    }
    i = nextI;
    j = nextJ;
    path.push([i, j]);
  }
  return path.reverse();
}

/**
 * Secondary span per primary entry: the range covering every secondary
 * token aligned to any of the entry's tokens. An entry with no aligned
 * token gets an empty span where the previous entry ended.
 */
export function groupPairingByEntry(pairing: readonly number[][], primarySpans: readonly TokenSpan[]): TokenSpan[] {
  const spans: TokenSpan[] = [];
  let previousEnd = 0;
  for (const span of primarySpans) {
    let min = Number.POSITIVE_INFINITY;
    let max = Number.NEGATIVE_INFINITY;
    for (let i = span.start; i < span.end; i += 1) {
      for (const j of pairing[i] ?? []) {
        min = Math.min(min, j);
        max = Math.max(max, j);
      }
    }
    if (min === Number.POSITIVE_INFINITY) {
      spans.push({ start: previousEnd, end: previousEnd });
      continue;
    }
    spans.push({ start: min, end: max + 1 });
    previousEnd = max + 1;
  }
  return spans;
}
