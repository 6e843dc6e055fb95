/**
 * Windowed re-scoring of secondary assignments.
 *
 * DTW pairs tokens, so neighbouring primary entries often share secondary
 * material or split one secondary sentence between them. Each pass slides
 * a window of W entries over the track and re-partitions the secondary
 * tokens the window covers into W consecutive runs, maximizing the sum of
 * entry-level similarities. Windows covering more than `maxWindowTokens`
 * tokens are still re-partitioned, but each inner boundary may only move
 * `boundaryRadius` tokens from where it currently is.
 */

import { throwIfCancelled } from '../cancellation.js';
import type { EmbeddingStore } from '../embedding/embedding-store.js';
import type { Logger } from '../logger.js';
import { isEmptySpan, renderTokens, type TokenSequence } from '../tokenization/token-sequence.js';
import type { LocalProgress, TokenSpan, TokenizedEntry } from '../types.js';

export interface RefinerEntry {
  readonly primary: TokenizedEntry;
  readonly primaryText: string;
  span: TokenSpan;
  secondaryText: string;
  score: number;
}

export interface RefineOptions {
  secondary: TokenSequence;
  store: EmbeddingStore;
  window: number;
  maxWindowTokens: number;
  boundaryRadius: number;
  stageNumber: number;
  signal?: AbortSignal;
  onProgress?: LocalProgress;
  logger?: Partial<Logger>;
}

export interface RefineResult {
  entries: RefinerEntry[];
  /** Incremented once per pass */
  stageNumber: number;
}

export async function refineWindows(entries: readonly RefinerEntry[], options: RefineOptions): Promise<RefineResult> {
  const { secondary, store } = options;
  const logger = options.logger ?? {};
  const working = entries.map((entry) => ({ ...entry }));

  assignLeftoverTokens(working, secondary.tokens.length);
  await rescoreEntries(working, secondary, store);

  const windowSize = Math.min(options.window, working.length);
  const anchors = working.length <= options.window ? 1 : working.length - options.window + 1;
  let bounded = 0;

  for (let anchor = 0; anchor < anchors; anchor += 1) {
    throwIfCancelled(options.signal);
    const members = working.slice(anchor, anchor + windowSize);
    const range = coveredRange(members);
    if (range && members.length > 0) {
      const tokens = range.end - range.start;
      const radius = tokens > options.maxWindowTokens ? options.boundaryRadius : tokens;
      if (radius < tokens) {
        bounded += 1;
        logger.debug?.('refiner.window.bounded', { anchor, tokens, radius });
      }
      await repartitionWindow(members, range, radius, options);
    }
    options.onProgress?.((anchor + 1) / anchors);
  }

  resolveOverlaps(working);
  await rescoreEntries(working, secondary, store);

  logger.debug?.('refiner.pass.complete', {
    window: options.window,
    entries: working.length,
    windows: anchors,
    bounded,
    stageNumber: options.stageNumber,
  });
  return { entries: working, stageNumber: options.stageNumber + 1 };
}

/** Re-renders every entry's secondary text and recomputes its score. */
export async function rescoreEntries(
  entries: RefinerEntry[],
  secondary: TokenSequence,
  store: EmbeddingStore,
): Promise<void> {
  for (const entry of entries) {
    entry.secondaryText = renderTokens(secondary, entry.span.start, entry.span.end);
  }
  await store.ensure(entries.flatMap((entry) => [entry.primaryText, entry.secondaryText]));
  for (const entry of entries) {
    entry.score = store.similarity(entry.primaryText, entry.secondaryText);
  }
}

/**
 * Gives every uncovered secondary token to an entry: the first empty entry
 * between the gap's neighbours, else the preceding entry, else the next one.
 */
export function assignLeftoverTokens(entries: RefinerEntry[], tokenCount: number): void {
  if (entries.length === 0) {
    return;
  }
  const covered = new Uint8Array(tokenCount);
  for (const { span } of entries) {
    covered.fill(1, Math.max(0, span.start), Math.min(tokenCount, span.end));
  }

  let index = 0;
  while (index < tokenCount) {
    if (covered[index]) {
      index += 1;
      continue;
    }
    const gapStart = index;
    while (index < tokenCount && !covered[index]) {
      index += 1;
    }
    claimGap(entries, gapStart, index);
  }
}

function claimGap(entries: RefinerEntry[], gapStart: number, gapEnd: number): void {
  let previous = -1;
  let next = entries.length;
  entries.forEach((entry, position) => {
    if (isEmptySpan(entry.span)) {
      return;
    }
    if (entry.span.start < gapStart) {
      previous = position;
    } else if (entry.span.start >= gapEnd && next === entries.length) {
      next = position;
    }
  });

  for (let position = previous + 1; position < next; position += 1) {
    const candidate = entries[position];
    if (candidate && isEmptySpan(candidate.span)) {
      candidate.span = { start: gapStart, end: gapEnd };
      return;
    }
  }
  const before = entries[previous];
  if (before) {
    before.span = { start: before.span.start, end: Math.max(before.span.end, gapEnd) };
    return;
  }
  const after = entries[next];
  if (after) {
    after.span = { start: gapStart, end: after.span.end };
  }
}

function coveredRange(members: readonly RefinerEntry[]): TokenSpan | null {
  let start = Number.POSITIVE_INFINITY;
  let end = Number.NEGATIVE_INFINITY;
  for (const { span } of members) {
    if (isEmptySpan(span)) {
      continue;
    }
    start = Math.min(start, span.start);
    end = Math.max(end, span.end);
  }
  return start < end ? { start, end } : null;
}

/**
 * Current inner boundaries of the window, relative to `range.start`: the
 * end of each member but the last, kept non-decreasing.
 */
function currentBoundaries(members: readonly RefinerEntry[], range: TokenSpan): number[] {
  const length = range.end - range.start;
  const boundaries = [0];
  let cursor = 0;
  for (const member of members.slice(0, -1)) {
    if (!isEmptySpan(member.span)) {
      cursor = Math.max(cursor, Math.min(length, member.span.end - range.start));
    }
    boundaries.push(cursor);
  }
  boundaries.push(length);
  return boundaries;
}

/**
 * Optimal split of `range` into one run per member, with boundary k kept
 * within `radius` of its current position. Empty runs score 0; on ties
 * earlier members keep more tokens.
 */
async function repartitionWindow(
  members: RefinerEntry[],
  range: TokenSpan,
  radius: number,
  options: RefineOptions,
): Promise<void> {
  const { store, secondary } = options;
  const length = range.end - range.start;
  const count = members.length;
  const runText = (from: number, to: number): string =>
    renderTokens(secondary, range.start + from, range.start + to);

  const current = currentBoundaries(members, range);
  // allowed[k]: inclusive [low, high] positions for boundary k
  const allowed = current.map((position, k): [number, number] =>
    k === 0 || k === count ? [position, position] : [Math.max(0, position - radius), Math.min(length, position + radius)],
  );
  const bounds = (k: number): [number, number] => allowed[k] ?? [0, length];

  const candidates: string[] = [];
  for (let k = 0; k < count; k += 1) {
    const [fromLow, fromHigh] = bounds(k);
    const [toLow, toHigh] = bounds(k + 1);
    for (let from = fromLow; from <= fromHigh; from += 1) {
      for (let to = Math.max(from + 1, toLow); to <= toHigh; to += 1) {
        candidates.push(runText(from, to));
      }
    }
  }
  await store.ensure([...members.map((member) => member.primaryText), ...candidates]);

  // best[k][q]: best total for members [0, k) covering tokens [0, q)
  const best: number[][] = Array.from({ length: count + 1 }, () =>
    new Array<number>(length + 1).fill(Number.NEGATIVE_INFINITY),
  );
  const choice: number[][] = Array.from({ length: count + 1 }, () => new Array<number>(length + 1).fill(0));
  const firstRow = best[0];
  if (firstRow) {
    firstRow[0] = 0;
  }

  for (let k = 0; k < count; k += 1) {
    const member = members[k];
    const currentRow = best[k];
    const nextRow = best[k + 1];
    const nextChoice = choice[k + 1];
    if (!member || !currentRow || !nextRow || !nextChoice) {
      continue;
    }
    const [fromLow, fromHigh] = bounds(k);
    const [toLow, toHigh] = bounds(k + 1);
    for (let q = toLow; q <= toHigh; q += 1) {
      for (let p = fromLow; p <= Math.min(q, fromHigh); p += 1) {
        const base = currentRow[p] ?? Number.NEGATIVE_INFINITY;
        if (base === Number.NEGATIVE_INFINITY) {
          continue;
        }
        const score = p === q ? 0 : store.similarity(member.primaryText, runText(p, q));
        if (base + score >= (nextRow[q] ?? Number.NEGATIVE_INFINITY)) {
          nextRow[q] = base + score;
          nextChoice[q] = p;
        }
      }
    }
  }

  let end = length;
  for (let k = count; k > 0; k -= 1) {
    const start = choice[k]?.[end] ?? 0;
    const member = members[k - 1];
    if (member) {
      member.span = { start: range.start + start, end: range.start + end };
    }
    end = start;
  }
}

/** Clamps spans so they no longer overlap; earlier entries keep shared tokens. */
export function resolveOverlaps(entries: RefinerEntry[]): void {
  let cursor = 0;
  for (const entry of entries) {
    if (isEmptySpan(entry.span)) {
      if (entry.span.start !== cursor || entry.span.end !== cursor) {
        entry.span = { start: cursor, end: cursor };
      }
      continue;
    }
    const start = Math.max(entry.span.start, cursor);
    const end = Math.max(entry.span.end, start);
    if (start !== entry.span.start || end !== entry.span.end) {
      entry.span = { start, end };
    }
    cursor = end;
  }
}
