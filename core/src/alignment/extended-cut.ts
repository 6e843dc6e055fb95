import { throwIfCancelled } from '../cancellation.js';
import type { ExtendedCutConfig } from '../config/aligner-config.js';
import type { EmbeddingStore } from '../embedding/embedding-store.js';
import type { Logger } from '../logger.js';
import type { NumericArena } from '../numeric/arena.js';
import type { LocalProgress, MergedField } from '../types.js';
import { runsOf, smoothMask, UNALIGNED } from './hmm.js';
import type { RefinerEntry } from './window-refiner.js';

export interface ExtendedCutOptions {
  config: ExtendedCutConfig;
  store: EmbeddingStore;
  arena: NumericArena;
  signal?: AbortSignal;
  onProgress?: LocalProgress;
  logger?: Partial<Logger>;
}

export interface ExtendedCutResult {
  /** Entries left for the next refinement pass */
  pool: RefinerEntry[];
  /** Primary entries that exist only in the extended cut */
  extended: MergedField[];
}

/**
 * Finds runs of primary entries without a credible secondary counterpart.
 *
 * The per-entry match mask is smoothed by a two-state HMM; each unaligned
 * run is then trimmed from both ends while its edge entry is a borderline
 * match for itself or for the aligned entry next to it.
 */
export async function extractExtendedCut(
  entries: readonly RefinerEntry[],
  options: ExtendedCutOptions,
): Promise<ExtendedCutResult> {
  const { config, store } = options;
  const logger = options.logger ?? {};
  const mask = options.arena.uint8('extended.mask', entries.length);
  entries.forEach((entry, index) => {
    mask[index] = entry.score > config.alignThreshold ? 1 : 0;
  });
  const states = smoothMask(mask, config.hmm, options.arena);
  const runs = runsOf(states, UNALIGNED);

  await store.ensure(entries.flatMap((entry) => [entry.primaryText, entry.secondaryText]));

  const borderline = (index: number, neighbour: number): boolean => {
    const entry = entries[index];
    if (!entry) {
      return false;
    }
    const adjacent = entries[neighbour];
    const neighbourScore = adjacent ? store.similarity(entry.primaryText, adjacent.secondaryText) : 0;
    return Math.max(entry.score, neighbourScore) > config.trimThreshold;
  };

  const survivors = new Set<number>();
  runs.forEach(([runStart, runEnd], position) => {
    throwIfCancelled(options.signal);
    let start = runStart;
    let end = runEnd;
    while (start < end) {
      if (borderline(start, start - 1)) {
        start += 1;
      } else if (borderline(end - 1, end)) {
        end -= 1;
      } else {
        break;
      }
    }
    const kept = end - start >= config.minRunLength;
    logger.debug?.('extended.run', { start: runStart, end: runEnd, trimmedTo: [start, end], kept });
    if (kept) {
      for (let index = start; index < end; index += 1) {
        survivors.add(index);
      }
    }
    options.onProgress?.((position + 1) / runs.length);
  });
  options.onProgress?.(1);

  if (survivors.size === 0) {
    return { pool: [...entries], extended: [] };
  }

  const pool: RefinerEntry[] = [];
  const extended: MergedField[] = [];
  entries.forEach((entry, index) => {
    if (!survivors.has(index)) {
      pool.push(entry);
      return;
    }
    const { entry: source, sourceIndex } = entry.primary;
    extended.push({
      start: source.start,
      end: source.end,
      primaryText: entry.primaryText,
      secondaryText: '',
      primaryStyle: source.style,
      score: 0,
      origin: 'extended',
      sourceIndex,
    });
  });
  return { pool, extended };
}
