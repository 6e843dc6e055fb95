import { throwIfCancelled } from '../cancellation.js';
import { renderEntryText } from '../tokenization/token-sequence.js';
import type { LocalProgress, MergedField, TokenizedEntry, TrackRole } from '../types.js';

export interface TimeInterval {
  readonly start: number;
  readonly end: number;
}

export interface NonOverlapResult {
  /** Placeholder fields for the entries that overlap nothing */
  fields: MergedField[];
  /** Entries still needing semantic alignment, in input order */
  residual: TokenizedEntry[];
}

export interface NonOverlapOptions {
  signal?: AbortSignal;
  /** Entries between cancellation checks */
  batchSize?: number;
  onProgress?: LocalProgress;
}

/** Touching intervals do not overlap, and neither do empty ones. */
export function intervalsOverlap(a: TimeInterval, b: TimeInterval): boolean {
  return Math.min(a.end, b.end) - Math.max(a.start, b.start) > 0;
}

/**
 * Sorted reference intervals with a running maximum of their ends, so one
 * binary search answers "does anything overlap [start, end)?".
 */
class IntervalIndex {
  private readonly starts: number[];
  private readonly maxEnds: number[];

  constructor(intervals: readonly TimeInterval[]) {
    const sorted = intervals.filter((interval) => interval.end > interval.start).sort((a, b) => a.start - b.start);
    this.starts = sorted.map((interval) => interval.start);
    this.maxEnds = [];
    let maxEnd = Number.NEGATIVE_INFINITY;
    for (const interval of sorted) {
      maxEnd = Math.max(maxEnd, interval.end);
      this.maxEnds.push(maxEnd);
    }
  }

  overlapsAny(interval: TimeInterval): boolean {
    if (interval.end <= interval.start) {
      return false;
    }
    // count of references starting before interval.end
    let lo = 0;
    let hi = this.starts.length;
    while (lo < hi) {
      const mid = (lo + hi) >> 1;
      if ((this.starts[mid] ?? Number.POSITIVE_INFINITY) < interval.end) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return lo > 0 && (this.maxEnds[lo - 1] ?? Number.NEGATIVE_INFINITY) > interval.start;
  }
}

/**
 * Splits `entries` into those overlapping no reference interval (turned into
 * placeholder fields) and the residual. Partial overlap counts as overlap.
 */
export function extractNonOverlap(
  entries: readonly TokenizedEntry[],
  reference: readonly TimeInterval[],
  role: TrackRole,
  options: NonOverlapOptions = {},
): NonOverlapResult {
  const index = new IntervalIndex(reference);
  const batchSize = options.batchSize ?? 32;
  const result: NonOverlapResult = { fields: [], residual: [] };

  entries.forEach((tokenized, position) => {
    if (position % batchSize === 0) {
      throwIfCancelled(options.signal);
      options.onProgress?.(position / entries.length);
    }
    if (index.overlapsAny(tokenized.entry)) {
      result.residual.push(tokenized);
      return;
    }
    result.fields.push(toPlaceholderField(tokenized, role));
  });
  options.onProgress?.(1);
  return result;
}

/** A field for an entry that is carried over without alignment. */
export function toPlaceholderField(tokenized: TokenizedEntry, role: TrackRole): MergedField {
  const { entry, sourceIndex } = tokenized;
  const text = renderEntryText(tokenized);
  if (role === 'primary') {
    return {
      start: entry.start,
      end: entry.end,
      primaryText: text,
      secondaryText: '',
      primaryStyle: entry.style,
      score: 0,
      origin: 'primary-only',
      sourceIndex,
    };
  }
  return {
    start: entry.start,
    end: entry.end,
    primaryText: '',
    secondaryText: text,
    secondaryStyle: entry.style,
    score: 0,
    origin: 'secondary-only',
    sourceIndex,
  };
}
