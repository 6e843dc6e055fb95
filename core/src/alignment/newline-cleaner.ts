import { throwIfCancelled } from '../cancellation.js';
import type { LocalProgress, MergedField } from '../types.js';

export interface CleanOptions {
  retainNewline: boolean;
  batchSize: number;
  signal?: AbortSignal;
  onProgress?: LocalProgress;
}

const MARKER_WITH_SPACE = /[^\S\r\n]*\\N[^\S\r\n]*/g;
const REPEATED_MARKERS = /(?:\\N){2,}/g;
const EDGE_MARKERS = /^(?:\\N)+|(?:\\N)+$/g;
const SPACE_RUNS = / {2,}/g;

/**
 * Removes break markers left redundant by token-level merging: spaces
 * around a marker, repeated markers, and markers at either end.
 */
export function cleanLineBreaks(text: string): string {
  return text
    .replace(MARKER_WITH_SPACE, '\\N')
    .replace(REPEATED_MARKERS, '\\N')
    .replace(EDGE_MARKERS, '')
    .replace(SPACE_RUNS, ' ')
    .trim();
}

/** Cleans both texts of every field; order and timing are untouched. */
export function cleanFields(fields: readonly MergedField[], options: CleanOptions): MergedField[] {
  if (options.retainNewline) {
    options.onProgress?.(1);
    return [...fields];
  }
  const cleaned: MergedField[] = [];
  fields.forEach((field, index) => {
    if (index % options.batchSize === 0) {
      throwIfCancelled(options.signal);
      options.onProgress?.(index / fields.length);
    }
    cleaned.push({
      ...field,
      primaryText: cleanLineBreaks(field.primaryText),
      secondaryText: cleanLineBreaks(field.secondaryText),
    });
  });
  options.onProgress?.(1);
  return cleaned;
}
