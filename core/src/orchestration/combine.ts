import type { FieldOrigin, MergedField } from '../types.js';

const ORIGIN_RANK: Record<FieldOrigin, number> = {
  aligned: 0,
  extended: 1,
  'primary-only': 2,
  'secondary-only': 3,
};

export function compareFields(a: MergedField, b: MergedField): number {
  return (
    a.start - b.start ||
    a.end - b.end ||
    ORIGIN_RANK[a.origin] - ORIGIN_RANK[b.origin] ||
    a.sourceIndex - b.sourceIndex
  );
}

/** Concatenates every group and sorts by (start, end, origin, sourceIndex). */
export function combineFields(...groups: ReadonlyArray<readonly MergedField[]>): MergedField[] {
  return groups.flat().sort(compareFields);
}

export function countByOrigin(fields: readonly MergedField[]): Record<FieldOrigin, number> {
  const counts: Record<FieldOrigin, number> = { aligned: 0, extended: 0, 'primary-only': 0, 'secondary-only': 0 };
  for (const field of fields) {
    counts[field.origin] += 1;
  }
  return counts;
}
