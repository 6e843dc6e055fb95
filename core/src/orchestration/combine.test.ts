import { describe, it, expect } from 'vitest';
import type { FieldOrigin, MergedField } from '../types.js';
import { combineFields, countByOrigin } from './combine.js';

const field = (start: number, end: number, origin: FieldOrigin, sourceIndex: number): MergedField => ({
  start,
  end,
  primaryText: origin === 'secondary-only' ? '' : `p${sourceIndex}`,
  secondaryText: origin === 'primary-only' || origin === 'extended' ? '' : `s${sourceIndex}`,
  score: 0,
  origin,
  sourceIndex,
});

describe('combineFields', () => {
  it('keeps every field and orders by start then end', () => {
    const aligned = [field(2000, 3000, 'aligned', 1), field(0, 1000, 'aligned', 0)];
    const secondaryOnly = [field(500, 800, 'secondary-only', 4)];
    const extended = [field(0, 500, 'extended', 2)];

    const combined = combineFields(aligned, secondaryOnly, extended);

    expect(combined.map((item) => [item.start, item.end, item.origin])).toEqual([
      [0, 500, 'extended'],
      [0, 1000, 'aligned'],
      [500, 800, 'secondary-only'],
      [2000, 3000, 'aligned'],
    ]);
  });

  it('breaks timing ties by origin, then by source index', () => {
    const combined = combineFields(
      [field(0, 1000, 'secondary-only', 0)],
      [field(0, 1000, 'primary-only', 5), field(0, 1000, 'primary-only', 3)],
      [field(0, 1000, 'aligned', 9)],
    );

    expect(combined.map((item) => `${item.origin}:${item.sourceIndex}`)).toEqual([
      'aligned:9',
      'primary-only:3',
      'primary-only:5',
      'secondary-only:0',
    ]);
  });

  it('returns an empty list for no input', () => {
    expect(combineFields()).toEqual([]);
  });
});

describe('countByOrigin', () => {
  it('counts each origin, including absent ones', () => {
    expect(countByOrigin([field(0, 1, 'aligned', 0), field(1, 2, 'aligned', 1), field(2, 3, 'extended', 2)])).toEqual({
      aligned: 2,
      extended: 1,
      'primary-only': 0,
      'secondary-only': 0,
    });
  });
});
