import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { isCancelledError } from '../cancellation.js';
import { isPlainObject } from '../config/config-utils.js';
import { tokenizeEntries } from '../tokenization/tokenizer.js';
import type { SubtitleEntry } from '../types.js';
import { NON_OVERLAP_CASES_PATH } from '../../tests/fixture-paths.js';
import { extractNonOverlap, intervalsOverlap } from './non-overlap.js';

interface NonOverlapCase {
  name: string;
  primary: SubtitleEntry[];
  secondary: SubtitleEntry[];
  expectedPrimary: number[];
  expectedSecondary: number[];
}

function toEntries(value: unknown, label: string): SubtitleEntry[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.map((pair: unknown, index) => {
    if (!Array.isArray(pair)) {
      throw new Error('interval must be [start, end]');
    }
    return { start: Number(pair[0]), end: Number(pair[1]), text: `${label} ${index}` };
  });
}

function loadCases(): NonOverlapCase[] {
  const raw: unknown = parseYaml(readFileSync(NON_OVERLAP_CASES_PATH, 'utf8'));
  if (!Array.isArray(raw)) {
    throw new Error('non-overlap cases must be a list');
  }
  return raw.map((item: unknown): NonOverlapCase => {
    if (!isPlainObject(item) || !isPlainObject(item.expected)) {
      throw new Error('malformed non-overlap case');
    }
    const { primary, secondary } = item.expected;
    return {
      name: String(item.name),
      primary: toEntries(item.primary, 'primary'),
      secondary: toEntries(item.secondary, 'secondary'),
      expectedPrimary: Array.isArray(primary) ? primary.map(Number) : [],
      expectedSecondary: Array.isArray(secondary) ? secondary.map(Number) : [],
    };
  });
}

const cases = loadCases();

describe('extractNonOverlap', () => {
  it.each(cases.map((testCase) => [testCase.name, testCase] as const))('%s', (_name, testCase) => {
    const primary = tokenizeEntries(testCase.primary, true);
    const secondary = tokenizeEntries(testCase.secondary, true);

    const fromPrimary = extractNonOverlap(primary, testCase.secondary, 'primary');
    const fromSecondary = extractNonOverlap(secondary, testCase.primary, 'secondary');

    expect(fromPrimary.fields.map((field) => field.sourceIndex)).toEqual(testCase.expectedPrimary);
    expect(fromSecondary.fields.map((field) => field.sourceIndex)).toEqual(testCase.expectedSecondary);

    for (const [input, result] of [
      [primary, fromPrimary],
      [secondary, fromSecondary],
    ] as const) {
      const carried = result.fields.map((field) => input[field.sourceIndex]);
      const all = [...carried, ...result.residual];
      expect(all).toHaveLength(input.length);
      expect(new Set(all).size).toBe(input.length);
      for (const entry of input) {
        expect(all).toContain(entry);
      }
    }
  });

  it('builds placeholder fields at the entry timing', () => {
    const secondary = tokenizeEntries([{ start: 5000, end: 6000, text: 'Merci\nbeaucoup', style: 'Alt' }], true);
    const result = extractNonOverlap(secondary, [{ start: 0, end: 2000 }], 'secondary');
    expect(result.fields).toEqual([
      {
        start: 5000,
        end: 6000,
        primaryText: '',
        secondaryText: 'Merci\\Nbeaucoup',
        secondaryStyle: 'Alt',
        score: 0,
        origin: 'secondary-only',
        sourceIndex: 0,
      },
    ]);
    expect(result.residual).toEqual([]);
  });

  it('marks primary placeholders as primary-only', () => {
    const primary = tokenizeEntries([{ start: 0, end: 10, text: 'Alone' }], true);
    const [field] = extractNonOverlap(primary, [], 'primary').fields;
    expect(field).toMatchObject({ origin: 'primary-only', primaryText: 'Alone', secondaryText: '' });
  });

  it('stops when the signal is aborted', () => {
    const controller = new AbortController();
    controller.abort();
    const primary = tokenizeEntries([{ start: 0, end: 10, text: 'x' }], true);
    let caught: unknown;
    try {
      extractNonOverlap(primary, [], 'primary', { signal: controller.signal });
    } catch (error) {
      caught = error;
    }
    expect(isCancelledError(caught)).toBe(true);
  });
});

describe('intervalsOverlap', () => {
  it('requires a positive intersection', () => {
    expect(intervalsOverlap({ start: 0, end: 10 }, { start: 5, end: 15 })).toBe(true);
    expect(intervalsOverlap({ start: 0, end: 10 }, { start: 10, end: 15 })).toBe(false);
    expect(intervalsOverlap({ start: 3, end: 3 }, { start: 0, end: 10 })).toBe(false);
  });
});
