import { describe, it, expect } from 'vitest';
import { tokenizeEntries } from './tokenizer.js';
import { buildTokenSequence, isEmptySpan, renderSpan, renderTokens } from './token-sequence.js';

describe('buildTokenSequence', () => {
  it('flattens tokens and records one span per entry', () => {
    const entries = tokenizeEntries(
      [
        { start: 0, end: 1, text: 'One, two' },
        { start: 1, end: 2, text: '' },
        { start: 2, end: 3, text: 'Three' },
      ],
      true,
    );
    const sequence = buildTokenSequence(entries);
    expect(sequence.tokens.map((token) => token.text)).toEqual(['One,', 'two', 'Three']);
    expect(sequence.spans).toEqual([
      { start: 0, end: 2 },
      { start: 2, end: 2 },
      { start: 2, end: 3 },
    ]);
    expect(isEmptySpan(sequence.spans[1] ?? { start: 0, end: 1 })).toBe(true);
  });

  it('keeps source indices after filtering', () => {
    const entries = tokenizeEntries(
      [
        { start: 0, end: 1, text: 'Dropped' },
        { start: 1, end: 2, text: 'Kept' },
      ],
      true,
    );
    const sequence = buildTokenSequence(entries.slice(1));
    expect(sequence.spans).toEqual([{ start: 0, end: 1 }]);
    expect(sequence.tokens[0]?.entryIndex).toBe(1);
    expect(renderTokens(sequence, 0, 1)).toBe('Kept');
  });
});

describe('renderTokens', () => {
  const sequence = buildTokenSequence(
    tokenizeEntries(
      [
        { start: 0, end: 1, text: 'Hello world, friend' },
        { start: 1, end: 2, text: 'Top\\NBottom' },
      ],
      true,
    ),
  );

  it('joins tokens of one entry the way the source did', () => {
    expect(renderTokens(sequence, 0, 2)).toBe('Hello world, friend');
  });

  it('joins entries with a space and keeps break markers', () => {
    expect(renderTokens(sequence, 0, 4)).toBe('Hello world, friend Top\\NBottom');
  });

  it('renders an empty range as an empty string', () => {
    expect(renderTokens(sequence, 2, 2)).toBe('');
    expect(renderSpan(sequence, { start: 3, end: 1 })).toBe('');
  });

  it('does not insert spaces the source did not have', () => {
    const cjk = buildTokenSequence(
      tokenizeEntries(
        [
          { start: 0, end: 1, text: '你好，世界' },
          { start: 1, end: 2, text: '今天 天气' },
        ],
        false,
      ),
    );
    expect(renderTokens(cjk, 0, 2)).toBe('你好，世界');
    expect(renderTokens(cjk, 2, 4)).toBe('今天 天气');
  });
});
