/**
 * Line tokenizer.
 *
 * A token is a contiguous slice of one line. Tokens never contain line
 * breaks or leading/trailing whitespace, so the source line is recoverable
 * from the tokens' offsets and the gaps between them.
 *
 * Two rules:
 * - space-separated scripts split on punctuation only
 * - other scripts also split at every whitespace run
 */

import type { SubtitleEntry, Token, TokenizedEntry } from '../types.js';

/** Literal two-character break marker used by ASS/SSA and in rendered output. */
export const LINE_BREAK_MARKER = '\\N';

const DELIMITERS = new Set([
  '.', ',', '!', '?', ';', ':', '…', '‼', '⁇', '⁈', '⁉',
  '。', '、', '・', '，', '．', '！', '？', '；', '：', '｡', '､', '･',
  '،', '؛', '؟', '۔',
  '।', '॥',
  '၊', '။',
  '๚', '๛', '។', '៕',
]);

/** Allowed alone between two digits: 3.5, 1,000, 10:30 */
const DIGIT_JOINERS = new Set(['.', ',', ':']);

const DASHES = new Set(['-', '‐', '‑', '–', '—', '―', '－']);

const WHITESPACE = /\s/u;
const DIGIT = /\p{Nd}/u;

export interface TokenizeOptions {
  spaceSeparated: boolean;
  /** Stored on each token; defaults to 0 */
  entryIndex?: number;
}

interface LineBreak {
  length: number;
  marksToken: boolean;    // a lone \r is a boundary without a marker
}

interface PendingToken {
  start: number;
  end: number;
  breakAfter: boolean;
}

export function isDelimiter(char: string | undefined): boolean {
  return char !== undefined && DELIMITERS.has(char);
}

function isDigit(char: string | undefined): boolean {
  return char !== undefined && DIGIT.test(char);
}

function readLineBreak(text: string, index: number): LineBreak | null {
  const char = text[index];
  if (char === '\r') {
    return text[index + 1] === '\n' ? { length: 2, marksToken: true } : { length: 1, marksToken: false };
  }
  if (char === '\n') {
    return { length: 1, marksToken: true };
  }
  if (char === '\\' && text[index + 1] === 'N') {
    return { length: 2, marksToken: true };
  }
  return null;
}

function delimiterRunEnd(text: string, index: number): number {
  let end = index;
  while (end < text.length && isDelimiter(text[end])) {
    end += 1;
  }
  return end;
}

function isDigitJoiner(text: string, index: number, runEnd: number): boolean {
  const char = text[index];
  return (
    runEnd === index + 1 &&
    char !== undefined &&
    DIGIT_JOINERS.has(char) &&
    isDigit(text[index - 1]) &&
    isDigit(text[index + 1])
  );
}

/** True when the whitespace run at `index` is followed by punctuation. */
function whitespaceLeadsToDelimiter(text: string, index: number): boolean {
  let cursor = index;
  while (cursor < text.length && readLineBreak(text, cursor) === null && WHITESPACE.test(text.charAt(cursor))) {
    cursor += 1;
  }
  return readLineBreak(text, cursor) === null && isDelimiter(text[cursor]);
}

function isDashOnly(text: string): boolean {
  return text.length > 0 && [...text].every((char) => DASHES.has(char) || WHITESPACE.test(char));
}

export function tokenizeLine(text: string, options: TokenizeOptions): Token[] {
  const pending: PendingToken[] = [];
  let open: { start: number; contentEnd: number } | null = null;

  const close = (): void => {
    if (open) {
      pending.push({ start: open.start, end: open.contentEnd, breakAfter: false });
      open = null;
    }
  };

  let index = 0;
  while (index < text.length) {
    const lineBreak = readLineBreak(text, index);
    if (lineBreak) {
      close();
      const previous = pending[pending.length - 1];
      if (lineBreak.marksToken && previous) {
        previous.breakAfter = true;
      }
      index += lineBreak.length;
      continue;
    }

    const char = text.charAt(index);
    if (WHITESPACE.test(char)) {
      if (open && !options.spaceSeparated && !whitespaceLeadsToDelimiter(text, index)) {
        close();
      }
      index += 1;
      continue;
    }

    if (isDelimiter(char)) {
      const runEnd = delimiterRunEnd(text, index);
      if (!isDigitJoiner(text, index, runEnd)) {
        if (open) {
          open.contentEnd = runEnd;
          close();
        } else {
          pending.push({ start: index, end: runEnd, breakAfter: false });
        }
        index = runEnd;
        continue;
      }
    }

    if (open) {
      open.contentEnd = index + 1;
    } else {
      open = { start: index, contentEnd: index + 1 };
    }
    index += 1;
  }
  close();

  const merged = options.spaceSeparated ? pending : mergeDialogueDashes(text, pending);
  const entryIndex = options.entryIndex ?? 0;
  return merged.map((token) => ({
    text: text.slice(token.start, token.end),
    start: token.start,
    end: token.end,
    breakAfter: token.breakAfter,
    entryIndex,
  }));
}

/** A dash-only token (dialogue marker) joins the token that follows it. */
function mergeDialogueDashes(text: string, tokens: PendingToken[]): PendingToken[] {
  const result: PendingToken[] = [];
  let carry: PendingToken | null = null;
  for (const token of tokens) {
    const current: PendingToken = carry
      ? { start: carry.start, end: token.end, breakAfter: token.breakAfter }
      : token;
    carry = null;
    if (!current.breakAfter && isDashOnly(text.slice(current.start, current.end))) {
      carry = current;
      continue;
    }
    result.push(current);
  }
  if (carry) {
    result.push(carry);
  }
  return result;
}

/** Rebuilds the source line from its tokens and the gaps between them. */
export function restoreLine(source: string, tokens: readonly Token[]): string {
  let cursor = 0;
  let line = '';
  for (const token of tokens) {
    line += source.slice(cursor, token.start) + token.text;
    cursor = token.end;
  }
  return line + source.slice(cursor);
}

export function tokenDisplayText(token: Token): string {
  return token.breakAfter ? `${token.text}${LINE_BREAK_MARKER}` : token.text;
}

export function tokenizeEntries(
  entries: readonly SubtitleEntry[],
  spaceSeparated: boolean,
): TokenizedEntry[] {
  return entries.map((entry, sourceIndex) => ({
    entry,
    sourceIndex,
    tokens: tokenizeLine(entry.text, { spaceSeparated, entryIndex: sourceIndex }),
  }));
}
