import type { Token, TokenSpan, TokenizedEntry } from '../types.js';
import { LINE_BREAK_MARKER, tokenDisplayText } from './tokenizer.js';

/**
 * Flat tokens of a list of entries. Rebuilt whenever the list is filtered,
 * so spans always index this sequence and never a previous one.
 */
export interface TokenSequence {
  readonly entries: readonly TokenizedEntry[];
  readonly tokens: readonly Token[];
  /** One span per entry, same order as `entries` */
  readonly spans: readonly TokenSpan[];
  /** Source line per token.entryIndex */
  readonly lines: ReadonlyMap<number, string>;
}

export function buildTokenSequence(entries: readonly TokenizedEntry[]): TokenSequence {
  const tokens: Token[] = [];
  const spans: TokenSpan[] = [];
  const lines = new Map<number, string>();
  for (const entry of entries) {
    const start = tokens.length;
    tokens.push(...entry.tokens);
    spans.push({ start, end: tokens.length });
    lines.set(entry.sourceIndex, entry.entry.text);
  }
  return { entries, tokens, spans, lines };
}

export function isEmptySpan(span: TokenSpan): boolean {
  return span.end <= span.start;
}

const WHITESPACE = /\s/u;

function joinerBetween(sequence: TokenSequence, left: Token, right: Token): string {
  if (left.breakAfter) {
    return '';
  }
  if (left.entryIndex !== right.entryIndex) {
    return ' ';
  }
  const line = sequence.lines.get(left.entryIndex) ?? '';
  const gap = line.slice(left.end, right.start).split(LINE_BREAK_MARKER).join('');
  return WHITESPACE.test(gap) ? ' ' : '';
}

/**
 * Display text of tokens [start, end). Tokens of one entry are joined the
 * way the source joined them; tokens of different entries by a space.
 */
export function renderTokens(sequence: TokenSequence, start: number, end: number): string {
  let text = '';
  let previous: Token | undefined;
  for (let index = Math.max(0, start); index < Math.min(end, sequence.tokens.length); index += 1) {
    const token = sequence.tokens[index];
    if (!token) {
      continue;
    }
    if (previous) {
      text += joinerBetween(sequence, previous, token);
    }
    text += tokenDisplayText(token);
    previous = token;
  }
  return text;
}

export function renderSpan(sequence: TokenSequence, span: TokenSpan): string {
  return renderTokens(sequence, span.start, span.end);
}

/** Display text of a single entry, with line breaks as markers. */
export function renderEntryText(entry: TokenizedEntry): string {
  return renderTokens(buildTokenSequence([entry]), 0, entry.tokens.length);
}
