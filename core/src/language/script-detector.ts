/**
 * Script-based language classification, the fallback when n-gram detection
 * has no answer.
 *
 * Only the tokenization rule depends on the result, so this distinguishes
 * scripts rather than languages: scripts used by a single language map to
 * that language, shared scripts map to `und-<Script>`.
 */

import type { LanguageDetector, SubtitleEntry } from '../types.js';

interface ScriptRule {
  code: string;
  pattern: RegExp;
}

const KANA = /[\p{Script=Hiragana}\p{Script=Katakana}]/u;
const HAN = /\p{Script=Han}/u;

const SCRIPT_RULES: readonly ScriptRule[] = [
  { code: 'ko', pattern: /\p{Script=Hangul}/u },
  { code: 'th', pattern: /\p{Script=Thai}/u },
  { code: 'lo', pattern: /\p{Script=Lao}/u },
  { code: 'km', pattern: /\p{Script=Khmer}/u },
  { code: 'my', pattern: /\p{Script=Myanmar}/u },
  { code: 'bo', pattern: /\p{Script=Tibetan}/u },
  { code: 'und-Latn', pattern: /\p{Script=Latin}/u },
  { code: 'und-Cyrl', pattern: /\p{Script=Cyrillic}/u },
  { code: 'und-Arab', pattern: /\p{Script=Arabic}/u },
  { code: 'und-Grek', pattern: /\p{Script=Greek}/u },
  { code: 'und-Hebr', pattern: /\p{Script=Hebrew}/u },
  { code: 'und-Deva', pattern: /\p{Script=Devanagari}/u },
];

const LETTER = /\p{L}/u;

const NON_SPACE_LANGUAGES = new Set(['zh', 'ja', 'th', 'lo', 'km', 'my', 'bo', 'yue', 'wuu', 'cmn']);
const NON_SPACE_SCRIPTS = new Set(['hani', 'hans', 'hant', 'jpan', 'thai', 'laoo', 'khmr', 'mymr', 'tibt']);

/**
 * Classifies text by its dominant script. Han text containing any kana
 * counts as Japanese. Returns null when the text has no letters.
 */
export function detectScriptLanguage(text: string): string | null {
  const counts = new Map<string, number>();
  let kana = 0;
  let han = 0;
  let letters = 0;

  for (const char of text) {
    if (!LETTER.test(char)) {
      continue;
    }
    letters += 1;
    if (KANA.test(char)) {
      kana += 1;
      continue;
    }
    if (HAN.test(char)) {
      han += 1;
      continue;
    }
    const rule = SCRIPT_RULES.find((candidate) => candidate.pattern.test(char));
    const code = rule?.code ?? 'und';
    counts.set(code, (counts.get(code) ?? 0) + 1);
  }

  if (letters === 0) {
    return null;
  }
  if (kana > 0) {
    counts.set('ja', kana + han);
  } else if (han > 0) {
    counts.set('zh', han);
  }

  let best: string | null = null;
  let bestCount = 0;
  for (const [code, count] of counts) {
    if (count > bestCount) {
      best = code;
      bestCount = count;
    }
  }
  return best;
}

export function createScriptLanguageDetector(): LanguageDetector {
  return { detect: detectScriptLanguage };
}

/**
 * Whether tokens of this language are delimited by spaces.
 * Unknown (null) falls back to the non-space rule.
 */
export function isSpaceSeparatedLanguage(code: string | null): boolean {
  if (code === null) {
    return false;
  }
  const [language = '', ...subtags] = code.toLowerCase().split(/[-_]/);
  if (NON_SPACE_LANGUAGES.has(language)) {
    return false;
  }
  return !subtags.some((subtag) => NON_SPACE_SCRIPTS.has(subtag));
}

const DEFAULT_SAMPLE_ENTRIES = 100;

/**
 * Builds the detection sample for a track: the text of up to
 * `sampleEntries` entries spread evenly across it.
 */
export function sampleTrackText(
  entries: readonly SubtitleEntry[],
  sampleEntries = DEFAULT_SAMPLE_ENTRIES,
): string {
  if (entries.length <= sampleEntries) {
    return entries.map((entry) => entry.text).join('\n');
  }
  const step = entries.length / sampleEntries;
  const picked: string[] = [];
  for (let i = 0; i < sampleEntries; i += 1) {
    const entry = entries[Math.floor(i * step)];
    if (entry) {
      picked.push(entry.text);
    }
  }
  return picked.join('\n');
}
