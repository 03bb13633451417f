import { estimatorLogger as logger } from "../utils/logger";

/** Anything that can put a syllable count on a raw token. */
export interface SyllableCounter {
  count(token: string): number;
}

export type DictionaryEntry = readonly [word: string, syllables: number];

const PUNCTUATION = new Set(["!", ".", "?", ",", ":", ";", '"', "'"]);
const VOWELS = new Set(["a", "e", "i", "o", "u"]);

// Order matters: each pattern runs once against what the previous ones left.
const DIPHTHONGS: readonly RegExp[] = [
  /ea|ee/,
  /ai|ei|a[^aeiou]e/,
  /ou|oo|u[^aeiou]e/,
  /ay/,
  /igh|ie|[aeiou]y[aeiou]/,
  /oi|oy/,
  /ai|ei|a[^aeiou]e/,
  /ou/,
];

const TRIPHTHONGS: readonly RegExp[] = [/aye/, /i[^aeiou]e/, /oya/, /ay/, /owe/];

const SILENT_LE = /^[a-z]+les?$/;

/** Lowercase and drop the punctuation that commonly clings to words in prose. */
export function normalizeWord(raw: string): string {
  let out = "";
  for (const ch of raw.toLowerCase()) {
    if (!PUNCTUATION.has(ch)) out += ch;
  }
  return out;
}

/**
 * Delete the first match of each pattern in turn, returning the shortened
 * word and how many patterns matched.
 */
function collapse(word: string, patterns: readonly RegExp[]): { rest: string; removed: number } {
  let rest = word;
  let removed = 0;
  for (const pattern of patterns) {
    const m = pattern.exec(rest);
    if (m) {
      rest = rest.slice(0, m.index) + rest.slice(m.index + m[0].length);
      removed++;
    }
  }
  return { rest, removed };
}

/**
 * Rule-based syllable estimate for an already normalized word.
 *
 * Counts vowels, treats a lone or trailing `y` as a vowel, drops a silent
 * final `e`, subtracts one per diphthong and triphthong removed, and adds one
 * back for a trailing `le`/`les`. The result is not clamped: some words
 * ("make", "tree", "night") come out at 0.
 */
export function estimateSyllables(word: string): number {
  let num = 0;
  for (const ch of word) {
    if (VOWELS.has(ch)) num++;
  }

  if ((num === 0 && word.includes("y")) || word.endsWith("y")) num++;

  if (word.endsWith("e") && num !== 0) num--;

  const diphthongs = collapse(word, DIPHTHONGS);
  const triphthongs = collapse(diphthongs.rest, TRIPHTHONGS);
  num -= diphthongs.removed + triphthongs.removed;

  if (SILENT_LE.test(word)) num++;

  return num;
}

/**
 * Dictionary-first syllable counter with write-through memoization.
 * A seeded or computed entry never changes for the life of the instance.
 */
export class SyllableEstimator implements SyllableCounter {
  private readonly cache = new Map<string, number>();

  constructor(seed: Iterable<DictionaryEntry> = []) {
    for (const [word, syllables] of seed) {
      this.cache.set(word, syllables);
    }
    logger.debug({ seeded: this.cache.size }, 'SyllableEstimator initialized');
  }

  /** Number of cached words, seeded plus memoized. */
  get size(): number {
    return this.cache.size;
  }

  count(token: string): number {
    const word = normalizeWord(token);

    const known = this.cache.get(word);
    if (known !== undefined) return known;

    // past tense or -es plural of a known word
    if (word.length >= 2) {
      const root = this.cache.get(word.slice(0, -2));
      if (root !== undefined) {
        if (word.endsWith("ed")) return root;
        if (word.endsWith("es")) return root + 1;
      }
    }

    const singular = this.cache.get(word.slice(0, -1));
    if (singular !== undefined && word.endsWith("s")) return singular;

    const num = estimateSyllables(word);
    this.cache.set(word, num);
    logger.trace({ word, syllables: num, cacheSize: this.cache.size }, 'Syllables estimated');
    return num;
  }
}
