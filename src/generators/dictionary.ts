import { existsSync, readFileSync } from "node:fs";
import type { Logger } from "pino";
import { MAX_PLAINTEXT_LENGTH } from "../hashUtils.js";

/**
 * Words used when the configured wordlist file is missing.
 */
export const FALLBACK_WORDS = ["password", "123456", "qwerty", "admin", "letmein", "welcome"];

const NUMBER_AFFIXES = ["123", "1234", "12345", "123456", "1", "2", "3"];
const SYMBOL_AFFIXES = ["!", "@", "#", "$", "%", "&", "*"];

/**
 * Number of candidates produced for every word in the list.
 */
export const CANDIDATES_PER_WORD = 2 + 2 * NUMBER_AFFIXES.length + 2 * SYMBOL_AFFIXES.length;

/**
 * Longest base word whose every variant still fits in a plaintext.
 */
export const MAX_WORD_LENGTH =
  MAX_PLAINTEXT_LENGTH - Math.max(...[...NUMBER_AFFIXES, ...SYMBOL_AFFIXES].map((affix) => affix.length));

/**
 * Drop words that are empty or too long to take an affix, so the attempt
 * count always matches `words.length * CANDIDATES_PER_WORD`.
 */
export function usableWords(words: readonly string[]): string[] {
  return words.filter((word) => word.length > 0 && word.length <= MAX_WORD_LENGTH);
}

export function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

/**
 * Read a wordlist with one word per line, skipping blank lines and words
 * longer than `MAX_WORD_LENGTH`.
 * Fall back to a short built-in list when the file does not exist.
 */
export function loadWordlist(path: string, log: Logger): string[] {
  if (!existsSync(path)) {
    log.warn({ path }, "Wordlist not found, using built-in fallback words");
    return [...FALLBACK_WORDS];
  }

  const words = usableWords(
    readFileSync(path, "utf-8")
      .split(/\r?\n/)
      .map((line) => line.trim()),
  );

  log.debug({ path, count: words.length }, "Loaded wordlist");
  return words;
}

/**
 * Yield each word followed by its common variations:
 * capitalized, number suffix and prefix, symbol suffix and prefix.
 * Duplicates are kept so the sequence length is always
 * `words.length * CANDIDATES_PER_WORD`.
 */
export function* dictionaryCandidates(words: readonly string[]): Generator<string> {
  for (const word of words) {
    yield word;
    yield capitalize(word);
    for (const affix of NUMBER_AFFIXES) {
      yield word + affix;
      yield affix + word;
    }
    for (const affix of SYMBOL_AFFIXES) {
      yield word + affix;
      yield affix + word;
    }
  }
}
