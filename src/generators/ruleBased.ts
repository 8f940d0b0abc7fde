import { capitalize } from "./dictionary.js";

/**
 * Base words the word rules are applied to, in order.
 */
export const RULE_BASE_WORDS = ["password", "admin", "user", "test", "demo", "guest", "john", "jane"];

const LEET_MAP: Record<string, string> = { a: "4", e: "3", i: "1", o: "0", s: "5", t: "7" };
const YEARS = ["1980", "1990", "2020", "2021", "2022", "2023", "2024", "2025"];
const SYMBOLS = ["!", "@", "#", "$", "%"];
const KEYBOARD_ROWS = ["qwertyuiop", "asdfghjkl", "zxcvbnm"];
const NUMBER_ROW = "1234567890";
const MONTHS = Array.from({ length: 12 }, (_, i) => String(i + 1).padStart(2, "0"));
const DAYS = Array.from({ length: 31 }, (_, i) => String(i + 1).padStart(2, "0"));

/**
 * A transformation that turns one base word into zero or more candidates.
 */
interface WordRule {
  name: string;
  apply: (word: string) => Iterable<string>;
}

/**
 * A rule that produces candidates without a base word.
 */
interface PatternRule {
  name: string;
  produce: () => Iterable<string>;
}

export function leetspeak(word: string): string {
  return Array.from(word, (ch) => LEET_MAP[ch] ?? ch).join("");
}

function* range(count: number): Generator<number> {
  for (let n = 0; n < count; n++) {
    yield n;
  }
}

const WORD_RULES: readonly WordRule[] = [
  { name: "identity", apply: (word) => [word] },
  { name: "case", apply: (word) => [capitalize(word), word.toUpperCase()] },
  { name: "leetspeak", apply: (word) => [leetspeak(word), capitalize(leetspeak(word))] },
  {
    name: "number-suffix",
    apply: function* (word) {
      for (const n of range(100)) {
        yield `${word}${n}`;
      }
    },
  },
  {
    name: "number-prefix",
    apply: function* (word) {
      for (const n of range(100)) {
        yield `${n}${word}`;
      }
    },
  },
  {
    name: "year-suffix",
    apply: function* (word) {
      for (const year of YEARS) {
        yield word + year;
        yield capitalize(word) + year;
      }
    },
  },
  {
    name: "symbol-affix",
    apply: function* (word) {
      for (const symbol of SYMBOLS) {
        yield word + symbol;
        yield symbol + word;
      }
    },
  },
];

const PATTERN_RULES: readonly PatternRule[] = [
  {
    name: "sequential-digits",
    produce: function* () {
      for (let length = 4; length <= 9; length++) {
        for (let start = 0; start + length <= 10; start++) {
          yield Array.from({ length }, (_, i) => String(start + i)).join("");
        }
      }
    },
  },
  {
    name: "repeated-characters",
    produce: function* () {
      for (const ch of ["1", "2", "3", "a", "b", "c"]) {
        for (let length = 4; length <= 8; length++) {
          yield ch.repeat(length);
        }
      }
    },
  },
  {
    name: "keyboard-walks",
    produce: function* () {
      for (const row of KEYBOARD_ROWS) {
        for (let length = 4; length <= row.length; length++) {
          for (let start = 0; start + length <= row.length; start++) {
            const walk = row.slice(start, start + length);
            yield walk;
            yield Array.from(walk).reverse().join("");
          }
        }
      }
      for (let length = 4; length <= 6; length++) {
        for (let start = 0; start + length <= NUMBER_ROW.length; start++) {
          yield NUMBER_ROW.slice(start, start + length);
        }
      }
    },
  },
  {
    name: "dates",
    produce: function* () {
      for (const year of YEARS) {
        yield year;
        for (const month of MONTHS) {
          yield month + year;
          yield year + month;
          for (const day of DAYS) {
            yield month + day + year;
            yield year + month + day;
          }
        }
      }
    },
  },
];

/**
 * Names of all rules in the order they are applied.
 */
export const RULE_NAMES: readonly string[] = [
  ...WORD_RULES.map((rule) => rule.name),
  ...PATTERN_RULES.map((rule) => rule.name),
];

/**
 * Yield rule-based candidates. Ordering is rule-major, word-minor: every
 * word rule runs over all base words before the next rule starts, and the
 * word-independent pattern rules follow in their fixed order.
 */
export function* ruleBasedCandidates(
  words: readonly string[] = RULE_BASE_WORDS,
): Generator<string> {
  for (const rule of WORD_RULES) {
    for (const word of words) {
      yield* rule.apply(word);
    }
  }
  for (const rule of PATTERN_RULES) {
    yield* rule.produce();
  }
}
