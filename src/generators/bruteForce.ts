import { LimitExceededError, ValidationError } from "../errors.js";

const LOWERCASE = "abcdefghijklmnopqrstuvwxyz";
const UPPERCASE = "ABCDEFGHIJKLMNOPQRSTUVWXYZ";
const DIGITS = "0123456789";

export const CHARSET_NAMES = [
  "lowercase",
  "uppercase",
  "digits",
  "alphanumeric",
  "alpha",
  "full",
] as const;

export type CharsetName = (typeof CHARSET_NAMES)[number];

/**
 * Named alphabets a brute-force run can enumerate.
 */
export const CHARSETS: Record<CharsetName, string> = {
  lowercase: LOWERCASE,
  uppercase: UPPERCASE,
  digits: DIGITS,
  alphanumeric: LOWERCASE + DIGITS,
  alpha: LOWERCASE + UPPERCASE,
  full: LOWERCASE + UPPERCASE + DIGITS,
};

export const DEFAULT_CHARSET: CharsetName = "alphanumeric";

export const DEFAULT_MAX_LENGTH = 4;

export interface BruteForceParams {
  charset: CharsetName;
  maxLength: number;
}

/**
 * Reject a maximum length that is not a positive integer or that is above
 * the configured ceiling.
 */
export function assertMaxLength(maxLength: number, ceiling: number): void {
  if (!Number.isInteger(maxLength) || maxLength < 1) {
    throw new ValidationError("Max length must be a positive integer");
  }
  if (maxLength > ceiling) {
    throw new LimitExceededError(`Max length must be between 1 and ${ceiling}`);
  }
}

/**
 * Total number of strings of length 1..maxLength over an alphabet.
 */
export function searchSpaceSize(alphabetSize: number, maxLength: number): number {
  let total = 0;
  for (let length = 1; length <= maxLength; length++) {
    total += alphabetSize ** length;
  }
  return total;
}

/**
 * Enumerate every string of length 1..maxLength over the charset in
 * odometer order: shorter strings first, the rightmost position cycling
 * fastest and carrying left when it wraps.
 */
export function* bruteForceCandidates(params: BruteForceParams): Generator<string> {
  const alphabet = CHARSETS[params.charset];
  const base = alphabet.length;

  for (let length = 1; length <= params.maxLength; length++) {
    const wheels = new Array<number>(length).fill(0);

    while (true) {
      yield wheels.map((wheel) => alphabet.charAt(wheel)).join("");

      let position = length - 1;
      while (position >= 0) {
        const next = (wheels[position] ?? 0) + 1;
        if (next < base) {
          wheels[position] = next;
          break;
        }
        wheels[position] = 0;
        position--;
      }
      if (position < 0) {
        break;
      }
    }
  }
}
