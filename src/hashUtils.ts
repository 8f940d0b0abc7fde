import { createHash, timingSafeEqual } from "node:crypto";
import { ValidationError } from "./errors.js";

/**
 * Longest plaintext the simulator will hash.
 */
export const MAX_PLAINTEXT_LENGTH = 128;

const DIGEST_PATTERN = /^[0-9a-f]{64}$/i;
const HEX_PATTERN = /^[0-9a-f]+$/i;

/**
 * Prefixes of modular-crypt formats used by real credential stores.
 */
const SUSPICIOUS_PREFIXES = ["$2a$", "$2b$", "$2y$", "$1$", "$5$", "$6$", "$argon2", "$y$"];

/**
 * Key-derivation scheme names that never appear in a bare hex digest.
 */
const SUSPICIOUS_KEYWORDS = ["pbkdf2", "scrypt", "bcrypt"];

/**
 * Algorithm guess made from the length of a hex string.
 */
export type DigestAlgorithm = "MD5" | "SHA-1" | "SHA-256" | "SHA-512" | "unknown";

/**
 * Outcome of checking a digest supplied by a caller.
 */
export interface DigestValidation {
  isValid: boolean;
  isSuspicious: boolean;
  algorithm: DigestAlgorithm;
  warning?: string;
}

/**
 * Compute the SHA-256 digest of a plaintext as lowercase hex.
 * @throws ValidationError if the plaintext is empty or too long
 */
export function hash(plaintext: string): string {
  if (plaintext.length === 0) {
    throw new ValidationError("Plaintext must not be empty");
  }
  if (plaintext.length > MAX_PLAINTEXT_LENGTH) {
    throw new ValidationError(`Plaintext cannot exceed ${MAX_PLAINTEXT_LENGTH} characters`);
  }
  return createHash("sha256").update(plaintext, "utf8").digest("hex");
}

/**
 * Check whether a plaintext hashes to the given digest.
 * The comparison always looks at every byte.
 * @throws ValidationError if the digest is not a SHA-256 hex string
 */
export function verify(plaintext: string, digest: string): boolean {
  if (!isValidFormat(digest)) {
    throw new ValidationError("Digest must be 64 hexadecimal characters");
  }
  const expected = Buffer.from(digest.toLowerCase(), "hex");
  const actual = Buffer.from(hash(plaintext), "hex");
  return timingSafeEqual(actual, expected);
}

export function isValidFormat(digest: string): boolean {
  return DIGEST_PATTERN.test(digest);
}

/**
 * Detect strings that look like real-world password hashes rather than
 * synthetic SHA-256 digests.
 */
export function isSuspicious(digest: string): boolean {
  const lower = digest.toLowerCase();

  if (SUSPICIOUS_PREFIXES.some((prefix) => lower.startsWith(prefix))) {
    return true;
  }
  // Any "$id$..." modular-crypt shape
  if (/^\$[a-z0-9-]+\$/.test(lower)) {
    return true;
  }
  if (SUSPICIOUS_KEYWORDS.some((keyword) => lower.includes(keyword))) {
    return true;
  }
  return digest.length > MAX_PLAINTEXT_LENGTH;
}

/**
 * Guess the algorithm that produced a hex digest from its length.
 */
export function describeDigest(digest: string): { length: number; algorithm: DigestAlgorithm } {
  const length = digest.length;
  if (!HEX_PATTERN.test(digest)) {
    return { length, algorithm: "unknown" };
  }

  switch (length) {
    case 32:
      return { length, algorithm: "MD5" };
    case 40:
      return { length, algorithm: "SHA-1" };
    case 64:
      return { length, algorithm: "SHA-256" };
    case 128:
      return { length, algorithm: "SHA-512" };
    default:
      return { length, algorithm: "unknown" };
  }
}

/**
 * Validate a caller-supplied digest. Never throws.
 */
export function validateDigest(digest: string): DigestValidation {
  const trimmed = digest.trim();
  const { algorithm } = describeDigest(trimmed);

  if (isSuspicious(trimmed)) {
    return {
      isValid: false,
      isSuspicious: true,
      algorithm,
      warning:
        "This looks like a real-world password hash. Only synthetic SHA-256 digests can be used in the simulator.",
    };
  }

  if (isValidFormat(trimmed)) {
    return { isValid: true, isSuspicious: false, algorithm };
  }

  return {
    isValid: false,
    isSuspicious: false,
    algorithm,
    warning:
      algorithm === "unknown"
        ? "Digest must be 64 hexadecimal characters"
        : `${algorithm} digests are not supported; use a SHA-256 digest`,
  };
}
