/**
 * Machine-readable classification carried by every simulator error.
 */
export type ErrorCode =
  | "VALIDATION_ERROR"
  | "SUSPICIOUS_INPUT"
  | "NOT_FOUND"
  | "ALREADY_LOCKED_OUT"
  | "CAPABILITY_UNAVAILABLE"
  | "LIMIT_EXCEEDED"
  | "RATE_LIMITED";

/**
 * Base class for classified failures. The web server turns these into
 * `{ error, code }` responses with the matching status code.
 */
export abstract class CrackLabError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly statusCode: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Malformed digest or out-of-range parameters. Rejected before any work starts.
 */
export class ValidationError extends CrackLabError {
  readonly code = "VALIDATION_ERROR";
  readonly statusCode = 400;
}

/**
 * Input that looks like a real-world credential hash. Never processed.
 */
export class SuspiciousInputError extends CrackLabError {
  readonly code = "SUSPICIOUS_INPUT";
  readonly statusCode = 422;
}

export class NotFoundError extends CrackLabError {
  readonly code = "NOT_FOUND";
  readonly statusCode = 404;
}

/**
 * Unlock attempted on a device that has used up its attempts.
 */
export class AlreadyLockedOutError extends CrackLabError {
  readonly code = "ALREADY_LOCKED_OUT";
  readonly statusCode = 423;

  constructor(readonly deviceId: string) {
    super(`Device ${deviceId} is locked out after too many failed attempts. Reset it to try again.`);
  }
}

/**
 * The external AI capability is missing, misconfigured or failed to answer.
 */
export class CapabilityUnavailableError extends CrackLabError {
  readonly code = "CAPABILITY_UNAVAILABLE";
  readonly statusCode = 503;
}

/**
 * A requested bound is above the configured safety ceiling.
 */
export class LimitExceededError extends CrackLabError {
  readonly code = "LIMIT_EXCEEDED";
  readonly statusCode = 400;
}

export class RateLimitedError extends CrackLabError {
  readonly code = "RATE_LIMITED";
  readonly statusCode = 429;

  constructor(readonly resetAt: Date) {
    super("Rate limit exceeded. Please try again later.");
  }
}
