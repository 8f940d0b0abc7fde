import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import type { AiAdvisor } from "./aiAdvisor.js";
import type { AttackLog, AttackStatistics } from "./attackLog.js";
import {
  CapabilityUnavailableError,
  type ErrorCode,
  SuspiciousInputError,
  ValidationError,
} from "./errors.js";
import {
  assertMaxLength,
  bruteForceCandidates,
  CHARSETS,
  type CharsetName,
  DEFAULT_CHARSET,
  DEFAULT_MAX_LENGTH,
  searchSpaceSize,
} from "./generators/bruteForce.js";
import {
  CANDIDATES_PER_WORD,
  capitalize,
  dictionaryCandidates,
  usableWords,
} from "./generators/dictionary.js";
import { RULE_NAMES, ruleBasedCandidates } from "./generators/ruleBased.js";
import { isSuspicious, isValidFormat, MAX_PLAINTEXT_LENGTH, verify } from "./hashUtils.js";
import type { AttackMethod, AttackRequest } from "./shared/types.js";

/**
 * Common passwords appended after the AI's own guesses.
 */
const HYBRID_COMMON = ["password", "admin", "123456", "qwerty", "letmein"];

/**
 * Method-specific figures attached to a result.
 */
export interface AttackStats {
  attemptsPerSecond: number;
  wordsLoaded?: number;
  candidateCount?: number;
  rulesUsed?: number;
  charset?: CharsetName;
  charsetSize?: number;
  maxLength?: number;
  searchSpace?: number;
  aiModel?: string;
  aiRationale?: string;
  aiCandidates?: number;
  aiPatterns?: string[];
}

/**
 * Outcome of one attack run. `plaintext` is present only on success and must
 * be masked before it leaves the process.
 */
export interface AttackResult {
  readonly id: string;
  readonly success: boolean;
  readonly method: AttackMethod;
  readonly targetDigest: string;
  readonly plaintext: string | null;
  readonly attempts: number;
  readonly elapsedMs: number;
  readonly timestamp: string;
  readonly limitReached: boolean;
  readonly error: { code: ErrorCode; message: string } | null;
  readonly stats: AttackStats;
}

/**
 * Dependencies and limits for the attack orchestrator.
 */
export interface AttackOrchestratorOptions {
  log: Logger;
  attackLog: AttackLog;
  words: readonly string[];
  advisor: AiAdvisor | null;
  bruteForceMaxLength: number;
  bruteForceMaxAttempts: number;
}

interface SearchOutcome {
  plaintext: string | null;
  attempts: number;
  limitReached: boolean;
}

/**
 * Body of a run before timing and bookkeeping are added.
 */
interface RunOutcome extends SearchOutcome {
  error?: { code: ErrorCode; message: string };
  stats: Omit<AttackStats, "attemptsPerSecond">;
}

/**
 * Verify candidates in order until one matches, the sequence ends or the
 * attempt ceiling is reached.
 */
export function searchCandidates(
  candidates: Iterable<string>,
  targetDigest: string,
  maxAttempts = Number.POSITIVE_INFINITY,
): SearchOutcome {
  let attempts = 0;
  for (const candidate of candidates) {
    if (candidate.length === 0 || candidate.length > MAX_PLAINTEXT_LENGTH) {
      continue;
    }
    if (attempts >= maxAttempts) {
      return { plaintext: null, attempts, limitReached: true };
    }
    attempts++;
    if (verify(candidate, targetDigest)) {
      return { plaintext: candidate, attempts, limitReached: false };
    }
  }
  return { plaintext: null, attempts, limitReached: false };
}

/**
 * AI failures are reported on the result rather than thrown.
 */
function unavailable(message: string): { code: ErrorCode; message: string } {
  const error = new CapabilityUnavailableError(message);
  return { code: error.code, message: error.message };
}

/**
 * Candidates tried after the AI's own suggestions: context words with common
 * variants, the patterns the AI reported, then a few common passwords.
 */
export function hybridCandidates(context: string, patterns: readonly string[]): string[] {
  const candidates: string[] = [];

  for (const word of context.toLowerCase().split(/\s+/)) {
    if (word.length >= 3) {
      candidates.push(
        word,
        capitalize(word),
        word.toUpperCase(),
        `${word}123`,
        `123${word}`,
        `${word}!`,
        `!${word}`,
      );
    }
  }
  for (const pattern of patterns) {
    if (pattern.length >= 3) {
      candidates.push(pattern);
    }
  }
  candidates.push(...HYBRID_COMMON);

  return candidates;
}

/**
 * Runs attacks against synthetic digests and records each result.
 */
export class AttackOrchestrator {
  private readonly log: Logger;
  private readonly attackLog: AttackLog;
  private readonly words: readonly string[];
  private readonly advisor: AiAdvisor | null;
  private readonly bruteForceMaxLength: number;
  private readonly bruteForceMaxAttempts: number;

  constructor(options: AttackOrchestratorOptions) {
    this.log = options.log.child({ component: "AttackOrchestrator" });
    this.attackLog = options.attackLog;
    this.words = usableWords(options.words);
    this.advisor = options.advisor;
    this.bruteForceMaxLength = options.bruteForceMaxLength;
    this.bruteForceMaxAttempts = options.bruteForceMaxAttempts;
  }

  get aiAvailable(): boolean {
    return this.advisor !== null;
  }

  get wordCount(): number {
    return this.words.length;
  }

  /**
   * Validate the request, run the selected method and record the result.
   * @throws ValidationError, SuspiciousInputError or LimitExceededError
   *   before any candidate is tried
   */
  async runAttack(request: AttackRequest): Promise<AttackResult> {
    const targetDigest = this.validate(request);
    const started = performance.now();

    this.log.info({ method: request.method, targetDigest }, "Starting attack");
    const outcome = await this.execute(request, targetDigest);

    const elapsedMs = performance.now() - started;
    const result: AttackResult = Object.freeze({
      id: randomUUID(),
      success: outcome.plaintext !== null,
      method: request.method,
      targetDigest,
      plaintext: outcome.plaintext,
      attempts: outcome.attempts,
      elapsedMs,
      timestamp: new Date().toISOString(),
      limitReached: outcome.limitReached,
      error: outcome.error ?? null,
      stats: {
        ...outcome.stats,
        attemptsPerSecond: elapsedMs > 0 ? Math.round((outcome.attempts / elapsedMs) * 1000) : 0,
      },
    });

    this.attackLog.append(result);
    this.log.info(
      {
        method: result.method,
        success: result.success,
        attempts: result.attempts,
        elapsedMs: Math.round(elapsedMs),
        limitReached: result.limitReached,
        error: result.error?.code,
      },
      "Attack finished",
    );

    return result;
  }

  statistics(): AttackStatistics {
    return this.attackLog.statistics();
  }

  /**
   * Check the digest and parameters, returning the normalized digest.
   */
  private validate(request: AttackRequest): string {
    const digest = request.targetDigest.trim();

    if (digest.length === 0) {
      throw new ValidationError("Target digest is required");
    }
    if (isSuspicious(digest)) {
      this.log.warn({ method: request.method }, "Refused attack on a real-world hash format");
      throw new SuspiciousInputError(
        "This looks like a real-world password hash. The simulator only works on synthetic SHA-256 digests.",
      );
    }
    if (!isValidFormat(digest)) {
      throw new ValidationError("Target digest must be 64 hexadecimal characters (SHA-256)");
    }
    if (request.method === "brute_force") {
      assertMaxLength(this.maxLengthFor(request), this.bruteForceMaxLength);
    }

    return digest.toLowerCase();
  }

  private maxLengthFor(request: AttackRequest): number {
    return request.maxLength ?? Math.min(DEFAULT_MAX_LENGTH, this.bruteForceMaxLength);
  }

  private async execute(request: AttackRequest, targetDigest: string): Promise<RunOutcome> {
    switch (request.method) {
      case "dictionary":
        return {
          ...searchCandidates(dictionaryCandidates(this.words), targetDigest),
          stats: {
            wordsLoaded: this.words.length,
            candidateCount: this.words.length * CANDIDATES_PER_WORD,
          },
        };

      case "rule_based":
        return {
          ...searchCandidates(ruleBasedCandidates(), targetDigest),
          stats: { rulesUsed: RULE_NAMES.length },
        };

      case "brute_force": {
        const charset = request.charset ?? DEFAULT_CHARSET;
        const maxLength = this.maxLengthFor(request);
        const charsetSize = CHARSETS[charset].length;
        return {
          ...searchCandidates(
            bruteForceCandidates({ charset, maxLength }),
            targetDigest,
            this.bruteForceMaxAttempts,
          ),
          stats: {
            charset,
            charsetSize,
            maxLength,
            searchSpace: searchSpaceSize(charsetSize, maxLength),
          },
        };
      }

      case "ai":
        return this.executeAi(targetDigest, request.context ?? "");
    }
  }

  private async executeAi(targetDigest: string, context: string): Promise<RunOutcome> {
    if (!this.advisor) {
      return {
        plaintext: null,
        attempts: 0,
        limitReached: false,
        error: unavailable("AI advisor is not available. Configure an API key to enable it."),
        stats: {},
      };
    }

    const outcome = await this.advisor.suggest(targetDigest, context);
    if (!outcome.ok) {
      return {
        plaintext: null,
        attempts: 0,
        limitReached: false,
        error: unavailable(outcome.reason),
        stats: { aiModel: this.advisor.capabilityName, aiCandidates: 0 },
      };
    }

    const candidates = new Set([
      ...outcome.candidates,
      ...hybridCandidates(context, outcome.patterns),
    ]);

    return {
      ...searchCandidates(candidates, targetDigest),
      stats: {
        aiModel: this.advisor.capabilityName,
        aiRationale: outcome.rationale,
        aiCandidates: outcome.candidates.length,
        aiPatterns: outcome.patterns,
      },
    };
  }
}
