import { beforeEach, describe, expect, it, vi } from "vitest";
import { AiAdvisor, type GuessCapability } from "./aiAdvisor.js";
import { AttackLog } from "./attackLog.js";
import { AttackOrchestrator, hybridCandidates, searchCandidates } from "./attackOrchestrator.js";
import { LimitExceededError, SuspiciousInputError, ValidationError } from "./errors.js";
import { hash } from "./hashUtils.js";
import { log } from "./logger.js";

const WORDS = ["dragon", "monkey"];

let attackLog: AttackLog;

function fakeCapability(generate: GuessCapability["generate"]): GuessCapability {
  return { name: "fake-model", generate };
}

function createOrchestrator(
  overrides: { advisor?: AiAdvisor | null; bruteForceMaxLength?: number; bruteForceMaxAttempts?: number } = {},
): AttackOrchestrator {
  return new AttackOrchestrator({
    log,
    attackLog,
    words: WORDS,
    advisor: overrides.advisor ?? null,
    bruteForceMaxLength: overrides.bruteForceMaxLength ?? 6,
    bruteForceMaxAttempts: overrides.bruteForceMaxAttempts ?? 5_000_000,
  });
}

function createAdvisor(capability: GuessCapability, timeoutMs = 1000): AiAdvisor {
  return new AiAdvisor({ capability, log, timeoutMs, maxCandidates: 15 });
}

beforeEach(() => {
  attackLog = new AttackLog();
});

describe("validation", () => {
  it("refuses real-world hash formats before checking the format", async () => {
    const orchestrator = createOrchestrator();

    await expect(
      orchestrator.runAttack({ targetDigest: "$2b$12$abcdefghijklmnopqrstuv", method: "dictionary" }),
    ).rejects.toThrow(SuspiciousInputError);
    expect(attackLog.size).toBe(0);
  });

  it("requires a digest", async () => {
    const orchestrator = createOrchestrator();

    await expect(orchestrator.runAttack({ targetDigest: "  ", method: "dictionary" })).rejects.toThrow(
      "Target digest is required",
    );
  });

  it("rejects malformed digests", async () => {
    const orchestrator = createOrchestrator();

    await expect(orchestrator.runAttack({ targetDigest: "abc123", method: "rule_based" })).rejects.toThrow(
      ValidationError,
    );
    expect(attackLog.size).toBe(0);
  });

  it("rejects brute force lengths above the ceiling", async () => {
    const orchestrator = createOrchestrator({ bruteForceMaxLength: 6 });

    await expect(
      orchestrator.runAttack({ targetDigest: hash("abc"), method: "brute_force", maxLength: 7 }),
    ).rejects.toThrow(LimitExceededError);
    expect(attackLog.size).toBe(0);
  });

  it("rejects a zero brute force length", async () => {
    const orchestrator = createOrchestrator();

    await expect(
      orchestrator.runAttack({ targetDigest: hash("abc"), method: "brute_force", maxLength: 0 }),
    ).rejects.toThrow("Max length must be a positive integer");
  });

  it("normalizes uppercase digests", async () => {
    const orchestrator = createOrchestrator();
    const result = await orchestrator.runAttack({
      targetDigest: hash("monkey").toUpperCase(),
      method: "dictionary",
    });

    expect(result.targetDigest).toBe(hash("monkey"));
    expect(result.success).toBe(true);
  });
});

describe("dictionary", () => {
  it("finds a variation of a listed word", async () => {
    const orchestrator = createOrchestrator();
    const result = await orchestrator.runAttack({ targetDigest: hash("dragon!"), method: "dictionary" });

    expect(result.success).toBe(true);
    expect(result.plaintext).toBe("dragon!");
    expect(result.attempts).toBe(17);
    expect(result.stats.wordsLoaded).toBe(2);
    expect(result.stats.candidateCount).toBe(60);
    expect(result.error).toBeNull();
  });

  it("tries every candidate before failing", async () => {
    const orchestrator = createOrchestrator();
    const result = await orchestrator.runAttack({ targetDigest: hash("zebra"), method: "dictionary" });

    expect(result.success).toBe(false);
    expect(result.plaintext).toBeNull();
    expect(result.attempts).toBe(60);
    expect(result.limitReached).toBe(false);
  });
});

describe("dictionary with long words", () => {
  it("counts exactly the candidates it reports", async () => {
    const orchestrator = new AttackOrchestrator({
      log,
      attackLog,
      words: ["x".repeat(122), "y".repeat(125)],
      advisor: null,
      bruteForceMaxLength: 6,
      bruteForceMaxAttempts: 5_000_000,
    });

    const result = await orchestrator.runAttack({ targetDigest: hash("zebra"), method: "dictionary" });

    expect(result.success).toBe(false);
    expect(result.stats.wordsLoaded).toBe(1);
    expect(result.stats.candidateCount).toBe(30);
    expect(result.attempts).toBe(result.stats.candidateCount);
  });
});

describe("rule_based", () => {
  it("reaches a capitalized base word on the 11th attempt", async () => {
    const orchestrator = createOrchestrator();
    const result = await orchestrator.runAttack({ targetDigest: hash("Admin"), method: "rule_based" });

    expect(result.success).toBe(true);
    expect(result.attempts).toBe(11);
    expect(result.stats.rulesUsed).toBe(11);
  });
});

describe("brute_force", () => {
  it("finds a short lowercase plaintext", async () => {
    const orchestrator = createOrchestrator();
    const result = await orchestrator.runAttack({
      targetDigest: hash("ab"),
      method: "brute_force",
      charset: "lowercase",
      maxLength: 2,
    });

    expect(result.success).toBe(true);
    expect(result.plaintext).toBe("ab");
    expect(result.attempts).toBe(28);
    expect(result.stats).toMatchObject({
      charset: "lowercase",
      charsetSize: 26,
      maxLength: 2,
      searchSpace: 702,
    });
  });

  it("defaults to alphanumeric up to four characters", async () => {
    const orchestrator = createOrchestrator();
    const result = await orchestrator.runAttack({ targetDigest: hash("b7k"), method: "brute_force" });

    expect(result.success).toBe(true);
    expect(result.attempts).toBe(3827);
    expect(result.stats.charset).toBe("alphanumeric");
    expect(result.stats.maxLength).toBe(4);
  });

  it("stops at the attempt ceiling", async () => {
    const orchestrator = createOrchestrator({ bruteForceMaxAttempts: 100 });
    const result = await orchestrator.runAttack({
      targetDigest: hash("zzz"),
      method: "brute_force",
      charset: "lowercase",
      maxLength: 3,
    });

    expect(result.success).toBe(false);
    expect(result.attempts).toBe(100);
    expect(result.limitReached).toBe(true);
  });

  it("fails after exhausting the search space", async () => {
    const orchestrator = createOrchestrator();
    const result = await orchestrator.runAttack({
      targetDigest: hash("abc"),
      method: "brute_force",
      charset: "digits",
      maxLength: 2,
    });

    expect(result.success).toBe(false);
    expect(result.attempts).toBe(110);
    expect(result.limitReached).toBe(false);
  });
});

describe("ai", () => {
  it("reports the capability as unavailable without an advisor", async () => {
    const orchestrator = createOrchestrator();
    const result = await orchestrator.runAttack({ targetDigest: hash("abc"), method: "ai" });

    expect(result.success).toBe(false);
    expect(result.attempts).toBe(0);
    expect(result.error).toEqual({
      code: "CAPABILITY_UNAVAILABLE",
      message: "AI advisor is not available. Configure an API key to enable it.",
    });
    expect(attackLog.size).toBe(1);
  });

  it("verifies the advisor's candidates locally", async () => {
    const generate = vi.fn(async () =>
      JSON.stringify({ candidates: ["sunshine", "dragon2024"], rationale: "Pet names", patterns: [] }),
    );
    const orchestrator = createOrchestrator({ advisor: createAdvisor(fakeCapability(generate)) });

    const result = await orchestrator.runAttack({
      targetDigest: hash("dragon2024"),
      method: "ai",
      context: "likes dragons",
    });

    expect(result.success).toBe(true);
    expect(result.attempts).toBe(2);
    expect(result.stats).toMatchObject({
      aiModel: "fake-model",
      aiRationale: "Pet names",
      aiCandidates: 2,
    });
    expect(generate).toHaveBeenCalledOnce();
  });

  it("falls back to context words after the advisor's guesses", async () => {
    const capability = fakeCapability(async () => "nope");
    const orchestrator = createOrchestrator({ advisor: createAdvisor(capability) });

    const result = await orchestrator.runAttack({
      targetDigest: hash("fluffy123"),
      method: "ai",
      context: "Fluffy cat",
    });

    expect(result.success).toBe(true);
    expect(result.attempts).toBe(5);
  });

  it("turns an advisor failure into a classified result", async () => {
    const capability = fakeCapability(async () => {
      throw new Error("quota exceeded");
    });
    const orchestrator = createOrchestrator({ advisor: createAdvisor(capability) });

    const result = await orchestrator.runAttack({ targetDigest: hash("abc"), method: "ai" });

    expect(result.success).toBe(false);
    expect(result.attempts).toBe(0);
    expect(result.error).toEqual({
      code: "CAPABILITY_UNAVAILABLE",
      message: "AI request failed: quota exceeded",
    });
    expect(attackLog.size).toBe(1);
  });

  it("turns an advisor timeout into a classified result", async () => {
    const capability = fakeCapability(() => new Promise<string>(() => {}));
    const orchestrator = createOrchestrator({ advisor: createAdvisor(capability, 20) });

    const result = await orchestrator.runAttack({ targetDigest: hash("abc"), method: "ai" });

    expect(result.success).toBe(false);
    expect(result.error?.message).toBe("AI request failed: AI request timed out after 20ms");
  });
});

describe("results", () => {
  it("are frozen and carry a timestamp and id", async () => {
    const orchestrator = createOrchestrator();
    const result = await orchestrator.runAttack({ targetDigest: hash("monkey"), method: "dictionary" });

    expect(Object.isFrozen(result)).toBe(true);
    expect(result.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(Number.isNaN(Date.parse(result.timestamp))).toBe(false);
    expect(result.elapsedMs).toBeGreaterThanOrEqual(0);
  });

  it("are aggregated by method", async () => {
    const orchestrator = createOrchestrator();
    await orchestrator.runAttack({ targetDigest: hash("dragon!"), method: "dictionary" });
    await orchestrator.runAttack({ targetDigest: hash("zebra"), method: "dictionary" });
    await orchestrator.runAttack({ targetDigest: hash("Admin"), method: "rule_based" });

    const stats = orchestrator.statistics();
    expect(stats.totalRuns).toBe(3);
    expect(stats.totalSuccesses).toBe(2);
    expect(stats.totalAttempts).toBe(17 + 60 + 11);
    expect(stats.methods.dictionary).toEqual({ runs: 2, successes: 1, attempts: 77, successRate: 0.5 });
    expect(stats.methods.rule_based).toEqual({ runs: 1, successes: 1, attempts: 11, successRate: 1 });
    expect(stats.methods.brute_force).toBeUndefined();
  });
});

describe("searchCandidates", () => {
  it("skips empty and overlong candidates without counting them", () => {
    const outcome = searchCandidates(["", "x".repeat(129), "a", "b"], hash("b"));

    expect(outcome).toEqual({ plaintext: "b", attempts: 2, limitReached: false });
  });

  it("does not report the ceiling when the sequence ends exactly at it", () => {
    const outcome = searchCandidates(["a", "b"], hash("c"), 2);

    expect(outcome).toEqual({ plaintext: null, attempts: 2, limitReached: false });
  });
});

describe("hybridCandidates", () => {
  it("expands context words, then patterns, then common passwords", () => {
    expect(hybridCandidates("Rex is 5", ["2019", "xy"])).toEqual([
      "rex",
      "Rex",
      "REX",
      "rex123",
      "123rex",
      "rex!",
      "!rex",
      "2019",
      "password",
      "admin",
      "123456",
      "qwerty",
      "letmein",
    ]);
  });
});
