import { type GenerativeModel, GoogleGenerativeAI } from "@google/generative-ai";
import type { Logger } from "pino";
import { z } from "zod";
import { MAX_PLAINTEXT_LENGTH } from "./hashUtils.js";

/**
 * An external text-generation capability. Given a prompt, it answers with
 * free text. Implementations must honour the abort signal.
 */
export interface GuessCapability {
  readonly name: string;
  generate(prompt: string, signal: AbortSignal): Promise<string>;
}

/**
 * Gemini-backed capability using the @google/generative-ai SDK.
 */
export class GeminiCapability implements GuessCapability {
  readonly name: string;
  private readonly model: GenerativeModel;

  constructor(apiKey: string, modelName: string) {
    const genAI = new GoogleGenerativeAI(apiKey);
    this.model = genAI.getGenerativeModel({ model: modelName });
    this.name = modelName;
  }

  async generate(prompt: string, signal: AbortSignal): Promise<string> {
    const result = await this.model.generateContent(prompt, { signal });
    return result.response.text();
  }
}

/**
 * Structured guesses returned by the advisor.
 */
export interface AdvisorSuggestion {
  ok: true;
  candidates: string[];
  rationale: string;
  patterns: string[];
}

/**
 * The advisor could not produce usable guesses. Never thrown.
 */
export interface AdvisorFailure {
  ok: false;
  candidates: [];
  reason: string;
}

export type AdvisorOutcome = AdvisorSuggestion | AdvisorFailure;

const AdvisorResponseSchema = z.object({
  candidates: z.array(z.string()).default([]),
  rationale: z.string().default(""),
  patterns: z.array(z.string()).default([]),
});

type ParsedResponse = z.infer<typeof AdvisorResponseSchema>;

/**
 * Options for the AI guess advisor.
 */
export interface AiAdvisorOptions {
  capability: GuessCapability;
  log: Logger;
  timeoutMs: number;
  maxCandidates: number;
}

class AdvisorTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`AI request timed out after ${timeoutMs}ms`);
    this.name = "AdvisorTimeoutError";
  }
}

/**
 * Build the prompt sent to the capability for a target digest and
 * optional free-text context.
 */
export function buildPrompt(targetDigest: string, context: string, maxCandidates: number): string {
  return [
    "You are helping with an educational password-cracking simulation.",
    "The digest below is synthetic SHA-256 test data, not a real credential.",
    "",
    `Digest: ${targetDigest}`,
    `Context: ${context || "No specific context provided"}`,
    "",
    `Suggest up to ${maxCandidates} likely plaintext candidates, considering common`,
    "patterns, context words, number and symbol variations and keyboard walks.",
    "",
    "Respond with JSON only, in this shape:",
    '{"candidates": ["guess1", "guess2"], "rationale": "why", "patterns": ["pattern"]}',
  ].join("\n");
}

function stripCodeFence(text: string): string {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(text);
  return (fenced?.[1] ?? text).trim();
}

function tryParseJson(text: string): ParsedResponse | null {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return null;
  }
  const parsed = AdvisorResponseSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

function cleanCandidates(values: readonly string[], maxCandidates: number): string[] {
  const seen = new Set<string>();
  for (const value of values) {
    const candidate = value.trim();
    if (candidate.length === 0 || candidate.length > MAX_PLAINTEXT_LENGTH) {
      continue;
    }
    seen.add(candidate);
    if (seen.size >= maxCandidates) {
      break;
    }
  }
  return [...seen];
}

/**
 * Parse the capability's free-text answer. Accept the requested JSON shape
 * (optionally inside a fenced block); otherwise treat each non-empty line
 * without whitespace as a candidate, after stripping list markers and quotes.
 */
export function parseAdvisorResponse(
  text: string,
  maxCandidates: number,
): Omit<AdvisorSuggestion, "ok"> {
  const body = stripCodeFence(text);
  const json = tryParseJson(body);

  if (json) {
    return {
      candidates: cleanCandidates(json.candidates, maxCandidates),
      rationale: json.rationale.trim(),
      patterns: cleanCandidates(json.patterns, maxCandidates),
    };
  }

  const lines = body
    .split(/\r?\n/)
    .map((line) =>
      line
        .trim()
        .replace(/^(?:[-*•]|\d+[.)])\s+/, "")
        .replace(/^["'`]+|["'`,]+$/g, ""),
    )
    .filter((line) => line.length > 0 && !/\s/.test(line));

  return { candidates: cleanCandidates(lines, maxCandidates), rationale: "", patterns: [] };
}

/**
 * Ask an external capability for plaintext guesses. Every failure mode
 * (timeout, rejected request, unusable answer) is reported as an
 * `AdvisorFailure` rather than thrown.
 */
export class AiAdvisor {
  private readonly capability: GuessCapability;
  private readonly log: Logger;
  private readonly timeoutMs: number;
  private readonly maxCandidates: number;

  constructor(options: AiAdvisorOptions) {
    this.capability = options.capability;
    this.log = options.log.child({ component: "AiAdvisor" });
    this.timeoutMs = options.timeoutMs;
    this.maxCandidates = options.maxCandidates;
  }

  get capabilityName(): string {
    return this.capability.name;
  }

  async suggest(targetDigest: string, context: string): Promise<AdvisorOutcome> {
    const prompt = buildPrompt(targetDigest, context, this.maxCandidates);

    let text: string;
    try {
      text = await this.generateWithTimeout(prompt);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this.log.warn({ err, targetDigest }, "AI capability request failed");
      return { ok: false, candidates: [], reason: `AI request failed: ${reason}` };
    }

    const parsed = parseAdvisorResponse(text, this.maxCandidates);
    if (parsed.candidates.length === 0) {
      this.log.warn({ targetDigest, length: text.length }, "AI returned no usable candidates");
      return { ok: false, candidates: [], reason: "AI returned no usable candidates" };
    }

    this.log.debug(
      { targetDigest, candidates: parsed.candidates.length },
      "AI suggested candidates",
    );
    return { ok: true, ...parsed };
  }

  private async generateWithTimeout(prompt: string): Promise<string> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        // Reject before aborting so the timeout wins the race
        reject(new AdvisorTimeoutError(this.timeoutMs));
        controller.abort();
      }, this.timeoutMs);
    });

    try {
      return await Promise.race([this.capability.generate(prompt, controller.signal), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
