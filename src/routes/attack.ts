import type { FastifyInstance } from "fastify";
import type { Logger } from "pino";
import type { AttackOrchestrator, AttackResult } from "../attackOrchestrator.js";
import { RateLimitedError } from "../errors.js";
import { hash, validateDigest } from "../hashUtils.js";
import type { RateLimiter } from "../rateLimiter.js";
import type { SampleDigest } from "../samples.js";
import {
  AttackRequestSchema,
  GenerateHashRequestSchema,
  ValidateHashRequestSchema,
} from "../shared/types.js";

/**
 * Dependencies required for hashing and attack routes.
 */
export interface AttackRoutesDependencies {
  orchestrator: AttackOrchestrator;
  samples: readonly SampleDigest[];
  rateLimiter: RateLimiter;
  log: Logger;
}

/**
 * Wire form of an attack result: the recovered plaintext is replaced by a
 * mask of the same length.
 */
export type AttackResponse = Omit<AttackResult, "plaintext"> & { maskedPlaintext: string | null };

export function maskPlaintext(plaintext: string): string {
  return "*".repeat(plaintext.length);
}

export function toAttackResponse(result: AttackResult): AttackResponse {
  const { plaintext, ...rest } = result;
  return { ...rest, maskedPlaintext: plaintext === null ? null : maskPlaintext(plaintext) };
}

/**
 * Register sample, hashing and attack routes.
 */
export function registerAttackRoutes(app: FastifyInstance, deps: AttackRoutesDependencies): void {
  const { orchestrator, samples, rateLimiter, log } = deps;

  /**
   * GET /api/samples
   * List the precomputed synthetic digests.
   */
  app.get("/api/samples", async (_request, reply) => {
    return reply.send({ samples });
  });

  /**
   * POST /api/generate-hash
   * Hash a plaintext chosen by the user.
   */
  app.post("/api/generate-hash", async (request, reply) => {
    const { plaintext } = GenerateHashRequestSchema.parse(request.body);
    const digest = hash(plaintext);
    return reply.send({ digest, algorithm: "SHA-256", length: plaintext.length });
  });

  /**
   * POST /api/validate-hash
   * Check whether a digest can be used as an attack target.
   */
  app.post("/api/validate-hash", async (request, reply) => {
    const { digest } = ValidateHashRequestSchema.parse(request.body);
    return reply.send(validateDigest(digest));
  });

  /**
   * POST /api/attack
   * Run one attack against a synthetic digest. Rate limited per client address.
   */
  app.post("/api/attack", async (request, reply) => {
    const body = AttackRequestSchema.parse(request.body);

    const rateLimitResult = rateLimiter.consume(request.ip);
    if (!rateLimitResult.allowed) {
      log.info({ ip: request.ip, method: body.method }, "Attack rate limit exceeded");
      throw new RateLimitedError(rateLimitResult.resetAt);
    }

    const result = await orchestrator.runAttack(body);
    return reply.send(toAttackResponse(result));
  });

  /**
   * GET /api/attack/statistics
   * Aggregate figures over every attack run so far.
   */
  app.get("/api/attack/statistics", async (_request, reply) => {
    return reply.send(orchestrator.statistics());
  });
}
