import type { FastifyInstance } from "fastify";
import type { AttackOrchestrator } from "../attackOrchestrator.js";
import type { SampleDigest } from "../samples.js";
import type { UsbSimulator } from "../usbSimulator.js";

export interface HealthRoutesDependencies {
  orchestrator: AttackOrchestrator;
  simulator: UsbSimulator;
  samples: readonly SampleDigest[];
}

/**
 * Register liveness and readiness routes.
 */
export function registerHealthRoutes(app: FastifyInstance, deps: HealthRoutesDependencies): void {
  const { orchestrator, simulator, samples } = deps;

  /**
   * GET /health
   * Health check endpoint.
   */
  app.get("/health", async (_request, reply) => {
    return reply.send({ status: "ok", timestamp: Date.now() });
  });

  /**
   * GET /api/status
   * Report which capabilities are available and how much state is loaded.
   */
  app.get("/api/status", async (_request, reply) => {
    return reply.send({
      status: "ok",
      aiAvailable: orchestrator.aiAvailable,
      wordsLoaded: orchestrator.wordCount,
      samplesLoaded: samples.length,
      devices: simulator.deviceCount,
      attacksRun: orchestrator.statistics().totalRuns,
    });
  });
}
