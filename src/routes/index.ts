import type { FastifyInstance } from "fastify";
import type { Logger } from "pino";
import type { AttackOrchestrator } from "../attackOrchestrator.js";
import type { RateLimiter } from "../rateLimiter.js";
import type { SampleDigest } from "../samples.js";
import type { UsbSimulator } from "../usbSimulator.js";
import { registerAttackRoutes } from "./attack.js";
import { registerHealthRoutes } from "./health.js";
import { registerUsbRoutes } from "./usb.js";

/**
 * Dependencies required for registering HTTP routes.
 */
export interface RoutesDependencies {
  orchestrator: AttackOrchestrator;
  simulator: UsbSimulator;
  samples: readonly SampleDigest[];
  rateLimiter: RateLimiter;
  log: Logger;
}

/**
 * Register all HTTP routes for the web server.
 */
export function registerRoutes(app: FastifyInstance, deps: RoutesDependencies): void {
  const { orchestrator, simulator, samples, rateLimiter, log } = deps;

  registerAttackRoutes(app, { orchestrator, samples, rateLimiter, log });

  registerUsbRoutes(app, { simulator, log });

  registerHealthRoutes(app, { orchestrator, simulator, samples });
}
