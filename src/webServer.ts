import Fastify, { type FastifyInstance } from "fastify";
import type { Logger } from "pino";
import { ZodError } from "zod";
import type { AttackOrchestrator } from "./attackOrchestrator.js";
import type { Config } from "./config.js";
import { CrackLabError, RateLimitedError } from "./errors.js";
import type { RateLimiter } from "./rateLimiter.js";
import { registerRoutes } from "./routes/index.js";
import type { SampleDigest } from "./samples.js";
import type { UsbSimulator } from "./usbSimulator.js";

/**
 * Dependencies required for initializing the web server.
 */
export interface WebServerDependencies {
  config: Config;
  orchestrator: AttackOrchestrator;
  simulator: UsbSimulator;
  samples: readonly SampleDigest[];
  rateLimiter: RateLimiter;
  log: Logger;
}

/**
 * JSON API over the attack orchestrator and the USB simulator.
 */
export class WebServer {
  private readonly app: FastifyInstance;
  private readonly config: Config;
  private readonly log: Logger;

  constructor(deps: WebServerDependencies) {
    this.config = deps.config;
    this.log = deps.log.child({ component: "WebServer" });

    this.app = Fastify({
      logger: false,
    });

    this.setupErrorHandler();
    this.setupRoutes(deps);
  }

  /**
   * Map classified errors to their status and code. Anything unclassified is
   * logged with its stack and answered with a generic 500.
   */
  private setupErrorHandler(): void {
    this.app.setErrorHandler((err, request, reply) => {
      if (err instanceof CrackLabError) {
        this.log.info({ code: err.code, url: request.url }, err.message);
        if (err instanceof RateLimitedError) {
          return reply
            .status(err.statusCode)
            .send({ error: err.message, code: err.code, resetAt: err.resetAt.toISOString() });
        }
        return reply.status(err.statusCode).send({ error: err.message, code: err.code });
      }

      if (err instanceof ZodError) {
        this.log.info({ errors: err.issues, url: request.url }, "Invalid request data");
        return reply
          .status(400)
          .send({ error: "Invalid request data", code: "VALIDATION_ERROR", issues: err.issues });
      }

      // Fastify's own client errors (malformed JSON, wrong content type)
      if (err.statusCode !== undefined && err.statusCode >= 400 && err.statusCode < 500) {
        return reply.status(err.statusCode).send({ error: err.message || "Bad request" });
      }

      this.log.error(
        {
          err,
          stack: err.stack,
          statusCode: err.statusCode,
        },
        "Unhandled error in request handler",
      );
      return reply.status(500).send({ error: "Internal server error" });
    });
  }

  private setupRoutes(deps: WebServerDependencies): void {
    registerRoutes(this.app, {
      orchestrator: deps.orchestrator,
      simulator: deps.simulator,
      samples: deps.samples,
      rateLimiter: deps.rateLimiter,
      log: this.log,
    });
  }

  /**
   * Start the web server.
   */
  async start(): Promise<void> {
    try {
      await this.app.listen({
        port: this.config.WEB_SERVER_PORT,
        host: this.config.WEB_SERVER_HOST,
      });
      this.log.info(
        {
          port: this.config.WEB_SERVER_PORT,
          host: this.config.WEB_SERVER_HOST,
        },
        "Web server started",
      );
    } catch (err) {
      this.log.error({ err }, "Failed to start web server");
      throw err;
    }
  }

  /**
   * Stop the web server.
   */
  async stop(): Promise<void> {
    try {
      await this.app.close();
      this.log.info("Web server stopped");
    } catch (err) {
      this.log.error({ err }, "Error stopping web server");
      throw err;
    }
  }

  /**
   * Get the Fastify instance for testing.
   */
  getApp(): FastifyInstance {
    return this.app;
  }
}
