import { AiAdvisor, type GuessCapability } from "../aiAdvisor.js";
import { AttackLog } from "../attackLog.js";
import { AttackOrchestrator } from "../attackOrchestrator.js";
import type { Config } from "../config.js";
import { hash } from "../hashUtils.js";
import { log } from "../logger.js";
import { RateLimiter } from "../rateLimiter.js";
import type { SampleDigest } from "../samples.js";
import { UsbSimulator } from "../usbSimulator.js";
import { WebServer, type WebServerDependencies } from "../webServer.js";

/**
 * Test context containing all dependencies for E2E testing.
 */
export interface E2ETestContext {
  server: WebServer;
  orchestrator: AttackOrchestrator;
  simulator: UsbSimulator;
  rateLimiter: RateLimiter;
  samples: SampleDigest[];
  config: Config;
  cleanup: () => Promise<void>;
}

/**
 * Options for creating an E2E test context.
 */
export interface E2ETestOptions {
  configOverrides?: Partial<Config>;
  /**
   * Stand-in for the external AI service. Without one, AI attacks report
   * the capability as unavailable.
   */
  capability?: GuessCapability;
}

/**
 * Words the test dictionary attack draws from.
 */
export const TEST_WORDS = ["dragon", "monkey", "sunshine"];

const DEFAULT_CONFIG: Config = {
  WEB_SERVER_PORT: 3001,
  WEB_SERVER_HOST: "127.0.0.1",
  WORDLIST_PATH: "data/wordlist.txt",
  SAMPLES_PATH: "data/samples.json",
  BRUTE_FORCE_MAX_LENGTH: 4,
  BRUTE_FORCE_MAX_ATTEMPTS: 100_000,
  ATTACKS_PER_MIN: 30,
  AI_MODEL: "fake-model",
  AI_TIMEOUT_MS: 1000,
  AI_MAX_CANDIDATES: 15,
  LOG_LEVEL: "silent",
  NODE_ENV: "test",
};

/**
 * Creates a complete E2E test context with all required dependencies.
 * Everything runs in process; nothing listens on a port.
 */
export function createE2ETestContext(options: E2ETestOptions = {}): E2ETestContext {
  const { configOverrides = {}, capability } = options;
  const config: Config = { ...DEFAULT_CONFIG, ...configOverrides };

  const advisor = capability
    ? new AiAdvisor({
        capability,
        log,
        timeoutMs: config.AI_TIMEOUT_MS,
        maxCandidates: config.AI_MAX_CANDIDATES,
      })
    : null;

  const orchestrator = new AttackOrchestrator({
    log,
    attackLog: new AttackLog(),
    words: TEST_WORDS,
    advisor,
    bruteForceMaxLength: config.BRUTE_FORCE_MAX_LENGTH,
    bruteForceMaxAttempts: config.BRUTE_FORCE_MAX_ATTEMPTS,
  });

  const simulator = new UsbSimulator({ log });
  const rateLimiter = new RateLimiter(config.ATTACKS_PER_MIN, 60, log);
  const samples: SampleDigest[] = [
    { digest: hash("monkey"), description: "Common word", difficulty: "easy", length: 6 },
    { digest: hash("b7k"), description: "Short random", difficulty: "hard", length: 3 },
  ];

  const deps: WebServerDependencies = {
    config,
    orchestrator,
    simulator,
    samples,
    rateLimiter,
    log,
  };

  const server = new WebServer(deps);

  const cleanup = async () => {
    await server.stop();
    rateLimiter.clear();
  };

  return {
    server,
    orchestrator,
    simulator,
    rateLimiter,
    samples,
    config,
    cleanup,
  };
}
