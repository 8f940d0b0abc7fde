import { AiAdvisor, GeminiCapability } from "./aiAdvisor.js";
import { AttackLog } from "./attackLog.js";
import { AttackOrchestrator } from "./attackOrchestrator.js";
import { config } from "./config.js";
import { loadWordlist } from "./generators/dictionary.js";
import { log } from "./logger.js";
import { RateLimiter } from "./rateLimiter.js";
import { loadSamples } from "./samples.js";
import { UsbSimulator } from "./usbSimulator.js";
import { WebServer } from "./webServer.js";

/**
 * Main application entry point.
 * Initialize and start all services.
 */
async function main() {
  log.info("Starting CrackLab...");

  const words = loadWordlist(config.WORDLIST_PATH, log);
  const samples = loadSamples(config.SAMPLES_PATH, log);

  let advisor: AiAdvisor | null = null;
  if (config.AI_API_KEY) {
    advisor = new AiAdvisor({
      capability: new GeminiCapability(config.AI_API_KEY, config.AI_MODEL),
      log,
      timeoutMs: config.AI_TIMEOUT_MS,
      maxCandidates: config.AI_MAX_CANDIDATES,
    });
    log.info({ model: config.AI_MODEL }, "AI advisor enabled");
  } else {
    log.warn("No AI API key configured, AI attacks will report the capability as unavailable");
  }

  const orchestrator = new AttackOrchestrator({
    log,
    attackLog: new AttackLog(),
    words,
    advisor,
    bruteForceMaxLength: config.BRUTE_FORCE_MAX_LENGTH,
    bruteForceMaxAttempts: config.BRUTE_FORCE_MAX_ATTEMPTS,
  });

  const simulator = new UsbSimulator({ log });

  // Attacks per client per minute
  const rateLimiter = new RateLimiter(config.ATTACKS_PER_MIN, 60, log);

  const webServer = new WebServer({
    config,
    orchestrator,
    simulator,
    samples,
    rateLimiter,
    log,
  });

  await webServer.start();

  log.info("CrackLab started successfully");

  // Handle graceful shutdown
  const shutdown = async (signal: string) => {
    log.info({ signal }, "Shutting down...");

    try {
      await webServer.stop();
      log.info("Shutdown complete");
      process.exit(0);
    } catch (err) {
      log.error({ err }, "Error during shutdown");
      process.exit(1);
    }
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

main().catch((err) => {
  log.fatal({ err }, "Fatal error during startup");
  process.exit(1);
});
