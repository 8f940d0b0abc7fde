import pino from "pino";

/**
 * Whether log lines should be pretty-printed for a human reader.
 */
const isDevelopment = (process.env["NODE_ENV"] ?? "development") === "development";

/**
 * Configuration options for the Pino logger.
 */
const loggerOptions: pino.LoggerOptions = {
  level: process.env["LOG_LEVEL"] ?? "info",
};

if (isDevelopment) {
  loggerOptions.transport = {
    target: "pino-pretty",
    options: {
      colorize: true,
      translateTime: "HH:MM:ss",
      ignore: "pid,hostname",
    },
  };
}

/**
 * Application-wide logger instance using Pino.
 * Configured with pretty-printing in development and JSON output elsewhere.
 */
export const log = pino(loggerOptions);
