import pino, { type Logger } from "pino";

/** Credential-bearing fields that never reach a log line. */
export const LOG_REDACT_PATHS = [
  "req.headers.authorization",
  "req.headers.cookie",
  'req.headers["x-ingest-token"]',
  "accessToken",
  "token",
];

/**
 * Create a Pino logger instance for a specific service/module.
 *
 * Output is JSON with ISO timestamps and the service name bound to every
 * line. The level follows LOG_LEVEL (defaults to "info").
 *
 * Usage:
 *   const logger = createLogger("status-monitor:aggregator");
 *   logger.info({ targets: 7 }, "Refresh complete");
 *   logger.error({ err }, "Something went wrong");
 */
export function createLogger(serviceName: string): Logger {
  return pino({
    name: serviceName,
    level: process.env["LOG_LEVEL"] ?? "info",
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: LOG_REDACT_PATHS, censor: "[redacted]" },
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
  });
}
