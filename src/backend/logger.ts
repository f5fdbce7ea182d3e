/**
 * logger.ts — Shared pino logger for all backend modules
 *
 * A single pino instance is created at startup and exported here.
 * Every module should import `logger` and call `.child({ module: "<name>" })`
 * to create a scoped logger that includes the module name in every entry.
 *
 * Fastify is configured with the same level and transport in server.ts so
 * request logs and runtime-cache logs look alike.
 *
 * Log level:
 *   • RTD_LOG_LEVEL env var — overrides everything (e.g. "debug", "silent")
 *   • NODE_ENV === "production" → "info"   (NDJSON, no pretty-print)
 *   • otherwise               → "debug"   (pino-pretty, colorised)
 */

import pino from "pino";

const isProd = process.env.NODE_ENV === "production";
const level  = process.env.RTD_LOG_LEVEL ?? (isProd ? "info" : "debug");

export const logger = pino(
  isProd || level === "silent"
    ? { level }
    : {
        level,
        transport: {
          target:  "pino-pretty",
          options: { colorize: true },
        },
      }
);

export type Logger = typeof logger;
