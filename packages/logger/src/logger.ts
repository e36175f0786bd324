/**
 * Main Logger Setup
 *
 * Pino loggers with secret redaction: pretty-printed in development,
 * JSON lines everywhere else.
 */

import pino, { type Logger as PinoLogger } from "pino";
import { REDACT_PATHS, redactValue } from "./pii-redactor.js";

/**
 * Re-export the Pino Logger type so consumers do not need a direct pino dependency.
 */
export type Logger = PinoLogger;

export interface CreateLoggerOptions {
  /** Log level (defaults to "info", or "debug" when NODE_ENV is "development"). */
  level?: string;
  /** Logical service / component name attached to every log line. */
  service?: string;
  /** Write JSON lines here instead of stdout. Disables pretty-printing. */
  destination?: pino.DestinationStream;
}

function isDevelopment(): boolean {
  return process.env["NODE_ENV"] === "development";
}

/**
 * Build the Pino transport configuration.
 *
 * - In **development** we pipe through `pino-pretty` for human-readable output.
 * - In **production / test** we emit structured JSON (no transport needed).
 */
function buildTransport(): pino.TransportSingleOptions | undefined {
  if (isDevelopment()) {
    return {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
    };
  }
  return undefined;
}

/**
 * Create a new root Pino logger. `destination` lets tests capture output.
 */
export function createLogger(options?: CreateLoggerOptions): Logger {
  const level = options?.level ?? (isDevelopment() ? "debug" : "info");
  const service = options?.service ?? "benchrag";

  const transport = options?.destination ? undefined : buildTransport();

  const pinoOptions: pino.LoggerOptions = {
    level,
    name: service,
    redact: {
      paths: REDACT_PATHS,
      censor: "[REDACTED]",
    },
    formatters: {
      log: (object) =>
        Object.fromEntries(Object.entries(object).map(([key, value]) => [key, redactValue(key, value)])),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(transport ? { transport } : {}),
  };

  return options?.destination ? pino(pinoOptions, options.destination) : pino(pinoOptions);
}

/**
 * Create a child logger that inherits the parent's configuration and adds
 * scoped bindings (e.g. `component`, `sessionId`, `jobId`).
 */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}
