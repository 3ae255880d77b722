// ---------------------------------------------------------------------------
// Pino logger factory for the circulation service.
// ---------------------------------------------------------------------------

import pino from "pino";
import type { LoggingConfig } from "../core/types.js";

export type Logger = pino.Logger;

/** Reader contact fields and credentials, wherever they appear one level down. */
export const REDACTED_PATHS: readonly string[] = [
  "*.email",
  "*.document",
  "*.readerName",
  "req.headers.authorization",
  "req.headers.cookie",
];

/**
 * Build the root logger. Every line carries `service` and `version`;
 * loan and reader modules log through `logger.child({ module })`.
 *
 * `destination` overrides stdout and is ignored when pretty-printing.
 */
export function createLogger(
  config: LoggingConfig,
  destination?: pino.DestinationStream,
): pino.Logger {
  const options: pino.LoggerOptions = {
    level: config.level,
    base: {
      service: "circulation-core",
      version: process.env["APP_VERSION"] ?? "dev",
    },
    serializers: { err: pino.stdSerializers.err },
  };

  if (config.redactPersonalData) {
    options.redact = { paths: [...REDACTED_PATHS], censor: "[REDACTED]" };
  }

  if (config.prettyPrint) {
    return pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: { colorize: true, translateTime: "SYS:standard", ignore: "pid,hostname,service" },
      },
    });
  }

  return destination ? pino(options, destination) : pino(options);
}
