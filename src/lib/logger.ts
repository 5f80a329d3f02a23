import type { LoggerOptions } from "pino";
import pino from "pino";
import { logLevelSchema } from "../config/schema.ts";
import type { LogLevel } from "../config/schema.ts";

/**
 * Level used before config is loaded. A blank or unknown value falls back to
 * "warn"; `loadConfig` reports the bad value once main() is running.
 */
export function resolveLogLevel(value: string | undefined): LogLevel {
  const parsed = logLevelSchema.safeParse(value);
  return parsed.success ? parsed.data : "warn";
}

// stdout belongs to the menu; logs go to stderr.
const options: LoggerOptions = {
  level: resolveLogLevel(process.env["LOG_LEVEL"]),
};

if (process.env["NODE_ENV"] !== "production") {
  options.transport = {
    target: "pino-pretty",
    options: { colorize: true, destination: 2 },
  };
}

export const logger = options.transport
  ? pino(options)
  : pino(options, pino.destination(2));

export function createChildLogger(module: string) {
  return logger.child({ module });
}

export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}
