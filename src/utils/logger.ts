/**
 * Structured logging with Pino
 */

import pino from "pino";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

const envLevel = process.env["LOG_LEVEL"];
const level: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

export const logger = pino({
  level,
  transport:
    process.env["NODE_ENV"] === "development"
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:HH:MM:ss",
            ignore: "pid,hostname",
          },
        }
      : undefined,
  base: {
    service: "session-deck",
  },
});

/**
 * Create a child logger with additional context
 */
export function createLogger(name: string) {
  return logger.child({ module: name });
}
