/**
 * Configuration schema validation with Zod
 */

import { join } from "path";
import { z } from "zod";

function defaultStorageFile(): string {
  return join(process.env["HOME"] || "~", ".session-deck", "store.json");
}

export const configSchema = z.object({
  storageFile: z
    .string()
    .min(1, "STORAGE_FILE must not be empty")
    .default(defaultStorageFile)
    .describe("JSON file backing the key-value store"),

  maxSessions: z
    .number()
    .int()
    .positive()
    .default(5)
    .describe("Maximum number of live sessions"),

  maxRecentUrls: z
    .number()
    .int()
    .positive()
    .default(10)
    .describe("Maximum number of recent-server history entries"),

  persistRenderState: z
    .boolean()
    .default(false)
    .describe("Write render state through to durable storage"),

  autoReconnect: z.boolean().default(true).describe("Default for the autoReconnect preference"),

  nodeEnv: z
    .enum(["development", "production", "test"])
    .default("development")
    .describe("Environment mode"),

  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info").describe("Log level"),
});

export type ConfigInput = z.input<typeof configSchema>;
export type ConfigOutput = z.output<typeof configSchema>;

function parseInteger(value: string | undefined): number | undefined {
  return value ? Number(value) : undefined;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value === "") return undefined;
  return value === "true";
}

/**
 * Parse environment variables into config input.
 * Values are passed through raw so the schema reports bad ones.
 */
export function parseEnvVars(): Record<keyof ConfigInput, unknown> {
  return {
    storageFile: process.env["STORAGE_FILE"] ?? defaultStorageFile(),
    maxSessions: parseInteger(process.env["MAX_SESSIONS"]),
    maxRecentUrls: parseInteger(process.env["MAX_RECENT_URLS"]),
    persistRenderState: parseBoolean(process.env["PERSIST_RENDER_STATE"]),
    autoReconnect: parseBoolean(process.env["AUTO_RECONNECT"]),
    nodeEnv: process.env["NODE_ENV"] || undefined,
    logLevel: process.env["LOG_LEVEL"] || undefined,
  };
}
