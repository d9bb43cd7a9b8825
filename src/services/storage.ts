/**
 * Key-value storage backends
 *
 * Synchronous by contract: every write is durable before it returns.
 */

import { mkdirSync, readFileSync, renameSync, writeFileSync } from "fs";
import { dirname } from "path";
import type { Logger } from "pino";
import type { KeyValueStore } from "../types";

/**
 * In-process store, lost on exit.
 */
export class MemoryKeyValueStore implements KeyValueStore {
  private entries = new Map<string, string>();

  get(key: string): string | null {
    return this.entries.get(key) ?? null;
  }

  set(key: string, value: string): void {
    this.entries.set(key, value);
  }

  remove(key: string): void {
    this.entries.delete(key);
  }
}

/**
 * Store backed by a single JSON object file.
 * The whole file is rewritten atomically (write temp, rename) on each change.
 */
export class FileKeyValueStore implements KeyValueStore {
  private file: string;
  private log: Logger;
  private entries: Map<string, string>;

  constructor(file: string, logger: Logger) {
    this.file = file;
    this.log = logger;
    this.entries = this.read();
  }

  get(key: string): string | null {
    return this.entries.get(key) ?? null;
  }

  set(key: string, value: string): void {
    this.entries.set(key, value);
    this.flush();
  }

  remove(key: string): void {
    if (!this.entries.delete(key)) return;
    this.flush();
  }

  private read(): Map<string, string> {
    let data: string;
    try {
      data = readFileSync(this.file, "utf-8");
    } catch (error: unknown) {
      if (hasCode(error, "ENOENT")) {
        this.log.debug({ file: this.file }, "No storage file found, starting empty");
      } else {
        this.log.warn({ error: errorMessage(error), file: this.file }, "Failed to read storage file");
      }
      return new Map();
    }

    try {
      const parsed: unknown = JSON.parse(data);
      const entries = new Map<string, string>();
      if (parsed && typeof parsed === "object" && !Array.isArray(parsed)) {
        for (const [key, value] of Object.entries(parsed)) {
          if (typeof value === "string") {
            entries.set(key, value);
          }
        }
      }
      return entries;
    } catch (error: unknown) {
      this.log.warn({ error: errorMessage(error), file: this.file }, "Storage file corrupted, starting empty");
      return new Map();
    }
  }

  private flush(): void {
    const tmpFile = `${this.file}.tmp`;
    mkdirSync(dirname(this.file), { recursive: true });
    writeFileSync(tmpFile, JSON.stringify(Object.fromEntries(this.entries), null, 2));
    renameSync(tmpFile, this.file);
  }
}

function hasCode(error: unknown, code: string): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === code;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
