/**
 * PersistenceAdapter - Durable session metadata and server history
 *
 * Maps the SessionStore's durable fields to the key-value store, and keeps
 * the recent-server history and preferences, which outlive live sessions.
 * Unreadable records always recover to the empty state.
 */

import type { Logger } from "pino";
import { z } from "zod";
import type {
  AppSettings,
  KeyValueStore,
  RecentServerEntry,
  RenderState,
  Session,
  SessionRecord,
  StoreRecord,
} from "../types";
import { MAX_SESSIONS } from "../types";

export const STORAGE_KEYS = {
  sessions: "active_sessions",
  recentServers: "recent_servers",
  settings: "settings",
  renderStatePrefix: "render_state:",
} as const;

export const MAX_RECENT_URLS = 10;

const sessionRecordSchema = z.object({
  id: z.string().min(1),
  serverUrl: z.string().min(1),
  displayName: z.string(),
  createdAt: z.number().int().nonnegative(),
  lastActiveAt: z.number().int().nonnegative(),
});

const storeRecordSchema = z.object({
  sessions: z.array(sessionRecordSchema),
  activeId: z.string().nullable(),
});

const recentEntrySchema = z.object({
  url: z.string().min(1),
  name: z.string().optional(),
  lastConnected: z.number().int().nonnegative(),
  createdAt: z.number().int().nonnegative(),
});

const settingsSchema = z
  .object({
    autoReconnect: z.boolean(),
    firstLaunch: z.boolean(),
  })
  .partial();

export interface PersistenceOptions {
  maxRecentUrls?: number;
  maxSessions?: number;
  defaultAutoReconnect?: boolean;
  now?: () => number;
}

export interface LoadedSessions {
  sessions: Session[];
  activeId: string | null;
}

export class PersistenceAdapter {
  private store: KeyValueStore;
  private log: Logger;
  private maxRecentUrls: number;
  private maxSessions: number;
  private defaultAutoReconnect: boolean;
  private now: () => number;

  constructor(store: KeyValueStore, logger: Logger, options: PersistenceOptions = {}) {
    this.store = store;
    this.log = logger;
    this.maxRecentUrls = options.maxRecentUrls ?? MAX_RECENT_URLS;
    this.maxSessions = options.maxSessions ?? MAX_SESSIONS;
    this.defaultAutoReconnect = options.defaultAutoReconnect ?? true;
    this.now = options.now ?? Date.now;
  }

  // ========================================
  // Live sessions
  // ========================================

  /**
   * Overwrite the durable session record.
   * Connection state and render state are deliberately left out.
   */
  persist(sessions: readonly SessionRecord[], activeId: string | null): void {
    const record: StoreRecord = {
      sessions: sessions.map(toRecord),
      activeId,
    };
    this.store.set(STORAGE_KEYS.sessions, JSON.stringify(record));
  }

  /**
   * Read the durable session record. Every restored session starts Disconnected.
   */
  load(): LoadedSessions {
    const record = this.readJson(STORAGE_KEYS.sessions, storeRecordSchema);
    if (!record) {
      return { sessions: [], activeId: null };
    }

    const seenUrls = new Set<string>();
    const seenIds = new Set<string>();
    let records = record.sessions.filter((r) => {
      if (seenUrls.has(r.serverUrl) || seenIds.has(r.id)) return false;
      seenUrls.add(r.serverUrl);
      seenIds.add(r.id);
      return true;
    });

    if (records.length > this.maxSessions) {
      const keep = new Set(
        [...records]
          .sort((a, b) => b.lastActiveAt - a.lastActiveAt || b.createdAt - a.createdAt)
          .slice(0, this.maxSessions)
          .map((r) => r.id)
      );
      this.log.warn(
        { stored: records.length, kept: keep.size },
        "Persisted sessions exceed capacity, dropping least recent"
      );
      records = records.filter((r) => keep.has(r.id));
    }

    return {
      sessions: records.map((r): Session => ({
        ...r,
        connectionState: { kind: "Disconnected" },
        renderState: null,
      })),
      activeId: record.activeId,
    };
  }

  /** Remove the durable session record only */
  clearSessions(): void {
    this.store.remove(STORAGE_KEYS.sessions);
  }

  // ========================================
  // Recent server history
  // ========================================

  /** Most recent first */
  getRecentServers(): RecentServerEntry[] {
    const entries = this.readJson(STORAGE_KEYS.recentServers, z.array(recentEntrySchema)) ?? [];
    const seen = new Set<string>();
    return entries.filter((entry) => {
      if (seen.has(entry.url)) return false;
      seen.add(entry.url);
      return true;
    });
  }

  getRecentUrls(): string[] {
    return this.getRecentServers().map((entry) => entry.url);
  }

  /** Url of the most recent connection, for pre-filling input */
  getLastServerUrl(): string | null {
    return this.getRecentServers()[0]?.url ?? null;
  }

  /**
   * Record a connection to `url`, moving an existing entry to the front.
   */
  addRecentUrl(url: string): void {
    const now = this.now();
    const entries = this.getRecentServers();
    const existing = entries.find((entry) => entry.url === url);
    const rest = entries.filter((entry) => entry.url !== url);

    const entry: RecentServerEntry = existing
      ? { ...existing, lastConnected: now }
      : { url, lastConnected: now, createdAt: now };

    this.writeRecent([entry, ...rest]);
  }

  removeRecentUrl(url: string): void {
    const entries = this.getRecentServers();
    const remaining = entries.filter((entry) => entry.url !== url);
    if (remaining.length === entries.length) return;
    this.writeRecent(remaining);
  }

  /**
   * Give a history entry a user-chosen name. A blank name clears it.
   */
  renameRecentServer(url: string, name: string): void {
    const entries = this.getRecentServers();
    if (!entries.some((entry) => entry.url === url)) return;

    const trimmed = name.trim();
    this.writeRecent(
      entries.map((entry) => {
        if (entry.url !== url) return entry;
        const { name: _previous, ...rest } = entry;
        return trimmed ? { ...rest, name: trimmed } : rest;
      })
    );
  }

  /**
   * Forget the history, the persisted sessions and their render state.
   * Live in-memory sessions are untouched.
   */
  clearHistory(): void {
    const record = this.readJson(STORAGE_KEYS.sessions, storeRecordSchema);
    for (const session of record?.sessions ?? []) {
      this.removeRenderState(session.id);
    }
    this.store.remove(STORAGE_KEYS.recentServers);
    this.store.remove(STORAGE_KEYS.sessions);
    this.log.info("History cleared");
  }

  // ========================================
  // Preferences
  // ========================================

  getSettings(): AppSettings {
    const stored = this.readJson(STORAGE_KEYS.settings, settingsSchema) ?? {};
    return {
      autoReconnect: stored.autoReconnect ?? this.defaultAutoReconnect,
      firstLaunch: stored.firstLaunch ?? true,
    };
  }

  updateSettings(changes: Partial<AppSettings>): AppSettings {
    const next = { ...this.getSettings(), ...changes };
    this.store.set(STORAGE_KEYS.settings, JSON.stringify(next));
    return next;
  }

  // ========================================
  // Render state write-through
  // ========================================

  saveRenderState(sessionId: string, state: RenderState): void {
    this.store.set(
      STORAGE_KEYS.renderStatePrefix + sessionId,
      Buffer.from(state).toString("base64")
    );
  }

  loadRenderState(sessionId: string): RenderState | null {
    const encoded = this.store.get(STORAGE_KEYS.renderStatePrefix + sessionId);
    if (encoded === null) return null;
    return new Uint8Array(Buffer.from(encoded, "base64"));
  }

  removeRenderState(sessionId: string): void {
    this.store.remove(STORAGE_KEYS.renderStatePrefix + sessionId);
  }

  private writeRecent(entries: RecentServerEntry[]): void {
    this.store.set(
      STORAGE_KEYS.recentServers,
      JSON.stringify(entries.slice(0, this.maxRecentUrls))
    );
  }

  /**
   * Read and validate a JSON value. Missing or malformed values yield null.
   */
  private readJson<T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | null {
    const raw = this.store.get(key);
    if (raw === null || !raw.trim()) {
      this.log.debug({ key }, "No stored value");
      return null;
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      this.log.warn({ key, error: error instanceof Error ? error.message : String(error) }, "Stored value is not JSON");
      return null;
    }

    const result = schema.safeParse(data);
    if (!result.success) {
      this.log.warn({ key, issues: result.error.issues.length }, "Stored value failed validation");
      return null;
    }
    return result.data;
  }
}

function toRecord(session: SessionRecord): SessionRecord {
  return {
    id: session.id,
    serverUrl: session.serverUrl,
    displayName: session.displayName,
    createdAt: session.createdAt,
    lastActiveAt: session.lastActiveAt,
  };
}
