/**
 * SessionStore - Live sessions and the active-session pointer
 *
 * The only writer of session membership, connection state and activity
 * timestamps. Each mutation is applied in full, published to the zustand
 * state and mirrored to persistence before any event is emitted, so
 * listeners never observe a half-applied change.
 */

import { randomUUID } from "crypto";
import type { Logger } from "pino";
import { type StoreApi, createStore } from "zustand/vanilla";
import type { ConnectionState, RenderState, Session, SessionStoreEventMap } from "../types";
import { MAX_SESSIONS } from "../types";
import { deriveDisplayName } from "../utils/display-name";
import { EventBus, type Listener } from "../utils/events";
import { DISCONNECTED, describeState, isActiveState } from "./connection";
import type { PersistenceAdapter } from "./persistence";

export interface SessionStoreOptions {
  /** Capacity, defaults to MAX_SESSIONS */
  maxSessions?: number;

  /** Clock in epoch milliseconds */
  now?: () => number;

  generateId?: () => string;
}

/**
 * What observers see: live sessions in creation order and the session
 * currently shown.
 */
export interface SessionSnapshot {
  sessions: readonly Session[];
  activeSession: Session | null;
}

/** Read-only view of the store's zustand state */
export type SessionStateView = Pick<StoreApi<SessionSnapshot>, "getState" | "subscribe">;

/**
 * Eviction order: least recently active first, then oldest created.
 */
export function compareForEviction(a: Session, b: Session): number {
  return a.lastActiveAt - b.lastActiveAt || a.createdAt - b.createdAt;
}

export class SessionStore {
  private persistence: PersistenceAdapter | null;
  private log: Logger;
  private events: EventBus<SessionStoreEventMap>;
  private maxSessions: number;
  private now: () => number;
  private generateId: () => string;

  private byId = new Map<string, Session>();
  private activeId: string | null = null;
  private snapshot = createStore<SessionSnapshot>()(() => ({
    sessions: [],
    activeSession: null,
  }));

  /** Sessions and active session, for observers */
  readonly state: SessionStateView = {
    getState: () => this.snapshot.getState(),
    subscribe: (listener) => this.snapshot.subscribe(listener),
  };

  constructor(
    persistence: PersistenceAdapter | null,
    logger: Logger,
    options: SessionStoreOptions = {}
  ) {
    this.persistence = persistence;
    this.log = logger;
    this.events = new EventBus(logger);
    this.maxSessions = options.maxSessions ?? MAX_SESSIONS;
    this.now = options.now ?? Date.now;
    this.generateId = options.generateId ?? randomUUID;
  }

  get activeSessionId(): string | null {
    return this.activeId;
  }

  getSession(id: string): Session | null {
    return this.byId.get(id) ?? null;
  }

  getSessionByUrl(serverUrl: string): Session | null {
    for (const session of this.byId.values()) {
      if (session.serverUrl === serverUrl) return session;
    }
    return null;
  }

  getSessions(): readonly Session[] {
    return this.snapshot.getState().sessions;
  }

  getActiveSession(): Session | null {
    return this.snapshot.getState().activeSession;
  }

  /**
   * Rehydrate from persistence. Restored sessions are Disconnected.
   * Emits no events.
   */
  restore(): void {
    if (!this.persistence) return;

    const { sessions, activeId } = this.persistence.load();
    this.byId = new Map(sessions.map((session) => [session.id, session]));

    if (activeId === null) {
      const [mostRecent] = [...sessions].sort(compareForEviction).reverse();
      this.activeId = mostRecent?.id ?? null;
    } else {
      this.activeId = this.byId.has(activeId) ? activeId : null;
    }

    this.publish();
    this.log.info({ count: sessions.length, activeId: this.activeId }, "Sessions restored");
  }

  /**
   * Return the live session for `serverUrl`, activating it, or create one.
   * At capacity, the least recently active idle session is evicted first;
   * when every session is Connecting or Connected, the least recently active
   * one is evicted regardless.
   */
  createSession(serverUrl: string, displayName?: string): Session {
    const existing = this.getSessionByUrl(serverUrl);
    if (existing) {
      this.setActiveSession(existing.id);
      return this.byId.get(existing.id) ?? existing;
    }

    const evicted: Session[] = [];
    while (this.byId.size >= this.maxSessions) {
      const victim = this.pickEvictionTarget();
      if (!victim) break;
      this.byId.delete(victim.id);
      if (this.activeId === victim.id) {
        this.activeId = null;
      }
      evicted.push(victim);
    }

    const now = this.now();
    const session: Session = {
      id: this.generateId(),
      serverUrl,
      displayName: displayName?.trim() || deriveDisplayName(serverUrl),
      connectionState: DISCONNECTED,
      createdAt: now,
      lastActiveAt: now,
      renderState: null,
    };
    this.byId.set(session.id, session);
    this.activeId = session.id;

    this.commit();

    for (const victim of evicted) {
      this.log.info({ sessionId: victim.id, serverUrl: victim.serverUrl }, "Session evicted");
      this.events.emit("sessionRemoved", victim);
    }
    this.log.info({ sessionId: session.id, serverUrl }, "Session created");
    this.events.emit("sessionCreated", session);
    this.events.emit("activeSessionChanged", session);

    return session;
  }

  /**
   * Make `id` the active session. No-op when already active or unknown.
   */
  setActiveSession(id: string): void {
    const target = this.byId.get(id);
    if (!target || this.activeId === id) {
      this.log.debug({ sessionId: id, found: Boolean(target) }, "Active session unchanged");
      return;
    }

    const now = this.now();
    if (this.activeId !== null) {
      this.touchInPlace(this.activeId, now);
    }
    const activated = this.touchInPlace(id, now) ?? target;
    this.activeId = id;

    this.commit();
    this.events.emit("activeSessionChanged", activated);
  }

  /**
   * Record a connection state reported for session `id`. Emitted even when
   * the state is unchanged.
   */
  updateSessionState(id: string, newState: ConnectionState): void {
    const session = this.byId.get(id);
    if (!session) {
      this.log.debug({ sessionId: id }, "State update for unknown session ignored");
      return;
    }

    const oldState = session.connectionState;
    const updated = this.replace(id, {
      connectionState: newState,
      lastActiveAt: Math.max(session.lastActiveAt, this.now()),
    });

    this.commit();
    this.log.debug(
      { sessionId: id, from: describeState(oldState), to: describeState(newState) },
      "Session state changed"
    );
    this.events.emit("sessionStateChanged", updated, oldState, newState);
  }

  /**
   * Refresh the activity timestamp of session `id`.
   */
  touch(id: string): void {
    if (!this.touchInPlace(id, this.now())) return;
    this.commit();
  }

  /**
   * Override the display name. A blank name restores the derived one.
   */
  renameSession(id: string, displayName: string): void {
    const session = this.byId.get(id);
    if (!session) return;

    const renamed = this.replace(id, {
      displayName: displayName.trim() || deriveDisplayName(session.serverUrl),
    });

    this.commit();
    this.events.emit("sessionRenamed", renamed);
  }

  /**
   * Remove session `id`. When it was active, the most recently active
   * remaining session takes over (or none).
   */
  removeSession(id: string): void {
    const session = this.byId.get(id);
    if (!session) return;

    this.byId.delete(id);
    const wasActive = this.activeId === id;
    let next: Session | null = null;
    if (wasActive) {
      const [mostRecent] = [...this.byId.values()].sort(compareForEviction).reverse();
      next = mostRecent ?? null;
      this.activeId = next?.id ?? null;
    }

    this.commit();
    this.log.info({ sessionId: id, serverUrl: session.serverUrl }, "Session removed");
    this.events.emit("sessionRemoved", session);
    if (wasActive) {
      this.events.emit("activeSessionChanged", next);
    }
  }

  removeAllSessions(): void {
    const removed = [...this.byId.values()];
    const hadActive = this.activeId !== null;

    this.byId.clear();
    this.activeId = null;

    this.commit();
    for (const session of removed) {
      this.events.emit("sessionRemoved", session);
    }
    if (hadActive) {
      this.events.emit("activeSessionChanged", null);
    }
  }

  /**
   * Store a render-state blob on the session. Activity time is untouched
   * and no event is emitted.
   */
  attachRenderState(id: string, renderState: RenderState | null): void {
    if (!this.byId.has(id)) return;
    this.replace(id, { renderState });
    this.publish();
  }

  /**
   * True when a new session fits without evicting a Connecting or
   * Connected one.
   */
  canCreateNewSession(): boolean {
    if (this.byId.size < this.maxSessions) return true;
    for (const session of this.byId.values()) {
      if (!isActiveState(session.connectionState)) return true;
    }
    return false;
  }

  /** Number of Connecting or Connected sessions */
  getActiveSessionCount(): number {
    let count = 0;
    for (const session of this.byId.values()) {
      if (isActiveState(session.connectionState)) count++;
    }
    return count;
  }

  on<K extends keyof SessionStoreEventMap>(
    event: K,
    listener: Listener<SessionStoreEventMap[K]>
  ): () => void {
    return this.events.on(event, listener);
  }

  off<K extends keyof SessionStoreEventMap>(
    event: K,
    listener: Listener<SessionStoreEventMap[K]>
  ): void {
    this.events.off(event, listener);
  }

  private pickEvictionTarget(): Session | null {
    const all = [...this.byId.values()];
    const idle = all.filter((session) => !isActiveState(session.connectionState));
    const pool = idle.length > 0 ? idle : all;
    return pool.sort(compareForEviction)[0] ?? null;
  }

  private replace(id: string, changes: Partial<Session>): Session {
    const current = this.byId.get(id);
    if (!current) {
      throw new Error(`Unknown session: ${id}`);
    }
    const next: Session = { ...current, ...changes };
    this.byId.set(id, next);
    return next;
  }

  private touchInPlace(id: string, now: number): Session | null {
    const session = this.byId.get(id);
    if (!session) return null;
    return this.replace(id, { lastActiveAt: Math.max(session.lastActiveAt, now) });
  }

  private publish(): void {
    this.snapshot.setState({
      sessions: [...this.byId.values()],
      activeSession: this.activeId === null ? null : (this.byId.get(this.activeId) ?? null),
    });
  }

  private commit(): void {
    this.publish();
    if (!this.persistence) return;
    try {
      this.persistence.persist([...this.byId.values()], this.activeId);
    } catch (error) {
      this.log.error({ error }, "Failed to persist sessions");
    }
  }
}
