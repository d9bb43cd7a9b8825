/**
 * SessionClient - Orchestrates the core services for a UI layer
 *
 * Validates input, creates and switches sessions, keeps the rendering
 * surface and both state machines in step, and turns surface and
 * reachability reports into state transitions. Renders nothing itself.
 */

import type { Logger } from "pino";
import type { RenderSurface, Session } from "../types";
import { type ValidationError, validateUrl } from "../utils/url";
import { CONNECTED, CONNECTING, type ConnectionStateMachine, errorState } from "./connection";
import type { PersistenceAdapter } from "./persistence";
import type { RenderStateBridge } from "./render-state";
import type { SessionStateView, SessionStore } from "./session-store";

export const NETWORK_UNAVAILABLE_MESSAGE = "Network unavailable";

export type ConnectResult =
  | { success: true; session: Session }
  | { success: false; error: ValidationError };

export interface SessionClientDeps {
  store: SessionStore;
  connection: ConnectionStateMachine;
  persistence: PersistenceAdapter;
  renderState: RenderStateBridge;
  surface: RenderSurface;
  logger: Logger;
}

export class SessionClient {
  readonly store: SessionStore;
  readonly connection: ConnectionStateMachine;
  readonly persistence: PersistenceAdapter;
  readonly renderState: RenderStateBridge;
  private surface: RenderSurface;
  private log: Logger;
  private unsubscribers: Array<() => void> = [];

  constructor(deps: SessionClientDeps) {
    this.store = deps.store;
    this.connection = deps.connection;
    this.persistence = deps.persistence;
    this.renderState = deps.renderState;
    this.surface = deps.surface;
    this.log = deps.logger;

    // Evicted sessions leave no render state behind
    this.unsubscribers.push(
      this.store.on("sessionRemoved", (session) => this.renderState.clearState(session.id))
    );
  }

  /** Sessions and active session, for the UI layer to observe */
  get state(): SessionStateView {
    return this.store.state;
  }

  /**
   * Validate `rawInput` and connect to it, reusing a live session for the
   * same url.
   */
  connect(rawInput: string): ConnectResult {
    const validation = validateUrl(rawInput);
    if (!validation.success) {
      this.log.debug({ code: validation.error.code }, "Rejected server url");
      return validation;
    }

    this.saveOutgoingState();
    const session = this.store.createSession(validation.url);
    this.startConnection(session);
    return { success: true, session: this.store.getSession(session.id) ?? session };
  }

  /**
   * Show session `id`, resuming its saved render state when there is one.
   * Returns false for unknown sessions.
   */
  switchToSession(id: string): boolean {
    const target = this.store.getSession(id);
    if (!target) return false;
    if (this.store.activeSessionId === id) return true;

    // Outgoing state must be captured before the incoming one is loaded
    this.saveOutgoingState();
    this.store.setActiveSession(id);
    this.show(target);
    return true;
  }

  /**
   * Close session `id`. When it was visible, the next active session is shown.
   */
  closeSession(id: string): boolean {
    if (!this.store.getSession(id)) return false;

    const wasActive = this.store.activeSessionId === id;
    this.renderState.clearState(id);
    this.store.removeSession(id);

    if (this.connection.currentSessionId === id) {
      this.connection.onDisconnected(id);
    }

    const next = this.store.getActiveSession();
    if (wasActive && next) {
      this.show(next);
    }
    return true;
  }

  /**
   * Reconnect the active session, or the last url the connection machine saw.
   * Returns whether a connection was started.
   */
  reconnect(): boolean {
    const active = this.store.getActiveSession();
    if (active) {
      this.startConnection(active);
      return true;
    }

    const url = this.connection.currentUrl;
    if (url === null) return false;
    return this.connect(url).success;
  }

  /** Surface began loading `url` */
  pageStarted(url: string): void {
    const active = this.store.getActiveSession();
    this.connection.onConnectionStarted(url, active?.id);
    if (active) {
      this.store.updateSessionState(active.id, CONNECTING);
    }
  }

  /** Surface finished loading `url` */
  pageFinished(url: string): void {
    const active = this.store.getActiveSession();
    this.connection.onConnectionSuccess(url, active?.id);
    if (active) {
      this.store.updateSessionState(active.id, CONNECTED);
    }
  }

  /** Surface reported a load error */
  pageError(message: string): void {
    const active = this.store.getActiveSession();
    this.connection.onConnectionFailed(message, active?.id);
    if (active) {
      this.store.updateSessionState(active.id, this.connection.state);
    }
  }

  /**
   * Feed a reachability change. Going offline fails the active session;
   * coming back online reconnects it when it is in error and the
   * autoReconnect preference is on.
   */
  onReachabilityChanged(isOnline: boolean): void {
    const active = this.store.getActiveSession();
    if (!active) return;

    if (!isOnline) {
      this.connection.onConnectionFailed(NETWORK_UNAVAILABLE_MESSAGE, active.id);
      this.store.updateSessionState(active.id, errorState(NETWORK_UNAVAILABLE_MESSAGE));
      return;
    }

    if (active.connectionState.kind === "Error" && this.persistence.getSettings().autoReconnect) {
      this.log.info({ sessionId: active.id }, "Network back, reconnecting");
      this.startConnection(active);
    }
  }

  /**
   * Drop every live session, its render state, the history and the
   * persisted sessions.
   */
  resetAll(): void {
    this.renderState.clearAll();
    this.store.removeAllSessions();
    try {
      this.persistence.clearHistory();
    } catch (error) {
      this.log.error({ error }, "Failed to clear history");
    }
    this.connection.onDisconnected();
  }

  dispose(): void {
    for (const unsubscribe of this.unsubscribers) {
      unsubscribe();
    }
    this.unsubscribers = [];
  }

  private startConnection(session: Session): void {
    this.connection.onConnectionStarted(session.serverUrl, session.id);
    this.store.updateSessionState(session.id, CONNECTING);
    this.surface.load(session.serverUrl);
  }

  private show(session: Session): void {
    const saved = this.renderState.loadState(session.id);
    if (saved) {
      this.surface.restoreState(saved);
    } else {
      this.surface.load(session.serverUrl);
    }
    this.connection.switchToSession(session.id, session.serverUrl);
  }

  private saveOutgoingState(): void {
    const outgoing = this.store.getActiveSession();
    if (!outgoing) return;
    this.renderState.saveState(outgoing.id, this.surface.captureState());
  }
}
