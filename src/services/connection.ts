/**
 * ConnectionStateMachine - Lifecycle of the current connection attempt
 *
 * Disconnected -> Connecting -> Connected | Error, and from Connected or
 * Error back to Connecting (retry) or Disconnected (close). Reported
 * transitions are always applied and broadcast, even repeats of the same
 * state. Mirroring into a session's state is the caller's job.
 */

import type { Logger } from "pino";
import type { ConnectionEventMap, ConnectionState, ConnectionStateKind } from "../types";
import { EventBus, type Listener } from "../utils/events";
import type { PersistenceAdapter } from "./persistence";

export const DEFAULT_FAILURE_MESSAGE = "Connection failed";

const LIFECYCLE: Record<ConnectionStateKind, readonly ConnectionStateKind[]> = {
  Disconnected: ["Connecting"],
  Connecting: ["Connected", "Error", "Disconnected"],
  Connected: ["Connecting", "Disconnected"],
  Error: ["Connecting", "Disconnected"],
};

export const DISCONNECTED: ConnectionState = { kind: "Disconnected" };
export const CONNECTING: ConnectionState = { kind: "Connecting" };
export const CONNECTED: ConnectionState = { kind: "Connected" };

export function errorState(message: string): ConnectionState {
  return { kind: "Error", message };
}

/** Connecting or Connected */
export function isActiveState(state: ConnectionState): boolean {
  return state.kind === "Connecting" || state.kind === "Connected";
}

/**
 * Whether `to` follows `from` in the connection lifecycle.
 * Repeating the current state counts as legal.
 */
export function isLegalTransition(from: ConnectionState, to: ConnectionState): boolean {
  return from.kind === to.kind || LIFECYCLE[from.kind].includes(to.kind);
}

export function describeState(state: ConnectionState): string {
  return state.kind === "Error" ? `Error(${state.message})` : state.kind;
}

export class ConnectionStateMachine {
  private persistence: PersistenceAdapter;
  private log: Logger;
  private events: EventBus<ConnectionEventMap>;
  private _state: ConnectionState = DISCONNECTED;
  private _currentUrl: string | null = null;
  private _currentSessionId: string | null = null;

  constructor(persistence: PersistenceAdapter, logger: Logger) {
    this.persistence = persistence;
    this.log = logger;
    this.events = new EventBus(logger);
  }

  get state(): ConnectionState {
    return this._state;
  }

  get currentUrl(): string | null {
    return this._currentUrl;
  }

  get currentSessionId(): string | null {
    return this._currentSessionId;
  }

  /**
   * A connection to `url` has begun.
   */
  onConnectionStarted(url: string, sessionId?: string): void {
    this._currentUrl = url;
    if (sessionId !== undefined) {
      this._currentSessionId = sessionId;
    }
    this.updateState(CONNECTING, sessionId);
  }

  /**
   * The connection to `url` succeeded. Also recorded in the recent history.
   */
  onConnectionSuccess(url: string, sessionId?: string): void {
    this._currentUrl = url;
    if (sessionId !== undefined) {
      this._currentSessionId = sessionId;
    }
    try {
      this.persistence.addRecentUrl(url);
    } catch (error) {
      this.log.error({ error, url }, "Failed to record recent server");
    }
    this.updateState(CONNECTED, sessionId);
  }

  /**
   * The connection failed. `message` is stored verbatim.
   */
  onConnectionFailed(message?: string, sessionId?: string): void {
    this.updateState(errorState(message || DEFAULT_FAILURE_MESSAGE), sessionId);
  }

  onDisconnected(sessionId?: string): void {
    if (sessionId !== undefined && this._currentSessionId === sessionId) {
      this._currentSessionId = null;
    }
    this.updateState(DISCONNECTED, sessionId);
  }

  /**
   * Record that the visible session changed. The state is left as is.
   */
  switchToSession(sessionId: string, url: string): void {
    this._currentSessionId = sessionId;
    this._currentUrl = url;
    this.events.emit("sessionSwitched", sessionId, url);
  }

  getLastServerUrl(): string | null {
    return this.persistence.getLastServerUrl();
  }

  getRecentUrls(): string[] {
    return this.persistence.getRecentUrls();
  }

  clearHistory(): void {
    this.persistence.clearHistory();
  }

  on<K extends keyof ConnectionEventMap>(
    event: K,
    listener: Listener<ConnectionEventMap[K]>
  ): () => void {
    return this.events.on(event, listener);
  }

  off<K extends keyof ConnectionEventMap>(event: K, listener: Listener<ConnectionEventMap[K]>): void {
    this.events.off(event, listener);
  }

  private updateState(newState: ConnectionState, sessionId?: string): void {
    const oldState = this._state;
    if (!isLegalTransition(oldState, newState)) {
      this.log.debug(
        { from: describeState(oldState), to: describeState(newState), sessionId },
        "Transition outside connection lifecycle"
      );
    }
    this._state = newState;
    this.events.emit("connectionStateChanged", oldState, newState, sessionId ?? null);
  }
}
