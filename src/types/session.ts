/**
 * Session types for multi-server connection management
 */

/** Hard cap on simultaneously live sessions */
export const MAX_SESSIONS = 5;

/**
 * Connection lifecycle of a session (or of a single connection attempt).
 * `Error` carries opaque user-facing text reported by the network layer.
 */
export type ConnectionState =
  | { kind: "Disconnected" }
  | { kind: "Connecting" }
  | { kind: "Connected" }
  | { kind: "Error"; message: string };

export type ConnectionStateKind = ConnectionState["kind"];

/**
 * Opaque state produced by the rendering surface (navigation, scroll, forms).
 * Never interpreted at this layer.
 */
export type RenderState = Uint8Array;

export interface Session {
  /** Unique identifier, assigned at creation */
  readonly id: string;

  /** Canonical absolute URL; a different URL is a different session */
  readonly serverUrl: string;

  /** Derived from serverUrl unless overridden by the user */
  displayName: string;

  /** Set only by the SessionStore */
  connectionState: ConnectionState;

  /** Epoch milliseconds */
  readonly createdAt: number;

  /** Epoch milliseconds; never decreases */
  lastActiveAt: number;

  /** Last render state saved for this session, if any */
  renderState: RenderState | null;
}

/**
 * Durable subset of a Session. Connection and render state are never persisted.
 */
export interface SessionRecord {
  id: string;
  serverUrl: string;
  displayName: string;
  createdAt: number;
  lastActiveAt: number;
}

export interface StoreRecord {
  sessions: SessionRecord[];
  activeId: string | null;
}

/**
 * History of servers the user connected to, independent of live sessions.
 */
export interface RecentServerEntry {
  url: string;

  /** Optional user-chosen name */
  name?: string;

  /** Epoch milliseconds of the last successful connection */
  lastConnected: number;

  /** Epoch milliseconds when the entry was first added */
  createdAt: number;
}

/** User preferences kept alongside the history */
export interface AppSettings {
  /** Reconnect the active session when the network comes back */
  autoReconnect: boolean;

  /** True until the caller marks onboarding as done */
  firstLaunch: boolean;
}

/**
 * Events emitted by the SessionStore, in the order they are listed per operation.
 */
export interface SessionStoreEventMap {
  sessionCreated: [session: Session];
  sessionRemoved: [session: Session];
  sessionRenamed: [session: Session];
  sessionStateChanged: [session: Session, oldState: ConnectionState, newState: ConnectionState];
  activeSessionChanged: [session: Session | null];
}

/**
 * Events emitted by the ConnectionStateMachine.
 */
export interface ConnectionEventMap {
  connectionStateChanged: [
    oldState: ConnectionState,
    newState: ConnectionState,
    contextId: string | null,
  ];
  sessionSwitched: [sessionId: string, url: string];
}
