/**
 * Service module exports
 */

export { SessionClient, NETWORK_UNAVAILABLE_MESSAGE, type ConnectResult } from "./client";
export {
  ConnectionStateMachine,
  CONNECTED,
  CONNECTING,
  DISCONNECTED,
  DEFAULT_FAILURE_MESSAGE,
  describeState,
  errorState,
  isActiveState,
  isLegalTransition,
} from "./connection";
export { PersistenceAdapter, MAX_RECENT_URLS, STORAGE_KEYS } from "./persistence";
export { RenderStateBridge } from "./render-state";
export {
  SessionStore,
  compareForEviction,
  type SessionSnapshot,
  type SessionStateView,
} from "./session-store";
export { FileKeyValueStore, MemoryKeyValueStore } from "./storage";
