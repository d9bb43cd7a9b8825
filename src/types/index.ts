/**
 * Centralized type exports
 */

export type { AppConfig } from "./config";
export type { KeyValueStore, RenderSurface } from "./collaborators";
export type {
  AppSettings,
  ConnectionEventMap,
  ConnectionState,
  ConnectionStateKind,
  RecentServerEntry,
  RenderState,
  Session,
  SessionRecord,
  SessionStoreEventMap,
  StoreRecord,
} from "./session";
export { MAX_SESSIONS } from "./session";
