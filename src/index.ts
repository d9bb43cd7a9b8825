/**
 * Session Deck - Entry Point
 *
 * Builds one set of core services per process and hands them out through a
 * SessionClient. Consumers receive the client; nothing is reachable through
 * global state.
 */

import type { Logger } from "pino";
import { loadConfig } from "./config";
import {
  ConnectionStateMachine,
  FileKeyValueStore,
  PersistenceAdapter,
  RenderStateBridge,
  SessionClient,
  SessionStore,
} from "./services";
import type { AppConfig, KeyValueStore, RenderSurface } from "./types";
import { logger as rootLogger } from "./utils";

export * from "./types";
export * from "./config";
export * from "./services";
export * from "./utils";

export interface CreateSessionClientOptions {
  /** Rendering surface the sessions are shown on */
  surface: RenderSurface;

  /** Defaults to loadConfig() */
  config?: AppConfig;

  /** Defaults to a FileKeyValueStore at config.storageFile */
  storage?: KeyValueStore;

  /** Parent logger for every service */
  logger?: Logger;

  /** Clock in epoch milliseconds */
  now?: () => number;
}

/**
 * Wire the core services together and restore persisted sessions.
 */
export function createSessionClient(options: CreateSessionClientOptions): SessionClient {
  const config = options.config ?? loadConfig();
  const base = options.logger ?? rootLogger;
  const child = (module: string) => base.child({ module });

  const storage = options.storage ?? new FileKeyValueStore(config.storageFile, child("storage"));

  const persistence = new PersistenceAdapter(storage, child("persistence"), {
    maxRecentUrls: config.maxRecentUrls,
    maxSessions: config.maxSessions,
    defaultAutoReconnect: config.autoReconnect,
    now: options.now,
  });

  const store = new SessionStore(persistence, child("sessions"), {
    maxSessions: config.maxSessions,
    now: options.now,
  });
  store.restore();

  const connection = new ConnectionStateMachine(persistence, child("connection"));
  const renderState = new RenderStateBridge(store, persistence, child("render-state"), {
    writeThrough: config.persistRenderState,
  });

  return new SessionClient({
    store,
    connection,
    persistence,
    renderState,
    surface: options.surface,
    logger: child("client"),
  });
}
