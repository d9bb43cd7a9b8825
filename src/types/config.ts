/**
 * Configuration types for the session manager
 */

export interface AppConfig {
  /** Path of the JSON file backing the key-value store */
  storageFile: string;

  /** Maximum number of live sessions */
  maxSessions: number;

  /** Maximum number of recent-server history entries */
  maxRecentUrls: number;

  /** Write render-state blobs through to durable storage */
  persistRenderState: boolean;

  /** Default for the autoReconnect preference */
  autoReconnect: boolean;

  /** Environment mode */
  nodeEnv: "development" | "production" | "test";

  /** Log level */
  logLevel: "debug" | "info" | "warn" | "error";
}
