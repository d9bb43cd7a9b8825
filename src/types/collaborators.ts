/**
 * Contracts of the external collaborators the core depends on
 */

import type { RenderState } from "./session";

/**
 * Durable string storage. A `set` that returns is visible to the next `get`.
 */
export interface KeyValueStore {
  get(key: string): string | null;
  set(key: string, value: string): void;
  remove(key: string): void;
}

/**
 * Embeddable browser surface that displays a session's remote content.
 * Reports back through SessionClient.pageStarted / pageFinished / pageError.
 */
export interface RenderSurface {
  /** Begin fetching and displaying `url` */
  load(url: string): void;

  /** Snapshot of the surface's current state */
  captureState(): RenderState;

  /** Resume from a snapshot taken by captureState */
  restoreState(state: RenderState): void;
}
