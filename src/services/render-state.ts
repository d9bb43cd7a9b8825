/**
 * RenderStateBridge - Per-session render state for switch continuity
 *
 * Blobs are opaque and replaced wholesale. The in-memory cache is the
 * primary copy; with write-through enabled, blobs also go to persistence so
 * they survive a restart.
 */

import type { Logger } from "pino";
import type { RenderState } from "../types";
import type { PersistenceAdapter } from "./persistence";
import type { SessionStore } from "./session-store";

export interface RenderStateOptions {
  /** Also write blobs to durable storage */
  writeThrough?: boolean;
}

export class RenderStateBridge {
  private states = new Map<string, RenderState>();
  private store: SessionStore;
  private persistence: PersistenceAdapter;
  private log: Logger;
  private writeThrough: boolean;

  constructor(
    store: SessionStore,
    persistence: PersistenceAdapter,
    logger: Logger,
    options: RenderStateOptions = {}
  ) {
    this.store = store;
    this.persistence = persistence;
    this.log = logger;
    this.writeThrough = options.writeThrough ?? false;
  }

  /**
   * Replace the saved state of `sessionId`, here and on the Session itself.
   */
  saveState(sessionId: string, state: RenderState): void {
    this.states.set(sessionId, state);
    this.store.attachRenderState(sessionId, state);

    if (this.writeThrough) {
      try {
        this.persistence.saveRenderState(sessionId, state);
      } catch (error) {
        this.log.error({ error, sessionId }, "Failed to write render state");
      }
    }
    this.log.debug({ sessionId, bytes: state.byteLength }, "Render state saved");
  }

  /**
   * Most recently saved state, or null when the caller should load the
   * session's url from scratch.
   */
  loadState(sessionId: string): RenderState | null {
    const cached = this.states.get(sessionId) ?? this.store.getSession(sessionId)?.renderState;
    if (cached) return cached;
    if (!this.writeThrough) return null;

    const stored = this.persistence.loadRenderState(sessionId);
    if (stored) {
      this.states.set(sessionId, stored);
    }
    return stored;
  }

  hasState(sessionId: string): boolean {
    return this.loadState(sessionId) !== null;
  }

  /**
   * Forget the state of `sessionId`, including any durable copy.
   */
  clearState(sessionId: string): void {
    this.states.delete(sessionId);
    this.store.attachRenderState(sessionId, null);
    if (this.writeThrough) {
      this.removeDurable(sessionId);
    }
  }

  /**
   * Forget every saved state, for cached and live sessions alike.
   */
  clearAll(): void {
    const ids = new Set([...this.states.keys(), ...this.store.getSessions().map((s) => s.id)]);
    this.states.clear();
    for (const id of ids) {
      this.store.attachRenderState(id, null);
    }
    if (this.writeThrough) {
      for (const id of ids) {
        this.removeDurable(id);
      }
    }
  }

  private removeDurable(sessionId: string): void {
    try {
      this.persistence.removeRenderState(sessionId);
    } catch (error) {
      this.log.error({ error, sessionId }, "Failed to remove render state");
    }
  }
}
