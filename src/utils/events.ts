/**
 * Typed synchronous event bus
 *
 * Listeners run in registration order on the caller's stack, before emit
 * returns. The listener list is snapshotted per emit, so handlers may
 * subscribe or unsubscribe while a dispatch is in progress.
 */

import type { Logger } from "pino";

type EventArgs = readonly unknown[];

export type Listener<Args extends EventArgs> = (...args: Args) => void;

export class EventBus<Events extends { [K in keyof Events]: EventArgs }> {
  private listeners: { [K in keyof Events]?: Listener<Events[K]>[] } = {};
  private log: Logger;

  constructor(logger: Logger) {
    this.log = logger;
  }

  /**
   * Register a listener. Returns a function that removes it.
   */
  on<K extends keyof Events>(event: K, listener: Listener<Events[K]>): () => void {
    const list = this.listeners[event] ?? [];
    list.push(listener);
    this.listeners[event] = list;
    return () => this.off(event, listener);
  }

  off<K extends keyof Events>(event: K, listener: Listener<Events[K]>): void {
    const list = this.listeners[event];
    if (!list) return;
    const index = list.indexOf(listener);
    if (index !== -1) {
      list.splice(index, 1);
    }
  }

  /**
   * Deliver an event to every listener registered at the time of the call.
   * A throwing listener is logged and does not stop the others.
   */
  emit<K extends keyof Events>(event: K, ...args: Events[K]): void {
    const snapshot = [...(this.listeners[event] ?? [])];
    for (const listener of snapshot) {
      try {
        listener(...args);
      } catch (error) {
        this.log.error({ error, event: String(event) }, "Event listener failed");
      }
    }
  }

  listenerCount<K extends keyof Events>(event: K): number {
    return this.listeners[event]?.length ?? 0;
  }
}
