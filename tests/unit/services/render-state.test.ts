import { beforeEach, describe, expect, test, vi } from "vitest";
import type { Logger } from "pino";
import { PersistenceAdapter } from "../../../src/services/persistence";
import { RenderStateBridge } from "../../../src/services/render-state";
import { SessionStore } from "../../../src/services/session-store";
import { MemoryKeyValueStore } from "../../../src/services/storage";
import { blob, createClock, createIdGenerator, createSilentLogger, text } from "../../setup";

describe("RenderStateBridge", () => {
  let kv: MemoryKeyValueStore;
  let logger: Logger;
  let persistence: PersistenceAdapter;
  let store: SessionStore;

  function bridge(writeThrough = false): RenderStateBridge {
    return new RenderStateBridge(store, persistence, logger, { writeThrough });
  }

  beforeEach(() => {
    kv = new MemoryKeyValueStore();
    logger = createSilentLogger();
    const clock = createClock();
    persistence = new PersistenceAdapter(kv, logger, { now: clock.now });
    store = new SessionStore(persistence, logger, {
      now: clock.now,
      generateId: createIdGenerator(),
    });
  });

  test("returns null when nothing was saved", () => {
    const session = store.createSession("https://a.com");

    expect(bridge().loadState(session.id)).toBeNull();
    expect(bridge().hasState(session.id)).toBe(false);
  });

  test("returns the most recently saved blob", () => {
    const session = store.createSession("https://a.com");
    const states = bridge();

    states.saveState(session.id, blob("first"));
    states.saveState(session.id, blob("second"));

    expect(text(states.loadState(session.id))).toBe("second");
  });

  test("writes the blob onto the session", () => {
    const session = store.createSession("https://a.com");

    bridge().saveState(session.id, blob("scroll=40"));

    expect(text(store.getSession(session.id)?.renderState ?? null)).toBe("scroll=40");
  });

  test("falls back to the blob held by the session", () => {
    const session = store.createSession("https://a.com");
    bridge().saveState(session.id, blob("kept"));

    expect(text(bridge().loadState(session.id))).toBe("kept");
  });

  test("keeps blobs in memory only by default", () => {
    const session = store.createSession("https://a.com");

    bridge().saveState(session.id, blob("x"));

    expect(kv.get(`render_state:${session.id}`)).toBeNull();
  });

  test("clearState() forgets the blob", () => {
    const session = store.createSession("https://a.com");
    const states = bridge();
    states.saveState(session.id, blob("x"));

    states.clearState(session.id);

    expect(states.loadState(session.id)).toBeNull();
    expect(store.getSession(session.id)?.renderState).toBeNull();
  });

  describe("write-through", () => {
    test("survives a restart", () => {
      const session = store.createSession("https://a.com");
      bridge(true).saveState(session.id, blob("form"));

      const restarted = new SessionStore(persistence, logger);
      restarted.restore();
      const afterRestart = new RenderStateBridge(restarted, persistence, logger, { writeThrough: true });

      expect(restarted.getSession(session.id)?.renderState).toBeNull();
      expect(text(afterRestart.loadState(session.id))).toBe("form");
    });

    test("clearState() removes the durable copy", () => {
      const session = store.createSession("https://a.com");
      const states = bridge(true);
      states.saveState(session.id, blob("form"));

      states.clearState(session.id);

      expect(kv.get(`render_state:${session.id}`)).toBeNull();
    });

    test("clearAll() removes every blob", () => {
      const a = store.createSession("https://a.com");
      const b = store.createSession("https://b.com");
      const states = bridge(true);
      states.saveState(a.id, blob("a"));
      states.saveState(b.id, blob("b"));

      states.clearAll();

      expect(states.loadState(a.id)).toBeNull();
      expect(states.loadState(b.id)).toBeNull();
      expect(kv.get(`render_state:${a.id}`)).toBeNull();
    });

    test("logs a failed durable write and keeps the in-memory copy", () => {
      const session = store.createSession("https://a.com");
      const states = bridge(true);
      const errorSpy = vi.spyOn(logger, "error");
      vi.spyOn(persistence, "saveRenderState").mockImplementation(() => {
        throw new Error("Disk full");
      });

      states.saveState(session.id, blob("x"));

      expect(errorSpy).toHaveBeenCalledTimes(1);
      expect(text(states.loadState(session.id))).toBe("x");
    });
  });
});
