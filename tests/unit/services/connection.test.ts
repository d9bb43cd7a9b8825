import { beforeEach, describe, expect, test, vi } from "vitest";
import {
  ConnectionStateMachine,
  DEFAULT_FAILURE_MESSAGE,
  isLegalTransition,
} from "../../../src/services/connection";
import { PersistenceAdapter } from "../../../src/services/persistence";
import { MemoryKeyValueStore } from "../../../src/services/storage";
import type { ConnectionState } from "../../../src/types";
import { FailingKeyValueStore, createClock, createSilentLogger } from "../../setup";

const disconnected: ConnectionState = { kind: "Disconnected" };
const connecting: ConnectionState = { kind: "Connecting" };
const connected: ConnectionState = { kind: "Connected" };

describe("ConnectionStateMachine", () => {
  let persistence: PersistenceAdapter;
  let machine: ConnectionStateMachine;

  beforeEach(() => {
    const logger = createSilentLogger();
    persistence = new PersistenceAdapter(new MemoryKeyValueStore(), logger, {
      now: createClock().now,
    });
    machine = new ConnectionStateMachine(persistence, logger);
  });

  test("starts Disconnected with nothing current", () => {
    expect(machine.state).toEqual(disconnected);
    expect(machine.currentUrl).toBeNull();
    expect(machine.currentSessionId).toBeNull();
  });

  test("onConnectionStarted() records the url and moves to Connecting", () => {
    const listener = vi.fn();
    machine.on("connectionStateChanged", listener);

    machine.onConnectionStarted("https://a.com");

    expect(machine.state).toEqual(connecting);
    expect(machine.currentUrl).toBe("https://a.com");
    expect(listener).toHaveBeenCalledWith(disconnected, connecting, null);
  });

  test("onConnectionSuccess() moves to Connected and records history", () => {
    machine.onConnectionStarted("https://a.com");
    machine.onConnectionSuccess("https://a.com");

    expect(machine.state).toEqual(connected);
    expect(machine.getRecentUrls()).toEqual(["https://a.com"]);
    expect(machine.getLastServerUrl()).toBe("https://a.com");
  });

  test("onConnectionSuccess() still moves to Connected when history cannot be written", () => {
    const logger = createSilentLogger();
    const errorSpy = vi.spyOn(logger, "error");
    const kv = new FailingKeyValueStore();
    const isolated = new ConnectionStateMachine(new PersistenceAdapter(kv, logger), logger);
    const listener = vi.fn();
    isolated.on("connectionStateChanged", listener);

    isolated.onConnectionStarted("https://a.com", "s1");
    kv.failing = true;
    isolated.onConnectionSuccess("https://a.com", "s1");

    expect(isolated.state).toEqual(connected);
    expect(listener).toHaveBeenLastCalledWith(connecting, connected, "s1");
    expect(errorSpy).toHaveBeenCalledWith(
      expect.objectContaining({ url: "https://a.com" }),
      "Failed to record recent server"
    );
  });

  test("onConnectionFailed() stores the message verbatim", () => {
    machine.onConnectionStarted("https://a.com");
    machine.onConnectionFailed("net::ERR_CONNECTION_REFUSED");

    expect(machine.state).toEqual({ kind: "Error", message: "net::ERR_CONNECTION_REFUSED" });
    expect(machine.getRecentUrls()).toEqual([]);
  });

  test("onConnectionFailed() without a message uses the default text", () => {
    machine.onConnectionFailed();

    expect(machine.state).toEqual({ kind: "Error", message: DEFAULT_FAILURE_MESSAGE });
  });

  test("passes the session id as context", () => {
    const listener = vi.fn();
    machine.on("connectionStateChanged", listener);

    machine.onConnectionStarted("https://a.com", "s1");

    expect(machine.currentSessionId).toBe("s1");
    expect(listener).toHaveBeenCalledWith(disconnected, connecting, "s1");
  });

  test("notifies on every update, including repeats of the same state", () => {
    const listener = vi.fn();
    machine.on("connectionStateChanged", listener);

    machine.onConnectionStarted("https://a.com");
    machine.onConnectionStarted("https://a.com");

    expect(listener).toHaveBeenCalledTimes(2);
    expect(listener).toHaveBeenLastCalledWith(connecting, connecting, null);
  });

  test("still applies transitions outside the lifecycle", () => {
    machine.onConnectionSuccess("https://a.com");

    expect(machine.state).toEqual(connected);
  });

  test("onDisconnected() clears the current session only when it matches", () => {
    machine.onConnectionStarted("https://a.com", "s1");

    machine.onDisconnected("other");
    expect(machine.currentSessionId).toBe("s1");

    machine.onDisconnected("s1");
    expect(machine.currentSessionId).toBeNull();
    expect(machine.state).toEqual(disconnected);
  });

  test("switchToSession() records the switch without changing state", () => {
    const switched = vi.fn();
    const changed = vi.fn();
    machine.on("sessionSwitched", switched);
    machine.on("connectionStateChanged", changed);

    machine.switchToSession("s2", "https://b.com");

    expect(machine.currentSessionId).toBe("s2");
    expect(machine.currentUrl).toBe("https://b.com");
    expect(switched).toHaveBeenCalledWith("s2", "https://b.com");
    expect(changed).not.toHaveBeenCalled();
  });

  test("off() removes a listener", () => {
    const listener = vi.fn();
    machine.on("connectionStateChanged", listener);
    machine.off("connectionStateChanged", listener);

    machine.onDisconnected();

    expect(listener).not.toHaveBeenCalled();
  });

  test("clearHistory() empties the recent list", () => {
    machine.onConnectionSuccess("https://a.com");
    machine.clearHistory();

    expect(machine.getRecentUrls()).toEqual([]);
  });
});

describe("isLegalTransition", () => {
  const error: ConnectionState = { kind: "Error", message: "x" };

  test("follows the connection lifecycle", () => {
    expect(isLegalTransition(disconnected, connecting)).toBe(true);
    expect(isLegalTransition(connecting, connected)).toBe(true);
    expect(isLegalTransition(connecting, error)).toBe(true);
    expect(isLegalTransition(connected, connecting)).toBe(true);
    expect(isLegalTransition(error, disconnected)).toBe(true);
  });

  test("rejects skipped steps", () => {
    expect(isLegalTransition(disconnected, connected)).toBe(false);
    expect(isLegalTransition(connected, error)).toBe(false);
    expect(isLegalTransition(error, connected)).toBe(false);
  });

  test("allows repeating the current state", () => {
    expect(isLegalTransition(connected, connected)).toBe(true);
  });
});
