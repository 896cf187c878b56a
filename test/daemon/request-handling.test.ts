import { describe, expect, test } from "vitest";
import { PROTOCOL_VERSION } from "@cmdtrail/daemon";
import { openRawSocket, rawConnect, sendRawRequest, sendRawText, startTestDaemon } from "../helpers/daemon.js";
import { createTestWorkspace, removeTestWorkspace } from "../helpers/workspace.js";

describe("daemon request handling", () => {
  test("given malformed and invalid requests, when sent on one connection, then each fails alone and the connection stays usable", async () => {
    const home = createTestWorkspace("daemon-invalid");
    const daemon = await startTestDaemon(home);
    const ws = await openRawSocket(daemon.paths.socketPath);
    try {
      const garbage = await sendRawText(ws, "not json");
      expect(garbage.ok).toBe(false);
      expect(garbage.error?.code).toBe("invalid_request");

      const early = await sendRawRequest(ws, "daemon.health", {});
      expect(early.error).toMatchObject({ code: "bad_state", message: "call connect first" });

      const hello = await rawConnect(ws);
      expect(hello.ok).toBe(true);
      expect(hello.payload).toMatchObject({ type: "hello-ok", protocol: PROTOCOL_VERSION });

      const again = await rawConnect(ws);
      expect(again.error).toMatchObject({ code: "bad_state", message: "connection already established" });

      const unknown = await sendRawRequest(ws, "events.drop", {});
      expect(unknown.error).toMatchObject({ code: "method_not_found", message: "method not found: events.drop" });

      const badParams = await sendRawRequest(ws, "events.append", { command: "ls" });
      expect(badParams.ok).toBe(false);
      expect(badParams.error?.code).toBe("invalid_request");

      const badMode = await sendRawRequest(ws, "events.search", { mode: "session" });
      expect(badMode.error).toMatchObject({
        code: "invalid_request",
        message: "search mode 'session' requires a sessionId",
      });

      const health = await sendRawRequest(ws, "daemon.health", {});
      expect(health.ok).toBe(true);
      expect(health.payload).toMatchObject({ ok: true, machine: "laptop", events: 0 });
    } finally {
      ws.close();
      await daemon.stop();
      removeTestWorkspace(home);
    }
  });

  test("given a client on another protocol version, when connecting, then the handshake is refused", async () => {
    const home = createTestWorkspace("daemon-protocol");
    const daemon = await startTestDaemon(home);
    const ws = await openRawSocket(daemon.paths.socketPath);
    try {
      const response = await sendRawRequest(ws, "connect", {
        protocol: PROTOCOL_VERSION + 1,
        client: { id: "raw-test", version: "0.1.0" },
      });
      expect(response.error).toMatchObject({
        code: "invalid_request",
        message: `protocol mismatch: server=${PROTOCOL_VERSION}, client=${PROTOCOL_VERSION + 1}`,
      });
    } finally {
      ws.close();
      await daemon.stop();
      removeTestWorkspace(home);
    }
  });

  test("given no running search, when cancelling by id, then nothing is cancelled", async () => {
    const home = createTestWorkspace("daemon-cancel");
    const daemon = await startTestDaemon(home);
    const ws = await openRawSocket(daemon.paths.socketPath);
    try {
      await rawConnect(ws);
      const response = await sendRawRequest(ws, "events.search-cancel", { searchId: "missing" });
      expect(response.payload).toEqual({ searchId: "missing", cancelled: false });
    } finally {
      ws.close();
      await daemon.stop();
      removeTestWorkspace(home);
    }
  });
});
