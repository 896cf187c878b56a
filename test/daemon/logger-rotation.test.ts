import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { describe, expect, test } from "vitest";
import { DEFAULT_LOG_LEVEL, StructuredLogger } from "@cmdtrail/daemon";
import { createTestWorkspace, removeTestWorkspace } from "../helpers/workspace.js";

describe("daemon logger", () => {
  test("given pre-existing rotated files, when logger exceeds size threshold, then rotation still succeeds", () => {
    const root = createTestWorkspace("daemon-log");
    const logFilePath = join(root, "daemon.log");
    try {
      const logger = new StructuredLogger({
        logFilePath,
        maxBytes: 256 * 1024,
        maxFiles: 2,
      });

      const large = "x".repeat(300_000);
      logger.info(large);
      logger.info(large);
      logger.info(large);

      expect(existsSync(logFilePath)).toBe(true);
      expect(existsSync(`${logFilePath}.1`)).toBe(true);
      expect(existsSync(`${logFilePath}.2`)).toBe(true);
      expect(existsSync(`${logFilePath}.3`)).toBe(false);

      const current = readFileSync(logFilePath, "utf8");
      const rotated1 = readFileSync(`${logFilePath}.1`, "utf8");
      expect(current.length).toBeGreaterThan(0);
      expect(rotated1.length).toBeGreaterThan(0);
    } finally {
      removeTestWorkspace(root);
    }
  });

  test("given a minimum level, when logging below it, then only records at or above it are written", () => {
    const root = createTestWorkspace("daemon-log-level");
    const logFilePath = join(root, "nested", "daemon.log");
    try {
      const logger = new StructuredLogger({ logFilePath, minLevel: "warn" });
      logger.debug("dropped");
      logger.info("dropped too");
      logger.warn("journal lagging", { pendingWrites: 4 });

      const lines = readFileSync(logFilePath, "utf8").trim().split("\n");
      expect(lines).toHaveLength(1);
      expect(JSON.parse(lines[0] ?? "")).toEqual({
        ts: expect.any(String),
        level: "warn",
        message: "journal lagging",
        pendingWrites: 4,
      });
    } finally {
      removeTestWorkspace(root);
    }
  });

  test("given no minimum level, when per-request debug records are logged, then only info and above are kept", () => {
    const root = createTestWorkspace("daemon-log-default");
    const logFilePath = join(root, "daemon.log");
    try {
      const logger = new StructuredLogger({ logFilePath });
      logger.debug("request received", { method: "events.append" });
      logger.debug("request completed", { method: "events.append" });
      logger.info("daemon started");

      const lines = readFileSync(logFilePath, "utf8").trim().split("\n");
      expect(DEFAULT_LOG_LEVEL).toBe("info");
      expect(lines.map((line) => JSON.parse(line).message)).toEqual(["daemon started"]);
    } finally {
      removeTestWorkspace(root);
    }
  });
});
