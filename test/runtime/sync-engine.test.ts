import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { describe, expect, test } from "vitest";
import {
  EventStore,
  LocalHistory,
  SyncEngine,
  createMachineFile,
  eventKey,
  loadMachineFile,
  writeMachineFile,
} from "@cmdtrail/runtime";
import { createTestWorkspace, makeEvent, removeTestWorkspace } from "../helpers/workspace.js";

interface TestMachine {
  store: EventStore;
  local: LocalHistory;
  sync: SyncEngine;
}

function createMachine(workspace: string, machineId: string, root: string | null, recentLimit = 1_000): TestMachine {
  const home = join(workspace, machineId);
  const local = new LocalHistory({
    journalPath: join(home, "journal.jsonl"),
    archiveDir: join(home, "archive"),
    machineId,
  });
  local.open();
  const store = new EventStore({ machineId });
  store.restoreLocal(local.localEvents);
  const sync = new SyncEngine({
    store,
    local,
    archiveDir: join(home, "archive"),
    root,
    recentLimit,
  });
  return { store, local, sync };
}

async function record(machine: TestMachine, command: string, startTime: number): Promise<void> {
  const event = machine.store.appendLocal({
    command,
    startTime,
    endTime: startTime,
    exitCode: 0,
    folder: "/work",
    sessionId: "s1",
  });
  await machine.local.appendLocal(event);
}

function keys(machine: TestMachine): string[] {
  return machine.store.snapshot().ordered.map((event) => eventKey(event));
}

describe("sync engine", () => {
  test("given two machines sharing a root, when both sync, then each sees the other's events once", async () => {
    const workspace = createTestWorkspace("sync-pair");
    try {
      const root = join(workspace, "shared");
      mkdirSync(root);
      const laptop = createMachine(workspace, "laptop", root);
      const desk = createMachine(workspace, "desk", root);

      await record(laptop, "make build", 100);
      await record(laptop, "make test", 200);
      const published = await laptop.sync.syncNow();
      expect(published.rootAvailable).toBe(true);
      expect(published.published).toEqual({
        recentPath: join(root, `${laptop.local.fileId}.recent.json`),
        archivePath: undefined,
        events: 2,
      });
      expect(published.compacted).toBe(true);

      await record(desk, "htop", 150);
      const merged = await desk.sync.syncNow();
      expect(merged.scannedFiles).toBe(1);
      expect(merged.inserted).toBe(2);
      expect(merged.mergedFiles).toBe(1);
      expect(keys(desk)).toEqual(["laptop:1", "desk:1", "laptop:2"]);

      await laptop.sync.syncNow();
      expect(keys(laptop)).toEqual(keys(desk));

      const again = await desk.sync.syncNow();
      expect(again.scannedFiles).toBe(1);
      expect(again.unchangedFiles).toBe(1);
      expect(again.inserted).toBe(0);
      expect(again.published).toBeNull();
    } finally {
      removeTestWorkspace(workspace);
    }
  });

  test("given new events after a merge, when synced again, then only the new ones are inserted", async () => {
    const workspace = createTestWorkspace("sync-incremental");
    try {
      const root = join(workspace, "shared");
      mkdirSync(root);
      const laptop = createMachine(workspace, "laptop", root);
      const desk = createMachine(workspace, "desk", root);

      await record(laptop, "one", 100);
      await laptop.sync.syncNow();
      await desk.sync.syncNow();

      await record(laptop, "two", 200);
      await laptop.sync.syncNow();
      const report = await desk.sync.syncNow();

      expect(report.inserted).toBe(1);
      expect(report.duplicates).toBe(0);
      expect(desk.store.stats().machines.laptop).toEqual({ events: 2, maxSequence: 2 });
    } finally {
      removeTestWorkspace(workspace);
    }
  });

  test("given recent history past twice the limit, when published, then older events roll into the archive file", async () => {
    const workspace = createTestWorkspace("sync-rollover");
    try {
      const root = join(workspace, "shared");
      mkdirSync(root);
      const laptop = createMachine(workspace, "laptop", root, 1);
      await record(laptop, "one", 100);
      await record(laptop, "two", 200);
      await record(laptop, "three", 300);

      const report = await laptop.sync.syncNow();
      const archivePath = join(root, `${laptop.local.fileId}.archive.json`);
      expect(report.published?.archivePath).toBe(archivePath);

      const recent = await loadMachineFile(join(root, `${laptop.local.fileId}.recent.json`));
      const archive = await loadMachineFile(archivePath);
      expect(recent.file.kind).toBe("recent");
      expect(recent.file.events.map((event) => event.sequence)).toEqual([3]);
      expect(archive.file.kind).toBe("archive");
      expect(archive.file.events.map((event) => event.sequence)).toEqual([1, 2]);
    } finally {
      removeTestWorkspace(workspace);
    }
  });

  test("given a missing root, when syncing, then the run stays local-only and reports why", async () => {
    const workspace = createTestWorkspace("sync-missing-root");
    try {
      const root = join(workspace, "not-mounted");
      const laptop = createMachine(workspace, "laptop", root);
      await record(laptop, "one", 100);

      const report = await laptop.sync.syncNow();
      expect(report.rootAvailable).toBe(false);
      expect(report.rootError?.startsWith(`replication root unavailable: ${root}`)).toBe(true);
      expect(report.published).toBeNull();
      expect(report.compacted).toBe(true);
    } finally {
      removeTestWorkspace(workspace);
    }
  });

  test("given a corrupt file in the root, when syncing, then it is skipped and reported", async () => {
    const workspace = createTestWorkspace("sync-corrupt");
    try {
      const root = join(workspace, "shared");
      mkdirSync(root);
      const badPath = join(root, "other.recent.json");
      writeFileSync(badPath, '{"format_version":', "utf8");
      const laptop = createMachine(workspace, "laptop", root);

      const report = await laptop.sync.syncNow();
      expect(report.corruptFiles).toBe(1);
      expect(laptop.sync.getStatus().corruptFiles).toEqual([
        { path: badPath, reason: "not valid JSON (possibly still being written)" },
      ]);
    } finally {
      removeTestWorkspace(workspace);
    }
  });

  test("given a sync in progress, when another is requested, then both share one run", async () => {
    const workspace = createTestWorkspace("sync-shared-run");
    try {
      const laptop = createMachine(workspace, "laptop", null);
      const first = laptop.sync.syncNow();
      const second = laptop.sync.syncNow();
      expect(second).toBe(first);
      await first;
      expect(laptop.sync.getStatus().running).toBe(false);
    } finally {
      removeTestWorkspace(workspace);
    }
  });

  test("given a file with this machine id under another file id, when synced, then new local sequences continue above it", async () => {
    const workspace = createTestWorkspace("sync-shared-id");
    try {
      const root = join(workspace, "shared");
      mkdirSync(root);
      const laptop = createMachine(workspace, "laptop", root);
      await record(laptop, "one", 100);

      const events = [1, 2, 3, 4, 5].map((sequence) => makeEvent({ sequence, machine: "laptop" }));
      await writeMachineFile(
        join(root, "old-install.recent.json"),
        createMachineFile({
          machineId: "laptop",
          createdAt: "2024-01-01T00:00:00Z",
          fileId: "old-install",
          kind: "recent",
          events,
        }),
      );

      const report = await laptop.sync.syncNow();
      expect(report.inserted).toBe(4);
      expect(report.duplicates).toBe(1);
      expect(laptop.store.nextSequence).toBe(6);

      const next = laptop.store.appendLocal({
        command: "after",
        startTime: 300,
        endTime: 300,
        exitCode: 0,
        folder: "/work",
        sessionId: "s1",
      });
      expect(next.sequence).toBe(6);
    } finally {
      removeTestWorkspace(workspace);
    }
  });
});
