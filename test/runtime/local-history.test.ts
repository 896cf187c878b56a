import { appendFileSync, existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { describe, expect, test } from "vitest";
import { LocalHistory, parseMachineFile, recoverJournal } from "@cmdtrail/runtime";
import { createTestWorkspace, makeEvent, removeTestWorkspace } from "../helpers/workspace.js";

const createdAt = new Date(2026, 0, 2, 3, 4, 5);

function openHistory(workspace: string, machineId: string, compactAfterEvents = 500): LocalHistory {
  return new LocalHistory({
    journalPath: join(workspace, "journal.jsonl"),
    archiveDir: join(workspace, "archive"),
    machineId,
    compactAfterEvents,
    now: () => createdAt,
  });
}

describe("local history", () => {
  test("given an empty home, when opened, then a journal is created with a new file id", () => {
    const workspace = createTestWorkspace("local-fresh");
    try {
      const history = openHistory(workspace, "laptop");
      expect(history.open()).toEqual({ created: true, events: 0, corruptRecords: 0, truncatedBytes: 0 });
      expect(history.fileId).toMatch(/^laptop-20260102T030405-[0-9a-f]{6}$/);
      expect(history.createdAt).toBe(createdAt.toISOString());
      expect(recoverJournal(join(workspace, "journal.jsonl")).header?.file_id).toBe(history.fileId);
    } finally {
      removeTestWorkspace(workspace);
    }
  });

  test("given appended events, when reopened, then they are restored in sequence order", async () => {
    const workspace = createTestWorkspace("local-reopen");
    try {
      const history = openHistory(workspace, "laptop");
      history.open();
      await history.appendLocal(makeEvent({ sequence: 1, machine: "laptop" }));
      await history.appendLocal(makeEvent({ sequence: 2, machine: "laptop" }));

      const reopened = openHistory(workspace, "laptop");
      expect(reopened.open()).toEqual({ created: false, events: 2, corruptRecords: 0, truncatedBytes: 0 });
      expect(reopened.fileId).toBe(history.fileId);
      expect(reopened.localEvents.map((event) => event.sequence)).toEqual([1, 2]);
      expect(reopened.maxSequence).toBe(2);
    } finally {
      removeTestWorkspace(workspace);
    }
  });

  test("given an event out of order or from another machine, when appended, then it is refused", async () => {
    const workspace = createTestWorkspace("local-refuse");
    try {
      const history = openHistory(workspace, "laptop");
      history.open();
      await history.appendLocal(makeEvent({ sequence: 1, machine: "laptop" }));

      await expect(history.appendLocal(makeEvent({ sequence: 1, machine: "laptop" }))).rejects.toThrow(
        "sequence 1 is not above 1",
      );
      await expect(history.appendLocal(makeEvent({ sequence: 2, machine: "desk" }))).rejects.toThrow(
        "refusing to journal an event of machine desk",
      );
    } finally {
      removeTestWorkspace(workspace);
    }
  });

  test("given enough journal lines, when compacted, then the snapshot holds them and the journal empties", async () => {
    const workspace = createTestWorkspace("local-compact");
    try {
      const history = openHistory(workspace, "laptop", 2);
      history.open();
      await history.appendLocal(makeEvent({ sequence: 1, machine: "laptop" }));
      expect(history.needsCompaction()).toBe(false);
      await history.appendLocal(makeEvent({ sequence: 2, machine: "laptop" }));
      expect(history.needsCompaction()).toBe(true);

      await history.snapshotLocal();

      expect(history.journalLines).toBe(0);
      expect(history.needsCompaction()).toBe(false);
      const snapshot = parseMachineFile(readFileSync(history.snapshotPath, "utf8"), history.snapshotPath);
      expect(snapshot.file.kind).toBe("full");
      expect(snapshot.file.fileId).toBe(history.fileId);
      expect(snapshot.file.events.map((event) => event.sequence)).toEqual([1, 2]);

      await history.appendLocal(makeEvent({ sequence: 3, machine: "laptop" }));
      const reopened = openHistory(workspace, "laptop", 2);
      expect(reopened.open().events).toBe(3);
      expect(reopened.journalLines).toBe(1);
    } finally {
      removeTestWorkspace(workspace);
    }
  });

  test("given a journal from another machine id, when opened, then it is retired to the archive", async () => {
    const workspace = createTestWorkspace("local-retire");
    try {
      const original = openHistory(workspace, "laptop");
      original.open();
      await original.appendLocal(makeEvent({ sequence: 1, machine: "laptop" }));
      const retiredPath = join(workspace, "archive", `${original.fileId}.json`);

      const renamed = openHistory(workspace, "laptop-2");
      expect(renamed.open()).toEqual({ created: true, events: 0, corruptRecords: 0, truncatedBytes: 0 });
      expect(renamed.fileId).not.toBe(original.fileId);
      expect(existsSync(retiredPath)).toBe(true);

      const retired = parseMachineFile(readFileSync(retiredPath, "utf8"), retiredPath);
      expect(retired.file.machineId).toBe("laptop");
      expect(retired.file.events.map((event) => event.sequence)).toEqual([1]);
    } finally {
      removeTestWorkspace(workspace);
    }
  });

  test("given a torn journal tail, when opened, then it is truncated and the whole lines survive", async () => {
    const workspace = createTestWorkspace("local-torn");
    try {
      const history = openHistory(workspace, "laptop");
      history.open();
      await history.appendLocal(makeEvent({ sequence: 1, machine: "laptop" }));
      appendFileSync(join(workspace, "journal.jsonl"), '{"event":', "utf8");

      const reopened = openHistory(workspace, "laptop");
      expect(reopened.open()).toEqual({ created: false, events: 1, corruptRecords: 0, truncatedBytes: 9 });
    } finally {
      removeTestWorkspace(workspace);
    }
  });
});
