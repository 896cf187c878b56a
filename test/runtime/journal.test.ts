import { appendFileSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { describe, expect, test } from "vitest";
import {
  HistoryJournal,
  JOURNAL_FORMAT,
  LocalStorageError,
  encodeEvent,
  recoverJournal,
  type JournalHeader,
} from "@cmdtrail/runtime";
import { createTestWorkspace, makeEvent, removeTestWorkspace } from "../helpers/workspace.js";

const header: JournalHeader = {
  format: JOURNAL_FORMAT,
  machine_id: "m1",
  file_id: "m1-file",
  created_at: "2026-01-01T00:00:00.000Z",
};

function eventLine(sequence: number): string {
  return `${JSON.stringify({ event: encodeEvent(makeEvent({ sequence })) })}\n`;
}

describe("journal recovery", () => {
  test("given a torn trailing line, when recovered without repair, then the file is left alone", () => {
    const workspace = createTestWorkspace("journal-torn");
    try {
      const filePath = join(workspace, "journal.jsonl");
      const complete = `${JSON.stringify(header)}\n${eventLine(1)}`;
      const torn = '{"event":{"comm';
      writeFileSync(filePath, complete + torn, "utf8");

      const readOnly = recoverJournal(filePath, { repair: false });
      expect(readOnly.header).toEqual(header);
      expect(readOnly.events.map((event) => event.sequence)).toEqual([1]);
      expect(readOnly.truncatedBytes).toBe(Buffer.byteLength(torn));
      expect(readFileSync(filePath, "utf8")).toBe(complete + torn);

      const repaired = recoverJournal(filePath);
      expect(repaired.truncatedBytes).toBe(Buffer.byteLength(torn));
      expect(readFileSync(filePath, "utf8")).toBe(complete);
    } finally {
      removeTestWorkspace(workspace);
    }
  });

  test("given an unparseable line in the middle, when recovered, then it is counted and skipped", () => {
    const workspace = createTestWorkspace("journal-corrupt");
    try {
      const filePath = join(workspace, "journal.jsonl");
      writeFileSync(filePath, `${JSON.stringify(header)}\n${eventLine(1)}not json\n${eventLine(2)}`, "utf8");

      const recovery = recoverJournal(filePath);
      expect(recovery.corruptLines).toBe(1);
      expect(recovery.truncatedBytes).toBe(0);
      expect(recovery.events.map((event) => event.sequence)).toEqual([1, 2]);
    } finally {
      removeTestWorkspace(workspace);
    }
  });

  test("given no journal, when recovered, then nothing is found", () => {
    expect(recoverJournal("/nonexistent/journal.jsonl")).toEqual({
      events: [],
      corruptLines: 0,
      truncatedBytes: 0,
    });
  });
});

describe("history journal", () => {
  test("given concurrent appends, when flushed, then lines land in call order", async () => {
    const workspace = createTestWorkspace("journal-append");
    try {
      const filePath = join(workspace, "journal.jsonl");
      const journal = new HistoryJournal(filePath, header);
      journal.initialize();

      await Promise.all([1, 2, 3].map((sequence) => journal.append(makeEvent({ sequence }))));
      await journal.flush();

      expect(journal.lineCount).toBe(3);
      expect(recoverJournal(filePath).events.map((event) => event.sequence)).toEqual([1, 2, 3]);
    } finally {
      removeTestWorkspace(workspace);
    }
  });

  test("given a rewrite, when it completes, then only the survivors follow the header", async () => {
    const workspace = createTestWorkspace("journal-rewrite");
    try {
      const filePath = join(workspace, "journal.jsonl");
      const journal = new HistoryJournal(filePath, header);
      journal.initialize([makeEvent({ sequence: 1 }), makeEvent({ sequence: 2 })]);
      expect(journal.lineCount).toBe(2);

      await journal.rewrite(() => [makeEvent({ sequence: 2 })]);

      expect(journal.lineCount).toBe(1);
      expect(readFileSync(filePath, "utf8")).toBe(`${JSON.stringify(header)}\n${eventLine(2)}`);
    } finally {
      removeTestWorkspace(workspace);
    }
  });

  test("given a journal whose directory vanished, when appending, then it fails and stays failed", async () => {
    const workspace = createTestWorkspace("journal-failure");
    try {
      const directory = join(workspace, "state");
      const filePath = join(directory, "journal.jsonl");
      const journal = new HistoryJournal(filePath, header);
      journal.initialize();
      rmSync(directory, { recursive: true, force: true });

      await expect(journal.append(makeEvent({ sequence: 1 }))).rejects.toBeInstanceOf(LocalStorageError);
      await expect(journal.append(makeEvent({ sequence: 2 }))).rejects.toBeInstanceOf(LocalStorageError);
      await expect(journal.flush()).rejects.toBeInstanceOf(LocalStorageError);
    } finally {
      removeTestWorkspace(workspace);
    }
  });

  test("given existing lines, when constructed over them, then the line count starts there", () => {
    const workspace = createTestWorkspace("journal-count");
    try {
      const filePath = join(workspace, "journal.jsonl");
      writeFileSync(filePath, JSON.stringify(header) + "\n", "utf8");
      appendFileSync(filePath, eventLine(1) + eventLine(2), "utf8");
      const journal = new HistoryJournal(filePath, header, recoverJournal(filePath).events.length);
      expect(journal.lineCount).toBe(2);
    } finally {
      removeTestWorkspace(workspace);
    }
  });
});
