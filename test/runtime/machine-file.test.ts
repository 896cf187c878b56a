import { join } from "node:path";
import { describe, expect, test } from "vitest";
import {
  CorruptFileError,
  MACHINE_FILE_FORMAT,
  createMachineFile,
  encodeEvent,
  loadMachineFile,
  parseMachineFile,
  writeMachineFile,
} from "@cmdtrail/runtime";
import { createTestWorkspace, makeEvent, removeTestWorkspace } from "../helpers/workspace.js";

function container(overrides: Record<string, unknown>): string {
  return JSON.stringify({
    format_version: MACHINE_FILE_FORMAT,
    machine_id: "m1",
    created_at: "2026-01-01T00:00:00.000Z",
    events: [],
    ...overrides,
  });
}

describe("machine files", () => {
  test("given a newer format version, when parsed, then the file is refused as corrupt", () => {
    expect(() => parseMachineFile(container({ format_version: "cmdtrail-history-v2" }), "/h/m1.json")).toThrow(
      "corrupt history file /h/m1.json: unsupported format_version cmdtrail-history-v2",
    );
  });

  test("given no format version, when parsed, then the file is refused as corrupt", () => {
    expect(() => parseMachineFile(JSON.stringify({ machine_id: "m1", events: [] }), "/h/m1.json")).toThrow(
      "corrupt history file /h/m1.json: missing format_version",
    );
  });

  test("given a half-written file, when parsed, then it is reported as not valid JSON", () => {
    let caught: unknown;
    try {
      parseMachineFile('{"format_version":', "/h/m1.json");
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(CorruptFileError);
    expect(caught instanceof CorruptFileError ? caught.reason : undefined).toBe(
      "not valid JSON (possibly still being written)",
    );
  });

  test("given bad and repeated records, when parsed, then good records survive sorted by sequence", () => {
    const loaded = parseMachineFile(
      container({
        events: [
          encodeEvent(makeEvent({ sequence: 3, command: "third" })),
          encodeEvent(makeEvent({ sequence: 1, command: "first" })),
          encodeEvent(makeEvent({ sequence: 3, command: "repeat" })),
          { command: 42 },
          encodeEvent(makeEvent({ sequence: 2, machine: "elsewhere" })),
        ],
      }),
      "/h/m1.json",
    );

    expect(loaded.corruptRecords).toBe(2);
    expect(loaded.file.events.map((event) => [event.sequence, event.command])).toEqual([
      [1, "first"],
      [3, "third"],
    ]);
  });

  test("given a record without a machine, when parsed, then it takes the file's machine", () => {
    const record: Record<string, unknown> = { ...encodeEvent(makeEvent({ sequence: 1 })) };
    delete record.machine;
    const loaded = parseMachineFile(container({ machine_id: "desk", events: [record] }), "/h/desk.json");
    expect(loaded.file.events[0]?.machine).toBe("desk");
  });

  test("given a written file, when loaded, then header and events come back", async () => {
    const workspace = createTestWorkspace("machine-file");
    try {
      const filePath = join(workspace, "root", "m1.recent.json");
      const file = createMachineFile({
        machineId: "m1",
        createdAt: "2026-01-01T00:00:00.000Z",
        fileId: "m1-file",
        kind: "recent",
        events: [makeEvent({ sequence: 1, exitCode: null, folder: null, sessionId: null })],
      });
      await writeMachineFile(filePath, file);

      const loaded = await loadMachineFile(filePath);
      expect(loaded.corruptRecords).toBe(0);
      expect(loaded.file).toEqual(file);
    } finally {
      removeTestWorkspace(workspace);
    }
  });
});
