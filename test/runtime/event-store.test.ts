import { describe, expect, test } from "vitest";
import { EventStore, compareEvents, eventKey } from "@cmdtrail/runtime";
import { makeEvent } from "../helpers/workspace.js";

function keysOf(events: readonly { machine: string; sequence: number }[]): string[] {
  return events.map((event) => eventKey(event));
}

describe("event store", () => {
  test("given appended commands, when appending locally, then sequences count up from one per machine", () => {
    const store = new EventStore({ machineId: "laptop" });
    const first = store.appendLocal({
      command: "ls",
      startTime: 10,
      endTime: 11,
      exitCode: 0,
      folder: "/tmp",
      sessionId: "s1",
    });
    const second = store.appendLocal({
      command: "pwd",
      startTime: 12,
      endTime: 5,
      exitCode: 1,
      folder: "/tmp",
      machine: "spoofed",
      sessionId: "s1",
    });

    expect(first.sequence).toBe(1);
    expect(first.machine).toBe("laptop");
    expect(second.sequence).toBe(2);
    expect(second.machine).toBe("laptop");
    expect(second.endTime).toBe(12);
    expect(store.nextSequence).toBe(3);
  });

  test("given a reserved floor, when appending, then new sequences continue above it", () => {
    const store = new EventStore({ machineId: "laptop" });
    store.reserveSequencesThrough(40);
    const event = store.appendLocal({
      command: "ls",
      startTime: 1,
      endTime: 1,
      exitCode: 0,
      folder: null,
      sessionId: null,
    });
    expect(event.sequence).toBe(41);
  });

  test("given a foreign batch, when merged twice, then the second merge only reports duplicates", () => {
    const store = new EventStore({ machineId: "laptop" });
    const events = [1, 2, 3].map((sequence) => makeEvent({ sequence, machine: "desk" }));

    expect(store.mergeForeign("desk", events)).toEqual({ inserted: 3, duplicates: 0, rejected: 0 });
    expect(store.mergeForeign("desk", events)).toEqual({ inserted: 0, duplicates: 3, rejected: 0 });
    expect(store.size).toBe(3);
  });

  test("given a batch naming another machine, when merged, then those events are rejected", () => {
    const store = new EventStore({ machineId: "laptop" });
    const result = store.mergeForeign("desk", [
      makeEvent({ sequence: 1, machine: "desk" }),
      makeEvent({ sequence: 2, machine: "server" }),
    ]);
    expect(result).toEqual({ inserted: 1, duplicates: 0, rejected: 1 });
    expect(store.has("server", 2)).toBe(false);
  });

  test("given the same events in different orders, when merged into two stores, then both orderings match", () => {
    const fromDesk = [1, 2, 3].map((sequence) =>
      makeEvent({ sequence, machine: "desk", startTime: 100 + sequence * 10 }),
    );
    const fromServer = [1, 2, 3].map((sequence) =>
      makeEvent({ sequence, machine: "server", startTime: 105 + sequence * 10 }),
    );

    const left = new EventStore({ machineId: "laptop" });
    left.mergeForeign("desk", fromDesk);
    left.mergeForeign("server", fromServer);

    const right = new EventStore({ machineId: "laptop" });
    right.mergeForeign("server", [...fromServer].reverse());
    right.mergeForeign("desk", [...fromDesk].reverse());

    expect(keysOf(left.snapshot().ordered)).toEqual(keysOf(right.snapshot().ordered));
    expect(keysOf(left.snapshot().ordered)).toEqual([
      "desk:1",
      "server:1",
      "desk:2",
      "server:2",
      "desk:3",
      "server:3",
    ]);
  });

  test("given a large batch, when merged in bulk, then the order is the same as inserting one by one", () => {
    const events = Array.from({ length: 100 }, (_, index) =>
      makeEvent({ sequence: index + 1, machine: "desk", startTime: 1_000 - index }),
    );
    const store = new EventStore({ machineId: "laptop" });
    store.mergeForeign("desk", events);

    const ordered = store.snapshot().ordered;
    expect(ordered).toHaveLength(100);
    expect(ordered[0]?.sequence).toBe(100);
    expect(ordered[99]?.sequence).toBe(1);
    expect([...ordered].sort(compareEvents)).toEqual(ordered);
  });

  test("given equal start times, when ordered, then sequence then machine break the tie", () => {
    const store = new EventStore({ machineId: "laptop" });
    store.mergeForeign("b", [makeEvent({ sequence: 1, machine: "b", startTime: 50 })]);
    store.mergeForeign("a", [
      makeEvent({ sequence: 2, machine: "a", startTime: 50 }),
      makeEvent({ sequence: 1, machine: "a", startTime: 50 }),
    ]);
    expect(keysOf(store.snapshot().ordered)).toEqual(["a:1", "b:1", "a:2"]);
  });

  test("given a snapshot, when the store changes afterwards, then the snapshot keeps its view", () => {
    const store = new EventStore({ machineId: "laptop" });
    store.restoreLocal([makeEvent({ sequence: 1, machine: "laptop", sessionId: "s1" })]);
    const snapshot = store.snapshot();

    store.appendLocal({
      command: "later",
      startTime: 2_000_000_000,
      endTime: 2_000_000_000,
      exitCode: 0,
      folder: "/work",
      sessionId: "s1",
    });

    expect(snapshot.size).toBe(1);
    expect(snapshot.ordered).toHaveLength(1);
    expect(snapshot.bySession("s1")).toHaveLength(1);
    expect(snapshot.byFolder("/work")).toHaveLength(1);
    expect(store.snapshot().bySession("s1")).toHaveLength(2);
  });

  test("given released snapshots, when appending, then indexes are updated in place without copying", () => {
    const store = new EventStore({ machineId: "laptop" });
    store.restoreLocal([makeEvent({ sequence: 1, machine: "laptop", sessionId: "s1" })]);
    const input = { command: "ls", exitCode: 0, folder: "/work", sessionId: "s1" };

    const released = store.snapshot();
    const ordered = released.ordered;
    const session = released.bySession("s1");
    released.release();
    released.release();
    expect(store.openSnapshots).toBe(0);

    store.appendLocal({ ...input, startTime: 2_000_000_000, endTime: 2_000_000_000 });
    expect(ordered).toHaveLength(2);
    expect(session).toHaveLength(2);

    const held = store.snapshot();
    store.appendLocal({ ...input, startTime: 2_000_000_001, endTime: 2_000_000_001 });
    expect(held.ordered).toBe(ordered);
    expect(held.ordered).toHaveLength(2);
    expect(store.openSnapshots).toBe(1);

    held.release();
    const latest = store.snapshot();
    expect(latest.ordered).toHaveLength(3);
    expect(latest.ordered).not.toBe(ordered);
    latest.release();
  });

  test("given local and foreign events, when reading stats, then counts are split by machine", () => {
    const store = new EventStore({ machineId: "laptop" });
    store.restoreLocal([
      makeEvent({ sequence: 1, machine: "laptop" }),
      makeEvent({ sequence: 7, machine: "laptop", sessionId: "s2", folder: null }),
    ]);
    store.mergeForeign("desk", [makeEvent({ sequence: 3, machine: "desk", folder: "/srv" })]);

    expect(store.stats()).toEqual({
      events: 3,
      localEvents: 2,
      foreignEvents: 1,
      sessions: 2,
      folders: 2,
      machines: {
        laptop: { events: 2, maxSequence: 7 },
        desk: { events: 1, maxSequence: 3 },
      },
      openSnapshots: 0,
    });
    expect(store.nextSequence).toBe(8);
  });
});
