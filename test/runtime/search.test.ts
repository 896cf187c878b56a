import { describe, expect, test } from "vitest";
import {
  EventStore,
  InvalidRequestError,
  compileTextMatcher,
  createDecayingFrequencyScorer,
  frequencyScorer,
  resolveSearchLimit,
  runSearch,
  type AggregateStats,
  type SearchResultItem,
  type StoreSnapshot,
} from "@cmdtrail/runtime";
import { makeEvent } from "../helpers/workspace.js";

function seededSnapshot(): StoreSnapshot {
  const store = new EventStore({ machineId: "laptop" });
  store.restoreLocal([
    makeEvent({ sequence: 1, machine: "laptop", command: "git status", startTime: 100, folder: "/a", sessionId: "s1" }),
    makeEvent({
      sequence: 2,
      machine: "laptop",
      command: "git commit -m Fix",
      startTime: 200,
      exitCode: 1,
      folder: "/a",
      sessionId: "s1",
    }),
    makeEvent({ sequence: 3, machine: "laptop", command: "ls", startTime: 300, folder: "/b", sessionId: "s2" }),
    makeEvent({ sequence: 4, machine: "laptop", command: "git status", startTime: 400, folder: "/a", sessionId: "s2" }),
    makeEvent({
      sequence: 5,
      machine: "laptop",
      command: "git status",
      startTime: 500,
      exitCode: null,
      folder: "/b",
      sessionId: "s1",
    }),
  ]);
  return store.snapshot();
}

function sequences(items: SearchResultItem[]): number[] {
  return items.map((item) => (item.kind === "event" ? item.event.sequence : item.entry.latest.sequence));
}

describe("search", () => {
  test("given no text, when searching all history, then events come newest first", () => {
    const result = runSearch(seededSnapshot(), { mode: "all" });
    expect(sequences(result.items)).toEqual([5, 4, 3, 2, 1]);
    expect(result.truncated).toBe(false);
  });

  test("given query terms, when searching, then every term must appear", () => {
    const snapshot = seededSnapshot();
    expect(sequences(runSearch(snapshot, { mode: "all", text: "git" }).items)).toEqual([5, 4, 2, 1]);
    expect(sequences(runSearch(snapshot, { mode: "all", text: "git status" }).items)).toEqual([5, 4, 1]);
    expect(sequences(runSearch(snapshot, { mode: "all", text: "status commit" }).items)).toEqual([]);
  });

  test("given a term with an uppercase letter, when searching, then that term is case-sensitive", () => {
    const snapshot = seededSnapshot();
    expect(sequences(runSearch(snapshot, { mode: "all", text: "fix" }).items)).toEqual([2]);
    expect(sequences(runSearch(snapshot, { mode: "all", text: "Fix" }).items)).toEqual([2]);
    expect(sequences(runSearch(snapshot, { mode: "all", text: "FIX" }).items)).toEqual([]);
  });

  test("given session and folder modes, when searching, then only that index is read", () => {
    const snapshot = seededSnapshot();
    expect(sequences(runSearch(snapshot, { mode: "session", sessionId: "s1" }).items)).toEqual([5, 2, 1]);
    expect(sequences(runSearch(snapshot, { mode: "folder", folder: "/a" }).items)).toEqual([4, 2, 1]);
    expect(runSearch(snapshot, { mode: "folder", folder: "/missing" }).items).toEqual([]);
  });

  test("given session mode without a session id, when searching, then the request is invalid", () => {
    expect(() => runSearch(seededSnapshot(), { mode: "session" })).toThrow(InvalidRequestError);
  });

  test("given filterFailed, when searching events, then failures are dropped but unknown exits stay", () => {
    const result = runSearch(seededSnapshot(), { mode: "all", filterFailed: true });
    expect(sequences(result.items)).toEqual([5, 4, 3, 1]);
  });

  test("given more matches than the limit, when searching, then the result is truncated", () => {
    const snapshot = seededSnapshot();
    const limited = runSearch(snapshot, { mode: "all", limit: 2 });
    expect(sequences(limited.items)).toEqual([5, 4]);
    expect(limited.truncated).toBe(true);

    const exact = runSearch(snapshot, { mode: "all", limit: 5 });
    expect(exact.items).toHaveLength(5);
    expect(exact.truncated).toBe(false);
  });

  test("given a frequency scorer, when aggregating, then entries rank by count and then by recency", () => {
    const result = runSearch(seededSnapshot(), { mode: "aggregated-unique" }, { scorer: frequencyScorer });
    const entries = result.items.flatMap((item) => (item.kind === "aggregate" ? [item.entry] : []));

    expect(entries.map((entry) => [entry.command, entry.folder, entry.count])).toEqual([
      ["git status", "/a", 2],
      ["git status", "/b", 1],
      ["ls", "/b", 1],
      ["git commit -m Fix", "/a", 1],
    ]);
    expect(entries[0]).toMatchObject({
      key: JSON.stringify(["git status", "/a"]),
      firstStartTime: 100,
      failedCount: 0,
      unknownCount: 0,
      machines: ["laptop"],
      score: 2,
    });
    expect(entries[0]?.latest.sequence).toBe(4);
    expect(entries[1]?.unknownCount).toBe(1);
  });

  test("given filterFailed, when aggregating, then only entries whose known runs all failed are dropped", () => {
    const result = runSearch(
      seededSnapshot(),
      { mode: "aggregated-unique", filterFailed: true },
      { scorer: frequencyScorer },
    );
    const commands = result.items.flatMap((item) => (item.kind === "aggregate" ? [item.entry.command] : []));
    expect(commands).toEqual(["git status", "git status", "ls"]);
  });
});

describe("scoring", () => {
  const latest = makeEvent({ sequence: 1, startTime: 1_000_000 });
  const stats: AggregateStats = {
    key: "k",
    command: latest.command,
    folder: latest.folder,
    latest,
    firstStartTime: latest.startTime,
    count: 4,
    failedCount: 1,
    unknownCount: 2,
    machines: ["m1"],
  };

  test("given a use one half-life ago, when scoring, then the count halves and failures cost weight", () => {
    const scorer = createDecayingFrequencyScorer(1);
    expect(scorer(stats, 1_000_000 + 86_400)).toBe(1.5);
  });

  test("given a clock behind the latest use, when scoring, then there is no decay", () => {
    const scorer = createDecayingFrequencyScorer(1);
    expect(scorer(stats, 0)).toBe(3);
  });
});

describe("text matching and limits", () => {
  test("given blank text, when matching, then every command matches", () => {
    expect(compileTextMatcher("   ")("anything")).toBe(true);
    expect(compileTextMatcher(undefined)("")).toBe(true);
  });

  test("given mixed-case terms, when matching, then only the uppercase term is exact", () => {
    const matches = compileTextMatcher("Git st");
    expect(matches("Git STATUS")).toBe(true);
    expect(matches("git status")).toBe(false);
  });

  test("given requested limits, when resolving, then they are clamped to one and the configured cap", () => {
    expect(resolveSearchLimit({ mode: "all" }, 50)).toBe(50);
    expect(resolveSearchLimit({ mode: "all", limit: 0 }, 50)).toBe(1);
    expect(resolveSearchLimit({ mode: "all", limit: 100 }, 50)).toBe(50);
    expect(resolveSearchLimit({ mode: "all", limit: 7.9 }, 50)).toBe(7);
  });
});
