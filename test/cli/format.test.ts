import { describe, expect, test } from "vitest";
import type { AggregatedEntry, SearchResultItem } from "@cmdtrail/runtime";
import {
  FZF_FIELD_SEPARATOR,
  formatEventTime,
  formatFzfRecord,
  formatPlainLine,
  formatPreview,
  formatSearchItem,
  humanDuration,
} from "@cmdtrail/cli";
import { makeEvent } from "../helpers/workspace.js";

const START = 1_700_000_000;
const context = { now: new Date((START + 90) * 1000), home: "/home/dev" };

function eventItem(overrides: Parameters<typeof makeEvent>[0]): SearchResultItem {
  return { kind: "event", event: makeEvent(overrides) };
}

function aggregateItem(overrides: Partial<AggregatedEntry>): SearchResultItem {
  const latest = makeEvent({ sequence: 1, command: "make", startTime: START });
  return {
    kind: "aggregate",
    entry: {
      key: JSON.stringify(["make", "/work"]),
      command: "make",
      folder: "/work",
      latest,
      firstStartTime: START - 100,
      count: 4,
      failedCount: 1,
      unknownCount: 1,
      machines: ["m1"],
      score: 4,
      ...overrides,
    },
  };
}

function decodeBase64(text: string): string {
  return Buffer.from(text, "base64").toString("utf8");
}

describe("search output formatting", () => {
  test("given durations across units, when humanized, then the largest fitting unit is used", () => {
    expect(humanDuration(250)).toBe("250ms");
    expect(humanDuration(1_500)).toBe("2s");
    expect(humanDuration(90_000)).toBe("2m");
    expect(humanDuration(3 * 3_600_000)).toBe("3h");
    expect(humanDuration(2 * 86_400_000)).toBe("2D");
    expect(humanDuration(14 * 86_400_000)).toBe("2W");
    expect(humanDuration(800 * 86_400_000)).toBe("2Y");
  });

  test("given fractional seconds, when formatted, then the time is fixed width", () => {
    expect(formatEventTime(START + 0.5)).toBe("01700000000.500000000");
    expect(formatEventTime(5)).toBe("00000000005.000000000");
  });

  test("given an event and an aggregate, when printed plain, then the command is JSON quoted", () => {
    expect(formatPlainLine(eventItem({ sequence: 1, command: 'echo "hi"', startTime: START + 0.5 }))).toBe(
      '01700000000.500000000 -- "echo \\"hi\\""',
    );
    expect(formatPlainLine(aggregateItem({}))).toBe('01700000000.000000000 -- 4x "make"');
  });

  test("given a multi-line command, when formatted for fzf, then fields carry base64 text and a glyph", () => {
    const item = eventItem({ sequence: 1, command: "for x\ndo", startTime: START, folder: "/home/dev/proj" });
    const fields = formatFzfRecord(item, context).split(FZF_FIELD_SEPARATOR);

    expect(fields).toHaveLength(4);
    expect(decodeBase64(fields[0] ?? "")).toBe("for x\ndo");
    expect(decodeBase64(fields[1] ?? "")).toBe(formatPreview(item, context));
    expect(fields[2]).toBe("[ 2m ago] ");
    expect(fields[3]).toBe("for x⏎do");
  });

  test("given a recorded event, when previewed, then exit, duration and abbreviated folder are shown", () => {
    const lines = formatPreview(
      eventItem({ sequence: 1, command: "ls", startTime: START, folder: "/home/dev/proj" }),
      context,
    ).split("\n");

    expect(lines[0]?.startsWith("[returned 0 after 1s at ")).toBe(true);
    expect(lines.slice(1)).toEqual(["[ran in ~/proj on m1]", "", "ls"]);
  });

  test("given an end time before the start, when previewed, then the duration is zero", () => {
    const lines = formatPreview(
      eventItem({ sequence: 1, command: "ls", startTime: START, endTime: START - 5, folder: "/srv" }),
      context,
    ).split("\n");

    expect(lines[0]?.startsWith("[returned 0 after 0ms at ")).toBe(true);
  });

  test("given an imported event without exit code, when previewed, then only the time is shown", () => {
    const lines = formatPreview(eventItem({ sequence: 1, command: "ls", exitCode: null }), context).split("\n");

    expect(lines[0]?.startsWith("ran on ")).toBe(true);
    expect(lines.slice(1)).toEqual(["", "ls"]);
  });

  test("given an aggregate, when previewed, then outcome shares are percentages of the count", () => {
    const lines = formatPreview(aggregateItem({}), context).split("\n");

    expect(lines[0]?.startsWith("[ran 4 times, most recently at ")).toBe(true);
    expect(lines[1]).toBe("[50% success, 25% failure, 25% unknown]");
  });

  test("given each format, when an item is written, then the right terminator follows", () => {
    const item = eventItem({ sequence: 1, command: "ls" });

    expect(formatSearchItem(item, "json", context)).toBe(`${JSON.stringify(item)}\n`);
    expect(formatSearchItem(item, "fzf", context).endsWith("\0")).toBe(true);
    expect(formatSearchItem(item, "plain", context)).toBe(`${formatPlainLine(item)}\n`);
  });
});
