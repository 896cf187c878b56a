import { describe, expect, test } from "vitest";
import { aggregateKey, compareEvents, durationOf, eventKey, isFailedExit, lowerBound } from "@cmdtrail/runtime";
import { makeEvent } from "../helpers/workspace.js";

describe("event model", () => {
  test("given start and end times, when measuring duration, then it is never negative", () => {
    expect(durationOf({ startTime: 10, endTime: 12.5 })).toBe(2.5);
    expect(durationOf({ startTime: 10, endTime: 4 })).toBe(0);
  });

  test("given success exit codes, when classifying exits, then unknown and success codes are not failures", () => {
    const success = new Set([0, 130]);
    expect(isFailedExit(null, success)).toBe(false);
    expect(isFailedExit(0, success)).toBe(false);
    expect(isFailedExit(130, success)).toBe(false);
    expect(isFailedExit(1, success)).toBe(true);
  });

  test("given equal start times, when ordering, then sequence and then machine break the tie", () => {
    const early = makeEvent({ sequence: 1, machine: "b", startTime: 5 });
    const later = makeEvent({ sequence: 2, machine: "a", startTime: 5 });
    const other = makeEvent({ sequence: 2, machine: "b", startTime: 5 });
    expect([other, later, early].sort(compareEvents).map((event) => eventKey(event))).toEqual(["b:1", "a:2", "b:2"]);
  });

  test("given runs of one command in one folder on two machines, when keyed for aggregation, then the keys match", () => {
    const left = makeEvent({ sequence: 1, machine: "a", command: "make", folder: "/srv" });
    const right = makeEvent({ sequence: 9, machine: "b", command: "make", folder: "/srv" });
    expect(aggregateKey(left)).toBe(aggregateKey(right));
    expect(eventKey(left)).not.toBe(eventKey(right));
  });

  test("given a sorted list, when searching a lower bound, then the first index not before the target is returned", () => {
    const compare = (left: number, right: number): number => left - right;
    expect(lowerBound([1, 3, 3, 7], 3, compare)).toBe(1);
    expect(lowerBound([1, 3, 3, 7], 8, compare)).toBe(4);
    expect(lowerBound([], 1, compare)).toBe(0);
  });
});
