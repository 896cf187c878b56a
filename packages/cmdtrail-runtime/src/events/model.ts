import type { HistoryEvent } from "../types.js";

type EventIdentity = Pick<HistoryEvent, "machine" | "sequence">;
type EventPosition = Pick<HistoryEvent, "startTime" | "sequence" | "machine">;

/** Sequence is numeric and last, so the key stays unambiguous for any machine id. */
export function eventKey(event: EventIdentity): string {
  return `${event.machine}:${event.sequence}`;
}

/** Display order: start time, then sequence, then machine. */
export function compareEvents(left: EventPosition, right: EventPosition): number {
  if (left.startTime !== right.startTime) {
    return left.startTime < right.startTime ? -1 : 1;
  }
  if (left.sequence !== right.sequence) {
    return left.sequence - right.sequence;
  }
  if (left.machine === right.machine) {
    return 0;
  }
  return left.machine < right.machine ? -1 : 1;
}

export function compareRecency(left: EventPosition, right: EventPosition): number {
  return compareEvents(right, left);
}

export function aggregateKey(event: Pick<HistoryEvent, "command" | "folder">): string {
  return JSON.stringify([event.command, event.folder]);
}

export function durationOf(event: Pick<HistoryEvent, "startTime" | "endTime">): number {
  return Math.max(0, event.endTime - event.startTime);
}

export function isFailedExit(
  exitCode: number | null,
  successExitCodes: ReadonlySet<number>,
): boolean {
  return exitCode !== null && !successExitCodes.has(exitCode);
}

/** Index of the first element not ordered before `target`. */
export function lowerBound<T>(
  items: readonly T[],
  target: T,
  compare: (left: T, right: T) => number,
): number {
  let low = 0;
  let high = items.length;
  while (low < high) {
    const middle = (low + high) >>> 1;
    const item = items[middle];
    if (item !== undefined && compare(item, target) < 0) {
      low = middle + 1;
    } else {
      high = middle;
    }
  }
  return low;
}
