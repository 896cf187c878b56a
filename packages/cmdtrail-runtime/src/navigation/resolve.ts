import type { StoreSnapshot } from "../store/event-store.js";
import type { HistoryEvent, NavigationReference, NavigationRequest, NavigationResult } from "../types.js";

/**
 * Shells print times with nine decimals, so a time-only reference may be a
 * hair off the stored value.
 */
export const TIME_TOLERANCE_SECONDS = 1e-8;

/** Negative when `event` is strictly before the reference position. */
function compareToReference(event: HistoryEvent, reference: NavigationReference): number {
  if (reference.sequence === undefined || reference.machine === undefined) {
    if (event.startTime < reference.startTime - TIME_TOLERANCE_SECONDS) return -1;
    if (event.startTime > reference.startTime + TIME_TOLERANCE_SECONDS) return 1;
    return 0;
  }
  if (event.startTime !== reference.startTime) {
    return event.startTime < reference.startTime ? -1 : 1;
  }
  if (event.sequence !== reference.sequence) {
    return event.sequence - reference.sequence;
  }
  if (event.machine === reference.machine) {
    return 0;
  }
  return event.machine < reference.machine ? -1 : 1;
}

function inScope(event: HistoryEvent, request: NavigationRequest): boolean {
  if (request.sessionId === null) {
    return true;
  }
  if (event.sessionId === request.sessionId) {
    return true;
  }
  return request.sessionStart !== undefined && event.startTime < request.sessionStart;
}

function candidatesFor(snapshot: StoreSnapshot, request: NavigationRequest): readonly HistoryEvent[] {
  if (request.sessionId !== null && request.sessionStart === undefined) {
    return snapshot.bySession(request.sessionId);
  }
  return snapshot.ordered;
}

/** First index whose event is not strictly before the reference. */
function referenceIndex(items: readonly HistoryEvent[], reference: NavigationReference): number {
  let low = 0;
  let high = items.length;
  while (low < high) {
    const middle = (low + high) >>> 1;
    const item = items[middle];
    if (item !== undefined && compareToReference(item, reference) < 0) {
      low = middle + 1;
    } else {
      high = middle;
    }
  }
  return low;
}

/**
 * Closest event strictly before (`previous`) or after (`next`) the
 * reference that starts with the prefix. `next` past the newest match
 * reports the original prefix at `capturedAt` instead.
 */
export function resolveNavigation(
  snapshot: StoreSnapshot,
  request: NavigationRequest,
): NavigationResult {
  const items = candidatesFor(snapshot, request);
  const matches = (event: HistoryEvent): boolean =>
    inScope(event, request) &&
    event.command.startsWith(request.prefix) &&
    (request.ignore === undefined || event.command !== request.ignore);

  const start = referenceIndex(items, request.reference);
  if (request.direction === "previous") {
    for (let index = start - 1; index >= 0; index -= 1) {
      const event = items[index];
      if (event && matches(event)) {
        return { found: true, event };
      }
    }
    return { found: false };
  }

  for (let index = start; index < items.length; index += 1) {
    const event = items[index];
    if (!event || compareToReference(event, request.reference) <= 0) continue;
    if (request.capturedAt !== undefined && event.startTime >= request.capturedAt) break;
    if (matches(event)) {
      return { found: true, event };
    }
  }
  if (
    request.capturedAt !== undefined &&
    request.reference.startTime < request.capturedAt - TIME_TOLERANCE_SECONDS
  ) {
    return { found: true, restored: { prefix: request.prefix, startTime: request.capturedAt } };
  }
  return { found: false };
}
