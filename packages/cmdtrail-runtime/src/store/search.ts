import { InvalidRequestError } from "../errors.js";
import { aggregateKey, compareRecency, isFailedExit } from "../events/model.js";
import type { AggregatedEntry, HistoryEvent, SearchQuery, SearchResultItem } from "../types.js";
import type { StoreSnapshot } from "./event-store.js";
import { type AggregateScorer, type AggregateStats, createDecayingFrequencyScorer } from "./scoring.js";
import { compileTextMatcher } from "./text-match.js";

export const DEFAULT_MAX_RESULTS = 10_000;
const DEFAULT_HALF_LIFE_DAYS = 30;

/** The part of the event filters a search needs. */
export interface SearchFilterView {
  discard(event: HistoryEvent): boolean;
  isFailure(exitCode: number | null): boolean;
}

export interface SearchOptions {
  scorer?: AggregateScorer;
  filters?: SearchFilterView;
  nowSeconds?: number;
  maxResults?: number;
}

export interface SearchResult {
  items: SearchResultItem[];
  truncated: boolean;
}

const DEFAULT_SUCCESS_EXIT_CODES: ReadonlySet<number> = new Set([0]);

const defaultFilterView: SearchFilterView = {
  discard: () => false,
  isFailure: (exitCode) => isFailedExit(exitCode, DEFAULT_SUCCESS_EXIT_CODES),
};

export function resolveSearchLimit(query: SearchQuery, maxResults = DEFAULT_MAX_RESULTS): number {
  const cap = Math.max(1, Math.floor(maxResults));
  if (query.limit === undefined) {
    return cap;
  }
  return Math.max(1, Math.min(cap, Math.floor(query.limit)));
}

function selectSource(snapshot: StoreSnapshot, query: SearchQuery): readonly HistoryEvent[] {
  switch (query.mode) {
    case "all":
    case "aggregated-unique":
      return snapshot.ordered;
    case "session":
      if (!query.sessionId) {
        throw new InvalidRequestError("search mode 'session' requires a sessionId");
      }
      return snapshot.bySession(query.sessionId);
    case "folder":
      if (!query.folder) {
        throw new InvalidRequestError("search mode 'folder' requires a folder");
      }
      return snapshot.byFolder(query.folder);
  }
}

/**
 * Matching items, most relevant first. Event modes stream lazily from the
 * snapshot; the aggregated mode ranks everything before the first item.
 * No limit is applied here.
 */
export function* iterateSearch(
  snapshot: StoreSnapshot,
  query: SearchQuery,
  options: SearchOptions = {},
): Generator<SearchResultItem> {
  const source = selectSource(snapshot, query);
  const filters = options.filters ?? defaultFilterView;
  const matches = compileTextMatcher(query.text);
  const accept = (event: HistoryEvent): boolean =>
    matches(event.command) && !(query.filterIgnored === true && filters.discard(event));

  if (query.mode !== "aggregated-unique") {
    for (let index = source.length - 1; index >= 0; index -= 1) {
      const event = source[index];
      if (!event || !accept(event)) continue;
      if (query.filterFailed === true && filters.isFailure(event.exitCode)) continue;
      yield { kind: "event", event };
    }
    return;
  }

  for (const entry of aggregate(source, accept, filters, query.filterFailed === true, options)) {
    yield { kind: "aggregate", entry };
  }
}

export function runSearch(
  snapshot: StoreSnapshot,
  query: SearchQuery,
  options: SearchOptions = {},
): SearchResult {
  const limit = resolveSearchLimit(query, options.maxResults);
  const items: SearchResultItem[] = [];
  for (const item of iterateSearch(snapshot, query, options)) {
    if (items.length >= limit) {
      return { items, truncated: true };
    }
    items.push(item);
  }
  return { items, truncated: false };
}

interface MutableAggregate extends AggregateStats {
  machineSet: Set<string>;
}

function aggregate(
  source: readonly HistoryEvent[],
  accept: (event: HistoryEvent) => boolean,
  filters: SearchFilterView,
  filterFailed: boolean,
  options: SearchOptions,
): AggregatedEntry[] {
  const entries = new Map<string, MutableAggregate>();
  for (let index = source.length - 1; index >= 0; index -= 1) {
    const event = source[index];
    if (!event || !accept(event)) continue;
    const key = aggregateKey(event);
    let entry = entries.get(key);
    if (!entry) {
      entry = {
        key,
        command: event.command,
        folder: event.folder,
        latest: event,
        firstStartTime: event.startTime,
        count: 0,
        failedCount: 0,
        unknownCount: 0,
        machines: [],
        machineSet: new Set<string>(),
      };
      entries.set(key, entry);
    }
    entry.count += 1;
    entry.firstStartTime = Math.min(entry.firstStartTime, event.startTime);
    if (event.exitCode === null) {
      entry.unknownCount += 1;
    } else if (filters.isFailure(event.exitCode)) {
      entry.failedCount += 1;
    }
    entry.machineSet.add(event.machine);
  }

  const scorer = options.scorer ?? createDecayingFrequencyScorer(DEFAULT_HALF_LIFE_DAYS);
  const nowSeconds = options.nowSeconds ?? Date.now() / 1000;
  const ranked: AggregatedEntry[] = [];
  for (const { machineSet, ...entry } of entries.values()) {
    const known = entry.count - entry.unknownCount;
    if (filterFailed && known > 0 && entry.failedCount === known) {
      continue;
    }
    const stats: AggregateStats = { ...entry, machines: [...machineSet].sort() };
    ranked.push({ ...stats, score: scorer(stats, nowSeconds) });
  }
  ranked.sort((left, right) => {
    if (left.score !== right.score) {
      return right.score - left.score;
    }
    return compareRecency(left.latest, right.latest);
  });
  return ranked;
}
