import { compareEvents, eventKey, lowerBound } from "../events/model.js";
import type { AppendEventInput, HistoryEvent } from "../types.js";

/** Above this many inserts a merge appends and re-sorts instead of inserting one by one. */
const BULK_INSERT_THRESHOLD = 64;

interface IndexHolder {
  /** Generation the array was copied in; older arrays may be held by a snapshot. */
  generation: number;
  items: HistoryEvent[];
}

export interface StoreSnapshot {
  readonly generation: number;
  readonly size: number;
  /** Every event in display order (oldest first). */
  readonly ordered: readonly HistoryEvent[];
  bySession(sessionId: string): readonly HistoryEvent[];
  byFolder(folder: string): readonly HistoryEvent[];
  /** Lets later mutations write in place again. Safe to call more than once. */
  release(): void;
}

export interface MergeResult {
  inserted: number;
  duplicates: number;
  /** Events that named a different machine than the file they came from. */
  rejected: number;
}

export interface MachineStats {
  events: number;
  maxSequence: number;
}

export interface EventStoreStats {
  events: number;
  localEvents: number;
  foreignEvents: number;
  sessions: number;
  folders: number;
  machines: Record<string, MachineStats>;
  openSnapshots: number;
}

export interface EventStoreOptions {
  machineId: string;
}

const EMPTY: readonly HistoryEvent[] = Object.freeze([]);

/**
 * In-memory index of every known event. All mutations are synchronous, so
 * on a single event loop they are serialized by construction; readers take
 * a `snapshot()` that later mutations never touch. An index array is copied
 * before a write only while a snapshot that shares it is unreleased.
 */
export class EventStore {
  readonly machineId: string;
  private readonly keys = new Set<string>();
  private readonly machineStats = new Map<string, MachineStats>();
  private readonly ordered: IndexHolder = { generation: 0, items: [] };
  private readonly sessions = new Map<string, IndexHolder>();
  private readonly folders = new Map<string, IndexHolder>();
  private generation = 0;
  /** Open snapshots per generation. */
  private readonly held = new Map<number, number>();
  private heldThrough = -1;
  private sequenceFloor = 0;

  constructor(options: EventStoreOptions) {
    this.machineId = options.machineId;
  }

  get size(): number {
    return this.keys.size;
  }

  /** Next sequence `appendLocal` will assign. */
  get nextSequence(): number {
    return Math.max(this.sequenceFloor, this.maxSequenceFor(this.machineId)) + 1;
  }

  /** Keeps new local sequences above ones already used elsewhere for this machine id. */
  reserveSequencesThrough(sequence: number): void {
    this.sequenceFloor = Math.max(this.sequenceFloor, sequence);
  }

  has(machine: string, sequence: number): boolean {
    return this.keys.has(eventKey({ machine, sequence }));
  }

  maxSequenceFor(machine: string): number {
    return this.machineStats.get(machine)?.maxSequence ?? 0;
  }

  appendLocal(input: AppendEventInput): HistoryEvent {
    const event: HistoryEvent = {
      command: input.command,
      startTime: input.startTime,
      endTime: Math.max(input.startTime, input.endTime),
      exitCode: input.exitCode,
      folder: input.folder,
      machine: this.machineId,
      sessionId: input.sessionId,
      sequence: this.nextSequence,
    };
    this.insertOne(event);
    return event;
  }

  /** Loads this machine's own persisted events. */
  restoreLocal(events: readonly HistoryEvent[]): MergeResult {
    return this.mergeForeign(this.machineId, events);
  }

  /** Inserts events whose key is absent. Merging the same events again is a no-op. */
  mergeForeign(machine: string, events: readonly HistoryEvent[]): MergeResult {
    const result: MergeResult = { inserted: 0, duplicates: 0, rejected: 0 };
    const fresh: HistoryEvent[] = [];
    const batchKeys = new Set<string>();
    for (const event of events) {
      if (event.machine !== machine) {
        result.rejected += 1;
        continue;
      }
      const key = eventKey(event);
      if (this.keys.has(key) || batchKeys.has(key)) {
        result.duplicates += 1;
        continue;
      }
      batchKeys.add(key);
      fresh.push(event);
    }

    if (fresh.length > BULK_INSERT_THRESHOLD) {
      this.insertMany(fresh);
    } else {
      for (const event of fresh) {
        this.insertOne(event);
      }
    }
    result.inserted = fresh.length;
    return result;
  }

  snapshot(): StoreSnapshot {
    const generation = this.generation;
    this.generation += 1;
    this.held.set(generation, (this.held.get(generation) ?? 0) + 1);
    this.heldThrough = Math.max(this.heldThrough, generation);

    const ordered = this.ordered.items;
    const sessions = new Map<string, readonly HistoryEvent[]>();
    for (const [sessionId, holder] of this.sessions) {
      sessions.set(sessionId, holder.items);
    }
    const folders = new Map<string, readonly HistoryEvent[]>();
    for (const [folder, holder] of this.folders) {
      folders.set(folder, holder.items);
    }
    let released = false;
    return {
      generation,
      size: ordered.length,
      ordered,
      bySession: (sessionId) => sessions.get(sessionId) ?? EMPTY,
      byFolder: (folder) => folders.get(folder) ?? EMPTY,
      release: () => {
        if (released) return;
        released = true;
        this.releaseGeneration(generation);
      },
    };
  }

  /** Snapshots not yet released. */
  get openSnapshots(): number {
    let count = 0;
    for (const open of this.held.values()) count += open;
    return count;
  }

  stats(): EventStoreStats {
    const machines: Record<string, MachineStats> = {};
    for (const [machine, stats] of this.machineStats) {
      machines[machine] = { ...stats };
    }
    const localEvents = this.machineStats.get(this.machineId)?.events ?? 0;
    return {
      events: this.keys.size,
      localEvents,
      foreignEvents: this.keys.size - localEvents,
      sessions: this.sessions.size,
      folders: this.folders.size,
      machines,
      openSnapshots: this.openSnapshots,
    };
  }

  private insertOne(event: HistoryEvent): void {
    this.register(event);
    insertSorted(this.writable(this.ordered), event);
    if (event.sessionId !== null) {
      insertSorted(this.writable(this.holderFor(this.sessions, event.sessionId)), event);
    }
    if (event.folder !== null) {
      insertSorted(this.writable(this.holderFor(this.folders, event.folder)), event);
    }
  }

  private insertMany(events: readonly HistoryEvent[]): void {
    const touched = new Set<IndexHolder>([this.ordered]);
    for (const event of events) {
      this.register(event);
      this.writable(this.ordered).push(event);
      if (event.sessionId !== null) {
        const holder = this.holderFor(this.sessions, event.sessionId);
        this.writable(holder).push(event);
        touched.add(holder);
      }
      if (event.folder !== null) {
        const holder = this.holderFor(this.folders, event.folder);
        this.writable(holder).push(event);
        touched.add(holder);
      }
    }
    for (const holder of touched) {
      holder.items.sort(compareEvents);
    }
  }

  private register(event: HistoryEvent): void {
    this.keys.add(eventKey(event));
    const stats = this.machineStats.get(event.machine);
    if (stats) {
      stats.events += 1;
      stats.maxSequence = Math.max(stats.maxSequence, event.sequence);
    } else {
      this.machineStats.set(event.machine, { events: 1, maxSequence: event.sequence });
    }
  }

  private holderFor(index: Map<string, IndexHolder>, key: string): IndexHolder {
    let holder = index.get(key);
    if (!holder) {
      holder = { generation: this.generation, items: [] };
      index.set(key, holder);
    }
    return holder;
  }

  private releaseGeneration(generation: number): void {
    const open = (this.held.get(generation) ?? 0) - 1;
    if (open > 0) {
      this.held.set(generation, open);
      return;
    }
    this.held.delete(generation);
    this.heldThrough = -1;
    for (const held of this.held.keys()) {
      this.heldThrough = Math.max(this.heldThrough, held);
    }
  }

  /** Copies an array an open snapshot may still be reading before it is changed. */
  private writable(holder: IndexHolder): HistoryEvent[] {
    if (holder.generation <= this.heldThrough) {
      holder.items = holder.items.slice();
      holder.generation = this.generation;
    }
    return holder.items;
  }
}

function insertSorted(items: HistoryEvent[], event: HistoryEvent): void {
  const index = lowerBound(items, event, compareEvents);
  items.splice(index, 0, event);
}
