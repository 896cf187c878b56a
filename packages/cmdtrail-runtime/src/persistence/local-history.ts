import { randomBytes } from "node:crypto";
import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { format } from "date-fns";
import { CorruptFileError, LocalStorageError } from "../errors.js";
import type { HistoryEvent, HistoryLogger } from "../types.js";
import { ensureDir, writeFileAtomic } from "../utils/fs.js";
import { silentLogger } from "../utils/silent-logger.js";
import { type JournalHeader, HistoryJournal, JOURNAL_FORMAT, recoverJournal } from "./journal.js";
import {
  createMachineFile,
  parseMachineFile,
  serializeMachineFile,
  writeMachineFile,
} from "./machine-file.js";

const DEFAULT_COMPACT_AFTER_EVENTS = 500;

export interface LocalHistoryOptions {
  journalPath: string;
  archiveDir: string;
  machineId: string;
  compactAfterEvents?: number;
  logger?: HistoryLogger;
  now?: () => Date;
}

export interface LocalHistoryOpenReport {
  created: boolean;
  events: number;
  corruptRecords: number;
  truncatedBytes: number;
}

function sanitizeFileComponent(value: string): string {
  const cleaned = value.replace(/[^A-Za-z0-9._-]+/gu, "_").replace(/^\.+/u, "");
  return cleaned.length > 0 ? cleaned : "machine";
}

export function createFileId(machineId: string, createdAt: Date): string {
  return [
    sanitizeFileComponent(machineId),
    format(createdAt, "yyyyMMdd'T'HHmmss"),
    randomBytes(3).toString("hex"),
  ].join("-");
}

/**
 * This machine's own events: a compacted snapshot under `archive/` plus the
 * append-only journal written since the last compaction.
 */
export class LocalHistory {
  readonly machineId: string;
  private readonly journalPath: string;
  private readonly archiveDir: string;
  private readonly compactAfterEvents: number;
  private readonly logger: HistoryLogger;
  private readonly now: () => Date;
  private journal: HistoryJournal | null = null;
  private identity: JournalHeader | null = null;
  private events: HistoryEvent[] = [];
  private snapshotSequence = 0;
  private compaction: Promise<void> | null = null;

  constructor(options: LocalHistoryOptions) {
    this.machineId = options.machineId;
    this.journalPath = options.journalPath;
    this.archiveDir = options.archiveDir;
    this.compactAfterEvents = Math.max(1, options.compactAfterEvents ?? DEFAULT_COMPACT_AFTER_EVENTS);
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  get fileId(): string {
    return this.requireIdentity().file_id;
  }

  get createdAt(): string {
    return this.requireIdentity().created_at;
  }

  get snapshotPath(): string {
    return join(this.archiveDir, `${this.fileId}.json`);
  }

  get localEvents(): readonly HistoryEvent[] {
    return this.events;
  }

  get maxSequence(): number {
    return this.events.at(-1)?.sequence ?? 0;
  }

  get pendingWrites(): number {
    return this.journal?.pendingCount ?? 0;
  }

  get journalLines(): number {
    return this.journal?.lineCount ?? 0;
  }

  open(): LocalHistoryOpenReport {
    ensureDir(this.archiveDir);
    const recovery = recoverJournal(this.journalPath);
    if (recovery.truncatedBytes > 0) {
      this.logger.warn("journal had a torn trailing record; truncated", {
        journalPath: this.journalPath,
        truncatedBytes: recovery.truncatedBytes,
      });
    }

    let created = false;
    let header = recovery.header;
    let salvaged: HistoryEvent[] = [];
    if (!header || header.machine_id !== this.machineId) {
      if (header) {
        this.logger.warn("journal belongs to another machine id; starting a new local file", {
          journalPath: this.journalPath,
          journalMachine: header.machine_id,
          machine: this.machineId,
        });
        this.retireJournal(header, recovery.events);
      } else {
        salvaged = recovery.events.filter((event) => event.machine === this.machineId);
      }
      const createdAt = this.now();
      header = {
        format: JOURNAL_FORMAT,
        machine_id: this.machineId,
        file_id: createFileId(this.machineId, createdAt),
        created_at: createdAt.toISOString(),
      };
      created = true;
    }
    this.identity = header;

    const bySequence = new Map<number, HistoryEvent>();
    let corruptRecords = recovery.corruptLines;
    if (!created && existsSync(this.snapshotPath)) {
      try {
        const snapshot = parseMachineFile(readFileSync(this.snapshotPath, "utf8"), this.snapshotPath);
        corruptRecords += snapshot.corruptRecords;
        for (const event of snapshot.file.events) {
          bySequence.set(event.sequence, event);
        }
      } catch (error) {
        if (!(error instanceof CorruptFileError)) {
          throw new LocalStorageError(this.snapshotPath, error);
        }
        this.logger.error("local snapshot is unreadable; continuing from the journal", {
          snapshotPath: this.snapshotPath,
          error: error.message,
        });
        corruptRecords += 1;
      }
    }
    this.snapshotSequence = 0;
    for (const sequence of bySequence.keys()) {
      this.snapshotSequence = Math.max(this.snapshotSequence, sequence);
    }

    const journalEvents = created ? salvaged : recovery.events;
    for (const event of journalEvents) {
      if (event.machine === this.machineId && !bySequence.has(event.sequence)) {
        bySequence.set(event.sequence, event);
      }
    }
    this.events = [...bySequence.values()].sort((left, right) => left.sequence - right.sequence);

    this.journal = new HistoryJournal(this.journalPath, header, journalEvents.length);
    if (created) {
      this.journal.initialize(this.events);
    }

    return {
      created,
      events: this.events.length,
      corruptRecords,
      truncatedBytes: recovery.truncatedBytes,
    };
  }

  /** Resolves once the event is on disk. */
  appendLocal(event: HistoryEvent): Promise<void> {
    const journal = this.requireJournal();
    if (event.machine !== this.machineId) {
      return Promise.reject(
        new Error(`refusing to journal an event of machine ${event.machine}`),
      );
    }
    if (event.sequence <= this.maxSequence) {
      return Promise.reject(
        new Error(`sequence ${event.sequence} is not above ${this.maxSequence}`),
      );
    }
    this.events.push(event);
    return journal.append(event);
  }

  needsCompaction(): boolean {
    return this.journalLines >= this.compactAfterEvents;
  }

  async flush(): Promise<void> {
    await this.requireJournal().flush();
  }

  /**
   * Rewrites the snapshot with every local event, then resets the journal to
   * the events appended since. Concurrent calls share one run.
   */
  async snapshotLocal(): Promise<void> {
    if (this.compaction) {
      await this.compaction;
      return;
    }
    this.compaction = this.compact().finally(() => {
      this.compaction = null;
    });
    await this.compaction;
  }

  private async compact(): Promise<void> {
    const journal = this.requireJournal();
    await journal.flush();
    const identity = this.requireIdentity();
    const captured = this.events.slice();
    const capturedSequence = captured.at(-1)?.sequence ?? 0;
    if (capturedSequence === this.snapshotSequence && journal.lineCount === 0) {
      return;
    }

    try {
      await writeMachineFile(
        this.snapshotPath,
        createMachineFile({
          machineId: this.machineId,
          createdAt: identity.created_at,
          fileId: identity.file_id,
          kind: "full",
          events: captured,
        }),
      );
    } catch (error) {
      throw new LocalStorageError(this.snapshotPath, error);
    }
    this.snapshotSequence = capturedSequence;

    await journal.rewrite(() => this.events.filter((event) => event.sequence > capturedSequence));
    this.logger.debug("local history compacted", {
      snapshotPath: this.snapshotPath,
      events: captured.length,
      journalLines: journal.lineCount,
    });
  }

  /** Keeps a journal written under another machine id as an archived file of that machine. */
  private retireJournal(header: JournalHeader, journalEvents: HistoryEvent[]): void {
    const retiredPath = join(this.archiveDir, `${header.file_id}.json`);
    const bySequence = new Map<number, HistoryEvent>();
    if (existsSync(retiredPath)) {
      try {
        for (const event of parseMachineFile(readFileSync(retiredPath, "utf8"), retiredPath).file
          .events) {
          bySequence.set(event.sequence, event);
        }
      } catch (error) {
        this.logger.warn("retired snapshot is unreadable; keeping journal events only", {
          retiredPath,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
    for (const event of journalEvents) {
      if (event.machine === header.machine_id && !bySequence.has(event.sequence)) {
        bySequence.set(event.sequence, event);
      }
    }
    const file = createMachineFile({
      machineId: header.machine_id,
      createdAt: header.created_at,
      fileId: header.file_id,
      kind: "full",
      events: [...bySequence.values()].sort((left, right) => left.sequence - right.sequence),
    });
    try {
      writeFileAtomic(retiredPath, serializeMachineFile(file));
    } catch (error) {
      throw new LocalStorageError(retiredPath, error);
    }
  }

  private requireJournal(): HistoryJournal {
    if (!this.journal) {
      throw new Error("local history is not open");
    }
    return this.journal;
  }

  private requireIdentity(): JournalHeader {
    if (!this.identity) {
      throw new Error("local history is not open");
    }
    return this.identity;
  }
}
