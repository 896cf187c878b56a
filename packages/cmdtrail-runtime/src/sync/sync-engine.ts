import { existsSync } from "node:fs";
import { basename, join } from "node:path";
import { formatISO } from "date-fns";
import { CorruptFileError, ReplicationRootUnavailableError, toErrorMessage } from "../errors.js";
import type { LocalHistory } from "../persistence/local-history.js";
import { createMachineFile, loadMachineFile, writeMachineFile } from "../persistence/machine-file.js";
import type { EventStore } from "../store/event-store.js";
import type { HistoryLogger, LoadedMachineFile } from "../types.js";
import { errnoCode, readFileSignature } from "../utils/fs.js";
import { silentLogger } from "../utils/silent-logger.js";
import { assertReplicationRoot, listMachineFiles } from "./scan.js";

const DEFAULT_RECENT_LIMIT = 1_000;
const DEFAULT_INTERVAL_MS = 5 * 60_000;

export interface SyncEngineOptions {
  store: EventStore;
  local: LocalHistory;
  /** Local directory with imported and retired machine files. */
  archiveDir: string;
  /** Shared directory other machines publish into; `null` for local-only. */
  root: string | null;
  recentLimit?: number;
  intervalMs?: number;
  logger?: HistoryLogger;
  now?: () => Date;
  /** Failures of timer-triggered runs. */
  onError?: (error: unknown) => void;
}

export interface PublishedFiles {
  recentPath: string;
  archivePath?: string;
  events: number;
}

export interface SyncReport {
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  rootAvailable: boolean;
  rootError?: string;
  scannedFiles: number;
  mergedFiles: number;
  unchangedFiles: number;
  inserted: number;
  duplicates: number;
  rejected: number;
  corruptFiles: number;
  corruptRecords: number;
  published: PublishedFiles | null;
  compacted: boolean;
}

export interface CorruptFileStatus {
  path: string;
  reason: string;
}

export interface SyncStatus {
  running: boolean;
  root: string | null;
  trackedFiles: number;
  corruptFiles: CorruptFileStatus[];
  corruptRecords: number;
  lastReport: SyncReport | null;
}

interface TrackedFile {
  signature: string;
  /** Highest sequence already merged from this path. */
  watermark: number;
  corrupt?: string;
  corruptRecords: number;
}

export class SyncEngine {
  private readonly store: EventStore;
  private readonly local: LocalHistory;
  private readonly archiveDir: string;
  private readonly root: string | null;
  private readonly recentLimit: number;
  private readonly intervalMs: number;
  private readonly logger: HistoryLogger;
  private readonly now: () => Date;
  private readonly onError?: (error: unknown) => void;
  private readonly tracked = new Map<string, TrackedFile>();
  private inFlight: Promise<SyncReport> | null = null;
  private timer: ReturnType<typeof setInterval> | null = null;
  private lastReport: SyncReport | null = null;
  private publishedSequence = -1;
  private archivedThrough: number | null = null;
  private rootWarned = false;

  constructor(options: SyncEngineOptions) {
    this.store = options.store;
    this.local = options.local;
    this.archiveDir = options.archiveDir;
    this.root = options.root;
    this.recentLimit = Math.max(1, options.recentLimit ?? DEFAULT_RECENT_LIMIT);
    this.intervalMs = Math.max(1_000, options.intervalMs ?? DEFAULT_INTERVAL_MS);
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
    this.onError = options.onError;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      this.syncNow().catch((error: unknown) => {
        this.logger.error("scheduled sync failed", { error: toErrorMessage(error) });
        this.onError?.(error);
      });
    }, this.intervalMs);
    this.timer.unref?.();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /** Concurrent callers share the run already in progress. */
  syncNow(): Promise<SyncReport> {
    if (this.inFlight) {
      return this.inFlight;
    }
    const run = this.runOnce().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = run;
    return run;
  }

  async waitForIdle(): Promise<void> {
    while (this.inFlight) {
      await this.inFlight.catch(() => undefined);
    }
  }

  getStatus(): SyncStatus {
    const corruptFiles: CorruptFileStatus[] = [];
    let corruptRecords = 0;
    for (const [path, tracked] of this.tracked) {
      corruptRecords += tracked.corruptRecords;
      if (tracked.corrupt !== undefined) {
        corruptFiles.push({ path, reason: tracked.corrupt });
      }
    }
    return {
      running: this.inFlight !== null,
      root: this.root,
      trackedFiles: this.tracked.size,
      corruptFiles,
      corruptRecords,
      lastReport: this.lastReport,
    };
  }

  private async runOnce(): Promise<SyncReport> {
    const started = this.now();
    const report: SyncReport = {
      startedAt: formatISO(started),
      finishedAt: formatISO(started),
      durationMs: 0,
      rootAvailable: false,
      scannedFiles: 0,
      mergedFiles: 0,
      unchangedFiles: 0,
      inserted: 0,
      duplicates: 0,
      rejected: 0,
      corruptFiles: 0,
      corruptRecords: 0,
      published: null,
      compacted: false,
    };

    const files = await this.listLocalArchive();
    if (this.root !== null) {
      try {
        await assertReplicationRoot(this.root);
        files.push(...(await listMachineFiles(this.root)));
        report.rootAvailable = true;
        this.rootWarned = false;
      } catch (error) {
        const failure =
          error instanceof ReplicationRootUnavailableError
            ? error
            : new ReplicationRootUnavailableError(this.root, error);
        report.rootError = failure.message;
        if (!this.rootWarned) {
          this.logger.warn("replication root unavailable; continuing local-only", {
            root: this.root,
            error: failure.message,
          });
          this.rootWarned = true;
        }
      }
    }

    const ownPrefix = `${this.local.fileId}.`;
    for (const path of files) {
      if (basename(path).startsWith(ownPrefix)) {
        continue;
      }
      report.scannedFiles += 1;
      await this.ingest(path, report);
    }

    if (this.root !== null && report.rootAvailable) {
      try {
        report.published = await this.publish(this.root);
      } catch (error) {
        report.rootError = toErrorMessage(error);
        this.logger.warn("publishing to replication root failed", {
          root: this.root,
          error: report.rootError,
        });
      }
    }

    if (this.local.journalLines > 0) {
      await this.local.snapshotLocal();
      report.compacted = true;
    }

    const status = this.getStatus();
    report.corruptFiles = status.corruptFiles.length;
    report.corruptRecords = status.corruptRecords;
    const finished = this.now();
    report.finishedAt = formatISO(finished);
    report.durationMs = Math.max(0, finished.getTime() - started.getTime());
    this.lastReport = report;
    this.logger.debug("sync finished", {
      scannedFiles: report.scannedFiles,
      mergedFiles: report.mergedFiles,
      inserted: report.inserted,
      corruptFiles: report.corruptFiles,
      published: report.published !== null,
    });
    return report;
  }

  private async listLocalArchive(): Promise<string[]> {
    try {
      return await listMachineFiles(this.archiveDir);
    } catch (error) {
      if (errnoCode(error) === "ENOENT") {
        return [];
      }
      throw error;
    }
  }

  private async ingest(path: string, report: SyncReport): Promise<void> {
    let signature: string | undefined;
    try {
      signature = await readFileSignature(path);
    } catch (error) {
      this.logger.warn("cannot stat machine file", { path, error: toErrorMessage(error) });
      return;
    }
    if (signature === undefined) {
      return;
    }
    const previous = this.tracked.get(path);
    if (previous?.signature === signature) {
      report.unchangedFiles += 1;
      return;
    }

    const watermark = previous?.watermark ?? 0;
    let loaded: LoadedMachineFile;
    try {
      loaded = await loadMachineFile(path);
    } catch (error) {
      if (error instanceof CorruptFileError) {
        // retried once the file changes again
        this.tracked.set(path, { signature, watermark, corrupt: error.reason, corruptRecords: 0 });
        this.logger.warn("skipping corrupt machine file", { path, reason: error.reason });
        return;
      }
      if (errnoCode(error) === "ENOENT") {
        return;
      }
      this.logger.warn("cannot read machine file", { path, error: toErrorMessage(error) });
      return;
    }

    const { file } = loaded;
    if (file.machineId === this.store.machineId && file.fileId !== this.local.fileId) {
      // another file written under this machine id; its sequences are taken
      const highest = file.events.reduce((max, event) => Math.max(max, event.sequence), 0);
      if (highest >= this.store.nextSequence) {
        this.logger.warn("machine file shares this machine id; new sequences continue above it", {
          path,
          fileId: file.fileId,
          sequence: highest,
        });
      }
      this.store.reserveSequencesThrough(highest);
    }
    const fresh = file.events.filter((event) => event.sequence > watermark);
    const merged = this.store.mergeForeign(file.machineId, fresh);
    report.inserted += merged.inserted;
    report.duplicates += merged.duplicates;
    report.rejected += merged.rejected;
    if (merged.inserted > 0) {
      report.mergedFiles += 1;
    }
    if (loaded.corruptRecords > 0) {
      this.logger.warn("machine file has unreadable records", {
        path,
        corruptRecords: loaded.corruptRecords,
      });
    }
    const lastSequence = file.events.at(-1)?.sequence ?? 0;
    this.tracked.set(path, {
      signature,
      watermark: Math.max(watermark, lastSequence),
      corruptRecords: loaded.corruptRecords,
    });
  }

  /**
   * Writes this machine's recent file, rolling older events into the
   * archive file once recent grows past twice the limit. The archive is
   * written first so every event is always visible in one of the two.
   */
  private async publish(root: string): Promise<PublishedFiles | null> {
    const events = this.local.localEvents.slice();
    const maxSequence = events.at(-1)?.sequence ?? 0;
    if (maxSequence === this.publishedSequence) {
      return null;
    }

    const fileId = this.local.fileId;
    const recentPath = join(root, `${fileId}.recent.json`);
    const archivePath = join(root, `${fileId}.archive.json`);
    if (this.archivedThrough === null) {
      this.archivedThrough = await this.readArchivedThrough(archivePath);
    }

    let archiveThrough = this.archivedThrough;
    let recent = events.filter((event) => event.sequence > archiveThrough);
    let archiveWritten = false;
    if (recent.length > 2 * this.recentLimit) {
      const boundary = recent[recent.length - this.recentLimit - 1];
      if (boundary) {
        archiveThrough = boundary.sequence;
        await writeMachineFile(
          archivePath,
          createMachineFile({
            machineId: this.local.machineId,
            createdAt: this.local.createdAt,
            fileId,
            kind: "archive",
            events: events.filter((event) => event.sequence <= archiveThrough),
          }),
        );
        this.archivedThrough = archiveThrough;
        archiveWritten = true;
        recent = events.filter((event) => event.sequence > archiveThrough);
      }
    }

    await writeMachineFile(
      recentPath,
      createMachineFile({
        machineId: this.local.machineId,
        createdAt: this.local.createdAt,
        fileId,
        kind: "recent",
        events: recent,
      }),
    );
    this.publishedSequence = maxSequence;
    return {
      recentPath,
      archivePath: archiveWritten ? archivePath : undefined,
      events: events.length,
    };
  }

  private async readArchivedThrough(archivePath: string): Promise<number> {
    if (!existsSync(archivePath)) {
      return 0;
    }
    try {
      const loaded = await loadMachineFile(archivePath);
      return loaded.file.events.at(-1)?.sequence ?? 0;
    } catch (error) {
      this.logger.warn("own archive file unreadable; it will be rewritten", {
        archivePath,
        error: toErrorMessage(error),
      });
      return 0;
    }
  }
}
