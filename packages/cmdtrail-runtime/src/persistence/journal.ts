import { existsSync, readFileSync, truncateSync } from "node:fs";
import { appendFile } from "node:fs/promises";
import { Type, type Static } from "@sinclair/typebox";
import { Ajv } from "ajv";
import { decodeEvent, encodeEvent } from "../events/codec.js";
import { LocalStorageError } from "../errors.js";
import type { HistoryEvent } from "../types.js";
import { writeFileAtomic, writeFileAtomicAsync } from "../utils/fs.js";
import { isRecord, safeParseJson } from "../utils/json.js";

export const JOURNAL_FORMAT = "cmdtrail-journal-v1";

const JournalHeaderSchema = Type.Object({
  format: Type.Literal(JOURNAL_FORMAT),
  machine_id: Type.String({ minLength: 1 }),
  file_id: Type.String({ minLength: 1 }),
  created_at: Type.String({ minLength: 1 }),
});

export type JournalHeader = Static<typeof JournalHeaderSchema>;

const ajv = new Ajv({ allErrors: false, strict: false });
const validateJournalHeader = ajv.compile<JournalHeader>(JournalHeaderSchema);

export interface JournalRecovery {
  header?: JournalHeader;
  events: HistoryEvent[];
  corruptLines: number;
  /** Bytes of a torn trailing line removed during recovery. */
  truncatedBytes: number;
}

interface PendingLine {
  line: string;
  resolve: () => void;
  reject: (error: Error) => void;
}

function headerLine(header: JournalHeader): string {
  return `${JSON.stringify(header)}\n`;
}

function eventLine(event: HistoryEvent): string {
  return `${JSON.stringify({ event: encodeEvent(event) })}\n`;
}

/**
 * Reads a journal and repairs a torn tail in place. Only whole lines are
 * ever appended, so anything after the last newline is an interrupted write.
 * With `repair: false` the torn tail is skipped but left on disk.
 */
export function recoverJournal(
  filePath: string,
  options: { repair?: boolean } = {},
): JournalRecovery {
  if (!existsSync(filePath)) {
    return { events: [], corruptLines: 0, truncatedBytes: 0 };
  }

  const content = readFileSync(filePath, "utf8");
  const lastNewline = content.lastIndexOf("\n");
  const complete = lastNewline < 0 ? "" : content.slice(0, lastNewline + 1);
  const truncatedBytes = Buffer.byteLength(content, "utf8") - Buffer.byteLength(complete, "utf8");
  if (truncatedBytes > 0 && options.repair !== false) {
    try {
      truncateSync(filePath, Buffer.byteLength(complete, "utf8"));
    } catch (error) {
      throw new LocalStorageError(filePath, error);
    }
  }

  let header: JournalHeader | undefined;
  const events: HistoryEvent[] = [];
  let corruptLines = 0;
  for (const line of complete.split("\n")) {
    if (!line.trim()) {
      continue;
    }
    const parsed = safeParseJson(line);
    if (validateJournalHeader(parsed)) {
      header ??= parsed;
      continue;
    }
    const event = isRecord(parsed) ? decodeEvent(parsed.event, header?.machine_id) : undefined;
    if (!event) {
      corruptLines += 1;
      continue;
    }
    events.push(event);
  }

  return { header, events, corruptLines, truncatedBytes };
}

/**
 * Append-only JSONL log of local events. Appends are batched and written
 * strictly in call order; `rewrite` is serialized with them.
 */
export class HistoryJournal {
  private pending: PendingLine[] = [];
  private tail: Promise<void> = Promise.resolve();
  private drainScheduled = false;
  private failure: LocalStorageError | null = null;
  private lines = 0;

  constructor(
    readonly filePath: string,
    private readonly header: JournalHeader,
    existingLines = 0,
  ) {
    this.lines = existingLines;
  }

  /** Creates or replaces the file with its header followed by `events`. */
  initialize(events: readonly HistoryEvent[] = []): void {
    try {
      writeFileAtomic(
        this.filePath,
        headerLine(this.header) + events.map((event) => eventLine(event)).join(""),
      );
    } catch (error) {
      throw new LocalStorageError(this.filePath, error);
    }
    this.lines = events.length;
  }

  get lineCount(): number {
    return this.lines;
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  append(event: HistoryEvent): Promise<void> {
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    return new Promise<void>((resolveAppend, rejectAppend) => {
      this.pending.push({ line: eventLine(event), resolve: resolveAppend, reject: rejectAppend });
      this.scheduleDrain();
    });
  }

  /**
   * Atomically replaces the journal with its header plus `survivors()`.
   * Lines still queued are dropped: callers guarantee `survivors()` covers
   * every queued event not already held elsewhere.
   */
  rewrite(survivors: () => HistoryEvent[]): Promise<void> {
    return this.enqueue(async () => {
      const dropped = this.pending.splice(0);
      const events = survivors();
      try {
        await writeFileAtomicAsync(
          this.filePath,
          headerLine(this.header) + events.map((event) => eventLine(event)).join(""),
        );
      } catch (error) {
        const failure = this.fail(error);
        for (const entry of dropped) {
          entry.reject(failure);
        }
        throw failure;
      }
      this.lines = events.length;
      for (const entry of dropped) {
        entry.resolve();
      }
    });
  }

  async flush(): Promise<void> {
    let observed: Promise<void> | undefined;
    while (observed !== this.tail) {
      observed = this.tail;
      await observed;
    }
    if (this.failure) {
      throw this.failure;
    }
  }

  private scheduleDrain(): void {
    if (this.drainScheduled) {
      return;
    }
    this.drainScheduled = true;
    void this.enqueue(async () => {
      this.drainScheduled = false;
      await this.drain();
    });
  }

  private enqueue(operation: () => Promise<void>): Promise<void> {
    const next = this.tail.then(operation);
    // the chain keeps going after a failed step; the step's own promise reports it
    this.tail = next.catch(() => undefined);
    return next;
  }

  private async drain(): Promise<void> {
    const batch = this.pending.splice(0);
    if (batch.length === 0) {
      return;
    }
    if (this.failure) {
      for (const entry of batch) {
        entry.reject(this.failure);
      }
      return;
    }
    try {
      await appendFile(this.filePath, batch.map((entry) => entry.line).join(""), "utf8");
    } catch (error) {
      const failure = this.fail(error);
      for (const entry of batch) {
        entry.reject(failure);
      }
      return;
    }
    this.lines += batch.length;
    for (const entry of batch) {
      entry.resolve();
    }
  }

  private fail(error: unknown): LocalStorageError {
    this.failure ??=
      error instanceof LocalStorageError ? error : new LocalStorageError(this.filePath, error);
    return this.failure;
  }
}
