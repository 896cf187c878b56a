import { appendFileSync, existsSync, mkdirSync, renameSync, rmSync, statSync } from "node:fs";
import { dirname, resolve } from "node:path";
import type { HistoryLogger } from "@cmdtrail/runtime";
import { formatISO } from "date-fns";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/** Per-request records are debug, so they stay out of the log unless asked for. */
export const DEFAULT_LOG_LEVEL: LogLevel = "info";

export interface StructuredLoggerOptions {
  logFilePath: string;
  maxBytes?: number;
  maxFiles?: number;
  jsonStdout?: boolean;
  minLevel?: LogLevel;
  now?: () => Date;
}

/** JSON lines to a size-rotated file: `daemon.log`, `daemon.log.1`, ... */
export class StructuredLogger implements HistoryLogger {
  private readonly filePath: string;
  private readonly maxBytes: number;
  private readonly maxFiles: number;
  private readonly jsonStdout: boolean;
  private readonly minRank: number;
  private readonly now: () => Date;

  constructor(options: StructuredLoggerOptions) {
    this.filePath = resolve(options.logFilePath);
    this.maxBytes = Math.max(1024, Math.floor(options.maxBytes ?? 10 * 1024 * 1024));
    this.maxFiles = Math.max(1, Math.floor(options.maxFiles ?? 5));
    this.jsonStdout = options.jsonStdout === true;
    this.minRank = LEVEL_RANK[options.minLevel ?? DEFAULT_LOG_LEVEL];
    this.now = options.now ?? (() => new Date());
    mkdirSync(dirname(this.filePath), { recursive: true });
  }

  get logFilePath(): string {
    return this.filePath;
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log("debug", message, fields);
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.log("info", message, fields);
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log("warn", message, fields);
  }

  error(message: string, fields?: Record<string, unknown>): void {
    this.log("error", message, fields);
  }

  log(level: LogLevel, message: string, fields?: Record<string, unknown>): void {
    if (LEVEL_RANK[level] < this.minRank) {
      return;
    }
    const baseRecord = {
      ts: formatISO(this.now()),
      level,
      message,
    };
    const line = JSON.stringify(fields ? { ...baseRecord, ...fields } : baseRecord);

    if (this.jsonStdout) {
      process.stdout.write(`${line}\n`);
    }

    this.rotateIfNeeded(Buffer.byteLength(line, "utf8") + 1);
    appendFileSync(this.filePath, `${line}\n`, "utf8");
  }

  private currentSize(): number {
    if (!existsSync(this.filePath)) {
      return 0;
    }
    try {
      return statSync(this.filePath).size;
    } catch {
      return 0;
    }
  }

  private rotateIfNeeded(nextBytes: number): void {
    const current = this.currentSize();
    if (current === 0 || current + nextBytes <= this.maxBytes) {
      return;
    }

    for (let index = this.maxFiles; index >= 1; index -= 1) {
      const source = index === 1 ? this.filePath : `${this.filePath}.${index - 1}`;
      const target = `${this.filePath}.${index}`;
      if (!existsSync(source)) {
        continue;
      }
      try {
        rmSync(target, { force: true });
        renameSync(source, target);
      } catch (error) {
        process.stderr.write(
          `cmdtrail: log rotation failed for ${source}: ${error instanceof Error ? error.message : String(error)}\n`,
        );
      }
    }
  }
}
