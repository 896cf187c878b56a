import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { DuplicateInstanceError, errnoCode, isRecord, safeParseJson } from "@cmdtrail/runtime";

export interface DaemonPidRecord {
  pid: number;
  socketPath: string;
  startedAt: number;
  home: string;
  machine: string;
}

export function isProcessAlive(pid: number): boolean {
  if (!Number.isInteger(pid) || pid <= 0) {
    return false;
  }
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: alive, owned by someone else
    return errnoCode(error) === "EPERM";
  }
}

export function readPidRecord(pidFilePath: string): DaemonPidRecord | undefined {
  const filePath = resolve(pidFilePath);
  if (!existsSync(filePath)) {
    return undefined;
  }
  let text: string;
  try {
    text = readFileSync(filePath, "utf8");
  } catch {
    return undefined;
  }
  const value = safeParseJson(text);
  if (
    isRecord(value) &&
    typeof value.pid === "number" &&
    typeof value.socketPath === "string" &&
    typeof value.startedAt === "number" &&
    typeof value.home === "string"
  ) {
    return {
      pid: value.pid,
      socketPath: value.socketPath,
      startedAt: value.startedAt,
      home: value.home,
      machine: typeof value.machine === "string" ? value.machine : "",
    };
  }
  return undefined;
}

/**
 * Claims the pid file. A record left by a dead process is replaced; one held
 * by a live process means another daemon owns this home.
 */
export function writePidRecord(pidFilePath: string, record: DaemonPidRecord): void {
  const filePath = resolve(pidFilePath);
  mkdirSync(dirname(filePath), { recursive: true });

  const existing = readPidRecord(filePath);
  if (existing && existing.pid !== process.pid && isProcessAlive(existing.pid)) {
    throw new DuplicateInstanceError(record.socketPath, existing.pid);
  }
  if (existsSync(filePath)) {
    rmSync(filePath, { force: true });
  }

  try {
    writeFileSync(filePath, JSON.stringify(record, null, 2), { encoding: "utf8", flag: "wx" });
  } catch (error) {
    if (errnoCode(error) === "EEXIST") {
      throw new DuplicateInstanceError(record.socketPath, readPidRecord(filePath)?.pid);
    }
    throw error;
  }
}

export function removePidRecord(pidFilePath: string): void {
  rmSync(resolve(pidFilePath), { force: true });
}
