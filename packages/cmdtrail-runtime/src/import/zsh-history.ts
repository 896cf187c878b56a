import { readFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { formatISO } from "date-fns";
import { createMachineFile, loadMachineFile, writeMachineFile } from "../persistence/machine-file.js";
import type { HistoryEvent, MachineFile } from "../types.js";
import { errnoCode } from "../utils/fs.js";
import { sha256 } from "../utils/hash.js";

const EXTENDED_HISTORY_LINE = /^: (?<start>\d+):(?<duration>\d+);(?<command>.*)$/su;

export interface ParsedZshHistory {
  events: HistoryEvent[];
  skippedLines: number;
}

export interface ZshImportResult {
  filePath: string;
  machineId: string;
  /** Events in the file after the import. */
  events: number;
  /** Events this import appended. */
  added: number;
  skippedLines: number;
}

/** Imported histories get a machine id of their own, stable per source path. */
export function importedMachineId(historyPath: string): string {
  return `import-${sha256(resolve(historyPath)).slice(0, 16)}`;
}

/**
 * Parses zsh extended history (`: <start>:<duration>;<command>`). A trailing
 * backslash continues the command on the next line. Sequences follow line
 * order; folder, exit code and session are unknown.
 */
export function parseZshHistory(text: string, machineId: string): ParsedZshHistory {
  const lines = text.split("\n");
  if (lines.at(-1) === "") {
    lines.pop();
  }

  const events: HistoryEvent[] = [];
  let skippedLines = 0;
  for (let index = 0; index < lines.length; index += 1) {
    const match = EXTENDED_HISTORY_LINE.exec(lines[index] ?? "");
    if (!match?.groups) {
      skippedLines += 1;
      continue;
    }
    const startTime = Number(match.groups.start);
    const duration = Number(match.groups.duration);
    let command = match.groups.command ?? "";
    while (command.endsWith("\\") && index + 1 < lines.length) {
      index += 1;
      command = `${command.slice(0, -1)}\n${lines[index] ?? ""}`;
    }
    events.push({
      command,
      startTime,
      endTime: startTime + duration,
      exitCode: null,
      folder: null,
      machine: machineId,
      sessionId: null,
      sequence: events.length + 1,
    });
  }
  return { events, skippedLines };
}

/**
 * Builds the machine file for an import. With `existing`, its events are kept
 * as they are and only entries whose start time and command it lacks are
 * appended, numbered after its highest sequence. zsh trims old lines from its
 * history file, so line positions cannot serve as sequences across imports.
 */
export function buildZshImportFile(
  historyPath: string,
  text: string,
  now: Date = new Date(),
  existing?: MachineFile,
): { file: MachineFile; added: number; skippedLines: number } {
  const machineId = importedMachineId(historyPath);
  const parsed = parseZshHistory(text, machineId);
  const kept = existing?.events ?? [];
  const seen = new Set(kept.map(importIdentity));
  let sequence = kept.reduce((max, event) => Math.max(max, event.sequence), 0);
  const appended: HistoryEvent[] = [];
  for (const event of parsed.events) {
    const identity = importIdentity(event);
    if (seen.has(identity)) {
      continue;
    }
    seen.add(identity);
    sequence += 1;
    appended.push({ ...event, sequence });
  }
  return {
    file: createMachineFile({
      machineId,
      createdAt: existing?.createdAt ?? formatISO(now),
      fileId: machineId,
      kind: "full",
      events: [...kept, ...appended],
    }),
    added: appended.length,
    skippedLines: parsed.skippedLines,
  };
}

function importIdentity(event: HistoryEvent): string {
  return JSON.stringify([event.startTime, event.command]);
}

async function loadPreviousImport(filePath: string): Promise<MachineFile | undefined> {
  try {
    return (await loadMachineFile(filePath)).file;
  } catch (error) {
    if (errnoCode(error) === "ENOENT") {
      return undefined;
    }
    throw error;
  }
}

/**
 * Writes `<archiveDir>/<machine>.json`. Importing the same path again adds the
 * entries that are new since the previous import.
 */
export async function importZshHistory(
  historyPath: string,
  archiveDir: string,
  now: Date = new Date(),
): Promise<ZshImportResult> {
  const text = await readFile(historyPath, "utf8");
  const filePath = join(archiveDir, `${importedMachineId(historyPath)}.json`);
  const previous = await loadPreviousImport(filePath);
  const { file, added, skippedLines } = buildZshImportFile(historyPath, text, now, previous);
  await writeMachineFile(filePath, file);
  return {
    filePath,
    machineId: file.machineId,
    events: file.events.length,
    added,
    skippedLines,
  };
}
