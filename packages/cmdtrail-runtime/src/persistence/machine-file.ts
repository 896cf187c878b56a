import { readFile } from "node:fs/promises";
import { Type, type Static } from "@sinclair/typebox";
import { Ajv } from "ajv";
import { CorruptFileError } from "../errors.js";
import { decodeEvent, encodeEvent } from "../events/codec.js";
import type { HistoryEvent, LoadedMachineFile, MachineFile } from "../types.js";
import { writeFileAtomicAsync } from "../utils/fs.js";
import { safeParseJson } from "../utils/json.js";

export const MACHINE_FILE_FORMAT = "cmdtrail-history-v1";

const MachineFileContainerSchema = Type.Object({
  format_version: Type.String({ minLength: 1 }),
  machine_id: Type.String({ minLength: 1 }),
  created_at: Type.String({ minLength: 1 }),
  file_id: Type.Optional(Type.String({ minLength: 1 })),
  kind: Type.Optional(
    Type.Union([Type.Literal("full"), Type.Literal("recent"), Type.Literal("archive")]),
  ),
  events: Type.Array(Type.Unknown()),
});

type MachineFileContainer = Static<typeof MachineFileContainerSchema>;

const ajv = new Ajv({ allErrors: false, strict: false });
const validateContainer = ajv.compile<MachineFileContainer>(MachineFileContainerSchema);

function readFormatVersion(value: unknown): string | undefined {
  if (!value || typeof value !== "object" || !("format_version" in value)) {
    return undefined;
  }
  return typeof value.format_version === "string" ? value.format_version : undefined;
}

export function parseMachineFile(text: string, filePath: string): LoadedMachineFile {
  const parsed = safeParseJson(text);
  if (parsed === undefined) {
    throw new CorruptFileError(filePath, "not valid JSON (possibly still being written)");
  }
  const version = readFormatVersion(parsed);
  if (version !== MACHINE_FILE_FORMAT) {
    // unknown or newer layouts are refused instead of guessed at
    throw new CorruptFileError(
      filePath,
      version === undefined ? "missing format_version" : `unsupported format_version ${version}`,
    );
  }
  if (!validateContainer(parsed)) {
    throw new CorruptFileError(filePath, "invalid machine file header");
  }

  const events: HistoryEvent[] = [];
  const seen = new Set<number>();
  let corruptRecords = 0;
  for (const record of parsed.events) {
    const event = decodeEvent(record, parsed.machine_id);
    if (!event) {
      corruptRecords += 1;
      continue;
    }
    if (seen.has(event.sequence)) {
      continue;
    }
    seen.add(event.sequence);
    events.push(event);
  }
  events.sort((left, right) => left.sequence - right.sequence);

  return {
    file: {
      formatVersion: parsed.format_version,
      machineId: parsed.machine_id,
      createdAt: parsed.created_at,
      fileId: parsed.file_id,
      kind: parsed.kind,
      events,
    },
    corruptRecords,
  };
}

export async function loadMachineFile(filePath: string): Promise<LoadedMachineFile> {
  const text = await readFile(filePath, "utf8");
  return parseMachineFile(text, filePath);
}

export function serializeMachineFile(file: MachineFile): string {
  const container = {
    format_version: file.formatVersion,
    machine_id: file.machineId,
    created_at: file.createdAt,
    file_id: file.fileId,
    kind: file.kind,
    events: file.events.map((event) => encodeEvent(event)),
  };
  return `${JSON.stringify(container)}\n`;
}

/** Write-new-then-rename; readers see the old or the new file, never a mix. */
export async function writeMachineFile(filePath: string, file: MachineFile): Promise<void> {
  await writeFileAtomicAsync(filePath, serializeMachineFile(file));
}

export function createMachineFile(input: {
  machineId: string;
  createdAt: string;
  fileId?: string;
  kind?: MachineFile["kind"];
  events: HistoryEvent[];
}): MachineFile {
  return {
    formatVersion: MACHINE_FILE_FORMAT,
    machineId: input.machineId,
    createdAt: input.createdAt,
    fileId: input.fileId,
    kind: input.kind,
    events: input.events,
  };
}
