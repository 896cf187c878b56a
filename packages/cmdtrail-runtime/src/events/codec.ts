import { Type, type Static } from "@sinclair/typebox";
import { Ajv } from "ajv";
import type { HistoryEvent } from "../types.js";

export const PersistedEventRecordSchema = Type.Object({
  command: Type.String(),
  start_time: Type.Number(),
  end_time: Type.Number(),
  exit_code: Type.Union([Type.Integer(), Type.Null()]),
  folder: Type.Union([Type.String(), Type.Null()]),
  machine: Type.Optional(Type.String({ minLength: 1 })),
  session_id: Type.Union([Type.String(), Type.Null()]),
  sequence: Type.Integer({ minimum: 1 }),
});

export type PersistedEventRecord = Static<typeof PersistedEventRecordSchema>;

const ajv = new Ajv({
  allErrors: false,
  strict: false,
});

const validatePersistedEventRecord = ajv.compile<PersistedEventRecord>(PersistedEventRecordSchema);

export function encodeEvent(event: HistoryEvent): PersistedEventRecord {
  return {
    command: event.command,
    start_time: event.startTime,
    end_time: event.endTime,
    exit_code: event.exitCode,
    folder: event.folder,
    machine: event.machine,
    session_id: event.sessionId,
    sequence: event.sequence,
  };
}

/**
 * Returns `undefined` for records that do not parse. A record without a
 * machine takes `fallbackMachine`; one naming another machine is rejected.
 */
export function decodeEvent(value: unknown, fallbackMachine?: string): HistoryEvent | undefined {
  if (!validatePersistedEventRecord(value)) {
    return undefined;
  }
  const machine = value.machine ?? fallbackMachine;
  if (!machine) {
    return undefined;
  }
  if (fallbackMachine !== undefined && machine !== fallbackMachine) {
    return undefined;
  }
  return {
    command: value.command,
    startTime: value.start_time,
    endTime: value.end_time,
    exitCode: value.exit_code,
    folder: value.folder,
    machine,
    sessionId: value.session_id,
    sequence: value.sequence,
  };
}
