export interface HistoryEvent {
  command: string;
  /** Wall-clock seconds since the epoch, fractional. */
  startTime: number;
  endTime: number;
  /** `null` when the exit status was never recorded (imported history). */
  exitCode: number | null;
  folder: string | null;
  machine: string;
  sessionId: string | null;
  sequence: number;
}

/**
 * What a shell reports after a command. The daemon owns `machine` and
 * `sequence`; a reported machine is kept only as a hint for logging.
 */
export interface AppendEventInput {
  command: string;
  startTime: number;
  endTime: number;
  exitCode: number | null;
  folder: string | null;
  machine?: string;
  sessionId: string | null;
}

export type MachineFileKind = "full" | "recent" | "archive";

export interface MachineFile {
  formatVersion: string;
  machineId: string;
  createdAt: string;
  fileId?: string;
  kind?: MachineFileKind;
  events: HistoryEvent[];
}

export interface LoadedMachineFile {
  file: MachineFile;
  corruptRecords: number;
}

export type SearchMode = "all" | "session" | "folder" | "aggregated-unique";

export interface SearchQuery {
  mode: SearchMode;
  text?: string;
  sessionId?: string;
  folder?: string;
  limit?: number;
  filterIgnored?: boolean;
  filterFailed?: boolean;
}

export interface AggregatedEntry {
  key: string;
  command: string;
  folder: string | null;
  /** Most recent occurrence. */
  latest: HistoryEvent;
  firstStartTime: number;
  count: number;
  failedCount: number;
  unknownCount: number;
  machines: string[];
  score: number;
}

export type SearchResultItem =
  | { kind: "event"; event: HistoryEvent }
  | { kind: "aggregate"; entry: AggregatedEntry };

export interface NavigationReference {
  startTime: number;
  machine?: string;
  sequence?: number;
}

export type NavigationDirection = "previous" | "next";

export interface NavigationRequest {
  direction: NavigationDirection;
  sessionId: string | null;
  /** Events that started before the shell began are in scope too. */
  sessionStart?: number;
  prefix: string;
  reference: NavigationReference;
  /** Skip events whose command equals the buffer currently shown. */
  ignore?: string;
  /** When `next` runs past the newest match, the buffer returns to `prefix` at this time. */
  capturedAt?: number;
}

export type NavigationResult =
  | { found: true; event: HistoryEvent }
  | { found: true; restored: { prefix: string; startTime: number } }
  | { found: false };

export type ScorerName = "frequency" | "recency" | "decaying-frequency";

export interface CmdtrailConfig {
  /** `null` resolves to the host name. */
  machine: string | null;
  sync: {
    root: string | null;
    intervalMs: number;
    recentLimit: number;
  };
  persistence: {
    compactAfterEvents: number;
  };
  search: {
    maxResults: number;
    batchSize: number;
    scorer: ScorerName;
    halfLifeDays: number;
  };
  logging: {
    maxBytes: number;
    maxFiles: number;
  };
}

export interface HistoryLogger {
  debug(message: string, fields?: Record<string, unknown>): void;
  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(message: string, fields?: Record<string, unknown>): void;
}
