export * from "./types.js";
export * from "./errors.js";
export {
  aggregateKey,
  compareEvents,
  compareRecency,
  durationOf,
  eventKey,
  isFailedExit,
  lowerBound,
} from "./events/model.js";
export {
  decodeEvent,
  encodeEvent,
  PersistedEventRecordSchema,
  type PersistedEventRecord,
} from "./events/codec.js";
export {
  createMachineFile,
  loadMachineFile,
  MACHINE_FILE_FORMAT,
  parseMachineFile,
  serializeMachineFile,
  writeMachineFile,
} from "./persistence/machine-file.js";
export {
  HistoryJournal,
  JOURNAL_FORMAT,
  recoverJournal,
  type JournalHeader,
  type JournalRecovery,
} from "./persistence/journal.js";
export {
  createFileId,
  LocalHistory,
  type LocalHistoryOpenReport,
  type LocalHistoryOptions,
} from "./persistence/local-history.js";
export {
  EventStore,
  type EventStoreOptions,
  type EventStoreStats,
  type MachineStats,
  type MergeResult,
  type StoreSnapshot,
} from "./store/event-store.js";
export {
  DEFAULT_MAX_RESULTS,
  iterateSearch,
  resolveSearchLimit,
  runSearch,
  type SearchFilterView,
  type SearchOptions,
  type SearchResult,
} from "./store/search.js";
export {
  createDecayingFrequencyScorer,
  createScorer,
  frequencyScorer,
  recencyScorer,
  type AggregateScorer,
  type AggregateStats,
} from "./store/scoring.js";
export { compileTextMatcher, type TextMatcher } from "./store/text-match.js";
export {
  DEFAULT_EVENT_FILTERS_TEMPLATE,
  EMPTY_EVENT_FILTER_RULES,
  ensureEventFiltersFile,
  EVENT_FILTERS_FORMAT,
  EventFilters,
  parseEventFilters,
  type EventFilterRules,
} from "./filters/event-filters.js";
export { resolveNavigation, TIME_TOLERANCE_SECONDS } from "./navigation/resolve.js";
export {
  IDLE_NAVIGATION,
  stepNavigation,
  type NavigationBackend,
  type NavigationInput,
  type NavigationScope,
  type NavigationState,
  type NavigationStep,
} from "./navigation/state-machine.js";
export {
  SyncEngine,
  type CorruptFileStatus,
  type PublishedFiles,
  type SyncEngineOptions,
  type SyncReport,
  type SyncStatus,
} from "./sync/sync-engine.js";
export { assertReplicationRoot, listMachineFiles } from "./sync/scan.js";
export {
  buildZshImportFile,
  importedMachineId,
  importZshHistory,
  parseZshHistory,
  type ParsedZshHistory,
  type ZshImportResult,
} from "./import/zsh-history.js";
export { DEFAULT_CMDTRAIL_CONFIG } from "./config/defaults.js";
export {
  loadCmdtrailConfig,
  loadCmdtrailConfigWithDiagnostics,
  resolveMachineId,
  type CmdtrailConfigDiagnostic,
  type CmdtrailConfigDiagnosticLevel,
  type LoadConfigOptions,
} from "./config/loader.js";
export { normalizeCmdtrailConfig } from "./config/normalize.js";
export {
  CMDTRAIL_HOME_ENV,
  CMDTRAIL_MACHINE_ENV,
  CMDTRAIL_SYNC_ROOT_ENV,
  CMDTRAIL_TESTING_ENV,
  normalizePathInput,
  resolveCmdtrailHome,
  resolveCmdtrailPaths,
  resolveMaybeAbsolute,
  type CmdtrailPaths,
} from "./config/paths.js";
export { CmdtrailConfigFileSchema, type CmdtrailConfigFile } from "./config/schema.js";
export { validateCmdtrailConfigFile } from "./config/validate.js";
export {
  ensureDir,
  ensureDirForFile,
  errnoCode,
  readFileSignature,
  writeFileAtomic,
  writeFileAtomicAsync,
} from "./utils/fs.js";
export { isRecord, safeParseJson } from "./utils/json.js";
export { sha256 } from "./utils/hash.js";
export { silentLogger } from "./utils/silent-logger.js";
