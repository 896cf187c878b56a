export * from "./protocol/index.js";
export {
  connectDaemonClient,
  DaemonClient,
  DaemonRequestError,
  tryConnectDaemonClient,
  type DaemonClientConnectOptions,
  type DaemonClientEvent,
  type DaemonClientEventListener,
  type SearchHandle,
  type SearchStreamOptions,
} from "./client.js";
export {
  HistoryDaemon,
  LOCAL_STORAGE_EXIT_CODE,
  runHistoryDaemon,
  type HistoryDaemonOptions,
  type HistoryDaemonRuntimeInfo,
  type HistoryDaemonStatusPayload,
} from "./daemon/history-daemon.js";
export { DEFAULT_LOG_LEVEL, StructuredLogger, type LogLevel, type StructuredLoggerOptions } from "./daemon/logger.js";
export {
  isProcessAlive,
  readPidRecord,
  removePidRecord,
  writePidRecord,
  type DaemonPidRecord,
} from "./daemon/pid.js";
export { checkSocket, removeSocketFile, type SocketState } from "./daemon/socket.js";
export {
  queryDaemonStatus,
  runDaemonCli,
  type RunDaemonCliOptions,
  type RunDaemonCliResult,
} from "./cli.js";
