import { randomUUID } from "node:crypto";
import { chmodSync } from "node:fs";
import { createServer, type Server } from "node:http";
import process from "node:process";
import {
  CmdtrailError,
  DuplicateInstanceError,
  EventFilters,
  EventStore,
  LocalHistory,
  LocalStorageError,
  SyncEngine,
  createScorer,
  ensureDir,
  ensureEventFiltersFile,
  isCmdtrailError,
  iterateSearch,
  loadCmdtrailConfigWithDiagnostics,
  resolveCmdtrailHome,
  resolveCmdtrailPaths,
  resolveMachineId,
  resolveNavigation,
  resolveSearchLimit,
  toErrorMessage,
  type AggregateScorer,
  type CmdtrailConfig,
  type CmdtrailConfigDiagnostic,
  type CmdtrailPaths,
  type EventStoreStats,
  type LocalHistoryOpenReport,
  type NavigationDirection,
  type NavigationResult,
  type SearchQuery,
  type SearchResultItem,
  type SyncReport,
  type SyncStatus,
} from "@cmdtrail/runtime";
import { WebSocketServer, type RawData, type WebSocket } from "ws";
import {
  DaemonEvents,
  DaemonMethods,
  ErrorCodes,
  PROTOCOL_VERSION,
  daemonError,
  type ConnectParams,
  type DaemonErrorShape,
  type DaemonEvent,
  type DaemonMethod,
  type DaemonParamsByMethod,
  type EventsAppendResult,
  type EventsSearchParams,
  type EventsSearchResult,
  type HealthPayload,
  type HelloOkPayload,
  type NavigationParams,
} from "../protocol/index.js";
import { validateParamsForMethod, validateRequestFrame } from "../protocol/validate.js";
import { StructuredLogger, type LogLevel } from "./logger.js";
import { readPidRecord, removePidRecord, writePidRecord } from "./pid.js";
import { checkSocket, removeSocketFile } from "./socket.js";

const DAEMON_VERSION = "0.1.0";
const DEFAULT_MAX_PAYLOAD_BYTES = 4 * 1024 * 1024;
const WEBSOCKET_CLOSE_TIMEOUT_MS = 3_000;
export const LOCAL_STORAGE_EXIT_CODE = 3;

type ConnectionPhase = "connected" | "ready" | "closing";

interface ActiveSearch {
  searchId: string;
  cancelled: boolean;
}

interface ConnectionState {
  connId: string;
  socket: WebSocket;
  phase: ConnectionPhase;
  searches: Map<string, ActiveSearch>;
  connectedAt: number;
  lastSeenAt: number;
  client?: {
    id: string;
    version: string;
  };
}

interface RequestContext {
  requestId: string;
  state: ConnectionState;
}

type MethodHandlers = {
  [M in DaemonMethod]: (
    params: DaemonParamsByMethod[M],
    context: RequestContext,
  ) => unknown;
};

interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
}

function createDeferred<T>(): Deferred<T> {
  let resolveValue!: (value: T) => void;
  let rejectValue!: (error: unknown) => void;
  const promise = new Promise<T>((resolvePromise, rejectPromise) => {
    resolveValue = resolvePromise;
    rejectValue = rejectPromise;
  });
  return {
    promise,
    resolve: resolveValue,
    reject: rejectValue,
  };
}

function toMessageText(raw: RawData): string {
  if (typeof raw === "string") {
    return raw;
  }
  if (raw instanceof ArrayBuffer) {
    return Buffer.from(raw).toString("utf8");
  }
  if (Array.isArray(raw)) {
    return Buffer.concat(raw).toString("utf8");
  }
  return raw.toString("utf8");
}

function parseJsonFrame(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function isDaemonErrorShape(value: unknown): value is DaemonErrorShape {
  if (!value || typeof value !== "object" || value instanceof Error) {
    return false;
  }
  return (
    "code" in value &&
    typeof value.code === "string" &&
    "message" in value &&
    typeof value.message === "string"
  );
}

function toErrorShape(error: unknown): DaemonErrorShape {
  if (isDaemonErrorShape(error)) {
    return error;
  }
  if (error instanceof CmdtrailError) {
    return { code: error.code, message: error.message };
  }
  return daemonError(ErrorCodes.INTERNAL, toErrorMessage(error));
}

function isDaemonMethod(value: string): value is DaemonMethod {
  return DaemonMethods.some((method) => method === value);
}

function readFrameId(value: unknown): string {
  if (value && typeof value === "object" && "id" in value && typeof value.id === "string") {
    return value.id;
  }
  return randomUUID();
}

function normalizeTraceId(traceId: unknown): string | undefined {
  if (typeof traceId !== "string") {
    return undefined;
  }
  const normalized = traceId.trim();
  return normalized.length > 0 ? normalized : undefined;
}

export interface HistoryDaemonOptions {
  /** Defaults to `$CMDTRAIL_HOME` or `~/.cmdtrail`. */
  home?: string;
  config?: CmdtrailConfig;
  env?: NodeJS.ProcessEnv;
  jsonStdout?: boolean;
  logLevel?: LogLevel;
  maxPayloadBytes?: number;
  /** Tests run several daemons in one process and leave signals alone. */
  handleSignals?: boolean;
  now?: () => Date;
}

export interface HistoryDaemonRuntimeInfo {
  pid: number;
  machine: string;
  fileId: string;
  startedAt: number;
  home: string;
  socketPath: string;
  pidFilePath: string;
  logFilePath: string;
}

export interface HistoryDaemonStatusPayload extends HealthPayload {
  fileId: string;
  home: string;
  pidFilePath: string;
  logFilePath: string;
  config: CmdtrailConfig;
  configDiagnostics: CmdtrailConfigDiagnostic[];
  local: {
    journalPath: string;
    snapshotPath: string;
    events: number;
    maxSequence: number;
    pendingWrites: number;
    journalLines: number;
    opened: LocalHistoryOpenReport | null;
  };
  store: EventStoreStats;
  sync: SyncStatus;
  filters: {
    path: string;
    revision: number;
  };
  activeSearches: number;
  connectionsDetail: Array<{
    connId: string;
    phase: ConnectionPhase;
    connectedAt: number;
    lastSeenAt: number;
    searches: number;
    client?: {
      id: string;
      version: string;
    };
  }>;
}

export class HistoryDaemon {
  readonly paths: CmdtrailPaths;
  readonly config: CmdtrailConfig;
  readonly machineId: string;
  private readonly configDiagnostics: CmdtrailConfigDiagnostic[];
  private readonly maxPayloadBytes: number;
  private readonly logger: StructuredLogger;
  private readonly store: EventStore;
  private readonly local: LocalHistory;
  private readonly sync: SyncEngine;
  private readonly filters: EventFilters;
  private readonly scorer: AggregateScorer;
  private readonly now: () => Date;
  private readonly startedAt: number;
  private readonly stopDeferred = createDeferred<void>();
  private readonly connections = new Map<WebSocket, ConnectionState>();

  private httpServer: Server | null = null;
  private wss: WebSocketServer | null = null;
  private eventSeq = 0;
  private openReport: LocalHistoryOpenReport | null = null;
  private stopping = false;
  private ownsPidRecord = false;
  private ownsSocket = false;
  private fatalError: LocalStorageError | null = null;
  private onSigInt: (() => void) | null = null;
  private onSigTerm: (() => void) | null = null;

  constructor(private readonly options: HistoryDaemonOptions = {}) {
    const env = options.env ?? process.env;
    this.paths = resolveCmdtrailPaths(options.home ?? resolveCmdtrailHome(env));
    const loaded = options.config
      ? { config: options.config, diagnostics: [] }
      : loadCmdtrailConfigWithDiagnostics({ home: this.paths.home, env });
    this.config = loaded.config;
    this.configDiagnostics = loaded.diagnostics;
    this.machineId = resolveMachineId(this.config);
    this.now = options.now ?? (() => new Date());
    this.startedAt = this.now().getTime();
    this.maxPayloadBytes = Math.max(
      16 * 1024,
      options.maxPayloadBytes ?? DEFAULT_MAX_PAYLOAD_BYTES,
    );

    this.logger = new StructuredLogger({
      logFilePath: this.paths.logFilePath,
      maxBytes: this.config.logging.maxBytes,
      maxFiles: this.config.logging.maxFiles,
      jsonStdout: options.jsonStdout === true,
      minLevel: options.logLevel,
      now: this.now,
    });

    this.store = new EventStore({ machineId: this.machineId });
    this.local = new LocalHistory({
      journalPath: this.paths.journalPath,
      archiveDir: this.paths.archiveDir,
      machineId: this.machineId,
      compactAfterEvents: this.config.persistence.compactAfterEvents,
      logger: this.logger,
      now: this.now,
    });
    this.sync = new SyncEngine({
      store: this.store,
      local: this.local,
      archiveDir: this.paths.archiveDir,
      root: this.config.sync.root,
      recentLimit: this.config.sync.recentLimit,
      intervalMs: this.config.sync.intervalMs,
      logger: this.logger,
      now: this.now,
      onError: (error) => {
        if (error instanceof LocalStorageError) {
          this.enterFatalState(error);
        }
      },
    });
    this.filters = new EventFilters(this.paths.eventFiltersPath, this.logger);
    this.scorer = createScorer(this.config.search.scorer, {
      halfLifeDays: this.config.search.halfLifeDays,
    });
  }

  /** Non-zero once local storage has failed. */
  get exitCode(): number {
    return this.fatalError ? LOCAL_STORAGE_EXIT_CODE : 0;
  }

  async start(): Promise<void> {
    ensureDir(this.paths.daemonDir);
    const socketState = await checkSocket(this.paths.socketPath);
    if (socketState === "live") {
      throw new DuplicateInstanceError(this.paths.socketPath, readPidRecord(this.paths.pidFilePath)?.pid);
    }

    try {
      writePidRecord(this.paths.pidFilePath, {
        pid: process.pid,
        socketPath: this.paths.socketPath,
        startedAt: this.startedAt,
        home: this.paths.home,
        machine: this.machineId,
      });
      this.ownsPidRecord = true;

      if (socketState === "stale") {
        this.logger.warn("removing stale daemon socket", { socketPath: this.paths.socketPath });
        removeSocketFile(this.paths.socketPath);
      }

      for (const diagnostic of this.configDiagnostics) {
        this.logger.warn("config diagnostic", {
          code: diagnostic.code,
          configPath: diagnostic.configPath,
          error: diagnostic.message,
        });
      }

      this.openReport = this.local.open();
      this.store.restoreLocal(this.local.localEvents);
      if (ensureEventFiltersFile(this.paths.eventFiltersPath)) {
        this.logger.info("wrote default event filters", { path: this.paths.eventFiltersPath });
      }
      this.filters.refresh();

      const report = await this.sync.syncNow();
      this.logger.info("initial sync finished", {
        inserted: report.inserted,
        scannedFiles: report.scannedFiles,
        rootAvailable: report.rootAvailable,
      });

      await this.listen();
      this.sync.start();
      if (this.options.handleSignals !== false) {
        this.installSignalHandlers();
      }

      this.logger.info("daemon started", {
        pid: process.pid,
        machine: this.machineId,
        fileId: this.local.fileId,
        socketPath: this.paths.socketPath,
        events: this.store.size,
        protocol: PROTOCOL_VERSION,
      });
    } catch (error) {
      await this.cleanupFailedStart();
      throw error;
    }
  }

  getRuntimeInfo(): HistoryDaemonRuntimeInfo {
    return {
      pid: process.pid,
      machine: this.machineId,
      fileId: this.local.fileId,
      startedAt: this.startedAt,
      home: this.paths.home,
      socketPath: this.paths.socketPath,
      pidFilePath: this.paths.pidFilePath,
      logFilePath: this.paths.logFilePath,
    };
  }

  getHealthStatus(): HealthPayload {
    return {
      ok: true,
      pid: process.pid,
      machine: this.machineId,
      socketPath: this.paths.socketPath,
      startedAt: this.startedAt,
      uptimeMs: Math.max(0, this.now().getTime() - this.startedAt),
      connections: this.readyConnections().length,
      events: this.store.size,
    };
  }

  getStatus(): HistoryDaemonStatusPayload {
    const connections = [...this.connections.values()];
    return {
      ...this.getHealthStatus(),
      fileId: this.local.fileId,
      home: this.paths.home,
      pidFilePath: this.paths.pidFilePath,
      logFilePath: this.paths.logFilePath,
      config: this.config,
      configDiagnostics: this.configDiagnostics,
      local: {
        journalPath: this.paths.journalPath,
        snapshotPath: this.local.snapshotPath,
        events: this.local.localEvents.length,
        maxSequence: this.local.maxSequence,
        pendingWrites: this.local.pendingWrites,
        journalLines: this.local.journalLines,
        opened: this.openReport,
      },
      store: this.store.stats(),
      sync: this.sync.getStatus(),
      filters: {
        path: this.paths.eventFiltersPath,
        revision: this.filters.revision,
      },
      activeSearches: connections.reduce((total, state) => total + state.searches.size, 0),
      connectionsDetail: connections.map((state) => ({
        connId: state.connId,
        phase: state.phase,
        connectedAt: state.connectedAt,
        lastSeenAt: state.lastSeenAt,
        searches: state.searches.size,
        client: state.client,
      })),
    };
  }

  async waitForStop(): Promise<void> {
    await this.stopDeferred.promise;
  }

  async stop(reason = "shutdown"): Promise<void> {
    if (this.stopping) {
      await this.stopDeferred.promise;
      return;
    }
    this.stopping = true;

    this.logger.info("daemon stopping", { reason });
    this.broadcastEvent("shutdown", {
      reason,
      ts: this.now().getTime(),
    });
    await this.closeServer();

    this.sync.stop();
    await this.sync.waitForIdle();

    if (!this.fatalError) {
      try {
        await this.local.flush();
        await this.local.snapshotLocal();
        const report = await this.sync.syncNow();
        this.logger.info("final sync finished", {
          published: report.published !== null,
          rootAvailable: report.rootAvailable,
        });
      } catch (error) {
        if (error instanceof LocalStorageError) {
          this.markFatal(error);
        } else {
          this.logger.error("shutdown persistence failed", { error: toErrorMessage(error) });
        }
      }
    }

    this.releaseOwnedFiles();
    this.uninstallSignalHandlers();
    this.logger.info("daemon stopped", { reason, exitCode: this.exitCode });
    this.stopDeferred.resolve(undefined);
  }

  private async listen(): Promise<void> {
    const httpServer = createServer((_request, response) => {
      response.writeHead(426, { "content-type": "text/plain" });
      response.end("websocket upgrade required\n");
    });
    const wss = new WebSocketServer({
      server: httpServer,
      maxPayload: this.maxPayloadBytes,
    });
    this.httpServer = httpServer;
    this.wss = wss;

    await new Promise<void>((resolveListen, rejectListen) => {
      const onError = (error: NodeJS.ErrnoException): void => {
        httpServer.off("listening", onListening);
        rejectListen(
          error.code === "EADDRINUSE"
            ? new DuplicateInstanceError(this.paths.socketPath)
            : error,
        );
      };
      const onListening = (): void => {
        httpServer.off("error", onError);
        resolveListen();
      };
      httpServer.once("error", onError);
      httpServer.once("listening", onListening);
      httpServer.listen(this.paths.socketPath);
    });
    this.ownsSocket = true;
    chmodSync(this.paths.socketPath, 0o600);

    wss.on("connection", (socket: WebSocket) => {
      this.onConnection(socket);
    });
    wss.on("error", (error: Error) => {
      this.logger.error("websocket server error", { error: error.message });
    });
    httpServer.on("error", (error: Error) => {
      this.logger.error("socket server error", { error: error.message });
    });
  }

  private installSignalHandlers(): void {
    if (!this.onSigInt) {
      this.onSigInt = () => {
        void this.stop("sigint");
      };
      process.on("SIGINT", this.onSigInt);
    }
    if (!this.onSigTerm) {
      this.onSigTerm = () => {
        void this.stop("sigterm");
      };
      process.on("SIGTERM", this.onSigTerm);
    }
  }

  private uninstallSignalHandlers(): void {
    if (this.onSigInt) {
      process.off("SIGINT", this.onSigInt);
      this.onSigInt = null;
    }
    if (this.onSigTerm) {
      process.off("SIGTERM", this.onSigTerm);
      this.onSigTerm = null;
    }
  }

  private async cleanupFailedStart(): Promise<void> {
    this.sync.stop();
    await this.sync.waitForIdle();
    await this.closeServer();
    this.uninstallSignalHandlers();
    this.releaseOwnedFiles();
  }

  private releaseOwnedFiles(): void {
    if (this.ownsSocket) {
      removeSocketFile(this.paths.socketPath);
      this.ownsSocket = false;
    }
    if (!this.ownsPidRecord) {
      return;
    }
    const currentRecord = readPidRecord(this.paths.pidFilePath);
    if (currentRecord?.pid === process.pid) {
      removePidRecord(this.paths.pidFilePath);
    }
    this.ownsPidRecord = false;
  }

  private async closeServer(): Promise<void> {
    const wss = this.wss;
    const httpServer = this.httpServer;
    this.wss = null;
    this.httpServer = null;

    for (const state of Array.from(this.connections.values())) {
      this.cleanupConnectionState(state);
      state.socket.terminate();
    }
    this.connections.clear();

    if (wss) {
      await this.closeWithTimeout("websocket server", (done) => wss.close(() => done()));
    }
    if (httpServer) {
      await this.closeWithTimeout("socket server", (done) => httpServer.close(() => done()));
    }
  }

  private async closeWithTimeout(label: string, close: (done: () => void) => void): Promise<void> {
    await new Promise<void>((resolveClose) => {
      let settled = false;
      const finish = (): void => {
        if (settled) {
          return;
        }
        settled = true;
        resolveClose();
      };

      const timer = setTimeout(() => {
        this.logger.warn(`${label} close timeout`, { timeoutMs: WEBSOCKET_CLOSE_TIMEOUT_MS });
        finish();
      }, WEBSOCKET_CLOSE_TIMEOUT_MS);
      timer.unref?.();

      try {
        close(() => {
          clearTimeout(timer);
          finish();
        });
      } catch (error) {
        clearTimeout(timer);
        this.logger.warn(`${label} close threw error`, { error: toErrorMessage(error) });
        finish();
      }
    });
  }

  /** Local storage failures stop the daemon; anything else is logged and survived. */
  private handleBackgroundError(error: unknown, message: string): void {
    if (error instanceof LocalStorageError) {
      this.enterFatalState(error);
      return;
    }
    this.logger.error(message, { error: toErrorMessage(error) });
  }

  private markFatal(error: LocalStorageError): boolean {
    if (this.fatalError) {
      return false;
    }
    this.fatalError = error;
    this.logger.error("local storage failure; daemon exiting", {
      path: error.filePath,
      error: error.message,
    });
    process.stderr.write(`cmdtrail daemon: ${error.message}\n`);
    return true;
  }

  private enterFatalState(error: LocalStorageError): void {
    if (this.markFatal(error)) {
      void this.stop("local_storage_failure");
    }
  }

  private nextEventSeq(): number {
    this.eventSeq += 1;
    return this.eventSeq;
  }

  private readyConnections(): ConnectionState[] {
    return [...this.connections.values()].filter((state) => state.phase === "ready");
  }

  private onConnection(socket: WebSocket): void {
    if (this.stopping) {
      socket.terminate();
      return;
    }
    const connectedAt = this.now().getTime();
    const state: ConnectionState = {
      connId: randomUUID(),
      socket,
      phase: "connected",
      searches: new Map(),
      connectedAt,
      lastSeenAt: connectedAt,
    };
    this.connections.set(socket, state);

    socket.on("message", (raw: RawData) => {
      void this.handleIncomingMessage(state, raw);
    });
    socket.on("close", () => {
      this.cleanupConnectionState(state);
    });
    socket.on("error", (error: Error) => {
      this.logger.warn("connection error", {
        connId: state.connId,
        error: error.message,
      });
    });
  }

  private async handleIncomingMessage(state: ConnectionState, raw: RawData): Promise<void> {
    state.lastSeenAt = this.now().getTime();
    const parsedRaw = parseJsonFrame(toMessageText(raw));
    if (!validateRequestFrame(parsedRaw)) {
      this.sendResponse(state, {
        id: readFrameId(parsedRaw),
        ok: false,
        error: daemonError(
          ErrorCodes.INVALID_REQUEST,
          "invalid request frame; expected {type:'req',id,method,params}",
        ),
      });
      return;
    }

    const request = parsedRaw;
    const traceId = normalizeTraceId(request.traceId);
    if (!isDaemonMethod(request.method)) {
      this.sendResponse(state, {
        id: request.id,
        ok: false,
        traceId,
        error: daemonError(ErrorCodes.METHOD_NOT_FOUND, `method not found: ${request.method}`),
      });
      return;
    }
    const method = request.method;

    if (state.phase === "closing" || this.stopping) {
      this.sendResponse(state, {
        id: request.id,
        ok: false,
        traceId,
        error: daemonError(ErrorCodes.BAD_STATE, "daemon is shutting down"),
      });
      return;
    }
    if (method !== "connect" && state.phase !== "ready") {
      this.sendResponse(state, {
        id: request.id,
        ok: false,
        traceId,
        error: daemonError(ErrorCodes.BAD_STATE, "call connect first"),
      });
      return;
    }
    if (method === "connect" && state.phase === "ready") {
      this.sendResponse(state, {
        id: request.id,
        ok: false,
        traceId,
        error: daemonError(ErrorCodes.BAD_STATE, "connection already established"),
      });
      return;
    }

    const startedAt = Date.now();
    this.logger.debug("request received", {
      connId: state.connId,
      method,
      requestId: request.id,
      traceId,
    });

    try {
      const payload = await this.dispatch(method, request.params ?? {}, request.id, state);
      this.sendResponse(state, {
        id: request.id,
        ok: true,
        traceId,
        payload,
      });
      this.logger.debug("request completed", {
        connId: state.connId,
        method,
        requestId: request.id,
        traceId,
        latencyMs: Date.now() - startedAt,
      });
    } catch (error) {
      const shaped = toErrorShape(error);
      this.sendResponse(state, {
        id: request.id,
        ok: false,
        traceId,
        error: shaped,
      });
      this.logger.warn("request failed", {
        connId: state.connId,
        method,
        requestId: request.id,
        traceId,
        latencyMs: Date.now() - startedAt,
        errorCode: shaped.code,
        errorMessage: shaped.message,
      });
    }
  }

  private async dispatch<K extends DaemonMethod>(
    method: K,
    rawParams: unknown,
    requestId: string,
    state: ConnectionState,
  ): Promise<unknown> {
    const validated = validateParamsForMethod(method, rawParams);
    if (!validated.ok) {
      throw daemonError(ErrorCodes.INVALID_REQUEST, validated.error);
    }
    const handler: MethodHandlers[K] = this.handlers[method];
    return await handler(validated.params, { requestId, state });
  }

  private readonly handlers: MethodHandlers = {
    connect: (params, { state }) => this.handleConnect(params, state),
    "events.append": (params) => this.handleAppend(params),
    "events.search": (params, { requestId, state }) =>
      this.handleSearch(params, requestId, state),
    "events.search-cancel": ({ searchId }, { state }) => {
      const active = state.searches.get(searchId);
      if (active) {
        active.cancelled = true;
      }
      return { searchId, cancelled: active !== undefined };
    },
    "events.previous": (params) => this.handleNavigation("previous", params),
    "events.next": (params) => this.handleNavigation("next", params),
    "daemon.health": () => this.getHealthStatus(),
    "daemon.status": () => this.getStatus(),
    "daemon.stop": ({ reason: requested }) => {
      const reason = requested?.trim() || "remote_stop";
      setTimeout(() => {
        void this.stop(reason);
      }, 10).unref?.();
      return {
        stopping: true,
        reason,
      };
    },
    "sync.now": () => this.handleSyncNow(),
  };

  private handleConnect(params: ConnectParams, state: ConnectionState): HelloOkPayload {
    if (params.protocol !== PROTOCOL_VERSION) {
      throw daemonError(
        ErrorCodes.INVALID_REQUEST,
        `protocol mismatch: server=${PROTOCOL_VERSION}, client=${params.protocol}`,
      );
    }

    state.phase = "ready";
    state.client = {
      id: params.client.id,
      version: params.client.version,
    };

    return {
      type: "hello-ok",
      protocol: PROTOCOL_VERSION,
      server: {
        version: DAEMON_VERSION,
        connId: state.connId,
        pid: process.pid,
        machine: this.machineId,
      },
      features: {
        methods: [...DaemonMethods],
        events: [...DaemonEvents],
      },
      policy: {
        maxPayloadBytes: this.maxPayloadBytes,
        searchBatchSize: this.config.search.batchSize,
      },
    };
  }

  private handleAppend(params: DaemonParamsByMethod["events.append"]): EventsAppendResult {
    if (this.fatalError) {
      throw this.fatalError;
    }
    if (params.machine !== undefined && params.machine !== this.machineId) {
      this.logger.debug("client machine id overridden", {
        reported: params.machine,
        machine: this.machineId,
      });
    }
    const event = this.store.appendLocal(params);
    this.local
      .appendLocal(event)
      .then(() => {
        if (this.local.needsCompaction() && !this.stopping) {
          return this.local.snapshotLocal();
        }
        return undefined;
      })
      .catch((error: unknown) => {
        this.handleBackgroundError(error, "journal write failed");
      });
    return { machine: event.machine, sequence: event.sequence };
  }

  private handleNavigation(
    direction: NavigationDirection,
    params: NavigationParams,
  ): NavigationResult {
    const snapshot = this.store.snapshot();
    try {
      return resolveNavigation(snapshot, {
        direction,
        sessionId: params.sessionId,
        sessionStart: params.sessionStart,
        prefix: params.prefix,
        reference: params.reference,
        ignore: params.ignore,
        capturedAt: params.capturedAt,
      });
    } finally {
      snapshot.release();
    }
  }

  private async handleSyncNow(): Promise<SyncReport> {
    try {
      return await this.sync.syncNow();
    } catch (error) {
      if (error instanceof LocalStorageError) {
        this.enterFatalState(error);
      }
      throw error;
    }
  }

  /**
   * Streams matches as `search.batch` events, awaiting each write before
   * producing the next batch. Works on a snapshot, so appends that land
   * meanwhile are not seen.
   */
  private async handleSearch(
    params: EventsSearchParams,
    requestId: string,
    state: ConnectionState,
  ): Promise<EventsSearchResult> {
    const searchId = params.searchId ?? requestId;
    if (state.searches.has(searchId)) {
      throw daemonError(ErrorCodes.BAD_STATE, `search already running: ${searchId}`);
    }
    const query: SearchQuery = {
      mode: params.mode,
      text: params.query,
      sessionId: params.sessionId,
      folder: params.folder,
      limit: params.limit,
      filterIgnored: params.filterIgnored,
      filterFailed: params.filterFailed,
    };
    const maxResults = this.config.search.maxResults;
    const limit = resolveSearchLimit(query, maxResults);
    const batchSize = Math.max(1, this.config.search.batchSize);
    this.filters.refresh();
    const snapshot = this.store.snapshot();
    const items = iterateSearch(snapshot, query, {
      scorer: this.scorer,
      filters: this.filters,
      nowSeconds: this.now().getTime() / 1000,
      maxResults,
    });

    const active: ActiveSearch = { searchId, cancelled: false };
    state.searches.set(searchId, active);
    let sent = 0;
    let truncated = false;
    let batch: SearchResultItem[] = [];
    try {
      for (const item of items) {
        if (active.cancelled) {
          break;
        }
        if (sent + batch.length >= limit) {
          truncated = true;
          break;
        }
        batch.push(item);
        if (batch.length >= batchSize) {
          await this.sendSearchBatch(state, active, batch);
          sent += batch.length;
          batch = [];
        }
      }
      if (!active.cancelled && batch.length > 0) {
        await this.sendSearchBatch(state, active, batch);
        sent += batch.length;
      }
    } catch (error) {
      if (isCmdtrailError(error, "invalid_request")) {
        throw daemonError(ErrorCodes.INVALID_REQUEST, error.message);
      }
      throw error;
    } finally {
      state.searches.delete(searchId);
      snapshot.release();
    }

    return {
      searchId,
      count: sent,
      truncated,
      cancelled: active.cancelled,
    };
  }

  private async sendSearchBatch(
    state: ConnectionState,
    active: ActiveSearch,
    items: SearchResultItem[],
  ): Promise<void> {
    const delivered = await this.sendEventAndWait(state, "search.batch", {
      searchId: active.searchId,
      items,
    });
    if (!delivered) {
      active.cancelled = true;
    }
  }

  private cleanupConnectionState(state: ConnectionState): void {
    state.phase = "closing";
    for (const active of state.searches.values()) {
      active.cancelled = true;
    }
    this.connections.delete(state.socket);
  }

  private sendResponse(
    state: ConnectionState,
    payload: {
      id: string;
      ok: boolean;
      traceId?: string;
      payload?: unknown;
      error?: DaemonErrorShape;
    },
  ): void {
    if (state.socket.readyState !== state.socket.OPEN) {
      return;
    }

    const frame = {
      type: "res",
      id: payload.id,
      traceId: payload.traceId,
      ok: payload.ok,
      payload: payload.payload,
      error: payload.error,
    };
    state.socket.send(JSON.stringify(frame));
  }

  private sendEvent(state: ConnectionState, event: DaemonEvent, payload?: unknown, seq?: number): void {
    if (state.socket.readyState !== state.socket.OPEN) {
      return;
    }
    const frame = {
      type: "event",
      event,
      payload,
      seq: seq ?? this.nextEventSeq(),
    };
    state.socket.send(JSON.stringify(frame));
  }

  /** Resolves `false` when the peer is gone or the write failed. */
  private sendEventAndWait(state: ConnectionState, event: DaemonEvent, payload: unknown): Promise<boolean> {
    if (state.socket.readyState !== state.socket.OPEN) {
      return Promise.resolve(false);
    }
    const frame = JSON.stringify({
      type: "event",
      event,
      payload,
      seq: this.nextEventSeq(),
    });
    return new Promise<boolean>((resolveSend) => {
      state.socket.send(frame, (error?: Error) => {
        if (error) {
          this.logger.debug("event delivery failed", {
            connId: state.connId,
            event,
            error: error.message,
          });
        }
        resolveSend(!error);
      });
    });
  }

  private broadcastEvent(event: DaemonEvent, payload?: unknown): void {
    const seq = this.nextEventSeq();
    for (const state of this.readyConnections()) {
      this.sendEvent(state, event, payload, seq);
    }
  }
}

export async function runHistoryDaemon(options: HistoryDaemonOptions = {}): Promise<number> {
  const daemon = new HistoryDaemon(options);
  await daemon.start();
  await daemon.waitForStop();
  return daemon.exitCode;
}
