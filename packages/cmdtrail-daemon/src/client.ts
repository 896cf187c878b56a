import { randomUUID } from "node:crypto";
import { existsSync } from "node:fs";
import {
  CmdtrailError,
  CmdtrailErrorCodes,
  DaemonUnreachableError,
  errnoCode,
  safeParseJson,
  toErrorMessage,
  type AppendEventInput,
  type CmdtrailErrorCode,
  type NavigationRequest,
  type NavigationResult,
  type SearchQuery,
  type SearchResultItem,
} from "@cmdtrail/runtime";
import WebSocket, { type RawData } from "ws";
import {
  PROTOCOL_VERSION,
  type DaemonErrorShape,
  type DaemonMethod,
  type DaemonParamsByMethod,
  type EventFrame,
  type EventsAppendResult,
  type EventsSearchResult,
  type HealthPayload,
  type HelloOkPayload,
  type NavigationParams,
  type ResponseFrame,
} from "./protocol/index.js";
import {
  validateDaemonFrame,
  validateEventsAppendResult,
  validateEventsSearchResult,
  validateHealthPayload,
  validateHelloOkPayload,
  validateNavigationResult,
  validateSearchBatchPayload,
} from "./protocol/validate.js";

interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
  settled: () => boolean;
}

interface PendingResponse {
  resolve: (frame: ResponseFrame) => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

export type DaemonClientEvent = EventFrame;
export type DaemonClientEventListener = (event: DaemonClientEvent) => void;

const DEFAULT_CONNECT_TIMEOUT_MS = 2_000;
const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;
const CLIENT_ERROR_CODES = new Set<string>(Object.values(CmdtrailErrorCodes));

function createDeferred<T>(): Deferred<T> {
  let settled = false;
  let resolveValue!: (value: T) => void;
  let rejectValue!: (error: unknown) => void;
  const promise = new Promise<T>((resolvePromise, rejectPromise) => {
    resolveValue = (value) => {
      if (settled) return;
      settled = true;
      resolvePromise(value);
    };
    rejectValue = (error) => {
      if (settled) return;
      settled = true;
      rejectPromise(error);
    };
  });
  return {
    promise,
    resolve: resolveValue,
    reject: rejectValue,
    settled: () => settled,
  };
}

function withTimeout<T>(promise: Promise<T>, timeoutMs: number, message: string): Promise<T> {
  return new Promise<T>((resolvePromise, rejectPromise) => {
    const timer = setTimeout(
      () => {
        rejectPromise(new Error(message));
      },
      Math.max(100, timeoutMs),
    );
    timer.unref?.();

    promise
      .then((value) => {
        clearTimeout(timer);
        resolvePromise(value);
      })
      .catch((error: unknown) => {
        clearTimeout(timer);
        rejectPromise(error);
      });
  });
}

function rawToText(raw: RawData): string {
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

function isClientErrorCode(code: string): code is CmdtrailErrorCode {
  return CLIENT_ERROR_CODES.has(code);
}

/** Error returned by the daemon for one request; the connection stays usable. */
export class DaemonRequestError extends Error {
  constructor(
    readonly code: string,
    message: string,
    readonly details?: unknown,
  ) {
    super(`[${code}] ${message}`);
    this.name = "DaemonRequestError";
  }
}

function toErrorFromShape(shape: DaemonErrorShape | undefined): Error {
  if (!shape) {
    return new Error("daemon request failed");
  }
  if (isClientErrorCode(shape.code)) {
    return new CmdtrailError(shape.code, shape.message);
  }
  return new DaemonRequestError(shape.code, shape.message, shape.details);
}

function isUnreachable(error: unknown): boolean {
  const code = errnoCode(error);
  return code === "ECONNREFUSED" || code === "ENOENT" || code === "ENOTSOCK";
}

export interface DaemonClientConnectOptions {
  socketPath: string;
  clientId?: string;
  clientVersion?: string;
  connectTimeoutMs?: number;
  requestTimeoutMs?: number;
}

export interface SearchStreamOptions {
  searchId?: string;
  onBatch: (items: SearchResultItem[]) => void;
}

export interface SearchHandle {
  searchId: string;
  done: Promise<EventsSearchResult>;
  cancel(): Promise<void>;
}

export class DaemonClient {
  private readonly ws: WebSocket;
  private readonly requestTimeoutMs: number;
  private readonly pending = new Map<string, PendingResponse>();
  private readonly eventListeners = new Set<DaemonClientEventListener>();
  private readonly openDeferred = createDeferred<void>();
  private readonly closeDeferred = createDeferred<void>();
  private ready = false;
  private closed = false;
  private helloPayload: HelloOkPayload | null = null;

  private constructor(
    ws: WebSocket,
    private readonly options: {
      socketPath: string;
      requestTimeoutMs: number;
      connectTimeoutMs: number;
      clientId: string;
      clientVersion: string;
    },
  ) {
    this.ws = ws;
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.attachSocketListeners();
  }

  static async connect(options: DaemonClientConnectOptions): Promise<DaemonClient> {
    const socketPath = options.socketPath;
    if (!existsSync(socketPath)) {
      throw new DaemonUnreachableError(socketPath);
    }

    const connectTimeoutMs = Math.max(100, options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS);
    const requestTimeoutMs = Math.max(100, options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS);
    const ws = new WebSocket(`ws+unix:${socketPath}:/`);

    const client = new DaemonClient(ws, {
      socketPath,
      connectTimeoutMs,
      requestTimeoutMs,
      clientId: options.clientId ?? "cmdtrail-cli",
      clientVersion: options.clientVersion ?? "0.1.0",
    });

    try {
      await withTimeout(
        client.openDeferred.promise,
        connectTimeoutMs,
        "daemon connection timeout while opening socket",
      );
    } catch (error) {
      await client.close(300);
      throw new DaemonUnreachableError(socketPath, isUnreachable(error) ? errnoCode(error) : error);
    }

    try {
      await client.performConnectHandshake();
      return client;
    } catch (error) {
      await client.close(300);
      throw error;
    }
  }

  get hello(): HelloOkPayload | null {
    return this.helloPayload;
  }

  async request<K extends DaemonMethod>(
    method: K,
    params: DaemonParamsByMethod[K],
    options: {
      traceId?: string;
      id?: string;
      timeoutMs?: number;
    } = {},
  ): Promise<unknown> {
    if (!this.ready) {
      throw new Error("daemon client is not ready");
    }
    const response = await this.sendRequest(
      method,
      params,
      options.timeoutMs ?? this.requestTimeoutMs,
      options.traceId,
      options.id,
    );
    if (response.ok) {
      return response.payload;
    }
    throw toErrorFromShape(response.error);
  }

  async append(input: AppendEventInput): Promise<EventsAppendResult> {
    const payload = await this.request("events.append", {
      command: input.command,
      startTime: input.startTime,
      endTime: input.endTime,
      exitCode: input.exitCode,
      folder: input.folder,
      machine: input.machine,
      sessionId: input.sessionId,
    });
    if (!validateEventsAppendResult(payload)) {
      throw new Error("daemon returned an invalid append result");
    }
    return payload;
  }

  async navigate(request: NavigationRequest): Promise<NavigationResult> {
    const params: NavigationParams = {
      sessionId: request.sessionId,
      sessionStart: request.sessionStart,
      prefix: request.prefix,
      reference: request.reference,
      ignore: request.ignore,
      capturedAt: request.capturedAt,
    };
    const payload = await this.request(
      request.direction === "previous" ? "events.previous" : "events.next",
      params,
    );
    if (!validateNavigationResult(payload)) {
      throw new Error("daemon returned an invalid navigation result");
    }
    return payload;
  }

  async health(): Promise<HealthPayload> {
    const payload = await this.request("daemon.health", {});
    if (!validateHealthPayload(payload)) {
      throw new Error("daemon returned an invalid health payload");
    }
    return payload;
  }

  /**
   * Starts a streamed search. Batches arrive through `onBatch` before `done`
   * resolves; `cancel` asks the daemon to stop between batches.
   */
  search(query: SearchQuery, options: SearchStreamOptions): SearchHandle {
    const searchId = options.searchId ?? randomUUID();
    const unsubscribe = this.onEvent((event) => {
      if (event.event !== "search.batch" || !validateSearchBatchPayload(event.payload)) {
        return;
      }
      if (event.payload.searchId === searchId) {
        options.onBatch(event.payload.items);
      }
    });

    const done = this.request(
      "events.search",
      {
        mode: query.mode,
        query: query.text,
        sessionId: query.sessionId,
        folder: query.folder,
        limit: query.limit,
        filterIgnored: query.filterIgnored,
        filterFailed: query.filterFailed,
        searchId,
      },
      { id: searchId },
    )
      .then((payload) => {
        if (!validateEventsSearchResult(payload)) {
          throw new Error("daemon returned an invalid search result");
        }
        return payload;
      })
      .finally(unsubscribe);

    return {
      searchId,
      done,
      cancel: async () => {
        await this.request("events.search-cancel", { searchId });
      },
    };
  }

  onEvent(listener: DaemonClientEventListener): () => void {
    this.eventListeners.add(listener);
    return () => {
      this.eventListeners.delete(listener);
    };
  }

  async close(timeoutMs = 2_000): Promise<void> {
    if (this.closed) {
      await this.closeDeferred.promise.catch(() => undefined);
      return;
    }

    this.closed = true;
    if (this.ws.readyState === WebSocket.CONNECTING) {
      this.ws.terminate();
    } else if (this.ws.readyState === WebSocket.OPEN) {
      this.ws.close(1000, "client_close");
    }

    try {
      await withTimeout(this.closeDeferred.promise, timeoutMs, "daemon close timeout");
    } catch {
      this.ws.terminate();
      await this.closeDeferred.promise.catch(() => undefined);
    }
  }

  private attachSocketListeners(): void {
    this.ws.on("open", () => {
      this.openDeferred.resolve(undefined);
    });

    this.ws.on("message", (raw: RawData) => {
      this.onMessage(raw);
    });

    this.ws.on("close", () => {
      this.ready = false;
      this.failAllPending(new DaemonUnreachableError(this.options.socketPath, "socket closed"));
      this.closeDeferred.resolve(undefined);
    });

    this.ws.on("error", (error: Error) => {
      if (!this.openDeferred.settled()) {
        this.openDeferred.reject(error);
      }
      this.failAllPending(error);
    });
  }

  private onMessage(raw: RawData): void {
    const parsed = safeParseJson(rawToText(raw));
    if (!validateDaemonFrame(parsed)) {
      return;
    }

    if (parsed.type === "event") {
      this.emitEvent(parsed);
      return;
    }

    if (parsed.type !== "res") {
      return;
    }

    const pending = this.pending.get(parsed.id);
    if (!pending) {
      return;
    }
    clearTimeout(pending.timer);
    this.pending.delete(parsed.id);
    pending.resolve(parsed);
  }

  private async performConnectHandshake(): Promise<void> {
    const response = await this.sendRequest(
      "connect",
      {
        protocol: PROTOCOL_VERSION,
        client: {
          id: this.options.clientId,
          version: this.options.clientVersion,
        },
      },
      this.options.connectTimeoutMs,
    );

    if (!response.ok) {
      throw toErrorFromShape(response.error);
    }
    if (!validateHelloOkPayload(response.payload)) {
      throw new Error("daemon returned an invalid hello payload");
    }
    this.helloPayload = response.payload;
    this.ready = true;
  }

  private sendRequest(
    method: DaemonMethod,
    params: unknown,
    timeoutMs: number,
    traceId?: string,
    requestId?: string,
  ): Promise<ResponseFrame> {
    if (this.ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new DaemonUnreachableError(this.options.socketPath, "socket is not open"));
    }

    const id = requestId ?? randomUUID();
    const frame = JSON.stringify({
      type: "req",
      id,
      traceId: typeof traceId === "string" && traceId.trim() ? traceId.trim() : undefined,
      method,
      params,
    });

    return new Promise<ResponseFrame>((resolveRequest, rejectRequest) => {
      const timer = setTimeout(
        () => {
          this.pending.delete(id);
          rejectRequest(new Error(`daemon request timeout: ${method}`));
        },
        Math.max(100, timeoutMs),
      );
      timer.unref?.();

      this.pending.set(id, {
        resolve: resolveRequest,
        reject: rejectRequest,
        timer,
      });

      this.ws.send(frame, (error?: Error) => {
        if (!error) {
          return;
        }
        clearTimeout(timer);
        this.pending.delete(id);
        rejectRequest(new Error(`failed to send daemon request: ${toErrorMessage(error)}`));
      });
    });
  }

  private failAllPending(error: unknown): void {
    for (const pending of this.pending.values()) {
      clearTimeout(pending.timer);
      pending.reject(error instanceof Error ? error : new Error(toErrorMessage(error)));
    }
    this.pending.clear();
  }

  private emitEvent(event: EventFrame): void {
    for (const listener of this.eventListeners) {
      try {
        listener(event);
      } catch (error) {
        process.stderr.write(`cmdtrail: event listener failed: ${toErrorMessage(error)}\n`);
      }
    }
  }
}

export async function connectDaemonClient(
  options: DaemonClientConnectOptions,
): Promise<DaemonClient> {
  return await DaemonClient.connect(options);
}

/** `null` when no daemon answers on the socket. */
export async function tryConnectDaemonClient(
  options: DaemonClientConnectOptions,
): Promise<DaemonClient | null> {
  try {
    return await DaemonClient.connect(options);
  } catch (error) {
    if (error instanceof DaemonUnreachableError) {
      return null;
    }
    throw error;
  }
}
