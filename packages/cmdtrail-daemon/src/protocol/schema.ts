import { Type, type Static } from "@sinclair/typebox";

export const PROTOCOL_VERSION = 1 as const;

const NonEmptyString = Type.String({ minLength: 1 });
const NullableString = Type.Union([Type.String(), Type.Null()]);
const Seconds = Type.Number({ minimum: 0 });

export const ErrorCodes = {
  INVALID_REQUEST: "invalid_request",
  METHOD_NOT_FOUND: "method_not_found",
  INTERNAL: "internal_error",
  TIMEOUT: "timeout",
  BAD_STATE: "bad_state",
  LOCAL_STORAGE_FAILURE: "local_storage_failure",
} as const;

export type DaemonErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export const DaemonMethods = [
  "connect",
  "events.append",
  "events.search",
  "events.search-cancel",
  "events.previous",
  "events.next",
  "daemon.health",
  "daemon.status",
  "daemon.stop",
  "sync.now",
] as const;

export type DaemonMethod = (typeof DaemonMethods)[number];

export const DaemonEvents = ["search.batch", "shutdown"] as const;

export type DaemonEvent = (typeof DaemonEvents)[number];

export const DaemonErrorShapeSchema = Type.Object(
  {
    code: Type.String({ minLength: 1 }),
    message: Type.String({ minLength: 1 }),
    retryable: Type.Optional(Type.Boolean()),
    details: Type.Optional(Type.Unknown()),
  },
  { additionalProperties: false },
);

export type DaemonErrorShape = Static<typeof DaemonErrorShapeSchema>;

export const ConnectParamsSchema = Type.Object(
  {
    protocol: Type.Integer({ minimum: 1 }),
    client: Type.Object(
      {
        id: NonEmptyString,
        version: NonEmptyString,
      },
      { additionalProperties: false },
    ),
  },
  { additionalProperties: false },
);

export type ConnectParams = Static<typeof ConnectParamsSchema>;

export const HelloOkPayloadSchema = Type.Object(
  {
    type: Type.Literal("hello-ok"),
    protocol: Type.Integer({ minimum: 1 }),
    server: Type.Object(
      {
        version: NonEmptyString,
        connId: NonEmptyString,
        pid: Type.Integer({ minimum: 1 }),
        machine: NonEmptyString,
      },
      { additionalProperties: false },
    ),
    features: Type.Object(
      {
        methods: Type.Array(NonEmptyString),
        events: Type.Array(NonEmptyString),
      },
      { additionalProperties: false },
    ),
    policy: Type.Object(
      {
        maxPayloadBytes: Type.Integer({ minimum: 1024 }),
        searchBatchSize: Type.Integer({ minimum: 1 }),
      },
      { additionalProperties: false },
    ),
  },
  { additionalProperties: false },
);

export type HelloOkPayload = Static<typeof HelloOkPayloadSchema>;

export const RequestFrameSchema = Type.Object(
  {
    type: Type.Literal("req"),
    id: NonEmptyString,
    traceId: Type.Optional(NonEmptyString),
    method: NonEmptyString,
    params: Type.Optional(Type.Unknown()),
  },
  { additionalProperties: false },
);

export type RequestFrame = Static<typeof RequestFrameSchema>;

export const ResponseFrameSchema = Type.Object(
  {
    type: Type.Literal("res"),
    id: NonEmptyString,
    traceId: Type.Optional(NonEmptyString),
    ok: Type.Boolean(),
    payload: Type.Optional(Type.Unknown()),
    error: Type.Optional(DaemonErrorShapeSchema),
  },
  { additionalProperties: false },
);

export type ResponseFrame = Static<typeof ResponseFrameSchema>;

export const EventFrameSchema = Type.Object(
  {
    type: Type.Literal("event"),
    event: NonEmptyString,
    payload: Type.Optional(Type.Unknown()),
    seq: Type.Optional(Type.Integer({ minimum: 0 })),
  },
  { additionalProperties: false },
);

export type EventFrame = Static<typeof EventFrameSchema>;

export const DaemonFrameSchema = Type.Union(
  [RequestFrameSchema, ResponseFrameSchema, EventFrameSchema],
  {
    discriminator: "type",
  },
);

export type DaemonFrame = Static<typeof DaemonFrameSchema>;

export const HistoryEventSchema = Type.Object(
  {
    command: Type.String(),
    startTime: Seconds,
    endTime: Seconds,
    exitCode: Type.Union([Type.Integer(), Type.Null()]),
    folder: NullableString,
    machine: NonEmptyString,
    sessionId: NullableString,
    sequence: Type.Integer({ minimum: 1 }),
  },
  { additionalProperties: false },
);

export const AggregatedEntrySchema = Type.Object(
  {
    key: Type.String(),
    command: Type.String(),
    folder: NullableString,
    latest: HistoryEventSchema,
    firstStartTime: Seconds,
    count: Type.Integer({ minimum: 1 }),
    failedCount: Type.Integer({ minimum: 0 }),
    unknownCount: Type.Integer({ minimum: 0 }),
    machines: Type.Array(NonEmptyString),
    score: Type.Number(),
  },
  { additionalProperties: false },
);

export const SearchResultItemSchema = Type.Union([
  Type.Object(
    { kind: Type.Literal("event"), event: HistoryEventSchema },
    { additionalProperties: false },
  ),
  Type.Object(
    { kind: Type.Literal("aggregate"), entry: AggregatedEntrySchema },
    { additionalProperties: false },
  ),
]);

export const EventsAppendParamsSchema = Type.Object(
  {
    command: Type.String(),
    startTime: Seconds,
    endTime: Seconds,
    exitCode: Type.Union([Type.Integer(), Type.Null()]),
    folder: NullableString,
    machine: Type.Optional(NonEmptyString),
    sessionId: NullableString,
  },
  { additionalProperties: false },
);
export type EventsAppendParams = Static<typeof EventsAppendParamsSchema>;

export const EventsAppendResultSchema = Type.Object(
  {
    machine: NonEmptyString,
    sequence: Type.Integer({ minimum: 1 }),
  },
  { additionalProperties: false },
);
export type EventsAppendResult = Static<typeof EventsAppendResultSchema>;

export const SearchModeSchema = Type.Union([
  Type.Literal("all"),
  Type.Literal("session"),
  Type.Literal("folder"),
  Type.Literal("aggregated-unique"),
]);

export const EventsSearchParamsSchema = Type.Object(
  {
    mode: SearchModeSchema,
    query: Type.Optional(Type.String()),
    sessionId: Type.Optional(NonEmptyString),
    folder: Type.Optional(NonEmptyString),
    limit: Type.Optional(Type.Integer({ minimum: 1 })),
    filterIgnored: Type.Optional(Type.Boolean()),
    filterFailed: Type.Optional(Type.Boolean()),
    /** Defaults to the request id; batches and cancellation refer to it. */
    searchId: Type.Optional(NonEmptyString),
  },
  { additionalProperties: false },
);
export type EventsSearchParams = Static<typeof EventsSearchParamsSchema>;

export const SearchBatchPayloadSchema = Type.Object(
  {
    searchId: NonEmptyString,
    items: Type.Array(SearchResultItemSchema),
  },
  { additionalProperties: false },
);
export type SearchBatchPayload = Static<typeof SearchBatchPayloadSchema>;

export const EventsSearchResultSchema = Type.Object(
  {
    searchId: NonEmptyString,
    count: Type.Integer({ minimum: 0 }),
    truncated: Type.Boolean(),
    cancelled: Type.Boolean(),
  },
  { additionalProperties: false },
);
export type EventsSearchResult = Static<typeof EventsSearchResultSchema>;

export const EventsSearchCancelParamsSchema = Type.Object(
  {
    searchId: NonEmptyString,
  },
  { additionalProperties: false },
);
export type EventsSearchCancelParams = Static<typeof EventsSearchCancelParamsSchema>;

export const NavigationParamsSchema = Type.Object(
  {
    sessionId: NullableString,
    sessionStart: Type.Optional(Seconds),
    prefix: Type.String(),
    reference: Type.Object(
      {
        startTime: Seconds,
        machine: Type.Optional(NonEmptyString),
        sequence: Type.Optional(Type.Integer({ minimum: 1 })),
      },
      { additionalProperties: false },
    ),
    ignore: Type.Optional(Type.String()),
    capturedAt: Type.Optional(Seconds),
  },
  { additionalProperties: false },
);
export type NavigationParams = Static<typeof NavigationParamsSchema>;

export const NavigationResultSchema = Type.Union([
  Type.Object(
    { found: Type.Literal(true), event: HistoryEventSchema },
    { additionalProperties: false },
  ),
  Type.Object(
    {
      found: Type.Literal(true),
      restored: Type.Object(
        { prefix: Type.String(), startTime: Seconds },
        { additionalProperties: false },
      ),
    },
    { additionalProperties: false },
  ),
  Type.Object({ found: Type.Literal(false) }, { additionalProperties: false }),
]);

export const HealthParamsSchema = Type.Object({}, { additionalProperties: false });
export type HealthParams = Static<typeof HealthParamsSchema>;

export const HealthPayloadSchema = Type.Object(
  {
    ok: Type.Literal(true),
    pid: Type.Integer({ minimum: 1 }),
    machine: NonEmptyString,
    socketPath: NonEmptyString,
    startedAt: Type.Integer({ minimum: 0 }),
    uptimeMs: Type.Integer({ minimum: 0 }),
    connections: Type.Integer({ minimum: 0 }),
    events: Type.Integer({ minimum: 0 }),
  },
  { additionalProperties: false },
);
export type HealthPayload = Static<typeof HealthPayloadSchema>;

export const StatusParamsSchema = Type.Object({}, { additionalProperties: false });
export type StatusParams = Static<typeof StatusParamsSchema>;

export const DaemonStopParamsSchema = Type.Object(
  {
    reason: Type.Optional(NonEmptyString),
  },
  { additionalProperties: false },
);
export type DaemonStopParams = Static<typeof DaemonStopParamsSchema>;

export const SyncNowParamsSchema = Type.Object({}, { additionalProperties: false });
export type SyncNowParams = Static<typeof SyncNowParamsSchema>;

export type DaemonParamsByMethod = {
  connect: ConnectParams;
  "events.append": EventsAppendParams;
  "events.search": EventsSearchParams;
  "events.search-cancel": EventsSearchCancelParams;
  "events.previous": NavigationParams;
  "events.next": NavigationParams;
  "daemon.health": HealthParams;
  "daemon.status": StatusParams;
  "daemon.stop": DaemonStopParams;
  "sync.now": SyncNowParams;
};

export function daemonError(
  code: DaemonErrorCode,
  message: string,
  options: { retryable?: boolean; details?: unknown } = {},
): DaemonErrorShape {
  return {
    code,
    message,
    retryable: options.retryable,
    details: options.details,
  };
}
