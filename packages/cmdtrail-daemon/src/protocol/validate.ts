import type { Static } from "@sinclair/typebox";
import { Ajv, type ErrorObject } from "ajv";
import {
  ConnectParamsSchema,
  DaemonFrameSchema,
  DaemonStopParamsSchema,
  EventFrameSchema,
  EventsAppendParamsSchema,
  EventsAppendResultSchema,
  EventsSearchCancelParamsSchema,
  EventsSearchParamsSchema,
  EventsSearchResultSchema,
  HealthParamsSchema,
  HealthPayloadSchema,
  HelloOkPayloadSchema,
  NavigationParamsSchema,
  NavigationResultSchema,
  RequestFrameSchema,
  ResponseFrameSchema,
  SearchBatchPayloadSchema,
  StatusParamsSchema,
  SyncNowParamsSchema,
  type DaemonMethod,
  type DaemonParamsByMethod,
} from "./schema.js";

const ajv = new Ajv({
  allErrors: true,
  strict: false,
  removeAdditional: false,
});

export const validateRequestFrame = ajv.compile<Static<typeof RequestFrameSchema>>(
  RequestFrameSchema,
);
export const validateResponseFrame = ajv.compile<Static<typeof ResponseFrameSchema>>(
  ResponseFrameSchema,
);
export const validateEventFrame = ajv.compile<Static<typeof EventFrameSchema>>(EventFrameSchema);
export const validateDaemonFrame = ajv.compile<Static<typeof DaemonFrameSchema>>(
  DaemonFrameSchema,
);

export const validateConnectParams = ajv.compile(ConnectParamsSchema);
export const validateEventsAppendParams = ajv.compile(EventsAppendParamsSchema);
export const validateEventsSearchParams = ajv.compile(EventsSearchParamsSchema);
export const validateEventsSearchCancelParams = ajv.compile(EventsSearchCancelParamsSchema);
export const validateNavigationParams = ajv.compile(NavigationParamsSchema);
export const validateHealthParams = ajv.compile(HealthParamsSchema);
export const validateStatusParams = ajv.compile(StatusParamsSchema);
export const validateDaemonStopParams = ajv.compile(DaemonStopParamsSchema);
export const validateSyncNowParams = ajv.compile(SyncNowParamsSchema);

export const validateHelloOkPayload = ajv.compile<Static<typeof HelloOkPayloadSchema>>(
  HelloOkPayloadSchema,
);
export const validateEventsAppendResult = ajv.compile<Static<typeof EventsAppendResultSchema>>(
  EventsAppendResultSchema,
);
export const validateSearchBatchPayload = ajv.compile<Static<typeof SearchBatchPayloadSchema>>(
  SearchBatchPayloadSchema,
);
export const validateEventsSearchResult = ajv.compile<Static<typeof EventsSearchResultSchema>>(
  EventsSearchResultSchema,
);
export const validateNavigationResult = ajv.compile<Static<typeof NavigationResultSchema>>(
  NavigationResultSchema,
);
export const validateHealthPayload = ajv.compile<Static<typeof HealthPayloadSchema>>(
  HealthPayloadSchema,
);

const methodValidators: {
  [K in DaemonMethod]: {
    validate: (value: unknown) => boolean;
    errors: () => ErrorObject[] | null | undefined;
  };
} = {
  connect: {
    validate: validateConnectParams,
    errors: () => validateConnectParams.errors,
  },
  "events.append": {
    validate: validateEventsAppendParams,
    errors: () => validateEventsAppendParams.errors,
  },
  "events.search": {
    validate: validateEventsSearchParams,
    errors: () => validateEventsSearchParams.errors,
  },
  "events.search-cancel": {
    validate: validateEventsSearchCancelParams,
    errors: () => validateEventsSearchCancelParams.errors,
  },
  "events.previous": {
    validate: validateNavigationParams,
    errors: () => validateNavigationParams.errors,
  },
  "events.next": {
    validate: validateNavigationParams,
    errors: () => validateNavigationParams.errors,
  },
  "daemon.health": {
    validate: validateHealthParams,
    errors: () => validateHealthParams.errors,
  },
  "daemon.status": {
    validate: validateStatusParams,
    errors: () => validateStatusParams.errors,
  },
  "daemon.stop": {
    validate: validateDaemonStopParams,
    errors: () => validateDaemonStopParams.errors,
  },
  "sync.now": {
    validate: validateSyncNowParams,
    errors: () => validateSyncNowParams.errors,
  },
};

export function validateParamsForMethod<K extends DaemonMethod>(
  method: K,
  params: unknown,
): { ok: true; params: DaemonParamsByMethod[K] } | { ok: false; error: string } {
  const validator = methodValidators[method];
  if (validator.validate(params)) {
    return {
      ok: true,
      params: params as DaemonParamsByMethod[K],
    };
  }
  return {
    ok: false,
    error: formatValidationErrors(validator.errors()),
  };
}

export function formatValidationErrors(errors: ErrorObject[] | null | undefined): string {
  if (!errors || errors.length === 0) {
    return "unknown validation error";
  }

  const messages: string[] = [];
  for (const error of errors) {
    const path =
      typeof error.instancePath === "string" && error.instancePath
        ? `at ${error.instancePath}`
        : "at root";
    const message = typeof error.message === "string" ? error.message : "validation error";
    if (error.keyword === "additionalProperties") {
      const prop = readAdditionalProperty(error.params);
      if (prop) {
        messages.push(`${path}: unexpected property '${prop}'`);
        continue;
      }
    }
    messages.push(`${path}: ${message}`);
  }
  return Array.from(new Set(messages)).join("; ");
}

function readAdditionalProperty(params: Record<string, unknown>): string | null {
  const value = params.additionalProperty;
  return typeof value === "string" ? value : null;
}
