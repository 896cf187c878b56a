import type {
  HistoryEvent,
  NavigationDirection,
  NavigationReference,
  NavigationRequest,
  NavigationResult,
} from "../types.js";

export type NavigationState =
  | { kind: "idle" }
  | {
      kind: "armed";
      prefix: string;
      reference: NavigationReference;
      capturedAt: number;
    };

export const IDLE_NAVIGATION: NavigationState = { kind: "idle" };

export type NavigationInput =
  | {
      type: NavigationDirection;
      /** Buffer contents and cursor as shown right now. */
      buffer: string;
      cursor: number;
      nowSeconds: number;
    }
  | { type: "buffer-edited" }
  | { type: "command-executed" }
  | { type: "cancel" };

export interface NavigationBackend {
  navigate(request: NavigationRequest): Promise<NavigationResult>;
}

export interface NavigationScope {
  sessionId: string | null;
  sessionStart?: number;
}

export interface NavigationStep {
  state: NavigationState;
  /** Set when the buffer should change. */
  buffer?: string;
  event?: HistoryEvent;
  /** `false` when nothing matched; state and buffer stay as they were. */
  moved: boolean;
}

/**
 * Per-shell prefix navigation. The state is a plain value the caller keeps
 * and passes back in; nothing here is shared between sessions.
 */
export async function stepNavigation(
  state: NavigationState,
  input: NavigationInput,
  backend: NavigationBackend,
  scope: NavigationScope,
): Promise<NavigationStep> {
  if (input.type === "buffer-edited" || input.type === "command-executed" || input.type === "cancel") {
    return { state: IDLE_NAVIGATION, moved: false };
  }

  const armed =
    state.kind === "armed"
      ? state
      : {
          kind: "armed" as const,
          prefix: input.buffer.slice(0, Math.max(0, input.cursor)),
          reference: { startTime: input.nowSeconds },
          capturedAt: input.nowSeconds,
        };

  const result = await backend.navigate({
    direction: input.type,
    sessionId: scope.sessionId,
    sessionStart: scope.sessionStart,
    prefix: armed.prefix,
    reference: armed.reference,
    ignore: input.buffer,
    capturedAt: armed.capturedAt,
  });

  if (!result.found) {
    return { state, moved: false };
  }
  if ("restored" in result) {
    return {
      state: { ...armed, reference: { startTime: armed.capturedAt } },
      buffer: armed.prefix,
      moved: true,
    };
  }
  return {
    state: {
      ...armed,
      reference: {
        startTime: result.event.startTime,
        machine: result.event.machine,
        sequence: result.event.sequence,
      },
    },
    buffer: result.event.command,
    event: result.event,
    moved: true,
  };
}
