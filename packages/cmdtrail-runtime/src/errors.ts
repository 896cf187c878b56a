export const CmdtrailErrorCodes = {
  DAEMON_UNREACHABLE: "daemon_unreachable",
  CORRUPT_FILE: "corrupt_file",
  DUPLICATE_INSTANCE: "duplicate_instance",
  REPLICATION_ROOT_UNAVAILABLE: "replication_root_unavailable",
  LOCAL_STORAGE_FAILURE: "local_storage_failure",
  INVALID_REQUEST: "invalid_request",
} as const;

export type CmdtrailErrorCode = (typeof CmdtrailErrorCodes)[keyof typeof CmdtrailErrorCodes];

export class CmdtrailError extends Error {
  constructor(
    readonly code: CmdtrailErrorCode,
    message: string,
    options: { cause?: unknown } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
  }
}

export class DaemonUnreachableError extends CmdtrailError {
  constructor(
    readonly socketPath: string,
    cause?: unknown,
  ) {
    super(
      CmdtrailErrorCodes.DAEMON_UNREACHABLE,
      `daemon is not reachable at ${socketPath}${cause === undefined ? "" : ` (${toErrorMessage(cause)})`}`,
      { cause },
    );
  }
}

export class CorruptFileError extends CmdtrailError {
  constructor(
    readonly filePath: string,
    readonly reason: string,
  ) {
    super(CmdtrailErrorCodes.CORRUPT_FILE, `corrupt history file ${filePath}: ${reason}`);
  }
}

export class DuplicateInstanceError extends CmdtrailError {
  constructor(
    readonly socketPath: string,
    readonly pid?: number,
  ) {
    super(
      CmdtrailErrorCodes.DUPLICATE_INSTANCE,
      pid === undefined
        ? `daemon already running (socket=${socketPath})`
        : `daemon already running (pid=${pid}, socket=${socketPath})`,
    );
  }
}

export class ReplicationRootUnavailableError extends CmdtrailError {
  constructor(
    readonly root: string,
    cause?: unknown,
  ) {
    super(
      CmdtrailErrorCodes.REPLICATION_ROOT_UNAVAILABLE,
      `replication root unavailable: ${root}${cause === undefined ? "" : ` (${toErrorMessage(cause)})`}`,
      { cause },
    );
  }
}

export class LocalStorageError extends CmdtrailError {
  constructor(
    readonly filePath: string,
    cause: unknown,
  ) {
    super(
      CmdtrailErrorCodes.LOCAL_STORAGE_FAILURE,
      `cannot write local history ${filePath}: ${toErrorMessage(cause)}`,
      { cause },
    );
  }
}

export class InvalidRequestError extends CmdtrailError {
  constructor(message: string) {
    super(CmdtrailErrorCodes.INVALID_REQUEST, message);
  }
}

export function isCmdtrailError(value: unknown, code?: CmdtrailErrorCode): value is CmdtrailError {
  if (!(value instanceof CmdtrailError)) {
    return false;
  }
  return code === undefined || value.code === code;
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  if (error === undefined || error === null) {
    return "unknown error";
  }
  try {
    const serialized = JSON.stringify(error);
    if (typeof serialized === "string") {
      return serialized;
    }
  } catch {
    // fall through
  }
  return "non-serializable error";
}
