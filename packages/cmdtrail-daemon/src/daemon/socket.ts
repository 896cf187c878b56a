import { existsSync, rmSync } from "node:fs";
import { createConnection } from "node:net";

export type SocketState = "missing" | "live" | "stale";

const DEFAULT_CHECK_TIMEOUT_MS = 1_000;

/**
 * Whether something is accepting connections on a Unix socket path. A socket
 * file nobody listens on (left by a crash) is `stale`; a connection attempt that neither
 * connects nor fails in time counts as `live`.
 */
export function checkSocket(
  socketPath: string,
  timeoutMs = DEFAULT_CHECK_TIMEOUT_MS,
): Promise<SocketState> {
  if (!existsSync(socketPath)) {
    return Promise.resolve("missing");
  }
  return new Promise<SocketState>((resolveState) => {
    const socket = createConnection(socketPath);
    let settled = false;
    const finish = (result: SocketState): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      socket.destroy();
      resolveState(result);
    };
    const timer = setTimeout(() => finish("live"), Math.max(50, timeoutMs));
    timer.unref?.();
    socket.once("connect", () => finish("live"));
    socket.once("error", (error: NodeJS.ErrnoException) => {
      finish(error.code === "ENOENT" ? "missing" : "stale");
    });
  });
}

export function removeSocketFile(socketPath: string): void {
  rmSync(socketPath, { force: true });
}
