import { writeFileSync } from "node:fs";
import { join } from "node:path";
import { ensureDir, errnoCode, sha256, type CmdtrailPaths } from "@cmdtrail/runtime";
import { formatISO } from "date-fns";

export function warnedMarkerPath(
  paths: Pick<CmdtrailPaths, "warnedDir">,
  topic: string,
  sessionId: string | null,
): string {
  const session = sha256(sessionId ?? "no-session").slice(0, 16);
  return join(paths.warnedDir, `${topic}-${session}`);
}

/**
 * Claims the marker for `topic` in this shell session. Returns `true` the
 * first time, when the caller should print its warning.
 */
export function claimSessionWarning(
  paths: Pick<CmdtrailPaths, "warnedDir">,
  topic: string,
  sessionId: string | null,
  now: Date = new Date(),
): boolean {
  const markerPath = warnedMarkerPath(paths, topic, sessionId);
  try {
    ensureDir(paths.warnedDir);
    writeFileSync(markerPath, `${formatISO(now)}\n`, { flag: "wx" });
    return true;
  } catch (error) {
    if (errnoCode(error) === "EEXIST") {
      return false;
    }
    // unwritable marker: warn every time
    return true;
  }
}
