import { join } from "node:path";
import { afterEach, describe, expect, test } from "vitest";
import { runCli, type JsonLineWritable } from "@cmdtrail/cli";
import { createMachineFile, resolveCmdtrailPaths, writeMachineFile } from "@cmdtrail/runtime";
import { startTestDaemon } from "../helpers/daemon.js";
import { createTestWorkspace, makeEvent, removeTestWorkspace, writeTestConfig } from "../helpers/workspace.js";

class CapturedOutput implements JsonLineWritable {
  private readonly chunks: string[] = [];

  write(chunk: string, callback?: (error?: Error | null) => void): boolean {
    this.chunks.push(chunk);
    callback?.(null);
    return true;
  }

  text(): string {
    return this.chunks.join("");
  }
}

interface CliRun {
  exitCode: number;
  stdout: string;
  stderr: string;
}

async function cli(argv: string[]): Promise<CliRun> {
  const stdout = new CapturedOutput();
  const stderr = new CapturedOutput();
  const exitCode = await runCli(argv, {
    env: {},
    stdout,
    stderr,
    now: () => new Date(1_700_000_500 * 1000),
    userHome: "/home/dev",
    connectTimeoutMs: 500,
  });
  return { exitCode, stdout: stdout.text(), stderr: stderr.text() };
}

describe("cmdtrail command line", () => {
  const workspaces: string[] = [];
  afterEach(() => {
    for (const workspace of workspaces.splice(0)) removeTestWorkspace(workspace);
  });

  function home(name: string): string {
    const workspace = createTestWorkspace(name);
    workspaces.push(workspace);
    return join(workspace, "home");
  }

  test("given no daemon, when a command is appended twice in a session, then it warns once and succeeds", async () => {
    const dataHome = home("cli-append");
    const socketPath = resolveCmdtrailPaths(dataHome).socketPath;
    const argv = ["append-event", "--home", dataHome, "--command", "ls", "--start-time", "100", "--session", "s1"];

    const first = await cli(argv);
    const second = await cli(argv);

    expect(first).toEqual({
      exitCode: 0,
      stdout: "",
      stderr: `cmdtrail: daemon not reachable at ${socketPath}; commands are not being recorded (run "cmdtrail start").\n`,
    });
    expect(second).toEqual({ exitCode: 0, stdout: "", stderr: "" });
  });

  test("given an append without a command, when run, then it fails with a usage error", async () => {
    const result = await cli(["append-event", "--home", home("cli-usage"), "--start-time", "100"]);

    expect(result).toEqual({ exitCode: 1, stdout: "", stderr: "Error: --command is required.\n" });
  });

  test("given an unknown search mode, when run, then the accepted modes are listed", async () => {
    const result = await cli(["search", "--home", home("cli-mode"), "--mode", "everything"]);

    expect(result.exitCode).toBe(1);
    expect(result.stderr).toBe("Error: --mode must be one of all, session, folder, aggregated-unique.\n");
  });

  test("given archived history and no daemon, when searching directly, then results are read from disk", async () => {
    const dataHome = home("cli-direct");
    const paths = resolveCmdtrailPaths(dataHome);
    writeTestConfig(dataHome, { machine: "laptop" });
    await writeMachineFile(
      join(paths.archiveDir, "desk.json"),
      createMachineFile({
        machineId: "desk",
        createdAt: "2026-01-01T00:00:00.000Z",
        events: [
          makeEvent({ sequence: 1, machine: "desk", command: "git status" }),
          makeEvent({ sequence: 2, machine: "desk", command: "make" }),
          makeEvent({ sequence: 3, machine: "desk", command: "git log" }),
        ],
      }),
    );

    const result = await cli(["search", "--home", dataHome, "--direct", "--query", "git"]);

    expect(result).toEqual({
      exitCode: 0,
      stdout: '01700000003.000000000 -- "git log"\n01700000001.000000000 -- "git status"\n',
      stderr: `cmdtrail: degraded: daemon not reachable at ${paths.socketPath}; read 1 file(s) directly\n`,
    });
  });

  test("given a running daemon, when commands are appended then searched and navigated, then the daemon answers", async () => {
    const dataHome = home("cli-daemon");
    const daemon = await startTestDaemon(dataHome);
    try {
      for (const [command, startTime] of [
        ["make build", "1700000100"],
        ["ls", "1700000200"],
        ["make test", "1700000300"],
      ] as const) {
        const appended = await cli([
          "append-event",
          "--home",
          dataHome,
          "--command",
          command,
          "--start-time",
          startTime,
          "--exit-code",
          "0",
          "--folder",
          "/work",
          "--session",
          "s1",
        ]);
        expect(appended).toEqual({ exitCode: 0, stdout: "", stderr: "" });
      }

      expect(await cli(["search", "--home", dataHome, "--query", "make", "--limit", "1"])).toEqual({
        exitCode: 0,
        stdout: '01700000300.000000000 -- "make test"\n',
        stderr: "cmdtrail: showing the first 1 results.\n",
      });

      const reference = ["--home", dataHome, "--prefix", "make", "--session", "s1", "--time", "1700000300"];
      const exact = ["--machine", "laptop", "--sequence", "3"];

      expect(await cli(["previous-event", ...reference, ...exact])).toEqual({
        exitCode: 0,
        stdout: "01700000100.000000000 laptop 1\nmake build\n",
        stderr: "",
      });
      expect(await cli(["next-event", ...reference, ...exact, "--captured-at", "1700000400"])).toEqual({
        exitCode: 0,
        stdout: "01700000400.000000000\nmake\n",
        stderr: "",
      });
      expect(await cli(["next-event", ...reference, ...exact])).toEqual({ exitCode: 1, stdout: "", stderr: "" });
      expect(await cli(["next-event", ...reference, ...exact, "--json"])).toEqual({
        exitCode: 1,
        stdout: '{"found":false}\n',
        stderr: "",
      });
    } finally {
      await daemon.stop();
    }
  });
});
