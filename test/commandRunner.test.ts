import { readFileSync } from "node:fs";
import { describe, expect, it, vi } from "vitest";
import { CancelledError, LaunchError, TimeoutError } from "../src/errors.js";
import { ShellCommandRunner } from "../src/services/commandRunner.js";
import type { OutputStream } from "../src/types.js";

const node = process.execPath;
const MISSING_TOOL = "scoopui-missing-tool-for-tests";

function isAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
  } catch {
    return false;
  }
  try {
    // An unreaped zombie still answers signal 0.
    const stat = readFileSync(`/proc/${pid}/stat`, "utf8");
    return stat.slice(stat.lastIndexOf(")") + 2, stat.lastIndexOf(")") + 3) !== "Z";
  } catch {
    return true;
  }
}

describe("ShellCommandRunner", () => {
  it("collects exit code and both streams", async () => {
    const runner = new ShellCommandRunner();
    const seen: Array<[OutputStream, string]> = [];

    const result = await runner.run(
      node,
      ["-e", "process.stdout.write('one\\ntwo\\n'); process.stderr.write('warn\\n'); process.exitCode = 3;"],
      { onLine: (stream, line) => seen.push([stream, line]) }
    );

    expect(result).toEqual({ exitCode: 3, stdout: "one\ntwo\n", stderr: "warn\n" });
    expect(seen.filter(([stream]) => stream === "stdout").map(([, line]) => line)).toEqual(["one", "two"]);
    expect(seen.filter(([stream]) => stream === "stderr").map(([, line]) => line)).toEqual(["warn"]);
  });

  it("splits progress redraws into separate lines", async () => {
    const runner = new ShellCommandRunner();
    const lines: string[] = [];

    await runner.run(node, ["-e", "process.stdout.write('10%\\r20%\\rdone')"], {
      onLine: (_stream, line) => lines.push(line)
    });

    expect(lines).toEqual(["10%", "20%", "done"]);
  });

  it("decodes diagnostics written in the Japanese OEM code page", async () => {
    const runner = new ShellCommandRunner();
    const lines: string[] = [];

    const result = await runner.run(
      node,
      ["-e", "process.stderr.write(Buffer.from([0x83, 0x65, 0x83, 0x58, 0x83, 0x67, 0x0a])); process.exitCode = 1;"],
      { onLine: (_stream, line) => lines.push(line) }
    );

    expect(result).toEqual({ exitCode: 1, stdout: "", stderr: "テスト\n" });
    expect(lines).toEqual(["テスト"]);
  });

  it("reports a missing executable as a launch error", async () => {
    const runner = new ShellCommandRunner();

    const error = await runner.run(MISSING_TOOL, ["list"]).catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(LaunchError);
    expect(error).toMatchObject({ command: MISSING_TOOL });
  });

  it("does not spawn when the signal is already aborted", async () => {
    const runner = new ShellCommandRunner();

    // A spawn attempt would fail with a launch error instead.
    await expect(runner.run(MISSING_TOOL, [], { signal: AbortSignal.abort() })).rejects.toBeInstanceOf(
      CancelledError
    );
  });

  it("kills the child and its descendants on cancel", async () => {
    const runner = new ShellCommandRunner({ killGraceMs: 500 });
    const controller = new AbortController();
    const pids: number[] = [];
    const script = [
      "const { spawn } = require('node:child_process');",
      "const sleeper = spawn(process.execPath, ['-e', 'setInterval(() => {}, 1000)'], { stdio: 'ignore' });",
      "console.log(process.pid + ' ' + sleeper.pid);",
      "setInterval(() => {}, 1000);"
    ].join("\n");

    const running = runner.run(node, ["-e", script], {
      signal: controller.signal,
      onLine: (_stream, line) => {
        pids.push(...line.split(" ").map(Number));
        controller.abort();
      }
    });

    await expect(running).rejects.toBeInstanceOf(CancelledError);
    expect(pids).toHaveLength(2);
    await vi.waitFor(() => expect(pids.filter(isAlive)).toEqual([]), { timeout: 3000 });
  });

  it("stops the child through the Windows kill path", async () => {
    // Where taskkill is missing the runner falls back to killing the direct child.
    const runner = new ShellCommandRunner({ platform: "win32", killGraceMs: 500 });
    const controller = new AbortController();

    const running = runner.run(node, ["-e", "console.log('ready'); setInterval(() => {}, 1000);"], {
      signal: controller.signal,
      onLine: () => controller.abort()
    });

    await expect(running).rejects.toBeInstanceOf(CancelledError);
  });

  it("stops a command that runs past its deadline", async () => {
    const runner = new ShellCommandRunner({ killGraceMs: 500 });

    await expect(runner.run(node, ["-e", "setInterval(() => {}, 1000)"], { timeoutMs: 200 })).rejects.toBeInstanceOf(
      TimeoutError
    );
  });
});
