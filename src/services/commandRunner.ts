import { spawn, type ChildProcess } from "node:child_process";
import type { Logger } from "pino";
import { CancelledError, LaunchError, TimeoutError } from "../errors.js";
import { silentLogger } from "../logging/logger.js";
import type { CommandExecutor, CommandResult, OutputStream, RunOptions } from "../types.js";
import { decodeOutput } from "./decodeOutput.js";
import { LineBuffer } from "./lineBuffer.js";

const DEFAULT_KILL_GRACE_MS = 3000;

export interface ShellCommandRunnerOptions {
  killGraceMs?: number;
  platform?: NodeJS.Platform;
  logger?: Logger;
}

type StopReason = "cancelled" | "timeout";

export class ShellCommandRunner implements CommandExecutor {
  private readonly killGraceMs: number;
  private readonly platform: NodeJS.Platform;
  private readonly logger: Logger;

  constructor(options: ShellCommandRunnerOptions = {}) {
    this.killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
    this.platform = options.platform ?? process.platform;
    this.logger = options.logger ?? silentLogger;
  }

  async run(cmd: string, args: string[], options: RunOptions = {}): Promise<CommandResult> {
    const { signal, timeoutMs, onLine } = options;
    if (signal?.aborted) {
      throw new CancelledError();
    }

    return new Promise((resolve, reject) => {
      const isWindows = this.platform === "win32";
      const child = spawn(cmd, args, {
        stdio: ["ignore", "pipe", "pipe"],
        // Own process group on POSIX so the whole tree can be signalled.
        detached: !isWindows,
        windowsHide: true
      });

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      const lines: Record<OutputStream, LineBuffer> = {
        stdout: new LineBuffer(),
        stderr: new LineBuffer()
      };
      let spawned = false;
      let settled = false;
      let stopReason: StopReason | undefined;
      let killTimer: NodeJS.Timeout | undefined;

      const emit = (stream: OutputStream, batch: string[]): void => {
        if (!onLine) {
          return;
        }
        for (const line of batch) {
          onLine(stream, line);
        }
      };

      const stop = (reason: StopReason): void => {
        if (stopReason || settled) {
          return;
        }
        stopReason = reason;
        this.logger.info({ cmd, pid: child.pid, reason }, "terminating command");
        killTimer = this.terminate(child);
      };

      const onAbort = (): void => stop("cancelled");
      signal?.addEventListener("abort", onAbort, { once: true });
      const deadline =
        timeoutMs !== undefined ? setTimeout(() => stop("timeout"), timeoutMs) : undefined;

      const finish = (): void => {
        settled = true;
        signal?.removeEventListener("abort", onAbort);
        if (deadline) {
          clearTimeout(deadline);
        }
        if (killTimer) {
          clearTimeout(killTimer);
        }
      };

      child.on("spawn", () => {
        spawned = true;
      });

      child.stdout?.on("data", (chunk: Buffer) => {
        stdout.push(chunk);
        emit("stdout", lines.stdout.push(chunk));
      });

      child.stderr?.on("data", (chunk: Buffer) => {
        stderr.push(chunk);
        emit("stderr", lines.stderr.push(chunk));
      });

      child.on("error", (error) => {
        if (settled) {
          return;
        }
        if (!spawned) {
          finish();
          reject(new LaunchError(cmd, error));
          return;
        }
        this.logger.warn({ cmd, pid: child.pid, err: error }, "child process error");
      });

      child.on("close", (code, exitSignal) => {
        if (settled) {
          return;
        }
        finish();
        emit("stdout", lines.stdout.flush());
        emit("stderr", lines.stderr.flush());

        if (stopReason === "cancelled") {
          reject(new CancelledError());
          return;
        }
        if (stopReason === "timeout" && timeoutMs !== undefined) {
          reject(new TimeoutError(timeoutMs));
          return;
        }

        this.logger.debug({ cmd, code, signal: exitSignal }, "command exited");
        resolve({
          exitCode: code ?? 1,
          stdout: decodeOutput(Buffer.concat(stdout)),
          stderr: decodeOutput(Buffer.concat(stderr))
        });
      });
    });
  }

  private terminate(child: ChildProcess): NodeJS.Timeout | undefined {
    const pid = child.pid;
    if (pid === undefined) {
      return undefined;
    }

    if (this.platform === "win32") {
      const killer = spawn("taskkill", ["/pid", String(pid), "/T", "/F"], {
        stdio: "ignore",
        windowsHide: true
      });
      killer.on("error", (error) => {
        this.logger.warn({ pid, err: error }, "taskkill failed, killing direct child only");
        child.kill();
      });
      return undefined;
    }

    this.signalGroup(child, pid, "SIGTERM");
    return setTimeout(() => this.signalGroup(child, pid, "SIGKILL"), this.killGraceMs);
  }

  private signalGroup(child: ChildProcess, pid: number, signal: NodeJS.Signals): void {
    try {
      process.kill(-pid, signal);
    } catch (error) {
      this.logger.debug({ pid, signal, err: error }, "process group not signalled, signalling child");
      child.kill(signal);
    }
  }
}
