import type { RejectedLine } from "./types.js";

export class ScoopUiError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ScoopUiError";
  }
}

export class LaunchError extends ScoopUiError {
  constructor(
    public readonly command: string,
    cause: unknown
  ) {
    super(`Unable to launch ${command}: ${messageOf(cause)}`, { cause });
    this.name = "LaunchError";
  }
}

export class ToolExecutionError extends ScoopUiError {
  constructor(
    public readonly command: string,
    public readonly exitCode: number,
    public readonly stderr: string
  ) {
    super(stderr.trim() || `${command} failed (code=${exitCode})`);
    this.name = "ToolExecutionError";
  }
}

export class ParseError extends ScoopUiError {
  constructor(
    message: string,
    public readonly rejected: RejectedLine[] = []
  ) {
    super(message);
    this.name = "ParseError";
  }
}

export class CancelledError extends ScoopUiError {
  constructor(message = "Command cancelled") {
    super(message);
    this.name = "CancelledError";
  }
}

export class TimeoutError extends ScoopUiError {
  constructor(public readonly timeoutMs: number) {
    super(`Command timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

export class InvalidArgumentError extends ScoopUiError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

export class ConfigError extends ScoopUiError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigError";
  }
}

export function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// Tool failures show the tool's own diagnostics.
export function describeError(error: unknown): string {
  if (error instanceof LaunchError) {
    return `Tool not found or not executable (${error.command}): ${messageOf(error.cause)}`;
  }

  if (error instanceof ToolExecutionError) {
    return error.stderr.trim() || `Tool failed with exit code ${error.exitCode}`;
  }

  if (error instanceof ParseError) {
    return `Tool output could not be read: ${error.message}`;
  }

  if (error instanceof TimeoutError) {
    return `Tool did not finish within ${error.timeoutMs}ms`;
  }

  if (error instanceof CancelledError) {
    return "Cancelled";
  }

  return messageOf(error);
}
