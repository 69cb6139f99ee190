export type CommandKind = "list" | "search" | "install" | "update" | "uninstall" | "cleanup" | "status";

export type RequestStatus = "queued" | "running" | "succeeded" | "failed" | "cancelled";

export type OutputStream = "stdout" | "stderr";

export interface PackageRecord {
  readonly name: string;
  readonly version: string;
  readonly source: string;
  readonly updatedVersion?: string;
  readonly updated?: string;
  readonly info?: string;
  readonly binaries?: string;
}

export interface RejectedLine {
  lineNumber: number;
  text: string;
  reason: string;
}

export type ListingFormat = "json" | "table";

export interface ParsedListing {
  records: PackageRecord[];
  rejected: RejectedLine[];
  format: ListingFormat;
}

export interface CommandRequest {
  readonly id: number;
  readonly kind: CommandKind;
  readonly argument?: string;
  readonly status: RequestStatus;
  readonly queuedAt: number;
  readonly startedAt?: number;
  readonly finishedAt?: number;
}

export interface OutputLine {
  requestId: number;
  stream: OutputStream;
  line: string;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
  onLine?: (stream: OutputStream, line: string) => void;
}

export interface CommandExecutor {
  run(cmd: string, args: string[], options?: RunOptions): Promise<CommandResult>;
}
