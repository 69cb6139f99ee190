import Emittery from "emittery";
import type { Logger } from "pino";
import { CancelledError, ParseError, TimeoutError, ToolExecutionError } from "../errors.js";
import { silentLogger } from "../logging/logger.js";
import { makeRecord, ScoopOutputParser, type OutputParser } from "../parser/scoopOutputParser.js";
import type {
  CommandExecutor,
  CommandKind,
  CommandRequest,
  CommandResult,
  OutputLine,
  PackageRecord,
  ParsedListing
} from "../types.js";
import { validatePackageName, validateSearchQuery } from "./arguments.js";
import { CommandQueue, type CommandHandle, type TaskContext } from "./commandQueue.js";
import { PackageCatalog, type CatalogView, type Snapshot } from "./packageCatalog.js";
import { buildCommand, displayCommand, type InvocationSettings } from "./scoopCommands.js";

export interface ServiceEvents {
  request: CommandRequest;
  output: OutputLine;
}

export interface CommandOptions {
  onOutput?: (line: OutputLine) => void;
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface CommandOutcome {
  requestId: number;
  exitCode: number;
  output: string;
}

export interface ScoopServiceOptions {
  invocation?: Partial<InvocationSettings>;
  parser?: OutputParser;
  logger?: Logger;
  timeoutMs?: number;
  searchCacheSize?: number;
  now?: () => number;
}

const DEFAULT_INVOCATION: InvocationSettings = {
  tool: "scoop",
  shell: "direct",
  powershell: "powershell"
};

/**
 * Entry point for everything that talks to Scoop. Commands are queued and run
 * one at a time; listings are parsed into records and cached in the catalog.
 */
export class ScoopService {
  readonly events = new Emittery<ServiceEvents>();

  private readonly invocation: InvocationSettings;
  private readonly parser: OutputParser;
  private readonly logger: Logger;
  private readonly timeoutMs: number | undefined;
  private readonly store: PackageCatalog;
  private readonly queue: CommandQueue;
  private readonly now: () => number;

  constructor(
    private readonly runner: CommandExecutor,
    options: ScoopServiceOptions = {}
  ) {
    this.invocation = { ...DEFAULT_INVOCATION, ...options.invocation };
    this.parser = options.parser ?? new ScoopOutputParser();
    this.logger = options.logger ?? silentLogger;
    this.timeoutMs = options.timeoutMs;
    this.now = options.now ?? Date.now;
    this.store = new PackageCatalog(options.searchCacheSize);
    this.queue = new CommandQueue({
      now: options.now,
      onTransition: (request) => this.publishTransition(request)
    });
  }

  get catalog(): CatalogView {
    return this.store;
  }

  listInstalled(options: CommandOptions = {}): CommandHandle<Snapshot> {
    return this.queue.enqueue(
      "list",
      undefined,
      async (context) => {
        const result = await this.invoke("list", undefined, context, options);
        const parsed = this.parser.parseInstalledList(result.stdout);
        this.reportRejected("list", parsed);

        if (parsed.records.length === 0 && parsed.rejected.length > 0) {
          throw new ParseError(
            `none of ${parsed.rejected.length} line(s) of "${this.display("list")}" output could be read`,
            parsed.rejected
          );
        }

        throwIfCancelled(context.signal);
        return this.store.setInstalled(parsed.records);
      },
      options.signal
    );
  }

  async getInstalled(options: CommandOptions = {}): Promise<Snapshot> {
    const cached = this.store.getInstalled();
    if (cached) {
      return cached;
    }
    return this.listInstalled(options).result;
  }

  search(query: string, options: CommandOptions = {}): CommandHandle<Snapshot> {
    const text = validateSearchQuery(query);
    return this.queue.enqueue(
      "search",
      text,
      async (context) => {
        const result = await this.invoke("search", text, context, options);
        const parsed = this.parser.parseSearchResults(result.stdout);
        this.reportRejected("search", parsed);
        throwIfCancelled(context.signal);
        return this.store.setSearch(text, parsed.records);
      },
      options.signal
    );
  }

  /**
   * Packages with a newer version available. When an installed listing is
   * cached, it is replaced by a copy carrying the new versions.
   */
  checkUpdates(options: CommandOptions = {}): CommandHandle<Snapshot> {
    return this.queue.enqueue(
      "status",
      undefined,
      async (context) => {
        const result = await this.invoke("status", undefined, context, options);
        const parsed = this.parser.parseStatus(result.stdout);
        this.reportRejected("status", parsed);
        throwIfCancelled(context.signal);

        const outdated = parsed.records.filter((record) => record.updatedVersion);
        const installed = this.store.getInstalled();
        if (installed) {
          this.store.setInstalled(withUpdates(installed, outdated));
        }
        return Object.freeze(outdated);
      },
      options.signal
    );
  }

  install(name: string, options: CommandOptions = {}): CommandHandle<CommandOutcome> {
    return this.mutate("install", validatePackageName(name), options);
  }

  update(name: string, options: CommandOptions = {}): CommandHandle<CommandOutcome> {
    return this.mutate("update", validatePackageName(name), options);
  }

  uninstall(name: string, options: CommandOptions = {}): CommandHandle<CommandOutcome> {
    return this.mutate("uninstall", validatePackageName(name), options);
  }

  cleanup(name: string, options: CommandOptions = {}): CommandHandle<CommandOutcome> {
    return this.mutate("cleanup", validatePackageName(name), options);
  }

  cleanupAll(options: CommandOptions = {}): CommandHandle<CommandOutcome> {
    return this.mutate("cleanup", "*", options);
  }

  /**
   * Refreshes Scoop and its buckets, then updates every installed package.
   * Stops after the first step that fails. A deadline covers both steps.
   */
  updateAll(options: CommandOptions = {}): CommandHandle<CommandOutcome> {
    return this.queue.enqueue(
      "update",
      "*",
      async (context) => {
        const timeoutMs = options.timeoutMs ?? this.timeoutMs;
        const startedAt = this.now();
        const refreshed = await this.invoke("update", undefined, context, { ...options, timeoutMs });

        let remainingMs: number | undefined;
        if (timeoutMs !== undefined) {
          remainingMs = timeoutMs - (this.now() - startedAt);
          if (remainingMs <= 0) {
            throw new TimeoutError(timeoutMs);
          }
        }
        const upgraded = await this.invoke("update", "*", context, { ...options, timeoutMs: remainingMs });
        this.store.invalidateInstalled();
        return {
          requestId: context.request.id,
          exitCode: upgraded.exitCode,
          output: [refreshed.stdout, upgraded.stdout].filter((text) => text.trim()).join("\n")
        };
      },
      options.signal
    );
  }

  pending(): CommandRequest[] {
    return this.queue.pending();
  }

  cancel(requestId: number): boolean {
    return this.queue.cancel(requestId);
  }

  cancelAll(): void {
    this.queue.cancelAll();
  }

  private mutate(kind: CommandKind, name: string, options: CommandOptions): CommandHandle<CommandOutcome> {
    return this.queue.enqueue(
      kind,
      name,
      async (context) => {
        const result = await this.invoke(kind, name, context, options);
        this.store.invalidateInstalled();
        return { requestId: context.request.id, exitCode: result.exitCode, output: result.stdout };
      },
      options.signal
    );
  }

  private async invoke(
    kind: CommandKind,
    argument: string | undefined,
    context: TaskContext,
    options: CommandOptions
  ): Promise<CommandResult> {
    const [cmd, args] = buildCommand(kind, argument, this.invocation);
    const requestId = context.request.id;
    const display = this.display(kind, argument);
    this.logger.debug({ requestId, cmd, args }, "spawning tool");

    const result = await this.runner.run(cmd, args, {
      signal: context.signal,
      timeoutMs: options.timeoutMs ?? this.timeoutMs,
      onLine: (stream, line) => this.relay({ requestId, stream, line }, options.onOutput)
    });

    if (result.exitCode !== 0) {
      this.logger.warn({ requestId, command: display, exitCode: result.exitCode }, "tool failed");
      throw new ToolExecutionError(display, result.exitCode, result.stderr);
    }

    return result;
  }

  private relay(line: OutputLine, onOutput: CommandOptions["onOutput"]): void {
    if (onOutput) {
      try {
        onOutput(line);
      } catch (error) {
        this.logger.warn({ requestId: line.requestId, err: error }, "output callback threw");
      }
    }

    this.events.emit("output", line).catch((error: unknown) => {
      this.logger.warn({ requestId: line.requestId, err: error }, "output listener failed");
    });
  }

  private publishTransition(request: CommandRequest): void {
    this.logger.debug(
      { requestId: request.id, kind: request.kind, argument: request.argument, status: request.status },
      "request transition"
    );

    this.events.emit("request", request).catch((error: unknown) => {
      this.logger.warn({ requestId: request.id, err: error }, "request listener failed");
    });
  }

  private reportRejected(kind: CommandKind, parsed: ParsedListing): void {
    if (parsed.rejected.length === 0) {
      return;
    }

    this.logger.warn(
      { kind, format: parsed.format, rejected: parsed.rejected.length, first: parsed.rejected[0] },
      "dropped unreadable output lines"
    );
  }

  private display(kind: CommandKind, argument?: string): string {
    return displayCommand(kind, argument, this.invocation.tool);
  }
}

function throwIfCancelled(signal: AbortSignal): void {
  if (signal.aborted) {
    throw new CancelledError();
  }
}

function withUpdates(installed: Snapshot, outdated: readonly PackageRecord[]): PackageRecord[] {
  const latest = new Map(outdated.map((record) => [record.name, record.updatedVersion]));
  return installed.map((record) =>
    makeRecord({
      name: record.name,
      version: record.version,
      source: record.source,
      updated: record.updated,
      info: record.info,
      binaries: record.binaries,
      updatedVersion: latest.get(record.name)
    })
  );
}
