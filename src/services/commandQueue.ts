import { CancelledError } from "../errors.js";
import type { CommandKind, CommandRequest, RequestStatus } from "../types.js";

export interface TaskContext {
  request: CommandRequest;
  signal: AbortSignal;
}

export type CommandTask<T> = (context: TaskContext) => Promise<T>;

export interface CommandHandle<T> {
  readonly request: CommandRequest;
  readonly result: Promise<T>;
  cancel(): void;
}

export interface CommandQueueOptions {
  now?: () => number;
  onTransition?: (request: CommandRequest) => void;
}

type MutableRequest = { -readonly [K in keyof CommandRequest]: CommandRequest[K] };

interface QueueEntry {
  request: MutableRequest;
  controller: AbortController;
  execute(): Promise<void>;
  fail(error: unknown): void;
}

const TERMINAL: ReadonlySet<RequestStatus> = new Set(["succeeded", "failed", "cancelled"]);

export class CommandQueue {
  private readonly waiting: QueueEntry[] = [];
  private active: QueueEntry | undefined;
  private nextId = 1;
  private readonly now: () => number;

  constructor(private readonly options: CommandQueueOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  enqueue<T>(
    kind: CommandKind,
    argument: string | undefined,
    task: CommandTask<T>,
    signal?: AbortSignal
  ): CommandHandle<T> {
    const request: MutableRequest = {
      id: this.nextId,
      kind,
      argument,
      status: "queued",
      queuedAt: this.now()
    };
    this.nextId += 1;

    const controller = new AbortController();
    const deferred = createDeferred<T>();
    const detach = this.linkSignal(request.id, signal);

    const entry: QueueEntry = {
      request,
      controller,
      execute: async () => {
        this.transition(request, "running");
        try {
          const value = await task({ request: snapshot(request), signal: controller.signal });
          this.transition(request, "succeeded");
          deferred.resolve(value);
        } catch (error) {
          this.transition(request, error instanceof CancelledError ? "cancelled" : "failed");
          deferred.reject(error);
        } finally {
          detach();
        }
      },
      fail: (error) => {
        detach();
        deferred.reject(error);
      }
    };

    this.waiting.push(entry);
    this.options.onTransition?.(snapshot(request));

    if (signal?.aborted) {
      this.cancel(request.id);
    } else {
      this.pump();
    }

    return {
      get request() {
        return snapshot(request);
      },
      result: deferred.promise,
      cancel: () => {
        this.cancel(request.id);
      }
    };
  }

  /**
   * Cancels a queued request (it never runs) or aborts the running one.
   * Returns false when the request is unknown or already finished.
   */
  cancel(id: number): boolean {
    const index = this.waiting.findIndex((entry) => entry.request.id === id);
    if (index >= 0) {
      const [entry] = this.waiting.splice(index, 1);
      if (entry) {
        this.transition(entry.request, "cancelled");
        entry.fail(new CancelledError("Cancelled before it started"));
      }
      return true;
    }

    if (this.active?.request.id === id) {
      this.active.controller.abort();
      return true;
    }

    return false;
  }

  cancelAll(): void {
    for (const entry of [...this.waiting]) {
      this.cancel(entry.request.id);
    }
    if (this.active) {
      this.cancel(this.active.request.id);
    }
  }

  pending(): CommandRequest[] {
    const entries = this.active ? [this.active, ...this.waiting] : this.waiting;
    return entries.map((entry) => snapshot(entry.request));
  }

  isIdle(): boolean {
    return !this.active && this.waiting.length === 0;
  }

  private pump(): void {
    if (this.active) {
      return;
    }

    const next = this.waiting.shift();
    if (!next) {
      return;
    }

    this.active = next;
    void this.runEntry(next);
  }

  private async runEntry(entry: QueueEntry): Promise<void> {
    try {
      await entry.execute();
    } finally {
      this.active = undefined;
      this.pump();
    }
  }

  private linkSignal(id: number, signal: AbortSignal | undefined): () => void {
    if (!signal || signal.aborted) {
      return () => {};
    }

    const onAbort = (): void => {
      this.cancel(id);
    };
    signal.addEventListener("abort", onAbort, { once: true });
    return () => signal.removeEventListener("abort", onAbort);
  }

  private transition(request: MutableRequest, status: RequestStatus): void {
    if (TERMINAL.has(request.status)) {
      return;
    }

    request.status = status;
    if (status === "running") {
      request.startedAt = this.now();
    } else if (TERMINAL.has(status)) {
      request.finishedAt = this.now();
    }

    this.options.onTransition?.(snapshot(request));
  }
}

function snapshot(request: MutableRequest): CommandRequest {
  return Object.freeze({ ...request });
}

interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(error: unknown): void;
}

function createDeferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (error: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
