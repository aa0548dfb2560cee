/**
 * Runtime supervisor: owns the process-wide executor.
 *
 * The executor has two halves: async tasks scheduled on the event loop
 * (tracked so shutdown can drain them) and a blocking pool of worker threads
 * for synchronous collaborator calls. The supervisor starts lazily, at most
 * once, and is torn down at most once; after teardown or a failed start
 * every spawn fails with RuntimeUnavailable.
 */

import { setImmediate as nextTurn } from "node:timers/promises";
import { GatewayError, type BlockingJob, type Logger } from "@walletgate/core";
import { BlockingPool, type WorkerFactory } from "./blocking-pool.js";

const LOG_PREFIX = "walletgate:runtime-supervisor";

export type RuntimeState = "idle" | "running" | "failed" | "stopping" | "stopped";

export interface RuntimeSupervisorParams {
  workerThreads: number;
  shutdownGraceMs: number;
  log?: Logger;
  workerFactory?: WorkerFactory;
}

export type RuntimeTask<T> = (signal: AbortSignal) => Promise<T>;

export class RuntimeSupervisor {
  private readonly params: RuntimeSupervisorParams;
  private readonly log: Logger;
  private runtimeState: RuntimeState = "idle";
  private pool: BlockingPool | null = null;
  private readonly abort = new AbortController();
  private readonly pending = new Set<Promise<unknown>>();
  private shutdownPromise: Promise<void> | null = null;
  private startError: string | null = null;

  constructor(params: RuntimeSupervisorParams) {
    this.params = params;
    this.log = params.log ?? {};
  }

  get state(): RuntimeState {
    return this.runtimeState;
  }

  get isAvailable(): boolean {
    return this.runtimeState === "running";
  }

  /** Aborted once the shutdown grace period has elapsed. */
  get signal(): AbortSignal {
    return this.abort.signal;
  }

  get pendingTasks(): number {
    return this.pending.size;
  }

  /**
   * Start the executor if it has not been started. Idempotent. Returns
   * whether the runtime is available.
   */
  ensureStarted(): boolean {
    if (this.runtimeState !== "idle") return this.isAvailable;
    const pool = new BlockingPool({
      size: this.params.workerThreads,
      log: this.log,
      workerFactory: this.params.workerFactory,
    });
    try {
      pool.start();
    } catch (err) {
      this.runtimeState = "failed";
      this.startError = err instanceof Error ? err.message : String(err);
      this.log.error?.({ error: this.startError }, `${LOG_PREFIX}:ensureStarted - Executor failed to start`);
      return false;
    }
    this.pool = pool;
    this.runtimeState = "running";
    this.log.info?.({ workerThreads: this.params.workerThreads }, `${LOG_PREFIX}:ensureStarted - Runtime started`);
    return true;
  }

  /**
   * Fails with RuntimeUnavailable unless the runtime is running.
   */
  assertAvailable(): void {
    if (this.isAvailable) return;
    throw new GatewayError({
      kind: "RuntimeUnavailable",
      message:
        this.runtimeState === "failed"
          ? `Runtime failed to start: ${this.startError ?? "unknown error"}`
          : `Runtime is ${this.runtimeState}`,
    });
  }

  /**
   * Schedule a task on a later turn of the event loop. The caller never
   * waits for the task to begin. The returned promise settles with the task.
   */
  spawn<T>(task: RuntimeTask<T>): Promise<T> {
    try {
      this.assertAvailable();
    } catch (err) {
      return Promise.reject(err);
    }
    const signal = this.abort.signal;
    const run = nextTurn().then(() => task(signal));
    const tracked: Promise<unknown> = run.then(
      () => undefined,
      () => undefined
    );
    this.pending.add(tracked);
    void tracked.finally(() => this.pending.delete(tracked));
    return run;
  }

  /** Run a synchronous collaborator call on a pool thread. */
  runBlocking(job: BlockingJob): Promise<unknown> {
    const pool = this.pool;
    if (!pool || !this.isAvailable) {
      return Promise.reject(
        new GatewayError({ kind: "RuntimeUnavailable", message: `Runtime is ${this.runtimeState}` })
      );
    }
    return pool.run(job);
  }

  /**
   * Drain pending tasks for up to `shutdownGraceMs`, then abort the runtime
   * signal and terminate the pool. Runs once; later calls return the same
   * promise.
   */
  shutdown(): Promise<void> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.doShutdown();
    }
    return this.shutdownPromise;
  }

  private async doShutdown(): Promise<void> {
    const previous = this.runtimeState;
    this.runtimeState = "stopping";
    this.log.info?.(
      { pending: this.pending.size, graceMs: this.params.shutdownGraceMs },
      `${LOG_PREFIX}:shutdown - Draining`
    );

    if (previous === "running" && this.pending.size > 0) {
      let timer: NodeJS.Timeout | undefined;
      const grace = new Promise<"timeout">((resolve) => {
        timer = setTimeout(() => resolve("timeout"), this.params.shutdownGraceMs);
      });
      const drained = Promise.all([...this.pending]).then(() => "drained" as const);
      const outcome = await Promise.race([drained, grace]);
      clearTimeout(timer);
      if (outcome === "timeout") {
        this.log.warn?.(
          { pending: this.pending.size },
          `${LOG_PREFIX}:shutdown - Grace period elapsed, aborting pending tasks`
        );
      }
    }

    this.abort.abort(new GatewayError({ kind: "Cancelled", message: "Runtime shut down" }));
    const pool = this.pool;
    this.pool = null;
    if (pool) await pool.destroy();
    this.runtimeState = "stopped";
    this.log.info?.({}, `${LOG_PREFIX}:shutdown - Runtime stopped`);
  }
}
