/**
 * Blocking pool: a fixed set of worker threads that run synchronous
 * collaborator calls off the event loop.
 *
 * A job names a module and one of its exports; the thread imports the module
 * (cached after the first import), calls the export with the job's
 * structured-cloneable args and posts the result back. A thread that dies
 * fails its current job and is replaced.
 */

import { isAbsolute, resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { Worker } from "node:worker_threads";
import { z } from "zod";
import { GatewayError, type BlockingJob, type Logger } from "@walletgate/core";

const LOG_PREFIX = "walletgate:blocking-pool";

const WORKER_SOURCE = `
const { parentPort } = require("node:worker_threads");
parentPort.on("message", async (job) => {
  try {
    const mod = await import(job.module);
    const fn = mod[job.exportName];
    if (typeof fn !== "function") {
      throw new Error("Export " + job.exportName + " of " + job.module + " is not a function");
    }
    const result = await fn(...job.args);
    parentPort.postMessage({ id: job.id, ok: true, result });
  } catch (err) {
    parentPort.postMessage({
      id: job.id,
      ok: false,
      error: {
        name: err && err.name ? String(err.name) : "Error",
        message: err && err.message ? String(err.message) : String(err),
      },
    });
  }
});
`;

const JobResultSchema = z.discriminatedUnion("ok", [
  z.object({ id: z.number(), ok: z.literal(true), result: z.unknown() }),
  z.object({
    id: z.number(),
    ok: z.literal(false),
    error: z.object({ name: z.string(), message: z.string() }),
  }),
]);

interface QueuedJob {
  id: number;
  module: string;
  exportName: string;
  args: unknown[];
  resolve: (value: unknown) => void;
  reject: (err: unknown) => void;
}

interface Slot {
  worker: Worker;
  current: QueuedJob | null;
}

export type WorkerFactory = () => Worker;

const defaultWorkerFactory: WorkerFactory = () => new Worker(WORKER_SOURCE, { eval: true });

function toModuleUrl(module: string | URL): string {
  if (module instanceof URL) return module.href;
  if (module.startsWith("file:") || module.startsWith("data:")) return module;
  return pathToFileURL(isAbsolute(module) ? module : resolve(module)).href;
}

export class BlockingPool {
  private readonly size: number;
  private readonly log: Logger;
  private readonly createWorker: WorkerFactory;
  private slots: Slot[] = [];
  private queue: QueuedJob[] = [];
  private nextJobId = 1;
  private closed = false;

  constructor(params: { size: number; log?: Logger; workerFactory?: WorkerFactory }) {
    this.size = Math.max(1, params.size);
    this.log = params.log ?? {};
    this.createWorker = params.workerFactory ?? defaultWorkerFactory;
  }

  /**
   * Spawn every thread. Throws if a thread cannot be created; threads that
   * were already created are terminated first.
   */
  start(): void {
    try {
      for (let i = 0; i < this.size; i++) {
        this.slots.push(this.spawnSlot());
      }
    } catch (err) {
      for (const slot of this.slots) this.terminate(slot.worker);
      this.slots = [];
      throw err;
    }
    this.log.info?.({ threads: this.size }, `${LOG_PREFIX}:start - Pool started`);
  }

  run(job: BlockingJob): Promise<unknown> {
    if (this.closed) {
      return Promise.reject(
        new GatewayError({ kind: "RuntimeUnavailable", message: "Blocking pool is closed" })
      );
    }
    return new Promise<unknown>((resolve, reject) => {
      this.queue.push({
        id: this.nextJobId++,
        module: toModuleUrl(job.module),
        exportName: job.exportName,
        args: job.args ?? [],
        resolve,
        reject,
      });
      this.pump();
    });
  }

  get threadCount(): number {
    return this.slots.length;
  }

  get queued(): number {
    return this.queue.length;
  }

  get busy(): number {
    return this.slots.filter((slot) => slot.current !== null).length;
  }

  /**
   * Terminate every thread. Queued and running jobs fail with
   * RuntimeUnavailable.
   */
  async destroy(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    const err = new GatewayError({ kind: "RuntimeUnavailable", message: "Blocking pool destroyed" });
    for (const job of this.queue.splice(0)) job.reject(err);
    const slots = this.slots;
    this.slots = [];
    for (const slot of slots) {
      slot.current?.reject(err);
      slot.current = null;
    }
    await Promise.allSettled(slots.map((slot) => slot.worker.terminate()));
    this.log.info?.({}, `${LOG_PREFIX}:destroy - Pool destroyed`);
  }

  private spawnSlot(): Slot {
    const worker = this.createWorker();
    worker.unref();
    const slot: Slot = { worker, current: null };
    worker.on("message", (message: unknown) => this.onMessage(slot, message));
    worker.on("error", (err) => this.onWorkerFailure(slot, err));
    worker.on("exit", (code) => {
      if (!this.closed) this.onWorkerFailure(slot, new Error(`Worker exited with code ${code}`));
    });
    return slot;
  }

  private onMessage(slot: Slot, message: unknown): void {
    const job = slot.current;
    const parsed = JobResultSchema.safeParse(message);
    if (!job || !parsed.success || parsed.data.id !== job.id) {
      this.log.warn?.({}, `${LOG_PREFIX}:onMessage - Unexpected message from worker`);
      return;
    }
    slot.current = null;
    slot.worker.unref();
    const result = parsed.data;
    if (result.ok) {
      job.resolve(result.result);
    } else {
      job.reject(
        new GatewayError({
          kind: "InternalError",
          message: `${job.exportName}: ${result.error.message}`,
          details: { name: result.error.name },
        })
      );
    }
    this.pump();
  }

  private onWorkerFailure(slot: Slot, err: Error): void {
    const index = this.slots.indexOf(slot);
    if (index === -1) return;
    this.log.error?.(
      { error: err.message, job: slot.current?.exportName },
      `${LOG_PREFIX}:onWorkerFailure - Worker failed, replacing it`
    );
    slot.current?.reject(
      new GatewayError({ kind: "InternalError", message: `Blocking worker failed: ${err.message}`, cause: err })
    );
    slot.current = null;
    this.slots.splice(index, 1);
    this.terminate(slot.worker);
    if (this.closed) return;
    try {
      this.slots.push(this.spawnSlot());
    } catch (spawnErr) {
      this.log.error?.(
        { error: spawnErr instanceof Error ? spawnErr.message : String(spawnErr) },
        `${LOG_PREFIX}:onWorkerFailure - Could not replace worker`
      );
    }
    this.pump();
  }

  private terminate(worker: Worker): void {
    worker.terminate().catch((err: unknown) => {
      this.log.warn?.(
        { error: err instanceof Error ? err.message : String(err) },
        `${LOG_PREFIX}:terminate - Worker did not terminate cleanly`
      );
    });
  }

  private pump(): void {
    if (this.slots.length === 0) {
      const err = new GatewayError({ kind: "RuntimeUnavailable", message: "Blocking pool has no threads" });
      for (const job of this.queue.splice(0)) job.reject(err);
      return;
    }
    for (const slot of this.slots) {
      if (this.queue.length === 0) return;
      if (slot.current !== null) continue;
      const job = this.queue.shift();
      if (!job) return;
      try {
        slot.worker.postMessage({ id: job.id, module: job.module, exportName: job.exportName, args: job.args });
      } catch (err) {
        job.reject(
          new GatewayError({
            kind: "InvalidArgument",
            message: `${job.exportName}: arguments cannot be sent to a worker thread`,
            cause: err,
          })
        );
        continue;
      }
      slot.current = job;
      slot.worker.ref();
    }
  }
}
