import { afterEach, describe, it, expect, vi } from "vitest";
import { delay } from "@walletgate/core";
import { RuntimeSupervisor } from "./runtime-supervisor.js";

const jobs = new URL("./__fixtures__/blocking-jobs.mjs", import.meta.url);

let supervisor: RuntimeSupervisor | null = null;

function createSupervisor(overrides: Partial<ConstructorParameters<typeof RuntimeSupervisor>[0]> = {}) {
  supervisor = new RuntimeSupervisor({ workerThreads: 1, shutdownGraceMs: 200, ...overrides });
  return supervisor;
}

afterEach(async () => {
  await supervisor?.shutdown();
  supervisor = null;
});

describe("RuntimeSupervisor", () => {
  it("starts lazily and only once", () => {
    const s = createSupervisor();
    expect(s.state).toBe("idle");
    expect(s.ensureStarted()).toBe(true);
    expect(s.ensureStarted()).toBe(true);
    expect(s.state).toBe("running");
    expect(s.isAvailable).toBe(true);
  });

  it("fails fast with RuntimeUnavailable after a failed start", async () => {
    const s = createSupervisor({
      workerFactory: () => {
        throw new Error("no threads");
      },
    });
    expect(s.ensureStarted()).toBe(false);
    expect(s.state).toBe("failed");
    expect(s.ensureStarted()).toBe(false);
    await expect(s.spawn(async () => 1)).rejects.toMatchObject({
      kind: "RuntimeUnavailable",
      message: "Runtime failed to start: no threads",
    });
  });

  it("runs spawned tasks on a later turn", async () => {
    const s = createSupervisor();
    s.ensureStarted();
    let ran = false;
    const result = s.spawn(async () => {
      ran = true;
      return 42;
    });
    expect(ran).toBe(false);
    await expect(result).resolves.toBe(42);
    expect(s.pendingTasks).toBe(0);
  });

  it("runs blocking jobs on the pool", async () => {
    const s = createSupervisor();
    s.ensureStarted();
    await expect(s.runBlocking({ module: jobs, exportName: "add", args: [20, 22] })).resolves.toBe(42);
  });

  it("drains pending tasks before stopping", async () => {
    const s = createSupervisor();
    s.ensureStarted();
    const task = s.spawn(async (signal) => {
      await delay(30, signal);
      return "done";
    });
    await s.shutdown();
    await expect(task).resolves.toBe("done");
    expect(s.state).toBe("stopped");
  });

  it("aborts tasks still running after the grace period", async () => {
    const warn = vi.fn();
    const s = createSupervisor({ shutdownGraceMs: 20, log: { warn } });
    s.ensureStarted();
    const task = s.spawn((signal) => delay(10_000, signal));
    const outcome = expect(task).rejects.toMatchObject({ kind: "Cancelled" });
    await s.shutdown();
    await outcome;
    expect(warn).toHaveBeenCalledWith(
      { pending: 1 },
      "walletgate:runtime-supervisor:shutdown - Grace period elapsed, aborting pending tasks"
    );
  });

  it("shuts down once and never restarts", async () => {
    const s = createSupervisor();
    s.ensureStarted();
    const first = s.shutdown();
    expect(s.shutdown()).toBe(first);
    await first;

    expect(s.ensureStarted()).toBe(false);
    await expect(s.spawn(async () => 1)).rejects.toMatchObject({
      kind: "RuntimeUnavailable",
      message: "Runtime is stopped",
    });
    await expect(s.runBlocking({ module: jobs, exportName: "add", args: [1, 1] })).rejects.toMatchObject({
      kind: "RuntimeUnavailable",
    });
  });
});
