import { describe, expect, it, vi } from "vitest";
import {
  CancellationSource,
  NEVER_CANCELLED,
  raceCancellation,
  throwIfCancelled,
  type CancellationToken,
} from "../src/concurrency/cancellation";
import { TaskManager } from "../src/concurrency/taskManager";
import { withTimeout } from "../src/concurrency/timeout";
import { CancelledError, TimeoutError } from "../src/errors";
import { silentLogger } from "../src/logger";
import { spyLogger } from "./helpers";

function untilCancelled(token: CancellationToken): Promise<never> {
  return new Promise((_resolve, reject) => {
    token.onCancelled(() => reject(new CancelledError("wait")));
  });
}

describe("CancellationSource", () => {
  it("notifies listeners once and late subscribers at once", () => {
    const source = new CancellationSource();
    const early = vi.fn();
    source.token.onCancelled(early);
    source.cancel();
    source.cancel();
    expect(early).toHaveBeenCalledTimes(1);
    expect(source.token.isCancelled).toBe(true);
    expect(source.signal.aborted).toBe(true);

    const late = vi.fn();
    source.token.onCancelled(late);
    expect(late).toHaveBeenCalledTimes(1);
  });

  it("cancels children with their parent", () => {
    const parent = new CancellationSource();
    const child = parent.child();
    parent.cancel();
    expect(child.token.isCancelled).toBe(true);
  });

  it("detaches a disposed child", () => {
    const parent = new CancellationSource();
    const child = parent.child();
    child.dispose();
    parent.cancel();
    expect(child.token.isCancelled).toBe(false);
  });

  it("lets an unsubscribed listener go", () => {
    const source = new CancellationSource();
    const listener = vi.fn();
    const unsubscribe = source.token.onCancelled(listener);
    unsubscribe();
    source.cancel();
    expect(listener).not.toHaveBeenCalled();
  });

  it("throws once cancelled", () => {
    const source = new CancellationSource();
    expect(() => throwIfCancelled(source.token, "scan")).not.toThrow();
    source.cancel();
    expect(() => throwIfCancelled(source.token, "scan")).toThrow(CancelledError);
    expect(NEVER_CANCELLED.isCancelled).toBe(false);
  });
});

describe("raceCancellation", () => {
  it("settles with the work when not cancelled", async () => {
    const source = new CancellationSource();
    await expect(raceCancellation(Promise.resolve(7), source.token)).resolves.toBe(7);
  });

  it("rejects when cancelled midway", async () => {
    const source = new CancellationSource();
    const pending = raceCancellation(new Promise<number>(() => undefined), source.token, "lookup");
    source.cancel();
    await expect(pending).rejects.toThrow("lookup was cancelled");
  });

  it("rejects at once when already cancelled", async () => {
    const source = new CancellationSource();
    source.cancel();
    await expect(raceCancellation(Promise.resolve(1), source.token)).rejects.toBeInstanceOf(
      CancelledError,
    );
  });
});

describe("withTimeout", () => {
  it("passes a fast result through", async () => {
    await expect(withTimeout(Promise.resolve("ok"), 1000, "fast")).resolves.toBe("ok");
  });

  it("rejects a slow one with a TimeoutError", async () => {
    const slow = new Promise<string>(() => undefined);
    const error = await withTimeout(slow, 10, "Lookup of PORT").catch((err: unknown) => err);
    expect(error).toBeInstanceOf(TimeoutError);
    expect(error instanceof TimeoutError && error.label).toBe("Lookup of PORT");
    expect(error instanceof Error && error.message).toBe("Lookup of PORT timed out after 10ms");
  });

  it("keeps the original rejection", async () => {
    await expect(withTimeout(Promise.reject(new Error("boom")), 1000, "x")).rejects.toThrow("boom");
  });

  it("returns the promise itself when disabled", () => {
    const promise = Promise.resolve(1);
    expect(withTimeout(promise, 0, "off")).toBe(promise);
  });
});

describe("TaskManager", () => {
  it("runs a task and hands back its result", async () => {
    const tasks = new TaskManager(silentLogger);
    const handle = tasks.spawn("sum", async () => 1 + 2);
    await expect(handle.promise).resolves.toBe(3);
    expect(handle.name).toBe("sum");
  });

  it("cancels running tasks on shutdown and waits for them", async () => {
    const logger = spyLogger();
    const tasks = new TaskManager(logger);
    const handle = tasks.spawn("index", untilCancelled);
    const outcome = handle.promise.catch((err: unknown) => err);

    await tasks.shutdown();
    expect(await outcome).toBeInstanceOf(CancelledError);
    expect(tasks.isShuttingDown).toBe(true);
    expect(logger.error).not.toHaveBeenCalled();
  });

  it("cancels a single task through its handle", async () => {
    const tasks = new TaskManager(silentLogger);
    const first = tasks.spawn("first", untilCancelled);
    const second = tasks.spawn("second", async () => "done");
    first.cancel();
    await expect(first.promise).rejects.toBeInstanceOf(CancelledError);
    await expect(second.promise).resolves.toBe("done");
  });

  it("refuses new work after shutdown", async () => {
    const tasks = new TaskManager(silentLogger);
    await tasks.shutdown();
    const fn = vi.fn(async () => 1);
    const handle = tasks.spawn("late", fn);
    await expect(handle.promise).rejects.toBeInstanceOf(CancelledError);
    expect(fn).not.toHaveBeenCalled();
  });

  it("logs failures of a task", async () => {
    const logger = spyLogger();
    const tasks = new TaskManager(logger);
    const handle = tasks.spawn("broken", async () => {
      throw new Error("disk gone");
    });
    await expect(handle.promise).rejects.toThrow("disk gone");
    await tasks.shutdown();
    expect(logger.error).toHaveBeenCalledWith("Task broken failed: disk gone");
  });
});
