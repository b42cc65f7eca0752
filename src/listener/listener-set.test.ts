import { describe, expect, it, vi } from "vitest";
import { ListenerSet } from "./listener-set.js";

/** A listener that runs until its signal aborts. */
function untilAborted(_threadId: string, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) resolve();
    else signal.addEventListener("abort", () => resolve(), { once: true });
  });
}

describe("ListenerSet", () => {
  it("starts one listener for concurrent spawns on a thread", async () => {
    const run = vi.fn(untilAborted);
    const set = new ListenerSet(run);

    const results = Array.from({ length: 10 }, () => set.spawnIfAbsent("t1"));

    expect(results.filter(Boolean)).toHaveLength(1);
    expect(set.size).toBe(1);
    await set.shutdown();
    expect(run).toHaveBeenCalledOnce();
  });

  it("runs listeners for different threads side by side", async () => {
    const set = new ListenerSet(untilAborted);
    expect(set.spawnIfAbsent("t1")).toBe(true);
    expect(set.spawnIfAbsent("t2")).toBe(true);
    expect(set.size).toBe(2);
    await set.shutdown();
  });

  it("allows a new listener once the previous one has finished", async () => {
    const run = vi.fn(async () => undefined);
    const set = new ListenerSet(run);

    set.spawnIfAbsent("t1");
    await vi.waitFor(() => expect(set.has("t1")).toBe(false));

    expect(set.spawnIfAbsent("t1")).toBe(true);
    await set.shutdown();
    expect(run).toHaveBeenCalledTimes(2);
  });

  it("stop aborts only that thread's listener", async () => {
    const signals = new Map<string, AbortSignal>();
    const set = new ListenerSet((threadId, signal) => {
      signals.set(threadId, signal);
      return untilAborted(threadId, signal);
    });
    set.spawnIfAbsent("t1");
    set.spawnIfAbsent("t2");
    await vi.waitFor(() => expect(signals.size).toBe(2));

    set.stop("t1");

    expect(signals.get("t1")?.aborted).toBe(true);
    expect(signals.get("t2")?.aborted).toBe(false);
    await vi.waitFor(() => expect(set.has("t1")).toBe(false));
    expect(set.has("t2")).toBe(true);
    await set.shutdown();
  });

  it("keeps a stopped listener registered until it has exited", async () => {
    let finish = () => {};
    const exited = new Promise<void>((resolve) => {
      finish = resolve;
    });
    const run = vi.fn(async (threadId: string, signal: AbortSignal) => {
      await untilAborted(threadId, signal);
      await exited;
    });
    const set = new ListenerSet(run);
    set.spawnIfAbsent("t1");
    await vi.waitFor(() => expect(run).toHaveBeenCalledOnce());

    set.stop("t1");

    expect(set.has("t1")).toBe(true);
    expect(set.spawnIfAbsent("t1")).toBe(false);
    finish();
    await vi.waitFor(() => expect(set.has("t1")).toBe(false));
    expect(set.spawnIfAbsent("t1")).toBe(true);
    await set.shutdown();
    expect(run).toHaveBeenCalledTimes(2);
  });

  it("release ignores a signal from an older listener", async () => {
    const signals: AbortSignal[] = [];
    const set = new ListenerSet((threadId, signal) => {
      signals.push(signal);
      return untilAborted(threadId, signal);
    });
    set.spawnIfAbsent("t1");
    await vi.waitFor(() => expect(signals).toHaveLength(1));
    set.stop("t1");
    await vi.waitFor(() => expect(set.has("t1")).toBe(false));
    set.spawnIfAbsent("t1");
    await vi.waitFor(() => expect(signals).toHaveLength(2));

    set.release("t1", signals[0]);
    expect(set.has("t1")).toBe(true);
    set.release("t1", signals[1]);
    expect(set.has("t1")).toBe(false);
    await set.shutdown();
  });

  it("shutdown waits for every listener to exit", async () => {
    const exited: string[] = [];
    const set = new ListenerSet(async (threadId, signal) => {
      await untilAborted(threadId, signal);
      await new Promise((r) => setTimeout(r, 10));
      exited.push(threadId);
    });
    set.spawnIfAbsent("t1");
    set.spawnIfAbsent("t2");

    await set.shutdown();

    expect(exited.sort()).toEqual(["t1", "t2"]);
    expect(set.size).toBe(0);
    expect(set.spawnIfAbsent("t3")).toBe(false);
  });

  it("survives a crashing listener", async () => {
    const set = new ListenerSet(async () => {
      throw new Error("boom");
    });
    set.spawnIfAbsent("t1");
    await vi.waitFor(() => expect(set.has("t1")).toBe(false));
    await expect(set.shutdown()).resolves.toBeUndefined();
  });
});
