import { errorMessage } from "../errors.js";
import { log } from "../log.js";

/** Body of a per-thread listener. Must return promptly once `signal` aborts. */
export type ListenerTask = (threadId: string, signal: AbortSignal) => Promise<void>;

type Entry = {
  controller: AbortController;
  task: Promise<void>;
};

/**
 * Supervised set of per-thread listener tasks.
 *
 * At most one listener runs per thread. Each holds its own AbortController,
 * chained to the set's parent signal, and every task is tracked until it
 * has actually exited so shutdown can wait for all of them.
 */
export class ListenerSet {
  private readonly entries = new Map<string, Entry>();
  private readonly running = new Set<Promise<void>>();
  private readonly parent = new AbortController();

  constructor(private readonly run: ListenerTask) {}

  get size(): number {
    return this.entries.size;
  }

  has(threadId: string): boolean {
    return this.entries.has(threadId);
  }

  /**
   * Start a listener for the thread unless one is registered already.
   * Returns true when a new listener was started.
   */
  spawnIfAbsent(threadId: string): boolean {
    if (this.parent.signal.aborted) return false;
    if (this.entries.has(threadId)) return false;

    const controller = new AbortController();
    const onParentAbort = () => controller.abort();
    this.parent.signal.addEventListener("abort", onParentAbort, { once: true });

    // Registered before the task body can run, so a fast-exiting listener
    // deregisters its own entry and not a later one
    const entry: Entry = { controller, task: Promise.resolve() };
    this.entries.set(threadId, entry);

    const task = Promise.resolve()
      .then(() => this.run(threadId, controller.signal))
      .catch((err: unknown) => {
        log.error(`[listener] Listener crashed thread=${threadId}:`, errorMessage(err));
      })
      .finally(() => {
        this.parent.signal.removeEventListener("abort", onParentAbort);
        if (this.entries.get(threadId) === entry) this.entries.delete(threadId);
        this.running.delete(task);
      });
    entry.task = task;
    this.running.add(task);

    log.debug(`[listener] Spawned listener thread=${threadId}`);
    return true;
  }

  /**
   * Deregister the thread's listener if `signal` is still the one it was
   * started with. Listeners call this on their way out.
   */
  release(threadId: string, signal: AbortSignal): void {
    const entry = this.entries.get(threadId);
    if (entry && entry.controller.signal === signal) {
      this.entries.delete(threadId);
    }
  }

  /**
   * Cancel one thread's listener. The entry stays until the task has
   * exited, so no second listener starts for the thread in the meantime.
   */
  stop(threadId: string): void {
    const entry = this.entries.get(threadId);
    if (!entry) return;
    entry.controller.abort();
    log.debug(`[listener] Stopping listener thread=${threadId}`);
  }

  /**
   * Cancel every listener and wait until each task has exited. No listener
   * can be spawned afterwards.
   */
  async shutdown(): Promise<void> {
    this.parent.abort();
    this.entries.clear();
    await Promise.allSettled([...this.running]);
    log.info("[listener] All listeners stopped");
  }
}
