import type { AgentApi } from "../agent/client.js";
import { errorMessage } from "../errors.js";
import { log } from "../log.js";
import type { SessionRegistry } from "../session/registry.js";

export type MonitorDeps = {
  registry: Pick<SessionRegistry, "setActiveBySessionId">;
  agent: Pick<AgentApi, "events">;
  retryDelayMs?: number;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
};

function delay(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(done, ms);
    function done() {
      clearTimeout(timer);
      signal.removeEventListener("abort", done);
      resolve();
    }
    signal.addEventListener("abort", done, { once: true });
  });
}

/**
 * Server-wide watcher on the unscoped event stream. Marks any cached session
 * inactive when the agent reports it idle, including sessions that have no
 * per-thread listener. Reconnects after a dropped stream until `signal` aborts.
 */
export async function runSessionMonitor(signal: AbortSignal, deps: MonitorDeps): Promise<void> {
  const retryDelayMs = deps.retryDelayMs ?? 5000;
  const sleep = deps.sleep ?? delay;

  while (!signal.aborted) {
    try {
      for await (const event of deps.agent.events({ signal })) {
        if (event.type === "server.connected") {
          log.info("[monitor] Connected to agent event stream");
        } else if (event.type === "session.idle") {
          const record = deps.registry.setActiveBySessionId(event.sessionID, false);
          if (record) log.debug(`[monitor] Session idle thread=${record.threadId}`);
        }
      }
    } catch (err) {
      log.warn("[monitor] Event stream error:", errorMessage(err));
    }
    if (signal.aborted) break;
    await sleep(retryDelayMs, signal);
  }
  log.info("[monitor] Stopped");
}
