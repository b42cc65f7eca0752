import type { AgentApi } from "../agent/client.js";
import { isPartReady, type Part } from "../agent/events.js";
import { errorMessage } from "../errors.js";
import { log } from "../log.js";
import type { SessionRegistry } from "../session/registry.js";
import type { SessionRecord } from "../session/types.js";
import { appendToHistory, collapseNewlines, formatBlockquote, mentionUser } from "../telegram/format.js";

export type ListenerDeps = {
  registry: Pick<SessionRegistry, "get" | "setActive">;
  agent: Pick<AgentApi, "events">;
  compositor: {
    rebuild(threadId: string): Promise<void>;
    finalize(threadId: string): Promise<void>;
    post(threadId: string, text: string): Promise<unknown>;
  };
  listeners: { release(threadId: string, signal: AbortSignal): void };
};

/** Mention for the user who started the turn; undefined when nobody is known. */
export function completionMessage(record: SessionRecord): string | undefined {
  const who = record.runtime.startedBy;
  return who ? `${mentionUser(who)} task completed` : undefined;
}

/** Fold a finished part into the turn buffers. Returns false when nothing changed. */
export function applyPart(record: SessionRecord, part: Part): boolean {
  const rt = record.runtime;
  switch (part.type) {
    case "tool":
      rt.toolHistory = appendToHistory(rt.toolHistory, formatBlockquote(`tool: ${part.tool}`));
      return true;
    case "reasoning": {
      const text = collapseNewlines(part.text);
      if (!text) return false;
      rt.toolHistory = appendToHistory(rt.toolHistory, formatBlockquote(`thinking: ${text}`));
      return true;
    }
    case "text":
      rt.currentResponse = collapseNewlines(part.text);
      return true;
    default:
      return false;
  }
}

/**
 * Per-thread event listener: follows the agent's event stream for the
 * thread's workspace and mirrors finished parts into the live status
 * message until the session goes idle.
 */
export async function runEventListener(threadId: string, signal: AbortSignal, deps: ListenerDeps): Promise<void> {
  const { registry, agent, compositor, listeners } = deps;
  const record = registry.get(threadId);
  if (!record) {
    log.warn(`[listener] No session for thread=${threadId}`);
    listeners.release(threadId, signal);
    return;
  }

  log.info(`[listener] Listening thread=${threadId} session=${record.sessionId}`);

  try {
    for await (const event of agent.events({ directory: record.worktreePath, signal })) {
      if (signal.aborted) break;

      if (event.type === "server.connected") {
        record.runtime.streaming = true;
        log.debug(`[listener] Connected thread=${threadId}`);
      } else if (event.type === "message.part.updated") {
        const { part } = event;
        if (part.sessionID !== record.sessionId) continue;
        if (!isPartReady(part)) continue;
        if (applyPart(record, part)) await compositor.rebuild(threadId);
      } else if (event.type === "session.idle") {
        if (event.sessionID !== record.sessionId) continue;
        log.info(`[listener] Session idle thread=${threadId}`);
        record.runtime.streaming = false;
        try {
          await compositor.finalize(threadId);
          const done = completionMessage(record);
          if (done) await compositor.post(threadId, done);
        } catch (err) {
          log.error(`[listener] Failed to report completion thread=${threadId}:`, errorMessage(err));
        }
        registry.setActive(threadId, false);
        return;
      } else {
        log.debug(`[listener] Ignoring event ${event.rawType} thread=${threadId}`);
      }
    }
    if (!signal.aborted) log.info(`[listener] Event stream closed thread=${threadId}`);
  } catch (err) {
    log.error(`[listener] Event stream error thread=${threadId}:`, errorMessage(err));
  } finally {
    record.runtime.streaming = false;
    listeners.release(threadId, signal);
  }
}
