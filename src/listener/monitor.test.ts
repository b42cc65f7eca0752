import { describe, expect, it, vi } from "vitest";
import type { AgentEvent } from "../agent/events.js";
import { runSessionMonitor } from "./monitor.js";

describe("runSessionMonitor", () => {
  it("marks idle sessions inactive", async () => {
    const controller = new AbortController();
    const setActiveBySessionId = vi.fn((_sessionId: string, _active: boolean) => undefined);
    const events = vi.fn(async function* (): AsyncGenerator<AgentEvent> {
      yield { type: "server.connected" };
      yield { type: "session.idle", sessionID: "ses_1" };
      yield { type: "session.idle", sessionID: "ses_2" };
      controller.abort();
    });

    await runSessionMonitor(controller.signal, { registry: { setActiveBySessionId }, agent: { events } });

    expect(events).toHaveBeenCalledWith({ signal: controller.signal });
    expect(setActiveBySessionId.mock.calls).toEqual([
      ["ses_1", false],
      ["ses_2", false],
    ]);
  });

  it("reconnects after the stream drops", async () => {
    const controller = new AbortController();
    let attempt = 0;
    const events = vi.fn(async function* (): AsyncGenerator<AgentEvent> {
      attempt++;
      if (attempt === 1) throw new Error("socket hang up");
      yield { type: "session.idle", sessionID: "ses_1" };
      controller.abort();
    });
    const setActiveBySessionId = vi.fn((_sessionId: string, _active: boolean) => undefined);
    const sleep = vi.fn(async (_ms: number, _signal: AbortSignal) => undefined);

    await runSessionMonitor(controller.signal, {
      registry: { setActiveBySessionId },
      agent: { events },
      retryDelayMs: 250,
      sleep,
    });

    expect(events).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledOnce();
    expect(sleep).toHaveBeenCalledWith(250, controller.signal);
    expect(setActiveBySessionId).toHaveBeenCalledWith("ses_1", false);
  });

  it("returns at once when already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const events = vi.fn(async function* (): AsyncGenerator<AgentEvent> {});

    await runSessionMonitor(controller.signal, { registry: { setActiveBySessionId: vi.fn() }, agent: { events } });

    expect(events).not.toHaveBeenCalled();
  });
});
