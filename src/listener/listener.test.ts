import { describe, expect, it, vi } from "vitest";
import type { AgentEvent, Part, ReasoningPart, TextPart, ToolPart, ToolState } from "../agent/events.js";
import { AgentError } from "../errors.js";
import { emptyRuntime, type SessionRecord } from "../session/types.js";
import { completionMessage, runEventListener, type ListenerDeps } from "./listener.js";

function record(): SessionRecord {
  return {
    threadId: "-100123_42",
    chatId: -100123,
    topicId: 42,
    sessionId: "ses_1",
    model: { providerID: "test-provider", modelID: "test-model" },
    worktreePath: "/tmp/worktrees/-100123_42",
    branch: "agent/calm-otter-1a2b",
    repositoryPath: "/tmp/demo-repo",
    repositoryName: "demo",
    createdAt: "2026-01-15T12:00:00.000Z",
    commits: [],
    runtime: { ...emptyRuntime(true), startedBy: { id: 7, name: "Ann" } },
  };
}

const ids = { id: "prt", sessionID: "ses_1", messageID: "msg_1" };

function text(value: string, time: { start: number; end?: number }, sessionID = "ses_1"): TextPart {
  return { ...ids, sessionID, type: "text", text: value, time };
}

function reasoning(value: string, time: { start: number; end?: number }): ReasoningPart {
  return { ...ids, type: "reasoning", text: value, time };
}

function tool(name: string, state: ToolState): ToolPart {
  return { ...ids, type: "tool", callID: "call_1", tool: name, state };
}

const running: ToolState = { status: "running", input: {}, time: { start: 1 } };
const completed: ToolState = {
  status: "completed",
  input: {},
  output: "",
  title: "bash",
  metadata: {},
  time: { start: 1, end: 2 },
};

function updated(part: Part): AgentEvent {
  return { type: "message.part.updated", part };
}

function harness(events: AgentEvent[] | (() => AsyncGenerator<AgentEvent>)) {
  const rec = record();
  const calls: string[] = [];
  const snapshots: { toolHistory: string; currentResponse: string }[] = [];
  const streamingAtRebuild: boolean[] = [];

  const stream =
    typeof events === "function"
      ? events
      : async function* () {
          for (const event of events) yield event;
        };

  const deps = {
    registry: {
      get: vi.fn((threadId: string) => (threadId === rec.threadId ? rec : undefined)),
      setActive: vi.fn((_threadId: string, active: boolean) => {
        calls.push(`setActive:${active}`);
        rec.runtime.active = active;
        return rec;
      }),
    },
    agent: { events: vi.fn(() => stream()) },
    compositor: {
      rebuild: vi.fn(async () => {
        snapshots.push({ toolHistory: rec.runtime.toolHistory, currentResponse: rec.runtime.currentResponse });
        streamingAtRebuild.push(rec.runtime.streaming);
      }),
      finalize: vi.fn(async () => {
        calls.push(`finalize:streaming=${rec.runtime.streaming}`);
      }),
      post: vi.fn(async (_threadId: string, text: string) => {
        calls.push(`post:${text}`);
      }),
    },
    listeners: {
      release: vi.fn(() => {
        calls.push("release");
      }),
    },
  } satisfies ListenerDeps;

  return { rec, deps, calls, snapshots, streamingAtRebuild };
}

const signal = () => new AbortController().signal;

describe("runEventListener", () => {
  it("surfaces a tool only once it has completed", async () => {
    const { deps, snapshots } = harness([
      updated(tool("bash", running)),
      updated(tool("bash", completed)),
    ]);

    await runEventListener("-100123_42", signal(), deps);

    expect(deps.compositor.rebuild).toHaveBeenCalledOnce();
    expect(snapshots).toEqual([{ toolHistory: "> tool: bash", currentResponse: "" }]);
  });

  it("appends reasoning and replaces the response", async () => {
    const { deps, snapshots } = harness([
      updated(reasoning("plan\n\nit", { start: 1, end: 2 })),
      updated(text("first", { start: 1, end: 2 })),
      updated(text("\nsecond\n\n\nanswer\n", { start: 1, end: 3 })),
    ]);

    await runEventListener("-100123_42", signal(), deps);

    expect(snapshots).toEqual([
      { toolHistory: "> thinking: plan\n> it", currentResponse: "" },
      { toolHistory: "> thinking: plan\n> it", currentResponse: "first" },
      { toolHistory: "> thinking: plan\n> it", currentResponse: "second\nanswer" },
    ]);
  });

  it("ignores unfinished parts, step markers and other sessions", async () => {
    const { deps } = harness([
      updated(text("partial", { start: 1 })),
      updated({ ...ids, type: "step-start" }),
      updated(text("elsewhere", { start: 1, end: 2 }, "ses_other")),
      { type: "session.idle", sessionID: "ses_other" },
      { type: "unknown", rawType: "file.edited" },
    ]);

    await runEventListener("-100123_42", signal(), deps);

    expect(deps.compositor.rebuild).not.toHaveBeenCalled();
    expect(deps.compositor.finalize).not.toHaveBeenCalled();
  });

  it("finishes the turn when the session goes idle", async () => {
    const { rec, deps, calls } = harness([
      { type: "server.connected" },
      updated(text("done", { start: 1, end: 2 })),
      { type: "session.idle", sessionID: "ses_1" },
      updated(text("after idle", { start: 3, end: 4 })),
    ]);

    await runEventListener("-100123_42", signal(), deps);

    expect(calls).toEqual([
      "finalize:streaming=false",
      "post:[Ann](tg://user?id=7) task completed",
      "setActive:false",
      "release",
    ]);
    expect(deps.compositor.rebuild).toHaveBeenCalledOnce();
    expect(rec.runtime.active).toBe(false);
    expect(rec.runtime.streaming).toBe(false);
  });

  it("deregisters quietly when the stream fails", async () => {
    const { rec, deps, calls } = harness(async function* () {
      yield { type: "server.connected" } satisfies AgentEvent;
      throw new AgentError("Event stream dropped (socket hang up)");
    });

    await expect(runEventListener("-100123_42", signal(), deps)).resolves.toBeUndefined();

    expect(calls).toEqual(["release"]);
    expect(rec.runtime.streaming).toBe(false);
    expect(rec.runtime.active).toBe(true);
  });

  it("marks the session streaming once the server confirms the subscription", async () => {
    const { deps, streamingAtRebuild } = harness([
      updated(text("early", { start: 1, end: 2 })),
      { type: "server.connected" },
      updated(text("later", { start: 3, end: 4 })),
    ]);

    await runEventListener("-100123_42", signal(), deps);

    expect(streamingAtRebuild).toEqual([false, true]);
  });

  it("still marks the session inactive when the completion post fails", async () => {
    const { rec, deps, calls } = harness([
      { type: "server.connected" },
      { type: "session.idle", sessionID: "ses_1" },
    ]);
    deps.compositor.post.mockRejectedValueOnce(new Error("Bad Request: message thread not found"));

    await runEventListener("-100123_42", signal(), deps);

    expect(calls).toEqual(["finalize:streaming=false", "setActive:false", "release"]);
    expect(rec.runtime.active).toBe(false);
  });

  it("skips the completion mention when nobody started the turn", async () => {
    const { rec, deps, calls } = harness([{ type: "session.idle", sessionID: "ses_1" }]);
    rec.runtime.startedBy = undefined;

    await runEventListener("-100123_42", signal(), deps);

    expect(deps.compositor.post).not.toHaveBeenCalled();
    expect(calls).toEqual(["finalize:streaming=false", "setActive:false", "release"]);
  });

  it("subscribes to the session's workspace with its own signal", async () => {
    const { deps } = harness([]);
    const abort = new AbortController();

    await runEventListener("-100123_42", abort.signal, deps);

    expect(deps.agent.events).toHaveBeenCalledWith({ directory: "/tmp/worktrees/-100123_42", signal: abort.signal });
    expect(deps.listeners.release).toHaveBeenCalledWith("-100123_42", abort.signal);
  });

  it("returns at once for an unknown thread", async () => {
    const { deps } = harness([]);
    await runEventListener("-1_1", signal(), deps);
    expect(deps.agent.events).not.toHaveBeenCalled();
    expect(deps.listeners.release).toHaveBeenCalledOnce();
  });
});

describe("completionMessage", () => {
  it("mentions the user who started the turn", () => {
    expect(completionMessage(record())).toBe("[Ann](tg://user?id=7) task completed");
  });

  it("has nothing to say without a known user", () => {
    const rec = record();
    rec.runtime.startedBy = undefined;
    expect(completionMessage(rec)).toBeUndefined();
  });
});
