import { GrammyError } from "grammy";
import { describe, expect, it, vi } from "vitest";
import { emptyRuntime, type SessionRecord } from "../session/types.js";
import {
  ACTIVITY_HEADER,
  CONTINUED_HEADER,
  MessageCompositor,
  composeBody,
  type ChatApi,
} from "./compositor.js";

const THREAD = "-100123_42";

function record(): SessionRecord {
  return {
    threadId: THREAD,
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
    runtime: emptyRuntime(true),
  };
}

function setup(opts: { maxChars?: number } = {}) {
  const rec = record();
  let nextId = 1;
  const api = {
    sendMessage: vi.fn(async (_chatId: number, _text: string, _other?: object) => ({ message_id: nextId++ })),
    editMessageText: vi.fn(async (_chatId: number, _messageId: number, _text: string, _other?: object): Promise<unknown> => true),
  } satisfies ChatApi;
  const sleep = vi.fn(async (_ms: number) => undefined);
  const compositor = new MessageCompositor(api, { get: (id) => (id === THREAD ? rec : undefined) }, {
    editIntervalMs: 1200,
    maxChars: opts.maxChars,
    now: () => 1000,
    sleep,
  });
  return { rec, api, sleep, compositor };
}

function parseError(): GrammyError {
  return new GrammyError(
    "Call to 'sendMessage' failed!",
    { ok: false, error_code: 400, description: "Bad Request: can't parse entities: unsupported start tag" },
    "sendMessage",
    {},
  );
}

describe("composeBody", () => {
  it("puts the header first and the response last", () => {
    expect(composeBody(ACTIVITY_HEADER, "> tool: bash", "done")).toBe(
      "🛠 Agent activity\n\n> tool: bash\n\nResponse:\ndone",
    );
  });

  it("is just the header when nothing happened yet", () => {
    expect(composeBody(ACTIVITY_HEADER, "", "")).toBe("🛠 Agent activity");
  });
});

describe("MessageCompositor", () => {
  it("creates the live message in the thread's topic", async () => {
    const { rec, api, compositor } = setup();
    rec.runtime.toolHistory = "> tool: bash";

    await compositor.rebuild(THREAD);

    expect(api.sendMessage).toHaveBeenCalledWith(
      -100123,
      "🛠 Agent activity\n\n<blockquote>tool: bash</blockquote>",
      { message_thread_id: 42, parse_mode: "HTML" },
    );
    expect(rec.runtime.statusMessageId).toBe(1);
    expect(rec.runtime.statusMessageContent).toBe("🛠 Agent activity\n\n> tool: bash");
  });

  it("edits the live message in place and skips identical content", async () => {
    const { rec, api, compositor } = setup();
    rec.runtime.toolHistory = "> tool: bash";
    await compositor.rebuild(THREAD);

    rec.runtime.currentResponse = "all good";
    await compositor.rebuild(THREAD);
    await compositor.rebuild(THREAD);

    expect(api.sendMessage).toHaveBeenCalledOnce();
    expect(api.editMessageText).toHaveBeenCalledOnce();
    expect(api.editMessageText).toHaveBeenCalledWith(
      -100123,
      1,
      "🛠 Agent activity\n\n<blockquote>tool: bash</blockquote>\n\nResponse:\nall good",
      { parse_mode: "HTML" },
    );
  });

  it("spaces writes to one thread by the edit interval", async () => {
    const { rec, sleep, compositor } = setup();
    rec.runtime.toolHistory = "> tool: a";
    await compositor.rebuild(THREAD);
    rec.runtime.toolHistory = "> tool: a\n> tool: b";
    await compositor.rebuild(THREAD);

    expect(sleep).toHaveBeenCalledOnce();
    expect(sleep).toHaveBeenCalledWith(1200);
  });

  it("continues in a new message when the body would overflow", async () => {
    const { rec, api, compositor } = setup({ maxChars: 300 });
    rec.runtime.toolHistory = "> tool: a";
    await compositor.rebuild(THREAD);

    const lines = Array.from({ length: 10 }, (_, i) => `> tool: t${i}`);
    rec.runtime.toolHistory = lines.join("\n");
    await compositor.rebuild(THREAD);

    expect(api.editMessageText).toHaveBeenCalledWith(
      -100123,
      1,
      "🛠 Agent activity\n\n<blockquote>tool: a</blockquote>\n\n⤵ continued below",
      { parse_mode: "HTML" },
    );
    const kept = lines.slice(4).join("\n");
    expect(rec.runtime.toolHistory).toBe(kept);
    expect(rec.runtime.statusMessageId).toBe(2);
    expect(rec.runtime.statusMessageContent).toBe(`${CONTINUED_HEADER}\n\n${kept}`);
    expect(rec.runtime.statusMessageContent.length).toBeLessThanOrEqual(100);
    expect(rec.runtime.statusContinued).toBe(true);
  });

  it("keeps the buffers and the marker when the continuation send fails", async () => {
    const { rec, api, compositor } = setup({ maxChars: 300 });
    const lines = Array.from({ length: 11 }, (_, i) => `> tool: t${i}`);
    rec.runtime.toolHistory = lines.slice(0, 3).join("\n");
    await compositor.rebuild(THREAD);

    api.sendMessage.mockRejectedValueOnce(new Error("network down"));
    rec.runtime.toolHistory = lines.slice(0, 10).join("\n");
    await compositor.rebuild(THREAD);

    expect(rec.runtime.toolHistory).toBe(lines.slice(0, 10).join("\n"));
    expect(rec.runtime.statusMessageId).toBe(1);
    expect(rec.runtime.statusContinued).toBe(false);

    rec.runtime.toolHistory = lines.join("\n");
    await compositor.rebuild(THREAD);

    const marked = "🛠 Agent activity\n\n<blockquote>tool: t0\ntool: t1\ntool: t2</blockquote>\n\n⤵ continued below";
    for (const [, messageId, text] of api.editMessageText.mock.calls) {
      expect(messageId).toBe(1);
      expect(text).toBe(marked);
    }
    expect(rec.runtime.statusMessageId).toBe(2);
    expect(rec.runtime.toolHistory).toBe(lines.slice(5).join("\n"));
    expect(rec.runtime.statusContinued).toBe(true);
  });

  it("keeps the continuation header for later edits", async () => {
    const { rec, api, compositor } = setup({ maxChars: 300 });
    rec.runtime.toolHistory = Array.from({ length: 10 }, (_, i) => `> tool: t${i}`).join("\n");
    await compositor.rebuild(THREAD);

    rec.runtime.toolHistory = rec.runtime.toolHistory.replace("t9", "T9");
    await compositor.rebuild(THREAD);

    expect(api.sendMessage).toHaveBeenCalledOnce();
    expect(api.editMessageText).toHaveBeenCalledOnce();
    expect(rec.runtime.statusMessageId).toBe(1);
    expect(rec.runtime.statusMessageContent.startsWith(`${CONTINUED_HEADER}\n\n`)).toBe(true);
    expect(rec.runtime.statusMessageContent.endsWith("> tool: T9")).toBe(true);
  });

  it("keeps only the end of a response too long for one message", async () => {
    const { rec, compositor } = setup({ maxChars: 300 });
    rec.runtime.toolHistory = "> tool: a";
    rec.runtime.currentResponse = Array.from({ length: 20 }, (_, i) => `answer line ${String(i).padStart(2, "0")}`).join("\n");

    await compositor.rebuild(THREAD);

    expect(rec.runtime.toolHistory).toBe("");
    expect(rec.runtime.currentResponse.endsWith("answer line 19")).toBe(true);
    expect(rec.runtime.currentResponse.startsWith("answer line ")).toBe(true);
    expect(rec.runtime.statusMessageContent.length).toBeLessThanOrEqual(100);
  });

  it("falls back to plain text when Telegram rejects the HTML", async () => {
    const { rec, api, compositor } = setup();
    api.sendMessage.mockRejectedValueOnce(parseError());
    rec.runtime.currentResponse = "x";

    await compositor.rebuild(THREAD);

    expect(api.sendMessage).toHaveBeenLastCalledWith(-100123, "🛠 Agent activity\n\nResponse:\nx", {
      message_thread_id: 42,
    });
    expect(rec.runtime.statusMessageId).toBe(1);
  });

  it("logs and carries on when sending fails", async () => {
    const { rec, api, compositor } = setup();
    api.sendMessage.mockRejectedValueOnce(new Error("network down"));
    rec.runtime.currentResponse = "x";

    await expect(compositor.rebuild(THREAD)).resolves.toBeUndefined();
    expect(rec.runtime.statusMessageId).toBeUndefined();
  });

  it("finalize flushes and resets the turn", async () => {
    const { rec, api, compositor } = setup();
    rec.runtime.toolHistory = "> tool: a";
    await compositor.rebuild(THREAD);
    rec.runtime.currentResponse = "final";

    await compositor.finalize(THREAD);

    expect(api.editMessageText).toHaveBeenCalledOnce();
    expect(rec.runtime).toMatchObject({
      toolHistory: "",
      currentResponse: "",
      statusMessageId: undefined,
      statusMessageContent: "",
      statusContinued: false,
    });
  });

  it("finalize sends nothing for an empty turn", async () => {
    const { api, compositor } = setup();
    await compositor.finalize(THREAD);
    expect(api.sendMessage).not.toHaveBeenCalled();
  });

  it("posts one-off messages to the thread", async () => {
    const { api, compositor } = setup();

    await expect(compositor.post(THREAD, "[Ann](tg://user?id=7) task completed")).resolves.toBe(1);
    await expect(compositor.post("-1_1", "lost")).resolves.toBeUndefined();

    expect(api.sendMessage).toHaveBeenCalledOnce();
    expect(api.sendMessage).toHaveBeenCalledWith(-100123, '<a href="tg://user?id=7">Ann</a> task completed', {
      message_thread_id: 42,
      parse_mode: "HTML",
    });
  });
});
