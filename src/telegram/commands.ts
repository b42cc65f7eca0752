import type { Context } from "grammy";
import type { ModelRef, Repository } from "../config.js";
import { errorMessage } from "../errors.js";
import { NO_DIFF } from "../git/git.js";
import { log } from "../log.js";
import { generateBranchName, type SessionManager } from "../session/manager.js";
import { threadKey, type SessionRecord, type SessionUser } from "../session/types.js";
import { chunkDiff } from "./chunking.js";
import { isTelegramParseError, markdownToTelegramHtml } from "./format.js";
import { commitOutcomeMessages, replies, statusMessage, welcomeMessage } from "./replies.js";
import { modelKeyboard, parsePickerData, repositoryKeyboard } from "./ui/keyboards.js";

export type CommandDeps = {
  manager: SessionManager;
  repositories: readonly Repository[];
  models: readonly ModelRef[];
};

type Handler = (ctx: Context) => Promise<void>;

/** `<chatId>_<topicId>` for messages posted inside a forum topic. */
export function threadIdOf(ctx: Context): string | undefined {
  const msg = ctx.msg;
  if (!msg?.is_topic_message || msg.message_thread_id === undefined) return undefined;
  return threadKey(msg.chat.id, msg.message_thread_id);
}

export function userOf(ctx: Context): SessionUser | undefined {
  const from = ctx.from;
  if (!from) return undefined;
  const name = [from.first_name, from.last_name].filter(Boolean).join(" ") || from.username || String(from.id);
  return { id: from.id, name };
}

/** Reply with Markdown in the same topic, falling back to plain text. */
export async function replyMarkdown(ctx: Context, text: string): Promise<void> {
  const target = ctx.msg?.is_topic_message ? { message_thread_id: ctx.msg.message_thread_id } : {};
  try {
    await ctx.reply(markdownToTelegramHtml(text), { ...target, parse_mode: "HTML" });
  } catch (err) {
    if (!isTelegramParseError(err)) throw err;
    await ctx.reply(text, target);
  }
}

/** Run `body` with the thread id, or reply with a hint outside a session topic. */
function inThread(body: (ctx: Context, threadId: string) => Promise<void>): Handler {
  return async (ctx) => {
    const threadId = threadIdOf(ctx);
    if (!threadId) {
      await replyMarkdown(ctx, replies.notInSession);
      return;
    }
    await body(ctx, threadId);
  };
}

export async function handleStart(ctx: Context): Promise<void> {
  await replyMarkdown(ctx, replies.help);
}

export function handleSession(deps: CommandDeps): Handler {
  return async (ctx) => {
    const chat = ctx.chat;
    if (!chat || chat.type !== "supergroup" || !chat.is_forum) {
      await replyMarkdown(ctx, replies.needsForum);
      return;
    }
    const target = ctx.msg?.is_topic_message ? { message_thread_id: ctx.msg.message_thread_id } : {};
    await ctx.reply(replies.pickRepository, { ...target, reply_markup: repositoryKeyboard(deps.repositories) });
  };
}

/** The part of grammy's `Api` that opens a session topic. */
export interface TopicApi {
  createForumTopic(chatId: number, name: string): Promise<{ message_thread_id: number }>;
  deleteForumTopic(chatId: number, topicId: number): Promise<unknown>;
  sendMessage(chatId: number, text: string, other?: { message_thread_id?: number; parse_mode?: "HTML" }): Promise<unknown>;
}

export type OpenTopicInput = {
  chatId: number;
  repository: Repository;
  model: ModelRef;
  branch: string;
  startedBy?: SessionUser;
};

/**
 * Create a forum topic named after the branch and start its session. The
 * topic is deleted again when the session cannot be started; once it has
 * started, a failed welcome message is only logged.
 */
export async function openSessionTopic(
  api: TopicApi,
  manager: Pick<SessionManager, "startSession">,
  input: OpenTopicInput,
): Promise<SessionRecord> {
  const { chatId, branch } = input;
  const topicId = (await api.createForumTopic(chatId, branch)).message_thread_id;

  let record: SessionRecord;
  try {
    record = await manager.startSession({ ...input, topicId });
  } catch (err) {
    await api.deleteForumTopic(chatId, topicId).catch((delErr: unknown) => {
      log.warn(`[session] Failed to delete topic ${topicId}:`, errorMessage(delErr));
    });
    throw err;
  }

  await api
    .sendMessage(chatId, markdownToTelegramHtml(welcomeMessage(record)), { message_thread_id: topicId, parse_mode: "HTML" })
    .catch((err: unknown) => {
      log.warn(`[session] Failed to post welcome thread=${record.threadId}:`, errorMessage(err));
    });
  return record;
}

/** Callback handler for the repository → model picker. */
export function handlePicker(deps: CommandDeps): Handler {
  return async (ctx) => {
    const choice = parsePickerData(ctx.callbackQuery?.data ?? "");
    const chatId = ctx.chat?.id;
    if (!choice || chatId === undefined) {
      await ctx.answerCallbackQuery({ text: replies.unknownChoice });
      return;
    }

    if (choice.kind === "cancel") {
      await ctx.answerCallbackQuery();
      await ctx.deleteMessage();
      return;
    }

    const repository = deps.repositories[choice.repoIndex];
    if (!repository) {
      await ctx.answerCallbackQuery({ text: replies.unknownChoice });
      return;
    }

    if (choice.kind === "repository") {
      await ctx.answerCallbackQuery();
      await ctx.editMessageText(markdownToTelegramHtml(replies.pickModel(repository.name)), {
        parse_mode: "HTML",
        reply_markup: modelKeyboard(choice.repoIndex, deps.models),
      });
      return;
    }

    const model = deps.models[choice.modelIndex];
    if (!model) {
      await ctx.answerCallbackQuery({ text: replies.unknownChoice });
      return;
    }
    await ctx.answerCallbackQuery({ text: "Starting session..." });

    const branch = generateBranchName();
    try {
      await openSessionTopic(ctx.api, deps.manager, { chatId, repository, model, branch, startedBy: userOf(ctx) });
    } catch (err) {
      log.error(`[session] Start failed chat=${chatId} branch=${branch}:`, errorMessage(err));
      await ctx.editMessageText(replies.startFailed);
      return;
    }
    await ctx.editMessageText(`Session started in topic "${branch}".`).catch((err: unknown) => {
      log.warn(`[session] Failed to update picker chat=${chatId}:`, errorMessage(err));
    });
  };
}

export function handleCommit(deps: CommandDeps): Handler {
  return inThread(async (ctx, threadId) => {
    await replyMarkdown(ctx, replies.committing);
    const outcome = await deps.manager.commit(threadId);
    if (!outcome) {
      await replyMarkdown(ctx, replies.noSession);
      return;
    }
    for (const message of commitOutcomeMessages(outcome)) {
      await replyMarkdown(ctx, message);
    }
  });
}

export function handleDiff(deps: CommandDeps): Handler {
  return inThread(async (ctx, threadId) => {
    let diff: string | undefined;
    try {
      diff = await deps.manager.diff(threadId);
    } catch (err) {
      log.error(`[diff] Failed thread=${threadId}:`, errorMessage(err));
      await replyMarkdown(ctx, replies.diffFailed);
      return;
    }
    if (diff === undefined) {
      await replyMarkdown(ctx, replies.noSession);
      return;
    }
    if (diff === NO_DIFF) {
      await replyMarkdown(ctx, NO_DIFF);
      return;
    }
    for (const chunk of chunkDiff(diff)) {
      await replyMarkdown(ctx, chunk);
    }
  });
}

export function handleStatus(deps: CommandDeps): Handler {
  return inThread(async (ctx, threadId) => {
    const status = await deps.manager.status(threadId);
    if (!status) {
      await replyMarkdown(ctx, replies.noSession);
      return;
    }
    await replyMarkdown(ctx, statusMessage(status.record, status.listening));
  });
}

export function handleStop(deps: CommandDeps): Handler {
  return inThread(async (ctx, threadId) => {
    try {
      const outcome = await deps.manager.stop(threadId);
      const text = outcome === "stopped" ? replies.stopped : outcome === "not_running" ? replies.notRunning : replies.noSession;
      await replyMarkdown(ctx, text);
    } catch (err) {
      log.error(`[session] Stop failed thread=${threadId}:`, errorMessage(err));
      await replyMarkdown(ctx, replies.stopFailed);
    }
  });
}

export function handleCleanup(deps: CommandDeps): Handler {
  return inThread(async (ctx, threadId) => {
    let existed: boolean;
    try {
      existed = await deps.manager.cleanup(threadId);
    } catch (err) {
      log.error(`[session] Cleanup failed thread=${threadId}:`, errorMessage(err));
      await replyMarkdown(ctx, replies.cleanupFailed);
      return;
    }
    if (!existed) {
      await replyMarkdown(ctx, replies.noSession);
      return;
    }
    await replyMarkdown(ctx, replies.cleanedUp);
    const msg = ctx.msg;
    if (msg?.message_thread_id !== undefined) {
      await ctx.api.closeForumTopic(msg.chat.id, msg.message_thread_id).catch((err: unknown) => {
        log.warn(`[session] Failed to close topic thread=${threadId}:`, errorMessage(err));
      });
    }
  });
}

/**
 * Prompt text of a message addressed to the bot: one that @mentions it or
 * replies to one of its messages. Undefined when the bot is not addressed.
 */
export function promptFromMessage(ctx: Context, botId: number, botUsername: string): string | undefined {
  const msg = ctx.msg;
  const text = msg?.text;
  if (!msg || text === undefined) return undefined;

  const handle = `@${botUsername}`.toLowerCase();
  const mentioned = (msg.entities ?? []).some(
    (e) => e.type === "mention" && text.slice(e.offset, e.offset + e.length).toLowerCase() === handle,
  );
  // In a topic every message "replies" to the topic's creation message
  const reply = msg.reply_to_message;
  const repliedToBot = reply !== undefined && reply.message_id !== msg.message_thread_id && reply.from?.id === botId;
  if (!mentioned && !repliedToBot) return undefined;

  const pattern = new RegExp(`@${botUsername.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")}\\b`, "gi");
  return text.replace(pattern, "").trim();
}

/** Forward a message that addresses the bot to the topic's agent session. */
export function handleMention(deps: CommandDeps): Handler {
  return async (ctx) => {
    const prompt = promptFromMessage(ctx, ctx.me.id, ctx.me.username);
    if (prompt === undefined) return;

    const threadId = threadIdOf(ctx);
    if (!threadId) {
      await replyMarkdown(ctx, replies.notInSession);
      return;
    }
    if (!prompt) {
      await replyMarkdown(ctx, replies.emptyPrompt);
      return;
    }

    const topicId = ctx.msg?.message_thread_id;
    await ctx.replyWithChatAction("typing", topicId !== undefined ? { message_thread_id: topicId } : {}).catch(
      (err: unknown) => log.debug("[telegram] Typing indicator failed:", errorMessage(err)),
    );

    // Not awaited: the call lasts for the whole agent turn
    void deps.manager
      .sendMessage(threadId, prompt, userOf(ctx))
      .then(async (outcome) => {
        if (outcome === "no_session") await replyMarkdown(ctx, replies.noSession);
        else if (outcome === "missing_worktree") await replyMarkdown(ctx, replies.missingWorktree);
      })
      .catch(async (err: unknown) => {
        log.error(`[session] Prompt failed thread=${threadId}:`, errorMessage(err));
        await replyMarkdown(ctx, replies.promptFailed).catch((replyErr: unknown) => {
          log.error("[telegram] Failed to report prompt failure:", errorMessage(replyErr));
        });
      });
  };
}
