import { Bot, GrammyError, HttpError } from "grammy";
import { config } from "../config.js";
import { log } from "../log.js";
import {
  handleCleanup,
  handleCommit,
  handleDiff,
  handleMention,
  handlePicker,
  handleSession,
  handleStart,
  handleStatus,
  handleStop,
  type CommandDeps,
} from "./commands.js";
import { replies } from "./replies.js";
import { PICKER_CALLBACK } from "./ui/keyboards.js";

export const BOT_COMMANDS = [
  { command: "session", description: "Start a coding session in a new topic" },
  { command: "commit", description: "Commit and push the session's changes" },
  { command: "diff", description: "Show uncommitted changes" },
  { command: "status", description: "Show the session's state" },
  { command: "stop", description: "Interrupt the agent's current turn" },
  { command: "cleanup", description: "End the session and remove its workspace" },
  { command: "start", description: "Show help" },
];

export function createBot(deps: CommandDeps, token = config.telegramBotToken): Bot {
  const bot = new Bot(token);

  // Access control middleware
  bot.use(async (ctx, next) => {
    const userId = ctx.from?.id;
    if (!userId) return;

    if (config.allowedUsers.length > 0 && !config.allowedUsers.includes(userId)) {
      log.warn(`[access] Unauthorized user: ${userId} (${ctx.from?.username ?? "unknown"})`);
      if (ctx.callbackQuery) await ctx.answerCallbackQuery({ text: replies.notAllowed });
      else if (ctx.chat?.type === "private") await ctx.reply(replies.notAllowed);
      return;
    }

    await next();
  });

  bot.command("start", handleStart);
  bot.command("help", handleStart);
  bot.command("session", handleSession(deps));
  bot.command("commit", handleCommit(deps));
  bot.command("diff", handleDiff(deps));
  bot.command("status", handleStatus(deps));
  bot.command("stop", handleStop(deps));
  bot.command("cleanup", handleCleanup(deps));

  bot.callbackQuery(PICKER_CALLBACK, handlePicker(deps));

  bot.on("message:text", handleMention(deps));

  bot.catch((err) => {
    const where = `update ${err.ctx.update.update_id}`;
    if (err.error instanceof GrammyError) {
      log.error(`[telegram] Request failed in ${where}:`, err.error.description);
    } else if (err.error instanceof HttpError) {
      log.error(`[telegram] Could not reach Telegram in ${where}:`, err.error.message);
    } else {
      log.error(`[telegram] Handler error in ${where}:`, err.error);
    }
  });

  return bot;
}
