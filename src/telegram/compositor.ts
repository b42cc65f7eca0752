import { config } from "../config.js";
import { errorMessage } from "../errors.js";
import { log } from "../log.js";
import type { SessionRecord } from "../session/types.js";
import { isNotModifiedError, isTelegramParseError, markdownToTelegramHtml, tailAtLineBoundary } from "./format.js";

export const TELEGRAM_MAX_CHARS = 4096;
export const SAFETY_MARGIN = 200;

export const ACTIVITY_HEADER = "🛠 Agent activity";
export const CONTINUED_HEADER = "🛠 Agent activity (continued)";
export const CONTINUED_MARKER = "\n\n⤵ continued below";
const RESPONSE_LABEL = "Response:\n";

type SendOptions = {
  message_thread_id?: number;
  parse_mode?: "HTML";
};

/** The part of grammy's `Api` the compositor writes through. */
export interface ChatApi {
  sendMessage(chatId: number, text: string, other?: SendOptions): Promise<{ message_id: number }>;
  editMessageText(chatId: number, messageId: number, text: string, other?: SendOptions): Promise<unknown>;
}

/** Read access to cached records. */
export interface RecordSource {
  get(threadId: string): SessionRecord | undefined;
}

export type CompositorOptions = {
  editIntervalMs?: number;
  maxChars?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
};

function combineBuffers(history: string, response: string): string {
  const sections: string[] = [];
  if (history) sections.push(history);
  if (response) sections.push(RESPONSE_LABEL + response);
  return sections.join("\n\n");
}

export function composeBody(header: string, history: string, response: string): string {
  const combined = combineBuffers(history, response);
  return combined ? `${header}\n\n${combined}` : header;
}

/**
 * Keeps one live "agent activity" message per thread in sync with the
 * thread's turn buffers.
 *
 * The live message is edited in place while it fits; once it would exceed
 * Telegram's limit the old message gets a continuation marker and a new one
 * takes over with the newest content. Once that message is sent, the turn
 * buffers are trimmed to what it shows.
 */
export class MessageCompositor {
  readonly editIntervalMs: number;
  readonly budget: number;
  private readonly lastWriteAt = new Map<string, number>();
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly api: ChatApi,
    private readonly records: RecordSource,
    opts: CompositorOptions = {},
  ) {
    this.editIntervalMs = opts.editIntervalMs ?? config.editIntervalMs;
    this.budget = (opts.maxChars ?? TELEGRAM_MAX_CHARS) - SAFETY_MARGIN;
    this.now = opts.now ?? Date.now;
    this.sleep = opts.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  /** Bring the live message in line with the thread's buffers. Never throws. */
  async rebuild(threadId: string): Promise<void> {
    const record = this.records.get(threadId);
    if (!record) return;
    try {
      await this.sync(record);
    } catch (err) {
      log.warn(`[compositor] Status update failed thread=${threadId}:`, errorMessage(err));
    }
  }

  /**
   * Flush the live message one last time and reset the turn state, so the
   * next turn starts a fresh status message.
   */
  async finalize(threadId: string): Promise<void> {
    const record = this.records.get(threadId);
    if (!record) return;
    const rt = record.runtime;
    if (rt.statusMessageId !== undefined || rt.toolHistory || rt.currentResponse) {
      await this.rebuild(threadId);
    }
    rt.toolHistory = "";
    rt.currentResponse = "";
    rt.statusMessageId = undefined;
    rt.statusMessageContent = "";
    rt.statusContinued = false;
    this.lastWriteAt.delete(threadId);
  }

  /** Send a one-off Markdown message to the thread. */
  async post(threadId: string, text: string): Promise<number | undefined> {
    const record = this.records.get(threadId);
    if (!record) {
      log.warn(`[compositor] No session to post to thread=${threadId}`);
      return undefined;
    }
    return this.send(record, text);
  }

  private async sync(record: SessionRecord): Promise<void> {
    const rt = record.runtime;
    const header = rt.statusContinued ? CONTINUED_HEADER : ACTIVITY_HEADER;
    const body = composeBody(header, rt.toolHistory, rt.currentResponse);

    if (body.length <= this.budget) {
      if (rt.statusMessageId !== undefined) {
        if (body === rt.statusMessageContent) return;
        await this.edit(record, rt.statusMessageId, body);
      } else {
        rt.statusMessageId = await this.send(record, body);
      }
      rt.statusMessageContent = body;
      return;
    }

    if (rt.statusMessageId !== undefined) {
      try {
        await this.edit(record, rt.statusMessageId, rt.statusMessageContent + CONTINUED_MARKER);
      } catch (err) {
        log.warn(`[compositor] Could not mark message continued thread=${record.threadId}:`, errorMessage(err));
      }
    }

    const kept = this.keepNewest(rt.toolHistory, rt.currentResponse);
    const next = composeBody(CONTINUED_HEADER, kept.history, kept.response);
    rt.statusMessageId = await this.send(record, next);
    rt.toolHistory = kept.history;
    rt.currentResponse = kept.response;
    rt.statusMessageContent = next;
    rt.statusContinued = true;
    log.debug(`[compositor] Continued status message thread=${record.threadId}`);
  }

  /** The newest whole lines of the buffers that fit a continuation message. */
  private keepNewest(history: string, response: string): { history: string; response: string } {
    const room = this.budget - CONTINUED_HEADER.length - 2;
    const responseSection = response ? RESPONSE_LABEL.length + response.length : 0;

    if (responseSection > room) {
      return { history: "", response: tailAtLineBoundary(response, room - RESPONSE_LABEL.length) };
    }
    const historyRoom = room - responseSection - (responseSection > 0 ? 2 : 0);
    return { history: tailAtLineBoundary(history, historyRoom), response };
  }

  private async throttle(threadId: string): Promise<void> {
    const last = this.lastWriteAt.get(threadId);
    if (last !== undefined) {
      const wait = last + this.editIntervalMs - this.now();
      if (wait > 0) await this.sleep(wait);
    }
    this.lastWriteAt.set(threadId, this.now());
  }

  private async send(record: SessionRecord, text: string): Promise<number> {
    await this.throttle(record.threadId);
    const target = { message_thread_id: record.topicId };
    try {
      const sent = await this.api.sendMessage(record.chatId, markdownToTelegramHtml(text), {
        ...target,
        parse_mode: "HTML",
      });
      return sent.message_id;
    } catch (err) {
      if (!isTelegramParseError(err)) throw err;
      const sent = await this.api.sendMessage(record.chatId, text, target);
      return sent.message_id;
    }
  }

  private async edit(record: SessionRecord, messageId: number, text: string): Promise<void> {
    await this.throttle(record.threadId);
    try {
      await this.api.editMessageText(record.chatId, messageId, markdownToTelegramHtml(text), { parse_mode: "HTML" });
    } catch (err) {
      if (isNotModifiedError(err)) return;
      if (!isTelegramParseError(err)) throw err;
      await this.api.editMessageText(record.chatId, messageId, text);
    }
  }
}
