import { GrammyError } from "grammy";

/**
 * Text shaping for agent output, and Markdown → Telegram HTML rendering.
 *
 * Everything the relay posts is composed as lightweight Markdown first
 * (so length budgets are computed on what the user reads) and rendered to
 * Telegram's HTML subset at send time.
 */

/** Prefix every non-blank line with "> ". Blank lines are dropped. */
export function formatBlockquote(text: string): string {
  return text
    .replace(/\n+$/, "")
    .split("\n")
    .filter((line) => line !== "")
    .map((line) => `> ${line}`)
    .join("\n");
}

/** Trim surrounding newlines and collapse every run of newlines into one. */
export function collapseNewlines(text: string): string {
  return text.replace(/^\n+|\n+$/g, "").replace(/\n{2,}/g, "\n");
}

/** Append a fragment on its own line. */
export function appendToHistory(existing: string, fragment: string): string {
  if (!existing) return fragment;
  if (existing.endsWith("\n")) return existing + fragment;
  return `${existing}\n${fragment}`;
}

/**
 * Longest suffix of `text` no longer than `max` that starts at a line
 * boundary. A single line longer than `max` is cut hard.
 */
export function tailAtLineBoundary(text: string, max: number): string {
  if (max <= 0) return "";
  if (text.length <= max) return text;
  const cut = text.length - max;
  if (text[cut - 1] === "\n") return text.slice(cut);
  const nextLine = text.indexOf("\n", cut);
  if (nextLine === -1) return text.slice(cut);
  return text.slice(nextLine + 1);
}

/** Markdown link that pings a Telegram user by id. */
export function mentionUser(user: { id: number; name: string }): string {
  const label = user.name.replace(/[[\]()]/g, "").trim() || "user";
  return `[${label}](tg://user?id=${user.id})`;
}

function escapeHtml(s: string): string {
  return s.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

/**
 * Convert the Markdown subset the relay emits to Telegram HTML.
 * Handles unclosed code fences, which appear while output is still streaming.
 */
export function markdownToTelegramHtml(md: string): string {
  const stash: string[] = [];
  const hold = (html: string): string => {
    stash.push(html);
    return `\x00${stash.length - 1}\x00`;
  };
  const codeBlock = (lang: string, code: string): string => {
    const cls = lang ? ` class="language-${escapeHtml(lang)}"` : "";
    return hold(`<pre><code${cls}>${escapeHtml(code.trimEnd())}</code></pre>`);
  };

  let t = md;
  t = t.replace(/```(\w*)\n?([\s\S]*?)```/g, (_, lang: string, code: string) => codeBlock(lang, code));
  t = t.replace(/```(\w*)\n?([\s\S]+)$/, (_, lang: string, code: string) => codeBlock(lang, code));
  t = t.replace(/`([^`\n]+)`/g, (_, code: string) => hold(`<code>${escapeHtml(code)}</code>`));

  t = escapeHtml(t);

  t = t.replace(/\*\*(.+?)\*\*/g, "<b>$1</b>");
  t = t.replace(/(?<!\w)\*(.+?)\*(?!\w)/g, "<i>$1</i>");
  t = t.replace(/~~(.+?)~~/g, "<s>$1</s>");
  t = t.replace(/\[([^\]]+)\]\(([^)\s]+)\)/g, '<a href="$2">$1</a>');
  t = t.replace(/^#{1,6}\s+(.+)$/gm, "<b>$1</b>");
  t = t.replace(/(?:^&gt;[ \t]?.*$\n?)+/gm, (match) => {
    const lines = match.trimEnd().split("\n").map((l) => l.replace(/^&gt;[ \t]?/, ""));
    return `<blockquote>${lines.join("\n")}</blockquote>\n`;
  });
  t = t.replace(/<\/blockquote>\n$/, "</blockquote>");

  return t.replace(/\x00(\d+)\x00/g, (_, i: string) => stash[Number(i)] ?? "");
}

/** Telegram 400 for malformed HTML entities. */
export function isTelegramParseError(err: unknown): boolean {
  return err instanceof GrammyError && err.error_code === 400 && /can't parse entities/i.test(err.description);
}

/** Telegram 400 for an edit whose content equals the current content. */
export function isNotModifiedError(err: unknown): boolean {
  return err instanceof GrammyError && err.error_code === 400 && /message is not modified/i.test(err.description);
}
