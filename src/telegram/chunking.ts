import { TELEGRAM_MAX_CHARS } from "./compositor.js";

const FENCE_CLOSE = "\n```";

/**
 * Split text into ``` fenced blocks of at most `limit` characters each,
 * breaking only between lines. Removing the fences and joining the contents
 * with "\n" gives back the input, as long as no single line is longer than a
 * block can hold; such lines are cut hard.
 */
export function chunkFenced(text: string, lang = "", limit = TELEGRAM_MAX_CHARS): string[] {
  if (!text) return [];
  const open = "```" + lang + "\n";
  const room = limit - open.length - FENCE_CLOSE.length;
  if (room <= 0) throw new RangeError(`Chunk limit ${limit} leaves no room for content`);

  const contents: string[] = [];
  let current: string[] = [];
  let currentLen = 0;

  const flush = () => {
    contents.push(current.join("\n"));
    current = [];
    currentLen = 0;
  };

  for (const line of text.split("\n")) {
    if (line.length > room) {
      if (current.length > 0) flush();
      for (let i = 0; i < line.length; i += room) contents.push(line.slice(i, i + room));
      continue;
    }
    const added = current.length > 0 ? line.length + 1 : line.length;
    if (current.length > 0 && currentLen + added > room) flush();
    currentLen += current.length > 0 ? line.length + 1 : line.length;
    current.push(line);
  }
  if (current.length > 0) flush();

  return contents.map((content) => open + content + FENCE_CLOSE);
}

/** A diff as ```diff blocks; see `chunkFenced`. */
export function chunkDiff(diff: string, limit = TELEGRAM_MAX_CHARS): string[] {
  return chunkFenced(diff, "diff", limit);
}
