/**
 * Inline keyboards for the /session picker.
 */

import { InlineKeyboard } from "grammy";
import type { ModelRef, Repository } from "../../config.js";

export type PickerChoice =
  | { kind: "repository"; repoIndex: number }
  | { kind: "model"; repoIndex: number; modelIndex: number }
  | { kind: "cancel" };

export const PICKER_CALLBACK = /^pick:/;

/**
 * Build a grid of buttons from [label, callbackData] pairs.
 * `columns` controls how many buttons per row (default 2).
 */
export function buildGrid(items: [label: string, data: string][], columns = 2): InlineKeyboard {
  const kb = new InlineKeyboard();
  items.forEach(([label, data], i) => {
    kb.text(label, data);
    if ((i + 1) % columns === 0 || i === items.length - 1) kb.row();
  });
  return kb;
}

export function repositoryKeyboard(repositories: readonly Repository[]): InlineKeyboard {
  return buildGrid(repositories.map((repo, i) => [repo.name, `pick:repo:${i}`])).text("Cancel", "pick:cancel");
}

export function modelKeyboard(repoIndex: number, models: readonly ModelRef[]): InlineKeyboard {
  return buildGrid(
    models.map((m, i) => [`${m.providerID}/${m.modelID}`, `pick:model:${repoIndex}:${i}`]),
    1,
  ).text("Cancel", "pick:cancel");
}

/** Decode picker callback data. Null for anything malformed. */
export function parsePickerData(data: string): PickerChoice | null {
  if (data === "pick:cancel") return { kind: "cancel" };
  const repo = /^pick:repo:(\d+)$/.exec(data);
  if (repo) return { kind: "repository", repoIndex: Number(repo[1]) };
  const model = /^pick:model:(\d+):(\d+)$/.exec(data);
  if (model) return { kind: "model", repoIndex: Number(model[1]), modelIndex: Number(model[2]) };
  return null;
}
