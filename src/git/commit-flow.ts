import fs from "node:fs/promises";
import type { AgentApi } from "../agent/client.js";
import type { TextPart } from "../agent/events.js";
import { errorMessage, GitError } from "../errors.js";
import { log } from "../log.js";
import type { CommitRecord, CommitStatus, SessionRecord } from "../session/types.js";
import type { GitOperations } from "./git.js";

export const DEFAULT_SUMMARY = "Changes made during session";
export const SUMMARY_MAX_CHARS = 72;

/** Tool switches for the summarizer turn: it may read, never write. */
export const SUMMARIZER_TOOLS = { write: false, edit: false } as const;

export type CommitStage = "status" | "add" | "commit" | "branch" | "push";

export type CommitOutcome =
  | { kind: "missing_worktree" }
  | { kind: "summary_failed"; error: string }
  | { kind: "no_changes"; commit: CommitRecord }
  | { kind: "failed"; stage: CommitStage; output: string; commit: CommitRecord }
  | { kind: "success"; commit: CommitRecord; branch: string; prLink?: string; pushOutput: string };

export type CommitFlowDeps = {
  agent: Pick<AgentApi, "prompt">;
  git: GitOperations;
  /** Persist the record; failures are logged by the flow. */
  save: (record: SessionRecord) => Promise<void>;
  summarizerInstruction: string;
};

/** First line of the agent's draft, cut to a commit subject's length. */
export function summaryFromText(text: string | undefined): string {
  const firstLine = (text ?? "")
    .split("\n")
    .map((line) => line.trim())
    .find((line) => line !== "");
  if (!firstLine) return DEFAULT_SUMMARY;
  return firstLine.length > SUMMARY_MAX_CHARS ? firstLine.slice(0, SUMMARY_MAX_CHARS).trimEnd() : firstLine;
}

/**
 * Link to open a pull/merge request for `branch`, for GitHub and GitLab
 * remotes in HTTPS or SSH form. Empty for any other host.
 */
export function constructPRLink(remoteUrl: string, branch: string): string {
  const url = remoteUrl.trim().replace(/\.git$/, "");
  const match = /^https:\/\/(github\.com|gitlab\.com)\/(.+)$/.exec(url) ?? /^git@(github\.com|gitlab\.com):(.+)$/.exec(url);
  if (!match) return "";
  const [, host, repo] = match;
  if (host === "github.com") return `https://github.com/${repo}/compare/${branch}?expand=1`;
  return `https://gitlab.com/${repo}/-/merge_requests/new?merge_request[source_branch]=${branch}`;
}

function gitOutput(err: unknown): string {
  return err instanceof GitError ? err.output : errorMessage(err);
}

/**
 * Summarize, stage, commit and push the session's workspace, recording the
 * attempt in the session's commit history.
 *
 * The history gets a `pending` entry once a summary exists; exactly one
 * later step settles it to `no_changes`, `failed` or `success`. A failed
 * push keeps the local commit's hash.
 */
export async function runCommitFlow(record: SessionRecord, deps: CommitFlowDeps): Promise<CommitOutcome> {
  const { threadId, worktreePath } = record;
  const tag = `thread=${threadId}`;

  try {
    await fs.access(worktreePath);
  } catch {
    log.warn(`[commit] Workspace missing ${tag} path=${worktreePath}`);
    return { kind: "missing_worktree" };
  }

  let summary: string;
  try {
    const response = await deps.agent.prompt(record.sessionId, {
      directory: worktreePath,
      model: record.model,
      text: deps.summarizerInstruction,
      tools: { ...SUMMARIZER_TOOLS },
    });
    const textPart = response.parts.find((p): p is TextPart => p.type === "text" && p.text.trim() !== "");
    summary = summaryFromText(textPart?.text);
  } catch (err) {
    log.error(`[commit] Summary generation failed ${tag}:`, errorMessage(err));
    return { kind: "summary_failed", error: errorMessage(err) };
  }
  log.info(`[commit] Summary ${tag}: ${summary}`);

  const commit: CommitRecord = { hash: "", summary, timestamp: new Date().toISOString(), status: "pending" };
  record.commits.push(commit);

  const settle = async (status: CommitStatus, hash?: string): Promise<void> => {
    commit.status = status;
    if (hash !== undefined) commit.hash = hash;
    try {
      await deps.save(record);
    } catch (err) {
      log.error(`[commit] Failed to persist commit status=${status} ${tag}:`, errorMessage(err));
    }
  };

  const fail = async (stage: CommitStage, err: unknown, hash?: string): Promise<CommitOutcome> => {
    log.error(`[commit] git ${stage} failed ${tag}:`, errorMessage(err));
    await settle("failed", hash);
    return { kind: "failed", stage, output: gitOutput(err), commit };
  };

  try {
    const status = await deps.git.status(worktreePath);
    if (status.clean) {
      log.info(`[commit] Nothing to commit ${tag}`);
      await settle("no_changes");
      return { kind: "no_changes", commit };
    }
  } catch (err) {
    return fail("status", err);
  }

  try {
    await deps.git.addAll(worktreePath);
  } catch (err) {
    return fail("add", err);
  }

  let hash: string;
  try {
    hash = await deps.git.commit(worktreePath, summary);
  } catch (err) {
    return fail("commit", err);
  }

  let branch: string;
  try {
    branch = await deps.git.currentBranch(worktreePath);
  } catch (err) {
    return fail("branch", err, hash);
  }

  let pushOutput: string;
  try {
    pushOutput = await deps.git.push(worktreePath, branch);
  } catch (err) {
    return fail("push", err, hash);
  }

  await settle("success", hash);
  log.info(`[commit] Pushed ${hash.slice(0, 8)} to ${branch} ${tag}`);

  let prLink: string | undefined;
  try {
    prLink = constructPRLink(await deps.git.remoteUrl(worktreePath), branch) || undefined;
  } catch (err) {
    log.debug(`[commit] No remote URL ${tag}:`, errorMessage(err));
  }

  return { kind: "success", commit, branch, prLink, pushOutput };
}
