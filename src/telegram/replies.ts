import type { CommitOutcome, CommitStage } from "../git/commit-flow.js";
import type { SessionRecord } from "../session/types.js";
import { chunkFenced } from "./chunking.js";
import { SAFETY_MARGIN, TELEGRAM_MAX_CHARS } from "./compositor.js";

/** Every fixed string the bot shows users. Markdown, rendered by format.ts. */
export const replies = {
  help: [
    "**worktree-relay**",
    "",
    "/session - start a coding session in a new topic",
    "/commit - commit and push the session's changes",
    "/diff - show uncommitted changes",
    "/status - show the session's state",
    "/stop - interrupt the agent's current turn",
    "/cleanup - end the session and remove its workspace",
    "",
    "Inside a session topic, mention me (or reply to me) to prompt the agent.",
  ].join("\n"),
  notAllowed: "You are not allowed to use this bot.",
  needsForum: "Sessions run in forum topics. Enable topics for this group and try again.",
  notInSession: "Use this command inside a session topic. Start one with /session.",
  noSession: "No session found for this topic. Start one with /session.",
  pickRepository: "Pick a repository:",
  pickModel: (repository: string) => `Repository: **${repository}**\nPick a model:`,
  unknownChoice: "That option is no longer available. Run /session again.",
  startFailed: "Failed to start session.",
  promptFailed: "Failed to send the message to the agent.",
  emptyPrompt: "Mention me together with what you want the agent to do.",
  stopped: "Stopping the current turn.",
  notRunning: "The agent is not working on anything.",
  stopFailed: "Failed to stop the agent.",
  cleanedUp: "Session ended and workspace removed.",
  cleanupFailed: "Failed to clean up the session.",
  diffFailed: "Failed to get diff.",
  committing: "Generating commit message...",
  missingWorktree: "Worktree directory not found. Please start a new session.",
  summaryFailed: "Failed to generate summary.",
  noChanges: "No changes to commit.",
};

export function welcomeMessage(record: SessionRecord): string {
  return [
    "**Session started**",
    "",
    `**Repository:** ${record.repositoryName}`,
    `**Model:** \`${record.model.providerID}/${record.model.modelID}\``,
    `**Branch:** \`${record.branch}\``,
    `**Session:** \`${record.sessionId.slice(0, 12)}\``,
    "",
    "Mention me in this topic to give the agent a task.",
  ].join("\n");
}

export function statusMessage(record: SessionRecord, listening: boolean): string {
  const last = record.commits.at(-1);
  const lines = [
    `**Repository:** ${record.repositoryName}`,
    `**Branch:** \`${record.branch}\``,
    `**Model:** \`${record.model.providerID}/${record.model.modelID}\``,
    `**Agent:** ${record.runtime.active ? "working" : "idle"}${listening ? " (streaming)" : ""}`,
    `**Commits:** ${record.commits.filter((c) => c.status === "success").length}`,
  ];
  if (last) lines.push(`**Last commit:** ${last.summary} (${last.status.replace("_", " ")})`);
  return lines.join("\n");
}

const STAGE_FAILURE: Record<CommitStage, string> = {
  status: "Failed to check the workspace status.",
  add: "Failed to stage changes.",
  commit: "Failed to commit changes.",
  branch: "Failed to determine the current branch.",
  push: "Failed to push changes.",
};

const MESSAGE_BUDGET = TELEGRAM_MAX_CHARS - SAFETY_MARGIN;

/**
 * A heading followed by git's output in a code block. Output too long to
 * share one message with the heading follows in separate fenced chunks.
 */
function withOutput(head: string, output: string): string[] {
  if (!output) return [head];
  const safe = output.replace(/```/g, "'''");
  const single = `${head}\n\n\`\`\`\n${safe}\n\`\`\``;
  if (single.length <= MESSAGE_BUDGET) return [single];
  return [head, ...chunkFenced(safe, "", MESSAGE_BUDGET)];
}

/** The chat messages that report a commit outcome, in order. */
export function commitOutcomeMessages(outcome: CommitOutcome): string[] {
  switch (outcome.kind) {
    case "missing_worktree":
      return [replies.missingWorktree];
    case "summary_failed":
      return [replies.summaryFailed];
    case "no_changes":
      return [replies.noChanges];
    case "failed": {
      const head = STAGE_FAILURE[outcome.stage];
      const hash = outcome.commit.hash ? `\n**Local commit:** \`${outcome.commit.hash.slice(0, 12)}\`` : "";
      return withOutput(`${head}${hash}`, outcome.output);
    }
    case "success": {
      let message =
        `**Commit & Push Successful**\n\n**Summary:** ${outcome.commit.summary}\n` +
        `**Hash:** \`${outcome.commit.hash}\`\n**Branch:** \`${outcome.branch}\``;
      if (outcome.prLink) message += `\n\n**Pull Request:** ${outcome.prLink}`;
      return outcome.pushOutput ? withOutput(`${message}\n\n**Git Push Output:**`, outcome.pushOutput) : [message];
    }
  }
}
