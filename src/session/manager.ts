import crypto from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import type { ModelRef, Repository } from "../config.js";
import type { AgentApi } from "../agent/client.js";
import { ProvisioningError, errorMessage } from "../errors.js";
import { runCommitFlow, type CommitOutcome } from "../git/commit-flow.js";
import type { GitOperations } from "../git/git.js";
import { log } from "../log.js";
import { KeyedLock } from "./queue.js";
import type { SessionRegistry } from "./registry.js";
import { threadKey, type SessionRecord, type SessionUser } from "./types.js";

export const WORKSPACE_BOUNDARY_NOTE = "\n\nImportant: Stay within the current worktree directory for all file operations.";

const ADJECTIVES = ["brave", "calm", "clever", "eager", "gentle", "happy", "lucky", "mellow", "nimble", "quiet", "swift", "witty"];
const NOUNS = ["badger", "comet", "falcon", "harbor", "lantern", "maple", "otter", "pebble", "river", "sparrow", "summit", "willow"];

function pick<T>(items: readonly T[]): T {
  return items[crypto.randomInt(items.length)];
}

/** `agent/<adjective>-<noun>-<4 hex>` */
export function generateBranchName(): string {
  return `agent/${pick(ADJECTIVES)}-${pick(NOUNS)}-${crypto.randomBytes(2).toString("hex")}`;
}

export type StartSessionInput = {
  chatId: number;
  topicId: number;
  repository: Repository;
  model: ModelRef;
  startedBy?: SessionUser;
  /** Defaults to a generated name. */
  branch?: string;
};

export type PromptOutcome = "sent" | "no_session" | "missing_worktree";

export type StopOutcome = "stopped" | "not_running" | "no_session";

export type SessionStatus = {
  record: SessionRecord;
  listening: boolean;
};

export type SessionManagerDeps = {
  registry: SessionRegistry;
  listeners: { spawnIfAbsent(threadId: string): boolean; has(threadId: string): boolean; stop(threadId: string): void };
  agent: Pick<AgentApi, "prompt" | "abort">;
  git: GitOperations;
  worktreesDir: string;
  summarizerInstruction: string;
};

async function pathExists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

/**
 * Session lifecycle as the chat surface sees it: provisioning a workspace,
 * prompting, interrupting, committing and tearing down.
 */
export class SessionManager {
  private readonly commits = new KeyedLock();

  constructor(private readonly deps: SessionManagerDeps) {}

  /**
   * Create the thread's branch, workspace and agent session. On failure the
   * workspace is removed again and ProvisioningError is thrown.
   */
  async startSession(input: StartSessionInput): Promise<SessionRecord> {
    const threadId = threadKey(input.chatId, input.topicId);
    const branch = input.branch ?? generateBranchName();
    const worktreePath = path.join(this.deps.worktreesDir, threadId);

    log.info(`[session] Provisioning thread=${threadId} repo=${input.repository.name} branch=${branch}`);
    try {
      await this.deps.git.addWorktree(input.repository.path, worktreePath, branch);
    } catch (err) {
      throw new ProvisioningError(`Failed to create worktree: ${errorMessage(err)}`, { cause: err });
    }

    try {
      return await this.deps.registry.getOrCreate({
        threadId,
        chatId: input.chatId,
        topicId: input.topicId,
        worktreePath,
        branch,
        repositoryPath: input.repository.path,
        repositoryName: input.repository.name,
        model: input.model,
        startedBy: input.startedBy,
      });
    } catch (err) {
      await this.deps.git.removeWorktree(input.repository.path, worktreePath).catch((rmErr: unknown) => {
        log.error(`[session] Failed to remove worktree after failed start thread=${threadId}:`, errorMessage(rmErr));
      });
      throw err instanceof ProvisioningError ? err : new ProvisioningError(errorMessage(err), { cause: err });
    }
  }

  /**
   * Prompt the thread's agent session. Resolves once the agent has finished
   * the turn; progress reaches the chat through the thread's listener.
   */
  async sendMessage(threadId: string, text: string, from?: SessionUser): Promise<PromptOutcome> {
    const record = await this.deps.registry.lazyLoad(threadId);
    if (!record) return "no_session";
    if (!(await pathExists(record.worktreePath))) {
      log.warn(`[session] Workspace missing thread=${threadId} path=${record.worktreePath}`);
      return "missing_worktree";
    }

    if (from && !record.runtime.startedBy) record.runtime.startedBy = from;
    this.deps.registry.setActive(threadId, true);
    this.deps.listeners.spawnIfAbsent(threadId);

    log.info(`[session] Prompting thread=${threadId} session=${record.sessionId} (${text.length} chars)`);
    try {
      await this.deps.agent.prompt(record.sessionId, {
        directory: record.worktreePath,
        model: record.model,
        text: text + WORKSPACE_BOUNDARY_NOTE,
      });
    } catch (err) {
      this.deps.registry.setActive(threadId, false);
      this.deps.listeners.stop(threadId);
      throw err;
    }
    return "sent";
  }

  /** Interrupt the agent's current turn. */
  async stop(threadId: string): Promise<StopOutcome> {
    const record = await this.deps.registry.lazyLoad(threadId);
    if (!record) return "no_session";
    if (!record.runtime.active) return "not_running";
    await this.deps.agent.abort(record.sessionId, record.worktreePath);
    log.info(`[session] Aborted turn thread=${threadId}`);
    return "stopped";
  }

  /** Forget the session and remove its workspace. False when there was none. */
  async cleanup(threadId: string): Promise<boolean> {
    const record = await this.deps.registry.lazyLoad(threadId);
    await this.deps.registry.cleanup(threadId);
    if (!record) return false;
    await this.deps.git.removeWorktree(record.repositoryPath, record.worktreePath);
    log.info(`[session] Removed worktree thread=${threadId} path=${record.worktreePath}`);
    return true;
  }

  async status(threadId: string): Promise<SessionStatus | undefined> {
    const record = await this.deps.registry.lazyLoad(threadId);
    if (!record) return undefined;
    return { record, listening: this.deps.listeners.has(threadId) };
  }

  /** Commit and push the workspace. One commit runs per thread at a time. */
  async commit(threadId: string): Promise<CommitOutcome | undefined> {
    const record = await this.deps.registry.lazyLoad(threadId);
    if (!record) return undefined;
    return this.commits.run(threadId, () =>
      runCommitFlow(record, {
        agent: this.deps.agent,
        git: this.deps.git,
        save: (r) => this.deps.registry.save(r),
        summarizerInstruction: this.deps.summarizerInstruction,
      }),
    );
  }

  async diff(threadId: string): Promise<string | undefined> {
    const record = await this.deps.registry.lazyLoad(threadId);
    if (!record) return undefined;
    return this.deps.git.diff(record.worktreePath);
  }
}
