import { execFile } from "node:child_process";
import fs from "node:fs/promises";
import path from "node:path";
import { promisify } from "node:util";
import { GitError, errorMessage } from "../errors.js";
import { log } from "../log.js";

const execFileAsync = promisify(execFile);

const AUTHOR_NAME = "worktree-relay bot";
const AUTHOR_EMAIL = "worktree-relay@localhost";
const MAX_BUFFER = 16 * 1024 * 1024;

export const NO_DIFF = "No changes to show.";

export type GitStatus = {
  clean: boolean;
  /** `git status --porcelain` lines. */
  entries: string[];
};

/** Everything the relay asks of git. Tests substitute a fake. */
export interface GitOperations {
  addWorktree(repoPath: string, worktreePath: string, branch: string): Promise<void>;
  removeWorktree(repoPath: string, worktreePath: string): Promise<void>;
  status(worktreePath: string): Promise<GitStatus>;
  addAll(worktreePath: string): Promise<void>;
  /** Commit staged changes; returns the new commit hash. */
  commit(worktreePath: string, message: string): Promise<string>;
  currentBranch(worktreePath: string): Promise<string>;
  /** Push the branch to origin with upstream tracking; returns git's output. */
  push(worktreePath: string, branch: string): Promise<string>;
  remoteUrl(worktreePath: string): Promise<string>;
  diff(worktreePath: string): Promise<string>;
  isRepository(dir: string): Promise<boolean>;
}

type ExecOutput = { stdout: string; stderr: string; message: string };

/** stdout/stderr carried by a rejected execFile call. */
function failureOutput(err: unknown): ExecOutput {
  if (!(err instanceof Error)) return { stdout: "", stderr: "", message: String(err) };
  const stdout = "stdout" in err && typeof err.stdout === "string" ? err.stdout : "";
  const stderr = "stderr" in err && typeof err.stderr === "string" ? err.stderr : "";
  return { stdout, stderr, message: err.message };
}

function combinedOutput(stdout: string, stderr: string): string {
  return [stdout, stderr].map((s) => s.trim()).filter(Boolean).join("\n");
}

/** git via the command line, one child process per call. */
export class GitCli implements GitOperations {
  constructor(private readonly binary = "git") {}

  private async git(operation: string, cwd: string, args: string[]): Promise<string> {
    log.debug(`[git] ${operation}: git ${args.join(" ")} (cwd=${cwd})`);
    try {
      const { stdout, stderr } = await execFileAsync(this.binary, args, {
        cwd,
        maxBuffer: MAX_BUFFER,
        env: { ...process.env, GIT_TERMINAL_PROMPT: "0" },
      });
      return combinedOutput(stdout, stderr);
    } catch (err) {
      const failure = failureOutput(err);
      const output = combinedOutput(failure.stdout, failure.stderr) || failure.message;
      throw new GitError(operation, output, err);
    }
  }

  private async stdout(operation: string, cwd: string, args: string[]): Promise<string> {
    try {
      const { stdout } = await execFileAsync(this.binary, args, { cwd, maxBuffer: MAX_BUFFER });
      return stdout;
    } catch (err) {
      const failure = failureOutput(err);
      throw new GitError(operation, failure.stderr.trim() || failure.message, err);
    }
  }

  async addWorktree(repoPath: string, worktreePath: string, branch: string): Promise<void> {
    await fs.mkdir(path.dirname(worktreePath), { recursive: true });
    await this.git("worktree add", repoPath, ["worktree", "add", "-b", branch, worktreePath]);
  }

  async removeWorktree(repoPath: string, worktreePath: string): Promise<void> {
    try {
      await this.git("worktree remove", repoPath, ["worktree", "remove", "--force", worktreePath]);
    } catch (err) {
      log.warn(`[git] worktree remove failed for ${worktreePath}; deleting directory instead:`, errorMessage(err));
      await fs.rm(worktreePath, { recursive: true, force: true });
      await this.git("worktree prune", repoPath, ["worktree", "prune"]);
    }
  }

  async status(worktreePath: string): Promise<GitStatus> {
    const out = await this.stdout("status", worktreePath, ["status", "--porcelain"]);
    const entries = out.split("\n").filter((line) => line.trim() !== "");
    return { clean: entries.length === 0, entries };
  }

  async addAll(worktreePath: string): Promise<void> {
    await this.git("add", worktreePath, ["add", "--all"]);
  }

  async commit(worktreePath: string, message: string): Promise<string> {
    await this.git("commit", worktreePath, [
      "-c",
      `user.name=${AUTHOR_NAME}`,
      "-c",
      `user.email=${AUTHOR_EMAIL}`,
      "commit",
      "--no-verify",
      "-m",
      message,
    ]);
    return (await this.stdout("rev-parse", worktreePath, ["rev-parse", "HEAD"])).trim();
  }

  async currentBranch(worktreePath: string): Promise<string> {
    const branch = (await this.stdout("branch", worktreePath, ["branch", "--show-current"])).trim();
    if (!branch) throw new GitError("branch", "HEAD is detached");
    return branch;
  }

  async push(worktreePath: string, branch: string): Promise<string> {
    const fetched = await this.git("fetch", worktreePath, ["fetch", "origin"]);
    const pushed = await this.git("push", worktreePath, ["push", "--set-upstream", "origin", branch]);
    return combinedOutput(fetched, pushed);
  }

  async remoteUrl(worktreePath: string): Promise<string> {
    return (await this.stdout("remote", worktreePath, ["remote", "get-url", "origin"])).trim();
  }

  async diff(worktreePath: string): Promise<string> {
    const out = await this.stdout("diff", worktreePath, [
      "diff",
      "--minimal",
      "--ignore-all-space",
      "--diff-filter=ACMR",
    ]);
    const trimmed = out.trim();
    return trimmed || NO_DIFF;
  }

  async isRepository(dir: string): Promise<boolean> {
    try {
      const out = await this.stdout("rev-parse", dir, ["rev-parse", "--is-inside-work-tree"]);
      return out.trim() === "true";
    } catch {
      return false;
    }
  }
}
