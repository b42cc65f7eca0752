import fs from "node:fs";
import path from "node:path";
import type { CommitRecord, CommitStatus, PersistedSession, SessionRecord } from "./types.js";
import { emptyRuntime } from "./types.js";

const COMMIT_STATUSES: readonly CommitStatus[] = ["pending", "success", "failed", "no_changes"];

/** Strip the runtime fields; only these keys ever reach disk. */
export function toPersisted(record: SessionRecord): PersistedSession {
  return {
    threadId: record.threadId,
    chatId: record.chatId,
    topicId: record.topicId,
    sessionId: record.sessionId,
    model: { providerID: record.model.providerID, modelID: record.model.modelID },
    worktreePath: record.worktreePath,
    branch: record.branch,
    repositoryPath: record.repositoryPath,
    repositoryName: record.repositoryName,
    createdAt: record.createdAt,
    commits: record.commits.map((c) => ({ ...c })),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function str(obj: Record<string, unknown>, key: string): string {
  const value = obj[key];
  if (typeof value !== "string") {
    throw new Error(`expected string at "${key}"`);
  }
  return value;
}

function num(obj: Record<string, unknown>, key: string): number {
  const value = obj[key];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new Error(`expected number at "${key}"`);
  }
  return value;
}

function parseCommit(value: unknown): CommitRecord {
  if (!isRecord(value)) throw new Error("expected commit object");
  const status = COMMIT_STATUSES.find((s) => s === value.status);
  if (!status) throw new Error(`unknown commit status ${String(value.status)}`);
  return {
    hash: str(value, "hash"),
    summary: str(value, "summary"),
    timestamp: str(value, "timestamp"),
    status,
  };
}

/**
 * Validate a decoded session file and build a record with zeroed runtime
 * state. Throws on any shape mismatch.
 */
export function fromPersisted(value: unknown): SessionRecord {
  if (!isRecord(value)) throw new Error("session file is not an object");
  const model = value.model;
  if (!isRecord(model)) throw new Error(`expected object at "model"`);
  const commits = value.commits ?? [];
  if (!Array.isArray(commits)) throw new Error(`expected array at "commits"`);

  return {
    threadId: str(value, "threadId"),
    chatId: num(value, "chatId"),
    topicId: num(value, "topicId"),
    sessionId: str(value, "sessionId"),
    model: { providerID: str(model, "providerID"), modelID: str(model, "modelID") },
    worktreePath: str(value, "worktreePath"),
    branch: str(value, "branch"),
    repositoryPath: str(value, "repositoryPath"),
    repositoryName: str(value, "repositoryName"),
    createdAt: str(value, "createdAt"),
    commits: commits.map(parseCommit),
    runtime: emptyRuntime(),
  };
}

/**
 * One JSON file per thread under `dir`, written atomically.
 */
export class SessionStore {
  constructor(private readonly dir: string) {}

  filePath(threadId: string): string {
    return path.join(this.dir, `${threadId}.json`);
  }

  /**
   * Read a session file. `undefined` when there is none; throws when the
   * file exists but cannot be read or parsed.
   */
  async load(threadId: string): Promise<SessionRecord | undefined> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(this.filePath(threadId), "utf-8");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return undefined;
      throw err;
    }
    return fromPersisted(JSON.parse(raw));
  }

  /**
   * Save with atomic write (temp + rename).
   */
  async save(record: SessionRecord): Promise<void> {
    const target = this.filePath(record.threadId);
    await fs.promises.mkdir(this.dir, { recursive: true });
    const tmp = `${target}.${process.pid}.${Math.random().toString(16).slice(2)}.tmp`;
    const json = JSON.stringify(toPersisted(record), null, 2);
    await fs.promises.writeFile(tmp, json, "utf-8");
    await fs.promises.rename(tmp, target);
  }

  async delete(threadId: string): Promise<void> {
    try {
      await fs.promises.unlink(this.filePath(threadId));
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code !== "ENOENT") throw err;
    }
  }
}
