import path from "node:path";
import type { ModelRef } from "../config.js";
import type { AgentApi } from "../agent/client.js";
import { ProvisioningError, errorMessage } from "../errors.js";
import { log } from "../log.js";
import { KeyedLock } from "./queue.js";
import type { SessionStore } from "./store.js";
import { emptyRuntime, type SessionRecord, type SessionUser } from "./types.js";

export type NewSessionInput = {
  threadId: string;
  chatId: number;
  topicId: number;
  worktreePath: string;
  branch: string;
  repositoryPath: string;
  repositoryName: string;
  model: ModelRef;
  startedBy?: SessionUser;
};

/** Capability to stop a thread's event listener. */
export interface ListenerControl {
  stop(threadId: string): void;
}

export type RegistryDeps = {
  store: SessionStore;
  agent: Pick<AgentApi, "createSession">;
  listeners: ListenerControl;
};

/**
 * In-memory cache of session records, backed by the session store.
 *
 * Anything that awaits between looking a record up and inserting it runs
 * under the thread's lock, so concurrent callers never create a thread's
 * session twice. Disk writes go through a second, independent per-thread
 * queue: `save` is never called while the thread's lock is held.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, SessionRecord>();
  private readonly lock = new KeyedLock();
  private readonly writes = new KeyedLock();

  constructor(private readonly deps: RegistryDeps) {}

  get(threadId: string): SessionRecord | undefined {
    return this.sessions.get(threadId);
  }

  /**
   * Return the thread's session, creating the agent session and the record
   * if neither the cache nor the store has one. An existing record is only
   * marked active. Throws ProvisioningError when the agent refuses.
   */
  async getOrCreate(input: NewSessionInput): Promise<SessionRecord> {
    const { record, created } = await this.lock.run(input.threadId, async () => {
      const existing = await this.loadUnlocked(input.threadId);
      if (existing) {
        existing.runtime.active = true;
        log.info(`[session] Using existing session thread=${input.threadId} session=${existing.sessionId}`);
        return { record: existing, created: false };
      }

      const directory = path.resolve(input.worktreePath);
      let sessionId: string;
      try {
        sessionId = (await this.deps.agent.createSession(directory)).id;
      } catch (err) {
        throw new ProvisioningError(`Failed to create agent session: ${errorMessage(err)}`, { cause: err });
      }

      const fresh: SessionRecord = {
        threadId: input.threadId,
        chatId: input.chatId,
        topicId: input.topicId,
        sessionId,
        model: input.model,
        worktreePath: directory,
        branch: input.branch,
        repositoryPath: input.repositoryPath,
        repositoryName: input.repositoryName,
        createdAt: new Date().toISOString(),
        commits: [],
        runtime: { ...emptyRuntime(true), startedBy: input.startedBy },
      };
      this.sessions.set(input.threadId, fresh);
      log.info(`[session] Created session thread=${input.threadId} session=${sessionId}`);
      return { record: fresh, created: true };
    });

    if (created) {
      try {
        await this.save(record);
      } catch (err) {
        log.error(`[session] Failed to persist new session thread=${input.threadId}:`, errorMessage(err));
      }
    }
    return record;
  }

  /**
   * Cached record, or the one on disk loaded into the cache as inactive.
   * The stored agent session id is trusted as-is. A missing or unreadable
   * file both yield undefined.
   */
  async lazyLoad(threadId: string): Promise<SessionRecord | undefined> {
    const cached = this.sessions.get(threadId);
    if (cached) return cached;
    return this.lock.run(threadId, () => this.loadUnlocked(threadId));
  }

  private async loadUnlocked(threadId: string): Promise<SessionRecord | undefined> {
    const cached = this.sessions.get(threadId);
    if (cached) return cached;

    let loaded: SessionRecord | undefined;
    try {
      loaded = await this.deps.store.load(threadId);
    } catch (err) {
      log.error(`[session] Failed to load session file thread=${threadId}:`, errorMessage(err));
      return undefined;
    }
    if (!loaded) return undefined;
    if (loaded.threadId !== threadId) {
      log.error(`[session] Session file for thread=${threadId} names thread=${loaded.threadId}; ignoring`);
      return undefined;
    }

    this.sessions.set(threadId, loaded);
    log.info(`[session] Lazy loaded session thread=${threadId} session=${loaded.sessionId}`);
    return loaded;
  }

  setActive(threadId: string, active: boolean): SessionRecord | undefined {
    const record = this.sessions.get(threadId);
    if (record) record.runtime.active = active;
    return record;
  }

  setActiveBySessionId(sessionId: string, active: boolean): SessionRecord | undefined {
    for (const record of this.sessions.values()) {
      if (record.sessionId === sessionId) {
        record.runtime.active = active;
        return record;
      }
    }
    return undefined;
  }

  /**
   * Persist a record. Writes for one thread are applied in call order;
   * records already evicted by cleanup are not written back. Errors
   * propagate to the caller.
   */
  async save(record: SessionRecord): Promise<void> {
    await this.writes.run(record.threadId, async () => {
      if (this.sessions.get(record.threadId) !== record) {
        log.debug(`[session] Skipping save for evicted thread=${record.threadId}`);
        return;
      }
      await this.deps.store.save(record);
    });
  }

  /**
   * Stop the thread's listener, then forget the record and delete its file.
   */
  async cleanup(threadId: string): Promise<void> {
    this.deps.listeners.stop(threadId);
    await this.lock.run(threadId, () => {
      this.sessions.delete(threadId);
    });
    await this.writes.run(threadId, () => this.deps.store.delete(threadId));
    log.info(`[session] Cleaned up session thread=${threadId}`);
  }
}
