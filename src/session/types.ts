import type { ModelRef } from "../config.js";

export type CommitStatus = "pending" | "success" | "failed" | "no_changes";

export type CommitRecord = {
  /** Empty until the local commit succeeded. */
  hash: string;
  summary: string;
  timestamp: string;
  status: CommitStatus;
};

export type SessionUser = {
  id: number;
  name: string;
};

/** Live, never-persisted state of a session. Reset on reload. */
export type SessionRuntime = {
  active: boolean;
  streaming: boolean;
  /** Id of the status message currently being edited in place. */
  statusMessageId?: number;
  /** Body last written to the status message. */
  statusMessageContent: string;
  /** The live message is a continuation of an overflowed one. */
  statusContinued: boolean;
  /** Tool/reasoning narration for the current turn, blockquoted. */
  toolHistory: string;
  /** Latest text response for the current turn. */
  currentResponse: string;
  startedBy?: SessionUser;
};

export type PersistedSession = {
  /** `<chatId>_<topicId>`; see threadKey(). */
  threadId: string;
  chatId: number;
  topicId: number;
  sessionId: string;
  model: ModelRef;
  worktreePath: string;
  branch: string;
  repositoryPath: string;
  repositoryName: string;
  createdAt: string;
  commits: CommitRecord[];
};

export type SessionRecord = PersistedSession & {
  runtime: SessionRuntime;
};

export function emptyRuntime(active = false): SessionRuntime {
  return {
    active,
    streaming: false,
    statusMessageContent: "",
    statusContinued: false,
    toolHistory: "",
    currentResponse: "",
  };
}

/** A thread is one forum topic in one chat. */
export function threadKey(chatId: number, topicId: number): string {
  return `${chatId}_${topicId}`;
}
