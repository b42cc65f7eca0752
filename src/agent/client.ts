import { createOpencodeClient, type OpencodeClient } from "@opencode-ai/sdk";
import type { ModelRef } from "../config.js";
import { AgentError, errorMessage } from "../errors.js";
import { log } from "../log.js";
import { toAgentEvent, type AgentEvent, type Part } from "./events.js";

export type AgentSession = {
  id: string;
  directory?: string;
};

export type PromptRequest = {
  /** Absolute workspace path the turn is scoped to. */
  directory: string;
  model: ModelRef;
  text: string;
  /** Per-turn tool switches, e.g. `{ write: false, edit: false }`. */
  tools?: Record<string, boolean>;
};

export type PromptResponse = {
  messageId?: string;
  parts: Part[];
};

export type EventStreamOptions = {
  /** Scope the stream to one workspace; omit for every session on the server. */
  directory?: string;
  signal: AbortSignal;
};

/**
 * The slice of the agent server the relay depends on. Tests substitute a
 * fake; production code uses AgentClient.
 */
export interface AgentApi {
  createSession(directory: string): Promise<AgentSession>;
  prompt(sessionId: string, req: PromptRequest): Promise<PromptResponse>;
  abort(sessionId: string, directory: string): Promise<boolean>;
  events(opts: EventStreamOptions): AsyncIterable<AgentEvent>;
}

/** What every SDK call resolves to when it does not throw. */
type SdkResult<T> = {
  data?: T;
  error?: unknown;
  response?: Response;
};

function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  const json = JSON.stringify(error);
  return json === undefined ? String(error) : json.slice(0, 300);
}

/**
 * Client for an opencode agent server, built on the opencode SDK. Stateless
 * between calls, so one instance is shared by every session.
 */
export class AgentClient implements AgentApi {
  readonly baseUrl: string;
  private readonly sdk: OpencodeClient;

  constructor(baseUrl: string, fetchFn?: typeof fetch) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
    this.sdk = createOpencodeClient(fetchFn ? { baseUrl: this.baseUrl, fetch: fetchFn } : { baseUrl: this.baseUrl });
  }

  /** Unwrap an SDK result, turning transport failures and error answers into AgentError. */
  private async call<T>(what: string, run: () => Promise<SdkResult<T>>): Promise<T> {
    let result: SdkResult<T>;
    try {
      result = await run();
    } catch (err) {
      throw new AgentError(`${what}: agent unreachable (${errorMessage(err)})`, { cause: err });
    }
    const status = result.response?.status;
    if (result.error !== undefined || result.data === undefined) {
      throw new AgentError(`${what} failed${status ? ` with status ${status}` : ""}: ${describeError(result.error)}`, {
        status,
      });
    }
    return result.data;
  }

  async createSession(directory: string): Promise<AgentSession> {
    const session = await this.call("Session create", () => this.sdk.session.create({ query: { directory } }));
    if (!session.id) throw new AgentError("Session create response missing id");
    return { id: session.id, directory: session.directory };
  }

  async prompt(sessionId: string, req: PromptRequest): Promise<PromptResponse> {
    const data = await this.call("Prompt", () =>
      this.sdk.session.prompt({
        path: { id: sessionId },
        query: { directory: req.directory },
        body: {
          parts: [{ type: "text", text: req.text }],
          model: { providerID: req.model.providerID, modelID: req.model.modelID },
          ...(req.tools ? { tools: req.tools } : {}),
        },
      }),
    );
    return { messageId: data.info.id, parts: data.parts };
  }

  async abort(sessionId: string, directory: string): Promise<boolean> {
    const aborted = await this.call("Abort", () =>
      this.sdk.session.abort({ path: { id: sessionId }, query: { directory } }),
    );
    return aborted === true;
  }

  /**
   * Follow the server's event stream. Iteration ends when the server closes
   * the stream or `signal` aborts; a dropped connection throws AgentError.
   */
  async *events(opts: EventStreamOptions): AsyncGenerator<AgentEvent> {
    const { signal } = opts;
    try {
      const { stream } = await this.sdk.event.subscribe({
        query: opts.directory ? { directory: opts.directory } : undefined,
        signal,
      });
      for await (const event of stream) {
        if (signal.aborted) return;
        yield toAgentEvent(event);
      }
    } catch (err) {
      if (signal.aborted) return;
      throw new AgentError(`Event stream dropped (${errorMessage(err)})`, { cause: err });
    }
  }
}

let shared: AgentClient | undefined;

/**
 * Process-wide client, created on first use. Later calls return the same
 * instance regardless of `baseUrl`.
 */
export function getAgentClient(baseUrl: string): AgentClient {
  if (!shared) {
    shared = new AgentClient(baseUrl);
    log.info(`[agent] Client: ${shared.baseUrl}`);
  } else if (shared.baseUrl !== baseUrl.replace(/\/+$/, "")) {
    log.warn(`[agent] Ignoring base URL ${baseUrl}; client already bound to ${shared.baseUrl}`);
  }
  return shared;
}
