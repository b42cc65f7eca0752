/** Missing or invalid settings. Fatal at startup. */
export class ConfigError extends Error {
  override name = "ConfigError";
}

/** Worktree, branch, topic or agent-session creation failed. Nothing was registered. */
export class ProvisioningError extends Error {
  override name = "ProvisioningError";
}

/** The agent server was unreachable or answered with a non-2xx status. */
export class AgentError extends Error {
  override name = "AgentError";
  readonly status?: number;

  constructor(message: string, opts?: { status?: number; cause?: unknown }) {
    super(message, opts?.cause === undefined ? undefined : { cause: opts.cause });
    this.status = opts?.status;
  }
}

/** A git sub-process exited non-zero. `output` is its combined stdout/stderr. */
export class GitError extends Error {
  override name = "GitError";
  readonly operation: string;
  readonly output: string;

  constructor(operation: string, output: string, cause?: unknown) {
    super(`git ${operation} failed${output ? `: ${output}` : ""}`, cause === undefined ? undefined : { cause });
    this.operation = operation;
    this.output = output;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
