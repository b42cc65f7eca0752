import { spawn, type ChildProcess } from "node:child_process";
import { log } from "../log.js";

const POLL_INTERVAL_MS = 500;
const LAUNCH_TIMEOUT_MS = 30_000;
const STOP_GRACE_MS = 5_000;

let serverProc: ChildProcess | null = null;

export function localAgentUrl(port: number): string {
  return `http://127.0.0.1:${port}`;
}

/** True when an agent server answers on `baseUrl`. */
export async function isAgentServerUp(baseUrl: string, fetchFn: typeof fetch = fetch): Promise<boolean> {
  try {
    const res = await fetchFn(`${baseUrl}/config`, { signal: AbortSignal.timeout(2_000) });
    await res.body?.cancel();
    return res.ok;
  } catch {
    return false;
  }
}

async function waitForAgentServer(baseUrl: string, timeoutMs: number): Promise<void> {
  const start = Date.now();
  while (Date.now() - start < timeoutMs) {
    if (await isAgentServerUp(baseUrl)) return;
    if (serverProc === null) throw new Error("Agent server exited during startup");
    await new Promise((r) => setTimeout(r, POLL_INTERVAL_MS));
  }
  throw new Error(`Agent server did not become ready at ${baseUrl} within ${timeoutMs}ms`);
}

function launchAgentServer(command: string, port: number): ChildProcess {
  const proc = spawn(command, ["serve", "--port", String(port)], {
    stdio: ["ignore", "inherit", "inherit"],
  });

  proc.on("error", (err) => {
    log.error("[agent-server] Process error:", err.message);
  });

  proc.on("exit", (code, signal) => {
    log.warn(`[agent-server] Process exited (code=${code}, signal=${signal})`);
    if (serverProc === proc) serverProc = null;
  });

  return proc;
}

/**
 * Start `<command> serve --port <port>` and wait until it answers. Reuses a
 * server already listening on the port. Returns its base URL.
 */
export async function ensureAgentServer(command: string, port: number): Promise<string> {
  const baseUrl = localAgentUrl(port);
  if (await isAgentServerUp(baseUrl)) {
    log.info(`[agent-server] Reusing server on port ${port}`);
    return baseUrl;
  }

  log.info(`[agent-server] Launching: ${command} serve --port ${port}`);
  serverProc = launchAgentServer(command, port);
  await waitForAgentServer(baseUrl, LAUNCH_TIMEOUT_MS);
  log.info(`[agent-server] Ready on port ${port}`);
  return baseUrl;
}

/** Stop the server this process launched, if any. */
export async function stopAgentServer(): Promise<void> {
  if (!serverProc) return;

  const proc = serverProc;
  serverProc = null;
  if (proc.exitCode !== null) return;

  log.info("[agent-server] Stopping...");
  proc.kill("SIGTERM");

  const exited = await new Promise<boolean>((resolve) => {
    const timer = setTimeout(() => resolve(false), STOP_GRACE_MS);
    proc.once("exit", () => {
      clearTimeout(timer);
      resolve(true);
    });
  });

  if (!exited) {
    log.warn("[agent-server] Force killing after grace period");
    proc.kill("SIGKILL");
  }
  log.info("[agent-server] Stopped");
}
