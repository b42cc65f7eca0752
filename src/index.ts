#!/usr/bin/env node
import { config } from "./config.js";
import { getAgentClient } from "./agent/client.js";
import { ensureAgentServer, stopAgentServer } from "./agent/server.js";
import { GitCli } from "./git/git.js";
import { runEventListener } from "./listener/listener.js";
import { ListenerSet } from "./listener/listener-set.js";
import { runSessionMonitor } from "./listener/monitor.js";
import { SessionManager } from "./session/manager.js";
import { SessionRegistry } from "./session/registry.js";
import { SessionStore } from "./session/store.js";
import { BOT_COMMANDS, createBot } from "./telegram/bot.js";
import { MessageCompositor } from "./telegram/compositor.js";

async function main() {
  console.log("[init] Starting worktree-relay...");
  console.log(`[init] Data dir: ${config.dataDir}`);
  console.log(`[init] Sessions: ${config.sessionsDir}`);
  console.log(`[init] Worktrees: ${config.worktreesDir}`);
  console.log(`[init] Repositories: ${config.repositories.map((r) => `${r.name}=${r.path}`).join(", ")}`);
  console.log(`[init] Models: ${config.models.map((m) => `${m.providerID}/${m.modelID}`).join(", ")}`);
  console.log(`[init] Allowed users: ${config.allowedUsers.length > 0 ? config.allowedUsers.join(", ") : "(all)"}`);

  const git = new GitCli();
  for (const repo of config.repositories) {
    if (!(await git.isRepository(repo.path))) {
      throw new Error(`Repository "${repo.name}" at ${repo.path} is not a git repository`);
    }
  }

  const agentUrl = config.agentUrl || (await ensureAgentServer(config.agentCommand, config.agentPort));
  const agent = getAgentClient(agentUrl);

  // The listener set and the registry refer to each other; the task closure
  // resolves both at call time
  let registry: SessionRegistry;
  let compositor: MessageCompositor;
  const listeners: ListenerSet = new ListenerSet((threadId, signal) =>
    runEventListener(threadId, signal, { registry, agent, compositor, listeners }),
  );
  registry = new SessionRegistry({ store: new SessionStore(config.sessionsDir), agent, listeners });

  const manager = new SessionManager({
    registry,
    listeners,
    agent,
    git,
    worktreesDir: config.worktreesDir,
    summarizerInstruction: config.summarizerInstruction,
  });
  const bot = createBot({ manager, repositories: config.repositories, models: config.models });
  compositor = new MessageCompositor(bot.api, registry);

  const monitorAbort = new AbortController();
  const monitor = runSessionMonitor(monitorAbort.signal, { registry, agent });

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`\n[shutdown] Received ${signal}, shutting down...`);

    await bot.stop();
    monitorAbort.abort();
    await Promise.allSettled([monitor, listeners.shutdown()]);
    await stopAgentServer();

    console.log("[shutdown] Done.");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));

  await bot.api.setMyCommands(BOT_COMMANDS).catch((err: unknown) => {
    console.warn("[init] Failed to register commands:", err instanceof Error ? err.message : err);
  });

  console.log("[init] Bot starting...");
  await bot.start({
    allowed_updates: ["message", "callback_query"],
    onStart: (botInfo) => {
      console.log(`[init] Bot @${botInfo.username} is running!`);
    },
  });
}

main().catch(async (err) => {
  console.error("[fatal]", err);
  await stopAgentServer();
  process.exit(1);
});
