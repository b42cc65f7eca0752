import path from "node:path";
import os from "node:os";
import { config as loadEnv } from "dotenv";
import { ConfigError } from "./errors.js";

loadEnv();

export type Repository = {
  name: string;
  path: string;
};

export type ModelRef = {
  providerID: string;
  modelID: string;
};

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const DEFAULT_SUMMARIZER_INSTRUCTION =
  "Generate a git commit message in conventional commit format. " +
  "The first line should be in the format 'type(scope): description'. " +
  "Follow with a bullet-point list of key changes made in the session. " +
  "Keep the entire message concise.";

function expandHome(p: string): string {
  if (p.startsWith("~/") || p === "~") {
    return path.join(os.homedir(), p.slice(1));
  }
  return p;
}

function requireEnv(key: string): string {
  const value = process.env[key];
  if (!value?.trim()) {
    throw new ConfigError(`Missing required env var: ${key}`);
  }
  return value.trim();
}

/**
 * Parse `name=path` pairs, e.g. `webapp=/srv/webapp,api=~/code/api`.
 * Paths are resolved to absolute paths.
 */
export function parseRepositories(raw: string): Repository[] {
  const entries = raw.split(",").map((s) => s.trim()).filter(Boolean);
  if (entries.length === 0) {
    throw new ConfigError("REPOSITORIES must list at least one name=path entry");
  }
  const seen = new Set<string>();
  return entries.map((entry) => {
    const eq = entry.indexOf("=");
    const name = eq > 0 ? entry.slice(0, eq).trim() : "";
    const repoPath = eq > 0 ? entry.slice(eq + 1).trim() : "";
    if (!name || !repoPath) {
      throw new ConfigError(`Invalid repository entry "${entry}" (expected name=path)`);
    }
    if (seen.has(name)) {
      throw new ConfigError(`Duplicate repository name "${name}"`);
    }
    seen.add(name);
    return { name, path: path.resolve(expandHome(repoPath)) };
  });
}

/**
 * Parse `providerID/modelID` entries. Only the first slash separates the two,
 * so model ids may themselves contain slashes (`openrouter/meta/llama-3`).
 */
export function parseModels(raw: string): ModelRef[] {
  const entries = raw.split(",").map((s) => s.trim()).filter(Boolean);
  if (entries.length === 0) {
    throw new ConfigError("MODELS must list at least one providerID/modelID entry");
  }
  return entries.map((entry) => {
    const slash = entry.indexOf("/");
    const providerID = slash > 0 ? entry.slice(0, slash) : "";
    const modelID = slash > 0 ? entry.slice(slash + 1) : "";
    if (!providerID || !modelID) {
      throw new ConfigError(`Invalid model entry "${entry}" (expected providerID/modelID)`);
    }
    return { providerID, modelID };
  });
}

export function parseLogLevel(raw: string | undefined): LogLevel {
  const value = raw?.trim().toLowerCase() || "info";
  const level = LOG_LEVELS.find((l) => l === value);
  if (!level) {
    throw new ConfigError(`Invalid LOG_LEVEL "${raw}" (expected ${LOG_LEVELS.join(", ")})`);
  }
  return level;
}

const dataDir = expandHome(process.env.DATA_DIR?.trim() || "~/.worktree-relay");

export const config = {
  telegramBotToken: requireEnv("TELEGRAM_BOT_TOKEN"),

  allowedUsers: (process.env.ALLOWED_TELEGRAM_USERS ?? "")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean)
    .map(Number)
    .filter((n) => Number.isFinite(n) && n > 0),

  repositories: parseRepositories(requireEnv("REPOSITORIES")),
  models: parseModels(requireEnv("MODELS")),

  dataDir,
  sessionsDir: expandHome(process.env.SESSIONS_DIR?.trim() || "") || path.join(dataDir, "sessions"),
  worktreesDir: expandHome(process.env.WORKTREES_DIR?.trim() || "") || path.join(dataDir, "worktrees"),

  // Empty agentUrl = spawn `<agentCommand> serve` on agentPort
  agentUrl: process.env.AGENT_URL?.trim() || "",
  agentPort: Number(process.env.AGENT_PORT) || 4096,
  agentCommand: process.env.AGENT_COMMAND?.trim() || "opencode",

  summarizerInstruction: process.env.SUMMARIZER_INSTRUCTION?.trim() || DEFAULT_SUMMARIZER_INSTRUCTION,
  editIntervalMs: Number(process.env.EDIT_INTERVAL_MS) || 1_200,
  logLevel: parseLogLevel(process.env.LOG_LEVEL),
} as const;

export type Config = typeof config;
