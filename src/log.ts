import { config, type LogLevel } from "./config.js";

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function enabled(level: LogLevel): boolean {
  return RANK[level] >= RANK[config.logLevel];
}

/**
 * Console logging gated by LOG_LEVEL. Call sites keep the bracketed
 * component tag, e.g. `log.info("[session]", "created", threadId)`.
 */
export const log = {
  debug: (...args: unknown[]): void => {
    if (enabled("debug")) console.debug(...args);
  },
  info: (...args: unknown[]): void => {
    if (enabled("info")) console.log(...args);
  },
  warn: (...args: unknown[]): void => {
    if (enabled("warn")) console.warn(...args);
  },
  error: (...args: unknown[]): void => {
    if (enabled("error")) console.error(...args);
  },
};
