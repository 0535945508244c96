import type { LogLevel } from "./config.js";

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface Logger {
  debug(message: string, details?: unknown): void;
  info(message: string, details?: unknown): void;
  warn(message: string, details?: unknown): void;
  error(message: string, details?: unknown): void;
}

/**
 * Console logger printing `[tag] message` with optional details,
 * dropping anything below `level`.
 */
export function createLogger(tag: string, level: LogLevel = "info"): Logger {
  const emit = (at: LogLevel, sink: (...args: unknown[]) => void) => {
    return (message: string, details?: unknown) => {
      if (RANK[at] < RANK[level]) return;
      if (details === undefined) sink(`[${tag}] ${message}`);
      else sink(`[${tag}] ${message}`, details);
    };
  };

  return {
    debug: emit("debug", console.debug),
    info: emit("info", console.log),
    warn: emit("warn", console.warn),
    error: emit("error", console.error),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
