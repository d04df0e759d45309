/**
 * Scoped stderr logger.
 *
 * stdout carries the MCP stdio protocol, so nothing may be logged there.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Derive a logger with a nested scope: "registry" → "registry:qudelix". */
  child(scope: string): Logger;
}

export type LogSink = (line: string) => void;

const stderrSink: LogSink = (line) => console.error(line);

export function createLogger(scope: string, level: LogLevel = "info", sink: LogSink = stderrSink): Logger {
  const threshold = LEVEL_ORDER[level];
  const emit = (lvl: LogLevel, message: string) => {
    if (LEVEL_ORDER[lvl] < threshold) return;
    sink(`[${lvl}] ${scope}: ${message}`);
  };
  return {
    debug: (m) => emit("debug", m),
    info: (m) => emit("info", m),
    warn: (m) => emit("warn", m),
    error: (m) => emit("error", m),
    child: (sub) => createLogger(`${scope}:${sub}`, level, sink),
  };
}

/** Logger that drops everything. Default for handlers built without one. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};

/** Format bytes as "4B 26 00 …" for packet traces. */
export function hex(bytes: ArrayLike<number>, limit = 16): string {
  const parts: string[] = [];
  const n = Math.min(bytes.length, limit);
  for (let i = 0; i < n; i++) {
    parts.push(bytes[i].toString(16).toUpperCase().padStart(2, "0"));
  }
  if (bytes.length > limit) parts.push("…");
  return parts.join(" ");
}
