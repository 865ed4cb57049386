export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

let threshold: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

/**
 * Logging for the MCP server.
 * - Every level goes to stderr (console.error); stdout carries the MCP JSON-RPC stream.
 * - Messages below the configured threshold are dropped.
 */
export function log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) {
    return;
  }
  const timestamp = new Date().toISOString();
  if (meta && Object.keys(meta).length > 0) {
    // eslint-disable-next-line no-console
    console.error(`[${timestamp}] [${level.toUpperCase()}] ${message}`, meta);
  } else {
    // eslint-disable-next-line no-console
    console.error(`[${timestamp}] [${level.toUpperCase()}] ${message}`);
  }
}

export const logDebug = (msg: string, meta?: Record<string, unknown>) => log("debug", msg, meta);
export const logInfo = (msg: string, meta?: Record<string, unknown>) => log("info", msg, meta);
export const logWarn = (msg: string, meta?: Record<string, unknown>) => log("warn", msg, meta);
export const logError = (msg: string, meta?: Record<string, unknown>) => log("error", msg, meta);
