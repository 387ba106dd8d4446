import { env, type LogLevelSetting } from "../config/env";

type LogLevel = "info" | "warn" | "error" | "debug";

const LEVEL_RANK: Record<LogLevelSetting, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const threshold = LEVEL_RANK[env.logLevel];

const log = (level: LogLevel, scope: string | undefined, message: string, meta?: Record<string, unknown>) => {
  if (LEVEL_RANK[level] < threshold) {
    return;
  }
  const timestamp = new Date().toISOString();
  const prefix = scope ? ` [${scope}]` : "";
  const payload = meta ? ` ${JSON.stringify(meta, serializeError)}` : "";
  // eslint-disable-next-line no-console
  console[level](`[${timestamp}] [${level.toUpperCase()}]${prefix} ${message}${payload}`);
};

// JSON.stringify drops Error fields otherwise
const serializeError = (_key: string, value: unknown) =>
  value instanceof Error ? { name: value.name, message: value.message } : value;

export interface Logger {
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
  debug: (message: string, meta?: Record<string, unknown>) => void;
  child: (scope: string) => Logger;
}

const createLogger = (scope?: string): Logger => ({
  info: (message, meta) => log("info", scope, message, meta),
  warn: (message, meta) => log("warn", scope, message, meta),
  error: (message, meta) => log("error", scope, message, meta),
  debug: (message, meta) => log("debug", scope, message, meta),
  child: (childScope) => createLogger(scope ? `${scope}:${childScope}` : childScope),
});

export const logger = createLogger();
