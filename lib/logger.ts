/**
 * Leveled logger for the analysis server.
 *
 * Production writes one JSON object per line; anything else writes a short
 * readable line. Each entry carries the package version (`v`) and, for
 * scoped loggers, the `scope` that wrote it.
 *
 *   const log = scopedLogger("api/analyze");
 *   log.warn("validation failed", { error });
 *
 * LOG_LEVEL (debug | info | warn | error) is read on every call, so tests
 * and a running server can change it without a restart.
 */

import packageJson from "@/package.json";

type LogLevel = "debug" | "info" | "warn" | "error";

type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

const APP_VERSION = packageJson.version;
const IS_PRODUCTION = process.env.NODE_ENV === "production";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const WRITERS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.log(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_PRIORITY;
}

function minLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL?.trim().toLowerCase();
  if (isLogLevel(fromEnv)) return fromEnv;
  return IS_PRODUCTION ? "info" : "debug";
}

/** `HH:MM:SS.mmm [LEVEL] [v1.2.3] [scope] message {"meta":1}` */
function readableLine(level: LogLevel, scope: string | undefined, message: string, meta: LogMeta): string {
  const time = new Date().toISOString().slice(11, 23);
  const tag = scope ? ` [${scope}]` : "";
  const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `${time} [${level.toUpperCase().padEnd(5)}] [v${APP_VERSION}]${tag} ${message}${extra}`;
}

function write(level: LogLevel, scope: string | undefined, message: string, meta: LogMeta = {}) {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[minLevel()]) return;

  const line = IS_PRODUCTION
    ? JSON.stringify({
        level,
        message,
        timestamp: new Date().toISOString(),
        v: APP_VERSION,
        ...(scope ? { scope } : {}),
        ...meta,
      })
    : readableLine(level, scope, message, meta);

  WRITERS[level](line);
}

function makeLogger(scope?: string): Logger {
  return {
    debug: (message, meta) => write("debug", scope, message, meta),
    info: (message, meta) => write("info", scope, message, meta),
    warn: (message, meta) => write("warn", scope, message, meta),
    error: (message, meta) => write("error", scope, message, meta),
  };
}

export const logger: Logger = makeLogger();

/** A logger whose entries are tagged with `scope`. */
export function scopedLogger(scope: string): Logger {
  return makeLogger(scope);
}
