/***
 * Logger — winston setup shared by every container.
 *
 * Containers take an optional `logger` and fall back to `default_logger`.
 * The level comes from the caller, then CONTAINERS_LOG_LEVEL, then "warn".
 *
 ***/

import { createLogger, format, transports, type Logger } from "winston";
import { DEFAULT_LOG_LEVEL, LOG_LEVEL_ENV } from "./constants";

export type { Logger };

export type LogLevel = "error" | "warn" | "info" | "verbose" | "debug" | "silly";

const LOG_LEVELS: readonly LogLevel[] = [
  "error",
  "warn",
  "info",
  "verbose",
  "debug",
  "silly",
];

export interface LoggerOptions {
  /** Prefix attached to every line as `[module]`. */
  module?: string;
  level?: LogLevel;
  /** Drop every log entry. */
  silent?: boolean;
}

export function is_log_level(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function resolve_log_level(
  level?: LogLevel,
  env: NodeJS.ProcessEnv = process.env,
): LogLevel {
  if (level !== undefined) return level;
  const from_env = env[LOG_LEVEL_ENV];
  return is_log_level(from_env) ? from_env : DEFAULT_LOG_LEVEL;
}

export function create_logger(options: LoggerOptions = {}): Logger {
  const module = options.module ?? "";
  return createLogger({
    level: resolve_log_level(options.level),
    silent: options.silent ?? false,
    defaultMeta: { module },
    format: format.combine(
      format.timestamp(),
      format.printf(({ timestamp, level, message, module: mod, ...meta }) => {
        const prefix = typeof mod === "string" && mod !== "" ? ` [${mod}]` : "";
        const rest = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
        return `${String(timestamp)} ${level}${prefix}: ${String(message)}${rest}`;
      }),
    ),
    transports: [new transports.Console()],
    exitOnError: false,
  });
}

export const default_logger: Logger = create_logger({ module: "containers" });
