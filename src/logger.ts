/**
 * Leveled stderr logger.
 *
 * stdout belongs to protocol traffic when serving over stdio, so every line
 * goes to stderr.
 */

import chalk from "chalk";

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const PAINT: Record<Exclude<LogLevel, "silent">, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

export interface Logger {
  debug(message: string, fields?: Record<string, unknown>): void;
  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(message: string, fields?: Record<string, unknown>): void;
}

export interface LoggerOptions {
  /** Minimum level that gets written. Defaults to `"warn"`. */
  level?: LogLevel;
  /** Prefix shown in brackets before each message. */
  name?: string;
  /** Line sink. Defaults to `console.error`. */
  write?: (line: string) => void;
}

export function createLogger(opts: LoggerOptions = {}): Logger {
  const threshold = RANK[opts.level ?? "warn"];
  const write = opts.write ?? ((line: string) => console.error(line));
  const prefix = opts.name ? `[${opts.name}] ` : "";

  const emit =
    (level: Exclude<LogLevel, "silent">) =>
    (message: string, fields?: Record<string, unknown>): void => {
      if (RANK[level] < threshold) return;
      const tag = PAINT[level](level.toUpperCase().padEnd(5));
      const extra = fields && Object.keys(fields).length > 0 ? ` ${formatFields(fields)}` : "";
      write(`${tag} ${prefix}${message}${extra}`);
    };

  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
  };
}

/** A logger that drops everything. */
export const silentLogger: Logger = createLogger({ level: "silent" });

function formatFields(fields: Record<string, unknown>): string {
  return Object.entries(fields)
    .map(([key, value]) => `${key}=${formatValue(value)}`)
    .join(" ");
}

function formatValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Error) return value.message;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
