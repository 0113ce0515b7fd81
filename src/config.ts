/**
 * Runtime configuration, read from the environment and overridden by CLI
 * flags.
 *
 *   JSONRPC_LOG_LEVEL            debug | info | warn | error | silent  (warn)
 *   JSONRPC_NOTIFICATION_ERRORS  surface | suppress                    (surface)
 *   JSONRPC_OMIT_NULL_ID         1 | true | 0 | false                  (false)
 */

import { z } from "zod";
import { LOG_LEVELS, type LogLevel } from "./logger.js";
import { formatIssues } from "./rpc/types.js";
import type { NotificationErrorPolicy } from "./server.js";

const LogLevelSchema = z.enum(LOG_LEVELS);

const FlagSchema = z
  .enum(["1", "0", "true", "false"])
  .transform((value) => value === "1" || value === "true");

export const ConfigSchema = z.object({
  logLevel: LogLevelSchema.default("warn"),
  notificationErrors: z.enum(["surface", "suppress"]).default("surface"),
  omitNullId: z.boolean().default(false),
});

export interface Config {
  logLevel: LogLevel;
  notificationErrors: NotificationErrorPolicy;
  omitNullId: boolean;
}

export type ConfigOverrides = Partial<Config>;

const EnvSchema = z.object({
  JSONRPC_LOG_LEVEL: LogLevelSchema.optional(),
  JSONRPC_NOTIFICATION_ERRORS: z.enum(["surface", "suppress"]).optional(),
  JSONRPC_OMIT_NULL_ID: FlagSchema.optional(),
});

/**
 * Resolve configuration. Overrides win over the environment, which wins
 * over defaults. Throws when a value is not one the setting accepts.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: ConfigOverrides = {},
): Config {
  const fromEnv = EnvSchema.safeParse({
    JSONRPC_LOG_LEVEL: blankToUndefined(env["JSONRPC_LOG_LEVEL"]),
    JSONRPC_NOTIFICATION_ERRORS: blankToUndefined(env["JSONRPC_NOTIFICATION_ERRORS"]),
    JSONRPC_OMIT_NULL_ID: blankToUndefined(env["JSONRPC_OMIT_NULL_ID"]?.toLowerCase()),
  });
  if (!fromEnv.success) {
    throw new Error(`Invalid configuration: ${formatIssues(fromEnv.error)}`);
  }

  const merged = ConfigSchema.safeParse({
    logLevel: overrides.logLevel ?? fromEnv.data.JSONRPC_LOG_LEVEL,
    notificationErrors: overrides.notificationErrors ?? fromEnv.data.JSONRPC_NOTIFICATION_ERRORS,
    omitNullId: overrides.omitNullId ?? fromEnv.data.JSONRPC_OMIT_NULL_ID,
  });
  if (!merged.success) {
    throw new Error(`Invalid configuration: ${formatIssues(merged.error)}`);
  }
  return merged.data;
}

function blankToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value.trim();
}

