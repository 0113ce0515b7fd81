#!/usr/bin/env node
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { loadConfig, type Config, type ConfigOverrides } from "./config.js";
import { createLogger, LOG_LEVELS } from "./logger.js";

// --- Parse CLI args ---

const argv = await yargs(hideBin(process.argv))
  .scriptName("rpc-chain")
  .usage("Usage: $0 <command> [options]")
  .command(["serve", "$0"], "Answer newline-delimited JSON-RPC on stdin/stdout (default)")
  .command("check <message>", "Parse one message and print the request or the error", (y) =>
    y.positional("message", {
      type: "string",
      describe: "Raw JSON-RPC message",
      demandOption: true,
    }),
  )
  .command("call <method> [params]", "Dispatch one request through the demo services", (y) =>
    y
      .positional("method", {
        type: "string",
        describe: "Method name",
        demandOption: true,
      })
      .positional("params", {
        type: "string",
        describe: "Params as JSON text",
      })
      .option("notify", {
        type: "boolean",
        default: false,
        describe: "Send as a notification (no id)",
      }),
  )
  .option("log-level", {
    type: "string",
    choices: LOG_LEVELS,
    describe: "Minimum log level written to stderr",
  })
  .option("notification-errors", {
    type: "string",
    choices: ["surface", "suppress"] as const,
    describe: "Whether failed notifications get an error response",
  })
  .option("omit-null-id", {
    type: "boolean",
    describe: "Leave `id` out of responses instead of sending null",
  })
  .option("greeting", {
    type: "string",
    default: "world",
    describe: "Name the `greet` method says hello to",
  })
  .strict()
  .help()
  .parse();

// --- Resolve configuration ---

const overrides: ConfigOverrides = {};
if (argv.logLevel) overrides.logLevel = argv.logLevel;
if (argv.notificationErrors) overrides.notificationErrors = argv.notificationErrors;
if (argv.omitNullId !== undefined) overrides.omitNullId = argv.omitNullId;

let config: Config;
try {
  config = loadConfig(process.env, overrides);
} catch (err) {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
}

const logger = createLogger({ level: config.logLevel, name: "rpc-chain" });
const ctx = { greeting: argv.greeting };

// --- Route to subcommands ---

const command = argv._[0];

if (command === "check") {
  const { runCheck } = await import("./commands/check.js");
  process.exitCode = runCheck(String(argv.message), { omitNullId: config.omitNullId });
} else if (command === "call") {
  const { runCall } = await import("./commands/call.js");
  process.exitCode = runCall(
    String(argv.method),
    typeof argv.params === "string" ? argv.params : undefined,
    { ctx, logger, notify: argv.notify === true, omitNullId: config.omitNullId },
  );
} else {
  const { runServe } = await import("./commands/serve.js");
  await runServe({ config, ctx, logger });
}
