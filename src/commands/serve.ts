/**
 * `rpc-chain serve`: answer newline-delimited JSON-RPC on stdin/stdout
 * until stdin ends.
 */
import type { Config } from "../config.js";
import type { Logger } from "../logger.js";
import { AsyncServer } from "../server.js";
import { demoServices, type DemoContext } from "../services/demo.js";
import { bindTransport } from "../transport/bind.js";
import { StdioTransport, type StdioTransportOptions } from "../transport/stdio.js";

export interface ServeOptions extends StdioTransportOptions {
  config: Config;
  ctx: DemoContext;
  logger: Logger;
}

/** Resolves once input has ended and every pending message is answered. */
export async function runServe(opts: ServeOptions): Promise<void> {
  const server = new AsyncServer<DemoContext>(demoServices(), {
    notificationErrors: opts.config.notificationErrors,
    logger: opts.logger,
  });
  const transport = new StdioTransport({ input: opts.input, output: opts.output });
  const binding = bindTransport(server, transport, opts.ctx, {
    logger: opts.logger,
    omitNullId: opts.config.omitNullId,
  });

  opts.logger.info("serving on stdio", { policy: opts.config.notificationErrors });

  await transport.ended;
  await binding.idle;
  binding.dispose();
  transport.close();
  opts.logger.info("input closed, shutting down");
}
