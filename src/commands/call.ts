/**
 * `rpc-chain call <method> [params]`: dispatch one request through the
 * blocking demo chain and print the response.
 */
import type { Logger } from "../logger.js";
import { Request } from "../rpc/request.js";
import { Response } from "../rpc/response.js";
import type { JsonValue } from "../rpc/types.js";
import { JsonValueSchema } from "../rpc/types.js";
import { Server } from "../server.js";
import { blockingDemoServices, type DemoContext } from "../services/demo.js";

export interface CallOptions {
  ctx: DemoContext;
  logger: Logger;
  /** Send as a notification instead of a request expecting a reply. */
  notify?: boolean;
  omitNullId?: boolean;
}

/** Returns the exit code: 0 on a result or no response, 1 on an error. */
export function runCall(method: string, rawParams: string | undefined, opts: CallOptions): number {
  let params: JsonValue | undefined;
  try {
    params = rawParams === undefined ? undefined : JsonValueSchema.parse(JSON.parse(rawParams));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Invalid params JSON: ${message}`);
    return 1;
  }

  const request = opts.notify
    ? Request.newNotification(method, params)
    : Request.newReply(method, params);
  const server = new Server<DemoContext>(blockingDemoServices(), { logger: opts.logger });

  let response: Response | undefined;
  try {
    response = server.serve(request, opts.ctx);
  } catch (err) {
    response = Response.fromError(err, request.id);
  }

  if (!response) {
    opts.logger.info("notification handled, no response", { method });
    return 0;
  }
  console.log(JSON.stringify(response.toJSON({ omitNullId: opts.omitNullId })));
  return response.isError ? 1 : 0;
}
