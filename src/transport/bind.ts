/**
 * Bind a dispatcher to a transport.
 *
 * Each inbound message is parsed, dispatched and answered before the next
 * one is looked at. Parse-time failures are answered with a null-id error
 * response, since no request exists to correlate them with.
 */

import { silentLogger, type Logger } from "../logger.js";
import { Request } from "../rpc/request.js";
import { Response } from "../rpc/response.js";
import type { AsyncServer } from "../server.js";
import type { Disposable, Transport } from "./transport.js";

export interface BindOptions {
  logger?: Logger;
  /** Drop null ids from outbound responses. */
  omitNullId?: boolean;
}

/** A live binding. `idle` settles once every message received so far is answered. */
export interface Binding extends Disposable {
  readonly idle: Promise<void>;
}

export function bindTransport<C>(
  server: AsyncServer<C>,
  transport: Transport,
  ctx: C,
  opts: BindOptions = {},
): Binding {
  const log = opts.logger ?? silentLogger;
  let queue: Promise<void> = Promise.resolve();

  const reply = (response: Response): void => {
    if (transport.state !== "open") {
      log.debug("transport closed, dropping response", { id: response.id });
      return;
    }
    transport.send(JSON.stringify(response.toJSON({ omitNullId: opts.omitNullId })));
  };

  const answer = async (line: string): Promise<void> => {
    let request: Request;
    try {
      request = Request.fromString(line);
    } catch (err) {
      const response = Response.fromError(err);
      log.warn("rejected message", { code: response.error?.code });
      reply(response);
      return;
    }
    const response = await server.serve(request, ctx);
    if (response) reply(response);
  };

  const messageSub = transport.onMessage((line) => {
    queue = queue
      .then(() => answer(line))
      .catch((err: unknown) => {
        log.error("failed to answer message", { error: err });
      });
  });

  const errorSub = transport.onError((err) => {
    log.error("transport error", { error: err });
  });

  return {
    get idle() {
      return queue;
    },
    dispose: () => {
      messageSub.dispose();
      errorSub.dispose();
    },
  };
}
