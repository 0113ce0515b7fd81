/**
 * Service-chain dispatchers.
 *
 * Both variants walk the chain in list order and stop at the first service
 * that answers or throws. If every service declines, the verdict is a
 * method-not-found error. `serve` adds the notification policy on top of
 * `handle`.
 *
 * @example
 * ```ts
 * const server = new Server<AppContext>([auth, users, fallback]);
 * const response = server.serve(Request.fromString(line), ctx);
 * if (response) transport.send(JSON.stringify(response));
 * ```
 */

import { classifyError, MethodNotFoundError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type { Request } from "./rpc/request.js";
import { Response } from "./rpc/response.js";
import type { AsyncService, Service } from "./service.js";

/**
 * What to do with a notification whose dispatch failed.
 *
 * - `"surface"`: return the error response (with a null id); the caller
 *   decides whether to send it.
 * - `"suppress"`: never answer a notification.
 *
 * Successful notifications are never answered under either policy.
 */
export type NotificationErrorPolicy = "surface" | "suppress";

export interface ServerOptions {
  /** Defaults to `"surface"`. */
  notificationErrors?: NotificationErrorPolicy;
  logger?: Logger;
}

/** Blocking dispatcher. */
export class Server<C = unknown> {
  readonly #services: readonly Service<C>[];
  readonly #policy: NotificationErrorPolicy;
  readonly #log: Logger;

  constructor(services: readonly Service<C>[], opts: ServerOptions = {}) {
    this.#services = [...services];
    this.#policy = opts.notificationErrors ?? "surface";
    this.#log = opts.logger ?? silentLogger;
  }

  /** Dispatch through the chain. Always yields a verdict. */
  handle(request: Request, ctx: C): Response {
    try {
      for (const [index, service] of this.#services.entries()) {
        const response = service.handle(request, ctx);
        if (response !== undefined) {
          this.#log.debug("handled", { method: request.method, service: index });
          return response;
        }
      }
    } catch (err) {
      return failed(this.#log, request, err);
    }
    return notFound(this.#log, request);
  }

  /** Dispatch and apply the notification policy. */
  serve(request: Request, ctx: C): Response | undefined {
    return applyPolicy(this.#policy, request, this.handle(request, ctx));
  }
}

/**
 * Suspending dispatcher. Accepts blocking services too; each is awaited
 * before the next is tried, so no two services run for one request.
 */
export class AsyncServer<C = unknown> {
  readonly #services: readonly (Service<C> | AsyncService<C>)[];
  readonly #policy: NotificationErrorPolicy;
  readonly #log: Logger;

  constructor(services: readonly (Service<C> | AsyncService<C>)[], opts: ServerOptions = {}) {
    this.#services = [...services];
    this.#policy = opts.notificationErrors ?? "surface";
    this.#log = opts.logger ?? silentLogger;
  }

  async handle(request: Request, ctx: C): Promise<Response> {
    try {
      for (const [index, service] of this.#services.entries()) {
        const response = await service.handle(request, ctx);
        if (response !== undefined) {
          this.#log.debug("handled", { method: request.method, service: index });
          return response;
        }
      }
    } catch (err) {
      return failed(this.#log, request, err);
    }
    return notFound(this.#log, request);
  }

  async serve(request: Request, ctx: C): Promise<Response | undefined> {
    return applyPolicy(this.#policy, request, await this.handle(request, ctx));
  }
}

// ---------------------------------------------------------------------------
// Shared verdict helpers
// ---------------------------------------------------------------------------

function notFound(log: Logger, request: Request): Response {
  log.info("method not found", { method: request.method });
  return Response.fromError(new MethodNotFoundError(request.id, request.method), request.id);
}

function failed(log: Logger, request: Request, err: unknown): Response {
  const error = classifyError(err);
  log.warn("service failed", { method: request.method, kind: error.kind, error: error.message });
  return Response.fromError(error, request.id);
}

function applyPolicy(
  policy: NotificationErrorPolicy,
  request: Request,
  response: Response,
): Response | undefined {
  if (!request.isNotification) return response;
  if (!response.isError && response.id === null) return undefined;
  if (response.isError && policy === "suppress") return undefined;
  return response;
}
