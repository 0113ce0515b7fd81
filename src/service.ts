/**
 * Service contracts.
 *
 * A service looks at a request and either declines (`undefined`), answers
 * with a {@link Response}, or throws. The dispatchers in `server.ts` try
 * services in order and stop at the first one that does not decline.
 */

import type { Request } from "./rpc/request.js";
import { Response } from "./rpc/response.js";
import type { JsonValue } from "./rpc/types.js";

/** Blocking service: runs to completion before returning. */
export interface Service<C = unknown> {
  handle(request: Request, ctx: C): Response | undefined;
}

/** Suspending service: may await I/O before answering. */
export interface AsyncService<C = unknown> {
  handle(request: Request, ctx: C): Promise<Response | undefined>;
}

/** Handler for a single method in a method table. */
export type MethodHandler<C> = (request: Request, ctx: C) => JsonValue;

export type AsyncMethodHandler<C> = (request: Request, ctx: C) => Promise<JsonValue>;

/**
 * Build a service from a method table. Methods not in the table are
 * declined; the handler's return value becomes the result.
 */
export function methodService<C = unknown>(
  methods: Readonly<Record<string, MethodHandler<C>>>,
): Service<C> {
  return {
    handle(request, ctx) {
      const handler = lookup(methods, request.method);
      return handler ? Response.success(request, handler(request, ctx)) : undefined;
    },
  };
}

export function asyncMethodService<C = unknown>(
  methods: Readonly<Record<string, AsyncMethodHandler<C>>>,
): AsyncService<C> {
  return {
    async handle(request, ctx) {
      const handler = lookup(methods, request.method);
      return handler ? Response.success(request, await handler(request, ctx)) : undefined;
    },
  };
}

// Own keys only, so "toString" and friends never match.
function lookup<H>(table: Readonly<Record<string, H>>, method: string): H | undefined {
  return Object.prototype.hasOwnProperty.call(table, method) ? table[method] : undefined;
}
