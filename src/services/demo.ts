/**
 * Demo services used by the CLI, one per way of writing a service: a
 * class, a method table, an async method table and a bare object.
 */

import { setTimeout as sleep } from "node:timers/promises";
import { z } from "zod";
import type { Request } from "../rpc/request.js";
import { Response } from "../rpc/response.js";
import { asyncMethodService, methodService, type AsyncService, type Service } from "../service.js";

/** State shared by the demo services for the life of a server. */
export interface DemoContext {
  /** Who `greet` says hello to. */
  greeting: string;
}

/** Longest wait `delay` accepts. */
export const MAX_DELAY_MS = 10_000;

/** `hello` takes a string and greets it. */
export class HelloService implements Service<DemoContext> {
  handle(request: Request): Response | undefined {
    if (!request.matches("hello")) return undefined;
    const name = request.deserialize(z.string());
    return Response.success(request, `Hello, ${name}!`);
  }
}

/** `greet` greets whoever the context names; `echo` returns its params. */
export const contextService = methodService<DemoContext>({
  greet: (_request, ctx) => `Hello, ${ctx.greeting}!`,
  echo: (request) => (request.hasParams ? request.takeParams() : null),
});

const DelayParams = z.object({
  ms: z.number().int().min(0).max(MAX_DELAY_MS),
});

/** `delay` waits `ms` milliseconds before answering. */
export const delayService = asyncMethodService<DemoContext>({
  delay: async (request) => {
    const { ms } = request.deserialize(DelayParams);
    await sleep(ms);
    return { waited: ms };
  },
});

/** `fail` always throws, with the given message if any. */
export const failService: Service<DemoContext> = {
  handle(request) {
    if (!request.matches("fail")) return undefined;
    const message = request.hasParams ? request.deserialize(z.string()) : "requested failure";
    throw new Error(message);
  },
};

/** The chain served by the CLI, in dispatch order. */
export function demoServices(): (Service<DemoContext> | AsyncService<DemoContext>)[] {
  return [new HelloService(), contextService, delayService, failService];
}

/** Blocking subset, for the synchronous `call` command. */
export function blockingDemoServices(): Service<DemoContext>[] {
  return [new HelloService(), contextService, failService];
}
