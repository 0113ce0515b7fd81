import { describe, expect, it } from "vitest";
import { z } from "zod";
import { Request } from "../rpc/request.js";
import { Response } from "../rpc/response.js";
import { AsyncServer } from "../server.js";
import type { AsyncService, Service } from "../service.js";

const tick = () => new Promise<void>((r) => setTimeout(r, 0));

const hello: AsyncService = {
  async handle(req) {
    if (!req.matches("hello")) return undefined;
    const name = req.deserialize(z.string());
    await tick();
    return Response.success(req, `Hello, ${name}!`);
  },
};

describe("AsyncServer.handle", () => {
  it("answers through an async service", async () => {
    const server = new AsyncServer([hello]);
    const req = Request.fromString('{"jsonrpc":"2.0","id":7,"method":"hello","params":"world"}');
    expect((await server.handle(req, undefined)).toJSON()).toEqual({
      jsonrpc: "2.0",
      id: 7,
      result: "Hello, world!",
    });
  });

  it("synthesizes method-not-found", async () => {
    const server = new AsyncServer([hello]);
    const req = Request.fromString('{"jsonrpc":"2.0","id":9,"method":"missing"}');
    expect((await server.handle(req, undefined)).toJSON()).toEqual({
      jsonrpc: "2.0",
      id: 9,
      error: { code: -32601, message: "Service method not found: missing" },
    });
  });

  it("runs services one at a time, in order", async () => {
    const events: string[] = [];
    const slow: AsyncService = {
      async handle() {
        events.push("slow:start");
        await tick();
        events.push("slow:end");
        return undefined;
      },
    };
    const fast: Service = {
      handle(req) {
        events.push("fast");
        return Response.success(req, "fast");
      },
    };
    const never: Service = {
      handle(req) {
        events.push("never");
        return Response.success(req, "never");
      },
    };

    const res = await new AsyncServer([slow, fast, never]).handle(Request.newReply("x"), undefined);

    expect(res.result).toBe("fast");
    expect(events).toEqual(["slow:start", "slow:end", "fast"]);
  });

  it("converts a rejection into an error response with the request id", async () => {
    const failing: AsyncService = {
      async handle() {
        await tick();
        throw new Error("upstream timeout");
      },
    };
    const req = Request.fromString('{"jsonrpc":"2.0","id":12,"method":"fetch"}');
    expect((await new AsyncServer([failing]).handle(req, undefined)).toJSON()).toEqual({
      jsonrpc: "2.0",
      id: 12,
      error: { code: -32603, message: "upstream timeout" },
    });
  });

  it("converts a synchronous throw from a blocking service", async () => {
    const failing: Service = {
      handle() {
        throw new Error("sync boom");
      },
    };
    const res = await new AsyncServer([failing, hello]).handle(Request.newReply("hello", "x"), undefined);
    expect(res.error).toEqual({ code: -32603, message: "sync boom" });
  });

  it("passes the context through", async () => {
    const greet: AsyncService<{ who: string }> = {
      async handle(req, ctx) {
        return Response.success(req, `Hello, ${ctx.who}!`);
      },
    };
    const res = await new AsyncServer([greet]).handle(Request.newReply("greet"), { who: "ctx" });
    expect(res.result).toBe("Hello, ctx!");
  });
});

describe("AsyncServer.serve", () => {
  it("returns nothing for a successful notification", async () => {
    const server = new AsyncServer([hello]);
    expect(await server.serve(Request.newNotification("hello", "quiet"), undefined)).toBeUndefined();
  });

  it("surfaces a failed notification with a null id", async () => {
    const server = new AsyncServer([hello]);
    const res = await server.serve(Request.newNotification("hello", false), undefined);
    expect(res?.id).toBeNull();
    expect(res?.error?.code).toBe(-32602);
  });

  it("suppresses failed notifications under the suppress policy", async () => {
    const server = new AsyncServer([hello], { notificationErrors: "suppress" });
    expect(await server.serve(Request.newNotification("nope"), undefined)).toBeUndefined();
  });
});
