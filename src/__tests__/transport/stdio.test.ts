import { PassThrough } from "node:stream";
import { describe, expect, it, vi } from "vitest";
import { StdioTransport } from "../../transport/stdio.js";

function pipes() {
  const input = new PassThrough();
  const output = new PassThrough();
  let written = "";
  output.setEncoding("utf8");
  output.on("data", (chunk: string) => {
    written += chunk;
  });
  return { input, output, written: () => written };
}

describe("StdioTransport", () => {
  it("hands each non-blank line to the message handlers", async () => {
    const { input, output } = pipes();
    const transport = new StdioTransport({ input, output });
    const lines: string[] = [];
    transport.onMessage((line) => lines.push(line));

    input.write('{"a":1}\n\n   \n{"b":2}\r\n');
    input.end('{"c":3}');
    await transport.ended;

    expect(lines).toEqual(['{"a":1}', '{"b":2}', '{"c":3}']);
    transport.close();
  });

  it("stays open after input ends", async () => {
    const { input, output, written } = pipes();
    const transport = new StdioTransport({ input, output });

    input.end();
    await transport.ended;
    expect(transport.state).toBe("open");

    transport.send("late answer");
    await new Promise<void>((r) => setImmediate(r));
    expect(written()).toBe("late answer\n");
    transport.close();
  });

  it("writes each sent message followed by a newline", async () => {
    const { input, output, written } = pipes();
    const transport = new StdioTransport({ input, output });

    transport.send('{"x":1}');
    transport.send('{"x":2}');
    await new Promise<void>((r) => setImmediate(r));

    expect(written()).toBe('{"x":1}\n{"x":2}\n');
    transport.close();
  });

  it("refuses to send once closed", () => {
    const { input, output } = pipes();
    const transport = new StdioTransport({ input, output });
    transport.close();
    expect(transport.state).toBe("closed");
    expect(() => transport.send("x")).toThrow('Cannot send in "closed" state');
  });

  it("fires close handlers once", () => {
    const { input, output } = pipes();
    const transport = new StdioTransport({ input, output });
    const onClose = vi.fn();
    transport.onClose(onClose);

    transport.close();
    transport.close();

    expect(onClose).toHaveBeenCalledTimes(1);
  });

  it("reports stream errors to the error handlers", () => {
    const { input, output } = pipes();
    const transport = new StdioTransport({ input, output });
    const onError = vi.fn();
    transport.onError(onError);

    const err = new Error("pipe broke");
    output.emit("error", err);

    expect(onError).toHaveBeenCalledWith(err);
    transport.close();
  });
});
