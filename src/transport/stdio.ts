/**
 * Stdio transport: newline-delimited JSON over a readable/writable pair,
 * by default the current process's stdin and stdout.
 */

import { createInterface, type Interface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import type { Disposable, Transport, TransportState } from "./transport.js";

export interface StdioTransportOptions {
  /** Source of inbound lines. Defaults to `process.stdin`. */
  input?: Readable;
  /** Sink for outbound lines. Defaults to `process.stdout`. */
  output?: Writable;
}

/**
 * Each non-blank input line is one message. Each sent message is written
 * followed by a newline. Running out of input settles {@link ended} but
 * leaves the transport open, so answers to the last lines still go out.
 */
export class StdioTransport implements Transport {
  readonly #rl: Interface;
  readonly #output: Writable;
  readonly #messageHandlers = new Set<(data: string) => void>();
  readonly #closeHandlers = new Set<(reason?: Error) => void>();
  readonly #errorHandlers = new Set<(error: Error) => void>();
  #state: TransportState = "connecting";

  /** Settles when the input stream has no more lines. */
  readonly ended: Promise<void>;

  constructor(opts: StdioTransportOptions = {}) {
    const input = opts.input ?? process.stdin;
    this.#output = opts.output ?? process.stdout;
    this.#rl = createInterface({ input, crlfDelay: Infinity });
    this.#state = "open";

    this.#rl.on("line", (line: string) => {
      if (!line.trim()) return;
      for (const handler of this.#messageHandlers) {
        handler(line);
      }
    });

    this.ended = new Promise<void>((resolve) => {
      this.#rl.once("close", () => resolve());
    });

    input.on("error", (err: Error) => this.#fireError(err));
    this.#output.on("error", (err: Error) => this.#fireError(err));
  }

  get state(): TransportState {
    return this.#state;
  }

  send(data: string): void {
    if (this.#state !== "open") {
      throw new Error(`Cannot send in "${this.#state}" state`);
    }
    this.#output.write(data + "\n");
  }

  onMessage(handler: (data: string) => void): Disposable {
    this.#messageHandlers.add(handler);
    return { dispose: () => this.#messageHandlers.delete(handler) };
  }

  onClose(handler: (reason?: Error) => void): Disposable {
    this.#closeHandlers.add(handler);
    return { dispose: () => this.#closeHandlers.delete(handler) };
  }

  onError(handler: (error: Error) => void): Disposable {
    this.#errorHandlers.add(handler);
    return { dispose: () => this.#errorHandlers.delete(handler) };
  }

  /** Stop reading. Idempotent; does not end the output stream. */
  close(): void {
    if (this.#state === "closed") return;
    this.#state = "closed";
    this.#rl.close();
    this.#fireClose();
  }

  [Symbol.dispose](): void {
    this.close();
  }

  #fireError(error: Error): void {
    for (const handler of this.#errorHandlers) {
      handler(error);
    }
  }

  #fireClose(): void {
    for (const handler of this.#closeHandlers) {
      handler();
    }
    this.#closeHandlers.clear();
  }
}
