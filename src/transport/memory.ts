/**
 * In-process transport pair.
 *
 * Hand one end to `bindTransport` and drive the other as the client:
 * whatever the client sends arrives at the dispatcher as one message, and
 * every response comes back as one JSON string. Delivery happens on a later
 * microtask, so callers see the same ordering they would over a real pipe
 * without any I/O.
 *
 * @example
 * ```ts
 * const [client, server] = createMemoryTransport();
 * const binding = bindTransport(new AsyncServer(services), server, ctx);
 * client.onMessage((line) => console.log(JSON.parse(line)));
 * client.send(JSON.stringify(Request.newReply("hello", "world")));
 * await binding.idle;
 * ```
 */

import type { Disposable, Transport, TransportState } from "./transport.js";

/**
 * Create two linked ends, both already open. Closing either end closes both,
 * and messages still in flight to a closed end are dropped.
 */
export function createMemoryTransport(): [Transport, Transport] {
  const left = new MemoryEnd();
  const right = new MemoryEnd();
  left.link(right);
  right.link(left);
  return [left, right];
}

/** One side of the pair. Never surfaces I/O errors, so `onError` handlers stay idle. */
class MemoryEnd implements Transport {
  readonly #onMessage = new Set<(data: string) => void>();
  readonly #onClose = new Set<(reason?: Error) => void>();
  readonly #onError = new Set<(error: Error) => void>();
  #state: TransportState = "connecting";
  #peer: MemoryEnd | undefined;

  link(peer: MemoryEnd): void {
    this.#peer = peer;
    this.#state = "open";
  }

  get state(): TransportState {
    return this.#state;
  }

  send(data: string): void {
    const peer = this.#peer;
    if (this.#state !== "open" || !peer) {
      throw new Error(`Cannot send in "${this.#state}" state`);
    }
    queueMicrotask(() => peer.#deliver(data));
  }

  onMessage(handler: (data: string) => void): Disposable {
    this.#onMessage.add(handler);
    return { dispose: () => this.#onMessage.delete(handler) };
  }

  onClose(handler: (reason?: Error) => void): Disposable {
    this.#onClose.add(handler);
    return { dispose: () => this.#onClose.delete(handler) };
  }

  onError(handler: (error: Error) => void): Disposable {
    this.#onError.add(handler);
    return { dispose: () => this.#onError.delete(handler) };
  }

  close(): void {
    if (this.#state === "closed") return;
    this.#shutdown();
    this.#peer?.close();
  }

  [Symbol.dispose](): void {
    this.close();
  }

  #deliver(data: string): void {
    if (this.#state !== "open") return;
    for (const handler of this.#onMessage) handler(data);
  }

  #shutdown(): void {
    this.#state = "closed";
    for (const handler of this.#onClose) handler();
    this.#onClose.clear();
  }
}
