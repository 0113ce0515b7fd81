/** Lifecycle state of a transport. */
export type TransportState = "connecting" | "open" | "closed";

/** Callback cleanup handle. */
export interface Disposable {
  dispose(): void;
}

/**
 * Message channel carrying one serialized JSON-RPC message per payload.
 *
 * Implementations own framing (newline-delimited JSON for stdio, frames for
 * sockets). The dispatch layer only ever sees whole message strings.
 */
export interface Transport {
  readonly state: TransportState;

  /** Send one serialized message. Throws if not open. */
  send(data: string): void;

  /** Register a handler for inbound messages. */
  onMessage(handler: (data: string) => void): Disposable;

  /** Register a handler for close. Fires once. */
  onClose(handler: (reason?: Error) => void): Disposable;

  /** Register a handler for non-fatal I/O errors. */
  onError(handler: (error: Error) => void): Disposable;

  /** Shut down. Idempotent. */
  close(): void;

  [Symbol.dispose](): void;
}
