/**
 * JSON-RPC request with one-shot params.
 *
 * The method and id are fixed at construction. Params sit in a take-once
 * slot: the first service that extracts them commits to handling the
 * request, and any later extraction fails with "No parameters given".
 *
 * @example
 * ```ts
 * const req = Request.fromString('{"jsonrpc":"2.0","id":7,"method":"hello","params":"world"}');
 * if (req.matches("hello")) {
 *   const name = req.deserialize(z.string()); // "world"
 * }
 * ```
 */

import { randomInt } from "node:crypto";
import { TextDecoder } from "node:util";
import type { z } from "zod";
import { InvalidParamsError, InvalidRequestError, ParseError } from "../errors.js";
import {
  RequestIdSchema,
  RequestSchema,
  VERSION,
  formatIssues,
  type JsonRpcRequest,
  type JsonValue,
  type RequestId,
} from "./types.js";

/** Upper bound (exclusive) for generated correlation ids. */
const ID_CEILING = 2 ** 32;

const utf8 = new TextDecoder("utf-8", { fatal: true });

export class Request {
  readonly #id: RequestId;
  readonly #method: string;
  #params: JsonValue | undefined;

  private constructor(id: RequestId, method: string, params: JsonValue | undefined) {
    this.#id = id;
    this.#method = method;
    // `params: null` carries nothing to extract
    this.#params = params === null ? undefined : params;
  }

  // ---------------------------------------------------------------------------
  // Construction
  // ---------------------------------------------------------------------------

  /** A request that expects an answer, with a random non-zero id. */
  static newReply(method: string, params?: JsonValue): Request {
    return new Request(randomInt(1, ID_CEILING), method, params);
  }

  /** A fire-and-forget request with no id. */
  static newNotification(method: string, params?: JsonValue): Request {
    return new Request(null, method, params);
  }

  /** Parse JSON text. Throws {@link ParseError} or {@link InvalidRequestError}. */
  static fromString(text: string): Request {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new ParseError(err instanceof Error ? err.message : String(err));
    }
    return Request.fromValue(raw);
  }

  /** Parse UTF-8 encoded JSON. Invalid UTF-8 is a parse failure. */
  static fromBytes(bytes: Uint8Array): Request {
    let text: string;
    try {
      text = utf8.decode(bytes);
    } catch (err) {
      throw new ParseError(err instanceof Error ? err.message : String(err));
    }
    return Request.fromString(text);
  }

  /**
   * Read a source to its end, then parse it. Accepts any async iterable of
   * chunks, which includes Node readable streams.
   */
  static async fromStream(source: AsyncIterable<string | Uint8Array>): Promise<Request> {
    const chunks: Buffer[] = [];
    try {
      for await (const chunk of source) {
        chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : Buffer.from(chunk));
      }
    } catch (err) {
      throw new ParseError(err instanceof Error ? err.message : String(err));
    }
    return Request.fromBytes(Buffer.concat(chunks));
  }

  /** Validate an already-decoded value. Throws {@link InvalidRequestError}. */
  static fromValue(value: unknown): Request {
    if (value === null || typeof value !== "object" || Array.isArray(value)) {
      throw new InvalidRequestError(`expected a JSON object, received ${typeName(value)}`);
    }
    const parsed = RequestSchema.safeParse(value);
    if (!parsed.success) {
      throw new InvalidRequestError(formatIssues(parsed.error), salvageId(value));
    }
    const { id, method, params } = parsed.data;
    return new Request(id ?? null, method, params);
  }

  // ---------------------------------------------------------------------------
  // Accessors
  // ---------------------------------------------------------------------------

  get id(): RequestId {
    return this.#id;
  }

  get method(): string {
    return this.#method;
  }

  /** True when the request carries no id. */
  get isNotification(): boolean {
    return this.#id === null;
  }

  /** Whether params are still available for extraction. */
  get hasParams(): boolean {
    return this.#params !== undefined;
  }

  /** Exact match against the method name. */
  matches(name: string): boolean {
    return this.#method === name;
  }

  // ---------------------------------------------------------------------------
  // Params
  // ---------------------------------------------------------------------------

  /** Take the raw params, leaving the slot empty. */
  takeParams(): JsonValue {
    const params = this.#params;
    if (params === undefined) {
      throw new InvalidParamsError(this.#id, "No parameters given");
    }
    this.#params = undefined;
    return params;
  }

  /**
   * Take the params and validate them against a schema.
   * Params are consumed even when validation fails.
   */
  deserialize<S extends z.ZodTypeAny>(schema: S): z.output<S> {
    const parsed = schema.safeParse(this.takeParams());
    if (!parsed.success) {
      throw new InvalidParamsError(this.#id, formatIssues(parsed.error));
    }
    return parsed.data;
  }

  /** Wire form. Params already taken are no longer part of it. */
  toJSON(): JsonRpcRequest {
    const msg: JsonRpcRequest = { jsonrpc: VERSION, method: this.#method };
    if (this.#id !== null) msg.id = this.#id;
    if (this.#params !== undefined) msg.params = this.#params;
    return msg;
  }
}

function salvageId(value: object): RequestId | undefined {
  if (!("id" in value)) return undefined;
  const id = RequestIdSchema.safeParse(value.id);
  return id.success ? id.data : undefined;
}

function typeName(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}
