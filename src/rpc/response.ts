/**
 * JSON-RPC response. Holds exactly one of `result` or `error`; the private
 * constructor and the factories below keep it that way.
 */

import { classifyError, InvalidRequestError, ParseError, toErrorData } from "../errors.js";
import type { Request } from "./request.js";
import {
  ResponseSchema,
  VERSION,
  formatIssues,
  type JsonRpcErrorData,
  type JsonRpcResponse,
  type JsonValue,
  type RequestId,
} from "./types.js";

type Outcome = { result: JsonValue } | { error: JsonRpcErrorData };

export interface SerializeOptions {
  /** Drop `id` from the wire object when it is null. */
  omitNullId?: boolean;
}

export class Response {
  readonly #id: RequestId;
  readonly #outcome: Outcome;

  private constructor(id: RequestId, outcome: Outcome) {
    this.#id = id;
    this.#outcome = outcome;
  }

  /** Successful answer to `request`, echoing its id. */
  static success(request: Request, result: JsonValue): Response {
    return new Response(request.id, { result });
  }

  static failure(id: RequestId, error: JsonRpcErrorData): Response {
    return new Response(id, { error: { ...error } });
  }

  /**
   * Error response for any thrown value. The id is `id` when given, else the
   * id the error carries, else null.
   */
  static fromError(error: unknown, id?: RequestId): Response {
    const classified = classifyError(error);
    return new Response(id !== undefined ? id : (classified.id ?? null), {
      error: toErrorData(classified),
    });
  }

  /** Parse a response document. Throws {@link ParseError} or {@link InvalidRequestError}. */
  static fromString(text: string): Response {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new ParseError(err instanceof Error ? err.message : String(err));
    }
    return Response.fromValue(raw);
  }

  static fromValue(value: unknown): Response {
    const parsed = ResponseSchema.safeParse(value);
    if (!parsed.success) {
      throw new InvalidRequestError(formatIssues(parsed.error));
    }
    const { id, result, error } = parsed.data;
    if (error !== undefined) return new Response(id ?? null, { error });
    return new Response(id ?? null, { result: result ?? null });
  }

  get id(): RequestId {
    return this.#id;
  }

  get isError(): boolean {
    return "error" in this.#outcome;
  }

  get result(): JsonValue | undefined {
    return "result" in this.#outcome ? this.#outcome.result : undefined;
  }

  get error(): JsonRpcErrorData | undefined {
    return "error" in this.#outcome ? { ...this.#outcome.error } : undefined;
  }

  /** Wire form. */
  toJSON(opts: SerializeOptions = {}): JsonRpcResponse {
    const withId = (): { id?: RequestId } =>
      this.#id === null && opts.omitNullId ? {} : { id: this.#id };

    if ("error" in this.#outcome) {
      return { jsonrpc: VERSION, ...withId(), error: { ...this.#outcome.error } };
    }
    return { jsonrpc: VERSION, ...withId(), result: this.#outcome.result };
  }
}
