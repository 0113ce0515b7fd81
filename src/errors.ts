/**
 * Error taxonomy for the dispatch layer.
 *
 * Every failure that crosses the dispatch boundary is one of five kinds,
 * each a subclass of {@link JsonRpcError} with a `.kind` discriminant.
 * {@link toErrorData} is the only place a kind becomes a wire error code.
 *
 * @example
 * ```ts
 * try {
 *   const req = Request.fromString(line);
 * } catch (e) {
 *   const err = classifyError(e);
 *   switch (err.kind) {
 *     case "PARSE":           console.error("bad JSON:", err.data); break;
 *     case "INVALID_REQUEST": console.error("bad shape:", err.data); break;
 *   }
 * }
 * ```
 */

import { ErrorCodes, type JsonRpcErrorData, type RequestId } from "./rpc/types.js";

// ---------------------------------------------------------------------------
// Kinds
// ---------------------------------------------------------------------------

/** Union of all error kinds for exhaustive switch handling. */
export type JsonRpcErrorKind =
  | "PARSE"
  | "INVALID_REQUEST"
  | "METHOD_NOT_FOUND"
  | "INVALID_PARAMS"
  | "INTERNAL";

// ---------------------------------------------------------------------------
// Base class
// ---------------------------------------------------------------------------

/** Base error for every failure the dispatcher can report. */
export abstract class JsonRpcError extends Error {
  abstract readonly kind: JsonRpcErrorKind;

  /** Id of the originating request, when one was known at failure time. */
  readonly id: RequestId | undefined;

  constructor(message: string, opts?: { id?: RequestId; cause?: unknown }) {
    super(message, opts?.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = "JsonRpcError";
    this.id = opts?.id;
  }
}

// ---------------------------------------------------------------------------
// Concrete errors
// ---------------------------------------------------------------------------

/** The payload is not well-formed JSON. */
export class ParseError extends JsonRpcError {
  readonly kind = "PARSE" as const;
  readonly data: string;

  constructor(data: string) {
    super("Parsing failed, invalid JSON data");
    this.name = "ParseError";
    this.data = data;
  }
}

/** Well-formed JSON that is not a valid JSON-RPC message. */
export class InvalidRequestError extends JsonRpcError {
  readonly kind = "INVALID_REQUEST" as const;
  readonly data: string;

  constructor(data: string, id?: RequestId) {
    super("Invalid JSON-RPC request", { id });
    this.name = "InvalidRequestError";
    this.data = data;
  }
}

/** No service in the chain handled the method. */
export class MethodNotFoundError extends JsonRpcError {
  readonly kind = "METHOD_NOT_FOUND" as const;
  readonly method: string;

  constructor(id: RequestId, method: string) {
    super(`Service method not found: ${method}`, { id });
    this.name = "MethodNotFoundError";
    this.method = method;
  }
}

/** Params were missing or could not be converted to the expected shape. */
export class InvalidParamsError extends JsonRpcError {
  readonly kind = "INVALID_PARAMS" as const;
  readonly data: string;

  constructor(id: RequestId, data: string) {
    super("Message parameters are invalid", { id });
    this.name = "InvalidParamsError";
    this.data = data;
  }
}

/** Any other failure raised inside a service. Only the message survives. */
export class InternalError extends JsonRpcError {
  readonly kind = "INTERNAL" as const;

  constructor(message: string, opts?: { id?: RequestId; cause?: unknown }) {
    super(message, opts);
    this.name = "InternalError";
  }
}

/** Closed union of the concrete error classes. */
export type AnyJsonRpcError =
  | ParseError
  | InvalidRequestError
  | MethodNotFoundError
  | InvalidParamsError
  | InternalError;

// ---------------------------------------------------------------------------
// Mapping
// ---------------------------------------------------------------------------

/** Map an error to its wire representation. Pure and total. */
export function toErrorData(error: AnyJsonRpcError): JsonRpcErrorData {
  switch (error.kind) {
    case "PARSE":
      return { code: ErrorCodes.PARSE_ERROR, message: error.message, data: error.data };
    case "INVALID_REQUEST":
      return { code: ErrorCodes.INVALID_REQUEST, message: error.message, data: error.data };
    case "METHOD_NOT_FOUND":
      return { code: ErrorCodes.METHOD_NOT_FOUND, message: error.message };
    case "INVALID_PARAMS":
      return { code: ErrorCodes.INVALID_PARAMS, message: error.message, data: error.data };
    case "INTERNAL":
      return { code: ErrorCodes.INTERNAL_ERROR, message: error.message };
    default:
      return assertNever(error);
  }
}

/**
 * Classify any thrown value. Foreign errors land in the internal bucket,
 * keeping their message and nothing else of their shape.
 */
export function classifyError(value: unknown): AnyJsonRpcError {
  if (
    value instanceof ParseError ||
    value instanceof InvalidRequestError ||
    value instanceof MethodNotFoundError ||
    value instanceof InvalidParamsError ||
    value instanceof InternalError
  ) {
    return value;
  }
  if (value instanceof Error) {
    return new InternalError(value.message, { cause: value });
  }
  return new InternalError(String(value), { cause: value });
}

// ---------------------------------------------------------------------------
// Type predicates
// ---------------------------------------------------------------------------

/** Narrow any caught value to a {@link JsonRpcError}. */
export function isJsonRpcError(err: unknown): err is JsonRpcError {
  return err instanceof JsonRpcError;
}

/** Narrow to a specific error by kind. */
export function isErrorKind<K extends JsonRpcErrorKind>(
  err: unknown,
  kind: K,
): err is Extract<AnyJsonRpcError, { kind: K }> {
  return err instanceof JsonRpcError && err.kind === kind;
}

/** Exhaustive-check helper. Call it in the `default` branch of a switch. */
export function assertNever(x: never): never {
  throw new Error(`Unexpected value: ${JSON.stringify(x)}`);
}
