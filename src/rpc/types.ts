/**
 * JSON-RPC 2.0 wire types and schemas.
 *
 * The interfaces describe what goes over the wire; the zod schemas validate
 * inbound documents before they become a {@link Request} or {@link Response}.
 */

import { z } from "zod";

/** Protocol version literal carried by every message. */
export const VERSION = "2.0";

/** Any JSON value. */
export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Correlation token. Any JSON scalar; `null` marks a notification.
 * Never interpreted numerically.
 */
export type RequestId = string | number | boolean | null;

/** The `error` member of an error response. */
export interface JsonRpcErrorData {
  code: number;
  message: string;
  data?: string;
}

export interface JsonRpcRequest {
  readonly jsonrpc: typeof VERSION;
  id?: RequestId;
  method: string;
  params?: JsonValue;
}

export interface JsonRpcSuccessResponse {
  readonly jsonrpc: typeof VERSION;
  id?: RequestId;
  result: JsonValue;
}

export interface JsonRpcErrorResponse {
  readonly jsonrpc: typeof VERSION;
  id?: RequestId;
  error: JsonRpcErrorData;
}

export type JsonRpcResponse = JsonRpcSuccessResponse | JsonRpcErrorResponse;

/** Standard JSON-RPC 2.0 error codes. */
export const ErrorCodes = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

/**
 * Accepts any JSON value. The walk uses an explicit stack, so nesting depth
 * is bounded by memory rather than by the call stack. Non-finite numbers,
 * non-plain objects and cycles are rejected.
 */
export const JsonValueSchema = z.custom<JsonValue>(isJsonValue, {
  message: "expected a JSON value",
});

/**
 * Numeric ids must survive a round trip through a double: integers within
 * the safe range, other numbers finite.
 */
const NumericIdSchema = z
  .number()
  .refine(
    (n) => (Number.isInteger(n) ? Number.isSafeInteger(n) : Number.isFinite(n)),
    "numeric id is out of range",
  );

export const RequestIdSchema = z.union([z.string(), NumericIdSchema, z.boolean(), z.null()]);

export const RequestSchema = z.object({
  jsonrpc: z.literal(VERSION),
  id: RequestIdSchema.optional(),
  method: z.string().min(1, "method must not be empty"),
  params: JsonValueSchema.optional(),
});

export const ErrorDataSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.string().optional(),
});

export const ResponseSchema = z
  .object({
    jsonrpc: z.literal(VERSION),
    id: RequestIdSchema.optional(),
    result: JsonValueSchema.optional(),
    error: ErrorDataSchema.optional(),
  })
  .refine((msg) => (msg.result === undefined) !== (msg.error === undefined), {
    message: "exactly one of result and error must be present",
  });

/** Render zod issues as a single diagnostic line. */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    )
    .join("; ");
}

/** Structural JSON check without recursion. */
export function isJsonValue(value: unknown): value is JsonValue {
  // `exit` frames close an object so cycles can be told from shared references.
  const stack: { value: unknown; exit: boolean }[] = [{ value, exit: false }];
  const open = new Set<object>();

  while (stack.length > 0) {
    const frame = stack.pop();
    if (frame === undefined) break;
    const current = frame.value;

    if (current === null || typeof current === "string" || typeof current === "boolean") continue;
    if (typeof current === "number") {
      if (!Number.isFinite(current)) return false;
      continue;
    }
    if (typeof current !== "object") return false;

    if (frame.exit) {
      open.delete(current);
      continue;
    }
    if (open.has(current)) return false;

    let children: unknown[];
    if (Array.isArray(current)) {
      children = current;
    } else {
      const proto: unknown = Object.getPrototypeOf(current);
      if (proto !== Object.prototype && proto !== null) return false;
      children = Object.values(current);
    }
    open.add(current);
    stack.push({ value: current, exit: true });
    for (const child of children) stack.push({ value: child, exit: false });
  }
  return true;
}
