/**
 * rpc-chain: transport-agnostic JSON-RPC 2.0 dispatch through an ordered
 * chain of services.
 *
 * @example Quick start
 * ```ts
 * import { z } from "zod";
 * import { Request, Response, Server, type Service } from "rpc-chain";
 *
 * const hello: Service = {
 *   handle(req) {
 *     if (!req.matches("hello")) return undefined;
 *     return Response.success(req, `Hello, ${req.deserialize(z.string())}!`);
 *   },
 * };
 *
 * const server = new Server([hello]);
 * const response = server.serve(Request.newReply("hello", "world"), undefined);
 * response?.result; // "Hello, world!"
 * ```
 */

export { Request } from "./rpc/request.js";
export { Response, type SerializeOptions } from "./rpc/response.js";
export {
  VERSION,
  ErrorCodes,
  JsonValueSchema,
  RequestIdSchema,
  RequestSchema,
  ResponseSchema,
  formatIssues,
  isJsonValue,
  type ErrorCode,
  type JsonValue,
  type RequestId,
  type JsonRpcErrorData,
  type JsonRpcRequest,
  type JsonRpcResponse,
  type JsonRpcSuccessResponse,
  type JsonRpcErrorResponse,
} from "./rpc/types.js";

export {
  JsonRpcError,
  ParseError,
  InvalidRequestError,
  MethodNotFoundError,
  InvalidParamsError,
  InternalError,
  toErrorData,
  classifyError,
  isJsonRpcError,
  isErrorKind,
  assertNever,
  type JsonRpcErrorKind,
  type AnyJsonRpcError,
} from "./errors.js";

export {
  methodService,
  asyncMethodService,
  type Service,
  type AsyncService,
  type MethodHandler,
  type AsyncMethodHandler,
} from "./service.js";

export {
  Server,
  AsyncServer,
  type ServerOptions,
  type NotificationErrorPolicy,
} from "./server.js";

export type { Transport, TransportState, Disposable } from "./transport/transport.js";
export { createMemoryTransport } from "./transport/memory.js";
export { StdioTransport, type StdioTransportOptions } from "./transport/stdio.js";
export { bindTransport, type BindOptions, type Binding } from "./transport/bind.js";

export { loadConfig, ConfigSchema, type Config, type ConfigOverrides } from "./config.js";
export {
  createLogger,
  silentLogger,
  LOG_LEVELS,
  type Logger,
  type LoggerOptions,
  type LogLevel,
} from "./logger.js";
