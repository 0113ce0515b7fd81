/**
 * `rpc-chain check <message>`: parse one message and report the verdict.
 */
import { Request } from "../rpc/request.js";
import { Response } from "../rpc/response.js";

/** Prints the normalized request, or the error response. Returns the exit code. */
export function runCheck(message: string, opts: { omitNullId?: boolean } = {}): number {
  try {
    const request = Request.fromString(message);
    console.log(JSON.stringify(request));
    return 0;
  } catch (err) {
    const response = Response.fromError(err);
    console.log(JSON.stringify(response.toJSON({ omitNullId: opts.omitNullId })));
    return 1;
  }
}
