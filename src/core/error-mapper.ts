/**
 * Maps transport rejections onto TravisError.
 */

import { TravisError, type BuiltRequest } from "./types.js";

const NETWORK_CODES = ["ECONNRESET", "ECONNREFUSED", "ETIMEDOUT", "ENOTFOUND", "EAI_AGAIN"];

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  if (error instanceof Error && error.cause !== undefined) {
    return errorCode(error.cause);
  }
  return undefined;
}

export function mapTransportError(error: unknown, request: BuiltRequest): TravisError {
  if (error instanceof TravisError) {
    return error;
  }

  const metadata: Record<string, unknown> = {
    method: request.method,
    path: request.path,
  };

  const code = errorCode(error);
  if (code !== undefined) {
    metadata["code"] = code;
  }

  let message = "Request failed before a response was received";
  if (code !== undefined && NETWORK_CODES.includes(code)) {
    message = `Network request failed (${code}). Check your connection and try again.`;
  } else if (error instanceof Error && error.message.length > 0) {
    message = `Request failed before a response was received: ${error.message}`;
  }

  return new TravisError("transportFailure", message, { metadata, cause: error });
}
