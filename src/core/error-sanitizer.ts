/**
 * Error metadata sanitizer
 *
 * INVARIANTS:
 * - Metadata on a returned TravisError never carries credential-like keys
 * - kind, message, field, remote and status are preserved as-is
 */

import { TravisError, type TravisErrorOptions } from "./types.js";

/**
 * Metadata keys that are dropped.
 */
const UNSAFE_METADATA_KEYS: readonly string[] = [
  "password",
  "secret",
  "token",
  "apiKey",
  "api_key",
  "authorization",
  "cookie",
  "session",
  "credentials",
  "privateKey",
  "private_key",
  "headers",
] as const;

export function sanitizeMetadata(
  metadata: Record<string, unknown> | undefined
): Record<string, unknown> | undefined {
  if (!metadata) {
    return undefined;
  }

  const sanitized: Record<string, unknown> = {};
  const lowerUnsafeKeys = UNSAFE_METADATA_KEYS.map((k) => k.toLowerCase());

  for (const [key, value] of Object.entries(metadata)) {
    const lowerKey = key.toLowerCase();

    if (lowerUnsafeKeys.some((unsafeKey) => lowerKey.includes(unsafeKey))) {
      continue;
    }

    if (isRecord(value)) {
      const nested = sanitizeMetadata(value);
      if (nested && Object.keys(nested).length > 0) {
        sanitized[key] = nested;
      }
    } else {
      sanitized[key] = value;
    }
  }

  return Object.keys(sanitized).length > 0 ? sanitized : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Copy of `error` with unsafe metadata keys removed. Errors without
 * metadata are returned unchanged.
 */
export function sanitizeTravisError(error: TravisError): TravisError {
  if (error.metadata === undefined) {
    return error;
  }
  const metadata = sanitizeMetadata(error.metadata);

  const options: TravisErrorOptions = {};
  if (error.field !== undefined) options.field = error.field;
  if (error.remote !== undefined) options.remote = error.remote;
  if (error.status !== undefined) options.status = error.status;
  if (error.cause !== undefined) options.cause = error.cause;
  if (metadata !== undefined) options.metadata = metadata;
  return new TravisError(error.kind, error.message, options);
}
