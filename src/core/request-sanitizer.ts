import type { BuiltRequest, QueryParams, SanitizerOptions } from "./types.js";

export const REDACTED = "[REDACTED]";

const DEFAULT_REDACTED = [
  "authorization",
  "cookie",
  "token",
  "apikey",
  "api_key",
  "body",
];

export interface SanitizedRequest {
  headers: Record<string, string>;
  query: QueryParams;
  body?: unknown;
}

function normalize(key: string): string {
  return key.toLowerCase().replace(/[-_]/g, "");
}

/** "token abc", "Bearer abc", "Basic abc" */
export const CREDENTIAL_SCHEME = /^(token|bearer|basic)\s/i;

function isRedactedKey(key: string, redacted: string[]): boolean {
  const normalized = normalize(key);
  return redacted.some((r) => normalized.includes(normalize(r)));
}

function redactHeaders(headers: Record<string, string>, redacted: string[]): Record<string, string> {
  const copy: Record<string, string> = {};
  for (const [k, v] of Object.entries(headers)) {
    copy[k] = isRedactedKey(k, redacted) || CREDENTIAL_SCHEME.test(v) ? REDACTED : v;
  }
  return copy;
}

function redactQuery(query: QueryParams, redacted: string[]): QueryParams {
  const copy: QueryParams = {};
  for (const [k, v] of Object.entries(query)) {
    const values = Array.isArray(v) ? v : [v];
    if (isRedactedKey(k, redacted) || values.some((item) => CREDENTIAL_SCHEME.test(item))) {
      copy[k] = REDACTED;
    } else {
      copy[k] = Array.isArray(v) ? [...v] : v;
    }
  }
  return copy;
}

/**
 * Strips credentials from a request before it reaches observability.
 * Bodies are redacted whole unless "body" is removed from the redacted keys.
 */
export function sanitizeRequest(request: BuiltRequest, opts?: SanitizerOptions): SanitizedRequest {
  const redacted = (opts?.redactedKeys ?? DEFAULT_REDACTED).map((k) => k.toLowerCase());

  const sanitized: SanitizedRequest = {
    headers: redactHeaders(request.headers, redacted),
    query: redactQuery(request.query, redacted),
  };

  if (request.body !== undefined) {
    sanitized.body = redacted.includes("body") ? REDACTED : request.body;
  }

  return sanitized;
}
