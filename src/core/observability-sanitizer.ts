import type { Metric, SanitizerOptions } from "./types.js";
import { CREDENTIAL_SCHEME, REDACTED } from "./request-sanitizer.js";

const DEFAULT = [
  "authorization",
  "cookie",
  "token",
  "apikey",
  "api_key",
  "value",
];

function shouldRedact(key: string, redacted: string[]) {
  const lower = key.toLowerCase();
  return redacted.some(r => lower.includes(r));
}

/**
 * Deep copy of `obj` with sensitive keys replaced. Environment variable
 * values are redacted by default.
 */
export function sanitizeObject(obj: unknown, opts?: SanitizerOptions): unknown {
  const redacted = (opts?.redactedKeys ?? DEFAULT).map(s => s.toLowerCase());

  if (obj === null || obj === undefined) return obj;
  if (typeof obj !== "object") return obj;

  if (Array.isArray(obj)) {
    return obj.map(v => sanitizeObject(v, opts));
  }

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(obj)) {
    if (shouldRedact(k, redacted)) {
      out[k] = REDACTED;
    } else if (v && typeof v === "object") {
      out[k] = sanitizeObject(v, opts);
    } else {
      out[k] = v;
    }
  }
  return out;
}

// A tag value carrying a credential query parameter, e.g. "/repos?token=abc"
function hasCredentialParam(value: string, redacted: string[]) {
  const query = value.indexOf("?");
  if (query === -1) return false;
  const params = new URLSearchParams(value.slice(query + 1));
  return [...params.keys()].some(key => shouldRedact(key, redacted));
}

/**
 * Tags are redacted by key. Values are only inspected for credentials
 * (an Authorization scheme or a credential query parameter), so names such
 * as "tokenizer" survive.
 */
export function sanitizeMetric(metric: Metric, opts?: SanitizerOptions): Metric {
  const redacted = (opts?.redactedKeys ?? DEFAULT).map(s => s.toLowerCase());
  const tags: Record<string, string> = {};
  for (const [k, v] of Object.entries(metric.tags)) {
    if (shouldRedact(k, redacted) || CREDENTIAL_SCHEME.test(v) || hasCredentialParam(v, redacted)) {
      tags[k] = REDACTED;
    } else {
      tags[k] = v;
    }
  }
  return { ...metric, tags };
}
