/**
 * Request construction for the Travis v3 API.
 *
 * Builds requests but never executes them; the pipeline hands the result
 * to the transport.
 */

import type {
  BuiltRequest,
  QueryParams,
  RequestOptions,
  RequestTarget,
  TravisEndpoint,
} from "./types.js";
import { API_VERSION, SDK_VERSION } from "./types.js";

export const DEFAULT_USER_AGENT = `travis-v3-client/${SDK_VERSION}`;

const PUBLIC_HOSTS = {
  org: "api.travis-ci.org",
  com: "api.travis-ci.com",
} as const;

export function resolveHost(endpoint: TravisEndpoint): string {
  if (typeof endpoint === "string") {
    return PUBLIC_HOSTS[endpoint];
  }
  return endpoint.enterprise;
}

export function createRequestTarget(
  token: string,
  endpoint: TravisEndpoint = "org",
  userAgent: string = DEFAULT_USER_AGENT
): RequestTarget {
  return { host: resolveHost(endpoint), token, userAgent };
}

/**
 * Escapes an id or slug so it stays a single path segment.
 * "travis-ci/travis-web" becomes "travis-ci%2Ftravis-web".
 */
export function pathEscape(segment: string | number): string {
  return encodeURIComponent(String(segment));
}

/**
 * Joins segments into an absolute API path, escaping each one.
 */
export function apiPath(...segments: Array<string | number>): string {
  return "/" + segments.map(pathEscape).join("/");
}

export function buildHeaders(target: RequestTarget): Record<string, string> {
  return {
    "Travis-API-Version": API_VERSION,
    "Authorization": `token ${target.token}`,
    "User-Agent": target.userAgent,
    "Accept": "application/json",
  };
}

/**
 * Serializes query parameters, repeating a key once per value.
 */
export function encodeQuery(query: QueryParams): string {
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    for (const item of Array.isArray(value) ? value : [value]) {
      params.append(key, item);
    }
  }
  return params.toString();
}

export function buildRequest(target: RequestTarget, options: RequestOptions): BuiltRequest {
  const method = options.method ?? "GET";
  const query: QueryParams = {};
  for (const [key, value] of Object.entries(options.query ?? {})) {
    query[key] = Array.isArray(value) ? [...value] : value;
  }

  const url = new URL(`https://${target.host}`);
  // The path is already percent-encoded segment by segment.
  url.pathname = options.path;
  url.search = encodeQuery(query);

  const headers = buildHeaders(target);

  const built: BuiltRequest = {
    method,
    url: url.toString(),
    host: target.host,
    path: options.path,
    query,
    headers,
  };

  if (options.body !== undefined && method !== "GET") {
    built.body = JSON.stringify(options.body);
    headers["Content-Type"] = "application/json";
  }

  return built;
}
