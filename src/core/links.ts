/**
 * Link following
 *
 * Turns hrefs found in earlier responses (embedded minimal stubs and
 * pagination links) into requests. Pure request builders: no I/O.
 */

import {
  TravisError,
  failure,
  success,
  type BuiltRequest,
  type DecodeResult,
  type QueryParams,
  type RequestTarget,
} from "./types.js";
import type { Page } from "./envelope.js";
import { buildRequest } from "./request-builder.js";

export interface LinkedReference {
  "@href"?: string | null | undefined;
}

/**
 * Resolves an href against the configured host.
 *
 * Rejected as `unparseableLink`:
 * - empty strings and strings containing whitespace
 * - strings the URL parser refuses
 * - hrefs resolving to another origin
 */
export function parseLink(
  href: string,
  target: RequestTarget
): DecodeResult<{ path: string; query: QueryParams }> {
  const unparseable = (reason: string) =>
    failure(
      new TravisError("unparseableLink", `Cannot follow link "${href}": ${reason}`, {
        metadata: { href },
      })
    );

  if (href.length === 0 || /\s/.test(href)) {
    return unparseable("not a URL reference");
  }

  let base: URL;
  let url: URL;
  try {
    base = new URL(`https://${target.host}`);
    url = new URL(href, base);
  } catch {
    return unparseable("not a URL reference");
  }

  if (url.origin !== base.origin) {
    return unparseable(`points outside ${base.host}`);
  }

  const query: QueryParams = {};
  for (const key of new Set(url.searchParams.keys())) {
    const values = url.searchParams.getAll(key);
    const [only] = values;
    query[key] = values.length === 1 && only !== undefined ? only : values;
  }
  return success({ path: url.pathname, query });
}

/**
 * Builds the request for the full representation behind a minimal stub.
 * Stubs without an href return `undefined`: not every embedded entity can
 * be fetched, and that is not an error.
 */
export function followMinimal(
  reference: LinkedReference,
  target: RequestTarget
): DecodeResult<BuiltRequest> | undefined {
  const href = reference["@href"];
  if (href === undefined || href === null || href.length === 0) {
    return undefined;
  }
  const link = parseLink(href, target);
  if (!link.ok) {
    return link;
  }
  return success(buildRequest(target, { method: "GET", ...link.value }));
}

/**
 * Builds the request for a page of a paginated collection.
 */
export function followPage(page: Page, target: RequestTarget): DecodeResult<BuiltRequest> {
  const link = parseLink(page.path, target);
  if (!link.ok) {
    return link;
  }
  return success(buildRequest(target, { method: "GET", ...link.value }));
}
