/**
 * Envelope decoding
 *
 * Every v3 response is an object tagged with `@type`. For collections the
 * payload sits under a key named after the type:
 *
 *   { "@type": "repositories", "@href": "/repos", "@pagination": {...}, "repositories": [...] }
 *
 * For single resources the fields are inlined next to the metadata keys:
 *
 *   { "@type": "repository", "@href": "/repo/1", "id": 1, "name": "..." }
 *
 * The decoder handles both shapes with one envelope type.
 */

import { z } from "zod";
import {
  TravisError,
  failure,
  success,
  type DecodeResult,
  type RawResponse,
  type TravisErrorOptions,
} from "./types.js";
import { RemoteErrorSchema, toRemoteErrorMessage } from "../models/error.js";

// ============================================================================
// Pagination
// ============================================================================

export interface Page {
  readonly path: string;
  readonly offset?: number;
  readonly limit?: number;
}

export interface Pagination {
  readonly limit: number;
  readonly offset: number;
  readonly count: number;
  readonly isFirst?: boolean;
  readonly isLast?: boolean;
  readonly self?: Page;
  readonly next?: Page;
  readonly previous?: Page;
  readonly first?: Page;
  readonly last?: Page;
}

const PageLinkSchema = z
  .object({
    "@href": z.string(),
    offset: z.number().int().optional(),
    limit: z.number().int().optional(),
  })
  .passthrough();

const PaginationSchema = z
  .object({
    limit: z.number().int(),
    offset: z.number().int(),
    count: z.number().int(),
    is_first: z.boolean().optional(),
    is_last: z.boolean().optional(),
    self: PageLinkSchema.nullish(),
    next: PageLinkSchema.nullish(),
    prev: PageLinkSchema.nullish(),
    first: PageLinkSchema.nullish(),
    last: PageLinkSchema.nullish(),
  })
  .passthrough();

type PageLink = z.infer<typeof PageLinkSchema>;

function toPage(link: PageLink): Page {
  const page: { path: string; offset?: number; limit?: number } = { path: link["@href"] };
  if (link.offset !== undefined) {
    page.offset = link.offset;
  }
  if (link.limit !== undefined) {
    page.limit = link.limit;
  }
  return page;
}

function toPagination(wire: z.infer<typeof PaginationSchema>): Pagination {
  const pagination: {
    -readonly [K in keyof Pagination]: Pagination[K];
  } = {
    limit: wire.limit,
    offset: wire.offset,
    count: wire.count,
  };
  if (wire.is_first !== undefined) {
    pagination.isFirst = wire.is_first;
  }
  if (wire.is_last !== undefined) {
    pagination.isLast = wire.is_last;
  }
  if (wire.self) {
    pagination.self = toPage(wire.self);
  }
  if (wire.next) {
    pagination.next = toPage(wire.next);
  }
  if (wire.prev) {
    pagination.previous = toPage(wire.prev);
  }
  if (wire.first) {
    pagination.first = toPage(wire.first);
  }
  if (wire.last) {
    pagination.last = toPage(wire.last);
  }
  return pagination;
}

// ============================================================================
// Envelope
// ============================================================================

export type ElementOf<T> = T extends ReadonlyArray<infer E> ? E : never;

function isSequence<T>(value: T): value is T & ReadonlyArray<ElementOf<T>> {
  return Array.isArray(value);
}

/**
 * Decoded wrapper around a single resource or a collection.
 *
 * Field reads go through `get`, which forwards to `object`. When the
 * payload is an array the envelope iterates over it.
 */
export class Envelope<T> implements Iterable<ElementOf<T>> {
  readonly type: string;
  readonly path: string;
  readonly pagination?: Pagination;
  readonly object: T;

  constructor(type: string, path: string, object: T, pagination?: Pagination) {
    this.type = type;
    this.path = path;
    this.object = object;
    if (pagination !== undefined) {
      this.pagination = pagination;
    }
  }

  get<K extends keyof T>(key: K): T[K] {
    return this.object[key];
  }

  *[Symbol.iterator](): Iterator<ElementOf<T>> {
    const object = this.object;
    if (!isSequence(object)) {
      throw new TypeError(`Envelope of type "${this.type}" does not wrap a collection`);
    }
    yield* object;
  }
}

// ============================================================================
// Decoding
// ============================================================================

export const DISCRIMINATOR_KEY = "@type";
export const PATH_KEY = "@href";
export const PAGINATION_KEY = "@pagination";

export type JsonObject = Record<string, unknown>;

export type PayloadSelection =
  | { source: "nested"; value: unknown }
  | { source: "inline"; value: JsonObject };

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseDocument(text: string): DecodeResult<unknown> {
  if (text.trim().length === 0) {
    return failure(new TravisError("malformedDocument", "Response body is empty"));
  }
  try {
    const document: unknown = JSON.parse(text);
    return success(document);
  } catch (error) {
    return failure(
      new TravisError("malformedDocument", "Response body is not valid JSON", {
        cause: error,
        metadata: { reason: error instanceof Error ? error.message : String(error) },
      })
    );
  }
}

/**
 * Picks the payload out of an envelope document.
 * A non-null value under the type key wins; otherwise the document itself
 * is the payload.
 */
export function selectPayload(document: JsonObject, type: string): PayloadSelection {
  const nested = Object.prototype.hasOwnProperty.call(document, type) ? document[type] : undefined;
  if (nested !== undefined && nested !== null) {
    return { source: "nested", value: nested };
  }
  return { source: "inline", value: document };
}

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const at = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${at}: ${issue.message}`;
  });
}

export function decodeWith<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  context: string
): DecodeResult<T> {
  const parsed = schema.safeParse(value);
  if (parsed.success) {
    return success(parsed.data);
  }
  return failure(
    new TravisError("schemaMismatch", `${context} does not match the expected shape`, {
      metadata: { issues: describeIssues(parsed.error) },
    })
  );
}

function readString(
  document: JsonObject,
  key: string,
  missing: () => TravisError
): DecodeResult<string> {
  const value = document[key];
  if (value === undefined || value === null) {
    return failure(missing());
  }
  if (typeof value !== "string") {
    return failure(
      new TravisError("schemaMismatch", `Expected "${key}" to be a string`, { field: key })
    );
  }
  return success(value);
}

/**
 * Decodes an already parsed document into an envelope.
 *
 * Metadata is read first (`@type` and `@href` are mandatory), then the
 * payload is resolved with `selectPayload` and validated against `schema`.
 * A nested payload that fails validation is reported as a mismatch; it is
 * not retried against the whole document.
 */
export function decodeEnvelope<T>(
  document: unknown,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  discriminatorKey: string = DISCRIMINATOR_KEY
): DecodeResult<Envelope<T>> {
  if (!isJsonObject(document)) {
    return failure(new TravisError("schemaMismatch", "Expected the document to be a JSON object"));
  }

  const type = readString(
    document,
    discriminatorKey,
    () =>
      new TravisError("missingDiscriminator", `Document has no "${discriminatorKey}" discriminator`, {
        field: discriminatorKey,
      })
  );
  if (!type.ok) {
    return type;
  }

  const path = readString(
    document,
    PATH_KEY,
    () => new TravisError("missingField", `Document has no "${PATH_KEY}"`, { field: PATH_KEY })
  );
  if (!path.ok) {
    return path;
  }

  let pagination: Pagination | undefined;
  const rawPagination = document[PAGINATION_KEY];
  if (rawPagination !== undefined && rawPagination !== null) {
    const decoded = decodeWith(PaginationSchema, rawPagination, PAGINATION_KEY);
    if (!decoded.ok) {
      return decoded;
    }
    pagination = toPagination(decoded.value);
  }

  const selection = selectPayload(document, type.value);
  const object = decodeWith(
    schema,
    selection.value,
    selection.source === "nested" ? `"${type.value}" payload` : `"${type.value}" document`
  );
  if (!object.ok) {
    return object;
  }

  return success(new Envelope(type.value, path.value, object.value, pagination));
}

/**
 * Recognizes the API's error document.
 */
export function decodeRemoteError(document: unknown, status?: number): TravisError | undefined {
  const parsed = RemoteErrorSchema.safeParse(document);
  if (!parsed.success) {
    return undefined;
  }
  const remote = toRemoteErrorMessage(parsed.data);
  return new TravisError("remoteError", remote.errorMessage, {
    remote,
    ...(status !== undefined ? { status } : {}),
  });
}

/**
 * Turns a raw response into a typed value.
 *
 * Order: no bytes → transportFailure; invalid JSON → malformedDocument;
 * then `decode`. If `decode` fails and the document is an API error
 * document, that error wins.
 */
export function decodeDocument<T>(
  response: RawResponse,
  decode: (document: unknown) => DecodeResult<T>
): DecodeResult<T> {
  if (response.body.length === 0) {
    return failure(
      new TravisError("transportFailure", `Response ${response.status} carried no data`, {
        status: response.status,
      })
    );
  }

  const document = parseDocument(response.body);
  if (!document.ok) {
    return failure(withStatus(document.error, response.status));
  }

  const decoded = decode(document.value);
  if (decoded.ok) {
    return decoded;
  }

  const remote = decodeRemoteError(document.value, response.status);
  if (remote) {
    return failure(remote);
  }
  return failure(withStatus(decoded.error, response.status));
}

export function decodeResponse<T>(
  response: RawResponse,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): DecodeResult<Envelope<T>> {
  return decodeDocument(response, (document) => decodeEnvelope(document, schema));
}

function withStatus(error: TravisError, status: number): TravisError {
  if (error.status !== undefined) {
    return error;
  }
  const options: TravisErrorOptions = { status };
  if (error.field !== undefined) options.field = error.field;
  if (error.remote !== undefined) options.remote = error.remote;
  if (error.metadata !== undefined) options.metadata = error.metadata;
  if (error.cause !== undefined) options.cause = error.cause;
  return new TravisError(error.kind, error.message, options);
}
