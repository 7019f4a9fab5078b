/**
 * Core type definitions for the Travis v3 client
 */

// ============================================================================
// Error Contract
// ============================================================================

/**
 * Canonical error kinds.
 * Every failure a request can end in is reported as exactly one of these.
 */
export type TravisErrorKind =
  | "transportFailure"     // No response bytes (network failure, timeout, empty body)
  | "malformedDocument"    // Body is not valid JSON
  | "missingDiscriminator" // Envelope has no @type
  | "missingField"         // A mandatory metadata key is absent
  | "schemaMismatch"       // Payload does not match the expected model
  | "unparseableLink"      // Pagination or embedded href is not a usable URL
  | "remoteError";         // Service answered with its error document

/**
 * Error document returned by the API:
 * `{ "@type": "error", "error_type": "not_found", "error_message": "..." }`
 */
export interface RemoteErrorMessage {
  errorType: string;
  errorMessage: string;
  resourceType?: string;
}

export interface TravisErrorOptions {
  field?: string;
  remote?: RemoteErrorMessage;
  status?: number;
  metadata?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Canonical client error.
 *
 * INVARIANTS:
 * - `kind` is always one of the canonical kinds
 * - `field` is set for `missingField`
 * - `remote` is set for `remoteError`
 * - `metadata` never holds credentials (see error-sanitizer)
 */
export class TravisError extends Error {
  readonly kind: TravisErrorKind;
  readonly field?: string;
  readonly remote?: RemoteErrorMessage;
  readonly status?: number;
  readonly metadata?: Record<string, unknown>;

  constructor(kind: TravisErrorKind, message: string, options: TravisErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "TravisError";
    this.kind = kind;
    if (options.field !== undefined) {
      this.field = options.field;
    }
    if (options.remote !== undefined) {
      this.remote = options.remote;
    }
    if (options.status !== undefined) {
      this.status = options.status;
    }
    if (options.metadata !== undefined) {
      this.metadata = options.metadata;
    }
  }
}

export function isTravisError(value: unknown): value is TravisError {
  return value instanceof TravisError;
}

// ============================================================================
// Results
// ============================================================================

export type Success<T> = { ok: true; value: T };
export type Failure = { ok: false; error: TravisError };

/**
 * Outcome of a decode step or of a whole request. Failures are values,
 * never thrown.
 */
export type DecodeResult<T> = Success<T> | Failure;
export type TravisResult<T> = DecodeResult<T>;

export function success<T>(value: T): Success<T> {
  return { ok: true, value };
}

export function failure(error: TravisError): Failure {
  return { ok: false, error };
}

// ============================================================================
// Endpoint Environments
// ============================================================================

/**
 * Which Travis installation to talk to.
 * - "org": api.travis-ci.org
 * - "com": api.travis-ci.com
 * - { enterprise }: a self-hosted installation's API host
 */
export type TravisEndpoint = "org" | "com" | { enterprise: string };

// ============================================================================
// Request Types
// ============================================================================

export type HttpMethod = "GET" | "POST" | "PATCH" | "DELETE";

/** A key the server repeats ("include=a&include=b") maps to every value, in order. */
export type QueryParams = Record<string, string | string[]>;

export interface RequestOptions {
  method?: HttpMethod;
  path: string;
  query?: QueryParams;
  body?: unknown;
}

/**
 * Everything needed to address the API: resolved host plus credentials.
 */
export interface RequestTarget {
  host: string;
  token: string;
  userAgent: string;
}

/**
 * Fully formed request, ready for the transport.
 */
export interface BuiltRequest {
  method: HttpMethod;
  url: string;
  host: string;
  path: string;
  query: QueryParams;
  headers: Record<string, string>;
  body?: string;
}

export interface RawResponse {
  status: number;
  headers: Headers;
  body: string;
}

// ============================================================================
// Transport
// ============================================================================

/**
 * External collaborator that moves bytes.
 *
 * GUARANTEES expected from implementations:
 * - Resolves with the raw body for every HTTP status
 * - Rejects only when no response was received
 */
export interface Transport {
  send(request: BuiltRequest): Promise<RawResponse>;
}

// ============================================================================
// Delivery
// ============================================================================

/**
 * Execution context results are delivered on. `schedule` must run the task
 * later, never inline.
 */
export interface DeliveryContext {
  schedule(task: () => void): void;
}

// ============================================================================
// Observability
// ============================================================================

export interface RequestContext {
  method: HttpMethod;
  path: string;
  query: QueryParams;
  requestId: string;
  timestamp: Date;
  headers: Record<string, string>;
  body?: unknown;
}

export interface ResponseContext {
  method: HttpMethod;
  path: string;
  requestId: string;
  statusCode: number;
  /** `@type` of the decoded document, when it has one */
  type?: string;
  duration: number;
  timestamp: Date;
}

export interface ErrorContext {
  method: HttpMethod;
  path: string;
  requestId: string;
  error: TravisError;
  duration: number;
  timestamp: Date;
}

export interface Metric {
  name: string;
  value: number;
  tags: Record<string, string>;
  timestamp: Date;
}

export interface ObservabilityAdapter {
  logRequest(context: RequestContext): void;
  logResponse(context: ResponseContext): void;
  logError(context: ErrorContext): void;
  logWarning(message: string, metadata?: Record<string, unknown>): void;
  recordMetric(metric: Metric): void;
}

// ============================================================================
// Configuration
// ============================================================================

export interface SanitizerOptions {
  redactedKeys?: string[];
}

export interface TravisClientConfig {
  token: string;
  endpoint?: TravisEndpoint;
  transport?: Transport;
  delivery?: DeliveryContext;
  observability?: ObservabilityAdapter | ObservabilityAdapter[];
  /** Request timeout for the default transport, in ms (default: 30000) */
  timeout?: number;
  userAgent?: string;
  sanitizer?: SanitizerOptions;
}

// ============================================================================
// Versioning
// ============================================================================

export const SDK_VERSION = "0.1.0";

export const API_VERSION = "3";
