/**
 * Public API surface of the Travis v3 client.
 *
 * This is the ONLY file consumers should import from.
 * All other modules are internal implementation details.
 */

// Main client
export { TravisClient, DEFAULT_MAX_PAGES } from "./index.js";
export type {
  ActionOutcome,
  EnvelopeResult,
  ModelSchema,
  PaginateOptions,
  RepositoryId,
} from "./index.js";

// Configuration
export { configFromEnv } from "./core/config.js";
export type {
  TravisClientConfig,
  TravisEndpoint,
  SanitizerOptions,
  RequestOptions,
  HttpMethod,
  QueryParams,
} from "./core/types.js";

// Results and errors - frozen contract
export { TravisError, isTravisError, success, failure } from "./core/types.js";
export type {
  TravisErrorKind,
  RemoteErrorMessage,
  TravisResult,
  DecodeResult,
  Success,
  Failure,
} from "./core/types.js";

// Envelope decoding
export { Envelope, decodeEnvelope, decodeResponse, parseDocument, selectPayload } from "./core/envelope.js";
export type { Page, Pagination, ElementOf } from "./core/envelope.js";
export { decodeAction } from "./core/action.js";
export type { ActionResult } from "./core/action.js";

// Link following (request builders, no I/O)
export { followMinimal, followPage } from "./core/links.js";
export type { LinkedReference } from "./core/links.js";

// Transport and delivery extension points
export type { Transport, BuiltRequest, RawResponse, DeliveryContext } from "./core/types.js";
export { FetchTransport } from "./transport/fetch.js";
export type { FetchTransportConfig } from "./transport/fetch.js";
export { immediateDelivery, microtaskDelivery } from "./core/delivery.js";
export type { Completion } from "./core/delivery.js";

// Observability extension point
export type {
  ObservabilityAdapter,
  RequestContext,
  ResponseContext,
  ErrorContext,
  Metric,
} from "./core/types.js";

// Built-in observability adapters
export { ConsoleObservability, NoOpObservability } from "./observability/index.js";
export type { ConsoleObservabilityConfig } from "./observability/index.js";

// Resource models
export * from "./models/index.js";
