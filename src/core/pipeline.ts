/**
 * Request pipeline
 * Flow: log → transport → decode → log/metrics → deliver
 *
 * One logical request per call. No retries: a transport or decode failure
 * is returned as-is.
 */

import type {
  BuiltRequest,
  DeliveryContext,
  ErrorContext,
  ObservabilityAdapter,
  RawResponse,
  RequestContext,
  ResponseContext,
  SanitizerOptions,
  TravisResult,
  Transport,
} from "./types.js";
import { TravisError, failure } from "./types.js";
import { Envelope } from "./envelope.js";
import { deliver, type Completion } from "./delivery.js";
import { mapTransportError } from "./error-mapper.js";
import { sanitizeTravisError } from "./error-sanitizer.js";
import { sanitizeMetric, sanitizeObject } from "./observability-sanitizer.js";
import { sanitizeRequest } from "./request-sanitizer.js";
import { randomUUID } from "crypto";

export type Decoder<T> = (response: RawResponse) => TravisResult<T>;

export interface PipelineConfig {
  transport: Transport;
  delivery: DeliveryContext;
  observability: ObservabilityAdapter[];
  sanitizerOptions?: SanitizerOptions;
}

function documentType(value: unknown): string | undefined {
  if (value instanceof Envelope) {
    return value.type;
  }
  if (typeof value === "object" && value !== null && "type" in value && typeof value.type === "string") {
    return value.type;
  }
  return undefined;
}

export class RequestPipeline {
  private config: PipelineConfig;

  constructor(config: PipelineConfig) {
    this.config = config;
  }

  /**
   * Broadcasts an observability event to every adapter.
   *
   * Adapters are invoked independently; a throwing adapter is reported on
   * console.error (not through the adapters, to avoid loops) and the
   * request carries on.
   */
  private safelyBroadcastObservability(
    action: (adapter: ObservabilityAdapter) => void,
    actionName: string
  ): void {
    const errors: Array<{ adapter: string; error: unknown }> = [];

    for (const obs of this.config.observability) {
      try {
        action(obs);
      } catch (error) {
        errors.push({
          adapter: obs.constructor?.name || "UnknownObservabilityAdapter",
          error,
        });
      }
    }

    if (errors.length > 0) {
      const errorSummary = errors
        .map(
          ({ adapter, error }) =>
            `  - ${adapter}: ${error instanceof Error ? error.message : String(error)}`
        )
        .join("\n");

      console.error(
        `[travis-client] Observability failure in ${actionName} (${errors.length}/${this.config.observability.length} adapters failed):\n${errorSummary}`
      );
    }
  }

  /**
   * Sends `request`, decodes the response and delivers the result on the
   * configured context. Never rejects for transport or decode failures.
   */
  async execute<T>(
    request: BuiltRequest,
    decode: Decoder<T>,
    completion?: Completion<TravisResult<T>>
  ): Promise<TravisResult<T>> {
    const result = await this.run(request, decode);
    return deliver(this.config.delivery, result, completion);
  }

  /**
   * Delivers a failure that happened before anything was sent (e.g. an
   * unparseable link), through the same context as any other result.
   */
  reject<T>(
    error: TravisError,
    completion?: Completion<TravisResult<T>>
  ): Promise<TravisResult<T>> {
    const sanitized = sanitizeTravisError(error);
    this.warn(`Request not sent: ${sanitized.message}`, { kind: sanitized.kind });
    const result: TravisResult<T> = failure(sanitized);
    return deliver(this.config.delivery, result, completion);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    const cleaned = metadata === undefined ? undefined : this.sanitizeForLogs(metadata);
    this.safelyBroadcastObservability(
      (obs) => obs.logWarning(message, cleaned),
      "logWarning"
    );
  }

  private async run<T>(request: BuiltRequest, decode: Decoder<T>): Promise<TravisResult<T>> {
    const requestId = randomUUID();
    const startTime = Date.now();

    const sanitized = sanitizeRequest(request, this.config.sanitizerOptions);
    const requestContext: RequestContext = {
      method: request.method,
      path: request.path,
      query: sanitized.query,
      headers: sanitized.headers,
      requestId,
      timestamp: new Date(),
    };
    if (sanitized.body !== undefined) {
      requestContext.body = sanitized.body;
    }

    this.safelyBroadcastObservability(
      (obs) => obs.logRequest(requestContext),
      "logRequest"
    );

    let response: RawResponse;
    try {
      response = await this.config.transport.send(request);
    } catch (error) {
      return this.fail(request, requestId, startTime, mapTransportError(error, request));
    }

    const decoded = decode(response);
    if (!decoded.ok) {
      return this.fail(request, requestId, startTime, decoded.error);
    }

    const duration = Date.now() - startTime;
    const responseContext: ResponseContext = {
      method: request.method,
      path: request.path,
      requestId,
      statusCode: response.status,
      duration,
      timestamp: new Date(),
    };
    const type = documentType(decoded.value);
    if (type !== undefined) {
      responseContext.type = type;
    }

    this.safelyBroadcastObservability(
      (obs) => obs.logResponse(responseContext),
      "logResponse"
    );

    this.safelyBroadcastObservability(
      (obs) => obs.recordMetric(sanitizeMetric({
        name: "travis.request.count",
        value: 1,
        tags: {
          method: request.method,
          path: request.path,
          status: String(response.status),
        },
        timestamp: new Date(),
      }, this.config.sanitizerOptions)),
      "recordMetric:request.count"
    );

    this.safelyBroadcastObservability(
      (obs) => obs.recordMetric(sanitizeMetric({
        name: "travis.request.duration",
        value: duration,
        tags: {
          method: request.method,
          path: request.path,
        },
        timestamp: new Date(),
      }, this.config.sanitizerOptions)),
      "recordMetric:request.duration"
    );

    return decoded;
  }

  private fail<T>(
    request: BuiltRequest,
    requestId: string,
    startTime: number,
    error: TravisError
  ): TravisResult<T> {
    const sanitized = sanitizeTravisError(error);

    // Error metadata is clean at this point; logs get a second pass with
    // the observability redaction list (which also covers variable values).
    const logged = sanitized.metadata === undefined
      ? sanitized
      : new TravisError(sanitized.kind, sanitized.message, {
          ...(sanitized.field !== undefined ? { field: sanitized.field } : {}),
          ...(sanitized.remote !== undefined ? { remote: sanitized.remote } : {}),
          ...(sanitized.status !== undefined ? { status: sanitized.status } : {}),
          metadata: this.sanitizeForLogs(sanitized.metadata),
        });

    const errorContext: ErrorContext = {
      method: request.method,
      path: request.path,
      requestId,
      error: logged,
      duration: Date.now() - startTime,
      timestamp: new Date(),
    };

    this.safelyBroadcastObservability(
      (obs) => obs.logError(errorContext),
      "logError"
    );

    this.safelyBroadcastObservability(
      (obs) => obs.recordMetric(sanitizeMetric({
        name: "travis.request.error",
        value: 1,
        tags: {
          method: request.method,
          path: request.path,
          kind: sanitized.kind,
        },
        timestamp: new Date(),
      }, this.config.sanitizerOptions)),
      "recordMetric:request.error"
    );

    return failure(sanitized);
  }

  private sanitizeForLogs(metadata: Record<string, unknown>): Record<string, unknown> {
    const cleaned = sanitizeObject(metadata, this.config.sanitizerOptions);
    const out: Record<string, unknown> = {};
    if (typeof cleaned === "object" && cleaned !== null) {
      for (const [key, value] of Object.entries(cleaned)) {
        out[key] = value;
      }
    }
    return out;
  }
}
