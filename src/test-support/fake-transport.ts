/**
 * In-process stand-ins for tests: a routed transport and a recording
 * observability adapter. No network.
 */

import type {
  BuiltRequest,
  ErrorContext,
  HttpMethod,
  Metric,
  ObservabilityAdapter,
  QueryParams,
  RawResponse,
  RequestContext,
  ResponseContext,
  Transport,
} from "../core/types.js";
import { encodeQuery } from "../core/request-builder.js";

export interface Reply {
  status?: number;
  /** Serialized with JSON.stringify unless already a string */
  body?: unknown;
}

function routeKey(method: HttpMethod, path: string, query: QueryParams): string {
  const search = encodeQuery(query);
  return search.length > 0 ? `${method} ${path}?${search}` : `${method} ${path}`;
}

export class FakeTransport implements Transport {
  readonly requests: BuiltRequest[] = [];
  private readonly routes = new Map<string, Reply | Error>();

  /** `target` is "/path" or "/path?a=1&b=2", query in the order it is sent */
  on(method: HttpMethod, target: string, reply: Reply | Error): this {
    this.routes.set(`${method} ${target}`, reply);
    return this;
  }

  async send(request: BuiltRequest): Promise<RawResponse> {
    this.requests.push(request);
    const reply = this.routes.get(routeKey(request.method, request.path, request.query));

    if (reply instanceof Error) {
      throw reply;
    }
    if (reply === undefined) {
      return {
        status: 404,
        headers: new Headers({ "content-type": "application/json" }),
        body: JSON.stringify({
          "@type": "error",
          error_type: "not_found",
          error_message: `no route for ${request.method} ${request.path}`,
        }),
      };
    }

    let body = "";
    if (typeof reply.body === "string") {
      body = reply.body;
    } else if (reply.body !== undefined) {
      body = JSON.stringify(reply.body);
    }

    return {
      status: reply.status ?? 200,
      headers: new Headers({ "content-type": "application/json" }),
      body,
    };
  }

  get last(): BuiltRequest | undefined {
    return this.requests[this.requests.length - 1];
  }
}

export class RecordingObservability implements ObservabilityAdapter {
  readonly requests: RequestContext[] = [];
  readonly responses: ResponseContext[] = [];
  readonly errors: ErrorContext[] = [];
  readonly warnings: Array<{ message: string; metadata: Record<string, unknown> | undefined }> = [];
  readonly metrics: Metric[] = [];

  logRequest(context: RequestContext): void {
    this.requests.push(context);
  }

  logResponse(context: ResponseContext): void {
    this.responses.push(context);
  }

  logError(context: ErrorContext): void {
    this.errors.push(context);
  }

  logWarning(message: string, metadata?: Record<string, unknown>): void {
    this.warnings.push({ message, metadata });
  }

  recordMetric(metric: Metric): void {
    this.metrics.push(metric);
  }

  metricNames(): string[] {
    return this.metrics.map((m) => m.name);
  }
}
