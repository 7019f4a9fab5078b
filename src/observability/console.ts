import type {
  ObservabilityAdapter,
  RequestContext,
  ResponseContext,
  ErrorContext,
  Metric,
} from "../core/types.js";

export interface ConsoleObservabilityConfig {
  pretty?: boolean;
}

/**
 * Writes one JSON line per event to stdout.
 */
export class ConsoleObservability implements ObservabilityAdapter {
  private config: ConsoleObservabilityConfig;

  constructor(config: ConsoleObservabilityConfig = {}) {
    this.config = config;
  }

  logRequest(context: RequestContext): void {
    const log = {
      level: "info",
      type: "request",
      method: context.method,
      path: context.path,
      query: context.query,
      requestId: context.requestId,
      timestamp: context.timestamp.toISOString(),
    };

    this.output(log);
  }

  logResponse(context: ResponseContext): void {
    const log = {
      level: "info",
      type: "response",
      method: context.method,
      path: context.path,
      requestId: context.requestId,
      statusCode: context.statusCode,
      resourceType: context.type,
      duration: context.duration,
      timestamp: context.timestamp.toISOString(),
    };

    this.output(log);
  }

  logError(context: ErrorContext): void {
    const log = {
      level: "error",
      type: "error",
      method: context.method,
      path: context.path,
      requestId: context.requestId,
      error: {
        kind: context.error.kind,
        message: context.error.message,
        field: context.error.field,
        status: context.error.status,
        remote: context.error.remote,
      },
      duration: context.duration,
      timestamp: context.timestamp.toISOString(),
    };

    this.output(log);
  }

  logWarning(message: string, metadata?: Record<string, unknown>): void {
    const log = {
      level: "warn",
      type: "warning",
      message,
      metadata,
      timestamp: new Date().toISOString(),
    };

    this.output(log);
  }

  recordMetric(metric: Metric): void {
    const log = {
      level: "info",
      type: "metric",
      name: metric.name,
      value: metric.value,
      tags: metric.tags,
      timestamp: metric.timestamp.toISOString(),
    };

    this.output(log);
  }

  private output(data: unknown): void {
    if (this.config.pretty) {
      console.log(JSON.stringify(data, null, 2));
    } else {
      console.log(JSON.stringify(data));
    }
  }
}
