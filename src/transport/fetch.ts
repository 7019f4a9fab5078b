/**
 * Default transport on the global fetch.
 */

import {
  TravisError,
  type BuiltRequest,
  type RawResponse,
  type Transport,
} from "../core/types.js";

export const DEFAULT_TIMEOUT_MS = 30000;

export interface FetchTransportConfig {
  /** Request timeout in ms (default: 30000) */
  timeout?: number;
  fetch?: typeof fetch;
}

export class FetchTransport implements Transport {
  private readonly timeout: number;
  private readonly fetchImpl: typeof fetch | undefined;

  constructor(config: FetchTransportConfig = {}) {
    this.timeout = config.timeout ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = config.fetch;
  }

  /**
   * Resolves for every HTTP status; rejects only when no response arrived.
   */
  async send(request: BuiltRequest): Promise<RawResponse> {
    // AbortController so a stalled connection cannot hold the request open
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    const init: RequestInit = {
      method: request.method,
      headers: request.headers,
      signal: controller.signal,
    };
    if (request.body !== undefined) {
      init.body = request.body;
    }

    try {
      const response = this.fetchImpl
        ? await this.fetchImpl(request.url, init)
        : await fetch(request.url, init);
      const body = await response.text();

      const headers = new Headers();
      response.headers.forEach((value, key) => {
        headers.set(key, value);
      });

      return {
        status: response.status,
        headers,
        body,
      };
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new TravisError("transportFailure", `Request timeout after ${this.timeout}ms`, {
          metadata: {
            timeout: this.timeout,
            method: request.method,
            path: request.path,
          },
          cause: error,
        });
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
