import { describe, it, expect, vi } from "vitest";
import { FetchTransport } from "./fetch.js";
import { buildRequest, createRequestTarget } from "../core/request-builder.js";
import { isTravisError } from "../core/types.js";

const target = createRequestTarget("test-token", "com");

describe("FetchTransport", () => {
  it("should send the built request and return the raw body", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () =>
      new Response('{"@type":"user"}', { status: 200, headers: { "x-request-id": "abc" } })
    );
    const transport = new FetchTransport({ fetch: fetchImpl });
    const request = buildRequest(target, { method: "POST", path: "/repo/1/star", body: {} });

    const response = await transport.send(request);

    expect(response.status).toBe(200);
    expect(response.body).toBe('{"@type":"user"}');
    expect(response.headers.get("x-request-id")).toBe("abc");

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe("https://api.travis-ci.com/repo/1/star");
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe("{}");
    expect(init?.headers).toEqual(request.headers);
  });

  it("should resolve for error statuses", async () => {
    const transport = new FetchTransport({
      fetch: async () => new Response('{"@type":"error"}', { status: 403 }),
    });

    const response = await transport.send(buildRequest(target, { path: "/user" }));

    expect(response.status).toBe(403);
    expect(response.body).toBe('{"@type":"error"}');
  });

  it("should turn an abort into a timeout failure", async () => {
    const transport = new FetchTransport({
      timeout: 5,
      fetch: (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => {
            reject(Object.assign(new Error("This operation was aborted"), { name: "AbortError" }));
          });
        }),
    });

    const failure = await transport.send(buildRequest(target, { path: "/repos" })).catch((error: unknown) => error);

    expect(isTravisError(failure)).toBe(true);
    if (!isTravisError(failure)) return;
    expect(failure.kind).toBe("transportFailure");
    expect(failure.message).toBe("Request timeout after 5ms");
    expect(failure.metadata).toEqual({ timeout: 5, method: "GET", path: "/repos" });
  });

  it("should rethrow other fetch errors", async () => {
    const boom = new TypeError("fetch failed");
    const transport = new FetchTransport({
      fetch: async () => {
        throw boom;
      },
    });

    await expect(transport.send(buildRequest(target, { path: "/repos" }))).rejects.toBe(boom);
  });
});
