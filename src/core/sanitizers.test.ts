import { describe, it, expect } from "vitest";
import { REDACTED, sanitizeRequest } from "./request-sanitizer.js";
import { sanitizeMetric, sanitizeObject } from "./observability-sanitizer.js";
import { sanitizeMetadata, sanitizeTravisError } from "./error-sanitizer.js";
import { mapTransportError } from "./error-mapper.js";
import { buildRequest, createRequestTarget } from "./request-builder.js";
import { TravisError } from "./types.js";

const target = createRequestTarget("test-token", "org");

describe("Sanitizers", () => {
  describe("sanitizeRequest", () => {
    it("should redact the authorization header and bodies", () => {
      const request = buildRequest(target, {
        method: "POST",
        path: "/repo/1/env_vars",
        body: { "env_var.value": "test-secret" },
      });

      const sanitized = sanitizeRequest(request);

      expect(sanitized.headers["Authorization"]).toBe(REDACTED);
      expect(sanitized.headers["Travis-API-Version"]).toBe("3");
      expect(sanitized.body).toBe(REDACTED);
      expect(request.headers["Authorization"]).toBe("token test-token");
    });

    it("should redact query parameters carrying credentials", () => {
      const request = buildRequest(target, { path: "/repos", query: { access_token: "test-token", limit: "5" } });

      expect(sanitizeRequest(request).query).toEqual({ access_token: REDACTED, limit: "5" });
    });

    it("should judge query values by credential scheme only", () => {
      const request = buildRequest(target, {
        path: "/owner/tokenizer/repos",
        query: { "branch.name": "somebody", sort_by: "value", auth: "token test-token" },
      });

      expect(sanitizeRequest(request).query).toEqual({
        "branch.name": "somebody",
        sort_by: "value",
        auth: REDACTED,
      });
    });

    it("should keep repeated query values", () => {
      const request = buildRequest(target, { path: "/repos", query: { include: ["a", "b"], access_token: ["x", "y"] } });

      expect(sanitizeRequest(request).query).toEqual({ include: ["a", "b"], access_token: REDACTED });
    });

    it("should keep bodies when the redaction list omits them", () => {
      const request = buildRequest(target, { method: "PATCH", path: "/repo/1/setting/x", body: { "setting.value": 1 } });

      const sanitized = sanitizeRequest(request, { redactedKeys: ["authorization"] });

      expect(sanitized.body).toBe('{"setting.value":1}');
    });
  });

  describe("sanitizeObject", () => {
    it("should redact nested keys and variable values", () => {
      expect(
        sanitizeObject({ name: "DEPLOY_KEY", value: "test-secret", nested: [{ apiKey: "test-key", id: 1 }] })
      ).toEqual({ name: "DEPLOY_KEY", value: REDACTED, nested: [{ apiKey: REDACTED, id: 1 }] });
    });

    it("should redact metric tags by key or value", () => {
      const metric = sanitizeMetric({
        name: "travis.request.count",
        value: 1,
        tags: { method: "GET", token: "abc", path: "/repos?token=abc" },
        timestamp: new Date(0),
      });

      expect(metric.tags).toEqual({ method: "GET", token: REDACTED, path: REDACTED });
    });

    it("should keep metric tag values that merely contain a redacted word", () => {
      const metric = sanitizeMetric({
        name: "travis.request.count",
        value: 1,
        tags: { method: "GET", path: "/owner/tokenizer/repos", owner: "somebody", auth: "Bearer abc" },
        timestamp: new Date(0),
      });

      expect(metric.tags).toEqual({
        method: "GET",
        path: "/owner/tokenizer/repos",
        owner: "somebody",
        auth: REDACTED,
      });
    });
  });

  describe("error metadata", () => {
    it("should drop credential-like keys", () => {
      expect(
        sanitizeMetadata({ method: "GET", headers: { Authorization: "token x" }, nested: { secret: "s", keep: 1 } })
      ).toEqual({ method: "GET", nested: { keep: 1 } });
      expect(sanitizeMetadata({ token: "x" })).toBeUndefined();
    });

    it("should keep the error contract while cleaning metadata", () => {
      const error = new TravisError("remoteError", "not found", {
        status: 404,
        remote: { errorType: "not_found", errorMessage: "not found" },
        metadata: { path: "/repo/1", authorization: "token x" },
      });

      const sanitized = sanitizeTravisError(error);

      expect(sanitized.kind).toBe("remoteError");
      expect(sanitized.status).toBe(404);
      expect(sanitized.remote).toEqual({ errorType: "not_found", errorMessage: "not found" });
      expect(sanitized.metadata).toEqual({ path: "/repo/1" });
    });

    it("should return errors without metadata unchanged", () => {
      const error = new TravisError("missingField", "no href", { field: "@href" });
      expect(sanitizeTravisError(error)).toBe(error);
    });
  });

  describe("mapTransportError", () => {
    const request = buildRequest(target, { path: "/repos" });

    it("should pass TravisErrors through", () => {
      const error = new TravisError("transportFailure", "Request timeout after 10ms");
      expect(mapTransportError(error, request)).toBe(error);
    });

    it("should name network failures by code", () => {
      const cause = Object.assign(new Error("connect ECONNREFUSED 127.0.0.1:443"), { code: "ECONNREFUSED" });
      const error = mapTransportError(new TypeError("fetch failed", { cause }), request);

      expect(error.kind).toBe("transportFailure");
      expect(error.message).toBe("Network request failed (ECONNREFUSED). Check your connection and try again.");
      expect(error.metadata).toEqual({ method: "GET", path: "/repos", code: "ECONNREFUSED" });
      expect(error.cause).toBeInstanceOf(TypeError);
    });

    it("should describe other failures", () => {
      const error = mapTransportError(new Error("socket hang up"), request);

      expect(error.message).toBe("Request failed before a response was received: socket hang up");
      expect(error.metadata).toEqual({ method: "GET", path: "/repos" });
    });
  });
});
