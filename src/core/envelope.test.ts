/**
 * Contract tests for the envelope decoder
 *
 * Both payload shapes (nested collection, inlined resource) and every
 * failure kind the decoder can produce.
 */

import { describe, it, expect } from "vitest";
import { z } from "zod";
import {
  Envelope,
  decodeEnvelope,
  decodeRemoteError,
  decodeResponse,
  parseDocument,
  selectPayload,
} from "./envelope.js";
import type { RawResponse } from "./types.js";
import { RepositoryListSchema, RepositorySchema } from "../models/index.js";
import { collection, remoteError, repository } from "../test-support/fixtures.js";

function response(status: number, body: string): RawResponse {
  return { status, headers: new Headers(), body };
}

describe("Envelope decoder", () => {
  describe("collections", () => {
    it("should take the payload from the key named by @type", () => {
      const items = [repository(1, "ada/engine"), repository(2, "ada/loom")];
      const document = collection("repositories", "/repos", items);

      const result = decodeEnvelope(document, RepositoryListSchema);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.type).toBe("repositories");
      expect(result.value.path).toBe("/repos");
      expect(result.value.object).toEqual(items);
    });

    it("should iterate the wrapped items in order", () => {
      const document = { "@type": "numbers", "@href": "/numbers", numbers: [3, 1, 2] };

      const result = decodeEnvelope(document, z.array(z.number()));

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect([...result.value]).toEqual([3, 1, 2]);
    });

    it("should iterate decoded resources", () => {
      const document = collection("repositories", "/repos", [
        repository(1, "ada/engine"),
        repository(2, "ada/loom"),
        repository(3, "ada/notes"),
      ]);

      const result = decodeEnvelope(document, RepositoryListSchema);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      const slugs: string[] = [];
      for (const repo of result.value) {
        slugs.push(repo.slug);
      }
      expect(slugs).toEqual(["ada/engine", "ada/loom", "ada/notes"]);
    });

    it("should report a nested payload that does not match as schemaMismatch", () => {
      const document = {
        "@type": "repositories",
        "@href": "/repos",
        repositories: [{ "@type": "repository", id: "not-a-number" }],
      };

      const result = decodeEnvelope(document, RepositoryListSchema);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("schemaMismatch");
      expect(result.error.message).toBe('"repositories" payload does not match the expected shape');
      expect(Array.isArray(result.error.metadata?.["issues"])).toBe(true);
    });

    it("should not fall back to the whole document when the nested value mismatches", () => {
      // The whole document would satisfy this schema; the nested value does not.
      const schema = z.object({ "@type": z.string() }).passthrough();
      const document = { "@type": "thing", "@href": "/thing", thing: 5 };

      const result = decodeEnvelope(document, schema);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("schemaMismatch");
    });
  });

  describe("single resources", () => {
    it("should decode the whole document when no key matches @type", () => {
      const document = repository(1, "ada/engine");

      const result = decodeEnvelope(document, RepositorySchema);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.type).toBe("repository");
      expect(result.value.path).toBe("/repo/1");
      expect(result.value.object).toEqual(document);
      expect(result.value.pagination).toBeUndefined();
    });

    it("should read fields through get", () => {
      const result = decodeEnvelope(repository(1, "ada/engine"), RepositorySchema);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.get("name")).toBe("engine");
      expect(result.value.get("owner").login).toBe("ada");
    });

    it("should throw a TypeError when iterating a non-collection", () => {
      const result = decodeEnvelope(repository(), RepositorySchema);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      const envelope = result.value;
      expect(() => [...envelope]).toThrow(TypeError);
    });

    it("should honor a custom discriminator key", () => {
      const schema = z.object({ id: z.number() }).passthrough();

      const result = decodeEnvelope({ kind: "thing", "@href": "/thing/1", id: 1 }, schema, "kind");

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.type).toBe("thing");
      expect(result.value.get("id")).toBe(1);
    });
  });

  describe("metadata", () => {
    it("should fail with missingDiscriminator without @type", () => {
      const result = decodeEnvelope({ "@href": "/repo/1", id: 1 }, RepositorySchema);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("missingDiscriminator");
      expect(result.error.field).toBe("@type");
    });

    it("should fail with schemaMismatch when @type is not a string", () => {
      const result = decodeEnvelope({ "@type": 5, "@href": "/repo/1" }, RepositorySchema);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("schemaMismatch");
      expect(result.error.field).toBe("@type");
    });

    it("should fail with missingField(@href) and produce no envelope", () => {
      const { "@href": _href, ...document } = repository();

      const result = decodeEnvelope(document, RepositorySchema);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("missingField");
      expect(result.error.field).toBe("@href");
      expect("value" in result).toBe(false);
    });

    it("should reject documents that are not objects", () => {
      for (const document of [null, 3, "text", [1, 2]]) {
        const result = decodeEnvelope(document, RepositorySchema);
        expect(result.ok).toBe(false);
        if (result.ok) continue;
        expect(result.error.kind).toBe("schemaMismatch");
      }
    });

    it("should map pagination links and flags", () => {
      const document = collection("repositories", "/repos?limit=2", [repository()], {
        limit: 2,
        offset: 0,
        count: 5,
        is_first: true,
        is_last: false,
        next: { "@href": "/repos?limit=2&offset=2", offset: 2, limit: 2 },
        prev: null,
        first: { "@href": "/repos?limit=2", offset: 0, limit: 2 },
        last: { "@href": "/repos?limit=2&offset=4", offset: 4, limit: 2 },
      });

      const result = decodeEnvelope(document, RepositoryListSchema);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.pagination).toEqual({
        limit: 2,
        offset: 0,
        count: 5,
        isFirst: true,
        isLast: false,
        next: { path: "/repos?limit=2&offset=2", offset: 2, limit: 2 },
        first: { path: "/repos?limit=2", offset: 0, limit: 2 },
        last: { path: "/repos?limit=2&offset=4", offset: 4, limit: 2 },
      });
      expect(result.value.pagination?.previous).toBeUndefined();
    });

    it("should reject malformed pagination", () => {
      const document = collection("repositories", "/repos", [], { limit: "2", offset: 0, count: 0 });

      const result = decodeEnvelope(document, RepositoryListSchema);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("schemaMismatch");
      expect(result.error.message).toBe("@pagination does not match the expected shape");
    });
  });

  describe("selectPayload", () => {
    it("should prefer a present nested key", () => {
      const selection = selectPayload({ "@type": "builds", builds: [] }, "builds");
      expect(selection).toEqual({ source: "nested", value: [] });
    });

    it("should treat a null nested key as absent", () => {
      const document = { "@type": "build", build: null, id: 1 };
      const selection = selectPayload(document, "build");
      expect(selection.source).toBe("inline");
      expect(selection.value).toBe(document);
    });

    it("should ignore inherited keys", () => {
      const document = { "@type": "constructor" };
      expect(selectPayload(document, "constructor").source).toBe("inline");
    });
  });

  describe("parseDocument", () => {
    it("should fail on empty input", () => {
      const result = parseDocument("   ");
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("malformedDocument");
    });

    it("should fail on invalid JSON", () => {
      const result = parseDocument("{\"@type\":");
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("malformedDocument");
      expect(result.error.message).toBe("Response body is not valid JSON");
    });

    it("should parse any JSON value", () => {
      expect(parseDocument("[1,2]")).toEqual({ ok: true, value: [1, 2] });
    });
  });

  describe("decodeResponse", () => {
    it("should decode a successful response", () => {
      const result = decodeResponse(response(200, JSON.stringify(repository())), RepositorySchema);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value).toBeInstanceOf(Envelope);
      expect(result.value.get("slug")).toBe("ada/engine");
    });

    it("should report an empty body as transportFailure", () => {
      const result = decodeResponse(response(200, ""), RepositorySchema);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("transportFailure");
      expect(result.error.status).toBe(200);
    });

    it("should report invalid JSON with the response status", () => {
      const result = decodeResponse(response(502, "<html>Bad Gateway</html>"), RepositorySchema);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("malformedDocument");
      expect(result.error.status).toBe(502);
    });

    it("should surface the API error document as remoteError", () => {
      const result = decodeResponse(response(404, JSON.stringify(remoteError())), RepositorySchema);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("remoteError");
      expect(result.error.status).toBe(404);
      expect(result.error.message).toBe("repository not found (or insufficient access)");
      expect(result.error.remote).toEqual({
        errorType: "not_found",
        errorMessage: "repository not found (or insufficient access)",
        resourceType: "repository",
      });
    });

    it("should keep the decode error when the document is not an error document", () => {
      const body = JSON.stringify({ "@type": "repository", "@href": "/repo/1" });

      const result = decodeResponse(response(200, body), RepositorySchema);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("schemaMismatch");
      expect(result.error.status).toBe(200);
    });
  });

  describe("decodeRemoteError", () => {
    it("should ignore documents that are not error documents", () => {
      expect(decodeRemoteError(repository())).toBeUndefined();
      expect(decodeRemoteError({ "@type": "error" })).toBeUndefined();
    });

    it("should omit resourceType when absent", () => {
      const error = decodeRemoteError({
        "@type": "error",
        error_type: "login_required",
        error_message: "login required",
      });

      expect(error?.kind).toBe("remoteError");
      expect(error?.remote).toEqual({ errorType: "login_required", errorMessage: "login required" });
      expect(error?.status).toBeUndefined();
    });
  });
});
