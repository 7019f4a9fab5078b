import { describe, it, expect } from "vitest";
import { followMinimal, followPage, parseLink } from "./links.js";
import { createRequestTarget } from "./request-builder.js";
import { minimalBuild } from "../test-support/fixtures.js";

const target = createRequestTarget("test-token", "org");

describe("Link follower", () => {
  describe("followPage", () => {
    it("should split the page href into path and query", () => {
      const result = followPage({ path: "/repo/123/builds?limit=5&offset=5" }, target);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.method).toBe("GET");
      expect(result.value.path).toBe("/repo/123/builds");
      expect(result.value.query).toEqual({ limit: "5", offset: "5" });
      expect(result.value.url).toBe("https://api.travis-ci.org/repo/123/builds?limit=5&offset=5");
    });

    it("should keep every value of a repeated query key", () => {
      const result = followPage({ path: "/repos?include=a&limit=2&include=b" }, target);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.query).toEqual({ include: ["a", "b"], limit: "2" });
      expect(result.value.url).toBe("https://api.travis-ci.org/repos?include=a&include=b&limit=2");
    });

    it("should build the same headers as an endpoint request", () => {
      const result = followPage({ path: "/repos?offset=25" }, target);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.host).toBe("api.travis-ci.org");
      expect(result.value.headers["Authorization"]).toBe("token test-token");
      expect(result.value.headers["Travis-API-Version"]).toBe("3");
    });

    it("should accept absolute hrefs on the configured host", () => {
      const result = followPage({ path: "https://api.travis-ci.org/repos?offset=25" }, target);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.path).toBe("/repos");
      expect(result.value.query).toEqual({ offset: "25" });
    });

    it("should keep escaped path segments", () => {
      const result = followPage({ path: "/repo/ada%2Fengine/builds" }, target);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.path).toBe("/repo/ada%2Fengine/builds");
      expect(result.value.url).toBe("https://api.travis-ci.org/repo/ada%2Fengine/builds");
    });

    it.each([
      ["empty", ""],
      ["whitespace", "/repo/1 /builds"],
      ["unparseable", "https://[bad"],
      ["another host", "https://example.test/repos"],
      ["another scheme", "http://api.travis-ci.org/repos"],
    ])("should reject an href with %s as unparseableLink", (_label, href) => {
      const result = followPage({ path: href }, target);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("unparseableLink");
      expect(result.error.metadata).toEqual({ href });
    });
  });

  describe("followMinimal", () => {
    it("should return nothing for a stub without href", () => {
      expect(followMinimal({}, target)).toBeUndefined();
      expect(followMinimal({ "@href": null }, target)).toBeUndefined();
      expect(followMinimal({ "@href": "" }, target)).toBeUndefined();
    });

    it("should build a GET for the stub's href", () => {
      const result = followMinimal(minimalBuild(100), target);

      expect(result?.ok).toBe(true);
      if (result === undefined || !result.ok) return;
      expect(result.value.method).toBe("GET");
      expect(result.value.path).toBe("/build/100");
      expect(result.value.query).toEqual({});
      expect("body" in result.value).toBe(false);
    });

    it("should reject a stub pointing elsewhere", () => {
      const result = followMinimal({ "@href": "https://example.test/build/1" }, target);

      expect(result?.ok).toBe(false);
      if (result === undefined || result.ok) return;
      expect(result.error.kind).toBe("unparseableLink");
      expect(result.error.message).toBe(
        'Cannot follow link "https://example.test/build/1": points outside api.travis-ci.org'
      );
    });
  });

  describe("parseLink", () => {
    it("should resolve relative hrefs against an enterprise host", () => {
      const enterprise = createRequestTarget("test-token", { enterprise: "travis.example.test" });

      const result = parseLink("/build/9?include=build.commit", enterprise);

      expect(result).toEqual({
        ok: true,
        value: { path: "/build/9", query: { include: "build.commit" } },
      });
    });
  });
});
