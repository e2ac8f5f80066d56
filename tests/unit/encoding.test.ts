import { describe, it, expect } from "vitest";
import {
  computeContentHash,
  decodeBase64Url,
  decodeBody,
  isBase64Url,
  matchesContentHash,
} from "../../src/utils/encoding.js";
import { EnvelopeError } from "../../src/errors.js";

describe("encoding", () => {
  describe("base64url", () => {
    it("should decode unpadded input", () => {
      expect(decodeBase64Url("dGVzdA").toString("utf8")).toBe("test");
      expect([...decodeBase64Url("-_8")]).toEqual([0xfb, 0xff]);
    });

    it("should reject characters outside the alphabet", () => {
      expect(isBase64Url("abc+")).toBe(false);
      expect(isBase64Url("abcde")).toBe(false);
      expect(() => decodeBase64Url("a=b")).toThrow(EnvelopeError);
    });
  });

  describe("decodeBody", () => {
    it("should decode base64url bodies", () => {
      expect(decodeBody("aGVsbG8", "base64url").toString("utf8")).toBe("hello");
    });

    it("should treat other encodings as UTF-8 text", () => {
      expect(decodeBody("hello").toString("utf8")).toBe("hello");
      expect(decodeBody('{"a":1}', "json").toString("utf8")).toBe('{"a":1}');
    });

    it("should serialize object bodies", () => {
      expect(decodeBody({ a: 1 }, "json").toString("utf8")).toBe('{"a":1}');
    });
  });

  describe("content_hash", () => {
    const content = Buffer.from("hello", "utf8");

    it("should compute sha512 by default", () => {
      const hash = computeContentHash(content);

      expect(hash.startsWith("sha512-")).toBe(true);
      expect(decodeBase64Url(hash.slice("sha512-".length))).toHaveLength(64);
    });

    it("should match any listed hash", () => {
      const sha256 = computeContentHash(content, "sha256");

      expect(sha256).toBe("sha256-LPJNul-wow4m6DsqxbninhsWHlwfp0JecwQzYpOLmCQ");
      expect(matchesContentHash(content, sha256)).toBe(true);
      expect(matchesContentHash(content, ["md5-abc", sha256])).toBe(true);
    });

    it("should not match other content or unknown algorithms", () => {
      expect(matchesContentHash(content, computeContentHash(Buffer.from("bye")))).toBe(false);
      expect(matchesContentHash(content, "md5-XUFAKrxLKna5cZ2REBfFkg")).toBe(false);
      expect(matchesContentHash(content, "nohash")).toBe(false);
    });
  });
});
