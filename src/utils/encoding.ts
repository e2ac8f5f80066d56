/**
 * Encoding helpers for inline content and content hashes
 */

import { createHash } from "node:crypto";
import { EnvelopeError } from "../errors.js";
import type { Encoding } from "../types/vcon.js";

const BASE64URL_PATTERN = /^[A-Za-z0-9_-]*$/;

/** Check whether a string only uses the base64url alphabet (no padding) */
export function isBase64Url(value: string): boolean {
  return BASE64URL_PATTERN.test(value) && value.length % 4 !== 1;
}

/** Decode base64url to Buffer */
export function decodeBase64Url(base64url: string): Buffer {
  if (!isBase64Url(base64url)) {
    throw new EnvelopeError("Malformed base64url value", "MALFORMED_ENCODING");
  }
  // Convert base64url to base64
  const base64 = base64url.replace(/-/g, "+").replace(/_/g, "/");
  // Add padding if needed
  const padded = base64 + "=".repeat((4 - (base64.length % 4)) % 4);
  return Buffer.from(padded, "base64");
}

/** Bytes of an inline body in the given encoding (defaults to none) */
export function decodeBody(
  body: string | object,
  encoding: Encoding = "none"
): Buffer {
  if (typeof body !== "string") {
    return Buffer.from(JSON.stringify(body), "utf8");
  }
  if (encoding === "base64url") {
    return decodeBase64Url(body);
  }
  return Buffer.from(body, "utf8");
}

/** Supported content_hash algorithms, as written before the dash */
const HASH_ALGORITHMS = {
  sha512: "sha512",
  sha256: "sha256",
} as const;

type ContentHashAlgorithm = keyof typeof HASH_ALGORITHMS;

function isContentHashAlgorithm(value: string): value is ContentHashAlgorithm {
  return value in HASH_ALGORITHMS;
}

/** Compute a content_hash value, e.g. `sha512-<base64url digest>` */
export function computeContentHash(
  content: Buffer,
  algorithm: ContentHashAlgorithm = "sha512"
): string {
  const digest = createHash(HASH_ALGORITHMS[algorithm]).update(content).digest("base64url");
  return `${algorithm}-${digest}`;
}

/**
 * Check content against one or more content_hash values.
 * Matches when any listed hash with a known algorithm matches.
 */
export function matchesContentHash(
  content: Buffer,
  contentHash: string | string[]
): boolean {
  const hashes = Array.isArray(contentHash) ? contentHash : [contentHash];

  return hashes.some((hash) => {
    const separator = hash.indexOf("-");
    if (separator <= 0) return false;
    const algorithm = hash.slice(0, separator).toLowerCase();
    if (!isContentHashAlgorithm(algorithm)) return false;
    return computeContentHash(content, algorithm) === `${algorithm}${hash.slice(separator)}`;
  });
}
