/**
 * Content Resolver Service
 * Loads dialog, analysis and attachment content, inline or by URL
 */

import { request } from "undici";
import type { Encoding } from "../types/vcon.js";
import { ContentError, VconError, errorMessage } from "../errors.js";
import { decodeBody, matchesContentHash } from "../utils/encoding.js";
import { logger } from "../utils/logger.js";
import { config } from "../config.js";

/** Fields shared by dialog, analysis and attachment entries */
export interface ContentEntry {
  mediatype?: string;
  filename?: string;
  body?: string | object;
  encoding?: Encoding;
  url?: string;
  content_hash?: string | string[];
}

export interface ResolvedContent {
  buffer: Buffer;
  mediatype?: string;
  filename?: string;
  source: "inline" | "url";
  /** True when a content_hash was present and matched */
  verified: boolean;
}

export interface ResolveOptions {
  maxSizeBytes?: number;
  timeoutMs?: number;
}

async function fetchContent(
  url: string,
  maxSizeBytes: number,
  timeoutMs: number
): Promise<Buffer> {
  const response = await request(url, {
    method: "GET",
    headersTimeout: timeoutMs,
    bodyTimeout: timeoutMs,
  });

  if (response.statusCode < 200 || response.statusCode >= 300) {
    await response.body.dump();
    throw new ContentError(
      `Fetching ${url} failed with HTTP ${response.statusCode}`,
      "CONTENT_UNAVAILABLE"
    );
  }

  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of response.body) {
    const bytes = Buffer.from(chunk);
    size += bytes.length;
    if (size > maxSizeBytes) {
      response.body.destroy();
      throw new ContentError(
        `Content at ${url} exceeds ${maxSizeBytes} bytes`,
        "CONTENT_UNAVAILABLE"
      );
    }
    chunks.push(bytes);
  }

  return Buffer.concat(chunks);
}

/**
 * Resolve the bytes of an entry. Inline bodies win over URLs.
 * When content_hash is present the bytes must match it.
 * Returns null when the entry carries neither body nor url.
 */
export async function resolveContent(
  entry: ContentEntry,
  options: ResolveOptions = {}
): Promise<ResolvedContent | null> {
  const maxSizeBytes = options.maxSizeBytes ?? config.maxContentSizeMb * 1024 * 1024;
  const timeoutMs = options.timeoutMs ?? config.contentFetchTimeoutMs;

  let buffer: Buffer;
  let source: ResolvedContent["source"];

  if (entry.body !== undefined) {
    try {
      buffer = decodeBody(entry.body, entry.encoding);
    } catch (error) {
      throw new ContentError(
        `Inline body is not valid ${entry.encoding ?? "none"} content`,
        "MALFORMED_ENCODING",
        error
      );
    }
    source = "inline";
  } else if (entry.url) {
    try {
      buffer = await fetchContent(entry.url, maxSizeBytes, timeoutMs);
    } catch (error) {
      if (error instanceof VconError) throw error;
      throw new ContentError(
        `Fetching ${entry.url} failed: ${errorMessage(error)}`,
        "CONTENT_UNAVAILABLE",
        error
      );
    }
    source = "url";
  } else {
    return null;
  }

  if (buffer.length > maxSizeBytes) {
    throw new ContentError(
      `Content exceeds ${maxSizeBytes} bytes`,
      "CONTENT_UNAVAILABLE"
    );
  }

  const verified = entry.content_hash !== undefined;
  if (entry.content_hash !== undefined && !matchesContentHash(buffer, entry.content_hash)) {
    logger.warn(
      { source, url: entry.url, size: buffer.length },
      "Content hash mismatch"
    );
    throw new ContentError("Content does not match content_hash", "CONTENT_HASH_MISMATCH");
  }

  logger.debug(
    { source, size: buffer.length, mediatype: entry.mediatype, verified },
    "Content resolved"
  );

  return {
    buffer,
    mediatype: entry.mediatype,
    filename: entry.filename,
    source,
    verified,
  };
}
