/**
 * vCon Parser Service
 * Detects the container state, decodes JSON text and validates containers
 */

import type { ZodError, ZodIssue } from "zod";
import { VconSchema, DANGLING_REFERENCE } from "../schemas/vcon.schema.js";
import type {
  Vcon,
  NormalizedVcon,
  DetectedVconState,
  IssueDetail,
} from "../types/vcon.js";
import { SchemaError, errorMessage, type VconErrorCode } from "../errors.js";
import { isRecord } from "../utils/json.js";
import { logger } from "../utils/logger.js";

export interface ParseResult {
  success: true;
  /** Container with every list present */
  vcon: NormalizedVcon;
  /** Validated container with only the keys it was given */
  data: Vcon;
}

export interface ParseError {
  success: false;
  error: string;
  code: VconErrorCode;
  state: DetectedVconState;
  details?: IssueDetail[];
}

export type VconParseResult = ParseResult | ParseError;

export interface DecodeSuccess {
  success: true;
  value: unknown;
  state: DetectedVconState;
}

export type VconDecodeResult = DecodeSuccess | ParseError;

const COMPACT_JWS = /^[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+$/;
const COMPACT_JWE =
  /^[A-Za-z0-9_-]+\.[A-Za-z0-9_-]*\.[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+$/;

/**
 * Work out which of the three container states a value is in.
 * Envelope shapes are checked before the plain container so that an
 * envelope leaking container fields is still treated as an envelope.
 */
export function detectVconState(input: unknown): DetectedVconState {
  if (typeof input === "string") {
    const value = input.trim();
    if (COMPACT_JWS.test(value)) return "signed";
    if (COMPACT_JWE.test(value)) return "encrypted";
    return "unknown";
  }

  if (!isRecord(input)) return "unknown";
  if ("payload" in input && "signatures" in input) return "signed";
  if ("ciphertext" in input) return "encrypted";
  if ("vcon" in input) return "unsigned";
  return "unknown";
}

/**
 * Decode the text of a vCon file: a bare container, a JWS/JWE envelope
 * object, or a compact JWS/JWE string (bare or JSON-quoted).
 */
export function decodeVcon(text: string): VconDecodeResult {
  const trimmed = text.trim();

  if (COMPACT_JWS.test(trimmed) || COMPACT_JWE.test(trimmed)) {
    return { success: true, value: trimmed, state: detectVconState(trimmed) };
  }

  let value: unknown;
  try {
    value = JSON.parse(trimmed);
  } catch (error) {
    return {
      success: false,
      error: `Invalid JSON: ${errorMessage(error)}`,
      code: "INVALID_JSON",
      state: "unknown",
    };
  }

  return { success: true, value, state: detectVconState(value) };
}

function isDanglingReference(issue: ZodIssue): boolean {
  return issue.code === "custom" && issue.params?.["code"] === DANGLING_REFERENCE;
}

/** Map zod issues to path/message pairs */
export function toIssueDetails(error: ZodError): IssueDetail[] {
  return error.errors.map((e) => ({
    path: e.path.join("."),
    message: e.message,
  }));
}

/**
 * Parse and validate an unsigned vCon
 */
export function parseVcon(input: unknown): VconParseResult {
  const state = detectVconState(input);

  if (state === "signed" || state === "encrypted") {
    return {
      success: false,
      error: `vCon is ${state}; unwrap the envelope before reading the container`,
      code: "SCHEMA_MISMATCH",
      state,
    };
  }

  // Validate against schema
  const result = VconSchema.safeParse(input);

  if (!result.success) {
    const details = toIssueDetails(result.error);
    const code = result.error.errors.every(isDanglingReference)
      ? "DANGLING_REFERENCE"
      : "SCHEMA_MISMATCH";

    logger.warn({ details, code }, "vCon validation failed");

    return {
      success: false,
      error: "Invalid vCon format",
      code,
      state,
      details,
    };
  }

  const vcon = normalizeVcon(result.data);

  logger.debug(
    {
      uuid: vcon.uuid,
      parties: vcon.parties.length,
      dialogs: vcon.dialog.length,
      analyses: vcon.analysis.length,
      attachments: vcon.attachments.length,
    },
    "vCon parsed successfully"
  );

  return {
    success: true,
    vcon,
    data: result.data,
  };
}

/**
 * Decode and validate the text of an unsigned vCon
 */
export function parseVconText(text: string): VconParseResult {
  const decoded = decodeVcon(text);
  if (!decoded.success) return decoded;
  return parseVcon(decoded.value);
}

/**
 * Parse an unsigned vCon, throwing a SchemaError when it is invalid
 */
export function assertVcon(input: unknown): NormalizedVcon {
  const result = parseVcon(input);
  if (!result.success) {
    const code =
      result.code === "DANGLING_REFERENCE" || result.code === "INVALID_JSON"
        ? result.code
        : "SCHEMA_MISMATCH";
    throw new SchemaError(result.error, result.details ?? [], code);
  }
  return result.vcon;
}

/**
 * Normalize a vCon to ensure all arrays are present
 */
export function normalizeVcon(vcon: Vcon): NormalizedVcon {
  return {
    ...vcon,
    dialog: vcon.dialog ?? [],
    analysis: vcon.analysis ?? [],
    attachments: vcon.attachments ?? [],
  };
}
