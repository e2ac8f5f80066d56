import type { IssueDetail } from "./types/vcon.js";

export type VconErrorCode =
  | "INVALID_JSON"
  | "SCHEMA_MISMATCH"
  | "DANGLING_REFERENCE"
  | "MALFORMED_ENVELOPE"
  | "MALFORMED_ENCODING"
  | "UNSUPPORTED_ALGORITHM"
  | "INVALID_SIGNATURE"
  | "DECRYPTION_FAILED"
  | "CONTENT_HASH_MISMATCH"
  | "CONTENT_UNAVAILABLE"
  | "DIRECTORY_NOT_FOUND";

/**
 * Base error for all vCon processing failures.
 */
export class VconError extends Error {
  readonly code: VconErrorCode;

  constructor(code: VconErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "VconError";
    this.code = code;
  }
}

/**
 * Thrown when a container does not match the schema.
 * A failure caused only by out-of-range indices carries DANGLING_REFERENCE.
 */
export class SchemaError extends VconError {
  readonly details: IssueDetail[];

  constructor(
    message: string,
    details: IssueDetail[],
    code: "SCHEMA_MISMATCH" | "DANGLING_REFERENCE" | "INVALID_JSON" = "SCHEMA_MISMATCH"
  ) {
    super(code, message);
    this.name = "SchemaError";
    this.details = details;
  }
}

/**
 * Thrown when a JWS/JWE envelope or one of its base64url parts cannot be read.
 */
export class EnvelopeError extends VconError {
  constructor(
    message: string,
    code:
      | "MALFORMED_ENVELOPE"
      | "MALFORMED_ENCODING"
      | "UNSUPPORTED_ALGORITHM" = "MALFORMED_ENVELOPE",
    options?: ErrorOptions
  ) {
    super(code, message, options);
    this.name = "EnvelopeError";
  }
}

/**
 * Thrown when no signature of a JWS envelope verifies with the given key.
 */
export class SignatureError extends VconError {
  constructor(message: string) {
    super("INVALID_SIGNATURE", message);
    this.name = "SignatureError";
  }
}

/**
 * Thrown when no recipient of a JWE envelope can be decrypted with the given key.
 */
export class DecryptionError extends VconError {
  constructor(message: string, cause?: unknown) {
    super(
      "DECRYPTION_FAILED",
      message,
      cause instanceof Error ? { cause } : undefined
    );
    this.name = "DecryptionError";
  }
}

/**
 * Thrown when dialog, analysis or attachment content cannot be resolved.
 */
export class ContentError extends VconError {
  constructor(
    message: string,
    code: "CONTENT_HASH_MISMATCH" | "CONTENT_UNAVAILABLE" | "MALFORMED_ENCODING",
    cause?: unknown
  ) {
    super(code, message, cause instanceof Error ? { cause } : undefined);
    this.name = "ContentError";
  }
}

/** Message of an unknown thrown value */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
