/**
 * vCon Serializer Service
 * Writes containers and envelopes back to JSON text
 */

import type { Vcon } from "../types/vcon.js";
import type { EncryptedVcon, SignedVcon } from "../types/jose.js";

/** Top-level field order used when writing a container */
export const CANONICAL_FIELD_ORDER = [
  "vcon",
  "uuid",
  "created_at",
  "updated_at",
  "subject",
  "redacted",
  "appended",
  "group",
  "parties",
  "dialog",
  "analysis",
  "attachments",
] as const;

export interface SerializeOptions {
  /** Indent with two spaces */
  pretty?: boolean;
}

/**
 * Reorder the top-level fields of a container. Known fields come first in
 * canonical order, extension fields follow in their original order.
 * Undefined values are dropped; list contents are left untouched.
 */
export function orderVconFields(vcon: Vcon): Record<string, unknown> {
  const fields = new Map<string, unknown>(Object.entries(vcon));
  const ordered: Record<string, unknown> = {};

  for (const key of CANONICAL_FIELD_ORDER) {
    const value = fields.get(key);
    if (value !== undefined) {
      ordered[key] = value;
    }
    fields.delete(key);
  }

  for (const [key, value] of fields) {
    if (value !== undefined) {
      ordered[key] = value;
    }
  }

  return ordered;
}

/**
 * Serialize a container to JSON text
 */
export function serializeVcon(vcon: Vcon, options: SerializeOptions = {}): string {
  return JSON.stringify(orderVconFields(vcon), null, options.pretty ? 2 : undefined);
}

/**
 * Serialize a JWS or JWE envelope to JSON text
 */
export function serializeEnvelope(
  envelope: SignedVcon | EncryptedVcon,
  options: SerializeOptions = {}
): string {
  return JSON.stringify(envelope, null, options.pretty ? 2 : undefined);
}
