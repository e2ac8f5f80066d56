/**
 * Key loading for signing and encryption
 */

import { createSecretKey, type KeyObject } from "node:crypto";
import type { JweContentAlgorithm } from "../types/jose.js";
import { decodeBase64Url } from "../utils/encoding.js";
import { config } from "../config.js";

/** Secret key from a UTF-8 string (HS256) or raw bytes */
export function secretKey(secret: string | Buffer): KeyObject {
  return createSecretKey(
    typeof secret === "string" ? Buffer.from(secret, "utf8") : secret
  );
}

/** Secret key from base64url bytes (dir encryption) */
export function secretKeyFromBase64Url(value: string): KeyObject {
  return createSecretKey(decodeBase64Url(value));
}

/**
 * Content encryption algorithm matching the size of a direct key:
 * 32 bytes for A256GCM, 64 bytes for A256CBC-HS512
 */
export function contentAlgorithmForKey(
  key: KeyObject
): JweContentAlgorithm | undefined {
  if (key.type !== "secret") return undefined;
  switch (key.symmetricKeySize) {
    case 32:
      return "A256GCM";
    case 64:
      return "A256CBC-HS512";
    default:
      return undefined;
  }
}

let signingKey: KeyObject | undefined;
let encryptionKey: KeyObject | undefined;

/** HS256 key from VCON_SIGNING_SECRET, if configured */
export function getSigningKey(): KeyObject | undefined {
  if (!signingKey && config.signingSecret) {
    signingKey = secretKey(config.signingSecret);
  }
  return signingKey;
}

/** Direct encryption key from VCON_ENCRYPTION_KEY, if configured */
export function getEncryptionKey(): KeyObject | undefined {
  if (!encryptionKey && config.encryptionKey) {
    encryptionKey = secretKeyFromBase64Url(config.encryptionKey);
  }
  return encryptionKey;
}
