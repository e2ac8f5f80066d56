/**
 * JOSE envelope types for signed (JWS) and encrypted (JWE) vCons.
 * Both use the General JSON Serialization (RFC 7515 section 7.2,
 * RFC 7516 section 7.2); the compact form is accepted on input.
 */

export type JwsAlgorithm = "HS256" | "RS256" | "ES256";

export type JweKeyAlgorithm = "dir" | "RSA-OAEP" | "RSA-OAEP-256";

export type JweContentAlgorithm = "A256GCM" | "A256CBC-HS512";

/** Media type carried in the `cty` header of vCon envelopes */
export const VCON_MEDIA_TYPE = "application/vcon+json";

export interface JwsProtectedHeader {
  alg: JwsAlgorithm;
  cty?: string;
  kid?: string;
  [key: string]: unknown;
}

export type JwsUnprotectedHeader = {
  uuid?: string;
  kid?: string;
};

export interface JwsSignature {
  protected: string;
  header?: JwsUnprotectedHeader;
  signature: string;
}

/** Signed vCon (JWS General JSON Serialization) */
export interface SignedVcon {
  payload: string;
  signatures: JwsSignature[];
}

export type JweUnprotectedHeader = {
  uuid?: string;
};

export type JweRecipientHeader = {
  alg?: JweKeyAlgorithm;
  kid?: string;
};

export interface JweRecipient {
  header?: JweRecipientHeader;
  encrypted_key?: string;
}

/** Encrypted vCon (JWE General JSON Serialization) */
export interface EncryptedVcon {
  protected: string;
  unprotected?: JweUnprotectedHeader;
  recipients: JweRecipient[];
  aad?: string;
  iv: string;
  ciphertext: string;
  tag: string;
}
