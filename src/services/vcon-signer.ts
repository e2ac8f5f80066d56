/**
 * vCon Signer Service
 * Wraps containers in JWS envelopes and verifies them
 */

import {
  GeneralSign,
  compactVerify,
  decodeProtectedHeader,
  errors,
  flattenedVerify,
} from "jose";
import type { KeyObject } from "node:crypto";
import {
  JwsGeneralSchema,
  JwsProtectedHeaderSchema,
  type JwsGeneral,
} from "../schemas/envelope.schema.js";
import {
  VCON_MEDIA_TYPE,
  type JwsAlgorithm,
  type JwsProtectedHeader,
  type JwsSignature,
  type SignedVcon,
} from "../types/jose.js";
import type { NormalizedVcon, Vcon } from "../types/vcon.js";
import {
  EnvelopeError,
  SchemaError,
  SignatureError,
  errorMessage,
} from "../errors.js";
import { decodeVcon, parseVcon, assertVcon, toIssueDetails } from "./vcon-parser.js";
import { serializeVcon } from "./vcon-serializer.js";
import { logger } from "../utils/logger.js";

export const JWS_ALGORITHMS: readonly JwsAlgorithm[] = ["HS256", "RS256", "ES256"];

export interface VconSigner {
  alg: JwsAlgorithm;
  key: KeyObject;
  kid?: string;
}

export interface VerifiedVcon {
  /** Container with every list present */
  vcon: NormalizedVcon;
  /** Container exactly as signed */
  data: Vcon;
  header: JwsProtectedHeader;
  signatureIndex: number;
}

export function isJwsAlgorithm(value: unknown): value is JwsAlgorithm {
  return JWS_ALGORITHMS.some((alg) => alg === value);
}

/** Check whether a key can be used with a JWS algorithm */
export function keyFitsAlgorithm(alg: JwsAlgorithm, key: KeyObject): boolean {
  switch (alg) {
    case "HS256":
      return key.type === "secret";
    case "RS256":
      return key.type !== "secret" && key.asymmetricKeyType === "rsa";
    case "ES256":
      return (
        key.type !== "secret" &&
        key.asymmetricKeyType === "ec" &&
        key.asymmetricKeyDetails?.namedCurve === "prime256v1"
      );
  }
}

/** Map jose failures other than a bad signature to envelope errors */
function toEnvelopeError(error: unknown): unknown {
  if (
    error instanceof errors.JOSENotSupported ||
    error instanceof errors.JOSEAlgNotAllowed
  ) {
    return new EnvelopeError(error.message, "UNSUPPORTED_ALGORITHM", { cause: error });
  }
  if (error instanceof errors.JWSInvalid) {
    return new EnvelopeError(`Malformed JWS envelope: ${error.message}`, "MALFORMED_ENVELOPE", {
      cause: error,
    });
  }
  return error;
}

/**
 * Sign a vCon, producing a JWS General JSON envelope with one
 * signature per signer. The container is signed as given.
 */
export async function signVcon(
  vcon: Vcon,
  signers: VconSigner | VconSigner[]
): Promise<SignedVcon> {
  const list = Array.isArray(signers) ? signers : [signers];
  if (list.length === 0) {
    throw new EnvelopeError("At least one signer is required");
  }

  const { uuid } = assertVcon(vcon);
  const builder = new GeneralSign(new TextEncoder().encode(serializeVcon(vcon)));

  for (const { alg, key, kid } of list) {
    if (!keyFitsAlgorithm(alg, key) || key.type === "public") {
      throw new EnvelopeError(
        `Key of type ${key.asymmetricKeyType ?? key.type} cannot sign with ${alg}`,
        "UNSUPPORTED_ALGORITHM"
      );
    }

    builder
      .addSignature(key)
      .setProtectedHeader(kid ? { alg, cty: VCON_MEDIA_TYPE, kid } : { alg, cty: VCON_MEDIA_TYPE })
      .setUnprotectedHeader({ uuid });
  }

  const jws = await builder.sign();

  const signatures = jws.signatures.map((entry): JwsSignature => {
    if (!entry.protected) {
      throw new EnvelopeError("Signature is missing its protected header");
    }
    return { protected: entry.protected, header: { uuid }, signature: entry.signature };
  });

  logger.info({ uuid, signatures: signatures.length }, "vCon signed");

  return { payload: jws.payload, signatures };
}

function readJwsEnvelope(input: unknown): JwsGeneral {
  const result = JwsGeneralSchema.safeParse(input);

  if (!result.success) {
    const summary = toIssueDetails(result.error)
      .map((d) => (d.path ? `${d.path}: ${d.message}` : d.message))
      .join("; ");
    throw new EnvelopeError(`Malformed JWS envelope: ${summary}`);
  }

  return result.data;
}

function readProtectedHeader(token: string | { protected: string }) {
  let decoded: unknown;
  try {
    decoded = decodeProtectedHeader(token);
  } catch (error) {
    throw new EnvelopeError(
      "Malformed JWS protected header",
      "MALFORMED_ENVELOPE",
      error instanceof Error ? { cause: error } : undefined
    );
  }

  const result = JwsProtectedHeaderSchema.safeParse(decoded);
  if (!result.success) {
    throw new EnvelopeError("Malformed JWS protected header");
  }
  return result.data;
}

function decodePayload(payload: Uint8Array): { vcon: NormalizedVcon; data: Vcon } {
  const decoded = decodeVcon(new TextDecoder().decode(payload));
  if (!decoded.success) {
    throw new SchemaError(decoded.error, [], "INVALID_JSON");
  }

  const parsed = parseVcon(decoded.value);
  if (!parsed.success) {
    assertVcon(decoded.value);
    throw new SchemaError(parsed.error, parsed.details ?? []);
  }
  return { vcon: parsed.vcon, data: parsed.data };
}

function verified(
  payload: Uint8Array,
  header: JwsProtectedHeader,
  signatureIndex: number
): VerifiedVcon {
  const { vcon, data } = decodePayload(payload);
  logger.info({ uuid: vcon.uuid, alg: header.alg, signatureIndex }, "vCon signature verified");
  return { vcon, data, header, signatureIndex };
}

async function verifyCompact(token: string, key: KeyObject): Promise<VerifiedVcon> {
  const header = readProtectedHeader(token.trim());

  if (!isJwsAlgorithm(header.alg)) {
    throw new EnvelopeError(`Unsupported JWS algorithm: ${header.alg}`, "UNSUPPORTED_ALGORITHM");
  }
  if (!keyFitsAlgorithm(header.alg, key)) {
    throw new SignatureError("No signature uses an algorithm that fits the verification key");
  }

  try {
    const { payload } = await compactVerify(token.trim(), key, { algorithms: [header.alg] });
    return verified(payload, { ...header, alg: header.alg }, 0);
  } catch (error) {
    if (error instanceof errors.JWSSignatureVerificationFailed) {
      logger.warn({ alg: header.alg }, "vCon signature invalid");
      throw new SignatureError("Signature verification failed");
    }
    throw toEnvelopeError(error);
  }
}

/**
 * Verify a signed vCon (general envelope or compact string) and return the
 * validated container. Succeeds when any signature verifies with the key.
 */
export async function verifyVcon(input: unknown, key: KeyObject): Promise<VerifiedVcon> {
  if (typeof input === "string") {
    return verifyCompact(input, key);
  }

  const envelope = readJwsEnvelope(input);
  const unsupported: string[] = [];
  let attempted = 0;

  for (const [index, entry] of envelope.signatures.entries()) {
    const header = readProtectedHeader(entry);

    if (!isJwsAlgorithm(header.alg)) {
      unsupported.push(header.alg);
      continue;
    }
    if (!keyFitsAlgorithm(header.alg, key)) continue;

    attempted++;

    let payload: Uint8Array;
    try {
      ({ payload } = await flattenedVerify(
        {
          payload: envelope.payload,
          protected: entry.protected,
          signature: entry.signature,
        },
        key,
        { algorithms: [header.alg] }
      ));
    } catch (error) {
      if (!(error instanceof errors.JWSSignatureVerificationFailed)) {
        throw toEnvelopeError(error);
      }
      logger.debug(
        { index, alg: header.alg, error: errorMessage(error) },
        "Signature did not verify"
      );
      continue;
    }

    return verified(payload, { ...header, alg: header.alg }, index);
  }

  if (attempted === 0 && unsupported.length === envelope.signatures.length) {
    throw new EnvelopeError(
      `Unsupported JWS algorithm: ${unsupported.join(", ")}`,
      "UNSUPPORTED_ALGORITHM"
    );
  }
  if (attempted === 0) {
    throw new SignatureError(
      "No signature uses an algorithm that fits the verification key"
    );
  }

  logger.warn({ signatures: envelope.signatures.length }, "vCon signature invalid");
  throw new SignatureError("Signature verification failed");
}

/**
 * Compact serialization of one signature of a signed vCon.
 * The unprotected header is not carried over.
 */
export function toCompactJws(envelope: SignedVcon, index = 0): string {
  const entry = envelope.signatures[index];
  if (!entry) {
    throw new EnvelopeError(`No signature at index ${index}`);
  }
  return `${entry.protected}.${envelope.payload}.${entry.signature}`;
}
