/**
 * vCon Encryptor Service
 * Wraps containers in JWE envelopes and decrypts them
 */

import {
  CompactEncrypt,
  GeneralEncrypt,
  compactDecrypt,
  decodeProtectedHeader,
  errors,
  flattenedDecrypt,
} from "jose";
import type { KeyObject } from "node:crypto";
import {
  JweGeneralSchema,
  JweProtectedHeaderSchema,
  type JweGeneral,
} from "../schemas/envelope.schema.js";
import {
  VCON_MEDIA_TYPE,
  type EncryptedVcon,
  type JweContentAlgorithm,
  type JweKeyAlgorithm,
  type JweRecipient,
} from "../types/jose.js";
import type { NormalizedVcon, Vcon } from "../types/vcon.js";
import {
  DecryptionError,
  EnvelopeError,
  SchemaError,
  errorMessage,
} from "../errors.js";
import { assertVcon, decodeVcon, parseVcon, toIssueDetails } from "./vcon-parser.js";
import { serializeVcon } from "./vcon-serializer.js";
import { logger } from "../utils/logger.js";

export const JWE_KEY_ALGORITHMS: readonly JweKeyAlgorithm[] = [
  "dir",
  "RSA-OAEP",
  "RSA-OAEP-256",
];

export const JWE_CONTENT_ALGORITHMS: readonly JweContentAlgorithm[] = [
  "A256GCM",
  "A256CBC-HS512",
];

export const DEFAULT_CONTENT_ALGORITHM: JweContentAlgorithm = "A256CBC-HS512";

/** Content encryption key size in bytes */
const CONTENT_KEY_LENGTH: Record<JweContentAlgorithm, number> = {
  A256GCM: 32,
  "A256CBC-HS512": 64,
};

export interface VconRecipient {
  alg: JweKeyAlgorithm;
  key: KeyObject;
  kid?: string;
}

export interface EncryptOptions {
  enc?: JweContentAlgorithm;
}

export interface DecryptedVcon {
  /** Container with every list present */
  vcon: NormalizedVcon;
  /** Container exactly as encrypted */
  data: Vcon;
  enc: JweContentAlgorithm;
  recipientIndex: number;
}

export function isKeyAlgorithm(value: unknown): value is JweKeyAlgorithm {
  return JWE_KEY_ALGORITHMS.some((alg) => alg === value);
}

export function isContentAlgorithm(value: unknown): value is JweContentAlgorithm {
  return JWE_CONTENT_ALGORITHMS.some((enc) => enc === value);
}

function isDirectKey(key: KeyObject, enc: JweContentAlgorithm): boolean {
  return key.type === "secret" && key.symmetricKeySize === CONTENT_KEY_LENGTH[enc];
}

function isRsaKey(key: KeyObject): boolean {
  return key.type !== "secret" && key.asymmetricKeyType === "rsa";
}

/** Check recipients against the content algorithm before handing them to jose */
function checkRecipients(recipients: VconRecipient[], enc: JweContentAlgorithm): void {
  if (recipients.length === 0) {
    throw new EnvelopeError("At least one recipient is required");
  }

  if (recipients.some((r) => r.alg === "dir") && recipients.length > 1) {
    throw new EnvelopeError(
      "Direct encryption (dir) supports a single recipient",
      "UNSUPPORTED_ALGORITHM"
    );
  }

  for (const { alg, key } of recipients) {
    if (alg === "dir" && !isDirectKey(key, enc)) {
      throw new EnvelopeError(
        `dir with ${enc} needs a ${CONTENT_KEY_LENGTH[enc]}-byte secret key`,
        "UNSUPPORTED_ALGORITHM"
      );
    }
    if (alg !== "dir" && !isRsaKey(key)) {
      throw new EnvelopeError(`${alg} needs an RSA key`, "UNSUPPORTED_ALGORITHM");
    }
  }
}

function recipientHeader({ alg, kid }: VconRecipient): { alg: JweKeyAlgorithm; kid?: string } {
  return kid ? { alg, kid } : { alg };
}

/**
 * Encrypt a vCon, producing a JWE General JSON envelope.
 * The content encryption key is random unless the recipient uses `dir`.
 */
export async function encryptVcon(
  vcon: Vcon,
  recipients: VconRecipient | VconRecipient[],
  options: EncryptOptions = {}
): Promise<EncryptedVcon> {
  const enc = options.enc ?? DEFAULT_CONTENT_ALGORITHM;
  const list = Array.isArray(recipients) ? recipients : [recipients];

  checkRecipients(list, enc);
  const { uuid } = assertVcon(vcon);

  const builder = new GeneralEncrypt(new TextEncoder().encode(serializeVcon(vcon)))
    .setProtectedHeader({ enc, cty: VCON_MEDIA_TYPE })
    .setSharedUnprotectedHeader({ uuid });

  for (const recipient of list) {
    builder.addRecipient(recipient.key).setUnprotectedHeader(recipientHeader(recipient));
  }

  const jwe = await builder.encrypt();
  if (!jwe.protected || !jwe.iv || !jwe.tag) {
    throw new EnvelopeError("Encrypted envelope is missing its header, IV or tag");
  }

  const wrapped = jwe.recipients.map((entry, index): JweRecipient => {
    const source = list[index];
    if (!source) {
      throw new EnvelopeError(`No recipient at index ${index}`);
    }
    const header = recipientHeader(source);
    return entry.encrypted_key ? { header, encrypted_key: entry.encrypted_key } : { header };
  });

  logger.info({ uuid, enc, recipients: list.map((r) => r.alg) }, "vCon encrypted");

  return {
    protected: jwe.protected,
    unprotected: { uuid },
    recipients: wrapped,
    iv: jwe.iv,
    ciphertext: jwe.ciphertext,
    tag: jwe.tag,
  };
}

/**
 * Encrypt a vCon for a single recipient in JWE compact form
 */
export async function encryptVconCompact(
  vcon: Vcon,
  recipient: VconRecipient,
  options: EncryptOptions = {}
): Promise<string> {
  const enc = options.enc ?? DEFAULT_CONTENT_ALGORITHM;

  checkRecipients([recipient], enc);
  const { uuid } = assertVcon(vcon);

  const token = await new CompactEncrypt(new TextEncoder().encode(serializeVcon(vcon)))
    .setProtectedHeader({ ...recipientHeader(recipient), enc, cty: VCON_MEDIA_TYPE })
    .encrypt(recipient.key);

  logger.info({ uuid, enc, recipients: [recipient.alg] }, "vCon encrypted");
  return token;
}

function readJweEnvelope(input: unknown): JweGeneral {
  const result = JweGeneralSchema.safeParse(input);

  if (!result.success) {
    const summary = toIssueDetails(result.error)
      .map((d) => (d.path ? `${d.path}: ${d.message}` : d.message))
      .join("; ");
    throw new EnvelopeError(`Malformed JWE envelope: ${summary}`);
  }

  return result.data;
}

function readProtectedHeader(token: string | { protected: string }) {
  let decoded: unknown;
  try {
    decoded = decodeProtectedHeader(token);
  } catch (error) {
    throw new EnvelopeError(
      "Malformed JWE protected header",
      "MALFORMED_ENVELOPE",
      error instanceof Error ? { cause: error } : undefined
    );
  }

  const result = JweProtectedHeaderSchema.safeParse(decoded);
  if (!result.success) {
    throw new EnvelopeError("Malformed JWE protected header");
  }
  return result.data;
}

function contentAlgorithm(enc: string): JweContentAlgorithm {
  if (!isContentAlgorithm(enc)) {
    throw new EnvelopeError(
      `Unsupported JWE content encryption: ${enc}`,
      "UNSUPPORTED_ALGORITHM"
    );
  }
  return enc;
}

/** Check whether a key can recover the content key for a key algorithm */
function keyFitsForDecryption(
  alg: JweKeyAlgorithm,
  enc: JweContentAlgorithm,
  key: KeyObject
): boolean {
  if (alg === "dir") return isDirectKey(key, enc);
  return key.type === "private" && key.asymmetricKeyType === "rsa";
}

/** Map jose failures other than a failed decryption to envelope errors */
function toEnvelopeError(error: unknown): unknown {
  if (
    error instanceof errors.JOSENotSupported ||
    error instanceof errors.JOSEAlgNotAllowed
  ) {
    return new EnvelopeError(error.message, "UNSUPPORTED_ALGORITHM", { cause: error });
  }
  if (error instanceof errors.JWEInvalid) {
    return new EnvelopeError(`Malformed JWE envelope: ${error.message}`, "MALFORMED_ENVELOPE", {
      cause: error,
    });
  }
  return error;
}

function decrypted(
  plaintext: Uint8Array,
  alg: JweKeyAlgorithm,
  enc: JweContentAlgorithm,
  recipientIndex: number
): DecryptedVcon {
  const decoded = decodeVcon(new TextDecoder().decode(plaintext));
  if (!decoded.success) {
    throw new SchemaError(decoded.error, [], "INVALID_JSON");
  }

  const parsed = parseVcon(decoded.value);
  if (!parsed.success) {
    assertVcon(decoded.value);
    throw new SchemaError(parsed.error, parsed.details ?? []);
  }

  logger.info({ uuid: parsed.vcon.uuid, alg, enc, recipientIndex }, "vCon decrypted");
  return { vcon: parsed.vcon, data: parsed.data, enc, recipientIndex };
}

async function decryptCompact(token: string, key: KeyObject): Promise<DecryptedVcon> {
  const header = readProtectedHeader(token);
  const enc = contentAlgorithm(header.enc);
  const alg = header.alg;

  if (!isKeyAlgorithm(alg)) {
    throw new EnvelopeError(
      `Unsupported JWE key management: ${String(alg)}`,
      "UNSUPPORTED_ALGORITHM"
    );
  }
  if (!keyFitsForDecryption(alg, enc, key)) {
    throw new DecryptionError(
      "No recipient uses a key algorithm that fits the decryption key"
    );
  }

  try {
    const { plaintext } = await compactDecrypt(token, key, {
      keyManagementAlgorithms: [alg],
      contentEncryptionAlgorithms: [enc],
    });
    return decrypted(plaintext, alg, enc, 0);
  } catch (error) {
    if (error instanceof errors.JWEDecryptionFailed) {
      logger.warn({ alg, enc }, "vCon decryption failed");
      throw new DecryptionError("Decryption failed for every recipient", error);
    }
    throw toEnvelopeError(error);
  }
}

/**
 * Decrypt an encrypted vCon (general envelope or compact string) and
 * return the validated container. Each recipient whose key algorithm fits
 * the key is tried in order.
 */
export async function decryptVcon(input: unknown, key: KeyObject): Promise<DecryptedVcon> {
  if (typeof input === "string") {
    return decryptCompact(input.trim(), key);
  }

  const envelope = readJweEnvelope(input);
  const header = readProtectedHeader(envelope);
  const enc = contentAlgorithm(header.enc);

  const unsupported: string[] = [];
  let attempted = 0;
  let lastError: unknown;

  for (const [index, recipient] of envelope.recipients.entries()) {
    const alg = recipient.header?.alg ?? envelope.unprotected?.["alg"] ?? header.alg;

    if (!isKeyAlgorithm(alg)) {
      unsupported.push(String(alg));
      continue;
    }
    if (!keyFitsForDecryption(alg, enc, key)) continue;

    attempted++;

    let plaintext: Uint8Array;
    try {
      ({ plaintext } = await flattenedDecrypt(
        {
          protected: envelope.protected,
          header: header.alg ? undefined : { alg },
          encrypted_key: recipient.encrypted_key,
          iv: envelope.iv,
          ciphertext: envelope.ciphertext,
          tag: envelope.tag,
          aad: envelope.aad,
        },
        key,
        { keyManagementAlgorithms: [alg], contentEncryptionAlgorithms: [enc] }
      ));
    } catch (error) {
      if (!(error instanceof errors.JWEDecryptionFailed)) {
        throw toEnvelopeError(error);
      }
      logger.debug(
        { index, alg, error: errorMessage(error) },
        "Recipient could not be decrypted"
      );
      lastError = error;
      continue;
    }

    return decrypted(plaintext, alg, enc, index);
  }

  if (attempted === 0 && unsupported.length === envelope.recipients.length) {
    throw new EnvelopeError(
      `Unsupported JWE key management: ${unsupported.join(", ")}`,
      "UNSUPPORTED_ALGORITHM"
    );
  }
  if (attempted === 0) {
    throw new DecryptionError(
      "No recipient uses a key algorithm that fits the decryption key"
    );
  }

  logger.warn({ recipients: envelope.recipients.length }, "vCon decryption failed");
  throw new DecryptionError("Decryption failed for every recipient", lastError);
}
