import { z } from "zod";

const Base64UrlSchema = z
  .string()
  .regex(/^[A-Za-z0-9_-]*$/, "must be base64url encoded");

/** Container fields that must only appear inside an envelope's payload */
export const PLAINTEXT_FIELDS = [
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

function rejectPlaintextFields(
  data: Record<string, unknown>,
  ctx: z.RefinementCtx
): void {
  const leaked = PLAINTEXT_FIELDS.filter((field) => field in data);
  if (leaked.length > 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Envelope must not expose plaintext container fields: ${leaked.join(", ")}`,
    });
  }
}

/** JWS protected header (decoded) */
export const JwsProtectedHeaderSchema = z
  .object({
    alg: z.string().min(1),
    cty: z.string().optional(),
    kid: z.string().optional(),
    crit: z.array(z.string()).optional(),
  })
  .passthrough();

export const JwsSignatureSchema = z.object({
  protected: Base64UrlSchema.min(1),
  header: z
    .object({
      uuid: z.string().optional(),
      kid: z.string().optional(),
    })
    .passthrough()
    .optional(),
  signature: Base64UrlSchema.min(1),
});

/** Signed vCon: JWS General JSON Serialization */
export const JwsGeneralSchema = z
  .object({
    payload: Base64UrlSchema.min(1),
    signatures: z.array(JwsSignatureSchema).min(1),
  })
  .passthrough()
  .superRefine(rejectPlaintextFields);

/** JWE protected header (decoded) */
export const JweProtectedHeaderSchema = z
  .object({
    enc: z.string().min(1),
    alg: z.string().optional(),
    cty: z.string().optional(),
    kid: z.string().optional(),
    crit: z.array(z.string()).optional(),
  })
  .passthrough();

export const JweRecipientSchema = z.object({
  header: z
    .object({
      alg: z.string().optional(),
      kid: z.string().optional(),
    })
    .passthrough()
    .optional(),
  encrypted_key: Base64UrlSchema.optional(),
});

/** Encrypted vCon: JWE General JSON Serialization */
export const JweGeneralSchema = z
  .object({
    protected: Base64UrlSchema.min(1),
    unprotected: z
      .object({
        uuid: z.string().optional(),
      })
      .passthrough()
      .optional(),
    recipients: z.array(JweRecipientSchema).min(1),
    aad: Base64UrlSchema.optional(),
    iv: Base64UrlSchema.min(1),
    ciphertext: Base64UrlSchema.min(1),
    tag: Base64UrlSchema.min(1),
  })
  .passthrough()
  .superRefine(rejectPlaintextFields);

export type JwsGeneral = z.output<typeof JwsGeneralSchema>;
export type JweGeneral = z.output<typeof JweGeneralSchema>;
