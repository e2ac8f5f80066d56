/**
 * vCon routes: validation, migration, signing and encryption
 */

import type {
  FastifyInstance,
  FastifyPluginOptions,
  FastifyReply,
} from "fastify";
import { parseVcon, type ParseError } from "../services/vcon-parser.js";
import { validateVcon } from "../services/vcon-validator.js";
import { migrateValue } from "../services/vcon-migrator.js";
import { signVcon, verifyVcon } from "../services/vcon-signer.js";
import { decryptVcon, encryptVcon } from "../services/vcon-encryptor.js";
import {
  contentAlgorithmForKey,
  getEncryptionKey,
  getSigningKey,
} from "../services/keys.js";

interface ValidateQuerystring {
  expected_version?: string;
}

interface SignQuerystring {
  kid?: string;
}

const issueSchema = {
  type: "object",
  properties: {
    path: { type: "string" },
    message: { type: "string" },
  },
} as const;

const errorSchema = {
  type: "object",
  properties: {
    error: { type: "string" },
    code: { type: "string" },
    details: { type: "array", items: issueSchema },
  },
} as const;

const reportSchema = {
  type: "object",
  properties: {
    valid: { type: "boolean" },
    state: { type: "string" },
    uuid: { type: "string" },
    errors: {
      type: "array",
      items: {
        type: "object",
        properties: {
          path: { type: "string" },
          message: { type: "string" },
          source: { type: "string" },
        },
      },
    },
  },
} as const;

const anyObjectSchema = {
  type: "object",
  additionalProperties: true,
} as const;

const validateQuerystringSchema = {
  type: "object",
  properties: {
    expected_version: {
      type: "string",
      description: "vCon version every container must carry (defaults to VCON_VERSION)",
    },
  },
} as const;

function sendParseError(reply: FastifyReply, result: ParseError) {
  return reply.status(400).send({
    error: result.error,
    code: result.code,
    details: result.details ?? [],
  });
}

function sendKeyMissing(reply: FastifyReply, purpose: "Signing" | "Encryption") {
  return reply.status(503).send({
    error: `${purpose} key not configured`,
    code: "KEY_NOT_CONFIGURED",
  });
}

export async function vconRoutes(
  fastify: FastifyInstance,
  _opts: FastifyPluginOptions
) {
  fastify.post<{ Body: unknown; Querystring: ValidateQuerystring }>(
    "/vcon/validate",
    {
      schema: {
        description:
          "Validate a vCon against the container schema and the lint rules",
        tags: ["vcon"],
        querystring: validateQuerystringSchema,
        response: {
          200: reportSchema,
        },
      },
    },
    async (request, reply) => {
      const report = validateVcon(request.body, {
        expectedVersion: request.query.expected_version,
      });
      return reply.send(report);
    }
  );

  fastify.post<{ Body: unknown[]; Querystring: ValidateQuerystring }>(
    "/vcon/validate/batch",
    {
      schema: {
        description: "Validate multiple vCons",
        tags: ["vcon"],
        querystring: validateQuerystringSchema,
        body: {
          type: "array",
          items: {},
          description: "Array of vCon documents",
        },
        response: {
          200: {
            type: "object",
            properties: {
              results: { type: "array", items: reportSchema },
              summary: {
                type: "object",
                properties: {
                  total: { type: "number" },
                  valid: { type: "number" },
                  invalid: { type: "number" },
                },
              },
            },
          },
        },
      },
    },
    async (request, reply) => {
      const results = request.body.map((vcon) =>
        validateVcon(vcon, { expectedVersion: request.query.expected_version })
      );
      const valid = results.filter((r) => r.valid).length;

      return reply.send({
        results,
        summary: {
          total: results.length,
          valid,
          invalid: results.length - valid,
        },
      });
    }
  );

  fastify.post<{ Body: unknown }>(
    "/vcon/migrate",
    {
      schema: {
        description:
          "Repair malformed timestamps and drop redacted/appended/group references",
        tags: ["vcon"],
        response: {
          200: {
            type: "object",
            properties: {
              vcon: anyObjectSchema,
              changes: { type: "array", items: { type: "string" } },
              updated: { type: "boolean" },
            },
          },
          400: errorSchema,
        },
      },
    },
    async (request, reply) => {
      const result = migrateValue(request.body);
      if (!result) {
        return reply.status(400).send({
          error: "vCon must be a JSON object",
          code: "SCHEMA_MISMATCH",
        });
      }
      return reply.send(result);
    }
  );

  fastify.post<{ Body: unknown; Querystring: SignQuerystring }>(
    "/vcon/sign",
    {
      schema: {
        description: "Sign a vCon (JWS, HS256 with the configured secret)",
        tags: ["vcon"],
        querystring: {
          type: "object",
          properties: {
            kid: { type: "string", description: "Key identifier for the protected header" },
          },
        },
        response: {
          200: anyObjectSchema,
          400: errorSchema,
          503: errorSchema,
        },
      },
    },
    async (request, reply) => {
      const key = getSigningKey();
      if (!key) return sendKeyMissing(reply, "Signing");

      const parsed = parseVcon(request.body);
      if (!parsed.success) return sendParseError(reply, parsed);

      const signed = await signVcon(parsed.data, {
        alg: "HS256",
        key,
        kid: request.query.kid,
      });
      return reply.send(signed);
    }
  );

  fastify.post<{ Body: unknown }>(
    "/vcon/verify",
    {
      schema: {
        description:
          "Verify a signed vCon (general JSON envelope or compact string) and return the container",
        tags: ["vcon"],
        response: {
          200: {
            type: "object",
            properties: {
              vcon: anyObjectSchema,
              header: anyObjectSchema,
              signature_index: { type: "number" },
            },
          },
          400: errorSchema,
          401: errorSchema,
          503: errorSchema,
        },
      },
    },
    async (request, reply) => {
      const key = getSigningKey();
      if (!key) return sendKeyMissing(reply, "Signing");

      const verified = await verifyVcon(request.body, key);
      return reply.send({
        vcon: verified.data,
        header: verified.header,
        signature_index: verified.signatureIndex,
      });
    }
  );

  fastify.post<{ Body: unknown }>(
    "/vcon/encrypt",
    {
      schema: {
        description: "Encrypt a vCon (JWE, dir with the configured key)",
        tags: ["vcon"],
        response: {
          200: anyObjectSchema,
          400: errorSchema,
          503: errorSchema,
        },
      },
    },
    async (request, reply) => {
      const key = getEncryptionKey();
      const enc = key ? contentAlgorithmForKey(key) : undefined;
      if (!key || !enc) return sendKeyMissing(reply, "Encryption");

      const parsed = parseVcon(request.body);
      if (!parsed.success) return sendParseError(reply, parsed);

      return reply.send(await encryptVcon(parsed.data, { alg: "dir", key }, { enc }));
    }
  );

  fastify.post<{ Body: unknown }>(
    "/vcon/decrypt",
    {
      schema: {
        description:
          "Decrypt an encrypted vCon (general JSON envelope or compact string) and return the container",
        tags: ["vcon"],
        response: {
          200: {
            type: "object",
            properties: {
              vcon: anyObjectSchema,
              enc: { type: "string" },
            },
          },
          400: errorSchema,
          422: errorSchema,
          503: errorSchema,
        },
      },
    },
    async (request, reply) => {
      const key = getEncryptionKey();
      if (!key) return sendKeyMissing(reply, "Encryption");

      const decrypted = await decryptVcon(request.body, key);
      return reply.send({ vcon: decrypted.data, enc: decrypted.enc });
    }
  );
}
