import { describe, it, expect, beforeAll, afterAll } from "vitest";
import type { FastifyInstance } from "fastify";
import { buildServer } from "../../src/server.js";
import { encryptVcon } from "../../src/services/vcon-encryptor.js";
import { secretKey } from "../../src/services/keys.js";
import { SAMPLE_UUID, sampleVcon } from "../fixtures/vcon.js";

describe("vCon API Integration Tests", () => {
  let server: FastifyInstance;

  beforeAll(async () => {
    server = await buildServer();
    await server.ready();
  });

  afterAll(async () => {
    await server.close();
  });

  const post = (url: string, payload: unknown) =>
    server.inject({
      method: "POST",
      url,
      payload: JSON.stringify(payload),
      headers: {
        "content-type": "application/json",
      },
    });

  describe("GET /health", () => {
    it("should return healthy status", async () => {
      const response = await server.inject({ method: "GET", url: "/health" });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.body);
      expect(body.status).toBe("ok");
      expect(body.timestamp).toBeDefined();
    });
  });

  describe("GET /health/ready", () => {
    it("should report configured keys", async () => {
      const response = await server.inject({ method: "GET", url: "/health/ready" });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.body);
      expect(body.services.signing.status).toBe("configured");
      expect(body.services.encryption.status).toBe("configured");
    });
  });

  describe("POST /vcon/validate", () => {
    it("should accept a valid vCon", async () => {
      const response = await post("/vcon/validate", sampleVcon());

      expect(response.statusCode).toBe(200);
      expect(JSON.parse(response.body)).toEqual({
        valid: true,
        state: "unsigned",
        uuid: SAMPLE_UUID,
        errors: [],
      });
    });

    it("should report errors for an invalid vCon", async () => {
      const response = await post("/vcon/validate?expected_version=0.0.2", sampleVcon());

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.body);
      expect(body.valid).toBe(false);
      expect(body.errors).toEqual([
        {
          path: "",
          message: "Invalid vcon version. Expected '0.0.2'",
          source: "lint",
        },
      ]);
    });

    it("should return 400 for malformed JSON", async () => {
      const response = await server.inject({
        method: "POST",
        url: "/vcon/validate",
        payload: "{ not json",
        headers: {
          "content-type": "application/json",
        },
      });

      expect(response.statusCode).toBe(400);
    });
  });

  describe("POST /vcon/validate/batch", () => {
    it("should validate every vCon and summarize", async () => {
      const response = await post("/vcon/validate/batch", [
        sampleVcon(),
        { ...sampleVcon(), uuid: "nope" },
      ]);

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.body);
      expect(body.results).toHaveLength(2);
      expect(body.summary).toEqual({ total: 2, valid: 1, invalid: 1 });
    });

    it("should reject a body that is not an array", async () => {
      const response = await post("/vcon/validate/batch", sampleVcon());

      expect(response.statusCode).toBe(400);
    });
  });

  describe("POST /vcon/migrate", () => {
    it("should return the migrated vCon", async () => {
      const response = await post("/vcon/migrate", {
        ...sampleVcon(),
        created_at: "2024-11-08T10:30:00.749585+00+00:00",
      });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.body);
      expect(body.updated).toBe(true);
      expect(body.changes).toEqual(["created_at: repaired UTC offset"]);
      expect(body.vcon.created_at).toBe("2024-11-08T10:30:00.749585+00:00");
    });

    it("should reject a value that is not an object", async () => {
      const response = await post("/vcon/migrate", ["not", "a", "vcon"]);

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body)).toEqual({
        error: "vCon must be a JSON object",
        code: "SCHEMA_MISMATCH",
      });
    });
  });

  describe("signing", () => {
    it("should sign and verify a vCon", async () => {
      const signResponse = await post("/vcon/sign?kid=test-key", sampleVcon());

      expect(signResponse.statusCode).toBe(200);
      const signed = JSON.parse(signResponse.body);
      expect(Object.keys(signed)).toEqual(["payload", "signatures"]);

      const verifyResponse = await post("/vcon/verify", signed);

      expect(verifyResponse.statusCode).toBe(200);
      const body = JSON.parse(verifyResponse.body);
      expect(body.vcon.uuid).toBe(SAMPLE_UUID);
      expect(body.header).toEqual({
        alg: "HS256",
        cty: "application/vcon+json",
        kid: "test-key",
      });
      expect(body.signature_index).toBe(0);
    });

    it("should sign a minimal vCon without adding fields", async () => {
      const minimal = {
        vcon: "0.0.1",
        uuid: SAMPLE_UUID,
        created_at: "2024-01-15T10:30:00Z",
        parties: [],
      };
      const signed = JSON.parse((await post("/vcon/sign", minimal)).body);

      const response = await post("/vcon/verify", signed);

      expect(response.statusCode).toBe(200);
      expect(JSON.parse(response.body).vcon).toEqual(minimal);
    });

    it("should refuse to sign an invalid vCon", async () => {
      const response = await post("/vcon/sign", { ...sampleVcon(), uuid: "nope" });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body)).toEqual({
        error: "Invalid vCon format",
        code: "SCHEMA_MISMATCH",
        details: [{ path: "uuid", message: "Invalid uuid" }],
      });
    });

    it("should return 401 for a tampered envelope", async () => {
      const signed = JSON.parse((await post("/vcon/sign", sampleVcon())).body);
      const other = JSON.parse(
        (await post("/vcon/sign", { ...sampleVcon(), subject: "Other" })).body
      );

      const response = await post("/vcon/verify", {
        payload: other.payload,
        signatures: signed.signatures,
      });

      expect(response.statusCode).toBe(401);
      expect(JSON.parse(response.body)).toEqual({
        error: "Signature verification failed",
        code: "INVALID_SIGNATURE",
      });
    });

    it("should return 400 for a malformed envelope", async () => {
      const response = await post("/vcon/verify", { payload: "e30", signatures: [] });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).code).toBe("MALFORMED_ENVELOPE");
    });
  });

  describe("encryption", () => {
    it("should encrypt and decrypt a vCon", async () => {
      const encryptResponse = await post("/vcon/encrypt", sampleVcon());

      expect(encryptResponse.statusCode).toBe(200);
      const encrypted = JSON.parse(encryptResponse.body);
      expect(encrypted.unprotected).toEqual({ uuid: SAMPLE_UUID });
      expect(encrypted).not.toHaveProperty("parties");

      const decryptResponse = await post("/vcon/decrypt", encrypted);

      expect(decryptResponse.statusCode).toBe(200);
      const body = JSON.parse(decryptResponse.body);
      expect(body.enc).toBe("A256GCM");
      expect(body.vcon.parties).toHaveLength(2);
    });

    it("should return 422 for an envelope sealed with another key", async () => {
      const encrypted = await encryptVcon(
        sampleVcon(),
        { alg: "dir", key: secretKey(Buffer.alloc(32, 1)) },
        { enc: "A256GCM" }
      );

      const response = await post("/vcon/decrypt", encrypted);

      expect(response.statusCode).toBe(422);
      expect(JSON.parse(response.body)).toEqual({
        error: "Decryption failed for every recipient",
        code: "DECRYPTION_FAILED",
      });
    });
  });
});
