import { describe, it, expect } from "vitest";
import {
  assertVcon,
  decodeVcon,
  detectVconState,
  normalizeVcon,
  parseVcon,
  parseVconText,
} from "../../src/services/vcon-parser.js";
import { SchemaError } from "../../src/errors.js";
import type { Vcon } from "../../src/types/vcon.js";
import { SAMPLE_UUID, sampleVcon } from "../fixtures/vcon.js";

describe("vcon-parser", () => {
  describe("detectVconState", () => {
    it("should detect an unsigned container", () => {
      expect(detectVconState(sampleVcon())).toBe("unsigned");
    });

    it("should detect a general JWS envelope", () => {
      expect(
        detectVconState({ payload: "e30", signatures: [{ protected: "e30", signature: "c2ln" }] })
      ).toBe("signed");
    });

    it("should detect a general JWE envelope", () => {
      expect(
        detectVconState({ protected: "e30", recipients: [{}], iv: "aXY", ciphertext: "Y3Q", tag: "dGFn" })
      ).toBe("encrypted");
    });

    it("should treat an envelope that leaks container fields as an envelope", () => {
      expect(
        detectVconState({ vcon: "0.0.1", payload: "e30", signatures: [] })
      ).toBe("signed");
    });

    it("should detect compact serializations", () => {
      expect(detectVconState("eyJhbGciOiJIUzI1NiJ9.e30.c2ln")).toBe("signed");
      expect(detectVconState("eyJlbmMiOiJBMjU2R0NNIn0..aXY.Y3Q.dGFn")).toBe("encrypted");
    });

    it("should return unknown for anything else", () => {
      expect(detectVconState({ hello: "world" })).toBe("unknown");
      expect(detectVconState([1, 2, 3])).toBe("unknown");
      expect(detectVconState("not a token")).toBe("unknown");
      expect(detectVconState(null)).toBe("unknown");
    });
  });

  describe("decodeVcon", () => {
    it("should decode JSON text", () => {
      const result = decodeVcon(JSON.stringify(sampleVcon()));

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.state).toBe("unsigned");
      }
    });

    it("should pass a compact token through untouched", () => {
      const result = decodeVcon("  eyJhbGciOiJIUzI1NiJ9.e30.c2ln\n");

      expect(result).toEqual({
        success: true,
        value: "eyJhbGciOiJIUzI1NiJ9.e30.c2ln",
        state: "signed",
      });
    });

    it("should report invalid JSON", () => {
      const result = decodeVcon("{ not json");

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.code).toBe("INVALID_JSON");
        expect(result.state).toBe("unknown");
        expect(result.error.startsWith("Invalid JSON: ")).toBe(true);
      }
    });
  });

  describe("parseVcon", () => {
    it("should parse a valid vCon", () => {
      const result = parseVcon(sampleVcon());

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.vcon.uuid).toBe(SAMPLE_UUID);
        expect(result.vcon.parties).toHaveLength(2);
        expect(result.vcon.dialog).toHaveLength(1);
      }
    });

    it("should parse a vCon with no parties and keep its keys as given", () => {
      const input = {
        vcon: "0.0.1",
        uuid: SAMPLE_UUID,
        created_at: "2024-11-08T10:30:00Z",
        parties: [],
      };
      const result = parseVcon(input);

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data).toEqual(input);
        expect(Object.keys(result.data)).toEqual(["vcon", "uuid", "created_at", "parties"]);
        expect(result.vcon.attachments).toEqual([]);
      }
    });

    it("should reject a vCon with an invalid UUID", () => {
      const result = parseVcon({ ...sampleVcon(), uuid: "not-a-uuid" });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.code).toBe("SCHEMA_MISMATCH");
        expect(result.error).toBe("Invalid vCon format");
        expect(result.details?.some((d) => d.path === "uuid")).toBe(true);
      }
    });

    it("should reject a vCon missing required fields", () => {
      const { created_at: _createdAt, ...input } = sampleVcon();
      const result = parseVcon(input);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.details?.map((d) => d.path)).toEqual(["created_at"]);
      }
    });

    it("should use DANGLING_REFERENCE when only indices are wrong", () => {
      const vcon = sampleVcon();
      const result = parseVcon({
        ...vcon,
        analysis: [{ type: "summary", vendor: "example-vendor", dialog: 2 }],
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.code).toBe("DANGLING_REFERENCE");
        expect(result.details).toEqual([
          {
            path: "analysis.0.dialog",
            message: "Dialog index 2 is out of range (1 dialogs)",
          },
        ]);
      }
    });

    it("should refuse a signed envelope", () => {
      const result = parseVcon({
        payload: "e30",
        signatures: [{ protected: "e30", signature: "c2ln" }],
      });

      expect(result).toEqual({
        success: false,
        error: "vCon is signed; unwrap the envelope before reading the container",
        code: "SCHEMA_MISMATCH",
        state: "signed",
      });
    });

    it("should fill in missing lists", () => {
      const { dialog: _dialog, analysis: _analysis, attachments: _attachments, ...input } =
        sampleVcon();
      const result = parseVcon(input);

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.vcon.dialog).toEqual([]);
        expect(result.vcon.analysis).toEqual([]);
        expect(result.vcon.attachments).toEqual([]);
      }
    });
  });

  describe("parseVconText", () => {
    it("should decode and parse", () => {
      const result = parseVconText(JSON.stringify(sampleVcon()));
      expect(result.success).toBe(true);
    });

    it("should surface JSON errors", () => {
      const result = parseVconText("[");

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.code).toBe("INVALID_JSON");
      }
    });
  });

  describe("assertVcon", () => {
    it("should return the normalized vCon", () => {
      expect(assertVcon(sampleVcon()).uuid).toBe(SAMPLE_UUID);
    });

    it("should throw a SchemaError with details", () => {
      const vcon = sampleVcon();
      let caught: unknown;
      try {
        assertVcon({ ...vcon, uuid: "nope" });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(SchemaError);
      if (caught instanceof SchemaError) {
        expect(caught.code).toBe("SCHEMA_MISMATCH");
        expect(caught.details).toEqual([{ path: "uuid", message: "Invalid uuid" }]);
      }
    });
  });

  describe("normalizeVcon", () => {
    it("should add empty arrays for missing fields", () => {
      const vcon: Vcon = {
        vcon: "0.0.1",
        uuid: SAMPLE_UUID,
        created_at: "2024-11-08T10:30:00.000Z",
        parties: [{ name: "Test" }],
      };

      const normalized = normalizeVcon(vcon);

      expect(normalized.dialog).toEqual([]);
      expect(normalized.analysis).toEqual([]);
      expect(normalized.attachments).toEqual([]);
    });

    it("should preserve existing arrays", () => {
      const vcon = sampleVcon();
      const normalized = normalizeVcon(vcon);

      expect(normalized.dialog).toBe(vcon.dialog);
      expect(normalized.analysis).toHaveLength(1);
    });
  });
});
