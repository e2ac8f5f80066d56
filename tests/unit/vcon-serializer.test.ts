import { describe, it, expect } from "vitest";
import {
  orderVconFields,
  serializeEnvelope,
  serializeVcon,
} from "../../src/services/vcon-serializer.js";
import { parseVconText } from "../../src/services/vcon-parser.js";
import type { Vcon } from "../../src/types/vcon.js";
import { sampleVcon } from "../fixtures/vcon.js";

describe("vcon-serializer", () => {
  it("should write top-level fields in canonical order", () => {
    const vcon: Vcon = {
      parties: [{ name: "Test" }],
      created_at: "2024-11-08T10:30:00.000Z",
      uuid: "019371a4-1234-7000-8000-000000000001",
      vcon: "0.0.1",
      subject: "Order test",
    };

    expect(Object.keys(orderVconFields(vcon))).toEqual([
      "vcon",
      "uuid",
      "created_at",
      "subject",
      "parties",
    ]);
  });

  it("should keep extension fields after the known ones", () => {
    const vcon = { x_tag: "first", ...sampleVcon(), x_note: "second" };

    expect(Object.keys(orderVconFields(vcon)).slice(-2)).toEqual([
      "x_tag",
      "x_note",
    ]);
  });

  it("should drop undefined values", () => {
    const vcon: Vcon = { ...sampleVcon(), updated_at: undefined };

    expect(orderVconFields(vcon)).not.toHaveProperty("updated_at");
  });

  it("should produce compact JSON by default and indented JSON on request", () => {
    const vcon: Vcon = {
      vcon: "0.0.1",
      uuid: "019371a4-1234-7000-8000-000000000001",
      created_at: "2024-11-08T10:30:00.000Z",
      parties: [{ name: "Test" }],
    };

    expect(serializeVcon(vcon)).toBe(
      '{"vcon":"0.0.1","uuid":"019371a4-1234-7000-8000-000000000001","created_at":"2024-11-08T10:30:00.000Z","parties":[{"name":"Test"}]}'
    );
    expect(serializeVcon(vcon, { pretty: true }).split("\n")[1]).toBe(
      '  "vcon": "0.0.1",'
    );
  });

  it("should read back what it writes", () => {
    const vcon = sampleVcon();
    const result = parseVconText(serializeVcon(vcon, { pretty: true }));

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.vcon).toEqual(vcon);
    }
  });

  it("should not add lists a minimal container left out", () => {
    const text =
      '{"vcon":"0.0.1","uuid":"019371a4-1234-7000-8000-000000000001","created_at":"2024-11-08T10:30:00Z","parties":[]}';
    const result = parseVconText(text);

    expect(result.success).toBe(true);
    if (result.success) {
      expect(serializeVcon(result.data)).toBe(text);
      expect(result.vcon.dialog).toEqual([]);
    }
  });

  it("should write envelopes as they are", () => {
    const envelope = {
      payload: "e30",
      signatures: [{ protected: "eyJhbGciOiJIUzI1NiJ9", signature: "c2ln" }],
    };

    expect(serializeEnvelope(envelope)).toBe(
      '{"payload":"e30","signatures":[{"protected":"eyJhbGciOiJIUzI1NiJ9","signature":"c2ln"}]}'
    );
    expect(JSON.parse(serializeEnvelope(envelope, { pretty: true }))).toEqual(envelope);
  });
});
