import { describe, it, expect } from "vitest";
import { migrateValue, migrateVcon } from "../../src/services/vcon-migrator.js";
import { SAMPLE_UUID } from "../fixtures/vcon.js";

describe("vcon-migrator", () => {
  it("should repair a doubled UTC offset", () => {
    const result = migrateVcon({
      vcon: "0.0.1",
      uuid: SAMPLE_UUID,
      created_at: "2024-11-08T10:30:00.749585+00+00:00",
      updated_at: "2024-11-08T11:00:00.000001+00+00:00",
    });

    expect(result.vcon["created_at"]).toBe("2024-11-08T10:30:00.749585+00:00");
    expect(result.vcon["updated_at"]).toBe("2024-11-08T11:00:00.000001+00:00");
    expect(result.changes).toEqual([
      "created_at: repaired UTC offset",
      "updated_at: repaired UTC offset",
    ]);
    expect(result.updated).toBe(true);
  });

  it("should drop redacted, appended and group", () => {
    const result = migrateVcon({
      vcon: "0.0.1",
      uuid: SAMPLE_UUID,
      created_at: "2024-11-08T10:30:00.000Z",
      redacted: {},
      appended: {},
      group: [],
    });

    expect(result.vcon).toEqual({
      vcon: "0.0.1",
      uuid: SAMPLE_UUID,
      created_at: "2024-11-08T10:30:00.000Z",
    });
    expect(result.changes).toEqual([
      "removed redacted",
      "removed appended",
      "removed group",
    ]);
  });

  it("should leave a current vCon alone", () => {
    const input = {
      vcon: "0.0.1",
      uuid: SAMPLE_UUID,
      created_at: "2024-11-08T10:30:00+00:00",
      parties: [{ name: "Test" }],
    };

    const result = migrateVcon(input);

    expect(result.updated).toBe(false);
    expect(result.changes).toEqual([]);
    expect(result.vcon).toEqual(input);
  });

  it("should not modify its input", () => {
    const input = { created_at: "2024-11-08T10:30:00+00+00:00", group: [] };

    migrateVcon(input);

    expect(input).toEqual({ created_at: "2024-11-08T10:30:00+00+00:00", group: [] });
  });

  it("should reject values that are not objects", () => {
    expect(migrateValue([])).toBeNull();
    expect(migrateValue("vcon")).toBeNull();
    expect(migrateValue({ vcon: "0.0.1" })).not.toBeNull();
  });
});
