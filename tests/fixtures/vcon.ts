import type { Vcon } from "../../src/types/vcon.js";

export const SAMPLE_UUID = "019371a4-1234-7000-8000-000000000001";

/** A small, valid unsigned vCon: two parties, one text dialog, one summary */
export function sampleVcon(): Vcon {
  return {
    vcon: "0.0.1",
    uuid: SAMPLE_UUID,
    created_at: "2024-11-08T10:30:00.000Z",
    subject: "Invoice question",
    parties: [
      { tel: "+15551230001", name: "Test Customer", role: "customer" },
      { mailto: "agent@example.com", name: "Test Agent", role: "agent" },
    ],
    dialog: [
      {
        type: "text",
        start: "2024-11-08T10:30:05.000Z",
        parties: [0, 1],
        originator: 0,
        mediatype: "text/plain",
        body: "Hello, my invoice looks wrong.",
        encoding: "none",
      },
    ],
    analysis: [
      {
        type: "summary",
        dialog: 0,
        vendor: "example-vendor",
        body: "Customer asks about an invoice.",
        encoding: "none",
      },
    ],
    attachments: [],
  };
}
