import { z } from "zod";

/** ISO 8601 date-time; a numeric UTC offset is allowed */
const DateTimeSchema = z.string().datetime({ offset: true });

const IndexSchema = z.number().int().nonnegative();

const IndexListSchema = z.union([IndexSchema, z.array(IndexSchema)]);

const ContentHashSchema = z.union([z.string(), z.array(z.string())]);

const BodySchema = z.union([
  z.string(),
  z.record(z.unknown()),
  z.array(z.unknown()),
]);

/** Civic address schema */
export const CivicAddressSchema = z
  .object({
    country: z.string().optional(),
    a1: z.string().optional(),
    a2: z.string().optional(),
    a3: z.string().optional(),
    a4: z.string().optional(),
    a5: z.string().optional(),
    a6: z.string().optional(),
    prd: z.string().optional(),
    pod: z.string().optional(),
    sts: z.string().optional(),
    hno: z.string().optional(),
    hns: z.string().optional(),
    lmk: z.string().optional(),
    loc: z.string().optional(),
    flr: z.string().optional(),
    nam: z.string().optional(),
    pc: z.string().optional(),
  })
  .strict();

/** Party role enum */
export const PartyRoleSchema = z.enum([
  "agent",
  "customer",
  "supervisor",
  "sme",
  "thirdparty",
]);

/** Party schema */
export const PartySchema = z
  .object({
    tel: z.string().optional(),
    mailto: z.string().email().optional(),
    name: z.string().optional(),
    stir: z.string().optional(),
    validation: z.string().optional(),
    uuid: z.string().uuid().optional(),
    role: PartyRoleSchema.optional(),
    gmlpos: z.string().optional(),
    civicaddress: CivicAddressSchema.optional(),
    timezone: z.string().optional(),
    contact_list: z.string().optional(),
  })
  .passthrough();

/** Dialog type enum */
export const DialogTypeSchema = z.enum([
  "recording",
  "text",
  "transfer",
  "incomplete",
]);

/** Encoding type enum */
export const EncodingSchema = z.enum(["base64url", "json", "none"]);

/** Party history event schema */
export const PartyHistoryEventSchema = z.object({
  event: z.enum(["join", "drop", "hold", "unhold", "mute", "unmute"]),
  party: IndexSchema,
  time: DateTimeSchema,
});

/** Dialog schema */
export const DialogSchema = z
  .object({
    type: DialogTypeSchema,
    start: DateTimeSchema,
    duration: z.number().nonnegative().optional(),
    parties: IndexListSchema,
    originator: IndexSchema.optional(),
    mediatype: z.string().optional(),
    filename: z.string().optional(),
    body: z.string().optional(),
    encoding: EncodingSchema.optional(),
    url: z.string().url().optional(),
    content_hash: ContentHashSchema.optional(),
    disposition: z.string().optional(),
    party_history: z.array(PartyHistoryEventSchema).optional(),
    campaign: z.string().optional(),
    interaction_type: z.string().optional(),
    interaction_id: z.string().optional(),
    skill: z.string().optional(),
    application: z.string().optional(),
    message_id: z.string().optional(),
    // Transfer-specific fields: party indices
    transferee: IndexSchema.optional(),
    transferor: IndexSchema.optional(),
    transfer_target: IndexSchema.optional(),
    // Transfer-specific fields: dialog indices
    original: IndexSchema.optional(),
    consultation: IndexSchema.optional(),
    target_dialog: IndexSchema.optional(),
  })
  .passthrough()
  .refine(
    (data) => {
      // If type is recording or text with inline content, mediatype is required
      if ((data.type === "recording" || data.type === "text") && data.body) {
        return !!data.mediatype;
      }
      return true;
    },
    {
      message: "mediatype is required when body is present for recording/text",
      path: ["mediatype"],
    }
  );

/** Analysis type enum */
export const AnalysisTypeSchema = z.enum([
  "summary",
  "transcript",
  "translation",
  "sentiment",
  "tts",
]);

/** Analysis schema */
export const AnalysisSchema = z
  .object({
    type: z.union([AnalysisTypeSchema, z.string().min(1)]),
    dialog: IndexListSchema.optional(),
    mediatype: z.string().optional(),
    filename: z.string().optional(),
    vendor: z.string().min(1),
    product: z.string().optional(),
    schema: z.string().optional(),
    body: BodySchema.optional(),
    encoding: EncodingSchema.optional(),
    url: z.string().url().optional(),
    content_hash: ContentHashSchema.optional(),
  })
  .passthrough();

/** Attachment schema */
export const AttachmentSchema = z
  .object({
    type: z.string().optional(),
    start: DateTimeSchema.optional(),
    party: IndexSchema.optional(),
    dialog: IndexSchema.optional(),
    mediatype: z.string().min(1).optional(),
    filename: z.string().optional(),
    body: BodySchema.optional(),
    encoding: EncodingSchema.optional(),
    url: z.string().url().optional(),
    content_hash: ContentHashSchema.optional(),
  })
  .passthrough();

/** Reference to another vCon (redacted, appended, group member) */
export const VconReferenceSchema = z
  .object({
    uuid: z.string().uuid(),
    type: z.string().optional(),
    url: z.string().url().optional(),
    content_hash: ContentHashSchema.optional(),
    body: BodySchema.optional(),
    encoding: EncodingSchema.optional(),
    mediatype: z.string().optional(),
  })
  .passthrough();

const VconObjectSchema = z
  .object({
    vcon: z.string().regex(/^\d+\.\d+\.\d+$/, "Invalid version format"),
    uuid: z.string().uuid(),
    created_at: DateTimeSchema,
    updated_at: DateTimeSchema.optional(),
    subject: z.string().optional(),
    redacted: VconReferenceSchema.optional(),
    appended: VconReferenceSchema.optional(),
    group: z.array(VconReferenceSchema).optional(),
    parties: z.array(PartySchema),
    dialog: z.array(DialogSchema).optional(),
    analysis: z.array(AnalysisSchema).optional(),
    attachments: z.array(AttachmentSchema).optional(),
  })
  .passthrough();

type VconObject = z.output<typeof VconObjectSchema>;

type IssuePath = Array<string | number>;

/** Issue param marking a party/dialog index that points past its list */
export const DANGLING_REFERENCE = "DANGLING_REFERENCE";

function checkReferences(data: VconObject, ctx: z.RefinementCtx): void {
  const partyCount = data.parties.length;
  const dialogCount = data.dialog?.length ?? 0;

  const checkParty = (index: number | undefined, path: IssuePath) => {
    if (index !== undefined && index >= partyCount) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path,
        message: `Party index ${index} is out of range (${partyCount} parties)`,
        params: { code: DANGLING_REFERENCE },
      });
    }
  };

  const checkDialog = (index: number | undefined, path: IssuePath) => {
    if (index !== undefined && index >= dialogCount) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path,
        message: `Dialog index ${index} is out of range (${dialogCount} dialogs)`,
        params: { code: DANGLING_REFERENCE },
      });
    }
  };

  data.dialog?.forEach((dialog, i) => {
    if (Array.isArray(dialog.parties)) {
      dialog.parties.forEach((party, j) =>
        checkParty(party, ["dialog", i, "parties", j])
      );
    } else {
      checkParty(dialog.parties, ["dialog", i, "parties"]);
    }
    checkParty(dialog.originator, ["dialog", i, "originator"]);
    checkParty(dialog.transferee, ["dialog", i, "transferee"]);
    checkParty(dialog.transferor, ["dialog", i, "transferor"]);
    checkParty(dialog.transfer_target, ["dialog", i, "transfer_target"]);
    checkDialog(dialog.original, ["dialog", i, "original"]);
    checkDialog(dialog.consultation, ["dialog", i, "consultation"]);
    checkDialog(dialog.target_dialog, ["dialog", i, "target_dialog"]);
    dialog.party_history?.forEach((event, k) =>
      checkParty(event.party, ["dialog", i, "party_history", k, "party"])
    );
  });

  data.analysis?.forEach((analysis, i) => {
    if (analysis.dialog === undefined) return;
    if (Array.isArray(analysis.dialog)) {
      analysis.dialog.forEach((dialog, j) =>
        checkDialog(dialog, ["analysis", i, "dialog", j])
      );
    } else {
      checkDialog(analysis.dialog, ["analysis", i, "dialog"]);
    }
  });

  data.attachments?.forEach((attachment, i) => {
    checkParty(attachment.party, ["attachments", i, "party"]);
    checkDialog(attachment.dialog, ["attachments", i, "dialog"]);
  });
}

/** Main vCon schema */
export const VconSchema = VconObjectSchema.superRefine((data, ctx) => {
  // group, redacted, and appended are mutually exclusive
  const count = [data.group, data.redacted, data.appended].filter(
    Boolean
  ).length;
  if (count > 1) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "group, redacted, and appended are mutually exclusive",
    });
  }

  checkReferences(data, ctx);
});
