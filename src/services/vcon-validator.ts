/**
 * vCon Validator Service
 * Rule-based linting of raw vCon documents, plus the combined report
 * used by the HTTP routes and the directory scanner
 */

import { z } from "zod";
import type { DetectedVconState, IssueDetail } from "../types/vcon.js";
import { detectVconState, parseVcon } from "./vcon-parser.js";
import { isRecord } from "../utils/json.js";
import { config } from "../config.js";

export const REQUIRED_FIELDS = ["vcon", "uuid", "created_at"] as const;

export const DIALOG_REQUIRED_FIELDS = ["type", "start", "parties"] as const;

export const DIALOG_TYPES = ["recording", "text", "transfer", "incomplete"];

export const PARTY_IDENTIFIERS = ["tel", "mailto", "name"] as const;

const LIST_FIELDS = ["parties", "dialog", "analysis", "attachments"] as const;

export interface LintOptions {
  /** Version string every container must carry */
  expectedVersion?: string;
}

export interface ValidationIssue extends IssueDetail {
  source: "schema" | "lint";
}

export interface ValidationReport {
  valid: boolean;
  state: DetectedVconState;
  uuid?: string;
  errors: ValidationIssue[];
}

/**
 * ISO 8601 as the linter reads it: a date, or a date and time with or
 * without an offset, separated by `T` or a space
 */
const LintDateTimeSchema = z.union([
  z.string().datetime({ offset: true, local: true }),
  z.string().date(),
]);

function isDateTime(value: unknown): boolean {
  return (
    typeof value === "string" &&
    LintDateTimeSchema.safeParse(value.replace(" ", "T")).success
  );
}

function isIndex(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

function indexList(value: unknown): number[] {
  if (isIndex(value)) return [value];
  if (Array.isArray(value)) return value.filter(isIndex);
  return [];
}

function listOrEmpty(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

export function lintParty(party: unknown, index: number): string[] {
  if (!isRecord(party)) {
    return [`Party ${index} must be an object`];
  }

  const errors: string[] = [];

  // Check for at least one identifier
  if (!PARTY_IDENTIFIERS.some((identifier) => identifier in party)) {
    errors.push(
      `Party ${index} must have at least one identifier (tel, mailto, or name)`
    );
  }

  const tel = party["tel"];
  if (tel !== undefined && (typeof tel !== "string" || !tel.startsWith("+"))) {
    errors.push(`Party ${index}: tel must start with '+'`);
  }

  const mailto = party["mailto"];
  if (mailto !== undefined && (typeof mailto !== "string" || !mailto.includes("@"))) {
    errors.push(`Party ${index}: invalid mailto format`);
  }

  return errors;
}

export function lintDialog(dialog: unknown, index: number): string[] {
  if (!isRecord(dialog)) {
    return [`Dialog ${index} must be an object`];
  }

  const errors: string[] = [];

  for (const field of DIALOG_REQUIRED_FIELDS) {
    if (!(field in dialog)) {
      errors.push(`Dialog ${index}: Missing required field: ${field}`);
    }
  }

  const type = dialog["type"];
  if (type !== undefined && (typeof type !== "string" || !DIALOG_TYPES.includes(type))) {
    errors.push(
      `Dialog ${index}: Invalid type. Must be one of ${DIALOG_TYPES.join(", ")}`
    );
  }

  if ("start" in dialog && !isDateTime(dialog["start"])) {
    errors.push(`Dialog ${index}: Invalid start date format`);
  }

  if ("parties" in dialog) {
    const parties = dialog["parties"];
    if (!Number.isInteger(parties) && !Array.isArray(parties)) {
      errors.push(
        `Dialog ${index}: parties must be an integer or an array of integers`
      );
    }
  }

  if ("duration" in dialog && typeof dialog["duration"] !== "number") {
    errors.push(`Dialog ${index}: duration must be a number`);
  }

  return errors;
}

export function lintAnalysis(analysis: unknown, index: number): string[] {
  if (!isRecord(analysis)) {
    return [`Analysis ${index} must be an object`];
  }
  if (!("type" in analysis)) {
    return [`Analysis ${index}: Missing required field: type`];
  }
  return [];
}

export function lintAttachment(attachment: unknown, index: number): string[] {
  if (!isRecord(attachment)) {
    return [`Attachment ${index} must be an object`];
  }
  return [];
}

/**
 * Check that every party/dialog index used by dialog, analysis and
 * attachment entries points into its list
 */
export function lintReferences(vcon: Record<string, unknown>): string[] {
  const errors: string[] = [];
  const parties = listOrEmpty(vcon["parties"]);
  const dialogs = listOrEmpty(vcon["dialog"]);

  dialogs.forEach((dialog, i) => {
    if (!isRecord(dialog)) return;
    for (const party of indexList(dialog["parties"])) {
      if (party >= parties.length) {
        errors.push(`Dialog ${i}: party index ${party} is out of range`);
      }
    }
  });

  listOrEmpty(vcon["analysis"]).forEach((analysis, i) => {
    if (!isRecord(analysis)) return;
    for (const dialog of indexList(analysis["dialog"])) {
      if (dialog >= dialogs.length) {
        errors.push(`Analysis ${i}: dialog index ${dialog} is out of range`);
      }
    }
  });

  listOrEmpty(vcon["attachments"]).forEach((attachment, i) => {
    if (!isRecord(attachment)) return;
    for (const party of indexList(attachment["party"])) {
      if (party >= parties.length) {
        errors.push(`Attachment ${i}: party index ${party} is out of range`);
      }
    }
  });

  return errors;
}

/**
 * Lint a raw vCon value. Returns a list of error messages; empty when clean.
 */
export function lintVcon(vcon: unknown, options: LintOptions = {}): string[] {
  if (!isRecord(vcon)) {
    return ["vCon must be a JSON object"];
  }

  const expectedVersion = options.expectedVersion ?? config.vconVersion;
  const errors: string[] = [];

  // Check required top-level fields
  for (const field of REQUIRED_FIELDS) {
    if (!(field in vcon)) {
      errors.push(`Missing required field: ${field}`);
    }
  }

  if ("vcon" in vcon && vcon["vcon"] !== expectedVersion) {
    errors.push(`Invalid vcon version. Expected '${expectedVersion}'`);
  }

  if ("uuid" in vcon && typeof vcon["uuid"] !== "string") {
    errors.push("UUID must be a string");
  }

  if ("created_at" in vcon && !isDateTime(vcon["created_at"])) {
    errors.push("Invalid created_at date format");
  }

  if ("updated_at" in vcon && !isDateTime(vcon["updated_at"])) {
    errors.push("Invalid updated_at date format");
  }

  const linters = {
    parties: lintParty,
    dialog: lintDialog,
    analysis: lintAnalysis,
    attachments: lintAttachment,
  };

  for (const field of LIST_FIELDS) {
    if (!(field in vcon)) continue;
    const list = vcon[field];
    if (!Array.isArray(list)) {
      errors.push(`${field} must be an array`);
      continue;
    }
    list.forEach((item, i) => errors.push(...linters[field](item, i)));
  }

  const references = ["redacted", "appended", "group"].filter((key) => key in vcon);
  if (references.length > 1) {
    errors.push("redacted, appended, and group are mutually exclusive");
  }

  errors.push(...lintReferences(vcon));

  return errors;
}

/**
 * Validate a value against the schema and the lint rules.
 * Signed and encrypted envelopes are reported as invalid until unwrapped.
 */
export function validateVcon(
  input: unknown,
  options: LintOptions = {}
): ValidationReport {
  const state = detectVconState(input);

  if (state === "signed" || state === "encrypted") {
    return {
      valid: false,
      state,
      errors: [
        {
          path: "",
          message: `vCon is ${state}; unwrap the envelope before validation`,
          source: "schema",
        },
      ],
    };
  }

  const errors: ValidationIssue[] = [];
  const parsed = parseVcon(input);

  if (!parsed.success) {
    for (const detail of parsed.details ?? []) {
      errors.push({ ...detail, source: "schema" });
    }
  }

  for (const message of lintVcon(input, options)) {
    errors.push({ path: "", message, source: "lint" });
  }

  const uuid = isRecord(input) && typeof input["uuid"] === "string"
    ? input["uuid"]
    : undefined;

  return {
    valid: errors.length === 0,
    state,
    uuid,
    errors,
  };
}
