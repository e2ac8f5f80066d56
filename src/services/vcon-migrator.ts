/**
 * vCon Migrator Service
 * Repairs documents written by older generator releases
 */

import { isRecord } from "../utils/json.js";
import { logger } from "../utils/logger.js";

/** Offset written twice by older generators, e.g. `...749585+00+00:00` */
const DOUBLED_UTC_OFFSET = "+00+00:00";

const TIMESTAMP_FIELDS = ["created_at", "updated_at"] as const;

/** Reference fields no longer carried by the data set */
export const REMOVED_FIELDS = ["redacted", "appended", "group"] as const;

export interface MigrationResult {
  vcon: Record<string, unknown>;
  changes: string[];
  updated: boolean;
}

/**
 * Migrate a raw vCon object. The input is not modified.
 */
export function migrateVcon(input: Record<string, unknown>): MigrationResult {
  const vcon: Record<string, unknown> = { ...input };
  const changes: string[] = [];

  for (const field of TIMESTAMP_FIELDS) {
    const value = vcon[field];
    if (typeof value === "string" && value.includes(DOUBLED_UTC_OFFSET)) {
      vcon[field] = value.replace(DOUBLED_UTC_OFFSET, "+00:00");
      changes.push(`${field}: repaired UTC offset`);
    }
  }

  for (const field of REMOVED_FIELDS) {
    if (field in vcon) {
      delete vcon[field];
      changes.push(`removed ${field}`);
    }
  }

  if (changes.length > 0) {
    logger.debug(
      { uuid: typeof vcon["uuid"] === "string" ? vcon["uuid"] : undefined, changes },
      "vCon migrated"
    );
  }

  return { vcon, changes, updated: changes.length > 0 };
}

/**
 * Migrate an unknown value; anything other than a JSON object is rejected
 */
export function migrateValue(input: unknown): MigrationResult | null {
  return isRecord(input) ? migrateVcon(input) : null;
}
