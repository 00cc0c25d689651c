/**
 * @fileoverview Loads the RIS tag and reference type table from
 * `data/ris-tags.json` under the project root.
 * @module src/services/RIS/core/risTagTable
 */

import { readFileSync } from "fs";
import path from "path";
import { z } from "zod";
import { config } from "../../../config/index.js";
import { BaseErrorCode, McpError } from "../../../types-global/errors.js";
import type { RisTagDefinition, RisTagTable } from "./risTypes.js";

const RisTagTableSchema = z.object({
  tags: z.record(
    z.string().regex(/^[A-Z][A-Z0-9]$/),
    z.object({
      field: z.string().min(1),
      repeatable: z.boolean(),
      label: z.string(),
    }),
  ),
  referenceTypes: z.record(z.string().min(1), z.string()),
});

export const RIS_TAG_TABLE_PATH = path.join(config.projectRoot, "data", "ris-tags.json");

let cachedTable: RisTagTable | undefined;

/**
 * Returns the tag table, reading and validating it on first use.
 * @throws {McpError} CONFIGURATION_ERROR when the file is missing or invalid.
 */
export function getRisTagTable(): RisTagTable {
  if (cachedTable) {
    return cachedTable;
  }
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(RIS_TAG_TABLE_PATH, "utf-8"));
  } catch (error) {
    throw new McpError(
      BaseErrorCode.CONFIGURATION_ERROR,
      `Could not read RIS tag table at ${RIS_TAG_TABLE_PATH}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  const parsed = RisTagTableSchema.safeParse(raw);
  if (!parsed.success) {
    throw new McpError(BaseErrorCode.CONFIGURATION_ERROR, "RIS tag table is invalid.", {
      issues: parsed.error.issues,
    });
  }
  cachedTable = parsed.data;
  return cachedTable;
}

export function getTagDefinition(tag: string): RisTagDefinition | undefined {
  return getRisTagTable().tags[tag];
}

export function isKnownReferenceType(type: string): boolean {
  return Object.prototype.hasOwnProperty.call(getRisTagTable().referenceTypes, type);
}
