/**
 * JSON export of the substance list.
 *
 * The export is one JSON array with one object per substance: snake_case
 * keys, ISO dates, null for absent values (see SubstanceExportSchema). It
 * serves two readers:
 *
 * 1. RENDERING: the site generator and the public JSON download read it
 *    as-is.
 *
 * 2. DIFFING: the previous run's export is reloaded into records and
 *    compared with the current snapshot. An export entry is itself a valid
 *    raw row, so reloading goes through the same construction path as
 *    source data, and UNII info is restored from `unii_info`.
 */

import { writeFileSync, readFileSync, mkdirSync, existsSync } from "node:fs";
import { join } from "node:path";
import { SubstanceCollection } from "../substances/collection.js";
import { SubstanceRecord, uniiInfoFromExport } from "../substances/record.js";
import { SubstanceExportCollectionSchema, type SubstanceExport } from "../substances/schema.js";
import type { NormalizationConfig } from "../config/normalization/schema.js";

export const DEFAULT_EXPORT_FILENAME = "substances.json";

export class ExportFormatError extends Error {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = "ExportFormatError";
    this.issues = issues;
  }
}

type Exportable = readonly SubstanceRecord[] | SubstanceCollection;

/**
 * Export entries for records, in order.
 */
export function toExport(records: Exportable): SubstanceExport[] {
  const list = records instanceof SubstanceCollection ? records.records : records;
  return list.map((record) => record.toJSON());
}

/**
 * Serialize records to the export JSON string.
 *
 * @param pretty - Whether to format with indentation (default: true)
 */
export function serializeExport(records: Exportable, pretty = true): string {
  return JSON.stringify(toExport(records), null, pretty ? 2 : undefined);
}

/**
 * Parse and validate an export JSON string.
 *
 * @throws ExportFormatError if parsing or validation fails
 */
export function deserializeExport(json: string): SubstanceExport[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new ExportFormatError(
      `Failed to parse export JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const result = SubstanceExportCollectionSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ExportFormatError(`Invalid export format: ${issues.join("; ")}`, issues);
  }

  return result.data;
}

/**
 * Rebuild records from export entries, restoring UNII info.
 */
export function recordsFromExport(
  entries: readonly SubstanceExport[],
  config?: Readonly<NormalizationConfig>
): SubstanceRecord[] {
  return entries.map((entry) => {
    const record = SubstanceRecord.fromRaw(entry, { config, markup: false });
    if (entry.unii_info !== null) {
      record.attachUniiInfo(uniiInfoFromExport(entry.unii_info));
    }
    return record;
  });
}

/**
 * Write the export to a file, creating the directory if needed.
 *
 * @returns Full path to the saved file
 */
export function saveExport(
  records: Exportable,
  directory: string,
  filename: string = DEFAULT_EXPORT_FILENAME
): string {
  const filePath = join(directory, filename);

  if (!existsSync(directory)) {
    mkdirSync(directory, { recursive: true });
  }

  writeFileSync(filePath, serializeExport(records) + "\n", "utf-8");
  return filePath;
}

/**
 * Read and validate an export file.
 *
 * @throws ExportFormatError if the file content is not a valid export
 */
export function loadExport(filePath: string): SubstanceExport[] {
  return deserializeExport(readFileSync(filePath, "utf-8"));
}
