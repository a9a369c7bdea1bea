/**
 * UNII lookup backed by a local copy of the UNII records file.
 *
 * The records file is tab-separated with a header row. Only the columns
 * below are read; the rest are ignored:
 *
 *   UNII            code (required)
 *   PT              preferred term
 *   DISPLAY_NAME    display name ("Display Name" in the names file)
 *   RN              CAS registry number
 *   PUBCHEM         PubChem compound id
 *   EPA_COMPTOX     CompTox dashboard id
 *   SUBSTANCE_TYPE  substance type (TYPE in older files)
 *
 * A name matches a row when its searchable form equals the searchable form
 * of the row's preferred term or display name.
 */

import { toSearchableName } from "../substances/text.js";
import type { UniiLookup } from "./schema.js";

export class UniiTableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UniiTableError";
  }
}

/**
 * One row of the records file, already shaped as a lookup candidate.
 */
export interface UniiTableRow {
  unii: string;
  preferredTerm?: string;
  displayName?: string;
  casRn?: string;
  pubchemCid?: string;
  substanceType?: string;
  comptoxId?: string;
}

type OptionalColumn = Exclude<keyof UniiTableRow, "unii">;

const COLUMN_HEADERS: ReadonlyArray<readonly [OptionalColumn, readonly string[]]> = [
  ["preferredTerm", ["PT"]],
  ["displayName", ["DISPLAY_NAME"]],
  ["casRn", ["RN"]],
  ["pubchemCid", ["PUBCHEM"]],
  ["substanceType", ["SUBSTANCE_TYPE", "TYPE"]],
  ["comptoxId", ["EPA_COMPTOX"]],
];

function normalizeHeader(header: string): string {
  return header.trim().toUpperCase().replace(/[\s-]+/g, "_");
}

/**
 * Parse the tab-separated records file.
 *
 * @throws UniiTableError if the header has no UNII column
 */
export function parseUniiRecords(text: string): UniiTableRow[] {
  const lines = text.split(/\r?\n/).filter((line) => line.trim().length > 0);
  const [headerLine, ...dataLines] = lines;
  if (headerLine === undefined) {
    return [];
  }

  const headers = headerLine.replace(/^\uFEFF/, "").split("\t").map(normalizeHeader);
  const uniiIndex = headers.indexOf("UNII");
  if (uniiIndex === -1) {
    throw new UniiTableError(`UNII records header has no UNII column: ${headers.join(", ")}`);
  }

  const columnIndex = new Map<OptionalColumn, number>();
  for (const [column, names] of COLUMN_HEADERS) {
    const index = headers.findIndex((header) => names.includes(header));
    if (index !== -1) columnIndex.set(column, index);
  }

  const rows: UniiTableRow[] = [];
  for (const line of dataLines) {
    const cells = line.split("\t");
    const unii = cells[uniiIndex]?.trim();
    if (!unii) continue;

    const row: UniiTableRow = { unii };
    for (const [column, index] of columnIndex) {
      const value = cells[index]?.trim();
      if (value) row[column] = value;
    }
    rows.push(row);
  }

  return rows;
}

/**
 * Build an in-memory lookup over parsed rows.
 *
 * @example
 *   const lookup = createUniiTableLookup(parseUniiRecords(readFileSync(path, "utf8")));
 *   lookup("Testosterone") // rows whose PT or display name is "TESTOSTERONE"
 */
export function createUniiTableLookup(rows: readonly UniiTableRow[]): UniiLookup {
  const index = new Map<string, UniiTableRow[]>();

  for (const row of rows) {
    const keys = new Set(
      [row.preferredTerm, row.displayName]
        .filter((term): term is string => term !== undefined)
        .map(toSearchableName)
        .filter((key) => key.length > 0)
    );
    for (const key of keys) {
      const bucket = index.get(key);
      if (bucket) bucket.push(row);
      else index.set(key, [row]);
    }
  }

  return (name) => index.get(toSearchableName(name)) ?? [];
}
