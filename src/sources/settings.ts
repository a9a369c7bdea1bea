/**
 * Row extraction from the source page's embedded settings.
 *
 * The list page ships its data as a JSON settings object; the substance rows
 * sit under a dotted path inside it ("dodProhibited" by default). Retrieval
 * of the page and extraction of the JSON blob happen outside this module.
 */

import { isPlainRecord } from "../substances/raw-value.js";
import type { RawRow } from "../substances/schema.js";

export const DEFAULT_SETTINGS_PATH = "dodProhibited";

/**
 * Value at a dotted path ("a.b.0.c"), or undefined when any step is missing.
 * Numeric segments index into arrays.
 */
export function getNested(data: unknown, path: string): unknown {
  let current: unknown = data;
  for (const segment of path.split(".").filter((part) => part.length > 0)) {
    if (Array.isArray(current) && /^\d+$/.test(segment)) {
      current = current[Number(segment)];
    } else if (isPlainRecord(current)) {
      current = current[segment];
    } else {
      return undefined;
    }
  }
  return current;
}

/**
 * Raw rows under `path`. A missing path or a non-list value gives [];
 * entries that are not objects are skipped.
 *
 * @example
 *   extractRowsFromSettings({ dodProhibited: [{ Name: "DMAA" }] }) // [{ Name: "DMAA" }]
 */
export function extractRowsFromSettings(settings: unknown, path = DEFAULT_SETTINGS_PATH): RawRow[] {
  const value = getNested(settings, path);
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter(isPlainRecord);
}
