/**
 * Snapshot diffing.
 *
 * Two snapshots are matched by slug. A slug only in the new snapshot is
 * added, only in the old one removed, and in both with any compared field
 * different it is changed, with the list of fields that differ. The
 * changelog renderer builds its entries from this result.
 */

import { SubstanceCollection } from "./collection.js";
import type { SubstanceRecord } from "./record.js";
import { stableStringify } from "./text.js";
import { ComparableField } from "../config/normalization/enums.js";

export interface DiffOptions {
  /** Fields whose differences are not reported (e.g. dates that churn) */
  ignoreFields?: readonly ComparableField[];
}

export interface ChangedRecord {
  slug: string;
  name: string;
  previous: SubstanceRecord;
  current: SubstanceRecord;
  /** Compared fields that differ, in ComparableField order */
  fields: ComparableField[];
}

export interface CollectionDiff {
  added: SubstanceRecord[];
  removed: SubstanceRecord[];
  changed: ChangedRecord[];
}

type Snapshot = readonly SubstanceRecord[] | SubstanceCollection;

function recordsOf(snapshot: Snapshot): readonly SubstanceRecord[] {
  return snapshot instanceof SubstanceCollection ? snapshot.records : snapshot;
}

/**
 * Slug → record. Within one snapshot the first record with a slug wins.
 */
function indexBySlug(records: readonly SubstanceRecord[]): Map<string, SubstanceRecord> {
  const index = new Map<string, SubstanceRecord>();
  for (const record of records) {
    if (!index.has(record.slug)) {
      index.set(record.slug, record);
    }
  }
  return index;
}

/**
 * Compared fields that differ between two versions of a record.
 */
export function changedFields(
  previous: SubstanceRecord,
  current: SubstanceRecord,
  ignoreFields: readonly ComparableField[] = []
): ComparableField[] {
  const before = previous.comparable();
  const after = current.comparable();
  return ComparableField.options.filter(
    (field) =>
      !ignoreFields.includes(field) &&
      stableStringify(before[field] ?? null) !== stableStringify(after[field] ?? null)
  );
}

/**
 * @example
 *   const diff = diffCollections([a1], [a2, b]);
 *   diff.added   // [b]
 *   diff.changed // [{ slug: "a", fields: ["classifications"], ... }]
 */
export function diffCollections(
  previous: Snapshot,
  current: Snapshot,
  options: DiffOptions = {}
): CollectionDiff {
  const { ignoreFields = [] } = options;
  const before = indexBySlug(recordsOf(previous));
  const after = indexBySlug(recordsOf(current));

  const added: SubstanceRecord[] = [];
  const changed: ChangedRecord[] = [];

  for (const [slug, record] of after) {
    const old = before.get(slug);
    if (old === undefined) {
      added.push(record);
      continue;
    }
    const fields = changedFields(old, record, ignoreFields);
    if (fields.length > 0) {
      changed.push({ slug, name: record.name, previous: old, current: record, fields });
    }
  }

  const removed = [...before.values()].filter((record) => !after.has(record.slug));

  return { added, removed, changed };
}

export function isEmptyDiff(diff: CollectionDiff): boolean {
  return diff.added.length === 0 && diff.removed.length === 0 && diff.changed.length === 0;
}

/**
 * Plain-text summary, one line per affected substance.
 */
export function formatDiffSummary(diff: CollectionDiff): string {
  const lines = [
    `Changes: ${diff.added.length} added, ${diff.removed.length} removed, ${diff.changed.length} changed`,
  ];
  for (const record of diff.added) {
    lines.push(`  + ${record.name} (${record.slug})`);
  }
  for (const record of diff.removed) {
    lines.push(`  - ${record.name} (${record.slug})`);
  }
  for (const entry of diff.changed) {
    lines.push(`  ~ ${entry.name} (${entry.slug}): ${entry.fields.join(", ")}`);
  }
  return lines.join("\n");
}
