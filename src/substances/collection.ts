/**
 * Record collection operations.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * COLLECTIONS
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * A collection is an ordered list of records whose slugs are unique. The
 * free functions here (deduplicate, sortRecords, findSlugCollisions) work on
 * plain arrays and never drop or merge records beyond what they document;
 * SubstanceCollection is the frozen, slug-indexed form handed to renderers.
 *
 * Ordering is deterministic: sorts are stable and compare code units, so
 * the same input yields the same page order on every machine.
 */

import type { SubstanceRecord } from "./record.js";
import type { DeaSchedule, SubstanceExport } from "./schema.js";
import { stableStringify, toSearchableName } from "./text.js";

export const SORT_KEYS = ["name", "added", "updated"] as const;
export type SortKey = (typeof SORT_KEYS)[number];

export function isSortKey(value: string): value is SortKey {
  return (SORT_KEYS as readonly string[]).includes(value);
}

/**
 * Error raised when records cannot form a collection.
 */
export class CollectionError extends Error {
  public readonly slugs: string[];

  constructor(message: string, slugs: string[]) {
    super(message);
    this.name = "CollectionError";
    this.slugs = slugs;
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// DEDUPLICATION
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Equality key over the normalized content fields. Dates, identifiers and
 * source bookkeeping are not part of it.
 */
export function dedupeKey(record: SubstanceRecord): string {
  return stableStringify({
    name: record.name,
    otherNames: record.otherNames,
    classifications: record.classifications,
    reasons: record.reasons,
    warnings: record.warnings,
    references: record.references,
    deaSchedule: record.deaSchedule ?? null,
    isSteroid: record.isSteroid,
  });
}

/**
 * Keep the first of every group of records with equal content, in input order.
 */
export function deduplicate(records: readonly SubstanceRecord[]): SubstanceRecord[] {
  const seen = new Set<string>();
  const result: SubstanceRecord[] = [];
  for (const record of records) {
    const key = dedupeKey(record);
    if (!seen.has(key)) {
      seen.add(key);
      result.push(record);
    }
  }
  return result;
}

// ═══════════════════════════════════════════════════════════════════════════
// SORTING
// ═══════════════════════════════════════════════════════════════════════════

function compareCodeUnits(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Newest first; records without the date go last.
 */
function compareDatesDescending(a: string | undefined, b: string | undefined): number {
  if (a === undefined || b === undefined) {
    return a === b ? 0 : a === undefined ? 1 : -1;
  }
  return compareCodeUnits(b, a);
}

/**
 * Stable sort. "name" orders by searchable name; "added" and "updated"
 * order newest first with undated records last. Ties keep input order.
 */
export function sortRecords(
  records: readonly SubstanceRecord[],
  key: SortKey = "name"
): SubstanceRecord[] {
  const compare = (a: SubstanceRecord, b: SubstanceRecord): number => {
    switch (key) {
      case "name":
        return compareCodeUnits(a.searchableName, b.searchableName);
      case "added":
        return compareDatesDescending(a.added, b.added);
      case "updated":
        return compareDatesDescending(a.updated, b.updated);
    }
  };

  return records
    .map((record, index) => ({ record, index }))
    .sort((a, b) => compare(a.record, b.record) || a.index - b.index)
    .map(({ record }) => record);
}

// ═══════════════════════════════════════════════════════════════════════════
// SLUG COLLISIONS
// ═══════════════════════════════════════════════════════════════════════════

export interface SlugCollision {
  slug: string;
  /** Names of every record using the slug, in input order */
  names: string[];
  /** Input positions of those records */
  indices: number[];
}

/**
 * Slugs used by more than one record, in order of first use.
 */
export function findSlugCollisions(records: readonly SubstanceRecord[]): SlugCollision[] {
  const bySlug = new Map<string, SlugCollision>();
  records.forEach((record, index) => {
    const entry = bySlug.get(record.slug);
    if (entry) {
      entry.names.push(record.name);
      entry.indices.push(index);
    } else {
      bySlug.set(record.slug, { slug: record.slug, names: [record.name], indices: [index] });
    }
  });
  return [...bySlug.values()].filter((entry) => entry.indices.length > 1);
}

// ═══════════════════════════════════════════════════════════════════════════
// INDEXED COLLECTION
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Collection filter. All criteria are AND-combined.
 */
export interface SubstanceFilter {
  deaSchedule?: DeaSchedule;
  isSteroid?: boolean;
  /** Exact classification, case-insensitive */
  classification?: string;
  /** Substring of the searchable name or of any other name */
  nameContains?: string;
  isEnriched?: boolean;
  hasReviewIssues?: boolean;
}

export interface CollectionStats {
  total: number;
  steroids: number;
  enriched: number;
  withReviewIssues: number;
  bySchedule: Record<DeaSchedule | "none", number>;
  uniqueClassifications: number;
}

/**
 * Frozen, slug-indexed collection of records.
 *
 * @example
 *   const collection = SubstanceCollection.create(sortRecords(records));
 *   collection.getBySlug("testosterone");
 *   collection.filter({ deaSchedule: "III", isSteroid: true });
 */
export class SubstanceCollection {
  private readonly _records: ReadonlyArray<SubstanceRecord>;
  private readonly _bySlug: ReadonlyMap<string, SubstanceRecord>;

  private constructor(records: readonly SubstanceRecord[]) {
    this._records = Object.freeze([...records]);
    this._bySlug = new Map(records.map((record) => [record.slug, record]));
  }

  /**
   * @throws CollectionError if two records share a slug
   */
  static create(records: readonly SubstanceRecord[]): SubstanceCollection {
    const collisions = findSlugCollisions(records);
    if (collisions.length > 0) {
      const slugs = collisions.map((collision) => collision.slug);
      throw new CollectionError(`Duplicate slugs in collection: ${slugs.join(", ")}`, slugs);
    }
    return new SubstanceCollection(records);
  }

  get records(): ReadonlyArray<SubstanceRecord> {
    return this._records;
  }

  get size(): number {
    return this._records.length;
  }

  has(slug: string): boolean {
    return this._bySlug.has(slug);
  }

  getBySlug(slug: string): SubstanceRecord | undefined {
    return this._bySlug.get(slug);
  }

  slugs(): string[] {
    return this._records.map((record) => record.slug);
  }

  /**
   * New collection with the same records in another order.
   */
  sorted(key: SortKey = "name"): SubstanceCollection {
    return new SubstanceCollection(sortRecords(this._records, key));
  }

  filter(filter: SubstanceFilter): SubstanceRecord[] {
    const classification = filter.classification?.toLowerCase();
    const needle = filter.nameContains === undefined ? undefined : toSearchableName(filter.nameContains);

    return this._records.filter((record) => {
      if (filter.deaSchedule !== undefined && record.deaSchedule !== filter.deaSchedule) {
        return false;
      }
      if (filter.isSteroid !== undefined && record.isSteroid !== filter.isSteroid) {
        return false;
      }
      if (filter.isEnriched !== undefined && record.isEnriched !== filter.isEnriched) {
        return false;
      }
      if (
        filter.hasReviewIssues !== undefined &&
        (record.reviewIssues.length > 0) !== filter.hasReviewIssues
      ) {
        return false;
      }
      if (
        classification !== undefined &&
        !record.classifications.some((entry) => entry.toLowerCase() === classification)
      ) {
        return false;
      }
      if (needle !== undefined) {
        const names = [record.searchableName, ...record.otherNames.map(toSearchableName)];
        if (!names.some((name) => name.includes(needle))) {
          return false;
        }
      }
      return true;
    });
  }

  /**
   * Classification → number of records, most common first, then by name.
   */
  getClassificationCounts(): Array<[string, number]> {
    const counts = new Map<string, number>();
    for (const record of this._records) {
      for (const entry of new Set(record.classifications)) {
        counts.set(entry, (counts.get(entry) ?? 0) + 1);
      }
    }
    return [...counts.entries()].sort(
      ([nameA, countA], [nameB, countB]) => countB - countA || compareCodeUnits(nameA, nameB)
    );
  }

  getStats(): CollectionStats {
    const bySchedule: Record<DeaSchedule | "none", number> = {
      I: 0,
      II: 0,
      III: 0,
      IV: 0,
      V: 0,
      none: 0,
    };
    let steroids = 0;
    let enriched = 0;
    let withReviewIssues = 0;

    for (const record of this._records) {
      bySchedule[record.deaSchedule ?? "none"]++;
      if (record.isSteroid) steroids++;
      if (record.isEnriched) enriched++;
      if (record.reviewIssues.length > 0) withReviewIssues++;
    }

    return {
      total: this._records.length,
      steroids,
      enriched,
      withReviewIssues,
      bySchedule,
      uniqueClassifications: this.getClassificationCounts().length,
    };
  }

  toJSON(): SubstanceExport[] {
    return this._records.map((record) => record.toJSON());
  }
}
