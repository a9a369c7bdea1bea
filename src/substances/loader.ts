/**
 * Substance loader.
 *
 * Turns a list of raw source rows into records ready for enrichment and
 * export:
 *
 *   1. Construct one record per row. Rows without a usable name are skipped
 *      and reported; every other row produces a record.
 *   2. Drop content duplicates (first occurrence kept).
 *   3. Check slug uniqueness. Both records of a collision are flagged.
 *   4. Surface construction-time review issues (fallback slugs, conflicting
 *      schedule mentions) as warnings.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * COLLISION MODES
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * LENIENT (default):
 *    - The first record with a slug is kept, later ones are dropped and
 *      reported as warnings
 *    - Skipped rows are reported as errors but the load still succeeds
 *
 * STRICT:
 *    - Slug collisions and skipped rows are errors and fail the load
 *    - Use when the output feeds a published site
 */

import { z } from "zod";
import { ConstructionError, SubstanceRecord } from "./record.js";
import { deduplicate } from "./collection.js";
import type { RecordIssueCode } from "./schema.js";
import type { NormalizationConfig } from "../config/normalization/schema.js";
import type { CollisionMode } from "../config/normalization/enums.js";
import { DEFAULT_NORMALIZATION_CONFIG } from "../config/normalization/defaults.js";
import { silentLogger, type Logger } from "../logging/logger.js";

/**
 * Error thrown by loadSubstancesOrThrow.
 */
export class SubstanceLoadError extends Error {
  public readonly issues: LoadIssue[];

  constructor(message: string, issues: LoadIssue[]) {
    super(message);
    this.name = "SubstanceLoadError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Substance loading failed:"];
    for (const issue of this.issues) {
      lines.push(`  - ${issueLocation(issue)} ${issue.field}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

export type LoadIssueType =
  | "schema"
  | "construction"
  | "duplicate"
  | "slug_collision"
  | "slug_fallback"
  | "schedule_conflict";

/**
 * One problem found while loading.
 */
export interface LoadIssue {
  /** Position of the raw row, when the issue belongs to one */
  index?: number;
  /** Slug of the affected record, when one was built */
  slug?: string;
  field: string;
  message: string;
  type: LoadIssueType;
  severity: "error" | "warning";
}

export interface LoadSubstancesOptions {
  /** Overrides config.collisionMode */
  collisionMode?: CollisionMode;
  logger?: Logger;
}

export interface LoadStats {
  totalRows: number;
  constructed: number;
  skipped: number;
  duplicates: number;
  slugCollisions: number;
  fallbackSlugs: number;
  scheduleConflicts: number;
  loaded: number;
}

export interface SubstanceLoadResult {
  success: boolean;
  records: SubstanceRecord[];
  errors: LoadIssue[];
  warnings: LoadIssue[];
  stats: LoadStats;
}

const RowsSchema = z.array(z.unknown());

const REVIEW_ISSUE_TYPES: Record<Exclude<RecordIssueCode, "SLUG_COLLISION">, LoadIssueType> = {
  SLUG_FALLBACK: "slug_fallback",
  SCHEDULE_CONFLICT: "schedule_conflict",
};

function issueLocation(issue: LoadIssue): string {
  if (issue.slug !== undefined) return `[${issue.slug}]`;
  if (issue.index !== undefined) return `[row ${issue.index}]`;
  return "[rows]";
}

function emptyStats(totalRows: number): LoadStats {
  return {
    totalRows,
    constructed: 0,
    skipped: 0,
    duplicates: 0,
    slugCollisions: 0,
    fallbackSlugs: 0,
    scheduleConflicts: 0,
    loaded: 0,
  };
}

/**
 * Load records from raw rows.
 *
 * @example
 *   const result = loadSubstances(rows, config, { logger });
 *   if (!result.success) console.error(formatLoadReport(result));
 */
export function loadSubstances(
  input: unknown,
  config: Readonly<NormalizationConfig> = DEFAULT_NORMALIZATION_CONFIG,
  options: LoadSubstancesOptions = {}
): SubstanceLoadResult {
  const collisionMode = options.collisionMode ?? config.collisionMode;
  const logger = options.logger ?? silentLogger;
  const failureSeverity = collisionMode === "strict" ? "error" : "warning";

  const rowsResult = RowsSchema.safeParse(input);
  if (!rowsResult.success) {
    return {
      success: false,
      records: [],
      errors: [
        {
          field: "(root)",
          message: "Expected an array of raw rows",
          type: "schema",
          severity: "error",
        },
      ],
      warnings: [],
      stats: emptyStats(0),
    };
  }

  const rows = rowsResult.data;
  const stats = emptyStats(rows.length);
  const errors: LoadIssue[] = [];
  const warnings: LoadIssue[] = [];

  // 1. Construction
  const constructed: SubstanceRecord[] = [];
  const rowIndex = new Map<SubstanceRecord, number>();
  rows.forEach((row, index) => {
    try {
      const record = SubstanceRecord.fromRaw(row, { config });
      constructed.push(record);
      rowIndex.set(record, index);
    } catch (error) {
      if (!(error instanceof ConstructionError)) {
        throw error;
      }
      stats.skipped++;
      errors.push({ index, field: error.field, message: error.message, type: "construction", severity: "error" });
      logger.warn("Skipping row", { index, reason: error.message });
    }
  });
  stats.constructed = constructed.length;

  // 2. Content duplicates
  const unique = deduplicate(constructed);
  const kept = new Set(unique);
  for (const record of constructed) {
    if (!kept.has(record)) {
      stats.duplicates++;
      warnings.push({
        index: rowIndex.get(record),
        slug: record.slug,
        field: "(record)",
        message: `Duplicate of an earlier row for "${record.name}"; dropped`,
        type: "duplicate",
        severity: "warning",
      });
    }
  }

  // 3. Slug uniqueness
  const bySlug = new Map<string, SubstanceRecord>();
  const records: SubstanceRecord[] = [];
  for (const record of unique) {
    const first = bySlug.get(record.slug);
    if (first === undefined) {
      bySlug.set(record.slug, record);
      records.push(record);
      continue;
    }

    stats.slugCollisions++;
    const message = `Slug "${record.slug}" of "${record.name}" is already used by "${first.name}"`;
    first.flag({ code: "SLUG_COLLISION", field: "slug", message });
    record.flag({ code: "SLUG_COLLISION", field: "slug", message });
    const issue: LoadIssue = {
      index: rowIndex.get(record),
      slug: record.slug,
      field: "slug",
      message: collisionMode === "strict" ? message : `${message}; later record dropped`,
      type: "slug_collision",
      severity: failureSeverity,
    };
    (collisionMode === "strict" ? errors : warnings).push(issue);
    logger.warn("Slug collision", { slug: record.slug, kept: first.name, dropped: record.name });
  }

  // 4. Construction-time review issues
  for (const record of records) {
    for (const issue of record.reviewIssues) {
      if (issue.code === "SLUG_COLLISION") continue;
      const type = REVIEW_ISSUE_TYPES[issue.code];
      if (type === "slug_fallback") stats.fallbackSlugs++;
      if (type === "schedule_conflict") stats.scheduleConflicts++;
      warnings.push({
        index: rowIndex.get(record),
        slug: record.slug,
        field: issue.field,
        message: issue.message,
        type,
        severity: "warning",
      });
    }
  }

  stats.loaded = records.length;
  const success = collisionMode === "lenient" || errors.length === 0;

  logger.info("Loaded substances", { ...stats, collisionMode });

  return { success, records, errors, warnings, stats };
}

/**
 * Load records, throwing when the load fails.
 *
 * @throws SubstanceLoadError
 */
export function loadSubstancesOrThrow(
  input: unknown,
  config: Readonly<NormalizationConfig> = DEFAULT_NORMALIZATION_CONFIG,
  options: LoadSubstancesOptions = {}
): SubstanceRecord[] {
  const result = loadSubstances(input, config, options);

  if (!result.success) {
    throw new SubstanceLoadError(
      `Substance loading failed: ${result.errors.length} error(s)`,
      result.errors
    );
  }

  return result.records;
}

/**
 * Format a detailed load report.
 */
export function formatLoadReport(result: SubstanceLoadResult): string {
  const lines: string[] = [];

  lines.push("═══════════════════════════════════════════════════════════════");
  lines.push(" Substance Load Report");
  lines.push("═══════════════════════════════════════════════════════════════");

  lines.push("");
  lines.push(`Rows:               ${result.stats.totalRows}`);
  lines.push(`Constructed:        ${result.stats.constructed}`);
  lines.push(`Skipped:            ${result.stats.skipped}`);
  lines.push(`Duplicates:         ${result.stats.duplicates}`);
  lines.push(`Slug Collisions:    ${result.stats.slugCollisions}`);
  lines.push(`Fallback Slugs:     ${result.stats.fallbackSlugs}`);
  lines.push(`Schedule Conflicts: ${result.stats.scheduleConflicts}`);
  lines.push(`Loaded:             ${result.stats.loaded}`);

  if (result.errors.length > 0) {
    lines.push("");
    lines.push("───────────────────────────────────────────────────────────────");
    lines.push(" ERRORS");
    lines.push("───────────────────────────────────────────────────────────────");
    for (const issue of result.errors) {
      lines.push(`  ✗ ${issueLocation(issue)} ${issue.field}: ${issue.message}`);
    }
  }

  if (result.warnings.length > 0) {
    lines.push("");
    lines.push("───────────────────────────────────────────────────────────────");
    lines.push(" WARNINGS");
    lines.push("───────────────────────────────────────────────────────────────");
    for (const issue of result.warnings) {
      lines.push(`  ⚠ ${issueLocation(issue)} ${issue.field}: ${issue.message}`);
    }
  }

  lines.push("");
  lines.push(result.success ? "Result: OK" : "Result: FAILED");

  return lines.join("\n");
}
