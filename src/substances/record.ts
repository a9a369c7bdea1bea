/**
 * Substance record: the canonical entity.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * CONSTRUCTION
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * A record is built once per raw row. Every field is computed eagerly in
 * `fromRaw` and stored frozen; nothing is recomputed afterwards.
 *
 * Only a missing name fails construction. Every other column degrades to
 * empty or undefined, and data-quality problems that need a human look are
 * attached as review issues instead of being thrown:
 *
 *   SLUG_FALLBACK      name has no URL-safe characters
 *   SCHEDULE_CONFLICT  reasons/classifications mention several schedules
 *   SLUG_COLLISION     (added by the loader) slug already taken
 *
 * The one permitted mutation after construction is `attachUniiInfo`, which
 * the enrichment adapter calls at most once.
 */

import { createHash } from "node:crypto";
import {
  RawRowSchema,
  type DeaSchedule,
  type ExportUniiInfo,
  type RawRow,
  type Reason,
  type RecordIssue,
  type SubstanceExport,
  type UniiInfo,
} from "./schema.js";
import { ingestRawValue } from "./raw-value.js";
import {
  dedupeCaseInsensitive,
  normalizeDate,
  normalizeListField,
  normalizeReasons,
  normalizeReferences,
  normalizeScalarField,
  normalizeUrl,
  PROSE_DELIMITERS,
  type TextOptions,
} from "./normalize.js";
import { extractIsSteroid, findScheduleMentions } from "./classification.js";
import { slugify, toSearchableName } from "./text.js";
import { DEFAULT_NORMALIZATION_CONFIG } from "../config/normalization/defaults.js";
import type { ColumnAliases, NormalizationConfig } from "../config/normalization/schema.js";
import type { ComparableField, SourceField } from "../config/normalization/enums.js";
import { deepFreeze } from "../config/normalization/loader.js";

/**
 * A row could not become a record. The caller skips the row and logs it.
 */
export class ConstructionError extends Error {
  public readonly row: unknown;
  public readonly field: string;

  constructor(message: string, row: unknown, field = "name") {
    super(message);
    this.name = "ConstructionError";
    this.row = row;
    this.field = field;
  }
}

/**
 * An operation that the record's current state does not allow.
 */
export class RecordStateError extends Error {
  public readonly slug: string;

  constructor(message: string, slug: string) {
    super(message);
    this.name = "RecordStateError";
    this.slug = slug;
  }
}

export interface SubstanceRecordOptions {
  /** Column aliases and slug prefix; defaults to DEFAULT_NORMALIZATION_CONFIG */
  config?: Readonly<NormalizationConfig>;
  /** Whether column values may carry HTML; false when reloading an export */
  markup?: boolean;
}

/**
 * The fields two snapshots are compared on.
 */
export type ComparableRecord = { readonly [K in ComparableField]: SubstanceRecord[K] };

// ═══════════════════════════════════════════════════════════════════════════
// COLUMN LOOKUP
// ═══════════════════════════════════════════════════════════════════════════

type ColumnReader = (field: SourceField) => unknown;

/**
 * Index a row by trimmed, lower-cased column name. The first spelling wins.
 */
function indexColumns(row: RawRow): ReadonlyMap<string, unknown> {
  const byKey = new Map<string, unknown>();
  for (const [key, value] of Object.entries(row)) {
    const normalized = key.trim().toLowerCase();
    if (!byKey.has(normalized)) {
      byKey.set(normalized, value);
    }
  }
  return byKey;
}

/**
 * Resolve logical fields to raw values through case-insensitive aliases.
 * The first alias holding a non-empty value wins.
 */
function createColumnReader(
  byKey: ReadonlyMap<string, unknown>,
  columns: Readonly<ColumnAliases>
): ColumnReader {
  return (field) => {
    for (const alias of columns[field]) {
      const value = byKey.get(alias.toLowerCase());
      if (ingestRawValue(value).kind !== "absent") {
        return value;
      }
    }
    return undefined;
  };
}

/**
 * A name column can hold only markup; fall through to the next alias then.
 */
function readName(
  byKey: ReadonlyMap<string, unknown>,
  aliases: readonly string[],
  text: TextOptions
): string | undefined {
  for (const alias of aliases) {
    const name = normalizeScalarField(byKey.get(alias.toLowerCase()), text);
    if (name !== undefined) return name;
  }
  return undefined;
}

function fallbackSlug(prefix: string, name: string): string {
  return `${prefix}-${createHash("sha1").update(name).digest("hex").slice(0, 10)}`;
}

// ═══════════════════════════════════════════════════════════════════════════
// RECORD
// ═══════════════════════════════════════════════════════════════════════════

interface SubstanceFields {
  name: string;
  otherNames: readonly string[];
  classifications: readonly string[];
  reasons: readonly Readonly<Reason>[];
  warnings: readonly string[];
  references: readonly string[];
  deaSchedule: DeaSchedule | undefined;
  isSteroid: boolean;
  moreInfoUrl: string | undefined;
  added: string | undefined;
  updated: string | undefined;
  slug: string;
  searchableName: string;
  guid: string | undefined;
  sourceOf: string | undefined;
  labelTerms: readonly string[];
  linkedIngredients: readonly string[];
  issues: RecordIssue[];
}

/**
 * Canonical substance record.
 *
 * @example
 *   const record = SubstanceRecord.fromRaw({
 *     Name: "Testosterone",
 *     Classifications: '["Anabolic Steroid"]',
 *     Reasons: "This substance is a Schedule III controlled substance",
 *   });
 *   record.slug        // "testosterone"
 *   record.deaSchedule // "III"
 *   record.isSteroid   // true
 */
export class SubstanceRecord {
  readonly name: string;
  readonly otherNames: readonly string[];
  readonly classifications: readonly string[];
  readonly reasons: readonly Readonly<Reason>[];
  readonly warnings: readonly string[];
  readonly references: readonly string[];
  readonly deaSchedule: DeaSchedule | undefined;
  readonly isSteroid: boolean;
  readonly moreInfoUrl: string | undefined;
  readonly added: string | undefined;
  readonly updated: string | undefined;
  readonly slug: string;
  readonly searchableName: string;
  readonly guid: string | undefined;
  readonly sourceOf: string | undefined;
  readonly labelTerms: readonly string[];
  readonly linkedIngredients: readonly string[];

  private readonly _issues: RecordIssue[];
  private _uniiInfo: Readonly<UniiInfo> | undefined;

  private constructor(fields: SubstanceFields) {
    this.name = fields.name;
    this.otherNames = Object.freeze([...fields.otherNames]);
    this.classifications = Object.freeze([...fields.classifications]);
    this.reasons = Object.freeze(fields.reasons.map((reason) => Object.freeze({ ...reason })));
    this.warnings = Object.freeze([...fields.warnings]);
    this.references = Object.freeze([...fields.references]);
    this.deaSchedule = fields.deaSchedule;
    this.isSteroid = fields.isSteroid;
    this.moreInfoUrl = fields.moreInfoUrl;
    this.added = fields.added;
    this.updated = fields.updated;
    this.slug = fields.slug;
    this.searchableName = fields.searchableName;
    this.guid = fields.guid;
    this.sourceOf = fields.sourceOf;
    this.labelTerms = Object.freeze([...fields.labelTerms]);
    this.linkedIngredients = Object.freeze([...fields.linkedIngredients]);
    this._issues = fields.issues;
    this._uniiInfo = undefined;
  }

  /**
   * Build a record from one raw source row.
   *
   * @throws ConstructionError when the row is not an object or has no name
   */
  static fromRaw(row: unknown, options: SubstanceRecordOptions = {}): SubstanceRecord {
    const parsed = RawRowSchema.safeParse(row);
    if (!parsed.success) {
      throw new ConstructionError("Raw row must be an object of column values", row, "(root)");
    }

    const config = options.config ?? DEFAULT_NORMALIZATION_CONFIG;
    const byKey = indexColumns(parsed.data);
    const read = createColumnReader(byKey, config.columns);
    const text: TextOptions = { markup: options.markup ?? true };

    const name = readName(byKey, config.columns.name, text);
    if (name === undefined) {
      throw new ConstructionError(
        `Row has no name in any of the columns: ${config.columns.name.join(", ")}`,
        row
      );
    }

    const issues: RecordIssue[] = [];

    let reasons = normalizeReasons(read("reasons"), text);
    if (reasons.length === 0) {
      reasons = normalizeReasons(read("reason"), text);
    }
    const classifications = normalizeListField(read("classifications"), text);

    const schedules = findScheduleMentions(
      reasons.map((reason) => reason.text),
      classifications
    );
    if (schedules.length > 1) {
      issues.push({
        code: "SCHEDULE_CONFLICT",
        field: "deaSchedule",
        message: `Mentions schedules ${schedules.join(", ")}; using ${schedules[0]}`,
      });
    }

    let slug = slugify(name);
    if (slug === undefined) {
      slug = fallbackSlug(config.slugFallbackPrefix, name);
      issues.push({
        code: "SLUG_FALLBACK",
        field: "slug",
        message: `Name "${name}" has no URL-safe characters; using "${slug}"`,
      });
    }

    return new SubstanceRecord({
      name,
      otherNames: dedupeCaseInsensitive(normalizeListField(read("otherNames"), text)),
      classifications,
      reasons,
      warnings: normalizeListField(read("warnings"), { ...text, delimiters: PROSE_DELIMITERS }),
      references: normalizeReferences(read("references"), text),
      deaSchedule: schedules[0],
      isSteroid: extractIsSteroid(classifications),
      moreInfoUrl: normalizeUrl(read("moreInfoUrl"), text),
      added: normalizeDate(read("added")),
      updated: normalizeDate(read("updated")),
      slug,
      searchableName: toSearchableName(name),
      guid: normalizeScalarField(read("guid"), text),
      sourceOf: normalizeScalarField(read("sourceOf"), text),
      labelTerms: normalizeListField(read("labelTerms"), text),
      linkedIngredients: normalizeListField(read("linkedIngredients"), text),
      issues,
    });
  }

  // ============================================================
  // Enrichment
  // ============================================================

  get uniiInfo(): Readonly<UniiInfo> | undefined {
    return this._uniiInfo;
  }

  get isEnriched(): boolean {
    return this._uniiInfo !== undefined;
  }

  /**
   * Attach UNII information. Allowed once per record.
   *
   * @throws RecordStateError if the record is already enriched
   */
  attachUniiInfo(info: UniiInfo): void {
    if (this._uniiInfo !== undefined) {
      throw new RecordStateError(
        `Record "${this.slug}" already carries UNII ${this._uniiInfo.uniiCode}`,
        this.slug
      );
    }
    this._uniiInfo = deepFreeze({ ...info, links: { ...info.links } });
  }

  // ============================================================
  // Review issues
  // ============================================================

  get reviewIssues(): readonly RecordIssue[] {
    return Object.freeze([...this._issues]);
  }

  /**
   * Attach a review issue found outside construction (e.g. a slug collision
   * within a collection). Repeating the same issue is a no-op.
   */
  flag(issue: RecordIssue): void {
    const exists = this._issues.some(
      (existing) => existing.code === issue.code && existing.message === issue.message
    );
    if (!exists) {
      this._issues.push({ ...issue });
    }
  }

  // ============================================================
  // Views
  // ============================================================

  comparable(): ComparableRecord {
    return {
      name: this.name,
      otherNames: this.otherNames,
      classifications: this.classifications,
      reasons: this.reasons,
      warnings: this.warnings,
      references: this.references,
      deaSchedule: this.deaSchedule,
      isSteroid: this.isSteroid,
      moreInfoUrl: this.moreInfoUrl,
      added: this.added,
      updated: this.updated,
      guid: this.guid,
      sourceOf: this.sourceOf,
      labelTerms: this.labelTerms,
      linkedIngredients: this.linkedIngredients,
    };
  }

  /**
   * Export shape: snake_case keys, null for absent values.
   */
  toJSON(): SubstanceExport {
    return {
      name: this.name,
      other_names: [...this.otherNames],
      classifications: [...this.classifications],
      reasons: this.reasons.map((reason) => ({ text: reason.text, link: reason.link ?? null })),
      warnings: [...this.warnings],
      references: [...this.references],
      dea_schedule: this.deaSchedule ?? null,
      is_steroid: this.isSteroid,
      more_info_url: this.moreInfoUrl ?? null,
      added: this.added ?? null,
      updated: this.updated ?? null,
      slug: this.slug,
      searchable_name: this.searchableName,
      guid: this.guid ?? null,
      source_of: this.sourceOf ?? null,
      label_terms: [...this.labelTerms],
      linked_ingredients: [...this.linkedIngredients],
      unii_info: this._uniiInfo === undefined ? null : uniiInfoToExport(this._uniiInfo),
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// UNII INFO CONVERSION
// ═══════════════════════════════════════════════════════════════════════════

export function uniiInfoToExport(info: Readonly<UniiInfo>): ExportUniiInfo {
  return {
    unii_code: info.uniiCode,
    preferred_term: info.preferredTerm ?? null,
    resource_url: info.resourceUrl,
    cas_rn: info.casRn ?? null,
    pubchem_cid: info.pubchemCid ?? null,
    substance_type: info.substanceType ?? null,
    comptox_id: info.comptoxId ?? null,
    links: {
      gsrs: info.links.gsrs,
      ncats: info.links.ncats,
      common_chemistry: info.links.commonChemistry ?? null,
      pubchem: info.links.pubchem ?? null,
      comptox: info.links.comptox ?? null,
    },
  };
}

function present<K extends string, V>(key: K, value: V | null): { [P in K]?: V } {
  const entry: { [P in K]?: V } = {};
  if (value !== null) {
    entry[key] = value;
  }
  return entry;
}

export function uniiInfoFromExport(exported: ExportUniiInfo): UniiInfo {
  const { links } = exported;
  return {
    uniiCode: exported.unii_code,
    resourceUrl: exported.resource_url,
    ...present("preferredTerm", exported.preferred_term),
    ...present("casRn", exported.cas_rn),
    ...present("pubchemCid", exported.pubchem_cid),
    ...present("substanceType", exported.substance_type),
    ...present("comptoxId", exported.comptox_id),
    links: {
      gsrs: links.gsrs,
      ncats: links.ncats,
      ...present("commonChemistry", links.common_chemistry),
      ...present("pubchem", links.pubchem),
      ...present("comptox", links.comptox),
    },
  };
}
