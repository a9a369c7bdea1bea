/**
 * Substance schema and type definitions.
 *
 * Two shapes live here:
 *
 *   RawRow          one row as the source delivers it. Nothing is assumed
 *                   about how any column is encoded.
 *   SubstanceExport one substance as the JSON export writes it. Keys are
 *                   snake_case, dates are ISO strings, absent scalars are
 *                   null. An export entry is itself a valid RawRow, so a
 *                   previous export can be reloaded for diffing.
 *
 * The in-memory record (SubstanceRecord) is built from the first and
 * serializes to the second.
 */

import { z } from "zod";

/**
 * One raw source row: column name → value of unknown encoding.
 */
export const RawRowSchema = z.record(z.string(), z.unknown());
export type RawRow = Readonly<Record<string, unknown>>;

/**
 * DEA controlled-substance schedules, I (most restrictive) through V.
 */
export const DeaSchedule = z.enum(["I", "II", "III", "IV", "V"]);
export type DeaSchedule = z.infer<typeof DeaSchedule>;

/**
 * Absolute http(s) URL.
 */
export const HttpUrlSchema = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), "URL must use http or https");

/**
 * A reason for prohibition, with an optional source link.
 */
export const ReasonSchema = z.object({
  text: z.string().min(1),
  link: HttpUrlSchema.optional(),
});
export type Reason = z.infer<typeof ReasonSchema>;

/**
 * External resource links derived from a UNII record.
 */
export const UniiLinksSchema = z.object({
  gsrs: HttpUrlSchema,
  ncats: HttpUrlSchema,
  commonChemistry: HttpUrlSchema.optional(),
  pubchem: HttpUrlSchema.optional(),
  comptox: HttpUrlSchema.optional(),
});
export type UniiLinks = z.infer<typeof UniiLinksSchema>;

/**
 * UNII enrichment attached to one record.
 */
export const UniiInfoSchema = z.object({
  uniiCode: z.string().min(1),
  preferredTerm: z.string().min(1).optional(),
  resourceUrl: HttpUrlSchema,
  casRn: z.string().min(1).optional(),
  pubchemCid: z.number().int().positive().optional(),
  substanceType: z.string().min(1).optional(),
  comptoxId: z.string().min(1).optional(),
  links: UniiLinksSchema,
});
export type UniiInfo = z.infer<typeof UniiInfoSchema>;

/**
 * Data-quality flags raised on a record. None of them blocks generation.
 */
export const RecordIssueCode = z.enum([
  "SLUG_FALLBACK", // name has no alphanumerics; slug is hash-derived
  "SLUG_COLLISION", // another record in the same snapshot has this slug
  "SCHEDULE_CONFLICT", // more than one DEA schedule is mentioned
]);
export type RecordIssueCode = z.infer<typeof RecordIssueCode>;

export interface RecordIssue {
  code: RecordIssueCode;
  field: string;
  message: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// JSON EXPORT
// ═══════════════════════════════════════════════════════════════════════════

const IsoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected an ISO date (YYYY-MM-DD)");

export const ExportReasonSchema = z.object({
  text: z.string().min(1),
  link: HttpUrlSchema.nullable(),
});

export const ExportUniiInfoSchema = z.object({
  unii_code: z.string().min(1),
  preferred_term: z.string().nullable(),
  resource_url: HttpUrlSchema,
  cas_rn: z.string().nullable(),
  pubchem_cid: z.number().int().positive().nullable(),
  substance_type: z.string().nullable(),
  comptox_id: z.string().nullable(),
  links: z.object({
    gsrs: HttpUrlSchema,
    ncats: HttpUrlSchema,
    common_chemistry: HttpUrlSchema.nullable(),
    pubchem: HttpUrlSchema.nullable(),
    comptox: HttpUrlSchema.nullable(),
  }),
});
export type ExportUniiInfo = z.infer<typeof ExportUniiInfoSchema>;

export const SubstanceExportSchema = z.object({
  name: z.string().min(1),
  other_names: z.array(z.string()),
  classifications: z.array(z.string()),
  reasons: z.array(ExportReasonSchema),
  warnings: z.array(z.string()),
  references: z.array(z.string()),
  dea_schedule: DeaSchedule.nullable(),
  is_steroid: z.boolean(),
  more_info_url: HttpUrlSchema.nullable(),
  added: IsoDate.nullable(),
  updated: IsoDate.nullable(),
  slug: z.string().regex(/^[a-z0-9]+(?:-[a-z0-9]+)*$/),
  searchable_name: z.string(),
  guid: z.string().nullable(),
  source_of: z.string().nullable(),
  label_terms: z.array(z.string()),
  linked_ingredients: z.array(z.string()),
  unii_info: ExportUniiInfoSchema.nullable(),
});
export type SubstanceExport = z.infer<typeof SubstanceExportSchema>;

export const SubstanceExportCollectionSchema = z.array(SubstanceExportSchema);
