/**
 * Normalization configuration schema.
 *
 * The configuration is validated once per run and frozen. Column aliases
 * decide which raw columns feed which record field, so changing them between
 * two snapshots would make a diff report spurious changes.
 */

import { z } from "zod";
import { CollisionMode, ComparableField } from "./enums.js";

/**
 * Ordered aliases for one source field.
 * Matched case-insensitively; the first alias with a non-empty value wins.
 */
const Aliases = z.array(z.string().min(1)).min(1);

/**
 * Column aliases for every source field.
 */
export const ColumnAliasesSchema = z
  .object({
    name: Aliases,
    otherNames: Aliases,
    classifications: Aliases,
    reasons: Aliases,
    reason: Aliases,
    warnings: Aliases,
    references: Aliases,
    moreInfoUrl: Aliases,
    added: Aliases,
    updated: Aliases,
    guid: Aliases,
    sourceOf: Aliases,
    labelTerms: Aliases,
    linkedIngredients: Aliases,
  })
  .strict();

export type ColumnAliases = z.infer<typeof ColumnAliasesSchema>;

export const NormalizationConfigSchema = z
  .object({
    /** Raw column aliases per record field */
    columns: ColumnAliasesSchema.describe("Raw column aliases per record field"),

    /** Slug collision policy for the loader */
    collisionMode: CollisionMode.describe("How duplicate slugs are treated when loading"),

    /** Fields left out when comparing snapshots */
    diffIgnoreFields: z
      .array(ComparableField)
      .describe("Record fields ignored when diffing two snapshots"),

    /** Prefix for hash-derived slugs of names with no alphanumerics */
    slugFallbackPrefix: z
      .string()
      .regex(/^[a-z0-9]+(?:-[a-z0-9]+)*$/, "Slug prefix must itself be a valid slug")
      .describe("Prefix for hash-derived fallback slugs"),

    /** Configuration schema version for migration support */
    configSchemaVersion: z
      .string()
      .regex(/^\d+\.\d+\.\d+$/)
      .describe("Semantic version of this configuration schema"),
  })
  .strict();

export type NormalizationConfig = z.infer<typeof NormalizationConfigSchema>;
