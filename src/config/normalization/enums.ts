/**
 * Enumerations shared by the normalization configuration and the record model.
 */

import { z } from "zod";

/**
 * Logical record fields that are read from raw source columns.
 * Each one maps to a list of column aliases in NormalizationConfig.columns.
 */
export const SourceField = z.enum([
  "name",
  "otherNames",
  "classifications",
  "reasons",
  "reason",
  "warnings",
  "references",
  "moreInfoUrl",
  "added",
  "updated",
  "guid",
  "sourceOf",
  "labelTerms",
  "linkedIngredients",
]);
export type SourceField = z.infer<typeof SourceField>;

/**
 * Record fields compared when diffing two snapshots.
 * Derived values (deaSchedule, isSteroid) are included so a reworded reason
 * that changes the schedule shows up as a change to both.
 */
export const ComparableField = z.enum([
  "name",
  "otherNames",
  "classifications",
  "reasons",
  "warnings",
  "references",
  "deaSchedule",
  "isSteroid",
  "moreInfoUrl",
  "added",
  "updated",
  "guid",
  "sourceOf",
  "labelTerms",
  "linkedIngredients",
]);
export type ComparableField = z.infer<typeof ComparableField>;

/**
 * How the loader treats two records that produce the same slug.
 *
 * "lenient" → keep the first record, report the later one as a warning
 * "strict"  → report an error and fail the load
 */
export const CollisionMode = z.enum(["lenient", "strict"]);
export type CollisionMode = z.infer<typeof CollisionMode>;
