/**
 * Default normalization configuration.
 *
 * The aliases cover the capitalized column names the source list uses today,
 * the lower-case variants it has used before, and the snake_case keys of our
 * own JSON export, so a previous export can be read back as raw rows.
 */

import type { NormalizationConfig } from "./schema.js";

export const DEFAULT_NORMALIZATION_CONFIG: NormalizationConfig = {
  columns: {
    name: ["Name", "ingredient", "substance", "title"],
    otherNames: ["Other_names", "other_names", "otherNames"],
    classifications: ["Classifications"],
    reasons: ["Reasons"],
    reason: ["Reason"],
    warnings: ["Warnings"],
    references: ["References"],
    moreInfoUrl: ["More_info_url", "more_info_url", "moreInfoUrl"],
    added: ["added", "date_added", "created"],
    updated: ["updated", "last_updated", "modified_date"],
    guid: ["Guid"],
    sourceOf: ["Sourceof", "source_of"],
    labelTerms: ["Label_terms"],
    linkedIngredients: ["Linked_ingredients"],
  },

  collisionMode: "lenient",

  diffIgnoreFields: [],

  slugFallbackPrefix: "substance",

  configSchemaVersion: "1.0.0",
};
