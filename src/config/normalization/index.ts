/**
 * Normalization configuration module.
 *
 * Usage:
 *   import { loadNormalizationConfig } from "./config/normalization/index.js";
 *
 *   // Defaults
 *   const config = loadNormalizationConfig();
 *
 *   // Override one alias list and the collision policy
 *   const strict = loadNormalizationConfig({
 *     collisionMode: "strict",
 *     columns: { name: ["Substance Name"] },
 *   });
 */

export { SourceField, ComparableField, CollisionMode } from "./enums.js";

export type { NormalizationConfig, ColumnAliases } from "./schema.js";
export { NormalizationConfigSchema, ColumnAliasesSchema } from "./schema.js";

export {
  loadNormalizationConfig,
  validateNormalizationConfig,
  deepFreeze,
  NormalizationConfigError,
  type ConfigValidationIssue,
} from "./loader.js";

export { DEFAULT_NORMALIZATION_CONFIG } from "./defaults.js";
