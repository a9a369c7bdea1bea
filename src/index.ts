/**
 * Prohibited substances dataset: normalization, enrichment and export.
 *
 * Usage:
 *   import {
 *     extractRowsFromSettings,
 *     loadSubstances,
 *     enrichCollection,
 *     sortRecords,
 *     serializeExport,
 *   } from "prohibited-substances";
 *
 *   const { records } = loadSubstances(extractRowsFromSettings(settings));
 *   enrichCollection(records, lookup);
 *   const json = serializeExport(sortRecords(records));
 */

export * from "./substances/index.js";
export * from "./enrichment/index.js";
export * from "./sources/index.js";
export * from "./export/index.js";
export {
  config,
  loadConfig,
  validateConfig,
  ConfigError,
  loadNormalizationConfig,
  validateNormalizationConfig,
  NormalizationConfigError,
  DEFAULT_NORMALIZATION_CONFIG,
  SourceField,
  ComparableField,
  CollisionMode,
  type AppConfig,
  type NormalizationConfig,
  type ColumnAliases,
  type ConfigValidationIssue,
} from "./config/index.js";
export {
  createLogger,
  silentLogger,
  initRunId,
  getRunId,
  type Logger,
  type LogLevel,
  type LoggerOptions,
} from "./logging/index.js";
