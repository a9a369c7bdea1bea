/**
 * Substance record model: raw value ingestion, field normalization,
 * classification, records, collections, diffing and loading.
 *
 * Usage:
 *   import { loadSubstances, sortRecords, SubstanceCollection } from "./substances/index.js";
 *
 *   const result = loadSubstances(rows, config, { logger });
 *   const collection = SubstanceCollection.create(sortRecords(result.records));
 */

// Schema & types
export {
  RawRowSchema,
  DeaSchedule,
  HttpUrlSchema,
  ReasonSchema,
  UniiLinksSchema,
  UniiInfoSchema,
  RecordIssueCode,
  ExportReasonSchema,
  ExportUniiInfoSchema,
  SubstanceExportSchema,
  SubstanceExportCollectionSchema,
  type RawRow,
  type Reason,
  type UniiLinks,
  type UniiInfo,
  type RecordIssue,
  type ExportUniiInfo,
  type SubstanceExport,
} from "./schema.js";

// Raw values
export { ingestRawValue, parseJson, isPlainRecord, ABSENT, type RawValue, type RawValueKind } from "./raw-value.js";

// Text
export {
  stripHtml,
  firstAnchorHref,
  collapseWhitespace,
  foldDiacritics,
  slugify,
  toSearchableName,
  stableStringify,
} from "./text.js";

// Normalizers
export {
  normalizeListField,
  normalizeScalarField,
  normalizeDate,
  normalizeReasons,
  normalizeReferences,
  normalizeUrl,
  splitDelimited,
  parseQuotedList,
  dedupeCaseInsensitive,
  toHttpUrl,
  LIST_DELIMITERS,
  PROSE_DELIMITERS,
  type ListFieldOptions,
  type TextOptions,
} from "./normalize.js";

// Classification
export { extractDeaSchedule, extractIsSteroid, findScheduleMentions, STEROID_KEYWORDS } from "./classification.js";

// Record
export {
  SubstanceRecord,
  ConstructionError,
  RecordStateError,
  uniiInfoToExport,
  uniiInfoFromExport,
  type SubstanceRecordOptions,
  type ComparableRecord,
} from "./record.js";

// Collections
export {
  deduplicate,
  dedupeKey,
  sortRecords,
  findSlugCollisions,
  isSortKey,
  SubstanceCollection,
  CollectionError,
  SORT_KEYS,
  type SortKey,
  type SlugCollision,
  type SubstanceFilter,
  type CollectionStats,
} from "./collection.js";

// Diff
export {
  diffCollections,
  changedFields,
  isEmptyDiff,
  formatDiffSummary,
  type DiffOptions,
  type ChangedRecord,
  type CollectionDiff,
} from "./diff.js";

// Loader
export {
  loadSubstances,
  loadSubstancesOrThrow,
  formatLoadReport,
  SubstanceLoadError,
  type LoadIssue,
  type LoadIssueType,
  type LoadStats,
  type LoadSubstancesOptions,
  type SubstanceLoadResult,
} from "./loader.js";
