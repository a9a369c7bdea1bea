/**
 * UNII enrichment: candidate schema, selection, adapter and table lookup.
 */

export { UniiCandidateSchema, type UniiCandidate, type UniiLookup } from "./schema.js";
export { jaroWinkler } from "./similarity.js";
export {
  enrichRecord,
  enrichCollection,
  selectCandidate,
  buildUniiInfo,
  memoizeLookup,
  findSharedUniiCodes,
  type EnrichmentOutcome,
  type EnrichmentStatus,
  type EnrichmentSummary,
  type EnrichCollectionOptions,
  type ScoredCandidate,
  type SharedUniiCode,
} from "./adapter.js";
export { parseUniiRecords, createUniiTableLookup, UniiTableError, type UniiTableRow } from "./unii-table.js";
