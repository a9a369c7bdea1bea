/**
 * Enrichment adapter.
 *
 * Attaches UNII information to records through an injected lookup. The
 * adapter keeps no state between records: caching, retries and transport
 * belong to whoever builds the lookup (see memoizeLookup for a per-run
 * cache).
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * CANDIDATE SELECTION
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Each valid candidate is scored by Jaro-Winkler similarity between the
 * searchable form of its preferred term (display name when it has none) and
 * the record's searchable name. The highest score wins; ties go to the
 * shorter UNII code, then the lexicographically smaller one.
 *
 * A lookup that throws, returns nothing usable or returns only invalid
 * candidates leaves the record untouched. The outcome says which.
 */

import type { SubstanceRecord } from "../substances/record.js";
import type { UniiInfo } from "../substances/schema.js";
import { toSearchableName } from "../substances/text.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import { UniiCandidateSchema, type UniiCandidate, type UniiLookup } from "./schema.js";
import { jaroWinkler } from "./similarity.js";

const UNII_SEARCH_URL = "https://precision.fda.gov/uniisearch/srs/unii/";
const GSRS_URL = "https://precision.fda.gov/ginas/app/ui/substances/";
const NCATS_URL = "https://drugs.ncats.io/substance/";
const COMMON_CHEMISTRY_URL = "https://commonchemistry.cas.org/detail?cas_rn=";
const PUBCHEM_URL = "https://pubchem.ncbi.nlm.nih.gov/compound/";
const COMPTOX_URL = "https://comptox.epa.gov/dashboard/chemical/details/";

export type EnrichmentOutcome =
  | { status: "matched"; slug: string; uniiCode: string; score: number; candidates: number }
  | { status: "no_candidates"; slug: string; invalidCandidates: number }
  | { status: "lookup_failed"; slug: string; error: string }
  | { status: "already_enriched"; slug: string; uniiCode: string };

export type EnrichmentStatus = EnrichmentOutcome["status"];

export interface ScoredCandidate {
  candidate: UniiCandidate;
  score: number;
}

function candidateTerm(candidate: UniiCandidate): string {
  return candidate.preferredTerm ?? candidate.displayName ?? "";
}

function compareCodes(a: string, b: string): number {
  if (a.length !== b.length) return a.length - b.length;
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Pick the best candidate for a searchable name, or undefined for none.
 */
export function selectCandidate(
  candidates: readonly UniiCandidate[],
  searchableName: string
): ScoredCandidate | undefined {
  let best: ScoredCandidate | undefined;
  for (const candidate of candidates) {
    const score = jaroWinkler(toSearchableName(candidateTerm(candidate)), searchableName);
    if (
      best === undefined ||
      score > best.score ||
      (score === best.score && compareCodes(candidate.unii, best.candidate.unii) < 0)
    ) {
      best = { candidate, score };
    }
  }
  return best;
}

/**
 * UNII info with derived resource links for one candidate.
 */
export function buildUniiInfo(candidate: UniiCandidate): UniiInfo {
  const code = encodeURIComponent(candidate.unii);
  const info: UniiInfo = {
    uniiCode: candidate.unii,
    resourceUrl: `${UNII_SEARCH_URL}${code}`,
    links: {
      gsrs: `${GSRS_URL}${code}`,
      ncats: `${NCATS_URL}${code}`,
    },
  };

  if (candidate.preferredTerm !== undefined) info.preferredTerm = candidate.preferredTerm;
  if (candidate.substanceType !== undefined) info.substanceType = candidate.substanceType;
  if (candidate.casRn !== undefined) {
    info.casRn = candidate.casRn;
    info.links.commonChemistry = `${COMMON_CHEMISTRY_URL}${encodeURIComponent(candidate.casRn)}`;
  }
  if (candidate.pubchemCid !== undefined) {
    info.pubchemCid = candidate.pubchemCid;
    info.links.pubchem = `${PUBCHEM_URL}${candidate.pubchemCid}`;
  }
  if (candidate.comptoxId !== undefined) {
    info.comptoxId = candidate.comptoxId;
    info.links.comptox = `${COMPTOX_URL}${encodeURIComponent(candidate.comptoxId)}`;
  }

  return info;
}

/**
 * Enrich one record. Calls the lookup once with the record name; never
 * throws for lookup or data problems.
 */
export function enrichRecord(record: SubstanceRecord, lookup: UniiLookup): EnrichmentOutcome {
  const existing = record.uniiInfo;
  if (existing !== undefined) {
    return { status: "already_enriched", slug: record.slug, uniiCode: existing.uniiCode };
  }

  let raw: readonly unknown[];
  try {
    raw = lookup(record.name);
  } catch (error) {
    return {
      status: "lookup_failed",
      slug: record.slug,
      error: error instanceof Error ? error.message : String(error),
    };
  }

  if (!Array.isArray(raw)) {
    return { status: "lookup_failed", slug: record.slug, error: "Lookup did not return a list" };
  }

  const candidates: UniiCandidate[] = [];
  for (const item of raw) {
    const parsed = UniiCandidateSchema.safeParse(item);
    if (parsed.success) candidates.push(parsed.data);
  }

  const best = selectCandidate(candidates, record.searchableName);
  if (best === undefined) {
    return { status: "no_candidates", slug: record.slug, invalidCandidates: raw.length };
  }

  record.attachUniiInfo(buildUniiInfo(best.candidate));
  return {
    status: "matched",
    slug: record.slug,
    uniiCode: best.candidate.unii,
    score: best.score,
    candidates: candidates.length,
  };
}

export interface EnrichCollectionOptions {
  logger?: Logger;
}

export interface EnrichmentSummary {
  matched: number;
  noCandidates: number;
  failed: number;
  alreadyEnriched: number;
  outcomes: EnrichmentOutcome[];
}

/**
 * Enrich every record once, in order.
 */
export function enrichCollection(
  records: readonly SubstanceRecord[],
  lookup: UniiLookup,
  options: EnrichCollectionOptions = {}
): EnrichmentSummary {
  const logger = options.logger ?? silentLogger;
  const summary: EnrichmentSummary = {
    matched: 0,
    noCandidates: 0,
    failed: 0,
    alreadyEnriched: 0,
    outcomes: [],
  };

  for (const record of records) {
    const outcome = enrichRecord(record, lookup);
    summary.outcomes.push(outcome);

    switch (outcome.status) {
      case "matched":
        summary.matched++;
        logger.debug("UNII matched", { slug: outcome.slug, unii: outcome.uniiCode, score: outcome.score });
        break;
      case "no_candidates":
        summary.noCandidates++;
        logger.debug("No UNII candidates", { slug: outcome.slug });
        break;
      case "lookup_failed":
        summary.failed++;
        logger.warn("UNII lookup failed", { slug: outcome.slug, error: outcome.error });
        break;
      case "already_enriched":
        summary.alreadyEnriched++;
        break;
    }
  }

  logger.info("Enrichment complete", {
    matched: summary.matched,
    noCandidates: summary.noCandidates,
    failed: summary.failed,
    alreadyEnriched: summary.alreadyEnriched,
  });

  return summary;
}

/**
 * Cache lookup results by name for the lifetime of the returned function.
 * Failures are not cached.
 */
export function memoizeLookup(lookup: UniiLookup): UniiLookup {
  const cache = new Map<string, readonly unknown[]>();
  return (name) => {
    const key = name.trim().toLowerCase();
    const cached = cache.get(key);
    if (cached !== undefined) return cached;
    const result = lookup(name);
    cache.set(key, result);
    return result;
  };
}

export interface SharedUniiCode {
  uniiCode: string;
  slugs: string[];
}

/**
 * UNII codes attached to more than one record, in order of first use.
 * Each record keeps its own info; this only reports the coincidence.
 */
export function findSharedUniiCodes(records: readonly SubstanceRecord[]): SharedUniiCode[] {
  const byCode = new Map<string, string[]>();
  for (const record of records) {
    const code = record.uniiInfo?.uniiCode;
    if (code === undefined) continue;
    const slugs = byCode.get(code);
    if (slugs) slugs.push(record.slug);
    else byCode.set(code, [record.slug]);
  }
  return [...byCode.entries()]
    .filter(([, slugs]) => slugs.length > 1)
    .map(([uniiCode, slugs]) => ({ uniiCode, slugs }));
}
