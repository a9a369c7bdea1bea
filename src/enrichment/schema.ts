/**
 * UNII candidate schema.
 *
 * A lookup returns candidates of unknown shape (parsed from a records file,
 * an API response, a cache). Each one is validated here before selection;
 * candidates that fail are ignored.
 */

import { z } from "zod";

const OptionalText = z.preprocess(
  (value) => (typeof value === "string" && value.trim().length === 0 ? undefined : value),
  z.string().trim().min(1).optional()
);

const OptionalCid = z.preprocess(
  (value) => {
    if (typeof value === "string") {
      const trimmed = value.trim();
      return /^\d+$/.test(trimmed) ? Number(trimmed) : trimmed.length === 0 ? undefined : value;
    }
    return value === null ? undefined : value;
  },
  z.number().int().positive().optional()
);

export const UniiCandidateSchema = z.object({
  /** UNII code, e.g. "3XMK78S47O" */
  unii: z.string().trim().min(1),
  /** Preferred term (PT) */
  preferredTerm: OptionalText,
  /** Display name, used when there is no preferred term */
  displayName: OptionalText,
  /** CAS registry number */
  casRn: OptionalText,
  pubchemCid: OptionalCid,
  substanceType: OptionalText,
  /** EPA CompTox dashboard id (DTXSID) */
  comptoxId: OptionalText,
});

export type UniiCandidate = z.infer<typeof UniiCandidateSchema>;

/**
 * Name → candidates. Injected per run; may throw.
 */
export type UniiLookup = (name: string) => readonly unknown[];
