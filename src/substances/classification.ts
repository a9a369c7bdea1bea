/**
 * Classification extraction.
 *
 * Derives the DEA schedule and the steroid flag from free-text reasons and
 * classifications. Both rules are literal pattern matches over the source
 * wording; neither one interprets negation or context.
 */

import type { DeaSchedule } from "./schema.js";

/**
 * "Schedule" (case-sensitive) followed by a whole Roman numeral I-V.
 * Longer numerals are listed first so "Schedule III" is not read as "I".
 */
const SCHEDULE_PATTERN = /\bSchedule\s+(IV|V|III|II|I)(?![A-Za-z])/g;

export const STEROID_KEYWORDS: readonly string[] = ["steroid", "anabolic"];

function isDeaSchedule(value: string | undefined): value is DeaSchedule {
  return value === "I" || value === "II" || value === "III" || value === "IV" || value === "V";
}

/**
 * Every distinct schedule mentioned, in scan order (reasons before
 * classifications, left to right within each entry).
 */
export function findScheduleMentions(
  reasons: readonly string[],
  classifications: readonly string[]
): DeaSchedule[] {
  const found: DeaSchedule[] = [];
  for (const text of [...reasons, ...classifications]) {
    for (const match of text.matchAll(SCHEDULE_PATTERN)) {
      const numeral = match[1];
      if (isDeaSchedule(numeral) && !found.includes(numeral)) {
        found.push(numeral);
      }
    }
  }
  return found;
}

/**
 * DEA schedule of a substance: the first mention wins when several disagree.
 *
 * @example
 *   extractDeaSchedule(["This substance is a Schedule III controlled substance"], []) // "III"
 *   extractDeaSchedule([], ["Stimulant"])                                             // undefined
 */
export function extractDeaSchedule(
  reasons: readonly string[],
  classifications: readonly string[]
): DeaSchedule | undefined {
  return findScheduleMentions(reasons, classifications)[0];
}

/**
 * True when any classification contains "steroid" or "anabolic",
 * case-insensitively. "Non-steroidal" matches too.
 */
export function extractIsSteroid(classifications: readonly string[]): boolean {
  return classifications.some((entry) => {
    const lowered = entry.toLowerCase();
    return STEROID_KEYWORDS.some((keyword) => lowered.includes(keyword));
  });
}
