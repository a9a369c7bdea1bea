/**
 * Text helpers for substance names and free-text fields.
 *
 * Substance names carry heavy chemical notation ("1,3-Dimethylamylamine",
 * "(R)-α-Methyltryptamine", "17α-methyl-5α-androstan-3-one") and the source
 * embeds HTML in several columns, so every derived form goes through the
 * same small set of functions.
 */

import { load } from "cheerio";
import * as slugifyModule from "slugify";

const DIACRITICS = /[\u0300-\u036f]/g;
const MULTISPACE = /\s+/g;
const MARKUP = /[<&]/;
const BLOCK_ELEMENTS = "p, div, li, ul, ol, tr, td, th, h1, h2, h3, h4, h5, h6";
const NON_ALPHANUMERIC = /[^\p{L}\p{N}]+/gu;

/**
 * Collapse runs of whitespace to one space and trim.
 */
export function collapseWhitespace(text: string): string {
  return text.replace(MULTISPACE, " ").trim();
}

/**
 * Remove markup from a field value: tags are dropped, line-level elements
 * become word breaks, entities are decoded and whitespace is collapsed.
 *
 * Decoding happens in the parser, so `&lt;b&gt;` comes out as the literal
 * text `<b>` and an out-of-range numeric entity as U+FFFD.
 */
export function stripHtml(text: string): string {
  if (!MARKUP.test(text)) {
    return collapseWhitespace(text);
  }
  const $ = load(text, null, false);
  $("br").replaceWith(" ");
  $(BLOCK_ELEMENTS).before(" ").after(" ");
  return collapseWhitespace($.root().text());
}

/**
 * The href of the first anchor in an HTML fragment, entity-decoded.
 */
export function firstAnchorHref(html: string): string | undefined {
  if (!/<a\s/i.test(html)) {
    return undefined;
  }
  return load(html, null, false)("a[href]").first().attr("href");
}

/**
 * Strip diacritics after compatibility decomposition ("é" → "e", "ﬁ" → "fi").
 */
export function foldDiacritics(text: string): string {
  return text.normalize("NFKD").replace(DIACRITICS, "");
}

/**
 * URL-safe slug: lower-case, diacritics folded, every run of characters
 * that are not letters or digits becomes one hyphen, letters outside ASCII
 * are transliterated where slugify knows them and dropped otherwise.
 *
 * Returns undefined when nothing alphanumeric survives.
 *
 * @example
 *   slugify("1,3-Dimethylamylamine (DMAA)") // "1-3-dimethylamylamine-dmaa"
 */
export function slugify(text: string): string | undefined {
  const words = foldDiacritics(text).replace(NON_ALPHANUMERIC, " ");
  // slugify is CommonJS; its callable is the namespace default.
  const slug = slugifyModule.default(words, { lower: true, strict: true });
  return slug.length > 0 ? slug : undefined;
}

/**
 * Normalized-for-search form of a name.
 *
 * Case-folded and diacritic-free; punctuation becomes a word break except
 * hyphens that join two alphanumeric runs ("3-dimethylamylamine" keeps its
 * hyphen, "-alanine" and "foo - bar" do not).
 *
 * @example
 *   toSearchableName("1,3-Dimethylamylamine (DMAA)") // "1 3-dimethylamylamine dmaa"
 */
export function toSearchableName(text: string): string {
  const flattened = foldDiacritics(text)
    .toLowerCase()
    .replace(/[^a-z0-9\s-]/g, " ");

  return flattened
    .split(MULTISPACE)
    .map((token) => token.replace(/-{2,}/g, "-").replace(/^-+|-+$/g, ""))
    .filter((token) => token.length > 0)
    .join(" ");
}

/**
 * JSON serialization with object keys sorted at every level, so two rows
 * holding the same data hash the same regardless of column order.
 */
export function stableStringify(value: unknown): string {
  return JSON.stringify(sortKeys(value)) ?? "null";
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value !== null && typeof value === "object") {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeys(Reflect.get(value, key));
    }
    return sorted;
  }
  return value;
}
