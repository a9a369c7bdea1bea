/**
 * Field normalizers.
 *
 * Pure functions that coerce one raw column value into a canonical list of
 * strings, a scalar, a date or a structured reason/reference. None of them
 * throws: malformed input degrades to best-effort extraction, and what cannot
 * be extracted becomes empty or undefined.
 */

import { DateTime } from "luxon";

import { HttpUrlSchema, type Reason } from "./schema.js";
import { ingestRawValue, isPlainRecord, parseJson, type RawValue } from "./raw-value.js";
import { collapseWhitespace, firstAnchorHref, stripHtml } from "./text.js";

/** Delimiters tried in priority order on plain-text list values. */
export const LIST_DELIMITERS: readonly string[] = [";", ","];

/** Free-text fields hold sentences, so only line breaks separate entries. */
export const PROSE_DELIMITERS: readonly string[] = ["\n"];

export interface TextOptions {
  /**
   * Whether values may carry HTML (default true). Text that was cleaned
   * before, such as a previous export, is read with `markup: false` so a
   * decoded `<` is not taken for a tag again.
   */
  markup?: boolean;
}

export interface ListFieldOptions extends TextOptions {
  /**
   * Delimiters tried in order on plain text. The first one present outside
   * parentheses wins. An empty list disables splitting.
   */
  delimiters?: readonly string[];
}

function cleanText(text: string, markup: boolean): string {
  return markup ? stripHtml(text) : collapseWhitespace(text);
}

// ═══════════════════════════════════════════════════════════════════════════
// SPLITTING
// ═══════════════════════════════════════════════════════════════════════════

const ENTITY_TAIL = /&(#x[0-9a-f]+|#\d+|[a-z]+)$/i;
const DIGIT = /[0-9]/;

/**
 * A delimiter occurrence that belongs to the text rather than separating
 * entries: the comma in "1,3-dimethylamylamine" and the semicolon closing
 * an HTML entity.
 */
function isEmbedded(text: string, index: number, delimiter: string): boolean {
  if (delimiter === ",") {
    return DIGIT.test(text.charAt(index - 1)) && DIGIT.test(text.charAt(index + 1));
  }
  if (delimiter === ";") {
    return ENTITY_TAIL.test(text.slice(Math.max(0, index - 12), index));
  }
  return false;
}

/**
 * Split on one delimiter, ignoring occurrences inside parentheses, brackets
 * and HTML tags. Undefined when the delimiter does not occur there.
 */
function splitOutside(text: string, delimiter: string): string[] | undefined {
  const parts: string[] = [];
  let current = "";
  let depth = 0;
  let inTag = false;
  let found = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);

    if (inTag) {
      if (ch === ">") inTag = false;
    } else if (ch === "<" && /[a-z/]/i.test(text.charAt(i + 1))) {
      inTag = true;
    } else if (ch === "(" || ch === "[") {
      depth++;
    } else if ((ch === ")" || ch === "]") && depth > 0) {
      depth--;
    } else if (depth === 0 && text.startsWith(delimiter, i) && !isEmbedded(text, i, delimiter)) {
      parts.push(current);
      current = "";
      found = true;
      i += delimiter.length - 1;
      continue;
    }

    current += ch;
  }
  if (!found) return undefined;
  parts.push(current);

  return parts.map((part) => part.trim()).filter((part) => part.length > 0);
}

/**
 * Split plain text on the first delimiter it contains, so "A, B;" splits on
 * the semicolon only.
 */
export function splitDelimited(text: string, delimiters: readonly string[] = LIST_DELIMITERS): string[] {
  for (const delimiter of delimiters) {
    const parts = splitOutside(text, delimiter);
    if (parts !== undefined) {
      return parts;
    }
  }
  const trimmed = text.trim();
  return trimmed.length > 0 ? [trimmed] : [];
}

const QUOTED_ITEM = /'((?:[^'\\]|\\.)*)'|"((?:[^"\\]|\\.)*)"/g;

/**
 * Parse a list literal written with single quotes, e.g. `['A', 'B']`.
 * Returns undefined unless the whole text is such a list.
 */
export function parseQuotedList(text: string): string[] | undefined {
  const trimmed = text.trim();
  if (!trimmed.startsWith("[") || !trimmed.endsWith("]")) {
    return undefined;
  }
  const inner = trimmed.slice(1, -1);
  const items: string[] = [];
  for (const match of inner.matchAll(QUOTED_ITEM)) {
    items.push((match[1] ?? match[2] ?? "").replace(/\\(.)/g, "$1"));
  }
  const leftover = inner.replace(QUOTED_ITEM, "").replace(/[\s,]/g, "");
  return leftover.length === 0 ? items : undefined;
}

/**
 * Best-effort recovery of a JSON-looking value that failed to parse:
 * strip the outer brackets, split on the caller's delimiters, and drop
 * stray quotes.
 */
function salvageJsonText(text: string, delimiters: readonly string[]): string[] {
  const inner = /^[[{].*[\]}]$/s.test(text) ? text.slice(1, -1) : text;
  return splitDelimited(inner, delimiters)
    .map((part) => part.replace(/^["']+|["']+$/g, "").trim())
    .filter((part) => part.length > 0);
}

/**
 * Expand a raw value into list items, each of which is still untyped.
 * Objects are kept whole so structured fields can read their keys.
 */
function rawListItems(value: RawValue, delimiters: readonly string[]): unknown[] {
  switch (value.kind) {
    case "absent":
      return [];
    case "scalar":
      return splitDelimited(value.text, delimiters);
    case "json": {
      const parsed = parseJson(value.text);
      if (parsed.ok) {
        return Array.isArray(parsed.value) ? parsed.value : [parsed.value];
      }
      return parseQuotedList(value.text) ?? salvageJsonText(value.text, delimiters);
    }
    case "array":
      return [...value.items];
    case "record":
      return [value.entries];
  }
}

/**
 * Scalar rule applied to every list item: strings are stripped of markup
 * and trimmed, nested lists are flattened, flat objects contribute their
 * values, empties are dropped.
 */
function itemToStrings(item: unknown, markup: boolean): string[] {
  if (typeof item === "string") {
    const text = cleanText(item, markup);
    return text.length > 0 ? [text] : [];
  }
  if (typeof item === "number") {
    return Number.isFinite(item) ? [String(item)] : [];
  }
  if (typeof item === "boolean") {
    return [String(item)];
  }
  if (Array.isArray(item)) {
    return item.flatMap((entry) => itemToStrings(entry, markup));
  }
  if (isPlainRecord(item)) {
    return Object.values(item).flatMap((entry) => itemToStrings(entry, markup));
  }
  return [];
}

// ═══════════════════════════════════════════════════════════════════════════
// LIST AND SCALAR FIELDS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Normalize a list-valued column.
 *
 * @example
 *   normalizeListField('["Stimulant", " Anorectic "]') // ["Stimulant", "Anorectic"]
 *   normalizeListField("Stimulant; Anorectic")          // ["Stimulant", "Anorectic"]
 *   normalizeListField("1,3-DMAA, Geranamine")          // ["1,3-DMAA", "Geranamine"]
 *   normalizeListField(null)                            // []
 */
export function normalizeListField(raw: unknown, options: ListFieldOptions = {}): string[] {
  const delimiters = options.delimiters ?? LIST_DELIMITERS;
  const markup = options.markup ?? true;
  return rawListItems(ingestRawValue(raw), delimiters).flatMap((item) => itemToStrings(item, markup));
}

/**
 * First non-empty string of a column, without splitting plain text.
 */
export function normalizeScalarField(raw: unknown, options: TextOptions = {}): string | undefined {
  return normalizeListField(raw, { ...options, delimiters: [] })[0];
}

/**
 * Drop later entries that equal an earlier one case-insensitively.
 */
export function dedupeCaseInsensitive(items: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const item of items) {
    const key = item.toLowerCase();
    if (!seen.has(key)) {
      seen.add(key);
      result.push(item);
    }
  }
  return result;
}

// ═══════════════════════════════════════════════════════════════════════════
// URLS, REASONS, REFERENCES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * The value as an absolute http(s) URL, or undefined.
 */
export function toHttpUrl(value: unknown): string | undefined {
  if (typeof value !== "string") return undefined;
  const candidate = value.trim();
  return HttpUrlSchema.safeParse(candidate).success ? candidate : undefined;
}

function anchorHref(html: string, markup: boolean): string | undefined {
  return markup ? toHttpUrl(firstAnchorHref(html)) : undefined;
}

/**
 * Normalize a URL column. An anchor tag contributes its href.
 */
export function normalizeUrl(raw: unknown, options: TextOptions = {}): string | undefined {
  const value = ingestRawValue(raw);
  if (value.kind === "scalar") {
    const href = anchorHref(value.text, options.markup ?? true);
    if (href !== undefined) return href;
  }
  return toHttpUrl(normalizeScalarField(raw, options));
}

function firstString(
  entries: Record<string, unknown>,
  keys: readonly string[],
  markup: boolean
): string | undefined {
  for (const key of keys) {
    const value = entries[key];
    if (typeof value === "string") {
      const text = cleanText(value, markup);
      if (text.length > 0) return text;
    }
  }
  return undefined;
}

function firstUrl(entries: Record<string, unknown>, keys: readonly string[]): string | undefined {
  for (const key of keys) {
    const url = toHttpUrl(entries[key]);
    if (url !== undefined) return url;
  }
  return undefined;
}

const REASON_TEXT_KEYS = ["reason", "text", "description", "title", "name", "link_title"] as const;
const LINK_KEYS = ["link", "url", "href"] as const;

function makeReason(text: string, link: string | undefined): Reason {
  return link === undefined ? { text } : { text, link };
}

function reasonsFromItem(item: unknown, markup: boolean): Reason[] {
  if (typeof item === "string") {
    const link = anchorHref(item, markup);
    const text = cleanText(item, markup);
    if (text.length > 0) return [makeReason(text, link)];
    return link === undefined ? [] : [makeReason(link, link)];
  }
  if (Array.isArray(item)) {
    return item.flatMap((entry) => reasonsFromItem(entry, markup));
  }
  if (isPlainRecord(item)) {
    const link = firstUrl(item, LINK_KEYS);
    const text = firstString(item, REASON_TEXT_KEYS, markup) ?? link;
    return text === undefined ? [] : [makeReason(text, link)];
  }
  return itemToStrings(item, markup).map((text) => makeReason(text, undefined));
}

/**
 * Normalize the reasons column. Bare strings, `{reason, link}` style objects
 * and HTML anchors all become `{ text, link? }`; links that are not
 * http(s) URLs are dropped.
 */
export function normalizeReasons(raw: unknown, options: TextOptions = {}): Reason[] {
  const markup = options.markup ?? true;
  return rawListItems(ingestRawValue(raw), PROSE_DELIMITERS).flatMap((item) => reasonsFromItem(item, markup));
}

const REFERENCE_TITLE_KEYS = ["title", "name", "text", "label", "citation"] as const;

function formatReference(title: string | undefined, url: string | undefined): string[] {
  if (title !== undefined && url !== undefined) {
    return [title === url ? url : `${title} (${url})`];
  }
  const single = title ?? url;
  return single === undefined ? [] : [single];
}

function referencesFromItem(item: unknown, markup: boolean): string[] {
  if (typeof item === "string") {
    const text = cleanText(item, markup);
    return formatReference(text.length > 0 ? text : undefined, anchorHref(item, markup));
  }
  if (Array.isArray(item)) {
    return item.flatMap((entry) => referencesFromItem(entry, markup));
  }
  if (isPlainRecord(item)) {
    return formatReference(firstString(item, REFERENCE_TITLE_KEYS, markup), firstUrl(item, LINK_KEYS));
  }
  return itemToStrings(item, markup);
}

/**
 * Normalize the references column into citation strings.
 * `{title, url}` objects and anchors become "title (url)".
 */
export function normalizeReferences(raw: unknown, options: TextOptions = {}): string[] {
  const markup = options.markup ?? true;
  return rawListItems(ingestRawValue(raw), PROSE_DELIMITERS).flatMap((item) =>
    referencesFromItem(item, markup)
  );
}

// ═══════════════════════════════════════════════════════════════════════════
// DATES
// ═══════════════════════════════════════════════════════════════════════════

const DATE_PREFIX = /^\d{4}-\d{2}-\d{2}(?:$|[T ])/;
const MONTH_DAY_YEAR = /^([A-Za-z]+)\.?\s+(\d{1,2})(?:st|nd|rd|th)?,?\s+(\d{4})$/;
const EPOCH_DIGITS = /^\d{9,13}(?:\.\d+)?$/;
const MONTH_FORMATS = ["LLLL d, yyyy", "LLL d, yyyy"] as const;

/**
 * Calendar date of a parsed value in UTC, bounded to four-digit years so
 * the result is always YYYY-MM-DD.
 */
function isoFromDateTime(date: DateTime): string | undefined {
  if (!date.isValid || date.year < 0 || date.year > 9999) return undefined;
  return date.toUTC().toISODate() ?? undefined;
}

/**
 * Epoch timestamp to an ISO date. Values from 1e11 up are taken as
 * milliseconds, smaller ones as seconds.
 */
function isoFromEpoch(value: number): string | undefined {
  if (!Number.isFinite(value) || value < 0) return undefined;
  return isoFromDateTime(
    value >= 1e11 ? DateTime.fromMillis(value, { zone: "utc" }) : DateTime.fromSeconds(value, { zone: "utc" })
  );
}

function isoFromTimestampRecord(entries: Readonly<Record<string, unknown>>): string | undefined {
  const seconds = entries["_seconds"] ?? entries["seconds"];
  if (typeof seconds === "number") return isoFromEpoch(seconds);
  if (typeof seconds === "string" && /^\d+$/.test(seconds.trim())) {
    return isoFromEpoch(Number(seconds));
  }
  return undefined;
}

function parseDateText(text: string): string | undefined {
  const trimmed = text.trim();

  if (EPOCH_DIGITS.test(trimmed)) {
    return isoFromEpoch(Number(trimmed));
  }

  if (DATE_PREFIX.test(trimmed)) {
    // Without an offset the calendar date is taken as written.
    return isoFromDateTime(DateTime.fromISO(trimmed.replace(" ", "T"), { zone: "utc" }));
  }

  const mdy = MONTH_DAY_YEAR.exec(trimmed);
  if (mdy) {
    const [, month = "", day = "", year = ""] = mdy;
    const written = `${month.replace(/^sept$/i, "Sep")} ${day}, ${year}`;
    for (const format of MONTH_FORMATS) {
      const date = DateTime.fromFormat(written, format, { zone: "utc", locale: "en-US" });
      if (date.isValid) return isoFromDateTime(date);
    }
  }

  return undefined;
}

/**
 * Normalize a date column to an ISO calendar date (YYYY-MM-DD, UTC).
 *
 * Accepts ISO-8601 dates and datetimes, "Month D, YYYY", epoch seconds as a
 * number or digit string, and `{"_seconds": n}` timestamp objects, native or
 * as JSON text. Anything else is undefined.
 *
 * @example
 *   normalizeDate("2023-04-05T10:00:00Z")    // "2023-04-05"
 *   normalizeDate("March 5, 2021")           // "2021-03-05"
 *   normalizeDate(1700000000)                // "2023-11-14"
 *   normalizeDate('{"_seconds":1700000000}') // "2023-11-14"
 */
export function normalizeDate(raw: unknown): string | undefined {
  if (typeof raw === "number") {
    return isoFromEpoch(raw);
  }

  const value = ingestRawValue(raw);
  switch (value.kind) {
    case "absent":
      return undefined;
    case "scalar":
      return parseDateText(value.text);
    case "json": {
      const parsed = parseJson(value.text);
      if (!parsed.ok) return undefined;
      if (isPlainRecord(parsed.value)) return isoFromTimestampRecord(parsed.value);
      if (typeof parsed.value === "string" || typeof parsed.value === "number") {
        return normalizeDate(parsed.value);
      }
      return undefined;
    }
    case "array":
      return value.items.length > 0 ? normalizeDate(value.items[0]) : undefined;
    case "record":
      return isoFromTimestampRecord(value.entries);
  }
}
