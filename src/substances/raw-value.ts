/**
 * Raw field values.
 *
 * The source delivers any column in any of several encodings: missing, an
 * empty string, plain text, JSON serialized into a string, a delimiter-joined
 * string, a native array or a native object. Every column read goes through
 * `ingestRawValue` once, and the normalizers switch over the resulting kind
 * instead of testing runtime types ad hoc.
 */

export type RawValue =
  | { readonly kind: "absent" }
  | { readonly kind: "scalar"; readonly text: string }
  | { readonly kind: "json"; readonly text: string }
  | { readonly kind: "array"; readonly items: readonly unknown[] }
  | { readonly kind: "record"; readonly entries: Readonly<Record<string, unknown>> };

export type RawValueKind = RawValue["kind"];

export const ABSENT: RawValue = Object.freeze({ kind: "absent" });

const JSON_DELIMITERS: ReadonlyArray<readonly [string, string]> = [
  ["[", "]"],
  ["{", "}"],
  ['"', '"'],
];

function looksLikeJson(text: string): boolean {
  return (
    text.length >= 2 &&
    JSON_DELIMITERS.some(([open, close]) => text.startsWith(open) && text.endsWith(close))
  );
}

export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Classify one raw column value.
 *
 * @example
 *   ingestRawValue(undefined)           // { kind: "absent" }
 *   ingestRawValue("  ")                // { kind: "absent" }
 *   ingestRawValue('["A", "B"]')        // { kind: "json", text: '["A", "B"]' }
 *   ingestRawValue("A; B")              // { kind: "scalar", text: "A; B" }
 *   ingestRawValue(["A", "B"])          // { kind: "array", items: ["A", "B"] }
 *   ingestRawValue({ _seconds: 1 })     // { kind: "record", entries: { _seconds: 1 } }
 */
export function ingestRawValue(raw: unknown): RawValue {
  if (raw === undefined || raw === null) {
    return ABSENT;
  }

  if (typeof raw === "string") {
    const text = raw.trim();
    if (text.length === 0) return ABSENT;
    return looksLikeJson(text) ? { kind: "json", text } : { kind: "scalar", text };
  }

  if (typeof raw === "number") {
    return Number.isFinite(raw) ? { kind: "scalar", text: String(raw) } : ABSENT;
  }

  if (typeof raw === "boolean" || typeof raw === "bigint") {
    return { kind: "scalar", text: String(raw) };
  }

  if (raw instanceof Date) {
    return Number.isNaN(raw.getTime()) ? ABSENT : { kind: "scalar", text: raw.toISOString() };
  }

  if (Array.isArray(raw)) {
    return { kind: "array", items: raw };
  }

  if (isPlainRecord(raw)) {
    return { kind: "record", entries: raw };
  }

  // Functions, symbols and class instances carry no field data.
  return ABSENT;
}

export type JsonParseResult = { ok: true; value: unknown } | { ok: false; error: string };

/**
 * JSON.parse that reports failure as data.
 */
export function parseJson(text: string): JsonParseResult {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}
