/**
 * Tests for field normalizers and text helpers.
 *
 * Run: node --import tsx src/substances/normalize.test.ts
 *
 * Tests cover:
 *   1. List fields in every encoding (JSON, delimited, native, null)
 *   2. Delimiter rules (priority, parentheses, chemical commas, entities)
 *   3. Scalars, URLs, reasons and references
 *   4. Dates (ISO, "Month D, YYYY", epoch, timestamp objects)
 *   5. Slugs and searchable names
 */

import { strict as assert } from "node:assert";

import {
  normalizeListField,
  normalizeScalarField,
  normalizeDate,
  normalizeReasons,
  normalizeReferences,
  normalizeUrl,
  splitDelimited,
  parseQuotedList,
  dedupeCaseInsensitive,
} from "./normalize.js";
import { slugify, stripHtml, toSearchableName, stableStringify } from "./text.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

// ═══════════════════════════════════════════════════════════════════════════
// LIST FIELDS
// ═══════════════════════════════════════════════════════════════════════════

section("List fields: encodings");

test("absent, null and empty values give an empty list", () => {
  assert.deepEqual(normalizeListField(undefined), []);
  assert.deepEqual(normalizeListField(null), []);
  assert.deepEqual(normalizeListField(""), []);
  assert.deepEqual(normalizeListField("[]"), []);
});

test("every encoding of the same values gives the same list", () => {
  const expected = ["Stimulant", "Anorectic"];
  assert.deepEqual(normalizeListField('["Stimulant", " Anorectic "]'), expected);
  assert.deepEqual(normalizeListField("Stimulant; Anorectic"), expected);
  assert.deepEqual(normalizeListField("Stimulant, Anorectic"), expected);
  assert.deepEqual(normalizeListField(["Stimulant", "Anorectic"]), expected);
  assert.deepEqual(normalizeListField("['Stimulant', 'Anorectic']"), expected);
});

test("a JSON string is a single entry", () => {
  assert.deepEqual(normalizeListField('"Solo"'), ["Solo"]);
});

test("a JSON object contributes its values", () => {
  assert.deepEqual(normalizeListField('{"a": "X", "b": "Y"}'), ["X", "Y"]);
});

test("native arrays drop empties and strip markup", () => {
  assert.deepEqual(normalizeListField(["  A ", "", "<i>B</i>", 5, null]), ["A", "B", "5"]);
});

test("nested arrays are flattened", () => {
  assert.deepEqual(normalizeListField([["A"], ["B", "C"]]), ["A", "B", "C"]);
});

test("unparseable bracket lists are salvaged", () => {
  assert.deepEqual(normalizeListField("[Alpha, Beta]"), ["Alpha", "Beta"]);
});

test("a JSON list with a trailing comma is read as a quoted list", () => {
  assert.deepEqual(normalizeListField('["Alpha", "Beta",]'), ["Alpha", "Beta"]);
});

test("values that carry no text never throw", () => {
  assert.deepEqual(normalizeListField(Symbol("x")), []);
  assert.deepEqual(normalizeListField(() => "x"), []);
  assert.deepEqual(normalizeListField("{"), ["{"]);
});

section("List fields: delimiters");

test("semicolon takes priority over comma", () => {
  assert.deepEqual(normalizeListField("A, B; C"), ["A, B", "C"]);
});

test("a lone trailing semicolon still takes priority", () => {
  assert.deepEqual(normalizeListField("A, B;"), ["A, B"]);
});

test("commas between digits stay inside the entry", () => {
  assert.deepEqual(normalizeListField("1,3-Dimethylamylamine, Geranamine"), [
    "1,3-Dimethylamylamine",
    "Geranamine",
  ]);
});

test("delimiters inside parentheses do not split", () => {
  assert.deepEqual(normalizeListField("Ephedra (Ma Huang, Sida cordifolia)"), [
    "Ephedra (Ma Huang, Sida cordifolia)",
  ]);
  assert.deepEqual(normalizeListField("Methylhexaneamine (DMAA, Geranamine); Forthane"), [
    "Methylhexaneamine (DMAA, Geranamine)",
    "Forthane",
  ]);
});

test("a semicolon closing an entity does not split", () => {
  assert.deepEqual(normalizeListField("<b>Stimulant</b>; Anorectic &amp; Appetite suppressant"), [
    "Stimulant",
    "Anorectic & Appetite suppressant",
  ]);
});

test("custom delimiters", () => {
  assert.deepEqual(splitDelimited("a|b", ["|"]), ["a", "b"]);
  assert.deepEqual(normalizeListField("a; b", { delimiters: [] }), ["a; b"]);
});

test("no delimiters also leaves a salvaged bracket list whole", () => {
  assert.deepEqual(normalizeListField("[Methyl, ethyl]", { delimiters: [] }), ["Methyl, ethyl"]);
});

test("numeric entities outside Unicode decode to the replacement character", () => {
  assert.deepEqual(normalizeListField("A &#99999999; B"), ["A \uFFFD B"]);
  assert.deepEqual(normalizeListField(["see &#x110000;"]), ["see \uFFFD"]);
});

test("markup: false keeps text as written", () => {
  assert.deepEqual(normalizeListField(["<b>  x </b>"], { markup: false }), ["<b> x </b>"]);
  assert.deepEqual(normalizeReasons([{ text: "Uses &lt;b&gt;" }], { markup: false }), [{ text: "Uses &lt;b&gt;" }]);
});

test("parseQuotedList only accepts whole quoted lists", () => {
  assert.deepEqual(parseQuotedList("['A', \"B\"]"), ["A", "B"]);
  assert.equal(parseQuotedList("[A, 'B']"), undefined);
  assert.equal(parseQuotedList("'A'"), undefined);
});

test("case-insensitive dedupe keeps the first spelling", () => {
  assert.deepEqual(dedupeCaseInsensitive(["DMAA", "dmaa", "Geranamine", "DMAA"]), [
    "DMAA",
    "Geranamine",
  ]);
});

// ═══════════════════════════════════════════════════════════════════════════
// SCALARS AND URLS
// ═══════════════════════════════════════════════════════════════════════════

section("Scalars and URLs");

test("scalar fields are not split", () => {
  assert.equal(normalizeScalarField("Alpha; Beta"), "Alpha; Beta");
  assert.equal(normalizeScalarField("[Methyl, ethyl]"), "Methyl, ethyl");
});

test("scalar of a JSON list is its first entry", () => {
  assert.equal(normalizeScalarField('["First", "Second"]'), "First");
});

test("blank scalar is undefined", () => {
  assert.equal(normalizeScalarField("   "), undefined);
  assert.equal(normalizeScalarField("<br>"), undefined);
});

test("URLs must be absolute http(s)", () => {
  assert.equal(normalizeUrl("https://example.org/info"), "https://example.org/info");
  assert.equal(normalizeUrl("www.example.org"), undefined);
  assert.equal(normalizeUrl("ftp://example.org/file"), undefined);
});

test("an anchor contributes its href", () => {
  assert.equal(normalizeUrl('<a href="https://example.org/x">More</a>'), "https://example.org/x");
});

// ═══════════════════════════════════════════════════════════════════════════
// REASONS AND REFERENCES
// ═══════════════════════════════════════════════════════════════════════════

section("Reasons");

test("a bare string is one reason without a link", () => {
  assert.deepEqual(normalizeReasons("This substance is a Schedule III controlled substance"), [
    { text: "This substance is a Schedule III controlled substance" },
  ]);
});

test("objects and strings mix in one JSON list", () => {
  assert.deepEqual(
    normalizeReasons('[{"reason": "Stimulant", "link": "https://example.org/a"}, "Plain text"]'),
    [{ text: "Stimulant", link: "https://example.org/a" }, { text: "Plain text" }]
  );
});

test("text and url keys are accepted", () => {
  assert.deepEqual(normalizeReasons([{ text: "Y", url: "https://example.org/y" }]), [
    { text: "Y", link: "https://example.org/y" },
  ]);
});

test("anchors give the link and the visible text", () => {
  assert.deepEqual(
    normalizeReasons('See <a href="https://example.org/b?x=1&amp;y=2">the notice</a>'),
    [{ text: "See the notice", link: "https://example.org/b?x=1&y=2" }]
  );
});

test("non-http links are dropped, the text is kept", () => {
  assert.deepEqual(normalizeReasons([{ reason: "Banned", link: "javascript:void(0)" }]), [
    { text: "Banned" },
  ]);
});

test("reasons split on line breaks only", () => {
  assert.deepEqual(normalizeReasons("First reason\nSecond, with comma; and more"), [
    { text: "First reason" },
    { text: "Second, with comma; and more" },
  ]);
});

test("an object with only a link uses the link as text", () => {
  assert.deepEqual(normalizeReasons([{ link: "https://example.org/z" }]), [
    { text: "https://example.org/z", link: "https://example.org/z" },
  ]);
});

section("References");

test("title and url objects become 'title (url)'", () => {
  assert.deepEqual(normalizeReferences('[{"title": "FDA notice", "url": "https://example.org/fda"}]'), [
    "FDA notice (https://example.org/fda)",
  ]);
});

test("anchors become 'text (href)'", () => {
  assert.deepEqual(normalizeReferences('<a href="https://example.org/r">Report</a>'), [
    "Report (https://example.org/r)",
  ]);
});

test("plain citations are kept whole", () => {
  assert.deepEqual(normalizeReferences("Plain citation, 2020"), ["Plain citation, 2020"]);
});

test("a url-only object is the url", () => {
  assert.deepEqual(normalizeReferences([{ url: "https://example.org/only" }]), [
    "https://example.org/only",
  ]);
});

// ═══════════════════════════════════════════════════════════════════════════
// DATES
// ═══════════════════════════════════════════════════════════════════════════

section("Dates");

test("ISO dates and datetimes", () => {
  assert.equal(normalizeDate("2023-04-05"), "2023-04-05");
  assert.equal(normalizeDate("2023-04-05T10:00:00Z"), "2023-04-05");
  assert.equal(normalizeDate("2023-04-05 10:00:00"), "2023-04-05");
});

test("datetimes with an offset are converted to UTC", () => {
  assert.equal(normalizeDate("2023-04-05T23:30:00-05:00"), "2023-04-06");
});

test("'Month D, YYYY' with full and short month names", () => {
  assert.equal(normalizeDate("March 5, 2021"), "2021-03-05");
  assert.equal(normalizeDate("Sept 30, 2020"), "2020-09-30");
});

test("impossible calendar dates are rejected", () => {
  assert.equal(normalizeDate("Feb 30, 2021"), undefined);
  assert.equal(normalizeDate("2023-13-01"), undefined);
});

test("epoch seconds as number or digit string", () => {
  assert.equal(normalizeDate(1700000000), "2023-11-14");
  assert.equal(normalizeDate("1700000000"), "2023-11-14");
});

test("large epoch values are milliseconds", () => {
  assert.equal(normalizeDate(1700000000000), "2023-11-14");
});

test("timestamp objects, native or as JSON text", () => {
  assert.equal(normalizeDate({ _seconds: 1700000000, _nanoseconds: 0 }), "2023-11-14");
  assert.equal(normalizeDate('{"_seconds": 1700000000}'), "2023-11-14");
});

test("epochs outside four-digit years are undefined", () => {
  assert.equal(normalizeDate(1e15), undefined);
  assert.equal(normalizeDate(253402300800000), undefined);
  assert.equal(normalizeDate(253402300799999), "9999-12-31");
});

test("unparseable dates are undefined", () => {
  assert.equal(normalizeDate("not a date"), undefined);
  assert.equal(normalizeDate(""), undefined);
  assert.equal(normalizeDate(null), undefined);
  assert.equal(normalizeDate(-5), undefined);
  assert.equal(normalizeDate({ when: "today" }), undefined);
});

// ═══════════════════════════════════════════════════════════════════════════
// TEXT HELPERS
// ═══════════════════════════════════════════════════════════════════════════

section("Text helpers");

test("stripHtml removes tags and decodes entities", () => {
  assert.equal(stripHtml("<p>17&alpha;-methyl</p><p>testosterone&nbsp;&#38; more</p>"), "17α-methyl testosterone & more");
});

test("stripHtml decodes escaped markup once, as text", () => {
  assert.equal(stripHtml("&lt;b&gt;bold&lt;/b&gt;"), "<b>bold</b>");
});

test("stripHtml turns line breaks and list items into spaces", () => {
  assert.equal(stripHtml("One<br>Two<ul><li>Three</li><li>Four</li></ul>"), "One Two Three Four");
});

test("slugs are lower-case and hyphenated", () => {
  assert.equal(slugify("1,3-Dimethylamylamine (DMAA)"), "1-3-dimethylamylamine-dmaa");
  assert.equal(slugify("  Ma Huang  "), "ma-huang");
  assert.equal(slugify("Éphédrine"), "ephedrine");
  assert.equal(slugify("Caffeine & Ephedra"), "caffeine-ephedra");
  assert.equal(slugify("-Alanine--"), "alanine");
});

test("names without alphanumerics have no slug", () => {
  assert.equal(slugify("+/-"), undefined);
  assert.equal(slugify("***"), undefined);
});

test("searchable names keep inner hyphens only", () => {
  assert.equal(toSearchableName("1,3-Dimethylamylamine (DMAA)"), "1 3-dimethylamylamine dmaa");
  assert.equal(toSearchableName("-Alanine  --  Beta"), "alanine beta");
  assert.equal(toSearchableName("Éphédrine"), "ephedrine");
});

test("stable stringify ignores key order", () => {
  assert.equal(stableStringify({ b: 1, a: [{ d: 2, c: 3 }] }), '{"a":[{"c":3,"d":2}],"b":1}');
});

// ═══════════════════════════════════════════════════════════════════════════
// Summary
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n${"═".repeat(60)}`);
console.log(`  ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
