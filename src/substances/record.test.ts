/**
 * Tests for SubstanceRecord construction, enrichment and export views.
 *
 * Run: node --import tsx src/substances/record.test.ts
 */

import { strict as assert } from "node:assert";
import { createHash } from "node:crypto";

import {
  ConstructionError,
  RecordStateError,
  SubstanceRecord,
  uniiInfoFromExport,
  uniiInfoToExport,
} from "./record.js";
import type { UniiInfo } from "./schema.js";
import { loadNormalizationConfig } from "../config/normalization/loader.js";

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

function sha1Prefix(text: string): string {
  return createHash("sha1").update(text).digest("hex").slice(0, 10);
}

// ═══════════════════════════════════════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

const DMAA_ROW = {
  Name: "1,3-Dimethylamylamine (DMAA)",
  Other_names: "Methylhexaneamine; Geranamine; methylhexaneamine",
  Classifications: '["Stimulant", "Anabolic Agent"]',
  Reasons: '[{"reason": "Listed as a Schedule II substance", "link": "https://example.org/dmaa"}]',
  Warnings: "Do not use.\nConsult a physician, first.",
  References: "FDA notice",
  More_info_url: "https://example.org/more",
  added: { _seconds: 1700000000 },
  updated: "March 5, 2024",
  Guid: "guid-0001",
  Sourceof: "Geranium oil",
  Label_terms: "DMAA, 1,3-DMAA",
  Linked_ingredients: '["Caffeine"]',
};

const TESTOSTERONE_ROW = {
  Name: "Testosterone",
  Classifications: "Anabolic Steroid",
  Reasons: "This substance is a Schedule III controlled substance",
};

const UNII_INFO: UniiInfo = {
  uniiCode: "TEST0001",
  preferredTerm: "TESTOSTERONE",
  resourceUrl: "https://example.org/unii/TEST0001",
  links: {
    gsrs: "https://example.org/gsrs/TEST0001",
    ncats: "https://example.org/ncats/TEST0001",
  },
};

// ═══════════════════════════════════════════════════════════════════════════
// CONSTRUCTION
// ═══════════════════════════════════════════════════════════════════════════

section("Construction");

test("a full row normalizes every field", () => {
  const record = SubstanceRecord.fromRaw(DMAA_ROW);
  assert.equal(record.name, "1,3-Dimethylamylamine (DMAA)");
  assert.equal(record.slug, "1-3-dimethylamylamine-dmaa");
  assert.equal(record.searchableName, "1 3-dimethylamylamine dmaa");
  assert.deepEqual(record.otherNames, ["Methylhexaneamine", "Geranamine"]);
  assert.deepEqual(record.classifications, ["Stimulant", "Anabolic Agent"]);
  assert.deepEqual(record.reasons, [
    { text: "Listed as a Schedule II substance", link: "https://example.org/dmaa" },
  ]);
  assert.deepEqual(record.warnings, ["Do not use.", "Consult a physician, first."]);
  assert.deepEqual(record.references, ["FDA notice"]);
  assert.equal(record.deaSchedule, "II");
  assert.equal(record.isSteroid, true);
  assert.equal(record.moreInfoUrl, "https://example.org/more");
  assert.equal(record.added, "2023-11-14");
  assert.equal(record.updated, "2024-03-05");
  assert.equal(record.guid, "guid-0001");
  assert.equal(record.sourceOf, "Geranium oil");
  assert.deepEqual(record.labelTerms, ["DMAA", "1,3-DMAA"]);
  assert.deepEqual(record.linkedIngredients, ["Caffeine"]);
  assert.deepEqual(record.reviewIssues, []);
  assert.equal(record.isEnriched, false);
});

test("list fields are frozen", () => {
  const record = SubstanceRecord.fromRaw(DMAA_ROW);
  assert.equal(Object.isFrozen(record.otherNames), true);
  assert.equal(Object.isFrozen(record.reasons), true);
  assert.equal(Object.isFrozen(record.reasons[0]), true);
});

test("column names match case-insensitively and ignore padding", () => {
  const record = SubstanceRecord.fromRaw({ "  name ": "Kratom", CLASSIFICATIONS: "Opioid" });
  assert.equal(record.name, "Kratom");
  assert.deepEqual(record.classifications, ["Opioid"]);
});

test("an empty name column falls through to the next alias", () => {
  assert.equal(SubstanceRecord.fromRaw({ Name: "", title: "Kratom" }).name, "Kratom");
  assert.equal(SubstanceRecord.fromRaw({ Name: "<br>", substance: "Kratom" }).name, "Kratom");
});

test("a bracketed name with a comma is kept whole", () => {
  assert.equal(SubstanceRecord.fromRaw({ Name: "[Methyl, ethyl]" }).name, "Methyl, ethyl");
});

test("an out-of-range entity does not stop construction", () => {
  const record = SubstanceRecord.fromRaw({ Name: "Kratom", Warnings: "see &#9999999;" });
  assert.deepEqual(record.warnings, ["see \uFFFD"]);
});

test("markup is stripped from the name", () => {
  const record = SubstanceRecord.fromRaw({ Name: "<b>Ephedra</b>&nbsp;" });
  assert.equal(record.name, "Ephedra");
  assert.equal(record.slug, "ephedra");
});

test("Reason is used when Reasons is empty", () => {
  const record = SubstanceRecord.fromRaw({ Name: "Yohimbe", Reasons: "  ", Reason: "Banned" });
  assert.deepEqual(record.reasons, [{ text: "Banned" }]);
});

test("Reasons wins over Reason", () => {
  const record = SubstanceRecord.fromRaw({ Name: "Yohimbe", Reasons: "Primary", Reason: "Other" });
  assert.deepEqual(record.reasons, [{ text: "Primary" }]);
});

test("absent columns degrade to empty values", () => {
  const record = SubstanceRecord.fromRaw({ Name: "Testosterone" });
  assert.deepEqual(record.otherNames, []);
  assert.deepEqual(record.reasons, []);
  assert.equal(record.deaSchedule, undefined);
  assert.equal(record.isSteroid, false);
  assert.equal(record.moreInfoUrl, undefined);
  assert.equal(record.added, undefined);
});

test("a non-http more-info URL is dropped", () => {
  const record = SubstanceRecord.fromRaw({ Name: "Kratom", More_info_url: "ftp://example.org/x" });
  assert.equal(record.moreInfoUrl, undefined);
});

// ═══════════════════════════════════════════════════════════════════════════
// CONSTRUCTION FAILURES
// ═══════════════════════════════════════════════════════════════════════════

section("Construction failures");

test("a row without a name throws ConstructionError", () => {
  assert.throws(
    () => SubstanceRecord.fromRaw({ Classifications: "Stimulant" }),
    (err: unknown) =>
      err instanceof ConstructionError &&
      err.field === "name" &&
      err.message === "Row has no name in any of the columns: Name, ingredient, substance, title"
  );
});

test("a whitespace-only name throws", () => {
  assert.throws(() => SubstanceRecord.fromRaw({ Name: "   " }), ConstructionError);
});

test("a non-object row throws with the root field", () => {
  for (const row of ["just text", null, ["Name", "Kratom"]]) {
    assert.throws(
      () => SubstanceRecord.fromRaw(row),
      (err: unknown) => err instanceof ConstructionError && err.field === "(root)"
    );
  }
});

test("the error keeps the offending row", () => {
  const row = { Guid: "guid-0002" };
  try {
    SubstanceRecord.fromRaw(row);
    assert.fail("expected ConstructionError");
  } catch (err) {
    assert.ok(err instanceof ConstructionError);
    assert.equal(err.row, row);
  }
});

// ═══════════════════════════════════════════════════════════════════════════
// REVIEW ISSUES
// ═══════════════════════════════════════════════════════════════════════════

section("Review issues");

test("a name without URL-safe characters gets a hashed slug", () => {
  const record = SubstanceRecord.fromRaw({ Name: "+/-" });
  const expected = `substance-${sha1Prefix("+/-")}`;
  assert.equal(record.slug, expected);
  assert.deepEqual(record.reviewIssues, [
    {
      code: "SLUG_FALLBACK",
      field: "slug",
      message: `Name "+/-" has no URL-safe characters; using "${expected}"`,
    },
  ]);
});

test("the fallback prefix comes from the config", () => {
  const config = loadNormalizationConfig({ slugFallbackPrefix: "item" });
  const record = SubstanceRecord.fromRaw({ Name: "***" }, { config });
  assert.equal(record.slug, `item-${sha1Prefix("***")}`);
});

test("the fallback slug depends only on the name", () => {
  const a = SubstanceRecord.fromRaw({ Name: "***", Guid: "one" });
  const b = SubstanceRecord.fromRaw({ Name: "***", Guid: "two" });
  assert.equal(a.slug, b.slug);
});

test("conflicting schedules keep the first and raise an issue", () => {
  const record = SubstanceRecord.fromRaw({
    Name: "Mixture",
    Reasons: "Schedule II",
    Classifications: "Schedule IV",
  });
  assert.equal(record.deaSchedule, "II");
  assert.deepEqual(record.reviewIssues, [
    {
      code: "SCHEDULE_CONFLICT",
      field: "deaSchedule",
      message: "Mentions schedules II, IV; using II",
    },
  ]);
});

test("flag ignores a repeated issue", () => {
  const record = SubstanceRecord.fromRaw({ Name: "Kratom" });
  const issue = { code: "SLUG_COLLISION" as const, field: "slug", message: "taken" };
  record.flag(issue);
  record.flag({ ...issue });
  assert.equal(record.reviewIssues.length, 1);
});

test("reviewIssues is a copy", () => {
  const record = SubstanceRecord.fromRaw({ Name: "+/-" });
  const issues = record.reviewIssues;
  assert.equal(Object.isFrozen(issues), true);
  record.flag({ code: "SLUG_COLLISION", field: "slug", message: "taken" });
  assert.equal(issues.length, 1);
  assert.equal(record.reviewIssues.length, 2);
});

// ═══════════════════════════════════════════════════════════════════════════
// ENRICHMENT
// ═══════════════════════════════════════════════════════════════════════════

section("Enrichment");

test("attachUniiInfo enriches once", () => {
  const record = SubstanceRecord.fromRaw(TESTOSTERONE_ROW);
  record.attachUniiInfo(UNII_INFO);
  assert.equal(record.isEnriched, true);
  assert.equal(record.uniiInfo?.uniiCode, "TEST0001");
});

test("a second attach throws RecordStateError", () => {
  const record = SubstanceRecord.fromRaw(TESTOSTERONE_ROW);
  record.attachUniiInfo(UNII_INFO);
  assert.throws(
    () => record.attachUniiInfo({ ...UNII_INFO, uniiCode: "TEST0002" }),
    (err: unknown) =>
      err instanceof RecordStateError &&
      err.slug === "testosterone" &&
      err.message === 'Record "testosterone" already carries UNII TEST0001'
  );
  assert.equal(record.uniiInfo?.uniiCode, "TEST0001");
});

test("attached info is frozen and detached from the input", () => {
  const info: UniiInfo = { ...UNII_INFO, links: { ...UNII_INFO.links } };
  const record = SubstanceRecord.fromRaw(TESTOSTERONE_ROW);
  record.attachUniiInfo(info);
  info.links.gsrs = "https://example.org/changed";
  assert.equal(record.uniiInfo?.links.gsrs, "https://example.org/gsrs/TEST0001");
  assert.equal(Object.isFrozen(record.uniiInfo?.links), true);
});

// ═══════════════════════════════════════════════════════════════════════════
// VIEWS
// ═══════════════════════════════════════════════════════════════════════════

section("Views");

test("toJSON uses snake_case keys and nulls", () => {
  assert.deepEqual(SubstanceRecord.fromRaw(TESTOSTERONE_ROW).toJSON(), {
    name: "Testosterone",
    other_names: [],
    classifications: ["Anabolic Steroid"],
    reasons: [{ text: "This substance is a Schedule III controlled substance", link: null }],
    warnings: [],
    references: [],
    dea_schedule: "III",
    is_steroid: true,
    more_info_url: null,
    added: null,
    updated: null,
    slug: "testosterone",
    searchable_name: "testosterone",
    guid: null,
    source_of: null,
    label_terms: [],
    linked_ingredients: [],
    unii_info: null,
  });
});

test("toJSON includes UNII info when enriched", () => {
  const record = SubstanceRecord.fromRaw(TESTOSTERONE_ROW);
  record.attachUniiInfo(UNII_INFO);
  assert.deepEqual(record.toJSON().unii_info, {
    unii_code: "TEST0001",
    preferred_term: "TESTOSTERONE",
    resource_url: "https://example.org/unii/TEST0001",
    cas_rn: null,
    pubchem_cid: null,
    substance_type: null,
    comptox_id: null,
    links: {
      gsrs: "https://example.org/gsrs/TEST0001",
      ncats: "https://example.org/ncats/TEST0001",
      common_chemistry: null,
      pubchem: null,
      comptox: null,
    },
  });
});

test("UNII info survives the export conversion", () => {
  const full: UniiInfo = {
    ...UNII_INFO,
    casRn: "0-00-0",
    pubchemCid: 1234,
    links: { ...UNII_INFO.links, pubchem: "https://example.org/pubchem/1234" },
  };
  assert.deepEqual(uniiInfoFromExport(uniiInfoToExport(full)), full);
});

test("an exported record reads back with the same comparable fields", () => {
  const original = SubstanceRecord.fromRaw(DMAA_ROW);
  const reloaded = SubstanceRecord.fromRaw(original.toJSON());
  assert.deepEqual(reloaded.comparable(), original.comparable());
  assert.equal(reloaded.slug, original.slug);
});

test("a fallback slug survives the export round", () => {
  const original = SubstanceRecord.fromRaw({ Name: "+/-" });
  assert.equal(SubstanceRecord.fromRaw(original.toJSON()).slug, original.slug);
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
