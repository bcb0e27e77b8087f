/**
 * Editorial contract loader tests.
 *
 * Run: node --import tsx src/standards/loader.test.ts
 */

import { strict as assert } from "node:assert";
import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import {
  DEFAULT_EDITORIAL_CONTRACT,
  StandardsValidationError,
  loadEditorialContract,
  loadEditorialContractFromFile,
} from "./loader.js";

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
  console.log(`\n${title}`);
}

function expectIssues(input: unknown): StandardsValidationError {
  try {
    loadEditorialContract(input);
  } catch (err) {
    if (err instanceof StandardsValidationError) {
      return err;
    }
    throw err;
  }
  throw new Error("Expected StandardsValidationError");
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

section("Defaults");

test("empty input yields the standard contract", () => {
  assert.deepEqual(DEFAULT_EDITORIAL_CONTRACT.metaTitle, { min: 30, max: 55, truncateAt: 52 });
  assert.deepEqual(DEFAULT_EDITORIAL_CONTRACT.metaDescription, { min: 50, max: 130, truncateAt: 127 });
  assert.deepEqual(DEFAULT_EDITORIAL_CONTRACT.wordCount, { min: 1200, max: 1800 });
  assert.equal(DEFAULT_EDITORIAL_CONTRACT.sources.maxPerDomain, 3);
  assert.deepEqual(DEFAULT_EDITORIAL_CONTRACT.balancedTags, ["p", "strong", "ul", "ol", "li", "h2", "h3"]);
});

test("loaded contracts are deeply frozen", () => {
  assert.ok(Object.isFrozen(DEFAULT_EDITORIAL_CONTRACT));
  assert.ok(Object.isFrozen(DEFAULT_EDITORIAL_CONTRACT.sections));
  assert.ok(Object.isFrozen(DEFAULT_EDITORIAL_CONTRACT.balancedTags));
});

test("partial sections keep the remaining defaults", () => {
  const contract = loadEditorialContract({ sections: { max: 12 } });
  assert.deepEqual(contract.sections, { min: 2, max: 12, maxTitleLength: 100 });
});

test("JSON strings are accepted", () => {
  const contract = loadEditorialContract('{"minFaq": 5}');
  assert.equal(contract.minFaq, 5);
  assert.equal(contract.minPaa, 2);
});

test("shipped contract file matches the defaults", () => {
  const path = fileURLToPath(new URL("../../config/editorial-contract.json", import.meta.url));
  assert.deepEqual(loadEditorialContractFromFile(path), DEFAULT_EDITORIAL_CONTRACT);
});

test("contract files are read from disk", () => {
  const dir = join(tmpdir(), `editorial-contract-test-${process.pid}`);
  mkdirSync(dir, { recursive: true });
  try {
    const file = join(dir, "contract.json");
    writeFileSync(file, JSON.stringify({ minKeywordOccurrences: 5 }));
    assert.equal(loadEditorialContractFromFile(file).minKeywordOccurrences, 5);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

// ---------------------------------------------------------------------------
// Validation errors
// ---------------------------------------------------------------------------

section("Validation errors");

test("invalid JSON is reported as an issue", () => {
  const err = expectIssues("{not json");
  assert.equal(err.issues[0]?.code, "invalid_json");
  assert.equal(err.issues[0]?.path, "(root)");
});

test("unknown keys are rejected", () => {
  const err = expectIssues({ maxSections: 4 });
  assert.equal(err.issues[0]?.code, "unrecognized_keys");
});

test("negative counts are rejected with their path", () => {
  const err = expectIssues({ sources: { min: -1 } });
  assert.equal(err.issues[0]?.path, "sources.min");
});

test("inverted ranges are rejected", () => {
  const err = expectIssues({ wordCount: { min: 2000, max: 1000 } });
  assert.deepEqual(err.issues, [{ path: "wordCount", message: "min must be <= max", code: "invalid_range" }]);
});

test("truncateAt must leave room for the ellipsis", () => {
  const err = expectIssues({ metaTitle: { min: 30, max: 55, truncateAt: 54 } });
  assert.equal(err.issues[0]?.path, "metaTitle.truncateAt");
  assert.equal(err.issues[0]?.code, "invalid_constraint");
});

test("format() lists every issue", () => {
  const err = expectIssues({ wordCount: { min: 2000, max: 1000 } });
  assert.equal(err.format(), "Editorial contract validation failed:\n  - wordCount: min must be <= max");
});

// ---------------------------------------------------------------------------
// Summary
// ---------------------------------------------------------------------------

console.log(`\n=== Results: ${passed} passed, ${failed} failed ===\n`);

if (failed > 0) {
  process.exit(1);
}
