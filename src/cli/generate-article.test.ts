/**
 * Tests for the generate-article CLI helpers.
 *
 * Run: node --import tsx src/cli/generate-article.test.ts
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import {
  CliUsageError,
  describeError,
  parseCliArgs,
  renderOutput,
  writeOutput,
} from "./generate-article.js";
import { ConfigError } from "../config/index.js";
import { InputValidationError } from "../input/index.js";
import { GenerationError, QualityCheckError, toArticleJson } from "../generator/index.js";
import type { Article } from "../types/index.js";

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

const ARTICLE: Article = {
  headline: "Cold storage basics",
  teaser: "Keep it cold.",
  intro: "<p>Intro [1].</p>",
  metaTitle: "Cold storage basics",
  metaDescription: "What cold storage costs and how to plan it.",
  sections: [{ title: "Costs", content: "<p>Costs [1].</p>" }],
  keyTakeaways: ["Plan ahead."],
  faq: [],
  paa: [],
  sources: [{ index: 1, url: "https://example.org/report", title: "Report" }],
  searchQueries: ["cold storage costs"],
  readTime: 1,
  date: "31.01.2024",
  literature: '<p>[1]: <a href="https://example.org/report" target="_blank">Report</a></p>',
};

// ═══════════════════════════════════════════════════════════════════════════
// ARGUMENT PARSING
// ═══════════════════════════════════════════════════════════════════════════

section("Argument parsing");

test("--input alone uses the defaults", () => {
  assert.deepEqual(parseCliArgs(["--input", "input.json"]), {
    input: "input.json",
    output: undefined,
    format: "json",
    apiKey: undefined,
    contract: undefined,
    help: false,
  });
});

test("short flags and --api-key", () => {
  const options = parseCliArgs([
    "-i", "{}",
    "-f", "html",
    "-o", "out/article.html",
    "--api-key", "test-secret",
    "--contract", "config/editorial-contract.json",
  ]);
  assert.equal(options.input, "{}");
  assert.equal(options.format, "html");
  assert.equal(options.output, "out/article.html");
  assert.equal(options.apiKey, "test-secret");
  assert.equal(options.contract, "config/editorial-contract.json");
});

test("--help needs no input", () => {
  const options = parseCliArgs(["--help"]);
  assert.equal(options.help, true);
  assert.equal(options.input, "");
});

test("missing --input is a usage error", () => {
  assert.throws(() => parseCliArgs(["--format", "html"]), (err: unknown) => {
    assert.ok(err instanceof CliUsageError);
    assert.equal(err.message, "--input is required");
    return true;
  });
});

test("unsupported --format is a usage error", () => {
  assert.throws(() => parseCliArgs(["--input", "x.json", "--format", "xml"]), (err: unknown) => {
    assert.ok(err instanceof CliUsageError);
    assert.equal(err.message, 'Unsupported --format "xml". Use json or html.');
    return true;
  });
});

test("unknown flags are usage errors", () => {
  assert.throws(() => parseCliArgs(["--input", "x.json", "--verbose"]), CliUsageError);
});

// ═══════════════════════════════════════════════════════════════════════════
// OUTPUT
// ═══════════════════════════════════════════════════════════════════════════

section("Output");

test("json output is the snake_case article with a trailing newline", () => {
  const text = renderOutput(ARTICLE, "json");
  assert.ok(text.endsWith("}\n"));
  assert.deepEqual(JSON.parse(text), toArticleJson(ARTICLE));
});

test("html output prefers the rendered page on the article", () => {
  assert.equal(renderOutput({ ...ARTICLE, html: "<html></html>" }, "html"), "<html></html>");
});

test("html output renders the page when the article has none", () => {
  const html = renderOutput(ARTICLE, "html");
  assert.ok(html.startsWith("<!DOCTYPE html>\n"));
  assert.ok(html.includes("<h1>Cold storage basics</h1>"));
});

test("writeOutput creates parent directories", () => {
  const dir = mkdtempSync(join(tmpdir(), "generate-article-"));
  try {
    const target = join(dir, "nested", "deeper", "article.json");
    writeOutput("{}\n", target);
    assert.equal(readFileSync(target, "utf-8"), "{}\n");
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

// ═══════════════════════════════════════════════════════════════════════════
// DIAGNOSTICS
// ═══════════════════════════════════════════════════════════════════════════

section("Diagnostics");

test("input validation errors list every issue", () => {
  const err = new InputValidationError("Invalid article input: 1 validation error(s)", [
    { path: "primary_keyword", message: "Required", code: "invalid_type" },
  ]);
  assert.equal(describeError(err), "Input validation failed:\n  - primary_keyword: Required");
});

test("quality failures print the remaining errors", () => {
  const err = new QualityCheckError(["Too few sections (1, minimum 2)"]);
  assert.equal(
    describeError(err),
    "Quality check failed after automatic fixes:\n  - Too few sections (1, minimum 2)"
  );
});

test("generation failures include the trace and its cause", () => {
  const err = new GenerationError("Content generation failed: quota exceeded", {
    cause: new Error("quota exceeded"),
  });
  const text = describeError(err);
  assert.ok(text.includes("Content generation failed: quota exceeded\n    at "));
  assert.ok(text.includes("\nCaused by: Error: quota exceeded\n"));
});

test("configuration errors print a single line", () => {
  assert.equal(describeError(new ConfigError("Invalid LOG_LEVEL: loud")), "Error: Invalid LOG_LEVEL: loud");
});

test("usage errors are followed by the usage text", () => {
  const text = describeError(new CliUsageError("--input is required"));
  assert.ok(text.startsWith("Error: --input is required\n\nUsage: generate-article"));
});

test("non-errors are stringified", () => {
  assert.equal(describeError("boom"), "Error: boom");
});

// ═══════════════════════════════════════════════════════════════════════════
// SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n${"═".repeat(60)}`);
console.log(`Results: ${passed} passed, ${failed} failed`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
