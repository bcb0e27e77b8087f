/**
 * Post-processing, helper and HTML rendering tests.
 *
 * Run: node --import tsx src/content/post-processor.test.ts
 */

import { strict as assert } from "node:assert";
import { cleanHtmlContent, formatLiterature } from "./post-processor.js";
import {
  charLength,
  countWords,
  estimateReadTime,
  formatDate,
  generateRandomDate,
  leadingChars,
  stripHtmlTags,
} from "./helpers.js";
import { escapeHtml, renderArticleHtml } from "./html.js";
import type { Article } from "../types/index.js";

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

// ---------------------------------------------------------------------------
// cleanHtmlContent
// ---------------------------------------------------------------------------

section("cleanHtmlContent");

test("markdown bold becomes <strong>", () => {
  assert.equal(cleanHtmlContent("<p>**Key** point</p>"), "<p><strong>Key</strong> point</p>");
});

test("markdown emphasis becomes <em>", () => {
  assert.equal(cleanHtmlContent("<p>A *very* fine day</p>"), "<p>A <em>very</em> fine day</p>");
});

test("asterisks inside tag attributes are left alone", () => {
  const html = '<p><a href="/a*b*c">x</a></p>';
  assert.equal(cleanHtmlContent(html), html);
});

test("whitespace inside href is removed", () => {
  assert.equal(
    cleanHtmlContent('<p><a href="/cold storage /guide">x</a></p>'),
    '<p><a href="/coldstorage/guide">x</a></p>'
  );
});

test("plain text is wrapped in a paragraph", () => {
  assert.equal(cleanHtmlContent("  plain text "), "<p>plain text</p>");
});

test("adjacent paragraphs are joined", () => {
  assert.equal(cleanHtmlContent("<p>One.</p>\n<p>Two.</p>"), "<p>One. Two.</p>");
});

test("empty input stays empty", () => {
  assert.equal(cleanHtmlContent(""), "");
});

// ---------------------------------------------------------------------------
// Literature
// ---------------------------------------------------------------------------

section("formatLiterature");

test("renders one escaped paragraph per source", () => {
  const html = formatLiterature([
    { index: 1, url: "https://example.org/a?x=1&y=2", title: "Cold & Co" },
    { index: 4, url: "https://example.org/b", title: "B" },
  ]);
  assert.equal(
    html,
    '<p>[1]: <a href="https://example.org/a?x=1&amp;y=2" target="_blank">Cold &amp; Co</a></p>' +
      '<p>[4]: <a href="https://example.org/b" target="_blank">B</a></p>'
  );
});

test("no sources renders nothing", () => {
  assert.equal(formatLiterature([]), "");
});

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

section("Helpers");

test("countWords splits on any whitespace", () => {
  assert.equal(countWords("  a  b\nc "), 3);
  assert.equal(countWords(""), 0);
});

test("character helpers work on code points", () => {
  assert.equal(charLength("Kühl 🧊"), 6);
  assert.equal("Kühl 🧊".length, 7);
  assert.equal(leadingChars("🧊🧊🧊", 2), "🧊🧊");
  assert.equal(leadingChars("ab", 5), "ab");
});

test("stripHtmlTags removes tags only", () => {
  assert.equal(stripHtmlTags("<p>Hi <strong>there</strong></p>"), "Hi there");
});

test("estimateReadTime rounds up with a one-minute floor", () => {
  assert.equal(estimateReadTime(0), 1);
  assert.equal(estimateReadTime(200), 1);
  assert.equal(estimateReadTime(201), 2);
  assert.equal(estimateReadTime(1500), 8);
});

test("formatDate pads day and month", () => {
  assert.equal(formatDate(new Date(2024, 0, 5)), "05.01.2024");
});

test("generateRandomDate stays within the window", () => {
  const now = new Date(2024, 2, 10);
  assert.equal(generateRandomDate(90, now, () => 0), "10.03.2024");
  assert.equal(generateRandomDate(90, now, () => 0.999), "11.12.2023");
});

// ---------------------------------------------------------------------------
// HTML page
// ---------------------------------------------------------------------------

section("renderArticleHtml");

const article: Article = {
  headline: "Cold & Dry",
  teaser: "Keep it <cool>",
  intro: "<p>Intro</p>",
  metaTitle: "Cold storage",
  metaDescription: "Storage tips",
  sections: [
    { title: "First", content: "<p>Body one</p>" },
    { title: "", content: "<p>Orphan body</p>" },
  ],
  keyTakeaways: ["Plan ahead"],
  faq: [],
  paa: [],
  sources: [],
  searchQueries: [],
  readTime: 7,
  date: "01.02.2024",
  literature: "<p>[1]: x</p>",
};

const page = renderArticleHtml(article, { language: "de" });

test("page carries language and escaped headline", () => {
  assert.ok(page.includes('<html lang="de">'));
  assert.ok(page.includes("<title>Cold &amp; Dry</title>"));
  assert.ok(page.includes('<p class="teaser">Keep it &lt;cool&gt;</p>'));
});

test("untitled sections are skipped", () => {
  assert.ok(page.includes('<section id="section-1">\n<h2>First</h2>\n<p>Body one</p>\n</section>'));
  assert.equal(page.includes("Orphan body"), false);
});

test("takeaways render, empty query list does not", () => {
  assert.ok(page.includes("<li>Plan ahead</li>"));
  assert.equal(page.includes('class="queries"'), false);
});

test("escapeHtml escapes quotes", () => {
  assert.equal(escapeHtml(`"a" 'b'`), "&quot;a&quot; &#39;b&#39;");
});

// ---------------------------------------------------------------------------
// Summary
// ---------------------------------------------------------------------------

console.log(`\n=== Results: ${passed} passed, ${failed} failed ===\n`);

if (failed > 0) {
  process.exit(1);
}
