/**
 * Source extractor tests.
 *
 * Run: node --import tsx src/sources/extractor.test.ts
 */

import { strict as assert } from "node:assert";
import { setTimeout as delay } from "node:timers/promises";
import {
  MAX_REPLACEMENTS,
  MAX_SOURCE_ENTRIES,
  REPLACEMENT_CONCURRENCY,
  VALIDATION_CONCURRENCY,
  extractSources,
  parseSourceLines,
  resolveSources,
  type SourceContext,
  type SourceResolver,
} from "./extractor.js";
import type { SearchProvider } from "../providers/types.js";
import { FakeHttpClient, FakeSearchProvider } from "../testing/fakes.js";

let passed = 0;
let failed = 0;

async function test(name: string, fn: () => void | Promise<void>): Promise<void> {
  try {
    await fn();
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

const context: SourceContext = {
  companyUrl: "https://acme.example",
  competitors: ["rival.example"],
  primaryKeyword: "cold storage",
  language: "en",
};

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

section("parseSourceLines");

await test("accepts hyphen, en dash and em dash separators", () => {
  const text = [
    "[1]: https://example.org/a – Report A",
    "not a source line",
    "  [2]: https://example.org/b - Guide B  ",
    "[3]: https://example.org/c — Study C",
    "[x]: https://example.org/d - Bad index",
    "[4]: ftp://example.org/e - Wrong scheme",
  ].join("\n");

  assert.deepEqual(parseSourceLines(text), [
    { index: 1, url: "https://example.org/a", description: "Report A" },
    { index: 2, url: "https://example.org/b", description: "Guide B" },
    { index: 3, url: "https://example.org/c", description: "Study C" },
  ]);
});

await test("caps parsing at 20 entries", () => {
  const text = Array.from({ length: 25 }, (_, i) => `[${i + 1}]: https://example.org/${i + 1} - Entry ${i + 1}`).join("\n");
  const entries = parseSourceLines(text);
  assert.equal(entries.length, MAX_SOURCE_ENTRIES);
  assert.equal(entries[19]?.index, 20);
});

await test("empty text yields no entries", () => {
  assert.deepEqual(parseSourceLines(""), []);
});

// ---------------------------------------------------------------------------
// Validation and replacement
// ---------------------------------------------------------------------------

section("extractSources");

await test("validates, replaces failures in place and sorts by index", async () => {
  const http = new FakeHttpClient()
    .live("https://example.org/a", "Report A page")
    .live("https://example.org/d")
    .live("https://example.net/alt", "Alternative");
  const search = new FakeSearchProvider({
    "cold storage Own blog": [
      { title: "Rival page", uri: "https://rival.example/x" },
      { title: "Alt blog", uri: "https://example.net/alt" },
    ],
  });

  const text = [
    "[4]: https://example.org/d - Study D",
    "[1]: https://example.org/a - Report A",
    "[2]: https://acme.example/blog - Own blog",
    "[3]: https://example.org/dead - Dead link",
  ].join("\n");

  const sources = await extractSources(text, context, { http, search });

  assert.deepEqual(sources, [
    { index: 1, url: "https://example.org/a", title: "Report A page" },
    { index: 2, url: "https://example.net/alt", title: "Alternative" },
    { index: 4, url: "https://example.org/d", title: "Study D" },
  ]);
  assert.deepEqual([...search.queries].sort(), ["cold storage Dead link", "cold storage Own blog"]);
  assert.equal(http.calls.some((call) => call.includes("rival.example")), false);
});

await test("only the first three failures are replaced", async () => {
  const http = new FakeHttpClient();
  const results: Record<string, { title: string; uri: string }[]> = {};
  for (let n = 1; n <= 5; n++) {
    results[`cold storage Dead ${n}`] = [{ title: `Alt ${n}`, uri: `https://example.net/alt-${n}` }];
    http.live(`https://example.net/alt-${n}`, `Alt page ${n}`);
  }
  const search = new FakeSearchProvider(results);
  const text = [1, 2, 3, 4, 5].map((n) => `[${n}]: https://example.org/dead-${n} - Dead ${n}`).join("\n");

  const sources = await extractSources(text, context, { http, search });

  assert.deepEqual(
    sources.map((s) => [s.index, s.url]),
    [
      [1, "https://example.net/alt-1"],
      [2, "https://example.net/alt-2"],
      [3, "https://example.net/alt-3"],
    ]
  );
  assert.equal(search.queries.length, 3);
});

await test("without a search provider failures are dropped", async () => {
  const http = new FakeHttpClient().live("https://example.org/a", "A");
  const text = "[1]: https://example.org/a - A\n[2]: https://example.org/gone - Gone";
  const sources = await extractSources(text, context, { http });
  assert.deepEqual(sources.map((s) => s.index), [1]);
});

await test("replacement search results are unwrapped from grounding redirects", async () => {
  const redirect = "https://vertexaisearch.cloud.google.com/grounding-api-redirect/xyz";
  const http = new FakeHttpClient()
    .on("HEAD", redirect, { status: 200, url: "https://example.net/found", headers: {}, body: "" })
    .live("https://example.net/found", "Found page");
  const search = new FakeSearchProvider({
    "cold storage Gone": [{ title: "example.net", uri: redirect }],
  });
  const sources = await extractSources("[6]: https://example.org/gone - Gone", context, { http, search });
  assert.deepEqual(sources, [{ index: 6, url: "https://example.net/found", title: "Found page" }]);
});

await test("a throwing resolver fails only its own entry", async () => {
  const resolver: SourceResolver = {
    async resolve(url) {
      if (url.endsWith("/boom")) {
        throw new Error("resolver exploded");
      }
      return { valid: true, finalUrl: url, title: "Fine" };
    },
  };
  const entries = [
    { index: 1, url: "https://example.org/ok", description: "Ok" },
    { index: 2, url: "https://example.org/boom", description: "Boom" },
  ];
  const sources = await resolveSources(entries, context, resolver);
  assert.deepEqual(sources, [{ index: 1, url: "https://example.org/ok", title: "Fine" }]);
});

await test("a failing search drops the entry", async () => {
  const resolver: SourceResolver = {
    async resolve(url) {
      return { valid: false, finalUrl: url, title: "" };
    },
  };
  const search: SearchProvider = {
    async search() {
      throw new Error("quota exceeded");
    },
  };
  const entries = [{ index: 7, url: "https://example.org/x", description: "X" }];
  const sources = await resolveSources(entries, context, resolver, { search });
  assert.deepEqual(sources, []);
});

await test("a replacement that repeats a kept source is skipped", async () => {
  const http = new FakeHttpClient()
    .live("https://example.org/a", "Report A")
    .live("https://example.org/a/", "Report A again")
    .live("https://example.net/other", "Other report");
  const search = new FakeSearchProvider({
    "cold storage Dead link": [
      { title: "Report A", uri: "https://example.org/a/" },
      { title: "Other", uri: "https://example.net/other" },
    ],
  });
  const text = "[1]: https://example.org/a - Report A\n[2]: https://example.org/dead - Dead link";

  const sources = await extractSources(text, context, { http, search });

  assert.deepEqual(sources, [
    { index: 1, url: "https://example.org/a", title: "Report A" },
    { index: 2, url: "https://example.net/other", title: "Other report" },
  ]);
});

await test("a replacement with only repeat candidates drops the entry", async () => {
  const http = new FakeHttpClient().live("https://example.org/a", "Report A");
  const search = new FakeSearchProvider({
    "cold storage Dead link": [{ title: "Report A", uri: "https://example.org/a" }],
  });
  const text = "[1]: https://example.org/a - Report A\n[2]: https://example.org/dead - Dead link";

  const sources = await extractSources(text, context, { http, search });

  assert.deepEqual(sources.map((s) => s.index), [1]);
});

await test("two failures never receive the same replacement", async () => {
  const resolver: SourceResolver = {
    async resolve(url) {
      return { valid: !url.includes("/dead-"), finalUrl: url, title: "Page" };
    },
  };
  const search: SearchProvider = {
    async search(query) {
      const n = query.slice(-1);
      return [
        { title: "Shared", uri: "https://example.net/shared" },
        { title: `Own ${n}`, uri: `https://example.net/own-${n}` },
      ];
    },
  };
  const entries = [
    { index: 1, url: "https://example.org/dead-1", description: "Dead 1" },
    { index: 2, url: "https://example.org/dead-2", description: "Dead 2" },
  ];

  const sources = await resolveSources(entries, context, resolver, { search });
  const urls = sources.map((s) => s.url);

  assert.equal(sources.length, 2);
  assert.equal(new Set(urls).size, 2);
  assert.ok(urls.includes("https://example.net/shared"));
});

// ---------------------------------------------------------------------------
// Pool widths
// ---------------------------------------------------------------------------

section("concurrency");

/** Counts calls running at the same time. */
class InFlight {
  current = 0;
  max = 0;

  async run<T>(fn: () => T): Promise<T> {
    this.current++;
    this.max = Math.max(this.max, this.current);
    try {
      await delay(5);
      return fn();
    } finally {
      this.current--;
    }
  }
}

await test(`validation runs at most ${VALIDATION_CONCURRENCY} resolves at once`, async () => {
  const inFlight = new InFlight();
  const resolver: SourceResolver = {
    resolve(url) {
      return inFlight.run(() => ({ valid: true, finalUrl: url, title: "Page" }));
    },
  };
  const entries = Array.from({ length: 25 }, (_, i) => ({
    index: i + 1,
    url: `https://example.org/${i + 1}`,
    description: `Entry ${i + 1}`,
  }));

  const sources = await resolveSources(entries, context, resolver);

  assert.equal(sources.length, 25);
  assert.equal(inFlight.max, VALIDATION_CONCURRENCY);
});

await test(`replacement runs at most ${REPLACEMENT_CONCURRENCY} searches at once`, async () => {
  const inFlight = new InFlight();
  const queries: string[] = [];
  const resolver: SourceResolver = {
    async resolve(url) {
      return { valid: false, finalUrl: url, title: "" };
    },
  };
  const search: SearchProvider = {
    search(query) {
      queries.push(query);
      return inFlight.run(() => []);
    },
  };
  const entries = Array.from({ length: 6 }, (_, i) => ({
    index: i + 1,
    url: `https://example.org/dead-${i + 1}`,
    description: `Dead ${i + 1}`,
  }));

  const sources = await resolveSources(entries, context, resolver, { search });

  assert.deepEqual(sources, []);
  assert.equal(queries.length, MAX_REPLACEMENTS);
  assert.ok(inFlight.max <= REPLACEMENT_CONCURRENCY);
  assert.ok(inFlight.max > 1);
});

// ---------------------------------------------------------------------------
// Summary
// ---------------------------------------------------------------------------

console.log(`\n=== Results: ${passed} passed, ${failed} failed ===\n`);

if (failed > 0) {
  process.exit(1);
}
