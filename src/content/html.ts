/**
 * Standalone HTML page for a finished article.
 *
 * Intro, section bodies and the literature block are already HTML and are
 * inserted as-is; every other field is plain text and gets escaped.
 */

import type { Article } from "../types/index.js";

const STYLE = [
  "body{font-family:Arial, sans-serif;line-height:1.5;margin:0;padding:20px;color:#333;}",
  "article{max-width:800px;margin:0 auto;}",
  "h1{font-size:2em;margin-bottom:0.3em;}",
  "h2{font-size:1.6em;margin-top:1em;color:#222;}",
  "h3{font-size:1.3em;margin-top:0.8em;color:#444;}",
  ".key-takeaways ul{padding-left:20px;}",
  ".sources{font-size:0.9em;margin:24px 0;}",
].join("\n    ");

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

function listSection(className: string, heading: string, items: readonly string[]): string {
  if (items.length === 0) {
    return "";
  }
  const lis = items.map((item) => `<li>${escapeHtml(item)}</li>`).join("\n");
  return `<section class="${className}">\n<h2>${escapeHtml(heading)}</h2>\n<ul>\n${lis}\n</ul>\n</section>\n`;
}

export interface HtmlRenderOptions {
  /** Value of <html lang>; defaults to "en" */
  language?: string;
  takeawaysHeading?: string;
  literatureHeading?: string;
  queriesHeading?: string;
}

export function renderArticleHtml(article: Article, options: HtmlRenderOptions = {}): string {
  const lang = escapeHtml(options.language ?? "en");
  const headline = escapeHtml(article.headline);

  const sections = article.sections
    .filter((section) => section.title !== "")
    .map(
      (section, i) =>
        `<section id="section-${i + 1}">\n<h2>${escapeHtml(section.title)}</h2>\n${section.content}\n</section>\n`
    )
    .join("\n");

  const subtitle = article.subtitle ? `<h2>${escapeHtml(article.subtitle)}</h2>` : "";

  return `<!DOCTYPE html>
<html lang="${lang}">
<head>
  <meta charset="UTF-8">
  <title>${headline}</title>
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <meta name="description" content="${escapeHtml(article.metaDescription)}">
  <style>
    ${STYLE}
  </style>
</head>
<body>
  <article>
    <header>
      <h1>${headline}</h1>
      ${subtitle}
      <p class="date">${escapeHtml(article.date)} · ${article.readTime} min</p>
      <p class="teaser">${escapeHtml(article.teaser)}</p>
      ${article.intro}
    </header>

${sections}
${listSection("key-takeaways", options.takeawaysHeading ?? "Key Takeaways", article.keyTakeaways)}
    <section class="sources">
      <h2>${escapeHtml(options.literatureHeading ?? "Literature")}</h2>
      ${article.literature}
    </section>

${listSection("queries", options.queriesHeading ?? "Search Queries", article.searchQueries)}
  </article>
</body>
</html>
`;
}
