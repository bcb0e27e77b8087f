/**
 * Clean-up applied to model HTML before the quality gate sees it, and the
 * rendered literature block.
 */

import type { Source } from "../types/index.js";
import { escapeHtml } from "./html.js";

/** `*x*` outside tags and not part of `**` */
const MARKDOWN_EMPHASIS = /(?<!<)(?<!\*)\*([^*<>]+?)\*(?!\*)(?![^<]*>)/g;
const BROKEN_HREF = /href="([^"]*?)\s+([^"]*)"/g;

/**
 * Normalize one HTML fragment:
 *   - `**x**` becomes `<strong>x</strong>`, `*x*` becomes `<em>x</em>`
 *   - whitespace inside `href="..."` is removed
 *   - plain text is wrapped in `<p>`
 *   - adjacent paragraphs are joined into one
 */
export function cleanHtmlContent(text: string): string {
  if (text === "") {
    return text;
  }

  let out = text.replace(/\*\*([^*]*)\*\*/g, "<strong>$1</strong>");
  out = out.replace(MARKDOWN_EMPHASIS, "<em>$1</em>");

  // Repeat until stable: each pass removes one whitespace run per attribute.
  let previous: string;
  do {
    previous = out;
    out = out.replace(BROKEN_HREF, 'href="$1$2"');
  } while (out !== previous);

  out = out.trim();
  if (out !== "" && !out.startsWith("<")) {
    out = `<p>${out}</p>`;
  }

  return out.replace(/<\/p>\s*<p>/g, " ");
}

/**
 * `<p>[n]: <a href="url" target="_blank">title</a></p>` per source.
 */
export function formatLiterature(sources: readonly Source[]): string {
  return sources
    .map(
      (source) =>
        `<p>[${source.index}]: <a href="${escapeHtml(source.url)}" target="_blank">${escapeHtml(source.title)}</a></p>`
    )
    .join("");
}
