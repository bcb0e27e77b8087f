/**
 * Model output parsing.
 *
 * The model answers with one flat JSON object. Scalar fields use display
 * names ("Meta Title"); repeated content lives in numbered slots
 * (`section_01_title`, `faq_03_answer`, `key_takeaway_02`). Blank slots
 * mean "unused" and are dropped.
 */

import { z } from "zod";
import type { FaqItem, PaaItem, Section } from "../types/index.js";
import { countWords } from "./helpers.js";

export type ContentPayload = Record<string, unknown>;

/** Non-string values count as blank */
const slotText = z.unknown().transform((value) => (typeof value === "string" ? value.trim() : ""));

export const ContentScalarsSchema = z.object({
  Headline: slotText,
  Subtitle: slotText,
  Teaser: slotText,
  Intro: slotText,
  "Meta Title": slotText,
  "Meta Description": slotText,
  Sources: slotText,
  "Search Queries": slotText,
});

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

function slots<T>(count: number, make: (n: string) => T): readonly T[] {
  return Array.from({ length: count }, (_, i) => make(pad(i + 1)));
}

export const SECTION_SLOTS = slots(9, (n) => ({
  title: `section_${n}_title`,
  content: `section_${n}_content`,
}));

export const FAQ_SLOTS = slots(6, (n) => ({
  question: `faq_${n}_question`,
  answer: `faq_${n}_answer`,
}));

export const PAA_SLOTS = slots(4, (n) => ({
  question: `paa_${n}_question`,
  answer: `paa_${n}_answer`,
}));

export const TAKEAWAY_SLOTS = slots(3, (n) => `key_takeaway_${n}`);

export interface ParsedContent {
  headline: string;
  subtitle: string;
  teaser: string;
  intro: string;
  metaTitle: string;
  metaDescription: string;
  sections: Section[];
  faq: FaqItem[];
  paa: PaaItem[];
  keyTakeaways: string[];
  /** Raw "Sources" block, parsed later by the source extractor */
  sourcesText: string;
  searchQueries: string[];
  /** Whitespace tokens across all string fields, HTML included */
  rawWordCount: number;
}

function isRecord(value: unknown): value is ContentPayload {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseObject(text: string): ContentPayload | null {
  try {
    const parsed: unknown = JSON.parse(text);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * Pull the JSON object out of a model answer.
 *
 * Tries the widest `{...}` span first, then a ```json fenced block.
 * Returns `{}` when neither parses to an object.
 */
export function extractJsonPayload(text: string): ContentPayload {
  const span = /\{[\s\S]*\}/.exec(text);
  if (span) {
    const parsed = parseObject(span[0]);
    if (parsed) {
      return parsed;
    }
  }

  const fenced = /```json\s*(\{[\s\S]*?\})\s*```/.exec(text);
  if (fenced?.[1]) {
    const parsed = parseObject(fenced[1]);
    if (parsed) {
      return parsed;
    }
  }

  return {};
}

function slot(payload: ContentPayload, key: string): string {
  return slotText.parse(payload[key]);
}

/**
 * `Q1: query` lines; anything else is ignored.
 */
export function parseSearchQueries(text: string): string[] {
  const queries: string[] = [];
  for (const line of text.split("\n")) {
    const match = /^Q\d+:\s*(.+)$/.exec(line.trim());
    const query = match?.[1]?.trim();
    if (query) {
      queries.push(query);
    }
  }
  return queries;
}

export function countRawWords(payload: ContentPayload): number {
  let total = 0;
  for (const value of Object.values(payload)) {
    if (typeof value === "string") {
      total += countWords(value);
    }
  }
  return total;
}

export function parseContent(payload: ContentPayload): ParsedContent {
  const scalars = ContentScalarsSchema.parse(payload);

  const sections: Section[] = [];
  for (const keys of SECTION_SLOTS) {
    const title = slot(payload, keys.title);
    const content = slot(payload, keys.content);
    if (title || content) {
      sections.push({ title, content });
    }
  }

  const pairs = (table: readonly { question: string; answer: string }[]) => {
    const items: { question: string; answer: string }[] = [];
    for (const keys of table) {
      const question = slot(payload, keys.question);
      const answer = slot(payload, keys.answer);
      if (question && answer) {
        items.push({ question, answer });
      }
    }
    return items;
  };

  return {
    headline: scalars.Headline,
    subtitle: scalars.Subtitle,
    teaser: scalars.Teaser,
    intro: scalars.Intro,
    metaTitle: scalars["Meta Title"],
    metaDescription: scalars["Meta Description"],
    sections,
    faq: pairs(FAQ_SLOTS),
    paa: pairs(PAA_SLOTS),
    keyTakeaways: TAKEAWAY_SLOTS.map((key) => slot(payload, key)).filter((value) => value !== ""),
    sourcesText: scalars.Sources,
    searchQueries: parseSearchQueries(scalars["Search Queries"]),
    rawWordCount: countRawWords(payload),
  };
}
