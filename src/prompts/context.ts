/**
 * Typed prompt context.
 *
 * Every `{{path}}` placeholder in a prompt template maps to one entry of
 * this flat, string-valued context. The context is built once per article
 * from the validated input and the editorial contract:
 *
 *   input.primaryKeyword     → ArticleInput.primaryKeyword
 *   input.competitors        → ArticleInput.competitors, comma-joined
 *   contract.metaTitleMax    → EditorialContract.metaTitle.max
 *   output.format            → the JSON key list the parser reads back
 *
 * Adding a variable takes two changes: a name in PROMPT_VARIABLES and its
 * value in buildPromptContext().
 */

import type { ArticleInput } from "../input/index.js";
import type { EditorialContract } from "../standards/index.js";
import { FAQ_SLOTS, PAA_SLOTS, SECTION_SLOTS, TAKEAWAY_SLOTS } from "../content/parser.js";

// ---------------------------------------------------------------------------
// Variables
// ---------------------------------------------------------------------------

export const PROMPT_VARIABLES = [
  // ── Article input ──────────────────────────────────────────
  "input.primaryKeyword",
  "input.companyName",
  "input.companyUrl",
  "input.companyInfo",
  "input.language",
  "input.location",
  "input.competitors",
  "input.links",
  "input.instruction",
  // ── Editorial contract ─────────────────────────────────────
  "contract.wordCountMin",
  "contract.wordCountMax",
  "contract.introWordsMin",
  "contract.introWordsMax",
  "contract.metaTitleMax",
  "contract.metaDescriptionMax",
  "contract.listSectionsMin",
  "contract.listSectionsMax",
  "contract.maxSources",
  // ── Output ─────────────────────────────────────────────────
  "output.format",
] as const;

/** A legal prompt variable name. */
export type PromptVariable = (typeof PROMPT_VARIABLES)[number];

/** The concrete context object passed to the renderer. */
export type PromptContext = Readonly<Record<PromptVariable, string>>;

const VARIABLE_SET: ReadonlySet<string> = new Set(PROMPT_VARIABLES);

export function isPromptVariable(name: string): name is PromptVariable {
  return VARIABLE_SET.has(name);
}

// ---------------------------------------------------------------------------
// Output format
// ---------------------------------------------------------------------------

/**
 * The JSON object the model must return, with a hint for the first slot of
 * each repeated group and blanks for the rest. Key names come from the
 * parser's slot tables so the two cannot drift apart.
 */
export function describeOutputFormat(contract: EditorialContract): string {
  const format: Record<string, string> = {
    Headline: "Concise headline naming the topic and containing the primary keyword",
    Subtitle: "Optional sub-headline adding context or a fresh angle",
    Teaser: "2-3 sentence hook naming a pain point or benefit",
    Intro: `Opening paragraph (${contract.introWords.min}-${contract.introWords.max} words) framing the problem and previewing the value`,
    "Meta Title": `At most ${contract.metaTitle.max} characters with the primary keyword`,
    "Meta Description": `At most ${contract.metaDescription.max} characters summarising the benefit, with a call to action`,
  };

  SECTION_SLOTS.forEach((keys, i) => {
    format[keys.title] = i === 0 ? "Section heading (H2)" : "";
    format[keys.content] = i === 0 ? "Section HTML, paragraphs wrapped in <p>" : "";
  });
  TAKEAWAY_SLOTS.forEach((key, i) => {
    format[key] = i === 0 ? "One-sentence key insight" : "";
  });
  PAA_SLOTS.forEach((keys, i) => {
    format[keys.question] = i === 0 ? "People also ask question" : "";
    format[keys.answer] = i === 0 ? "Concise answer" : "";
  });
  FAQ_SLOTS.forEach((keys, i) => {
    format[keys.question] = i === 0 ? "FAQ question" : "";
    format[keys.answer] = i === 0 ? "Clear, concise answer" : "";
  });

  format["Sources"] = `[1]: https://... - 8-15 word note, one per line, at most ${contract.sources.max}`;
  format["Search Queries"] = "Q1: keyword phrase, one per line";

  return JSON.stringify(format, null, 2);
}

// ---------------------------------------------------------------------------
// Builder
// ---------------------------------------------------------------------------

/**
 * Build the prompt context for one article. Optional inputs that are
 * empty become "" so `{{#if …}}` blocks can test them.
 */
export function buildPromptContext(
  input: Readonly<ArticleInput>,
  contract: Readonly<EditorialContract>
): PromptContext {
  const ctx: Record<PromptVariable, string> = {
    "input.primaryKeyword": input.primaryKeyword,
    "input.companyName": input.companyName,
    "input.companyUrl": input.companyUrl,
    "input.companyInfo": JSON.stringify(input.companyInfo),
    "input.language": input.language,
    "input.location": input.companyLocation,
    "input.competitors": input.competitors.join(", "),
    "input.links": input.links.join(", "),
    "input.instruction": input.instruction.trim(),

    "contract.wordCountMin": String(contract.wordCount.min),
    "contract.wordCountMax": String(contract.wordCount.max),
    "contract.introWordsMin": String(contract.introWords.min),
    "contract.introWordsMax": String(contract.introWords.max),
    "contract.metaTitleMax": String(contract.metaTitle.max),
    "contract.metaDescriptionMax": String(contract.metaDescription.max),
    "contract.listSectionsMin": String(contract.listSections.min),
    "contract.listSectionsMax": String(contract.listSections.max),
    "contract.maxSources": String(contract.sources.max),

    "output.format": describeOutputFormat(contract),
  };

  return Object.freeze(ctx);
}
