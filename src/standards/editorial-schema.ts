/**
 * Editorial contract schema.
 *
 * The editorial contract is the set of measurable thresholds every
 * generated article is checked against after generation: meta tag
 * lengths, word counts, section and list structure, source counts and
 * keyword presence. Every field has a default, so `{}` parses to the
 * standard contract.
 *
 * Meta tags carry a `truncateAt` length used by the fix pass: an over-long
 * value is cut to at most `truncateAt` characters at a word boundary and
 * "..." is appended, so `truncateAt + 3` must not exceed `max`.
 */

import { z } from "zod";

const count = z.number().int().min(0);

/**
 * Inclusive numeric range.
 */
export const RangeSchema = z.object({
  min: count,
  max: count,
});

export type Range = z.infer<typeof RangeSchema>;

/**
 * Character limits for a meta tag.
 */
export const MetaLimitSchema = z
  .object({
    /** Shorter values produce a warning */
    min: count,
    /** Longer values produce a fixable error */
    max: count,
    /** Cut length used by the fix pass, before "..." is appended */
    truncateAt: count,
  })
  .strict();

export type MetaLimit = z.infer<typeof MetaLimitSchema>;

export const SectionRulesSchema = z
  .object({
    /** Fewer sections is an error */
    min: count.default(2),
    /** More sections is a warning */
    max: count.default(9),
    maxTitleLength: count.default(100),
  })
  .strict();

export type SectionRules = z.infer<typeof SectionRulesSchema>;

export const SourceRulesSchema = z
  .object({
    min: count.default(8),
    max: count.default(20),
    minTitleLength: count.default(5),
    maxTitleLength: count.default(200),
    /** More sources than this on one host is a warning */
    maxPerDomain: count.default(3),
  })
  .strict();

export type SourceRules = z.infer<typeof SourceRulesSchema>;

export const EditorialContractSchema = z
  .object({
    metaTitle: MetaLimitSchema.default({ min: 30, max: 55, truncateAt: 52 }),
    metaDescription: MetaLimitSchema.default({ min: 50, max: 130, truncateAt: 127 }),

    /** Words across intro and sections, HTML stripped */
    wordCount: RangeSchema.default({ min: 1200, max: 1800 }),
    introWords: RangeSchema.default({ min: 80, max: 120 }),

    sections: SectionRulesSchema.default({}),
    /** Number of sections containing a <ul> or <ol> */
    listSections: RangeSchema.default({ min: 2, max: 4 }),

    /** Sections longer than this (characters) need an internal link */
    internalLinkMinSectionLength: count.default(200),

    sources: SourceRulesSchema.default({}),

    minKeyTakeaways: count.default(2),
    minFaq: count.default(3),
    minPaa: count.default(2),

    /** Fewer keyword occurrences (but at least one) is a warning */
    minKeywordOccurrences: count.default(3),

    /** Tags whose open and close counts must match */
    balancedTags: z
      .array(z.string().regex(/^[a-z][a-z0-9]*$/))
      .default(["p", "strong", "ul", "ol", "li", "h2", "h3"]),
  })
  .strict();

export type EditorialContract = z.infer<typeof EditorialContractSchema>;
