/**
 * Article input schema.
 *
 * The wire format uses snake_case keys (the format callers already send);
 * parsing yields the camelCase ArticleInput used everywhere else.
 *
 * Example:
 *   {
 *     "primary_keyword": "cold storage logistics",
 *     "company_url": "https://acme.example",
 *     "company_name": "Acme Cooling",
 *     "company_location": "Germany",
 *     "company_language": "de",
 *     "company_competitors": ["rival.example"],
 *     "links": ["/services/cold-chain", "/contact"]
 *   }
 */

import { z } from "zod";

const requiredText = (field: string) =>
  z
    .string({ required_error: `${field} is required` })
    .trim()
    .min(1, `${field} must not be blank`);

export const ArticleInputWireSchema = z
  .object({
    primary_keyword: requiredText("primary_keyword"),
    company_url: requiredText("company_url").url("company_url must be an absolute URL"),
    company_name: requiredText("company_name"),
    company_location: requiredText("company_location"),
    company_language: z
      .string()
      .trim()
      .min(2, "company_language must be a language code such as en or de")
      .default("en"),
    company_competitors: z.array(z.string().trim().min(1)).default([]),
    company_info: z.record(z.unknown()).default({}),
    content_generation_instruction: z.string().default(""),
    links: z.array(z.string().trim().min(1)).default([]),
  });

export type ArticleInputWire = z.input<typeof ArticleInputWireSchema>;

export const ArticleInputSchema = ArticleInputWireSchema.transform((wire) => ({
  primaryKeyword: wire.primary_keyword,
  companyUrl: wire.company_url,
  companyName: wire.company_name,
  companyLocation: wire.company_location,
  language: wire.company_language.toLowerCase(),
  competitors: wire.company_competitors,
  companyInfo: wire.company_info,
  instruction: wire.content_generation_instruction,
  links: wire.links,
}));

export type ArticleInput = z.output<typeof ArticleInputSchema>;
