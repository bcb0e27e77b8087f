/**
 * Library entry point.
 *
 * ```typescript
 * const generator = new ArticleGenerator({
 *   generation: createGeminiGenerationProvider({ apiKey, model: "gemini-2.5-pro" }),
 *   search: createGeminiSearchProvider({ apiKey, model: "gemini-2.5-flash" }),
 *   http: createAxiosHttpClient(),
 * });
 * const article = await generator.generate(loadArticleInputFrom("input.json"));
 * ```
 */

export * from "./config/index.js";
export * from "./logging/index.js";
export * from "./types/index.js";
export * from "./input/index.js";
export * from "./standards/index.js";
export * from "./sources/index.js";
export * from "./content/index.js";
export * from "./quality/index.js";
export * from "./prompts/index.js";
export * from "./providers/index.js";
export * from "./generator/index.js";
