/**
 * Model and search providers.
 */

export type {
  GenerationOptions,
  GenerationProvider,
  SearchProvider,
  SearchResult,
} from "./types.js";
export {
  ProviderError,
  createGeminiGenerationProvider,
  createGeminiSearchProvider,
  groundingSources,
  type GeminiProviderOptions,
  type GeminiModels,
  type GroundedResponse,
} from "./gemini.js";
