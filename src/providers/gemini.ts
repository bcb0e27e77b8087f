/**
 * Gemini-backed providers.
 *
 * Generation uses a plain model call. Search asks a grounded model about
 * the query and returns the web pages it cited; those URIs are usually
 * redirect links that the URL validator unwraps.
 */

import { GoogleGenAI, type GenerateContentParameters } from "@google/genai";
import { silentLogger, type Logger } from "../logging/index.js";
import type { GenerationOptions, GenerationProvider, SearchProvider, SearchResult } from "./types.js";

/** The part of a generateContent response the providers read. */
export interface GroundedResponse {
  readonly text?: string | undefined;
  readonly candidates?: readonly {
    groundingMetadata?: {
      groundingChunks?: readonly { web?: { uri?: string; title?: string } }[];
    };
  }[];
}

/** `GoogleGenAI#models`, narrowed to the one call the providers make. */
export interface GeminiModels {
  generateContent(params: GenerateContentParameters): Promise<GroundedResponse>;
}

export interface GeminiProviderOptions {
  apiKey: string;
  model: string;
  logger?: Logger;
  /** Defaults to a client built from `apiKey` */
  models?: GeminiModels;
}

export class ProviderError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "ProviderError";
  }
}

const SEARCH_TEMPERATURE = 1.0;
const SEARCH_MAX_TOKENS = 2048;
const SEARCH_INSTRUCTION =
  "Find authoritative web pages (studies, official bodies, industry associations, " +
  "established publications) for the query. Avoid vendor pages selling competing products.";

function modelsFor(options: GeminiProviderOptions): GeminiModels {
  return options.models ?? new GoogleGenAI({ apiKey: options.apiKey }).models;
}

/**
 * Web pages a grounded answer was based on, deduplicated by URI.
 */
export function groundingSources(response: GroundedResponse): SearchResult[] {
  const chunks = response.candidates?.[0]?.groundingMetadata?.groundingChunks ?? [];
  const seen = new Set<string>();
  const sources: SearchResult[] = [];
  for (const chunk of chunks) {
    const uri = chunk.web?.uri;
    if (!uri || seen.has(uri)) {
      continue;
    }
    seen.add(uri);
    sources.push({ uri, title: chunk.web?.title ?? "" });
  }
  return sources;
}

export function createGeminiGenerationProvider(options: GeminiProviderOptions): GenerationProvider {
  const logger = options.logger ?? silentLogger;
  const models = modelsFor(options);

  return {
    async generate(prompt: string, generation: GenerationOptions): Promise<string> {
      const started = Date.now();
      let text: string;
      try {
        const response = await models.generateContent({
          model: options.model,
          contents: prompt,
          config: {
            temperature: generation.temperature,
            maxOutputTokens: generation.maxOutputTokens,
          },
        });
        text = response.text ?? "";
      } catch (err) {
        throw new ProviderError(
          `Gemini request to ${options.model} failed: ${err instanceof Error ? err.message : String(err)}`,
          { cause: err }
        );
      }

      if (text.trim() === "") {
        throw new ProviderError(`Gemini model ${options.model} returned an empty response`);
      }

      logger.info("Model response received", {
        model: options.model,
        chars: text.length,
        ms: Date.now() - started,
      });
      return text;
    },
  };
}

export function createGeminiSearchProvider(options: GeminiProviderOptions): SearchProvider {
  const logger = options.logger ?? silentLogger;
  const models = modelsFor(options);

  return {
    async search(query: string): Promise<SearchResult[]> {
      try {
        const response = await models.generateContent({
          model: options.model,
          contents: query,
          config: {
            tools: [{ googleSearch: {} }],
            systemInstruction: SEARCH_INSTRUCTION,
            temperature: SEARCH_TEMPERATURE,
            maxOutputTokens: SEARCH_MAX_TOKENS,
          },
        });
        const sources = groundingSources(response);
        logger.debug("Grounded search", { query, results: sources.length });
        return sources;
      } catch (err) {
        throw new ProviderError(
          `Grounded search for "${query}" failed: ${err instanceof Error ? err.message : String(err)}`,
          { cause: err }
        );
      }
    },
  };
}
