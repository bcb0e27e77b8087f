/**
 * Provider interfaces.
 *
 * The generator talks to the language model and to grounded search only
 * through these two interfaces.
 */

export interface GenerationOptions {
  temperature: number;
  maxOutputTokens: number;
}

export interface GenerationProvider {
  /**
   * Generate text for a prompt.
   * Rejects on any provider failure (auth, quota, network, empty answer).
   */
  generate(prompt: string, options: GenerationOptions): Promise<string>;
}

export interface SearchResult {
  readonly title: string;
  readonly uri: string;
}

export interface SearchProvider {
  /** Web results for a query, best first; may be empty. */
  search(query: string): Promise<SearchResult[]>;
}
