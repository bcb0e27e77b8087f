/**
 * Shared domain types.
 */

export * from "./article.js";
