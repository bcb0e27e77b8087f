/**
 * JSON form of a finished article, using the snake_case names of the
 * input wire format.
 */

import type { Article } from "../types/index.js";

export interface ArticleJson {
  headline: string;
  subtitle: string | null;
  teaser: string;
  intro: string;
  meta_title: string;
  meta_description: string;
  sections: { title: string; content: string }[];
  key_takeaways: string[];
  faq: { question: string; answer: string }[];
  paa: { question: string; answer: string }[];
  sources: { url: string; title: string; index: number }[];
  search_queries: string[];
  read_time: number;
  date: string;
  literature: string;
  html: string | null;
}

export function toArticleJson(article: Article): ArticleJson {
  return {
    headline: article.headline,
    subtitle: article.subtitle ?? null,
    teaser: article.teaser,
    intro: article.intro,
    meta_title: article.metaTitle,
    meta_description: article.metaDescription,
    sections: article.sections.map(({ title, content }) => ({ title, content })),
    key_takeaways: [...article.keyTakeaways],
    faq: article.faq.map(({ question, answer }) => ({ question, answer })),
    paa: article.paa.map(({ question, answer }) => ({ question, answer })),
    sources: article.sources.map(({ url, title, index }) => ({ url, title, index })),
    search_queries: [...article.searchQueries],
    read_time: article.readTime,
    date: article.date,
    literature: article.literature,
    html: article.html ?? null,
  };
}

/** Pretty-printed, two-space indent */
export function serializeArticle(article: Article): string {
  return JSON.stringify(toArticleJson(article), null, 2);
}
