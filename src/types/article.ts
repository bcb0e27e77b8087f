/**
 * Article definitions.
 * An Article is the unit the pipeline generates, validates and repairs.
 */

export interface Section {
  readonly title: string;
  /** HTML body */
  readonly content: string;
}

export interface FaqItem {
  readonly question: string;
  readonly answer: string;
}

/** "People also ask" entry. */
export interface PaaItem {
  readonly question: string;
  readonly answer: string;
}

export interface Source {
  readonly url: string;
  readonly title: string;
  /** 1-based citation number, referenced in the body as `[index]` */
  readonly index: number;
}

export interface Article {
  readonly headline: string;
  readonly subtitle?: string;
  readonly teaser: string;
  /** HTML */
  readonly intro: string;
  readonly metaTitle: string;
  readonly metaDescription: string;
  readonly sections: readonly Section[];
  readonly keyTakeaways: readonly string[];
  readonly faq: readonly FaqItem[];
  readonly paa: readonly PaaItem[];
  readonly sources: readonly Source[];
  readonly searchQueries: readonly string[];
  /** Minutes */
  readonly readTime: number;
  /** DD.MM.YYYY */
  readonly date: string;
  /** Rendered source list */
  readonly literature: string;
  /** Full HTML page */
  readonly html?: string;
}
