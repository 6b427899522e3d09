import type { PublicationType } from "../classify/index.js";

export interface Article {
  journal: string;
  title: string;
  pmid: string;
  firstAuthor: string | null;
  lastAuthor: string | null;
}

/**
 * One digest row: the article together with its label and rendered summary.
 */
export interface DigestEntry {
  article: Article;
  publicationType: PublicationType;
  // Already HTML-safe; line breaks still raw
  summaryHtml: string;
}

export interface Digest {
  subject: string;
  html: string;
  entryCount: number;
  generatedAt: string;
}
