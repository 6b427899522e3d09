export interface ArticleMetadata {
  abstract: string;
  firstAuthor: string | null;
  lastAuthor: string | null;
}

export interface PubMedClientConfig {
  apiKey?: string;
  // Minimum spacing between any two E-utilities requests
  minIntervalMs: number;
  timeoutMs: number;
  baseUrl?: string;
}
