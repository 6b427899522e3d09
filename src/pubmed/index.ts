export {
  PubMedClient,
  parseArticleXml,
  parseSearchResult,
  formatAuthor,
} from "./client.js";
export { RateLimiter, type RateLimiterOptions } from "./rate-limiter.js";
export type { ArticleMetadata, PubMedClientConfig } from "./types.js";
