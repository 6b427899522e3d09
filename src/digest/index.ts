export {
  DigestGenerator,
  type DigestConfig,
  type DigestServices,
  type DigestRunResult,
} from "./generator.js";
export {
  renderDigestHtml,
  groupByJournal,
  authorLine,
  PUBMED_ARTICLE_URL,
  type RenderOptions,
  type JournalGroup,
  type IndexedEntry,
  type AuthorLine,
} from "./renderer.js";
export type { Article, Digest, DigestEntry } from "./types.js";
