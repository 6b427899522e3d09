export {
  PublicationTypeClassifier,
  buildClassificationPrompt,
  normalizePublicationType,
} from "./classifier.js";
export {
  ArticleSummarizer,
  buildSummaryPrompt,
  formatSummaryHtml,
  type SummaryAuthors,
} from "./summarizer.js";
export {
  PUBLICATION_TYPES,
  PUBLICATION_TYPE_COLORS,
  DEFAULT_PUBLICATION_TYPE,
  publicationTypeColor,
  type PublicationType,
} from "./publication-types.js";
