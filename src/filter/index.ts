export { isRelevant, INCLUSION_KEYWORDS, EXCLUSION_KEYWORDS } from "./relevance.js";
