import type { CompletionClient } from "../llm/index.js";
import {
  DEFAULT_PUBLICATION_TYPE,
  PUBLICATION_TYPES,
  type PublicationType,
} from "./publication-types.js";

export function buildClassificationPrompt(abstract: string): string {
  return `You are an expert in medical research classification.

Based on the following abstract, classify the publication type into ONE of these categories:
${PUBLICATION_TYPES.map((type) => `- ${type}`).join("\n")}

Return ONLY the classification as a single term with no explanation or additional text.

Abstract:
${abstract}
`;
}

/**
 * Map a raw model answer onto a known label. The first label, in
 * enumeration order, that appears anywhere in the answer wins.
 */
export function normalizePublicationType(raw: string): PublicationType {
  const answer = raw.toLowerCase();
  for (const type of PUBLICATION_TYPES) {
    if (answer.includes(type.toLowerCase())) {
      return type;
    }
  }
  return DEFAULT_PUBLICATION_TYPE;
}

export class PublicationTypeClassifier {
  constructor(private readonly llm: CompletionClient) {}

  async classify(abstract: string): Promise<PublicationType> {
    try {
      const answer = await this.llm.complete(buildClassificationPrompt(abstract), {
        maxTokens: 50,
      });
      return normalizePublicationType(answer);
    } catch (error) {
      console.error("Error determining publication type:", error);
      return DEFAULT_PUBLICATION_TYPE;
    }
  }
}
