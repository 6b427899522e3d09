import type { CompletionClient } from "../llm/index.js";
import { escapeHtml } from "../digest/html.js";

const HEADING_STYLE = "font-weight: bold; color: #333; margin-top: 12px; margin-bottom: 6px;";
const UNDERLINE_STYLE = "width: 60px; height: 2px; background-color: #2e8b57; margin-top: 3px;";

function styledHeading(label: string): string {
  return `<div style="${HEADING_STYLE}">${label}<div style="${UNDERLINE_STYLE}"></div></div>`;
}

export interface SummaryAuthors {
  firstAuthor: string | null;
  lastAuthor: string | null;
}

export function buildSummaryPrompt(abstract: string, authors: SummaryAuthors): string {
  const authorLine = [authors.firstAuthor, authors.lastAuthor].filter(Boolean).join(", ");

  return `You are an expert scientific assistant.

Given this abstract, generate:
1. A section that summarizes the core findings in formal academic language
2. A section that explains why the study is important and how it relates to previous pain medicine and spine research literature

Format your response so that:
- The first section begins with "Summary" (no colon)
- The second section begins with "Context" (no colon)
- Both headings should be in a formal style that a medical journal would use
- Use a concise, authoritative tone throughout

Do NOT use any asterisks or special formatting characters in your response.
${authorLine ? `\nAuthors: ${authorLine}\n` : ""}
Abstract:
${abstract}
`;
}

/**
 * Escape the model text and swap every literal "Summary"/"Context" for a
 * styled heading block. Line breaks are left for the renderer.
 */
export function formatSummaryHtml(text: string): string {
  return escapeHtml(text)
    .replaceAll("Summary", styledHeading("Summary"))
    .replaceAll("Context", styledHeading("Context"));
}

export class ArticleSummarizer {
  constructor(private readonly llm: CompletionClient) {}

  async summarize(abstract: string, authors: SummaryAuthors): Promise<string> {
    try {
      const text = await this.llm.complete(buildSummaryPrompt(abstract, authors), {
        maxTokens: 1024,
      });
      return formatSummaryHtml(text);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error("Error generating summary and context:", error);
      return escapeHtml(`Error generating summary and context: ${message}`);
    }
  }
}
