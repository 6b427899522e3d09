import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { CompletionClient } from "../../llm/index.js";
import { ArticleSummarizer, buildSummaryPrompt, formatSummaryHtml } from "../summarizer.js";

const SUMMARY_HEADING =
  '<div style="font-weight: bold; color: #333; margin-top: 12px; margin-bottom: 6px;">Summary<div style="width: 60px; height: 2px; background-color: #2e8b57; margin-top: 3px;"></div></div>';
const CONTEXT_HEADING =
  '<div style="font-weight: bold; color: #333; margin-top: 12px; margin-bottom: 6px;">Context<div style="width: 60px; height: 2px; background-color: #2e8b57; margin-top: 3px;"></div></div>';

function createLlm(answer: string | Error) {
  const complete = vi.fn(async (_prompt: string) => {
    if (answer instanceof Error) throw answer;
    return answer;
  });
  const llm: CompletionClient = { complete };
  return { llm, complete };
}

describe("formatSummaryHtml", () => {
  it("replaces both headings with styled blocks", () => {
    expect(formatSummaryHtml("Summary\nPain fell.\n\nContext\nIt matters.")).toBe(
      `${SUMMARY_HEADING}\nPain fell.\n\n${CONTEXT_HEADING}\nIt matters.`
    );
  });

  it("escapes markup in the model text", () => {
    expect(formatSummaryHtml("Scores < 3 & stable")).toBe("Scores &lt; 3 &amp; stable");
  });
});

describe("buildSummaryPrompt", () => {
  it("names both sections and passes the authors along", () => {
    const prompt = buildSummaryPrompt("Back pain is common.", {
      firstAuthor: "Rivera A",
      lastAuthor: "Okafor CJ",
    });
    expect(prompt).toContain('The first section begins with "Summary" (no colon)');
    expect(prompt).toContain('The second section begins with "Context" (no colon)');
    expect(prompt).toContain("Do NOT use any asterisks");
    expect(prompt).toContain("Authors: Rivera A, Okafor CJ");
    expect(prompt).toContain("Abstract:\nBack pain is common.");
  });

  it("omits the author line when no authors are known", () => {
    const prompt = buildSummaryPrompt("Back pain is common.", { firstAuthor: null, lastAuthor: null });
    expect(prompt).not.toContain("Authors:");
  });
});

describe("ArticleSummarizer", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns the formatted summary", async () => {
    const { llm } = createLlm("Summary\nPain fell.");
    const summarizer = new ArticleSummarizer(llm);

    const html = await summarizer.summarize("Back pain is common.", {
      firstAuthor: "Rivera A",
      lastAuthor: null,
    });

    expect(html).toBe(`${SUMMARY_HEADING}\nPain fell.`);
  });

  it("returns an inline error message when the call fails", async () => {
    const { llm } = createLlm(new Error("rate limited"));
    const summarizer = new ArticleSummarizer(llm);

    const html = await summarizer.summarize("Back pain is common.", {
      firstAuthor: null,
      lastAuthor: null,
    });

    expect(html).toBe("Error generating summary and context: rate limited");
  });
});
