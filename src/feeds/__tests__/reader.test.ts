import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type Parser from "rss-parser";
import { NO_TITLE, fetchAllFeeds, fetchFeedEntries, type FeedParser } from "../reader.js";
import type { FeedSource } from "../sources.js";

const PAIN: FeedSource = { journal: "Pain", url: "https://feeds.example.com/pain.xml" };
const PAIN_PRACTICE: FeedSource = { journal: "Pain Practice", url: "https://feeds.example.com/pp.xml" };

function parserFor(feeds: Record<string, Parser.Item[] | Error>) {
  const parseURL = vi.fn(async (url: string) => {
    const items = feeds[url];
    if (items instanceof Error) throw items;
    return { items: items ?? [] };
  });
  const parser: FeedParser = { parseURL };
  return { parser, parseURL };
}

describe("fetchFeedEntries", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("keeps at most the first entries in feed order", async () => {
    const items = Array.from({ length: 20 }, (_, i) => ({ title: `Article ${i + 1}` }));
    const { parser } = parserFor({ [PAIN.url]: items });

    const entries = await fetchFeedEntries(parser, PAIN, 15);

    expect(entries).toHaveLength(15);
    expect(entries[0].title).toBe("Article 1");
    expect(entries[14].title).toBe("Article 15");
  });

  it("tags each entry with its journal", async () => {
    const { parser } = parserFor({ [PAIN.url]: [{ title: "Opioid tapering", contentSnippet: "A cohort." }] });

    expect(await fetchFeedEntries(parser, PAIN)).toEqual([
      { journal: "Pain", title: "Opioid tapering", description: "A cohort.", hasTitle: true, source: PAIN },
    ]);
  });

  it("defaults a missing title and description and flags the entry as untitled", async () => {
    const { parser } = parserFor({ [PAIN.url]: [{ link: "https://example.com/a" }] });

    const [entry] = await fetchFeedEntries(parser, PAIN);

    expect(entry.title).toBe(NO_TITLE);
    expect(entry.hasTitle).toBe(false);
    expect(entry.description).toBe("");
  });

  it("treats a blank title as missing", async () => {
    const { parser } = parserFor({ [PAIN.url]: [{ title: "   " }] });

    const [entry] = await fetchFeedEntries(parser, PAIN);

    expect(entry.title).toBe("No Title");
    expect(entry.hasTitle).toBe(false);
  });

  it("falls back to raw content for the description", async () => {
    const { parser } = parserFor({ [PAIN.url]: [{ title: "T", content: "<p>Raw</p>" }] });

    const [entry] = await fetchFeedEntries(parser, PAIN);

    expect(entry.description).toBe("<p>Raw</p>");
  });

  it("returns no entries when the feed cannot be fetched", async () => {
    const { parser } = parserFor({ [PAIN.url]: new Error("Status code 503") });

    expect(await fetchFeedEntries(parser, PAIN)).toEqual([]);
  });
});

describe("fetchAllFeeds", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("reads feeds one after another and skips failures", async () => {
    const { parser, parseURL } = parserFor({
      [PAIN.url]: new Error("Status code 503"),
      [PAIN_PRACTICE.url]: [{ title: "Sleep and pain" }],
    });

    const entries = await fetchAllFeeds(parser, [PAIN, PAIN_PRACTICE]);

    expect(parseURL.mock.calls.map(([url]) => url)).toEqual([PAIN.url, PAIN_PRACTICE.url]);
    expect(entries.map((e) => `${e.journal}: ${e.title}`)).toEqual(["Pain Practice: Sleep and pain"]);
  });
});
