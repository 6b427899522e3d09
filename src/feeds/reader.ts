import Parser from "rss-parser";
import type { FeedSource } from "./sources.js";

export interface FeedEntry {
  journal: string;
  title: string;
  description: string;
  // False when the feed item had no usable title and "No Title" stands in
  hasTitle: boolean;
  source: FeedSource;
}

export interface FeedParser {
  parseURL(url: string): Promise<{ items: Parser.Item[] }>;
}

export const DEFAULT_ENTRY_LIMIT = 15;
export const NO_TITLE = "No Title";

export function createFeedParser(timeoutMs: number): FeedParser {
  return new Parser({ timeout: timeoutMs });
}

/**
 * Fetch the most recent entries of one feed, in feed order.
 * A feed that fails to download or parse yields no entries.
 */
export async function fetchFeedEntries(
  parser: FeedParser,
  source: FeedSource,
  limit: number = DEFAULT_ENTRY_LIMIT
): Promise<FeedEntry[]> {
  try {
    const feed = await parser.parseURL(source.url);
    return (feed.items || []).slice(0, limit).map((item) => {
      const title = item.title?.trim() || "";
      return {
        journal: source.journal,
        title: title || NO_TITLE,
        description: item.contentSnippet || item.content || "",
        hasTitle: title.length > 0,
        source,
      };
    });
  } catch (error) {
    console.error(`Failed to fetch feed for ${source.journal} (${source.url}):`, error);
    return [];
  }
}

export async function fetchAllFeeds(
  parser: FeedParser,
  sources: FeedSource[],
  limit: number = DEFAULT_ENTRY_LIMIT
): Promise<FeedEntry[]> {
  const entries: FeedEntry[] = [];

  for (const source of sources) {
    const feedEntries = await fetchFeedEntries(parser, source, limit);
    console.log(`${source.journal}: ${feedEntries.length} entries`);
    entries.push(...feedEntries);
  }

  return entries;
}
