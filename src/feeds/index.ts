export { DEFAULT_FEED_SOURCES, type FeedSource } from "./sources.js";
export {
  createFeedParser,
  fetchFeedEntries,
  fetchAllFeeds,
  DEFAULT_ENTRY_LIMIT,
  type FeedEntry,
  type FeedParser,
} from "./reader.js";
