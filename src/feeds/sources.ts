export interface FeedSource {
  journal: string;
  url: string;
  // Keyword relevance filter for broad journals; off for the pain-medicine set
  applyRelevanceFilter?: boolean;
}

export const DEFAULT_FEED_SOURCES: FeedSource[] = [
  {
    journal: "Interventional Pain Medicine",
    url: "https://rss.sciencedirect.com/publication/science/27725944",
  },
  {
    journal: "Regional Anesthesia & Pain Medicine",
    url: "https://rapm.bmj.com/rss/current.xml",
  },
  {
    journal: "Pain Medicine",
    url: "https://academic.oup.com/rss/site_5414/3275.xml",
  },
  {
    journal: "Pain Practice",
    url: "https://onlinelibrary.wiley.com/action/showFeed?jc=15332500&type=etoc&feed=rss",
  },
  {
    journal: "Pain",
    url: "https://journals.lww.com/pain/_layouts/15/OAKS.Journals/feed.aspx?FeedType=CurrentIssue",
  },
  {
    journal: "Journal of Pain Research",
    url: "https://www.tandfonline.com/feed/rss/djpr20",
  },
];
