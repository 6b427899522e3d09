import pLimit from "p-limit";
import type { PublicationTypeClassifier, ArticleSummarizer } from "../classify/index.js";
import { fetchAllFeeds, type FeedEntry, type FeedParser, type FeedSource } from "../feeds/index.js";
import { isRelevant } from "../filter/index.js";
import type { DigestMailer } from "../mailer/index.js";
import type { PubMedClient } from "../pubmed/index.js";
import type { RecipientDirectory } from "../recipients/index.js";
import { renderDigestHtml } from "./renderer.js";
import type { Digest, DigestEntry } from "./types.js";

export interface DigestConfig {
  feeds: FeedSource[];
  maxEntriesPerFeed: number;
  concurrency: number;
  subject: string;
  title: string;
}

export interface DigestServices {
  feedParser: FeedParser;
  pubmed: Pick<PubMedClient, "searchPmid" | "fetchMetadata">;
  classifier: Pick<PublicationTypeClassifier, "classify">;
  summarizer: Pick<ArticleSummarizer, "summarize">;
  recipients: Pick<RecipientDirectory, "loadRecipients">;
  mailer: Pick<DigestMailer, "send">;
}

export interface DigestRunResult {
  sent: boolean;
  entryCount: number;
  recipientCount: number;
}

export class DigestGenerator {
  constructor(
    private readonly services: DigestServices,
    private readonly config: DigestConfig
  ) {}

  /**
   * Enrich one feed entry. Returns null when the entry has no title, is
   * filtered out, has no PubMed match, or the record carries no abstract.
   */
  async processEntry(feedEntry: FeedEntry): Promise<DigestEntry | null> {
    const { journal, title, description } = feedEntry;

    if (!feedEntry.hasTitle) {
      console.log(`Skipping untitled entry from ${journal}`);
      return null;
    }

    if (feedEntry.source.applyRelevanceFilter && !isRelevant(title, description)) {
      console.log(`Skipping off-topic entry: ${title}`);
      return null;
    }

    const pmid = await this.services.pubmed.searchPmid(title, journal);
    if (!pmid) {
      console.log(`No PubMed match: ${title}`);
      return null;
    }

    const metadata = await this.services.pubmed.fetchMetadata(pmid);
    if (!metadata) {
      console.log(`No metadata for PMID ${pmid}: ${title}`);
      return null;
    }

    const publicationType = await this.services.classifier.classify(metadata.abstract);
    const summaryHtml = await this.services.summarizer.summarize(metadata.abstract, {
      firstAuthor: metadata.firstAuthor,
      lastAuthor: metadata.lastAuthor,
    });

    return {
      article: {
        journal,
        title,
        pmid,
        firstAuthor: metadata.firstAuthor,
        lastAuthor: metadata.lastAuthor,
      },
      publicationType,
      summaryHtml,
    };
  }

  async collectEntries(): Promise<DigestEntry[]> {
    const feedEntries = await fetchAllFeeds(
      this.services.feedParser,
      this.config.feeds,
      this.config.maxEntriesPerFeed
    );
    console.log(`Processing ${feedEntries.length} feed entries...`);

    const limit = pLimit(Math.max(1, this.config.concurrency));
    // Promise.all keeps results in feed order whatever order they finish in
    const results = await Promise.all(
      feedEntries.map((feedEntry) => limit(() => this.processEntry(feedEntry)))
    );

    return results.filter((entry): entry is DigestEntry => entry !== null);
  }

  async generateDigest(generatedAt: Date = new Date()): Promise<Digest | null> {
    const entries = await this.collectEntries();

    if (entries.length === 0) {
      console.log("No articles with abstracts found.");
      return null;
    }

    return {
      subject: this.config.subject,
      html: renderDigestHtml(entries, { title: this.config.title, generatedAt }),
      entryCount: entries.length,
      generatedAt: generatedAt.toISOString(),
    };
  }

  async run(): Promise<DigestRunResult> {
    // Recipient list errors abort the run before any feed is read
    const recipients = await this.services.recipients.loadRecipients();
    console.log(`Loaded ${recipients.length} recipients`);

    const digest = await this.generateDigest();
    if (!digest) {
      return { sent: false, entryCount: 0, recipientCount: recipients.length };
    }

    await this.services.mailer.send(digest.subject, digest.html, recipients);

    return { sent: true, entryCount: digest.entryCount, recipientCount: recipients.length };
  }
}
