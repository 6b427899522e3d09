import type { AppConfig } from "./config.js";
import { ArticleSummarizer, PublicationTypeClassifier } from "./classify/index.js";
import { DigestGenerator } from "./digest/index.js";
import { createFeedParser } from "./feeds/index.js";
import { AnthropicCompletionClient } from "./llm/index.js";
import { DigestMailer, createSmtpTransport } from "./mailer/index.js";
import { PubMedClient } from "./pubmed/index.js";
import { RecipientDirectory } from "./recipients/index.js";

export function createDigestGenerator(config: AppConfig): DigestGenerator {
  const llm = new AnthropicCompletionClient({
    apiKey: config.anthropic.apiKey,
    model: config.anthropic.model,
    timeoutMs: config.requestTimeoutMs,
  });

  const pubmed = new PubMedClient({
    apiKey: config.ncbi.apiKey,
    minIntervalMs: config.ncbi.minIntervalMs,
    timeoutMs: config.requestTimeoutMs,
  });

  const recipients = new RecipientDirectory({
    apiKey: config.airtable.apiKey,
    baseId: config.airtable.baseId,
    tableName: config.airtable.tableName,
    timeoutMs: config.requestTimeoutMs,
  });

  const mailer = new DigestMailer(
    createSmtpTransport({
      host: config.smtp.host,
      port: config.smtp.port,
      user: config.smtp.user,
      password: config.smtp.password,
      timeoutMs: config.requestTimeoutMs,
    }),
    config.smtp.user
  );

  return new DigestGenerator(
    {
      feedParser: createFeedParser(config.requestTimeoutMs),
      pubmed,
      classifier: new PublicationTypeClassifier(llm),
      summarizer: new ArticleSummarizer(llm),
      recipients,
      mailer,
    },
    {
      feeds: config.feeds,
      maxEntriesPerFeed: config.maxEntriesPerFeed,
      concurrency: config.concurrency,
      subject: config.digest.subject,
      title: config.digest.title,
    }
  );
}
