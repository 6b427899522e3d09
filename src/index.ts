import { config as loadDotenv } from "dotenv";
loadDotenv();

import { loadConfig, type AppConfig } from "./config.js";
import { createDigestGenerator } from "./services.js";

async function main(): Promise<void> {
  console.log("Journal Digest");
  console.log("==============\n");

  let config: AppConfig;
  try {
    config = loadConfig();
    console.log("Configuration validated");
  } catch (error) {
    console.error("Configuration error:", error);
    console.log("\nPlease set the required environment variables.");
    process.exitCode = 1;
    return;
  }

  console.log(`Feeds: ${config.feeds.map((f) => f.journal).join(", ")}`);
  console.log(`Entries per feed: ${config.maxEntriesPerFeed}`);
  console.log(`Concurrency: ${config.concurrency}`);
  console.log(`Model: ${config.anthropic.model}\n`);

  const generator = createDigestGenerator(config);
  const result = await generator.run();

  if (result.sent) {
    console.log(`\nDone: ${result.entryCount} articles sent to ${result.recipientCount} recipients`);
  } else {
    console.log("\nDone: nothing to send");
  }
}

main().catch((error) => {
  console.error("Digest run failed:", error);
  process.exitCode = 1;
});
