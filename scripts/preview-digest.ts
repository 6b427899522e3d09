/**
 * Build this month's digest and write it to disk instead of emailing it.
 *
 * Usage: npx tsx scripts/preview-digest.ts [output.html]
 */

import "dotenv/config";
import { writeFile } from "fs/promises";
import path from "path";
import { loadConfig } from "../src/config.js";
import { createDigestGenerator } from "../src/services.js";

async function main(): Promise<void> {
  const outputPath = path.resolve(process.argv[2] || "digest-preview.html");

  const config = loadConfig();
  const generator = createDigestGenerator(config);

  console.log("Collecting articles (no email will be sent)...\n");
  const digest = await generator.generateDigest();

  if (!digest) {
    console.log("Nothing to preview.");
    return;
  }

  await writeFile(outputPath, digest.html, "utf8");
  console.log(`\n${digest.entryCount} articles written to ${outputPath}`);
  console.log(`Subject: ${digest.subject}`);
}

main().catch((error) => {
  console.error("Preview failed:", error);
  process.exitCode = 1;
});
