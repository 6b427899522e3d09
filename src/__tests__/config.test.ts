import { describe, it, expect } from "vitest";
import { cronConfig, loadConfig, parsePositiveInt } from "../config.js";
import { DEFAULT_FEED_SOURCES } from "../feeds/index.js";

const REQUIRED = {
  ANTHROPIC_API_KEY: "test-anthropic-key",
  EMAIL_USER: "digest@example.com",
  EMAIL_PASSWORD: "test-password",
  AIRTABLE_API_KEY: "test-airtable-key",
  AIRTABLE_BASE_ID: "appTestBase",
};

describe("loadConfig", () => {
  it("lists every missing required variable", () => {
    expect(() => loadConfig({ EMAIL_USER: "digest@example.com" })).toThrow(
      "Missing required environment variables: ANTHROPIC_API_KEY, EMAIL_PASSWORD, AIRTABLE_API_KEY, AIRTABLE_BASE_ID"
    );
  });

  it("treats an empty required variable as missing", () => {
    expect(() => loadConfig({ ...REQUIRED, EMAIL_PASSWORD: "" })).toThrow(
      "Missing required environment variables: EMAIL_PASSWORD"
    );
  });

  it("applies defaults", () => {
    const config = loadConfig({ ...REQUIRED });

    expect(config.feeds).toBe(DEFAULT_FEED_SOURCES);
    expect(config.maxEntriesPerFeed).toBe(15);
    expect(config.concurrency).toBe(1);
    expect(config.cronConcurrency).toBe(4);
    expect(config.ncbi).toEqual({ apiKey: undefined, minIntervalMs: 340 });
    expect(config.smtp).toEqual({
      host: "smtp.gmail.com",
      port: 465,
      user: "digest@example.com",
      password: "test-password",
    });
    expect(config.airtable.tableName).toBe("recipients");
    expect(config.digest.subject).toBe("Monthly Pain Journal Update");
  });

  it("reads optional overrides", () => {
    const config = loadConfig({
      ...REQUIRED,
      NCBI_API_KEY: "test-ncbi-key",
      CONCURRENCY: "4",
      ANTHROPIC_MODEL: "claude-haiku-4-5",
      AIRTABLE_TABLE_NAME: "subscribers",
    });

    expect(config.ncbi.apiKey).toBe("test-ncbi-key");
    expect(config.concurrency).toBe(4);
    expect(config.anthropic.model).toBe("claude-haiku-4-5");
    expect(config.airtable.tableName).toBe("subscribers");
  });
});

describe("cronConfig", () => {
  it("runs the cron job with the cron concurrency", () => {
    const config = loadConfig({ ...REQUIRED, CONCURRENCY: "1", CRON_CONCURRENCY: "6" });

    const cron = cronConfig(config);

    expect(cron.concurrency).toBe(6);
    expect(cron.ncbi.minIntervalMs).toBe(340);
    expect(config.concurrency).toBe(1);
  });

  it("uses four workers by default", () => {
    expect(cronConfig(loadConfig({ ...REQUIRED })).concurrency).toBe(4);
  });
});

describe("parsePositiveInt", () => {
  it("falls back for missing, invalid or non-positive values", () => {
    expect(parsePositiveInt(undefined, 15)).toBe(15);
    expect(parsePositiveInt("abc", 15)).toBe(15);
    expect(parsePositiveInt("0", 15)).toBe(15);
    expect(parsePositiveInt("-3", 15)).toBe(15);
  });

  it("floors fractional values", () => {
    expect(parsePositiveInt("2.7", 15)).toBe(2);
  });
});
