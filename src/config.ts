import { DEFAULT_FEED_SOURCES, type FeedSource } from "./feeds/index.js";

export interface AppConfig {
  feeds: FeedSource[];
  maxEntriesPerFeed: number;
  concurrency: number;
  // Used instead of `concurrency` when running inside the time-limited cron function
  cronConcurrency: number;
  requestTimeoutMs: number;
  anthropic: {
    apiKey: string;
    model: string;
  };
  ncbi: {
    apiKey?: string;
    minIntervalMs: number;
  };
  airtable: {
    apiKey: string;
    baseId: string;
    tableName: string;
  };
  smtp: {
    host: string;
    port: number;
    user: string;
    password: string;
  };
  digest: {
    subject: string;
    title: string;
  };
}

type RequiredEnvKey =
  | "ANTHROPIC_API_KEY"
  | "EMAIL_USER"
  | "EMAIL_PASSWORD"
  | "AIRTABLE_API_KEY"
  | "AIRTABLE_BASE_ID";

export type RequiredEnv = Record<RequiredEnvKey, string>;

/**
 * Read every required variable, throwing once with all of the missing
 * (unset or empty) keys.
 */
export function readRequiredEnv(env: NodeJS.ProcessEnv): RequiredEnv {
  const missing: RequiredEnvKey[] = [];
  const read = (key: RequiredEnvKey): string => {
    const value = env[key];
    if (!value) {
      missing.push(key);
      return "";
    }
    return value;
  };

  const required: RequiredEnv = {
    ANTHROPIC_API_KEY: read("ANTHROPIC_API_KEY"),
    EMAIL_USER: read("EMAIL_USER"),
    EMAIL_PASSWORD: read("EMAIL_PASSWORD"),
    AIRTABLE_API_KEY: read("AIRTABLE_API_KEY"),
    AIRTABLE_BASE_ID: read("AIRTABLE_BASE_ID"),
  };

  if (missing.length > 0) {
    throw new Error(`Missing required environment variables: ${missing.join(", ")}`);
  }

  return required;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const required = readRequiredEnv(env);

  return {
    feeds: DEFAULT_FEED_SOURCES,
    maxEntriesPerFeed: parsePositiveInt(env.MAX_ENTRIES_PER_FEED, 15),
    concurrency: parsePositiveInt(env.CONCURRENCY, 1),
    cronConcurrency: parsePositiveInt(env.CRON_CONCURRENCY, 4),
    requestTimeoutMs: parsePositiveInt(env.REQUEST_TIMEOUT_MS, 30_000),
    anthropic: {
      apiKey: required.ANTHROPIC_API_KEY,
      model: env.ANTHROPIC_MODEL || "claude-sonnet-4-5",
    },
    ncbi: {
      apiKey: env.NCBI_API_KEY || undefined,
      minIntervalMs: parsePositiveInt(env.NCBI_MIN_INTERVAL_MS, 340),
    },
    airtable: {
      apiKey: required.AIRTABLE_API_KEY,
      baseId: required.AIRTABLE_BASE_ID,
      tableName: env.AIRTABLE_TABLE_NAME || "recipients",
    },
    smtp: {
      host: env.SMTP_HOST || "smtp.gmail.com",
      port: parsePositiveInt(env.SMTP_PORT, 465),
      user: required.EMAIL_USER,
      password: required.EMAIL_PASSWORD,
    },
    digest: {
      subject: env.DIGEST_SUBJECT || "Monthly Pain Journal Update",
      title: env.DIGEST_TITLE || "Pain Journal Update",
    },
  };
}

export function parsePositiveInt(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) return fallback;
  return Math.floor(parsed);
}

/**
 * Config for the serverless cron run, which must finish inside the
 * function's duration limit.
 */
export function cronConfig(config: AppConfig): AppConfig {
  return { ...config, concurrency: config.cronConcurrency };
}
