import type { VercelRequest } from "@vercel/node";
import { cronConfig, loadConfig, type AppConfig } from "../../src/config.js";
import type { DigestGenerator } from "../../src/digest/index.js";
import { createDigestGenerator } from "../../src/services.js";

export interface Services {
  digestGenerator: DigestGenerator;
  config: AppConfig;
}

export function verifyCronSecret(req: VercelRequest): boolean {
  const authHeader = req.headers.authorization;
  const cronSecret = process.env.CRON_SECRET;

  // In development, allow requests without secret
  if (!cronSecret) {
    return true;
  }

  return authHeader === `Bearer ${cronSecret}`;
}

export function initServices(): Services {
  // Fresh per invocation: recipients and feeds are read anew on every run
  const config = cronConfig(loadConfig());
  return {
    digestGenerator: createDigestGenerator(config),
    config,
  };
}
