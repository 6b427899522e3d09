import type { VercelRequest, VercelResponse } from "@vercel/node";
import { initServices, verifyCronSecret } from "../lib/init.js";

export const config = {
  maxDuration: 800,
};

export default async function handler(
  req: VercelRequest,
  res: VercelResponse
): Promise<void> {
  // Only allow GET requests
  if (req.method !== "GET") {
    res.status(405).json({ error: "Method not allowed" });
    return;
  }

  if (!verifyCronSecret(req)) {
    res.status(401).json({ error: "Unauthorized" });
    return;
  }

  try {
    console.log("Digest cron triggered");
    const { digestGenerator } = initServices();
    const result = await digestGenerator.run();

    res.status(200).json({
      success: true,
      sent: result.sent,
      articleCount: result.entryCount,
      recipientCount: result.recipientCount,
      message: result.sent ? undefined : "No articles with abstracts found",
    });
  } catch (error) {
    console.error("Digest cron error:", error);
    res.status(500).json({
      error: error instanceof Error ? error.message : "Unknown error",
    });
  }
}
