const AIRTABLE_API_URL = "https://api.airtable.com/v0";

export interface AirtableConfig {
  apiKey: string;
  baseId: string;
  tableName: string;
  timeoutMs: number;
  baseUrl?: string;
}

interface AirtablePage {
  emails: string[];
  offset: string | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Pull the "Email" column out of one page of Airtable list-records output.
 * Blank and non-string values are skipped.
 */
export function parseRecipientPage(body: unknown): AirtablePage {
  if (!isRecord(body) || !Array.isArray(body.records)) {
    throw new Error("Unexpected Airtable response: missing records");
  }

  const emails: string[] = [];
  for (const record of body.records) {
    const fields = isRecord(record) ? record.fields : undefined;
    const email = isRecord(fields) ? fields.Email : undefined;
    if (typeof email === "string" && email.trim()) {
      emails.push(email.trim());
    }
  }

  const offset = typeof body.offset === "string" && body.offset ? body.offset : null;
  return { emails, offset };
}

/**
 * Read-only view of the distribution list kept in an Airtable table.
 */
export class RecipientDirectory {
  private readonly baseUrl: string;

  constructor(private readonly config: AirtableConfig) {
    this.baseUrl = config.baseUrl ?? AIRTABLE_API_URL;
  }

  private async fetchPage(offset: string | null): Promise<AirtablePage> {
    const params = new URLSearchParams({ "fields[]": "Email" });
    if (offset) {
      params.set("offset", offset);
    }

    const url = `${this.baseUrl}/${encodeURIComponent(this.config.baseId)}/${encodeURIComponent(this.config.tableName)}?${params.toString()}`;
    const response = await fetch(url, {
      headers: {
        Authorization: `Bearer ${this.config.apiKey}`,
      },
      signal: AbortSignal.timeout(this.config.timeoutMs),
    });

    if (!response.ok) {
      const text = await response.text();
      throw new Error(`Airtable request failed: ${response.status} ${text}`);
    }

    const body: unknown = await response.json();
    return parseRecipientPage(body);
  }

  async loadRecipients(): Promise<string[]> {
    const recipients: string[] = [];
    let offset: string | null = null;

    do {
      const page: AirtablePage = await this.fetchPage(offset);
      recipients.push(...page.emails);
      offset = page.offset;
    } while (offset);

    return recipients;
  }
}
