import { XMLParser } from "fast-xml-parser";
import { RateLimiter } from "./rate-limiter.js";
import type { ArticleMetadata, PubMedClientConfig } from "./types.js";

const DEFAULT_BASE_URL = "https://eutils.ncbi.nlm.nih.gov/entrez/eutils";

const ARRAY_TAGS = new Set(["PubmedArticle", "AbstractText", "Author"]);

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  textNodeName: "#text",
  parseTagValue: false,
  // AbstractText may carry inline markup (<i>, <sup>); keep it raw and strip it ourselves
  stopNodes: ["*.AbstractText"],
  isArray: (name) => ARRAY_TAGS.has(name),
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asArray(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

function child(value: unknown, key: string): unknown {
  return isRecord(value) ? value[key] : undefined;
}

function textOf(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  if (isRecord(value)) {
    const text = value["#text"];
    if (typeof text === "string" || typeof text === "number") {
      return String(text);
    }
  }
  return "";
}

function decodeEntities(text: string): string {
  return text
    .replace(/&#x([0-9a-f]+);/gi, (_, hex: string) => String.fromCodePoint(parseInt(hex, 16)))
    .replace(/&#(\d+);/g, (_, dec: string) => String.fromCodePoint(parseInt(dec, 10)))
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&amp;/g, "&");
}

function stripMarkup(raw: string): string {
  return decodeEntities(raw.replace(/<[^>]+>/g, "")).replace(/\s+/g, " ").trim();
}

export function formatAuthor(author: unknown): string | null {
  const lastName = textOf(child(author, "LastName")).trim();
  if (!lastName) {
    return null;
  }
  const initials = textOf(child(author, "Initials")).trim();
  return initials ? `${lastName} ${initials}` : lastName;
}

/**
 * Extract abstract and first/last author from an EFetch PubMed XML document.
 * Returns null when the record has no abstract text at all.
 */
export function parseArticleXml(xml: string): ArticleMetadata | null {
  const parsed: unknown = xmlParser.parse(xml);
  const articles = asArray(child(child(parsed, "PubmedArticleSet"), "PubmedArticle"));
  const article = child(child(articles[0], "MedlineCitation"), "Article");

  const sections = asArray(child(child(article, "Abstract"), "AbstractText"))
    .map((section) => stripMarkup(textOf(section)))
    .filter((text) => text.length > 0);

  if (sections.length === 0) {
    return null;
  }

  const authors = asArray(child(child(article, "AuthorList"), "Author"))
    .map(formatAuthor)
    .filter((name): name is string => name !== null);

  return {
    abstract: sections.join(" "),
    firstAuthor: authors.length > 0 ? authors[0] : null,
    // A single author is reported only once
    lastAuthor: authors.length > 1 ? authors[authors.length - 1] : null,
  };
}

export function parseSearchResult(body: unknown): string | null {
  const idList = child(child(body, "esearchresult"), "idlist");
  if (!Array.isArray(idList) || idList.length === 0) {
    return null;
  }
  const first: unknown = idList[0];
  return typeof first === "string" && first ? first : null;
}

export class PubMedClient {
  private readonly baseUrl: string;
  private readonly limiter: Pick<RateLimiter, "acquire">;

  constructor(
    private readonly config: PubMedClientConfig,
    limiter?: Pick<RateLimiter, "acquire">
  ) {
    this.baseUrl = config.baseUrl ?? DEFAULT_BASE_URL;
    this.limiter = limiter ?? new RateLimiter({ minIntervalMs: config.minIntervalMs });
  }

  private async request(endpoint: string, params: Record<string, string>): Promise<Response> {
    const search = new URLSearchParams({ db: "pubmed", ...params });
    if (this.config.apiKey) {
      search.set("api_key", this.config.apiKey);
    }

    await this.limiter.acquire();

    const response = await fetch(`${this.baseUrl}/${endpoint}?${search.toString()}`, {
      signal: AbortSignal.timeout(this.config.timeoutMs),
    });

    if (!response.ok) {
      const text = await response.text();
      throw new Error(`PubMed ${endpoint} failed: ${response.status} ${text}`);
    }

    return response;
  }

  /**
   * Look up a PMID by article title, optionally restricted to a journal.
   *
   * Titles are not unique, so the first hit can belong to a different
   * article with the same title. Failures resolve to null.
   */
  async searchPmid(title: string, journal?: string): Promise<string | null> {
    const term = journal ? `${title} AND ${journal}[journal]` : title;

    try {
      const response = await this.request("esearch.fcgi", { term, retmode: "json" });
      const body: unknown = await response.json();
      return parseSearchResult(body);
    } catch (error) {
      console.warn(`PubMed search failed for "${title}":`, error);
      return null;
    }
  }

  async fetchMetadata(pmid: string | null): Promise<ArticleMetadata | null> {
    if (!pmid) {
      return null;
    }

    try {
      const response = await this.request("efetch.fcgi", { id: pmid, retmode: "xml" });
      return parseArticleXml(await response.text());
    } catch (error) {
      console.error(`Error fetching abstract and authors for PMID ${pmid}:`, error);
      return null;
    }
  }
}
