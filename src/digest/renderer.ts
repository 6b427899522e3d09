import { publicationTypeColor } from "../classify/index.js";
import { escapeHtml } from "./html.js";
import type { DigestEntry } from "./types.js";

export const PUBMED_ARTICLE_URL = "https://pubmed.ncbi.nlm.nih.gov";

export interface RenderOptions {
  title: string;
  generatedAt?: Date;
}

export interface IndexedEntry {
  // 1-based position in sorted-journal order
  index: number;
  entry: DigestEntry;
}

export interface JournalGroup {
  journal: string;
  items: IndexedEntry[];
}

export interface AuthorLine {
  label: "Author" | "Authors";
  names: string;
}

/**
 * Group entries by journal (keeping per-journal order), sort the journals
 * alphabetically and number every entry densely in that order.
 */
export function groupByJournal(entries: DigestEntry[]): JournalGroup[] {
  const byJournal = new Map<string, DigestEntry[]>();
  for (const entry of entries) {
    const group = byJournal.get(entry.article.journal);
    if (group) {
      group.push(entry);
    } else {
      byJournal.set(entry.article.journal, [entry]);
    }
  }

  const journals = [...byJournal.keys()].sort();
  let index = 0;

  return journals.map((journal) => ({
    journal,
    items: (byJournal.get(journal) ?? []).map((entry) => {
      index += 1;
      return { index, entry };
    }),
  }));
}

export function authorLine(firstAuthor: string | null, lastAuthor: string | null): AuthorLine | null {
  if (firstAuthor && lastAuthor && firstAuthor !== lastAuthor) {
    return { label: "Authors", names: `${firstAuthor} ... ${lastAuthor}` };
  }
  if (firstAuthor) {
    return { label: "Author", names: firstAuthor };
  }
  return null;
}

function journalAnchor(journal: string): string {
  return `journal_${journal.replace(/ /g, "_")}`;
}

function formatDate(date: Date): string {
  return date.toLocaleDateString("en-US", { year: "numeric", month: "long", day: "numeric" });
}

function renderTocGroup(group: JournalGroup): string {
  const rows = group.items
    .map(({ index, entry }) => {
      const color = publicationTypeColor(entry.publicationType);
      return `
              <tr>
                <td style="padding: 6px 0;">
                  <table cellspacing="0" cellpadding="0" border="0" width="100%">
                    <tr>
                      <td width="30" style="vertical-align: top;">
                        <span style="display: inline-block; width: 24px; height: 24px; line-height: 24px; text-align: center; background-color: ${color}; color: white; border-radius: 50%; margin-right: 8px; font-weight: bold; font-size: 14px;">${index}</span>
                      </td>
                      <td>
                        <a name="toc_article${index}" id="toc_article${index}"></a>
                        <a href="#article${index}" style="color: #0070C0; text-decoration: none; font-weight: bold;">${escapeHtml(entry.article.title)}</a>
                      </td>
                    </tr>
                  </table>
                </td>
              </tr>`;
    })
    .join("");

  return `
            <h3 style="margin-top: 15px; margin-bottom: 10px; font-size: 16px; color: #2e8b57; border-bottom: 1px solid #2e8b57; padding-bottom: 5px;">${escapeHtml(group.journal)}</h3>
            <table cellspacing="0" cellpadding="0" border="0" width="100%">${rows}
            </table>`;
}

function renderArticleCard({ index, entry }: IndexedEntry): string {
  const { article, publicationType } = entry;
  const color = publicationTypeColor(publicationType);
  const authors = authorLine(article.firstAuthor, article.lastAuthor);
  const authorHtml = authors
    ? `<p style="margin: 0;"><b>${authors.label}:</b> ${escapeHtml(authors.names)}</p>`
    : "";
  const pmid = escapeHtml(article.pmid);

  return `
      <tr>
        <td style="padding-bottom: 20px;">
          <a name="article${index}" id="article${index}"></a>
          <table cellspacing="0" cellpadding="0" border="0" width="100%" style="background: #fff; border: 1px solid ${color}; border-radius: 8px;">
            <tr>
              <td style="padding: 12px 15px; background-color: #f0f8ff; border-bottom: 1px solid #e0e0e0;">
                <table cellspacing="0" cellpadding="0" border="0" width="100%">
                  <tr>
                    <td width="40" style="vertical-align: top;">
                      <div style="width: 30px; height: 30px; background-color: ${color}; border-radius: 50%; color: white; font-weight: bold; font-size: 16px; text-align: center; line-height: 30px;">${index}</div>
                    </td>
                    <td style="vertical-align: middle;">
                      <div style="font-weight: bold; font-size: 16px; line-height: 1.3;">${escapeHtml(article.title)}</div>
                    </td>
                    <td width="80" style="vertical-align: middle; text-align: right;">
                      <a href="#toc_article${index}" style="color: #0070C0; text-decoration: none; font-size: 12px;">↑ Return</a>
                    </td>
                  </tr>
                </table>
              </td>
            </tr>
            <tr>
              <td style="padding: 15px;">
                <table cellspacing="0" cellpadding="0" border="0" width="100%">
                  <tr>
                    <td width="80" style="vertical-align: top; color: #666;"><b>Journal:</b></td>
                    <td style="vertical-align: top;">${escapeHtml(article.journal)}</td>
                  </tr>
                  <tr>
                    <td width="80" style="vertical-align: top; padding-top: 5px; color: #666;"><b>Type:</b></td>
                    <td style="vertical-align: top; padding-top: 5px;">
                      <span style="display: inline-block; padding: 2px 8px; background-color: ${color}; color: white; border-radius: 4px; font-size: 12px;">${escapeHtml(publicationType)}</span>
                    </td>
                  </tr>
                  <tr>
                    <td width="80" style="vertical-align: top; padding-top: 5px; color: #666;"><b>PMID:</b></td>
                    <td style="vertical-align: top; padding-top: 5px;">
                      <a href="${PUBMED_ARTICLE_URL}/${pmid}/" target="_blank" style="color: #0070C0; text-decoration: none;">${pmid}</a>
                    </td>
                  </tr>
                  <tr>
                    <td colspan="2" style="padding-top: 5px;">${authorHtml}</td>
                  </tr>
                  <tr>
                    <td colspan="2" style="padding-top: 10px;">
                      <div style="line-height: 1.5; color: #333;">${entry.summaryHtml.replace(/\n/g, "<br/>")}</div>
                    </td>
                  </tr>
                </table>
              </td>
            </tr>
          </table>
        </td>
      </tr>`;
}

function renderJournalSection(group: JournalGroup): string {
  const anchor = escapeHtml(journalAnchor(group.journal));
  return `
      <tr>
        <td style="padding-bottom: 15px;">
          <a name="${anchor}" id="${anchor}"></a>
          <h2 style="margin: 0; color: #2e8b57; font-size: 20px; border-bottom: 2px solid #2e8b57; padding-bottom: 8px;">${escapeHtml(group.journal)}</h2>
        </td>
      </tr>${group.items.map(renderArticleCard).join("")}`;
}

/**
 * Render the whole digest as one self-contained HTML document. Styles are
 * inline and there is no script.
 */
export function renderDigestHtml(entries: DigestEntry[], options: RenderOptions): string {
  const groups = groupByJournal(entries).filter((group) => group.items.length > 0);
  const title = escapeHtml(options.title);
  const generatedOn = formatDate(options.generatedAt ?? new Date());

  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${title}</title>
</head>
<body style="font-family: Arial, sans-serif; background-color: #f9f9f9; padding: 20px; margin: 0;">
  <table cellspacing="0" cellpadding="0" border="0" width="100%" style="max-width: 600px; margin: 0 auto;">
    <tr>
      <td>
        <a name="top" id="top"></a>
        <h1 style="color: #0070C0;">${title}</h1>
        <p><i>Generated on ${generatedOn}</i></p>
      </td>
    </tr>
    <tr>
      <td style="padding-bottom: 20px;">
        <table cellspacing="0" cellpadding="0" border="0" width="100%" style="background: #fff; border: 1px solid #ddd; border-radius: 8px;">
          <tr>
            <td style="padding: 15px;">
            <h2 style="margin-top: 0; font-size: 18px; color: #333;">In This Update:</h2>${groups.map(renderTocGroup).join("")}
            </td>
          </tr>
        </table>
      </td>
    </tr>${groups.map(renderJournalSection).join("")}
  </table>
</body>
</html>`;
}
