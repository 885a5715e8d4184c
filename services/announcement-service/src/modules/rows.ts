import { DEFAULT_UPSTREAM, UpstreamConfig } from "../constants/upstream";
import { NormalizedAnnouncement, RawRow } from "../interfaces/announcement";

// Envelope keys seen across endpoint versions, in priority order
const ENVELOPE_KEYS = ["Table", "table", "data", "Data"] as const;

export function isRawRow(value: unknown): value is RawRow {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Finds the row array inside whichever envelope the endpoint used.
 */
export function extractRows(payload: unknown): unknown[] {
  if (!isRawRow(payload)) return [];

  for (const key of ENVELOPE_KEYS) {
    const value = payload[key];
    if (Array.isArray(value)) return value;
  }

  const nested = payload.d;
  if (isRawRow(nested) && Array.isArray(nested.Table)) {
    return nested.Table;
  }

  return [];
}

/**
 * First alias holding a usable value wins. null, undefined and "" are
 * skipped; numbers and booleans are stringified.
 */
export function pick(row: RawRow, ...aliases: string[]): string | null {
  for (const alias of aliases) {
    const value = row[alias];
    if (value === null || value === undefined || value === "") continue;

    if (typeof value === "string") return value;
    if (typeof value === "number" || typeof value === "boolean") return String(value);
  }
  return null;
}

export function makePdfUrl(
  row: RawRow,
  upstream: Readonly<UpstreamConfig> = DEFAULT_UPSTREAM
): string | null {
  const attachment = pick(row, "ATTACHMENTNAME", "ATTACHMENT", "FILE");
  if (!attachment) return null;

  if (attachment.toLowerCase().startsWith("http")) return attachment;

  const historical = pick(row, "PDFFLAG", "pdfflag") === "1";
  const prefix = historical
    ? upstream.attachmentHistoricalPrefix
    : upstream.attachmentLivePrefix;

  return `${prefix}${attachment}`;
}

export function makeDetailUrl(
  row: RawRow,
  upstream: Readonly<UpstreamConfig> = DEFAULT_UPSTREAM
): string | null {
  const newsId = pick(row, "NEWSID", "newsid");
  const scrip = (pick(row, "SCRIP_CD", "Scripcode", "scripcode") ?? "").trim();
  if (!newsId || !scrip) return null;

  const query = new URLSearchParams({ Form: "STR", newsid: newsId, scrpcd: scrip });
  return `${upstream.detailPageUrl}?${query.toString()}`;
}

export function normalizeRow(
  row: RawRow,
  upstream: Readonly<UpstreamConfig> = DEFAULT_UPSTREAM
): NormalizedAnnouncement {
  return {
    datetime: pick(row, "DT_TM", "DtTm", "NEWS_DT"),
    scrip_code: pick(row, "SCRIP_CD", "Scripcode", "scripcode"),
    scrip_name: pick(row, "S_LONGNAME", "SLONGNAME", "SCRIPNAME", "Scripname"),
    headline: pick(row, "NEWSSUB", "HEADLINE", "NEWS_SUB"),
    category: pick(row, "CATEGORYNAME", "CATEGORY"),
    subcategory: pick(row, "SUBCATEGORYNAME", "SUBCAT"),
    news_id: pick(row, "NEWSID", "newsid"),
    pdf_url: makePdfUrl(row, upstream),
    detail_url: makeDetailUrl(row, upstream),
  };
}
