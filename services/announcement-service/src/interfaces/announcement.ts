/**
 * One corporate disclosure, normalized from whichever field names
 * the upstream endpoint happened to use. Keys are the wire format.
 */
export interface NormalizedAnnouncement {
  datetime: string | null;
  scrip_code: string | null;
  scrip_name: string | null;
  headline: string | null;
  category: string | null;
  subcategory: string | null;
  news_id: string | null;
  pdf_url: string | null;
  detail_url: string | null;
}

export type RawRow = Record<string, unknown>;

/** Query-parameter dictionary for one request attempt. */
export type ParamVariant = Record<string, string>;

export type AttemptOutcome = "rows" | "empty" | "no-result";

export interface AttemptRecord {
  page: number;
  endpoint: string;
  variant: number;
  outcome: AttemptOutcome;
  rows: number;
}

export interface AnnouncementsResponse {
  date?: string;
  count: number;
  rows: NormalizedAnnouncement[];
  diag?: Record<string, unknown>;
}
