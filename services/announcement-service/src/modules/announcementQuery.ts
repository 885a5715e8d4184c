import { FacadeMode } from "../config/env";
import {
  AnnouncementsResponse,
  AttemptRecord,
  NormalizedAnnouncement,
} from "../interfaces/announcement";
import { AnnouncementQuery } from "../schemas/announcementQuery.schema";
import { shiftSiteDate, todaySiteDate, toSiteDate } from "../utils/date";
import { dedupeByNewsId } from "./dedupe";
import { FetchAnnouncements, FetchAnnouncementsOptions } from "./fetchAnnouncements";

export const MAX_RESPONSE_ROWS = 200;
/** Extra pages granted to the widened window in today-fallback mode. */
export const FALLBACK_EXTRA_PAGES = 2;

export interface QueryContext {
  mode: FacadeMode;
  defaultMaxPages: number;
  delayMs: number;
  pageSize: number;
  timezone: string;
  fetch: FetchAnnouncements;
}

/**
 * Runs one facade request: resolves the date window for the mode,
 * fetches, dedupes and trims the rows.
 */
export async function runAnnouncementQuery(
  query: AnnouncementQuery,
  ctx: QueryContext
): Promise<AnnouncementsResponse> {
  const maxPages = query.max_pages ?? ctx.defaultMaxPages;
  const attempts: AttemptRecord[] = [];

  const base: FetchAnnouncementsOptions = {
    segment: query.segment,
    submissionType: query.submission_type,
    category: query.category,
    subcategory: query.subcategory,
    search: query.search,
    delayMs: ctx.delayMs,
    pageSize: ctx.pageSize,
    timezone: ctx.timezone,
    probe: query.probe,
    onAttempt: query.probe ? (attempt) => attempts.push(attempt) : undefined,
  };

  let fromDate: string;
  let toDate: string;
  let today: string | undefined;
  let rows: NormalizedAnnouncement[];

  if (ctx.mode === "range") {
    fromDate = toSiteDate(query.from_date, ctx.timezone);
    toDate = toSiteDate(query.to_date, ctx.timezone);
    rows = await ctx.fetch({ ...base, fromDate, toDate, maxPages });
  } else {
    today = todaySiteDate(ctx.timezone);
    fromDate = toDate = today;
    rows = await ctx.fetch({ ...base, fromDate, toDate, maxPages });

    if (!rows.length && ctx.mode === "today-fallback") {
      fromDate = shiftSiteDate(today, -1);
      rows = await ctx.fetch({
        ...base,
        fromDate,
        toDate,
        maxPages: maxPages + FALLBACK_EXTRA_PAGES,
      });
    }
  }

  const unique = dedupeByNewsId(rows);
  const response: AnnouncementsResponse = {
    ...(today ? { date: today } : {}),
    count: unique.length,
    rows: unique.slice(0, MAX_RESPONSE_ROWS),
  };

  if (query.diag || query.probe) {
    response.diag = {
      mode: ctx.mode,
      segment: query.segment,
      submission_type: query.submission_type,
      category: query.category,
      subcategory: query.subcategory,
      search: query.search,
      max_pages: maxPages,
      from_date: fromDate,
      to_date: toDate,
      first_row: unique[0] ?? null,
      ...(query.probe ? { attempts } : {}),
    };
  }

  return response;
}
