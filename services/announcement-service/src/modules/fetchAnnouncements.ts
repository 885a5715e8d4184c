import { DEFAULT_UPSTREAM, UpstreamConfig } from "../constants/upstream";
import {
  AttemptRecord,
  NormalizedAnnouncement,
} from "../interfaces/announcement";
import { diagnosticLogger } from "../logger";
import { DEFAULT_TIMEZONE, toSiteDate } from "../utils/date";
import { buildParamVariants } from "./paramVariants";
import { tryRequest } from "./requestExecutor";
import { extractRows, isRawRow, normalizeRow } from "./rows";
import { ClientFactory, createSessionClient, warmSession } from "./session";

// -------------------------------------------------
// Defaults
// -------------------------------------------------
export const DEFAULT_MAX_PAGES = 30;
export const DEFAULT_PAGE_DELAY_MS = 250;
/** Upstream page size is undocumented; a shorter page is taken as the last one. */
export const DEFAULT_PAGE_SIZE = 20;

export interface FetchAnnouncementsOptions {
  fromDate?: string;
  toDate?: string;
  segment?: string;
  submissionType?: string;
  category?: string;
  subcategory?: string;
  search?: string;
  maxPages?: number;
  delayMs?: number;
  pageSize?: number;
  timezone?: string;
  verbose?: boolean;
  probe?: boolean;
  onAttempt?: (attempt: AttemptRecord) => void;
}

export interface FetchDependencies {
  upstream?: Readonly<UpstreamConfig>;
  createClient?: ClientFactory;
  sleep?: (ms: number) => Promise<void>;
}

export type FetchAnnouncements = (
  options: FetchAnnouncementsOptions
) => Promise<NormalizedAnnouncement[]>;

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Walks the upstream pages, trying every endpoint/variant pair until one
 * yields rows. Stops on a short page or a page nothing answers.
 *
 * Rows come back in upstream order and are NOT deduplicated.
 */
export async function fetchAnnouncements(
  options: FetchAnnouncementsOptions = {},
  deps: FetchDependencies = {}
): Promise<NormalizedAnnouncement[]> {
  const {
    segment = "C",
    submissionType = "0",
    category = "",
    subcategory = "",
    search = "",
    maxPages = DEFAULT_MAX_PAGES,
    delayMs = DEFAULT_PAGE_DELAY_MS,
    pageSize = DEFAULT_PAGE_SIZE,
    timezone = DEFAULT_TIMEZONE,
    verbose = false,
    probe = false,
    onAttempt,
  } = options;
  const {
    upstream = DEFAULT_UPSTREAM,
    createClient = createSessionClient,
    sleep = defaultSleep,
  } = deps;

  const fromDate = toSiteDate(options.fromDate, timezone);
  const toDate = toSiteDate(options.toDate, timezone);

  const log = diagnosticLogger(verbose || probe);
  const client = await warmSession(createClient(upstream), upstream, log);

  const collected: NormalizedAnnouncement[] = [];
  const start = Date.now();

  for (let page = 1; page <= maxPages; page++) {
    const variants = buildParamVariants({
      segment,
      submissionType,
      fromDate,
      toDate,
      page,
      search,
      category,
      subcategory,
    });

    let pageRows: number | null = null;

    attempts: for (const endpoint of upstream.endpoints) {
      for (const [index, params] of variants.entries()) {
        log.debug({ page, endpoint, params }, "Trying variant");

        const payload = await tryRequest(client, endpoint, params, {
          timeoutMs: upstream.timeouts.requestMs,
          log,
          probe,
        });
        const rows = payload ? extractRows(payload) : [];

        onAttempt?.({
          page,
          endpoint,
          variant: index,
          outcome: !payload ? "no-result" : rows.length ? "rows" : "empty",
          rows: rows.length,
        });

        if (!rows.length) continue;

        for (const raw of rows) {
          if (isRawRow(raw)) collected.push(normalizeRow(raw, upstream));
        }
        pageRows = rows.length;
        break attempts;
      }
    }

    if (pageRows === null) {
      log.debug({ page }, "No variant produced rows, stopping");
      break;
    }

    if (pageRows < pageSize) {
      log.debug({ page, rows: pageRows, pageSize }, "Short page, stopping");
      break;
    }

    if (delayMs && page < maxPages) await sleep(delayMs);
  }

  log.info(
    { fromDate, toDate, rows: collected.length, durationMs: Date.now() - start },
    "Announcements fetch complete"
  );

  return collected;
}
