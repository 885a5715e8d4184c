// -------------------------------------------------
// Exchange endpoints & browser identity
// -------------------------------------------------
export interface UpstreamTimeouts {
  pageMs: number;
  assetMs: number;
  requestMs: number;
}

export interface UpstreamConfig {
  homeUrl: string;
  announcementsPage: string;
  /** JSON endpoints, tried in order. Deployments flip between them. */
  endpoints: readonly string[];
  /** Static assets touched once so the WAF sets cookies for the session. */
  warmAssets: readonly string[];
  headers: Readonly<Record<string, string>>;
  attachmentLivePrefix: string;
  attachmentHistoricalPrefix: string;
  detailPageUrl: string;
  timeouts: UpstreamTimeouts;
}

const HOME_URL = "https://www.bseindia.com";
const ANNOUNCEMENTS_PAGE = `${HOME_URL}/corporates/ann.html`;

export const BROWSER_HEADERS: Readonly<Record<string, string>> = Object.freeze({
  "User-Agent":
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  Accept: "application/json, text/javascript, */*; q=0.01",
  "Accept-Language": "en-US,en;q=0.9",
  "Cache-Control": "no-cache",
  Pragma: "no-cache",
  Referer: ANNOUNCEMENTS_PAGE,
  Origin: HOME_URL,
  "X-Requested-With": "XMLHttpRequest",
  Connection: "keep-alive",
});

export const FORM_CONTENT_TYPE = "application/x-www-form-urlencoded; charset=UTF-8";

export const DEFAULT_UPSTREAM: Readonly<UpstreamConfig> = Object.freeze({
  homeUrl: `${HOME_URL}/`,
  announcementsPage: ANNOUNCEMENTS_PAGE,
  endpoints: Object.freeze([
    "https://api.bseindia.com/BseIndiaAPI/api/Ann/w",
    "https://api.bseindia.com/BseIndiaAPI/api/AnnGetData/w",
  ]),
  warmAssets: Object.freeze([
    `${HOME_URL}/include/css/bootstrap.min.css`,
    `${HOME_URL}/include/js/jquery-1.11.3.min.js`,
  ]),
  headers: BROWSER_HEADERS,
  attachmentLivePrefix: `${HOME_URL}/xml-data/corpfiling/AttachLive/`,
  attachmentHistoricalPrefix: `${HOME_URL}/xml-data/corpfiling/AttachHis/`,
  detailPageUrl: "https://m.bseindia.com/MAnnDet.aspx",
  timeouts: Object.freeze({
    pageMs: 15_000,
    assetMs: 10_000,
    requestMs: 25_000,
  }),
});

/**
 * Copy of the default config with the request timeout replaced.
 */
export function withRequestTimeout(
  upstream: Readonly<UpstreamConfig>,
  requestMs: number
): Readonly<UpstreamConfig> {
  return Object.freeze({
    ...upstream,
    timeouts: Object.freeze({ ...upstream.timeouts, requestMs }),
  });
}
