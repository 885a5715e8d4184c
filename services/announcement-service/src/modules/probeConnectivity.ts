import { AxiosResponse } from "axios";
import { DEFAULT_UPSTREAM, UpstreamConfig } from "../constants/upstream";
import { ClientFactory, createSessionClient, sessionCookieNames } from "./session";

type ProbeError = { error: string };

export interface ProbeReport {
  warmup: ProbeError | {
    status: number;
    set_cookie: boolean;
    cookies_after: string[];
    url: string;
  };
  page: ProbeError | {
    status: number;
    len: number;
    sample: string;
    url: string;
  };
}

const SAMPLE_LENGTH = 500;

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** URL of the last hop: redirects are followed with absolute URLs. */
function finalUrl(res: AxiosResponse, requested: string): string {
  return typeof res.config.url === "string" ? res.config.url : requested;
}

/**
 * Shows how the exchange answers this environment: home page status and
 * the cookies the session holds after it, then a sample of the
 * announcements page. Never throws.
 */
export async function probeConnectivity(
  upstream: Readonly<UpstreamConfig> = DEFAULT_UPSTREAM,
  createClient: ClientFactory = createSessionClient
): Promise<ProbeReport> {
  const client = createClient(upstream);
  const report: ProbeReport = {
    warmup: { error: "not attempted" },
    page: { error: "not attempted" },
  };

  try {
    const res = await client.get<unknown>(upstream.homeUrl, {
      timeout: upstream.timeouts.pageMs,
      responseType: "text",
    });
    const url = finalUrl(res, upstream.homeUrl);
    const cookies = await sessionCookieNames(client, url);
    report.warmup = {
      status: res.status,
      set_cookie: cookies.length > 0,
      cookies_after: cookies,
      url,
    };
  } catch (err) {
    report.warmup = { error: errorMessage(err) };
  }

  try {
    const res = await client.get<unknown>(upstream.announcementsPage, {
      timeout: upstream.timeouts.pageMs,
      responseType: "text",
    });
    const body = typeof res.data === "string" ? res.data : "";
    report.page = {
      status: res.status,
      len: body.length,
      sample: body.slice(0, SAMPLE_LENGTH),
      url: finalUrl(res, upstream.announcementsPage),
    };
  } catch (err) {
    report.page = { error: errorMessage(err) };
  }

  return report;
}
