import axios, { AxiosInstance, AxiosRequestConfig, AxiosResponse } from "axios";
import https from "https";
import type { Logger } from "pino";
import { CookieJar } from "tough-cookie";
import { UpstreamConfig } from "../constants/upstream";

declare module "axios" {
  interface AxiosRequestConfig {
    /** Cookie jar read and filled on every hop, redirects included. */
    jar?: CookieJar;
    /** Redirect hops already followed for this request. */
    redirectCount?: number;
  }
}

export type ClientFactory = (upstream: Readonly<UpstreamConfig>) => AxiosInstance;

export const MAX_REDIRECTS = 10;
const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

async function storeCookies(jar: CookieJar, response: AxiosResponse): Promise<void> {
  const header: unknown = response.headers["set-cookie"];
  if (!Array.isArray(header) || header.length === 0) return;

  const url = axios.getUri(response.config);
  for (const cookie of header) {
    if (typeof cookie !== "string") continue;
    await jar.setCookie(cookie, url, { ignoreError: true });
  }
}

/**
 * Next hop of a redirect response, or null when there is nothing to follow.
 * 303, and 301/302 after a POST, continue as a bodiless GET.
 */
function redirectTarget(
  client: AxiosInstance,
  response: AxiosResponse
): AxiosRequestConfig | null {
  const location: unknown = response.headers["location"];
  if (!REDIRECT_STATUSES.has(response.status) || typeof location !== "string") {
    return null;
  }

  const hops = response.config.redirectCount ?? 0;
  if (hops >= MAX_REDIRECTS) return null;

  const method = (response.config.method ?? "get").toLowerCase();
  const asGet =
    response.status === 303 ||
    ((response.status === 301 || response.status === 302) && method === "post");

  return {
    ...response.config,
    url: new URL(location, client.getUri(response.config)).href,
    baseURL: undefined,
    params: undefined,
    method: asGet ? "get" : method,
    data: asGet ? undefined : response.config.data,
    redirectCount: hops + 1,
  };
}

/**
 * Axios instance that looks like a browser tab on the exchange site:
 * fixed browser headers plus a cookie jar scoped to this instance.
 *
 * Redirects are followed here rather than by the transport, so cookies
 * set on intermediate hops land in the jar.
 * Every status resolves; callers decide what counts as success.
 */
export function createSessionClient(upstream: Readonly<UpstreamConfig>): AxiosInstance {
  const client = axios.create({
    timeout: upstream.timeouts.requestMs,
    headers: { ...upstream.headers },
    httpsAgent: new https.Agent({ keepAlive: true, maxSockets: 1 }),
    maxRedirects: 0,
    validateStatus: () => true,
    jar: new CookieJar(),
  });

  client.interceptors.request.use(async (config) => {
    if (!config.jar) return config;

    const cookie = await config.jar.getCookieString(client.getUri(config));
    if (cookie) {
      config.headers.set("Cookie", cookie);
    } else {
      config.headers.delete("Cookie");
    }
    return config;
  });

  client.interceptors.response.use(async (response) => {
    if (response.config.jar) {
      await storeCookies(response.config.jar, response);
    }
    const next = redirectTarget(client, response);
    return next ? client.request(next) : response;
  });

  return client;
}

/**
 * Names of the cookies the client would send to `url`.
 * Empty for clients without a jar.
 */
export async function sessionCookieNames(
  client: AxiosInstance,
  url: string
): Promise<string[]> {
  const jar = client.defaults.jar;
  if (!jar) return [];
  const cookies = await jar.getCookies(url);
  return cookies.map((cookie) => cookie.key);
}

/**
 * Best-effort cookie acquisition: the announcements page first, then the
 * static assets. Failures are logged and ignored.
 */
export async function warmSession(
  client: AxiosInstance,
  upstream: Readonly<UpstreamConfig>,
  log: Logger
): Promise<AxiosInstance> {
  try {
    const res = await client.get(upstream.announcementsPage, {
      timeout: upstream.timeouts.pageMs,
      responseType: "text",
    });
    log.debug({ status: res.status }, "Warm announcements page");
  } catch (err) {
    log.debug({ err }, "Warm announcements page failed");
  }

  for (const url of upstream.warmAssets) {
    try {
      const res = await client.get(url, {
        timeout: upstream.timeouts.assetMs,
        responseType: "text",
      });
      log.debug({ url, status: res.status }, "Warm asset");
    } catch (err) {
      log.debug({ url, err }, "Warm asset failed");
    }
  }

  return client;
}
