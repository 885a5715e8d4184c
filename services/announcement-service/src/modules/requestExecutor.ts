import { AxiosInstance, AxiosResponse } from "axios";
import type { Logger } from "pino";
import { FORM_CONTENT_TYPE } from "../constants/upstream";
import { ParamVariant } from "../interfaces/announcement";

export interface RequestOptions {
  timeoutMs: number;
  log: Logger;
  /** Log every status and non-JSON sample at info level. */
  probe?: boolean;
}

const NO_JSON = Symbol("no-json");

function cacheBuster(): string {
  const jitter = 100 + Math.floor(Math.random() * 900);
  return `${Date.now()}${jitter}`;
}

function parseBody(body: unknown): unknown {
  if (typeof body !== "string") {
    return body === undefined ? NO_JSON : body;
  }
  try {
    return JSON.parse(body);
  } catch {
    return NO_JSON;
  }
}

async function attempt(
  method: "GET" | "POST",
  url: string,
  send: () => Promise<AxiosResponse<unknown>>,
  { log, probe }: RequestOptions
): Promise<unknown> {
  const level = probe ? "info" : "debug";

  try {
    const res = await send();
    log[level]({ method, url, status: res.status }, "Upstream response");

    if (res.status < 200 || res.status >= 300) return NO_JSON;

    const parsed = parseBody(res.data);
    if (parsed === NO_JSON) {
      const sample = typeof res.data === "string" ? res.data.slice(0, 300) : "";
      log[level]({ method, url, sample }, "Upstream returned non-JSON body");
    }
    return parsed;
  } catch (err) {
    log[level]({ method, url, err }, "Upstream request failed");
    return NO_JSON;
  }
}

/**
 * GET, then form-encoded POST with the same parameters.
 *
 * Resolves to the parsed JSON body, or null when neither attempt
 * produced one. Never rejects for network, status or parse failures.
 */
export async function tryRequest(
  client: AxiosInstance,
  url: string,
  variant: ParamVariant,
  options: RequestOptions
): Promise<unknown> {
  const params: ParamVariant = { ...variant, _: cacheBuster() };

  const viaGet = await attempt(
    "GET",
    url,
    () =>
      client.get<unknown>(url, {
        params,
        timeout: options.timeoutMs,
        responseType: "text",
      }),
    options
  );
  if (viaGet !== NO_JSON && viaGet !== null) return viaGet;

  const viaPost = await attempt(
    "POST",
    url,
    () =>
      client.post<unknown>(url, new URLSearchParams(params).toString(), {
        timeout: options.timeoutMs,
        responseType: "text",
        headers: { "Content-Type": FORM_CONTENT_TYPE },
      }),
    options
  );

  return viaPost === NO_JSON ? null : viaPost;
}
