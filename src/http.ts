import axios, { AxiosInstance } from "axios";
import { config } from "./config";
import { FetchError } from "./errors";
import { loadDocument, pageTitle } from "./parse";
import { FetchedPage } from "./types";
import { sleep } from "./utils";

export type PageFetcher = (url: string) => Promise<FetchedPage>;

export const http = axios.create({
  headers: {
    "User-Agent": config.USER_AGENT,
    Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
  },
  timeout: config.FETCH_TIMEOUT_MS,
  responseType: "text",
  // status handling is ours: anything but 200 is a FetchError
  validateStatus: () => true,
});

export type GetHtmlOptions = {
  client?: AxiosInstance;
  maxAttempts?: number;
  backoffMs?: number;
};

type HtmlResponse = {
  html: string;
  /** URL the body came from, after redirects. */
  finalUrl: string;
};

export async function fetchHtml(
  url: string,
  { client = http, maxAttempts = config.FETCH_MAX_ATTEMPTS, backoffMs = 500 }: GetHtmlOptions = {},
  attempt = 1
): Promise<HtmlResponse> {
  let error: FetchError;
  try {
    const res = await client.get<string>(url, { responseType: "text" });
    if (res.status === 200) {
      // node's http adapter records the last redirect target on the raw response
      const reached: unknown = res.request?.res?.responseUrl;
      return {
        html: typeof res.data === "string" ? res.data : String(res.data ?? ""),
        finalUrl: typeof reached === "string" && reached ? reached : url,
      };
    }
    error = new FetchError(url, `Failed to fetch: ${url} (HTTP ${res.status})`, res.status);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    error = new FetchError(url, `Network error: ${reason}`, undefined, { cause: err });
  }

  const retryable = error.status === undefined || error.status >= 500;
  if (attempt < maxAttempts && retryable) {
    await sleep(backoffMs * 2 ** (attempt - 1));
    return fetchHtml(url, { client, maxAttempts, backoffMs }, attempt + 1);
  }
  throw error;
}

export async function getHtml(url: string, options?: GetHtmlOptions): Promise<string> {
  return (await fetchHtml(url, options)).html;
}

export async function fetchPage(url: string, options?: GetHtmlOptions): Promise<FetchedPage> {
  const { html, finalUrl } = await fetchHtml(url, options);
  return {
    finalUrl,
    html,
    title: pageTitle(loadDocument(html, url)),
  };
}
