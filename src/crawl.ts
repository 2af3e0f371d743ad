import { load } from "cheerio";
import pLimit from "p-limit";
import { config } from "./config";
import { FetchError, ParseError } from "./errors";
import { fetchPage as defaultFetchPage, PageFetcher } from "./http";
import { createLogger, errorMessage } from "./logger";
import { parsePage } from "./parse";
import { Store } from "./store/types";
import { FetchedPage, PageExtract } from "./types";
import { cleanUrl, resolveUrl, sameOrigin, urlPath } from "./utils";

const log = createLogger("crawl");

export type CrawlOptions = {
  url: string;
  crawl?: boolean;
  maxPages?: number;
  concurrency?: number;
  fetchPage?: PageFetcher;
};

export type CrawledPage = {
  url: string;
  fetched: FetchedPage;
  extract: PageExtract;
};

export type ScrapeResult = {
  pagesSaved: number;
  urls: string[];
};

/** Same-origin http(s) links of a page, fragment-stripped, in document order. */
export function collectLinks(html: string, pageUrl: string): string[] {
  const $ = load(html);
  const links = new Set<string>();
  $("a[href]").each((_, a) => {
    const href = $(a).attr("href");
    if (!href) return;
    const abs = resolveUrl(pageUrl, href);
    if (!abs) return;
    const clean = cleanUrl(abs);
    if (clean.startsWith("http") && sameOrigin(pageUrl, clean)) links.add(clean);
  });
  return Array.from(links);
}

function isPageFailure(err: unknown): err is FetchError | ParseError {
  return err instanceof FetchError || err instanceof ParseError;
}

/**
 * Breadth-first, same-origin crawl. The frontier and the visited set belong
 * to this loop; only the fetches of one batch run concurrently.
 */
export async function* crawlPages({
  url,
  crawl = false,
  maxPages = 10,
  concurrency = config.CRAWL_CONCURRENCY,
  fetchPage = defaultFetchPage,
}: CrawlOptions): AsyncGenerator<CrawledPage> {
  const startUrl = cleanUrl(url);
  const budget = crawl ? Math.max(1, maxPages) : 1;
  const limit = pLimit(concurrency);

  const visited = new Set<string>();
  const queued = new Set<string>([startUrl]);
  const toVisit: string[] = [startUrl];
  let yielded = 0;

  while (toVisit.length && yielded < budget) {
    const batch: string[] = [];
    while (toVisit.length && batch.length < budget - yielded) {
      const next = cleanUrl(toVisit.shift() ?? "");
      if (!next || visited.has(next)) continue;
      visited.add(next);
      batch.push(next);
    }

    const settled = await Promise.allSettled(
      batch.map((pageUrl) =>
        limit(async () => {
          const fetched = await fetchPage(pageUrl);
          return { url: pageUrl, fetched, extract: parsePage(fetched.html, pageUrl) };
        })
      )
    );

    for (const [i, outcome] of settled.entries()) {
      const pageUrl = batch[i];
      if (outcome.status === "rejected") {
        if (pageUrl === startUrl || !isPageFailure(outcome.reason)) throw outcome.reason;
        log.warn(`skipping ${pageUrl}: ${errorMessage(outcome.reason)}`);
        continue;
      }

      const page = outcome.value;
      yielded++;
      yield page;

      if (!crawl) continue;
      try {
        for (const link of collectLinks(page.fetched.html, pageUrl)) {
          if (visited.has(link) || queued.has(link)) continue;
          queued.add(link);
          toVisit.push(link);
        }
      } catch (err) {
        log.warn(`link collection failed for ${pageUrl}: ${errorMessage(err)}`);
      }
    }
  }
}

/** Crawls from `url` and upserts every page snapshot into the store. */
export async function scrapeSite(store: Store, options: CrawlOptions): Promise<ScrapeResult> {
  const urls: string[] = [];
  for await (const page of crawlPages(options)) {
    await store.upsertPage({
      url: page.url,
      path: urlPath(page.url),
      title: page.extract.title,
      tables: page.extract.tables,
    });
    urls.push(page.url);
    log.info(`saved ${page.url} (${page.extract.tables.length} tables)`);
  }
  return { pagesSaved: urls.length, urls };
}
