import express, { Express, NextFunction, Request, RequestHandler, Response } from "express";
import cors from "cors";
import morgan from "morgan";
import { ZodError } from "zod";
import { scrapeSite } from "../crawl";
import { FetchError, HttpError, InvalidIdError, ParseError, PersistenceError } from "../errors";
import { extractConversions } from "../extract";
import { fetchPage as defaultFetchPage, PageFetcher } from "../http";
import { createLogger, errorMessage } from "../logger";
import { Store } from "../store/types";
import { cleanUrl } from "../utils";
import {
  ConversionsQuerySchema,
  ConversionsUpsertSchema,
  ExtractBodySchema,
  PageQuerySchema,
  PagesQuerySchema,
  ScrapeBodySchema,
} from "./schemas";

const log = createLogger("api");

export type AppDeps = {
  /** null when no database is configured; store-backed routes then answer 503. */
  store: Store | null;
  fetchPage?: PageFetcher;
  logRequests?: boolean;
};

const asyncRoute =
  (handler: (req: Request, res: Response) => Promise<unknown>): RequestHandler =>
  (req, res, next) => {
    handler(req, res).catch(next);
  };

export function statusFor(err: unknown): number {
  if (err instanceof HttpError) return err.status;
  if (err instanceof ZodError || err instanceof InvalidIdError) return 400;
  if (err instanceof FetchError) return err.status && err.status >= 400 ? err.status : 502;
  if (err instanceof ParseError) return 422;
  if (err instanceof PersistenceError) return 503;
  // body-parser errors (malformed JSON, oversized body) carry their client status
  if (err instanceof Error && "status" in err && typeof err.status === "number" && err.status >= 400 && err.status < 500) {
    return err.status;
  }
  return 500;
}

export function createApp({ store, fetchPage = defaultFetchPage, logRequests = false }: AppDeps): Express {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "1mb" }));
  if (logRequests) app.use(morgan("dev"));

  const requireStore = (): Store => {
    if (!store) throw new HttpError(503, "Database not available");
    return store;
  };

  app.get("/", (_req, res) => {
    res.json({ message: "Rate scraper API is running" });
  });

  app.get(
    "/health",
    asyncRoute(async (_req, res) => {
      const database = store ? ((await store.ping()) ? "connected" : "unavailable") : "not configured";
      res.json({ ok: true, service: "rate-scraper", database });
    })
  );

  app.post(
    "/api/scrape",
    asyncRoute(async (req, res) => {
      const body = ScrapeBodySchema.parse(req.body);
      const result = await scrapeSite(requireStore(), {
        url: body.url,
        crawl: body.crawl,
        maxPages: body.max_pages,
        fetchPage,
      });
      res.json({ status: "ok", pages_saved: result.pagesSaved });
    })
  );

  app.get(
    "/api/pages",
    asyncRoute(async (req, res) => {
      const { limit } = PagesQuerySchema.parse(req.query);
      res.json({ items: await requireStore().listPages(limit) });
    })
  );

  app.get(
    "/api/page",
    asyncRoute(async (req, res) => {
      const { url, id } = PageQuerySchema.parse(req.query);
      const db = requireStore();
      const page = url ? await db.findPage({ url: cleanUrl(url) }) : await db.findPage({ id: id ?? "" });
      if (!page) throw new HttpError(404, "Page not found");
      res.json(page);
    })
  );

  app.post(
    "/api/extract",
    asyncRoute(async (req, res) => {
      const body = ExtractBodySchema.parse(req.body);

      let pageUrl: string;
      if (body.url) {
        pageUrl = cleanUrl(body.url);
      } else {
        const page = await requireStore().findPage({ id: body.id ?? "" });
        if (!page) throw new HttpError(404, "Page not found");
        pageUrl = page.url;
      }

      const fetched = await fetchPage(pageUrl);
      const items = extractConversions(pageUrl, fetched.title, fetched.html, body.ocr);
      const result = { page_url: pageUrl, page_title: fetched.title ?? null, items };

      if (!body.persist || !store) {
        res.json({ ...result, persisted: false });
        return;
      }

      try {
        await store.upsertConversions(pageUrl, fetched.title, items);
      } catch (err) {
        if (!(err instanceof PersistenceError)) throw err;
        // the extraction stands; the caller can retry the write through /api/conversions/upsert
        res.status(503).json({ ok: false, error: err.message, ...result, persisted: false });
        return;
      }
      log.info(`extracted ${items.length} conversions from ${pageUrl}`);
      res.json({ ...result, persisted: true });
    })
  );

  app.get(
    "/api/conversions",
    asyncRoute(async (req, res) => {
      const { page_url, limit } = ConversionsQuerySchema.parse(req.query);
      const items = await requireStore().listConversions({ pageUrl: page_url, limit });
      res.json({ items });
    })
  );

  app.post(
    "/api/conversions/upsert",
    asyncRoute(async (req, res) => {
      const body = ConversionsUpsertSchema.parse(req.body);
      const upserted = await requireStore().upsertConversions(body.page_url, body.page_title, body.items);
      res.json({ status: "ok", upserted });
    })
  );

  app.use((_req, res) => {
    res.status(404).json({ ok: false, error: "Not found" });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = statusFor(err);
    if (err instanceof ZodError) {
      res.status(status).json({ ok: false, error: err.flatten() });
      return;
    }
    if (status >= 500) log.error(errorMessage(err));
    res.status(status).json({ ok: false, error: errorMessage(err) });
  });

  return app;
}
