import { describe, it, expect, vi, beforeEach } from "vitest";
import request from "supertest";
import { createApp, statusFor } from "../api/app";
import { FetchError, ParseError, PersistenceError } from "../errors";
import { FetchedPage } from "../types";
import { MemoryStore } from "./helpers/memory-store";

const SHOP_URL = "https://game.example/shop";
const SHOP_HTML = `
  <title>Gem Shop</title>
  <table><thead><tr><th>Item</th><th>Price</th></tr></thead><tbody><tr><td>Gem</td><td>10</td></tr></tbody></table>
  <p>1 Gem = 100 Coins</p>
  <p>2 Rubies = 30 Gems</p>
  <img alt="1 Crystal = 5 Gems">
`;

function fakeFetcher() {
  return vi.fn(async (url: string): Promise<FetchedPage> => {
    if (url !== SHOP_URL) throw new FetchError(url, `Failed to fetch: ${url}`, 404);
    return { finalUrl: url, html: SHOP_HTML, title: "Gem Shop" };
  });
}

describe("API", () => {
  let store: MemoryStore;
  let fetchPage: ReturnType<typeof fakeFetcher>;

  beforeEach(() => {
    store = new MemoryStore();
    fetchPage = fakeFetcher();
  });

  const app = () => createApp({ store, fetchPage });

  it("answers the root and health routes", async () => {
    expect((await request(app()).get("/")).body).toEqual({ message: "Rate scraper API is running" });

    const health = await request(app()).get("/health");
    expect(health.body).toEqual({ ok: true, service: "rate-scraper", database: "connected" });
  });

  describe("POST /api/scrape", () => {
    it("saves the page and reports the count", async () => {
      const res = await request(app()).post("/api/scrape").send({ url: `${SHOP_URL}#top` });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ status: "ok", pages_saved: 1 });
      expect(store.pages.has(SHOP_URL)).toBe(true);
    });

    it("rejects a body without a valid url", async () => {
      const res = await request(app()).post("/api/scrape").send({ url: "not a url" });

      expect(res.status).toBe(400);
      expect(res.body.ok).toBe(false);
    });

    it("passes the upstream status of a failed fetch through", async () => {
      const res = await request(app()).post("/api/scrape").send({ url: "https://game.example/gone" });

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ ok: false, error: "Failed to fetch: https://game.example/gone" });
    });

    it("answers 503 without a database", async () => {
      const res = await request(createApp({ store: null, fetchPage })).post("/api/scrape").send({ url: SHOP_URL });

      expect(res.status).toBe(503);
      expect(res.body).toEqual({ ok: false, error: "Database not available" });
    });
  });

  describe("GET /api/pages and /api/page", () => {
    beforeEach(async () => {
      await request(app()).post("/api/scrape").send({ url: SHOP_URL });
    });

    it("lists page summaries", async () => {
      const res = await request(app()).get("/api/pages");

      expect(res.body.items).toEqual([
        { id: "000000000000000000000001", url: SHOP_URL, path: "/shop", title: "Gem Shop", table_count: 1 },
      ]);
    });

    it("validates the limit", async () => {
      expect((await request(app()).get("/api/pages?limit=0")).status).toBe(400);
    });

    it("finds a page by url, ignoring the fragment", async () => {
      const res = await request(app()).get("/api/page").query({ url: `${SHOP_URL}#x` });

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ id: "000000000000000000000001", url: SHOP_URL, title: "Gem Shop" });
    });

    it("finds a page by id", async () => {
      const res = await request(app()).get("/api/page").query({ id: "000000000000000000000001" });

      expect(res.body.url).toBe(SHOP_URL);
    });

    it("answers 400 without url or id and for a malformed id", async () => {
      expect((await request(app()).get("/api/page")).status).toBe(400);

      const bad = await request(app()).get("/api/page").query({ id: "xyz" });
      expect(bad.status).toBe(400);
      expect(bad.body).toEqual({ ok: false, error: "Invalid id: xyz" });
    });

    it("answers 404 for an unknown page", async () => {
      const res = await request(app()).get("/api/page").query({ url: "https://game.example/none" });

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ ok: false, error: "Page not found" });
    });
  });

  describe("POST /api/extract", () => {
    it("extracts and persists conversions", async () => {
      const res = await request(app()).post("/api/extract").send({ url: SHOP_URL });

      expect(res.status).toBe(200);
      expect(res.body.persisted).toBe(true);
      expect(res.body.page_title).toBe("Gem Shop");
      expect(res.body.items.map((i: { source: string; target: string; rate: number }) => [i.source, i.target, i.rate])).toEqual([
        ["Gem", "Coins", 100],
        ["Rubies", "Gems", 15],
      ]);
      expect(store.conversions.size).toBe(2);
    });

    it("reads image metadata when ocr is set", async () => {
      const res = await request(app()).post("/api/extract").send({ url: SHOP_URL, ocr: true });

      expect(res.body.items).toHaveLength(3);
      expect(res.body.items[2]).toMatchObject({ source: "Crystal", target: "Gems", rate: 5 });
    });

    it("resolves a stored page by id", async () => {
      await request(app()).post("/api/scrape").send({ url: SHOP_URL });

      const res = await request(app()).post("/api/extract").send({ id: "000000000000000000000001", persist: false });

      expect(res.status).toBe(200);
      expect(res.body.page_url).toBe(SHOP_URL);
      expect(res.body.persisted).toBe(false);
      expect(store.conversions.size).toBe(0);
    });

    it("still returns the items when the write fails", async () => {
      vi.spyOn(store, "upsertConversions").mockRejectedValue(new PersistenceError("write refused"));

      const res = await request(app()).post("/api/extract").send({ url: SHOP_URL });

      expect(res.status).toBe(503);
      expect(res.body.ok).toBe(false);
      expect(res.body.error).toBe("write refused");
      expect(res.body.persisted).toBe(false);
      expect(res.body.items).toHaveLength(2);
    });

    it("works without a database", async () => {
      const res = await request(createApp({ store: null, fetchPage })).post("/api/extract").send({ url: SHOP_URL });

      expect(res.status).toBe(200);
      expect(res.body.persisted).toBe(false);
      expect(res.body.items).toHaveLength(2);
    });
  });

  describe("conversions", () => {
    it("upserts with canonical names, last write wins", async () => {
      const first = await request(app())
        .post("/api/conversions/upsert")
        .send({ page_url: SHOP_URL, page_title: "Shop", items: [{ source: "gem", target: "COINS", rate: 100 }] });
      expect(first.body).toEqual({ status: "ok", upserted: 1 });

      await request(app())
        .post("/api/conversions/upsert")
        .send({ page_url: `${SHOP_URL}#a`, page_title: "Shop v2", items: [{ source: "Gem", target: "Coins", rate: 120, text: "x" }] });

      const res = await request(app()).get("/api/conversions").query({ page_url: SHOP_URL });
      expect(res.body.items).toHaveLength(1);
      expect(res.body.items[0]).toMatchObject({
        page_url: SHOP_URL,
        page_title: "Shop v2",
        source: "Gem",
        target: "Coins",
        rate: 120,
        text: "x",
      });
    });

    it("rejects a non-positive rate", async () => {
      const res = await request(app())
        .post("/api/conversions/upsert")
        .send({ page_url: SHOP_URL, items: [{ source: "Gem", target: "Coins", rate: 0 }] });

      expect(res.status).toBe(400);
    });

    it("answers 400 for a malformed JSON body", async () => {
      const res = await request(app())
        .post("/api/conversions/upsert")
        .set("Content-Type", "application/json")
        .send('{"page_url": ');

      expect(res.status).toBe(400);
      expect(res.body.ok).toBe(false);
      expect(await store.listConversions({ limit: 10 })).toEqual([]);
    });

    it("filters by page", async () => {
      await store.upsertConversions(SHOP_URL, undefined, [{ source: "Gem", target: "Coins", rate: 1 }]);
      await store.upsertConversions("https://game.example/other", undefined, [{ source: "Gem", target: "Coins", rate: 2 }]);

      expect((await request(app()).get("/api/conversions")).body.items).toHaveLength(2);
      expect((await request(app()).get("/api/conversions").query({ page_url: SHOP_URL })).body.items).toHaveLength(1);
    });
  });

  it("answers 404 for unknown routes", async () => {
    const res = await request(app()).get("/api/nothing");

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ ok: false, error: "Not found" });
  });
});

describe("statusFor", () => {
  it("maps domain errors to statuses", () => {
    expect(statusFor(new FetchError("u", "m", 500))).toBe(500);
    expect(statusFor(new FetchError("u", "m", 204))).toBe(502);
    expect(statusFor(new FetchError("u", "m"))).toBe(502);
    expect(statusFor(new ParseError("u", "m"))).toBe(422);
    expect(statusFor(new PersistenceError("m"))).toBe(503);
    expect(statusFor(Object.assign(new SyntaxError("Unexpected end of JSON input"), { status: 400 }))).toBe(400);
    expect(statusFor(Object.assign(new Error("m"), { status: 502 }))).toBe(500);
    expect(statusFor(new Error("m"))).toBe(500);
  });
});
