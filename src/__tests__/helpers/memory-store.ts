import { InvalidIdError } from "../../errors";
import { canonicalName, conversionKey } from "../../extract/normalize";
import { ConversionQuery, PageQuery, Store } from "../../store/types";
import { ConversionInput, PageSummary, ScrapePage, StoredConversion, StoredPage } from "../../types";
import { cleanUrl } from "../../utils";

/** In-process stand-in for MongoStore with the same upsert keys. */
export class MemoryStore implements Store {
  readonly pages = new Map<string, StoredPage>();
  readonly conversions = new Map<string, StoredConversion>();
  private nextId = 1;

  async upsertPage(page: Omit<ScrapePage, "scraped_at">): Promise<void> {
    const existing = this.pages.get(page.url);
    const id = existing?.id ?? String(this.nextId++).padStart(24, "0");
    this.pages.set(page.url, { ...existing, ...page, id, scraped_at: new Date() });
  }

  async listPages(limit: number): Promise<PageSummary[]> {
    return Array.from(this.pages.values())
      .slice(0, limit)
      .map((p) => ({ id: p.id, url: p.url, path: p.path, title: p.title, table_count: p.tables.length }));
  }

  async findPage(query: PageQuery): Promise<StoredPage | null> {
    if ("url" in query) return this.pages.get(cleanUrl(query.url)) ?? null;
    if (!/^[0-9a-f]{24}$/i.test(query.id)) throw new InvalidIdError(query.id);
    return Array.from(this.pages.values()).find((p) => p.id === query.id) ?? null;
  }

  async upsertConversions(pageUrl: string, pageTitle: string | undefined, items: ConversionInput[]): Promise<number> {
    const page_url = cleanUrl(pageUrl);
    for (const item of items) {
      const source = canonicalName(item.source);
      const target = canonicalName(item.target);
      const key = conversionKey({ page_url, source, target });
      const now = new Date();
      const existing = this.conversions.get(key);
      this.conversions.set(key, {
        page_url,
        page_title: pageTitle,
        source,
        target,
        rate: item.rate,
        text: item.text ?? "",
        created_at: existing?.created_at ?? now,
        updated_at: now,
      });
    }
    return items.length;
  }

  async listConversions({ pageUrl, limit = 1000 }: ConversionQuery = {}): Promise<StoredConversion[]> {
    const wanted = pageUrl ? cleanUrl(pageUrl) : undefined;
    return Array.from(this.conversions.values())
      .filter((c) => !wanted || c.page_url === wanted)
      .slice(0, limit);
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {}
}
