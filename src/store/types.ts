import {
  ConversionInput,
  PageSummary,
  ScrapePage,
  StoredConversion,
  StoredPage,
} from "../types";

export type PageQuery = { url: string } | { id: string };

export type ConversionQuery = {
  pageUrl?: string;
  limit?: number;
};

/**
 * Document store behind the scraper. Writes are upserts on natural keys:
 * pages by `url`, conversions by `(page_url, source, target)`.
 */
export interface Store {
  upsertPage(page: Omit<ScrapePage, "scraped_at">): Promise<void>;
  listPages(limit: number): Promise<PageSummary[]>;
  /** @throws InvalidIdError when `id` is not a valid document id. */
  findPage(query: PageQuery): Promise<StoredPage | null>;
  /** Returns how many records were written. */
  upsertConversions(pageUrl: string, pageTitle: string | undefined, items: ConversionInput[]): Promise<number>;
  listConversions(query?: ConversionQuery): Promise<StoredConversion[]>;
  ping(): Promise<boolean>;
  close(): Promise<void>;
}
