import { AnyBulkWriteOperation, Collection, Db, MongoClient, ObjectId, WithId } from "mongodb";
import { InvalidIdError, PersistenceError } from "../errors";
import { canonicalName } from "../extract/normalize";
import { createLogger, errorMessage } from "../logger";
import { ConversionInput, PageSummary, ScrapePage, StoredConversion, StoredPage } from "../types";
import { cleanUrl } from "../utils";
import { ConversionQuery, PageQuery, Store } from "./types";

const log = createLogger("store");

export const PAGE_COLLECTION = "scrapepage";
export const CONVERSION_COLLECTION = "conversion";

type PageDoc = ScrapePage;
type ConversionDoc = Omit<StoredConversion, "page_title"> & { page_title?: string | null };

async function guard<T>(what: string, op: () => Promise<T>): Promise<T> {
  try {
    return await op();
  } catch (err) {
    if (err instanceof InvalidIdError || err instanceof PersistenceError) throw err;
    log.error(`${what} failed: ${errorMessage(err)}`);
    throw new PersistenceError(`${what} failed: ${errorMessage(err)}`, { cause: err });
  }
}

function toStoredPage(doc: WithId<PageDoc>): StoredPage {
  const { _id, ...rest } = doc;
  return { ...rest, id: _id.toHexString() };
}

function toStoredConversion(doc: WithId<ConversionDoc>): StoredConversion {
  const { _id, page_title, ...rest } = doc;
  return { ...rest, page_title: page_title ?? undefined };
}

export class MongoStore implements Store {
  private readonly pages: Collection<PageDoc>;
  private readonly conversions: Collection<ConversionDoc>;

  constructor(private readonly client: MongoClient, private readonly db: Db) {
    this.pages = db.collection<PageDoc>(PAGE_COLLECTION);
    this.conversions = db.collection<ConversionDoc>(CONVERSION_COLLECTION);
  }

  static async connect(url: string, dbName: string): Promise<MongoStore> {
    const client = new MongoClient(url, { serverSelectionTimeoutMS: 5000, ignoreUndefined: true });
    const store = await guard("connect", async () => {
      await client.connect();
      return new MongoStore(client, client.db(dbName));
    });
    await store.ensureIndexes();
    log.info(`connected to ${dbName}`);
    return store;
  }

  async ensureIndexes(): Promise<void> {
    await guard("createIndexes", async () => {
      await this.pages.createIndex({ url: 1 }, { unique: true });
      await this.conversions.createIndex({ page_url: 1, source: 1, target: 1 }, { unique: true });
    });
  }

  async upsertPage(page: Omit<ScrapePage, "scraped_at">): Promise<void> {
    await guard("upsertPage", () =>
      this.pages.updateOne(
        { url: page.url },
        { $set: page, $currentDate: { scraped_at: true } },
        { upsert: true }
      )
    );
  }

  async listPages(limit: number): Promise<PageSummary[]> {
    return guard("listPages", async () => {
      const docs = await this.pages.find({}).limit(limit).toArray();
      return docs.map((d) => ({
        id: d._id.toHexString(),
        url: d.url,
        path: d.path,
        title: d.title,
        table_count: d.tables?.length ?? 0,
      }));
    });
  }

  async findPage(query: PageQuery): Promise<StoredPage | null> {
    let filter: { url: string } | { _id: ObjectId };
    if ("url" in query) {
      filter = { url: cleanUrl(query.url) };
    } else {
      if (!ObjectId.isValid(query.id)) throw new InvalidIdError(query.id);
      filter = { _id: new ObjectId(query.id) };
    }
    return guard("findPage", async () => {
      const doc = await this.pages.findOne(filter);
      return doc ? toStoredPage(doc) : null;
    });
  }

  async upsertConversions(
    pageUrl: string,
    pageTitle: string | undefined,
    items: ConversionInput[]
  ): Promise<number> {
    if (!items.length) return 0;
    const page_url = cleanUrl(pageUrl);

    return guard("upsertConversions", async () => {
      const result = await this.conversions.bulkWrite(
        items.map((item): AnyBulkWriteOperation<ConversionDoc> => ({
          updateOne: {
            filter: { page_url, source: canonicalName(item.source), target: canonicalName(item.target) },
            update: {
              $set: { rate: item.rate, text: item.text ?? "", page_title: pageTitle ?? null },
              $setOnInsert: { created_at: new Date() },
              $currentDate: { updated_at: true },
            },
            upsert: true,
          },
        })),
        { ordered: true }
      );
      return result.upsertedCount + result.matchedCount;
    });
  }

  async listConversions({ pageUrl, limit = 1000 }: ConversionQuery = {}): Promise<StoredConversion[]> {
    const filter = pageUrl ? { page_url: cleanUrl(pageUrl) } : {};
    return guard("listConversions", async () => {
      const docs = await this.conversions.find(filter).sort({ created_at: 1 }).limit(limit).toArray();
      return docs.map(toStoredConversion);
    });
  }

  async ping(): Promise<boolean> {
    try {
      await this.db.command({ ping: 1 });
      return true;
    } catch (err) {
      log.warn(`ping failed: ${errorMessage(err)}`);
      return false;
    }
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}
