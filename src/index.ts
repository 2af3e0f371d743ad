#!/usr/bin/env node
import { parseCliArgs } from "./cli";
import { config } from "./config";
import { crawlPages } from "./crawl";
import { extractConversions } from "./extract";
import { createLogger, errorMessage } from "./logger";
import { makeFilename, saveCsv, saveJson } from "./save";
import { MongoStore } from "./store/mongo";
import { Store } from "./store/types";
import { ConversionRecord, TableData } from "./types";
import { urlPath } from "./utils";

const log = createLogger("cli");

async function main() {
  const opts = parseCliArgs(process.argv.slice(2));

  let store: Store | null = null;
  if (config.DATABASE_URL) store = await MongoStore.connect(config.DATABASE_URL, config.DATABASE_NAME);

  try {
    log.info(`[1/3] Fetching ${opts.url}${opts.crawl ? ` (crawl, up to ${opts.maxPages} pages)` : ""} ...`);
    const tables: Array<{ url: string; title?: string } & TableData> = [];
    const conversions: ConversionRecord[] = [];

    for await (const page of crawlPages({ url: opts.url, crawl: opts.crawl, maxPages: opts.maxPages })) {
      const records = extractConversions(page.url, page.extract.title, page.fetched.html, opts.ocr);
      log.info(`  ${page.url}: ${page.extract.tables.length} tables, ${records.length} conversions`);

      for (const table of page.extract.tables) tables.push({ url: page.url, title: page.extract.title, ...table });
      conversions.push(...records);

      if (store) {
        await store.upsertPage({ url: page.url, path: urlPath(page.url), title: page.extract.title, tables: page.extract.tables });
        await store.upsertConversions(page.url, page.extract.title, records);
      }
    }

    log.info("[2/3] Writing exports ...");
    const tablesPath = await saveJson(tables, makeFilename("tables", opts.url, "json"));
    const jsonPath = await saveJson(conversions, makeFilename("conversions", opts.url, "json"));
    const csvPath = await saveCsv(conversions, makeFilename("conversions", opts.url, "csv"));

    log.info(`[3/3] Done: ${conversions.length} conversions
Tables: ${tablesPath}
JSON  : ${jsonPath}
CSV   : ${csvPath}${store ? "\nSaved to database." : ""}`);
  } finally {
    await store?.close();
  }
}

if (require.main === module) {
  main().catch((e) => {
    log.error(`Error: ${errorMessage(e)}`);
    process.exit(1);
  });
}
