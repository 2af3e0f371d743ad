import { parseArgs } from "node:util";

const USAGE = "Usage: rate-scraper --url <url> [--crawl] [--max-pages <n>] [--ocr]";

export type CliOptions = {
  url: string;
  crawl: boolean;
  maxPages: number;
  ocr: boolean;
};

export function parseCliArgs(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      url: { type: "string" },
      crawl: { type: "boolean", default: false },
      "max-pages": { type: "string", default: "10" },
      ocr: { type: "boolean", default: false },
    },
  });

  if (!values.url) throw new Error(USAGE);
  const maxPages = Number(values["max-pages"]);
  if (!Number.isInteger(maxPages) || maxPages < 1) throw new Error(`--max-pages must be a positive integer\n${USAGE}`);

  return { url: values.url, crawl: values.crawl ?? false, maxPages, ocr: values.ocr ?? false };
}
