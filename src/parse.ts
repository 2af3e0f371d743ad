import { load, CheerioAPI } from "cheerio";
import { ParseError } from "./errors";
import { PageExtract, TableData } from "./types";
import { collapseWhitespace } from "./utils";

export function loadDocument(html: string, url: string): CheerioAPI {
  if (typeof html !== "string") {
    throw new ParseError(url, `Expected HTML text for ${url}`);
  }
  try {
    return load(html);
  } catch (err) {
    throw new ParseError(url, `Failed to parse HTML for ${url}`, { cause: err });
  }
}

export function pageTitle($: CheerioAPI): string | undefined {
  return collapseWhitespace($("title").first().text()) || undefined;
}

export function parsePage(html: string, url: string): PageExtract {
  const $ = loadDocument(html, url);
  return {
    url,
    title: pageTitle($),
    tables: extractTables($),
  };
}

export function extractTables($: CheerioAPI): TableData[] {
  const tables: TableData[] = [];

  $("table").each((_, table) => {
    const $table = $(table);
    const cellsOf = (tr: ReturnType<typeof $table.find>) =>
      tr
        .find("th, td")
        .toArray()
        .map((cell) => collapseWhitespace($(cell).text()));

    let headers: string[] = [];
    const headerRow = $table.find("thead tr").first();
    if (headerRow.length) headers = cellsOf(headerRow);
    if (!headers.length) {
      const firstRow = $table.find("tr").first();
      if (firstRow.length) headers = cellsOf(firstRow);
    }

    const body = $table.find("tbody").first();
    const rows: string[][] = [];
    (body.length ? body : $table).find("tr").each((_, tr) => {
      const cells = cellsOf($(tr));
      if (!cells.length) return;
      // repeated header row
      if (headers.length && sameCells(cells, headers)) return;
      rows.push(cells);
    });

    if (headers.length || rows.length) tables.push({ headers, rows });
  });

  return tables;
}

function sameCells(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((v, i) => v === b[i]);
}
