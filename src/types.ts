export type TableData = {
  headers: string[];
  rows: string[][];
};

export type PageExtract = {
  url: string;
  title?: string;
  tables: TableData[];
};

export type FetchedPage = {
  finalUrl: string;
  html: string;
  title?: string;
};

export type ConversionRecord = {
  page_url: string;
  page_title?: string;
  source: string;
  target: string;
  rate: number; // target units per one source unit
  text: string;
};

export type ScrapePage = {
  url: string;
  path: string;
  title?: string;
  tables: TableData[];
  scraped_at?: Date;
};

export type StoredPage = ScrapePage & { id: string };

export type PageSummary = {
  id: string;
  url: string;
  path: string;
  title?: string;
  table_count: number;
};

export type StoredConversion = ConversionRecord & {
  created_at: Date;
  updated_at: Date;
};

export type ConversionInput = {
  source: string;
  target: string;
  rate: number;
  text?: string;
};
