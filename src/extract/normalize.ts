import { ConversionRecord } from "../types";
import { cleanUrl, collapseWhitespace } from "../utils";
import type { RateMatch } from "./patterns";

export type PageContext = {
  pageUrl: string;
  pageTitle?: string;
};

/** `"  gold   BAR "` → `"Gold Bar"`. */
export function canonicalName(name: string): string {
  return collapseWhitespace(name)
    .split(" ")
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(" ");
}

export function conversionKey(record: Pick<ConversionRecord, "page_url" | "source" | "target">): string {
  return JSON.stringify([record.page_url, record.source, record.target]);
}

/**
 * Canonicalizes names and keeps one record per (page, source, target).
 * A later duplicate replaces the rate and text of the earlier one but the
 * record stays where the pair was first seen.
 */
export function normalizeConversions(
  matches: Iterable<Pick<RateMatch, "source" | "target" | "rate" | "text">>,
  { pageUrl, pageTitle }: PageContext
): ConversionRecord[] {
  const page_url = cleanUrl(pageUrl);
  const byKey = new Map<string, ConversionRecord>();

  for (const match of matches) {
    const record: ConversionRecord = {
      page_url,
      page_title: pageTitle,
      source: canonicalName(match.source),
      target: canonicalName(match.target),
      rate: match.rate,
      text: match.text,
    };
    if (!record.source || !record.target || !(record.rate > 0)) continue;

    const key = conversionKey(record);
    const existing = byKey.get(key);
    if (existing) {
      existing.rate = record.rate;
      existing.text = record.text;
    } else {
      byKey.set(key, record);
    }
  }

  return Array.from(byKey.values());
}
