import { loadDocument, pageTitle as readTitle } from "../parse";
import { ConversionRecord } from "../types";
import { cleanUrl } from "../utils";
import { collectCandidates } from "./candidates";
import { normalizeConversions } from "./normalize";
import { matchRate, RateMatch } from "./patterns";

export { collectCandidates } from "./candidates";
export type { CollectOptions } from "./candidates";
export { canonicalName, conversionKey, normalizeConversions } from "./normalize";
export type { PageContext } from "./normalize";
export { applyPattern, matchRate, parseAmount, RATE_PATTERNS } from "./patterns";
export type { EqualityMatch, PatternMatch, RateMatch, RatePattern, RatioMatch } from "./patterns";

function matchAll(lines: Iterable<string>): RateMatch[] {
  const matches: RateMatch[] = [];
  for (const line of lines) {
    const match = matchRate(line);
    if (match) matches.push(match);
  }
  return matches;
}

/**
 * Runs the whole pipeline over one page: candidate lines, rate patterns,
 * then canonical names and per-pair dedup.
 *
 * @throws ParseError when the HTML cannot be loaded at all.
 */
export function extractConversions(
  pageUrl: string,
  pageTitle: string | undefined,
  html: string,
  useImageMetadata = false
): ConversionRecord[] {
  const url = cleanUrl(pageUrl);
  const $ = loadDocument(html, url);
  const lines = collectCandidates($, { useImageMetadata });
  return normalizeConversions(matchAll(lines), { pageUrl: url, pageTitle: pageTitle ?? readTitle($) });
}

/**
 * Same as {@link extractConversions} for plain text. A line that matches
 * nothing on its own is retried joined with the next line, so two-line
 * ratio statements are found.
 */
export function extractConversionsFromText(
  pageUrl: string,
  pageTitle: string | undefined,
  text: string
): ConversionRecord[] {
  const lines = text
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter((l) => l.length > 0);

  const matches: RateMatch[] = [];
  lines.forEach((line, i) => {
    const match = matchRate(line) ?? (i + 1 < lines.length ? matchRate(`${line}\n${lines[i + 1]}`) : null);
    if (match) matches.push(match);
  });

  return normalizeConversions(matches, { pageUrl, pageTitle });
}
