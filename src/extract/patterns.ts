const AMOUNT = String.raw`(\d+(?:[.,]\d+)?)`;
// a letter, then letters, blanks and hyphens; never digits or punctuation
const NAME = String.raw`([a-z][a-z \t-]*?)`;
const TRAILING_NAME = String.raw`([a-z][a-z \t-]*)`;

export type EqualityMatch = {
  kind: "equality";
  amount1: number;
  source: string;
  amount2: number;
  target: string;
};

export type RatioMatch = {
  kind: "ratio";
  source: string;
  target: string;
  amount1: number;
  amount2: number;
};

export type PatternMatch = EqualityMatch | RatioMatch;

/** A pattern hit with its derived rate: one source unit is worth `rate` target units. */
export type RateMatch = PatternMatch & {
  rate: number;
  text: string;
};

export type RatePattern = {
  kind: PatternMatch["kind"];
  regex: RegExp;
  read: (groups: string[]) => PatternMatch | null;
};

/** Parses an amount written with either `.` or `,` as decimal separator. */
export function parseAmount(raw: string): number {
  return Number(raw.replace(",", "."));
}

/**
 * `1 Gem = 100 Coins`, `2x Gems => 300 Coins`, `1 gem → 5 gold`, `1 Gem to 100 Coins`.
 */
const equality: RatePattern = {
  kind: "equality",
  regex: new RegExp(
    String.raw`${AMOUNT}\s*(?:[x×](?=\s))?\s*${NAME}\s*(?:=>|=|→|\bto\b)\s*${AMOUNT}\s*${TRAILING_NAME}`,
    "i"
  ),
  read: ([amount1, source, amount2, target]) => ({
    kind: "equality",
    amount1: parseAmount(amount1),
    source: source.trim(),
    amount2: parseAmount(amount2),
    target: target.trim(),
  }),
};

/**
 * Two-line ratio tables such as
 *
 *     Gems to
 *     Coins: 1:150
 */
const ratio: RatePattern = {
  kind: "ratio",
  regex: new RegExp(
    String.raw`${NAME}[ \t]*(?:\bto\b|→|->|:)[ \t]*\r?\n\s*${NAME}[ \t]*[:\- \t][ \t]*${AMOUNT}[ \t]*[:/][ \t]*${AMOUNT}`,
    "i"
  ),
  read: ([source, target, amount1, amount2]) => ({
    kind: "ratio",
    source: source.trim(),
    target: target.trim(),
    amount1: parseAmount(amount1),
    amount2: parseAmount(amount2),
  }),
};

/** Tried in this order; the first valid hit wins. */
export const RATE_PATTERNS: readonly RatePattern[] = [equality, ratio];

export function rateOf(match: PatternMatch): number | null {
  if (match.amount1 === 0) return null;
  const rate = match.amount2 / match.amount1;
  return Number.isFinite(rate) && rate > 0 ? rate : null;
}

export function applyPattern(pattern: RatePattern, line: string): RateMatch | null {
  const m = pattern.regex.exec(line);
  if (!m) return null;

  const parsed = pattern.read(m.slice(1));
  if (!parsed || !parsed.source || !parsed.target) return null;

  const rate = rateOf(parsed);
  if (rate === null) return null;
  return { ...parsed, rate, text: line };
}

/** Returns the first pattern hit for `line`, or null when nothing matches. */
export function matchRate(line: string, patterns: readonly RatePattern[] = RATE_PATTERNS): RateMatch | null {
  for (const pattern of patterns) {
    const match = applyPattern(pattern, line);
    if (match) return match;
  }
  return null;
}
