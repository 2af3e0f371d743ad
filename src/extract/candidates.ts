import { CheerioAPI } from "cheerio";
import { collapseWhitespace } from "../utils";

const TEXT_SELECTOR = "h1, h2, h3, h4, h5, h6, p, li, span, div";
const HIDDEN_SELECTOR = "script, style, noscript, template";
const BLOCK_SELECTOR = [
  "address, article, aside, blockquote, dd, div, dl, dt, fieldset, figcaption, figure, footer, form",
  "h1, h2, h3, h4, h5, h6, header, hr, li, main, nav, ol, p, pre, section, ul",
  "table, thead, tbody, tfoot, tr, td, th, caption",
].join(", ");
const IMAGE_TEXT_ATTRIBUTES = ["alt", "title", "aria-label"] as const;
const MIN_LENGTH = 2;

// private-use character, not matched by \s, so collapsing keeps it
const LINE_BREAK = "\uE000";

export type CollectOptions = {
  /** Read alt/title/aria-label and the caption next to each image. */
  useImageMetadata?: boolean;
};

/** Marks where rendering would start a new line: `<br>` and block boundaries. */
function markLineBreaks($: CheerioAPI) {
  $("br").replaceWith(LINE_BREAK);
  $(BLOCK_SELECTOR).before(LINE_BREAK).after(LINE_BREAK);
}

/**
 * Visible text lines worth matching against the rate patterns, in document
 * order and without repeats. Text of sibling blocks or of lines split by
 * `<br>` is never joined. Mutates `$`.
 */
export function collectCandidates($: CheerioAPI, { useImageMetadata = false }: CollectOptions = {}): string[] {
  $(HIDDEN_SELECTOR).remove();
  markLineBreaks($);

  const lines: string[] = [];
  const push = (raw: string | undefined) => {
    for (const part of (raw ?? "").split(LINE_BREAK)) {
      const text = collapseWhitespace(part);
      if (text.length >= MIN_LENGTH) lines.push(text);
    }
  };

  $(TEXT_SELECTOR).each((_, el) => {
    push($(el).text());
  });

  if (useImageMetadata) {
    $("img").each((_, img) => {
      const $img = $(img);
      for (const attr of IMAGE_TEXT_ATTRIBUTES) push($img.attr(attr));

      const caption = $img
        .nextAll()
        .toArray()
        .map((sibling) => collapseWhitespace($(sibling).text().split(LINE_BREAK).join(" ")))
        .find((text) => text.length > 0);
      push(caption);
    });
  }

  return Array.from(new Set(lines));
}
