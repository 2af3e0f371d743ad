export function collapseWhitespace(s: string): string {
  return s.replace(/\s+/g, " ").trim();
}

/** Drops the fragment; the result is the identity of a page everywhere. */
export function cleanUrl(url: string): string {
  const hash = url.indexOf("#");
  return hash >= 0 ? url.slice(0, hash) : url;
}

export function sameOrigin(base: string, target: string): boolean {
  try {
    const b = new URL(base);
    const t = new URL(target);
    return (t.protocol === "http:" || t.protocol === "https:") && t.host === b.host;
  } catch {
    return false;
  }
}

export function urlPath(url: string): string {
  try {
    return new URL(url).pathname;
  } catch {
    return "";
  }
}

export function resolveUrl(base: string, href: string): string | undefined {
  try {
    return new URL(href, base).toString();
  } catch {
    return undefined;
  }
}

export async function sleep(ms: number) {
  return new Promise((r) => setTimeout(r, ms));
}
