import { cleanName } from "./name-cleaner";

/** Title suffixes stripped (case-insensitive) until none remain */
const TITLE_SUFFIXES = [
  "Pickleball Paddle",
  "Paddle",
  "Pickleball",
  "(Elongated)",
  "Elongated",
  "(Standard)",
  "Standard",
  "(Lightweight)",
  "Lightweight",
];

const SOURCE_SITE_NAMES = ["Pickleball Galaxy", "Pickleball Central", "Pickleball"];

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Strip the brand spelling found in the title from its start */
export function stripBrandPrefix(title: string, matchedBrand: string | null): string {
  if (!matchedBrand) return title.trim();
  const re = new RegExp(`^\\s*${escapeRegExp(matchedBrand)}(?![a-z0-9])\\s*`, "i");
  return title.replace(re, "").trim();
}

export function stripTitleSuffixes(m: string): string {
  let out = m.trim();
  let changed = true;
  while (changed && out) {
    changed = false;
    for (const suffix of TITLE_SUFFIXES) {
      const re = new RegExp(`(?:^|\\s)${escapeRegExp(suffix)}$`, "i");
      if (re.test(out)) {
        out = out.replace(re, "").trim();
        changed = true;
      }
    }
  }
  return out;
}

export function stripSiteNames(m: string): string {
  let out = m;
  for (const name of SOURCE_SITE_NAMES) {
    out = out.replace(new RegExp(`\\b${escapeRegExp(name)}\\b`, "gi"), " ");
  }
  return out.replace(/\s+/g, " ").trim();
}

/**
 * Model name from a product title: brand prefix, product-type suffixes and
 * site names removed, then cleaned.
 */
export function deriveModelName(title: string, matchedBrand: string | null): string {
  let m = cleanName(title);
  m = stripBrandPrefix(m, matchedBrand);
  m = stripTitleSuffixes(m);
  m = stripSiteNames(m);
  return cleanName(m);
}

function safeDecode(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment; // malformed escape
  }
}

/**
 * "https://example.com/selkirk-vanguard-power-air.html" → "Selkirk Vanguard Power Air".
 * Returns "" when the URL has no usable path segment.
 */
export function modelFromUrl(url: string): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    pathname = url;
  }
  const segments = pathname.split("/").filter(Boolean);
  const last = segments[segments.length - 1];
  if (!last) return "";
  const slug = safeDecode(last).replace(/\.[a-z0-9]+$/i, "");
  return slug
    .split(/[-_]+/)
    .filter(Boolean)
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1))
    .join(" ");
}
