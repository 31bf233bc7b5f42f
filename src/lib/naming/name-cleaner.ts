/**
 * Name cleaning steps for brand and model strings. Each step is exported so
 * callers (and tests) can compose them; `cleanName` runs the full pipeline.
 */

const PIPE_CHARS = "|│｜︱丨¦";
const PIPE_CLASS = `[${PIPE_CHARS}]`;

/** Checked in order, each once per pass, against the current end of string. */
export const TRAILING_SUFFIXES = [
  "Pickleball Paddle",
  "Paddle",
  " - PBC",
  " - NEW",
  " - Limited Edition",
  " - LE",
  " - Elongated",
  " - Standard",
  " - Teardrop",
  " -",
];

/** Removed as whole words, case-insensitive. Multi-word entries first. */
export const PROMO_DESCRIPTORS = ["Limited Edition", "In Stock", "New", "SALE"];

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Drop the first pipe-like delimiter and everything after it */
export function truncateAtPipe(s: string): string {
  return s.replace(new RegExp(`\\s*${PIPE_CLASS}[\\s\\S]*$`), "");
}

/** Remove any stray pipe-like characters */
export function removePipes(s: string): string {
  return s.replace(new RegExp(`${PIPE_CLASS}+`, "g"), "");
}

export function stripTrailingSuffixes(s: string): string {
  let out = s.trim();
  for (const suffix of TRAILING_SUFFIXES) {
    if (out.endsWith(suffix)) {
      out = out.slice(0, out.length - suffix.length).trim();
    }
  }
  return out;
}

/** "Vanguard (16mm)" → "Vanguard " */
export function stripParentheticals(s: string): string {
  return s.replace(/\s*\([^)]*\)\s*/g, " ");
}

export function stripDescriptors(s: string): string {
  let out = s;
  for (const descriptor of PROMO_DESCRIPTORS) {
    out = out.replace(new RegExp(`\\b${escapeRegExp(descriptor)}\\b`, "gi"), "");
  }
  return out;
}

export function collapseWhitespace(s: string): string {
  return s.replace(/\s+/g, " ").trim();
}

function cleanOnce(s: string): string {
  let m = truncateAtPipe(s);
  m = removePipes(m);
  m = stripTrailingSuffixes(m);
  m = stripParentheticals(m);
  m = stripDescriptors(m);
  m = collapseWhitespace(m);
  return m;
}

/**
 * Clean a raw brand/model string. Passes repeat until the output stops
 * changing, so cleanName(cleanName(x)) === cleanName(x). Every pass that
 * changes the string shortens it, which bounds the loop.
 */
export function cleanName(raw: string): string {
  if (!raw) return "";
  let current = cleanOnce(raw);
  for (;;) {
    const next = cleanOnce(current);
    if (next === current) return current;
    current = next;
  }
}
