import { PaddleShape } from "./types";
import {
  UNIT_TOKENS,
  SHAPE_KEYWORDS,
  SHAPE_LENGTH_THRESHOLDS,
  SURFACE_MATERIALS,
} from "./normalization-maps";

const STRICT_NUMBER_RE = /^(?:\d+(?:\.\d+)?|\.\d+)$/;
const DUAL_UNIT_SLASH_RE = /(?<!\d\s*)\/|\/(?!\s*\.?\d)/;

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function strictNumber(raw: string): number | null {
  const s = raw.trim();
  if (!STRICT_NUMBER_RE.test(s)) return null;
  return parseFloat(s);
}

function ratio(num: string, den: string): number | null {
  const n = strictNumber(num);
  const d = strictNumber(den);
  if (n === null || d === null || d === 0) return null;
  return n / d;
}

// Four decimal places keeps range means like (7.9 + 8.3) / 2 at exactly 8.1
function round(value: number): number {
  return Math.round(value * 10000) / 10000;
}

/**
 * Strip unit tokens that stand alone or trail a digit ("16.5in", "8 oz").
 * Tokens inside words ("Carbon", "Grip") are left alone.
 */
export function stripUnits(text: string, units: readonly string[] = UNIT_TOKENS): string {
  let out = text.replace(/["”″]/g, " ");
  for (const unit of units) {
    const re = new RegExp(`(?<![a-z])${escapeRegExp(unit)}(?![a-z])`, "gi");
    out = out.replace(re, " ");
  }
  return out.replace(/\s+/g, " ").trim();
}

/**
 * Parse a free-text measurement into a number.
 *
 * Handles mixed numbers ("4 1/4"), fractions ("1/4"), hyphen ranges
 * ("7.9-8.3", averaged) and plain decimals with unit suffixes. Returns null
 * when nothing parses; a zero denominator or a non-numeric range bound is
 * null, never a partial guess.
 */
export function parseMeasurement(
  raw: string | null | undefined,
  units?: readonly string[]
): number | null {
  if (!raw) return null;

  // Footnote markers: "4 1/8 in *may vary up to 1/8"
  const footnote = raw.indexOf("*");
  const cut = footnote >= 0 ? raw.slice(0, footnote) : raw;

  // "7.8 oz / 221 g": a slash without digits on both sides separates two
  // units of the same value, not a fraction. Keep the first.
  const alternate = cut.search(DUAL_UNIT_SLASH_RE);
  if (alternate >= 0) return parseMeasurement(cut.slice(0, alternate), units);

  const text = stripUnits(cut, units);
  if (!text) return null;

  const mixed = text.match(/^(\S+)\s+(\S+)\s*\/\s*(\S+)$/);
  if (mixed) {
    const whole = strictNumber(mixed[1]);
    const frac = ratio(mixed[2], mixed[3]);
    if (whole === null || frac === null) return null;
    return round(whole + frac);
  }

  const fraction = text.match(/^(\S+)\s*\/\s*(\S+)$/);
  if (fraction) {
    const value = ratio(fraction[1], fraction[2]);
    return value === null ? null : round(value);
  }

  const range = text.match(/^([^-]+)-([^-]+)$/);
  if (range) {
    const low = strictNumber(range[1]);
    const high = strictNumber(range[2]);
    if (low === null || high === null) return null;
    return round((low + high) / 2);
  }

  const plain = text.match(/\d*\.?\d+/);
  if (plain) return round(parseFloat(plain[0]));

  return null;
}

// ===== Shape =====

export type ShapeBasis = "length" | "keyword" | "default";

export function shapeFromLength(lengthInches: number): PaddleShape {
  for (const [min, shape] of SHAPE_LENGTH_THRESHOLDS) {
    if (lengthInches >= min) return shape;
  }
  return PaddleShape.WIDE_BODY;
}

/** First category (in SHAPE_KEYWORDS order) with a whole-word keyword hit. */
export function shapeFromKeywords(text: string | null | undefined): PaddleShape | null {
  if (!text) return null;
  for (const [shape, keywords] of SHAPE_KEYWORDS) {
    for (const kw of keywords) {
      // "wide-body", "wide body" and "widebody" are the same word
      const pattern = kw.split(/[\s-]+/).map(escapeRegExp).join("[\\s-]?");
      if (new RegExp(`\\b${pattern}\\b`, "i").test(text)) return shape;
    }
  }
  return null;
}

/**
 * Classify paddle shape from length when known, else from keywords in the
 * description. Defaults to Wide-body.
 */
export function classifyShape(
  lengthInches: number | null,
  description: string
): { shape: PaddleShape; basis: ShapeBasis } {
  if (lengthInches !== null && Number.isFinite(lengthInches)) {
    return { shape: shapeFromLength(lengthInches), basis: "length" };
  }
  const fromText = shapeFromKeywords(description);
  if (fromText) return { shape: fromText, basis: "keyword" };
  return { shape: PaddleShape.WIDE_BODY, basis: "default" };
}

/** Map any shape label onto the closed enum; unrecognized labels are Wide-body. */
export function normalizeShape(label: string | null | undefined): PaddleShape {
  return shapeFromKeywords(label) ?? PaddleShape.WIDE_BODY;
}

// ===== Surface =====

export function normalizeSurface(raw: string | null | undefined): string | null {
  if (!raw) return null;
  const trimmed = raw.replace(/\s+/g, " ").trim();
  if (!trimmed) return null;

  const lower = trimmed.toLowerCase();
  for (const [material, terms] of SURFACE_MATERIALS) {
    if (terms.every((t) => lower.includes(t))) return material;
  }
  return trimmed;
}
