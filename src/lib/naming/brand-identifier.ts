/**
 * Resolves the brand of a paddle from its page title, falling back to the
 * product URL. Derived properties are lazy-computed and cached.
 *
 * Usage:
 *   const id = new BrandIdentifier("JOOLA Ben Johns Hyperion 16mm", url);
 *   id.canonical   // "JOOLA"
 *   id.matchedText // "JOOLA"
 */

export type BrandBasis = "prefix" | "word" | "url" | "first-word" | "two-word";

export interface BrandMatch {
  canonical: string;
  matchedText: string; // the spelling found in the title, for prefix stripping
  basis: BrandBasis;
}

// ---------------------------------------------------------------------------
// Known brands, in match priority order. Longer names sharing a prefix with a
// shorter one ("Selkirk Labs" / "Selkirk") must come first.
// ---------------------------------------------------------------------------

export const KNOWN_BRANDS = [
  "Selkirk Labs",
  "Selkirk",
  "Engage",
  "JOOLA",
  "Paddletek",
  "Gearbox",
  "Franklin",
  "CRBN",
  "Diadem",
  "HEAD",
  "Gamma",
  "Players",
  "adidas",
  "OneShot",
  "Electrum",
  "SLK",
  "Legacy Pro",
  "Rokne",
  "Babolat",
  "TMPR",
  "Pickleball Apes",
  "ProKennex",
  "Vulcan",
  "Wilson",
  "Onix",
  "Prince",
  "Rally",
  "PROLITE",
];

// Alternate spellings → canonical brand
const BRAND_ALIASES: Record<string, string> = {
  "pro-lite": "PROLITE",
  "pro lite": "PROLITE",
  "joola": "JOOLA",
  "crbn pickleball": "CRBN",
  "gamma sports": "Gamma",
  "head": "HEAD",
};

const BRAND_VARIANTS: [string, string][] = [
  ...KNOWN_BRANDS.map((b): [string, string] => [b, b]),
  ...Object.entries(BRAND_ALIASES),
];

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function slugify(s: string): string {
  return s.toLowerCase().trim().replace(/\s+/g, "-");
}

/** Canonical spelling for a brand label, or the label itself when unknown */
export function canonicalizeBrand(brand: string): string {
  const key = brand.toLowerCase().replace(/\s+/g, " ").trim();
  const known = KNOWN_BRANDS.find((b) => b.toLowerCase() === key);
  return known ?? BRAND_ALIASES[key] ?? brand.trim();
}

export function isKnownBrand(brand: string): boolean {
  const key = brand.toLowerCase().trim();
  return KNOWN_BRANDS.some((b) => b.toLowerCase() === key);
}

export class BrandIdentifier {
  readonly title: string;
  readonly url: string;

  private _match?: BrandMatch | null;

  constructor(title: string, url = "") {
    this.title = title.trim();
    this.url = url;
  }

  get match(): BrandMatch | null {
    if (this._match === undefined) {
      this._match = this.identify();
    }
    return this._match;
  }

  get canonical(): string | null {
    return this.match?.canonical ?? null;
  }

  get matchedText(): string | null {
    return this.match?.matchedText ?? null;
  }

  private identify(): BrandMatch | null {
    if (!this.title) return this.fromUrl();

    // Prefix match across every known spelling before any mid-title match,
    // so "SLK by Selkirk ..." resolves to SLK
    for (const [variant, canonical] of BRAND_VARIANTS) {
      const re = new RegExp(`^${escapeRegExp(variant)}(?![a-z0-9])`, "i");
      const m = this.title.match(re);
      if (m) return { canonical, matchedText: m[0], basis: "prefix" };
    }

    for (const [variant, canonical] of BRAND_VARIANTS) {
      const re = new RegExp(`\\b${escapeRegExp(variant)}\\b`, "i");
      const m = this.title.match(re);
      if (m) return { canonical, matchedText: m[0], basis: "word" };
    }

    const fromUrl = this.fromUrl();
    if (fromUrl) return fromUrl;

    const words = this.title.split(/\s+/);
    const lowerUrl = this.url.toLowerCase();
    if (words.length >= 2) {
      const twoWord = `${words[0]} ${words[1]}`;
      if (lowerUrl && lowerUrl.includes(slugify(twoWord))) {
        return { canonical: twoWord, matchedText: twoWord, basis: "two-word" };
      }
    }
    return { canonical: words[0], matchedText: words[0], basis: "first-word" };
  }

  private fromUrl(): BrandMatch | null {
    const lowerUrl = this.url.toLowerCase();
    if (!lowerUrl) return null;
    for (const brand of KNOWN_BRANDS) {
      if (new RegExp(`\\b${escapeRegExp(slugify(brand))}\\b`).test(lowerUrl)) {
        return { canonical: brand, matchedText: "", basis: "url" };
      }
    }
    return null;
  }
}
