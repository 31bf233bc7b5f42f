import type { FieldSpec } from "../strategies";

export interface ImageSource {
  selector: string;
  attributes: string[]; // first non-empty attribute wins, e.g. ["src", "data-src"]
}

export interface ImageConfig {
  sources: ImageSource[]; // priority order
  reject: RegExp[];
  baseUrl?: string; // for relative paths; defaults to the page URL
}

export interface ListingConfig {
  startUrl: string;
  pageUrl(page: number): string; // page >= 2
  linkSelectors: string[]; // first selector with any match wins
  nextPageSelectors: string[];
  maxPages: number;
}

/**
 * Everything site-specific about extraction, as data. Adding a site means
 * adding one of these to the registry.
 */
export interface SiteProfile {
  id: string;
  name: string; // provenance recorded on every record
  baseUrl: string;
  hosts: string[];
  productMarker: string | null; // product pages contain at least one match
  fields: FieldSpec[];
  images: ImageConfig;
  listing: ListingConfig | null;
}
