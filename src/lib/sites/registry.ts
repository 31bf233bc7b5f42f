import type { SiteProfile } from "./types";
import { galaxy } from "./galaxy";
import { central } from "./central";
import { generic } from "./generic";

const ALL_SITES: SiteProfile[] = [galaxy, central];

export function getSite(id: string): SiteProfile {
  return ALL_SITES.find((s) => s.id === id) ?? generic;
}

/** Site whose host matches the URL (subdomains included); generic otherwise */
export function getSiteForUrl(url: string): SiteProfile {
  let host: string;
  try {
    host = new URL(url).hostname.toLowerCase();
  } catch {
    return generic;
  }
  return (
    ALL_SITES.find((s) => s.hosts.some((h) => host === h || host.endsWith(`.${h}`))) ?? generic
  );
}

export function getAllSiteIds(): string[] {
  return [...ALL_SITES.map((s) => s.id), generic.id];
}

export type { SiteProfile, ImageConfig, ImageSource, ListingConfig } from "./types";
