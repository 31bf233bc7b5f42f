import * as cheerio from "cheerio";
import type { SiteProfile } from "./sites/types";
import { fetchPage } from "./scraping/utils";

export type PageFetcher = (url: string) => Promise<string>;

export interface DiscoverOptions {
  fetcher?: PageFetcher;
  signal?: AbortSignal;
}

/** Product links on one listing page, resolved to absolute URLs */
export function parseListingLinks(html: string, site: SiteProfile, pageUrl: string): string[] {
  if (!site.listing) return [];
  const $ = cheerio.load(html);

  for (const selector of site.listing.linkSelectors) {
    const hrefs = $(selector)
      .toArray()
      .map((el) => $(el).attr("href")?.trim())
      .filter((href): href is string => !!href && !href.startsWith("#"));
    if (hrefs.length === 0) continue;

    const urls: string[] = [];
    for (const href of hrefs) {
      try {
        urls.push(new URL(href, site.baseUrl || pageUrl).toString());
      } catch {
        console.warn(`[crawler] skipping bad link ${href}`);
      }
    }
    return urls;
  }
  return [];
}

export function hasNextPage(html: string, site: SiteProfile): boolean {
  if (!site.listing) return false;
  const $ = cheerio.load(html);
  return site.listing.nextPageSelectors.some((s) => $(s).length > 0);
}

/**
 * Walk a site's listing pages and collect product URLs in discovery order,
 * without duplicates. Stops at maxPages, on a page with no product links,
 * or when a page has no next-page link.
 */
export async function discoverProductUrls(
  site: SiteProfile,
  options: DiscoverOptions = {}
): Promise<string[]> {
  const { listing } = site;
  if (!listing) {
    console.warn(`[crawler] ${site.id} has no listing pages; pass product URLs instead`);
    return [];
  }

  const fetcher = options.fetcher ?? ((url: string) => fetchPage(url));
  const seen = new Set<string>();
  const urls: string[] = [];

  for (let page = 1; page <= listing.maxPages; page++) {
    if (options.signal?.aborted) break;

    const pageUrl = page === 1 ? listing.startUrl : listing.pageUrl(page);
    console.log(`[crawler] ${site.id} listing page ${page}: ${pageUrl}`);
    const html = await fetcher(pageUrl);

    const links = parseListingLinks(html, site, pageUrl);
    if (links.length === 0) {
      console.warn(`[crawler] no product links on page ${page}; markup may have changed`);
      break;
    }

    let added = 0;
    for (const link of links) {
      if (seen.has(link)) continue;
      seen.add(link);
      urls.push(link);
      added++;
    }
    console.log(`[crawler] page ${page}: ${added} new product URLs`);

    if (added === 0 || !hasNextPage(html, site)) break;
  }

  return urls;
}
