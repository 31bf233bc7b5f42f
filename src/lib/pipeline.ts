import { randomUUID } from "crypto";
import type {
  AssemblyOutcome,
  Diagnostic,
  ProductRecord,
  RejectedPage,
  ScrapeError,
  ScrapeRun,
  ScrapeRunResult,
} from "./types";
import { config } from "./config";
import { loadDocument } from "./document";
import { assembleRecord } from "./assembler";
import { discoverProductUrls } from "./crawler";
import type { PageFetcher } from "./crawler";
import { getSite, getSiteForUrl } from "./sites/registry";
import type { SiteProfile } from "./sites/types";
import { fetchPage } from "./scraping/utils";
import { pruneHttpCache } from "./scraping/http-cache";
import { insertScrapeRun, upsertProducts } from "./db";

export interface PipelineOptions {
  site?: string; // site id; without it each URL picks its site by host
  urls?: string[]; // skip listing discovery
  concurrency?: number;
  signal?: AbortSignal;
  fetcher?: PageFetcher;
  persist?: boolean; // write records and the run to the database
}

type PageResult =
  | { kind: "outcome"; url: string; outcome: AssemblyOutcome }
  | { kind: "error"; url: string; error: ScrapeError };

/**
 * Run `worker` over items with at most `limit` in flight. Once the signal
 * aborts, no further items are started.
 */
export async function runPool<T>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<void>,
  signal?: AbortSignal
): Promise<void> {
  let next = 0;
  // NaN, zero or negative limits (e.g. a bad --concurrency) run one worker
  const workers = Number.isFinite(limit) && limit >= 1 ? Math.floor(limit) : 1;
  const size = Math.max(1, Math.min(workers, items.length));

  const runWorker = async (): Promise<void> => {
    while (next < items.length) {
      if (signal?.aborted) return;
      const index = next++;
      await worker(items[index], index);
    }
  };

  await Promise.all(Array.from({ length: size }, runWorker));
}

async function processPage(
  url: string,
  site: SiteProfile,
  fetcher: PageFetcher
): Promise<PageResult> {
  try {
    const html = await fetcher(url);
    const doc = loadDocument(html, url);
    return { kind: "outcome", url, outcome: assembleRecord(doc, site) };
  } catch (error) {
    console.error(`[pipeline] Failed to process ${url}:`, error);
    return {
      kind: "error",
      url,
      error: {
        source: site.id,
        url,
        error: error instanceof Error ? error.message : String(error),
        timestamp: new Date().toISOString(),
      },
    };
  }
}

/**
 * Discover (or take) product URLs, fetch and assemble each page through a
 * bounded worker pool, and deduplicate records by id. When several pages
 * yield the same id, the one earliest in URL order wins.
 */
export async function runScrapePipeline(options: PipelineOptions = {}): Promise<ScrapeRunResult> {
  const startTime = Date.now();
  const runId = randomUUID();
  const fetcher = options.fetcher ?? ((url: string) => fetchPage(url));
  const concurrency = options.concurrency ?? config.maxConcurrentPages;
  const { signal } = options;
  const siteId = options.site ?? "generic";

  const errors: ScrapeError[] = [];

  let urls = options.urls;
  if (!urls) {
    if (!options.site) throw new Error("runScrapePipeline needs a site or a list of URLs");
    try {
      urls = await discoverProductUrls(getSite(options.site), { fetcher, signal });
    } catch (error) {
      console.error(`[pipeline] Listing discovery failed for ${options.site}:`, error);
      errors.push({
        source: options.site,
        url: getSite(options.site).listing?.startUrl ?? "",
        error: error instanceof Error ? error.message : String(error),
        timestamp: new Date().toISOString(),
      });
      urls = [];
    }
  }
  console.log(`[pipeline] ${urls.length} product URLs, concurrency ${concurrency}`);

  const results = new Array<PageResult | undefined>(urls.length);
  await runPool(
    urls,
    concurrency,
    async (url, index) => {
      const site = options.site ? getSite(options.site) : getSiteForUrl(url);
      const result = await processPage(url, site, fetcher);
      // Work that finishes after cancellation is dropped, never kept half-done
      if (signal?.aborted) return;
      results[index] = result;
    },
    signal
  );
  if (signal?.aborted) {
    console.warn(`[pipeline] Cancelled; kept ${results.filter(Boolean).length} of ${urls.length} pages`);
  }

  const records: ProductRecord[] = [];
  const diagnostics: Record<string, readonly Diagnostic[]> = {};
  const imageUrls: Record<string, string> = {};
  const sourceUrls: Record<string, string> = {};
  const rejected: RejectedPage[] = [];
  const seen = new Set<string>();

  for (const result of results) {
    if (!result) continue;
    if (result.kind === "error") {
      errors.push(result.error);
      continue;
    }
    const { outcome } = result;
    if (outcome.status === "rejected") {
      console.warn(`[pipeline] Rejected ${outcome.url}: ${outcome.reason}`);
      rejected.push({ url: outcome.url, reason: outcome.reason });
      continue;
    }
    const { record } = outcome;
    if (seen.has(record.id)) {
      console.log(`[pipeline] Duplicate ${record.id} from ${result.url}, keeping first`);
      continue;
    }
    seen.add(record.id);
    records.push(record);
    diagnostics[record.id] = outcome.diagnostics;
    sourceUrls[record.id] = result.url;
    if (outcome.imageUrl) imageUrls[record.id] = outcome.imageUrl;
  }

  const run: ScrapeRun = {
    id: runId,
    site: siteId,
    timestamp: new Date().toISOString(),
    recordCount: records.length,
    rejectedCount: rejected.length,
    errorCount: errors.length,
    durationMs: Date.now() - startTime,
  };

  if (options.persist) {
    const { inserted, updated } = upsertProducts(
      records.map((record) => ({
        record,
        ctx: {
          sourceUrl: sourceUrls[record.id],
          imageUrl: imageUrls[record.id] ?? null,
          runId,
        },
      }))
    );
    insertScrapeRun(run);
    pruneHttpCache();
    console.log(`[pipeline] Stored ${inserted} new, ${updated} updated products`);
  }

  console.log(
    `[pipeline] Done in ${run.durationMs}ms: ${records.length} records, ${rejected.length} rejected, ${errors.length} errors`
  );

  return { run, records, diagnostics, imageUrls, rejected, errors };
}
