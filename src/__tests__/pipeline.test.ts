import { describe, it, expect, vi } from "vitest";
import { readFileSync } from "fs";
import { resolve } from "path";
import { runPool, runScrapePipeline } from "../lib/pipeline";
import { delay } from "../lib/scraping/utils";

const GALAXY_HTML = readFileSync(resolve(__dirname, "fixtures/galaxy-product.html"), "utf-8");
const NAVIGATION_HTML = readFileSync(resolve(__dirname, "fixtures/galaxy-navigation.html"), "utf-8");
const LISTING_HTML = readFileSync(resolve(__dirname, "fixtures/galaxy-listing-last.html"), "utf-8");

const BASE = "https://www.pickleballgalaxy.com";

describe("runPool", () => {
  it("never runs more than the limit at once", async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const done: number[] = [];

    await runPool([1, 2, 3, 4, 5, 6], 2, async (item) => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await delay(5);
      inFlight--;
      done.push(item);
    });

    expect(maxInFlight).toBe(2);
    expect([...done].sort()).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it("falls back to one worker for an unusable limit", async () => {
    for (const limit of [NaN, 0, -3]) {
      const done: number[] = [];
      await runPool([1, 2, 3], limit, async (item) => {
        done.push(item);
      });
      expect(done).toEqual([1, 2, 3]);
    }
  });
});

describe("runScrapePipeline", () => {
  it("assembles, rejects and reports errors per page", async () => {
    const pages: Record<string, string> = {
      [`${BASE}/selkirk-slk-era-power.html`]: GALAXY_HTML,
      [`${BASE}/paddles.html`]: NAVIGATION_HTML,
    };
    const fetcher = vi.fn(async (url: string) => {
      const html = pages[url];
      if (!html) throw new Error(`HTTP 404 for ${url}`);
      return html;
    });

    const result = await runScrapePipeline({
      urls: [`${BASE}/selkirk-slk-era-power.html`, `${BASE}/paddles.html`, `${BASE}/gone.html`],
      fetcher,
      concurrency: 2,
    });

    expect(result.records.map((r) => r.id)).toEqual(["selkirk-slk-era-power"]);
    expect(result.rejected).toEqual([{ url: `${BASE}/paddles.html`, reason: "navigation-page" }]);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toMatchObject({
      source: "galaxy",
      url: `${BASE}/gone.html`,
      error: `HTTP 404 for ${BASE}/gone.html`,
    });
    expect(result.diagnostics["selkirk-slk-era-power"]).toEqual(
      ["power", "pop", "spin", "twist_weight", "swing_weight", "balance_point"].map((field) => ({
        field,
        reason: "not-found",
      }))
    );
    expect(result.run).toMatchObject({
      site: "generic",
      recordCount: 1,
      rejectedCount: 1,
      errorCount: 1,
    });
  });

  it("keeps the first record in URL order when two pages share an id", async () => {
    const copy = GALAXY_HTML.replace("slk-era-power_480x480.jpg", "slk-era-power-copy_480x480.jpg");
    const fetcher = vi.fn(async (url: string) => {
      // The first page answers last
      if (url.endsWith("slk-era-power.html")) {
        await delay(20);
        return GALAXY_HTML;
      }
      return copy;
    });

    const result = await runScrapePipeline({
      site: "galaxy",
      urls: [`${BASE}/selkirk-slk-era-power.html`, `${BASE}/slk-era-power-2025.html`],
      fetcher,
      concurrency: 2,
    });

    expect(result.records).toHaveLength(1);
    expect(result.imageUrls["selkirk-slk-era-power"]).toBe(
      `${BASE}/mm5/graphics/00000001/slk-era-power_480x480.jpg`
    );
    expect(result.run.site).toBe("galaxy");
  });

  it("drops in-flight work and starts nothing new after cancellation", async () => {
    const controller = new AbortController();
    const fetcher = vi.fn(async () => {
      controller.abort();
      return GALAXY_HTML;
    });

    const result = await runScrapePipeline({
      urls: [`${BASE}/a.html`, `${BASE}/b.html`, `${BASE}/c.html`],
      fetcher,
      concurrency: 1,
      signal: controller.signal,
    });

    expect(fetcher).toHaveBeenCalledTimes(1);
    expect(result.records).toEqual([]);
  });

  it("discovers product URLs from the site's listing", async () => {
    const fetcher = vi.fn(async (url: string) =>
      url.startsWith(`${BASE}/all-pickleball-paddles.html`) ? LISTING_HTML : GALAXY_HTML
    );

    const result = await runScrapePipeline({ site: "galaxy", fetcher });

    expect(fetcher.mock.calls.map(([url]) => url)).toEqual([
      `${BASE}/all-pickleball-paddles.html`,
      `${BASE}/engage-pursuit-ex.html`,
    ]);
    expect(result.records.map((r) => r.id)).toEqual(["selkirk-slk-era-power"]);
  });

  it("needs a site or URLs", async () => {
    await expect(runScrapePipeline({})).rejects.toThrow("needs a site or a list of URLs");
  });
});
