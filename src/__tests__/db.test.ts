import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  initDb,
  closeDb,
  upsertProduct,
  upsertProducts,
  getProduct,
  getAllProducts,
  getPendingUploads,
  setImagePath,
  setUploadStatus,
  insertScrapeRun,
  getLatestRun,
  getAllRuns,
} from "../lib/db";
import { cacheKey, getHttpCache, setHttpCache, pruneHttpCache } from "../lib/scraping/http-cache";
import { PaddleShape } from "../lib/types";
import type { ProductRecord } from "../lib/types";

function makeRecord(brand: string, model: string, weight = 8): ProductRecord {
  return {
    id: `${brand}-${model}`.toLowerCase(),
    metadata: { brand, model, source: "Pickleball Galaxy" },
    specs: {
      shape: PaddleShape.ELONGATED,
      surface: "Carbon Fiber",
      average_weight: weight,
      core: 16,
      paddle_length: 16.5,
      paddle_width: 7.5,
      grip_length: 5.5,
      grip_type: null,
      grip_circumference: 4.25,
    },
    performance: null,
  };
}

const ctx = { sourceUrl: "https://www.pickleballgalaxy.com/x.html", imageUrl: null, runId: "run-1" };

beforeEach(() => {
  initDb(":memory:");
});

afterEach(() => {
  vi.restoreAllMocks();
  closeDb();
});

describe("products", () => {
  it("inserts new ids and refreshes existing ones", () => {
    expect(upsertProduct(makeRecord("Selkirk", "Vanguard"), ctx)).toBe(true);
    expect(upsertProduct(makeRecord("Selkirk", "Vanguard", 7.6), { ...ctx, runId: "run-2" })).toBe(false);

    const stored = getProduct("selkirk-vanguard");
    expect(stored?.record.specs.average_weight).toBe(7.6);
    expect(stored?.runId).toBe("run-2");
    expect(getAllProducts()).toHaveLength(1);
  });

  it("keeps the image path and upload status across re-scrapes", () => {
    upsertProduct(makeRecord("Selkirk", "Vanguard"), { ...ctx, imageUrl: "https://cdn.test/v.jpg" });
    setImagePath("selkirk-vanguard", "images/Selkirk/Selkirk_Vanguard.jpg");
    setUploadStatus("selkirk-vanguard", "created");

    upsertProduct(makeRecord("Selkirk", "Vanguard"), ctx);

    const stored = getProduct("selkirk-vanguard");
    expect(stored?.imagePath).toBe("images/Selkirk/Selkirk_Vanguard.jpg");
    expect(stored?.imageUrl).toBe("https://cdn.test/v.jpg");
    expect(stored?.uploadStatus).toBe("created");
  });

  it("counts inserts and updates in a batch", () => {
    upsertProduct(makeRecord("Engage", "Pursuit"), ctx);
    const counts = upsertProducts([
      { record: makeRecord("Engage", "Pursuit"), ctx },
      { record: makeRecord("JOOLA", "Hyperion"), ctx },
    ]);
    expect(counts).toEqual({ inserted: 1, updated: 1 });
  });

  it("lists products that still need uploading", () => {
    upsertProducts([
      { record: makeRecord("Engage", "Pursuit"), ctx },
      { record: makeRecord("JOOLA", "Hyperion"), ctx },
      { record: makeRecord("Selkirk", "Vanguard"), ctx },
    ]);
    setUploadStatus("engage-pursuit", "created");
    setUploadStatus("joola-hyperion", "error");
    setUploadStatus("selkirk-vanguard", "duplicate");
    upsertProduct(makeRecord("CRBN", "1X"), ctx);

    expect(getPendingUploads().map((p) => p.record.id)).toEqual(["crbn-1x", "joola-hyperion"]);
  });

  it("returns null for unknown ids", () => {
    expect(getProduct("nope")).toBeNull();
  });
});

describe("scrape runs", () => {
  it("returns the latest run first", () => {
    const run = { site: "galaxy", recordCount: 3, rejectedCount: 1, errorCount: 0, durationMs: 1200 };
    insertScrapeRun({ ...run, id: "a", timestamp: "2026-01-01T00:00:00.000Z" });
    insertScrapeRun({ ...run, id: "b", timestamp: "2026-02-01T00:00:00.000Z" });

    expect(getLatestRun()).toEqual({ ...run, id: "b", timestamp: "2026-02-01T00:00:00.000Z" });
    expect(getAllRuns().map((r) => r.id)).toEqual(["b", "a"]);
  });
});

describe("http cache", () => {
  const url = "https://www.pickleballgalaxy.com/x.html";

  it("serves fresh entries", () => {
    setHttpCache(url, "<html>cached</html>");
    expect(getHttpCache(url)).toBe("<html>cached</html>");
  });

  it("shares one entry across tracking parameters and fragments", () => {
    setHttpCache(`${url}?utm_source=listing&utm_medium=grid#reviews`, "<html>cached</html>");
    expect(getHttpCache(url)).toBe("<html>cached</html>");
    expect(getHttpCache(`${url}?gclid=abc`)).toBe("<html>cached</html>");
  });

  it("keeps meaningful query parameters apart", () => {
    const page1 = "https://www.pickleballgalaxy.com/all-pickleball-paddles.html?Offset=0&Per_Page=40";
    setHttpCache(page1, "<html>page 1</html>");
    expect(getHttpCache("https://www.pickleballgalaxy.com/all-pickleball-paddles.html?Per_Page=40&Offset=0")).toBe(
      "<html>page 1</html>"
    );
    expect(getHttpCache("https://www.pickleballgalaxy.com/all-pickleball-paddles.html?Offset=40&Per_Page=40")).toBeNull();
  });

  it("builds keys without tracking parameters", () => {
    expect(cacheKey("https://pickleballcentral.com/joola-hyperion/?utm_campaign=spring&color=blue#top")).toBe(
      "https://pickleballcentral.com/joola-hyperion/?color=blue"
    );
    expect(cacheKey("not a url")).toBe("not a url");
  });

  it("never matches with a zero TTL", () => {
    setHttpCache(url, "<html>cached</html>");
    expect(getHttpCache(url, 0)).toBeNull();
  });

  it("expires and prunes old entries", () => {
    const now = vi.spyOn(Date, "now").mockReturnValue(1_000_000);
    setHttpCache(url, "<html>old</html>", { ttlMs: 100 });
    setHttpCache("https://www.pickleballgalaxy.com/y.html", "<html>new</html>", { ttlMs: 10_000 });

    now.mockReturnValue(1_000_500);
    expect(getHttpCache(url)).toBeNull();
    expect(pruneHttpCache()).toBe(1);
    expect(getHttpCache("https://www.pickleballgalaxy.com/y.html")).toBe("<html>new</html>");
  });
});
