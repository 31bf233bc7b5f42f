import { describe, it, expect, vi, beforeEach } from "vitest";

// Mock http-cache before importing fetchPage
vi.mock("../lib/scraping/http-cache", () => ({
  getHttpCache: vi.fn(),
  setHttpCache: vi.fn(),
}));

vi.mock("undici", () => ({
  fetch: vi.fn(),
  ProxyAgent: vi.fn(),
}));

import { fetchPage, politeDelayMs } from "../lib/scraping/utils";
import { getHttpCache, setHttpCache } from "../lib/scraping/http-cache";
import { fetch as undiciFetch } from "undici";

const mockCache = getHttpCache as ReturnType<typeof vi.fn>;
const mockFetch = undiciFetch as ReturnType<typeof vi.fn>;

const URL = "https://www.pickleballgalaxy.com/selkirk-vanguard.html";

function page(body: string, status = 200) {
  return { ok: status >= 200 && status < 300, status, text: () => Promise.resolve(body) };
}

describe("fetchPage", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("returns a cached page without waiting or fetching", async () => {
    mockCache.mockReturnValue("<html>cached</html>");

    const start = Date.now();
    const result = await fetchPage(URL);

    expect(result).toBe("<html>cached</html>");
    expect(Date.now() - start).toBeLessThan(100);
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it("waits the polite delay before a network fetch", async () => {
    mockCache.mockReturnValue(null);
    mockFetch.mockResolvedValue(page("<html>fresh</html>"));

    const start = Date.now();
    const result = await fetchPage(URL, { politeDelayMs: 50 });

    expect(result).toBe("<html>fresh</html>");
    expect(Date.now() - start).toBeGreaterThanOrEqual(45);
    expect(setHttpCache).toHaveBeenCalledWith(URL, "<html>fresh</html>", { ttlMs: undefined });
  });

  it("retries a 503 with backoff", async () => {
    mockCache.mockReturnValue(null);
    mockFetch.mockResolvedValueOnce(page("", 503)).mockResolvedValueOnce(page("<html>ok</html>"));

    const result = await fetchPage(URL, { politeDelayMs: 0, retryDelayMs: 1 });

    expect(result).toBe("<html>ok</html>");
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it("gives up after the last rate-limited retry", async () => {
    mockCache.mockReturnValue(null);
    mockFetch.mockResolvedValue(page("", 429));

    await expect(fetchPage(URL, { politeDelayMs: 0, retryDelayMs: 1, retries: 1 })).rejects.toThrow(
      `Rate limited (429) after 1 retries: ${URL}`
    );
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it("does not retry other HTTP errors", async () => {
    mockCache.mockReturnValue(null);
    mockFetch.mockResolvedValue(page("", 404));

    await expect(fetchPage(URL, { politeDelayMs: 0 })).rejects.toThrow(`HTTP 404 for ${URL}`);
    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(setHttpCache).not.toHaveBeenCalled();
  });

  it("reports 403 as access denied", async () => {
    mockCache.mockReturnValue(null);
    mockFetch.mockResolvedValue(page("", 403));

    await expect(fetchPage(URL, { politeDelayMs: 0 })).rejects.toThrow(`Access denied (403) for ${URL}`);
  });
});

describe("politeDelayMs", () => {
  it("stays within bounds", () => {
    for (let i = 0; i < 20; i++) {
      const ms = politeDelayMs(10, 20);
      expect(ms).toBeGreaterThanOrEqual(10);
      expect(ms).toBeLessThanOrEqual(20);
    }
  });

  it("collapses to the lower bound when max is not above min", () => {
    expect(politeDelayMs(5, 5)).toBe(5);
    expect(politeDelayMs(20, 10)).toBe(10);
    expect(politeDelayMs(0, 0)).toBe(0);
  });
});
