export const config = {
  dbPath: process.env.DB_PATH || "data/paddle-specs.db",
  scrapeDelayMinMs: parseInt(process.env.SCRAPE_DELAY_MIN_MS || "1000", 10),
  scrapeDelayMaxMs: parseInt(process.env.SCRAPE_DELAY_MAX_MS || "3000", 10),
  maxConcurrentPages: parseInt(process.env.MAX_CONCURRENT_PAGES || "2", 10),
  httpCacheTtlMs: parseInt(process.env.HTTP_CACHE_TTL_MS || String(24 * 60 * 60 * 1000), 10),
  imageDir: process.env.IMAGE_DIR || "images",
  catalogApiUrl: process.env.CATALOG_API_URL || "http://localhost:8080",
  userAgents: [
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.2 Safari/605.1.15",
    "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  ],
  getRandomUserAgent(): string {
    return this.userAgents[Math.floor(Math.random() * this.userAgents.length)];
  },
};
