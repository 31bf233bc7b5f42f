import { config } from "../config";
import { ProxyAgent, fetch as undiciFetch } from "undici";
import { getHttpCache, setHttpCache } from "./http-cache";

export async function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Uniform random politeness delay in [scrapeDelayMinMs, scrapeDelayMaxMs] */
export function politeDelayMs(
  min: number = config.scrapeDelayMinMs,
  max: number = config.scrapeDelayMaxMs
): number {
  const lo = Math.max(0, Math.min(min, max));
  const hi = Math.max(lo, max);
  return lo + Math.floor(Math.random() * (hi - lo + 1));
}

function getProxyDispatcher(): ProxyAgent | undefined {
  const proxyUrl =
    process.env.HTTPS_PROXY ||
    process.env.https_proxy ||
    process.env.HTTP_PROXY ||
    process.env.http_proxy;
  if (!proxyUrl) return undefined;
  return new ProxyAgent(proxyUrl);
}

export interface FetchPageOptions {
  retries?: number;
  retryDelayMs?: number;
  timeoutMs?: number;
  cacheTtlMs?: number;
  politeDelayMs?: number; // wait before a network fetch; undefined = random configured delay
}

export async function fetchPage(url: string, options: FetchPageOptions = {}): Promise<string> {
  const { retries = 3, retryDelayMs = 2000, timeoutMs = 15000, cacheTtlMs } = options;

  // Check cache (cacheTtlMs=0 skips, undefined uses the configured TTL)
  const cached = getHttpCache(url, cacheTtlMs);
  if (cached) return cached;

  // Only real network fetches pay the politeness delay
  const wait = options.politeDelayMs ?? politeDelayMs();
  if (wait > 0) await delay(wait);

  const dispatcher = getProxyDispatcher();

  for (let attempt = 0; attempt <= retries; attempt++) {
    try {
      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), timeoutMs);

      const fetchOptions: Parameters<typeof undiciFetch>[1] = {
        headers: {
          "User-Agent": config.getRandomUserAgent(),
          Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
          "Accept-Language": "en-US,en;q=0.9",
        },
        signal: controller.signal,
        dispatcher,
      };

      const response = await undiciFetch(url, fetchOptions);

      clearTimeout(timeout);

      if (response.status === 429 || response.status === 503) {
        if (attempt < retries) {
          const backoff = retryDelayMs * Math.pow(2, attempt);
          console.warn(`[fetch] ${response.status} for ${url}, retrying in ${backoff}ms`);
          await delay(backoff);
          continue;
        }
        throw new Error(`Rate limited (${response.status}) after ${retries} retries: ${url}`);
      }

      if (response.status === 403) {
        throw new Error(`Access denied (403) for ${url}`);
      }

      if (!response.ok) {
        throw new Error(`HTTP ${response.status} for ${url}`);
      }

      const body = await response.text();
      setHttpCache(url, body, { ttlMs: cacheTtlMs });
      return body;
    } catch (error: unknown) {
      if (attempt < retries && error instanceof Error && error.name === "AbortError") {
        const backoff = retryDelayMs * Math.pow(2, attempt);
        await delay(backoff);
        continue;
      }
      throw error;
    }
  }

  throw new Error(`Failed to fetch ${url} after ${retries} retries`);
}
