import fs from "fs/promises";
import path from "path";
import { fetch as undiciFetch } from "undici";
import { config } from "./config";
import type { SourceDocument } from "./types";
import type { SiteProfile } from "./sites/types";

const IMAGE_EXTENSIONS = new Set(["jpg", "jpeg", "png", "gif", "webp"]);

/**
 * Product image URL from the site's image sources, in priority order.
 * Placeholder, logo and thumbnail images are skipped; relative paths are
 * resolved against the site's image base (or the page URL).
 */
export function selectImageUrl(doc: SourceDocument, site: SiteProfile): string | null {
  const { $ } = doc;
  const base = site.images.baseUrl || doc.url;

  for (const source of site.images.sources) {
    for (const el of $(source.selector).toArray()) {
      for (const attr of source.attributes) {
        const raw = $(el).attr(attr)?.trim();
        if (!raw || raw.startsWith("data:")) continue;
        if (site.images.reject.some((re) => re.test(raw))) continue;
        const resolved = resolveUrl(raw, base);
        if (resolved) return resolved;
      }
    }
  }
  return null;
}

function resolveUrl(raw: string, base: string): string | null {
  try {
    return new URL(raw, base || undefined).toString();
  } catch {
    return null;
  }
}

export function sanitizeFileName(name: string): string {
  return name
    .replace(/[<>:"/\\|?*]/g, "_")
    .replace(/\s+/g, "_")
    .replace(/^[._]+|[._]+$/g, "");
}

/** "Selkirk", "SLK Era", ".../era.PNG?v=2" → "Selkirk/Selkirk_SLK_Era.png" */
export function imageFileName(brand: string, model: string, imageUrl: string): string {
  const pathname = imageUrl.split(/[?#]/)[0];
  const match = pathname.match(/\.([a-z0-9]+)$/i);
  const ext = match && IMAGE_EXTENSIONS.has(match[1].toLowerCase()) ? match[1].toLowerCase() : "jpg";
  const b = sanitizeFileName(brand);
  return path.posix.join(b, `${b}_${sanitizeFileName(model)}.${ext}`);
}

async function exists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

/**
 * Download an image under config.imageDir. Returns the local path, or null
 * when the download fails. An existing file is reused without fetching.
 */
export async function saveImage(
  imageUrl: string,
  brand: string,
  model: string,
  options: { dir?: string } = {}
): Promise<string | null> {
  if (!imageUrl) return null;
  const filePath = path.join(options.dir ?? config.imageDir, imageFileName(brand, model, imageUrl));

  if (await exists(filePath)) {
    console.log(`[images] already have ${filePath}`);
    return filePath;
  }

  try {
    const response = await undiciFetch(imageUrl, {
      headers: { "User-Agent": config.getRandomUserAgent() },
    });
    if (!response.ok) {
      console.warn(`[images] HTTP ${response.status} for ${imageUrl}`);
      return null;
    }
    const data = Buffer.from(await response.arrayBuffer());
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, data);
    console.log(`[images] saved ${filePath}`);
    return filePath;
  } catch (err) {
    console.error(`[images] failed to save ${imageUrl}:`, err instanceof Error ? err.message : err);
    return null;
  }
}
