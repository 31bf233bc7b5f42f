import type { SourceDocument } from "../types";
import type { FieldExtractor, KeyValueStrategy } from "./types";

const BLOCK_ELEMENTS = "li, p, div, tr, dt, dd, h1, h2, h3, h4, h5, h6";

export function normalizeKey(key: string): string {
  return key.replace(/\s+/g, " ").trim().toLowerCase();
}

/**
 * Every "key: value" line inside the elements matched by selector.
 * Block elements and <br> break lines. The first occurrence of a key wins;
 * lines with an empty value are skipped.
 */
export function parseKeyValueBlock(doc: SourceDocument, selector: string): Map<string, string> {
  const { $ } = doc;
  const pairs = new Map<string, string>();

  $(selector).each((_, el) => {
    const clone = $(el).clone();
    clone.find("script, style, noscript").remove();
    clone.find("br").replaceWith("\n");
    clone.find(BLOCK_ELEMENTS).each((_, child) => {
      $(child).append("\n");
    });

    for (const line of clone.text().split("\n")) {
      const idx = line.indexOf(":");
      if (idx <= 0) continue;
      const key = normalizeKey(line.slice(0, idx));
      const value = line.slice(idx + 1).replace(/\s+/g, " ").trim();
      if (!key || !value || pairs.has(key)) continue;
      pairs.set(key, value);
    }
  });

  return pairs;
}

export class KeyValueExtractor implements FieldExtractor<KeyValueStrategy> {
  extract(doc: SourceDocument, strategy: KeyValueStrategy): string | null {
    const pairs = parseKeyValueBlock(doc, strategy.selector);
    for (const key of strategy.keys) {
      const value = pairs.get(normalizeKey(key));
      if (value) return value;
    }
    return null;
  }
}
