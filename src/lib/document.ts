import * as cheerio from "cheerio";
import type { SourceDocument } from "./types";

export function loadDocument(
  html: string,
  url: string,
  retrievedAt: string = new Date().toISOString()
): SourceDocument {
  return { url, retrievedAt, $: cheerio.load(html) };
}

/** Visible text of every element matching selector, whitespace-collapsed */
export function visibleText(doc: SourceDocument, selector: string): string {
  const { $ } = doc;
  const parts: string[] = [];
  $(selector).each((_, el) => {
    const clone = $(el).clone();
    clone.find("script, style, noscript").remove();
    parts.push(clone.text());
  });
  return parts.join(" ").replace(/\s+/g, " ").trim();
}
