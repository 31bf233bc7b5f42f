import type { SourceDocument } from "../types";
import { visibleText } from "../document";
import type { FieldExtractor, KeywordSentenceStrategy } from "./types";

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Split on periods that end a sentence; "16.5" stays whole */
export function splitSentences(text: string): string[] {
  return text
    .split(/\.(?=\s|$)/)
    .map((s) => s.trim())
    .filter(Boolean);
}

export class KeywordSentenceExtractor implements FieldExtractor<KeywordSentenceStrategy> {
  extract(doc: SourceDocument, strategy: KeywordSentenceStrategy): string | null {
    const text = visibleText(doc, strategy.selector);
    if (!text) return null;
    const re = new RegExp(`\\b${escapeRegExp(strategy.keyword)}\\b`, "i");
    return splitSentences(text).find((s) => re.test(s)) ?? null;
  }
}
