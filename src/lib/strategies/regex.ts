import type { SourceDocument } from "../types";
import { visibleText } from "../document";
import type { FieldExtractor, RegexStrategy } from "./types";

export class RegexExtractor implements FieldExtractor<RegexStrategy> {
  extract(doc: SourceDocument, strategy: RegexStrategy): string | null {
    const text = visibleText(doc, strategy.selector);
    if (!text) return null;
    const match = text.match(strategy.pattern);
    if (!match) return null;
    const captured = (match[1] ?? match[0]).trim();
    return captured || null;
  }
}
