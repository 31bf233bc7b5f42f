import type { SourceDocument } from "../types";
import type { FieldExtractor, SelectorStrategy } from "./types";

export class SelectorExtractor implements FieldExtractor<SelectorStrategy> {
  extract(doc: SourceDocument, strategy: SelectorStrategy): string | null {
    const { $ } = doc;
    const minLength = strategy.minLength ?? 1;

    for (const el of $(strategy.selector).toArray()) {
      const raw = strategy.attribute ? $(el).attr(strategy.attribute) ?? "" : $(el).text();
      let value = raw.replace(/\s+/g, " ").trim();
      if (strategy.split) {
        const idx = value.indexOf(strategy.split);
        if (idx >= 0) value = value.slice(0, idx).trim();
      }
      if (value.length >= minLength) return value;
    }
    return null;
  }
}
