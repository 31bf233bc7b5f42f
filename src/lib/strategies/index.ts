import type { SourceDocument } from "../types";
import type { ExtractionStrategy } from "./types";
import { KeyValueExtractor } from "./key-value";
import { RegexExtractor } from "./regex";
import { KeywordSentenceExtractor } from "./keyword-sentence";
import { SelectorExtractor } from "./selector";

export { parseKeyValueBlock, normalizeKey } from "./key-value";
export { splitSentences } from "./keyword-sentence";
export type {
  ExtractionStrategy,
  ExtractionResult,
  FieldExtractor,
  FieldKind,
  FieldSpec,
  KeyValueStrategy,
  KeywordSentenceStrategy,
  RegexStrategy,
  SelectorStrategy,
  StrategyType,
} from "./types";

const keyValueExtractor = new KeyValueExtractor();
const regexExtractor = new RegexExtractor();
const keywordSentenceExtractor = new KeywordSentenceExtractor();
const selectorExtractor = new SelectorExtractor();

/**
 * Run one extraction strategy against a document.
 */
export function runStrategy(doc: SourceDocument, strategy: ExtractionStrategy): string | null {
  switch (strategy.type) {
    case "key-value":
      return keyValueExtractor.extract(doc, strategy);
    case "regex":
      return regexExtractor.extract(doc, strategy);
    case "keyword-sentence":
      return keywordSentenceExtractor.extract(doc, strategy);
    case "selector":
      return selectorExtractor.extract(doc, strategy);
  }
}
