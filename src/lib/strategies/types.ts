import type { FieldName, SourceDocument } from "../types";

/**
 * Scan "key: value" lines in the block(s) matched by `selector`.
 * `keys` are lower-cased, whitespace-collapsed aliases tried in order.
 */
export interface KeyValueStrategy {
  type: "key-value";
  selector: string;
  keys: string[];
}

/** First capture group of the first match over the visible text of `selector` */
export interface RegexStrategy {
  type: "regex";
  selector: string;
  pattern: RegExp;
}

/** First period-delimited sentence containing `keyword` as a whole word */
export interface KeywordSentenceStrategy {
  type: "keyword-sentence";
  selector: string;
  keyword: string;
}

/** First matching element with usable text (or attribute value) */
export interface SelectorStrategy {
  type: "selector";
  selector: string;
  attribute?: string;
  split?: string; // keep only the text before this separator
  minLength?: number;
}

export type ExtractionStrategy =
  | KeyValueStrategy
  | RegexStrategy
  | KeywordSentenceStrategy
  | SelectorStrategy;

export type StrategyType = ExtractionStrategy["type"];

/**
 * One heuristic technique for locating a field's raw text.
 * Returns null when it finds nothing usable.
 */
export interface FieldExtractor<S extends ExtractionStrategy> {
  extract(doc: SourceDocument, strategy: S): string | null;
}

export type FieldKind = "number" | "enum" | "text";

export interface FieldSpec {
  field: FieldName;
  kind: FieldKind;
  strategies: ExtractionStrategy[];
  stripUnits?: string[]; // overrides the default unit tokens for numbers
}

export type ExtractionResult =
  | {
      status: "resolved";
      field: FieldName;
      value: string;
      strategy: ExtractionStrategy;
      strategyIndex: number;
    }
  | { status: "missing"; field: FieldName };
