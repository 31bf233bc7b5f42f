import type { PerformanceField } from "../types";
import type {
  FieldSpec,
  KeyValueStrategy,
  KeywordSentenceStrategy,
  RegexStrategy,
  SelectorStrategy,
} from "../strategies";

export function kv(selector: string, ...keys: string[]): KeyValueStrategy {
  return { type: "key-value", selector, keys };
}

export function rx(selector: string, pattern: RegExp): RegexStrategy {
  return { type: "regex", selector, pattern };
}

export function sentence(selector: string, keyword: string): KeywordSentenceStrategy {
  return { type: "keyword-sentence", selector, keyword };
}

export function sel(
  selector: string,
  options: Omit<SelectorStrategy, "type" | "selector"> = {}
): SelectorStrategy {
  return { type: "selector", selector, ...options };
}

export const SURFACE_PATTERN = /\b(fiberglass|carbon\s*fiber|graphite|composite)\b/i;

export const DEFAULT_IMAGE_REJECT = [/blank\.gif/i, /logo/i, /header/i, /banner/i, /_80x80/i];

const PERFORMANCE_KEYS: [PerformanceField, string[]][] = [
  ["power", ["power", "power rating"]],
  ["pop", ["pop", "pop rating"]],
  ["spin", ["spin", "spin rating"]],
  ["twist_weight", ["twist weight", "twistweight"]],
  ["swing_weight", ["swing weight", "swingweight"]],
  ["balance_point", ["balance point", "balance"]],
];

/** Performance ratings as printed in a key-value block */
export function performanceFields(selector: string): FieldSpec[] {
  return PERFORMANCE_KEYS.map(([field, keys]): FieldSpec => ({
    field,
    kind: "number",
    strategies: [kv(selector, ...keys)],
  }));
}
