import type { FieldName, SourceDocument } from "./types";
import { runStrategy } from "./strategies";
import type { ExtractionResult, FieldSpec } from "./strategies";

export type ResolvedField = Extract<ExtractionResult, { status: "resolved" }>;

export interface ResolvedFields {
  values: Map<FieldName, ResolvedField>;
  missing: FieldName[];
}

/**
 * Try the field's strategies in declared order. The first one producing
 * non-empty text wins; later strategies never run.
 */
export function resolveField(doc: SourceDocument, spec: FieldSpec): ExtractionResult {
  for (let i = 0; i < spec.strategies.length; i++) {
    const strategy = spec.strategies[i];
    const value = runStrategy(doc, strategy)?.trim();
    if (value) {
      return { status: "resolved", field: spec.field, value, strategy, strategyIndex: i };
    }
  }
  return { status: "missing", field: spec.field };
}

export function resolveFields(doc: SourceDocument, specs: readonly FieldSpec[]): ResolvedFields {
  const values = new Map<FieldName, ResolvedField>();
  const missing: FieldName[] = [];

  for (const spec of specs) {
    const result = resolveField(doc, spec);
    if (result.status === "resolved") {
      values.set(spec.field, result);
    } else {
      missing.push(spec.field);
    }
  }

  return { values, missing };
}

export { parseKeyValueBlock } from "./strategies";
