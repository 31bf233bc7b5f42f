import type { Performance, ProductRecord, Specs } from "./types";

/** Ingestion shape for the downstream catalog: no id, no source. */
export interface CatalogPayload {
  metadata: { brand: string; model: string };
  specs: Specs;
  performance: Performance | null;
}

export function toCatalogPayload(record: ProductRecord): CatalogPayload {
  return {
    metadata: { brand: record.metadata.brand, model: record.metadata.model },
    specs: { ...record.specs },
    performance: record.performance ? { ...record.performance } : null,
  };
}

/** JSON with a fixed key order, whatever order the record was built in */
export function serializeRecord(record: ProductRecord, space?: number): string {
  const { specs, performance, metadata } = record;
  const ordered = {
    id: record.id,
    metadata: { brand: metadata.brand, model: metadata.model, source: metadata.source },
    specs: {
      shape: specs.shape,
      surface: specs.surface,
      average_weight: specs.average_weight,
      core: specs.core,
      paddle_length: specs.paddle_length,
      paddle_width: specs.paddle_width,
      grip_length: specs.grip_length,
      grip_type: specs.grip_type,
      grip_circumference: specs.grip_circumference,
    },
    performance: performance
      ? {
          power: performance.power,
          pop: performance.pop,
          spin: performance.spin,
          twist_weight: performance.twist_weight,
          swing_weight: performance.swing_weight,
          balance_point: performance.balance_point,
        }
      : null,
  };
  return JSON.stringify(ordered, null, space);
}
