import type { CheerioAPI } from "cheerio";

// ===== Enums =====

export enum PaddleShape {
  ELONGATED = "Elongated",
  HYBRID = "Hybrid",
  WIDE_BODY = "Wide-body",
}

// ===== Source document (fetched page, read-only) =====

export interface SourceDocument {
  url: string;
  retrievedAt: string; // ISO timestamp
  $: CheerioAPI;
}

// ===== Product record (canonical, export-ready) =====

export interface Metadata {
  brand: string;
  model: string;
  source: string; // site display name, e.g. "Pickleball Galaxy"
}

export interface Specs {
  shape: PaddleShape;
  surface: string | null;
  average_weight: number | null; // ounces
  core: number | null; // mm
  paddle_length: number | null; // inches
  paddle_width: number | null; // inches
  grip_length: number | null; // inches
  grip_type: string | null;
  grip_circumference: number | null; // inches
}

export interface Performance {
  power: number | null;
  pop: number | null;
  spin: number | null;
  twist_weight: number | null;
  swing_weight: number | null;
  balance_point: number | null;
}

export interface ProductRecord {
  id: string; // assignId(brand, model)
  metadata: Metadata;
  specs: Specs;
  performance: Performance | null;
}

// ===== Field names =====

export type NumericSpecField =
  | "average_weight"
  | "core"
  | "paddle_length"
  | "paddle_width"
  | "grip_length"
  | "grip_circumference";

export type PerformanceField = keyof Performance;

export type FieldName =
  | "title"
  | "brand"
  | "description"
  | "shape"
  | "surface"
  | "grip_type"
  | NumericSpecField
  | PerformanceField;

// ===== Diagnostics =====

export type DiagnosticReason =
  | "not-found" // no strategy produced text
  | "unparseable" // text found, normalizer returned nothing
  | "defaulted" // shape fell back to Wide-body
  | "url-fallback"; // derived from the page URL instead of the page body

export interface Diagnostic {
  field: FieldName | "model";
  reason: DiagnosticReason;
}

export type RejectionReason =
  | "not-a-product-page"
  | "navigation-page"
  | "brand-unresolved"
  | "model-unresolved";

export type AssemblyState =
  | "fetched"
  | "fields-resolved"
  | "normalized"
  | "assembled"
  | "rejected";

export type AssemblyOutcome =
  | {
      status: "assembled";
      record: ProductRecord;
      diagnostics: readonly Diagnostic[];
      imageUrl: string | null;
      transitions: readonly AssemblyState[];
    }
  | {
      status: "rejected";
      url: string;
      reason: RejectionReason;
      diagnostics: readonly Diagnostic[];
      transitions: readonly AssemblyState[];
    };

// ===== Pipeline =====

export interface ScrapeError {
  source: string;
  url: string;
  error: string;
  timestamp: string;
}

export interface RejectedPage {
  url: string;
  reason: RejectionReason;
}

export interface ScrapeRun {
  id: string;
  site: string;
  timestamp: string;
  recordCount: number;
  rejectedCount: number;
  errorCount: number;
  durationMs: number;
}

export interface ScrapeRunResult {
  run: ScrapeRun;
  records: ProductRecord[];
  diagnostics: Record<string, readonly Diagnostic[]>; // keyed by record id
  imageUrls: Record<string, string>; // keyed by record id
  rejected: RejectedPage[];
  errors: ScrapeError[];
}
