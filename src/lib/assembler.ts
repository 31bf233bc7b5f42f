import type {
  AssemblyOutcome,
  AssemblyState,
  Diagnostic,
  FieldName,
  NumericSpecField,
  Performance,
  PerformanceField,
  ProductRecord,
  RejectionReason,
  SourceDocument,
  Specs,
} from "./types";
import type { FieldSpec } from "./strategies";
import type { SiteProfile } from "./sites/types";
import { resolveFields } from "./field-resolver";
import type { ResolvedFields } from "./field-resolver";
import { parseMeasurement, classifyShape, normalizeSurface } from "./normalization";
import { cleanName } from "./naming/name-cleaner";
import { BrandIdentifier, canonicalizeBrand } from "./naming/brand-identifier";
import { deriveModelName, modelFromUrl } from "./naming/model-name";
import { assignId } from "./identity";
import { selectImageUrl } from "./images";

const NAVIGATION_TITLES = new Set(["home", "products", "categories", "paddles"]);

const NUMERIC_SPEC_FIELDS: NumericSpecField[] = [
  "average_weight",
  "core",
  "paddle_length",
  "paddle_width",
  "grip_length",
  "grip_circumference",
];

const PERFORMANCE_FIELDS: PerformanceField[] = [
  "power",
  "pop",
  "spin",
  "twist_weight",
  "swing_weight",
  "balance_point",
];

type NumericField = NumericSpecField | PerformanceField;

const NUMERIC_FIELDS = new Set<FieldName>([...NUMERIC_SPEC_FIELDS, ...PERFORMANCE_FIELDS]);

function isNumericField(field: FieldName): field is NumericField {
  return NUMERIC_FIELDS.has(field);
}

// Always filled by a fallback, which is reported instead
const FALLBACK_FIELDS = new Set<FieldName>(["title", "shape"]);

function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const value of Object.values(obj)) {
    if (value && typeof value === "object") deepFreeze(value);
  }
  return Object.freeze(obj);
}

function hostOf(url: string): string {
  try {
    return new URL(url).hostname.replace(/^www\./, "");
  } catch {
    return "";
  }
}

/**
 * Turn one fetched page into a ProductRecord, or a rejection. Pure: the same
 * document and site always give the same outcome.
 *
 * fetched → fields-resolved → normalized → assembled, or → rejected from
 * any step before assembled.
 */
export function assembleRecord(doc: SourceDocument, site: SiteProfile): AssemblyOutcome {
  const transitions: AssemblyState[] = ["fetched"];
  const diagnostics: Diagnostic[] = [];

  const reject = (reason: RejectionReason): AssemblyOutcome => {
    transitions.push("rejected");
    return {
      status: "rejected",
      url: doc.url,
      reason,
      diagnostics: Object.freeze([...diagnostics]),
      transitions: Object.freeze([...transitions]),
    };
  };

  if (site.productMarker && doc.$(site.productMarker).length === 0) {
    return reject("not-a-product-page");
  }

  const resolved = resolveFields(doc, site.fields);
  transitions.push("fields-resolved");

  const text = (field: FieldName): string | null => resolved.values.get(field)?.value ?? null;

  // --- identity ---
  let title = text("title");
  if (title && NAVIGATION_TITLES.has(title.trim().toLowerCase())) {
    return reject("navigation-page");
  }
  if (!title) {
    title = modelFromUrl(doc.url);
    if (title) diagnostics.push({ field: "title", reason: "url-fallback" });
  }

  const siteBrand = text("brand");
  const identifier = new BrandIdentifier(cleanName(title), doc.url);
  const brand = siteBrand ? canonicalizeBrand(cleanName(siteBrand)) : identifier.canonical;
  if (!brand) return reject("brand-unresolved");

  const prefix = siteBrand ? cleanName(siteBrand) : identifier.matchedText;
  let model = deriveModelName(title, prefix);
  if (!model) {
    model = deriveModelName(modelFromUrl(doc.url), brand);
    if (model) diagnostics.push({ field: "model", reason: "url-fallback" });
  }
  if (!model) return reject("model-unresolved");

  // --- specs ---
  const numbers = normalizeNumbers(resolved, site.fields, diagnostics);

  const description = text("description") ?? "";
  const shapeText = [title, description].filter(Boolean).join(". ");
  // A printed shape label outranks keywords elsewhere on the page
  let { shape, basis } = classifyShape(numbers.paddle_length ?? null, text("shape") ?? "");
  if (basis === "default") ({ shape, basis } = classifyShape(null, shapeText));
  if (basis === "default") diagnostics.push({ field: "shape", reason: "defaulted" });

  const specs: Specs = {
    shape,
    surface: normalizeSurface(text("surface")),
    average_weight: numbers.average_weight ?? null,
    core: numbers.core ?? null,
    paddle_length: numbers.paddle_length ?? null,
    paddle_width: numbers.paddle_width ?? null,
    grip_length: numbers.grip_length ?? null,
    grip_type: text("grip_type")?.replace(/\s+/g, " ").trim() || null,
    grip_circumference: numbers.grip_circumference ?? null,
  };

  for (const field of resolved.missing) {
    if (!FALLBACK_FIELDS.has(field)) diagnostics.push({ field, reason: "not-found" });
  }

  const performance: Performance = {
    power: numbers.power ?? null,
    pop: numbers.pop ?? null,
    spin: numbers.spin ?? null,
    twist_weight: numbers.twist_weight ?? null,
    swing_weight: numbers.swing_weight ?? null,
    balance_point: numbers.balance_point ?? null,
  };
  const hasPerformance = PERFORMANCE_FIELDS.some((f) => performance[f] !== null);
  transitions.push("normalized");

  const record: ProductRecord = deepFreeze({
    id: assignId(brand, model),
    metadata: { brand, model, source: site.name || hostOf(doc.url) || "unknown" },
    specs,
    performance: hasPerformance ? performance : null,
  });
  transitions.push("assembled");

  return {
    status: "assembled",
    record,
    diagnostics: Object.freeze([...diagnostics]),
    imageUrl: selectImageUrl(doc, site),
    transitions: Object.freeze([...transitions]),
  };
}

/** Parse every resolved numeric field; unparseable text is reported, never guessed */
function normalizeNumbers(
  resolved: ResolvedFields,
  fields: readonly FieldSpec[],
  diagnostics: Diagnostic[]
): Partial<Record<NumericField, number>> {
  const out: Partial<Record<NumericField, number>> = {};
  for (const spec of fields) {
    if (spec.kind !== "number" || !isNumericField(spec.field)) continue;
    const raw = resolved.values.get(spec.field);
    if (!raw) continue;
    const value = parseMeasurement(raw.value, spec.stripUnits);
    if (value === null) {
      diagnostics.push({ field: spec.field, reason: "unparseable" });
    } else {
      out[spec.field] = value;
    }
  }
  return out;
}
