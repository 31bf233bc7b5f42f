import { PaddleShape } from "./types";

// ===== Unit tokens =====
// Longest-first so "ounces" is consumed before "oz", "inches" before "in".

export const UNIT_TOKENS = [
  "millimeters",
  "millimetres",
  "inches",
  "ounces",
  "ounce",
  "grams",
  "inch",
  "mm",
  "oz",
  "in",
  "g",
];

// ===== Shape keywords =====
// Evaluated in this order; the first category with a matching keyword wins.

export const SHAPE_KEYWORDS: [PaddleShape, string[]][] = [
  [PaddleShape.ELONGATED, ["elongated", "long"]],
  [PaddleShape.HYBRID, ["hybrid"]],
  [
    PaddleShape.WIDE_BODY,
    ["wide-body", "widebody", "wide body", "standard", "traditional", "classic", "teardrop"],
  ],
];

// Inclusive lower bounds, checked top to bottom
export const SHAPE_LENGTH_THRESHOLDS: [number, PaddleShape][] = [
  [16.5, PaddleShape.ELONGATED],
  [16.25, PaddleShape.HYBRID],
];

// ===== Surface materials =====
// Each entry needs every listed term present (case-insensitive).

export const SURFACE_MATERIALS: [string, string[]][] = [
  ["Fiberglass", ["fiberglass"]],
  ["Carbon Fiber", ["carbon", "fiber"]],
  ["Graphite", ["graphite"]],
  ["Composite", ["composite"]],
];
