import type { SiteProfile } from "./types";
import { kv, rx, sel, sentence, performanceFields, SURFACE_PATTERN, DEFAULT_IMAGE_REJECT } from "./shared";

const BODY = "body";
const DESCRIPTION = '[itemprop="description"], .product-description, #description';

/**
 * Heuristic table for unrecognized sites: labelled lines anywhere on the
 * page first, then sentences mentioning the field.
 */
export const generic: SiteProfile = {
  id: "generic",
  name: "", // provenance falls back to the page host
  baseUrl: "",
  hosts: [],
  productMarker: [
    '[itemtype*="Product"]',
    '[itemprop="price"]',
    'meta[property="og:type"][content="product"]',
    'form[action*="cart"]',
    ".product",
    "#product",
  ].join(", "),
  fields: [
    {
      field: "title",
      kind: "text",
      strategies: [
        sel("h1", { minLength: 3 }),
        sel('meta[property="og:title"]', { attribute: "content", minLength: 3 }),
        sel("title", { minLength: 3 }),
      ],
    },
    {
      field: "brand",
      kind: "text",
      strategies: [
        sel('[itemprop="brand"] [itemprop="name"]'),
        sel('[itemprop="brand"]', { attribute: "content" }),
        sel('[itemprop="brand"]'),
      ],
    },
    {
      field: "description",
      kind: "text",
      strategies: [
        sel(DESCRIPTION),
        sel('meta[name="description"]', { attribute: "content" }),
      ],
    },
    {
      field: "shape",
      kind: "enum",
      strategies: [kv(BODY, "shape", "paddle shape")],
    },
    {
      field: "surface",
      kind: "text",
      strategies: [kv(BODY, "surface", "surface material", "paddle face", "face"), rx(BODY, SURFACE_PATTERN)],
    },
    {
      field: "average_weight",
      kind: "number",
      strategies: [kv(BODY, "average weight", "weight"), sentence(BODY, "weight")],
    },
    {
      field: "core",
      kind: "number",
      strategies: [
        kv(BODY, "core thickness", "core"),
        rx(BODY, /(\d+\.?\d*)\s*mm\s*core/i),
        sentence(BODY, "core"),
      ],
    },
    {
      field: "paddle_length",
      kind: "number",
      strategies: [kv(BODY, "paddle length", "length"), sentence(BODY, "length")],
    },
    {
      field: "paddle_width",
      kind: "number",
      strategies: [kv(BODY, "paddle width", "width"), sentence(BODY, "width")],
    },
    {
      field: "grip_length",
      kind: "number",
      strategies: [kv(BODY, "handle length", "grip length"), sentence(BODY, "handle")],
    },
    {
      field: "grip_type",
      kind: "text",
      strategies: [kv(BODY, "grip type", "grip style", "grip")],
    },
    {
      field: "grip_circumference",
      kind: "number",
      strategies: [kv(BODY, "grip circumference", "grip size"), sentence(BODY, "circumference")],
    },
    ...performanceFields(BODY),
  ],
  images: {
    sources: [
      { selector: 'meta[property="og:image"]', attributes: ["content"] },
      { selector: 'img[itemprop="image"]', attributes: ["src", "data-src"] },
      { selector: ".product img, #product img", attributes: ["src", "data-src"] },
    ],
    reject: DEFAULT_IMAGE_REJECT,
  },
  listing: null,
};
