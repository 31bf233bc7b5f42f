import type { SiteProfile } from "./types";
import { kv, rx, sel, performanceFields, SURFACE_PATTERN, DEFAULT_IMAGE_REJECT } from "./shared";

const BASE_URL = "https://pickleballcentral.com";
const LISTING_URL = `${BASE_URL}/pickleball-paddles/`;

const SPECS = "#tab-spec .tab-inner";
const DESCRIPTION = "#tab-description";

// Spec text is whitespace-collapsed before matching, so captures stop at the
// last digit of the number rather than at a line break
const NUM = String.raw`(\d[\d./ -]*\d|\d)`;

function labelled(label: string): RegExp {
  return new RegExp(`${label}:\\s*${NUM}`, "i");
}

export const central: SiteProfile = {
  id: "central",
  name: "Pickleball Central",
  baseUrl: BASE_URL,
  hosts: ["pickleballcentral.com"],
  productMarker: "#tab-spec, h1.productView-title",
  fields: [
    {
      field: "title",
      kind: "text",
      strategies: [
        sel("h1.productView-title", { minLength: 3 }),
        sel('meta[property="og:title"]', { attribute: "content", minLength: 3 }),
        sel("title", { split: " - ", minLength: 3 }),
      ],
    },
    { field: "brand", kind: "text", strategies: [sel(".productView-brand")] },
    { field: "description", kind: "text", strategies: [sel(DESCRIPTION)] },
    { field: "shape", kind: "enum", strategies: [kv(SPECS, "shape", "paddle shape")] },
    {
      field: "surface",
      kind: "text",
      strategies: [kv(SPECS, "paddle face", "surface"), rx(DESCRIPTION, SURFACE_PATTERN)],
    },
    {
      field: "average_weight",
      kind: "number",
      strategies: [
        rx(SPECS, /Average Weight:\s*([\d.]+\s*(?:ounces|oz))/i),
        rx(SPECS, /Weight Range:\s*([\d.\s-]+?\s*(?:ounces|oz))/i),
        kv(SPECS, "average weight", "weight range", "weight"),
      ],
    },
    {
      field: "core",
      kind: "number",
      strategies: [rx(SPECS, labelled("Core Thickness")), kv(SPECS, "core thickness")],
    },
    {
      field: "paddle_length",
      kind: "number",
      strategies: [rx(SPECS, labelled("Paddle Length")), kv(SPECS, "paddle length")],
    },
    {
      field: "paddle_width",
      kind: "number",
      strategies: [rx(SPECS, labelled("Paddle Width")), kv(SPECS, "paddle width")],
    },
    {
      field: "grip_length",
      kind: "number",
      strategies: [rx(SPECS, labelled("Handle Length")), kv(SPECS, "handle length", "grip length")],
    },
    {
      field: "grip_type",
      kind: "text",
      strategies: [kv(SPECS, "grip style", "grip type")],
    },
    {
      field: "grip_circumference",
      kind: "number",
      strategies: [rx(SPECS, labelled("Grip Circumference")), kv(SPECS, "grip circumference")],
    },
    ...performanceFields(SPECS),
  ],
  images: {
    sources: [
      { selector: ".productView-image img", attributes: ["data-src", "src"] },
      { selector: ".productView-thumbnail img", attributes: ["data-src", "src"] },
      { selector: ".card-image img", attributes: ["data-src", "src"] },
    ],
    reject: DEFAULT_IMAGE_REJECT,
    baseUrl: `${BASE_URL}/`,
  },
  listing: {
    startUrl: LISTING_URL,
    pageUrl: (page: number) => `${LISTING_URL}?page=${page}`,
    linkSelectors: ["li.product article.card h3.card-title a"],
    nextPageSelectors: [".pagination-item--next a", 'a[rel="next"]'],
    maxPages: 10,
  },
};
