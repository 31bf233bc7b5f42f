import type { SiteProfile } from "./types";
import { kv, rx, sel, performanceFields, SURFACE_PATTERN, DEFAULT_IMAGE_REJECT } from "./shared";

const BASE_URL = "https://www.pickleballgalaxy.com";
const LISTING_URL = `${BASE_URL}/all-pickleball-paddles.html`;
const PER_PAGE = 40;

const SPECS = ".o-layout__item";
const DESCRIPTION = ".prod_description";
const TITLE = 'span[itemprop="name"], h1.page-title, .product-title';

export const galaxy: SiteProfile = {
  id: "galaxy",
  name: "Pickleball Galaxy",
  baseUrl: BASE_URL,
  hosts: ["pickleballgalaxy.com"],
  productMarker: `${DESCRIPTION}, span[itemprop="name"], img#main_image`,
  fields: [
    {
      field: "title",
      kind: "text",
      strategies: [
        sel('span[itemprop="name"]', { minLength: 5 }),
        sel("h1.page-title", { minLength: 5 }),
        sel(".product-title", { minLength: 5 }),
        sel(".product-name h1", { minLength: 5 }),
        sel("h1.product_title", { minLength: 5 }),
        sel(".product-info h1", { minLength: 5 }),
        sel("title", { split: " - ", minLength: 5 }),
      ],
    },
    { field: "description", kind: "text", strategies: [sel(DESCRIPTION)] },
    { field: "shape", kind: "enum", strategies: [kv(SPECS, "shape", "paddle shape")] },
    {
      field: "surface",
      kind: "text",
      strategies: [
        kv(SPECS, "surface material", "surface", "paddle face"),
        rx(DESCRIPTION, SURFACE_PATTERN),
      ],
    },
    {
      field: "average_weight",
      kind: "number",
      strategies: [kv(SPECS, "weight", "average weight")],
    },
    {
      field: "core",
      kind: "number",
      strategies: [
        kv(SPECS, "core thickness"),
        rx(DESCRIPTION, /(\d+\.?\d*)\s*mm\s*core/i),
        rx(DESCRIPTION, /core thickness[:\s]*(\d+\.?\d*)/i),
        rx(DESCRIPTION, /core[:\s]*(\d+\.?\d*)/i),
        rx(TITLE, /(\d+\.?\d*)\s*mm\b/i),
      ],
    },
    {
      field: "paddle_length",
      kind: "number",
      strategies: [kv(SPECS, "paddle length", "length")],
    },
    {
      field: "paddle_width",
      kind: "number",
      strategies: [kv(SPECS, "paddle width", "width")],
    },
    {
      field: "grip_length",
      kind: "number",
      strategies: [kv(SPECS, "handle length", "grip length")],
    },
    {
      field: "grip_type",
      kind: "text",
      strategies: [kv(SPECS, "factory grip", "grip type", "grip style")],
    },
    {
      field: "grip_circumference",
      kind: "number",
      strategies: [kv(SPECS, "grip size", "grip circumference")],
    },
    ...performanceFields(SPECS),
  ],
  images: {
    sources: [
      { selector: "img#closeup_image", attributes: ["src", "data-src"] },
      { selector: "img#main_image", attributes: ["src", "data-src"] },
      { selector: "img.x-product-layout-images__image", attributes: ["src", "data-src"] },
      { selector: 'img[src*="graphics"][src*="_480x480"]', attributes: ["src"] },
      { selector: 'img[src*="graphics"][src*="_960x960"]', attributes: ["src"] },
    ],
    reject: DEFAULT_IMAGE_REJECT,
    baseUrl: `${BASE_URL}/mm5/`,
  },
  listing: {
    startUrl: LISTING_URL,
    pageUrl(page: number): string {
      const offset = (page - 1) * PER_PAGE;
      return `${LISTING_URL}?CatListingOffset=${offset}&Offset=${offset}&Per_Page=${PER_PAGE}&Sort_By=disp_order`;
    },
    linkSelectors: [
      "a.u-block.x-product-list__link",
      "a.x-product-list__link",
      'a[href*="pickleball-paddle"]',
    ],
    nextPageSelectors: ["a.next-page", "a.action.next", 'a[title="Next"]', 'a[aria-label="Next"]'],
    maxPages: 10,
  },
};
