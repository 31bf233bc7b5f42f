import { describe, it, expect } from "vitest";
import { readFileSync } from "fs";
import { resolve } from "path";
import { loadDocument } from "../lib/document";
import { resolveFields } from "../lib/field-resolver";
import { getSite, getSiteForUrl, getAllSiteIds } from "../lib/sites/registry";

const GALAXY_HTML = readFileSync(resolve(__dirname, "fixtures/galaxy-product.html"), "utf-8");
const CENTRAL_HTML = readFileSync(resolve(__dirname, "fixtures/central-product.html"), "utf-8");
const GENERIC_HTML = readFileSync(resolve(__dirname, "fixtures/generic-product.html"), "utf-8");

describe("site registry", () => {
  it("selects a site by host, subdomains included", () => {
    expect(getSiteForUrl("https://www.pickleballgalaxy.com/x.html").id).toBe("galaxy");
    expect(getSiteForUrl("https://pickleballcentral.com/x/").id).toBe("central");
  });

  it("falls back to the generic table", () => {
    expect(getSiteForUrl("https://shop.example.com/p").id).toBe("generic");
    expect(getSiteForUrl("not a url").id).toBe("generic");
    expect(getSite("nope").id).toBe("generic");
  });

  it("lists every site id", () => {
    expect(getAllSiteIds()).toEqual(["galaxy", "central", "generic"]);
  });
});

describe("galaxy field table", () => {
  const doc = loadDocument(GALAXY_HTML, "https://www.pickleballgalaxy.com/selkirk-slk-era-power.html");
  const { values, missing } = resolveFields(doc, getSite("galaxy").fields);

  it("reads the title from the itemprop name", () => {
    expect(values.get("title")?.value).toBe("Selkirk SLK Era Power Elongated Pickleball Paddle");
  });

  it("reads key-value spec items", () => {
    expect(values.get("paddle_length")?.value).toBe("16.5 in");
    expect(values.get("average_weight")?.value).toBe("7.9-8.3 ounces");
    expect(values.get("grip_circumference")?.value).toBe("4 1/4in");
    expect(values.get("grip_type")?.value).toBe("Selkirk Sport Comfort Grip");
  });

  it("falls back to the description for core thickness", () => {
    const core = values.get("core");
    expect(core?.value).toBe("16");
    expect(core?.strategyIndex).toBe(1);
  });

  it("reports fields the page does not carry", () => {
    expect(missing).toContain("shape");
    expect(missing).toContain("power");
  });
});

describe("central field table", () => {
  const doc = loadDocument(CENTRAL_HTML, "https://pickleballcentral.com/joola-ben-johns-hyperion-cfs-16/");
  const { values } = resolveFields(doc, getSite("central").fields);

  it("matches labelled numbers in the spec tab with regexes", () => {
    expect(values.get("average_weight")).toMatchObject({ value: "7.8 ounces", strategyIndex: 0 });
    expect(values.get("grip_circumference")?.value).toBe("4 1/4");
    expect(values.get("paddle_length")?.value).toBe("16.5");
    expect(values.get("core")?.value).toBe("16");
  });

  it("reads text fields from key-value lines", () => {
    expect(values.get("grip_type")?.value).toBe("Feel-Tec Pure");
    expect(values.get("surface")?.value).toBe("Carbon Fiber");
  });

  it("reads the brand element", () => {
    expect(values.get("brand")?.value).toBe("JOOLA");
  });
});

describe("generic field table", () => {
  const doc = loadDocument(GENERIC_HTML, "https://shop.example.com/products/gearbox-pro-power-fusion");
  const { values, missing } = resolveFields(doc, getSite("generic").fields);

  it("finds numbers in sentences mentioning the field", () => {
    expect(values.get("paddle_length")?.value).toBe("The paddle length is 16.5 inches");
    expect(values.get("grip_length")?.value).toBe("The handle measures 5.25 inches");
  });

  it("reads labelled ratings anywhere on the page", () => {
    expect(values.get("power")?.value).toBe("9.5");
    expect(values.get("spin")?.value).toBe("8");
  });

  it("reports what it cannot find", () => {
    expect(missing).toEqual(
      expect.arrayContaining(["brand", "shape", "surface", "grip_type", "grip_circumference"])
    );
  });
});
