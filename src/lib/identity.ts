/**
 * Deduplication key for a paddle: "{brand}-{model}", lower-cased with
 * whitespace runs turned into hyphens. Equal brand+model always collide.
 */
export function assignId(brand: string, model: string): string {
  const slug = (s: string) => s.trim().toLowerCase().replace(/\s+/g, "-");
  return `${slug(brand)}-${slug(model)}`;
}
