/**
 * Soft parsing of free-text measurement fields.
 *
 * Missing, blank and unparsable values all come back as undefined; nothing
 * here throws.
 */

export function parseOptionalNumber(value: unknown): number | undefined {
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
  if (typeof value !== "string") return undefined;
  const txt = value.trim().replace(",", ".");
  if (txt === "") return undefined;
  const n = Number(txt);
  return Number.isFinite(n) ? n : undefined;
}

/** Whole number, truncated toward zero ("72.9" → 72). */
export function parseOptionalInt(value: unknown): number | undefined {
  const n = parseOptionalNumber(value);
  return n === undefined ? undefined : Math.trunc(n);
}

/** Trimmed text, or undefined when blank. */
export function optionalText(value: unknown): string | undefined {
  if (value === undefined || value === null) return undefined;
  const txt = String(value).trim();
  return txt === "" ? undefined : txt;
}

/** Trimmed text, or the default when blank. */
export function cleanText(value: unknown, fallback = "n.v.t."): string {
  return optionalText(value) ?? fallback;
}

/** True when at least one value is present and non-blank. */
export function hasAnyValue(...values: unknown[]): boolean {
  return values.some((v) => optionalText(v) !== undefined);
}
