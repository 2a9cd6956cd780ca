import type { SeverityScore } from "../shared/types.js";

/**
 * Round to specified decimal places.
 */
export function round(value: number, decimals: number = 4): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Index a measurement to body surface area.
 * Returns undefined without a measurement or a positive BSA.
 */
export function indexToBsa(
  value: number | undefined,
  bsa: number | undefined,
  decimals: number
): number | undefined {
  if (value === undefined || bsa === undefined || bsa <= 0) return undefined;
  return round(value / bsa, decimals);
}

/**
 * Index a volume to BSA with a lower floor on the divisor, so an implausibly
 * small BSA cannot blow up the index. Still requires a known BSA.
 */
export function indexToFlooredBsa(
  value: number | undefined,
  bsa: number | undefined,
  floor: number,
  decimals: number
): number | undefined {
  if (value === undefined || bsa === undefined) return undefined;
  return round(value / Math.max(floor, bsa), decimals);
}

/** Highest tier across independently graded criteria. */
export function maxTier(tiers: SeverityScore[]): SeverityScore {
  return tiers.reduce<SeverityScore>((worst, tier) => (tier > worst ? tier : worst), 0);
}
