import type { AorticSegmentKey, AorticSegmentMetrics, Sex } from "../shared/types.js";
import { indexToBsa, round } from "./stats.js";

export type LinearFormula = readonly [intercept: number, age: number, male: number, height: number, weight: number];

export interface AorticSegmentDefinition {
  key: AorticSegmentKey;
  label: string;
  name: string;
  /** Dilated when the BSA index exceeds this cutoff (mm/m²). */
  cutoffMmPerM2: number;
  lower: LinearFormula;
  upper: LinearFormula;
}

export const AORTIC_SEGMENTS: readonly AorticSegmentDefinition[] = [
  {
    key: "aoa",
    label: "AoA",
    name: "Aorta annulus (AoA)",
    cutoffMmPerM2: 14,
    lower: [10.828, 0.001, 0.871, 0.013, 0.02],
    upper: [14.97, 0.02, 1.278, 0.037, 0.034],
  },
  {
    key: "aosv",
    label: "AoSV",
    name: "Aorta sinus valsalva (AoSV)",
    cutoffMmPerM2: 20,
    lower: [3.483, 0.086, 1.731, 0.062, 0.036],
    upper: [12.129, 0.125, 2.589, 0.113, 0.065],
  },
  {
    key: "aostj",
    label: "AoSTJ",
    name: "Aorta sinotubulaire junctie (AoSTJ)",
    cutoffMmPerM2: 16,
    lower: [0.6, 0.061, 0.707, 0.056, 0.026],
    upper: [8.562, 0.097, 1.499, 0.103, 0.054],
  },
  {
    key: "ascao",
    label: "AscAo",
    name: "Aorta ascendens (AscAo)",
    cutoffMmPerM2: 17,
    lower: [8.189, 0.041, 0.655, -0.007, 0.04],
    upper: [21.214, 0.101, 1.961, 0.069, 0.087],
  },
] as const;

export interface BodyDimensions {
  sex: Sex;
  age?: number;
  lengthCm?: number;
  weightKg?: number;
}

function evaluate([intercept, age, male, height, weight]: LinearFormula, body: Required<BodyDimensions>): number {
  const isMale = body.sex === "Man" ? 1 : 0;
  return intercept + body.age * age + isMale * male + body.lengthCm * height + body.weightKg * weight;
}

/** Predicted normal range (mm, 2 decimals); needs age, length and weight. */
export function predictAorticRange(
  segment: AorticSegmentDefinition,
  body: BodyDimensions
): { lowerMm: number; upperMm: number } | undefined {
  const { sex, age, lengthCm, weightKg } = body;
  if (age === undefined || lengthCm === undefined || weightKg === undefined) return undefined;
  const full = { sex, age, lengthCm, weightKg };
  return {
    lowerMm: round(evaluate(segment.lower, full), 2),
    upperMm: round(evaluate(segment.upper, full), 2),
  };
}

/**
 * Index one aortic measurement to BSA (1 decimal) and flag dilation against
 * the segment's cutoff. Without a BSA the segment is never flagged.
 */
export function assessAorticSegment(
  segment: AorticSegmentDefinition,
  measuredMm: number,
  bsa: number | undefined,
  body: BodyDimensions
): AorticSegmentMetrics {
  const indexed = indexToBsa(measuredMm, bsa, 1);
  const result: AorticSegmentMetrics = {
    key: segment.key,
    label: segment.label,
    measuredMm,
    dilated: indexed !== undefined && indexed > segment.cutoffMmPerM2,
  };
  if (indexed !== undefined) result.indexedMmPerM2 = indexed;
  const predicted = predictAorticRange(segment, body);
  if (predicted) result.predictedRange = predicted;
  return result;
}

export function aorticSegment(key: AorticSegmentKey): AorticSegmentDefinition {
  const found = AORTIC_SEGMENTS.find((s) => s.key === key);
  if (!found) throw new Error(`Unknown aortic segment: ${key}`);
  return found;
}
