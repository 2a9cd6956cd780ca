import { round } from "./stats.js";

/** Mosteller body surface area (m²). */
export function bsaMosteller(lengthCm: number, weightKg: number): number {
  return Math.sqrt((lengthCm * weightKg) / 3600);
}

/** Body mass index (kg/m²), 1 decimal. */
export function bodyMassIndex(weightKg?: number, lengthCm?: number): number | undefined {
  if (!weightKg || !lengthCm || lengthCm <= 0) return undefined;
  return round(weightKg / (lengthCm / 100) ** 2, 1);
}

/** Tanaka predicted maximal heart rate: 208 − 0.7 × age, whole bpm. */
export function predictedMaxHeartRate(age?: number): number | undefined {
  if (age === undefined) return undefined;
  return Math.round(208 - 0.7 * age);
}
