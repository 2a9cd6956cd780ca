/**
 * Exercise capacity: VO2 reference lookup, VO2 estimated from the achieved
 * workload, predicted wattage and the submaximal-effort suggestion.
 *
 * Reference percentiles (cycle ergometer, by sex and age decade) live in
 * data/vo2_reference.json and are loaded once.
 */

import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { z } from "zod";
import type { Sex } from "../shared/types.js";
import { round } from "./stats.js";

// ── Reference table ────────────────────────────────────────────────

const PercentilesSchema = z.object({
  p95: z.number(),
  p75: z.number(),
  p50: z.number(),
  p25: z.number(),
  p5: z.number(),
});

export type Vo2Percentiles = z.infer<typeof PercentilesSchema>;

const ReferenceTableSchema = z.object({
  Man: z.record(z.string(), PercentilesSchema),
  Vrouw: z.record(z.string(), PercentilesSchema),
});

type Vo2ReferenceTable = z.infer<typeof ReferenceTableSchema>;

const REFERENCE_PATH = fileURLToPath(new URL("../../data/vo2_reference.json", import.meta.url));

let _table: Vo2ReferenceTable | null = null;

function loadReferenceTable(): Vo2ReferenceTable {
  if (_table) return _table;
  const raw: unknown = JSON.parse(readFileSync(REFERENCE_PATH, "utf-8"));
  const parsed = ReferenceTableSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid VO2 reference table at ${REFERENCE_PATH}: ${parsed.error.message}`);
  }
  _table = parsed.data;
  return _table;
}

/** Age decade bucket 20…70; unknown age counts as 50. */
export function ageBucket(age?: number): number {
  const a = age === undefined || !Number.isFinite(age) ? 50 : Math.trunc(age);
  if (a < 30) return 20;
  if (a < 40) return 30;
  if (a < 50) return 40;
  if (a < 60) return 50;
  if (a < 70) return 60;
  return 70;
}

export function getVo2ReferenceValues(sex: Sex, age?: number): Vo2Percentiles | undefined {
  return loadReferenceTable()[sex][String(ageBucket(age))];
}

// ── Percentile band ────────────────────────────────────────────────

export interface Vo2Percentile {
  /** Observed VO2 as % of the bucket's p50, 1 decimal. */
  percentOfP50: number;
  band: string;
  bandText: string;
}

export function vo2PercentileAndLabel(sex: Sex, age: number | undefined, vo2: number): Vo2Percentile | undefined {
  const ref = getVo2ReferenceValues(sex, age);
  if (!ref) return undefined;
  const percentOfP50 = round((vo2 / ref.p50) * 100, 1);
  if (vo2 >= ref.p95) return { percentOfP50, band: ">=95%", bandText: "Uitstekende inspanningscapaciteit" };
  if (vo2 >= ref.p75) return { percentOfP50, band: "75-95%", bandText: "Bovengemiddelde inspanningscapaciteit" };
  if (vo2 >= ref.p25) return { percentOfP50, band: "25-75%", bandText: "Normale inspanningscapaciteit" };
  if (vo2 >= ref.p5) return { percentOfP50, band: "5-25%", bandText: "Ondergemiddelde inspanningscapaciteit" };
  return { percentOfP50, band: "<5%", bandText: "Slechte inspanningscapaciteit" };
}

// ── Workload ───────────────────────────────────────────────────────

/** VO2 (mL·kg⁻¹·min⁻¹) from peak watts: 1.8 × (W × 6.12) / kg + 7, 1 decimal. */
export function estimateVo2FromWatts(maxWatt?: number, weightKg?: number): number | undefined {
  if (!maxWatt || !weightKg || weightKg <= 0) return undefined;
  const workRate = maxWatt * 6.12;
  return round((1.8 * workRate) / weightKg + 7, 1);
}

/** Wattage at which the estimated VO2 equals the reference p50, 1 decimal. */
export function predictedWattage(sex: Sex, age: number | undefined, weightKg?: number): number | undefined {
  const ref = getVo2ReferenceValues(sex, age);
  if (!ref || !weightKg || weightKg <= 0) return undefined;
  const workRate = (weightKg * (ref.p50 - 7)) / 1.8;
  if (workRate <= 0) return undefined;
  return round(workRate / 6.12, 1);
}

export const EFFORT_SIGNIFICANT = "Significant doorgevoerd";
export const EFFORT_SUBMAXIMAL = "Submaximale inspanning";

/** Submaximal when the peak HR stays under 80 % of the unrounded Tanaka prediction. */
export function suggestEffortType(maxHr?: number, age?: number): string | undefined {
  if (age === undefined || !maxHr || maxHr <= 0) return undefined;
  const predicted = 208 - 0.7 * age;
  return maxHr < 0.8 * predicted ? EFFORT_SUBMAXIMAL : EFFORT_SIGNIFICANT;
}
