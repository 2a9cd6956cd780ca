import { predictedMaxHeartRate } from "../calculations/body.js";
import {
  estimateVo2FromWatts,
  predictedWattage,
  suggestEffortType,
  vo2PercentileAndLabel,
} from "../calculations/exercise.js";
import { round } from "../calculations/stats.js";
import type { FietstestRecord } from "../snapshot/schemas.js";
import type { FietstestMetrics } from "../shared/types.js";

/**
 * Derived values for a bicycle stress test. Summary lines follow a fixed
 * order: heart rate, VO2, wattage.
 */
export function computeFietstestMetrics(test: FietstestRecord): FietstestMetrics {
  const { sex, age, weight } = test.patient;
  const maxHr = test.max_hr;
  const maxWatt = test.max_watt;

  const predictedMaxHr = predictedMaxHeartRate(age);
  const pctHr =
    predictedMaxHr && maxHr !== undefined && maxHr > 0 ? round((maxHr / predictedMaxHr) * 100, 1) : undefined;

  const vo2Observed = estimateVo2FromWatts(maxWatt, weight);
  const vo2ObservedText = vo2Observed !== undefined ? `Observed VO2: ${vo2Observed} ml·kg⁻¹·min⁻¹` : undefined;
  const percentile = vo2Observed !== undefined ? vo2PercentileAndLabel(sex, age, vo2Observed) : undefined;

  const predictedWatt = predictedWattage(sex, age, weight);
  const predictedWattPct =
    predictedWatt !== undefined && predictedWatt > 0 && maxWatt !== undefined && maxWatt > 0
      ? round((maxWatt / predictedWatt) * 100, 1)
      : undefined;

  const lines: string[] = [];
  if (predictedMaxHr) {
    if (pctHr !== undefined) {
      lines.push(`Max HR: ${maxHr} bpm (${pctHr}% of predicted ${predictedMaxHr} bpm)`);
    } else if (maxHr !== undefined) {
      lines.push(`Max HR: ${maxHr} bpm (predicted ${predictedMaxHr} bpm)`);
    }
  }
  if (vo2ObservedText !== undefined) {
    lines.push(
      percentile
        ? `${vo2ObservedText} — ${percentile.percentOfP50}% vs 50e (${percentile.band}: ${percentile.bandText})`
        : vo2ObservedText
    );
  }
  if (predictedWatt !== undefined) {
    lines.push(
      predictedWattPct !== undefined
        ? `Wattage: ${maxWatt} W (${predictedWattPct}% of predicted ${predictedWatt} W)`
        : `Predicted wattage: ${predictedWatt} W`
    );
  }

  return {
    predictedMaxHr,
    pctHr,
    vo2Observed,
    vo2ObservedText,
    vo2PercentOfP50: percentile?.percentOfP50,
    vo2Band: percentile?.band,
    vo2BandText: percentile?.bandText,
    predictedWatt,
    predictedWattPct,
    effortTypeSuggestion: suggestEffortType(maxHr, age),
    summaryLines: lines,
  };
}
