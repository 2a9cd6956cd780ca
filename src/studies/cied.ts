import { predictedMaxHeartRate } from "../calculations/body.js";
import {
  avDelayReduction,
  myPaceLowerRate,
  optimalPvarp,
  rateAdaptiveAvDelay,
  sensedAvFromPaced,
  suggestedUpperTrackingRate,
} from "../calculations/pacing.js";
import type { CiedRecord } from "../snapshot/schemas.js";
import { parseOptionalInt } from "../shared/parse.js";
import type { CiedMetrics } from "../shared/types.js";

/**
 * Pacing suggestions for a device follow-up. Captions come in a fixed order:
 * myPACE, UTR, AV reduction, rate-adaptive AV delays, PVARP, sensed-from-paced.
 */
export function computeCiedMetrics(cied: CiedRecord): CiedMetrics {
  const lines: string[] = [];
  const age = cied.patient?.age;
  const height = cied.patient?.length;

  const myPace = myPaceLowerRate(height, cied.lvef);
  if (myPace !== undefined) lines.push(`myPACE (if HFpEF) suggested lower rate: ${myPace} bpm`);

  const predictedMaxHr = predictedMaxHeartRate(age);
  const suggestedUpperTracking =
    predictedMaxHr !== undefined ? suggestedUpperTrackingRate(predictedMaxHr) : undefined;
  if (suggestedUpperTracking !== undefined) {
    lines.push(
      `Suggested upper tracking rate: ${suggestedUpperTracking} bpm (≈85% of predicted max HR ${predictedMaxHr} bpm)`
    );
  }

  const baseSensed = parseOptionalInt(cied.sensed_av_delay);
  const basePaced = parseOptionalInt(cied.paced_av_delay);

  let avReductionMs: number | undefined;
  let rateAdaptiveSensedAv: number | undefined;
  let rateAdaptivePacedAv: number | undefined;
  if (cied.lower_rate !== undefined && cied.upper_tracking !== undefined) {
    avReductionMs = avDelayReduction(cied.lower_rate, cied.upper_tracking);
    lines.push(`Optimal AV delay reduction: ${avReductionMs} ms (≈5 ms per 10 bpm).`);
    if (baseSensed !== undefined) {
      rateAdaptiveSensedAv = rateAdaptiveAvDelay(baseSensed, avReductionMs);
      lines.push(`Rate-adaptive sensed AV delay at peak UTR: ${rateAdaptiveSensedAv} ms`);
    }
    if (basePaced !== undefined) {
      rateAdaptivePacedAv = rateAdaptiveAvDelay(basePaced, avReductionMs);
      lines.push(`Rate-adaptive paced AV delay at peak UTR: ${rateAdaptivePacedAv} ms`);
    }
  }

  let pvarp: number | undefined;
  if (baseSensed !== undefined && cied.upper_tracking !== undefined) {
    pvarp = optimalPvarp(cied.upper_tracking, baseSensed);
    if (pvarp !== undefined) {
      lines.push(`Optimal PVARP: ${pvarp} ms (60000 / UTR - sensed AV delay - 20 ms)`);
    }
  }

  let recommendedSensedAv: number | undefined;
  if (basePaced !== undefined) {
    const recommended = sensedAvFromPaced(basePaced);
    if (baseSensed === undefined || baseSensed !== recommended) {
      recommendedSensedAv = recommended;
      lines.push(`Recommended sensed AV delay based on paced AV delay: ${recommended} ms (paced - 30).`);
    }
  }

  return {
    predictedMaxHr,
    suggestedUpperTracking,
    myPaceLowerRate: myPace,
    avReductionMs,
    rateAdaptiveSensedAv,
    rateAdaptivePacedAv,
    optimalPvarp: pvarp,
    recommendedSensedAv,
    atrialPacingPct: parseOptionalInt(cied.atrial_pacing_pct),
    ventricularPacingPct: parseOptionalInt(cied.ventricular_pacing_pct),
    lvPacingPct: parseOptionalInt(cied.lv_pacing_pct),
    summaryLines: lines,
  };
}
