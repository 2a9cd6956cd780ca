import { estimateVo2FromWatts } from "../../calculations/exercise.js";
import type { FietstestRecord } from "../../snapshot/schemas.js";
import type { FietstestMetrics } from "../../shared/types.js";
import { computeFietstestMetrics } from "../../studies/fietstest.js";

/**
 * Bicycle stress test report. Missing numbers print as 0 and missing text as
 * blank, the way the protocol form leaves them; the effort type falls back to
 * the heart-rate based suggestion.
 */
export function generateFietstestReport(
  test: FietstestRecord,
  metrics: FietstestMetrics = computeFietstestMetrics(test)
): string {
  const startWatt = test.start_watt ?? 0;
  const incrementWatt = test.increment_watt ?? 0;
  const maxWatt = test.max_watt ?? 0;
  const durationAtMax = test.duration_at_max ?? 0;
  const maxHr = test.max_hr ?? 0;
  const effortType = test.effort_type ?? metrics.effortTypeSuggestion ?? "";

  const maxWattText =
    maxWatt > 0
      ? `Maximale belasting tot ${maxWatt} Watt gedurende ${durationAtMax} seconden.`
      : "Maximale belasting niet bereikt of niet gerapporteerd.";

  let pctText = "";
  if (metrics.predictedMaxHr && maxHr > 0) {
    const pct = metrics.pctHr ?? Math.round((maxHr / metrics.predictedMaxHr) * 1000) / 10;
    pctText = ` (${pct}% predicted)`;
  }

  const report: string[] = [
    `Start aan ${startWatt} W. Opdrijven van de belasting met ${incrementWatt} W om de minuut.`,
    maxWattText,
    `Maximale hartslag bedraagt ${maxHr}/min${pctText}`,
    `${test.bp_evolutie ?? ""}. ${test.ritme ?? ""}.`,
    `${effortType}. Het criterium voor staken betreft ${test.stop_criterium ?? ""}.`,
    "",
    `Het ECG vertoont ${test.ecg_changes ?? ""} tijdens inspanning of recuperatie.`,
    "",
    `Conclusie: ${test.conclusion ?? ""}.`,
  ];

  const vo2 = metrics.vo2Observed ?? estimateVo2FromWatts(maxWatt, test.patient.weight);
  if (vo2 !== undefined) {
    const vo2Line =
      metrics.vo2PercentOfP50 !== undefined && metrics.vo2Band !== undefined && metrics.vo2BandText !== undefined
        ? `VO2: ${vo2} ml·kg⁻¹·min⁻¹ (${metrics.vo2PercentOfP50}% predicted) — Percentiel: ${metrics.vo2Band} (${metrics.vo2BandText})`
        : `VO2 (ml·kg⁻¹·min⁻¹): ${vo2}`;
    report.splice(3, 0, vo2Line);
  }

  return report.join("\n");
}

export function summarizeFietstestForBrief(
  test: FietstestRecord,
  metrics: FietstestMetrics = computeFietstestMetrics(test)
): string {
  const parts: string[] = [];
  if (test.max_watt) parts.push(`Max belasting ${test.max_watt.toFixed(0)} W`);
  if (test.max_hr) {
    parts.push(
      metrics.pctHr !== undefined
        ? `HF ${test.max_hr.toFixed(0)} bpm (${metrics.pctHr.toFixed(0)}% voorspeld)`
        : `HF ${test.max_hr.toFixed(0)} bpm`
    );
  }
  if (metrics.vo2Observed !== undefined) {
    parts.push(
      metrics.vo2PercentOfP50 !== undefined
        ? `VO₂ ${metrics.vo2Observed.toFixed(1)} ml·kg⁻¹·min⁻¹ (${metrics.vo2PercentOfP50.toFixed(0)}% vs p50)`
        : `VO₂ ${metrics.vo2Observed.toFixed(1)} ml·kg⁻¹·min⁻¹`
    );
  }
  if (test.conclusion) parts.push(test.conclusion.trim());
  return parts.length > 0 ? parts.join("; ") : "Geen fietsproefgegevens beschikbaar.";
}
