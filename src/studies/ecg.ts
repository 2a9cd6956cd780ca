import { classifyQrsAxis, correctQt } from "../calculations/ecg_intervals.js";
import { round } from "../calculations/stats.js";
import type { EcgRecord } from "../snapshot/schemas.js";
import type { EcgMetrics } from "../shared/types.js";

/** "QT 400 ms (QTcB 420 ms; QTcF 410 ms)" with whichever corrections exist. */
export function qtPhrase(qtMs: number, qtcbMs?: number, qtcfMs?: number): string {
  const base = `QT ${qtMs.toFixed(0)} ms`;
  if (qtcbMs !== undefined && qtcfMs !== undefined) {
    return `${base} (QTcB ${qtcbMs.toFixed(0)} ms; QTcF ${qtcfMs.toFixed(0)} ms)`;
  }
  if (qtcfMs !== undefined) return `${base} (QTcF ${qtcfMs.toFixed(0)} ms)`;
  if (qtcbMs !== undefined) return `${base} (QTcB ${qtcbMs.toFixed(0)} ms)`;
  return base;
}

export function computeEcgMetrics(ecg: EcgRecord): EcgMetrics {
  const rate = ecg.vent_rate;

  // Measured QT and rate win; a device-reported QTc stands in for both otherwise.
  let qtcbMs: number | undefined;
  let qtcfMs: number | undefined;
  if (ecg.qt_interval_ms !== undefined && rate !== undefined) {
    const corrected = correctQt(ecg.qt_interval_ms, rate);
    qtcbMs = corrected?.bazettMs;
    qtcfMs = corrected?.fridericiaMs;
  } else if (ecg.qtc_interval_ms !== undefined) {
    qtcbMs = qtcfMs = round(ecg.qtc_interval_ms, 1);
  }

  const axisDeviation = ecg.qrs_axis_deg !== undefined ? classifyQrsAxis(ecg.qrs_axis_deg) : undefined;

  const lines: string[] = [];
  if (ecg.rhythm_summary) lines.push(`Ritme: ${ecg.rhythm_summary}`);
  if (rate !== undefined) lines.push(`Frequentie: ${rate.toFixed(0)} bpm`);
  if (ecg.pr_interval_ms !== undefined) lines.push(`PR ${ecg.pr_interval_ms.toFixed(0)} ms`);
  if (ecg.p_duration_ms !== undefined) lines.push(`P duur ${ecg.p_duration_ms.toFixed(0)} ms`);
  if (ecg.qrs_duration_ms !== undefined) lines.push(`QRS ${ecg.qrs_duration_ms.toFixed(0)} ms`);
  if (ecg.qt_interval_ms !== undefined) lines.push(qtPhrase(ecg.qt_interval_ms, qtcbMs, qtcfMs));
  if (axisDeviation) lines.push(axisDeviation);

  return {
    qtcbMs,
    qtcfMs,
    tachyFlag: rate !== undefined && rate > 100,
    bradyFlag: rate !== undefined && rate > 0 && rate < 50,
    axisDeviation,
    summaryLines: lines,
  };
}
