import type { EcgRecord } from "../../snapshot/schemas.js";
import type { EcgMetrics } from "../../shared/types.js";
import { computeEcgMetrics, qtPhrase } from "../../studies/ecg.js";

export function generateEcgReport(ecg: EcgRecord, metrics: EcgMetrics = computeEcgMetrics(ecg)): string {
  const lines: string[] = [];
  lines.push(ecg.recorded_at ? `ECG geregistreerd op ${ecg.recorded_at}.` : "Normaal sinusaal ritme.");

  if (ecg.rhythm_summary) lines.push(`Ritme: ${ecg.rhythm_summary}.`);

  const intervals: string[] = [];
  if (ecg.vent_rate !== undefined) intervals.push(`Frequentie ${ecg.vent_rate.toFixed(0)} bpm`);
  if (ecg.pr_interval_ms !== undefined) intervals.push(`PR ${ecg.pr_interval_ms.toFixed(0)} ms`);
  if (ecg.qrs_duration_ms !== undefined) intervals.push(`QRS ${ecg.qrs_duration_ms.toFixed(0)} ms`);
  if (ecg.qt_interval_ms !== undefined) intervals.push(qtPhrase(ecg.qt_interval_ms, metrics.qtcbMs, metrics.qtcfMs));
  if (intervals.length > 0) lines.push(`${intervals.join(", ")}.`);

  // T axis and acquisition device stay out of the narrative.
  const axes: string[] = [];
  if (ecg.p_axis_deg !== undefined) axes.push(`P-as ${ecg.p_axis_deg.toFixed(0)}°`);
  if (ecg.qrs_axis_deg !== undefined) axes.push(`QRS-as ${ecg.qrs_axis_deg.toFixed(0)}°`);
  if (axes.length > 0) lines.push(`${axes.join(", ")}.`);

  const last = lines[lines.length - 1] ?? "";
  if (metrics.axisDeviation && !last.includes(metrics.axisDeviation)) {
    lines.push(`${metrics.axisDeviation}.`);
  }

  if (ecg.auto_report_text) {
    lines.push("", "Automatische protocolering:", ecg.auto_report_text.trim());
  }

  if (metrics.tachyFlag) lines.push("Frequentie in tachycard bereik (>100 bpm).");
  if (metrics.bradyFlag) lines.push("Frequentie in bradycard bereik (<50 bpm).");

  return lines.join("\n");
}

export function summarizeEcgForBrief(ecg: EcgRecord, metrics: EcgMetrics = computeEcgMetrics(ecg)): string {
  const parts: string[] = [];
  if (ecg.rhythm_summary) parts.push(ecg.rhythm_summary.trim());
  if (ecg.vent_rate !== undefined) parts.push(`HF ${ecg.vent_rate.toFixed(0)} bpm`);
  if (ecg.qrs_duration_ms !== undefined) parts.push(`QRS ${ecg.qrs_duration_ms.toFixed(0)} ms`);
  if (ecg.p_duration_ms !== undefined) parts.push(`P duur ${ecg.p_duration_ms.toFixed(0)} ms`);
  if (metrics.qtcbMs !== undefined) parts.push(`QTcB ${metrics.qtcbMs.toFixed(0)} ms`);
  if (metrics.qtcfMs !== undefined) parts.push(`QTcF ${metrics.qtcfMs.toFixed(0)} ms`);
  if (metrics.qtcbMs === undefined && metrics.qtcfMs === undefined && ecg.qt_interval_ms !== undefined) {
    parts.push(`QT ${ecg.qt_interval_ms.toFixed(0)} ms`);
  }
  if (metrics.axisDeviation) parts.push(metrics.axisDeviation);

  const text = parts.join("; ");
  let prefix = "";
  if (ecg.recorded_at) prefix = `ECG dd. ${ecg.recorded_at}: `;
  else if (text) prefix = "ECG: ";
  const summary = (prefix + text).trim();
  return summary || "Geen ECG-gegevens beschikbaar.";
}
