import type { HolterRecord } from "../snapshot/schemas.js";
import type { HolterMetrics } from "../shared/types.js";

// ── Thresholds ─────────────────────────────────────────────────────

export const HOLTER_BRADY_BELOW_BPM = 40;
export const HOLTER_TACHY_ABOVE_BPM = 120;
export const SIGNIFICANT_PAUSE_ABOVE_MS = 2000;
export const FREQUENT_ECTOPY_ABOVE = 1000;

export function computeHolterMetrics(holter: HolterRecord): HolterMetrics {
  const lines: string[] = [];
  let bradyFlag = false;
  let tachyFlag = false;
  let afibDetected = false;
  let significantPauses = false;
  let frequentVes = false;
  let frequentSves = false;
  let avBlockDetected = false;

  if (holter.recording_duration_hours) {
    lines.push(`Registratieduur: ${holter.recording_duration_hours} uur`);
  }
  if (holter.avg_hr !== undefined) lines.push(`Gemiddelde hartfrequentie: ${holter.avg_hr} bpm`);

  if (holter.min_hr !== undefined) {
    bradyFlag = holter.min_hr < HOLTER_BRADY_BELOW_BPM;
    lines.push(`Minimale hartfrequentie: ${holter.min_hr} bpm${bradyFlag ? " (bradycardie)" : ""}`);
  }
  if (holter.max_hr !== undefined) {
    tachyFlag = holter.max_hr > HOLTER_TACHY_ABOVE_BPM;
    lines.push(`Maximale hartfrequentie: ${holter.max_hr} bpm${tachyFlag ? " (tachycardie)" : ""}`);
  }

  if (holter.afib_percentage !== undefined && holter.afib_percentage > 0) {
    afibDetected = true;
    lines.push(`Atriumfibrilleren: ${holter.afib_percentage}% van de tijd`);
  }

  if (holter.pauses_count !== undefined && holter.pauses_count > 0) {
    significantPauses = holter.longest_pause_ms !== undefined && holter.longest_pause_ms > SIGNIFICANT_PAUSE_ABOVE_MS;
    let text = `Pauzes: ${holter.pauses_count}`;
    if (holter.longest_pause_ms) text += ` (langste: ${holter.longest_pause_ms} ms)`;
    if (significantPauses) text += " - significant";
    lines.push(text);
  }

  if (holter.ves_count !== undefined) {
    frequentVes = holter.ves_count > FREQUENT_ECTOPY_ABOVE;
    lines.push(`VES: ${holter.ves_count}${frequentVes ? " (frequent)" : ""}`);
  }
  if (holter.sves_count !== undefined) {
    frequentSves = holter.sves_count > FREQUENT_ECTOPY_ABOVE;
    lines.push(`SVES: ${holter.sves_count}${frequentSves ? " (frequent)" : ""}`);
  }

  if (holter.av_block_type) {
    avBlockDetected = true;
    lines.push(`AV-blok: ${holter.av_block_type}`);
  }

  return {
    bradyFlag,
    tachyFlag,
    afibDetected,
    significantPauses,
    frequentVes,
    frequentSves,
    avBlockDetected,
    summaryLines: lines,
  };
}
