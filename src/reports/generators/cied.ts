import type { CiedRecord, LeadRecord } from "../../snapshot/schemas.js";
import { joinDutch } from "../../shared/format.js";
import { cleanText, hasAnyValue, optionalText, parseOptionalInt } from "../../shared/parse.js";
import type { CiedMetrics } from "../../shared/types.js";
import { computeCiedMetrics } from "../../studies/cied.js";

const NO_EVENTS = "Geen events";

function programmingString(cied: CiedRecord): string | undefined {
  if (cied.lower_rate === undefined || cied.upper_tracking === undefined) return undefined;
  return `${cied.programming_mode ?? ""}-${cied.lower_rate}/${cied.upper_tracking}`;
}

function leadLine(name: string, lead: LeadRecord): string | undefined {
  if (!hasAnyValue(lead.sensing, lead.threshold_v, lead.threshold_ms, lead.impedance)) return undefined;
  const location = optionalText(lead.location);
  const stability = lead.stable ? "stabiel" : "onstabiel";
  return (
    `${name}: sensing ${cleanText(lead.sensing)} mV, ` +
    `drempel ${cleanText(lead.threshold_v)} V @ ${cleanText(lead.threshold_ms)} ms (${lead.polarity ?? "n.v.t."}), ` +
    `impedantie ${cleanText(lead.impedance)} Ω, ${stability}.` +
    (location ? ` Locatie: ${location}.` : "")
  );
}

function pacingParts(m: CiedMetrics): string[] {
  const parts: string[] = [];
  if (m.atrialPacingPct !== undefined) parts.push(`Atrium ${m.atrialPacingPct}%`);
  if (m.ventricularPacingPct !== undefined) parts.push(`Ventrikel ${m.ventricularPacingPct}%`);
  if (m.lvPacingPct !== undefined) parts.push(`LV ${m.lvPacingPct}%`);
  return parts;
}

function avDelayLine(kind: "Sensed" | "Paced", programmed: number | undefined, atPeak: number | undefined): string | undefined {
  if (programmed === undefined) return undefined;
  return atPeak !== undefined
    ? `${kind} AV delay: ${programmed} ms (Rate-adaptive AV delay at peak UTR: ${atPeak} ms).`
    : `${kind} AV delay: ${programmed} ms.`;
}

/** Device follow-up report: measured values first, then the conclusion block. */
export function generateCiedReport(cied: CiedRecord, metrics: CiedMetrics = computeCiedMetrics(cied)): string {
  let first = `Correcte werking van ${cied.device_type ?? "apparaat"}`;
  if (cied.device_brand) first += ` (${cied.device_brand})`;
  const programming = programmingString(cied);
  if (programming) first += ` modus ${programming}`;
  first += cied.indication_text ? ` ter behandeling van ${cied.indication_text}.` : ".";

  const measurements: string[] = [];
  const leads: Array<[boolean, string, LeadRecord]> = [
    [cied.lead_ra, "Atrium", cied.atrial_fields],
    [cied.lead_rv, "Ventrikel", cied.vent_fields],
    [cied.lead_lv, "LV", cied.lv_fields],
  ];
  for (const [implanted, name, lead] of leads) {
    if (!implanted) continue;
    const line = leadLine(name, lead);
    if (line) measurements.push(line);
  }

  const pacing = pacingParts(metrics);
  if (pacing.length > 0) measurements.push(`Pacing percentages: ${pacing.join(", ")}.`);

  const sensed = avDelayLine(
    "Sensed",
    parseOptionalInt(cied.sensed_av_delay),
    cied.suggested_sensed_av ?? metrics.rateAdaptiveSensedAv
  );
  if (sensed) measurements.push(sensed);
  const paced = avDelayLine(
    "Paced",
    parseOptionalInt(cied.paced_av_delay),
    cied.suggested_paced_av ?? metrics.rateAdaptivePacedAv
  );
  if (paced) measurements.push(paced);

  const checks = [
    cied.sensing_ok ? "sensing" : "sensing: afwijkend",
    cied.pacing_ok ? "pacing" : "pacing: afwijkend",
    cied.impedance_ok ? "impedantie" : "impedantie: afwijkend",
  ];
  const egm = cied.egm_events ?? NO_EVENTS;
  const battery = cied.battery_status ?? "Batterijstatus niet gerapporteerd";

  const conclusion = [
    first,
    `Goede en stabiele waardes voor ${joinDutch(checks)}.`,
    egm !== NO_EVENTS ? `De EGM uitlezing toont: ${egm}.` : "De EGM uitlezing toont geen events.",
    cied.settings_changed ? "Instellingen gewijzigd tijdens follow-up." : "Instellingen ongewijzigd.",
    cied.patient_dependent ? "Patiënt is pacemakerafhankelijk." : "Patiënt is niet afhankelijk.",
    `Batterij: ${battery}.`,
  ];

  const out: string[] = [];
  if (measurements.length > 0) out.push("Meetwaarden:", ...measurements, "");
  out.push("Conclusie:", ...conclusion);
  return out.join("\n");
}

function hasDeviceData(cied: CiedRecord): boolean {
  return hasAnyValue(
    cied.device_type,
    cied.device_brand,
    cied.programming_mode,
    cied.lower_rate,
    cied.upper_tracking,
    cied.atrial_pacing_pct,
    cied.ventricular_pacing_pct,
    cied.lv_pacing_pct,
    cied.battery_status
  );
}

export function summarizeCiedForBrief(cied: CiedRecord, metrics: CiedMetrics = computeCiedMetrics(cied)): string {
  if (!hasDeviceData(cied)) return "Geen device-gegevens beschikbaar.";
  const parts: string[] = [];

  const device = [cied.device_type ?? "Device", cied.device_brand ? `(${cied.device_brand})` : "", programmingString(cied) ?? ""]
    .filter((p) => p !== "")
    .join(" ");
  parts.push(device);

  const pacing: string[] = [];
  if (metrics.atrialPacingPct !== undefined) pacing.push(`A ${metrics.atrialPacingPct}%`);
  if (metrics.ventricularPacingPct !== undefined) pacing.push(`V ${metrics.ventricularPacingPct}%`);
  if (metrics.lvPacingPct !== undefined) pacing.push(`LV ${metrics.lvPacingPct}%`);
  if (pacing.length > 0) parts.push(`pacing ${pacing.join(", ")}`);

  if (cied.battery_status) parts.push(`batterij: ${cied.battery_status}`);

  const abnormal: string[] = [];
  if (!cied.sensing_ok) abnormal.push("sensing");
  if (!cied.pacing_ok) abnormal.push("pacing");
  if (!cied.impedance_ok) abnormal.push("impedantie");
  if (abnormal.length > 0) parts.push(`afwijkend: ${abnormal.join("/")}`);

  return parts.join("; ");
}
