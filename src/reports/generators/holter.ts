import type { HolterRecord } from "../../snapshot/schemas.js";
import type { HolterMetrics } from "../../shared/types.js";
import { computeHolterMetrics } from "../../studies/holter.js";

function atrialFibrillationSentence(pct: number): string {
  if (pct >= 50) return `Er werd permanent atriumfibrilleren vastgesteld (${pct}% van de tijd).`;
  if (pct >= 10) return `Er werden frequente episoden van atriumfibrilleren waargenomen (${pct}% van de tijd).`;
  return `Er werden incidentele episoden van atriumfibrilleren waargenomen (${pct}% van de tijd).`;
}

function rhythmFindings(holter: HolterRecord, m: HolterMetrics): string[] {
  const findings: string[] = [];

  if (m.afibDetected && holter.afib_percentage !== undefined) {
    findings.push(atrialFibrillationSentence(holter.afib_percentage));
  }

  if (holter.pauses_count !== undefined && holter.pauses_count > 0) {
    let pauses = `${holter.pauses_count} pauze(s)`;
    if (holter.longest_pause_ms) pauses += ` met een maximale duur van ${holter.longest_pause_ms} ms`;
    findings.push(
      m.significantPauses
        ? `Er werden significante pauzes geregistreerd: ${pauses}.`
        : `Er werden ${pauses} geregistreerd.`
    );
  }

  const ectopy: string[] = [];
  if (holter.ves_count !== undefined && holter.ves_count > 0) {
    const frequent = m.frequentVes ? "frequente " : "";
    ectopy.push(`${frequent}ventriculaire extrasystolen (VES: ${holter.ves_count})`);
  }
  if (holter.sves_count !== undefined && holter.sves_count > 0) {
    const frequent = m.frequentSves ? "frequente " : "";
    ectopy.push(`${frequent}supraventriculaire extrasystolen (SVES: ${holter.sves_count})`);
  }
  if (ectopy.length > 0) findings.push(`Er werden ${ectopy.join(" en ")} waargenomen.`);

  if (m.avBlockDetected && holter.av_block_type) findings.push(`Er werd ${holter.av_block_type} vastgesteld.`);

  if (findings.length === 0) findings.push("Geen significante ritmestoornissen waargenomen.");
  return findings;
}

function conclusions(holter: HolterRecord, m: HolterMetrics): string[] {
  const out: string[] = [];
  if (m.afibDetected) out.push("- Atriumfibrilleren gedocumenteerd");
  if (m.bradyFlag) out.push("- Bradycardie");
  if (m.tachyFlag) out.push("- Tachycardie");
  if (m.significantPauses) out.push("- Significante pauzes");
  if (m.frequentVes) out.push("- Frequente ventriculaire extrasystolen");
  if (m.frequentSves) out.push("- Frequente supraventriculaire extrasystolen");
  if (m.avBlockDetected && holter.av_block_type) out.push(`- ${holter.av_block_type}`);
  if (out.length === 0) out.push("- Geen afwijkingen geregistreerd tijdens Holter-monitoring");
  return out;
}

export function generateHolterReport(holter: HolterRecord, metrics: HolterMetrics = computeHolterMetrics(holter)): string {
  const lines: string[] = [];
  lines.push(
    holter.recording_date
      ? `Holter-monitoring geregistreerd op ${holter.recording_date}.`
      : "Holter-monitoring registratie."
  );
  if (holter.recording_duration_hours) lines.push(`Registratieduur: ${holter.recording_duration_hours} uur.`);

  const hr: string[] = [];
  if (holter.avg_hr !== undefined) hr.push(`gemiddelde hartfrequentie ${holter.avg_hr} bpm`);
  if (holter.min_hr !== undefined) hr.push(`minimum ${holter.min_hr} bpm`);
  if (holter.max_hr !== undefined) hr.push(`maximum ${holter.max_hr} bpm`);
  if (hr.length > 0) lines.push(`Hartfrequentie: ${hr.join(", ")}.`);

  if (metrics.bradyFlag) lines.push("Er werd bradycardie vastgesteld.");
  if (metrics.tachyFlag) lines.push("Er werden episoden van tachycardie waargenomen.");

  lines.push(...rhythmFindings(holter, metrics));

  const other = holter.other_findings?.trim();
  if (other) lines.push(`Overige bevindingen: ${other}.`);

  lines.push("", "Conclusie:", ...conclusions(holter, metrics));
  return lines.join("\n");
}

export function summarizeHolterForBrief(holter: HolterRecord): string {
  const parts: string[] = [];
  if (holter.avg_hr !== undefined) parts.push(`gem. HF ${holter.avg_hr} bpm`);
  if (holter.min_hr !== undefined) parts.push(`min ${holter.min_hr} bpm`);
  if (holter.max_hr !== undefined) parts.push(`max ${holter.max_hr} bpm`);
  if (holter.afib_percentage !== undefined && holter.afib_percentage > 0) parts.push(`VKF ${holter.afib_percentage}%`);
  if (holter.pauses_count !== undefined && holter.pauses_count > 0) {
    parts.push(
      holter.longest_pause_ms
        ? `${holter.pauses_count} pauze(s) (langste ${holter.longest_pause_ms} ms)`
        : `${holter.pauses_count} pauze(s)`
    );
  }
  if (holter.ves_count !== undefined) parts.push(`VES ${holter.ves_count}`);
  if (holter.sves_count !== undefined) parts.push(`SVES ${holter.sves_count}`);
  if (holter.av_block_type) parts.push(holter.av_block_type);
  const other = holter.other_findings?.trim();
  if (other) parts.push(`Overige: ${other}`);

  if (parts.length === 0 && !holter.recording_date) return "Geen Holter-gegevens beschikbaar.";
  const prefix = holter.recording_date ? `Holter dd. ${holter.recording_date}: ` : "Holter: ";
  return (prefix + parts.join("; ")).trim();
}
