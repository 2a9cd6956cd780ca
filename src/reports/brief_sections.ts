import type { StudySnapshot } from "../snapshot/schemas.js";
import { formatDateNl } from "../shared/format.js";
import type { ReportTextKey } from "../shared/types.js";
import type { InvestigationSection } from "./letter.js";

export interface StoredStudy {
  snapshot: StudySnapshot;
  /** ISO 8601 timestamp of the study, when known. */
  study_datetime?: string;
}

export interface BriefSection {
  text: string;
  /** dd-mm-yyyy */
  performed_on?: string;
}

export type BriefSections = Partial<Record<ReportTextKey, BriefSection>>;

/**
 * Latest non-empty text per report key across stored studies. ISO
 * timestamps compare as strings; a study without one counts as oldest and
 * ties keep the study seen first.
 */
export function collectBriefSections(studies: readonly StoredStudy[]): BriefSections {
  const best = new Map<string, { stamp: string; section: BriefSection }>();

  for (const study of studies) {
    const stamp = study.study_datetime ?? "";
    for (const [key, raw] of Object.entries(study.snapshot.report_texts)) {
      const text = raw.trim();
      if (!text) continue;
      const current = best.get(key);
      if (current && stamp <= current.stamp) continue;
      best.set(key, { stamp, section: { text, performed_on: formatDateNl(study.study_datetime) } });
    }
  }

  const out: BriefSections = {};
  for (const key of REPORT_KEYS_IN_LETTER) {
    const found = best.get(key);
    if (found) out[key] = found.section;
  }
  for (const key of BRIEF_KEYS) {
    const found = best.get(key);
    if (found) out[key] = found.section;
  }
  return out;
}

const REPORT_KEYS_IN_LETTER = ["full_ecg", "full_fietstest", "full_echo", "full_holter", "full_cied"] as const;
const BRIEF_KEYS = ["brief_ecg", "brief_fietstest", "brief_echo", "brief_holter", "brief_cied"] as const;

const INVESTIGATION_LABELS: Record<(typeof REPORT_KEYS_IN_LETTER)[number], string> = {
  full_ecg: "ECG",
  full_fietstest: "Fietsproef",
  full_echo: "Echocardiografie",
  full_holter: "Holter-monitoring",
  full_cied: "Device uitlezing",
};

/** Letter investigations from the full report texts; empty texts are skipped. */
export function buildLetterInvestigations(sections: BriefSections): InvestigationSection[] {
  const out: InvestigationSection[] = [];
  for (const key of REPORT_KEYS_IN_LETTER) {
    const section = sections[key];
    if (!section || !section.text.trim()) continue;
    out.push({ label: INVESTIGATION_LABELS[key], text: section.text, performed_on: section.performed_on });
  }
  return out;
}
