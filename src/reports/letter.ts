import { z } from "zod";
import { bodyMassIndex } from "../calculations/body.js";
import { DEFAULT_LETTER_SIGNATURE } from "../shared/report_config.js";
import { formatDateNl } from "../shared/format.js";
import { optionalText, parseOptionalNumber } from "../shared/parse.js";

const UNDERLINE = "-------------------------";

// ── Letter inputs ──────────────────────────────────────────────────

const optionalNumber = z.preprocess((v) => parseOptionalNumber(v), z.number().optional());
const optionalString = z.preprocess((v) => optionalText(v), z.string().optional());

export const ClinicalExamSchema = z
  .object({
    pols: optionalNumber,
    blood_pressure: z.tuple([optionalNumber, optionalNumber]).optional(),
    auscultation: optionalString,
    weight: optionalNumber,
    length: optionalNumber,
  })
  .transform((exam) => ({ ...exam, bmi: bodyMassIndex(exam.weight, exam.length) }));

export type ClinicalExam = z.infer<typeof ClinicalExamSchema>;

export const InvestigationSectionSchema = z.object({
  label: z.string(),
  text: z.string(),
  performed_on: optionalString,
});

export type InvestigationSection = z.infer<typeof InvestigationSectionSchema>;

export interface ConsultationLetterInput {
  /** ISO date of the consultation; "vandaag" when absent. */
  consultDate?: string;
  history?: string;
  complaint?: string;
  medication?: string;
  clinicalExam: ClinicalExam;
  investigations: readonly InvestigationSection[];
  discussion?: string;
}

// ── Composition ────────────────────────────────────────────────────

function block(value: string | undefined): string {
  return value?.trim() || "-";
}

/**
 * Investigation slots in letter order, matched on label substrings. Only
 * entries with text fill a slot; the first such entry wins.
 */
const INVESTIGATION_SLOTS: ReadonlyArray<{ heading: string; match: string[] }> = [
  { heading: "Elektrocardiogram in rust", match: ["ecg", "elektrocardiogram"] },
  { heading: "Cyclo-ergometrie", match: ["fietstest", "fietsproef", "cyclo", "ergometrie"] },
  { heading: "Transthoracale Echocardiografie", match: ["echo", "transthoracale", "transthoracische"] },
  { heading: "Device controle", match: ["cied", "device", "pacemaker"] },
  { heading: "Holter", match: ["holter"] },
];

function findSection(
  investigations: readonly InvestigationSection[],
  match: string[]
): InvestigationSection | undefined {
  return investigations.find((sec) => {
    if (sec.text.trim() === "") return false;
    const label = sec.label.toLowerCase();
    return match.some((m) => label.includes(m));
  });
}

function examLines(exam: ClinicalExam): string[] {
  const lines = ["Algemene inspectie: normale indruk"];
  if (exam.pols !== undefined) lines.push(`Pols ${Math.round(exam.pols)}/min.`);
  const [systolic, diastolic] = exam.blood_pressure ?? [undefined, undefined];
  if (systolic !== undefined && diastolic !== undefined) {
    lines.push(`Bloeddruk ${Math.round(systolic)}/${Math.round(diastolic)} mmHg.`);
  }
  if (exam.weight !== undefined && exam.length !== undefined && exam.bmi !== undefined) {
    lines.push(`Gewicht ${exam.weight} kg, lengte ${exam.length} cm (BMI ${exam.bmi} kg/m²).`);
  }
  if (exam.auscultation) lines.push(`Hartauscultatie: ${exam.auscultation.trim()}`);
  return lines;
}

/**
 * Consultation letter: salutation, history, complaint, medication, clinical
 * exam, the investigations in ECG → fietsproef → echo → device → Holter order,
 * discussion and closing.
 */
export function composeConsultationLetter(
  input: ConsultationLetterInput,
  signature: string = DEFAULT_LETTER_SIGNATURE
): string {
  const dateText = formatDateNl(input.consultDate) ?? "vandaag";
  const lines: string[] = [
    "Geachte collega",
    "",
    `Wij zagen uw patiënt op de raadpleging cardiologie op ${dateText}.`,
    "",
  ];

  const section = (heading: string, body: string[]) => lines.push(heading, UNDERLINE, ...body, "");

  section("Voorgeschiedenis", [block(input.history)]);
  section("Anamnese", [block(input.complaint)]);
  section("Huidige Medicatie", [block(input.medication)]);
  section("Klinisch onderzoek", examLines(input.clinicalExam));

  for (const slot of INVESTIGATION_SLOTS) {
    const found = findSection(input.investigations, slot.match);
    if (!found) continue;
    const heading = found.performed_on ? `${slot.heading} (${found.performed_on})` : slot.heading;
    section(heading, [block(found.text)]);
  }

  section("Bespreking", [block(input.discussion)]);
  lines.push("Met collegiale hoogachting,", signature);

  return `${lines.join("\n").trim()}\n`;
}

/** Headings of a composed letter: every line directly above an underline. */
export function letterHeadings(letter: string): string[] {
  const lines = letter.split("\n");
  return lines.filter((_, i) => lines[i + 1] === UNDERLINE);
}

export { UNDERLINE as LETTER_UNDERLINE };
