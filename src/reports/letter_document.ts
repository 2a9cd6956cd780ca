import { z } from "zod";
import { PatientSchema, type Patient } from "../snapshot/schemas.js";
import { snapshotFromDict } from "../snapshot/snapshot.js";
import { collectBriefSections, buildLetterInvestigations, type StoredStudy } from "./brief_sections.js";
import { ClinicalExamSchema, InvestigationSectionSchema, type ConsultationLetterInput } from "./letter.js";
import { generateStudyReports } from "./orchestrator.js";

const text = z.string().optional();

/** JSON document the letter CLI reads. */
export const LetterDocumentSchema = z.object({
  patient: PatientSchema,
  consult_date: text,
  history: text,
  complaint: text,
  medication: text,
  discussion: text,
  clinical_exam: ClinicalExamSchema.default({}),
  investigations: z.array(InvestigationSectionSchema).optional(),
  studies: z
    .array(
      z.object({
        snapshot: z.unknown(),
        study_datetime: text,
      })
    )
    .optional(),
});

export type LetterDocument = z.infer<typeof LetterDocumentSchema>;

export function parseLetterDocument(data: unknown): LetterDocument {
  const parsed = LetterDocumentSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new Error(`Invalid letter document: ${issues.join("; ")}`);
  }
  return parsed.data;
}

/**
 * Stored studies of the document. A snapshot without its own patient takes
 * the letter patient; one that has study records but no report texts yet
 * has its reports generated first.
 */
export function storedStudiesFromDocument(studies: LetterDocument["studies"], patient: Patient): StoredStudy[] {
  return (studies ?? []).map((entry) => {
    let snapshot = snapshotFromDict(entry.snapshot);
    if (!snapshot.patient) {
      const raw = entry.snapshot;
      snapshot = snapshotFromDict(
        typeof raw === "object" && raw !== null && !Array.isArray(raw) ? { ...raw, patient } : { patient }
      );
    }
    if (Object.keys(snapshot.report_texts).length === 0) snapshot = generateStudyReports(snapshot).snapshot;
    return { snapshot, study_datetime: entry.study_datetime };
  });
}

/** Explicit investigations win; otherwise they come from the stored studies. */
export function letterInputFromDocument(doc: LetterDocument): ConsultationLetterInput {
  const investigations =
    doc.investigations ?? buildLetterInvestigations(collectBriefSections(storedStudiesFromDocument(doc.studies, doc.patient)));
  return {
    consultDate: doc.consult_date,
    history: doc.history,
    complaint: doc.complaint,
    medication: doc.medication,
    clinicalExam: doc.clinical_exam,
    investigations,
    discussion: doc.discussion,
  };
}
