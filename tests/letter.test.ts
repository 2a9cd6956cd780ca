import { describe, it, expect } from "vitest";
import {
  ClinicalExamSchema,
  LETTER_UNDERLINE,
  composeConsultationLetter,
  letterHeadings,
} from "../src/reports/letter.js";
import { buildLetterInvestigations, collectBriefSections } from "../src/reports/brief_sections.js";
import { letterInputFromDocument, parseLetterDocument } from "../src/reports/letter_document.js";
import { snapshotFromDict } from "../src/snapshot/snapshot.js";
import { formatDateNl, joinDutch } from "../src/shared/format.js";

describe("Consultation letter", () => {
  const letter = composeConsultationLetter({
    consultDate: "2024-03-05",
    history: "Hypertensie",
    medication: "   ",
    clinicalExam: ClinicalExamSchema.parse({ pols: 72, blood_pressure: [130, 80], auscultation: " normaal " }),
    investigations: [
      { label: "Echocardiografie", text: "LV normaal", performed_on: "01-03-2024" },
      { label: "ECG", text: "Sinusritme" },
    ],
  });

  it("lays out the sections in letter order", () => {
    expect(letter).toBe(
      [
        "Geachte collega",
        "",
        "Wij zagen uw patiënt op de raadpleging cardiologie op 05-03-2024.",
        "",
        "Voorgeschiedenis",
        LETTER_UNDERLINE,
        "Hypertensie",
        "",
        "Anamnese",
        LETTER_UNDERLINE,
        "-",
        "",
        "Huidige Medicatie",
        LETTER_UNDERLINE,
        "-",
        "",
        "Klinisch onderzoek",
        LETTER_UNDERLINE,
        "Algemene inspectie: normale indruk",
        "Pols 72/min.",
        "Bloeddruk 130/80 mmHg.",
        "Hartauscultatie: normaal",
        "",
        "Elektrocardiogram in rust",
        LETTER_UNDERLINE,
        "Sinusritme",
        "",
        "Transthoracale Echocardiografie (01-03-2024)",
        LETTER_UNDERLINE,
        "LV normaal",
        "",
        "Bespreking",
        LETTER_UNDERLINE,
        "-",
        "",
        "Met collegiale hoogachting,",
        "Dienst Cardiologie",
      ].join("\n") + "\n"
    );
  });

  it("lists the headings", () => {
    expect(letterHeadings(letter)).toEqual([
      "Voorgeschiedenis",
      "Anamnese",
      "Huidige Medicatie",
      "Klinisch onderzoek",
      "Elektrocardiogram in rust",
      "Transthoracale Echocardiografie (01-03-2024)",
      "Bespreking",
    ]);
  });

  it("says vandaag without a date and signs with the given signature", () => {
    const plain = composeConsultationLetter({ clinicalExam: ClinicalExamSchema.parse({}), investigations: [] }, "Dr. Test");
    expect(plain).toContain("Wij zagen uw patiënt op de raadpleging cardiologie op vandaag.");
    expect(plain.endsWith("Met collegiale hoogachting,\nDr. Test\n")).toBe(true);
    expect(letterHeadings(plain)).toEqual([
      "Voorgeschiedenis",
      "Anamnese",
      "Huidige Medicatie",
      "Klinisch onderzoek",
      "Bespreking",
    ]);
  });

  it("computes BMI in the clinical exam and prints it", () => {
    const exam = ClinicalExamSchema.parse({ weight: "80", length: 180 });
    expect(exam.bmi).toBe(24.7);
    const lines = composeConsultationLetter({ clinicalExam: exam, investigations: [] }).split("\n");
    const start = lines.indexOf("Klinisch onderzoek");
    expect(lines.slice(start + 2, start + 4)).toEqual([
      "Algemene inspectie: normale indruk",
      "Gewicht 80 kg, lengte 180 cm (BMI 24.7 kg/m²).",
    ]);
  });

  it("leaves out investigations without text", () => {
    const text = composeConsultationLetter({
      clinicalExam: ClinicalExamSchema.parse({}),
      investigations: [
        { label: "Holter", text: "   " },
        { label: "ECG", text: "" },
        { label: "ECG rust", text: "Sinusritme" },
      ],
    });
    expect(letterHeadings(text)).toEqual([
      "Voorgeschiedenis",
      "Anamnese",
      "Huidige Medicatie",
      "Klinisch onderzoek",
      "Elektrocardiogram in rust",
      "Bespreking",
    ]);
    const lines = text.split("\n");
    expect(lines[lines.indexOf("Elektrocardiogram in rust") + 2]).toBe("Sinusritme");
  });
});

describe("Brief sections", () => {
  const studies = [
    {
      snapshot: snapshotFromDict({ report_texts: { full_ecg: "old ecg", brief_ecg: "b1" } }),
      study_datetime: "2024-01-01T10:00:00Z",
    },
    {
      snapshot: snapshotFromDict({ report_texts: { full_ecg: "new ecg ", full_echo: "echo text", full_holter: "   " } }),
      study_datetime: "2024-02-01",
    },
    {
      snapshot: snapshotFromDict({ report_texts: { full_ecg: "undated", full_cied: "cied" } }),
    },
  ];

  it("keeps the latest non-empty text per key", () => {
    expect(collectBriefSections(studies)).toEqual({
      full_ecg: { text: "new ecg", performed_on: "01-02-2024" },
      full_echo: { text: "echo text", performed_on: "01-02-2024" },
      full_cied: { text: "cied", performed_on: undefined },
      brief_ecg: { text: "b1", performed_on: "01-01-2024" },
    });
  });

  it("turns full reports into labelled investigations", () => {
    expect(buildLetterInvestigations(collectBriefSections(studies))).toEqual([
      { label: "ECG", text: "new ecg", performed_on: "01-02-2024" },
      { label: "Echocardiografie", text: "echo text", performed_on: "01-02-2024" },
      { label: "Device uitlezing", text: "cied", performed_on: undefined },
    ]);
  });
});

describe("Letter document", () => {
  it("requires a patient", () => {
    expect(() => parseLetterDocument({})).toThrow("Invalid letter document: patient: Required");
  });

  it("prefers explicit investigations", () => {
    const doc = parseLetterDocument({
      patient: { sex: "Vrouw" },
      investigations: [{ label: "Holter", text: "Geen pauzes" }],
      studies: [{ snapshot: { report_texts: { full_ecg: "ecg" } } }],
    });
    expect(letterInputFromDocument(doc).investigations).toEqual([{ label: "Holter", text: "Geen pauzes" }]);
  });

  it("skips empty explicit investigations", () => {
    const doc = parseLetterDocument({
      patient: { sex: "Man" },
      investigations: [
        { label: "Echocardiografie", text: " " },
        { label: "Echo controle", text: "LV normaal", performed_on: "2024-04-01" },
      ],
    });
    const letter = composeConsultationLetter(letterInputFromDocument(doc));
    const lines = letter.split("\n");
    const heading = lines.indexOf("Transthoracale Echocardiografie (2024-04-01)");
    expect(heading).toBeGreaterThan(-1);
    expect(lines[heading + 2]).toBe("LV normaal");
    expect(letterHeadings(letter)).toHaveLength(6);
  });

  it("generates reports for stored studies that have none", () => {
    const doc = parseLetterDocument({
      patient: { sex: "Vrouw", age: 60 },
      studies: [{ snapshot: { ecg: { vent_rate: 70, qrs_duration_ms: 90 } }, study_datetime: "2024-05-02" }],
    });
    const input = letterInputFromDocument(doc);
    expect(input.investigations.map((i) => [i.label, i.performed_on])).toEqual([["ECG", "02-05-2024"]]);
    expect(input.investigations[0]?.text).not.toBe("");
    expect(input.clinicalExam.bmi).toBeUndefined();
  });
});

describe("Dutch formatting", () => {
  it("formats ISO dates", () => {
    expect(formatDateNl("2024-03-05T10:00:00Z")).toBe("05-03-2024");
    expect(formatDateNl("05/03/2024")).toBeUndefined();
  });

  it("joins lists with en", () => {
    expect(joinDutch(["a", " ", "b", "c"])).toBe("a, b en c");
    expect(joinDutch(["a"])).toBe("a");
  });
});
