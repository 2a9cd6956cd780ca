import { describe, it, expect } from "vitest";
import { EchoRecordSchema } from "../src/snapshot/schemas.js";
import { computeEchoMetrics } from "../src/studies/echo.js";
import { generateEchoReport, resolveEchoLabels, summarizeEchoForBrief } from "../src/reports/generators/echo.js";

const patient = { sex: "Man", age: 50, length: 180, weight: 80 };

describe("Echo report with only the patient sex", () => {
  const echo = EchoRecordSchema.parse({ patient: { sex: "Vrouw" } });

  it("falls back to the default labels", () => {
    const report = generateEchoReport(echo);
    expect(report).toContain("Normotroof");
    expect(report).toContain("niet gedilateerd");
    expect(report.split("\n")).toEqual([
      "LV: Normotroof, niet gedilateerd, met goede globale en regionale systolische functie.",
      "Normale diastolische functie met normale vullingsdrukken in het linker atrium.",
      "LA: Niet gedilateerd.",
      "",
      "RV: Normotroof, niet gedilateerd met goede longitudinale systolische functie. Geen adequaat TR-signaal voor PASP",
      "RA: Niet gedilateerd.",
      "",
      "AK: Normale tricuspiede morfologie. Geen calcificatie. Geen stenose. Geen regurgitatie.",
      "MK: Normale morfologie. Geen regurgitatie.",
      "TK: Normale morfologie. Geen regurgitatie.",
      "PK: Normale morfologie. Geen regurgitatie.",
      "Pericardium is normaal zonder effusie.",
      "Endocardium geen tekens van infectie.",
      "IVC is niet gedilateerd met bewaarde ademhalingsvariatie. CVD bedraagt 3 mmHg.",
    ]);
  });

  it("has no summary lines and no brief", () => {
    expect(computeEchoMetrics(echo).summaryLines).toEqual([]);
    expect(summarizeEchoForBrief(echo)).toBe("Geen echogegevens beschikbaar.");
  });
});

describe("Echo report with measurements", () => {
  const echo = EchoRecordSchema.parse({
    patient,
    ivsd: 12,
    lvpw: 11,
    lvidd: 52,
    lvids: 34,
    lvef: 60,
    ea: 1.2,
    ee: 9,
    la_volume: 70,
    ra_volume: 50,
    tapse: 22,
    pasp_raw: 25,
    cvd: "3",
    aoa: 24,
    ascao: 36,
  });
  const metrics = computeEchoMetrics(echo);

  it("derives LV mass, geometry and indices", () => {
    expect(echo.patient.bsa).toBe(2);
    expect(metrics).toMatchObject({
      lvMassG: 234.6,
      lvMassIndex: 117.3,
      lvMassSeverity: "Mild",
      rwt: 0.423,
      lvHypertrophyAuto: "Mild concentrisch hypertroof",
      lvDilationAuto: "niet gedilateerd",
      lvesdi: 17,
      lvidsSeverity: 0,
      teichholzEf: 63.4,
      lavi: 35,
      laDilationAuto: "Mild gedilateerd",
      ravi: 25,
      raDilationAuto: "Niet gedilateerd",
      aortaDilated: true,
    });
  });

  it("lists summary lines in a fixed order", () => {
    const lines = metrics.summaryLines;
    expect(lines.slice(0, 9)).toEqual([
      "LV massa: 235 g",
      "LVMI: 117.3 g/m² (Mild)",
      "RWT: 0.423",
      "LV hypertrofie: Mild concentrisch hypertroof",
      "LVIDd index: 26 mm/m² — Niet gedilateerd",
      "LVIDs index: 17 mm/m² — Normaal",
      "Teichholz EF (LVIDd/LVIDs): ~63.4%",
      "LAVI: 35 mL/m² — Mild gedilateerd",
      "RAVI: 25 mL/m² — Niet gedilateerd",
    ]);
    expect(lines).toContain("AoA predicted range (lower–higher): 15.69–26.63 mm");
    expect(lines).toContain("AoA: 24 mm — Indexed: 12.0 mm/m² — Niet gedilateerd");
    expect(lines).toContain("AscAo: 36 mm — Indexed: 18.0 mm/m² — Gedilateerd");
    expect(lines[lines.length - 1]).toBe("Normale pulmonale drukken met PASP 28 mmHg.");
  });

  it("writes the structural blocks", () => {
    const report = generateEchoReport(echo, metrics).split("\n");
    expect(report.slice(0, 9)).toEqual([
      "LV: Mild concentrisch hypertroof, (IVSd 12 mm, LVPWd 11 mm, LVMI 117.3 g/m², RWT 0.423), niet gedilateerd (LVIDd 52 mm), met goede globale en regionale systolische functie (LVEF 60%).",
      "Normale diastolische functie met normale vullingsdrukken in het linker atrium (E/A 1.2, E/e' 9.0).",
      "LA: Mild gedilateerd. (LAVI 35 mL/m²).",
      "AO: Aorta gedilateerd (AoA 24 mm, 12.0 mm/m², AscAo 36 mm, 18.0 mm/m²).",
      "Aorta ascendens (AscAo) is gedilateerd (36 mm, 18.0 mm/m²).",
      "",
      "RV: Normotroof, niet gedilateerd met goede longitudinale systolische functie (TAPSE 22 mm). Normale pulmonale drukken met PASP 28 mmHg.",
      "RA: Niet gedilateerd. (RAVI 25 mL/m²).",
      "",
    ]);
  });

  it("lets clinician labels win over automatic ones", () => {
    const overridden = { ...echo, lv_hypertrophy: "Normotroof", la_dilation: "Niet gedilateerd" };
    const labels = resolveEchoLabels(overridden, metrics);
    expect(labels.lvHypertrophy).toBe("Normotroof");
    expect(labels.laDilation).toBe("Niet gedilateerd");
    expect(labels.rvFunction).toBe("goede longitudinale systolische functie");
  });

  it("summarizes for the letter", () => {
    expect(summarizeEchoForBrief(echo, metrics)).toBe(
      "goede globale en regionale systolische functie LVEF 60%; LV: niet gedilateerd; LA: Mild gedilateerd; AK: Geen stenose; Normale pulmonale drukken met PASP 28 mmHg."
    );
  });
});

describe("Echo valve findings", () => {
  const echo = EchoRecordSchema.parse({
    patient,
    ak_vmax: 4.5,
    ak_mean: 45,
    ava: 0.8,
    sv: 60,
    mk_eroa: 0.25,
    tk_vcw: 0.5,
  });

  it("grades the aortic valve and the regurgitant valves", () => {
    const m = computeEchoMetrics(echo);
    expect(m.avaIndex).toBe(0.4);
    expect(m.svi).toBe(30);
    expect(m.aorticStenosisAuto).toBe("Ernstige stenose");
    expect(m.lowFlowLowGradient).toBe(false);
    expect(m.summaryLines).toEqual([
      "AK: Ernstige stenose (Vmax 4.50 m/s, MeanG 45 mmHg, AVA 0.80 cm², AVA index 0.40 cm²/m², SVi 30.0 mL/m², (laag slagvolume))",
      "MK: Matige mitralis regurgitatie",
      "TK: Matige tricuspidalis regurgitatie",
    ]);
  });

  it("writes the valve lines", () => {
    const report = generateEchoReport(echo).split("\n");
    expect(report).toContain(
      "AK: Normale tricuspiede morfologie. Geen calcificatie. Ernstige stenose (Vmax 4.50 m/s, MeanG 45 mmHg, AVA 0.80 cm², 0.40 cm²/m², SV 60 mL, SVi 30.0 mL/m²). Geen regurgitatie."
    );
    expect(report).toContain("MK: Normale morfologie. Matige mitralis regurgitatie (EROA 0.25 cm²).");
    expect(report).toContain("TK: Normale morfologie. Matige tricuspidalis regurgitatie (VCW 0.50 cm).");
  });

  it("adds the low-flow low-gradient note", () => {
    const lflg = EchoRecordSchema.parse({ patient, ak_mean: 30, ava: 0.8, sv: 60 });
    expect(computeEchoMetrics(lflg).lowFlowLowGradient).toBe(true);
    expect(generateEchoReport(lflg)).toContain("Ernstige stenose (low-flow low-gradient patroon:");
  });

  it("names valve findings in the brief", () => {
    expect(summarizeEchoForBrief(echo)).toBe(
      "goede globale en regionale systolische functie; LV: niet gedilateerd; AK: Ernstige stenose; MK: Matige mitralis regurgitatie; TK: Matige tricuspidalis regurgitatie."
    );
  });
});
