/**
 * Guideline recommendations for an echo study.
 *
 * Severe mitral regurgitation and severe aortic stenosis are detected from
 * the raw measurements (or a clinician label naming them); only then do the
 * clinical yes/no flags add graded advice. Aortic size advice follows on its
 * own. Output order: mitral → aortic stenosis → aorta.
 */

import { indexToBsa } from "../calculations/stats.js";
import {
  isLowFlowLowGradient,
  isSevereAorticStenosis,
  mitralRegurgitationSeverity,
  type AorticValveMeasurements,
} from "../calculations/valves.js";
import type { EchoRecord } from "../snapshot/schemas.js";
import { aorticValveMeasurements } from "../studies/echo.js";

export const SEVERE_MR_LABEL = "Ernstige mitralis regurgitatie";

export const GENETIC_TESTING_ADVICE =
  "Bij aorta-aneurysma of thoracale dissectie met HTAD-risicofactoren genetische testing aangewezen " +
  "(<60 j, geen klassieke risicofactoren, familiaal plots overlijden, andere aneurysmata, familiale TAD, " +
  "syndromale kenmerken Marfan/Loeys-Dietz/Ehlers-Danlos).";

export function isSevereMitralRegurgitation(echo: EchoRecord): boolean {
  if (echo.mk_regurgitation?.includes(SEVERE_MR_LABEL)) return true;
  return mitralRegurgitationSeverity(echo.mk_eroa, echo.mk_regvol, echo.mk_rf) === 3;
}

// ── Mitral regurgitation ───────────────────────────────────────────

function mitralRecommendations(echo: EchoRecord): string[] {
  const bsa = echo.patient.bsa;
  const recs: string[] = ["Ernstige primaire mitralisregurgitatie vastgesteld."];
  const symptomatic = echo.mr_symptoms === true;
  const lvesdi = indexToBsa(echo.lvids, bsa, 1);
  const lavi = indexToBsa(echo.la_volume, bsa, 1) ?? echo.lavi;

  if (symptomatic) recs.push("Mitralisklepchirurgie is aangewezen bij ernstige primaire MR met symptomen (I-B).");
  if (echo.lvef !== undefined && echo.lvef <= 60) recs.push("Chirurgie aangewezen: LVEF ≤60% (I-B).");
  if (echo.lvids !== undefined && echo.lvids > 40) recs.push("Chirurgie aangewezen: LVESD >40 mm (I-B).");
  if (lvesdi !== undefined && lvesdi >= 20) recs.push("Chirurgie aangewezen: LVESDi ≥20 mm/m² (I-B).");
  if (echo.pasp_raw !== undefined && echo.pasp_raw > 50) recs.push("Pulmonale hypertensie met sPAP >50 mmHg (IIa-B).");
  if (lavi !== undefined && lavi > 60) recs.push("LA dilatatie (LAVI >60 mL/m²) (IIa-B).");
  if (echo.af_present === true) recs.push("Voorkamerfibrillatie bij ernstige MR (IIa-B).");
  recs.push("Chirurgisch klepherstel heeft de voorkeur (I-B).");
  recs.push("Minimaal invasieve klepchirurgie kan overwogen worden (IIb).");
  if (symptomatic) {
    recs.push(
      "TEER kan worden overwogen bij symptomatische ernstige MR met hoog chirurgisch risico en geschikte anatomie."
    );
  }
  return recs;
}

// ── Aortic stenosis ────────────────────────────────────────────────

function aorticStenosisRecommendations(echo: EchoRecord, valve: AorticValveMeasurements): string[] {
  const { sex, age, bsa } = echo.patient;
  const recs: string[] = ["Ernstige aortaklepstenose vastgesteld."];

  if (echo.as_symptoms === true) recs.push("Interventie aangewezen bij symptomatische ernstige AS (I-B).");
  if (isLowFlowLowGradient(valve, indexToBsa(echo.sv, bsa, 1))) {
    recs.push("Low-flow low-gradient patroon met ernstig stenoseprofiel.");
  }
  if (echo.lvef !== undefined) {
    if (echo.lvef < 50) recs.push("Interventie aangewezen bij LVEF <50% zonder andere oorzaak (I-B).");
    else if (echo.lvef < 55) recs.push("Interventie te overwegen bij LVEF <55% zonder andere oorzaak (IIa).");
  }
  if (echo.as_sbp_drop === true) recs.push("Bloeddrukdaling >20 mmHg bij inspanning (IIa).");
  if (valve.meanGradient !== undefined && valve.meanGradient > 60) {
    recs.push("Zeer ernstige AS: mean gradiënt >60 mmHg (IIa).");
  }
  if (valve.vmax !== undefined && valve.vmax > 5) recs.push("Zeer ernstige AS: Vmax >5.0 m/s (IIa).");

  const calcium = echo.as_calcium_score;
  if (calcium !== undefined && calcium > (sex === "Man" ? 2000 : 1200)) {
    recs.push("Ernstige calcificatie ondersteunt interventie (IIa).");
  }
  if (echo.as_vmax_progression !== undefined && echo.as_vmax_progression > 0.3) {
    recs.push("Vmax-progressie >0.3 m/s/jaar (IIa).");
  }
  if (echo.as_bnp !== undefined && echo.as_bnp > 0) {
    recs.push("Verhoogde BNP/NT-proBNP ondersteunt interventie (IIa).");
  }

  if (age !== undefined) {
    recs.push(
      Math.trunc(age) >= 70
        ? "TAVI aanbevolen bij geschikte anatomie (I-A)."
        : "SAVR aanbevolen bij leeftijd <70 jaar en laag operatierisico (I-B). TAVI kan worden overwogen afhankelijk van anatomie/risico (IIa/IIb)."
    );
  }
  return recs;
}

// ── Aortic dimensions ──────────────────────────────────────────────

function aortaRecommendations(echo: EchoRecord, severeAs: boolean): string[] {
  const { sex, bsa } = echo.patient;
  const values = [echo.aoa, echo.aosv, echo.aostj, echo.ascao].filter((v): v is number => v !== undefined);
  if (values.length === 0) return [];

  const maxAo = Math.max(...values);
  const indices = values.map((v) => indexToBsa(v, bsa, 1)).filter((v): v is number => v !== undefined);
  const maxIdx = indices.length > 0 ? Math.max(...indices) : undefined;
  const bicuspid = (echo.ak_morphology ?? "").toLowerCase().includes("bicus");
  const recs: string[] = [];

  if (maxAo >= 55) {
    recs.push("Aorta ascendens ≥55 mm: chirurgie aanbevolen (I-B).");
  } else if (maxAo >= 50) {
    recs.push(
      bicuspid || sex === "Man"
        ? "Aorta ascendens ≥50 mm: overweeg chirurgie (IIa), zeker bij bicuspide anatomie of man."
        : "Aorta ascendens ≥50 mm: overweeg chirurgie (IIa)."
    );
  }
  if (maxAo >= 45 && severeAs) {
    recs.push("Bij indicatie voor klepchirurgie en AscAo ≥45 mm: gelijktijdige aortachirurgie overwegen (IIa).");
  }

  // Follow-up interval: first matching tier only.
  if (maxAo >= 45 && maxAo < 50) {
    recs.push("AscAo 45-49 mm: controle CT/MRI/echo om de 6-12 maanden.");
  } else if (maxAo >= 40 && maxAo < 45) {
    recs.push("AscAo 40-44 mm: controle beeldvorming jaarlijks.");
  } else if (maxIdx !== undefined && maxIdx > 17 && maxAo < 40) {
    recs.push("AscAo index >17 mm/m²: overweeg jaarlijkse opvolging ondanks absolute <40 mm.");
  } else if (maxAo >= 37 && maxAo < 40) {
    recs.push("AscAo 37-39 mm: herbeoordeling binnen 2-3 jaar indien stabiel.");
  }

  if (maxAo >= 30 && maxAo < 40) recs.push("Aorta 30-40 mm: TTE elke 3 jaar.");
  if (maxAo >= 40 && maxAo <= 44) {
    recs.push(
      "Aorta 40-44 mm: baseline CT/MR aorta + TTE controle in 1 jaar; bij groei >3 mm/jaar bevestigen met CT/MR en daarna elke 6 maanden TTE; bij groei <3 mm/jaar TTE elke 2 jaar."
    );
  }
  if (maxAo >= 45 && maxAo <= 49) recs.push("Aorta 45-49 mm: baseline CT/MR aorta en TTE elke 6 maanden.");
  if (maxAo >= 50 && maxAo <= 52) {
    recs.push(
      "Aorta 50-52 mm: baseline CT/MR aorta; bij hoog-risico kenmerken (familiale aorta-event, ongecontroleerde hypertensie, leeftijd <50 j) kan chirurgie overwogen worden (IIb); anders elke 6 maanden nieuwe beeldvorming; bij groei >3 mm/jaar chirurgie overwegen."
    );
  }
  if (maxAo >= 50 && maxAo <= 54) {
    recs.push(
      "Aorta 50-54 mm: baseline CT/MR aorta; bij wortel-fenotype en bicuspide klep chirurgie (I); bij wortel-fenotype en tricuspide klep chirurgie te overwegen (IIb)."
    );
  }
  if (maxAo > 55) recs.push("Aorta >55 mm: chirurgie (I).");

  recs.push(GENETIC_TESTING_ADVICE);
  return recs;
}

/** Ordered guideline recommendations; empty when nothing applies. */
export function generateGuidelineRecommendations(echo: EchoRecord): string[] {
  const valve = aorticValveMeasurements(echo);
  const severeAs = isSevereAorticStenosis(valve, echo.ak_stenosis);
  const recs: string[] = [];
  if (isSevereMitralRegurgitation(echo)) recs.push(...mitralRecommendations(echo));
  if (severeAs) recs.push(...aorticStenosisRecommendations(echo, valve));
  recs.push(...aortaRecommendations(echo, severeAs));
  return recs;
}
