import type { AorticStenosisGrade, SeverityScore } from "../shared/types.js";
import { maxTier } from "./stats.js";

export type RegurgitantValve = "mitralis" | "tricuspidalis" | "pulmonalis";

// ── Shared per-metric tiers ─────────────────────────────────────────

function eroaTier(eroa: number): SeverityScore {
  if (eroa >= 0.4) return 3;
  if (eroa >= 0.2) return 2;
  return 1;
}

function fractionTier(rf: number): SeverityScore {
  if (rf > 50) return 3;
  if (rf >= 30) return 2;
  return 1;
}

function volumeTier(regVol: number, severeFrom: number): SeverityScore {
  if (regVol >= severeFrom) return 3;
  if (regVol >= 30) return 2;
  return 1;
}

function collect(...tiers: Array<SeverityScore | undefined>): SeverityScore[] {
  return tiers.filter((t): t is SeverityScore => t !== undefined);
}

// ── Regurgitation ───────────────────────────────────────────────────

/**
 * Mitral regurgitation score (0 none → 3 severe). Each supplied metric is
 * graded on its own and the worst tier wins.
 */
export function mitralRegurgitationSeverity(
  eroa?: number,
  regurgitantVolume?: number,
  regurgitantFraction?: number
): SeverityScore {
  return maxTier(
    collect(
      eroa !== undefined ? eroaTier(eroa) : undefined,
      regurgitantVolume !== undefined ? volumeTier(regurgitantVolume, 60) : undefined,
      regurgitantFraction !== undefined ? fractionTier(regurgitantFraction) : undefined
    )
  );
}

/** Tricuspid score: RegVol severe from 45 mL; vena contracta width in cm. */
export function tricuspidRegurgitationSeverity(params: {
  eroa?: number;
  regVol?: number;
  rf?: number;
  vcw?: number;
}): SeverityScore {
  const { eroa, regVol, rf, vcw } = params;
  let vcwTier: SeverityScore | undefined;
  if (vcw !== undefined) vcwTier = vcw >= 0.7 ? 3 : vcw >= 0.3 ? 2 : 1;
  return maxTier(
    collect(
      eroa !== undefined ? eroaTier(eroa) : undefined,
      regVol !== undefined ? volumeTier(regVol, 45) : undefined,
      vcwTier,
      rf !== undefined ? fractionTier(rf) : undefined
    )
  );
}

/** Pulmonic score: mitral cutoffs plus deceleration time, pressure half-time and PR index. */
export function pulmonicRegurgitationSeverity(params: {
  eroa?: number;
  regVol?: number;
  rf?: number;
  dtMs?: number;
  phtMs?: number;
  prIndex?: number;
}): SeverityScore {
  const { eroa, regVol, rf, dtMs, phtMs, prIndex } = params;
  const shorterIsWorse = (value: number, severeBelow: number, moderateBelow: number): SeverityScore =>
    value < severeBelow ? 3 : value < moderateBelow ? 2 : 1;
  return maxTier(
    collect(
      eroa !== undefined ? eroaTier(eroa) : undefined,
      regVol !== undefined ? volumeTier(regVol, 60) : undefined,
      rf !== undefined ? fractionTier(rf) : undefined,
      dtMs !== undefined ? shorterIsWorse(dtMs, 260, 400) : undefined,
      phtMs !== undefined ? shorterIsWorse(phtMs, 100, 200) : undefined,
      prIndex !== undefined ? shorterIsWorse(prIndex, 0.77, 0.9) : undefined
    )
  );
}

const REGURGITATION_PREFIX: Record<Exclude<SeverityScore, 0>, string> = {
  1: "Milde",
  2: "Matige",
  3: "Ernstige",
};

export function regurgitationLabel(score: SeverityScore, valve: RegurgitantValve): string {
  if (score === 0) return "Geen regurgitatie";
  return `${REGURGITATION_PREFIX[score]} ${valve} regurgitatie`;
}

// ── Aortic stenosis ─────────────────────────────────────────────────

export interface AorticValveMeasurements {
  vmax?: number;
  meanGradient?: number;
  ava?: number;
  /** AVA indexed to BSA, cm²/m² (2 decimals). */
  avaIndex?: number;
}

const STENOSIS_GRADES: AorticStenosisGrade[] = [
  "Geen stenose",
  "Milde stenose",
  "Matige stenose",
  "Ernstige stenose",
  "Zeer ernstige stenose",
];

/**
 * Aortic stenosis grade: worst tier reached by peak velocity, mean
 * gradient, valve area or indexed valve area. Only velocity and gradient
 * can reach the very severe tier.
 */
export function gradeAorticStenosis(m: AorticValveMeasurements): AorticStenosisGrade {
  const tiers: number[] = [0];
  if (m.vmax !== undefined) {
    tiers.push(m.vmax > 5 ? 4 : m.vmax >= 4 ? 3 : m.vmax >= 3 ? 2 : m.vmax >= 2.5 ? 1 : 0);
  }
  if (m.meanGradient !== undefined) {
    const g = m.meanGradient;
    tiers.push(g > 60 ? 4 : g >= 40 ? 3 : g >= 20 ? 2 : g >= 10 ? 1 : 0);
  }
  if (m.ava !== undefined) {
    tiers.push(m.ava < 1 ? 3 : m.ava <= 1.5 ? 2 : m.ava <= 2 ? 1 : 0);
  }
  if (m.avaIndex !== undefined) {
    tiers.push(m.avaIndex < 0.6 ? 3 : m.avaIndex <= 0.85 ? 2 : 0);
  }
  return STENOSIS_GRADES[Math.max(...tiers)] ?? "Geen stenose";
}

/**
 * Severe (or worse) aortic stenosis, either from the measurements or from a
 * clinician label that names it.
 */
export function isSevereAorticStenosis(m: AorticValveMeasurements, label?: string): boolean {
  if (label !== undefined && label.includes("Ernstige stenose")) return true;
  const grade = gradeAorticStenosis(m);
  return grade === "Ernstige stenose" || grade === "Zeer ernstige stenose";
}

/**
 * Low-flow low-gradient pattern: small valve (AVA < 1.0 cm² or indexed < 0.6)
 * with mean gradient < 40 mmHg and SVi ≤ 35 mL/m².
 */
export function isLowFlowLowGradient(m: AorticValveMeasurements, svi?: number): boolean {
  const smallValve = (m.ava !== undefined && m.ava < 1) || (m.avaIndex !== undefined && m.avaIndex < 0.6);
  return smallValve && m.meanGradient !== undefined && m.meanGradient < 40 && svi !== undefined && svi <= 35;
}
