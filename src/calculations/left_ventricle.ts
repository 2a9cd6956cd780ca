import type { LvSeverity, Sex, SeverityScore } from "../shared/types.js";
import { round } from "./stats.js";

// ── Wall thickness ──────────────────────────────────────────────────

/** Septal hypertrophy from IVSd (mm). */
export function classifyIvsd(ivsdMm: number, sex: Sex): string {
  const [normal, mild, moderate] = sex === "Man" ? [10, 13, 16] : [9, 12, 15];
  if (ivsdMm <= normal) return "Normotroof";
  if (ivsdMm <= mild) return "Mild concentrisch hypertroof";
  if (ivsdMm <= moderate) return "Matig concentrisch hypertroof";
  return "Ernstig concentrisch hypertroof";
}

// ── Systolic function ───────────────────────────────────────────────

/**
 * LVEF class. Severe and moderate bands are sex-neutral; values that fall
 * outside the sex-specific mild/normal bands (e.g. supranormal) fall back to
 * Matig below 41 % and Mild otherwise.
 */
export function classifyLvef(lvefPct: number, sex: Sex): LvSeverity {
  if (lvefPct < 30) return "Ernstig";
  if (lvefPct <= 40) return "Matig";
  const [mildUpper, normalLower, normalUpper] = sex === "Man" ? [51, 52, 72] : [53, 54, 74];
  if (lvefPct >= 41 && lvefPct <= mildUpper) return "Mild";
  if (lvefPct >= normalLower && lvefPct <= normalUpper) return "Normaal";
  if (lvefPct < 41) return "Matig";
  return "Mild";
}

const SYSTOLIC_PHRASES: Record<LvSeverity, string> = {
  Normaal: "goede globale en regionale systolische functie",
  Mild: "mild verminderde globale systolische functie",
  Matig: "matig verminderde globale systolische functie",
  Ernstig: "ernstig verminderde globale systolische functie",
};

/** Report phrase for an LVEF class; no class reads as preserved function. */
export function systolicFunctionPhrase(lvefClass?: LvSeverity): string {
  return SYSTOLIC_PHRASES[lvefClass ?? "Normaal"];
}

// ── Mass and geometry ───────────────────────────────────────────────

/**
 * Cube-formula LV mass (g), 1 decimal:
 * 0.8 × (1.04 × ((IVS + LVIDd + PW)³ − LVIDd³)) + 0.6, inputs in cm.
 */
export function computeLvMassG(ivsdMm: number, lviddMm: number, lvpwMm: number): number {
  const ivs = ivsdMm / 10;
  const lvidd = lviddMm / 10;
  const lvpw = lvpwMm / 10;
  const mass = 0.8 * (1.04 * ((ivs + lvidd + lvpw) ** 3 - lvidd ** 3)) + 0.6;
  return round(mass, 1);
}

/** Relative wall thickness 2 × PW / LVIDd, 3 decimals. */
export function computeRwt(lvpwMm: number, lviddMm: number): number | undefined {
  if (lviddMm <= 0) return undefined;
  return round((2 * lvpwMm) / lviddMm, 3);
}

/**
 * LV mass index (g/m², BSA floored at 0.1) and its sex-specific severity.
 * Tiers are contiguous: Man <115 / ≤131 / ≤148 / above, Vrouw <95 / ≤108 / ≤121 / above.
 */
export function lvMassIndexSeverity(
  lvMassG: number,
  bsaM2: number,
  sex: Sex
): { massIndex: number; severity: LvSeverity } {
  const massIndex = round(lvMassG / Math.max(0.1, bsaM2), 1);
  const [normalBelow, mildUpper, moderateUpper] = sex === "Man" ? [115, 131, 148] : [95, 108, 121];
  let severity: LvSeverity;
  if (massIndex < normalBelow) severity = "Normaal";
  else if (massIndex <= mildUpper) severity = "Mild";
  else if (massIndex <= moderateUpper) severity = "Matig";
  else severity = "Ernstig";
  return { massIndex, severity };
}

/** Geometry from mass-index severity and RWT (0.32 / 0.42 cutoffs). */
export function determineLvGeometry(severity: LvSeverity, rwt: number): string {
  if (severity !== "Normaal") {
    if (rwt > 0.42) return `${severity} concentrisch hypertroof`;
    if (rwt < 0.32) return `${severity} eccentrisch hypertroof`;
    return `${severity} gemengd hypertroof`;
  }
  if (rwt > 0.42) return "Concentrische remodeling";
  if (rwt < 0.32) return "Eccentrische remodeling";
  return "Normotroof";
}

// ── Dimensions ──────────────────────────────────────────────────────

/**
 * LV dilation from LVIDd. Uses the indexed table (mm/m², 1 decimal) when a
 * positive BSA is known, otherwise the absolute-mm table. The two tables are
 * not calibrated against each other.
 */
export function classifyLvidd(lviddMm: number, sex: Sex, bsaM2?: number): string {
  if (bsaM2 !== undefined && bsaM2 > 0) {
    const indexed = round(lviddMm / bsaM2, 1);
    const [normalBelow, mildUpper, moderateUpper] = sex === "Man" ? [31, 34, 36] : [32, 35, 37];
    if (indexed < normalBelow) return "niet gedilateerd";
    if (indexed <= mildUpper) return "mild gedilateerd";
    if (indexed <= moderateUpper) return "matig gedilateerd";
    return "ernstig gedilateerd";
  }

  const [normalUpper, mildUpper, moderateUpper] = sex === "Man" ? [58, 63, 68] : [52, 56, 61];
  if (lviddMm <= normalUpper) return "niet gedilateerd";
  if (lviddMm <= mildUpper) return "mild gedilateerd";
  if (lviddMm <= moderateUpper) return "matig gedilateerd";
  return "ernstig gedilateerd";
}

export const LVIDS_LABELS: Record<SeverityScore, string> = {
  0: "Normaal",
  1: "Mild vergroot",
  2: "Matig vergroot",
  3: "Ernstig vergroot",
};

/**
 * LVIDs enlargement tier from the absolute diameter (mm) and/or its BSA index
 * (mm/m²); the worst tier either criterion reaches wins.
 */
export function classifyLvids(lvidsMm: number | undefined, lvidsIndex: number | undefined, sex: Sex): SeverityScore {
  const mm = lvidsMm;
  const idx = lvidsIndex;
  if (sex === "Man") {
    if ((mm !== undefined && mm > 45) || (idx !== undefined && idx > 25)) return 3;
    if ((mm !== undefined && mm > 44) || (idx !== undefined && idx >= 24)) return 2;
    if ((mm !== undefined && mm >= 41) || (idx !== undefined && idx >= 22)) return 1;
    return 0;
  }
  if ((mm !== undefined && mm > 41) || (idx !== undefined && idx > 26)) return 3;
  if ((mm !== undefined && mm > 39) || (idx !== undefined && idx >= 24)) return 2;
  if ((mm !== undefined && mm >= 36) || (idx !== undefined && idx >= 22)) return 1;
  return 0;
}

/** Teichholz volume (mL) for a diameter in cm: 7 / (2.4 + D) × D³. */
export function teichholzVolume(diameterCm: number): number {
  return (7 / (2.4 + diameterCm)) * diameterCm ** 3;
}

/** Teichholz ejection fraction (%) from LVIDd/LVIDs in mm, 1 decimal. */
export function teichholzEjectionFraction(lviddMm?: number, lvidsMm?: number): number | undefined {
  if (lviddMm === undefined || lvidsMm === undefined || lviddMm <= 0) return undefined;
  const edv = teichholzVolume(lviddMm / 10);
  const esv = teichholzVolume(lvidsMm / 10);
  if (edv <= 0) return undefined;
  return round(((edv - esv) / edv) * 100, 1);
}

// ── Diastolic function ──────────────────────────────────────────────

export const DIASTOLIC_NORMAL = "Normale diastolische functie met normale vullingsdrukken in het linker atrium";
export const DIASTOLIC_GRADE_1 = "Diastolische dysfunctie graad 1 met normale vullingsdrukken in het linker atrium";
export const DIASTOLIC_GRADE_2 = "Diastolische dysfunctie graad 2 met gestegen vullingsdrukken in het linker atrium";
export const DIASTOLIC_GRADE_3 = "Diastolische dysfunctie graad 3 met ernstig gestegen vullingsdrukken in het linker atrium";

/**
 * Diastolic grade suggestion. E/A decides grades 1 and 3 outright; in between,
 * two or more of E/e' > 13, LAVI > 34 and PASP > 31 raise it to grade 2.
 */
export function suggestDiastolicFunction(params: {
  ea?: number;
  ee?: number;
  lavi?: number;
  pasp?: number;
}): string {
  const { ea, ee, lavi, pasp } = params;
  if (ea === undefined) return DIASTOLIC_NORMAL;
  if (ea < 0.8) return DIASTOLIC_GRADE_1;
  if (ea > 2) return DIASTOLIC_GRADE_3;

  const criteria = [
    ee !== undefined && ee > 13,
    lavi !== undefined && lavi > 34,
    pasp !== undefined && pasp > 31,
  ].filter(Boolean).length;
  return criteria >= 2 ? DIASTOLIC_GRADE_2 : DIASTOLIC_NORMAL;
}
