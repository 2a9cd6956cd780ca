import type { Sex } from "../shared/types.js";

// ── Left atrium ─────────────────────────────────────────────────────

export function classifyLavi(laviMlM2: number): string {
  if (laviMlM2 <= 34) return "Niet gedilateerd";
  if (laviMlM2 <= 41) return "Mild gedilateerd";
  if (laviMlM2 <= 48) return "Matig gedilateerd";
  return "Ernstig gedilateerd";
}

// ── Right ventricle ─────────────────────────────────────────────────

export const RV_FUNCTION_GOOD = "goede longitudinale systolische functie";

/** RV longitudinal function from TAPSE (mm). */
export function classifyTapse(tapseMm: number): string {
  if (!Number.isFinite(tapseMm)) return "Onbekend";
  if (tapseMm > 17) return RV_FUNCTION_GOOD;
  if (tapseMm >= 13) return "mild verminderde longitudinale systolische functie";
  if (tapseMm >= 11) return "matig verminderde longitudinale systolische functie";
  return "ernstig verminderde longitudinale systolische functie";
}

/** RVFWd above 5 mm reads as hypertrophy. */
export function suggestRvHypertrophy(rvfwdMm?: number): string {
  return rvfwdMm !== undefined && rvfwdMm > 5 ? "Hypertroof" : "Normotroof";
}

/** Basal diameter above 41 mm or mid diameter above 35 mm. */
export function suggestRvDilation(rvbdMm?: number, rvmdMm?: number): string {
  const dilated = (rvbdMm !== undefined && rvbdMm > 41) || (rvmdMm !== undefined && rvmdMm > 35);
  return dilated ? "gedilateerd" : "niet gedilateerd";
}

// ── Right atrium ────────────────────────────────────────────────────

/** RAVI cutoff: Man > 32, Vrouw > 28 mL/m². */
export function suggestRaDilation(raviMlM2: number | undefined, sex: Sex): string {
  if (raviMlM2 === undefined) return "Niet gedilateerd";
  const cutoff = sex === "Man" ? 32 : 28;
  return raviMlM2 > cutoff ? "Gedilateerd" : "Niet gedilateerd";
}
