export const CVD_OPTIONS = ["3", "8", "15+"] as const;

/** Form default for the estimated central venous pressure. */
export const DEFAULT_CVD = "3";

export const NO_TR_SIGNAL = "Geen adequaat TR-signaal voor PASP";

/** "15+" reads as 15; anything unparsable as 0. */
export function parseCvd(cvd: string | undefined): number {
  if (cvd === undefined) return 0;
  const value = Number.parseFloat(cvd.trim().replace(/\+$/, ""));
  return Number.isFinite(value) ? value : 0;
}

/** PASP = TR gradient + CVD, rounded; above 35 mmHg is pulmonary hypertension. */
export function estimatePasp(trGradient: number | undefined, cvd: string | undefined): number | undefined {
  if (trGradient === undefined) return undefined;
  return Math.round(trGradient + parseCvd(cvd));
}

export function paspText(trGradient: number | undefined, cvd: string | undefined): string {
  const total = estimatePasp(trGradient, cvd);
  if (total === undefined) return NO_TR_SIGNAL;
  return total > 35
    ? `Pulmonale hypertensie met PASP ${total} mmHg.`
    : `Normale pulmonale drukken met PASP ${total} mmHg.`;
}
