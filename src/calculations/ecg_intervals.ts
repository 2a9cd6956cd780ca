import { round } from "./stats.js";

export interface CorrectedQt {
  bazettMs: number;
  fridericiaMs: number;
}

/**
 * Heart-rate corrected QT (1 decimal). RR = 60 / HR in seconds;
 * Bazett QT / √RR, Fridericia QT / ∛RR.
 */
export function correctQt(qtMs: number, heartRate: number): CorrectedQt | undefined {
  if (!Number.isFinite(heartRate) || heartRate <= 0) return undefined;
  const rr = 60 / heartRate;
  return {
    bazettMs: round(qtMs / Math.sqrt(rr), 1),
    fridericiaMs: round(qtMs / Math.cbrt(rr), 1),
  };
}

export type QrsAxisClass = "Linkerasdeviatie" | "Rechterasdeviatie" | "Normale QRS-as";

export function classifyQrsAxis(axisDeg: number): QrsAxisClass {
  if (axisDeg < -30) return "Linkerasdeviatie";
  if (axisDeg > 90) return "Rechterasdeviatie";
  return "Normale QRS-as";
}
