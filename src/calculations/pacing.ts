/** Suggested upper tracking rate: 85 % of the rounded Tanaka maximum. */
export function suggestedUpperTrackingRate(predictedMaxHr: number): number {
  return Math.round(predictedMaxHr * 0.85);
}

/**
 * myPACE lower-rate suggestion for HFpEF:
 * ((height × −0.37) + 135) × (LVEF / 50)^¼, whole bpm.
 */
export function myPaceLowerRate(heightCm?: number, lvefPct?: number): number | undefined {
  if (!heightCm || lvefPct === undefined || lvefPct <= 0) return undefined;
  const factor = Math.sqrt(Math.sqrt(lvefPct / 50));
  return Math.round((heightCm * -0.37 + 135) * factor);
}

/** 5 ms of AV shortening per 10 bpm between lower rate and UTR; never negative. */
export function avDelayReduction(lowerRate: number, upperRate: number): number {
  const diff = upperRate - lowerRate;
  return diff > 0 ? Math.round((diff / 10) * 5) : 0;
}

/** Programmed AV delay shortened at peak UTR, floored at 50 ms. */
export function rateAdaptiveAvDelay(baseAvMs: number, reductionMs: number): number {
  return Math.max(50, baseAvMs - reductionMs);
}

/** 60000 / UTR − sensed AV − 20 ms, floored at 0. */
export function optimalPvarp(upperRate: number, sensedAvMs: number): number | undefined {
  if (upperRate <= 0) return undefined;
  return Math.max(0, Math.round(60000 / upperRate - sensedAvMs - 20));
}

/** Sensed AV delay 30 ms shorter than the paced one, floored at 50 ms. */
export function sensedAvFromPaced(pacedAvMs: number): number {
  return Math.max(50, pacedAvMs - 30);
}
