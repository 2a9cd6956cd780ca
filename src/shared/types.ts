/**
 * Shared result types for the calculation, aggregation and composition layers.
 *
 * Input records (patient, study measurements, snapshot) are inferred from the
 * zod schemas in snapshot/schemas.ts; everything derived from them lives here.
 */

/** All threshold tables are sex-binary. */
export type Sex = "Man" | "Vrouw";

/** Coarse severity tier: 0 none/normal → 3 severe. */
export type SeverityScore = 0 | 1 | 2 | 3;

/** LVEF class and LV mass-index severity share the same four keys. */
export type LvSeverity = "Normaal" | "Mild" | "Matig" | "Ernstig";

export type AorticStenosisGrade =
  | "Geen stenose"
  | "Milde stenose"
  | "Matige stenose"
  | "Ernstige stenose"
  | "Zeer ernstige stenose";

export type AorticSegmentKey = "aoa" | "aosv" | "aostj" | "ascao";

/** Study kinds that carry their own measurement record on a snapshot. */
export type StudyKind = "echo" | "fietstest" | "ecg" | "holter" | "cied";

/** Fixed report_texts keys a consultation letter can look up. */
export type ReportTextKey =
  | "full_echo"
  | "brief_echo"
  | "full_fietstest"
  | "brief_fietstest"
  | "full_ecg"
  | "brief_ecg"
  | "full_holter"
  | "brief_holter"
  | "full_cied"
  | "brief_cied";

// ── Echo ────────────────────────────────────────────────────────────

export interface AorticSegmentMetrics {
  key: AorticSegmentKey;
  label: string;
  measuredMm: number;
  indexedMmPerM2?: number;
  dilated: boolean;
  predictedRange?: { lowerMm: number; upperMm: number };
}

export interface EchoMetrics {
  lvMassG?: number;
  rwt?: number;
  lvMassIndex?: number;
  lvMassSeverity?: LvSeverity;
  ivsdClass?: string;
  lvHypertrophyAuto: string;
  lvDilationAuto: string;
  lvefClass?: LvSeverity;
  systolicFunctionAuto: string;
  lvesdi?: number;
  lvidsSeverity?: SeverityScore;
  lvidsLabel?: string;
  teichholzEf?: number;
  lavi?: number;
  laDilationAuto?: string;
  diastolicFunctionAuto: string;
  rvHypertrophyAuto: string;
  rvDilationAuto: string;
  rvFunctionAuto: string;
  ravi?: number;
  raDilationAuto: string;
  aorticSegments: AorticSegmentMetrics[];
  aortaDilated: boolean;
  avaIndex?: number;
  svi?: number;
  aorticStenosisAuto: AorticStenosisGrade;
  lowFlowLowGradient: boolean;
  mitralScore: SeverityScore;
  mitralRegurgitationAuto: string;
  tricuspidScore: SeverityScore;
  tricuspidRegurgitationAuto: string;
  pulmonicScore: SeverityScore;
  pulmonicRegurgitationAuto: string;
  paspText: string;
  summaryLines: string[];
}

// ── Fietstest ───────────────────────────────────────────────────────

export interface FietstestMetrics {
  predictedMaxHr?: number;
  pctHr?: number;
  vo2Observed?: number;
  vo2ObservedText?: string;
  vo2PercentOfP50?: number;
  vo2Band?: string;
  vo2BandText?: string;
  predictedWatt?: number;
  predictedWattPct?: number;
  effortTypeSuggestion?: string;
  summaryLines: string[];
}

// ── ECG ─────────────────────────────────────────────────────────────

export interface EcgMetrics {
  qtcbMs?: number;
  qtcfMs?: number;
  tachyFlag: boolean;
  bradyFlag: boolean;
  axisDeviation?: string;
  summaryLines: string[];
}

// ── Holter ──────────────────────────────────────────────────────────

export interface HolterMetrics {
  bradyFlag: boolean;
  tachyFlag: boolean;
  afibDetected: boolean;
  significantPauses: boolean;
  frequentVes: boolean;
  frequentSves: boolean;
  avBlockDetected: boolean;
  summaryLines: string[];
}

// ── CIED ────────────────────────────────────────────────────────────

export interface CiedMetrics {
  predictedMaxHr?: number;
  suggestedUpperTracking?: number;
  myPaceLowerRate?: number;
  avReductionMs?: number;
  rateAdaptiveSensedAv?: number;
  rateAdaptivePacedAv?: number;
  optimalPvarp?: number;
  recommendedSensedAv?: number;
  atrialPacingPct?: number;
  ventricularPacingPct?: number;
  lvPacingPct?: number;
  summaryLines: string[];
}

// ── Derivation trace ────────────────────────────────────────────────

export type DerivationType =
  | "SNAPSHOT_VALIDATION"
  | "METRICS_COMPUTATION"
  | "REPORT_COMPOSITION"
  | "BRIEF_COMPOSITION"
  | "GUIDELINE_EVALUATION"
  | "LETTER_COMPOSITION"
  | "EXPORT_GENERATION";

/** One hash-chained step of a report generation run. */
export interface DerivationRecord {
  traceId: string;
  runId: string;
  traceType: DerivationType;
  chainPosition: number;
  initiatedAt: string;
  completedAt: string;
  durationMs: number;
  inputLineage: {
    sources: Array<{ sourceId: string; sourceHash: string; sourceType: string }>;
  };
  formulas?: Array<{
    name: string;
    parameters: Record<string, unknown>;
  }>;
  reasoningChain?: {
    steps: Array<{ stepNumber: number; action: string; detail: string }>;
  };
  outputContent?: Record<string, unknown>;
  validationResults?: { pass: boolean; messages: string[] };
  hashChain: {
    contentHash: string;
    previousHash: string | null;
    merkleRoot: string;
  };
}
