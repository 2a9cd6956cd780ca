import { z } from "zod";
import { bsaMosteller } from "../calculations/body.js";
import { round } from "../calculations/stats.js";
import { optionalText, parseOptionalInt, parseOptionalNumber } from "../shared/parse.js";
import type { ReportTextKey } from "../shared/types.js";

// ── Coercion helpers ───────────────────────────────────────────────
// Measurement fields arrive as numbers, form text ("12,5") or null.
// Anything that is not a usable value becomes undefined.

const optionalNumber = z.preprocess((v) => parseOptionalNumber(v), z.number().optional());

const optionalInt = z.preprocess((v) => parseOptionalInt(v), z.number().int().optional());

const optionalString = z.preprocess(
  (v) => (typeof v === "string" || typeof v === "number" ? optionalText(v) : undefined),
  z.string().optional()
);

function coerceBoolean(v: unknown): boolean | undefined {
  if (typeof v === "boolean") return v;
  if (typeof v === "number") return v !== 0;
  if (typeof v !== "string") return undefined;
  const txt = v.trim().toLowerCase();
  if (["true", "1", "ja", "yes"].includes(txt)) return true;
  if (["false", "0", "nee", "no"].includes(txt)) return false;
  return undefined;
}

const flag = (fallback: boolean) => z.preprocess(coerceBoolean, z.boolean().default(fallback));

const optionalFlag = z.preprocess(coerceBoolean, z.boolean().optional());

function normalizeSex(v: unknown): unknown {
  if (typeof v !== "string") return v;
  const txt = v.trim().toLowerCase();
  if (["man", "m", "male"].includes(txt)) return "Man";
  if (["vrouw", "v", "f", "female", "woman"].includes(txt)) return "Vrouw";
  return v;
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

// ── Patient ────────────────────────────────────────────────────────

export const SexSchema = z.preprocess(normalizeSex, z.enum(["Man", "Vrouw"]));

export const PatientSchema = z
  .object({
    sex: SexSchema,
    patient_id: optionalString,
    full_name: optionalString,
    date_of_birth: optionalString,
    age: optionalNumber,
    bsa: optionalNumber,
    weight: optionalNumber,
    length: optionalNumber,
  })
  .transform((p) => {
    // BSA always follows length and weight when both are known.
    if (p.length !== undefined && p.weight !== undefined && p.length > 0 && p.weight > 0) {
      return { ...p, bsa: round(bsaMosteller(p.length, p.weight), 2) };
    }
    return p;
  });

export type Patient = z.infer<typeof PatientSchema>;

// ── Echo ───────────────────────────────────────────────────────────

export const EchoRecordSchema = z.object({
  patient: PatientSchema,

  // Raw measurements
  ivsd: optionalNumber,
  lvpw: optionalNumber,
  lvidd: optionalNumber,
  lvids: optionalNumber,
  lvef: optionalNumber,
  ea: optionalNumber,
  ee: optionalNumber,
  la_volume: optionalNumber,
  lavi: optionalNumber,
  rvfwd: optionalNumber,
  rvbd: optionalNumber,
  rvmd: optionalNumber,
  tapse: optionalNumber,
  ra_volume: optionalNumber,
  pasp_raw: optionalNumber,
  aoa: optionalNumber,
  aosv: optionalNumber,
  aostj: optionalNumber,
  ascao: optionalNumber,
  ak_vmax: optionalNumber,
  ak_mean: optionalNumber,
  ava: optionalNumber,
  sv: optionalNumber,
  mk_eroa: optionalNumber,
  mk_regvol: optionalNumber,
  mk_rf: optionalNumber,
  tk_eroa: optionalNumber,
  tk_regvol: optionalNumber,
  tk_rf: optionalNumber,
  tk_vcw: optionalNumber,
  pk_eroa: optionalNumber,
  pk_regvol: optionalNumber,
  pk_rf: optionalNumber,
  pk_dt: optionalNumber,
  pk_pht: optionalNumber,
  pk_pr_index: optionalNumber,

  // Clinician overrides of the automatic labels
  lv_hypertrophy: optionalString,
  lv_dilation: optionalString,
  systolic_function: optionalString,
  diastolic_function: optionalString,
  la_dilation: optionalString,
  rv_hypertrophy: optionalString,
  rv_dilation: optionalString,
  rv_function: optionalString,
  ra_dilation: optionalString,
  ak_morphology: optionalString,
  ak_calcification: optionalString,
  ak_stenosis: optionalString,
  ak_regurgitation: optionalString,
  mk_regurgitation: optionalString,
  tk_regurgitation: optionalString,
  pk_regurgitation: optionalString,
  ivc_dilation: optionalString,
  ivc_variation: optionalString,
  cvd: optionalString,

  // Guideline inputs
  mr_symptoms: optionalFlag,
  af_present: optionalFlag,
  as_symptoms: optionalFlag,
  as_sbp_drop: optionalFlag,
  as_calcium_score: optionalNumber,
  as_vmax_progression: optionalNumber,
  as_bnp: optionalNumber,
});

export type EchoRecord = z.infer<typeof EchoRecordSchema>;

// ── Fietstest ──────────────────────────────────────────────────────

export const FietstestRecordSchema = z.object({
  patient: PatientSchema,
  start_watt: optionalNumber,
  increment_watt: optionalNumber,
  max_watt: optionalNumber,
  duration_at_max: optionalNumber,
  max_hr: optionalNumber,
  bp_evolutie: optionalString,
  ritme: optionalString,
  effort_type: optionalString,
  stop_criterium: optionalString,
  ecg_changes: optionalString,
  conclusion: optionalString,
});

export type FietstestRecord = z.infer<typeof FietstestRecordSchema>;

// ── ECG ────────────────────────────────────────────────────────────

export const EcgRecordSchema = z.object({
  patient: PatientSchema,
  recorded_at: optionalString,
  vent_rate: optionalNumber,
  pr_interval_ms: optionalNumber,
  p_duration_ms: optionalNumber,
  qrs_duration_ms: optionalNumber,
  qt_interval_ms: optionalNumber,
  qtc_interval_ms: optionalNumber,
  p_axis_deg: optionalNumber,
  qrs_axis_deg: optionalNumber,
  t_axis_deg: optionalNumber,
  rhythm_summary: optionalString,
  auto_report_text: optionalString,
  acquisition_device: optionalString,
});

export type EcgRecord = z.infer<typeof EcgRecordSchema>;

// ── Holter ─────────────────────────────────────────────────────────

export const HolterRecordSchema = z.object({
  patient: PatientSchema,
  recording_date: optionalString,
  recording_duration_hours: optionalInt,
  avg_hr: optionalInt,
  min_hr: optionalInt,
  max_hr: optionalInt,
  afib_percentage: optionalNumber,
  pauses_count: optionalInt,
  longest_pause_ms: optionalInt,
  ves_count: optionalInt,
  sves_count: optionalInt,
  av_block_type: optionalString,
  other_findings: optionalString,
});

export type HolterRecord = z.infer<typeof HolterRecordSchema>;

// ── CIED ───────────────────────────────────────────────────────────

export const LeadRecordSchema = z.object({
  sensing: optionalString,
  impedance: optionalString,
  threshold_v: optionalString,
  threshold_ms: optionalString,
  polarity: optionalString,
  stable: flag(true),
  location: optionalString,
});

export type LeadRecord = z.infer<typeof LeadRecordSchema>;

const leadField = z.preprocess((v) => (isRecord(v) ? v : {}), LeadRecordSchema);

export const CiedRecordSchema = z.object({
  patient: PatientSchema.optional(),
  device_type: optionalString,
  device_brand: optionalString,
  programming_mode: optionalString,
  lower_rate: optionalInt,
  upper_tracking: optionalInt,
  indication_text: optionalString,
  lead_ra: flag(false),
  lead_rv: flag(false),
  lead_lv: flag(false),
  other_leads: optionalString,
  sensing_ok: flag(true),
  pacing_ok: flag(true),
  impedance_ok: flag(true),
  egm_events: optionalString,
  atrial_pacing_pct: optionalString,
  ventricular_pacing_pct: optionalString,
  lv_pacing_pct: optionalString,
  settings_changed: flag(false),
  patient_dependent: flag(false),
  battery_status: optionalString,
  suggested_sensed_av: optionalInt,
  suggested_paced_av: optionalInt,
  sensed_av_delay: optionalString,
  paced_av_delay: optionalString,
  lvef: optionalNumber,
  atrial_fields: leadField,
  vent_fields: leadField,
  lv_fields: leadField,
});

export type CiedRecord = z.infer<typeof CiedRecordSchema>;

// ── Snapshot ───────────────────────────────────────────────────────

export const REPORT_TEXT_KEYS = [
  "full_echo",
  "brief_echo",
  "full_fietstest",
  "brief_fietstest",
  "full_ecg",
  "brief_ecg",
  "full_holter",
  "brief_holter",
  "full_cied",
  "brief_cied",
] as const satisfies readonly ReportTextKey[];

const REPORT_TEXT_KEY_SET: ReadonlySet<string> = new Set(REPORT_TEXT_KEYS);

/** Only the fixed report keys with string texts are kept; other entries are dropped one by one. */
export const ReportTextsSchema = z.preprocess(
  (v) =>
    isRecord(v)
      ? Object.fromEntries(
          Object.entries(v).filter(([key, text]) => REPORT_TEXT_KEY_SET.has(key) && typeof text === "string")
        )
      : {},
  z.record(z.string(), z.string())
);

export const StudySnapshotSchema = z.object({
  patient: PatientSchema.optional(),
  echo: EchoRecordSchema.optional(),
  fietstest: FietstestRecordSchema.optional(),
  ecg: EcgRecordSchema.optional(),
  holter: HolterRecordSchema.optional(),
  cied: CiedRecordSchema.optional(),
  report_texts: ReportTextsSchema,
});

export type StudySnapshot = z.infer<typeof StudySnapshotSchema>;

/**
 * Validate an array of records against a schema.
 * Returns validated records and errors.
 */
export function validateRecords<T>(
  records: unknown[],
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): { valid: T[]; errors: Array<{ index: number; issues: string[] }> } {
  const valid: T[] = [];
  const errors: Array<{ index: number; issues: string[] }> = [];

  for (let i = 0; i < records.length; i++) {
    const result = schema.safeParse(records[i]);
    if (result.success) {
      valid.push(result.data);
    } else {
      errors.push({
        index: i,
        issues: result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      });
    }
  }

  return { valid, errors };
}
