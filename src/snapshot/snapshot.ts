import type { z } from "zod";
import { contentHash } from "../shared/hash.js";
import {
  CiedRecordSchema,
  EcgRecordSchema,
  EchoRecordSchema,
  FietstestRecordSchema,
  HolterRecordSchema,
  PatientSchema,
  ReportTextsSchema,
  isRecord,
  type Patient,
  type StudySnapshot,
} from "./schemas.js";

export function emptySnapshot(): StudySnapshot {
  return { report_texts: {} };
}

function coercePatient(value: unknown): Patient | undefined {
  const parsed = PatientSchema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

/**
 * A study payload keeps its own patient when that one is valid, and inherits
 * the snapshot patient otherwise. Without either the study is dropped.
 */
function buildStudy<T>(
  payload: unknown,
  fallbackPatient: Patient | undefined,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): T | undefined {
  if (!isRecord(payload)) return undefined;
  const patient = coercePatient(payload.patient) ?? fallbackPatient;
  if (!patient) return undefined;
  const parsed = schema.safeParse({ ...payload, patient });
  return parsed.success ? parsed.data : undefined;
}

/**
 * Rebuild a snapshot from its JSON form.
 *
 * Missing input yields an empty snapshot; anything other than an object is
 * rejected.
 */
export function snapshotFromDict(data: unknown): StudySnapshot {
  if (data === undefined || data === null) return emptySnapshot();
  if (!isRecord(data)) {
    throw new Error("Snapshot must be a JSON object with patient, study and report_texts keys");
  }

  const patient = coercePatient(data.patient);
  const texts = ReportTextsSchema.safeParse(data.report_texts);

  return {
    patient,
    echo: buildStudy(data.echo, patient, EchoRecordSchema),
    fietstest: buildStudy(data.fietstest, patient, FietstestRecordSchema),
    ecg: buildStudy(data.ecg, patient, EcgRecordSchema),
    holter: buildStudy(data.holter, patient, HolterRecordSchema),
    cied: buildStudy(data.cied, patient, CiedRecordSchema),
    report_texts: texts.success ? texts.data : {},
  };
}

function stripUndefined(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(stripUndefined);
  if (!isRecord(value)) return value;
  const out: Record<string, unknown> = {};
  for (const [key, v] of Object.entries(value)) {
    if (v !== undefined) out[key] = stripUndefined(v);
  }
  return out;
}

/** Plain JSON form: absent fields and empty sections are left out. */
export function snapshotToDict(snapshot: StudySnapshot): Record<string, unknown> {
  const payload: Record<string, unknown> = {};
  if (snapshot.patient) payload.patient = stripUndefined(snapshot.patient);
  if (snapshot.echo) payload.echo = stripUndefined(snapshot.echo);
  if (snapshot.fietstest) payload.fietstest = stripUndefined(snapshot.fietstest);
  if (snapshot.ecg) payload.ecg = stripUndefined(snapshot.ecg);
  if (snapshot.holter) payload.holter = stripUndefined(snapshot.holter);
  if (snapshot.cied) payload.cied = stripUndefined(snapshot.cied);
  if (Object.keys(snapshot.report_texts).length > 0) {
    payload.report_texts = { ...snapshot.report_texts };
  }
  return payload;
}

/** SHA-256 over the canonical JSON form. */
export function snapshotFingerprint(snapshot: StudySnapshot): string {
  return contentHash(snapshotToDict(snapshot));
}

/** Copy of the snapshot with the given texts merged over the existing ones. */
export function withReportTexts(snapshot: StudySnapshot, texts: Record<string, string>): StudySnapshot {
  return { ...snapshot, report_texts: { ...snapshot.report_texts, ...texts } };
}
