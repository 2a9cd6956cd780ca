import { parse } from "csv-parse/sync";
import type { z } from "zod";
import {
  CiedRecordSchema,
  EcgRecordSchema,
  EchoRecordSchema,
  FietstestRecordSchema,
  HolterRecordSchema,
  LeadRecordSchema,
  type Patient,
} from "../snapshot/schemas.js";
import type { StudyRecords } from "../reports/generators/index.js";
import type { StudyKind } from "../shared/types.js";

export interface MeasurementSheetResult<R> {
  record: R;
  /** One line per skipped row: unknown field, unparsable value, duplicate. */
  warnings: string[];
}

type SheetSchemas = { [K in StudyKind]: z.ZodType<StudyRecords[K], z.ZodTypeDef, unknown> };

const SHEET_SCHEMAS: SheetSchemas = {
  echo: EchoRecordSchema,
  fietstest: FietstestRecordSchema,
  ecg: EcgRecordSchema,
  holter: HolterRecordSchema,
  cied: CiedRecordSchema,
};

const SHEET_FIELDS: Record<StudyKind, z.ZodRawShape> = {
  echo: EchoRecordSchema.shape,
  fietstest: FietstestRecordSchema.shape,
  ecg: EcgRecordSchema.shape,
  holter: HolterRecordSchema.shape,
  cied: CiedRecordSchema.shape,
};

const LEAD_GROUPS = new Set(["atrial_fields", "vent_fields", "lv_fields"]);

/** Resolve "field" or "lead_group.field" to the schema that parses its value. */
function fieldSchema(study: StudyKind, field: string): z.ZodTypeAny | undefined {
  const [group, sub, ...rest] = field.split(".");
  if (sub !== undefined) {
    if (study !== "cied" || rest.length > 0 || !LEAD_GROUPS.has(group)) return undefined;
    const leadShape: z.ZodRawShape = LeadRecordSchema.shape;
    return Object.hasOwn(leadShape, sub) ? leadShape[sub] : undefined;
  }
  if (field === "patient" || LEAD_GROUPS.has(field)) return undefined;
  const shape = SHEET_FIELDS[study];
  return Object.hasOwn(shape, field) ? shape[field] : undefined;
}

function setField(target: Record<string, unknown>, field: string, value: string): void {
  const [group, sub] = field.split(".");
  if (sub === undefined) {
    target[field] = value;
    return;
  }
  const existing = target[group];
  const nested: Record<string, unknown> =
    typeof existing === "object" && existing !== null && !Array.isArray(existing) ? { ...existing } : {};
  nested[sub] = value;
  target[group] = nested;
}

/**
 * Parse a two-column `field,value` measurement export into a study record.
 * A leading `field,value` header is optional. Rows that cannot be used are
 * reported as warnings; the record is built from the rest.
 */
export function parseMeasurementSheet<K extends StudyKind>(
  csv: string,
  study: K,
  patient: Patient
): MeasurementSheetResult<StudyRecords[K]> {
  const rows: unknown[] = parse(csv, {
    skip_empty_lines: true,
    trim: true,
    relax_column_count: true,
  });

  const raw: Record<string, unknown> = {};
  const seen = new Set<string>();
  const warnings: string[] = [];

  rows.forEach((row, i) => {
    const line = i + 1;
    if (!Array.isArray(row)) return;
    const field = String(row[0] ?? "").trim().toLowerCase();
    const value = String(row[1] ?? "").trim();
    if (i === 0 && field === "field") return;
    if (!field) {
      warnings.push(`Row ${line}: missing field name`);
      return;
    }

    const schema = fieldSchema(study, field);
    if (!schema) {
      warnings.push(`Row ${line}: unknown ${study} field "${field}"`);
      return;
    }
    if (seen.has(field)) {
      warnings.push(`Row ${line}: duplicate field "${field}", keeping the first value`);
      return;
    }
    seen.add(field);
    if (value === "") return;

    const parsed = schema.safeParse(value);
    if (!parsed.success || parsed.data === undefined) {
      warnings.push(`Row ${line}: could not parse "${value}" for ${field}`);
      return;
    }
    setField(raw, field, value);
  });

  const record = SHEET_SCHEMAS[study].parse({ ...raw, patient });
  return { record, warnings };
}
