import { describe, it, expect } from "vitest";
import { parseMeasurementSheet } from "../src/ingest/measurement_sheet.js";
import { PatientSchema } from "../src/snapshot/schemas.js";

const patient = PatientSchema.parse({ sex: "Man", age: 50, length: 180, weight: 80 });

describe("Measurement sheet", () => {
  it("builds an echo record and reports unusable rows", () => {
    const csv = [
      "field,value",
      "lvef,60",
      'IVSd,"12,5"',
      "lvef,55",
      "foo,1",
      ",3",
      "lvidd,abc",
      "tapse,",
    ].join("\n");

    const { record, warnings } = parseMeasurementSheet(csv, "echo", patient);
    expect(record.lvef).toBe(60);
    expect(record.ivsd).toBe(12.5);
    expect(record.lvidd).toBeUndefined();
    expect(record.tapse).toBeUndefined();
    expect(record.patient.bsa).toBe(2);
    expect(warnings).toEqual([
      'Row 4: duplicate field "lvef", keeping the first value',
      'Row 5: unknown echo field "foo"',
      "Row 6: missing field name",
      'Row 7: could not parse "abc" for lvidd',
    ]);
  });

  it("reads sheets without a header row", () => {
    const { record, warnings } = parseMeasurementSheet("vent_rate,72\nqt_interval_ms,400\n", "ecg", patient);
    expect(record.vent_rate).toBe(72);
    expect(record.qt_interval_ms).toBe(400);
    expect(warnings).toEqual([]);
  });

  it("fills CIED lead fields from dotted names", () => {
    const csv = ["atrial_fields.sensing,2.5 mV", "lead_ra,ja", "vent_fields.stable,nee", "atrial_fields.bogus,1"].join("\n");
    const { record, warnings } = parseMeasurementSheet(csv, "cied", patient);
    expect(record.atrial_fields.sensing).toBe("2.5 mV");
    expect(record.lead_ra).toBe(true);
    expect(record.vent_fields.stable).toBe(false);
    expect(record.lv_fields.stable).toBe(true);
    expect(warnings).toEqual(['Row 4: unknown cied field "atrial_fields.bogus"']);
  });

  it("does not accept lead fields outside CIED or the patient key", () => {
    const { warnings } = parseMeasurementSheet("atrial_fields.sensing,2\npatient,x\n", "holter", patient);
    expect(warnings).toEqual([
      'Row 1: unknown holter field "atrial_fields.sensing"',
      'Row 2: unknown holter field "patient"',
    ]);
  });
});
