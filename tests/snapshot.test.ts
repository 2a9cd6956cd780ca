import { describe, it, expect } from "vitest";
import {
  emptySnapshot,
  snapshotFingerprint,
  snapshotFromDict,
  snapshotToDict,
  withReportTexts,
} from "../src/snapshot/snapshot.js";
import { PatientSchema, validateRecords } from "../src/snapshot/schemas.js";

describe("Snapshot parsing", () => {
  it("treats missing input as an empty snapshot", () => {
    expect(snapshotFromDict(undefined)).toEqual(emptySnapshot());
    expect(snapshotFromDict(null)).toEqual({ report_texts: {} });
  });

  it("rejects anything that is not an object", () => {
    expect(() => snapshotFromDict([1, 2])).toThrow("Snapshot must be a JSON object");
    expect(() => snapshotFromDict("echo")).toThrow("Snapshot must be a JSON object");
  });

  it("lets studies inherit the snapshot patient", () => {
    const snap = snapshotFromDict({
      patient: { sex: "m", length: 180, weight: 80 },
      ecg: { vent_rate: "70" },
      echo: { patient: { sex: "Vrouw" }, lvef: "55,5" },
      holter: { patient: { sex: "onbekend" }, avg_hr: 64 },
    });
    expect(snap.patient?.bsa).toBe(2);
    expect(snap.ecg?.patient.sex).toBe("Man");
    expect(snap.ecg?.vent_rate).toBe(70);
    expect(snap.echo?.patient.sex).toBe("Vrouw");
    expect(snap.echo?.lvef).toBe(55.5);
    expect(snap.holter?.patient.sex).toBe("Man");
  });

  it("drops a study without any patient", () => {
    const snap = snapshotFromDict({ ecg: { vent_rate: 70 }, report_texts: { full_ecg: "tekst" } });
    expect(snap.ecg).toBeUndefined();
    expect(snap.report_texts).toEqual({ full_ecg: "tekst" });
  });

  it("ignores report texts that are not a string map", () => {
    expect(snapshotFromDict({ report_texts: ["x"] }).report_texts).toEqual({});
    expect(snapshotFromDict({ report_texts: { full_ecg: 3 } }).report_texts).toEqual({});
  });

  it("drops unusable report text entries one by one", () => {
    const snap = snapshotFromDict({
      report_texts: { full_ecg: 3, brief_ecg: "kort", full_echo: "verslag", notes: "vrij", brief_cied: null },
    });
    expect(snap.report_texts).toEqual({ brief_ecg: "kort", full_echo: "verslag" });
  });
});

describe("Snapshot serialization", () => {
  const source = {
    patient: { sex: "Vrouw", age: 64, length: 165, weight: 70 },
    echo: { lvef: 58, ivsd: 10, mk_regurgitation: "Milde mitralis regurgitatie" },
    fietstest: { max_watt: 140, max_hr: 150 },
    cied: { device_type: "Pacemaker", lead_ra: true, atrial_fields: { sensing: "3 mV" } },
    report_texts: { brief_echo: "samenvatting" },
  };

  it("round-trips through JSON", () => {
    const snap = snapshotFromDict(source);
    const again = snapshotFromDict(JSON.parse(JSON.stringify(snapshotToDict(snap))));
    expect(again).toEqual(snap);
  });

  it("leaves out empty sections", () => {
    expect(snapshotToDict(emptySnapshot())).toEqual({});
    const dict = snapshotToDict(snapshotFromDict({ patient: { sex: "Man" } }));
    expect(dict).toEqual({ patient: { sex: "Man" } });
  });

  it("fingerprints the content, not the key order", () => {
    const a = snapshotFromDict({ patient: { sex: "Man", age: 40 }, report_texts: { full_ecg: "x" } });
    const b = snapshotFromDict({ report_texts: { full_ecg: "x" }, patient: { age: 40, sex: "Man" } });
    expect(snapshotFingerprint(a)).toBe(snapshotFingerprint(b));
    expect(snapshotFingerprint(withReportTexts(a, { brief_ecg: "y" }))).not.toBe(snapshotFingerprint(a));
  });

  it("merges report texts into a copy", () => {
    const snap = snapshotFromDict({ report_texts: { full_ecg: "oud", brief_ecg: "kort" } });
    const updated = withReportTexts(snap, { full_ecg: "nieuw" });
    expect(updated.report_texts).toEqual({ full_ecg: "nieuw", brief_ecg: "kort" });
    expect(snap.report_texts.full_ecg).toBe("oud");
  });
});

describe("Batch validation", () => {
  it("separates valid records from rejected ones", () => {
    const { valid, errors } = validateRecords([{ sex: "V", age: "70" }, { sex: "x" }, {}], PatientSchema);
    expect(valid).toEqual([{ sex: "Vrouw", age: 70 }]);
    expect(errors.map((e) => e.index)).toEqual([1, 2]);
    expect(errors[1].issues).toEqual(["sex: Required"]);
  });
});
