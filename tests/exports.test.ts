import { describe, it, expect } from "vitest";
import { buildReportArtifacts, createZipBundle } from "../src/exports/bundle.js";
import { letterParagraphs, renderLetterDocx, renderReportsDocx } from "../src/exports/docx.js";
import { LETTER_UNDERLINE } from "../src/reports/letter.js";
import { snapshotFromDict } from "../src/snapshot/snapshot.js";
import { DerivationRecorder } from "../src/trace/derivation.js";

const snapshot = snapshotFromDict({
  patient: { sex: "Man" },
  report_texts: { full_ecg: "Sinusritme.\nNormale as.", brief_ecg: "  " },
});

describe("Zip bundle", () => {
  it("produces a zip archive", async () => {
    const zip = await createZipBundle([{ name: "a.txt", content: "inhoud" }]);
    expect(zip.subarray(0, 2).toString("latin1")).toBe("PK");
  });
});

describe("Report artifacts", () => {
  it("lists texts, snapshot and trace files", () => {
    const recorder = new DerivationRecorder("run-artifacts");
    const files = buildReportArtifacts(snapshot, {
      recorder,
      extra: [{ name: "reports.docx", content: Buffer.from("x") }],
    });
    expect(files.map((f) => f.name)).toEqual([
      "full_ecg.txt",
      "snapshot.json",
      "trace.jsonl",
      "audit_summary.md",
      "reports.docx",
    ]);
    expect(files[0].content).toBe("Sinusritme.\nNormale as.\n");
  });

  it("writes the snapshot as JSON", () => {
    const [, json] = buildReportArtifacts(snapshot);
    expect(json.name).toBe("snapshot.json");
    expect(typeof json.content === "string" ? JSON.parse(json.content) : undefined).toEqual({
      patient: { sex: "Man" },
      report_texts: { full_ecg: "Sinusritme.\nNormale as.", brief_ecg: "  " },
    });
  });
});

describe("Word documents", () => {
  it("turns underlined lines into headings", () => {
    const paragraphs = letterParagraphs(["Titel", LETTER_UNDERLINE, "tekst", "", "Slot"].join("\n") + "\n");
    expect(paragraphs).toHaveLength(4);
  });

  it("renders the letter and the reports", async () => {
    const letter = await renderLetterDocx(["Bespreking", LETTER_UNDERLINE, "-"].join("\n"));
    const reports = await renderReportsDocx(snapshot, ["Aorta 30-40 mm: TTE elke 3 jaar."]);
    expect(letter.subarray(0, 2).toString("latin1")).toBe("PK");
    expect(reports.subarray(0, 2).toString("latin1")).toBe("PK");
  });
});
