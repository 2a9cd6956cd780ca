import { describe, it, expect } from "vitest";
import { DerivationRecorder, validateDerivationChain } from "../src/trace/derivation.js";
import { exportJSONL, generateAuditSummaryMd } from "../src/trace/exporters.js";

function recordSteps(recorder: DerivationRecorder): void {
  const at = new Date("2024-01-01T00:00:00.000Z");
  const done = new Date("2024-01-01T00:00:00.012Z");
  recorder.record({
    traceType: "SNAPSHOT_VALIDATION",
    initiatedAt: at,
    completedAt: done,
    inputLineage: { sources: [{ sourceId: "snapshot", sourceHash: "abc", sourceType: "study_snapshot" }] },
    validationResults: { pass: true, messages: [] },
  });
  recorder.record({
    traceType: "METRICS_COMPUTATION",
    initiatedAt: at,
    completedAt: at,
    inputLineage: { sources: [] },
    formulas: [
      { name: "QTc Bazett", parameters: {} },
      { name: "Devereux LV mass", parameters: {} },
    ],
  });
  recorder.record({
    traceType: "REPORT_COMPOSITION",
    initiatedAt: at,
    completedAt: at,
    inputLineage: { sources: [] },
    formulas: [{ name: "QTc Bazett", parameters: {} }],
  });
}

describe("Derivation recorder", () => {
  it("links each record to its predecessor", () => {
    const recorder = new DerivationRecorder("run-1");
    recordSteps(recorder);
    const chain = recorder.getChain();

    expect(chain.map((r) => r.chainPosition)).toEqual([0, 1, 2]);
    expect(chain[0].hashChain.previousHash).toBeNull();
    expect(chain[0].hashChain.merkleRoot).toBe(chain[0].hashChain.contentHash);
    expect(chain[1].hashChain.previousHash).toBe(chain[0].hashChain.contentHash);
    expect(chain[2].hashChain.previousHash).toBe(chain[1].hashChain.contentHash);
    expect(chain[0].durationMs).toBe(12);
    expect(chain.every((r) => r.runId === "run-1")).toBe(true);
    expect(recorder.validateChain()).toEqual({ valid: true, errors: [] });
  });

  it("detects tampering", () => {
    const recorder = new DerivationRecorder("run-2");
    recordSteps(recorder);
    const chain = recorder.getChain();
    chain[1] = { ...chain[1], durationMs: 999 };
    expect(validateDerivationChain(chain)).toEqual({
      valid: false,
      errors: ["Record 1: content hash mismatch"],
    });
  });

  it("detects reordering", () => {
    const recorder = new DerivationRecorder("run-3");
    recordSteps(recorder);
    const [first, second] = recorder.getChain();
    const result = validateDerivationChain([second, first]);
    expect(result.valid).toBe(false);
    expect(result.errors).toContain("Record 0: chain position mismatch (expected 0, got 1)");
    expect(result.errors).toContain("Record 0: previous hash should be null");
  });
});

describe("Trace exporters", () => {
  const recorder = new DerivationRecorder("run-4");
  recordSteps(recorder);
  const chain = recorder.getChain();

  it("writes one JSON line per record", () => {
    const lines = exportJSONL(chain).trimEnd().split("\n");
    expect(lines).toHaveLength(3);
    expect(JSON.parse(lines[1]).traceType).toBe("METRICS_COMPUTATION");
  });

  it("summarizes the run in markdown", () => {
    const md = generateAuditSummaryMd(chain, "run-4", new Date("2024-02-01T00:00:00.000Z")).split("\n");
    expect(md[0]).toBe("# Audit Summary: Run run-4");
    expect(md[2]).toBe("Generated: 2024-02-01T00:00:00.000Z");
    expect(md[4]).toBe("## Derivation Chain (3 records)");
    expect(md[8]).toBe(`| 0 | SNAPSHOT_VALIDATION | 12 | ${chain[0].hashChain.contentHash.slice(0, 16)}... | PASS |`);
    expect(md[9]).toBe(`| 1 | METRICS_COMPUTATION | 0 | ${chain[1].hashChain.contentHash.slice(0, 16)}... | — |`);
    expect(md).toContain(`- **Merkle Root**: \`${chain[2].hashChain.merkleRoot}\``);
    expect(md).toContain("- **Chain Length**: 3");
    expect(md.slice(-4)).toEqual(["## Formulas Applied", "", "- Devereux LV mass", "- QTc Bazett"]);
  });
});
