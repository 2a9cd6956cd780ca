import { describe, it, expect } from "vitest";
import { DEFAULT_LETTER_SIGNATURE, parseTraceMode, resolveReportConfig } from "../src/shared/report_config.js";

describe("Trace mode", () => {
  it("defaults to off", () => {
    expect(parseTraceMode()).toBe("off");
    expect(parseTraceMode(undefined, "nonsense")).toBe("off");
  });

  it("accepts record and its aliases", () => {
    expect(parseTraceMode("RECORD")).toBe("record");
    expect(parseTraceMode(undefined, "on")).toBe("record");
    expect(parseTraceMode(undefined, " 1 ")).toBe("record");
  });

  it("prefers the CLI argument over the environment", () => {
    expect(parseTraceMode("off", "record")).toBe("off");
  });
});

describe("Report config", () => {
  it("falls back to defaults", () => {
    expect(resolveReportConfig({}, {})).toEqual({ traceMode: "off", letterSignature: DEFAULT_LETTER_SIGNATURE });
  });

  it("reads the environment", () => {
    expect(
      resolveReportConfig(
        {},
        { REPORT_TRACE_MODE: "true", REPORT_LETTER_SIGNATURE: " Dr. Env ", REPORT_OUTPUT_DIR: "out/env" }
      )
    ).toEqual({ traceMode: "record", letterSignature: "Dr. Env", outputDir: "out/env" });
  });

  it("lets CLI flags win", () => {
    const config = resolveReportConfig(
      { trace: true, signature: "Dr. Cli", out: "out/cli" },
      { REPORT_TRACE_MODE: "off", REPORT_LETTER_SIGNATURE: "Dr. Env", REPORT_OUTPUT_DIR: "out/env" }
    );
    expect(config).toEqual({ traceMode: "record", letterSignature: "Dr. Cli", outputDir: "out/cli" });
  });
});
