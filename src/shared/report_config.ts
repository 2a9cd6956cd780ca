/**
 * Report Configuration Module
 *
 * Controls how a report run records and writes its output:
 * - traceMode OFF:    reports only.
 * - traceMode RECORD: every step appends a hash-chained derivation record.
 *
 * CLI arguments take priority over environment variables.
 */

import { z } from "zod";

export type TraceMode = "off" | "record";

export const DEFAULT_LETTER_SIGNATURE = "Dienst Cardiologie";

export const ReportConfigSchema = z.object({
  traceMode: z.enum(["off", "record"]),
  letterSignature: z.string().min(1),
  outputDir: z.string().min(1).optional(),
});

export type ReportConfig = z.infer<typeof ReportConfigSchema>;

/**
 * Parse trace mode from CLI argument and/or environment variable.
 * Defaults to "off" when neither is provided.
 */
export function parseTraceMode(cliArg?: string, envVar?: string): TraceMode {
  const raw = (cliArg ?? envVar ?? "off").trim().toLowerCase();
  if (raw === "record" || raw === "on" || raw === "true" || raw === "1") return "record";
  return "off";
}

export interface ReportConfigSources {
  trace?: boolean;
  signature?: string;
  out?: string;
}

/** Resolve the effective config from parsed CLI flags and an environment map. */
export function resolveReportConfig(
  cli: ReportConfigSources,
  env: Record<string, string | undefined> = process.env
): ReportConfig {
  const signature = cli.signature?.trim() || env.REPORT_LETTER_SIGNATURE?.trim() || DEFAULT_LETTER_SIGNATURE;
  const outputDir = cli.out?.trim() || env.REPORT_OUTPUT_DIR?.trim() || undefined;
  return ReportConfigSchema.parse({
    traceMode: parseTraceMode(cli.trace ? "record" : undefined, env.REPORT_TRACE_MODE),
    letterSignature: signature,
    outputDir,
  });
}
