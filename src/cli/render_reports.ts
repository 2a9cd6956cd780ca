#!/usr/bin/env tsx
/**
 * CLI: report
 *
 * Usage: npm run report -- <snapshot.json> [--out <dir>] [--trace]
 *
 * Validates a study snapshot, generates every full report and brief
 * summary, prints them and, with an output directory, writes the text
 * artifacts, a .docx of the reports and a zip bundle.
 */

import "dotenv/config";
import path from "path";
import { mkdirSync, readFileSync, writeFileSync } from "fs";
import { buildReportArtifacts, createZipBundle } from "../exports/bundle.js";
import { renderReportsDocx } from "../exports/docx.js";
import { REPORT_GENERATORS, STUDY_ORDER } from "../reports/generators/index.js";
import { generateStudyReports } from "../reports/orchestrator.js";
import { resolveReportConfig } from "../shared/report_config.js";
import { snapshotFromDict } from "../snapshot/snapshot.js";
import { DerivationRecorder } from "../trace/derivation.js";

let startTime: number;

function log(step: string, msg: string) {
  const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
  console.log(`  [${elapsed}s] [${step}] ${msg}`);
}

async function main() {
  startTime = Date.now();
  const args = process.argv.slice(2);
  let input = "";
  let out: string | undefined;
  let trace = false;

  for (let i = 0; i < args.length; i++) {
    if (args[i] === "--out" && i + 1 < args.length) {
      out = args[i + 1];
      i++;
    } else if (args[i] === "--trace") {
      trace = true;
    } else if (!args[i].startsWith("--") && !input) {
      input = args[i];
    }
  }

  if (!input) {
    console.error("Usage: npm run report -- <snapshot.json> [--out <dir>] [--trace]");
    process.exit(1);
  }

  const config = resolveReportConfig({ trace, out });
  const recorder = config.traceMode === "record" ? new DerivationRecorder() : undefined;

  try {
    log("LOAD", `Reading ${input}`);
    const snapshot = snapshotFromDict(JSON.parse(readFileSync(input, "utf-8")));
    const present = STUDY_ORDER.filter((kind) => snapshot[kind] !== undefined);
    log("LOAD", `Studies: ${present.length > 0 ? present.join(", ") : "none"}`);

    const result = generateStudyReports(snapshot, { recorder });
    log("REPORT", `Generated ${result.generatedKeys.length} texts`);

    for (const kind of present) {
      const generator = REPORT_GENERATORS[kind];
      console.log();
      console.log(`── ${generator.title} ──`);
      console.log(result.snapshot.report_texts[generator.fullKey] ?? "");
      console.log();
      console.log(`Brief: ${result.snapshot.report_texts[generator.briefKey] ?? ""}`);
    }

    if (result.recommendations.length > 0) {
      console.log();
      console.log("── Aanbevelingen ──");
      for (const rec of result.recommendations) console.log(`- ${rec}`);
    }
    console.log();

    if (recorder) {
      const check = recorder.validateChain();
      log("TRACE", `${recorder.getChain().length} records, chain ${check.valid ? "valid" : "INVALID"}`);
      for (const e of check.errors) log("TRACE", `  ⚠ ${e}`);
    }

    if (config.outputDir) {
      const started = new Date();
      const docx = await renderReportsDocx(result.snapshot, result.recommendations);
      const files = buildReportArtifacts(result.snapshot, {
        recorder,
        extra: [{ name: "reports.docx", content: docx }],
      });
      recorder?.record({
        traceType: "EXPORT_GENERATION",
        initiatedAt: started,
        completedAt: new Date(),
        inputLineage: { sources: [] },
        outputContent: { files: files.map((f) => f.name) },
      });

      mkdirSync(config.outputDir, { recursive: true });
      for (const file of files) writeFileSync(path.join(config.outputDir, file.name), file.content);
      const zip = await createZipBundle(files);
      writeFileSync(path.join(config.outputDir, "bundle.zip"), zip);
      log("OUTPUT", `${files.length} files + bundle.zip written to ${config.outputDir}`);
    }

    const totalTime = ((Date.now() - startTime) / 1000).toFixed(1);
    console.log(`  ✓ Reports complete in ${totalTime}s`);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`\n  ✗ Report generation failed: ${message}`);
    process.exit(1);
  }
}

void main();
