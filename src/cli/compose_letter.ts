#!/usr/bin/env tsx
/**
 * CLI: letter
 *
 * Usage: npm run letter -- <letter.json> [--out <dir>] [--signature <text>] [--trace]
 *
 * Composes the consultation letter from a letter document (patient, free
 * text, clinical exam and either explicit investigations or stored
 * studies), prints it and optionally writes letter.txt and letter.docx.
 */

import "dotenv/config";
import path from "path";
import { mkdirSync, readFileSync, writeFileSync } from "fs";
import { renderLetterDocx } from "../exports/docx.js";
import { composeConsultationLetter, letterHeadings } from "../reports/letter.js";
import { letterInputFromDocument, parseLetterDocument } from "../reports/letter_document.js";
import { contentHash } from "../shared/hash.js";
import { resolveReportConfig } from "../shared/report_config.js";
import { DerivationRecorder } from "../trace/derivation.js";
import { exportJSONL, generateAuditSummaryMd } from "../trace/exporters.js";

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
  let signature: string | undefined;
  let trace = false;

  for (let i = 0; i < args.length; i++) {
    if (args[i] === "--out" && i + 1 < args.length) {
      out = args[i + 1];
      i++;
    } else if (args[i] === "--signature" && i + 1 < args.length) {
      signature = args[i + 1];
      i++;
    } else if (args[i] === "--trace") {
      trace = true;
    } else if (!args[i].startsWith("--") && !input) {
      input = args[i];
    }
  }

  if (!input) {
    console.error("Usage: npm run letter -- <letter.json> [--out <dir>] [--signature <text>] [--trace]");
    process.exit(1);
  }

  const config = resolveReportConfig({ out, signature, trace });
  const recorder = config.traceMode === "record" ? new DerivationRecorder() : undefined;

  try {
    log("LOAD", `Reading ${input}`);
    const doc = parseLetterDocument(JSON.parse(readFileSync(input, "utf-8")));
    const letterInput = letterInputFromDocument(doc);
    log("LETTER", `${letterInput.investigations.length} investigation section(s)`);

    const started = new Date();
    const letter = composeConsultationLetter(letterInput, config.letterSignature);
    recorder?.record({
      traceType: "LETTER_COMPOSITION",
      initiatedAt: started,
      completedAt: new Date(),
      inputLineage: {
        sources: [{ sourceId: path.basename(input), sourceHash: contentHash(doc), sourceType: "letter_document" }],
      },
      outputContent: { headings: letterHeadings(letter), textHash: contentHash(letter) },
    });
    log("LETTER", `Sections: ${letterHeadings(letter).join(", ")}`);
    console.log();
    console.log(letter);

    if (config.outputDir) {
      mkdirSync(config.outputDir, { recursive: true });
      writeFileSync(path.join(config.outputDir, "letter.txt"), letter);
      writeFileSync(path.join(config.outputDir, "letter.docx"), await renderLetterDocx(letter));
      log("OUTPUT", `letter.txt + letter.docx written to ${config.outputDir}`);
      if (recorder) {
        const chain = recorder.getChain();
        writeFileSync(path.join(config.outputDir, "trace.jsonl"), exportJSONL(chain));
        writeFileSync(path.join(config.outputDir, "audit_summary.md"), generateAuditSummaryMd(chain, recorder.runId));
        log("TRACE", `${chain.length} derivation record(s) written`);
      }
    }

    const totalTime = ((Date.now() - startTime) / 1000).toFixed(1);
    console.log(`  ✓ Letter complete in ${totalTime}s`);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`\n  ✗ Letter composition failed: ${message}`);
    process.exit(1);
  }
}

void main();
