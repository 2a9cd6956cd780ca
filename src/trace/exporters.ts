import type { DerivationRecord } from "../shared/types.js";

/**
 * Export a derivation chain as JSONL (one JSON line per record).
 */
export function exportJSONL(chain: readonly DerivationRecord[]): string {
  return chain.map((record) => JSON.stringify(record)).join("\n") + "\n";
}

/**
 * Markdown audit summary of a report run: one table row per step, the chain
 * integrity block and the formulas that were applied.
 */
export function generateAuditSummaryMd(
  chain: readonly DerivationRecord[],
  runId: string,
  generatedAt: Date = new Date()
): string {
  const lines: string[] = [
    `# Audit Summary: Run ${runId}`,
    "",
    `Generated: ${generatedAt.toISOString()}`,
    "",
    `## Derivation Chain (${chain.length} records)`,
    "",
    "| # | Type | Duration (ms) | Content Hash | Valid |",
    "|---|------|--------------|--------------|-------|",
  ];

  for (const rec of chain) {
    const valid = rec.validationResults ? (rec.validationResults.pass ? "PASS" : "FAIL") : "—";
    lines.push(
      `| ${rec.chainPosition} | ${rec.traceType} | ${rec.durationMs} | ${rec.hashChain.contentHash.slice(0, 16)}... | ${valid} |`
    );
  }

  lines.push("", "## Hash Chain Integrity", "");
  const last = chain[chain.length - 1];
  if (last) {
    lines.push(`- **Merkle Root**: \`${last.hashChain.merkleRoot}\``);
    lines.push(`- **Final Content Hash**: \`${last.hashChain.contentHash}\``);
    lines.push(`- **Chain Length**: ${chain.length}`);
  }

  const formulas = new Set<string>();
  for (const rec of chain) {
    for (const f of rec.formulas ?? []) formulas.add(f.name);
  }
  if (formulas.size > 0) {
    lines.push("", "## Formulas Applied", "");
    for (const name of [...formulas].sort()) lines.push(`- ${name}`);
  }

  return lines.join("\n");
}
