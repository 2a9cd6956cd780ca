import { v4 as uuidv4 } from "uuid";
import { contentHash, merkleRoot } from "../shared/hash.js";
import type { DerivationRecord, DerivationType } from "../shared/types.js";

export interface DerivationStep {
  traceType: DerivationType;
  initiatedAt: Date;
  completedAt: Date;
  inputLineage: DerivationRecord["inputLineage"];
  formulas?: DerivationRecord["formulas"];
  reasoningChain?: DerivationRecord["reasoningChain"];
  outputContent?: DerivationRecord["outputContent"];
  validationResults?: DerivationRecord["validationResults"];
}

/**
 * Derivation Recorder: a hash-chained log of the steps of one report run.
 * Each record carries the hash of its predecessor and the Merkle root of
 * every content hash so far.
 */
export class DerivationRecorder {
  private chain: DerivationRecord[] = [];
  readonly runId: string;

  constructor(runId: string = uuidv4()) {
    this.runId = runId;
  }

  record(step: DerivationStep): DerivationRecord {
    const chainPosition = this.chain.length;
    const previousHash = chainPosition > 0 ? this.chain[chainPosition - 1].hashChain.contentHash : null;

    const recordContent = {
      traceId: uuidv4(),
      runId: this.runId,
      traceType: step.traceType,
      chainPosition,
      initiatedAt: step.initiatedAt.toISOString(),
      completedAt: step.completedAt.toISOString(),
      durationMs: step.completedAt.getTime() - step.initiatedAt.getTime(),
      inputLineage: step.inputLineage,
      formulas: step.formulas,
      reasoningChain: step.reasoningChain,
      outputContent: step.outputContent,
      validationResults: step.validationResults,
    };

    const cHash = contentHash(recordContent);
    const mRoot = merkleRoot([...this.chain.map((r) => r.hashChain.contentHash), cHash]);

    const record: DerivationRecord = {
      ...recordContent,
      hashChain: { contentHash: cHash, previousHash, merkleRoot: mRoot },
    };
    this.chain.push(record);
    return record;
  }

  getChain(): DerivationRecord[] {
    return [...this.chain];
  }

  validateChain(): { valid: boolean; errors: string[] } {
    return validateDerivationChain(this.chain);
  }
}

/** Check positions, predecessor links and content hashes of a chain. */
export function validateDerivationChain(chain: readonly DerivationRecord[]): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  chain.forEach((record, i) => {
    if (record.chainPosition !== i) {
      errors.push(`Record ${i}: chain position mismatch (expected ${i}, got ${record.chainPosition})`);
    }
    if (i === 0 && record.hashChain.previousHash !== null) {
      errors.push("Record 0: previous hash should be null");
    }
    if (i > 0 && record.hashChain.previousHash !== chain[i - 1].hashChain.contentHash) {
      errors.push(`Record ${i}: previous hash does not match prior content hash`);
    }
    const { hashChain, ...content } = record;
    if (hashChain.contentHash !== contentHash(content)) {
      errors.push(`Record ${i}: content hash mismatch`);
    }
  });

  return { valid: errors.length === 0, errors };
}
