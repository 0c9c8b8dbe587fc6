import { v4 as uuidv4 } from "uuid";
import { contentHash, merkleRoot } from "../shared/hash.js";
import type { DTRRecord, DTRType } from "../shared/types.js";

export type DTRInput = Omit<
  DTRRecord,
  "traceId" | "caseId" | "chainPosition" | "initiatedAt" | "completedAt" | "durationMs" | "hashChain"
> & {
  traceType: DTRType;
  initiatedAt: Date;
  completedAt: Date;
};

/**
 * DTR Recorder: hash-chained Decision Trace Records for one analysis run.
 * Each record's content hash links to the previous one, so any later edit
 * to a recorded stage breaks `validateChain`.
 */
export class DTRRecorder {
  private chain: DTRRecord[] = [];
  readonly caseId: string;

  constructor(caseId: string) {
    this.caseId = caseId;
  }

  record(params: DTRInput): DTRRecord {
    const chainPosition = this.chain.length;
    const previousHash =
      chainPosition > 0 ? this.chain[chainPosition - 1].hashChain.contentHash : null;

    const recordContent = {
      traceId: uuidv4(),
      caseId: this.caseId,
      traceType: params.traceType,
      chainPosition,
      initiatedAt: params.initiatedAt.toISOString(),
      completedAt: params.completedAt.toISOString(),
      durationMs: params.completedAt.getTime() - params.initiatedAt.getTime(),
      inputLineage: params.inputLineage,
      derivedInputs: params.derivedInputs,
      reasoningChain: params.reasoningChain,
      outputContent: params.outputContent,
      validationResults: params.validationResults,
    };

    const cHash = contentHash(recordContent);
    const allHashes = [...this.chain.map((r) => r.hashChain.contentHash), cHash];

    const record: DTRRecord = {
      ...recordContent,
      hashChain: {
        contentHash: cHash,
        previousHash,
        merkleRoot: merkleRoot(allHashes),
      },
    };

    this.chain.push(record);
    return record;
  }

  getChain(): DTRRecord[] {
    return [...this.chain];
  }

  get length(): number {
    return this.chain.length;
  }

  /** Validate the chain integrity. */
  validateChain(): { valid: boolean; errors: string[] } {
    return validateChain(this.chain);
  }
}

/** Validate positions, hash links and content hashes of a DTR chain. */
export function validateChain(chain: readonly DTRRecord[]): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  for (let i = 0; i < chain.length; i++) {
    const record = chain[i];

    if (record.chainPosition !== i) {
      errors.push(`DTR ${i}: chain position mismatch (expected ${i}, got ${record.chainPosition})`);
    }

    if (i === 0 && record.hashChain.previousHash !== null) {
      errors.push(`DTR 0: previous hash should be null`);
    }
    if (i > 0 && record.hashChain.previousHash !== chain[i - 1].hashChain.contentHash) {
      errors.push(`DTR ${i}: previous hash does not match prior DTR content hash`);
    }

    const { hashChain, ...contentWithoutHash } = record;
    if (hashChain.contentHash !== contentHash(contentWithoutHash)) {
      errors.push(`DTR ${i}: content hash mismatch`);
    }
  }

  return { valid: errors.length === 0, errors };
}
