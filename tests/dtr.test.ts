import { describe, it, expect } from "vitest";
import { DTRRecorder, validateChain } from "../src/trace/dtr.js";
import { exportJSONL, generateAuditSummaryMd, parseJSONL } from "../src/trace/exporters.js";
import type { DTRType } from "../src/shared/types.js";

function recordStage(recorder: DTRRecorder, traceType: DTRType, pass = true) {
  const at = new Date("2024-05-01T12:00:00.000Z");
  return recorder.record({
    traceType,
    initiatedAt: at,
    completedAt: new Date(at.getTime() + 5),
    inputLineage: {
      primarySources: [{ sourceId: "test-source", sourceHash: "abc123", sourceType: "time_series" }],
    },
    outputContent: { stage: traceType },
    validationResults: { pass, messages: pass ? [] : ["stage failed"] },
  });
}

describe("DTR Recorder", () => {
  it("links records into a valid hash chain", () => {
    const recorder = new DTRRecorder("case-1");
    const first = recordStage(recorder, "SERIES_NORMALIZATION");
    const second = recordStage(recorder, "DAY_OF_YEAR_SELECTION");

    expect(first.chainPosition).toBe(0);
    expect(first.hashChain.previousHash).toBeNull();
    expect(first.hashChain.merkleRoot).toBe(first.hashChain.contentHash);
    expect(second.hashChain.previousHash).toBe(first.hashChain.contentHash);
    expect(second.durationMs).toBe(5);
    expect(recorder.length).toBe(2);
    expect(recorder.validateChain()).toEqual({ valid: true, errors: [] });
  });

  it("detects an edited record", () => {
    const recorder = new DTRRecorder("case-2");
    recordStage(recorder, "SERIES_NORMALIZATION");
    recordStage(recorder, "DAY_OF_YEAR_SELECTION");
    const chain = recorder.getChain();
    chain[1] = { ...chain[1], outputContent: { stage: "edited" } };

    expect(validateChain(chain)).toEqual({
      valid: false,
      errors: ["DTR 1: content hash mismatch"],
    });
  });

  it("detects a reordered chain", () => {
    const recorder = new DTRRecorder("case-3");
    recordStage(recorder, "SERIES_NORMALIZATION");
    recordStage(recorder, "DAY_OF_YEAR_SELECTION");
    const result = validateChain(recorder.getChain().reverse());
    expect(result.valid).toBe(false);
    expect(result.errors).toContain("DTR 0: previous hash should be null");
  });

  it("returns a copy of the chain", () => {
    const recorder = new DTRRecorder("case-4");
    recordStage(recorder, "TREND_REGRESSION");
    recorder.getChain().pop();
    expect(recorder.length).toBe(1);
  });
});

describe("DTR exporters", () => {
  it("round-trips a chain through JSONL", () => {
    const recorder = new DTRRecorder("case-5");
    recordStage(recorder, "SERIES_NORMALIZATION");
    recordStage(recorder, "DAY_OF_YEAR_SELECTION");

    const jsonl = exportJSONL(recorder.getChain());
    expect(jsonl.trim().split("\n")).toHaveLength(2);
    const parsed = parseJSONL(jsonl);
    expect(parsed).toEqual(recorder.getChain());
    expect(validateChain(parsed).valid).toBe(true);
  });

  it("rejects a line that is not a DTR", () => {
    expect(() => parseJSONL('{"traceId":"x"}\n')).toThrow(/^Invalid DTR on line 1/);
  });

  it("summarises stages and failures in markdown", () => {
    const recorder = new DTRRecorder("case-6");
    recordStage(recorder, "SERIES_NORMALIZATION");
    const last = recordStage(recorder, "DAY_OF_YEAR_SELECTION", false);
    const md = generateAuditSummaryMd(recorder.getChain()).split("\n");

    expect(md[0]).toBe("# Analysis Trace Summary");
    expect(md).toContain("- **Case ID**: case-6");
    expect(md).toContain("- **Stages Recorded**: 2");
    expect(md).toContain(
      `| 1 | DAY_OF_YEAR_SELECTION | 5 | ${last.hashChain.contentHash.slice(0, 16)}... | ✗ |`
    );
    expect(md).toContain("- DAY_OF_YEAR_SELECTION: stage failed");
    expect(md).toContain(`- **Merkle Root**: \`${last.hashChain.merkleRoot}\``);
  });
});
