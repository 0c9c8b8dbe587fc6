import { z } from "zod";
import type { DTRRecord } from "../shared/types.js";

/**
 * Export DTR chain as JSONL string (one JSON line per record).
 */
export function exportJSONL(chain: readonly DTRRecord[]): string {
  return chain.map((record) => JSON.stringify(record)).join("\n") + "\n";
}

const DTRRecordSchema = z.object({
  traceId: z.string(),
  caseId: z.string(),
  traceType: z.enum([
    "SERIES_NORMALIZATION",
    "DAY_OF_YEAR_SELECTION",
    "TREND_REGRESSION",
    "EXTREME_ESTIMATION",
    "DISTRIBUTION_FIT",
    "INSIGHT_AGGREGATION",
  ]),
  chainPosition: z.number().int().nonnegative(),
  initiatedAt: z.string(),
  completedAt: z.string(),
  durationMs: z.number(),
  inputLineage: z.object({
    primarySources: z.array(
      z.object({ sourceId: z.string(), sourceHash: z.string(), sourceType: z.string() })
    ),
  }),
  derivedInputs: z
    .array(z.object({ formula: z.string(), parameters: z.record(z.unknown()) }))
    .optional(),
  reasoningChain: z
    .object({
      steps: z.array(
        z.object({ stepNumber: z.number(), action: z.string(), detail: z.string() })
      ),
    })
    .optional(),
  outputContent: z.record(z.unknown()).optional(),
  validationResults: z.object({ pass: z.boolean(), messages: z.array(z.string()) }).optional(),
  hashChain: z.object({
    contentHash: z.string(),
    previousHash: z.string().nullable(),
    merkleRoot: z.string(),
  }),
});

/**
 * Parse a JSONL export back into DTR records.
 */
export function parseJSONL(text: string): DTRRecord[] {
  return text
    .split("\n")
    .filter((line) => line.trim() !== "")
    .map((line, i) => {
      const result = DTRRecordSchema.safeParse(JSON.parse(line));
      if (!result.success) {
        throw new Error(`Invalid DTR on line ${i + 1}: ${result.error.issues[0]?.message}`);
      }
      return result.data;
    });
}

/**
 * Markdown summary of a run's trace: one row per stage plus chain hashes.
 */
export function generateAuditSummaryMd(chain: readonly DTRRecord[]): string {
  const lines: string[] = [];
  lines.push("# Analysis Trace Summary");
  lines.push("");
  if (chain.length > 0) {
    lines.push(`- **Case ID**: ${chain[0].caseId}`);
    lines.push(`- **Stages Recorded**: ${chain.length}`);
    lines.push("");
  }

  lines.push("| # | Stage | Duration (ms) | Content Hash | Passed |");
  lines.push("|---|-------|---------------|--------------|--------|");
  for (const dtr of chain) {
    const passed = (dtr.validationResults?.pass ?? true) ? "✓" : "✗";
    lines.push(
      `| ${dtr.chainPosition} | ${dtr.traceType} | ${dtr.durationMs} | ${dtr.hashChain.contentHash.slice(0, 16)}... | ${passed} |`
    );
  }

  const failed = chain.filter((d) => d.validationResults?.pass === false);
  if (failed.length > 0) {
    lines.push("");
    lines.push("## Failures");
    lines.push("");
    for (const dtr of failed) {
      for (const msg of dtr.validationResults?.messages ?? []) {
        lines.push(`- ${dtr.traceType}: ${msg}`);
      }
    }
  }

  const last = chain[chain.length - 1];
  if (last) {
    lines.push("");
    lines.push("## Hash Chain Integrity");
    lines.push("");
    lines.push(`- **Merkle Root**: \`${last.hashChain.merkleRoot}\``);
    lines.push(`- **Final Content Hash**: \`${last.hashChain.contentHash}\``);
  }

  return lines.join("\n") + "\n";
}
