import archiver from "archiver";
import { Writable } from "stream";
import { samplesToCsv, summaryToCsv } from "./csv.js";
import { serializeAnalysis } from "./json.js";
import { buildDistributionChart, buildTrendChart, type ChartRenderer } from "./chart.js";
import { buildInsightNarrative } from "./narrative.js";
import { exportJSONL, generateAuditSummaryMd } from "../trace/exporters.js";
import type { AnalysisResult, DTRRecord } from "../shared/types.js";

export interface BundleFile {
  name: string;
  content: Buffer | string;
}

/**
 * Create a zip bundle from files.
 * Returns the zip as a Buffer.
 */
export async function createZipBundle(files: BundleFile[]): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    const writableStream = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk);
        callback();
      },
    });

    const archive = archiver("zip", { zlib: { level: 9 } });

    writableStream.on("finish", () => {
      resolve(Buffer.concat(chunks));
    });

    archive.on("error", (err) => reject(err));
    archive.pipe(writableStream);

    for (const file of files) {
      archive.append(
        typeof file.content === "string"
          ? Buffer.from(file.content, "utf-8")
          : file.content,
        { name: file.name }
      );
    }

    archive.finalize().catch(reject);
  });
}

/** Files written into the export bundle, in order. */
export function buildExportFiles(
  result: AnalysisResult,
  trace: readonly DTRRecord[],
  options: { volatilityThreshold?: number } = {}
): BundleFile[] {
  const charts = [buildTrendChart(result), buildDistributionChart(result)];
  return [
    { name: "historical_data.csv", content: samplesToCsv(result) },
    { name: "summary.csv", content: summaryToCsv(result) },
    { name: "analysis.json", content: serializeAnalysis(result) },
    { name: "insight.txt", content: buildInsightNarrative(result, options).fullText + "\n" },
    {
      name: "charts.json",
      content: JSON.stringify(
        charts.map((c) => ({ title: c.title, url: c.url })),
        null,
        2
      ),
    },
    { name: "trace.jsonl", content: exportJSONL(trace) },
    { name: "trace_summary.md", content: generateAuditSummaryMd(trace) },
  ];
}

export interface ExportBundleOptions {
  volatilityThreshold?: number;
  /** When set, trend.png and distribution.png are rendered into the bundle. */
  renderChart?: ChartRenderer;
}

/** PNG images of both charts. */
export async function renderChartImages(
  result: AnalysisResult,
  renderChart: ChartRenderer
): Promise<BundleFile[]> {
  const trend = await renderChart(buildTrendChart(result));
  const distribution = await renderChart(buildDistributionChart(result));
  return [
    { name: "trend.png", content: trend },
    { name: "distribution.png", content: distribution },
  ];
}

export async function createExportBundle(
  result: AnalysisResult,
  trace: readonly DTRRecord[],
  options: ExportBundleOptions = {}
): Promise<Buffer> {
  const files = buildExportFiles(result, trace, options);
  if (options.renderChart) {
    files.push(...(await renderChartImages(result, options.renderChart)));
  }
  return createZipBundle(files);
}
