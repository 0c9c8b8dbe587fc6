import QuickChart from "quickchart-js";
import { moments, pdf } from "../analytics/distribution.js";
import { getVariableInfo } from "../sources/variables.js";
import type { AnalysisResult, DistributionParameters } from "../shared/types.js";

export interface ChartSpec {
  title: string;
  config: Record<string, unknown>;
  url: string;
}

const WIDTH = 800;
const HEIGHT = 400;
const CURVE_POINTS = 80;

/** Turns a chart spec into a PNG image. */
export type ChartRenderer = (spec: ChartSpec) => Promise<Buffer>;

function toQuickChart(config: Record<string, unknown>): QuickChart {
  const chart = new QuickChart();
  chart.setConfig(config);
  chart.setWidth(WIDTH);
  chart.setHeight(HEIGHT);
  chart.setBackgroundColor("#ffffff");
  return chart;
}

function toUrl(config: Record<string, unknown>): string {
  return toQuickChart(config).getUrl();
}

/**
 * Render a chart as PNG through the QuickChart API (network call).
 */
export async function renderQuickChart(spec: ChartSpec): Promise<Buffer> {
  const buffer = await toQuickChart(spec.config).toBinary();
  return buffer;
}

/**
 * Yearly samples with the fitted trend line and the long-run mean.
 * Only the config and URL are built here; `renderQuickChart` fetches the PNG.
 */
export function buildTrendChart(result: AnalysisResult): ChartSpec {
  const { unit, label } = getVariableInfo(result.sampleSet.variable);
  const years = result.sampleSet.samples.map((s) => s.year);
  const title = `${label} on ${result.query.month}/${result.query.day}: long-term trend`;

  const config = {
    type: "line",
    data: {
      labels: years,
      datasets: [
        {
          label: `${label} (${unit})`,
          data: result.sampleSet.samples.map((s) => s.value),
          borderColor: "#2563eb",
          fill: false,
          pointRadius: 3,
        },
        {
          label: `Trend (${result.trend.slopePerDecade.toFixed(3)} ${unit}/decade)`,
          data: result.trend.fitted.map((f) => f.value),
          borderColor: "#dc2626",
          pointRadius: 0,
          fill: false,
        },
        {
          label: `Mean (${result.extreme.mean.toFixed(2)})`,
          data: years.map(() => result.extreme.mean),
          borderColor: "#059669",
          borderDash: [5, 5],
          pointRadius: 0,
          fill: false,
        },
      ],
    },
    options: {
      title: { display: true, text: title },
      scales: {
        xAxes: [{ scaleLabel: { display: true, labelString: "Year" } }],
        yAxes: [{ scaleLabel: { display: true, labelString: unit } }],
      },
      legend: { position: "bottom" },
    },
  };

  return { title, config, url: toUrl(config) };
}

/**
 * Density sampled over mean ± 4σ. For the positive families the curve starts
 * one step above zero, where a gamma with shape < 1 has infinite density.
 */
export function densityCurve(params: DistributionParameters): { xs: number[]; density: number[] } {
  const { mean, stdDev } = moments(params);
  const hi = mean + 4 * stdDev;
  const lo = params.family === "normal" ? mean - 4 * stdDev : Math.max(mean - 4 * stdDev, hi / CURVE_POINTS);
  const step = (hi - lo) / (CURVE_POINTS - 1);

  const xs = Array.from({ length: CURVE_POINTS }, (_, i) => lo + i * step);
  return { xs, density: xs.map((x) => pdf(params, x)) };
}

/**
 * Density of the fitted distribution with the extreme threshold marked.
 */
export function buildDistributionChart(result: AnalysisResult): ChartSpec {
  const { unit, label } = getVariableInfo(result.sampleSet.variable);
  const params = result.distribution.parameters;
  const { xs, density } = densityCurve(params);
  const threshold = result.extreme.threshold;
  const thresholdIndex = xs.reduce(
    (best, x, i) => (Math.abs(x - threshold) < Math.abs(xs[best] - threshold) ? i : best),
    0
  );
  const peak = Math.max(...density);
  const title = `${label} on ${result.query.month}/${result.query.day}: ${result.distribution.family} distribution`;

  const config = {
    type: "line",
    data: {
      labels: xs.map((x) => x.toFixed(2)),
      datasets: [
        {
          label: "Density",
          data: density,
          borderColor: "#7c3aed",
          backgroundColor: "rgba(124, 58, 237, 0.2)",
          fill: true,
          pointRadius: 0,
        },
        {
          label: `Extreme threshold μ+2σ (${threshold.toFixed(2)} ${unit})`,
          data: xs.map((_, i) => (i === thresholdIndex ? peak : null)),
          borderColor: "#dc2626",
          type: "bar",
        },
      ],
    },
    options: {
      title: { display: true, text: title },
      scales: {
        xAxes: [{ scaleLabel: { display: true, labelString: unit } }],
      },
      legend: { position: "bottom" },
    },
  };

  return { title, config, url: toUrl(config) };
}
