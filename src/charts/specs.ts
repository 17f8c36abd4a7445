import type { TopLevelSpec } from "vega-lite";
import type { AggregatedResult } from "@/runner/aggregator";
import type { FioLogSample } from "./fio-log";

// --- Types ---

/** A chart to be rendered into the results directory. */
export interface ChartDefinition {
	/** Short identifier used in errors and logs */
	name: string;
	/** Output file name, relative to the results directory */
	fileName: string;
	spec: TopLevelSpec;
}

// --- Constants ---

const SCHEMA_URL = "https://vega.github.io/schema/vega-lite/v5.json";
const WIDTH = 560;
const HEIGHT = 320;
const THRESHOLD_COLOR = "#e8871e";
const READ_COLOR = "#1f77b4";
const WRITE_COLOR = "#d62728";

// --- Summary Charts ---

/**
 * Average and p99 latency per pattern as grouped bars, with a horizontal
 * rule at the latency threshold. Patterns keep their input order on the x axis.
 */
export function buildLatencyChartSpec(
	results: AggregatedResult[],
	latencyThresholdMs: number,
): ChartDefinition {
	const order = results.map((r) => r.pattern);
	const values = results.flatMap(({ pattern, metrics }) => [
		{ pattern, metric: "Average", latencyMs: metrics.latAvgMs },
		{ pattern, metric: "P99", latencyMs: metrics.latP99Ms },
	]);

	return {
		name: "latency",
		fileName: "latency.svg",
		spec: {
			$schema: SCHEMA_URL,
			title: {
				text: "Latency by pattern",
				subtitle: `Latency threshold: ${latencyThresholdMs} ms`,
			},
			width: WIDTH,
			height: HEIGHT,
			layer: [
				{
					data: { values },
					mark: "bar",
					encoding: {
						x: {
							field: "pattern",
							type: "nominal",
							sort: order,
							title: "Pattern",
							axis: { labelAngle: -30 },
						},
						xOffset: { field: "metric", type: "nominal" },
						y: {
							field: "latencyMs",
							type: "quantitative",
							title: "Latency (ms)",
						},
						color: {
							field: "metric",
							type: "nominal",
							title: "Metric",
						},
					},
				},
				{
					data: { values: [{ thresholdMs: latencyThresholdMs }] },
					mark: {
						type: "rule",
						color: THRESHOLD_COLOR,
						strokeDash: [6, 4],
						size: 2,
					},
					encoding: {
						y: { field: "thresholdMs", type: "quantitative" },
					},
				},
			],
		},
	};
}

/**
 * Total IOPS per pattern. Bars are coloured by whether the pattern's average
 * latency exceeds the threshold.
 */
export function buildThroughputChartSpec(
	results: AggregatedResult[],
	latencyThresholdMs: number,
): ChartDefinition {
	const order = results.map((r) => r.pattern);
	const aboveLabel = `Avg latency > ${latencyThresholdMs} ms`;
	const withinLabel = `Avg latency <= ${latencyThresholdMs} ms`;
	const values = results.map(({ pattern, metrics }) => ({
		pattern,
		iops: metrics.iops,
		bandwidthMiBps: metrics.bandwidthKiBps / 1024,
		latency: metrics.latAvgMs > latencyThresholdMs ? aboveLabel : withinLabel,
	}));

	return {
		name: "throughput",
		fileName: "throughput.svg",
		spec: {
			$schema: SCHEMA_URL,
			title: {
				text: "Throughput by pattern",
				subtitle: `Latency threshold: ${latencyThresholdMs} ms`,
			},
			width: WIDTH,
			height: HEIGHT,
			data: { values },
			mark: "bar",
			encoding: {
				x: {
					field: "pattern",
					type: "nominal",
					sort: order,
					title: "Pattern",
					axis: { labelAngle: -30 },
				},
				y: { field: "iops", type: "quantitative", title: "IOPS" },
				color: {
					field: "latency",
					type: "nominal",
					title: "Latency",
					scale: {
						domain: [withinLabel, aboveLabel],
						range: [READ_COLOR, THRESHOLD_COLOR],
					},
				},
				tooltip: [
					{ field: "pattern", type: "nominal" },
					{ field: "iops", type: "quantitative", format: ",.0f" },
					{ field: "bandwidthMiBps", type: "quantitative", format: ".1f" },
				],
			},
		},
	};
}

// --- Per-pattern Timeline ---

/**
 * Read/write IOPS over time for one pattern, from fio's iops log. Each second
 * in `spikeSeconds` (latency above the threshold) gets a vertical marker.
 */
export function buildIopsTimelineSpec(
	pattern: string,
	iopsSamples: FioLogSample[],
	spikeSeconds: number[],
	latencyThresholdMs: number,
): ChartDefinition {
	const values = iopsSamples
		.filter((s) => s.direction === 0 || s.direction === 1)
		.map((s) => ({
			timeS: s.timeMs / 1000,
			iops: s.value,
			direction: s.direction === 0 ? "Read IOPS" : "Write IOPS",
		}));

	return {
		name: `iops_${pattern}`,
		fileName: `iops_${pattern}.svg`,
		spec: {
			$schema: SCHEMA_URL,
			title: {
				text: `IOPS over Time: ${pattern}`,
				subtitle: `Markers: latency > ${latencyThresholdMs} ms`,
			},
			width: WIDTH,
			height: HEIGHT,
			layer: [
				{
					data: { values },
					mark: "line",
					encoding: {
						x: { field: "timeS", type: "quantitative", title: "Time (s)" },
						y: { field: "iops", type: "quantitative", title: "IOPS" },
						color: {
							field: "direction",
							type: "nominal",
							title: "Direction",
							scale: {
								domain: ["Read IOPS", "Write IOPS"],
								range: [READ_COLOR, WRITE_COLOR],
							},
						},
					},
				},
				{
					data: { values: spikeSeconds.map((timeS) => ({ timeS })) },
					mark: {
						type: "rule",
						color: THRESHOLD_COLOR,
						strokeDash: [4, 4],
						opacity: 0.3,
					},
					encoding: {
						x: { field: "timeS", type: "quantitative" },
					},
				},
			],
		},
	};
}
