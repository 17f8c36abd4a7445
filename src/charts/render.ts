import { readFile, rename, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { parse, View } from "vega";
import { compile, type TopLevelSpec } from "vega-lite";
import { isErrnoException, RenderError } from "@/errors";
import type { AggregatedResult } from "@/runner/aggregator";
import { logBasePath } from "@/runner/result-store";
import { findLatencySpikes, parseFioLog } from "./fio-log";
import {
	buildIopsTimelineSpec,
	buildLatencyChartSpec,
	buildThroughputChartSpec,
	type ChartDefinition,
} from "./specs";

// --- Rendering ---

/**
 * Compiles a Vega-Lite spec and renders it to an SVG string.
 * Rendering runs headless, so no canvas package is needed.
 */
export async function renderSvg(spec: TopLevelSpec): Promise<string> {
	const { spec: vegaSpec } = compile(spec);
	const view = new View(parse(vegaSpec), { renderer: "none" });
	try {
		return await view.toSVG();
	} finally {
		view.finalize();
	}
}

/**
 * Renders one chart into the results directory and returns the file path.
 * Any failure is raised as RenderError.
 */
export async function renderChart(
	chart: ChartDefinition,
	runDir: string,
): Promise<string> {
	const filePath = join(runDir, chart.fileName);
	const tempPath = `${filePath}.tmp`;

	try {
		const svg = await renderSvg(chart.spec);
		await writeFile(tempPath, svg, "utf-8");
		await rename(tempPath, filePath);
	} catch (err) {
		const message = err instanceof Error ? err.message : String(err);
		throw new RenderError({ chart: chart.name, message, cause: err });
	}

	return filePath;
}

// --- fio Logs ---

/**
 * Reads a fio log file, returning null when fio did not write it.
 */
async function readLogIfPresent(filePath: string): Promise<string | null> {
	try {
		return await readFile(filePath, "utf-8");
	} catch (err) {
		if (isErrnoException(err) && err.code === "ENOENT") return null;
		throw err;
	}
}

/**
 * Builds the IOPS-over-time chart for a pattern from its fio logs.
 * Returns null when the iops log is missing; a missing latency log only drops
 * the threshold markers.
 */
export async function buildTimelineChart(
	runDir: string,
	pattern: string,
	latencyThresholdMs: number,
): Promise<ChartDefinition | null> {
	const base = logBasePath(runDir, pattern);

	const iopsText = await readLogIfPresent(`${base}_iops.1.log`);
	if (iopsText === null) {
		console.warn(`  ! IOPS log not found for ${pattern}; skipping timeline chart`);
		return null;
	}

	const latText = await readLogIfPresent(`${base}_lat.1.log`);
	if (latText === null) {
		console.warn(`  ! Latency log not found for ${pattern}; timeline has no threshold markers`);
	}

	const spikes =
		latText === null
			? []
			: findLatencySpikes(parseFioLog(latText), latencyThresholdMs);

	return buildIopsTimelineSpec(
		pattern,
		parseFioLog(iopsText),
		spikes,
		latencyThresholdMs,
	);
}

// --- Run Charts ---

/**
 * Renders every chart of a completed run into its results directory:
 * latency.svg and throughput.svg, plus iops_{pattern}.svg for each pattern
 * whose fio logs are present. Returns the written file paths.
 */
export async function renderCharts(
	runDir: string,
	results: AggregatedResult[],
	latencyThresholdMs: number,
): Promise<string[]> {
	const charts: ChartDefinition[] = [
		buildLatencyChartSpec(results, latencyThresholdMs),
		buildThroughputChartSpec(results, latencyThresholdMs),
	];

	for (const { pattern } of results) {
		let timeline: ChartDefinition | null;
		try {
			timeline = await buildTimelineChart(runDir, pattern, latencyThresholdMs);
		} catch (err) {
			const message = err instanceof Error ? err.message : String(err);
			throw new RenderError({
				chart: `iops_${pattern}`,
				message: `cannot read fio logs: ${message}`,
				cause: err,
			});
		}
		if (timeline) charts.push(timeline);
	}

	const written: string[] = [];
	for (const chart of charts) {
		const filePath = await renderChart(chart, runDir);
		console.log(`  Chart saved to ${filePath}`);
		written.push(filePath);
	}

	return written;
}
