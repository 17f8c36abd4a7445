import { readFile } from "node:fs/promises";
import { isErrnoException, MissingResultError } from "@/errors";
import {
	type DirectionMetrics,
	type PatternMetrics,
	parseFioReport,
	summarizeFioOutput,
} from "./fio-report";
import { resultFilePath } from "./result-store";

// --- Types ---

export interface AggregatedResult {
	pattern: string;
	metrics: PatternMetrics;
}

// --- Loading ---

/**
 * Reads back the result file of every pattern and derives its metrics.
 *
 * Results come back in the order of `patternNames`, independent of the order
 * the files were written or are listed on disk. A missing file raises
 * MissingResultError; an unreadable report raises BenchmarkExecutionError
 * with stage `aggregating`.
 */
export async function loadResults(
	runDir: string,
	patternNames: readonly string[],
): Promise<AggregatedResult[]> {
	const results: AggregatedResult[] = [];

	for (const pattern of patternNames) {
		const filePath = resultFilePath(runDir, pattern);

		let content: string;
		try {
			content = await readFile(filePath, "utf-8");
		} catch (err) {
			if (isErrnoException(err) && err.code === "ENOENT") {
				throw new MissingResultError({ pattern, filePath });
			}
			throw err;
		}

		const output = parseFioReport(content, pattern, "aggregating");
		results.push({ pattern, metrics: summarizeFioOutput(output) });
	}

	return results;
}

// --- Formatting ---

/**
 * Formats a latency in milliseconds like "0.85 ms".
 */
function formatLatency(ms: number): string {
	return `${ms.toFixed(2)} ms`;
}

/**
 * Formats a KiB/s bandwidth as MiB/s like "312.5".
 */
function formatBandwidth(kibps: number): string {
	return (kibps / 1024).toFixed(1);
}

function formatIops(iops: number): string {
	return Math.round(iops).toString();
}

function padRight(str: string, width: number): string {
	return str.padEnd(width);
}

function padLeft(str: string, width: number): string {
	return str.padStart(width);
}

/**
 * Formats the per-direction lines printed after each pattern run.
 */
export function formatPatternMetrics(metrics: PatternMetrics): string {
	const lines: string[] = [];

	const describe = (label: string, d: DirectionMetrics) => {
		lines.push(`  ${label} IOPS: ${formatIops(d.iops)}`);
		lines.push(`  ${label} Avg Latency: ${formatLatency(d.latAvgMs)}`);
		lines.push(`  ${label} P99 Latency: ${formatLatency(d.latP99Ms)}`);
		lines.push(`  ${label} Max Latency: ${formatLatency(d.latMaxMs)}`);
	};

	if (metrics.read) describe("Read", metrics.read);
	if (metrics.write) describe("Write", metrics.write);
	if (lines.length === 0) lines.push("  No I/O recorded");

	return lines.join("\n");
}

/**
 * Generates the fixed-width summary table printed at the end of a run.
 * Patterns whose average latency exceeds the threshold are marked with "!".
 */
export function formatSummaryText(
	results: AggregatedResult[],
	latencyThresholdMs: number,
): string {
	const lines: string[] = [];
	const separator = "=".repeat(78);
	const dashSeparator = "-".repeat(78);
	const nameWidth = Math.max(
		16,
		...results.map((r) => r.pattern.length + 2),
	);

	lines.push(separator);
	lines.push(` RESULTS (latency threshold: ${latencyThresholdMs} ms)`);
	lines.push(separator);

	lines.push(
		padRight(" Pattern", nameWidth) +
			padLeft("Read IOPS", 11) +
			padLeft("Write IOPS", 12) +
			padLeft("MiB/s", 9) +
			padLeft("Avg", 12) +
			padLeft("P99", 12),
	);
	lines.push(dashSeparator);

	for (const { pattern, metrics } of results) {
		const flag = metrics.latAvgMs > latencyThresholdMs ? " !" : "";
		lines.push(
			padRight(` ${pattern}`, nameWidth) +
				padLeft(metrics.read ? formatIops(metrics.read.iops) : "-", 11) +
				padLeft(metrics.write ? formatIops(metrics.write.iops) : "-", 12) +
				padLeft(formatBandwidth(metrics.bandwidthKiBps), 9) +
				padLeft(formatLatency(metrics.latAvgMs), 12) +
				padLeft(formatLatency(metrics.latP99Ms), 12) +
				flag,
		);
	}

	lines.push(separator);
	return lines.join("\n");
}
