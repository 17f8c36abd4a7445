import { BenchmarkExecutionError, type RunStage } from "@/errors";
import {
	type FioDirectionStats,
	type FioOutput,
	FioOutputSchema,
} from "@/types/fio";
import { formatIssues } from "@/types/issues";

// --- Types ---

/** Summary metrics for one I/O direction. Latencies are in milliseconds. */
export interface DirectionMetrics {
	iops: number;
	bandwidthKiBps: number;
	latAvgMs: number;
	latMaxMs: number;
	latP99Ms: number;
}

/**
 * Summary metrics for one pattern run.
 *
 * `read`/`write` are null when that direction performed no I/O (e.g. the
 * write side of a pure randread pattern). The combined fields sum IOPS and
 * bandwidth, weight the average latency by IOPS, and take the worse p99.
 */
export interface PatternMetrics {
	read: DirectionMetrics | null;
	write: DirectionMetrics | null;
	iops: number;
	bandwidthKiBps: number;
	latAvgMs: number;
	latP99Ms: number;
}

// --- Constants ---

const NS_PER_MS = 1_000_000;
const P99_KEY = "99.000000";

// --- Parsing ---

/**
 * Extracts the JSON report from fio's stdout.
 * fio sometimes writes warning lines before the JSON blob, so everything
 * before the first '{' is dropped.
 */
export function extractFioJson(stdout: string): string | null {
	const jsonStart = stdout.indexOf("{");
	if (jsonStart === -1) return null;
	return stdout.slice(jsonStart).trimEnd();
}

/**
 * Parses and validates a fio JSON report.
 * Throws BenchmarkExecutionError, tagged with `stage`, when the text is not a
 * usable report.
 */
export function parseFioReport(
	text: string,
	pattern: string | null,
	stage: RunStage = "running",
): FioOutput {
	let json: unknown;
	try {
		json = JSON.parse(text);
	} catch (err) {
		const message = err instanceof Error ? err.message : String(err);
		throw new BenchmarkExecutionError({
			pattern,
			message: `fio output is not valid JSON: ${message}`,
			stage,
			cause: err,
		});
	}

	const result = FioOutputSchema.safeParse(json);
	if (!result.success) {
		throw new BenchmarkExecutionError({
			pattern,
			message: `fio output has an unexpected shape:\n${formatIssues(result.error)}`,
			stage,
		});
	}

	return result.data;
}

// --- Metrics ---

function nsToMs(ns: number): number {
	return ns / NS_PER_MS;
}

function directionMetrics(
	stats: FioDirectionStats | undefined,
): DirectionMetrics | null {
	if (!stats || (stats.io_bytes === 0 && stats.iops === 0)) return null;

	const p99Ns =
		stats.clat_ns?.percentile?.[P99_KEY] ??
		stats.lat_ns.percentile?.[P99_KEY] ??
		0;

	return {
		iops: stats.iops,
		bandwidthKiBps: stats.bw,
		latAvgMs: nsToMs(stats.lat_ns.mean),
		latMaxMs: nsToMs(stats.lat_ns.max),
		latP99Ms: nsToMs(p99Ns),
	};
}

/**
 * Derives pattern metrics from a fio report.
 * With --group_reporting the first job entry holds the aggregated stats.
 */
export function summarizeFioOutput(output: FioOutput): PatternMetrics {
	const job = output.jobs[0];
	const read = directionMetrics(job?.read);
	const write = directionMetrics(job?.write);
	const active = [read, write].filter(
		(d): d is DirectionMetrics => d !== null,
	);

	const iops = active.reduce((sum, d) => sum + d.iops, 0);
	const bandwidthKiBps = active.reduce((sum, d) => sum + d.bandwidthKiBps, 0);

	let latAvgMs = 0;
	if (active.length > 0) {
		latAvgMs =
			iops > 0
				? active.reduce((sum, d) => sum + d.latAvgMs * d.iops, 0) / iops
				: active.reduce((sum, d) => sum + d.latAvgMs, 0) / active.length;
	}

	const latP99Ms = active.reduce((max, d) => Math.max(max, d.latP99Ms), 0);

	return { read, write, iops, bandwidthKiBps, latAvgMs, latP99Ms };
}
