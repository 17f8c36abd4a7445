import type { FioProcessOutput } from "../fio";
import type { PatternMetrics } from "../fio-report";

// --- fio Report Fixtures ---

export interface DirectionFixture {
	iops: number;
	bwKiBps: number;
	latMeanMs: number;
	latMaxMs?: number;
	p99Ms?: number;
}

const MS = 1_000_000;

function directionStats(d: DirectionFixture | null) {
	if (d === null) {
		return {
			io_bytes: 0,
			bw: 0,
			iops: 0,
			lat_ns: { min: 0, max: 0, mean: 0, stddev: 0, N: 0 },
			clat_ns: { min: 0, max: 0, mean: 0, stddev: 0, N: 0 },
		};
	}
	return {
		io_bytes: Math.round(d.iops * 4096 * 60),
		bw: d.bwKiBps,
		iops: d.iops,
		runtime: 60000,
		lat_ns: {
			min: 20_000,
			max: (d.latMaxMs ?? d.latMeanMs * 4) * MS,
			mean: d.latMeanMs * MS,
			stddev: 1000,
			N: Math.round(d.iops * 60),
		},
		clat_ns: {
			min: 18_000,
			max: (d.latMaxMs ?? d.latMeanMs * 4) * MS,
			mean: d.latMeanMs * MS,
			stddev: 1000,
			N: Math.round(d.iops * 60),
			percentile: {
				"50.000000": d.latMeanMs * MS,
				"99.000000": (d.p99Ms ?? d.latMeanMs * 2) * MS,
				"99.900000": (d.latMaxMs ?? d.latMeanMs * 4) * MS,
			},
		},
	};
}

/**
 * Builds a fio --output-format=json report with one group-reported job.
 */
export function makeFioReport(
	pattern: string,
	read: DirectionFixture | null,
	write: DirectionFixture | null,
) {
	return {
		"fio version": "fio-3.36",
		timestamp: 1760000000,
		jobs: [
			{
				jobname: pattern,
				groupid: 0,
				error: 0,
				read: directionStats(read),
				write: directionStats(write),
				trim: directionStats(null),
			},
		],
	};
}

/**
 * A report whose only active direction is read with the given mean latency.
 */
export function readOnlyReport(pattern: string, latMeanMs: number) {
	return makeFioReport(
		pattern,
		{ iops: 1000, bwKiBps: 4000, latMeanMs },
		null,
	);
}

/** A successful fio process whose stdout carries the given report. */
export function processOutput(report: unknown): FioProcessOutput {
	return {
		exitCode: 0,
		signal: null,
		stdout: JSON.stringify(report, null, 2),
		stderr: "",
	};
}

/** Metrics for a pattern that only reads. */
export function readMetrics(latAvgMs: number, latP99Ms: number, iops = 1000): PatternMetrics {
	const read = {
		iops,
		bandwidthKiBps: iops * 4,
		latAvgMs,
		latMaxMs: latP99Ms * 2,
		latP99Ms,
	};
	return {
		read,
		write: null,
		iops,
		bandwidthKiBps: read.bandwidthKiBps,
		latAvgMs,
		latP99Ms,
	};
}
