import { mkdir, rename, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { isErrnoException } from "@/errors";
import type { AggregatedResult } from "./aggregator";

// --- Types ---

/** Lifecycle state of a run, as recorded in run-meta.json. */
export type RunState =
	| "configuring"
	| "running"
	| "aggregating"
	| "rendering"
	| "done"
	| "failed"
	| "interrupted";

/**
 * Metadata about a benchmark run.
 */
export interface RunMetadata {
	/** ISO timestamp when the run started */
	startTime: string;
	/** ISO timestamp when the run ended (empty while running) */
	endTime: string;
	/** Current state of the run */
	state: RunState;
	/** Pattern being run, null outside the running state */
	currentPattern: string | null;
	/** Patterns that completed, in run order */
	completedPatterns: string[];
	/** Number of patterns in the run */
	totalPatterns: number;
	/** fio --version output */
	fioVersion: string;
	/** Raw CLI arguments */
	cliArgs: string[];
	/** Error message when the run failed or was interrupted */
	error?: string;
}

// --- Paths ---

/**
 * Formats a date as YYYYMMDD_HHMMSS in local time.
 */
export function formatRunTimestamp(date: Date): string {
	const pad = (n: number) => n.toString().padStart(2, "0");
	return (
		`${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
		`_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
	);
}

/** Path of the raw fio JSON report for a pattern. */
export function resultFilePath(runDir: string, pattern: string): string {
	return join(runDir, `result_${pattern}.json`);
}

/**
 * Base path passed to fio's --write_iops_log/--write_lat_log. fio appends
 * `_iops.<job>.log` and `_lat.<job>.log`.
 */
export function logBasePath(runDir: string, pattern: string): string {
	return join(runDir, `result_${pattern}`);
}

// --- Functions ---

/**
 * Creates the results directory for a new run and returns its path.
 *
 * Structure: {baseDir}/run_{YYYYMMDD_HHMMSS}/
 *
 * A second run started within the same second gets a numeric suffix rather
 * than sharing the directory.
 */
export async function createRunDir(
	baseDir: string,
	now: Date = new Date(),
): Promise<string> {
	await mkdir(baseDir, { recursive: true });

	const stem = join(baseDir, `run_${formatRunTimestamp(now)}`);
	for (let attempt = 1; ; attempt++) {
		const runDir = attempt === 1 ? stem : `${stem}_${attempt}`;
		try {
			await mkdir(runDir);
			return runDir;
		} catch (err) {
			if (isErrnoException(err) && err.code === "EEXIST") continue;
			throw err;
		}
	}
}

/**
 * Stores the raw fio report for a pattern.
 *
 * Path: {runDir}/result_{pattern}.json
 *
 * Uses atomic write (write to temp file, then rename) so an interrupted run
 * never leaves a truncated report behind.
 */
export async function storeResult(
	runDir: string,
	pattern: string,
	reportJson: string,
): Promise<string> {
	const filePath = resultFilePath(runDir, pattern);
	const tempPath = `${filePath}.tmp`;

	await writeFile(tempPath, `${reportJson}\n`, "utf-8");
	await rename(tempPath, filePath);

	return filePath;
}

/**
 * Writes or updates the run metadata file.
 *
 * Path: {runDir}/run-meta.json
 */
export async function writeRunMetadata(
	runDir: string,
	metadata: RunMetadata,
): Promise<void> {
	const filePath = join(runDir, "run-meta.json");
	const tempPath = `${filePath}.tmp`;

	const json = JSON.stringify(metadata, null, 2);
	await writeFile(tempPath, json, "utf-8");
	await rename(tempPath, filePath);
}

/**
 * Writes the aggregated metrics for all patterns.
 *
 * Path: {runDir}/summary.json
 */
export async function writeSummary(
	runDir: string,
	results: AggregatedResult[],
	latencyThresholdMs: number,
): Promise<string> {
	const filePath = join(runDir, "summary.json");
	const tempPath = `${filePath}.tmp`;

	const json = JSON.stringify({ latencyThresholdMs, results }, null, 2);
	await writeFile(tempPath, json, "utf-8");
	await rename(tempPath, filePath);

	return filePath;
}
