import { spawn } from "node:child_process";
import { lstat, rm } from "node:fs/promises";
import { BenchmarkExecutionError, isErrnoException } from "@/errors";
import type { FioOutput } from "@/types/fio";
import type { ParameterSet, Pattern } from "@/types/params";
import {
	extractFioJson,
	type PatternMetrics,
	parseFioReport,
	summarizeFioOutput,
} from "./fio-report";
import { logBasePath, storeResult } from "./result-store";

// --- Types ---

/** Captured result of one fio process. */
export interface FioProcessOutput {
	/** Exit code, null when the process was killed by a signal */
	exitCode: number | null;
	/** Signal that terminated the process, if any */
	signal: NodeJS.Signals | null;
	stdout: string;
	stderr: string;
}

export interface FioSpawnOptions {
	/** Aborting kills the child process */
	signal?: AbortSignal;
	/** fio executable (default: "fio" from PATH) */
	binary?: string;
}

/**
 * Starts fio with the given arguments and resolves once it exits.
 * Rejects only when the process cannot be started or is aborted.
 */
export type FioExecutor = (
	args: readonly string[],
	options: FioSpawnOptions,
) => Promise<FioProcessOutput>;

/** Per-run context handed to a pattern runner. */
export interface PatternRunContext {
	/** Directory receiving the result file and fio logs */
	runDir: string;
	/** Aborting kills the in-flight fio process */
	signal?: AbortSignal;
}

/** Output of one pattern run. Never mutated after the result file is written. */
export interface RunResult {
	pattern: string;
	/** Path of the stored raw fio report */
	resultFile: string;
	durationMs: number;
	output: FioOutput;
	metrics: PatternMetrics;
}

/**
 * Runs one pattern to completion. This is the only seam between the
 * orchestrator and the child process, so tests swap it for a fake.
 */
export type PatternRunner = (
	pattern: Pattern,
	params: Readonly<ParameterSet>,
	context: PatternRunContext,
) => Promise<RunResult>;

/** Receives the elapsed and planned seconds of the running pattern. */
export interface ProgressReporter {
	update(elapsedS: number, totalS: number): void;
	/** Called once when fio exits, whatever the outcome */
	finish(): void;
}

export interface FioRunnerConfig {
	/** Process launcher (default: spawnFio) */
	execute?: FioExecutor;
	/** fio executable (default: "fio") */
	binary?: string;
	/** Progress output while fio runs (default: createConsoleProgress()); null disables it */
	progress?: ProgressReporter | null;
	/** Ticker period (default: 1000) */
	progressIntervalMs?: number;
}

// --- Constants ---

const DEFAULT_BINARY = "fio";
const STDERR_EXCERPT_LENGTH = 500;
const PROGRESS_INTERVAL_MS = 1000;
/** Without a terminal the progress line is logged this often instead of redrawn. */
const PLAIN_PROGRESS_EVERY_S = 30;

// --- Argument Building ---

/**
 * Builds the fio argument list for one pattern.
 *
 * `--name` and `--filename` come first, then the global parameters, then the
 * pattern's overrides (which replace a global option of the same name in
 * place), then the options the runner owns.
 */
export function buildFioArgs(
	params: Readonly<ParameterSet>,
	pattern: Pattern,
	logBase: string,
): string[] {
	const options = new Map<string, string | number>([
		["ioengine", params.ioengine],
		["direct", params.direct],
		["buffered", params.buffered],
		["bs", params.blocksize],
		["iodepth", params.iodepth],
		["size", params.file_size],
		["runtime", params.runtime],
		["numjobs", params.numjobs],
	]);

	for (const [key, value] of Object.entries(pattern.overrides)) {
		options.set(key, value);
	}

	return [
		`--name=${pattern.name}`,
		`--filename=${params.filename}`,
		...[...options].map(([key, value]) => `--${key}=${value}`),
		"--time_based",
		"--group_reporting",
		"--norandommap",
		"--output-format=json",
		`--write_iops_log=${logBase}`,
		`--write_lat_log=${logBase}`,
		"--log_avg_msec=1000",
	];
}

// --- Process Execution ---

/**
 * Spawns fio and collects stdout and stderr.
 */
export function spawnFio(
	args: readonly string[],
	options: FioSpawnOptions,
): Promise<FioProcessOutput> {
	return new Promise((resolve, reject) => {
		const proc = spawn(options.binary ?? DEFAULT_BINARY, args, {
			stdio: ["ignore", "pipe", "pipe"],
			signal: options.signal,
		});

		let stdout = "";
		let stderr = "";

		proc.stdout.setEncoding("utf-8");
		proc.stderr.setEncoding("utf-8");
		proc.stdout.on("data", (chunk: string) => {
			stdout += chunk;
		});
		proc.stderr.on("data", (chunk: string) => {
			stderr += chunk;
		});

		// ENOENT when fio is not installed, AbortError when the signal fires
		proc.on("error", reject);
		proc.on("close", (exitCode, signal) => {
			resolve({ exitCode, signal, stdout, stderr });
		});
	});
}

/**
 * Returns the output of `fio --version`, or null if fio is not on PATH.
 */
export async function getFioVersion(
	execute: FioExecutor = spawnFio,
	binary: string = DEFAULT_BINARY,
): Promise<string | null> {
	try {
		const result = await execute(["--version"], { binary });
		if (result.exitCode !== 0) return null;
		return result.stdout.trim() || null;
	} catch {
		return null;
	}
}

/**
 * Removes a stale test file left by a previous run so fio lays it out afresh.
 * Only regular files are removed; devices and directories are left alone.
 * Returns true when a file was removed.
 */
export async function prepareTestFile(filename: string): Promise<boolean> {
	try {
		const stats = await lstat(filename);
		if (!stats.isFile()) return false;
	} catch (err) {
		if (isErrnoException(err) && err.code === "ENOENT") return false;
		throw err;
	}

	await rm(filename, { force: true });
	return true;
}

// --- Progress ---

/** Minimal writable the console progress reporter draws on. */
export interface ProgressStream {
	isTTY?: boolean;
	write(text: string): unknown;
}

/**
 * Prints `Progress: <elapsed>/<total> s`. On a terminal the line is redrawn in
 * place every tick; otherwise a plain line is logged every 30 seconds.
 */
export function createConsoleProgress(
	stream: ProgressStream = process.stdout,
): ProgressReporter {
	let drawn = false;

	return {
		update(elapsedS, totalS) {
			const line = `  Progress: ${elapsedS}/${totalS} s`;
			if (stream.isTTY) {
				stream.write(`\r${line}`);
				drawn = true;
			} else if (elapsedS > 0 && elapsedS % PLAIN_PROGRESS_EVERY_S === 0) {
				stream.write(`${line}\n`);
			}
		},
		finish() {
			if (drawn) stream.write("\n");
			drawn = false;
		},
	};
}

function excerpt(text: string): string {
	const trimmed = text.trim();
	if (trimmed.length <= STDERR_EXCERPT_LENGTH) return trimmed;
	return `${trimmed.slice(0, STDERR_EXCERPT_LENGTH)}...`;
}

// --- Pattern Runner ---

/**
 * Creates the PatternRunner that invokes fio.
 *
 * Steps per pattern:
 * 1. Build the argument list (global parameters + pattern overrides)
 * 2. Run fio and wait for it to exit, reporting progress every second
 * 3. Fail on spawn error, abort, non-zero exit or unparseable output
 * 4. Store the raw JSON report as result_{pattern}.json
 */
export function createFioRunner(config: FioRunnerConfig = {}): PatternRunner {
	const execute = config.execute ?? spawnFio;
	const binary = config.binary ?? DEFAULT_BINARY;
	const progress =
		config.progress === undefined ? createConsoleProgress() : config.progress;
	const intervalMs = config.progressIntervalMs ?? PROGRESS_INTERVAL_MS;

	return async (pattern, params, context) => {
		const args = buildFioArgs(
			params,
			pattern,
			logBasePath(context.runDir, pattern.name),
		);
		const startTime = Date.now();

		const ticker = progress
			? setInterval(() => {
					const elapsedS = Math.floor((Date.now() - startTime) / 1000);
					progress.update(elapsedS, params.runtime);
				}, intervalMs)
			: null;

		let proc: FioProcessOutput;
		try {
			proc = await execute(args, { signal: context.signal, binary });
		} catch (err) {
			if (context.signal?.aborted) {
				throw new BenchmarkExecutionError({
					pattern: pattern.name,
					message: "interrupted; fio was terminated",
					interrupted: true,
					cause: err,
				});
			}
			const message = err instanceof Error ? err.message : String(err);
			throw new BenchmarkExecutionError({
				pattern: pattern.name,
				message: `failed to start ${binary}: ${message}`,
				cause: err,
			});
		} finally {
			if (ticker) clearInterval(ticker);
			progress?.finish();
		}

		if (context.signal?.aborted) {
			throw new BenchmarkExecutionError({
				pattern: pattern.name,
				message: "interrupted; fio was terminated",
				exitCode: proc.exitCode,
				interrupted: true,
			});
		}

		if (proc.exitCode !== 0) {
			const reason =
				proc.exitCode === null
					? `fio was killed by ${proc.signal ?? "a signal"}`
					: `fio exited with code ${proc.exitCode}`;
			const stderr = excerpt(proc.stderr);
			throw new BenchmarkExecutionError({
				pattern: pattern.name,
				message: stderr ? `${reason}: ${stderr}` : reason,
				exitCode: proc.exitCode,
				stderr,
			});
		}

		const reportJson = extractFioJson(proc.stdout);
		if (reportJson === null) {
			throw new BenchmarkExecutionError({
				pattern: pattern.name,
				message: `fio produced no JSON report. stdout: ${excerpt(proc.stdout)}`,
				exitCode: proc.exitCode,
				stderr: excerpt(proc.stderr),
			});
		}

		const output = parseFioReport(reportJson, pattern.name);
		const resultFile = await storeResult(
			context.runDir,
			pattern.name,
			reportJson,
		);

		return {
			pattern: pattern.name,
			resultFile,
			durationMs: Date.now() - startTime,
			output,
			metrics: summarizeFioOutput(output),
		};
	};
}
