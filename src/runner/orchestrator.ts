import { join } from "node:path";
import { renderCharts } from "@/charts";
import {
	BUILTIN_DEFAULTS,
	type CliConfig,
	formatUsage,
	loadConfigFile,
	resolveConfig,
	writeConfigFile,
} from "@/config";
import { BenchmarkExecutionError } from "@/errors";
import type { ResolvedConfig } from "@/types/params";
import {
	type AggregatedResult,
	formatPatternMetrics,
	formatSummaryText,
	loadResults,
} from "./aggregator";
import {
	buildFioArgs,
	createFioRunner,
	getFioVersion,
	type PatternRunner,
	prepareTestFile,
	type RunResult,
} from "./fio";
import type { RunMetadata } from "./result-store";
import {
	createRunDir,
	logBasePath,
	writeRunMetadata,
	writeSummary,
} from "./result-store";

// --- Types ---

/** Renders the charts of a completed run; returns the written file paths. */
export type ChartRenderer = (
	runDir: string,
	results: AggregatedResult[],
	latencyThresholdMs: number,
) => Promise<string[]>;

export interface BenchmarkOptions {
	config: ResolvedConfig;
	/** Runs one pattern (default: fio via createFioRunner) */
	runner?: PatternRunner;
	/** Chart renderer (default: renderCharts) */
	render?: ChartRenderer;
	/** Aborting stops the run and kills the in-flight fio process */
	signal?: AbortSignal;
	/** Recorded in run-meta.json */
	fioVersion?: string;
	/** Recorded in run-meta.json */
	cliArgs?: string[];
	/** Clock used for the results directory name */
	now?: Date;
}

export interface BenchmarkReport {
	runDir: string;
	runs: RunResult[];
	results: AggregatedResult[];
	charts: string[];
}

// --- Progress Logger ---

/**
 * Tracks completed patterns and estimates the remaining time.
 */
export class ProgressLogger {
	private completed = 0;
	private readonly total: number;
	private readonly startTime: number;

	constructor(total: number) {
		this.total = total;
		this.startTime = Date.now();
	}

	/**
	 * Logs progress for a completed pattern.
	 */
	log(pattern: string, durationMs: number): void {
		this.completed++;

		const elapsed = Date.now() - this.startTime;
		const eta = this.estimateEta(elapsed);

		console.log(
			`[${this.completed}/${this.total}] Pattern: ${pattern} | Took: ${formatDuration(durationMs)} | Elapsed: ${formatDuration(elapsed)} | ETA: ${eta}`,
		);
	}

	/**
	 * Patterns share the same runtime, so the mean so far predicts the rest.
	 */
	private estimateEta(elapsed: number): string {
		if (this.completed === 0) return "calculating...";
		const remaining = this.total - this.completed;
		return formatDuration((elapsed / this.completed) * remaining);
	}

	getCompleted(): number {
		return this.completed;
	}
}

/**
 * Formats milliseconds into a human-readable duration string.
 */
export function formatDuration(ms: number): string {
	if (ms < 1000) return `${Math.round(ms)}ms`;

	const seconds = Math.floor(ms / 1000);
	const minutes = Math.floor(seconds / 60);
	const hours = Math.floor(minutes / 60);

	if (hours > 0) {
		return `${hours}h${(minutes % 60).toString().padStart(2, "0")}m`;
	}
	if (minutes > 0) {
		return `${minutes}m${(seconds % 60).toString().padStart(2, "0")}s`;
	}
	return `${seconds}s`;
}

// --- Dry Run ---

/**
 * Formats the fio command line of every pattern without running anything.
 */
export function formatExecutionPlan(config: ResolvedConfig): string {
	const runDir = join(config.params.base_results_dir, "run_<timestamp>");
	const lines = ["--- Execution Plan (Dry Run) ---", ""];

	config.patterns.forEach((pattern, i) => {
		const args = buildFioArgs(
			config.params,
			pattern,
			logBasePath(runDir, pattern.name),
		);
		lines.push(`  ${(i + 1).toString().padStart(2)}. ${pattern.name}`);
		lines.push(`      fio ${args.join(" ")}`);
	});

	lines.push("", `Total: ${config.patterns.length} pattern(s)`);
	return lines.join("\n");
}

// --- Main Orchestrator ---

function interruptedError(pattern: string | null): BenchmarkExecutionError {
	return new BenchmarkExecutionError({
		pattern,
		message: "interrupted",
		interrupted: true,
	});
}

/**
 * Runs every pattern in order, then aggregates the results and renders the
 * charts.
 *
 * States: running(pattern_i) → aggregating → rendering → done. The first
 * failure marks the run failed (or interrupted) in run-meta.json and is
 * rethrown; later patterns never run and no chart is rendered.
 */
export async function runBenchmark(
	options: BenchmarkOptions,
): Promise<BenchmarkReport> {
	const { config, signal } = options;
	const { params, patterns } = config;
	const runner = options.runner ?? createFioRunner();
	const render = options.render ?? renderCharts;

	// Create results directory and snapshot the effective config
	const runDir = await createRunDir(params.base_results_dir, options.now);
	console.log(`Results directory: ${runDir}`);
	await writeConfigFile(join(runDir, "config.json"), config);

	const metadata: RunMetadata = {
		startTime: new Date().toISOString(),
		endTime: "",
		state: "running",
		currentPattern: null,
		completedPatterns: [],
		totalPatterns: patterns.length,
		fioVersion: options.fioVersion ?? "unknown",
		cliArgs: options.cliArgs ?? [],
	};
	await writeRunMetadata(runDir, metadata);

	const progress = new ProgressLogger(patterns.length);
	const runs: RunResult[] = [];

	try {
		for (const pattern of patterns) {
			if (signal?.aborted) throw interruptedError(pattern.name);

			metadata.currentPattern = pattern.name;
			await writeRunMetadata(runDir, metadata);

			console.log(`\n=== Running pattern ${pattern.name} ===`);
			const result = await runner(pattern, params, { runDir, signal });
			runs.push(result);
			metadata.completedPatterns.push(pattern.name);

			progress.log(pattern.name, result.durationMs);
			console.log(formatPatternMetrics(result.metrics));
		}

		metadata.currentPattern = null;
		metadata.state = "aggregating";
		await writeRunMetadata(runDir, metadata);

		const results = await loadResults(
			runDir,
			patterns.map((p) => p.name),
		);
		await writeSummary(runDir, results, params.latency_threshold);
		console.log(`\n${formatSummaryText(results, params.latency_threshold)}`);

		metadata.state = "rendering";
		await writeRunMetadata(runDir, metadata);

		console.log("\nRendering charts...");
		const charts = await render(runDir, results, params.latency_threshold);

		metadata.state = "done";
		metadata.endTime = new Date().toISOString();
		await writeRunMetadata(runDir, metadata);

		console.log(`\n=== Benchmark complete ===`);
		console.log(`All results saved in ${runDir}`);

		return { runDir, runs, results, charts };
	} catch (err) {
		const interrupted =
			err instanceof BenchmarkExecutionError && err.interrupted;
		metadata.state = interrupted ? "interrupted" : "failed";
		metadata.endTime = new Date().toISOString();
		metadata.error = err instanceof Error ? err.message : String(err);
		try {
			await writeRunMetadata(runDir, metadata);
		} catch (writeErr) {
			const message =
				writeErr instanceof Error ? writeErr.message : String(writeErr);
			console.warn(`  ! Could not update run metadata: ${message}`);
		}
		throw err;
	}
}

// --- CLI Entry ---

export interface CliDependencies {
	runner?: PatternRunner;
	render?: ChartRenderer;
	/** Returns the fio version, or null when fio is unavailable */
	fioVersion?: () => Promise<string | null>;
}

/**
 * Resolves the configuration from CLI flags and the optional config file,
 * checks the environment, and runs the benchmark with SIGINT/SIGTERM wired to
 * abort the in-flight fio process. Returns the process exit code.
 */
export async function runFromCli(
	cli: CliConfig,
	deps: CliDependencies = {},
): Promise<number> {
	if (cli.help) {
		console.log(formatUsage());
		return 0;
	}

	const fileConfig = cli.configPath
		? await loadConfigFile(cli.configPath)
		: null;
	const config = resolveConfig(BUILTIN_DEFAULTS, fileConfig, cli.overrides);

	console.log("=== Disk performance test ===");
	console.log("Configuration:");
	for (const [key, value] of Object.entries(config.params)) {
		console.log(`  ${key}: ${value}`);
	}
	console.log(`  patterns: ${config.patterns.map((p) => p.name).join(", ")}`);

	if (cli.dryRun) {
		console.log(`\n${formatExecutionPlan(config)}`);
		return 0;
	}

	const fioVersion = await (deps.fioVersion ?? (() => getFioVersion()))();
	if (fioVersion === null) {
		throw new BenchmarkExecutionError({
			pattern: null,
			message: "fio not found on PATH. Install it first (e.g. apt install fio)",
		});
	}
	console.log(`fio version: ${fioVersion}`);

	if (await prepareTestFile(config.params.filename)) {
		console.log(`Removed stale test file ${config.params.filename}`);
	}

	const controller = new AbortController();
	const handleSignal = () => {
		if (controller.signal.aborted) return; // Prevent double handling
		console.log("\n\nInterrupted! Stopping fio...");
		controller.abort();
	};

	process.on("SIGINT", handleSignal);
	process.on("SIGTERM", handleSignal);

	try {
		await runBenchmark({
			config,
			runner: deps.runner,
			render: deps.render,
			signal: controller.signal,
			fioVersion,
			cliArgs: cli.args,
		});
		return 0;
	} finally {
		process.off("SIGINT", handleSignal);
		process.off("SIGTERM", handleSignal);
	}
}
