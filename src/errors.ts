// --- Base Error ---

/** Pipeline stage in which an error was raised. */
export type RunStage = "configuring" | "running" | "aggregating" | "rendering";

/**
 * Base error class for all benchmark errors.
 *
 * Every subclass sets the stage it belongs to, so the entry point can report
 * where the run stopped without inspecting the concrete class.
 *
 * @example
 * ```typescript
 * try {
 *   await runBenchmark(options);
 * } catch (error) {
 *   if (error instanceof BenchmarkExecutionError) {
 *     console.error(error.pattern, error.exitCode);
 *   }
 * }
 * ```
 */
export class BenchmarkError extends Error {
	readonly stage: RunStage;

	constructor(stage: RunStage, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
		this.stage = stage;
	}
}

// --- Error Categories ---

/**
 * Thrown when parameters are missing, malformed or inconsistent, or when the
 * config file cannot be read or validated.
 */
export class ConfigurationError extends BenchmarkError {
	constructor(message: string, options?: { cause?: unknown }) {
		super("configuring", message, options);
	}
}

/**
 * Thrown when fio cannot be started, exits non-zero, is interrupted, or
 * produces output that is not a valid fio JSON report. A report that turns
 * out unreadable when results are read back carries stage `aggregating`.
 */
export class BenchmarkExecutionError extends BenchmarkError {
	readonly pattern: string | null;
	readonly exitCode: number | null;
	readonly stderr: string;
	readonly interrupted: boolean;

	constructor(params: {
		pattern: string | null;
		message: string;
		exitCode?: number | null;
		stderr?: string;
		interrupted?: boolean;
		stage?: RunStage;
		cause?: unknown;
	}) {
		const prefix = params.pattern ? `Pattern "${params.pattern}": ` : "";
		super(params.stage ?? "running", `${prefix}${params.message}`, {
			cause: params.cause,
		});
		this.pattern = params.pattern;
		this.exitCode = params.exitCode ?? null;
		this.stderr = params.stderr ?? "";
		this.interrupted = params.interrupted ?? false;
	}
}

/** Thrown when an expected result file is absent at aggregation time. */
export class MissingResultError extends BenchmarkError {
	readonly pattern: string;
	readonly filePath: string;

	constructor(params: { pattern: string; filePath: string }) {
		super(
			"aggregating",
			`Result for pattern "${params.pattern}" not found: ${params.filePath}`,
		);
		this.pattern = params.pattern;
		this.filePath = params.filePath;
	}
}

/** Thrown when the charting library fails to compile, render or save a chart. */
export class RenderError extends BenchmarkError {
	readonly chart: string;

	constructor(params: { chart: string; message: string; cause?: unknown }) {
		super("rendering", `Chart "${params.chart}": ${params.message}`, {
			cause: params.cause,
		});
		this.chart = params.chart;
	}
}

// --- Helpers ---

/** Exit code for a failed run: 130 when interrupted, 2 for usage errors, else 1. */
export function exitCodeFor(error: unknown): number {
	if (error instanceof BenchmarkExecutionError && error.interrupted) return 130;
	if (error instanceof ConfigurationError) return 2;
	return 1;
}

/** Formats an error for the final console line. */
export function describeError(error: unknown): string {
	if (error instanceof BenchmarkError) {
		return `Error [${error.stage}]: ${error.message}`;
	}
	const message = error instanceof Error ? error.message : String(error);
	return `Error: ${message}`;
}

/** Narrows a caught value to a Node.js system error carrying a `code`. */
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
	return err instanceof Error && "code" in err;
}
