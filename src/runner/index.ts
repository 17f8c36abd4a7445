export type { AggregatedResult } from "./aggregator";
export {
	formatPatternMetrics,
	formatSummaryText,
	loadResults,
} from "./aggregator";
export type {
	FioExecutor,
	FioProcessOutput,
	FioRunnerConfig,
	FioSpawnOptions,
	PatternRunContext,
	PatternRunner,
	ProgressReporter,
	ProgressStream,
	RunResult,
} from "./fio";
export {
	buildFioArgs,
	createConsoleProgress,
	createFioRunner,
	getFioVersion,
	prepareTestFile,
	spawnFio,
} from "./fio";
export type { DirectionMetrics, PatternMetrics } from "./fio-report";
export {
	extractFioJson,
	parseFioReport,
	summarizeFioOutput,
} from "./fio-report";
export type {
	BenchmarkOptions,
	BenchmarkReport,
	ChartRenderer,
	CliDependencies,
} from "./orchestrator";
export {
	formatDuration,
	formatExecutionPlan,
	ProgressLogger,
	runBenchmark,
	runFromCli,
} from "./orchestrator";
export type { RunMetadata, RunState } from "./result-store";
export {
	createRunDir,
	formatRunTimestamp,
	logBasePath,
	resultFilePath,
	storeResult,
	writeRunMetadata,
	writeSummary,
} from "./result-store";
