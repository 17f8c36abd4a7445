import { ConfigurationError } from "@/errors";
import type { ParameterKey, ParameterSet } from "@/types/params";

// --- Types ---

/**
 * Parameter values given on the command line. Numbers are parsed but not yet
 * range-checked; the resolver validates the merged set.
 */
export type CliOverrides = {
	[K in ParameterKey]?: ParameterSet[K] extends number ? number : string;
};

/**
 * CLI configuration parsed from command-line arguments.
 */
export interface CliConfig {
	/** Parameter overrides, highest precedence */
	overrides: CliOverrides;
	/** Path to a JSON config file */
	configPath?: string;
	/** Print the fio command lines without running them */
	dryRun: boolean;
	/** Print usage and exit */
	help: boolean;
	/** Raw CLI arguments, recorded in the run metadata */
	args: string[];
}

// --- Usage ---

export function formatUsage(): string {
	return [
		"Usage:",
		"  rwmix-bench [options]",
		"",
		"Options:",
		"  --ioengine <name>            IO engine to use (default: libaio)",
		"  --direct <0|1>               Direct IO mode (default: 1)",
		"  --buffered <0|1>             Buffered IO mode (default: 0)",
		"  --blocksize <size>           Block size for IO operations (default: 4k)",
		"  --iodepth <n>                IO depth (default: 64)",
		"  --runtime <seconds>          Test duration per pattern (default: 300)",
		"  --numjobs <n>                Number of jobs (default: 1)",
		"  --filename <path>            Test file path (default: /tmp/testfile)",
		"  --file_size <size>           Test file size (default: 1G)",
		"  --base_results_dir <dir>     Results directory (default: ./results)",
		"  --latency_threshold <ms>     Latency threshold marked on charts (default: 1.0)",
		"  --config <path>              JSON config file (same keys plus `patterns`)",
		"  --dry-run                    Print the fio command lines without running them",
		"  --help, -h                   Show this help",
		"",
		"Precedence: command line > config file > built-in defaults.",
		"",
	].join("\n");
}

// --- Value Parsing ---

function parseInteger(flag: string, raw: string): number {
	if (!/^-?\d+$/.test(raw)) {
		throw new ConfigurationError(
			`--${flag} expects an integer, got "${raw}"`,
		);
	}
	return Number.parseInt(raw, 10);
}

function parseDecimal(flag: string, raw: string): number {
	const value = Number(raw);
	if (raw.trim() === "" || !Number.isFinite(value)) {
		throw new ConfigurationError(`--${flag} expects a number, got "${raw}"`);
	}
	return value;
}

// --- CLI Argument Parsing ---

/**
 * Parses command-line arguments into a CliConfig object.
 * Accepts both `--flag value` and `--flag=value`.
 */
export function parseCliArgs(argv: string[]): CliConfig {
	const args = argv.slice(2); // Remove 'node' and script path

	const config: CliConfig = {
		overrides: {},
		dryRun: false,
		help: false,
		args,
	};

	for (let i = 0; i < args.length; i++) {
		const arg = args[i];
		if (arg === undefined) continue;

		if (arg === "--help" || arg === "-h") {
			config.help = true;
			continue;
		}
		if (arg === "--dry-run") {
			config.dryRun = true;
			continue;
		}
		if (!arg.startsWith("--")) {
			throw new ConfigurationError(`Unexpected argument: ${arg}`);
		}

		const eq = arg.indexOf("=");
		const flag = eq === -1 ? arg.slice(2) : arg.slice(2, eq);

		const takeValue = (): string => {
			if (eq !== -1) return arg.slice(eq + 1);
			const next = args[i + 1];
			if (next === undefined || next.startsWith("--")) {
				throw new ConfigurationError(`--${flag} requires a value`);
			}
			i++;
			return next;
		};

		switch (flag) {
			case "config":
				config.configPath = takeValue();
				break;
			case "ioengine":
			case "blocksize":
			case "filename":
			case "file_size":
			case "base_results_dir":
				config.overrides[flag] = takeValue();
				break;
			case "direct":
			case "buffered":
			case "iodepth":
			case "runtime":
			case "numjobs":
				config.overrides[flag] = parseInteger(flag, takeValue());
				break;
			case "latency_threshold":
				config.overrides[flag] = parseDecimal(flag, takeValue());
				break;
			default:
				throw new ConfigurationError(`Unknown option: --${flag}`);
		}
	}

	return config;
}
