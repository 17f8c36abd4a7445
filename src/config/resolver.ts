import { ConfigurationError } from "@/errors";
import { formatIssues } from "@/types/issues";
import {
	type ConfigFile,
	DEFAULT_PARAMS,
	DEFAULT_PATTERNS,
	PARAMETER_KEYS,
	type ParameterKey,
	type ParameterSet,
	ParameterSetSchema,
	type Pattern,
	type PatternEntry,
	type ResolvedConfig,
} from "@/types/params";
import type { CliOverrides } from "./cli";

// --- Types ---

/** Lowest-precedence layer of the merge. */
export interface ConfigDefaults {
	params: Partial<ParameterSet>;
	patterns: readonly Pattern[];
}

export const BUILTIN_DEFAULTS: ConfigDefaults = {
	params: DEFAULT_PARAMS,
	patterns: DEFAULT_PATTERNS,
};

/**
 * fio options the runner sets itself. A pattern that overrides one of these
 * would redirect the output or the test file away from the run directory.
 */
export const RESERVED_OVERRIDE_KEYS: ReadonlySet<string> = new Set([
	"name",
	"filename",
	"output",
	"output-format",
	"write_iops_log",
	"write_lat_log",
	"log_avg_msec",
]);

// --- Resolution ---

/**
 * Merges defaults, config file values and CLI overrides into one validated,
 * frozen configuration.
 *
 * Each parameter is taken from the CLI if given, else from the config file,
 * else from the defaults. Patterns come from the config file when it lists
 * any, else from the defaults.
 */
export function resolveConfig(
	defaults: ConfigDefaults,
	fileConfig: ConfigFile | null,
	cli: CliOverrides,
): ResolvedConfig {
	const merged: Partial<Record<ParameterKey, string | number>> = {};
	const missing: ParameterKey[] = [];

	for (const key of PARAMETER_KEYS) {
		const value = cli[key] ?? fileConfig?.[key] ?? defaults.params[key];
		if (value === undefined) {
			missing.push(key);
		} else {
			merged[key] = value;
		}
	}

	if (missing.length > 0) {
		throw new ConfigurationError(
			`Missing required parameter(s): ${missing.join(", ")}`,
		);
	}

	const parsed = ParameterSetSchema.safeParse(merged);
	if (!parsed.success) {
		throw new ConfigurationError(
			`Invalid parameters:\n${formatIssues(parsed.error)}`,
		);
	}
	const params = parsed.data;

	// fio's buffered is the inverse of direct; equal values leave the mode ambiguous
	if (params.direct === params.buffered) {
		throw new ConfigurationError(
			`Inconsistent IO mode: direct=${params.direct} and buffered=${params.buffered}; set exactly one of them to 1`,
		);
	}

	const patterns: readonly Pattern[] = fileConfig?.patterns
		? fileConfig.patterns.map(([name, overrides]) => ({ name, overrides }))
		: defaults.patterns;

	validatePatterns(patterns);

	return {
		params: Object.freeze(params),
		patterns: Object.freeze(
			patterns.map((p) =>
				Object.freeze({
					name: p.name,
					overrides: Object.freeze({ ...p.overrides }),
				}),
			),
		),
	};
}

function validatePatterns(patterns: readonly Pattern[]): void {
	if (patterns.length === 0) {
		throw new ConfigurationError("At least one pattern is required");
	}

	const seen = new Set<string>();
	for (const pattern of patterns) {
		if (seen.has(pattern.name)) {
			throw new ConfigurationError(
				`Duplicate pattern name "${pattern.name}"; each pattern writes its own result file`,
			);
		}
		seen.add(pattern.name);

		const reserved = Object.keys(pattern.overrides).filter((key) =>
			RESERVED_OVERRIDE_KEYS.has(key),
		);
		if (reserved.length > 0) {
			throw new ConfigurationError(
				`Pattern "${pattern.name}" overrides reserved option(s): ${reserved.join(", ")}`,
			);
		}
	}
}

// --- Serialization ---

/**
 * Converts a resolved config back into the config-file shape.
 */
export function toConfigFile(config: ResolvedConfig): ConfigFile {
	return {
		...config.params,
		patterns: config.patterns.map((p): PatternEntry => [
			p.name,
			{ ...p.overrides },
		]),
	};
}
