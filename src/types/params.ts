import { z } from "zod";

// --- Scalar Schemas ---

const SIZE = String.raw`\d+(\.\d+)?([kmgtp]i?)?b?`;
const SIZE_OR_RANGE = `${SIZE}(-${SIZE})?`;

/**
 * fio block size: a size (`4k`), a range (`4k-16k`), or up to three
 * comma-separated read,write,trim values where an empty slot keeps fio's
 * default (`4k,16k`, `,8k`).
 */
export const BlockSizeSchema = z
	.string()
	.regex(
		new RegExp(`^(${SIZE_OR_RANGE})?(,(${SIZE_OR_RANGE})?){0,2}$`, "i"),
		"expected a block size such as 4k, 4k-16k or 4k,16k",
	)
	.refine((value) => /\d/.test(value), "expected at least one block size");

/** fio file size: a size (`1G`) or a share of the device or file system (`50%`). */
export const FileSizeSchema = z
	.string()
	.regex(
		new RegExp(`^(${SIZE}|\\d+(\\.\\d+)?%)$`, "i"),
		"expected a size such as 512, 4k, 1G or 50%",
	);

const BinaryFlagSchema = z.union([z.literal(0), z.literal(1)]);

const PositiveIntSchema = z.number().int().positive();

// --- Parameter Set Schema ---

export const ParameterSetSchema = z
	.object({
		ioengine: z.string().min(1),
		direct: BinaryFlagSchema,
		buffered: BinaryFlagSchema,
		blocksize: BlockSizeSchema,
		iodepth: PositiveIntSchema,
		runtime: PositiveIntSchema,
		numjobs: PositiveIntSchema,
		filename: z.string().min(1),
		file_size: FileSizeSchema,
		base_results_dir: z.string().min(1),
		latency_threshold: z.number().positive().finite(),
	})
	.strict();

/** Ordered list of every parameter name, derived from the schema. */
export const PARAMETER_KEYS = ParameterSetSchema.keyof().options;

// --- Pattern Schemas ---

export const PatternNameSchema = z
	.string()
	.regex(
		/^[A-Za-z0-9._-]+$/,
		"pattern names may only contain letters, digits, '.', '_' and '-'",
	);

export const OverrideKeySchema = z
	.string()
	.regex(/^[a-z][a-z0-9_-]*$/, "expected a fio option name such as rwmixread");

export const OverridesSchema = z.record(
	OverrideKeySchema,
	z.union([z.string(), z.number()]),
);

/** A pattern as written in the config file: `[name, overrides]`. */
export const PatternEntrySchema = z.tuple([PatternNameSchema, OverridesSchema]);

// --- Config File Schema ---

export const ConfigFileSchema = ParameterSetSchema.partial()
	.extend({
		patterns: z.array(PatternEntrySchema).min(1).optional(),
	})
	.strict();

// --- Inferred TypeScript types ---

export type ParameterSet = z.infer<typeof ParameterSetSchema>;
export type ParameterKey = (typeof PARAMETER_KEYS)[number];
export type Overrides = z.infer<typeof OverridesSchema>;
export type PatternEntry = z.infer<typeof PatternEntrySchema>;
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/** A named read/write mix applied in one fio run. */
export interface Pattern {
	name: string;
	/** fio options for this pattern; they replace global options of the same name */
	overrides: Overrides;
}

/** Fully merged and validated configuration for one run. */
export interface ResolvedConfig {
	params: Readonly<ParameterSet>;
	patterns: readonly Pattern[];
}

// --- Defaults ---

export const DEFAULT_PARAMS: ParameterSet = {
	ioengine: "libaio",
	direct: 1,
	buffered: 0,
	blocksize: "4k",
	iodepth: 64,
	runtime: 300,
	numjobs: 1,
	filename: "/tmp/testfile",
	file_size: "1G",
	base_results_dir: "./results",
	latency_threshold: 1.0,
};

export const DEFAULT_PATTERNS: readonly Pattern[] = [
	{ name: "100read_0write", overrides: { rw: "randread", rwmixread: 100 } },
	{ name: "50read_50write", overrides: { rw: "randrw", rwmixread: 50 } },
	{ name: "70read_30write", overrides: { rw: "randrw", rwmixread: 70 } },
	{ name: "0read_100write", overrides: { rw: "randwrite", rwmixread: 0 } },
];
