import { mkdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { ConfigurationError } from "@/errors";
import { DEFAULT_PARAMS, DEFAULT_PATTERNS } from "@/types/params";
import { loadConfigFile, writeConfigFile } from "../config-file";
import { BUILTIN_DEFAULTS, resolveConfig, toConfigFile } from "../resolver";

let tempDir: string;

beforeEach(async () => {
	tempDir = join(
		tmpdir(),
		`resolver-test-${Date.now()}-${Math.random().toString(36).slice(2)}`,
	);
	await mkdir(tempDir, { recursive: true });
});

afterEach(async () => {
	await rm(tempDir, { recursive: true, force: true });
});

// --- Precedence ---

describe("resolveConfig precedence", () => {
	test("uses built-in defaults when nothing else is given", () => {
		const config = resolveConfig(BUILTIN_DEFAULTS, null, {});

		expect(config.params).toEqual(DEFAULT_PARAMS);
		expect(config.patterns.map((p) => p.name)).toEqual([
			"100read_0write",
			"50read_50write",
			"70read_30write",
			"0read_100write",
		]);
	});

	test("config file overrides defaults and CLI overrides the file", () => {
		const config = resolveConfig(
			BUILTIN_DEFAULTS,
			{ blocksize: "8k", iodepth: 16, runtime: 30 },
			{ blocksize: "64k" },
		);

		expect(config.params.blocksize).toBe("64k");
		expect(config.params.iodepth).toBe(16);
		expect(config.params.runtime).toBe(30);
		expect(config.params.ioengine).toBe("libaio");
	});

	test("patterns from the config file replace the defaults", () => {
		const config = resolveConfig(
			BUILTIN_DEFAULTS,
			{
				patterns: [
					["seqread", { rw: "read", bs: "1M" }],
					["randwrite", { rw: "randwrite" }],
				],
			},
			{},
		);

		expect(config.patterns).toEqual([
			{ name: "seqread", overrides: { rw: "read", bs: "1M" } },
			{ name: "randwrite", overrides: { rw: "randwrite" } },
		]);
	});

	test("returns a frozen configuration", () => {
		const config = resolveConfig(BUILTIN_DEFAULTS, null, {});

		expect(Object.isFrozen(config.params)).toBe(true);
		expect(Object.isFrozen(config.patterns)).toBe(true);
		expect(Object.isFrozen(config.patterns[0]?.overrides)).toBe(true);
	});
});

// --- Validation ---

describe("resolveConfig validation", () => {
	test("reports every parameter missing from all layers", () => {
		expect(() =>
			resolveConfig(
				{ params: {}, patterns: DEFAULT_PATTERNS },
				{
					ioengine: "sync",
					direct: 0,
					buffered: 1,
					blocksize: "4k",
					iodepth: 1,
					runtime: 10,
					numjobs: 1,
					filename: "/tmp/f",
					base_results_dir: "./out",
				},
				{},
			),
		).toThrow("Missing required parameter(s): file_size, latency_threshold");
	});

	test("rejects out-of-range values", () => {
		expect(() => resolveConfig(BUILTIN_DEFAULTS, null, { iodepth: 0 })).toThrow(
			/^Invalid parameters:\n {2}- iodepth: /,
		);
		expect(() => resolveConfig(BUILTIN_DEFAULTS, null, { direct: 5 })).toThrow(
			/- direct: /,
		);
	});

	test("rejects a malformed size", () => {
		expect(() =>
			resolveConfig(BUILTIN_DEFAULTS, null, { file_size: "lots" }),
		).toThrow("- file_size: expected a size such as 512, 4k, 1G or 50%");
		expect(() =>
			resolveConfig(BUILTIN_DEFAULTS, null, { blocksize: "4k,16k,8k,2k" }),
		).toThrow("- blocksize: expected a block size such as 4k, 4k-16k or 4k,16k");
		expect(() =>
			resolveConfig(BUILTIN_DEFAULTS, null, { blocksize: "," }),
		).toThrow("- blocksize: expected at least one block size");
	});

	test("accepts fio's split, range and percentage sizes", () => {
		for (const blocksize of ["4k,16k", ",8k", "4k-16k", "4k,16k,4k", "1MiB", "512"]) {
			expect(resolveConfig(BUILTIN_DEFAULTS, null, { blocksize }).params.blocksize).toBe(
				blocksize,
			);
		}
		expect(
			resolveConfig(BUILTIN_DEFAULTS, null, { file_size: "50%" }).params.file_size,
		).toBe("50%");
	});

	test("rejects direct and buffered set to the same value", () => {
		expect(() =>
			resolveConfig(BUILTIN_DEFAULTS, null, { direct: 1, buffered: 1 }),
		).toThrow(
			"Inconsistent IO mode: direct=1 and buffered=1; set exactly one of them to 1",
		);
		expect(() =>
			resolveConfig(BUILTIN_DEFAULTS, null, { direct: 0, buffered: 0 }),
		).toThrow(ConfigurationError);
	});

	test("accepts buffered IO when direct is off", () => {
		const config = resolveConfig(BUILTIN_DEFAULTS, null, { direct: 0, buffered: 1 });
		expect(config.params.direct).toBe(0);
		expect(config.params.buffered).toBe(1);
	});

	test("rejects an empty pattern list from the defaults", () => {
		expect(() =>
			resolveConfig({ params: DEFAULT_PARAMS, patterns: [] }, null, {}),
		).toThrow("At least one pattern is required");
	});

	test("rejects duplicate pattern names", () => {
		expect(() =>
			resolveConfig(
				BUILTIN_DEFAULTS,
				{
					patterns: [
						["mix", { rw: "randrw" }],
						["mix", { rw: "randread" }],
					],
				},
				{},
			),
		).toThrow('Duplicate pattern name "mix"');
	});

	test("rejects overrides of options the runner controls", () => {
		expect(() =>
			resolveConfig(
				BUILTIN_DEFAULTS,
				{ patterns: [["mix", { rw: "randrw", output: "/tmp/x", filename: "/dev/sda" }]] },
				{},
			),
		).toThrow('Pattern "mix" overrides reserved option(s): output, filename');
	});
});

// --- Config File ---

describe("loadConfigFile", () => {
	test("loads a valid config file", async () => {
		const filePath = join(tempDir, "bench.json");
		await writeFile(
			filePath,
			JSON.stringify({ runtime: 60, patterns: [["seq", { rw: "read" }]] }),
			"utf-8",
		);

		expect(await loadConfigFile(filePath)).toEqual({
			runtime: 60,
			patterns: [["seq", { rw: "read" }]],
		});
	});

	test("fails for a missing file", async () => {
		const filePath = join(tempDir, "missing.json");
		await expect(loadConfigFile(filePath)).rejects.toThrow(
			`Cannot read config file ${filePath}: `,
		);
	});

	test("fails for invalid JSON", async () => {
		const filePath = join(tempDir, "broken.json");
		await writeFile(filePath, "{ runtime: ", "utf-8");

		await expect(loadConfigFile(filePath)).rejects.toThrow(
			`Config file ${filePath} is not valid JSON: `,
		);
	});

	test("rejects unknown keys", async () => {
		const filePath = join(tempDir, "typo.json");
		await writeFile(filePath, JSON.stringify({ runtim: 60 }), "utf-8");

		const error = await loadConfigFile(filePath).catch((err: unknown) => err);
		expect(error).toBeInstanceOf(ConfigurationError);
		expect(error instanceof Error && error.message).toContain(
			`Config file ${filePath} failed validation:`,
		);
		expect(error instanceof Error && error.message).toContain("runtim");
	});

	test("rejects an invalid pattern name", async () => {
		const filePath = join(tempDir, "pattern.json");
		await writeFile(
			filePath,
			JSON.stringify({ patterns: [["../escape", { rw: "read" }]] }),
			"utf-8",
		);

		await expect(loadConfigFile(filePath)).rejects.toThrow(
			"pattern names may only contain letters, digits, '.', '_' and '-'",
		);
	});
});

describe("writeConfigFile", () => {
	test("round-trips through loadConfigFile and resolveConfig", async () => {
		const written = resolveConfig(
			BUILTIN_DEFAULTS,
			{ patterns: [["seq", { rw: "read", bs: "128k" }]] },
			{ iodepth: 8, latency_threshold: 2.5 },
		);
		const filePath = join(tempDir, "config.json");

		await writeConfigFile(filePath, written);
		const reloaded = resolveConfig(
			BUILTIN_DEFAULTS,
			await loadConfigFile(filePath),
			{},
		);

		expect(reloaded).toEqual(written);
	});

	test("writes every parameter and the pattern list", () => {
		const file = toConfigFile(resolveConfig(BUILTIN_DEFAULTS, null, {}));

		expect(file).toEqual({
			...DEFAULT_PARAMS,
			patterns: [
				["100read_0write", { rw: "randread", rwmixread: 100 }],
				["50read_50write", { rw: "randrw", rwmixread: 50 }],
				["70read_30write", { rw: "randrw", rwmixread: 70 }],
				["0read_100write", { rw: "randwrite", rwmixread: 0 }],
			],
		});
	});
});
