import { describe, expect, test } from "vitest";
import { ConfigurationError } from "@/errors";
import { formatUsage, parseCliArgs } from "../cli";

const argv = (...args: string[]) => ["node", "rwmix-bench", ...args];

describe("parseCliArgs", () => {
	test("returns empty overrides when no flags are given", () => {
		const cli = parseCliArgs(argv());

		expect(cli).toEqual({ overrides: {}, dryRun: false, help: false, args: [] });
	});

	test("parses string, integer and decimal flags", () => {
		const cli = parseCliArgs(
			argv(
				"--ioengine",
				"io_uring",
				"--blocksize=16k",
				"--iodepth",
				"32",
				"--runtime=60",
				"--latency_threshold",
				"2.5",
				"--filename",
				"/mnt/data/fio.dat",
			),
		);

		expect(cli.overrides).toEqual({
			ioengine: "io_uring",
			blocksize: "16k",
			iodepth: 32,
			runtime: 60,
			latency_threshold: 2.5,
			filename: "/mnt/data/fio.dat",
		});
	});

	test("records the raw arguments", () => {
		const cli = parseCliArgs(argv("--runtime", "10", "--dry-run"));
		expect(cli.args).toEqual(["--runtime", "10", "--dry-run"]);
		expect(cli.dryRun).toBe(true);
	});

	test("parses --config, --help and -h", () => {
		expect(parseCliArgs(argv("--config", "bench.json")).configPath).toBe("bench.json");
		expect(parseCliArgs(argv("--help")).help).toBe(true);
		expect(parseCliArgs(argv("-h")).help).toBe(true);
	});

	test("last occurrence of a flag wins", () => {
		const cli = parseCliArgs(argv("--numjobs", "2", "--numjobs", "4"));
		expect(cli.overrides.numjobs).toBe(4);
	});

	test("keeps out-of-range integers for the resolver to reject", () => {
		expect(parseCliArgs(argv("--direct", "5")).overrides.direct).toBe(5);
	});

	test("rejects non-integer values for integer flags", () => {
		expect(() => parseCliArgs(argv("--iodepth", "deep"))).toThrow(
			'--iodepth expects an integer, got "deep"',
		);
		expect(() => parseCliArgs(argv("--runtime=1.5"))).toThrow(
			'--runtime expects an integer, got "1.5"',
		);
	});

	test("rejects non-numeric latency thresholds", () => {
		expect(() => parseCliArgs(argv("--latency_threshold", "fast"))).toThrow(
			'--latency_threshold expects a number, got "fast"',
		);
	});

	test("rejects a flag without a value", () => {
		expect(() => parseCliArgs(argv("--blocksize"))).toThrow("--blocksize requires a value");
		expect(() => parseCliArgs(argv("--blocksize", "--dry-run"))).toThrow(
			"--blocksize requires a value",
		);
	});

	test("rejects unknown options and positional arguments", () => {
		expect(() => parseCliArgs(argv("--rw", "randread"))).toThrow("Unknown option: --rw");
		expect(() => parseCliArgs(argv("results"))).toThrow("Unexpected argument: results");
	});

	test("throws ConfigurationError", () => {
		expect(() => parseCliArgs(argv("--bogus"))).toThrow(ConfigurationError);
	});
});

describe("formatUsage", () => {
	test("lists every flag", () => {
		const usage = formatUsage();
		for (const flag of [
			"--ioengine",
			"--direct",
			"--buffered",
			"--blocksize",
			"--iodepth",
			"--runtime",
			"--numjobs",
			"--filename",
			"--file_size",
			"--base_results_dir",
			"--latency_threshold",
			"--config",
			"--dry-run",
			"--help",
		]) {
			expect(usage).toContain(flag);
		}
	});
});
