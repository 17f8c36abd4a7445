import Papa from "papaparse";

// --- Types ---

/** fio log direction column: 0 = read, 1 = write, 2 = trim */
export type FioLogDirection = 0 | 1 | 2;

/**
 * One line of a fio iops/lat/bw log:
 * `time (ms), value, data direction, block size[, offset[, priority]]`.
 * For latency logs the value is in nanoseconds.
 */
export interface FioLogSample {
	timeMs: number;
	value: number;
	direction: FioLogDirection;
	blockSize: number;
}

// --- Parsing ---

function toDirection(value: number): FioLogDirection | null {
	if (value === 0 || value === 1 || value === 2) return value;
	return null;
}

/**
 * Parses the text of a fio log file. Lines that do not carry at least the
 * time, value and direction columns as numbers are skipped.
 */
export function parseFioLog(text: string): FioLogSample[] {
	const parsed = Papa.parse<string[]>(text, {
		header: false,
		delimiter: ",",
		skipEmptyLines: true,
	});

	const samples: FioLogSample[] = [];
	for (const row of parsed.data) {
		const [timeMs, value, ddir, blockSize] = row.map((field) =>
			Number(field.trim()),
		);
		if (
			timeMs === undefined ||
			value === undefined ||
			ddir === undefined ||
			!Number.isFinite(timeMs) ||
			!Number.isFinite(value)
		) {
			continue;
		}
		const direction = toDirection(ddir);
		if (direction === null) continue;

		samples.push({
			timeMs,
			value,
			direction,
			blockSize:
				blockSize !== undefined && Number.isFinite(blockSize) ? blockSize : 0,
		});
	}

	return samples;
}

/**
 * Returns the distinct seconds at which a latency log exceeded the threshold.
 */
export function findLatencySpikes(
	latencySamples: FioLogSample[],
	thresholdMs: number,
): number[] {
	const seconds = new Set<number>();
	for (const sample of latencySamples) {
		if (sample.value / 1_000_000 > thresholdMs) {
			seconds.add(sample.timeMs / 1000);
		}
	}
	return [...seconds].sort((a, b) => a - b);
}
