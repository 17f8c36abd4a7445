import { readFile, rename, writeFile } from "node:fs/promises";
import { ConfigurationError } from "@/errors";
import { formatIssues } from "@/types/issues";
import {
	type ConfigFile,
	ConfigFileSchema,
	type ResolvedConfig,
} from "@/types/params";
import { toConfigFile } from "./resolver";

/**
 * Loads and validates a JSON config file.
 * Unknown keys are rejected so a typo cannot silently fall back to a default.
 */
export async function loadConfigFile(filePath: string): Promise<ConfigFile> {
	let raw: string;
	try {
		raw = await readFile(filePath, "utf-8");
	} catch (err) {
		const message = err instanceof Error ? err.message : String(err);
		throw new ConfigurationError(
			`Cannot read config file ${filePath}: ${message}`,
			{ cause: err },
		);
	}

	let json: unknown;
	try {
		json = JSON.parse(raw);
	} catch (err) {
		const message = err instanceof Error ? err.message : String(err);
		throw new ConfigurationError(
			`Config file ${filePath} is not valid JSON: ${message}`,
			{ cause: err },
		);
	}

	const result = ConfigFileSchema.safeParse(json);
	if (!result.success) {
		throw new ConfigurationError(
			`Config file ${filePath} failed validation:\n${formatIssues(result.error)}`,
		);
	}

	return result.data;
}

/**
 * Writes a resolved config in the config-file format.
 * Loading the file back and resolving it without CLI overrides yields the same config.
 */
export async function writeConfigFile(
	filePath: string,
	config: ResolvedConfig,
): Promise<void> {
	const tempPath = `${filePath}.tmp`;

	const json = JSON.stringify(toConfigFile(config), null, 2);
	await writeFile(tempPath, `${json}\n`, "utf-8");
	await rename(tempPath, filePath);
}
