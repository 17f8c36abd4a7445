export type { CliConfig, CliOverrides } from "./cli";
export { formatUsage, parseCliArgs } from "./cli";
export { loadConfigFile, writeConfigFile } from "./config-file";
export type { ConfigDefaults } from "./resolver";
export {
	BUILTIN_DEFAULTS,
	RESERVED_OVERRIDE_KEYS,
	resolveConfig,
	toConfigFile,
} from "./resolver";
