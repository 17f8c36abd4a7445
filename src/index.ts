import { parseCliArgs } from "@/config";
import { describeError, exitCodeFor } from "@/errors";
import { runFromCli } from "@/runner/orchestrator";

async function main(): Promise<void> {
	const cli = parseCliArgs(process.argv);
	process.exitCode = await runFromCli(cli);
}

main().catch((err) => {
	console.error(describeError(err));
	process.exit(exitCodeFor(err));
});
