import { resolveCanonicalPaths } from "../lib/canonical-paths.js";
import { createEngineContext, type EngineContext } from "../lib/engine-context.js";
import { isRulesSyncError } from "../lib/errors.js";
import { createConsoleLogger } from "../lib/logger.js";
import { createTerminalDecisions } from "./prompts.js";

export type GlobalArgs = {
	dryRun?: boolean;
	diff?: boolean;
	verbose?: boolean;
	yes?: boolean;
	root?: string;
	json?: boolean;
};

export function createCommandContext(command: string, argv: GlobalArgs): EngineContext {
	const options = {
		dryRun: argv.dryRun ?? false,
		showDiff: argv.diff ?? false,
		verbose: argv.verbose ?? false,
		autoConfirm: argv.yes ?? false,
	};
	return createEngineContext({
		command,
		paths: resolveCanonicalPaths({ root: argv.root }),
		options,
		logger: createConsoleLogger({ verbose: options.verbose, jsonOutput: argv.json ?? false }),
		decisions: createTerminalDecisions(),
	});
}

// Known failures end the process with their exit code; anything else propagates.
export function exitOnRulesSyncError(error: unknown): void {
	if (!isRulesSyncError(error)) {
		throw error;
	}
	console.error(`Error: ${error.message}`);
	process.exit(error.exitCode);
}
