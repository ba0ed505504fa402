import type { CommandModule } from "yargs";
import { initFromSources } from "../../lib/operations/init.js";
import { formatSummary } from "../../lib/sync-results.js";
import { createCommandContext, exitOnRulesSyncError, type GlobalArgs } from "../context.js";

export const initCommand: CommandModule<Record<string, never>, GlobalArgs> = {
	command: "init",
	describe: "Import existing agent rules and skills into the canonical store",
	handler: async (argv) => {
		const ctx = createCommandContext("init", argv);
		ctx.logger.info("=== AI Agent Rules - First-Time Setup ===");
		try {
			const outcome = await initFromSources(ctx);
			if (outcome.status === "aborted") {
				return;
			}
			if (outcome.sync) {
				console.log(formatSummary(outcome.sync, argv.json ?? false));
				if (outcome.sync.hadFailures) {
					process.exit(1);
				}
			}
		} catch (error) {
			exitOnRulesSyncError(error);
		}
	},
};
