import type { CommandModule } from "yargs";
import { formatCleanSummary, runClean } from "../../lib/clean/run.js";
import { createCommandContext, exitOnRulesSyncError, type GlobalArgs } from "../context.js";

export const cleanCommand: CommandModule<Record<string, never>, GlobalArgs> = {
	command: "clean",
	describe: "Remove generated files and skill links, restoring backed-up originals",
	handler: async (argv) => {
		const ctx = createCommandContext("clean", argv);
		try {
			const summary = await runClean(ctx);
			if (argv.json) {
				console.log(JSON.stringify(summary, null, 2));
				return;
			}
			console.log(formatCleanSummary(summary));
		} catch (error) {
			exitOnRulesSyncError(error);
		}
	},
};
