import type { CommandModule } from "yargs";
import { reconfigureTargets } from "../../lib/operations/reconfigure.js";
import { formatSummary } from "../../lib/sync-results.js";
import { createCommandContext, exitOnRulesSyncError, type GlobalArgs } from "../context.js";

export const reconfigureCommand: CommandModule<Record<string, never>, GlobalArgs> = {
	command: "reconfigure",
	describe: "Choose which agents receive rules and skills, then sync",
	handler: async (argv) => {
		const ctx = createCommandContext("reconfigure", argv);
		ctx.logger.info("=== Reconfigure Sync Targets ===");
		try {
			const { sync } = await reconfigureTargets(ctx);
			console.log(formatSummary(sync, argv.json ?? false));
			if (sync.hadFailures) {
				process.exit(1);
			}
		} catch (error) {
			exitOnRulesSyncError(error);
		}
	},
};
