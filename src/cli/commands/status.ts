import type { CommandModule } from "yargs";
import { formatStatus, showStatus } from "../../lib/operations/status.js";
import { createCommandContext, exitOnRulesSyncError, type GlobalArgs } from "../context.js";

export const statusCommand: CommandModule<Record<string, never>, GlobalArgs> = {
	command: "status",
	describe: "Show rules, active targets, skills, and AGENTS.md paths",
	handler: async (argv) => {
		const ctx = createCommandContext("status", argv);
		try {
			console.log(formatStatus(await showStatus(ctx), argv.json ?? false));
		} catch (error) {
			exitOnRulesSyncError(error);
		}
	},
};
