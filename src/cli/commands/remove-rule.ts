import type { CommandModule } from "yargs";
import { removeRule } from "../../lib/operations/rules.js";
import { formatSummary } from "../../lib/sync-results.js";
import { createCommandContext, exitOnRulesSyncError, type GlobalArgs } from "../context.js";

type RemoveRuleArgs = GlobalArgs & {
	id?: string;
};

export const removeRuleCommand: CommandModule<Record<string, never>, RemoveRuleArgs> = {
	command: "remove-rule <id>",
	describe: "Delete a canonical rule and sync",
	builder: (yargs) =>
		yargs.positional("id", {
			type: "string",
			describe: "Rule id to remove",
		}),
	handler: async (argv) => {
		if (!argv.id) {
			console.error("Error: Missing required argument: id");
			process.exit(1);
			return;
		}
		const ctx = createCommandContext("remove-rule", argv);
		try {
			const { sync } = await removeRule(ctx, argv.id);
			if (sync) {
				console.log(formatSummary(sync, argv.json ?? false));
				if (sync.hadFailures) {
					process.exit(1);
				}
			}
		} catch (error) {
			exitOnRulesSyncError(error);
		}
	},
};
