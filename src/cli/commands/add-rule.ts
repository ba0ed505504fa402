import type { CommandModule } from "yargs";
import { splitListValue } from "../../lib/manifest/settable-keys.js";
import { addRule } from "../../lib/operations/rules.js";
import { formatSummary } from "../../lib/sync-results.js";
import { createCommandContext, exitOnRulesSyncError, type GlobalArgs } from "../context.js";

type AddRuleArgs = GlobalArgs & {
	id?: string;
	file?: string;
	description?: string;
	alwaysApply?: boolean;
	exclude?: string;
};

export const addRuleCommand: CommandModule<Record<string, never>, AddRuleArgs> = {
	command: "add-rule <id>",
	describe: "Create a new canonical rule and sync it",
	builder: (yargs) =>
		yargs
			.positional("id", {
				type: "string",
				describe: "Rule id (lowercase words joined by hyphens)",
			})
			.option("file", {
				type: "string",
				describe: "Read the rule body from this file",
			})
			.option("description", {
				type: "string",
				describe: "One-line description used by Cursor and AGENTS.md",
			})
			.option("always-apply", {
				type: "boolean",
				default: true,
				describe: "Mark the rule as always applied (--no-always-apply to disable)",
			})
			.option("exclude", {
				type: "string",
				describe: "Comma-separated agents that should not receive this rule",
			}),
	handler: async (argv) => {
		if (!argv.id) {
			console.error("Error: Missing required argument: id");
			process.exit(1);
			return;
		}
		const ctx = createCommandContext("add-rule", argv);
		try {
			const { sync } = await addRule(ctx, {
				id: argv.id,
				file: argv.file,
				description: argv.description,
				alwaysApply: argv.alwaysApply ?? true,
				exclude: argv.exclude ? splitListValue(argv.exclude) : [],
			});
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
