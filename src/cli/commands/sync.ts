import type { CommandModule } from "yargs";
import { CONSUMER_IDS } from "../../lib/consumers/registry.js";
import { runSync } from "../../lib/sync/run.js";
import { formatSummary } from "../../lib/sync-results.js";
import { createCommandContext, exitOnRulesSyncError, type GlobalArgs } from "../context.js";

type SyncArgs = GlobalArgs & {
	only?: string;
};

export const syncCommand: CommandModule<Record<string, never>, SyncArgs> = {
	command: "sync",
	describe: "Regenerate rules and skill links for every active target",
	builder: (yargs) =>
		yargs.usage("agent-rules-sync sync [options]").option("only", {
			type: "string",
			describe: `Sync a single agent (${CONSUMER_IDS.join(", ")})`,
			coerce: (value) => {
				if (typeof value !== "string") {
					return value;
				}
				const trimmed = value.trim();
				return trimmed.length > 0 ? trimmed : undefined;
			},
		}),
	handler: async (argv) => {
		const ctx = createCommandContext("sync", argv);
		try {
			const summary = await runSync(ctx, { only: argv.only });
			console.log(formatSummary(summary, argv.json ?? false));
			if (summary.hadFailures) {
				process.exit(1);
			}
		} catch (error) {
			exitOnRulesSyncError(error);
		}
	},
};
