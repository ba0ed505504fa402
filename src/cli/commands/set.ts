import type { CommandModule } from "yargs";
import { SETTABLE_KEYS } from "../../lib/manifest/settable-keys.js";
import { setManifestKey } from "../../lib/operations/settings.js";
import { createCommandContext, exitOnRulesSyncError, type GlobalArgs } from "../context.js";

type SetArgs = GlobalArgs & {
	key?: string;
	value?: string;
};

export const setCommand: CommandModule<Record<string, never>, SetArgs> = {
	command: "set <key> <value>",
	describe: "Update a manifest setting",
	builder: (yargs) =>
		yargs
			.positional("key", {
				type: "string",
				describe: `Setting to change (${SETTABLE_KEYS.join(", ")})`,
			})
			.positional("value", {
				type: "string",
				describe: "New value; list settings take comma-separated values",
			}),
	handler: async (argv) => {
		if (!argv.key || argv.value === undefined) {
			console.error("Error: Missing required argument: key or value");
			process.exit(1);
			return;
		}
		const ctx = createCommandContext("set", argv);
		try {
			await setManifestKey(ctx, argv.key, String(argv.value));
		} catch (error) {
			exitOnRulesSyncError(error);
		}
	},
};
