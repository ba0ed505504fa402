#!/usr/bin/env node
import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { CANONICAL_ROOT_ENV, DEFAULT_CANONICAL_DIR } from "../lib/canonical-paths.js";
import { addRuleCommand } from "./commands/add-rule.js";
import { cleanCommand } from "./commands/clean.js";
import { initCommand } from "./commands/init.js";
import { reconfigureCommand } from "./commands/reconfigure.js";
import { removeRuleCommand } from "./commands/remove-rule.js";
import { setCommand } from "./commands/set.js";
import { statusCommand } from "./commands/status.js";
import { syncCommand } from "./commands/sync.js";

const VERSION = "0.1.0";
const KNOWN_COMMANDS = new Set([
	"init",
	"sync",
	"status",
	"reconfigure",
	"add-rule",
	"remove-rule",
	"set",
	"clean",
]);

function formatError(message: string) {
	if (message.startsWith("Unknown argument:")) {
		const raw = message.replace("Unknown argument:", "").trim();
		const option = raw.startsWith("-") ? raw : `--${raw}`;
		return `Error: Unknown option: ${option}`;
	}

	if (message.startsWith("Not enough non-option arguments")) {
		return "Error: Missing required argument";
	}

	return `Error: ${message}`;
}

function isCommandInvocation(args: string[]): boolean {
	const command = args.find((arg) => !arg.startsWith("-"));
	return command ? KNOWN_COMMANDS.has(command) : false;
}

export function runCli(argv = process.argv) {
	const args = hideBin(argv);
	let handledFailure = false;

	return yargs(args)
		.scriptName("agent-rules-sync")
		.version(VERSION)
		.help()
		.strict()
		.strictCommands()
		.exitProcess(false)
		.fail((msg, err) => {
			if (handledFailure) {
				return;
			}

			handledFailure = true;
			const message = msg || err?.message || "Unknown error";
			console.error(formatError(message));
			const exitCode = isCommandInvocation(args) ? 1 : 2;
			process.exit(exitCode);
		})
		.command(initCommand)
		.command(syncCommand)
		.command(statusCommand)
		.command(reconfigureCommand)
		.command(addRuleCommand)
		.command(removeRuleCommand)
		.command(setCommand)
		.command(cleanCommand)
		.option("dry-run", {
			type: "boolean",
			describe: "Show what would change without touching the filesystem",
		})
		.option("diff", {
			type: "boolean",
			describe: "Print a unified diff for each changed file and skip unchanged ones",
		})
		.option("verbose", {
			type: "boolean",
			describe: "Log every write, backup, and link",
		})
		.option("yes", {
			alias: "y",
			type: "boolean",
			describe: "Accept every default without prompting",
		})
		.option("root", {
			type: "string",
			describe: `Canonical directory (default ~/${DEFAULT_CANONICAL_DIR}, or $${CANONICAL_ROOT_ENV})`,
		})
		.option("json", {
			type: "boolean",
			describe: "Print the summary as JSON",
		})
		.demandCommand(1, "Specify a command")
		.parseAsync();
}

const entry = process.argv[1];
if (entry) {
	const entryUrl = pathToFileURL(realpathSync(entry)).href;
	if (entryUrl === import.meta.url) {
		await runCli();
	}
}
