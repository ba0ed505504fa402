import { createInterface } from "node:readline/promises";
import type { DecisionProvider, SelectOption } from "../lib/decisions.js";

type Ask = (prompt: string) => Promise<string>;

export async function withPrompter<T>(fn: (ask: Ask) => Promise<T>): Promise<T> {
	const rl = createInterface({ input: process.stdin, output: process.stderr });
	try {
		return await fn((prompt) => rl.question(prompt));
	} finally {
		rl.close();
	}
}

export async function promptChoice(
	ask: Ask,
	question: string,
	choices: string[],
	defaultValue: string,
): Promise<string> {
	const normalizedChoices = new Map(choices.map((choice) => [choice.toLowerCase(), choice]));
	while (true) {
		const answer = (await ask(question)).trim();
		if (!answer) {
			return defaultValue;
		}
		const match = normalizedChoices.get(answer.toLowerCase());
		if (match) {
			return match;
		}
		console.error(`Please enter one of: ${choices.join(", ")}.`);
	}
}

export async function promptConfirm(
	ask: Ask,
	question: string,
	defaultValue: boolean,
): Promise<boolean> {
	const choices = ["yes", "no"];
	const defaultLabel = defaultValue ? "yes" : "no";
	const answer = await promptChoice(
		ask,
		`${question} (${choices.join("/")}) [${defaultLabel}]: `,
		choices,
		defaultLabel,
	);
	return answer.toLowerCase() === "yes";
}

/**
 * Parses a multi-select answer: comma or space separated option numbers,
 * `all`, or `none`. Returns null when the answer is not understood.
 */
export function parseSelection(answer: string, options: SelectOption[]): string[] | null {
	const normalized = answer.trim().toLowerCase();
	if (normalized === "all") {
		return options.map((option) => option.id);
	}
	if (normalized === "none") {
		return [];
	}
	const picked = new Set<number>();
	for (const token of normalized.split(/[\s,]+/).filter(Boolean)) {
		const index = Number(token);
		if (!Number.isInteger(index) || index < 1 || index > options.length) {
			return null;
		}
		picked.add(index - 1);
	}
	return options.filter((_, index) => picked.has(index)).map((option) => option.id);
}

export async function promptSelectMany(
	ask: Ask,
	question: string,
	options: SelectOption[],
	defaults: string[],
): Promise<string[]> {
	console.error(`\n${question}`);
	options.forEach((option, index) => {
		const marker = defaults.includes(option.id) ? "*" : " ";
		console.error(`  ${index + 1}. [${marker}] ${option.label}`);
	});
	console.error("\n  (* = detected/suggested, press Enter to accept defaults)");
	while (true) {
		const answer = await ask("  Numbers (e.g. 1,3), all, or none: ");
		if (!answer.trim()) {
			return [...defaults];
		}
		const selection = parseSelection(answer, options);
		if (selection) {
			return selection;
		}
		console.error(`Please enter numbers between 1 and ${options.length}.`);
	}
}

export function createTerminalDecisions(): DecisionProvider {
	return {
		interactive: true,
		confirm: (prompt, defaultValue) =>
			withPrompter((ask) => promptConfirm(ask, prompt, defaultValue)),
		selectMany: (prompt, options, defaults) =>
			withPrompter((ask) => promptSelectMany(ask, prompt, options, defaults)),
		ask: (prompt, defaultValue) =>
			withPrompter(async (ask) => {
				const answer = (await ask(`  ${prompt} `)).trim();
				return answer || defaultValue;
			}),
	};
}
