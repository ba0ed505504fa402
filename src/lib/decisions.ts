import type { Logger } from "./logger.js";

export type SelectOption = {
	id: string;
	label: string;
};

/**
 * Answers the questions an operation would otherwise put to a terminal.
 */
export type DecisionProvider = {
	interactive: boolean;
	confirm: (prompt: string, defaultValue: boolean) => Promise<boolean>;
	selectMany: (prompt: string, options: SelectOption[], defaults: string[]) => Promise<string[]>;
	ask: (prompt: string, defaultValue: string) => Promise<string>;
};

export function createAutoConfirmDecisions(logger: Logger): DecisionProvider {
	return {
		interactive: false,
		confirm: async (_prompt, defaultValue) => defaultValue,
		selectMany: async (prompt, options, defaults) => {
			logger.info(prompt);
			for (const id of defaults) {
				const label = options.find((option) => option.id === id)?.label ?? id;
				logger.info(`  [auto] ${label}`);
			}
			return [...defaults];
		},
		ask: async (_prompt, defaultValue) => defaultValue,
	};
}

export type ScriptedAnswers = {
	confirm?: boolean[];
	selectMany?: string[][];
	ask?: string[];
};

// Replays canned answers in order, falling back to the defaults once exhausted.
export function createScriptedDecisions(answers: ScriptedAnswers): DecisionProvider & {
	prompts: string[];
} {
	const confirms = [...(answers.confirm ?? [])];
	const selections = [...(answers.selectMany ?? [])];
	const replies = [...(answers.ask ?? [])];
	const prompts: string[] = [];
	return {
		interactive: true,
		prompts,
		confirm: async (prompt, defaultValue) => {
			prompts.push(prompt);
			return confirms.shift() ?? defaultValue;
		},
		selectMany: async (prompt, _options, defaults) => {
			prompts.push(prompt);
			return selections.shift() ?? [...defaults];
		},
		ask: async (prompt, defaultValue) => {
			prompts.push(prompt);
			return replies.shift() ?? defaultValue;
		},
	};
}
