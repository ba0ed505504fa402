import os from "node:os";
import path from "node:path";
import { UnknownConsumerError } from "../errors.js";

export const CONSUMER_IDS = [
	"cursor",
	"codex",
	"claude",
	"gemini",
	"kiro",
	"antigravity",
	"agents-md",
] as const;

export type ConsumerId = (typeof CONSUMER_IDS)[number];

export type RulesOutput =
	| { kind: "per-file"; rulesDir: string; extension: string }
	| { kind: "concatenated"; rulesFile: string; headed: boolean }
	| { kind: "summary" }
	| { kind: "skills-only" };

export type ImportSource =
	| { kind: "per-file-frontmatter"; rulesDir: string; extension: string }
	| { kind: "source-sections"; rulesFile: string }
	| { kind: "heading-sections"; rulesFile: string }
	| { kind: "flat-directory"; rulesDir: string; extension: string };

export type ConsumerDefinition = {
	id: ConsumerId;
	label: string;
	description: string;
	rules: RulesOutput;
	skillsDir?: string;
	importSource?: ImportSource;
};

export type ResolvedConsumer = ConsumerDefinition;

// Paths are templates over {homeDir}; they resolve each time a consumer is looked up.
export const BUILTIN_CONSUMERS: readonly ConsumerDefinition[] = [
	{
		id: "cursor",
		label: "Cursor",
		description: "rules as .mdc + skill symlinks",
		rules: { kind: "per-file", rulesDir: "{homeDir}/.cursor/rules", extension: ".mdc" },
		skillsDir: "{homeDir}/.cursor/skills",
		importSource: {
			kind: "per-file-frontmatter",
			rulesDir: "{homeDir}/.cursor/rules",
			extension: ".mdc",
		},
	},
	{
		id: "codex",
		label: "Codex",
		description: "rules as model-instructions.md + skill symlinks",
		rules: {
			kind: "concatenated",
			rulesFile: "{homeDir}/.codex/model-instructions.md",
			headed: true,
		},
		skillsDir: "{homeDir}/.codex/skills",
		importSource: { kind: "source-sections", rulesFile: "{homeDir}/.codex/model-instructions.md" },
	},
	{
		id: "claude",
		label: "Claude Code",
		description: "rules as CLAUDE.md",
		rules: { kind: "concatenated", rulesFile: "{homeDir}/.claude/CLAUDE.md", headed: false },
		importSource: { kind: "heading-sections", rulesFile: "{homeDir}/.claude/CLAUDE.md" },
	},
	{
		id: "gemini",
		label: "Gemini CLI",
		description: "rules as GEMINI.md + skill symlinks",
		rules: { kind: "concatenated", rulesFile: "{homeDir}/.gemini/GEMINI.md", headed: false },
		skillsDir: "{homeDir}/.gemini/skills",
		importSource: { kind: "heading-sections", rulesFile: "{homeDir}/.gemini/GEMINI.md" },
	},
	{
		id: "kiro",
		label: "Kiro",
		description: "rules as steering/conventions.md",
		rules: {
			kind: "concatenated",
			rulesFile: "{homeDir}/.kiro/steering/conventions.md",
			headed: false,
		},
		importSource: {
			kind: "flat-directory",
			rulesDir: "{homeDir}/.kiro/steering",
			extension: ".md",
		},
	},
	{
		id: "antigravity",
		label: "Antigravity",
		description: "skill symlinks only",
		rules: { kind: "skills-only" },
		skillsDir: "{homeDir}/.gemini/antigravity/skills",
	},
	{
		id: "agents-md",
		label: "AGENTS.md",
		description: "condensed rules for cross-tool standard",
		rules: { kind: "summary" },
	},
];

const CONSUMER_ID_SET = new Set<string>(CONSUMER_IDS);

export function isConsumerId(value: string): value is ConsumerId {
	return CONSUMER_ID_SET.has(value);
}

function resolveTemplate(template: string, homeDir: string): string {
	return path.normalize(template.replace(/\{homeDir\}/g, homeDir));
}

function resolveRulesOutput(rules: RulesOutput, homeDir: string): RulesOutput {
	switch (rules.kind) {
		case "per-file":
			return { ...rules, rulesDir: resolveTemplate(rules.rulesDir, homeDir) };
		case "concatenated":
			return { ...rules, rulesFile: resolveTemplate(rules.rulesFile, homeDir) };
		default:
			return rules;
	}
}

function resolveImportSource(source: ImportSource, homeDir: string): ImportSource {
	switch (source.kind) {
		case "per-file-frontmatter":
		case "flat-directory":
			return { ...source, rulesDir: resolveTemplate(source.rulesDir, homeDir) };
		case "source-sections":
		case "heading-sections":
			return { ...source, rulesFile: resolveTemplate(source.rulesFile, homeDir) };
	}
}

export function resolveConsumer(
	definition: ConsumerDefinition,
	homeDir: string = os.homedir(),
): ResolvedConsumer {
	return {
		...definition,
		rules: resolveRulesOutput(definition.rules, homeDir),
		skillsDir: definition.skillsDir ? resolveTemplate(definition.skillsDir, homeDir) : undefined,
		importSource: definition.importSource
			? resolveImportSource(definition.importSource, homeDir)
			: undefined,
	};
}

export function getConsumer(id: string, homeDir: string = os.homedir()): ResolvedConsumer {
	const definition = BUILTIN_CONSUMERS.find((consumer) => consumer.id === id);
	if (!definition) {
		throw new UnknownConsumerError(id, CONSUMER_IDS);
	}
	return resolveConsumer(definition, homeDir);
}

export function listConsumers(homeDir: string = os.homedir()): ResolvedConsumer[] {
	return BUILTIN_CONSUMERS.map((definition) => resolveConsumer(definition, homeDir));
}

export const RULE_TARGET_IDS: readonly ConsumerId[] = BUILTIN_CONSUMERS.filter(
	(consumer) => consumer.rules.kind !== "skills-only",
).map((consumer) => consumer.id);

export const SKILL_TARGET_IDS: readonly ConsumerId[] = BUILTIN_CONSUMERS.filter((consumer) =>
	Boolean(consumer.skillsDir),
).map((consumer) => consumer.id);

export const IMPORT_SOURCE_IDS: readonly ConsumerId[] = BUILTIN_CONSUMERS.filter((consumer) =>
	Boolean(consumer.importSource),
).map((consumer) => consumer.id);

export function formatConsumerOption(consumer: ConsumerDefinition): string {
	return `${consumer.label}  (${consumer.description})`;
}
